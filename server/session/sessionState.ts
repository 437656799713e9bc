/**
 * Session Conversation State
 *
 * Explicit per-session state owned by the caller (HTTP layer or UI) and
 * passed into every turn: the ordered turn log, whether a schedule PDF has
 * been uploaded, and the token the UI uses to reset its file picker.
 */

import { v4 as uuidv4 } from "uuid";
import type { AttachedFile, Citation, ConversationTurn, TurnRole } from "@shared/schema";
import type { DraftingInputMessage } from "../drafting/orchestrator";

function freezeTurn(
  role: TurnRole,
  content: string,
  attachedFiles: readonly AttachedFile[],
  citations: readonly Citation[],
): ConversationTurn {
  return Object.freeze({
    role,
    content,
    attachedFiles: Object.freeze([...attachedFiles]),
    citations: Object.freeze([...citations]),
  });
}

export class SessionState {
  readonly id: string;
  readonly createdAt: Date;
  private turns: ConversationTurn[] = [];
  private _scheduleUploaded = false;
  private _uploaderToken: string;
  private _turnInProgress = false;

  constructor(id: string = uuidv4()) {
    this.id = id;
    this.createdAt = new Date();
    this._uploaderToken = uuidv4();
  }

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }

  get turnCount(): number {
    return this.turns.length;
  }

  get scheduleUploaded(): boolean {
    return this._scheduleUploaded;
  }

  get uploaderToken(): string {
    return this._uploaderToken;
  }

  get turnInProgress(): boolean {
    return this._turnInProgress;
  }

  /** Claim the session for one turn. False while another turn is still running. */
  beginTurn(): boolean {
    if (this._turnInProgress) return false;
    this._turnInProgress = true;
    return true;
  }

  endTurn(): void {
    this._turnInProgress = false;
  }

  appendUserTurn(content: string, attachedFiles: readonly AttachedFile[] = []): ConversationTurn {
    const turn = freezeTurn("user", content, attachedFiles, []);
    this.turns.push(turn);
    return turn;
  }

  appendAssistantTurn(
    content: string,
    attachedFiles: readonly AttachedFile[] = [],
    citations: readonly Citation[] = [],
  ): ConversationTurn {
    const turn = freezeTurn("assistant", content, attachedFiles, citations);
    this.turns.push(turn);
    return turn;
  }

  markScheduleUploaded(): void {
    this._scheduleUploaded = true;
  }

  /** New token after each submitted turn so the UI clears its file picker */
  rotateUploaderToken(): string {
    this._uploaderToken = uuidv4();
    return this._uploaderToken;
  }

  /**
   * Transcript replayed into the drafting call: role and text only, in
   * insertion order. Attached bytes and citations stay local.
   */
  toDraftingInput(): DraftingInputMessage[] {
    return this.turns.map((turn) => ({ role: turn.role, content: turn.content }));
  }

  clear(): void {
    this.turns = [];
    this._scheduleUploaded = false;
    this.rotateUploaderToken();
  }
}
