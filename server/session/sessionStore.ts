import { SESSION_CONSTANTS } from "../config/constants";
import { NotFoundError } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import { SessionState } from "./sessionState";

type SessionEntry = {
  session: SessionState;
  lastSeen: number;
};

/**
 * In-process session registry for the HTTP surface. Nothing is persisted;
 * sessions idle for longer than `idleTtlMs` are evicted, except while a
 * turn is running on them.
 */
export class SessionStore {
  private sessions = new Map<string, SessionEntry>();

  constructor(
    private readonly idleTtlMs: number = SESSION_CONSTANTS.IDLE_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  create(): SessionState {
    this.evictIdle();
    const session = new SessionState();
    this.sessions.set(session.id, { session, lastSeen: this.now() });
    logInfo(`[Sessions] Session created`, { active: this.size });
    return session;
  }

  get(id: string): SessionState {
    this.evictIdle();
    const entry = this.sessions.get(id);
    if (!entry) throw new NotFoundError("Session");
    entry.lastSeen = this.now();
    return entry.session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  evictIdle(): number {
    const cutoff = this.now() - this.idleTtlMs;
    let evicted = 0;
    for (const [id, entry] of this.sessions) {
      if (entry.lastSeen < cutoff && !entry.session.turnInProgress) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      logInfo(`[Sessions] Evicted idle sessions`, { evicted, active: this.size });
    }
    return evicted;
  }
}
