import { describe, it, expect, vi, beforeEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { getProfile } from "../config/profiles";
import { ArtifactResolver } from "../drafting/artifactResolver";
import { DraftingOrchestrator, type DraftingBackend, type DraftingRequest } from "../drafting/orchestrator";
import { DocumentExtractor, type DocumentUnderstandingBackend, type UploadedDocumentRef } from "../extraction/documentExtractor";
import { KnowledgeStoreRegistry } from "../knowledge/knowledgeStoreRegistry";
import type { KnowledgeStoreBackend } from "../knowledge/openaiStoreBackend";
import { SessionState } from "../session/sessionState";
import { processTurn, TURN_IN_PROGRESS_MESSAGE, type TurnReporter } from "../session/turnPipeline";

vi.spyOn(console, "log").mockImplementation(() => {});
vi.spyOn(console, "warn").mockImplementation(() => {});
vi.spyOn(console, "error").mockImplementation(() => {});

const profile = getProfile("bankruptcy_motion");

async function* streamOf(events: unknown[]): AsyncGenerator<unknown> {
  for (const event of events) {
    yield event;
  }
}

function answerStream(text: string) {
  return streamOf([
    { type: "response.created", response: { id: "resp_1" } },
    { type: "response.output_text.delta", delta: text },
    { type: "response.completed", response: { id: "resp_1", output: [] } },
  ]);
}

function recordingReporter() {
  const events: string[] = [];
  const reporter: TurnReporter = {
    onProgress: (message) => events.push(`progress:${message}`),
    onTextDelta: (delta) => events.push(`delta:${delta}`),
    onWarning: (message) => events.push(`warning:${message}`),
    onError: (message) => events.push(`error:${message}`),
  };
  return { reporter, events };
}

function setup(options: { stores?: Record<string, string>; dispatchError?: Error } = {}) {
  const extractionBackend: DocumentUnderstandingBackend = {
    upload: vi.fn(async (_bytes: Buffer, mimeType: string, filename: string): Promise<UploadedDocumentRef> => ({
      uri: `gs://uploads/${filename}`,
      mimeType,
      name: filename,
    })),
    generate: vi.fn(async (_prompt: string, document: UploadedDocumentRef) =>
      document.name === "schedule.pdf" ? "Creditor: Example Bank" : "NO_RELEVANT_INFO"),
  };

  const requests: DraftingRequest[] = [];
  const draftingBackend = {
    createStreamingResponse: vi.fn(async (request: DraftingRequest): Promise<AsyncIterable<unknown>> => {
      requests.push(request);
      if (options.dispatchError) throw options.dispatchError;
      return answerStream("MOTION TO VALUE SECURED CLAIM");
    }),
    retrieveResponse: vi.fn(async (): Promise<unknown> => ({ id: "resp_1", output: [] })),
  } satisfies DraftingBackend;

  const stores = options.stores ?? { value_claim: "vs_value", avoid_lien: "vs_lien" };
  const deps = {
    profile,
    registry: { get: (category: string) => stores[category] },
    extractor: new DocumentExtractor(extractionBackend, profile.extractionPrompt),
    orchestrator: new DraftingOrchestrator({
      backend: draftingBackend,
      artifactResolver: new ArtifactResolver({ apiKey: () => "test-secret", fetchImpl: vi.fn() }),
      systemInstructions: "SYSTEM",
    }),
  };

  return { deps, requests, extractionBackend, draftingBackend };
}

describe("processTurn", () => {
  let session: SessionState;

  beforeEach(() => {
    session = new SessionState("session-1");
  });

  it("extracts uploads, assembles context and records both turns", async () => {
    const { deps, requests } = setup();
    const { reporter, events } = recordingReporter();
    const uploads = [
      { filename: "schedule.pdf", bytes: Buffer.from("schedule") },
      { filename: "notes.txt", bytes: Buffer.from("notes") },
    ];
    const tokenBefore = session.uploaderToken;

    const outcome = await processTurn(session, {
      prompt: "Draft a motion to value the car loan",
      categorySlug: "value_claim",
      jurisdiction: "N.D. Cal.",
      subClassification: "13",
      uploads,
    }, deps, reporter);

    const expectedContext = [
      "Motion type: Motion to Value Secured Claim",
      "Jurisdiction: N.D. Cal.",
      "Chapter: 13",
      "EXTRACTED_FROM_UPLOAD File name (schedule.pdf):",
      "Creditor: Example Bank",
    ].join("\n");

    expect(outcome.status).toBe("completed");
    if (outcome.status === "rejected") return;
    expect(outcome.contextBlock).toBe(expectedContext);
    expect(outcome.assistantTurn.content).toBe("MOTION TO VALUE SECURED CLAIM");
    expect(outcome.uploaderToken).not.toBe(tokenBefore);

    expect(requests).toHaveLength(1);
    expect(requests[0].input).toEqual([
      { role: "system", content: "SYSTEM" },
      { role: "system", content: expectedContext },
      { role: "user", content: "Draft a motion to value the car loan" },
    ]);
    expect(requests[0].tools[0]).toEqual({ type: "file_search", vector_store_ids: ["vs_value"] });

    expect(session.history.map((turn) => [turn.role, turn.content])).toEqual([
      ["user", "Draft a motion to value the car loan"],
      ["assistant", "MOTION TO VALUE SECURED CLAIM"],
    ]);
    expect(session.history[0].attachedFiles).toEqual(uploads);
    expect(session.scheduleUploaded).toBe(true);
    expect(events).toEqual([
      "progress:Reading schedule.pdf …",
      "progress:Reading notes.txt …",
      "progress:Extraction complete",
      "delta:MOTION TO VALUE SECURED CLAIM",
    ]);
  });

  it("replays earlier turns into later requests", async () => {
    const { deps, requests, extractionBackend } = setup();
    const { reporter } = recordingReporter();
    const submission = { prompt: "First", categorySlug: "avoid_lien", uploads: [] };

    await processTurn(session, submission, deps, reporter);
    await processTurn(session, { ...submission, prompt: "Second" }, deps, reporter);

    expect(requests[1].input.slice(2)).toEqual([
      { role: "user", content: "First" },
      { role: "assistant", content: "MOTION TO VALUE SECURED CLAIM" },
      { role: "user", content: "Second" },
    ]);
    expect(requests[1].input[1].content).toBe(
      "Motion type: Motion to Avoid Judicial Lien\nJurisdiction: (unspecified)\nChapter: (unspecified)",
    );
    expect(session.scheduleUploaded).toBe(false);
    expect(extractionBackend.upload).not.toHaveBeenCalled();
  });

  it("rejects a turn without a category", async () => {
    const { deps, requests, extractionBackend } = setup();
    const { reporter, events } = recordingReporter();

    const outcome = await processTurn(session, {
      prompt: "Draft",
      uploads: [{ filename: "schedule.pdf", bytes: Buffer.from("x") }],
    }, deps, reporter);

    expect(outcome).toEqual({ status: "rejected", reason: "Please select a motion type to enable chat." });
    expect(events).toEqual(["error:Please select a motion type to enable chat."]);
    expect(session.history).toEqual([]);
    expect(requests).toEqual([]);
    expect(extractionBackend.upload).not.toHaveBeenCalled();
  });

  it("rejects a category without a knowledge store", async () => {
    const { deps, requests } = setup({ stores: {} });
    const { reporter } = recordingReporter();

    const outcome = await processTurn(session, { prompt: "Draft", categorySlug: "value_claim", uploads: [] }, deps, reporter);

    expect(outcome).toEqual({
      status: "rejected",
      reason: "Knowledge store not found for this motion type. Please create it in Admin.",
    });
    expect(requests).toEqual([]);
    expect(session.turnCount).toBe(0);
  });

  it("records an empty assistant turn when drafting fails", async () => {
    const { deps } = setup({ dispatchError: new Error("Connection error.") });
    const { reporter, events } = recordingReporter();

    const outcome = await processTurn(session, { prompt: "Draft", categorySlug: "value_claim", uploads: [] }, deps, reporter);

    expect(outcome.status).toBe("failed");
    expect(session.history.map((turn) => [turn.role, turn.content])).toEqual([
      ["user", "Draft"],
      ["assistant", ""],
    ]);
    expect(events).toEqual(["error:Could not reach the drafting service. Please check the connection and try again."]);
  });

  it("does not treat inherited object keys as categories", async () => {
    const { deps, requests } = setup();

    for (const slug of ["constructor", "toString", "__proto__"]) {
      const { reporter, events } = recordingReporter();
      const outcome = await processTurn(session, { prompt: "Draft", categorySlug: slug, uploads: [] }, deps, reporter);

      expect(outcome).toEqual({ status: "rejected", reason: "Please select a motion type to enable chat." });
      expect(events).toEqual(["error:Please select a motion type to enable chat."]);
    }
    expect(session.history).toEqual([]);
    expect(requests).toEqual([]);
  });

  it("records an empty assistant turn when the orchestrator throws", async () => {
    const { deps } = setup();
    vi.spyOn(deps.orchestrator, "runTurn").mockRejectedValueOnce(new Error("boom"));
    const { reporter, events } = recordingReporter();

    const outcome = await processTurn(session, { prompt: "Draft", categorySlug: "value_claim", uploads: [] }, deps, reporter);

    expect(outcome.status).toBe("failed");
    expect(session.history.map((turn) => [turn.role, turn.content])).toEqual([
      ["user", "Draft"],
      ["assistant", ""],
    ]);
    expect(events).toEqual(["error:Error creating response: boom"]);
    expect(session.turnInProgress).toBe(false);
  });

  it("runs one turn at a time per session", async () => {
    const { deps, requests } = setup();
    const first = recordingReporter();
    const second = recordingReporter();

    const running = processTurn(session, { prompt: "first", categorySlug: "value_claim", uploads: [] }, deps, first.reporter);
    const overlapping = await processTurn(session, { prompt: "second", categorySlug: "value_claim", uploads: [] }, deps, second.reporter);
    const completed = await running;

    expect(overlapping).toEqual({ status: "rejected", reason: TURN_IN_PROGRESS_MESSAGE });
    expect(second.events).toEqual([`error:${TURN_IN_PROGRESS_MESSAGE}`]);
    expect(completed.status).toBe("completed");
    expect(session.history.map((turn) => `${turn.role}:${turn.content}`)).toEqual([
      "user:first",
      "assistant:MOTION TO VALUE SECURED CLAIM",
    ]);
    expect(requests).toHaveLength(1);

    await processTurn(session, { prompt: "third", categorySlug: "value_claim", uploads: [] }, deps, second.reporter);
    expect(session.turnCount).toBe(4);
    expect(requests[1].input.slice(2)).toEqual([
      { role: "user", content: "first" },
      { role: "assistant", content: "MOTION TO VALUE SECURED CLAIM" },
      { role: "user", content: "third" },
    ]);
  });

  it("stops the turn on a corrupt config file and recovers once it is fixed", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "drafting-turn-"));
    const configPath = path.join(dir, "config2.json");
    fs.writeFileSync(configPath, "{ not json");
    const storeBackend: KnowledgeStoreBackend = {
      createStore: vi.fn(async () => "vs_new"),
      indexDocument: vi.fn(async () => "file-1"),
      listDocuments: vi.fn(async () => []),
    };
    const { deps, requests } = setup();
    const registryDeps = { ...deps, registry: new KnowledgeStoreRegistry(configPath, storeBackend) };

    try {
      const broken = recordingReporter();
      const outcome = await processTurn(session, { prompt: "Draft", categorySlug: "value_claim", uploads: [] }, registryDeps, broken.reporter);

      expect(outcome.status).toBe("rejected");
      if (outcome.status !== "rejected") return;
      expect(outcome.reason.startsWith(`Config file ${configPath} is not valid JSON`)).toBe(true);
      expect(broken.events).toEqual([`error:${outcome.reason}`]);
      expect(session.history).toEqual([]);
      expect(requests).toEqual([]);

      fs.writeFileSync(configPath, JSON.stringify({ vector_stores: { value_claim: "vs_fixed" } }));
      const next = await processTurn(session, { prompt: "Draft", categorySlug: "value_claim", uploads: [] }, registryDeps, recordingReporter().reporter);

      expect(next.status).toBe("completed");
      expect(requests[0].tools[0]).toEqual({ type: "file_search", vector_store_ids: ["vs_fixed"] });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
