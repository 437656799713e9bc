import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Request, Response } from "express";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import multer from "multer";
import { getProfile } from "../config/profiles";
import { ArtifactResolver } from "../drafting/artifactResolver";
import { DraftingOrchestrator, type DraftingBackend } from "../drafting/orchestrator";
import { DocumentExtractor, type DocumentUnderstandingBackend } from "../extraction/documentExtractor";
import { KnowledgeStoreRegistry } from "../knowledge/knowledgeStoreRegistry";
import type { KnowledgeStoreBackend } from "../knowledge/openaiStoreBackend";
import {
  apiErrorHandler,
  createIndexDocumentsHandler,
  createTurnHandler,
  uploadFileFilter,
} from "../routes";
import type { DraftingServices } from "../services";
import { SessionStore } from "../session/sessionStore";
import { TURN_IN_PROGRESS_MESSAGE } from "../session/turnPipeline";
import { ValidationError } from "../utils/errorHandler";

vi.spyOn(console, "log").mockImplementation(() => {});
vi.spyOn(console, "warn").mockImplementation(() => {});
vi.spyOn(console, "error").mockImplementation(() => {});

const profile = getProfile("bankruptcy_motion");

async function* answerStream(text: string): AsyncGenerator<unknown> {
  yield { type: "response.created", response: { id: "resp_1" } };
  yield { type: "response.output_text.delta", delta: text };
  yield { type: "response.completed", response: { id: "resp_1", output: [] } };
}

function mockResponse() {
  const lines: string[] = [];
  const mockRes = {
    headersSent: false,
    status: vi.fn().mockReturnThis(),
    json: vi.fn(),
    setHeader: vi.fn(),
    write: vi.fn((chunk: string) => {
      lines.push(chunk);
      return true;
    }),
    end: vi.fn(),
  };
  return {
    mockRes,
    res: mockRes as unknown as Response,
    events: () => lines.map((line) => JSON.parse(line)),
    lines,
  };
}

function mockRequest(fields: { params?: Record<string, string>; body?: unknown; files?: { originalname: string; buffer: Buffer }[] }) {
  return { params: {}, body: {}, ...fields } as unknown as Request;
}

function makeServices(configPath: string) {
  let next = 0;
  const storeBackend: KnowledgeStoreBackend = {
    createStore: vi.fn(async (name: string) => `vs_${++next}_${name}`),
    indexDocument: vi.fn(async (_storeId: string, file: { filename: string }) => `file-${file.filename}`),
    listDocuments: vi.fn(async () => []),
  };
  const extractionBackend: DocumentUnderstandingBackend = {
    upload: vi.fn(async (_bytes: Buffer, mimeType: string, filename: string) => ({ uri: `gs://uploads/${filename}`, mimeType, name: filename })),
    generate: vi.fn(async () => "NO_RELEVANT_INFO"),
  };
  const draftingBackend = {
    createStreamingResponse: vi.fn(async (): Promise<AsyncIterable<unknown>> => answerStream("MOTION TO VALUE SECURED CLAIM")),
    retrieveResponse: vi.fn(async (): Promise<unknown> => ({ id: "resp_1", output: [] })),
  } satisfies DraftingBackend;

  const services: DraftingServices = {
    profile,
    registry: new KnowledgeStoreRegistry(configPath, storeBackend),
    extractor: new DocumentExtractor(extractionBackend, profile.extractionPrompt),
    orchestrator: new DraftingOrchestrator({
      backend: draftingBackend,
      artifactResolver: new ArtifactResolver({ apiKey: () => "test-secret", fetchImpl: vi.fn() }),
      systemInstructions: "SYSTEM",
    }),
    sessions: new SessionStore(),
  };
  return { services, storeBackend, draftingBackend };
}

describe("routes", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "drafting-routes-"));
    configPath = path.join(dir, "config2.json");
    fs.writeFileSync(configPath, JSON.stringify({ vector_stores: { value_claim: "vs_value" } }));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("turn handler", () => {
    it("streams the answer and the recorded turn as NDJSON", async () => {
      const { services } = makeServices(configPath);
      const session = services.sessions.create();
      const { mockRes, res, events } = mockResponse();

      await createTurnHandler(services)(
        mockRequest({ params: { id: session.id }, body: { prompt: "draft the motion", category: "value_claim" } }),
        res,
      );

      expect(mockRes.status).toHaveBeenCalledWith(200);
      expect(mockRes.setHeader).toHaveBeenCalledWith("Content-Type", "application/x-ndjson");
      expect(events()).toEqual([
        { type: "delta", delta: "MOTION TO VALUE SECURED CLAIM" },
        {
          type: "turn",
          status: "completed",
          turn: { role: "assistant", content: "MOTION TO VALUE SECURED CLAIM", files: [], citations: [], sources: [] },
          uploaderToken: session.uploaderToken,
        },
      ]);
      expect(mockRes.end).toHaveBeenCalledTimes(1);
      expect(session.history.map((turn) => turn.role)).toEqual(["user", "assistant"]);
    });

    it("answers 409 while the session is still running a turn", async () => {
      const { services, draftingBackend } = makeServices(configPath);
      const session = services.sessions.create();
      session.beginTurn();
      const { mockRes, res } = mockResponse();

      await createTurnHandler(services)(
        mockRequest({ params: { id: session.id }, body: { prompt: "again", category: "value_claim" } }),
        res,
      );

      expect(mockRes.status).toHaveBeenCalledWith(409);
      expect(mockRes.json).toHaveBeenCalledWith({ error: TURN_IN_PROGRESS_MESSAGE });
      expect(mockRes.write).not.toHaveBeenCalled();
      expect(draftingBackend.createStreamingResponse).not.toHaveBeenCalled();
      expect(session.history).toEqual([]);
    });

    it("answers 404 for an unknown session", async () => {
      const { services } = makeServices(configPath);
      const { mockRes, res } = mockResponse();

      await createTurnHandler(services)(
        mockRequest({ params: { id: "0b9c7f8e-4a51-4a3e-9c43-2f1d6f0f2a11" }, body: { prompt: "draft" } }),
        res,
      );

      expect(mockRes.status).toHaveBeenCalledWith(404);
      expect(mockRes.json).toHaveBeenCalledWith({ error: "Session not found" });
    });

    it("streams an error event for a corrupt config file and keeps the session usable", async () => {
      fs.writeFileSync(configPath, "{ not json");
      const { services } = makeServices(configPath);
      const session = services.sessions.create();
      const request = mockRequest({ params: { id: session.id }, body: { prompt: "draft", category: "value_claim" } });

      const broken = mockResponse();
      await createTurnHandler(services)(request, broken.res);

      const [errorEvent, turnEvent] = broken.events();
      expect(errorEvent.type).toBe("error");
      expect(errorEvent.message.startsWith(`Config file ${configPath} is not valid JSON`)).toBe(true);
      expect(turnEvent).toEqual({ type: "turn", status: "rejected" });
      expect(broken.lines).toHaveLength(2);

      fs.writeFileSync(configPath, JSON.stringify({ vector_stores: { value_claim: "vs_value" } }));
      const fixed = mockResponse();
      await createTurnHandler(services)(request, fixed.res);

      expect(fixed.events()[1]).toMatchObject({ type: "turn", status: "completed" });
      expect(session.turnCount).toBe(2);
    });
  });

  describe("uploadFileFilter", () => {
    it("accepts the supported document types", () => {
      const cb = vi.fn();
      uploadFileFilter(mockRequest({}), { originalname: "Schedule.PDF" }, cb);
      expect(cb).toHaveBeenCalledWith(null, true);
    });

    it("rejects other files with a ValidationError", () => {
      const cb = vi.fn();
      uploadFileFilter(mockRequest({}), { originalname: "photo.png" }, cb);

      const [error] = cb.mock.calls[0];
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe("Unsupported file type: photo.png");
    });
  });

  describe("apiErrorHandler", () => {
    it("maps multer limit errors to 400", () => {
      const { mockRes, res } = mockResponse();
      const next = vi.fn();

      apiErrorHandler(new multer.MulterError("LIMIT_FILE_SIZE"), mockRequest({}), res, next);

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({ error: "File too large" });
      expect(next).not.toHaveBeenCalled();
    });

    it("passes errors on once the response has started", () => {
      const { mockRes, res } = mockResponse();
      mockRes.headersSent = true;
      const next = vi.fn();
      const error = new Error("late");

      apiErrorHandler(error, mockRequest({}), res, next);

      expect(next).toHaveBeenCalledWith(error);
      expect(mockRes.status).not.toHaveBeenCalled();
    });
  });

  describe("index documents handler", () => {
    const files = [{ originalname: "local_rules.pdf", buffer: Buffer.from("rules") }];

    it("indexes the uploaded files into the category store", async () => {
      fs.rmSync(configPath);
      const { services, storeBackend } = makeServices(configPath);
      const { mockRes, res } = mockResponse();

      await createIndexDocumentsHandler(services)(
        mockRequest({ params: { category: "avoid_lien" }, body: { jurisdiction: "N.D. Cal." }, files }),
        res,
      );

      expect(mockRes.json).toHaveBeenCalledWith({
        storeId: "vs_1_avoid_lien_store",
        indexed: ["local_rules.pdf"],
        failed: [],
      });
      expect(storeBackend.indexDocument).toHaveBeenCalledWith(
        "vs_1_avoid_lien_store",
        { filename: "local_rules.pdf", bytes: Buffer.from("rules") },
        { jurisdiction: "N.D. Cal." },
      );
    });

    it("rejects inherited object keys as categories", async () => {
      const { services, storeBackend } = makeServices(configPath);
      const { mockRes, res } = mockResponse();

      await createIndexDocumentsHandler(services)(
        mockRequest({ params: { category: "constructor" }, body: { jurisdiction: "N.D. Cal." }, files }),
        res,
      );

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({ error: "Unknown category: constructor" });
      expect(storeBackend.createStore).not.toHaveBeenCalled();
    });

    it("rejects a request without files", async () => {
      const { services } = makeServices(configPath);
      const { mockRes, res } = mockResponse();

      await createIndexDocumentsHandler(services)(
        mockRequest({ params: { category: "value_claim" }, body: { jurisdiction: "N.D. Cal." }, files: [] }),
        res,
      );

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({ error: "No files uploaded" });
    });

    it("reports a corrupt config file as 503", async () => {
      fs.writeFileSync(configPath, "{ not json");
      const { services } = makeServices(configPath);
      const { mockRes, res } = mockResponse();

      await createIndexDocumentsHandler(services)(
        mockRequest({ params: { category: "value_claim" }, body: { jurisdiction: "N.D. Cal." }, files }),
        res,
      );

      expect(mockRes.status).toHaveBeenCalledWith(503);
    });
  });
});
