import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import multer from "multer";
import {
  indexDocumentsRequestSchema,
  turnRequestSchema,
  type AttachedFile,
  type ConversationTurn,
} from "@shared/schema";
import { UPLOAD_CONSTANTS } from "./config/constants";
import { isCategory } from "./config/profiles";
import { citedSources } from "./drafting/citations";
import { requireAppPassword } from "./middleware/security";
import { commonSchemas, validate } from "./middleware/validation";
import type { DraftingServices } from "./services";
import type { SessionState } from "./session/sessionState";
import { processTurn, TURN_IN_PROGRESS_MESSAGE, type TurnReporter } from "./session/turnPipeline";
import { ConflictError, handleRouteError, NotFoundError, ValidationError } from "./utils/errorHandler";
import { fileExtension } from "./utils/mime";

const ACCEPTED_EXTENSIONS = new Set<string>(UPLOAD_CONSTANTS.ACCEPTED_EXTENSIONS);

export function uploadFileFilter(
  _req: Request,
  file: { originalname: string },
  cb: multer.FileFilterCallback,
): void {
  const ext = fileExtension(file.originalname);
  if (ext && ACCEPTED_EXTENSIONS.has(ext)) {
    cb(null, true);
  } else {
    cb(new ValidationError(`Unsupported file type: ${file.originalname}`));
  }
}

// Configure multer for file uploads (store in memory)
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: UPLOAD_CONSTANTS.MAX_FILE_BYTES,
    files: UPLOAD_CONSTANTS.MAX_FILES_PER_TURN,
  },
  fileFilter: uploadFileFilter,
});

function uploadedFiles(req: Request): AttachedFile[] {
  if (!Array.isArray(req.files)) return [];
  return req.files.map((file) => ({ filename: file.originalname, bytes: file.buffer }));
}

function serializeTurn(turn: ConversationTurn) {
  return {
    role: turn.role,
    content: turn.content,
    files: turn.attachedFiles.map((file) => ({
      filename: file.filename,
      data: file.bytes.toString("base64"),
    })),
    citations: turn.citations,
    sources: citedSources(turn.citations),
  };
}

export type TurnStreamEvent =
  | { type: "progress"; message: string; fraction: number }
  | { type: "delta"; delta: string }
  | { type: "warning"; message: string }
  | { type: "error"; message: string }
  | { type: "turn"; status: string; turn?: ReturnType<typeof serializeTurn>; uploaderToken?: string };

/**
 * Reporter that writes every turn event as one NDJSON line.
 */
function ndjsonReporter(res: Response): { reporter: TurnReporter; send: (event: TurnStreamEvent) => void } {
  const send = (event: TurnStreamEvent) => {
    res.write(JSON.stringify(event) + "\n");
  };
  return {
    send,
    reporter: {
      onProgress: (message, fraction) => send({ type: "progress", message, fraction }),
      onTextDelta: (delta) => send({ type: "delta", delta }),
      onWarning: (message) => send({ type: "warning", message }),
      onError: (message) => send({ type: "error", message }),
    },
  };
}

export type AsyncRouteHandler = (req: Request, res: Response) => Promise<void>;

/**
 * POST /api/sessions/:id/turns. Streams the turn as NDJSON; a session that is
 * still running a turn gets 409 before anything is streamed.
 */
export function createTurnHandler(services: DraftingServices): AsyncRouteHandler {
  const { profile, registry, extractor, orchestrator, sessions } = services;

  return async (req, res) => {
    let session: SessionState;
    try {
      session = sessions.get(req.params.id);
      if (session.turnInProgress) {
        throw new ConflictError(TURN_IN_PROGRESS_MESSAGE);
      }
    } catch (error) {
      handleRouteError(res, error, "Turns");
      return;
    }

    const body = turnRequestSchema.parse(req.body);
    res.status(200);
    res.setHeader("Content-Type", "application/x-ndjson");
    const { reporter, send } = ndjsonReporter(res);

    try {
      const outcome = await processTurn(
        session,
        {
          prompt: body.prompt,
          categorySlug: body.category,
          jurisdiction: body.jurisdiction,
          subClassification: body.subClassification,
          uploads: uploadedFiles(req),
        },
        { profile, registry, extractor, orchestrator },
        reporter,
      );

      if (outcome.status === "rejected") {
        send({ type: "turn", status: outcome.status });
      } else {
        send({
          type: "turn",
          status: outcome.status,
          turn: serializeTurn(outcome.assistantTurn),
          uploaderToken: outcome.uploaderToken,
        });
      }
    } catch (error) {
      console.error("[Turns] Turn failed:", error);
      send({ type: "error", message: error instanceof Error ? error.message : "Unknown error" });
    } finally {
      res.end();
    }
  };
}

/** POST /api/admin/stores/:category/documents */
export function createIndexDocumentsHandler(services: DraftingServices): AsyncRouteHandler {
  const { profile, registry } = services;

  return async (req, res) => {
    try {
      const { category } = req.params;
      if (!isCategory(profile, category)) {
        throw new ValidationError(`Unknown category: ${category}`);
      }
      const files = uploadedFiles(req);
      if (files.length === 0) {
        throw new ValidationError("No files uploaded");
      }
      const { jurisdiction } = indexDocumentsRequestSchema.parse(req.body);
      const report = await registry.indexDocuments(category, files, { jurisdiction });
      res.json(report);
    } catch (error) {
      handleRouteError(res, error, "Admin");
    }
  };
}

export function apiErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    handleRouteError(res, new ValidationError(err.message));
    return;
  }
  handleRouteError(res, err, "Express");
}

export function registerRoutes(app: Express, services: DraftingServices, appPassword: string): Server {
  const { profile, registry, sessions } = services;

  app.use("/api", requireAppPassword(appPassword));

  app.get("/api/profile", (_req, res) => {
    res.json({
      id: profile.id,
      title: profile.title,
      categories: profile.categories,
      labels: profile.labels,
      subClassificationOptions: profile.subClassificationOptions,
    });
  });

  // Sessions
  app.post("/api/sessions", (_req, res) => {
    const session = sessions.create();
    res.status(201).json({ id: session.id, uploaderToken: session.uploaderToken });
  });

  app.delete("/api/sessions/:id", validate({ params: commonSchemas.sessionId }), (req, res) => {
    try {
      if (!sessions.delete(req.params.id)) {
        throw new NotFoundError("Session");
      }
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.get("/api/sessions/:id/turns", validate({ params: commonSchemas.sessionId }), (req, res) => {
    try {
      const session = sessions.get(req.params.id);
      res.json({
        turns: session.history.map(serializeTurn),
        scheduleUploaded: session.scheduleUploaded,
        uploaderToken: session.uploaderToken,
      });
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.delete("/api/sessions/:id/turns", validate({ params: commonSchemas.sessionId }), (req, res) => {
    try {
      const session = sessions.get(req.params.id);
      session.clear();
      res.json({ success: true, uploaderToken: session.uploaderToken });
    } catch (error) {
      handleRouteError(res, error, "Sessions");
    }
  });

  app.post(
    "/api/sessions/:id/turns",
    validate({ params: commonSchemas.sessionId }),
    upload.array("files"),
    validate({ body: turnRequestSchema }),
    createTurnHandler(services),
  );

  // Admin: knowledge stores
  app.get("/api/admin/stores", (_req, res) => {
    try {
      res.json({ stores: registry.list(), categories: profile.categories });
    } catch (error) {
      handleRouteError(res, error, "Admin");
    }
  });

  app.post("/api/admin/stores", async (_req, res) => {
    try {
      const stores = await registry.ensureAll(Object.keys(profile.categories));
      res.json({ stores });
    } catch (error) {
      handleRouteError(res, error, "Admin");
    }
  });

  app.post(
    "/api/admin/stores/:category/documents",
    validate({ params: commonSchemas.category }),
    upload.array("files"),
    validate({ body: indexDocumentsRequestSchema }),
    createIndexDocumentsHandler(services),
  );

  app.get("/api/admin/documents", async (_req, res) => {
    try {
      res.json(await registry.listDocuments());
    } catch (error) {
      handleRouteError(res, error, "Admin");
    }
  });

  app.post("/api/admin/reset", (_req, res) => {
    try {
      registry.reset();
      res.json({ success: true });
    } catch (error) {
      handleRouteError(res, error, "Admin");
    }
  });

  app.use(apiErrorHandler);

  const httpServer = createServer(app);

  return httpServer;
}
