// Audio Violence Analyzer - HTTP routes, WebSocket handler and Express server
//
//   POST /analyze/upload                  batch analysis of a WAV or raw PCM16 body
//   GET  /analyze/results/:sessionId      finalized report, 404 when unknown or expired
//   POST /analyze/results/:sessionId/save opt-in export to disk
//   GET  /health, GET /
//   WS   /analyze/stream                  live streaming analysis
//
// Audio is held in memory only; nothing is written to disk unless a report is
// explicitly saved.

import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { InputError, SessionNotFoundError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { decodePcm16, decodeWav } from "./pcm.js";
import type { SessionManager } from "./session-manager.js";
import type { ChunkResult, ChunkResultMessage, ClientMessage, ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const APP_INFO = {
  app: "Audio Violence Analyzer",
  version: "0.1.0",
  endpoints: {
    upload: "POST /analyze/upload",
    stream: "WebSocket /analyze/stream",
    results: "GET /analyze/results/:sessionId",
    save: "POST /analyze/results/:sessionId/save",
    health: "GET /health",
  },
} as const;

export const STREAM_PATH = "/analyze/stream";

/** Content types accepted by the upload route. */
const WAV_CONTENT_TYPES = ["audio/wav", "audio/x-wav", "audio/wave"];
const PCM_CONTENT_TYPE = "application/octet-stream";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  /** Tail of this connection's work queue; keeps chunk results in arrival order. */
  queue: Promise<void>;
  /** Audio frames received but not yet analyzed. */
  pendingFrames: number;
  closed: boolean;
}

/** WebSocket close code sent when a client outpaces analysis. */
export const BACKLOG_CLOSE_CODE = 1013;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Maximum upload body size accepted by express.raw. Default: "100mb" */
  uploadLimit?: string | number;
  /** Audio frames a stream may have waiting before it is closed. Default: 120 */
  maxPendingFrames?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does not start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionManager,
    logger = createConsoleLogger("Server"),
    uploadLimit = "100mb",
    maxPendingFrames = 120,
  } = options;
  const sampleRate = () => sessionManager.sampleRate;

  const app = express();
  const httpServer = createServer(app);

  app.get("/", (_req, res) => {
    res.json(APP_INFO);
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: Date.now(), sessions: sessionManager.sessionCount });
  });

  app.post(
    "/analyze/upload",
    express.raw({ type: [...WAV_CONTENT_TYPES, PCM_CONTENT_TYPE], limit: uploadLimit }),
    asyncRoute(async (req, res) => {
      if (!Buffer.isBuffer(req.body)) {
        res.status(415).json({
          error: `Unsupported content type. Send ${WAV_CONTENT_TYPES[0]} or ${PCM_CONTENT_TYPE}.`,
        });
        return;
      }
      if (req.body.length === 0) {
        throw new InputError("Upload body is empty.");
      }

      const samples = req.is(PCM_CONTENT_TYPE)
        ? decodePcm16(req.body)
        : decodeWav(req.body, sampleRate()).samples;

      logger.info(`Upload received: ${(samples.length / sampleRate()).toFixed(1)}s of audio`);
      const report = await sessionManager.analyzeWaveform(samples);
      res.json(report);
    }),
  );

  app.get("/analyze/results/:sessionId", (req, res) => {
    res.json(sessionManager.getReport(req.params.sessionId));
  });

  app.post(
    "/analyze/results/:sessionId/save",
    asyncRoute(async (req, res) => {
      const paths = await sessionManager.saveReport(req.params.sessionId);
      if (paths.length === 0) {
        res.status(503).json({ error: "No report persistence configured." });
        return;
      }
      logger.info(`Report saved for session ${req.params.sessionId}: ${paths.join(", ")}`);
      res.json({ paths });
    }),
  );

  app.use(errorHandler(logger));

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer, path: STREAM_PATH });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger, maxPendingFrames);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        sessionManager.stopSweep();
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Error Handling ────────────────────────────────────────────────────────

/** Express 4 does not route rejected promises to error middleware on its own. */
function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function statusForError(err: unknown): number {
  if (err instanceof InputError) return 400;
  if (err instanceof SessionNotFoundError) return 404;
  return 500;
}

function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const status = statusForError(err);
    const message = errorMessage(err);
    if (status >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${message}`);
      res.status(status).json({ error: `Analysis failed: ${message}` });
      return;
    }
    res.status(status).json({ error: message });
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  logger: Logger,
  maxPendingFrames: number,
): void {
  // Each WebSocket connection gets its own streaming session
  const session = sessionManager.createSession("streaming");
  const connState: ConnectionState = {
    sessionId: session.id,
    queue: Promise.resolve(),
    pendingFrames: 0,
    closed: false,
  };

  logger.info(`New WebSocket connection, session ${session.id}`);

  sendMessage(ws, {
    type: "session_started",
    sessionId: session.id,
    sampleRate: sessionManager.sampleRate,
    chunkDurationSeconds: sessionManager.chunkDurationSeconds,
  });

  // Helper to run handlers in arrival order and report their errors to the client
  const enqueue = (work: () => Promise<void>) => {
    connState.queue = connState.queue.then(work).catch((err: unknown) => {
      const message = errorMessage(err);
      logger.error(`Error handling message for session ${connState.sessionId}: ${message}`);
      sendMessage(ws, { type: "error", message, recoverable: !(err instanceof SessionNotFoundError) });
    });
  };

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      if (connState.closed) return;
      if (connState.pendingFrames >= maxPendingFrames) {
        logger.warn(`Session ${connState.sessionId} has ${connState.pendingFrames} frames pending; closing`);
        ws.close(BACKLOG_CLOSE_CODE, "Analysis backlog too large");
        finishStream("closed for backlog");
        return;
      }
      const frame = toBuffer(data);
      connState.pendingFrames++;
      enqueue(async () => {
        connState.pendingFrames--;
        await handleAudioFrame(ws, frame, connState, sessionManager);
      });
      return;
    }

    let message: ClientMessage;
    try {
      message = parseClientMessage(toBuffer(data).toString("utf-8"));
    } catch (err) {
      sendMessage(ws, { type: "error", message: errorMessage(err), recoverable: true });
      return;
    }

    switch (message.type) {
      case "finalize":
        enqueue(async () => {
          const report = await sessionManager.finalize(connState.sessionId);
          sendMessage(ws, { type: "report", report });
        });
        break;
    }
  });

  function finishStream(reason: string): void {
    if (connState.closed) return;
    connState.closed = true;
    logger.info(`WebSocket ${reason}, session ${connState.sessionId}`);
    // Queued frames are skipped and buffered audio is dropped; the report
    // stays retrievable until its TTL expires
    const closing = sessionManager.closeStream(connState.sessionId);
    connState.queue = Promise.all([connState.queue, closing])
      .then(() => sessionManager.finalize(connState.sessionId))
      .then(
        () => undefined,
        (err: unknown) => {
          logger.error(`Failed to finalize session ${connState.sessionId}: ${errorMessage(err)}`);
        },
      );
  }

  ws.on("close", () => finishStream("closed"));

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
    finishStream("errored");
  });
}

// ─── Binary Message Handler (Audio Frames) ──────────────────────────────────────

async function handleAudioFrame(
  ws: WebSocket,
  frame: Buffer,
  connState: ConnectionState,
  sessionManager: SessionManager,
): Promise<void> {
  if (connState.closed) return;
  const samples = decodePcm16(frame);
  const results = await sessionManager.submitAudio(connState.sessionId, samples);
  for (const result of results) {
    sendMessage(ws, toChunkResultMessage(result));
  }
}

export function toChunkResultMessage(result: ChunkResult): ChunkResultMessage {
  return {
    type: "chunk_result",
    chunkId: result.chunkId,
    start: result.start,
    end: result.end,
    fusedScore: result.fusedScore,
    alert: result.alert,
    transcript: result.transcript,
    eventType: result.eventType,
    trend: result.trend,
    escalationScore: result.escalationScore,
    explanation: result.explanation,
  };
}

// ─── Message Parsing ────────────────────────────────────────────────────────────

/** @throws InputError for malformed JSON or an unknown message type */
export function parseClientMessage(text: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InputError("Malformed JSON message.");
  }
  if (typeof parsed === "object" && parsed !== null && "type" in parsed && parsed.type === "finalize") {
    return { type: "finalize" };
  }
  throw new InputError("Unknown message type. Expected {\"type\":\"finalize\"}.");
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export type { ConnectionState };
