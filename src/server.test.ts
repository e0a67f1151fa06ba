// Audio Violence Analyzer - Server Tests
// HTTP routes and the streaming WebSocket protocol, against an in-process
// server on an ephemeral port with fake inference collaborators.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import WebSocket from "ws";
import { DEFAULT_ANALYSIS_CONFIG } from "./config.js";
import { InputError, SessionNotFoundError } from "./errors.js";
import { FeatureExtractor } from "./feature-extractor.js";
import type { AcousticEventClassifier, InferenceCollaborators } from "./inference.js";
import { encodePcm16, encodeWav } from "./pcm.js";
import { ReportPersistence } from "./report-persistence.js";
import {
  APP_INFO,
  BACKLOG_CLOSE_CODE,
  STREAM_PATH,
  createAppServer,
  parseClientMessage,
  statusForError,
  toChunkResultMessage,
  type AppServer,
} from "./server.js";
import { SessionManager } from "./session-manager.js";
import { AlertLevel, type ChunkResult, type ServerMessage } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port
const SR = 16000;

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Speech-free collaborators; each chunk's first sample is its gunshot confidence. */
const collaborators: InferenceCollaborators = {
  vad: { detect: async () => ({ speechProbability: 0, speechTimestamps: [] }) },
  acoustic: { classify: async (waveform) => ({ "Gunshot, gunfire": waveform[0] }) },
  transcriber: { transcribe: async () => ({ text: "", confidence: 0 }) },
  toxicity: { score: async () => ({}) },
  emotion: { classify: async () => ({}) },
};

interface TestServerOptions {
  reportPersistence?: ReportPersistence;
  collaborators?: InferenceCollaborators;
  maxPendingFrames?: number;
}

function createTestServer(options: TestServerOptions = {}): AppServer {
  const logger = createSilentLogger();
  const extractor = new FeatureExtractor({
    collaborators: options.collaborators ?? collaborators,
    config: DEFAULT_ANALYSIS_CONFIG,
    logger,
  });
  const sessionManager = new SessionManager({
    extractor,
    config: DEFAULT_ANALYSIS_CONFIG,
    logger,
    reportPersistence: options.reportPersistence,
  });
  return createAppServer({ sessionManager, logger, maxPendingFrames: options.maxPendingFrames });
}

/** Collaborators whose acoustic classifier takes `delayMs` per chunk and counts its calls. */
function createSlowCollaborators(delayMs: number) {
  const classify = vi.fn<AcousticEventClassifier["classify"]>(
    () => new Promise((resolve) => setTimeout(() => resolve({}), delayMs)),
  );
  return { ...collaborators, acoustic: { classify } };
}

/** 5 seconds of audio whose three chunks score 0.1, 0.9 and 0.2. */
function makeWaveform(): Float32Array {
  const waveform = new Float32Array(5 * SR);
  waveform[0] = 0.1;
  waveform[32000] = 0.9;
  waveform[64000] = 0.2;
  return waveform;
}

function getPort(server: AppServer): number {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return addr.port;
}

function hasSessionId(value: unknown): value is { sessionId: string } {
  return typeof value === "object" && value !== null && "sessionId" in value && typeof value.sessionId === "string";
}

function isServerMessage(value: unknown): value is ServerMessage {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

type MessageOfType<K extends ServerMessage["type"]> = Extract<ServerMessage, { type: K }>;

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: ServerMessage[] = [];
  private waiters: Array<(msg: ServerMessage) => void> = [];

  /** Resolves with the close code once the connection closes. */
  readonly closed: Promise<number>;

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.closed = new Promise((resolve) => {
      this.ws.on("close", (code: number) => resolve(code));
    });
    this.ws.on("message", (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (!isServerMessage(parsed)) {
        throw new Error(`Unexpected message: ${data.toString()}`);
      }
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(parsed);
      } else {
        this.messageQueue.push(parsed);
      }
    });
  }

  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const waiterFn = (msg: ServerMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  /** Next message, which must be of the given type. */
  async expectMessage<K extends ServerMessage["type"]>(type: K): Promise<MessageOfType<K>> {
    const msg = await this.nextMessage();
    if (!isMessageOfType(msg, type)) {
      throw new Error(`Expected "${type}" message, got ${JSON.stringify(msg)}`);
    }
    return msg;
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  sendText(text: string): void {
    this.ws.send(text);
  }

  sendBinary(data: Buffer): void {
    this.ws.send(data);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

function isMessageOfType<K extends ServerMessage["type"]>(msg: ServerMessage, type: K): msg is MessageOfType<K> {
  return msg.type === type;
}

// ─── HTTP Routes ────────────────────────────────────────────────────────────────

describe("HTTP routes", () => {
  let server: AppServer;
  let baseUrl: string;
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "violence-server-"));
    server = createTestServer({ reportPersistence: new ReportPersistence(outputDir) });
    await server.listen(TEST_PORT);
    baseUrl = `http://127.0.0.1:${getPort(server)}`;
  });

  afterEach(async () => {
    await server.close();
    await rm(outputDir, { recursive: true, force: true });
  });

  async function upload(body: Buffer, contentType: string): Promise<Response> {
    return fetch(`${baseUrl}/analyze/upload`, {
      method: "POST",
      headers: { "Content-Type": contentType },
      body,
    });
  }

  it("describes the service at /", async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(APP_INFO);
  });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", sessions: 0 });
  });

  it("analyzes an uploaded WAV file", async () => {
    const res = await upload(encodeWav(makeWaveform(), SR), "audio/wav");
    expect(res.status).toBe(200);

    const report: unknown = await res.json();
    expect(report).toMatchObject({
      mode: "batch",
      overallAlert: "Critical",
      violenceDetected: true,
      totalChunks: 3,
      duration: 5,
      statistics: { safeChunks: 2, warningChunks: 0, criticalChunks: 1 },
    });
    expect(report).toMatchObject({ events: [{ type: "gunshot", confidence: 0.9, start: 2, end: 4.5 }] });
  });

  it("analyzes raw PCM16 uploaded as octet-stream", async () => {
    const res = await upload(encodePcm16(makeWaveform()), "application/octet-stream");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ totalChunks: 3, overallAlert: "Critical" });
  });

  it("rejects an unsupported content type with 415", async () => {
    const res = await upload(Buffer.from("hello"), "text/plain");
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({
      error: "Unsupported content type. Send audio/wav or application/octet-stream.",
    });
  });

  it("rejects a malformed WAV file with 400", async () => {
    const res = await upload(Buffer.from("definitely not audio"), "audio/wav");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Not a RIFF/WAVE file." });
  });

  it("rejects odd-length PCM with 400", async () => {
    const res = await upload(Buffer.alloc(3), "application/octet-stream");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "PCM byte length (3) is not a multiple of 2. Expected 16-bit aligned PCM data.",
    });
  });

  it("serves a finalized report by session id", async () => {
    const uploaded: unknown = await (await upload(encodeWav(makeWaveform(), SR), "audio/wav")).json();
    if (!hasSessionId(uploaded)) throw new Error("upload response has no sessionId");

    const res = await fetch(`${baseUrl}/analyze/results/${uploaded.sessionId}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(uploaded);
  });

  it("returns 404 for an unknown session", async () => {
    const res = await fetch(`${baseUrl}/analyze/results/missing`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Session not found: missing (unknown or expired)" });
  });

  it("saves a report on request", async () => {
    const uploaded: unknown = await (await upload(encodeWav(makeWaveform(), SR), "audio/wav")).json();
    if (!hasSessionId(uploaded)) throw new Error("upload response has no sessionId");

    const res = await fetch(`${baseUrl}/analyze/results/${uploaded.sessionId}/save`, { method: "POST" });
    expect(res.status).toBe(200);

    const body: unknown = await res.json();
    expect(body).toEqual({
      paths: [
        expect.stringMatching(new RegExp(`_${uploaded.sessionId}[/\\\\]report\\.json$`)),
        expect.stringMatching(new RegExp(`_${uploaded.sessionId}[/\\\\]timeline\\.txt$`)),
      ],
    });
  });
});

describe("HTTP routes without persistence", () => {
  let server: AppServer;

  beforeEach(async () => {
    server = createTestServer();
    await server.listen(TEST_PORT);
  });

  afterEach(async () => {
    await server.close();
  });

  it("answers 503 to a save request", async () => {
    const report = await server.sessionManager.analyzeWaveform(makeWaveform());
    const res = await fetch(`http://127.0.0.1:${getPort(server)}/analyze/results/${report.sessionId}/save`, {
      method: "POST",
    });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "No report persistence configured." });
  });
});

// ─── WebSocket Streaming ────────────────────────────────────────────────────────

describe("WebSocket streaming", () => {
  let server: AppServer;
  let clients: TestClient[];

  async function start(options: TestServerOptions = {}): Promise<void> {
    await server.close();
    server = createTestServer(options);
    await server.listen(TEST_PORT);
  }

  beforeEach(async () => {
    server = createTestServer();
    await server.listen(TEST_PORT);
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) {
      client.close();
    }
    await server.close();
  });

  async function connect(): Promise<{ client: TestClient; sessionId: string }> {
    const client = new TestClient(`ws://127.0.0.1:${getPort(server)}${STREAM_PATH}`);
    clients.push(client);
    await client.waitForOpen();
    const started = await client.expectMessage("session_started");
    return { client, sessionId: started.sessionId };
  }

  /** Send the waveform as one-second PCM16 frames. */
  function sendSeconds(client: TestClient, waveform: Float32Array): void {
    for (let i = 0; i < waveform.length; i += SR) {
      client.sendBinary(encodePcm16(waveform.subarray(i, i + SR)));
    }
  }

  it("announces the session and its audio format", async () => {
    const client = new TestClient(`ws://127.0.0.1:${getPort(server)}${STREAM_PATH}`);
    clients.push(client);
    await client.waitForOpen();

    const started = await client.expectMessage("session_started");
    expect(started).toMatchObject({ sampleRate: 16000, chunkDurationSeconds: 2.5 });
    expect(server.sessionManager.getSession(started.sessionId).mode).toBe("streaming");
  });

  it("streams chunk results and returns the report on finalize", async () => {
    const { client, sessionId } = await connect();
    sendSeconds(client, makeWaveform());

    const first = await client.expectMessage("chunk_result");
    expect(first).toMatchObject({ chunkId: 0, start: 0, end: 2.5, fusedScore: 0.1, alert: "Safe", eventType: null });

    const second = await client.expectMessage("chunk_result");
    expect(second).toMatchObject({
      chunkId: 1,
      fusedScore: 0.9,
      alert: "Critical",
      eventType: "gunshot",
      trend: "spike",
      escalationScore: 0.7,
      explanation: "Sudden spike in violent sound (Gunshot, gunfire)",
    });

    client.sendJson({ type: "finalize" });
    const { report } = await client.expectMessage("report");
    expect(report).toMatchObject({ sessionId, mode: "streaming", totalChunks: 2, duration: 5, overallAlert: "Critical" });
  });

  it("reports malformed JSON as a recoverable error", async () => {
    const { client } = await connect();
    client.sendText("{not json");

    expect(await client.expectMessage("error")).toEqual({
      type: "error",
      message: "Malformed JSON message.",
      recoverable: true,
    });
  });

  it("reports an unknown message type", async () => {
    const { client } = await connect();
    client.sendJson({ type: "start" });

    expect(await client.expectMessage("error")).toMatchObject({
      message: 'Unknown message type. Expected {"type":"finalize"}.',
    });
  });

  it("reports a misaligned PCM frame and keeps the connection usable", async () => {
    const { client } = await connect();
    client.sendBinary(Buffer.alloc(5));

    expect(await client.expectMessage("error")).toEqual({
      type: "error",
      message: "PCM byte length (5) is not a multiple of 2. Expected 16-bit aligned PCM data.",
      recoverable: true,
    });

    client.sendJson({ type: "finalize" });
    expect((await client.expectMessage("report")).report.totalChunks).toBe(0);
  });

  it("finalizes the session when the client disconnects", async () => {
    const { client, sessionId } = await connect();
    sendSeconds(client, makeWaveform().subarray(0, 3 * SR));
    await client.expectMessage("chunk_result");

    client.close();

    await vi.waitFor(() => {
      const report = server.sessionManager.getReport(sessionId);
      expect(report.totalChunks).toBe(1);
      expect(report.duration).toBe(3);
    });
  });

  it("stops analyzing queued audio once the client disconnects", async () => {
    const slow = createSlowCollaborators(100);
    await start({ collaborators: slow });
    const { client, sessionId } = await connect();

    sendSeconds(client, new Float32Array(30 * SR));
    await client.expectMessage("chunk_result");
    client.close();
    await client.closed;

    await vi.waitFor(() => expect(server.sessionManager.getReport(sessionId)).toBeDefined());
    const report = server.sessionManager.getReport(sessionId);

    // At most the chunk in flight at close time is finished after the first result
    expect(report.totalChunks).toBeLessThanOrEqual(2);
    await new Promise((resolve) => setTimeout(resolve, 250));
    expect(slow.acoustic.classify).toHaveBeenCalledTimes(report.totalChunks);
  });

  it("closes a stream whose backlog exceeds the pending frame limit", async () => {
    const slow = createSlowCollaborators(100);
    await start({ collaborators: slow, maxPendingFrames: 2 });
    const { client, sessionId } = await connect();

    sendSeconds(client, new Float32Array(10 * SR));

    expect(await client.closed).toBe(BACKLOG_CLOSE_CODE);
    await vi.waitFor(() => expect(server.sessionManager.getReport(sessionId).totalChunks).toBeLessThanOrEqual(1));
  });
});

// ─── Exported Helpers ───────────────────────────────────────────────────────────

describe("parseClientMessage", () => {
  it("accepts a finalize message", () => {
    expect(parseClientMessage('{"type":"finalize"}')).toEqual({ type: "finalize" });
  });

  it("rejects malformed JSON and unknown types with InputError", () => {
    expect(() => parseClientMessage("nope")).toThrow(InputError);
    expect(() => parseClientMessage("[]")).toThrow('Unknown message type. Expected {"type":"finalize"}.');
  });
});

describe("statusForError", () => {
  it("maps errors to HTTP status codes", () => {
    expect(statusForError(new InputError("bad"))).toBe(400);
    expect(statusForError(new SessionNotFoundError("x"))).toBe(404);
    expect(statusForError(new Error("boom"))).toBe(500);
  });
});

describe("toChunkResultMessage", () => {
  it("projects a chunk result onto the wire message", () => {
    const result: ChunkResult = {
      chunkId: 3,
      start: 6,
      end: 8.5,
      fusedScore: 0.42,
      acousticScore: 0.42,
      nlpScore: 0,
      emotionScore: 0,
      hasSpeech: false,
      transcript: "",
      alert: AlertLevel.WARNING,
      reason: "Elevated violence score (0.42)",
      explanation: "Violent sounds detected",
      trend: "stable",
      escalationScore: 0,
      eventType: "gunshot",
      degraded: false,
    };

    expect(toChunkResultMessage(result)).toEqual({
      type: "chunk_result",
      chunkId: 3,
      start: 6,
      end: 8.5,
      fusedScore: 0.42,
      alert: AlertLevel.WARNING,
      transcript: "",
      eventType: "gunshot",
      trend: "stable",
      escalationScore: 0,
      explanation: "Violent sounds detected",
    });
  });
});
