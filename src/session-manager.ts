// Audio Violence Analyzer - Session Manager
// Owns per-session analysis state for batch and streaming sessions and runs
// the chunk pipeline: extract → fuse → temporal → decide.
//
// Sessions share no mutable state. Every operation on one session is
// serialized through that session's promise chain, so chunks are always
// folded into the temporal window in chunkId order.

import { v4 as uuidv4 } from "uuid";
import { StreamChunkBuffer, chunkGeometry, chunkWaveform } from "./chunker.js";
import type { AnalysisConfig } from "./config.js";
import { aggregateAlerts, buildEvent, decideChunkAlert, maxAlert } from "./decision-engine.js";
import { InputError, SessionNotFoundError } from "./errors.js";
import type { FeatureExtractor } from "./feature-extractor.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { validateWaveform } from "./pcm.js";
import type { ReportPersistence } from "./report-persistence.js";
import { fuse } from "./score-fusion.js";
import { TemporalAnalyzer } from "./temporal-analyzer.js";
import {
  AlertLevel,
  type AlertEvent,
  type AnalysisReport,
  type Chunk,
  type ChunkResult,
  type FeatureVector,
  type SessionMode,
  type SessionStatus,
} from "./types.js";
import { mapOrdered } from "./utils/ordered-pool.js";
import { roundTo } from "./utils.js";

// ─── Session ────────────────────────────────────────────────────────────────────

export interface Session {
  readonly id: string;
  readonly mode: SessionMode;
  status: SessionStatus;
  createdAt: number; // epoch ms
  finalizedAt: number | null;
  chunkResults: ChunkResult[];
  events: AlertEvent[];
  temporal: TemporalAnalyzer;
  overallAlert: AlertLevel;
  /** Streaming sessions only: frames waiting for a full chunk. */
  streamBuffer: StreamChunkBuffer | null;
  streamClosed: boolean;
  /** Batch sessions only: samples accumulated until finalize. */
  batchFrames: Float32Array[];
  receivedSamples: number;
  lastChunkId: number; // -1 before the first chunk
  analyzedUntil: number; // seconds; end of the latest analyzed chunk
  processingMs: number;
  report: AnalysisReport | null;
  /** Tail of the per-session operation chain. */
  lock: Promise<void>;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  extractor: FeatureExtractor;
  config: Readonly<AnalysisConfig>;
  logger?: Logger;
  reportPersistence?: ReportPersistence;
  /** Clock in epoch ms. Default: Date.now */
  now?: () => number;
}

export class SessionManager {
  private readonly sessions: Map<string, Session> = new Map();
  private readonly extractor: FeatureExtractor;
  private readonly config: Readonly<AnalysisConfig>;
  private readonly logger: Logger;
  private readonly reportPersistence: ReportPersistence | undefined;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: SessionManagerDeps) {
    this.extractor = deps.extractor;
    this.config = deps.config;
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.reportPersistence = deps.reportPersistence;
    this.now = deps.now ?? Date.now;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  createSession(mode: SessionMode): Session {
    const session: Session = {
      id: uuidv4(),
      mode,
      status: "open",
      createdAt: this.now(),
      finalizedAt: null,
      chunkResults: [],
      events: [],
      temporal: new TemporalAnalyzer(this.config.temporal),
      overallAlert: AlertLevel.SAFE,
      streamBuffer: mode === "streaming" ? new StreamChunkBuffer(this.config.chunking) : null,
      streamClosed: false,
      batchFrames: [],
      receivedSamples: 0,
      lastChunkId: -1,
      analyzedUntil: 0,
      processingMs: 0,
      report: null,
      lock: Promise.resolve(),
    };

    this.sessions.set(session.id, session);
    this.logger.info(`Created ${mode} session ${session.id}`);
    return session;
  }

  /**
   * Retrieves a session by ID.
   * @throws SessionNotFoundError if the session does not exist or has expired
   */
  getSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      throw new SessionNotFoundError(sessionId, "expired");
    }
    return session;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  get sampleRate(): number {
    return this.config.chunking.sampleRate;
  }

  get chunkDurationSeconds(): number {
    return this.config.chunking.chunkDurationSeconds;
  }

  // ─── Ingestion ──────────────────────────────────────────────────────────────

  /**
   * Feed normalized samples into a session.
   *
   * Streaming sessions score every chunk the frame completes and return the
   * new results. Batch sessions only accumulate and return `[]`.
   */
  async submitAudio(sessionId: string, samples: Float32Array): Promise<ChunkResult[]> {
    const session = this.getSession(sessionId);
    return this.withLock(session, async () => {
      this.assertOpen(session);
      if (samples.length === 0) {
        return [];
      }
      validateWaveform(samples);

      if (session.mode === "batch") {
        if (session.chunkResults.length > 0) {
          throw new InputError(`Session ${session.id} already received pre-formed chunks; cannot mix in raw audio.`);
        }
        session.batchFrames.push(Float32Array.from(samples));
        session.receivedSamples += samples.length;
        return [];
      }

      if (session.streamClosed || !session.streamBuffer) {
        throw new InputError(`Stream for session ${session.id} is closed.`);
      }
      session.receivedSamples += samples.length;
      const results: ChunkResult[] = [];
      for (const chunk of session.streamBuffer.push(samples)) {
        if (session.streamClosed) break;
        results.push(await this.scoreChunk(session, chunk));
      }
      return results;
    });
  }

  /**
   * Score one pre-formed chunk. Chunks must arrive in increasing chunkId order.
   * @throws InputError for out-of-order ids or a waveform of the wrong length
   */
  async submitChunk(sessionId: string, chunk: Chunk): Promise<ChunkResult> {
    const session = this.getSession(sessionId);
    return this.withLock(session, async () => {
      this.assertOpen(session);
      if (session.batchFrames.length > 0) {
        throw new InputError(`Session ${session.id} has buffered raw audio; cannot mix in pre-formed chunks.`);
      }
      const { chunkSamples } = chunkGeometry(this.config.chunking);
      if (chunk.waveform.length !== chunkSamples) {
        throw new InputError(`Chunk ${chunk.chunkId} has ${chunk.waveform.length} samples, expected ${chunkSamples}.`);
      }
      validateWaveform(chunk.waveform);
      return this.scoreChunk(session, chunk);
    });
  }

  /**
   * Stop a stream. Audio submitted from now on is refused, and a submission
   * already running stops after its current chunk. Buffered audio is
   * dropped; results already produced stay for finalize.
   */
  async closeStream(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId);
    if (!session.streamBuffer) {
      return;
    }
    session.streamClosed = true;
    return this.withLock(session, async () => {
      if (session.streamBuffer && session.streamBuffer.bufferedSamples > 0) {
        const dropped = session.streamBuffer.bufferedSamples;
        session.streamBuffer.discard();
        this.logger.debug(`Closed stream ${session.id}, discarded ${dropped} buffered samples`);
      }
    });
  }

  // ─── Finalization ───────────────────────────────────────────────────────────

  /**
   * Run any pending batch analysis and build the report. Finalizing an
   * already-finalized session returns the same report.
   */
  async finalize(sessionId: string): Promise<AnalysisReport> {
    const session = this.getSession(sessionId);
    return this.withLock(session, async () => {
      if (session.status === "finalized" && session.report) {
        return session.report;
      }

      if (session.mode === "batch" && session.batchFrames.length > 0) {
        await this.runBatch(session);
      }
      if (session.streamBuffer) {
        session.streamBuffer.discard();
        session.streamClosed = true;
      }

      const report = this.buildReport(session);
      session.report = report;
      session.status = "finalized";
      session.finalizedAt = this.now();

      this.logger.info(
        `Session ${session.id} finalized: ${report.overallAlert}, ${report.totalChunks} chunks, ` +
          `${report.events.length} events, ${report.degradedChunks} degraded`,
      );
      return report;
    });
  }

  /**
   * @throws SessionNotFoundError if unknown, not finalized, or expired
   */
  getReport(sessionId: string): AnalysisReport {
    const session = this.getSession(sessionId);
    if (session.status !== "finalized" || !session.report) {
      throw new SessionNotFoundError(sessionId, "not finalized");
    }
    return session.report;
  }

  /**
   * Create a batch session, analyze the whole waveform, and return the report.
   * A failed run removes its session; nothing is left behind to retry.
   */
  async analyzeWaveform(waveform: Float32Array): Promise<AnalysisReport> {
    validateWaveform(waveform);
    const session = this.createSession("batch");
    try {
      await this.submitAudio(session.id, waveform);
      return await this.finalize(session.id);
    } catch (err) {
      this.sessions.delete(session.id);
      throw err;
    }
  }

  /**
   * Save a finalized report to disk. Opt-in only.
   * @returns saved file paths, or an empty array when no persistence is configured
   */
  async saveReport(sessionId: string): Promise<string[]> {
    const report = this.getReport(sessionId);
    if (!this.reportPersistence) {
      return [];
    }
    return this.reportPersistence.save(report);
  }

  // ─── Retention ──────────────────────────────────────────────────────────────

  /** Remove finalized sessions older than the report TTL. Returns the number removed. */
  purgeExpired(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.info(`Purged ${removed} expired session(s)`);
    }
    return removed;
  }

  startSweep(intervalMs = 60_000): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.purgeExpired(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  // ─── Pipeline ───────────────────────────────────────────────────────────────

  private async runBatch(session: Session): Promise<void> {
    const waveform = new Float32Array(session.receivedSamples);
    let offset = 0;
    for (const frame of session.batchFrames) {
      waveform.set(frame, offset);
      offset += frame.length;
    }

    const started = this.now();
    const chunks = [...chunkWaveform(waveform, this.config.chunking)];
    this.logger.info(
      `Session ${session.id}: ${(waveform.length / this.config.chunking.sampleRate).toFixed(1)}s of audio, ${chunks.length} chunks`,
    );

    // Extraction may run out of order; decisions never do. The buffered
    // audio stays until every chunk is applied so a failed run can be retried.
    const features = await mapOrdered(chunks, this.config.extractionConcurrency, (chunk) =>
      this.extractor.extract(chunk, { sessionId: session.id }),
    );
    chunks.forEach((chunk, i) => this.applyChunk(session, chunk, features[i]));
    session.batchFrames = [];
    session.processingMs += this.now() - started;
  }

  private async scoreChunk(session: Session, chunk: Chunk): Promise<ChunkResult> {
    if (chunk.chunkId <= session.lastChunkId) {
      throw new InputError(
        `Chunk ${chunk.chunkId} arrived out of order; session ${session.id} is at chunk ${session.lastChunkId}.`,
      );
    }
    const started = this.now();
    const features = await this.extractor.extract(chunk, { sessionId: session.id });
    const result = this.applyChunk(session, chunk, features);
    session.processingMs += this.now() - started;
    return result;
  }

  /** Fuse, fold into the temporal window, decide, and record. Synchronous by construction. */
  private applyChunk(session: Session, chunk: Chunk, features: FeatureVector): ChunkResult {
    const fused = fuse(features, this.config.fusion);
    const temporal = session.temporal.push(fused.fusedScore);
    const decision = decideChunkAlert(fused.fusedScore, temporal, this.config.decision);
    const event = buildEvent(
      { start: chunk.startTime, end: chunk.endTime, features, fused, temporal, alert: decision.alert },
      this.config.decision,
    );

    const result: ChunkResult = Object.freeze({
      chunkId: chunk.chunkId,
      start: chunk.startTime,
      end: chunk.endTime,
      fusedScore: fused.fusedScore,
      acousticScore: fused.componentScores.acoustic,
      nlpScore: fused.componentScores.nlp,
      emotionScore: fused.componentScores.emotion,
      hasSpeech: features.hasSpeech,
      transcript: features.transcript,
      alert: decision.alert,
      reason: decision.reason,
      explanation: event ? event.explanation : decision.reason,
      trend: temporal.trend,
      escalationScore: temporal.escalationScore,
      eventType: event ? event.type : null,
      degraded: features.degraded,
    });

    session.chunkResults.push(result);
    if (event) {
      session.events.push(Object.freeze(event));
    }
    session.overallAlert = maxAlert(session.overallAlert, decision.alert);
    session.lastChunkId = chunk.chunkId;
    session.analyzedUntil = Math.max(session.analyzedUntil, chunk.endTime);
    return result;
  }

  /** The report and everything it holds are frozen; callers share one instance. */
  private buildReport(session: Session): AnalysisReport {
    const { overall, statistics } = aggregateAlerts(session.chunkResults.map((r) => r.alert));
    const temporal = session.temporal.snapshot();
    const receivedSeconds = session.receivedSamples / this.config.chunking.sampleRate;

    return Object.freeze({
      sessionId: session.id,
      mode: session.mode,
      violenceDetected: overall !== AlertLevel.SAFE,
      overallAlert: overall,
      duration: roundTo(Math.max(receivedSeconds, session.analyzedUntil), 2),
      totalChunks: session.chunkResults.length,
      events: Object.freeze([...session.events]),
      chunks: Object.freeze([...session.chunkResults]),
      escalationTrend: temporal.trend,
      escalationScore: temporal.escalationScore,
      temporalPrediction: temporal.prediction,
      statistics: Object.freeze(statistics),
      degradedChunks: session.chunkResults.filter((r) => r.degraded).length,
      processingTimeSeconds: roundTo(session.processingMs / 1000, 2),
    });
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private withLock<T>(session: Session, operation: () => Promise<T>): Promise<T> {
    const run = session.lock.then(operation);
    // The chain continues whether or not this operation failed; the caller sees the rejection
    session.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private assertOpen(session: Session): void {
    if (session.status === "finalized") {
      throw new InputError(`Session ${session.id} is already finalized.`);
    }
  }

  private isExpired(session: Session): boolean {
    return session.finalizedAt !== null && this.now() - session.finalizedAt >= this.config.reportTtlMs;
  }
}
