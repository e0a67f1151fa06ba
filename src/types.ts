// Audio Violence Analyzer - Shared TypeScript interfaces and types

// ─── Alert Levels ───────────────────────────────────────────────────────────────

export enum AlertLevel {
  SAFE = "Safe",
  WARNING = "Warning",
  CRITICAL = "Critical",
}

/** Severity rank used for ordering and aggregation (Safe < Warning < Critical). */
export const ALERT_RANK: Readonly<Record<AlertLevel, number>> = {
  [AlertLevel.SAFE]: 0,
  [AlertLevel.WARNING]: 1,
  [AlertLevel.CRITICAL]: 2,
};

export type SessionMode = "batch" | "streaming";

export type SessionStatus = "open" | "finalized";

// ─── Chunks ─────────────────────────────────────────────────────────────────────

export interface Chunk {
  readonly chunkId: number;
  readonly startTime: number; // seconds from stream start
  readonly endTime: number; // seconds; end of real (unpadded) audio
  readonly waveform: Float32Array; // always chunkDuration * sampleRate samples
}

// ─── Feature Extraction ─────────────────────────────────────────────────────────

export type Modality = "vad" | "acoustic" | "transcript" | "nlp" | "emotion";

export interface ModalityFailure {
  modality: Modality;
  reason: "skipped" | "failed";
  message?: string;
}

export interface AcousticEvent {
  label: string;
  score: number;
}

/**
 * Per-chunk output of the feature extraction orchestrator.
 * A `null` score means the modality is absent for this chunk.
 */
export interface FeatureVector {
  readonly chunkId: number;
  readonly hasSpeech: boolean;
  readonly speechProbability: number;
  readonly acousticViolenceScore: number | null;
  readonly nlpThreatScore: number | null;
  readonly emotionViolenceScore: number | null;
  readonly transcript: string; // "" when there is no speech
  readonly acousticEvents: readonly AcousticEvent[]; // violent classes only, strongest first
  readonly unavailable: readonly ModalityFailure[];
  readonly degraded: boolean; // true when any inference call failed
}

// ─── Fusion ─────────────────────────────────────────────────────────────────────

export interface ComponentScores {
  acoustic: number;
  nlp: number;
  emotion: number;
}

export interface FusedScore {
  readonly chunkId: number;
  readonly fusedScore: number;
  readonly componentScores: Readonly<ComponentScores>;
  readonly fusionMode: "full" | "acoustic_only";
}

// ─── Temporal Analysis ──────────────────────────────────────────────────────────

export type Trend = "stable" | "rising" | "falling" | "sustained" | "spike";

export interface TemporalState {
  window: number[]; // most recent fused scores, oldest first
  trend: Trend;
  escalationScore: number;
  prediction: string;
  chunkCount: number; // total scores seen by the analyzer
}

// ─── Decisions and Events ───────────────────────────────────────────────────────

export type EventType = "gunshot" | "abusive_speech" | "aggressive_emotion" | "combined";

export interface AlertEvent {
  start: number;
  end: number;
  type: EventType;
  confidence: number;
  alert: AlertLevel;
  explanation: string;
  transcript: string;
  soundClass: string | null; // strongest violent acoustic class, when one was detected
}

/** Per-chunk decision record accumulated by a session. */
export interface ChunkResult {
  chunkId: number;
  start: number;
  end: number;
  fusedScore: number;
  acousticScore: number;
  nlpScore: number;
  emotionScore: number;
  hasSpeech: boolean;
  transcript: string;
  alert: AlertLevel;
  reason: string; // which decision rule fired
  explanation: string;
  trend: Trend;
  escalationScore: number;
  eventType: EventType | null;
  degraded: boolean;
}

// ─── Reports ────────────────────────────────────────────────────────────────────

export interface AlertStatistics {
  safeChunks: number;
  warningChunks: number;
  criticalChunks: number;
}

export interface AnalysisReport {
  sessionId: string;
  mode: SessionMode;
  violenceDetected: boolean;
  overallAlert: AlertLevel;
  duration: number; // seconds of analyzed audio
  totalChunks: number;
  events: readonly AlertEvent[];
  chunks: readonly ChunkResult[];
  escalationTrend: Trend;
  escalationScore: number;
  temporalPrediction: string;
  statistics: AlertStatistics;
  degradedChunks: number;
  processingTimeSeconds: number;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages (audio itself travels as binary PCM16 frames)
export type ClientMessage = { type: "finalize" };

/** Streaming per-chunk message. */
export interface ChunkResultMessage {
  type: "chunk_result";
  chunkId: number;
  start: number;
  end: number;
  fusedScore: number;
  alert: AlertLevel;
  transcript: string;
  eventType: EventType | null;
  trend: Trend;
  escalationScore: number;
  explanation: string;
}

// Server → Client messages
export type ServerMessage =
  | {
      type: "session_started";
      sessionId: string;
      sampleRate: number;
      chunkDurationSeconds: number;
    }
  | ChunkResultMessage
  | { type: "report"; report: AnalysisReport }
  | { type: "error"; message: string; recoverable: boolean };
