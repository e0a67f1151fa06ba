// Audio Violence Analyzer - Library entry point
// Server wiring lives in main.ts; this module only re-exports the public API.

import { APP_INFO } from "./server.js";

export const APP_NAME = APP_INFO.app;
export const APP_VERSION = APP_INFO.version;

export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export { createConsoleLogger, type Logger } from "./logger.js";
export { chunkWaveform, chunkGeometry, expectedChunkCount, ChunkSequence, StreamChunkBuffer } from "./chunker.js";
export { decodePcm16, encodePcm16, decodeWav, encodeWav, validateWaveform } from "./pcm.js";
export type * from "./inference.js";
export { EnergyVAD, DEFAULT_ENERGY_VAD_CONFIG, type EnergyVADConfig } from "./energy-vad.js";
export * from "./transcriber.js";
export * from "./toxicity-scorer.js";
export * from "./model-server-client.js";
export { FeatureExtractor, type FeatureExtractorOptions, type ExtractionContext } from "./feature-extractor.js";
export { fuse } from "./score-fusion.js";
export { TemporalAnalyzer, PREDICTIONS } from "./temporal-analyzer.js";
export {
  decideChunkAlert,
  aggregateAlerts,
  classifyEventType,
  explain,
  buildEvent,
  type ChunkDecision,
  type AlertAggregate,
} from "./decision-engine.js";
export { SessionManager, type Session, type SessionManagerDeps } from "./session-manager.js";
export { ReportPersistence, formatTimeline } from "./report-persistence.js";
export { createAppServer, type AppServer, type CreateServerOptions } from "./server.js";
