// Audio Violence Analyzer - Analysis configuration
//
// One validated, frozen AnalysisConfig is built at startup and passed
// explicitly to the fusion, temporal and decision stages. Nothing reads
// thresholds from ambient state.

import { readFileSync } from "node:fs";
import { ConfigurationError } from "./errors.js";

// ─── Configuration Types ────────────────────────────────────────────────────────

export interface ChunkingConfig {
  /** Sample rate of the normalized waveform. Default: 16000 */
  sampleRate: number;
  /** Duration of every chunk in seconds. Default: 2.5 */
  chunkDurationSeconds: number;
  /** Distance between consecutive chunk starts in seconds. Default: 2.0 (0.5s overlap) */
  strideSeconds: number;
  /** A trailing partial chunk with less real audio than this is dropped. Default: 1.0 */
  minChunkDurationSeconds: number;
}

/** Fusion weights for the speech branch. Must sum to 1.0. */
export interface FusionWeights {
  acoustic: number;
  nlp: number;
  emotion: number;
}

export interface TemporalConfig {
  /** Number of most recent fused scores kept in the sliding window. Default: 5 */
  windowSize: number;
  /** Spike: current score must exceed this. Default: 0.85 */
  spikeHighThreshold: number;
  /** Spike: previous score must be below this. Default: 0.4 */
  spikeLowThreshold: number;
  /** Sustained: scores above this count as aggressive. Default: 0.5 */
  sustainedThreshold: number;
  /** Sustained: minimum number of aggressive scores in the window. Default: 3 */
  sustainedMinCount: number;
  /** Rising: minimum last - first delta over a non-decreasing window. Default: 0.15 */
  risingMinDelta: number;
  /** Falling: last must be below first minus this. Default: 0.2 */
  fallingMinDelta: number;
}

export interface DecisionThresholds {
  /** fused > this → Critical. Default: 0.85 */
  criticalScore: number;
  /** sustained trend and fused > this → Critical. Default: 0.7 */
  sustainedCriticalScore: number;
  /** fused > this → Warning. Default: 0.3 */
  warningScore: number;
  /** escalation > this → Warning. Default: 0.3 */
  escalationWarningScore: number;
  /** fused > this → an event is logged. Default: 0.3 */
  eventScore: number;
  /** Components within this distance of the strongest one count as co-dominant. Default: 0.1 */
  dominanceMargin: number;
}

export interface ExtractionConfig {
  /** hasSpeech = speechProbability > this. Default: 0.5 */
  speechThreshold: number;
  /** Acoustic classes (case-insensitive substring match) that count as violent. */
  violentAcousticClasses: readonly string[];
  /** Toxicity categories reduced by max into the NLP threat score. */
  threatCategories: readonly string[];
  /** Emotions reduced by max into the emotion violence score. */
  violentEmotions: readonly string[];
}

export interface AnalysisConfig {
  chunking: ChunkingConfig;
  fusion: FusionWeights;
  temporal: TemporalConfig;
  decision: DecisionThresholds;
  extraction: ExtractionConfig;
  /** Max chunks whose features are extracted concurrently in batch mode. Default: 4 */
  extractionConcurrency: number;
  /** How long a finalized report stays retrievable. Default: 1 hour */
  reportTtlMs: number;
}

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_FUSION_WEIGHTS: FusionWeights = { acoustic: 0.5, nlp: 0.3, emotion: 0.2 };

/** Sound-event taxonomy labels treated as violent. */
export const DEFAULT_VIOLENT_ACOUSTIC_CLASSES = [
  "Gunshot, gunfire",
  "Machine gun",
  "Cap gun",
  "Explosion",
  "Boom",
  "Screaming",
  "Shout",
  "Battle cry",
  "Glass",
  "Shatter",
  "Breaking",
  "Smash, crash",
  "Slap, smack",
  "Whack, thwack",
  "Thump, thud",
];

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  chunking: {
    sampleRate: 16000,
    chunkDurationSeconds: 2.5,
    strideSeconds: 2.0,
    minChunkDurationSeconds: 1.0,
  },
  fusion: DEFAULT_FUSION_WEIGHTS,
  temporal: {
    windowSize: 5,
    spikeHighThreshold: 0.85,
    spikeLowThreshold: 0.4,
    sustainedThreshold: 0.5,
    sustainedMinCount: 3,
    risingMinDelta: 0.15,
    fallingMinDelta: 0.2,
  },
  decision: {
    criticalScore: 0.85,
    sustainedCriticalScore: 0.7,
    warningScore: 0.3,
    escalationWarningScore: 0.3,
    eventScore: 0.3,
    dominanceMargin: 0.1,
  },
  extraction: {
    speechThreshold: 0.5,
    violentAcousticClasses: DEFAULT_VIOLENT_ACOUSTIC_CLASSES,
    threatCategories: ["toxic", "severe_toxic", "threat"],
    violentEmotions: ["angry", "fear"],
  },
  extractionConcurrency: 4,
  reportTtlMs: 60 * 60 * 1000,
};

// ─── Validation ─────────────────────────────────────────────────────────────────

const WEIGHT_SUM_TOLERANCE = 1e-6;

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function collectFusionProblems(weights: FusionWeights, problems: string[]): void {
  for (const [name, value] of Object.entries(weights)) {
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`fusion weight "${name}" must be a non-negative number (got ${value})`);
    }
  }
  const sum = weights.acoustic + weights.nlp + weights.emotion;
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`fusion weights must sum to 1.0 (got ${sum})`);
  }
}

/**
 * Validate an AnalysisConfig and return a deep-frozen copy.
 * @throws ConfigurationError listing every problem found
 */
export function validateAnalysisConfig(config: AnalysisConfig): Readonly<AnalysisConfig> {
  const problems: string[] = [];
  const { chunking, fusion, temporal, decision, extraction } = config;

  if (!Number.isInteger(chunking.sampleRate) || chunking.sampleRate <= 0) {
    problems.push(`sampleRate must be a positive integer (got ${chunking.sampleRate})`);
  }
  if (!(chunking.chunkDurationSeconds > 0)) {
    problems.push(`chunkDurationSeconds must be > 0 (got ${chunking.chunkDurationSeconds})`);
  }
  if (!(chunking.strideSeconds > 0) || chunking.strideSeconds > chunking.chunkDurationSeconds) {
    problems.push(
      `strideSeconds must be > 0 and <= chunkDurationSeconds (got ${chunking.strideSeconds})`,
    );
  }
  if (
    !(chunking.minChunkDurationSeconds > 0) ||
    chunking.minChunkDurationSeconds > chunking.chunkDurationSeconds
  ) {
    problems.push(
      `minChunkDurationSeconds must be > 0 and <= chunkDurationSeconds (got ${chunking.minChunkDurationSeconds})`,
    );
  }

  collectFusionProblems(fusion, problems);

  if (!Number.isInteger(temporal.windowSize) || temporal.windowSize <= 0) {
    problems.push(`windowSize must be a positive integer (got ${temporal.windowSize})`);
  }
  if (!Number.isInteger(temporal.sustainedMinCount) || temporal.sustainedMinCount <= 0) {
    problems.push(`sustainedMinCount must be a positive integer (got ${temporal.sustainedMinCount})`);
  }
  const temporalThresholds: Array<[string, number]> = [
    ["spikeHighThreshold", temporal.spikeHighThreshold],
    ["spikeLowThreshold", temporal.spikeLowThreshold],
    ["sustainedThreshold", temporal.sustainedThreshold],
    ["risingMinDelta", temporal.risingMinDelta],
    ["fallingMinDelta", temporal.fallingMinDelta],
  ];
  const decisionThresholds: Array<[string, number]> = [
    ["criticalScore", decision.criticalScore],
    ["sustainedCriticalScore", decision.sustainedCriticalScore],
    ["warningScore", decision.warningScore],
    ["escalationWarningScore", decision.escalationWarningScore],
    ["eventScore", decision.eventScore],
    ["dominanceMargin", decision.dominanceMargin],
    ["speechThreshold", extraction.speechThreshold],
  ];
  for (const [name, value] of [...temporalThresholds, ...decisionThresholds]) {
    if (!isUnitInterval(value)) {
      problems.push(`${name} must be within [0, 1] (got ${value})`);
    }
  }

  if (extraction.violentAcousticClasses.length === 0) {
    problems.push("violentAcousticClasses must not be empty");
  }
  if (extraction.threatCategories.length === 0) {
    problems.push("threatCategories must not be empty");
  }
  if (extraction.violentEmotions.length === 0) {
    problems.push("violentEmotions must not be empty");
  }
  if (!Number.isInteger(config.extractionConcurrency) || config.extractionConcurrency <= 0) {
    problems.push(`extractionConcurrency must be a positive integer (got ${config.extractionConcurrency})`);
  }
  if (!(config.reportTtlMs > 0)) {
    problems.push(`reportTtlMs must be > 0 (got ${config.reportTtlMs})`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return Object.freeze({
    chunking: Object.freeze({ ...chunking }),
    fusion: Object.freeze({ ...fusion }),
    temporal: Object.freeze({ ...temporal }),
    decision: Object.freeze({ ...decision }),
    extraction: Object.freeze({
      ...extraction,
      violentAcousticClasses: Object.freeze([...extraction.violentAcousticClasses]),
      threatCategories: Object.freeze([...extraction.threatCategories]),
      violentEmotions: Object.freeze([...extraction.violentEmotions]),
    }),
    extractionConcurrency: config.extractionConcurrency,
    reportTtlMs: config.reportTtlMs,
  });
}

// ─── Loading ────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readWeight(raw: Record<string, unknown>, key: keyof FusionWeights): number {
  const value = raw[key] ?? raw[`w_${key}`];
  if (typeof value !== "number") {
    throw new ConfigurationError([`fusion weights file is missing a numeric "${key}" weight`]);
  }
  return value;
}

/**
 * Parse fusion weights from JSON text. Accepts `{ acoustic, nlp, emotion }`
 * or the `{ w_acoustic, w_nlp, w_emotion }` spelling written by weight
 * optimization runs.
 */
export function parseFusionWeights(json: string): FusionWeights {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ConfigurationError([`fusion weights file is not valid JSON: ${String(err)}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(["fusion weights file must contain a JSON object"]);
  }
  return {
    acoustic: readWeight(parsed, "acoustic"),
    nlp: readWeight(parsed, "nlp"),
    emotion: readWeight(parsed, "emotion"),
  };
}

export function loadFusionWeights(path: string): FusionWeights {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError([`cannot read fusion weights file ${path}: ${String(err)}`]);
  }
  return parseFusionWeights(text);
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError([`${name} must be a positive integer (got "${value}")`]);
  }
  return parsed;
}

/**
 * Build the validated AnalysisConfig from environment variables on top of
 * `base`. Reads FUSION_WEIGHTS_PATH, EXTRACTION_CONCURRENCY and REPORT_TTL_SECONDS.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv,
  base: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): Readonly<AnalysisConfig> {
  const weightsPath = env.FUSION_WEIGHTS_PATH?.trim();
  const concurrency = parsePositiveInt(env.EXTRACTION_CONCURRENCY, "EXTRACTION_CONCURRENCY");
  const ttlSeconds = parsePositiveInt(env.REPORT_TTL_SECONDS, "REPORT_TTL_SECONDS");

  return validateAnalysisConfig({
    ...base,
    fusion: weightsPath ? loadFusionWeights(weightsPath) : base.fusion,
    extractionConcurrency: concurrency ?? base.extractionConcurrency,
    reportTtlMs: ttlSeconds !== undefined ? ttlSeconds * 1000 : base.reportTtlMs,
  });
}
