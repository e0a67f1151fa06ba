// Audio Violence Analyzer - Feature Extraction Orchestrator
// Runs the per-chunk decision graph over the five inference collaborators:
//
//   VAD ─┬─ hasSpeech? ── transcribe ── non-empty? ─┬─ toxicity
//        │                                          └─ emotion
//   acoustic (always, concurrently with VAD)
//
// A throwing collaborator never fails the chunk. Its modality becomes absent
// (null), the vector is marked degraded, and the failure is logged.

import type { AnalysisConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { ClassConfidences, InferenceCollaborators } from "./inference.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { AcousticEvent, Chunk, FeatureVector, Modality, ModalityFailure } from "./types.js";
import { clamp01, maxOfKeys, roundTo } from "./utils.js";

/** Maximum number of violent acoustic classes kept on a FeatureVector. */
const MAX_ACOUSTIC_EVENTS = 5;

type Attempt<T> = { ok: true; value: T } | { ok: false; message: string };

export interface FeatureExtractorOptions {
  collaborators: InferenceCollaborators;
  config: Pick<AnalysisConfig, "chunking" | "extraction">;
  logger?: Logger;
}

/** Identifies the chunk in failure logs. */
export interface ExtractionContext {
  sessionId?: string;
}

export class FeatureExtractor {
  private readonly collaborators: InferenceCollaborators;
  private readonly config: Pick<AnalysisConfig, "chunking" | "extraction">;
  private readonly logger: Logger;

  constructor(options: FeatureExtractorOptions) {
    this.collaborators = options.collaborators;
    this.config = options.config;
    this.logger = options.logger ?? createConsoleLogger("FeatureExtractor");
  }

  async extract(chunk: Chunk, context: ExtractionContext = {}): Promise<FeatureVector> {
    const { sampleRate } = this.config.chunking;
    const { speechThreshold, threatCategories, violentEmotions } = this.config.extraction;
    const { vad, acoustic, transcriber, toxicity, emotion } = this.collaborators;
    const failures = new Map<Modality, ModalityFailure>();

    const attempt = async <T>(modality: Modality, call: () => Promise<T>): Promise<Attempt<T>> => {
      try {
        return { ok: true, value: await call() };
      } catch (err) {
        const message = errorMessage(err);
        failures.set(modality, { modality, reason: "failed", message });
        this.logger.warn(
          `${modality} inference failed for ${context.sessionId ? `session ${context.sessionId} ` : ""}chunk ${chunk.chunkId}: ${message}`,
        );
        return { ok: false, message };
      }
    };
    const skip = (modality: Modality) => failures.set(modality, { modality, reason: "skipped" });

    // ── Always: VAD and acoustic classification ──
    const [vadResult, acousticResult] = await Promise.all([
      attempt("vad", () => vad.detect(chunk.waveform, sampleRate)),
      attempt("acoustic", () => acoustic.classify(chunk.waveform, sampleRate)),
    ]);

    // A failed VAD means speech is treated as absent
    const speechProbability = vadResult.ok ? roundTo(clamp01(vadResult.value.speechProbability)) : 0;
    const hasSpeech = speechProbability > speechThreshold;

    let acousticViolenceScore: number | null = null;
    let acousticEvents: AcousticEvent[] = [];
    if (acousticResult.ok) {
      acousticEvents = this.violentEvents(acousticResult.value);
      acousticViolenceScore = acousticEvents.length > 0 ? acousticEvents[0].score : 0;
    }

    // ── Speech branch ──
    let transcript = "";
    let nlpThreatScore: number | null = null;
    let emotionViolenceScore: number | null = null;

    if (!hasSpeech) {
      skip("transcript");
    } else {
      const transcription = await attempt("transcript", () => transcriber.transcribe(chunk.waveform, sampleRate));
      if (transcription.ok) {
        transcript = transcription.value.text.trim();
      }
    }

    if (transcript === "") {
      skip("nlp");
      skip("emotion");
    } else {
      const text = transcript;
      const [toxicityResult, emotionResult] = await Promise.all([
        attempt("nlp", () => toxicity.score(text)),
        attempt("emotion", () => emotion.classify(chunk.waveform, sampleRate)),
      ]);
      if (toxicityResult.ok) {
        nlpThreatScore = roundTo(maxOfKeys(toxicityResult.value, threatCategories));
      }
      if (emotionResult.ok) {
        emotionViolenceScore = roundTo(maxOfKeys(emotionResult.value, violentEmotions));
      }
    }

    const modalityOrder: Modality[] = ["vad", "acoustic", "transcript", "nlp", "emotion"];
    const unavailable = modalityOrder.flatMap((m) => {
      const failure = failures.get(m);
      return failure ? [failure] : [];
    });

    return Object.freeze({
      chunkId: chunk.chunkId,
      hasSpeech,
      speechProbability,
      acousticViolenceScore,
      nlpThreatScore,
      emotionViolenceScore,
      transcript,
      acousticEvents: Object.freeze(acousticEvents),
      unavailable: Object.freeze(unavailable),
      degraded: unavailable.some((f) => f.reason === "failed"),
    });
  }

  /**
   * Classes whose label contains one of the configured violent class names
   * (case-insensitive), strongest first.
   */
  private violentEvents(confidences: ClassConfidences): AcousticEvent[] {
    const needles = this.config.extraction.violentAcousticClasses.map((c) => c.toLowerCase());
    const events: AcousticEvent[] = [];
    for (const [label, score] of Object.entries(confidences)) {
      if (!Number.isFinite(score) || score <= 0) continue;
      const lower = label.toLowerCase();
      if (needles.some((needle) => lower.includes(needle))) {
        events.push({ label, score: roundTo(clamp01(score)) });
      }
    }
    events.sort((a, b) => b.score - a.score || a.label.localeCompare(b.label));
    return events.slice(0, MAX_ACOUSTIC_EVENTS);
  }
}
