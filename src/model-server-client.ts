// Audio Violence Analyzer - Model Server Client
//
// The sound-event and speech-emotion classifiers (and optionally a neural VAD)
// run in a separate model-serving process. This client posts each chunk as
// raw little-endian float32 samples and validates the JSON it gets back.
//
//   POST {baseUrl}/acoustic → { "classes":  { "<label>": score, ... } }
//   POST {baseUrl}/emotion  → { "emotions": { "<emotion>": score, ... } }
//   POST {baseUrl}/vad      → { "speech_probability": p,
//                               "speech_timestamps": [{ "start": s, "end": e }] }

import type {
  AcousticEventClassifier,
  ClassConfidences,
  EmotionClassifier,
  EmotionScores,
  SpeechTimestamp,
  VoiceActivityDetector,
  VoiceActivityResult,
} from "./inference.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ModelServerClientOptions {
  baseUrl: string;
  /** Per-request timeout. Default: 10000 ms */
  timeoutMs?: number;
  /** Injected for tests. Default: global fetch */
  fetchImpl?: FetchLike;
}

export class ModelServerError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ModelServerError";
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toScoreMap(value: unknown, field: string): Record<string, number> {
  if (!isRecord(value)) {
    throw new ModelServerError(`Model server response is missing "${field}"`);
  }
  const scores: Record<string, number> = {};
  for (const [label, score] of Object.entries(value)) {
    if (typeof score !== "number" || !Number.isFinite(score)) {
      throw new ModelServerError(`Model server returned a non-numeric score for "${label}"`);
    }
    scores[label] = score;
  }
  return scores;
}

function toTimestamps(value: unknown): SpeechTimestamp[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ModelServerError('Model server "speech_timestamps" must be an array');
  }
  return value.map((entry: unknown) => {
    if (!isRecord(entry) || typeof entry.start !== "number" || typeof entry.end !== "number") {
      throw new ModelServerError("Model server returned a malformed speech timestamp");
    }
    return { start: entry.start, end: entry.end };
  });
}

/** Serialize samples as little-endian float32 regardless of host byte order. */
export function encodeFloat32LE(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * 4);
  for (let i = 0; i < samples.length; i++) {
    buf.writeFloatLE(samples[i], i * 4);
  }
  return buf;
}

export class ModelServerClient implements AcousticEventClassifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ModelServerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async classify(waveform: Float32Array, sampleRate: number): Promise<ClassConfidences> {
    const body = await this.post("/acoustic", waveform, sampleRate);
    return toScoreMap(body.classes, "classes");
  }

  async classifyEmotion(waveform: Float32Array, sampleRate: number): Promise<EmotionScores> {
    const body = await this.post("/emotion", waveform, sampleRate);
    return toScoreMap(body.emotions, "emotions");
  }

  async detectSpeech(waveform: Float32Array, sampleRate: number): Promise<VoiceActivityResult> {
    const body = await this.post("/vad", waveform, sampleRate);
    const probability = body.speech_probability;
    if (typeof probability !== "number" || !Number.isFinite(probability)) {
      throw new ModelServerError('Model server response is missing "speech_probability"');
    }
    return { speechProbability: probability, speechTimestamps: toTimestamps(body.speech_timestamps) };
  }

  /** The emotion endpoint viewed as an EmotionClassifier. */
  asEmotionClassifier(): EmotionClassifier {
    return { classify: (waveform, sampleRate) => this.classifyEmotion(waveform, sampleRate) };
  }

  /** The VAD endpoint viewed as a VoiceActivityDetector. */
  asVoiceActivityDetector(): VoiceActivityDetector {
    return { detect: (waveform, sampleRate) => this.detectSpeech(waveform, sampleRate) };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/health`, {
        method: "GET",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private async post(path: string, waveform: Float32Array, sampleRate: number): Promise<Record<string, unknown>> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/octet-stream",
        "X-Sample-Rate": String(sampleRate),
      },
      body: encodeFloat32LE(waveform),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new ModelServerError(`Model server ${path} returned HTTP ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new ModelServerError(`Model server ${path} returned a non-object body`);
    }
    return body;
  }
}
