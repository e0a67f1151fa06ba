// Audio Violence Analyzer - Transcribers
// Speech-to-text adapters for the chunk transcriber collaborator:
//   1. OpenAI audio transcriptions (default)
//   2. Deepgram pre-recorded transcription
//
// Both clients are injected through minimal interfaces so tests can supply
// fakes without importing the SDKs. Chunk audio is sent in-memory as a WAV
// file and never written to disk.

import type { Transcriber, TranscriptionResult } from "./inference.js";
import { encodeWav } from "./pcm.js";
import { roundTo } from "./utils.js";

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create()` of the OpenAI SDK.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: string;
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * Transcription response. `segments` is only present with the `verbose_json`
 * response format (whisper-1); `no_speech_prob` gives a per-segment confidence.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  segments?: Array<{
    text: string;
    no_speech_prob?: number;
  }>;
}

export interface OpenAITranscriberOptions {
  /** Default: "whisper-1" (verbose_json with segment confidences) */
  model?: string;
  /** Default: "en" */
  language?: string;
}

export class OpenAITranscriber implements Transcriber {
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;
  private readonly language: string;

  constructor(client: OpenAITranscriptionClient, options: OpenAITranscriberOptions = {}) {
    this.client = client;
    this.model = options.model ?? "whisper-1";
    this.language = options.language ?? "en";
  }

  async transcribe(waveform: Float32Array, sampleRate: number): Promise<TranscriptionResult> {
    const wav = encodeWav(waveform, sampleRate);
    const file = new File([new Uint8Array(wav.buffer, wav.byteOffset, wav.byteLength)], "chunk.wav", {
      type: "audio/wav",
    });

    // Only whisper-1 supports verbose_json; newer transcribe models return text only
    const response = await this.client.audio.transcriptions.create({
      file,
      model: this.model,
      language: this.language,
      response_format: this.model === "whisper-1" ? "verbose_json" : "json",
    });

    return parseOpenAITranscription(response);
  }
}

/**
 * Confidence is the mean of `1 - no_speech_prob` over segments when the
 * response carries them; a text-only response counts as fully confident.
 */
export function parseOpenAITranscription(response: OpenAITranscriptionResponse): TranscriptionResult {
  const text = response.text?.trim() ?? "";
  if (!text) {
    return { text: "", confidence: 0 };
  }

  const scored = (response.segments ?? []).filter(
    (s): s is { text: string; no_speech_prob: number } => typeof s.no_speech_prob === "number",
  );
  if (scored.length === 0) {
    return { text, confidence: 1 };
  }

  const mean = scored.reduce((sum, s) => sum + (1 - s.no_speech_prob), 0) / scored.length;
  return { text, confidence: roundTo(mean) };
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

export interface DeepgramTranscribeOptions {
  model: string;
  language: string;
  smart_format: boolean;
  punctuate: boolean;
}

/**
 * Shape of a Deepgram pre-recorded response, defined locally to avoid tight
 * coupling with SDK internals. The SDK resolves `{ result, error }` instead of
 * rejecting.
 */
export interface DeepgramPrerecordedResponse {
  result: {
    results: {
      channels: Array<{
        alternatives: Array<{ transcript: string; confidence: number }>;
      }>;
    };
  } | null;
  error: { message: string } | null;
}

/** Minimal interface for `listen.prerecorded.transcribeFile()` of the Deepgram SDK. */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(source: Buffer, options: DeepgramTranscribeOptions): Promise<DeepgramPrerecordedResponse>;
    };
  };
}

export class DeepgramTranscriber implements Transcriber {
  private readonly client: DeepgramPrerecordedClient;
  private readonly options: DeepgramTranscribeOptions;

  constructor(client: DeepgramPrerecordedClient, options: Partial<DeepgramTranscribeOptions> = {}) {
    this.client = client;
    this.options = {
      model: "nova-2",
      language: "en",
      smart_format: true,
      punctuate: true,
      ...options,
    };
  }

  async transcribe(waveform: Float32Array, sampleRate: number): Promise<TranscriptionResult> {
    const { result, error } = await this.client.listen.prerecorded.transcribeFile(
      encodeWav(waveform, sampleRate),
      this.options,
    );

    if (error) {
      throw new Error(`Deepgram transcription failed: ${error.message}`);
    }

    // Deepgram returns empty alternatives or an empty transcript for silence
    const alternative = result?.results.channels[0]?.alternatives[0];
    if (!alternative || !alternative.transcript.trim()) {
      return { text: "", confidence: 0 };
    }

    return { text: alternative.transcript.trim(), confidence: roundTo(alternative.confidence) };
  }
}
