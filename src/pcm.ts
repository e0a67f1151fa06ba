// Audio Violence Analyzer - PCM ingestion boundary
//
// The core consumes a normalized mono float waveform. This module converts the
// two wire formats the transport accepts (raw 16-bit LE PCM and PCM16 WAV) into
// that waveform, and wraps waveforms back into WAV for transcription uploads.
// Resampling, downmixing and compressed formats are out of scope.

import { InputError } from "./errors.js";

const INT16_SCALE = 32768;
const WAV_HEADER_BYTES = 44;

/**
 * Decode 16-bit little-endian PCM into floats in [-1, 1).
 * @throws InputError when the byte length is not sample-aligned
 */
export function decodePcm16(data: Buffer): Float32Array {
  if (data.length % 2 !== 0) {
    throw new InputError(
      `PCM byte length (${data.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
    );
  }
  const sampleCount = data.length / 2;
  const samples = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = data.readInt16LE(i * 2) / INT16_SCALE;
  }
  return samples;
}

/** Encode floats as 16-bit little-endian PCM, clamping to the Int16 range. */
export function encodePcm16(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const scaled = Math.round(samples[i] * INT16_SCALE);
    buf.writeInt16LE(Math.max(-32768, Math.min(32767, scaled)), i * 2);
  }
  return buf;
}

export interface DecodedWav {
  samples: Float32Array;
  sampleRate: number;
}

/**
 * Decode a PCM16 mono WAV file. Walks the RIFF chunk list so files with extra
 * chunks (LIST, fact) before `data` are accepted.
 *
 * @throws InputError for anything other than uncompressed 16-bit mono PCM at `expectedSampleRate`
 */
export function decodeWav(data: Buffer, expectedSampleRate: number): DecodedWav {
  if (data.length < 12 || data.toString("ascii", 0, 4) !== "RIFF" || data.toString("ascii", 8, 12) !== "WAVE") {
    throw new InputError("Not a RIFF/WAVE file.");
  }

  let offset = 12;
  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;

  while (offset + 8 <= data.length) {
    const chunkId = data.toString("ascii", offset, offset + 4);
    const chunkSize = data.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === "fmt ") {
      if (chunkSize < 16 || body + 16 > data.length) {
        throw new InputError("Truncated WAV fmt chunk.");
      }
      format = {
        audioFormat: data.readUInt16LE(body),
        channels: data.readUInt16LE(body + 2),
        sampleRate: data.readUInt32LE(body + 4),
        bitsPerSample: data.readUInt16LE(body + 14),
      };
    } else if (chunkId === "data") {
      if (!format) {
        throw new InputError("WAV data chunk appears before the fmt chunk.");
      }
      if (format.audioFormat !== 1 || format.bitsPerSample !== 16) {
        throw new InputError(
          `Unsupported WAV encoding (format ${format.audioFormat}, ${format.bitsPerSample}-bit). Expected 16-bit PCM.`,
        );
      }
      if (format.channels !== 1) {
        throw new InputError(`Expected mono audio, got ${format.channels} channels.`);
      }
      if (format.sampleRate !== expectedSampleRate) {
        throw new InputError(`Expected ${expectedSampleRate} Hz audio, got ${format.sampleRate} Hz.`);
      }
      const end = Math.min(body + chunkSize, data.length);
      // Drop a dangling odd byte from a truncated upload
      const alignedEnd = end - ((end - body) % 2);
      return { samples: decodePcm16(data.subarray(body, alignedEnd)), sampleRate: format.sampleRate };
    }

    // RIFF chunks are word-aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new InputError("WAV file has no data chunk.");
}

/** Wrap a mono float waveform into a 16-bit PCM WAV file. */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const pcm = encodePcm16(samples);
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28); // byte rate
  header.writeUInt16LE(2, 32); // block align
  header.writeUInt16LE(16, 34); // bits per sample
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

/** Root-mean-square energy of a float sample range. Returns 0 for an empty range. */
export function computeRMS(samples: Float32Array, start = 0, end = samples.length): number {
  const count = end - start;
  if (count <= 0) return 0;
  let sumSquares = 0;
  for (let i = start; i < end; i++) {
    sumSquares += samples[i] * samples[i];
  }
  return Math.sqrt(sumSquares / count);
}

/**
 * Reject waveforms the pipeline cannot analyze.
 * @throws InputError for an empty waveform or non-finite samples
 */
export function validateWaveform(samples: Float32Array): void {
  if (samples.length === 0) {
    throw new InputError("Waveform is empty.");
  }
  for (let i = 0; i < samples.length; i++) {
    if (!Number.isFinite(samples[i])) {
      throw new InputError(`Waveform contains a non-finite sample at index ${i}.`);
    }
  }
}
