// Audio Violence Analyzer - Chunker
// Splits a normalized waveform into fixed-duration overlapping chunks.
//
// Chunk boundaries are integer sample offsets (k * strideSamples), never
// accumulated float seconds, so long recordings do not drift.

import type { ChunkingConfig } from "./config.js";
import type { Chunk } from "./types.js";

export interface ChunkGeometry {
  sampleRate: number;
  chunkSamples: number;
  strideSamples: number;
  minSamples: number;
}

export function chunkGeometry(config: ChunkingConfig): ChunkGeometry {
  return {
    sampleRate: config.sampleRate,
    chunkSamples: Math.round(config.chunkDurationSeconds * config.sampleRate),
    strideSamples: Math.round(config.strideSeconds * config.sampleRate),
    minSamples: Math.round(config.minChunkDurationSeconds * config.sampleRate),
  };
}

/** Seconds, rounded to the millisecond. */
function toSeconds(samples: number, sampleRate: number): number {
  return Math.round((samples / sampleRate) * 1000) / 1000;
}

function makeChunk(
  chunkId: number,
  source: Float32Array,
  startSample: number,
  realEndSample: number,
  geometry: ChunkGeometry,
): Chunk {
  // Always a full-length buffer; a short final chunk is zero-padded
  const waveform = new Float32Array(geometry.chunkSamples);
  waveform.set(source.subarray(startSample, realEndSample));
  return Object.freeze({
    chunkId,
    startTime: toSeconds(startSample, geometry.sampleRate),
    endTime: toSeconds(realEndSample, geometry.sampleRate),
    waveform,
  });
}

/**
 * Number of chunks `chunkWaveform` yields for a waveform of `totalSamples`:
 * `ceil((L - D) / S) + 1`, minus a trailing chunk with less than the minimum
 * duration of real audio. Audio shorter than one chunk yields exactly one.
 */
export function expectedChunkCount(totalSamples: number, geometry: ChunkGeometry): number {
  if (totalSamples <= 0) return 0;
  if (totalSamples <= geometry.chunkSamples) return 1;
  const count = Math.ceil((totalSamples - geometry.chunkSamples) / geometry.strideSamples) + 1;
  const lastStart = (count - 1) * geometry.strideSamples;
  return totalSamples - lastStart < geometry.minSamples ? count - 1 : count;
}

/**
 * Lazy, finite and restartable sequence of chunks over one waveform.
 * Every iteration re-derives the same chunks from the sample count.
 */
export class ChunkSequence implements Iterable<Chunk> {
  private readonly waveform: Float32Array;
  private readonly geometry: ChunkGeometry;

  constructor(waveform: Float32Array, geometry: ChunkGeometry) {
    this.waveform = waveform;
    this.geometry = geometry;
  }

  get length(): number {
    return expectedChunkCount(this.waveform.length, this.geometry);
  }

  /** Duration of the underlying waveform in seconds. */
  get durationSeconds(): number {
    return this.waveform.length / this.geometry.sampleRate;
  }

  *[Symbol.iterator](): Iterator<Chunk> {
    const total = this.waveform.length;
    const { chunkSamples, strideSamples, minSamples } = this.geometry;

    let chunkId = 0;
    let start = 0;
    while (start < total) {
      const end = start + chunkSamples;
      const realEnd = Math.min(end, total);

      // The first chunk is always kept (short audio is padded, not dropped)
      if (chunkId > 0 && realEnd - start < minSamples) {
        return;
      }

      yield makeChunk(chunkId, this.waveform, start, realEnd, this.geometry);

      if (end >= total) {
        return;
      }
      chunkId++;
      start += strideSamples;
    }
  }
}

export function chunkWaveform(waveform: Float32Array, config: ChunkingConfig): ChunkSequence {
  return new ChunkSequence(waveform, chunkGeometry(config));
}

/**
 * Streaming counterpart of ChunkSequence. Buffers incoming frames and releases
 * a chunk each time a full chunk duration is available, then advances by one
 * stride, so chunk boundaries match batch chunking of the same audio.
 * A partial chunk is never released.
 */
export class StreamChunkBuffer {
  private readonly geometry: ChunkGeometry;
  private buffer: Float32Array;
  private buffered: number;
  private consumedSamples: number; // absolute sample offset of buffer[0]
  private nextId: number;

  constructor(config: ChunkingConfig) {
    this.geometry = chunkGeometry(config);
    this.buffer = new Float32Array(this.geometry.chunkSamples * 2);
    this.buffered = 0;
    this.consumedSamples = 0;
    this.nextId = 0;
  }

  /** Samples currently waiting for a full chunk. */
  get bufferedSamples(): number {
    return this.buffered;
  }

  /** Id the next released chunk will carry. */
  get nextChunkId(): number {
    return this.nextId;
  }

  /** Append a frame and return every chunk that became complete. */
  push(frame: Float32Array): Chunk[] {
    this.ensureCapacity(this.buffered + frame.length);
    this.buffer.set(frame, this.buffered);
    this.buffered += frame.length;

    const ready: Chunk[] = [];
    const { chunkSamples, strideSamples, sampleRate } = this.geometry;

    while (this.buffered >= chunkSamples) {
      const waveform = this.buffer.slice(0, chunkSamples);
      ready.push(
        Object.freeze({
          chunkId: this.nextId,
          startTime: toSeconds(this.consumedSamples, sampleRate),
          endTime: toSeconds(this.consumedSamples + chunkSamples, sampleRate),
          waveform,
        }),
      );
      this.nextId++;

      // Keep the overlap for the next chunk
      this.buffer.copyWithin(0, strideSamples, this.buffered);
      this.buffered -= strideSamples;
      this.consumedSamples += strideSamples;
    }

    return ready;
  }

  /** Drop buffered audio. Chunk numbering continues from where it was. */
  discard(): void {
    this.consumedSamples += this.buffered;
    this.buffered = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;
    const grown = new Float32Array(capacity);
    grown.set(this.buffer.subarray(0, this.buffered));
    this.buffer = grown;
  }
}
