// Unit tests for the PCM / WAV ingestion boundary

import { describe, it, expect } from "vitest";
import { InputError } from "./errors.js";
import { computeRMS, decodePcm16, decodeWav, encodePcm16, encodeWav, validateWaveform } from "./pcm.js";

describe("decodePcm16", () => {
  it("scales 16-bit little-endian samples into [-1, 1)", () => {
    const buf = Buffer.alloc(6);
    buf.writeInt16LE(16384, 0);
    buf.writeInt16LE(-32768, 2);
    buf.writeInt16LE(0, 4);

    expect(Array.from(decodePcm16(buf))).toEqual([0.5, -1, 0]);
  });

  it("rejects data that is not 16-bit aligned", () => {
    expect(() => decodePcm16(Buffer.alloc(3))).toThrow(InputError);
    expect(() => decodePcm16(Buffer.alloc(3))).toThrow(
      "PCM byte length (3) is not a multiple of 2. Expected 16-bit aligned PCM data.",
    );
  });

  it("decodes an empty buffer to an empty waveform", () => {
    expect(decodePcm16(Buffer.alloc(0))).toHaveLength(0);
  });
});

describe("encodePcm16", () => {
  it("clamps out-of-range samples to the Int16 range", () => {
    const buf = encodePcm16(Float32Array.from([1, -1.5, 0.5]));
    expect(buf.readInt16LE(0)).toBe(32767);
    expect(buf.readInt16LE(2)).toBe(-32768);
    expect(buf.readInt16LE(4)).toBe(16384);
  });
});

describe("WAV encoding", () => {
  it("writes a 44-byte PCM16 mono header", () => {
    const wav = encodeWav(new Float32Array(10), 16000);
    expect(wav).toHaveLength(64);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.readUInt32LE(40)).toBe(20);
  });

  it("decodes what it encodes", () => {
    const { samples, sampleRate } = decodeWav(encodeWav(Float32Array.from([0, 0.5, -0.5]), 16000), 16000);
    expect(sampleRate).toBe(16000);
    expect(Array.from(samples)).toEqual([0, 0.5, -0.5]);
  });

  it("skips chunks that precede the data chunk", () => {
    const plain = encodeWav(Float32Array.from([0.5]), 16000);
    const list = Buffer.concat([Buffer.from("LIST", "ascii"), Buffer.from([3, 0, 0, 0]), Buffer.from("abc\0", "ascii")]);
    // RIFF header + fmt chunk, then LIST (odd size, padded), then the data chunk
    const wav = Buffer.concat([plain.subarray(0, 36), list, plain.subarray(36)]);

    expect(Array.from(decodeWav(wav, 16000).samples)).toEqual([0.5]);
  });

  it("rejects non-WAV data", () => {
    expect(() => decodeWav(Buffer.from("hello world!", "ascii"), 16000)).toThrow("Not a RIFF/WAVE file.");
  });

  it("rejects stereo audio", () => {
    const wav = encodeWav(new Float32Array(4), 16000);
    wav.writeUInt16LE(2, 22);
    expect(() => decodeWav(wav, 16000)).toThrow("Expected mono audio, got 2 channels.");
  });

  it("rejects audio at another sample rate", () => {
    expect(() => decodeWav(encodeWav(new Float32Array(4), 8000), 16000)).toThrow(
      "Expected 16000 Hz audio, got 8000 Hz.",
    );
  });

  it("rejects a WAV file without a data chunk", () => {
    const headerOnly = encodeWav(new Float32Array(0), 16000).subarray(0, 36);
    expect(() => decodeWav(headerOnly, 16000)).toThrow("WAV file has no data chunk.");
  });
});

describe("validateWaveform", () => {
  it("rejects an empty waveform", () => {
    expect(() => validateWaveform(new Float32Array(0))).toThrow("Waveform is empty.");
  });

  it("rejects non-finite samples", () => {
    expect(() => validateWaveform(Float32Array.from([0, Number.NaN]))).toThrow(
      "Waveform contains a non-finite sample at index 1.",
    );
  });

  it("accepts finite samples", () => {
    expect(() => validateWaveform(Float32Array.from([0, 0.25, -1]))).not.toThrow();
  });
});

describe("computeRMS", () => {
  it("returns the amplitude of a constant signal", () => {
    expect(computeRMS(new Float32Array(100).fill(0.5))).toBeCloseTo(0.5, 6);
  });

  it("returns 0 for an empty range", () => {
    expect(computeRMS(new Float32Array(10), 5, 5)).toBe(0);
  });
});
