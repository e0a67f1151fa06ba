// ─── Energy VAD ─────────────────────────────────────────────────────────────────
// Local voice-activity detector based on per-frame RMS energy. Used when no
// neural VAD is served by the model server.

import type { SpeechTimestamp, VoiceActivityDetector, VoiceActivityResult } from "./inference.js";
import { computeRMS } from "./pcm.js";
import { roundTo } from "./utils.js";

export interface EnergyVADConfig {
  /** Analysis frame length in seconds. Default: 0.05 */
  frameDurationSeconds: number;
  /** Frames with float RMS at or above this are speech-active. Default: 0.02 */
  energyThreshold: number;
  /** Runs shorter than this many frames are ignored as clicks. Default: 3 */
  minSpeechFrames: number;
  /** Silent gaps up to this many frames inside speech are bridged. Default: 4 */
  maxGapFrames: number;
}

export const DEFAULT_ENERGY_VAD_CONFIG: EnergyVADConfig = {
  frameDurationSeconds: 0.05,
  energyThreshold: 0.02,
  minSpeechFrames: 3,
  maxGapFrames: 4,
};

interface FrameRun {
  startFrame: number;
  endFrame: number; // exclusive
}

/**
 * Classifies fixed-length frames as speech-active by energy, merges nearby
 * active frames into runs, and reports the fraction of frames covered by runs
 * as the speech probability.
 */
export class EnergyVAD implements VoiceActivityDetector {
  private readonly config: EnergyVADConfig;

  constructor(config: Partial<EnergyVADConfig> = {}) {
    this.config = { ...DEFAULT_ENERGY_VAD_CONFIG, ...config };
  }

  async detect(waveform: Float32Array, sampleRate: number): Promise<VoiceActivityResult> {
    const frameSamples = Math.max(1, Math.round(this.config.frameDurationSeconds * sampleRate));
    const frameCount = Math.floor(waveform.length / frameSamples);
    if (frameCount === 0) {
      return { speechProbability: 0, speechTimestamps: [] };
    }

    const active: boolean[] = [];
    for (let f = 0; f < frameCount; f++) {
      const start = f * frameSamples;
      active.push(computeRMS(waveform, start, start + frameSamples) >= this.config.energyThreshold);
    }

    const runs = this.findRuns(active);
    const speechFrames = runs.reduce((sum, run) => sum + (run.endFrame - run.startFrame), 0);
    const frameSeconds = frameSamples / sampleRate;

    const speechTimestamps: SpeechTimestamp[] = runs.map((run) => ({
      start: roundTo(run.startFrame * frameSeconds, 3),
      end: roundTo(run.endFrame * frameSeconds, 3),
    }));

    return {
      speechProbability: roundTo(speechFrames / frameCount),
      speechTimestamps,
    };
  }

  private findRuns(active: boolean[]): FrameRun[] {
    const merged: FrameRun[] = [];
    let runStart: number | null = null;

    for (let f = 0; f <= active.length; f++) {
      const isActive = f < active.length && active[f];
      if (isActive && runStart === null) {
        runStart = f;
      } else if (!isActive && runStart !== null) {
        const previous = merged[merged.length - 1];
        if (previous && runStart - previous.endFrame <= this.config.maxGapFrames) {
          previous.endFrame = f;
        } else {
          merged.push({ startFrame: runStart, endFrame: f });
        }
        runStart = null;
      }
    }

    return merged.filter((run) => run.endFrame - run.startFrame >= this.config.minSpeechFrames);
  }
}
