// Audio Violence Analyzer - Temporal Analyzer
// Per-session sliding window over fused scores that detects escalation
// patterns. One analyzer instance belongs to exactly one session.

import type { TemporalConfig } from "./config.js";
import type { TemporalState, Trend } from "./types.js";
import { clamp01, roundTo } from "./utils.js";

const SPIKE_WEIGHT = 0.4;
const RISING_WEIGHT = 0.3;
const SUSTAINED_WEIGHT = 0.3;

export const PREDICTIONS = {
  escalating: "violence likely to escalate",
  deescalating: "situation de-escalating",
  stable: "stable",
} as const;

interface TrendConditions {
  spike: boolean;
  sustained: boolean;
  rising: boolean;
  falling: boolean;
}

/** Evaluate every trend condition over a window (oldest first). */
export function evaluateConditions(window: readonly number[], config: TemporalConfig): TrendConditions {
  const n = window.length;
  if (n === 0) {
    return { spike: false, sustained: false, rising: false, falling: false };
  }
  const first = window[0];
  const last = window[n - 1];

  const spike = n >= 2 && last > config.spikeHighThreshold && window[n - 2] < config.spikeLowThreshold;
  const sustained = window.filter((s) => s > config.sustainedThreshold).length >= config.sustainedMinCount;

  let nonDecreasing = true;
  for (let i = 1; i < n; i++) {
    if (window[i] < window[i - 1]) {
      nonDecreasing = false;
      break;
    }
  }
  const rising = n >= 2 && nonDecreasing && last - first > config.risingMinDelta;
  const falling = n >= 2 && last < first - config.fallingMinDelta;

  return { spike, sustained, rising, falling };
}

/** First matching condition wins: spike, sustained, rising, falling, stable. */
export function classifyTrend(conditions: TrendConditions): Trend {
  if (conditions.spike) return "spike";
  if (conditions.sustained) return "sustained";
  if (conditions.rising) return "rising";
  if (conditions.falling) return "falling";
  return "stable";
}

/** Weighted sum of every condition that holds, independent of the reported trend. */
export function escalationScore(conditions: TrendConditions): number {
  const raw =
    (conditions.spike ? SPIKE_WEIGHT : 0) +
    (conditions.rising ? RISING_WEIGHT : 0) +
    (conditions.sustained ? SUSTAINED_WEIGHT : 0);
  return roundTo(clamp01(raw));
}

export function predictionFor(trend: Trend): string {
  switch (trend) {
    case "rising":
    case "spike":
      return PREDICTIONS.escalating;
    case "falling":
      return PREDICTIONS.deescalating;
    default:
      return PREDICTIONS.stable;
  }
}

export class TemporalAnalyzer {
  private readonly config: TemporalConfig;
  private window: number[] = [];
  private count = 0;

  constructor(config: TemporalConfig) {
    this.config = config;
  }

  /** Append a fused score, evict the oldest beyond the window size, and return the new state. */
  push(score: number): TemporalState {
    this.window.push(clamp01(score));
    if (this.window.length > this.config.windowSize) {
      this.window.shift();
    }
    this.count++;
    return this.snapshot();
  }

  snapshot(): TemporalState {
    const conditions = evaluateConditions(this.window, this.config);
    const trend = classifyTrend(conditions);
    return {
      window: [...this.window],
      trend,
      escalationScore: escalationScore(conditions),
      prediction: predictionFor(trend),
      chunkCount: this.count,
    };
  }

  reset(): void {
    this.window = [];
    this.count = 0;
  }
}
