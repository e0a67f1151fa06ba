// Audio Violence Analyzer - Decision Engine
// Deterministic mapping from fused score and temporal state to alert levels,
// event types and human-readable explanations. No state, no I/O.

import type { DecisionThresholds } from "./config.js";
import {
  ALERT_RANK,
  AlertLevel,
  type AlertEvent,
  type AlertStatistics,
  type ComponentScores,
  type EventType,
  type FeatureVector,
  type FusedScore,
  type TemporalState,
  type Trend,
} from "./types.js";
import { roundTo } from "./utils.js";

// ─── Chunk Alerts ───────────────────────────────────────────────────────────────

export interface ChunkDecision {
  alert: AlertLevel;
  /** Which rule fired, in words. */
  reason: string;
}

/**
 * Alert level for one chunk. Rules are checked in order and the first match
 * wins; every comparison is strict, so a score exactly at a threshold does
 * not trigger it.
 */
export function decideChunkAlert(
  fusedScore: number,
  temporal: Pick<TemporalState, "trend" | "escalationScore">,
  thresholds: DecisionThresholds,
): ChunkDecision {
  const score = fusedScore.toFixed(2);

  if (fusedScore > thresholds.criticalScore) {
    return { alert: AlertLevel.CRITICAL, reason: `Violence score ${score} above critical threshold` };
  }
  if (temporal.trend === "spike") {
    return { alert: AlertLevel.CRITICAL, reason: "Sudden spike in violence indicators" };
  }
  if (temporal.trend === "sustained" && fusedScore > thresholds.sustainedCriticalScore) {
    return { alert: AlertLevel.CRITICAL, reason: `Sustained aggression (score ${score})` };
  }
  if (fusedScore > thresholds.warningScore) {
    return { alert: AlertLevel.WARNING, reason: `Elevated violence score (${score})` };
  }
  if (temporal.trend === "rising") {
    return { alert: AlertLevel.WARNING, reason: "Violence indicators are rising" };
  }
  if (temporal.escalationScore > thresholds.escalationWarningScore) {
    return {
      alert: AlertLevel.WARNING,
      reason: `Escalation detected (score ${temporal.escalationScore.toFixed(2)})`,
    };
  }
  return { alert: AlertLevel.SAFE, reason: "No violence indicators detected" };
}

// ─── Aggregation ────────────────────────────────────────────────────────────────

export interface AlertAggregate {
  overall: AlertLevel;
  statistics: AlertStatistics;
}

/** Maximum level over all chunks (Safe when there are none) with per-level counts. */
export function aggregateAlerts(alerts: readonly AlertLevel[]): AlertAggregate {
  let overall = AlertLevel.SAFE;
  const statistics: AlertStatistics = { safeChunks: 0, warningChunks: 0, criticalChunks: 0 };

  for (const alert of alerts) {
    if (ALERT_RANK[alert] > ALERT_RANK[overall]) {
      overall = alert;
    }
    switch (alert) {
      case AlertLevel.SAFE:
        statistics.safeChunks++;
        break;
      case AlertLevel.WARNING:
        statistics.warningChunks++;
        break;
      case AlertLevel.CRITICAL:
        statistics.criticalChunks++;
        break;
    }
  }

  return { overall, statistics };
}

export function maxAlert(a: AlertLevel, b: AlertLevel): AlertLevel {
  return ALERT_RANK[b] > ALERT_RANK[a] ? b : a;
}

// ─── Event Classification ───────────────────────────────────────────────────────

const COMPONENT_EVENT_TYPES: ReadonlyArray<[keyof ComponentScores, EventType]> = [
  ["acoustic", "gunshot"],
  ["nlp", "abusive_speech"],
  ["emotion", "aggressive_emotion"],
];

/**
 * The strongest component names the event. When two or more components are
 * within `dominanceMargin` of the strongest, the event is "combined".
 */
export function classifyEventType(scores: ComponentScores, dominanceMargin: number): EventType {
  const max = Math.max(scores.acoustic, scores.nlp, scores.emotion);
  const dominant = COMPONENT_EVENT_TYPES.filter(([key]) => roundTo(max - scores[key]) <= dominanceMargin);
  if (dominant.length !== 1) {
    return "combined";
  }
  return dominant[0][1];
}

// ─── Explanations ───────────────────────────────────────────────────────────────

function signalPhrase(type: EventType, soundClass: string | null): string {
  switch (type) {
    case "gunshot":
      return soundClass ? `violent sound (${soundClass})` : "violent sounds";
    case "abusive_speech":
      return "threatening language";
    case "aggressive_emotion":
      return "aggressive vocal emotion";
    case "combined":
      return "multiple violence indicators";
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

const EXPLANATION_TEMPLATES: Readonly<Record<Trend, (signal: string) => string>> = {
  spike: (signal) => `Sudden spike in ${signal}`,
  rising: (signal) => `${capitalize(signal)} escalating over time`,
  sustained: (signal) => `Sustained aggressive activity with ${signal}`,
  falling: (signal) => `${capitalize(signal)} detected, de-escalating`,
  stable: (signal) => `${capitalize(signal)} detected`,
};

/** Explanation text keyed by the dominant signal and the temporal trend. */
export function explain(type: EventType, trend: Trend, soundClass: string | null = null): string {
  return EXPLANATION_TEMPLATES[trend](signalPhrase(type, soundClass));
}

// ─── Events ─────────────────────────────────────────────────────────────────────

export interface EventInput {
  start: number;
  end: number;
  features: FeatureVector;
  fused: FusedScore;
  temporal: Pick<TemporalState, "trend">;
  alert: AlertLevel;
}

/** An event for the chunk when its fused score exceeds the event threshold, else null. */
export function buildEvent(input: EventInput, thresholds: DecisionThresholds): AlertEvent | null {
  if (!(input.fused.fusedScore > thresholds.eventScore)) {
    return null;
  }
  const type = classifyEventType(input.fused.componentScores, thresholds.dominanceMargin);
  const soundClass = input.features.acousticEvents[0]?.label ?? null;
  return {
    start: input.start,
    end: input.end,
    type,
    confidence: input.fused.fusedScore,
    alert: input.alert,
    explanation: explain(type, input.temporal.trend, soundClass),
    transcript: input.features.transcript,
    soundClass,
  };
}
