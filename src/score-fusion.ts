// Audio Violence Analyzer - Score Fusion
// Combines the per-modality scores of one chunk into a single risk score.
//
// Without speech only the acoustic branch is meaningful, so it passes
// through unweighted. With speech the weighted sum applies and an absent
// modality contributes 0.

import type { FusionWeights } from "./config.js";
import type { FeatureVector, FusedScore } from "./types.js";
import { clamp01, roundTo } from "./utils.js";

export function fuse(features: FeatureVector, weights: FusionWeights): FusedScore {
  const componentScores = {
    acoustic: clamp01(features.acousticViolenceScore ?? 0),
    nlp: clamp01(features.nlpThreatScore ?? 0),
    emotion: clamp01(features.emotionViolenceScore ?? 0),
  };

  if (!features.hasSpeech) {
    return {
      chunkId: features.chunkId,
      fusedScore: roundTo(componentScores.acoustic),
      componentScores,
      fusionMode: "acoustic_only",
    };
  }

  const weighted =
    weights.acoustic * componentScores.acoustic +
    weights.nlp * componentScores.nlp +
    weights.emotion * componentScores.emotion;

  return {
    chunkId: features.chunkId,
    fusedScore: roundTo(clamp01(weighted)),
    componentScores,
    fusionMode: "full",
  };
}
