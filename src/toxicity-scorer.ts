// Audio Violence Analyzer - Toxicity Scorer
// Scores a transcript with the OpenAI moderation endpoint and maps its
// categories onto the toxic / severe_toxic / threat names the feature
// extractor reduces into the NLP threat score.

import type { CategoryScores, ToxicityScorer } from "./inference.js";
import { clamp01, roundTo } from "./utils.js";

/** Minimal interface for `moderations.create()` of the OpenAI SDK. */
export interface OpenAIModerationClient {
  moderations: {
    create(params: { model: string; input: string }): Promise<OpenAIModerationResponse>;
  };
}

export interface OpenAIModerationResponse {
  results: Array<{
    flagged: boolean;
    category_scores: Record<string, number>;
  }>;
}

/** Which moderation categories feed each toxicity category (max over the list). */
export const MODERATION_CATEGORY_MAP: Readonly<Record<string, readonly string[]>> = {
  toxic: ["harassment", "hate"],
  severe_toxic: ["hate/threatening", "violence/graphic"],
  threat: ["harassment/threatening", "violence"],
};

export function mapModerationScores(categoryScores: Record<string, number>): CategoryScores {
  const mapped: CategoryScores = {};
  for (const [target, sources] of Object.entries(MODERATION_CATEGORY_MAP)) {
    let max = 0;
    for (const source of sources) {
      const value = categoryScores[source];
      if (typeof value === "number" && Number.isFinite(value) && value > max) {
        max = value;
      }
    }
    mapped[target] = roundTo(clamp01(max));
  }
  return mapped;
}

export class OpenAIModerationScorer implements ToxicityScorer {
  private readonly client: OpenAIModerationClient;
  private readonly model: string;

  constructor(client: OpenAIModerationClient, model = "omni-moderation-latest") {
    this.client = client;
    this.model = model;
  }

  async score(text: string): Promise<CategoryScores> {
    const response = await this.client.moderations.create({ model: this.model, input: text });
    const result = response.results[0];
    if (!result) {
      throw new Error("Moderation response contained no results");
    }
    return mapModerationScores(result.category_scores);
  }
}
