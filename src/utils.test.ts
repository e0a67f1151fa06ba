import { describe, it, expect } from "vitest";
import { clamp01, maxOfKeys, roundTo } from "./utils.js";

describe("roundTo", () => {
  it("rounds to 4 decimals by default", () => {
    expect(roundTo(0.4 + 0.15 + 0.04)).toBe(0.59);
    expect(roundTo(0.123456)).toBe(0.1235);
  });

  it("accepts a decimal count", () => {
    expect(roundTo(4.56789, 2)).toBe(4.57);
  });
});

describe("clamp01", () => {
  it("clamps into [0, 1]", () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(1.7)).toBe(1);
    expect(clamp01(0.42)).toBe(0.42);
  });

  it("maps NaN to 0", () => {
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe("maxOfKeys", () => {
  it("takes the maximum over the listed keys only", () => {
    expect(maxOfKeys({ toxic: 0.4, threat: 0.7, insult: 0.9 }, ["toxic", "severe_toxic", "threat"])).toBe(0.7);
  });

  it("matches keys case-insensitively", () => {
    expect(maxOfKeys({ Angry: 0.6, fear: 0.2 }, ["angry", "fear"])).toBe(0.6);
  });

  it("returns 0 when no key is present", () => {
    expect(maxOfKeys({ neutral: 0.9 }, ["angry", "fear"])).toBe(0);
  });

  it("ignores non-finite scores", () => {
    expect(maxOfKeys({ angry: Number.POSITIVE_INFINITY, fear: 0.3 }, ["angry", "fear"])).toBe(0.3);
  });
});
