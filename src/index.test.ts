import { describe, it, expect } from "vitest";
import { APP_NAME, APP_VERSION, AlertLevel, DEFAULT_ANALYSIS_CONFIG } from "./index.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Audio Violence Analyzer");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });

  it("should re-export the public API", () => {
    expect(AlertLevel.CRITICAL).toBe("Critical");
    expect(DEFAULT_ANALYSIS_CONFIG.fusion).toEqual({ acoustic: 0.5, nlp: 0.3, emotion: 0.2 });
  });
});
