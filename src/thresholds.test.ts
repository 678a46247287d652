import { describe, it, expect } from "vitest";
import { DEFAULT_THRESHOLDS, InvalidThresholdsError, resolveThresholds } from "./thresholds.js";

describe("resolveThresholds", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveThresholds()).toEqual({
      pauseGapSeconds: 0.5,
      slowSpeechWpm: 100,
      manyPausesMinCount: 2,
      manyPausesRatio: 0.2,
      lowDensityWordsPerSecond: 1.5,
      shortUtteranceMinWords: 3,
    });
  });

  it("merges partial overrides", () => {
    const thresholds = resolveThresholds({ slowSpeechWpm: 110, pauseGapSeconds: 0.3 });
    expect(thresholds).toEqual({ ...DEFAULT_THRESHOLDS, slowSpeechWpm: 110, pauseGapSeconds: 0.3 });
  });

  it("does not mutate the defaults", () => {
    resolveThresholds({ slowSpeechWpm: 90 });
    expect(DEFAULT_THRESHOLDS.slowSpeechWpm).toBe(100);
  });

  it("rejects negative values", () => {
    expect(() => resolveThresholds({ manyPausesRatio: -0.1 })).toThrow(InvalidThresholdsError);
  });

  it("rejects non-finite values", () => {
    expect(() => resolveThresholds({ lowDensityWordsPerSecond: Number.POSITIVE_INFINITY })).toThrow(
      "Threshold 'lowDensityWordsPerSecond' must be a finite non-negative number, got Infinity",
    );
  });
});
