// Dysarthria Speech Timing Analyzer - Clinical threshold configuration

import type { AnalysisThresholds } from "./types.js";

export class InvalidThresholdsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidThresholdsError";
  }
}

/**
 * Screening defaults. Normal conversational rate is roughly 120-160 WPM;
 * these are coarse flags, not diagnostic cut-offs.
 */
export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  pauseGapSeconds: 0.5,
  slowSpeechWpm: 100,
  manyPausesMinCount: 2,
  manyPausesRatio: 0.2,
  lowDensityWordsPerSecond: 1.5,
  shortUtteranceMinWords: 3,
};

const THRESHOLD_KEYS: readonly (keyof AnalysisThresholds)[] = [
  "pauseGapSeconds",
  "slowSpeechWpm",
  "manyPausesMinCount",
  "manyPausesRatio",
  "lowDensityWordsPerSecond",
  "shortUtteranceMinWords",
];

/**
 * Merge partial overrides onto the defaults.
 * @throws InvalidThresholdsError if any resulting value is not a finite, non-negative number
 */
export function resolveThresholds(
  overrides: Partial<AnalysisThresholds> = {},
): AnalysisThresholds {
  const resolved: AnalysisThresholds = { ...DEFAULT_THRESHOLDS, ...overrides };

  for (const key of THRESHOLD_KEYS) {
    const value = resolved[key];
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new InvalidThresholdsError(
        `Threshold '${key}' must be a finite non-negative number, got ${String(value)}`,
      );
    }
  }

  return resolved;
}
