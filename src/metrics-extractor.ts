// Dysarthria Speech Timing Analyzer - Metrics Extractor
//
// Turns one user utterance's word timestamps into segment metrics:
// duration, word count, speech rate, pauses and speech density.
// Time spans are measured to the millisecond.

import type { SegmentMetrics, Utterance } from "./types.js";
import { roundTime, safeRatio, sum } from "./utils.js";

export const DEFAULT_PAUSE_THRESHOLD_SECONDS = 0.5;

// ─── Metrics Extractor ──────────────────────────────────────────────────────────

export class MetricsExtractor {
  private pauseThreshold: number; // gap must exceed this to count (seconds)

  constructor(pauseThreshold: number = DEFAULT_PAUSE_THRESHOLD_SECONDS) {
    if (!Number.isFinite(pauseThreshold) || pauseThreshold < 0) {
      throw new Error(`Invalid pause threshold: ${pauseThreshold}`);
    }
    this.pauseThreshold = pauseThreshold;
  }

  /**
   * Extract timing metrics from a single utterance.
   * The utterance must have at least one word.
   */
  extract(utterance: Utterance): SegmentMetrics {
    const words = utterance.words;
    if (words.length === 0) {
      throw new Error(`Utterance at turn ${utterance.turnIndex} has no words`);
    }

    // Duration: last word endTime - first word startTime
    const durationSeconds = roundTime(words[words.length - 1].endTime - words[0].startTime);
    if (durationSeconds < 0) {
      throw new Error(
        `Negative duration ${durationSeconds}s for utterance at turn ${utterance.turnIndex}`,
      );
    }

    const wordCount = words.length;
    const characterCount = utterance.text.replace(/\s/g, "").length;

    const speechRateWpm = safeRatio(wordCount, durationSeconds, "zero-duration segment", 60);

    const pauseDurations = this.detectPauses(utterance);
    const totalPauseDurationSeconds = roundTime(sum(pauseDurations));

    // Density: words per second of speaking time, pauses excluded
    const speechDensity = safeRatio(
      wordCount,
      roundTime(durationSeconds - totalPauseDurationSeconds),
      "no speaking time outside pauses",
    );

    return {
      durationSeconds,
      wordCount,
      characterCount,
      averageWordLength: safeRatio(characterCount, wordCount, "no words"),
      speechRateWpm,
      pauseCount: pauseDurations.length,
      pauseDurations,
      totalPauseDurationSeconds,
      speechDensity,
    };
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  /**
   * Gaps between consecutive words longer than the pause threshold, in order.
   * Overlapping words give a negative gap and never count.
   */
  private detectPauses(utterance: Utterance): number[] {
    const pauses: number[] = [];
    const words = utterance.words;

    for (let i = 0; i < words.length - 1; i++) {
      const gap = roundTime(words[i + 1].startTime - words[i].endTime);
      if (gap > this.pauseThreshold) {
        pauses.push(gap);
      }
    }

    return pauses;
  }
}
