// Property-Based Tests for SessionAggregator

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { aggregateSession } from "./session-aggregator.js";
import { metricOk, notApplicable } from "./utils.js";
import type { SegmentAnalysis } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/**
 * Generate an analyzed segment. Only the metric fields the aggregator reads
 * need to be consistent with each other.
 */
function arbitrarySegment(): fc.Arbitrary<SegmentAnalysis> {
  return fc
    .record({
      turnIndex: fc.nat({ max: 50 }),
      wordCount: fc.integer({ min: 1, max: 60 }),
      durationSeconds: fc.integer({ min: 0, max: 30_000 }).map((ms) => ms / 1000),
      pauseCount: fc.nat({ max: 10 }),
    })
    .map(({ turnIndex, wordCount, durationSeconds, pauseCount }) => {
      const words = Array.from({ length: wordCount }, (_, i) => ({
        text: `w${i}`,
        startTime: 0,
        endTime: 0,
      }));
      return {
        utterance: { role: "user" as const, turnIndex, text: "", words },
        metrics: {
          durationSeconds,
          wordCount,
          characterCount: wordCount * 2,
          averageWordLength: metricOk(2),
          speechRateWpm:
            durationSeconds > 0
              ? metricOk((wordCount / durationSeconds) * 60)
              : notApplicable("zero-duration segment"),
          pauseCount,
          pauseDurations: [],
          totalPauseDurationSeconds: 0,
          speechDensity: notApplicable("not generated"),
        },
        indicators: [],
      };
    });
}

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("SessionAggregator properties", () => {
  it("totalWords equals the sum of segment word counts, including for no segments", () => {
    fc.assert(
      fc.property(fc.array(arbitrarySegment(), { maxLength: 12 }), (segments) => {
        const summary = aggregateSession(segments);
        const expected = segments.reduce((total, s) => total + s.metrics.wordCount, 0);
        expect(summary.totalWords).toBe(expected);
      }),
      { numRuns: 200 },
    );
  });

  it("totalPauses equals the sum of segment pause counts", () => {
    fc.assert(
      fc.property(fc.array(arbitrarySegment(), { maxLength: 12 }), (segments) => {
        const summary = aggregateSession(segments);
        const expected = segments.reduce((total, s) => total + s.metrics.pauseCount, 0);
        expect(summary.totalPauses).toBe(expected);
      }),
      { numRuns: 200 },
    );
  });

  it("produces one result per segment", () => {
    fc.assert(
      fc.property(fc.array(arbitrarySegment(), { maxLength: 12 }), (segments) => {
        expect(aggregateSession(segments).segments).toHaveLength(segments.length);
      }),
      { numRuns: 100 },
    );
  });

  it("summary survives a JSON round trip unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbitrarySegment(), { maxLength: 8 }), (segments) => {
        const summary = aggregateSession(segments);
        expect(JSON.parse(JSON.stringify(summary))).toEqual(summary);
      }),
      { numRuns: 100 },
    );
  });
});
