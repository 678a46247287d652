// Dysarthria Speech Timing Analyzer - Rule Evaluator
//
// The one threshold comparison used by both the per-segment indicator
// classifier and the session-level assessment.

import type { MetricValue } from "./types.js";

export type Comparator = "lt" | "lte" | "gt" | "gte";

const COMPARATORS: Record<Comparator, (value: number, threshold: number) => boolean> = {
  lt: (value, threshold) => value < threshold,
  lte: (value, threshold) => value <= threshold,
  gt: (value, threshold) => value > threshold,
  gte: (value, threshold) => value >= threshold,
};

/**
 * Compare a metric against a threshold. A not-applicable metric never
 * satisfies a rule.
 */
export function evaluateRule(
  metric: MetricValue | number,
  threshold: number,
  comparator: Comparator,
): boolean {
  if (typeof metric === "number") {
    return COMPARATORS[comparator](metric, threshold);
  }
  if (metric.status !== "ok") {
    return false;
  }
  return COMPARATORS[comparator](metric.value, threshold);
}
