// Shared helpers for the Dysarthria Speech Timing Analyzer.
//
// Constructors and accessors for MetricValue, used by the metrics extractor,
// the session aggregator and the report formatter so that every component
// builds not-applicable values the same way.

import type { MetricValue } from "./types.js";

// ─── MetricValue ────────────────────────────────────────────────────────────────

export function metricOk(value: number): MetricValue {
  return { status: "ok", value };
}

export function notApplicable(reason: string): MetricValue {
  return { status: "not_applicable", reason };
}

export function isApplicable(
  metric: MetricValue,
): metric is Extract<MetricValue, { status: "ok" }> {
  return metric.status === "ok";
}

/**
 * Divide, producing a not-applicable value instead of dividing by a zero or
 * negative denominator.
 */
export function safeRatio(
  numerator: number,
  denominator: number,
  reason: string,
  scale: number = 1,
): MetricValue {
  if (denominator <= 0) {
    return notApplicable(reason);
  }
  return metricOk((numerator / denominator) * scale);
}

// ─── Number helpers ─────────────────────────────────────────────────────────────

/**
 * Round a time span to the nearest millisecond, so that differences of
 * timestamps compare the way they read (1.1 - 0.6 is 0.5, not 0.5000000000000001).
 */
export function roundTime(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, v) => total + v, 0);
}
