// Dysarthria Speech Timing Analyzer - Report Formatter
// Renders a SessionSummary as a human-readable report or as JSON.

import type { DysarthriaIndicator, MetricValue, SegmentResult, SessionSummary } from "./types.js";

/** Max characters of segment text shown in the report */
const MAX_TEXT_PREVIEW = 100;

const INDICATOR_LABELS: Record<DysarthriaIndicator, string> = {
  slow_speech: "slow_speech",
  many_pauses: "many_pauses",
  low_density: "low_speech_density",
  short_utterance: "short_utterance",
};

/**
 * Formats a metric with a fixed number of decimals, or `n/a`.
 */
export function formatMetricValue(metric: MetricValue, digits: number): string {
  return metric.status === "ok" ? metric.value.toFixed(digits) : "n/a";
}

/**
 * Serializes a SessionSummary to a pretty-printed JSON string.
 */
export function formatSummaryJson(summary: SessionSummary): string {
  return JSON.stringify(summary, null, 2);
}

function previewText(text: string): string {
  return text.length > MAX_TEXT_PREVIEW ? `${text.slice(0, MAX_TEXT_PREVIEW)}...` : text;
}

function formatSegment(segment: SegmentResult): string[] {
  const m = segment.metrics;
  const lines = [
    `  Segment ${segment.segmentIndex}:`,
    `    Text: '${previewText(segment.text)}'`,
    `    Duration: ${m.durationSeconds.toFixed(1)}s`,
    `    Words: ${m.wordCount}`,
    `    Characters: ${m.characterCount}`,
    `    Average word length: ${formatMetricValue(m.averageWordLength, 2)}`,
    `    Speech rate: ${formatMetricValue(m.speechRateWpm, 1)} WPM`,
    `    Pauses detected: ${m.pauseCount}`,
    `    Speech density: ${formatMetricValue(m.speechDensity, 2)} words/sec`,
  ];

  if (segment.indicators.length > 0) {
    const labels = segment.indicators.map((i) => INDICATOR_LABELS[i]);
    lines.push(`    Dysarthria indicators: ${labels.join(", ")}`);
  } else {
    lines.push("    No significant dysarthria indicators");
  }

  return lines;
}

/**
 * Renders the full analysis report for one call.
 */
export function formatSummaryReport(summary: SessionSummary): string {
  const lines: string[] = [];

  lines.push("Call Information:");
  lines.push(`  Conversation ID: ${summary.conversationId ?? "unknown"}`);
  lines.push(`  Agent ID: ${summary.agentId ?? "unknown"}`);
  lines.push(`  Status: ${summary.status ?? "unknown"}`);
  lines.push(`  Total transcript turns: ${summary.totalTurns}`);
  lines.push("");
  lines.push("User Speech Analysis:");
  lines.push(`  User speech segments found: ${summary.segments.length}`);

  if (summary.segments.length === 0) {
    lines.push("  No user speech found in transcript");
    return lines.join("\n");
  }

  for (const segment of summary.segments) {
    lines.push("");
    lines.push(...formatSegment(segment));
  }

  const pauseRate =
    summary.pauseRate.status === "ok" ? `${(summary.pauseRate.value * 100).toFixed(2)}%` : "n/a";

  lines.push("");
  lines.push("Overall Speech Analysis:");
  lines.push(`  Total speaking time: ${summary.totalSpeakingTimeSeconds.toFixed(1)}s`);
  lines.push(`  Total words spoken: ${summary.totalWords}`);
  lines.push(`  Overall speech rate: ${formatMetricValue(summary.overallSpeechRateWpm, 1)} WPM`);
  lines.push(`  Total pauses: ${summary.totalPauses}`);
  lines.push(`  Pause rate: ${pauseRate} (pauses per word)`);
  lines.push(
    `  Speech density: ${formatMetricValue(summary.overallSpeechDensity, 2)} words/sec`,
  );

  if (summary.assessment.length > 0) {
    lines.push("");
    lines.push("Clinical Assessment:");
    for (const msg of summary.assessment) {
      lines.push(`  ${msg.severity === "warning" ? "[WARN]" : "[OK]"} ${msg.message}`);
    }
  }

  return lines.join("\n");
}
