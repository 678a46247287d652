// Dysarthria Speech Timing Analyzer - Session Aggregator
//
// Combines every user segment of one call into session totals and a clinical
// assessment. The assessment re-applies the segment thresholds to the
// session-wide figures; it does not look at the per-segment tags.

import type {
  AnalysisThresholds,
  AssessmentMessage,
  ConversationInfo,
  DysarthriaIndicator,
  MetricValue,
  SegmentAnalysis,
  SegmentResult,
  SessionSummary,
} from "./types.js";
import { evaluateRule } from "./rule-evaluator.js";
import { DEFAULT_THRESHOLDS } from "./thresholds.js";
import { isApplicable, roundTime, safeRatio, sum } from "./utils.js";

const UNKNOWN_CONVERSATION: ConversationInfo = {
  conversationId: null,
  agentId: null,
  status: null,
};

/**
 * Build the session summary. An empty segment list is valid and yields
 * zero totals with not-applicable rates and no assessment.
 *
 * @param totalTurns - transcript turns of every role; defaults to the segment count
 */
export function aggregateSession(
  segments: readonly SegmentAnalysis[],
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS,
  conversation: ConversationInfo = UNKNOWN_CONVERSATION,
  totalTurns: number = segments.length,
): SessionSummary {
  const totalSpeakingTimeSeconds = roundTime(
    sum(segments.map((s) => s.metrics.durationSeconds)),
  );
  const totalWords = sum(segments.map((s) => s.metrics.wordCount));
  const totalPauses = sum(segments.map((s) => s.metrics.pauseCount));
  const totalPauseSeconds = roundTime(
    sum(segments.map((s) => s.metrics.totalPauseDurationSeconds)),
  );

  const overallSpeechRateWpm = safeRatio(
    totalWords,
    totalSpeakingTimeSeconds,
    "no speaking time",
    60,
  );
  const pauseRate = safeRatio(totalPauses, totalWords, "no words spoken");
  const overallSpeechDensity = safeRatio(
    totalWords,
    roundTime(totalSpeakingTimeSeconds - totalPauseSeconds),
    "no speaking time outside pauses",
  );

  const results: SegmentResult[] = segments.map((s, i) => ({
    segmentIndex: i + 1,
    turnIndex: s.utterance.turnIndex,
    text: s.utterance.text,
    metrics: s.metrics,
    indicators: s.indicators,
  }));

  const { indicators, messages } = assessSession(
    overallSpeechRateWpm,
    pauseRate,
    overallSpeechDensity,
    thresholds,
  );

  return {
    conversationId: conversation.conversationId,
    agentId: conversation.agentId,
    status: conversation.status,
    totalTurns,
    totalSpeakingTimeSeconds,
    totalWords,
    overallSpeechRateWpm,
    totalPauses,
    pauseRate,
    overallSpeechDensity,
    segments: results,
    sessionIndicators: indicators,
    assessment: messages,
  };
}

// ─── Clinical Assessment ────────────────────────────────────────────────────────

function assessSession(
  rate: MetricValue,
  pauseRate: MetricValue,
  density: MetricValue,
  t: AnalysisThresholds,
): { indicators: DysarthriaIndicator[]; messages: AssessmentMessage[] } {
  const indicators: DysarthriaIndicator[] = [];
  const messages: AssessmentMessage[] = [];

  if (isApplicable(rate)) {
    if (evaluateRule(rate, t.slowSpeechWpm, "lt")) {
      indicators.push("slow_speech");
      messages.push({
        code: "speech_rate_below_normal",
        severity: "warning",
        message: `Speech rate below normal (${t.slowSpeechWpm} WPM threshold)`,
      });
    } else {
      messages.push({
        code: "speech_rate_normal",
        severity: "normal",
        message: "Speech rate within normal range",
      });
    }
  }

  if (isApplicable(pauseRate)) {
    if (evaluateRule(pauseRate, t.manyPausesRatio, "gt")) {
      indicators.push("many_pauses");
      messages.push({
        code: "high_pause_frequency",
        severity: "warning",
        message: "High pause frequency detected",
      });
    } else {
      messages.push({
        code: "pause_frequency_normal",
        severity: "normal",
        message: "Normal pause frequency",
      });
    }
  }

  if (evaluateRule(density, t.lowDensityWordsPerSecond, "lt")) {
    indicators.push("low_density");
    messages.push({
      code: "low_speech_density",
      severity: "warning",
      message: `Low speech density (${t.lowDensityWordsPerSecond} words/sec threshold)`,
    });
  }

  return { indicators, messages };
}
