// Dysarthria Speech Timing Analyzer - Indicator Classifier
//
// Maps one segment's metrics to dysarthria indicator tags. Each axis is
// checked independently, so several tags may fire for the same segment.

import type { AnalysisThresholds, DysarthriaIndicator, SegmentMetrics } from "./types.js";
import { evaluateRule } from "./rule-evaluator.js";
import { DEFAULT_THRESHOLDS } from "./thresholds.js";
import { safeRatio } from "./utils.js";

export class IndicatorClassifier {
  private thresholds: AnalysisThresholds;

  constructor(thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  classify(metrics: SegmentMetrics): DysarthriaIndicator[] {
    const t = this.thresholds;
    const indicators: DysarthriaIndicator[] = [];

    if (evaluateRule(metrics.speechRateWpm, t.slowSpeechWpm, "lt")) {
      indicators.push("slow_speech");
    }

    const pausesPerWord = safeRatio(metrics.pauseCount, metrics.wordCount, "no words");
    if (
      evaluateRule(metrics.pauseCount, t.manyPausesMinCount, "gte") &&
      evaluateRule(pausesPerWord, t.manyPausesRatio, "gt")
    ) {
      indicators.push("many_pauses");
    }

    if (evaluateRule(metrics.speechDensity, t.lowDensityWordsPerSecond, "lt")) {
      indicators.push("low_density");
    }

    if (evaluateRule(metrics.wordCount, t.shortUtteranceMinWords, "lt")) {
      indicators.push("short_utterance");
    }

    return indicators;
  }
}
