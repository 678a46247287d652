// Dysarthria Speech Timing Analyzer - Analysis pipeline
//
// Normalizer → MetricsExtractor → IndicatorClassifier → SessionAggregator.
// Synchronous and stateless; each call works on its own payload only.

import type { AnalysisThresholds, SegmentAnalysis, SessionSummary } from "./types.js";
import { normalizeTranscript } from "./transcript-normalizer.js";
import { MetricsExtractor } from "./metrics-extractor.js";
import { IndicatorClassifier } from "./indicator-classifier.js";
import { aggregateSession } from "./session-aggregator.js";
import { DEFAULT_THRESHOLDS } from "./thresholds.js";

/**
 * Analyze one call's transcript. Only user turns are measured; agent turns
 * are validated and otherwise ignored.
 *
 * @throws MalformedTranscriptError if the payload fails validation
 */
export function analyzeTranscript(
  payload: unknown,
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS,
): SessionSummary {
  const transcript = normalizeTranscript(payload);

  const extractor = new MetricsExtractor(thresholds.pauseGapSeconds);
  const classifier = new IndicatorClassifier(thresholds);

  const segments: SegmentAnalysis[] = transcript.user.map((utterance) => {
    const metrics = extractor.extract(utterance);
    return { utterance, metrics, indicators: classifier.classify(metrics) };
  });

  return aggregateSession(segments, thresholds, transcript, transcript.utterances.length);
}
