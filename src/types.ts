// Dysarthria Speech Timing Analyzer - Shared TypeScript interfaces and types

// ─── Transcript ─────────────────────────────────────────────────────────────────

export type SpeakerRole = "user" | "agent";

export const SPEAKER_ROLES: readonly SpeakerRole[] = ["user", "agent"];

export interface TranscriptWord {
  readonly text: string;
  readonly startTime: number; // seconds from call start
  readonly endTime: number; // seconds from call start
}

/** One continuous speaker turn. */
export interface Utterance {
  readonly role: SpeakerRole;
  /** Position of the turn in the raw transcript (agent turns included). */
  readonly turnIndex: number;
  readonly text: string;
  readonly words: readonly TranscriptWord[];
}

export interface ConversationInfo {
  readonly conversationId: string | null;
  readonly agentId: string | null;
  readonly status: string | null;
}

export interface NormalizedTranscript extends ConversationInfo {
  /** Every turn, in transcript order */
  readonly utterances: readonly Utterance[];
  readonly user: readonly Utterance[];
  readonly agent: readonly Utterance[];
}

// ─── Metric Values ──────────────────────────────────────────────────────────────

/**
 * A metric that may be undefined for degenerate input (e.g. a zero-length
 * segment has no speech rate). Consumers must check `status` before reading
 * `value`.
 */
export type MetricValue =
  | { readonly status: "ok"; readonly value: number }
  | { readonly status: "not_applicable"; readonly reason: string };

// ─── Segment Analysis ───────────────────────────────────────────────────────────

export interface SegmentMetrics {
  readonly durationSeconds: number;
  readonly wordCount: number;
  /** Non-whitespace characters of the segment text */
  readonly characterCount: number;
  /** Characters per word */
  readonly averageWordLength: MetricValue;
  readonly speechRateWpm: MetricValue;
  readonly pauseCount: number;
  readonly pauseDurations: readonly number[];
  readonly totalPauseDurationSeconds: number;
  /** Words per second of non-pause time */
  readonly speechDensity: MetricValue;
}

export type DysarthriaIndicator =
  | "slow_speech"
  | "many_pauses"
  | "low_density"
  | "short_utterance";

export interface SegmentAnalysis {
  readonly utterance: Utterance;
  readonly metrics: SegmentMetrics;
  readonly indicators: readonly DysarthriaIndicator[];
}

export interface SegmentResult {
  /** 1-based position among the user segments */
  readonly segmentIndex: number;
  readonly turnIndex: number;
  readonly text: string;
  readonly metrics: SegmentMetrics;
  readonly indicators: readonly DysarthriaIndicator[];
}

// ─── Session Summary ────────────────────────────────────────────────────────────

export type AssessmentCode =
  | "speech_rate_below_normal"
  | "speech_rate_normal"
  | "high_pause_frequency"
  | "pause_frequency_normal"
  | "low_speech_density";

export interface AssessmentMessage {
  readonly code: AssessmentCode;
  readonly severity: "warning" | "normal";
  readonly message: string;
}

export interface SessionSummary extends ConversationInfo {
  /** Turns in the transcript, agent turns included */
  readonly totalTurns: number;
  readonly totalSpeakingTimeSeconds: number;
  readonly totalWords: number;
  readonly overallSpeechRateWpm: MetricValue;
  readonly totalPauses: number;
  /** Pauses per word */
  readonly pauseRate: MetricValue;
  readonly overallSpeechDensity: MetricValue;
  readonly segments: readonly SegmentResult[];
  readonly sessionIndicators: readonly DysarthriaIndicator[];
  readonly assessment: readonly AssessmentMessage[];
}

// ─── Thresholds ─────────────────────────────────────────────────────────────────

export interface AnalysisThresholds {
  /** Minimum gap between words, exclusive, that counts as a pause (seconds) */
  readonly pauseGapSeconds: number;
  /** Speech rate below this is slow (words per minute) */
  readonly slowSpeechWpm: number;
  /** Fewest pauses a segment needs before the pause ratio is considered */
  readonly manyPausesMinCount: number;
  /** Pauses-per-word ratio above which pauses are frequent */
  readonly manyPausesRatio: number;
  /** Speech density below this is low (words per second of non-pause time) */
  readonly lowDensityWordsPerSecond: number;
  /** Segments with fewer words than this are short */
  readonly shortUtteranceMinWords: number;
}
