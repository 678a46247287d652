// Dysarthria Speech Timing Analyzer - Transcript Normalizer
//
// Validates the post-call transcript payload and reshapes it into ordered,
// speaker-attributed utterances. No analysis happens here.

import {
  SPEAKER_ROLES,
  type NormalizedTranscript,
  type SpeakerRole,
  type TranscriptWord,
  type Utterance,
} from "./types.js";

// ─── Errors ─────────────────────────────────────────────────────────────────────

export class MalformedTranscriptError extends Error {
  /** Index of the offending turn, when the problem is inside one */
  readonly turnIndex: number | null;

  constructor(message: string, turnIndex: number | null = null) {
    super(turnIndex === null ? message : `transcript[${turnIndex}]: ${message}`);
    this.name = "MalformedTranscriptError";
    this.turnIndex = turnIndex;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSpeakerRole(value: unknown): value is SpeakerRole {
  return SPEAKER_ROLES.some((role) => role === value);
}

/** Identifiers pass through only as strings; any other JSON value is dropped. */
function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

// ─── Normalizer ─────────────────────────────────────────────────────────────────

/**
 * Normalize a raw transcript payload.
 *
 * Expected shape:
 * ```
 * {
 *   conversation_id?: string, agent_id?: string, status?: string,
 *   transcript: [{ role: "user" | "agent", message?: string,
 *                  words: [{ text, start, end }] }]
 * }
 * ```
 *
 * @throws MalformedTranscriptError when the payload or any turn is invalid
 */
export function normalizeTranscript(payload: unknown): NormalizedTranscript {
  if (!isRecord(payload)) {
    throw new MalformedTranscriptError("payload must be an object");
  }
  if (!Array.isArray(payload.transcript)) {
    throw new MalformedTranscriptError("missing or invalid 'transcript' array");
  }

  const utterances = payload.transcript.map((turn: unknown, turnIndex: number) =>
    normalizeTurn(turn, turnIndex),
  );

  return {
    conversationId: optionalString(payload.conversation_id),
    agentId: optionalString(payload.agent_id),
    status: optionalString(payload.status),
    utterances,
    user: utterances.filter((u) => u.role === "user"),
    agent: utterances.filter((u) => u.role === "agent"),
  };
}

function normalizeTurn(turn: unknown, turnIndex: number): Utterance {
  if (!isRecord(turn)) {
    throw new MalformedTranscriptError("turn must be an object", turnIndex);
  }
  if (turn.role === undefined || turn.role === null) {
    throw new MalformedTranscriptError("missing speaker role", turnIndex);
  }
  if (!isSpeakerRole(turn.role)) {
    throw new MalformedTranscriptError(
      `unrecognized speaker role "${String(turn.role)}"`,
      turnIndex,
    );
  }
  if (!Array.isArray(turn.words) || turn.words.length === 0) {
    throw new MalformedTranscriptError("turn has no word timestamps", turnIndex);
  }

  const words: TranscriptWord[] = [];
  turn.words.forEach((raw: unknown, wordIndex: number) => {
    const word = normalizeWord(raw, wordIndex, turnIndex);
    const prev = words[words.length - 1];
    if (prev && (word.startTime < prev.startTime || word.endTime < prev.endTime)) {
      throw new MalformedTranscriptError(
        `words[${wordIndex}]: timestamps are not monotonic ` +
          `(${word.startTime}-${word.endTime} follows ${prev.startTime}-${prev.endTime})`,
        turnIndex,
      );
    }
    words.push(word);
  });

  const message = typeof turn.message === "string" ? turn.message.trim() : "";

  return {
    role: turn.role,
    turnIndex,
    text: message.length > 0 ? message : words.map((w) => w.text).join(" "),
    words,
  };
}

function normalizeWord(raw: unknown, wordIndex: number, turnIndex: number): TranscriptWord {
  const prefix = `words[${wordIndex}]`;

  if (!isRecord(raw)) {
    throw new MalformedTranscriptError(`${prefix}: word must be an object`, turnIndex);
  }
  if (typeof raw.text !== "string") {
    throw new MalformedTranscriptError(`${prefix}: missing or invalid 'text'`, turnIndex);
  }
  if (!isTimestamp(raw.start)) {
    throw new MalformedTranscriptError(`${prefix}: missing or invalid 'start'`, turnIndex);
  }
  if (!isTimestamp(raw.end)) {
    throw new MalformedTranscriptError(`${prefix}: missing or invalid 'end'`, turnIndex);
  }
  if (raw.end < raw.start) {
    throw new MalformedTranscriptError(
      `${prefix}: 'end' (${raw.end}) is before 'start' (${raw.start})`,
      turnIndex,
    );
  }

  return { text: raw.text, startTime: raw.start, endTime: raw.end };
}
