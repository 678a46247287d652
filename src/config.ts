// Dysarthria Speech Timing Analyzer - Environment configuration

import type { AnalysisThresholds } from "./types.js";
import { resolveThresholds } from "./thresholds.js";
import { DEFAULT_SIGNATURE_TOLERANCE_SECONDS } from "./webhook-signature.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  port: number;
  webhookSecret: string;
  signatureToleranceSeconds: number;
  thresholds: AnalysisThresholds;
}

export const DEFAULT_PORT = 8000;

type Env = Record<string, string | undefined>;

const THRESHOLD_ENV_VARS: Record<keyof AnalysisThresholds, string> = {
  pauseGapSeconds: "PAUSE_GAP_SECONDS",
  slowSpeechWpm: "SLOW_SPEECH_WPM",
  manyPausesMinCount: "MANY_PAUSES_MIN_COUNT",
  manyPausesRatio: "MANY_PAUSES_RATIO",
  lowDensityWordsPerSecond: "LOW_DENSITY_WPS",
  shortUtteranceMinWords: "SHORT_UTTERANCE_MIN_WORDS",
};

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Build the application config from environment variables.
 * @throws ConfigError on a missing secret or an unparseable value
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const webhookSecret = env.WEBHOOK_SECRET;
  if (!webhookSecret) {
    throw new ConfigError("WEBHOOK_SECRET is not set. Add it to your .env file.");
  }

  const port = readNumber(env, "PORT") ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got ${port}`);
  }

  const overrides: { -readonly [K in keyof AnalysisThresholds]?: number } = {};
  for (const [key, name] of Object.entries(THRESHOLD_ENV_VARS)) {
    const value = readNumber(env, name);
    if (value !== undefined && isThresholdKey(key)) {
      overrides[key] = value;
    }
  }

  return {
    port,
    webhookSecret,
    signatureToleranceSeconds:
      readNumber(env, "WEBHOOK_TOLERANCE_SECONDS") ?? DEFAULT_SIGNATURE_TOLERANCE_SECONDS,
    thresholds: resolveThresholds(overrides),
  };
}

function isThresholdKey(key: string): key is keyof AnalysisThresholds {
  return key in THRESHOLD_ENV_VARS;
}
