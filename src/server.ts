// Dysarthria Speech Timing Analyzer - Webhook receiver and Express server
//
// Receives post-call webhooks from the voice agent platform, verifies their
// signature and runs the speech timing analysis on transcription events.
// Nothing is persisted: the summary is logged and returned in the response.

import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { AnalysisThresholds, SessionSummary } from "./types.js";
import { analyzeTranscript } from "./speech-analyzer.js";
import { MalformedTranscriptError, isRecord } from "./transcript-normalizer.js";
import { formatSummaryReport } from "./report-formatter.js";
import { DEFAULT_THRESHOLDS } from "./thresholds.js";
import {
  DEFAULT_SIGNATURE_TOLERANCE_SECONDS,
  SIGNATURE_HEADER,
  verifyWebhookSignature,
} from "./webhook-signature.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const WEBHOOK_PATH = "/webhook/post-call";

export const SERVICE_NAME = "Dysarthria Speech Timing Analyzer";

/** Largest webhook body accepted; post-call audio events carry base64 audio */
const MAX_BODY_SIZE = "50mb";

const DIVIDER = "=".repeat(50);

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Shared secret used to verify webhook signatures. */
  webhookSecret: string;
  /** Max signature age in seconds. Defaults to 30 minutes. */
  signatureToleranceSeconds?: number;
  /** Clinical thresholds for the analysis. */
  thresholds?: AnalysisThresholds;
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
  /** Clock in unix seconds (for testing). */
  now?: () => number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

interface WebhookContext {
  webhookSecret: string;
  signatureToleranceSeconds: number;
  thresholds: AnalysisThresholds;
  logger: ServerLogger;
  now: () => number;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const ctx: WebhookContext = {
    webhookSecret: options.webhookSecret,
    signatureToleranceSeconds:
      options.signatureToleranceSeconds ?? DEFAULT_SIGNATURE_TOLERANCE_SECONDS,
    thresholds: options.thresholds ?? DEFAULT_THRESHOLDS,
    logger: options.logger ?? defaultLogger,
    now: options.now ?? (() => Math.floor(Date.now() / 1000)),
  };

  const app = express();
  const httpServer = createServer(app);

  app.get("/", (_req, res) => {
    res.json({ message: SERVICE_NAME, status: "running" });
  });

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  // Raw body: the signature covers the exact bytes received, whatever the Content-Type
  app.post(WEBHOOK_PATH, express.raw({ type: () => true, limit: MAX_BODY_SIZE }), (req, res) => {
    handleWebhook(req, res, ctx);
  });

  const { logger } = ctx;

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

// ─── Webhook Handler ────────────────────────────────────────────────────────────

function handleWebhook(req: Request, res: Response, ctx: WebhookContext): void {
  const { logger } = ctx;
  const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

  const valid = verifyWebhookSignature(
    body,
    req.get(SIGNATURE_HEADER),
    ctx.webhookSecret,
    ctx.signatureToleranceSeconds,
    ctx.now(),
  );
  if (!valid) {
    logger.warn("Rejected webhook with invalid signature");
    res.status(401).json({ error: "Invalid webhook signature" });
    return;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body.toString("utf-8"));
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Error parsing JSON: ${errorMessage}`);
    res.status(400).json({ error: "Invalid JSON payload" });
    return;
  }

  try {
    const envelope: Record<string, unknown> = isRecord(payload) ? payload : {};
    const type = typeof envelope.type === "string" ? envelope.type : "unknown";

    logger.info(DIVIDER);
    logger.info(`Received webhook at ${new Date().toISOString()}`);
    logger.info(`Webhook type: ${type}`);
    logger.info(DIVIDER);

    switch (type) {
      case "post_call_transcription": {
        const summary = processTranscriptionWebhook(envelope.data, ctx);
        res.status(200).json({ status: "received", summary });
        return;
      }

      case "post_call_audio":
        processAudioWebhook(envelope.data, logger);
        break;

      default:
        logger.warn(`Unknown webhook type: ${type}`);
    }

    res.status(200).json({ status: "received" });
  } catch (err) {
    if (err instanceof MalformedTranscriptError) {
      logger.warn(`Malformed transcript: ${err.message}`);
      res.status(422).json({ error: err.message });
      return;
    }
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Error processing webhook: ${errorMessage}`);
    res.status(500).json({ error: "Internal server error" });
  }
}

function processTranscriptionWebhook(data: unknown, ctx: WebhookContext): SessionSummary {
  const summary = analyzeTranscript(data, ctx.thresholds);
  ctx.logger.info(`\n${formatSummaryReport(summary)}`);
  return summary;
}

function processAudioWebhook(data: unknown, logger: ServerLogger): void {
  const fields: Record<string, unknown> = isRecord(data) ? data : {};
  const conversationId =
    typeof fields.conversation_id === "string" ? fields.conversation_id : "unknown";
  const agentId = typeof fields.agent_id === "string" ? fields.agent_id : "unknown";
  const audio = fields.full_audio;

  logger.info("Audio Webhook Received:");
  logger.info(`  Conversation ID: ${conversationId}`);
  logger.info(`  Agent ID: ${agentId}`);
  logger.info(`  Audio data present: ${audio !== undefined}`);

  if (typeof audio === "string") {
    logger.info(`  Audio data size: ${audio.length} characters (base64)`);
  }
}
