// Dysarthria Speech Timing Analyzer - Entry point
// Loads configuration and starts the webhook server.

import "dotenv/config";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { createAppServer, SERVICE_NAME, WEBHOOK_PATH } from "./server.js";

const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    logFatal(err.message);
    process.exit(1);
  }
  throw err;
}

const t = config.thresholds;
logInit(
  `Thresholds: pause gap ${t.pauseGapSeconds}s, slow speech < ${t.slowSpeechWpm} WPM, ` +
    `many pauses >= ${t.manyPausesMinCount} and > ${t.manyPausesRatio}/word, ` +
    `low density < ${t.lowDensityWordsPerSecond} words/sec, short < ${t.shortUtteranceMinWords} words`,
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  webhookSecret: config.webhookSecret,
  signatureToleranceSeconds: config.signatureToleranceSeconds,
  thresholds: config.thresholds,
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${SERVICE_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`Webhook endpoint: http://localhost:${config.port}${WEBHOOK_PATH}`);
    logInit("Pipeline: Normalizer → MetricsExtractor → IndicatorClassifier → SessionAggregator");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
