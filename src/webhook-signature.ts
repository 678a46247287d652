// Dysarthria Speech Timing Analyzer - Webhook signature verification
//
// Header format: `t=<unix seconds>,v0=<hex HMAC-SHA256>`, where the digest is
// computed over `${t}.${rawBody}` with the shared webhook secret.

import { createHmac, timingSafeEqual } from "node:crypto";

export const SIGNATURE_HEADER = "elevenlabs-signature";

/** Default max signature age (30 minutes) */
export const DEFAULT_SIGNATURE_TOLERANCE_SECONDS = 30 * 60;

export interface ParsedSignature {
  timestamp: number;
  signature: string;
}

/**
 * Parse the signature header. Returns null when it is missing or malformed.
 */
export function parseSignatureHeader(header: string | undefined): ParsedSignature | null {
  if (!header) return null;

  let timestamp: number | null = null;
  let signature: string | null = null;

  for (const part of header.split(",")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const key = part.slice(0, eq).trim();
    const value = part.slice(eq + 1).trim();
    if (key === "t" && /^\d+$/.test(value)) {
      timestamp = parseInt(value, 10);
    } else if (key === "v0" && /^[0-9a-f]+$/i.test(value)) {
      signature = value.toLowerCase();
    }
  }

  if (timestamp === null || signature === null) return null;
  return { timestamp, signature };
}

/** Hex HMAC-SHA256 over the timestamp, a dot and the body bytes as received. */
export function computeSignature(body: Buffer | string, timestamp: number, secret: string): string {
  return createHmac("sha256", secret).update(`${timestamp}.`).update(body).digest("hex");
}

/**
 * Verify a webhook request body against its signature header.
 *
 * @param nowSeconds - current unix time, injectable for tests
 */
export function verifyWebhookSignature(
  body: Buffer | string,
  header: string | undefined,
  secret: string,
  toleranceSeconds: number = DEFAULT_SIGNATURE_TOLERANCE_SECONDS,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): boolean {
  const parsed = parseSignatureHeader(header);
  if (!parsed) return false;

  if (nowSeconds - parsed.timestamp > toleranceSeconds) {
    return false;
  }

  const expected = Buffer.from(computeSignature(body, parsed.timestamp, secret), "hex");
  const actual = Buffer.from(parsed.signature, "hex");

  // timingSafeEqual throws on length mismatch
  if (expected.length !== actual.length) return false;
  return timingSafeEqual(expected, actual);
}
