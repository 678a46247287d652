import { describe, it, expect } from "vitest";
import { createHmac } from "node:crypto";
import {
  computeSignature,
  parseSignatureHeader,
  verifyWebhookSignature,
} from "./webhook-signature.js";

const SECRET = "test-secret";
const NOW = 1_700_000_000;
const BODY = JSON.stringify({ type: "post_call_transcription", data: { transcript: [] } });

function signedHeader(body: string, timestamp: number, secret: string = SECRET): string {
  return `t=${timestamp},v0=${computeSignature(body, timestamp, secret)}`;
}

describe("computeSignature", () => {
  it("is the hex HMAC-SHA256 of `timestamp.body`", () => {
    const expected = createHmac("sha256", SECRET).update(`${NOW}.${BODY}`).digest("hex");
    expect(computeSignature(BODY, NOW, SECRET)).toBe(expected);
    expect(computeSignature(Buffer.from(BODY), NOW, SECRET)).toBe(expected);
  });

  it("signs the raw bytes of a body that is not valid UTF-8", () => {
    const body = Buffer.from([0x7b, 0xff, 0xfe, 0x7d]);
    const expected = createHmac("sha256", SECRET)
      .update(Buffer.concat([Buffer.from(`${NOW}.`), body]))
      .digest("hex");
    expect(computeSignature(body, NOW, SECRET)).toBe(expected);
    expect(computeSignature(body.toString("utf-8"), NOW, SECRET)).not.toBe(expected);
  });
});

describe("parseSignatureHeader", () => {
  it("reads the timestamp and signature", () => {
    expect(parseSignatureHeader("t=123,v0=ABCdef")).toEqual({
      timestamp: 123,
      signature: "abcdef",
    });
  });

  it("returns null for missing or malformed headers", () => {
    expect(parseSignatureHeader(undefined)).toBeNull();
    expect(parseSignatureHeader("")).toBeNull();
    expect(parseSignatureHeader("t=123")).toBeNull();
    expect(parseSignatureHeader("v0=abcdef")).toBeNull();
    expect(parseSignatureHeader("t=soon,v0=abcdef")).toBeNull();
    expect(parseSignatureHeader("t=123,v0=not-hex")).toBeNull();
  });
});

describe("verifyWebhookSignature", () => {
  it("accepts a correctly signed body", () => {
    expect(verifyWebhookSignature(BODY, signedHeader(BODY, NOW), SECRET, 1800, NOW)).toBe(true);
  });

  it("accepts a signature just inside the tolerance window", () => {
    const header = signedHeader(BODY, NOW - 1800);
    expect(verifyWebhookSignature(BODY, header, SECRET, 1800, NOW)).toBe(true);
  });

  it("rejects a signature older than the tolerance window", () => {
    const header = signedHeader(BODY, NOW - 1801);
    expect(verifyWebhookSignature(BODY, header, SECRET, 1800, NOW)).toBe(false);
  });

  it("rejects a tampered body", () => {
    const header = signedHeader(BODY, NOW);
    expect(verifyWebhookSignature(`${BODY} `, header, SECRET, 1800, NOW)).toBe(false);
  });

  it("rejects a signature made with another secret", () => {
    const header = signedHeader(BODY, NOW, "other-secret");
    expect(verifyWebhookSignature(BODY, header, SECRET, 1800, NOW)).toBe(false);
  });

  it("rejects a truncated signature", () => {
    const header = signedHeader(BODY, NOW).slice(0, -8);
    expect(verifyWebhookSignature(BODY, header, SECRET, 1800, NOW)).toBe(false);
  });

  it("accepts a correctly signed body that is not valid UTF-8", () => {
    const body = Buffer.from([0x7b, 0xff, 0x7d]);
    const header = `t=${NOW},v0=${computeSignature(body, NOW, SECRET)}`;
    expect(verifyWebhookSignature(body, header, SECRET, 1800, NOW)).toBe(true);
  });

  it("rejects a missing header", () => {
    expect(verifyWebhookSignature(BODY, undefined, SECRET, 1800, NOW)).toBe(false);
  });
});
