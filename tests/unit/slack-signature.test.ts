import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import { verifySlackSignature } from '@/integrations/slack.js';

const SECRET = 'test-secret';
const NOW = 1_760_000_000_000;

function makeSignature(body: string, timestamp: string, secret = SECRET): string {
  const sigBase = `v0:${timestamp}:${body}`;
  const hash = crypto.createHmac('sha256', secret).update(sigBase).digest('hex');
  return `v0=${hash}`;
}

const secondsAgo = (seconds: number) => String(Math.floor(NOW / 1000) - seconds);

describe('verifySlackSignature', () => {
  const body = 'payload=%7B%22type%22%3A%22block_actions%22%7D';

  it('accepts a valid signature with a fresh timestamp', () => {
    const ts = secondsAgo(0);
    expect(verifySlackSignature(SECRET, makeSignature(body, ts), ts, body, NOW)).toBe(true);
  });

  it('rejects a tampered body', () => {
    const ts = secondsAgo(0);
    expect(verifySlackSignature(SECRET, makeSignature(body, ts), ts, body + 'tampered', NOW)).toBe(false);
  });

  it('rejects a signature made with another secret', () => {
    const ts = secondsAgo(0);
    const sig = makeSignature(body, ts, 'other-secret');
    expect(verifySlackSignature(SECRET, sig, ts, body, NOW)).toBe(false);
  });

  it('rejects a signature of the wrong length instead of throwing', () => {
    const ts = secondsAgo(0);
    expect(verifySlackSignature(SECRET, 'v0=invalidsignature', ts, body, NOW)).toBe(false);
  });

  it('rejects a timestamp older than 5 minutes (replay attack)', () => {
    const ts = secondsAgo(301);
    expect(verifySlackSignature(SECRET, makeSignature(body, ts), ts, body, NOW)).toBe(false);
  });

  it('accepts a timestamp exactly at the 5-minute boundary', () => {
    const ts = secondsAgo(300);
    expect(verifySlackSignature(SECRET, makeSignature(body, ts), ts, body, NOW)).toBe(true);
  });

  it('rejects a non-numeric timestamp', () => {
    expect(verifySlackSignature(SECRET, makeSignature(body, 'abc'), 'abc', body, NOW)).toBe(false);
  });
});
