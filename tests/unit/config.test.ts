import { describe, it, expect } from 'vitest';
import { loadConfig } from '@/config.js';
import { ConfigError } from '@/errors.js';

const base = {
  OPENAI_API_KEY: 'test-openai-key',
  SLACK_BOT_TOKEN: 'test-bot-token',
  SLACK_SIGNING_SECRET: 'test-secret',
  SLACK_APPROVAL_CHANNEL: 'C0REVIEW',
  X_API_KEY: 'test-x-key',
  X_API_SECRET: 'test-x-secret',
  X_ACCESS_TOKEN: 'test-x-token',
  X_ACCESS_SECRET: 'test-x-access-secret',
};

function configError(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(base);
    expect(config.port).toBe(3000);
    expect(config.approvalPolicy).toBe('required');
    expect(config.approvalTimeoutMs).toBe(86_400_000);
    expect(config.approvalInterval).toEqual({ minMs: 3_600_000, maxMs: 10_800_000 });
    expect(config.failureBackoffMs).toBe(300_000);
    expect(config.postMaxLength).toBe(280);
    expect(config.dryRun).toBe(false);
    expect(config.llm).toEqual({
      provider: 'openai',
      apiKey: 'test-openai-key',
      model: 'gpt-4o-mini',
      baseURL: undefined,
    });
    expect(config.slack).toEqual({ botToken: 'test-bot-token', signingSecret: 'test-secret', channel: 'C0REVIEW' });
  });

  it('uses the xAI endpoint and key for the xai provider', () => {
    const config = loadConfig({ ...base, LLM_PROVIDER: 'xai', XAI_API_KEY: 'test-xai-key' });
    expect(config.llm).toEqual({
      provider: 'xai',
      apiKey: 'test-xai-key',
      model: 'grok-4',
      baseURL: 'https://api.x.ai/v1',
    });
    expect(config.images.apiKey).toBe('test-openai-key');
  });

  it('coerces numeric and boolean variables', () => {
    const config = loadConfig({ ...base, APPROVAL_TIMEOUT_MS: '5000', DRY_RUN: 'true', PORT: '8080' });
    expect(config.approvalTimeoutMs).toBe(5000);
    expect(config.dryRun).toBe(true);
    expect(config.port).toBe(8080);
  });

  it('requires Slack when approval is mandatory', () => {
    const { SLACK_BOT_TOKEN: _omit, ...env } = base;
    const error = configError(env);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^APPROVAL_POLICY=required needs SLACK_BOT_TOKEN/);
  });

  it('runs without Slack when approval is optional', () => {
    const { SLACK_BOT_TOKEN: _omit, ...env } = base;
    const config = loadConfig({ ...env, APPROVAL_POLICY: 'optional' });
    expect(config.slack).toBeNull();
  });

  it('treats "..." placeholders as missing', () => {
    const config = loadConfig({ ...base, APPROVAL_POLICY: 'disabled', SLACK_BOT_TOKEN: '...' });
    expect(config.slack).toBeNull();
  });

  it('requires X credentials unless DRY_RUN is set', () => {
    const { X_ACCESS_SECRET: _omit, ...env } = base;
    expect(configError(env).issues).toEqual([
      'X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN and X_ACCESS_SECRET are required unless DRY_RUN=true',
    ]);
    expect(loadConfig({ ...env, DRY_RUN: '1' }).twitter).toBeNull();
  });

  it('reports every problem at once', () => {
    const error = configError({
      ...base,
      OPENAI_API_KEY: '',
      DIRECT_INTERVAL_MIN_MS: '5000',
      DIRECT_INTERVAL_MAX_MS: '1000',
    });
    expect(error.issues).toEqual([
      'OPENAI_API_KEY is required',
      'OPENAI_API_KEY is required for image generation',
      'DIRECT_INTERVAL_MIN_MS must not exceed DIRECT_INTERVAL_MAX_MS',
    ]);
  });

  it('rejects values of the wrong shape', () => {
    const error = configError({ ...base, APPROVAL_POLICY: 'sometimes' });
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^APPROVAL_POLICY: /);
  });
});
