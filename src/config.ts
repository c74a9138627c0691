import os from 'os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ApprovalPolicy, IntervalRange } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

const DEFAULT_PERSONA =
  'You are a cheerful robot penguin who loves adventures, helping others, and sharing fun ' +
  'facts about technology and nature. Keep posts positive and engaging.';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value && value !== '...' ? value : undefined));

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const duration = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DB_PATH: z.string().min(1).default('data/approval.db'),

  LLM_PROVIDER: z.enum(['openai', 'xai']).default('openai'),
  OPENAI_API_KEY: optionalString,
  XAI_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  OPENAI_IMAGE_MODEL: z.string().min(1).default('dall-e-3'),
  IMAGE_DIR: z.string().min(1).default(os.tmpdir()),
  PERSONA: z.string().min(1).default(DEFAULT_PERSONA),
  POST_MAX_LENGTH: z.coerce.number().int().positive().default(280),
  HISTORY_CONTEXT_SIZE: z.coerce.number().int().min(0).default(3),

  APPROVAL_POLICY: z.enum(['required', 'optional', 'disabled']).default('required'),
  APPROVAL_TIMEOUT_MS: duration(24 * HOUR_MS),
  APPROVAL_INTERVAL_MIN_MS: duration(HOUR_MS),
  APPROVAL_INTERVAL_MAX_MS: duration(3 * HOUR_MS),
  DIRECT_INTERVAL_MIN_MS: duration(HOUR_MS),
  DIRECT_INTERVAL_MAX_MS: duration(3 * HOUR_MS),
  FAILURE_BACKOFF_MS: duration(5 * 60 * 1000),
  DRY_RUN: flag,

  SLACK_BOT_TOKEN: optionalString,
  SLACK_SIGNING_SECRET: optionalString,
  SLACK_APPROVAL_CHANNEL: optionalString,

  X_API_KEY: optionalString,
  X_API_SECRET: optionalString,
  X_ACCESS_TOKEN: optionalString,
  X_ACCESS_SECRET: optionalString,
});

type Env = z.infer<typeof envSchema>;

export interface SlackConfig {
  botToken: string;
  signingSecret: string;
  channel: string;
}

export interface TwitterCredentials {
  appKey: string;
  appSecret: string;
  accessToken: string;
  accessSecret: string;
}

export interface LLMConfig {
  provider: 'openai' | 'xai';
  apiKey: string;
  model: string;
  baseURL?: string;
}

export interface AppConfig {
  port: number;
  dbPath: string;
  llm: LLMConfig;
  images: { apiKey: string; model: string; dir: string };
  persona: string;
  postMaxLength: number;
  historyContextSize: number;
  approvalPolicy: ApprovalPolicy;
  approvalTimeoutMs: number;
  approvalInterval: IntervalRange;
  directInterval: IntervalRange;
  failureBackoffMs: number;
  dryRun: boolean;
  slack: SlackConfig | null;
  twitter: TwitterCredentials | null;
}

const LLM_DEFAULTS = {
  openai: { model: 'gpt-4o-mini', baseURL: undefined },
  xai: { model: 'grok-4', baseURL: 'https://api.x.ai/v1' },
} as const;

function slackFrom(env: Env): SlackConfig | null {
  const { SLACK_BOT_TOKEN, SLACK_SIGNING_SECRET, SLACK_APPROVAL_CHANNEL } = env;
  if (!SLACK_BOT_TOKEN || !SLACK_SIGNING_SECRET || !SLACK_APPROVAL_CHANNEL) return null;
  return { botToken: SLACK_BOT_TOKEN, signingSecret: SLACK_SIGNING_SECRET, channel: SLACK_APPROVAL_CHANNEL };
}

function twitterFrom(env: Env): TwitterCredentials | null {
  const { X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN, X_ACCESS_SECRET } = env;
  if (!X_API_KEY || !X_API_SECRET || !X_ACCESS_TOKEN || !X_ACCESS_SECRET) return null;
  return { appKey: X_API_KEY, appSecret: X_API_SECRET, accessToken: X_ACCESS_TOKEN, accessSecret: X_ACCESS_SECRET };
}

function range(minMs: number, maxMs: number): IntervalRange {
  return { minMs, maxMs };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = parsed.data;
  const issues: string[] = [];
  const slack = slackFrom(env);
  const twitter = twitterFrom(env);

  const llmKey = env.LLM_PROVIDER === 'xai' ? env.XAI_API_KEY : env.OPENAI_API_KEY;
  if (!llmKey) {
    issues.push(`${env.LLM_PROVIDER === 'xai' ? 'XAI_API_KEY' : 'OPENAI_API_KEY'} is required`);
  }
  if (!env.OPENAI_API_KEY) {
    issues.push('OPENAI_API_KEY is required for image generation');
  }
  if (env.APPROVAL_POLICY === 'required' && !slack) {
    issues.push(
      'APPROVAL_POLICY=required needs SLACK_BOT_TOKEN, SLACK_SIGNING_SECRET and SLACK_APPROVAL_CHANNEL ' +
      '(or set APPROVAL_POLICY to optional/disabled)'
    );
  }
  if (!env.DRY_RUN && !twitter) {
    issues.push('X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN and X_ACCESS_SECRET are required unless DRY_RUN=true');
  }
  if (env.APPROVAL_INTERVAL_MIN_MS > env.APPROVAL_INTERVAL_MAX_MS) {
    issues.push('APPROVAL_INTERVAL_MIN_MS must not exceed APPROVAL_INTERVAL_MAX_MS');
  }
  if (env.DIRECT_INTERVAL_MIN_MS > env.DIRECT_INTERVAL_MAX_MS) {
    issues.push('DIRECT_INTERVAL_MIN_MS must not exceed DIRECT_INTERVAL_MAX_MS');
  }

  if (issues.length > 0 || !llmKey || !env.OPENAI_API_KEY) {
    throw new ConfigError(issues);
  }

  const defaults = LLM_DEFAULTS[env.LLM_PROVIDER];

  return {
    port: env.PORT,
    dbPath: env.DB_PATH,
    llm: {
      provider: env.LLM_PROVIDER,
      apiKey: llmKey,
      model: env.LLM_MODEL ?? defaults.model,
      baseURL: defaults.baseURL,
    },
    images: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_IMAGE_MODEL, dir: env.IMAGE_DIR },
    persona: env.PERSONA,
    postMaxLength: env.POST_MAX_LENGTH,
    historyContextSize: env.HISTORY_CONTEXT_SIZE,
    approvalPolicy: env.APPROVAL_POLICY,
    approvalTimeoutMs: env.APPROVAL_TIMEOUT_MS,
    approvalInterval: range(env.APPROVAL_INTERVAL_MIN_MS, env.APPROVAL_INTERVAL_MAX_MS),
    directInterval: range(env.DIRECT_INTERVAL_MIN_MS, env.DIRECT_INTERVAL_MAX_MS),
    failureBackoffMs: env.FAILURE_BACKOFF_MS,
    dryRun: env.DRY_RUN,
    slack,
    twitter,
  };
}
