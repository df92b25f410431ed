/**
 * Relay configuration.
 *
 * Values come from the process environment, with a `.env` file in the
 * working directory loaded first (existing variables win). Everything is
 * validated up front so a misconfigured deployment fails at startup, not on
 * the first Slack event.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export const DEFAULT_ASSISTANT_API_URL = 'https://api.openai.com/v1';
export const DEFAULT_ASSISTANT_BETA_HEADER = 'assistants=v2';
export const DEFAULT_PROCESSED_EVENTS_FILE = 'processed_events.json';
export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_PORT = 8080;

export type RelayConfig = {
  assistant: {
    apiUrl: string;
    apiKey: string;
    assistantId: string;
    betaHeader: string;
    pollIntervalMs: number;
    /** Unset means wait for the run indefinitely. */
    maxWaitMs: number | undefined;
  };
  slack: {
    botToken: string;
    adminMemberId: string | undefined;
    signingSecret: string | undefined;
  };
  processedEventsFile: string;
  port: number;
  logLevel: LogLevel;
};

const optionalText = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const requiredText = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  ASSISTANT_API_URL: z.string().trim().url().default(DEFAULT_ASSISTANT_API_URL),
  ASSISTANT_API_KEY: requiredText('ASSISTANT_API_KEY'),
  ASSISTANT_ID: requiredText('ASSISTANT_ID'),
  ASSISTANT_BETA_HEADER: z.string().trim().min(1).default(DEFAULT_ASSISTANT_BETA_HEADER),
  SLACK_BOT_TOKEN: requiredText('SLACK_BOT_TOKEN'),
  SLACK_ADMIN_MEMBER_ID: optionalText,
  SLACK_SIGNING_SECRET: optionalText,
  PROCESSED_EVENTS_FILE: z.string().trim().min(1).default(DEFAULT_PROCESSED_EVENTS_FILE),
  RUN_POLL_INTERVAL_MS: positiveInt.default(DEFAULT_POLL_INTERVAL_MS),
  RUN_MAX_WAIT_MS: positiveInt.optional(),
  PORT: positiveInt.max(65_535).default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

type EnvSource = Record<string, string | undefined>;

/** Drop blank entries so `.default()` applies to `FOO=` lines in .env files. */
function withoutBlanks(env: EnvSource): EnvSource {
  const result: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim()) result[key] = value;
  }
  return result;
}

/**
 * Resolve configuration from an environment map.
 * `API_KEY` is accepted as a fallback name for `ASSISTANT_API_KEY`.
 */
export function resolveConfig(env: EnvSource): RelayConfig {
  const source = withoutBlanks(env);
  source.ASSISTANT_API_KEY ??= source.API_KEY;

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      }),
    );
  }

  const v = parsed.data;
  return {
    assistant: {
      apiUrl: v.ASSISTANT_API_URL.replace(/\/+$/, ''),
      apiKey: v.ASSISTANT_API_KEY,
      assistantId: v.ASSISTANT_ID,
      betaHeader: v.ASSISTANT_BETA_HEADER,
      pollIntervalMs: v.RUN_POLL_INTERVAL_MS,
      maxWaitMs: v.RUN_MAX_WAIT_MS,
    },
    slack: {
      botToken: v.SLACK_BOT_TOKEN,
      adminMemberId: v.SLACK_ADMIN_MEMBER_ID,
      signingSecret: v.SLACK_SIGNING_SECRET,
    },
    processedEventsFile: v.PROCESSED_EVENTS_FILE,
    port: v.PORT,
    logLevel: v.LOG_LEVEL,
  };
}

/** Load `.env` into `process.env`, then resolve. */
export function loadConfig(): RelayConfig {
  loadDotenv();
  return resolveConfig(process.env);
}
