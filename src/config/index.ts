/**
 * Configuration Module
 *
 * Reads the process environment once at start-up, validates it with zod and
 * returns a typed PipelineConfig. Missing credentials are not an error here:
 * the adapter factory falls back to in-process adapters for them.
 */

import { z } from 'zod';
import type { LogLevel } from '../observability/index.js';
import { fail, succeed, type ModuleResult } from '../types/index.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_LLM_TIMEOUT_MS = 120000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_NOTION_VERSION = '2022-06-28';

// ============================================================================
// Types
// ============================================================================

export interface PipelineConfig {
  anthropic: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  notion: {
    apiKey?: string;
    version: string;
    timeoutMs: number;
    databases: {
      firms?: string;
      prospects?: string;
      outreachLog?: string;
    };
  };
  clay: {
    firmWebhookUrl?: string;
    personWebhookUrl?: string;
    timeoutMs: number;
  };
  gmail: {
    accessToken?: string;
    timeoutMs: number;
  };
  /** Base URL the enrichment relay calls back on, without trailing slash */
  publicBaseUrl: string;
  /** Duplicate-delivery window; 0 disables the guard */
  idempotencyWindowMs: number;
  logLevel: LogLevel;
}

// ============================================================================
// Environment Schema
// ============================================================================

/** Blank strings count as unset */
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const durationMs = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? fallback : value),
    z.coerce.number().int().nonnegative()
  );

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  LLM_TIMEOUT_MS: durationMs(DEFAULT_LLM_TIMEOUT_MS),
  NOTION_API_KEY: optionalString,
  NOTION_VERSION: optionalString,
  NOTION_FIRMS_DB_ID: optionalString,
  NOTION_PROSPECTS_DB_ID: optionalString,
  NOTION_OUTREACH_LOG_DB_ID: optionalString,
  CLAY_FIRM_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  CLAY_PERSON_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  PUBLIC_BASE_URL: optionalString,
  GMAIL_ACCESS_TOKEN: optionalString,
  REQUEST_TIMEOUT_MS: durationMs(DEFAULT_REQUEST_TIMEOUT_MS),
  IDEMPOTENCY_WINDOW_MS: durationMs(0),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : 'info'),
    z.enum(['debug', 'info', 'warn', 'error', 'silent'])
  ),
});

// ============================================================================
// Loader
// ============================================================================

/**
 * Validate an environment map into a PipelineConfig
 *
 * @param env - Defaults to process.env
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ModuleResult<PipelineConfig> {
  const startTime = Date.now();
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return fail('config', {
      kind: 'InputError',
      code: 'INVALID_CONFIGURATION',
      message: 'Environment configuration is invalid',
      details: errors,
    }, startTime);
  }

  const e = parsed.data;
  const requestTimeout = e.REQUEST_TIMEOUT_MS;

  return succeed('config', {
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL ?? DEFAULT_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    notion: {
      apiKey: e.NOTION_API_KEY,
      version: e.NOTION_VERSION ?? DEFAULT_NOTION_VERSION,
      timeoutMs: requestTimeout,
      databases: {
        firms: e.NOTION_FIRMS_DB_ID,
        prospects: e.NOTION_PROSPECTS_DB_ID,
        outreachLog: e.NOTION_OUTREACH_LOG_DB_ID,
      },
    },
    clay: {
      firmWebhookUrl: e.CLAY_FIRM_WEBHOOK_URL,
      personWebhookUrl: e.CLAY_PERSON_WEBHOOK_URL,
      timeoutMs: requestTimeout,
    },
    gmail: {
      accessToken: e.GMAIL_ACCESS_TOKEN,
      timeoutMs: requestTimeout,
    },
    publicBaseUrl: (e.PUBLIC_BASE_URL ?? '').replace(/\/+$/, ''),
    idempotencyWindowMs: e.IDEMPOTENCY_WINDOW_MS,
    logLevel: e.LOG_LEVEL,
  }, startTime);
}
