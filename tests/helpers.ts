/**
 * Shared test doubles
 */

import type { CompletionRequest, LLMProvider } from '../src/llm/index.js';
import type { Logger, Metrics } from '../src/observability/index.js';
import { fail, succeed, type ModuleError, type ModuleResult } from '../src/types/index.js';

export interface LogEntry {
  level: string;
  msg: string;
  meta?: Record<string, unknown>;
}

export const createMockLogger = (): Logger & { logs: LogEntry[] } => {
  const logs: LogEntry[] = [];
  return {
    logs,
    info: (msg, meta) => logs.push({ level: 'info', msg, meta }),
    warn: (msg, meta) => logs.push({ level: 'warn', msg, meta }),
    error: (msg, meta) => logs.push({ level: 'error', msg, meta }),
    debug: (msg, meta) => logs.push({ level: 'debug', msg, meta }),
  };
};

export interface MetricEntry {
  type: 'increment' | 'gauge' | 'timing';
  metric: string;
  value?: number;
  tags?: Record<string, string>;
}

export const createMockMetrics = (): Metrics & { entries: MetricEntry[] } => {
  const entries: MetricEntry[] = [];
  return {
    entries,
    increment: (metric, tags) => entries.push({ type: 'increment', metric, tags }),
    gauge: (metric, value, tags) => entries.push({ type: 'gauge', metric, value, tags }),
    timing: (metric, value, tags) => entries.push({ type: 'timing', metric, value, tags }),
  };
};

/**
 * LLM provider that replays a fixed script: a string is a successful
 * completion, a ModuleError a failed one
 */
export class ScriptedLLM implements LLMProvider {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<string | ModuleError>;

  constructor(replies: Array<string | ModuleError>) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<ModuleResult<string>> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) {
      return fail('llm', { kind: 'ProviderError', code: 'SCRIPT_EXHAUSTED', message: 'No scripted reply left' }, Date.now());
    }
    if (typeof next === 'string') {
      return succeed('llm', next, Date.now());
    }
    return fail('llm', next, Date.now());
  }
}

export const providerError = (code = 'LLM_API_ERROR', message = 'upstream unavailable'): ModuleError => ({
  kind: 'ProviderError',
  code,
  message,
});

/** A scoring reply covering every offering */
export const scoringReply = (overrides: Record<string, string> = {}): string =>
  JSON.stringify({
    harborline_fit: 'Strong',
    harborline_rationale: 'Long-dated real estate program',
    cedar_yield_fit: 'moderate fit',
    cedar_yield_rationale: 'Income sleeve fits',
    northgate_fit: 'Weak',
    northgate_rationale: 'Limited venture exposure',
    keystone_fit: 'n/a',
    keystone_rationale: 'No public equity mandate',
    brightfield_fit: 'Moderate',
    brightfield_rationale: 'Open to growth equity',
    co_invest_fit: 'STRONG',
    co_invest_rationale: 'Active co-investor',
    best_match: 'Harborline',
    overall_notes: 'Diversified allocator with an active direct program.',
    ...overrides,
  });
