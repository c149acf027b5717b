/**
 * LLM Module
 *
 * Features:
 * - LLMProvider interface consumed by the scoring and outreach engines
 * - Anthropic Messages API integration with @anthropic-ai/sdk
 * - Explicit request timeout; a timeout is reported as a ProviderError
 * - No automatic retries: the SDK's own retry loop is switched off
 * - Code-fence stripping and JSON object parsing for structured replies
 */

import Anthropic from '@anthropic-ai/sdk';
import { DEFAULT_LLM_TIMEOUT_MS, DEFAULT_MODEL } from '../config/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import { fail, succeed, type ModuleResult } from '../types/index.js';

const MODULE = 'llm';

// ============================================================================
// Type Definitions
// ============================================================================

export interface CompletionRequest {
  systemPrompt?: string;
  userPrompt: string;
  maxOutputTokens: number;
}

export interface LLMProvider {
  complete(request: CompletionRequest): Promise<ModuleResult<string>>;
}

/**
 * The fields of a Messages API reply this module reads
 */
export interface CompletionMessage {
  content: ReadonlyArray<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic client this module calls
 */
export interface MessagesClient {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<CompletionMessage>;
}

export interface AnthropicProviderOptions {
  /** Anthropic API key; without it every call fails with MISSING_API_KEY */
  apiKey?: string;
  /** Model ID (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeoutMs?: number;
  temperature?: number;
  /** Pre-built client, used instead of constructing one from apiKey */
  client?: MessagesClient;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Anthropic Provider
// ============================================================================

export class AnthropicProvider implements LLMProvider {
  private readonly client: MessagesClient | null;
  private readonly model: string;
  private readonly temperature: number | undefined;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: AnthropicProviderOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature;
    this.logger = options.logger ?? createConsoleLogger(MODULE);
    this.metrics = options.metrics ?? noopMetrics;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      const anthropic = new Anthropic({
        apiKey: options.apiKey,
        timeout: options.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS,
        maxRetries: 0,
      });
      this.client = { create: (params) => anthropic.messages.create(params) };
    } else {
      this.client = null;
    }
  }

  async complete(request: CompletionRequest): Promise<ModuleResult<string>> {
    const startTime = Date.now();

    if (!this.client) {
      return fail(MODULE, {
        kind: 'ProviderError',
        code: 'MISSING_API_KEY',
        message: 'ANTHROPIC_API_KEY is required. Set it in config or environment variable.',
      }, startTime);
    }

    this.logger.info('Calling Claude API', {
      model: this.model,
      maxTokens: request.maxOutputTokens,
      promptLength: request.userPrompt.length,
    });
    this.metrics.increment('llm.claude.calls', { model: this.model });

    try {
      const response = await this.client.create({
        model: this.model,
        max_tokens: request.maxOutputTokens,
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
        ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
        messages: [{ role: 'user', content: request.userPrompt }],
      });

      const text = response.content.find((block) => block.type === 'text')?.text;
      if (text === undefined) {
        return fail(MODULE, {
          kind: 'ProviderError',
          code: 'EMPTY_RESPONSE',
          message: 'No text content in Claude response',
          details: { stopReason: response.stop_reason },
        }, startTime);
      }

      this.logger.info('Claude API response received', {
        model: this.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason,
      });
      this.metrics.timing('llm.claude.duration', Date.now() - startTime, { model: this.model });
      this.metrics.gauge('llm.claude.input_tokens', response.usage.input_tokens, { model: this.model });
      this.metrics.gauge('llm.claude.output_tokens', response.usage.output_tokens, { model: this.model });

      return succeed(MODULE, text, startTime);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const timedOut = error instanceof Anthropic.APIConnectionTimeoutError;
      const status = error instanceof Anthropic.APIError ? error.status : undefined;

      this.logger.error('Claude API call failed', { error: message, status, timedOut });
      this.metrics.increment('llm.claude.errors', { model: this.model });

      return fail(MODULE, {
        kind: 'ProviderError',
        code: timedOut ? 'LLM_TIMEOUT' : 'LLM_API_ERROR',
        message,
        details: { status },
      }, startTime);
    }
  }
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Remove markdown code fences around a structured reply. A fenced block
 * anywhere in the text wins over the surrounding prose.
 */
export function stripCodeFences(text: string): string {
  const fenced = text.match(/```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/);
  if (fenced && fenced[1] !== undefined) {
    return fenced[1].trim();
  }
  return text.trim().replace(/^```[a-zA-Z]*\s*/, '').trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a reply that must be a single JSON object
 *
 * Failures are ParseErrors whose details keep the raw reply.
 */
export function parseJsonObject(text: string, module: string = MODULE): ModuleResult<Record<string, unknown>> {
  const startTime = Date.now();
  const cleaned = stripCodeFences(text);

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (parseError) {
    return fail(module, {
      kind: 'ParseError',
      code: 'JSON_PARSE_ERROR',
      message: 'Failed to parse response as JSON',
      details: {
        parseError: parseError instanceof Error ? parseError.message : String(parseError),
        responsePreview: cleaned.substring(0, 500),
        raw: text,
      },
    }, startTime);
  }

  if (!isRecord(parsed)) {
    return fail(module, {
      kind: 'ParseError',
      code: 'NOT_AN_OBJECT',
      message: 'Response JSON is not an object',
      details: { responsePreview: cleaned.substring(0, 500), raw: text },
    }, startTime);
  }

  return succeed(module, parsed, startTime);
}
