/**
 * Adapters Module
 *
 * External collaborators other than the record store.
 *
 * Responsibilities:
 * - EnrichmentRelay: forward a firm or person to the enrichment service,
 *   which calls back asynchronously on the given URL
 * - MailDraftService: create an unsent draft in the sender's mailbox
 * - Null implementations of both for tests and unconfigured deployments
 * - Build the full adapter set from a PipelineConfig
 *
 * Dispatch reports plain success or failure; draft creation returns a
 * ModuleResult. Neither throws.
 */

import axios from 'axios';
import { z } from 'zod';
import type { PipelineConfig } from '../config/index.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/index.js';
import { createConsoleLogger, type Logger } from '../observability/index.js';
import {
  MemoryRecordStore,
  NotionRecordStore,
  type HttpClient,
  type RecordStore,
} from '../record-store/index.js';
import { PipelineError, fail, succeed, type ModuleResult } from '../types/index.js';

const defaultLogger = createConsoleLogger('adapters');

// ============================================================================
// ENRICHMENT RELAY TYPES
// ============================================================================

export interface FirmEnrichmentRequest {
  target: 'firm';
  recordId: string;
  firmName: string;
  website: string;
  domain: string;
}

export interface PersonEnrichmentRequest {
  target: 'person';
  recordId: string;
  name: string;
  firmName: string;
  linkedinUrl: string | null;
  email: string | null;
}

export type EnrichmentRequest = FirmEnrichmentRequest | PersonEnrichmentRequest;

export interface EnrichmentRelay {
  /**
   * Send a record to enrichment
   *
   * @returns true when the relay accepted the request
   */
  dispatch(request: EnrichmentRequest, callbackUrl: string): Promise<boolean>;
}

/** Callback paths the relay posts results back to */
export const CALLBACK_PATHS = {
  firm: '/webhook/clay/firm-enriched',
  person: '/webhook/clay/person-enriched',
} as const;

export function callbackUrlFor(baseUrl: string, target: EnrichmentRequest['target']): string {
  return `${baseUrl.replace(/\/+$/, '')}${CALLBACK_PATHS[target]}`;
}

/**
 * Wire payload of a relay request
 */
export function buildRelayPayload(request: EnrichmentRequest, callbackUrl: string): Record<string, string | null> {
  if (request.target === 'firm') {
    return {
      notion_page_id: request.recordId,
      firm_name: request.firmName,
      website: request.website,
      domain: request.domain,
      callback_url: callbackUrl,
    };
  }
  return {
    notion_page_id: request.recordId,
    name: request.name,
    firm_name: request.firmName,
    linkedin_url: request.linkedinUrl,
    email: request.email,
    callback_url: callbackUrl,
  };
}

// ============================================================================
// CLAY ENRICHMENT RELAY
// ============================================================================

export interface ClayRelayConfig {
  firmWebhookUrl?: string;
  personWebhookUrl?: string;
  timeoutMs?: number;
  /** Pre-built HTTP client, used instead of constructing one */
  client?: Pick<HttpClient, 'post'>;
}

/**
 * ClayEnrichmentRelay
 *
 * Posts to the Clay table webhook for the request's target. A target
 * without a configured webhook is a failed dispatch.
 */
export class ClayEnrichmentRelay implements EnrichmentRelay {
  private readonly webhooks: Record<EnrichmentRequest['target'], string | undefined>;
  private readonly client: Pick<HttpClient, 'post'>;
  private readonly logger: Logger;

  constructor(config: ClayRelayConfig, logger: Logger = defaultLogger) {
    this.webhooks = { firm: config.firmWebhookUrl, person: config.personWebhookUrl };
    this.logger = logger;
    this.client =
      config.client ??
      axios.create({
        timeout: config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async dispatch(request: EnrichmentRequest, callbackUrl: string): Promise<boolean> {
    const webhookUrl = this.webhooks[request.target];
    if (!webhookUrl) {
      this.logger.error('Clay webhook URL not configured', { target: request.target });
      return false;
    }

    try {
      await this.client.post(webhookUrl, buildRelayPayload(request, callbackUrl));
      this.logger.info('Sent to Clay for enrichment', {
        target: request.target,
        recordId: request.recordId,
      });
      return true;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      this.logger.error('Failed to send to Clay', {
        target: request.target,
        recordId: request.recordId,
        status,
        error: errorMessage,
      });
      return false;
    }
  }
}

// ============================================================================
// NULL ENRICHMENT RELAY
// ============================================================================

export interface RecordedDispatch {
  request: EnrichmentRequest;
  callbackUrl: string;
  payload: Record<string, string | null>;
}

/**
 * NullEnrichmentRelay
 *
 * Records every dispatch and performs no network call. `accept: false`
 * makes every dispatch fail, which is how an unconfigured relay behaves.
 */
export class NullEnrichmentRelay implements EnrichmentRelay {
  readonly dispatched: RecordedDispatch[] = [];
  private accept: boolean;
  private logger: Logger;

  constructor(options: { accept?: boolean } = {}, logger: Logger = defaultLogger) {
    this.accept = options.accept ?? true;
    this.logger = logger;
  }

  /** Switch between accepting and rejecting dispatches */
  setAccepting(accept: boolean): void {
    this.accept = accept;
  }

  async dispatch(request: EnrichmentRequest, callbackUrl: string): Promise<boolean> {
    if (!this.accept) {
      this.logger.warn('Enrichment relay not configured - dispatch rejected', {
        target: request.target,
        recordId: request.recordId,
      });
      return false;
    }
    this.dispatched.push({ request, callbackUrl, payload: buildRelayPayload(request, callbackUrl) });
    return true;
  }
}

// ============================================================================
// MAIL DRAFT TYPES
// ============================================================================

export interface DraftMessage {
  to?: string | null;
  subject: string;
  body: string;
}

export interface DraftReference {
  draftId: string;
  /** Link that opens the draft in the mail client */
  url: string;
  threadId: string | null;
}

export interface MailDraftService {
  createDraft(message: DraftMessage): Promise<ModuleResult<DraftReference>>;
}

// ============================================================================
// GMAIL DRAFT SERVICE
// ============================================================================

export interface GmailConfig {
  /** OAuth access token with the gmail.compose scope */
  accessToken: string;
  timeoutMs?: number;
  apiUrl?: string;
}

const GMAIL_API_URL = 'https://gmail.googleapis.com/gmail/v1/users/me';

const GmailDraftResponseSchema = z.object({
  id: z.string(),
  message: z
    .object({
      id: z.string(),
      threadId: z.string().optional(),
    })
    .optional(),
});

/** RFC 2047 encoded-word for a header carrying non-ASCII text */
function encodeHeader(value: string): string {
  return /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * RFC 822 message, base64url-encoded as the Gmail API expects
 *
 * @throws PipelineError INVALID_RECIPIENT when the recipient holds a line
 *   break, which would start a new header
 */
export function encodeRawMessage(message: DraftMessage): string {
  if (message.to && /[\r\n]/.test(message.to)) {
    throw new PipelineError('InputError', 'INVALID_RECIPIENT', 'Recipient must not contain line breaks');
  }
  const headers = [
    ...(message.to ? [`To: ${message.to}`] : []),
    `Subject: ${encodeHeader(message.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
  ];
  const raw = `${headers.join('\r\n')}\r\n\r\n${message.body.replace(/\r?\n/g, '\r\n')}`;
  return Buffer.from(raw, 'utf-8').toString('base64url');
}

export function gmailDraftUrl(messageId: string): string {
  return `https://mail.google.com/mail/u/0/#drafts?compose=${messageId}`;
}

/**
 * GmailDraftService
 *
 * Creates drafts through the Gmail REST API with an already-issued access
 * token. Token refresh is left to the host.
 */
export class GmailDraftService implements MailDraftService {
  private accessToken: string;
  private apiUrl: string;
  private timeout: number;
  private logger: Logger;

  constructor(config: GmailConfig, logger: Logger = defaultLogger) {
    if (!config.accessToken) {
      throw new Error('Gmail access token is required');
    }
    this.accessToken = config.accessToken;
    this.apiUrl = config.apiUrl ?? GMAIL_API_URL;
    this.timeout = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = logger;
  }

  async createDraft(message: DraftMessage): Promise<ModuleResult<DraftReference>> {
    const startTime = Date.now();

    try {
      const response = await fetch(`${this.apiUrl}/drafts`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ message: { raw: encodeRawMessage(message) } }),
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`Gmail API error: ${response.status} - ${errorBody}`);
      }

      const parsed = GmailDraftResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return fail('adapters', {
          kind: 'ProviderError',
          code: 'INVALID_RESPONSE',
          message: 'Gmail draft response is missing the draft id',
        }, startTime);
      }

      const messageId = parsed.data.message?.id ?? parsed.data.id;
      this.logger.info('Gmail draft created', { draftId: parsed.data.id, to: message.to ?? null });

      return succeed('adapters', {
        draftId: parsed.data.id,
        url: gmailDraftUrl(messageId),
        threadId: parsed.data.message?.threadId ?? null,
      }, startTime);
    } catch (error) {
      if (error instanceof PipelineError) {
        this.logger.error('Refused to create Gmail draft', { code: error.code, error: error.message });
        return fail('adapters', error.toModuleError(), startTime);
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      this.logger.error('Failed to create Gmail draft', { error: errorMessage, timedOut });

      return fail('adapters', {
        kind: 'ProviderError',
        code: timedOut ? 'MAIL_TIMEOUT' : 'MAIL_DRAFT_ERROR',
        message: errorMessage,
      }, startTime);
    }
  }
}

// ============================================================================
// NULL MAIL DRAFT SERVICE
// ============================================================================

/** Drafts a NullMailDraftService holds before dropping the oldest */
export const NULL_DRAFTS_KEPT = 50;

/**
 * NullMailDraftService
 *
 * Keeps the latest drafts in memory and returns placeholder links. Used when
 * Gmail is not configured.
 */
export class NullMailDraftService implements MailDraftService {
  readonly drafts: DraftMessage[] = [];
  private logger: Logger;
  private keep: number;
  private created = 0;

  constructor(logger: Logger = defaultLogger, options: { keep?: number } = {}) {
    this.logger = logger;
    this.keep = options.keep ?? NULL_DRAFTS_KEPT;
  }

  async createDraft(message: DraftMessage): Promise<ModuleResult<DraftReference>> {
    const startTime = Date.now();
    this.created++;
    this.drafts.push(message);
    if (this.drafts.length > this.keep) {
      this.drafts.shift();
    }
    const draftId = `draft-${this.created}`;
    this.logger.warn('Mail not configured - draft kept in memory', { draftId, subject: message.subject });

    return succeed('adapters', {
      draftId,
      url: `memory://drafts/${draftId}`,
      threadId: null,
    }, startTime);
  }
}

// ============================================================================
// ADAPTER FACTORY
// ============================================================================

export interface Adapters {
  recordStore: RecordStore;
  relay: EnrichmentRelay;
  mail: MailDraftService;
}

/**
 * Create adapters from a validated configuration
 *
 * A missing credential selects the in-process adapter for that concern.
 */
export function createAdaptersFromConfig(config: PipelineConfig, logger: Logger = defaultLogger): Adapters {
  let recordStore: RecordStore;
  if (config.notion.apiKey) {
    recordStore = new NotionRecordStore(
      {
        apiKey: config.notion.apiKey,
        databases: config.notion.databases,
        version: config.notion.version,
        timeoutMs: config.notion.timeoutMs,
      },
      logger
    );
  } else {
    logger.warn('NOTION_API_KEY not set - using in-memory record store');
    recordStore = new MemoryRecordStore();
  }

  let relay: EnrichmentRelay;
  if (config.clay.firmWebhookUrl || config.clay.personWebhookUrl) {
    relay = new ClayEnrichmentRelay(
      {
        firmWebhookUrl: config.clay.firmWebhookUrl,
        personWebhookUrl: config.clay.personWebhookUrl,
        timeoutMs: config.clay.timeoutMs,
      },
      logger
    );
  } else {
    logger.warn('Clay webhook URLs not set - enrichment dispatch disabled');
    relay = new NullEnrichmentRelay({ accept: false }, logger);
  }

  let mail: MailDraftService;
  if (config.gmail.accessToken) {
    mail = new GmailDraftService(
      { accessToken: config.gmail.accessToken, timeoutMs: config.gmail.timeoutMs },
      logger
    );
  } else {
    logger.warn('GMAIL_ACCESS_TOKEN not set - drafts kept in memory');
    mail = new NullMailDraftService(logger);
  }

  return { recordStore, relay, mail };
}
