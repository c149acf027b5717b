/**
 * Workflow Module
 *
 * The webhook handlers. Each handler takes the raw inbound payload, validates
 * it, drives the record store, relay, engines and mail service in sequence,
 * and returns a WorkflowOutcome. Handlers never throw.
 *
 * Record lifecycle:
 *   New ──(dispatch ok)──▶ Researching ──(enrichment merged | scored)──▶ Qualified
 *
 * The restart flag is cleared only in the write that follows a successful
 * dispatch, so a failed dispatch leaves it set for the next attempt.
 *
 * Outcome statuses:
 * - completed: every step succeeded
 * - partial: a write failed after an upstream step succeeded (PartialUpdateError)
 * - rejected: the payload failed validation; nothing was called
 * - failed: a collaborator failed before anything was written
 * - not_found: the referenced record or outreach thread does not exist
 * - duplicate: the idempotency guard rejected a repeated delivery
 */

import { classifyReply, replyStatusLabel } from '../classifier/index.js';
import type { PipelineConfig } from '../config/index.js';
import {
  callbackUrlFor,
  createAdaptersFromConfig,
  type EnrichmentRelay,
  type MailDraftService,
} from '../adapters/index.js';
import { IdempotencyGuard } from '../idempotency/index.js';
import { AnthropicProvider, type LLMProvider } from '../llm/index.js';
import {
  extractDomain,
  normalizeContactEnrichmentRequest,
  normalizeFirmEnrichedEvent,
  normalizeNewFirmEvent,
  normalizeOutreachTrigger,
  normalizePersonEnrichedEvent,
  normalizeReplyEvent,
  normalizeScoringTrigger,
  type PersonData,
} from '../normalizer/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import { loadDefaultRoster, type Roster } from '../offerings/index.js';
import {
  OutreachComposer,
  extractFirmContext,
  type OutreachDraft,
  type OutreachOutcome,
} from '../outreach/index.js';
import {
  FirmProperty,
  OutreachLogProperty,
  ProspectProperty,
  readFirmName,
  readText,
  type PropertyMap,
  type StoreRecord,
} from '../properties/index.js';
import type { PropertyFilter, RecordStore } from '../record-store/index.js';
import {
  DEFAULT_CONTACT_LABEL,
  buildContactProperties,
  buildContactStatusUpdate,
  buildDispatchUpdate,
  buildEnrichmentMerge,
  buildOutreachUpdate,
  buildReplyUpdate,
  buildScoringUpdate,
} from '../renderers/index.js';
import { ScoringEngine, type ScoringResult } from '../scoring/index.js';
import {
  PipelineError,
  fail,
  succeed,
  toModuleError,
  type ContactStatus,
  type ModuleError,
  type ModuleResult,
  type ReplyClassification,
} from '../types/index.js';

const MODULE = 'workflow';

/** Firms returned by listRecentFirms */
export const RECENT_FIRMS_LIMIT = 20;

// ============================================================================
// Outcome Types
// ============================================================================

export type WorkflowEvent =
  | 'new_firm'
  | 'firm_enriched'
  | 'firm_scoring'
  | 'score_existing_firm'
  | 'person_enriched'
  | 'person_enrichment_request'
  | 'outreach'
  | 'email_reply'
  | 'list_recent_firms';

export type OutcomeStatus = 'completed' | 'partial' | 'rejected' | 'failed' | 'not_found' | 'duplicate';

/** `fallback`: the step produced a substitute result after its primary path failed */
export type StepStatus = 'success' | 'failed' | 'skipped' | 'fallback';

export interface StepReport {
  step: string;
  status: StepStatus;
  attemptedAt: string;
  error: ModuleError | null;
}

export interface WorkflowOutcome<T> {
  event: WorkflowEvent;
  status: OutcomeStatus;
  /** Last stage reached */
  stage: string;
  recordId: string | null;
  /** Property names written, across every record touched */
  written: string[];
  steps: StepReport[];
  error: ModuleError | null;
  data: T | null;
  duration: number;
}

export interface NewFirmData {
  firmName: string;
  domain: string;
  restart: boolean;
  callbackUrl: string;
}

export interface ContactUpsert {
  name: string;
  recordId: string;
  action: 'created' | 'updated';
}

export interface FirmEnrichedData {
  updatesApplied: string[];
  contacts: ContactUpsert[];
  skippedPeople: number;
}

export interface ContactEnrichmentData {
  contactId: string;
  callbackUrl: string;
}

export interface OutreachData {
  firmName: string;
  source: OutreachOutcome['source'];
  draft: OutreachDraft;
  draftUrl: string | null;
  warnings: string[];
  /** Why the fallback draft was used */
  compositionError: ModuleError | null;
}

export interface ReplyData {
  outreachRecordId: string;
  classification: ReplyClassification;
  responseStatus: string;
  responseDate: string;
}

export interface FirmSummary {
  id: string;
  name: string;
  status: string;
  url: string;
}

// ============================================================================
// Handler Run
// ============================================================================

/**
 * Step log of one handler invocation
 */
class HandlerRun<T> {
  readonly steps: StepReport[] = [];
  readonly written: string[] = [];
  recordId: string | null = null;
  private readonly startTime = Date.now();

  constructor(readonly event: WorkflowEvent) {}

  /**
   * Run one collaborator call; a thrown error becomes a failed step
   */
  async step<R>(name: string, action: () => Promise<R>): Promise<ModuleResult<R>> {
    const attemptedAt = new Date().toISOString();
    const startTime = Date.now();
    try {
      const value = await action();
      this.steps.push({ step: name, status: 'success', attemptedAt, error: null });
      return succeed(MODULE, value, startTime);
    } catch (error) {
      const moduleError = toModuleError(error, 'ProviderError', 'STEP_FAILED');
      this.steps.push({ step: name, status: 'failed', attemptedAt, error: moduleError });
      return fail(MODULE, moduleError, startTime);
    }
  }

  /** Partial record update, tracked in `written` on success */
  async write(name: string, store: RecordStore, id: string, properties: PropertyMap): Promise<ModuleResult<void>> {
    const result = await this.step(name, () => store.update(id, properties));
    if (result.success) {
      this.written.push(...Object.keys(properties));
    }
    return result;
  }

  /** Log a call that already returns a ModuleResult */
  record<R>(name: string, result: ModuleResult<R>): ModuleResult<R> {
    this.steps.push({
      step: name,
      status: result.success ? 'success' : 'failed',
      attemptedAt: result.metadata.timestamp,
      error: result.success ? null : result.error,
    });
    return result;
  }

  skip(name: string): void {
    this.steps.push({ step: name, status: 'skipped', attemptedAt: new Date().toISOString(), error: null });
  }

  finish(status: OutcomeStatus, stage: string, data: T | null, error: ModuleError | null = null): WorkflowOutcome<T> {
    return {
      event: this.event,
      status,
      stage,
      recordId: this.recordId,
      written: [...this.written],
      steps: [...this.steps],
      error,
      data,
      duration: Date.now() - this.startTime,
    };
  }

  reject(stage: string, error: ModuleError): WorkflowOutcome<T> {
    return this.finish('rejected', stage, null, error);
  }

  partial(stage: string, data: T | null, cause: ModuleError, message: string): WorkflowOutcome<T> {
    return this.finish('partial', stage, data, {
      kind: 'PartialUpdateError',
      code: cause.code,
      message: `${message}: ${cause.message}`,
      details: { cause: cause.kind, written: [...this.written] },
    });
  }
}

function isNotFound(error: ModuleError): boolean {
  return error.code === 'RECORD_NOT_FOUND';
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface WorkflowDependencies {
  recordStore: RecordStore;
  relay: EnrichmentRelay;
  mail: MailDraftService;
  scoring: Pick<ScoringEngine, 'score'>;
  outreach: Pick<OutreachComposer, 'compose'>;
  /** Base URL the relay calls back on */
  publicBaseUrl: string;
  guard?: IdempotencyGuard;
  logger?: Logger;
  metrics?: Metrics;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class WorkflowOrchestrator {
  private readonly store: RecordStore;
  private readonly relay: EnrichmentRelay;
  private readonly mail: MailDraftService;
  private readonly scoring: Pick<ScoringEngine, 'score'>;
  private readonly outreach: Pick<OutreachComposer, 'compose'>;
  private readonly publicBaseUrl: string;
  private readonly guard: IdempotencyGuard;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly now: () => Date;

  constructor(deps: WorkflowDependencies) {
    this.store = deps.recordStore;
    this.relay = deps.relay;
    this.mail = deps.mail;
    this.scoring = deps.scoring;
    this.outreach = deps.outreach;
    this.publicBaseUrl = deps.publicBaseUrl;
    this.guard = deps.guard ?? new IdempotencyGuard({ windowMs: 0 });
    this.logger = deps.logger ?? createConsoleLogger(MODULE);
    this.metrics = deps.metrics ?? noopMetrics;
    this.now = deps.now ?? (() => new Date());
  }

  // --------------------------------------------------------------------------
  // New firm → enrichment dispatch
  // --------------------------------------------------------------------------

  /**
   * A firm was added (or flagged for restart) in the CRM
   */
  async handleNewFirm(payload: unknown): Promise<WorkflowOutcome<NewFirmData>> {
    return this.execute<NewFirmData>('new_firm', async (run) => {
      const normalized = normalizeNewFirmEvent(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }
      const { recordId, restart } = normalized.data;
      let { firmName, website } = normalized.data;
      run.recordId = recordId;

      if (!website && restart && recordId) {
        this.logger.info('Fetching full record for restart', { recordId });
        const loaded = await run.step('load_record', () => this.store.get(recordId));
        if (!loaded.success) {
          return run.finish(isNotFound(loaded.error) ? 'not_found' : 'failed', 'load_record', null, loaded.error);
        }
        website = readText(loaded.data.properties, FirmProperty.Website) || null;
        firmName = firmName || readFirmName(loaded.data);
      }

      const domain = extractDomain(website);
      if (!website || !domain) {
        this.logger.warn('No website provided for firm', { firm: firmName });
        return run.reject('validate', {
          kind: 'InputError',
          code: 'MISSING_WEBSITE',
          message: 'No website/domain provided',
        });
      }
      if (!recordId) {
        return run.reject('validate', {
          kind: 'InputError',
          code: 'MISSING_RECORD_ID',
          message: 'No page ID provided',
        });
      }
      const firmWebsite = website;

      return this.deduplicated(run, recordId, restart, async () => {
        const callbackUrl = callbackUrlFor(this.publicBaseUrl, 'firm');
        const dispatched = await run.step('dispatch_enrichment', () =>
          this.dispatchOrThrow(
            { target: 'firm', recordId, firmName, website: firmWebsite, domain },
            callbackUrl
          )
        );
        if (!dispatched.success) {
          return run.finish('failed', 'dispatch_enrichment', null, dispatched.error);
        }

        const data: NewFirmData = { firmName, domain, restart, callbackUrl };
        const written = await run.write('update_status', this.store, recordId, buildDispatchUpdate(restart));
        if (!written.success) {
          return run.partial('update_status', data, written.error, 'Enrichment dispatched but status update failed');
        }

        return run.finish('completed', 'update_status', data);
      });
    });
  }

  // --------------------------------------------------------------------------
  // Firm enrichment callback
  // --------------------------------------------------------------------------

  /**
   * Relay returned firmographics (and possibly people) for a firm
   */
  async handleFirmEnriched(payload: unknown): Promise<WorkflowOutcome<FirmEnrichedData>> {
    return this.execute<FirmEnrichedData>('firm_enriched', async (run) => {
      const normalized = normalizeFirmEnrichedEvent(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }
      const event = normalized.data;
      run.recordId = event.recordId;

      const merge = buildEnrichmentMerge(event);
      const merged = await run.write('merge_enrichment', this.store, event.recordId, merge);
      if (!merged.success) {
        return run.finish(isNotFound(merged.error) ? 'not_found' : 'failed', 'merge_enrichment', null, merged.error);
      }

      const data: FirmEnrichedData = {
        updatesApplied: Object.keys(merge),
        contacts: [],
        skippedPeople: event.skippedPeople,
      };

      let firstFailure: ModuleError | null = null;
      for (const person of event.people) {
        const upserted = await this.upsertContact(run, person);
        if (upserted.success) {
          data.contacts.push(upserted.data);
        } else {
          firstFailure = firstFailure ?? upserted.error;
        }
      }

      if (firstFailure) {
        return run.partial('upsert_contacts', data, firstFailure, 'Firm merged but a contact upsert failed');
      }
      return run.finish('completed', event.people.length > 0 ? 'upsert_contacts' : 'merge_enrichment', data);
    });
  }

  // --------------------------------------------------------------------------
  // Scoring
  // --------------------------------------------------------------------------

  /**
   * Research and score a firm, then write fits, notes and best matches
   */
  async handleScoring(payload: unknown): Promise<WorkflowOutcome<ScoringResult>> {
    return this.execute<ScoringResult>('firm_scoring', async (run) => {
      const normalized = normalizeScoringTrigger(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }
      const trigger = normalized.data;
      run.recordId = trigger.recordId;

      return this.deduplicated(run, trigger.recordId, false, () =>
        this.scoreAndWrite(run, trigger.recordId, trigger.firmName, trigger.website, trigger.research)
      );
    });
  }

  /**
   * Re-score a stored firm, reusing its overview as research text
   */
  async scoreExistingFirm(recordId: string): Promise<WorkflowOutcome<ScoringResult>> {
    return this.execute<ScoringResult>('score_existing_firm', async (run) => {
      const id = recordId.trim();
      if (!id) {
        return run.reject('validate', {
          kind: 'InputError',
          code: 'MISSING_RECORD_ID',
          message: 'No record id provided',
        });
      }
      run.recordId = id;

      const loaded = await run.step('load_record', () => this.store.get(id));
      if (!loaded.success) {
        return run.finish(isNotFound(loaded.error) ? 'not_found' : 'failed', 'load_record', null, loaded.error);
      }

      const { properties } = loaded.data;
      return this.deduplicated(run, id, false, () =>
        this.scoreAndWrite(
          run,
          id,
          readFirmName(loaded.data),
          readText(properties, FirmProperty.Website),
          readText(properties, FirmProperty.FirmOverview)
        )
      );
    });
  }

  private async scoreAndWrite(
    run: HandlerRun<ScoringResult>,
    recordId: string,
    firmName: string,
    website: string,
    research: string
  ): Promise<WorkflowOutcome<ScoringResult>> {
    this.logger.info('Scoring firm', { firm: firmName, recordId });

    const scored = run.record('score', await this.scoring.score(firmName, website, research));
    if (!scored.success) {
      return run.finish('failed', 'score', null, scored.error);
    }

    const written = await run.write('write_scores', this.store, recordId, buildScoringUpdate(scored.data));
    if (!written.success) {
      return run.partial('write_scores', scored.data, written.error, 'Scoring completed but record update failed');
    }

    return run.finish('completed', 'write_scores', scored.data);
  }

  // --------------------------------------------------------------------------
  // Contacts
  // --------------------------------------------------------------------------

  /**
   * Relay returned a single enriched person
   */
  async handlePersonEnriched(payload: unknown): Promise<WorkflowOutcome<ContactUpsert>> {
    return this.execute<ContactUpsert>('person_enriched', async (run) => {
      const normalized = normalizePersonEnrichedEvent(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }

      const upserted = await this.upsertContact(run, normalized.data);
      if (!upserted.success) {
        return run.finish('failed', 'upsert_contact', null, upserted.error);
      }
      run.recordId = upserted.data.recordId;
      return run.finish('completed', 'upsert_contact', upserted.data);
    });
  }

  /**
   * Send an existing contact to person enrichment and mark it Enriching
   */
  async handleContactEnrichmentRequest(payload: unknown): Promise<WorkflowOutcome<ContactEnrichmentData>> {
    return this.execute<ContactEnrichmentData>('person_enrichment_request', async (run) => {
      const normalized = normalizeContactEnrichmentRequest(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }
      const request = normalized.data;
      run.recordId = request.contactId;

      const callbackUrl = callbackUrlFor(this.publicBaseUrl, 'person');
      const dispatched = await run.step('dispatch_enrichment', () =>
        this.dispatchOrThrow(
          {
            target: 'person',
            recordId: request.contactId,
            name: request.name,
            firmName: request.firmName,
            linkedinUrl: request.linkedinUrl,
            email: request.email,
          },
          callbackUrl
        )
      );
      if (!dispatched.success) {
        return run.finish('failed', 'dispatch_enrichment', null, dispatched.error);
      }

      const data: ContactEnrichmentData = { contactId: request.contactId, callbackUrl };
      const written = await run.write(
        'update_status',
        this.store,
        request.contactId,
        buildContactStatusUpdate('Enriching' satisfies ContactStatus)
      );
      if (!written.success) {
        return run.partial('update_status', data, written.error, 'Enrichment dispatched but status update failed');
      }
      return run.finish('completed', 'update_status', data);
    });
  }

  /**
   * Create or update a Prospect matched by name and company
   */
  private async upsertContact<T>(run: HandlerRun<T>, person: PersonData): Promise<ModuleResult<ContactUpsert>> {
    const filters: PropertyFilter[] = [
      { property: ProspectProperty.Name, kind: 'title', operator: 'equals', value: person.name },
    ];
    if (person.firmName) {
      filters.push({ property: ProspectProperty.Company, kind: 'richText', operator: 'contains', value: person.firmName });
    }

    const existing = await run.step(`find_contact:${person.name}`, () =>
      this.store.query('prospects', { filters, limit: 1 })
    );
    if (!existing.success) {
      return existing;
    }

    const properties = buildContactProperties(person);
    const match = existing.data[0];

    if (match) {
      const updated = await run.write(`update_contact:${person.name}`, this.store, match.id, properties);
      return updated.success
        ? succeed(MODULE, { name: person.name, recordId: match.id, action: 'updated' }, Date.now())
        : updated;
    }

    const created = await run.step(`create_contact:${person.name}`, () => this.store.create('prospects', properties));
    if (!created.success) {
      return created;
    }
    run.written.push(...Object.keys(properties));
    return succeed(MODULE, { name: person.name, recordId: created.data.id, action: 'created' }, Date.now());
  }

  // --------------------------------------------------------------------------
  // Outreach
  // --------------------------------------------------------------------------

  /**
   * Compose an outreach draft for a firm and record it on the firm
   *
   * Composition always yields a draft. A failed draft creation or metadata
   * write makes the outcome partial.
   */
  async handleOutreach(payload: unknown): Promise<WorkflowOutcome<OutreachData>> {
    return this.execute<OutreachData>('outreach', async (run) => {
      const normalized = normalizeOutreachTrigger(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }
      const trigger = normalized.data;
      run.recordId = trigger.firmId;

      this.logger.info('Outreach trigger', {
        firmId: trigger.firmId,
        firm: trigger.firmName,
        fit: trigger.fit,
        website: trigger.website,
      });

      const loaded = await run.step('load_record', () => this.store.get(trigger.firmId));
      if (!loaded.success) {
        return run.finish(isNotFound(loaded.error) ? 'not_found' : 'failed', 'load_record', null, loaded.error);
      }
      const record: StoreRecord = loaded.data;

      return this.deduplicated(run, trigger.firmId, false, async () => {
        const context = extractFirmContext(record);
        const firmName = context.firmName || trigger.firmName || '';
        const matched = context.matchedOfferings && context.matchedOfferings.length > 0
          ? context.matchedOfferings
          : trigger.fit;

        const composed = await this.outreach.compose({
          ...context,
          firmName,
          website: context.website ?? trigger.website,
          matchedOfferings: matched,
          contactName: trigger.contactName,
          contactTitle: trigger.contactTitle,
        });
        run.steps.push({
          step: 'compose',
          status: composed.source === 'fallback' ? 'fallback' : 'success',
          attemptedAt: new Date().toISOString(),
          error: composed.error,
        });

        const data: OutreachData = {
          firmName,
          source: composed.source,
          draft: composed.draft,
          draftUrl: null,
          warnings: composed.warnings,
          compositionError: composed.error,
        };

        const draft = run.record(
          'create_draft',
          await this.mail.createDraft({
            to: trigger.contactEmail,
            subject: composed.draft.subject,
            body: composed.draft.body,
          })
        );
        if (draft.success) {
          data.draftUrl = draft.data.url;
        }

        const update = buildOutreachUpdate(record, {
          draft: composed.draft,
          contactLabel: trigger.contactName ?? DEFAULT_CONTACT_LABEL,
          contactEmail: trigger.contactEmail,
          draftUrl: data.draftUrl,
          runDate: this.now().toISOString().slice(0, 10),
        });

        if (Object.keys(update).length === 0) {
          this.logger.info('No outreach properties on firm record to update', { firmId: trigger.firmId });
          run.skip('write_outreach');
        } else {
          const written = await run.write('write_outreach', this.store, trigger.firmId, update);
          if (!written.success) {
            return run.partial('write_outreach', data, written.error, 'Draft composed but firm update failed');
          }
        }

        if (!draft.success) {
          return run.partial('create_draft', data, draft.error, 'Draft composed but mail draft creation failed');
        }
        return run.finish('completed', 'write_outreach', data);
      });
    });
  }

  // --------------------------------------------------------------------------
  // Replies
  // --------------------------------------------------------------------------

  /**
   * Classify an inbound reply and record it on the matching outreach log entry
   */
  async handleReply(payload: unknown): Promise<WorkflowOutcome<ReplyData>> {
    return this.execute<ReplyData>('email_reply', async (run) => {
      const normalized = normalizeReplyEvent(payload);
      if (!normalized.success) {
        return run.reject('validate', normalized.error);
      }
      const reply = normalized.data;

      const found = await run.step('find_outreach', () =>
        this.store.query('outreachLog', {
          filters: [
            {
              property: OutreachLogProperty.GmailThreadId,
              kind: 'richText',
              operator: 'equals',
              value: reply.threadId,
            },
          ],
          limit: 1,
        })
      );
      if (!found.success) {
        return run.finish('failed', 'find_outreach', null, found.error);
      }

      const entry = found.data[0];
      if (!entry) {
        return run.finish('not_found', 'find_outreach', null, {
          kind: 'InputError',
          code: 'OUTREACH_NOT_FOUND',
          message: `No outreach entry found for thread ID: ${reply.threadId}`,
        });
      }
      run.recordId = entry.id;

      const classification = classifyReply(reply.body);
      const responseDate = (reply.receivedAt ?? this.now().toISOString()).slice(0, 10);
      const update = buildReplyUpdate(
        classification,
        responseDate,
        readText(entry.properties, OutreachLogProperty.Notes),
        reply.body
      );

      const written = await run.write('update_outreach', this.store, entry.id, update);
      if (!written.success) {
        return run.finish('failed', 'update_outreach', null, written.error);
      }

      this.logger.info('Updated outreach entry', { sender: reply.senderEmail, recordId: entry.id, classification });
      return run.finish('completed', 'update_outreach', {
        outreachRecordId: entry.id,
        classification,
        responseStatus: replyStatusLabel(classification),
        responseDate,
      });
    });
  }

  // --------------------------------------------------------------------------
  // Listing
  // --------------------------------------------------------------------------

  async listRecentFirms(): Promise<WorkflowOutcome<FirmSummary[]>> {
    return this.execute<FirmSummary[]>('list_recent_firms', async (run) => {
      const firms = await run.step('query_firms', () =>
        this.store.query('firms', { limit: RECENT_FIRMS_LIMIT, newestFirst: true })
      );
      if (!firms.success) {
        return run.finish('failed', 'query_firms', null, firms.error);
      }

      return run.finish(
        'completed',
        'query_firms',
        firms.data.map((firm) => ({
          id: firm.id,
          name: readFirmName(firm),
          status: readText(firm.properties, FirmProperty.ResearchStatus),
          url: firm.url ?? '',
        }))
      );
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async dispatchOrThrow(...args: Parameters<EnrichmentRelay['dispatch']>): Promise<void> {
    const accepted = await this.relay.dispatch(...args);
    if (!accepted) {
      throw new PipelineError(
        'ProviderError',
        'RELAY_DISPATCH_FAILED',
        `Failed to send ${args[0].target} to enrichment relay`
      );
    }
  }

  /**
   * Apply the idempotency guard around a handler body. Failed runs release
   * their key so the same signal can be retried.
   */
  private async deduplicated<T>(
    run: HandlerRun<T>,
    recordId: string,
    restart: boolean,
    body: () => Promise<WorkflowOutcome<T>>
  ): Promise<WorkflowOutcome<T>> {
    const decision = this.guard.begin(run.event, recordId, restart);
    if (!decision.accepted) {
      this.logger.warn('Duplicate delivery ignored', { event: run.event, recordId, reason: decision.reason });
      return run.finish('duplicate', 'deduplicate', null, {
        kind: 'InputError',
        code: 'DUPLICATE_DELIVERY',
        message: `Duplicate ${run.event} delivery (${decision.reason})`,
        details: { key: decision.key },
      });
    }

    let outcome: WorkflowOutcome<T>;
    try {
      outcome = await body();
    } catch (error) {
      this.guard.release(decision.key);
      throw error;
    }

    if (outcome.status === 'completed' || outcome.status === 'partial') {
      this.guard.complete(decision.key);
    } else {
      this.guard.release(decision.key);
    }
    return outcome;
  }

  /**
   * Run a handler body; anything it throws becomes a failed outcome
   */
  private async execute<T>(
    event: WorkflowEvent,
    body: (run: HandlerRun<T>) => Promise<WorkflowOutcome<T>>
  ): Promise<WorkflowOutcome<T>> {
    const run = new HandlerRun<T>(event);
    let outcome: WorkflowOutcome<T>;
    try {
      outcome = await body(run);
    } catch (error) {
      outcome = run.finish('failed', 'unexpected', null, toModuleError(error, 'ProviderError', 'UNEXPECTED_ERROR'));
    }

    const meta = {
      event,
      status: outcome.status,
      stage: outcome.stage,
      recordId: outcome.recordId,
      duration: outcome.duration,
    };
    if (outcome.status === 'completed' || outcome.status === 'duplicate') {
      this.logger.info('Handler finished', meta);
    } else {
      this.logger.warn('Handler finished', { ...meta, code: outcome.error?.code, error: outcome.error?.message });
    }
    this.metrics.increment('workflow.outcomes', { event, status: outcome.status });
    this.metrics.timing('workflow.duration', outcome.duration, { event });

    return outcome;
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface WorkflowOptions {
  roster?: Roster;
  llm?: LLMProvider;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Wire adapters, engines and the idempotency guard from a validated
 * configuration
 */
export function createWorkflowFromConfig(config: PipelineConfig, options: WorkflowOptions = {}): WorkflowOrchestrator {
  const logger = options.logger ?? createConsoleLogger(MODULE, config.logLevel);
  const metrics = options.metrics ?? noopMetrics;
  const roster = options.roster ?? loadDefaultRoster();

  if (!config.publicBaseUrl) {
    logger.warn('PUBLIC_BASE_URL not set - enrichment callbacks will use relative URLs');
  }

  const adapters = createAdaptersFromConfig(config, logger);
  const llm =
    options.llm ??
    new AnthropicProvider({
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
      timeoutMs: config.anthropic.timeoutMs,
      logger,
      metrics,
    });

  return new WorkflowOrchestrator({
    ...adapters,
    scoring: new ScoringEngine({ llm, roster, logger, metrics }),
    outreach: new OutreachComposer({ llm, roster, logger, metrics }),
    publicBaseUrl: config.publicBaseUrl,
    guard: new IdempotencyGuard({ windowMs: config.idempotencyWindowMs }),
    logger,
    metrics,
  });
}
