/**
 * Prospect Pipeline - Main Entry Point
 *
 * Webhook handlers that move prospect firms and contacts between a Notion
 * CRM, the Clay enrichment relay, the Anthropic Messages API and Gmail
 * drafts.
 *
 * Architecture:
 * - Handlers are plain async functions on WorkflowOrchestrator; any HTTP
 *   framework can mount them
 * - Collaborators are injected interfaces with a real and an in-process
 *   implementation each
 * - Every module returns ModuleResult values instead of throwing
 */

// Core Types
export type * from './types/index.js';
export { PipelineError, toModuleError, succeed, fail, FIT_LEVELS } from './types/index.js';

// Observability
export {
  createConsoleLogger,
  noopMetrics,
  type Logger,
  type Metrics,
  type LogLevel,
} from './observability/index.js';

// Configuration
export {
  loadConfig,
  DEFAULT_MODEL,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type PipelineConfig,
} from './config/index.js';

// Offerings - Roster and persona
export {
  OFFERING_KEYS,
  loadDefaultRoster,
  parseRoster,
  findOffering,
  fitPropertyName,
  renderSignature,
  type OfferingKey,
  type TargetOffering,
  type Persona,
  type Roster,
} from './offerings/index.js';

// Properties - Record property model and Notion wire format
export {
  prop,
  extractPropertyValue,
  truncateText,
  keepTail,
  readText,
  readCheckbox,
  readOptions,
  readFirmName,
  fromNotionPage,
  fromNotionProperty,
  toNotionProperties,
  FirmProperty,
  ProspectProperty,
  OutreachLogProperty,
  type PropertyValue,
  type PropertyMap,
  type StoreRecord,
} from './properties/index.js';

// Normalizer - Inbound event validation
export {
  normalizeNewFirmEvent,
  normalizeFirmEnrichedEvent,
  normalizeScoringTrigger,
  normalizePersonEnrichedEvent,
  normalizeContactEnrichmentRequest,
  normalizeOutreachTrigger,
  normalizeReplyEvent,
  extractDomain,
  normalizeUrl,
  normalizeEmail,
  sanitizeResearch,
  mapOrganizationType,
  type OrganizationType,
  type NewFirmEvent,
  type FirmEnrichedEvent,
  type ScoringTriggerEvent,
  type PersonEnrichedEvent,
  type PersonData,
  type ContactEnrichmentRequest,
  type OutreachTriggerEvent,
  type ReplyEvent,
} from './normalizer/index.js';

// Classifier - Reply tagging
export {
  classifyReply,
  replyStatusLabel,
  replyOutcome,
  POSITIVE_KEYWORDS,
  NEGATIVE_KEYWORDS,
  type ReplyOutcome,
} from './classifier/index.js';

// LLM - Provider and response parsing
export {
  AnthropicProvider,
  stripCodeFences,
  parseJsonObject,
  type LLMProvider,
  type CompletionRequest,
  type MessagesClient,
  type CompletionMessage,
  type AnthropicProviderOptions,
} from './llm/index.js';

// Scoring
export {
  ScoringEngine,
  normalizeFit,
  buildResearchPrompt,
  buildScoringPrompt,
  parseScoringResponse,
  collectBestMatches,
  type OfferingScore,
  type ParsedScores,
  type ScoringResult,
} from './scoring/index.js';

// Outreach
export {
  OutreachComposer,
  buildSystemPrompt,
  buildFirmContext,
  buildUserMessage,
  extractFirmContext,
  parseOutreachResponse,
  fallbackDraft,
  checkDraftConstraints,
  type OutreachInput,
  type OutreachDraft,
  type OutreachOutcome,
} from './outreach/index.js';

// Record Store
export {
  NotionRecordStore,
  MemoryRecordStore,
  buildNotionQuery,
  type RecordStore,
  type CollectionName,
  type PropertyFilter,
  type RecordQuery,
  type HttpClient,
} from './record-store/index.js';

// Adapters - Enrichment relay and mail drafts
export {
  ClayEnrichmentRelay,
  NullEnrichmentRelay,
  GmailDraftService,
  NullMailDraftService,
  NULL_DRAFTS_KEPT,
  createAdaptersFromConfig,
  callbackUrlFor,
  type EnrichmentRelay,
  type EnrichmentRequest,
  type MailDraftService,
  type DraftMessage,
  type DraftReference,
  type Adapters,
} from './adapters/index.js';

// Idempotency
export { IdempotencyGuard, generateIdempotencyKey } from './idempotency/index.js';

// Renderers - Record update payloads
export {
  renderQualificationNotes,
  buildScoringUpdate,
  buildDispatchUpdate,
  buildEnrichmentMerge,
  buildContactProperties,
  buildContactStatusUpdate,
  buildOutreachUpdate,
  buildReplyUpdate,
  renderReplyExcerpt,
} from './renderers/index.js';

// Workflow - Webhook handlers
export {
  WorkflowOrchestrator,
  createWorkflowFromConfig,
  RECENT_FIRMS_LIMIT,
  type WorkflowDependencies,
  type WorkflowOutcome,
  type WorkflowEvent,
  type OutcomeStatus,
  type StepReport,
  type FirmSummary,
} from './workflow/index.js';
