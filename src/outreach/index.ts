/**
 * Outreach Module
 *
 * Drafts a first-contact email written in the persona's own voice.
 *
 * Responsibilities:
 * - Build the persona-and-roster system prompt (each roster list trimmed to a
 *   fixed count to bound prompt size)
 * - Build the firm context from the trigger payload and, when available,
 *   the full firm record
 * - Parse the structured draft, fenced or not
 * - Substitute a deterministic fallback draft whenever personalization fails
 *
 * `generate` may fail with a ComposeError. `compose` never fails: outreach
 * must not stall because the LLM is unavailable.
 */

import { z } from 'zod';
import type { LLMProvider } from '../llm/index.js';
import { parseJsonObject } from '../llm/index.js';
import {
  findOffering,
  fitPropertyName,
  renderSignature,
  type Persona,
  type Roster,
} from '../offerings/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import {
  FirmProperty,
  readFirmName,
  readOptions,
  readText,
  type StoreRecord,
} from '../properties/index.js';
import { fail, succeed, type ModuleError, type ModuleResult } from '../types/index.js';

const MODULE = 'outreach';

export const OUTREACH_MAX_TOKENS = 1500;
export const MAX_BODY_WORDS = 200;

/** Primary offering when the firm fits none of the roster */
export const RELATIONSHIP_BUILDING = 'Relationship Building';
/** Primary offering of the fallback draft */
export const GENERAL_OFFERING = 'General';

const ALLOCATOR_LIMIT = 3;
const SIGNAL_LIMIT = 4;
const DISQUALIFIER_LIMIT = 3;

// ============================================================================
// Types
// ============================================================================

export interface OutreachInput {
  firmName: string;
  website?: string | null;
  /** Offerings already tagged as best matches on the record */
  matchedOfferings?: string[];
  notes?: string | null;
  /** Full firm record, mined for structured attributes */
  record?: StoreRecord | null;
  contactName?: string | null;
  contactTitle?: string | null;
}

export interface OutreachDraft {
  subject: string;
  body: string;
  primaryOffering: string;
  secondaryOfferings: string[];
  rationale: string;
}

export interface OutreachOutcome {
  /** Always true: a failed personalization is replaced by the fallback */
  success: true;
  source: 'llm' | 'fallback';
  draft: OutreachDraft;
  /** Why personalization failed, when source is fallback */
  error: ModuleError | null;
  /** Soft constraint violations of the draft (length, signature) */
  warnings: string[];
}

export interface OutreachComposerOptions {
  llm: LLMProvider;
  roster: Roster;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Schemas
// ============================================================================

const DraftReplySchema = z.object({
  subject: z.string().trim().min(1, 'subject must not be empty'),
  body: z.string().trim().min(1, 'body must not be empty'),
  primary_client: z.string().default(''),
  secondary_clients: z.array(z.string()).default([]),
  reasoning: z.string().default(''),
});

// ============================================================================
// Prompts
// ============================================================================

export function buildSystemPrompt(roster: Roster): string {
  const { persona } = roster;

  const frameworks = roster.offerings
    .map((o) =>
      [
        `### ${o.fullName} (${o.label})`,
        `- **Asset Class:** ${o.assetClass}`,
        `- **Strategy:** ${o.strategy}`,
        `- **Geography:** ${o.geography}`,
        `- **Ticket Size:** ${o.ticketSize}`,
        `- **Key Differentiator:** ${o.keyDifferentiator}`,
        `- **Ideal Allocators:** ${o.idealAllocators.slice(0, ALLOCATOR_LIMIT).join(', ')}`,
        `- **High-Fit Signals:** ${o.highFitSignals.slice(0, SIGNAL_LIMIT).join(', ')}`,
        `- **Disqualifiers:** ${o.disqualifiers.slice(0, DISQUALIFIER_LIMIT).join(', ')}`,
        `- **Hook Themes:** ${o.hookThemes.join('; ')}`,
      ].join('\n')
    )
    .join('\n\n');

  const labels = roster.offerings.map((o) => o.label).join(', ');
  const signature = renderSignature(persona)
    .split('\n')
    .map((line) => `     ${line}`)
    .join('\n');

  return `You are writing emails AS ${persona.name}, ${persona.title.toLowerCase()} of ${persona.firm}. Write in FIRST PERSON as ${persona.name} - not as an assistant, not on someone's behalf, but AS ${persona.name} directly.

## About ${persona.name} & ${persona.firm}
${persona.background}

## Voice & Style
- First person: "I'm reaching out..." / "I came across..." / "I'd love to..."
- Warm but professional, never salesy or pushy
- Concise and respectful of the reader's time
- Shows genuine interest in the allocator's mandate
- References specific details that demonstrate research
- Positions opportunities as potentially relevant, not as pitches
- Always offers an easy path to learn more (brief call, materials)

## CRITICAL: Email Voice
- CORRECT: "I'm ${persona.name}, ${persona.title.toLowerCase()} of ${persona.firm}..."
- CORRECT: "I'd welcome the chance to connect..."
- WRONG: "I'm reaching out on behalf of ${persona.name}..."
- WRONG: "${persona.name} asked me to contact you..."

## Active Offerings
${frameworks}

## Your Task
Given information about a prospect firm, you will:
1. Analyze their profile to determine which offering(s) are the best fit
2. Select the PRIMARY offering to lead with (most relevant to their mandate)
3. Draft a personalized email in the first person that:
   - Opens with something specific to their firm or mandate
   - Introduces ${persona.firm} naturally ("${persona.introduction}")
   - Positions the primary offering naturally
   - Offers a low-friction next step
   - Keeps the body under ${MAX_BODY_WORDS} words
   - Ends with this signature block:

${signature}

## Output Format
Return a JSON object with:
- "primary_client": The offering to lead with (one of: ${labels}), or "${RELATIONSHIP_BUILDING}" if none fit
- "secondary_clients": List of other potentially relevant offerings (may be empty)
- "subject": Email subject line (brief, professional, not clickbait)
- "body": Full email body (salutation through signature)
- "reasoning": Brief explanation of why this offering and approach were chosen

## Important Guidelines
- If the firm is clearly a poor fit for ALL offerings, say so in reasoning and draft a relationship-building email instead
- Never fabricate details about the prospect; only use what's provided
- For Family Offices, emphasize alignment and access
- For Endowments/Foundations, emphasize mandate fit and institutional quality
- For Pensions, emphasize scale and governance alignment
- For RIAs/OCIOs, emphasize differentiated access for their clients`;
}

/** Record attributes surfaced to the model, in prompt order */
const CONTEXT_ATTRIBUTES: ReadonlyArray<{ label: string; properties: readonly string[] }> = [
  { label: 'Firm Type', properties: ['Firm Type', 'Type'] },
  { label: 'AUM Range', properties: ['AUM Range'] },
  { label: 'Geographic Focus', properties: ['Geographic Focus'] },
  { label: 'Location', properties: ['Primary Office City'] },
  { label: 'Private Markets Experience', properties: ['Private Markets Experience'] },
  { label: 'Real Estate Allocation', properties: ['Real Estate Allocation'] },
  { label: 'Alternatives Platform', properties: ['Alternatives Platform'] },
  { label: 'Value-Add Tolerance', properties: ['Value-Add Tolerance'] },
  { label: 'Key Investment Themes', properties: [FirmProperty.KeyInvestmentThemes] },
  { label: 'Qualification Notes', properties: [FirmProperty.QualificationNotes] },
  { label: 'Network Angles', properties: [FirmProperty.NetworkAngles] },
];

/**
 * Firm context block of the user message
 */
export function buildFirmContext(input: OutreachInput, roster: Roster): string {
  const lines = [`**Firm Name:** ${input.firmName}`];

  if (input.website) {
    lines.push(`**Website:** ${input.website}`);
  }
  if (input.matchedOfferings && input.matchedOfferings.length > 0) {
    lines.push(`**Pre-tagged Best Matches:** ${input.matchedOfferings.join(', ')}`);
  }
  if (input.notes) {
    lines.push(`**Research Notes:** ${input.notes}`);
  }

  const properties = input.record?.properties;
  if (properties) {
    for (const attribute of CONTEXT_ATTRIBUTES) {
      const value = attribute.properties
        .map((name) => readText(properties, name))
        .find((text) => text.length > 0);
      if (value) {
        lines.push(`**${attribute.label}:** ${value}`);
      }
    }

    const fitScores = roster.offerings
      .map((o) => ({ label: o.label, fit: readText(properties, fitPropertyName(o)) }))
      .filter((entry) => entry.fit.length > 0 && entry.fit !== 'N/A')
      .map((entry) => `${entry.label}: ${entry.fit}`);
    if (fitScores.length > 0) {
      lines.push(`**Fit Scores:** ${fitScores.join(', ')}`);
    }
  }

  if (input.contactName) {
    lines.push(`**Contact Name:** ${input.contactName}`);
  }
  if (input.contactTitle) {
    lines.push(`**Contact Title:** ${input.contactTitle}`);
  }

  return lines.join('\n');
}

/** Record fields combined into the research notes, in order */
const NOTE_PROPERTIES: readonly string[] = [
  FirmProperty.QualificationNotes,
  FirmProperty.Notes,
  FirmProperty.KeyInvestmentThemes,
  FirmProperty.NetworkAngles,
];

/**
 * Outreach input read from a stored firm record
 */
export function extractFirmContext(record: StoreRecord): OutreachInput {
  const notes = NOTE_PROPERTIES.map((name) => ({ name, text: readText(record.properties, name) }))
    .filter((field) => field.text.length > 0)
    .map((field) => `${field.name}: ${field.text}`)
    .join(' | ');

  return {
    firmName: readFirmName(record),
    website: readText(record.properties, FirmProperty.Website) || null,
    matchedOfferings: readOptions(record.properties, FirmProperty.BestMatches),
    notes: notes || null,
    record,
  };
}

export function buildUserMessage(input: OutreachInput, roster: Roster): string {
  return `Please generate a personalized outreach email for the following prospect firm:

${buildFirmContext(input, roster)}

Generate the email following the voice and guidelines in your instructions. Return your response as a valid JSON object.`;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Resolve a model-supplied offering name to a roster label; anything
 * unrecognized is relationship building
 */
export function canonicalOffering(value: string, roster: Roster): string {
  return findOffering(roster, value)?.label ?? RELATIONSHIP_BUILDING;
}

export function parseOutreachResponse(text: string, roster: Roster): ModuleResult<OutreachDraft> {
  const startTime = Date.now();
  const parsed = parseJsonObject(text, MODULE);
  if (!parsed.success) {
    return parsed;
  }

  const validation = DraftReplySchema.safeParse(parsed.data);
  if (!validation.success) {
    const errors = validation.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return fail(MODULE, {
      kind: 'ParseError',
      code: 'SCHEMA_VALIDATION_ERROR',
      message: 'Response does not conform to draft schema',
      details: { errors, raw: text },
    }, startTime);
  }
  const reply = validation.data;

  const primaryOffering = canonicalOffering(reply.primary_client, roster);
  const secondaryOfferings = reply.secondary_clients
    .map((name) => findOffering(roster, name)?.label)
    .filter((label): label is string => label !== undefined && label !== primaryOffering);

  return succeed(MODULE, {
    subject: reply.subject,
    body: reply.body,
    primaryOffering,
    secondaryOfferings: [...new Set(secondaryOfferings)],
    rationale: reply.reasoning.trim(),
  }, startTime);
}

// ============================================================================
// Fallback & Constraints
// ============================================================================

/**
 * Non-personalized draft used whenever generation fails
 */
export function fallbackDraft(firmName: string, roster: Roster): OutreachDraft {
  const { persona } = roster;
  const firm = firmName.trim() || 'your organization';

  const body = [
    'Hi,',
    '',
    `I hope this message finds you well. I'm ${persona.name}, ${persona.title.toLowerCase()} of ${persona.firm}, a boutique capital raising and strategic advisory firm.`,
    '',
    `I came across ${firm} and believe there may be alignment between your investment mandate and several managers we represent across real estate, global equities, and private growth equity.`,
    '',
    "Would you have 15 minutes for a brief introductory call? I'd be happy to share an overview of our current opportunities and learn more about your priorities.",
    '',
    renderSignature(persona),
  ].join('\n');

  return {
    subject: `${persona.firm} - Introduction`,
    body,
    primaryOffering: GENERAL_OFFERING,
    secondaryOfferings: [],
    rationale: 'Fallback template: personalized generation was unavailable',
  };
}

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Soft checks on a generated draft
 *
 * @returns Human-readable violations; empty when the draft conforms
 */
export function checkDraftConstraints(draft: OutreachDraft, persona: Persona): string[] {
  const warnings: string[] = [];

  const words = countWords(draft.body);
  if (words > MAX_BODY_WORDS) {
    warnings.push(`Body has ${words} words, should be <= ${MAX_BODY_WORDS}`);
  }
  if (!draft.body.includes(persona.name) || !draft.body.includes(persona.email)) {
    warnings.push('Body does not end with the signature block');
  }

  return warnings;
}

// ============================================================================
// Composer
// ============================================================================

export class OutreachComposer {
  private readonly llm: LLMProvider;
  private readonly roster: Roster;
  private readonly systemPrompt: string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: OutreachComposerOptions) {
    this.llm = options.llm;
    this.roster = options.roster;
    this.systemPrompt = buildSystemPrompt(options.roster);
    this.logger = options.logger ?? createConsoleLogger(MODULE);
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * One personalized draft; fails with a ComposeError wrapping the cause
   */
  async generate(input: OutreachInput): Promise<ModuleResult<OutreachDraft>> {
    const startTime = Date.now();
    this.logger.info('Generating outreach', { firm: input.firmName });

    const reply = await this.llm.complete({
      systemPrompt: this.systemPrompt,
      userPrompt: buildUserMessage(input, this.roster),
      maxOutputTokens: OUTREACH_MAX_TOKENS,
    });

    const draft = reply.success ? parseOutreachResponse(reply.data, this.roster) : reply;
    if (!draft.success) {
      return fail(MODULE, {
        kind: 'ComposeError',
        code: draft.error.code,
        message: `Outreach generation failed: ${draft.error.message}`,
        details: { cause: draft.error.kind, ...(draft.error.details !== undefined ? { causeDetails: draft.error.details } : {}) },
      }, startTime);
    }

    return succeed(MODULE, draft.data, startTime);
  }

  /**
   * Draft outreach for a firm, falling back to the fixed template on any
   * failure
   */
  async compose(input: OutreachInput): Promise<OutreachOutcome> {
    const generated = await this.generate(input);

    if (!generated.success) {
      this.logger.warn('Using fallback outreach draft', {
        firm: input.firmName,
        code: generated.error.code,
        error: generated.error.message,
      });
      this.metrics.increment('outreach.fallback', { code: generated.error.code });
      return {
        success: true,
        source: 'fallback',
        draft: fallbackDraft(input.firmName, this.roster),
        error: generated.error,
        warnings: [],
      };
    }

    const warnings = checkDraftConstraints(generated.data, this.roster.persona);
    if (warnings.length > 0) {
      this.logger.warn('Outreach draft violates constraints', { firm: input.firmName, warnings });
    }
    this.metrics.increment('outreach.generated', { primary: generated.data.primaryOffering });

    return { success: true, source: 'llm', draft: generated.data, error: null, warnings };
  }
}
