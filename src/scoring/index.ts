/**
 * Scoring Module
 *
 * Two-phase fit scoring of a prospect firm against the offering roster:
 *
 * 1. Independent research: the LLM profiles the firm from its name and
 *    website alone, covering for sparse enrichment data.
 * 2. Scoring: the enrichment text, the independent research and every
 *    offering's Strong/Moderate/Weak/N/A rules go into one prompt that must
 *    come back as a single JSON object.
 *
 * The reply is normalized so that every offering gets exactly one fit level
 * from the fixed taxonomy. The engine never retries; a provider or parse
 * failure is returned to the caller as-is.
 */

import type { LLMProvider } from '../llm/index.js';
import { parseJsonObject } from '../llm/index.js';
import { sanitizeResearch } from '../normalizer/index.js';
import { fitPropertyName, type OfferingKey, type Roster } from '../offerings/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import { fail, succeed, type FitLevel, type ModuleResult } from '../types/index.js';

const MODULE = 'scoring';

/** Output budget for each of the two calls */
export const SCORING_MAX_TOKENS = 1024;

export const NO_ENRICHMENT_TEXT = 'No enrichment data provided';

// ============================================================================
// Types
// ============================================================================

export interface OfferingScore {
  key: OfferingKey;
  label: string;
  /** Select property on the firm record this fit is written to */
  fitProperty: string;
  fit: FitLevel;
  rationale: string;
}

export interface ParsedScores {
  /** One entry per roster offering, in roster order */
  scores: OfferingScore[];
  bestMatch: string;
  summary: string;
}

export interface ScoringResult extends ParsedScores {
  firmName: string;
  website: string;
  /** Sanitized enrichment text the scoring prompt was given */
  enrichment: string;
  /** Independent research produced by phase one */
  research: string;
  /** Labels of offerings scored Strong */
  bestMatches: string[];
}

export interface ScoringEngineOptions {
  llm: LLMProvider;
  roster: Roster;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Map any LLM fit value onto the taxonomy
 *
 * Case and surrounding whitespace are ignored and a trailing "fit" is
 * dropped, so "strong fit" is Strong. Anything else, including non-strings,
 * is N/A.
 */
export function normalizeFit(value: unknown): FitLevel {
  if (typeof value !== 'string') {
    return 'N/A';
  }
  const cleaned = value.trim().toLowerCase().replace(/\s+fit$/, '');
  switch (cleaned) {
    case 'strong':
      return 'Strong';
    case 'moderate':
      return 'Moderate';
    case 'weak':
      return 'Weak';
    default:
      return 'N/A';
  }
}

export function collectBestMatches(scores: readonly OfferingScore[]): string[] {
  return scores.filter((s) => s.fit === 'Strong').map((s) => s.label);
}

// ============================================================================
// Prompts
// ============================================================================

export function buildResearchPrompt(firmName: string, website: string): string {
  return `You are an expert on institutional investors and asset allocators. Research this firm from your knowledge:

FIRM: ${firmName}
WEBSITE: ${website}

Provide what you know about:
1. What type of organization is this? (pension, endowment, foundation, family office, RIA, OCIO, etc.)
2. Approximate AUM if known
3. Asset allocation approach (what do they invest in?)
4. Do they allocate to: Real Estate? Private Equity? Public Equities? Alternatives?
5. Investment style (core, value-add, opportunistic, growth, etc.)
6. Geographic focus
7. Any notable investment preferences or constraints
8. Key investment staff if known

If you don't have information on this firm, say "Limited information available" and provide any reasonable inferences based on the firm type and website.

Be concise but comprehensive. Focus on investment-relevant details.`;
}

function fitField(key: OfferingKey): `${OfferingKey}_fit` {
  return `${key}_fit`;
}

function rationaleField(key: OfferingKey): `${OfferingKey}_rationale` {
  return `${key}_rationale`;
}

/**
 * JSON template the scoring reply must follow, derived from the roster keys
 */
export function buildResponseTemplate(roster: Roster): string {
  const template: Record<string, string> = {};
  for (const offering of roster.offerings) {
    template[fitField(offering.key)] = 'Strong/Moderate/Weak/N/A';
    template[rationaleField(offering.key)] = 'brief reason';
  }
  template['best_match'] = 'offering name with strongest fit';
  template['overall_notes'] = '1-2 sentence summary of allocator profile and recommended approach';
  return JSON.stringify(template, null, 2);
}

export interface ScoringPromptInput {
  firmName: string;
  website: string;
  enrichment: string;
  research: string;
}

export function buildScoringPrompt(input: ScoringPromptInput, roster: Roster): string {
  const count = roster.offerings.length;

  const rules = roster.offerings
    .map((o, index) =>
      [
        `${index + 1}. ${o.label.toUpperCase()} (${o.assetClass} - ${o.geography}; ${o.strategy}):`,
        `   - STRONG if: ${o.scoringRules.strong}`,
        `   - MODERATE if: ${o.scoringRules.moderate}`,
        `   - WEAK if: ${o.scoringRules.weak}`,
        `   - N/A if: ${o.scoringRules.na}`,
      ].join('\n')
    )
    .join('\n\n');

  const moderateDefaults = roster.offerings
    .filter((o) => o.diversifiedDefault)
    .map((o) => o.label);
  const defaultLine = moderateDefaults.length > 0
    ? `\n- If research shows a diversified alternatives program, default to MODERATE for ${moderateDefaults.join(', ')}`
    : '';

  return `You are an expert institutional capital raising advisor. Analyze this allocator firm and score their fit for each of our ${count} offerings.

FIRM: ${input.firmName}
WEBSITE: ${input.website}

ENRICHMENT DATA:
${input.enrichment || NO_ENRICHMENT_TEXT}

INDEPENDENT RESEARCH:
${input.research}

SCORING PHILOSOPHY:
- Most diversified institutional allocators (pensions, E&Fs, family offices) have broad mandates that include real estate and private equity
- Default to MODERATE fit if they have the relevant asset class allocation, even without specific sub-sector signals
- Upgrade to STRONG if there are explicit positive signals
- Only mark WEAK if there are mismatches or very limited allocations
- Only mark N/A if truly incompatible (e.g., public equity only, no alternatives)

SCORE EACH OFFERING:

${rules}

IMPORTANT GUIDANCE:
- Pensions, endowments, foundations, and large family offices typically have BOTH real estate AND private equity allocations${defaultLine}
- Be generous with MODERATE - these are qualified institutional allocators worth a conversation
- Reserve WEAK/N/A for clear mismatches, not absence of specific signals

Return your analysis as JSON:
${buildResponseTemplate(roster)}

Return ONLY valid JSON, no markdown fences or other text.`;
}

// ============================================================================
// Parsing
// ============================================================================

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value.trim() : null;
}

/**
 * Parse the scoring reply into exactly one score per roster offering
 *
 * A reply that is not a JSON object is a ParseError carrying the raw text.
 * Missing or unrecognized fit values become N/A and missing rationales ''.
 */
export function parseScoringResponse(text: string, roster: Roster): ModuleResult<ParsedScores> {
  const startTime = Date.now();
  const parsed = parseJsonObject(text, MODULE);
  if (!parsed.success) {
    return parsed;
  }
  const reply = parsed.data;

  const scores = roster.offerings.map((offering): OfferingScore => ({
    key: offering.key,
    label: offering.label,
    fitProperty: fitPropertyName(offering),
    fit: normalizeFit(reply[fitField(offering.key)]),
    rationale: asString(reply[rationaleField(offering.key)]) ?? '',
  }));

  return succeed(MODULE, {
    scores,
    bestMatch: asString(reply['best_match']) || 'TBD',
    summary: asString(reply['overall_notes']) ?? '',
  }, startTime);
}

// ============================================================================
// Engine
// ============================================================================

export class ScoringEngine {
  private readonly llm: LLMProvider;
  private readonly roster: Roster;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: ScoringEngineOptions) {
    this.llm = options.llm;
    this.roster = options.roster;
    this.logger = options.logger ?? createConsoleLogger(MODULE);
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Research and score a firm
   *
   * @param researchText - Upstream enrichment text; sanitized here
   */
  async score(firmName: string, website: string, researchText: string): Promise<ModuleResult<ScoringResult>> {
    const startTime = Date.now();
    const enrichment = sanitizeResearch(researchText);

    const research = await this.llm.complete({
      userPrompt: buildResearchPrompt(firmName, website),
      maxOutputTokens: SCORING_MAX_TOKENS,
    });
    if (!research.success) {
      this.logger.error('Independent research failed', { firm: firmName, error: research.error.message });
      this.metrics.increment('scoring.failures', { phase: 'research' });
      return fail(MODULE, research.error, startTime);
    }
    this.logger.info('Independent research completed', {
      firm: firmName,
      researchLength: research.data.length,
    });

    const reply = await this.llm.complete({
      userPrompt: buildScoringPrompt({ firmName, website, enrichment, research: research.data }, this.roster),
      maxOutputTokens: SCORING_MAX_TOKENS,
    });
    if (!reply.success) {
      this.logger.error('Scoring call failed', { firm: firmName, error: reply.error.message });
      this.metrics.increment('scoring.failures', { phase: 'scoring' });
      return fail(MODULE, reply.error, startTime);
    }

    const parsed = parseScoringResponse(reply.data, this.roster);
    if (!parsed.success) {
      this.logger.error('Failed to parse scoring response', {
        firm: firmName,
        code: parsed.error.code,
        responsePreview: reply.data.substring(0, 500),
      });
      this.metrics.increment('scoring.failures', { phase: 'parse' });
      return fail(MODULE, parsed.error, startTime);
    }

    const bestMatches = collectBestMatches(parsed.data.scores);
    this.logger.info('Scoring completed', { firm: firmName, bestMatch: parsed.data.bestMatch, bestMatches });
    this.metrics.timing('scoring.duration', Date.now() - startTime);

    return succeed(MODULE, {
      ...parsed.data,
      firmName,
      website,
      enrichment,
      research: research.data,
      bestMatches,
    }, startTime);
  }
}
