/**
 * Offerings Module
 *
 * The six target offerings scored against every firm, and the persona the
 * outreach drafts are written as. The roster is data (roster.json) but its
 * keys are a closed union: the scoring response schema is derived from
 * OFFERING_KEYS, so adding a seventh offering means extending both this
 * union and the JSON, and the loader rejects a roster that drifts from it.
 */

import { z } from 'zod';
import rosterJson from './roster.json';
import { PipelineError } from '../types/index.js';

// ============================================================================
// Keys
// ============================================================================

export const OFFERING_KEYS = [
  'harborline',
  'cedar_yield',
  'northgate',
  'keystone',
  'brightfield',
  'co_invest',
] as const;

export type OfferingKey = (typeof OFFERING_KEYS)[number];

// ============================================================================
// Schemas
// ============================================================================

const nonEmpty = z.string().trim().min(1);

const ScoringRulesSchema = z.object({
  strong: nonEmpty,
  moderate: nonEmpty,
  weak: nonEmpty,
  na: nonEmpty,
});

const TargetOfferingSchema = z.object({
  key: z.enum(OFFERING_KEYS),
  label: nonEmpty,
  fullName: nonEmpty,
  assetClass: nonEmpty,
  strategy: nonEmpty,
  geography: nonEmpty,
  ticketSize: nonEmpty,
  keyDifferentiator: nonEmpty,
  idealAllocators: z.array(nonEmpty).min(1),
  highFitSignals: z.array(nonEmpty).min(1),
  disqualifiers: z.array(nonEmpty).min(1),
  hookThemes: z.array(nonEmpty).min(1),
  scoringRules: ScoringRulesSchema,
  /** Default to Moderate for diversified alternatives programs */
  diversifiedDefault: z.boolean(),
});

const PersonaSchema = z.object({
  name: nonEmpty,
  firm: nonEmpty,
  title: nonEmpty,
  email: z.string().email(),
  phone: z.string().nullable(),
  signOff: nonEmpty,
  background: nonEmpty,
  introduction: nonEmpty,
});

export const RosterSchema = z
  .object({
    persona: PersonaSchema,
    offerings: z.array(TargetOfferingSchema).length(OFFERING_KEYS.length),
  })
  .superRefine((roster, ctx) => {
    const keys = new Set(roster.offerings.map((o) => o.key));
    for (const key of OFFERING_KEYS) {
      if (!keys.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['offerings'],
          message: `Missing offering: ${key}`,
        });
      }
    }
    const labels = new Set(roster.offerings.map((o) => o.label.toLowerCase()));
    if (labels.size !== roster.offerings.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['offerings'],
        message: 'Offering labels must be unique',
      });
    }
  });

export type TargetOffering = z.infer<typeof TargetOfferingSchema>;
export type Persona = z.infer<typeof PersonaSchema>;

export interface Roster {
  persona: Persona;
  offerings: readonly TargetOffering[];
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate raw roster data
 *
 * @throws PipelineError (InputError) when the data does not describe
 *   exactly the six known offerings
 */
export function parseRoster(raw: unknown): Roster {
  const result = RosterSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new PipelineError('InputError', 'INVALID_ROSTER', 'Offering roster is invalid', errors);
  }
  return result.data;
}

/** The bundled roster */
export function loadDefaultRoster(): Roster {
  return parseRoster(rosterJson);
}

// ============================================================================
// Lookups
// ============================================================================

/** Select property holding an offering's fit level on the firm record */
export function fitPropertyName(offering: TargetOffering): string {
  return `${offering.label} Fit`;
}

/**
 * Find an offering by key or label, ignoring case and separators
 */
export function findOffering(roster: Roster, value: string): TargetOffering | undefined {
  const wanted = value.toLowerCase().replace(/[^a-z0-9]/g, '');
  if (!wanted) {
    return undefined;
  }
  return roster.offerings.find(
    (o) =>
      o.key.replace(/_/g, '') === wanted ||
      o.label.toLowerCase().replace(/[^a-z0-9]/g, '') === wanted
  );
}

/** Closing block every draft ends with */
export function renderSignature(persona: Persona): string {
  return [persona.signOff, persona.name, persona.firm, persona.email, persona.phone]
    .filter((line): line is string => typeof line === 'string' && line.length > 0)
    .join('\n');
}
