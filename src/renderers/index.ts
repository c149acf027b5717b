/**
 * Renderers Module
 *
 * Pure functions that turn workflow results into record-update payloads.
 * Handlers decide when to write; renderers decide what the properties say.
 *
 * Responsibilities:
 * - Scoring update: fit selects, Qualification Notes, Firm Overview, Best Matches
 * - Enrichment merge of relay firmographics
 * - Contact properties for a person upsert
 * - Outreach metadata on the firm record
 * - Outreach log update for an inbound reply
 */

import { replyOutcome, replyStatusLabel } from '../classifier/index.js';
import type { PersonData, FirmEnrichedEvent } from '../normalizer/index.js';
import type { OutreachDraft } from '../outreach/index.js';
import {
  FirmProperty,
  MAX_TEXT_LENGTH,
  keepTail,
  truncateText,
  OutreachLogProperty,
  ProspectProperty,
  prop,
  type PropertyMap,
  type StoreRecord,
} from '../properties/index.js';
import type { ParsedScores, ScoringResult } from '../scoring/index.js';
import type { ContactStatus, ReplyClassification, ResearchStatus } from '../types/index.js';

/** Characters of a reply body copied into the outreach log */
export const REPLY_EXCERPT_LENGTH = 200;

/** Contact label when outreach was not addressed to a named person */
export const DEFAULT_CONTACT_LABEL = 'Investment Team';

// ============================================================================
// Scoring
// ============================================================================

/**
 * Qualification Notes text: best match, one rationale line per offering,
 * then the summary. Capped at the rich-text limit.
 */
export function renderQualificationNotes(scores: ParsedScores): string {
  const lines = scores.scores.map((score) => `${score.label}: ${score.rationale}`);
  const sections = [`Best Match: ${scores.bestMatch}`, lines.join('\n')];
  if (scores.summary) {
    sections.push(scores.summary);
  }
  return truncateText(sections.join('\n\n'), MAX_TEXT_LENGTH);
}

/**
 * Firm update after a completed scoring run
 *
 * Best Matches is written only when at least one offering is Strong, so a
 * run with no Strong fit leaves earlier tags in place.
 */
export function buildScoringUpdate(result: ScoringResult): PropertyMap {
  const update: PropertyMap = {};

  for (const score of result.scores) {
    update[score.fitProperty] = prop.select(score.fit);
  }
  update[FirmProperty.ResearchStatus] = prop.select('Qualified' satisfies ResearchStatus);
  update[FirmProperty.QualificationNotes] = prop.richText(renderQualificationNotes(result));
  update[FirmProperty.FirmOverview] = prop.richText(result.research);

  if (result.bestMatches.length > 0) {
    update[FirmProperty.BestMatches] = prop.multiSelect(result.bestMatches);
  }

  return update;
}

// ============================================================================
// Enrichment
// ============================================================================

/**
 * Firm update after a successful enrichment dispatch; clears the restart
 * flag when the dispatch was a restart
 */
export function buildDispatchUpdate(restart: boolean): PropertyMap {
  const update: PropertyMap = {
    [FirmProperty.ResearchStatus]: prop.select('Researching' satisfies ResearchStatus),
  };
  if (restart) {
    update[FirmProperty.RestartEnrichment] = prop.checkbox(false);
  }
  return update;
}

/**
 * Merge relay firmographics into the firm record. Only fields the relay
 * returned are written.
 */
export function buildEnrichmentMerge(event: FirmEnrichedEvent): PropertyMap {
  const update: PropertyMap = {};

  if (event.linkedinUrl) {
    update[FirmProperty.LinkedInCompanyUrl] = prop.url(event.linkedinUrl);
  }
  if (event.location) {
    update[FirmProperty.Location] = prop.richText(event.location);
  }
  if (event.firmOverview) {
    update[FirmProperty.FirmOverview] = prop.richText(event.firmOverview);
  }
  update[FirmProperty.ResearchStatus] = prop.select('Qualified' satisfies ResearchStatus);

  return update;
}

/**
 * Prospect properties for a person upsert
 *
 * @param status - Explicit status; by default Qualified iff an email is known
 */
export function buildContactProperties(person: PersonData, status?: ContactStatus): PropertyMap {
  const properties: PropertyMap = {
    [ProspectProperty.Name]: prop.title(person.name),
    [ProspectProperty.Company]: prop.richText(person.firmName),
    [ProspectProperty.Status]: prop.select(status ?? (person.email ? 'Qualified' : 'New')),
  };

  if (person.email) {
    properties[ProspectProperty.Email] = prop.email(person.email);
  }
  if (person.title) {
    properties[ProspectProperty.TitleRole] = prop.richText(person.title);
  }
  if (person.linkedinUrl) {
    properties[ProspectProperty.LinkedInUrl] = prop.url(person.linkedinUrl);
  }
  if (person.phone) {
    properties[ProspectProperty.MobilePhone] = prop.phoneNumber(person.phone);
  }
  if (person.organizationType) {
    properties[ProspectProperty.OrganizationType] = prop.select(person.organizationType);
  }

  return properties;
}

export function buildContactStatusUpdate(status: ContactStatus): PropertyMap {
  return { [ProspectProperty.Status]: prop.select(status) };
}

// ============================================================================
// Outreach
// ============================================================================

export interface OutreachMetadata {
  draft: OutreachDraft;
  contactLabel: string | null;
  contactEmail: string | null;
  draftUrl: string | null;
  /** YYYY-MM-DD */
  runDate: string;
}

/**
 * Firm update recording the latest outreach
 *
 * Only properties that already exist on the record are written, so a
 * database without the outreach columns is left untouched.
 */
export function buildOutreachUpdate(record: StoreRecord, metadata: OutreachMetadata): PropertyMap {
  const candidate: PropertyMap = {
    [FirmProperty.LatestOutreachContact]: prop.richText(metadata.contactLabel ?? DEFAULT_CONTACT_LABEL),
    [FirmProperty.LatestOutreachSubject]: prop.richText(metadata.draft.subject),
    [FirmProperty.OutreachPrimaryOffering]: prop.select(metadata.draft.primaryOffering),
    [FirmProperty.LastOutreachRun]: prop.date(metadata.runDate),
  };
  if (metadata.contactEmail) {
    candidate[FirmProperty.LatestOutreachEmail] = prop.email(metadata.contactEmail);
  }
  if (metadata.draftUrl) {
    candidate[FirmProperty.OutreachDraftUrl] = prop.url(metadata.draftUrl);
  }

  const update: PropertyMap = {};
  for (const [name, value] of Object.entries(candidate)) {
    if (name in record.properties) {
      update[name] = value;
    }
  }
  return update;
}

// ============================================================================
// Replies
// ============================================================================

export function renderReplyExcerpt(body: string, responseDate: string): string {
  return `\n\n[Response received ${responseDate}]\n${truncateText(body, REPLY_EXCERPT_LENGTH)}...`;
}

/**
 * Outreach log update for a classified reply
 *
 * The excerpt is appended to the existing notes; when the result would
 * exceed the rich-text limit the oldest text is dropped.
 */
export function buildReplyUpdate(
  classification: ReplyClassification,
  responseDate: string,
  existingNotes: string,
  body: string
): PropertyMap {
  const update: PropertyMap = {
    [OutreachLogProperty.ResponseStatus]: prop.select(replyStatusLabel(classification)),
    [OutreachLogProperty.ResponseDate]: prop.date(responseDate),
    [OutreachLogProperty.Outcome]: prop.select(replyOutcome(classification)),
    [OutreachLogProperty.FollowUpRequired]: prop.checkbox(false),
  };

  if (body) {
    const notes = existingNotes + renderReplyExcerpt(body, responseDate);
    update[OutreachLogProperty.Notes] = prop.richText(keepTail(notes, MAX_TEXT_LENGTH));
  }

  return update;
}
