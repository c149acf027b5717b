/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Validate every inbound event payload with zod
 * - Canonicalize strings, URLs and emails
 * - Derive a firm's domain from its website
 * - Sanitize research text before it reaches a prompt
 * - Map free-text organization types onto the Prospects select options
 *
 * Each `normalize*Event` returns a ModuleResult so handlers can reject bad
 * input before touching any collaborator. Field names follow the payloads
 * the CRM automations and the enrichment relay already send.
 */

import { z } from 'zod';
import {
  FirmProperty,
  fromNotionProperties,
  readCheckbox,
  readText,
  truncateText,
} from '../properties/index.js';
import { fail, succeed, type ModuleResult } from '../types/index.js';

const MODULE = 'normalizer';

/** Research text is flattened and cut to this length before prompting */
export const MAX_RESEARCH_LENGTH = 5000;

// ============================================================================
// String Canonicalization
// ============================================================================

/**
 * Trim whitespace; empty strings become null
 */
function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function normalizeEmail(email: string | null | undefined): string | null {
  const trimmed = trimString(email);
  return trimmed ? trimmed.toLowerCase() : null;
}

/**
 * Ensure a scheme (https by default) and drop a trailing slash from the path
 */
function normalizeUrl(url: string | null | undefined): string | null {
  const trimmed = trimString(url);
  if (!trimmed) {
    return null;
  }

  let normalized = trimmed;
  if (!normalized.match(/^https?:\/\//i)) {
    normalized = `https://${normalized}`;
  }

  try {
    const urlObj = new URL(normalized);
    if (urlObj.pathname !== '/' && urlObj.pathname.endsWith('/')) {
      urlObj.pathname = urlObj.pathname.slice(0, -1);
    }
    return urlObj.toString();
  } catch {
    return normalized.replace(/\/+$/, '') || normalized;
  }
}

/**
 * Extract the bare domain of a website: no protocol, `www.` prefix, path,
 * port or upper case. Applying it to its own output returns the same value.
 *
 * @example extractDomain('https://www.Example.com/path') // 'example.com'
 */
function extractDomain(url: string | null | undefined): string | null {
  const normalizedUrl = normalizeUrl(url);
  if (!normalizedUrl) {
    return null;
  }

  try {
    const urlObj = new URL(normalizedUrl);
    const domain = urlObj.hostname.replace(/^(www\.)+/i, '').toLowerCase();
    return domain.length > 0 ? domain : null;
  } catch {
    return null;
  }
}

/**
 * Replace line breaks with spaces and cap the length
 */
export function sanitizeResearch(text: string | null | undefined, maxLength = MAX_RESEARCH_LENGTH): string {
  if (!text) {
    return '';
  }
  return truncateText(text.replace(/[\r\n]/g, ' '), maxLength);
}

// ============================================================================
// Organization Types
// ============================================================================

export type OrganizationType =
  | 'Public Pension'
  | 'E&F'
  | 'Family Office'
  | 'RIA'
  | 'OCIO'
  | 'Hospital/Healthcare';

/** Checked in order; the first keyword starting a word wins */
const ORGANIZATION_TYPE_KEYWORDS: ReadonlyArray<readonly [string, OrganizationType]> = [
  ['pension', 'Public Pension'],
  ['endowment', 'E&F'],
  ['foundation', 'E&F'],
  ['family office', 'Family Office'],
  ['ria', 'RIA'],
  ['ocio', 'OCIO'],
  ['hospital', 'Hospital/Healthcare'],
  ['healthcare', 'Hospital/Healthcare'],
];

/**
 * Map free text such as "State Pension Fund" onto an Organization Type option
 */
export function mapOrganizationType(text: string | null | undefined): OrganizationType | null {
  const lower = text?.toLowerCase() ?? '';
  if (!lower) {
    return null;
  }
  for (const [keyword, type] of ORGANIZATION_TYPE_KEYWORDS) {
    if (new RegExp(`\\b${keyword}`).test(lower)) {
      return type;
    }
  }
  return null;
}

// ============================================================================
// Field Schemas
// ============================================================================

/**
 * Optional free-text field; numbers and booleans are stringified, objects are
 * serialized, blanks become undefined
 */
const text = z.preprocess((value) => {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value.trim() === '' ? undefined : value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}, z.string().optional());

const flag = z.preprocess((value) => {
  if (typeof value === 'string') return ['true', 'yes', '1', 'on'].includes(value.trim().toLowerCase());
  return value === true || value === 1;
}, z.boolean());

const PersonSchema = z.object({
  name: text,
  firm_name: text,
  title: text,
  email: text,
  linkedin_url: text,
  phone: text,
  location: text,
  organization_type: text,
  notion_page_id: text,
});

const NewFirmFlatSchema = z.object({
  id: text,
  page_id: text,
  notion_page_id: text,
  firm_name: text,
  name: text,
  website: text,
  restart_enrichment: flag.optional(),
  properties: z.record(z.unknown()).optional(),
});

const FirmEnrichedSchema = z.object({
  notion_page_id: text,
  firm_name: text,
  linkedin_url: text,
  location: text,
  firm_overview: text,
  employee_count: text,
  people: z.array(z.unknown()).optional(),
});

const ScoringTriggerSchema = z.object({
  notion_page_id: text,
  firm_name: text,
  website: text,
  firm_research: text,
  research: text,
});

const ContactEnrichmentRequestSchema = z.object({
  contact_id: text,
  notion_page_id: text,
  name: text,
  firm_name: text,
  linkedin_url: text,
  email: text,
});

const OutreachTriggerSchema = z.object({
  firm_id: text,
  firm_name: text,
  website: text,
  fit: z.union([z.array(z.string()), text]).optional(),
  contact_name: text,
  contact_title: text,
  contact_email: text,
});

const ReplyEventSchema = z.object({
  thread_id: text,
  sender_email: text,
  email_body: text,
  received_date: text,
});

// ============================================================================
// Event Types
// ============================================================================

export interface NewFirmEvent {
  recordId: string | null;
  firmName: string;
  website: string | null;
  restart: boolean;
}

export interface PersonData {
  name: string;
  firmName: string;
  title: string | null;
  email: string | null;
  linkedinUrl: string | null;
  phone: string | null;
  location: string | null;
  organizationType: OrganizationType | null;
}

export interface FirmEnrichedEvent {
  recordId: string;
  firmName: string | null;
  linkedinUrl: string | null;
  location: string | null;
  firmOverview: string | null;
  employeeCount: string | null;
  people: PersonData[];
  /** People entries dropped for lacking a name */
  skippedPeople: number;
}

export interface ScoringTriggerEvent {
  recordId: string;
  firmName: string;
  website: string;
  research: string;
}

export interface PersonEnrichedEvent extends PersonData {
  firmRecordId: string | null;
}

export interface ContactEnrichmentRequest {
  contactId: string;
  name: string;
  firmName: string;
  linkedinUrl: string | null;
  email: string | null;
}

export interface OutreachTriggerEvent {
  firmId: string;
  firmName: string | null;
  website: string | null;
  fit: string[];
  contactName: string | null;
  contactTitle: string | null;
  contactEmail: string | null;
}

export interface ReplyEvent {
  threadId: string;
  senderEmail: string;
  body: string;
  receivedAt: string | null;
}

// ============================================================================
// Helpers
// ============================================================================

function inputError<T>(code: string, message: string, startTime: number, details?: unknown): ModuleResult<T> {
  return fail(MODULE, {
    kind: 'InputError',
    code,
    message,
    ...(details !== undefined ? { details } : {}),
  }, startTime);
}

function schemaError<T>(error: z.ZodError, startTime: number): ModuleResult<T> {
  const errors = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
  return inputError('VALIDATION_ERROR', 'Payload validation failed', startTime, errors);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPersonData(raw: z.infer<typeof PersonSchema>, firmNameFallback: string): PersonData | null {
  const name = trimString(raw.name);
  if (!name) {
    return null;
  }
  return {
    name,
    firmName: trimString(raw.firm_name) ?? firmNameFallback,
    title: trimString(raw.title),
    email: normalizeEmail(raw.email),
    linkedinUrl: normalizeUrl(raw.linkedin_url),
    phone: trimString(raw.phone),
    location: trimString(raw.location),
    organizationType: mapOrganizationType(raw.organization_type),
  };
}

// ============================================================================
// Event Normalizers
// ============================================================================

/**
 * New-firm notification
 *
 * Accepts the CRM automation shape (`{ data: { id, properties } }`) or a flat
 * object. Missing website or id is not rejected here: the handler may still
 * recover the website from the record when restart is set.
 */
export function normalizeNewFirmEvent(raw: unknown): ModuleResult<NewFirmEvent> {
  const startTime = Date.now();
  const body = isObject(raw) && isObject(raw['data']) ? raw['data'] : raw;

  const parsed = NewFirmFlatSchema.safeParse(body);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }
  const p = parsed.data;

  let firmName = trimString(p.firm_name) ?? trimString(p.name) ?? '';
  let website = trimString(p.website);
  let restart = p.restart_enrichment ?? false;

  if (p.properties) {
    const properties = fromNotionProperties(p.properties);
    firmName = trimString(readText(properties, FirmProperty.FirmName)) ?? firmName;
    website = trimString(readText(properties, FirmProperty.Website)) ?? website;
    restart = restart || readCheckbox(properties, FirmProperty.RestartEnrichment);
  }

  return succeed(MODULE, {
    recordId: trimString(p.id) ?? trimString(p.page_id) ?? trimString(p.notion_page_id),
    firmName,
    website,
    restart,
  }, startTime);
}

/**
 * Firm enrichment callback from the relay
 */
export function normalizeFirmEnrichedEvent(raw: unknown): ModuleResult<FirmEnrichedEvent> {
  const startTime = Date.now();
  const parsed = FirmEnrichedSchema.safeParse(raw);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }
  const p = parsed.data;

  const recordId = trimString(p.notion_page_id);
  if (!recordId) {
    return inputError('MISSING_RECORD_ID', 'No notion_page_id provided', startTime);
  }

  const firmName = trimString(p.firm_name);
  const people: PersonData[] = [];
  let skippedPeople = 0;
  for (const entry of p.people ?? []) {
    const person = PersonSchema.safeParse(entry);
    const data = person.success ? toPersonData(person.data, firmName ?? '') : null;
    if (data) {
      people.push(data);
    } else {
      skippedPeople++;
    }
  }

  return succeed(MODULE, {
    recordId,
    firmName,
    linkedinUrl: normalizeUrl(p.linkedin_url),
    location: trimString(p.location),
    firmOverview: trimString(p.firm_overview),
    employeeCount: trimString(p.employee_count),
    people,
    skippedPeople,
  }, startTime);
}

/**
 * Scoring trigger; research comes from `firm_research` or `research`
 */
export function normalizeScoringTrigger(raw: unknown): ModuleResult<ScoringTriggerEvent> {
  const startTime = Date.now();
  const parsed = ScoringTriggerSchema.safeParse(raw);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }
  const p = parsed.data;

  const recordId = trimString(p.notion_page_id);
  if (!recordId) {
    return inputError('MISSING_RECORD_ID', 'No notion_page_id provided', startTime);
  }

  return succeed(MODULE, {
    recordId,
    firmName: trimString(p.firm_name) ?? '',
    website: trimString(p.website) ?? '',
    research: sanitizeResearch(p.research ?? p.firm_research),
  }, startTime);
}

/**
 * Person enrichment callback from the relay
 */
export function normalizePersonEnrichedEvent(raw: unknown): ModuleResult<PersonEnrichedEvent> {
  const startTime = Date.now();
  const parsed = PersonSchema.safeParse(raw);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }

  const person = toPersonData(parsed.data, '');
  if (!person) {
    return inputError('MISSING_NAME', 'No name provided', startTime);
  }

  return succeed(MODULE, {
    ...person,
    firmRecordId: trimString(parsed.data.notion_page_id),
  }, startTime);
}

/**
 * Request to send an existing contact to person enrichment
 */
export function normalizeContactEnrichmentRequest(raw: unknown): ModuleResult<ContactEnrichmentRequest> {
  const startTime = Date.now();
  const parsed = ContactEnrichmentRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }
  const p = parsed.data;

  const contactId = trimString(p.contact_id) ?? trimString(p.notion_page_id);
  if (!contactId) {
    return inputError('MISSING_RECORD_ID', 'No contact_id provided', startTime);
  }
  const name = trimString(p.name);
  if (!name) {
    return inputError('MISSING_NAME', 'No name provided', startTime);
  }

  return succeed(MODULE, {
    contactId,
    name,
    firmName: trimString(p.firm_name) ?? '',
    linkedinUrl: normalizeUrl(p.linkedin_url),
    email: normalizeEmail(p.email),
  }, startTime);
}

/**
 * Outreach trigger sent by the CRM button
 */
export function normalizeOutreachTrigger(raw: unknown): ModuleResult<OutreachTriggerEvent> {
  const startTime = Date.now();
  const parsed = OutreachTriggerSchema.safeParse(raw);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }
  const p = parsed.data;

  const firmId = trimString(p.firm_id);
  if (!firmId) {
    return inputError('MISSING_FIRM_ID', 'Missing required field: firm_id', startTime);
  }

  const contactEmail = normalizeEmail(p.contact_email);
  if (contactEmail && !z.string().email().safeParse(contactEmail).success) {
    return inputError('INVALID_EMAIL', 'contact_email is not a valid email address', startTime);
  }

  const fitValues = Array.isArray(p.fit) ? p.fit : (p.fit ?? '').split(',');
  const fit = fitValues
    .map((value) => trimString(value))
    .filter((value): value is string => value !== null);

  return succeed(MODULE, {
    firmId,
    firmName: trimString(p.firm_name),
    website: trimString(p.website),
    fit,
    contactName: trimString(p.contact_name),
    contactTitle: trimString(p.contact_title),
    contactEmail,
  }, startTime);
}

/**
 * Inbound reply on a thread that outreach started
 */
export function normalizeReplyEvent(raw: unknown): ModuleResult<ReplyEvent> {
  const startTime = Date.now();
  const parsed = ReplyEventSchema.safeParse(raw);
  if (!parsed.success) {
    return schemaError(parsed.error, startTime);
  }
  const p = parsed.data;

  const threadId = trimString(p.thread_id);
  const senderEmail = normalizeEmail(p.sender_email);
  if (!threadId || !senderEmail) {
    return inputError(
      'MISSING_REQUIRED_FIELDS',
      'Missing required fields: thread_id, sender_email',
      startTime
    );
  }

  return succeed(MODULE, {
    threadId,
    senderEmail,
    body: p.email_body ?? '',
    receivedAt: trimString(p.received_date),
  }, startTime);
}

export { extractDomain, normalizeUrl, normalizeEmail, trimString };
