/**
 * Properties Module
 *
 * Typed record properties. Every value read from or written to the record
 * store is one member of the PropertyValue union; `extractPropertyValue` is
 * the single exhaustive reader that turns any of them into plain text.
 *
 * Also holds the property names of the three CRM databases so handlers and
 * renderers agree on them.
 */

import { z } from 'zod';

// ============================================================================
// Property Values
// ============================================================================

export type PropertyValue =
  | { type: 'title'; text: string }
  | { type: 'richText'; text: string }
  | { type: 'select'; name: string | null }
  | { type: 'multiSelect'; names: string[] }
  | { type: 'url'; url: string | null }
  | { type: 'email'; email: string | null }
  | { type: 'phoneNumber'; phone: string | null }
  | { type: 'number'; value: number | null }
  | { type: 'date'; start: string | null }
  | { type: 'checkbox'; checked: boolean };

export type PropertyType = PropertyValue['type'];

export type PropertyMap = Record<string, PropertyValue>;

/**
 * A record in the store: an opaque id, an optional link back to the CRM UI,
 * and its properties
 */
export interface StoreRecord {
  id: string;
  url?: string;
  properties: PropertyMap;
}

/** Rich text and title content limit of the CRM API */
export const MAX_TEXT_LENGTH = 2000;

/**
 * First `max` code points of a string, so a surrogate pair is never split
 */
export function truncateText(text: string, max: number): string {
  return text.length <= max ? text : Array.from(text).slice(0, max).join('');
}

/** Last `max` code points of a string */
export function keepTail(text: string, max: number): string {
  return text.length <= max ? text : Array.from(text).slice(-max).join('');
}

// ============================================================================
// Builders
// ============================================================================

export const prop = {
  title: (text: string): PropertyValue => ({ type: 'title', text: truncateText(text, MAX_TEXT_LENGTH) }),
  richText: (text: string): PropertyValue => ({ type: 'richText', text: truncateText(text, MAX_TEXT_LENGTH) }),
  select: (name: string | null): PropertyValue => ({ type: 'select', name }),
  multiSelect: (names: string[]): PropertyValue => ({ type: 'multiSelect', names: [...names] }),
  url: (url: string | null): PropertyValue => ({ type: 'url', url }),
  email: (email: string | null): PropertyValue => ({ type: 'email', email }),
  phoneNumber: (phone: string | null): PropertyValue => ({ type: 'phoneNumber', phone }),
  number: (value: number | null): PropertyValue => ({ type: 'number', value }),
  date: (start: string | null): PropertyValue => ({ type: 'date', start }),
  checkbox: (checked: boolean): PropertyValue => ({ type: 'checkbox', checked }),
};

// ============================================================================
// Readers
// ============================================================================

function assertNever(value: never): never {
  throw new Error(`Unhandled property value: ${JSON.stringify(value)}`);
}

/**
 * Plain-text view of any property value; null when the value is empty
 */
export function extractPropertyValue(value: PropertyValue | undefined): string | null {
  if (!value) {
    return null;
  }
  switch (value.type) {
    case 'title':
    case 'richText':
      return value.text.length > 0 ? value.text : null;
    case 'select':
      return value.name;
    case 'multiSelect':
      return value.names.length > 0 ? value.names.join(', ') : null;
    case 'url':
      return value.url;
    case 'email':
      return value.email;
    case 'phoneNumber':
      return value.phone;
    case 'number':
      return value.value === null ? null : String(value.value);
    case 'date':
      return value.start;
    case 'checkbox':
      return value.checked ? 'Yes' : 'No';
    default:
      return assertNever(value);
  }
}

/** Text of a property, '' when absent or empty */
export function readText(properties: PropertyMap, name: string): string {
  return extractPropertyValue(properties[name]) ?? '';
}

export function readCheckbox(properties: PropertyMap, name: string): boolean {
  const value = properties[name];
  return value?.type === 'checkbox' && value.checked;
}

/** Option names of a select or multi-select property */
export function readOptions(properties: PropertyMap, name: string): string[] {
  const value = properties[name];
  if (value?.type === 'multiSelect') {
    return [...value.names];
  }
  if (value?.type === 'select' && value.name) {
    return [value.name];
  }
  return [];
}

/** Firm display name: "Firm Name" title, falling back to "Name" */
export function readFirmName(record: StoreRecord): string {
  return readText(record.properties, FirmProperty.FirmName) || readText(record.properties, 'Name');
}

// ============================================================================
// Property Names
// ============================================================================

export const FirmProperty = {
  FirmName: 'Firm Name',
  Website: 'Website',
  RestartEnrichment: 'Restart Enrichment',
  ResearchStatus: 'Research Status',
  FirmOverview: 'Firm Overview',
  LinkedInCompanyUrl: 'LinkedIn Company URL',
  Location: 'Location / Headquarters Location',
  QualificationNotes: 'Qualification Notes',
  BestMatches: 'Best Matches',
  Notes: 'Notes',
  KeyInvestmentThemes: 'Key Investment Themes',
  NetworkAngles: 'Network Angles',
  LastOutreachRun: 'Last Outreach Run',
  LatestOutreachSubject: 'Latest Outreach Subject',
  LatestOutreachContact: 'Latest Outreach Contact',
  LatestOutreachEmail: 'Latest Outreach Email',
  OutreachDraftUrl: 'Outreach Draft URL',
  OutreachPrimaryOffering: 'Outreach Primary Offering',
} as const;

export const ProspectProperty = {
  Name: 'Name',
  Company: 'Company',
  Status: 'Status',
  Email: 'Email',
  TitleRole: 'Title/Role',
  LinkedInUrl: 'LinkedIn URL',
  MobilePhone: 'Mobile Phone',
  OrganizationType: 'Organization Type',
} as const;

export const OutreachLogProperty = {
  GmailThreadId: 'Gmail Thread ID',
  ResponseStatus: 'Response Status',
  ResponseDate: 'Response Date',
  Outcome: 'Outcome',
  FollowUpRequired: 'Follow-up Required',
  Notes: 'Notes',
} as const;

// ============================================================================
// Notion Wire Format
// ============================================================================

const RichTextItemSchema = z.object({
  plain_text: z.string().optional(),
  text: z.object({ content: z.string() }).optional(),
});

const OptionSchema = z.object({ name: z.string() });

const NotionPropertySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('title'), title: z.array(RichTextItemSchema).default([]) }),
  z.object({ type: z.literal('rich_text'), rich_text: z.array(RichTextItemSchema).default([]) }),
  z.object({ type: z.literal('select'), select: OptionSchema.nullable().default(null) }),
  z.object({ type: z.literal('multi_select'), multi_select: z.array(OptionSchema).default([]) }),
  z.object({ type: z.literal('url'), url: z.string().nullable().default(null) }),
  z.object({ type: z.literal('email'), email: z.string().nullable().default(null) }),
  z.object({ type: z.literal('phone_number'), phone_number: z.string().nullable().default(null) }),
  z.object({ type: z.literal('number'), number: z.number().nullable().default(null) }),
  z.object({
    type: z.literal('date'),
    date: z.object({ start: z.string().nullable() }).nullable().default(null),
  }),
  z.object({ type: z.literal('checkbox'), checkbox: z.boolean().default(false) }),
]);

const NOTION_TYPES = [
  'title',
  'rich_text',
  'select',
  'multi_select',
  'url',
  'email',
  'phone_number',
  'number',
  'date',
  'checkbox',
] as const;

export const NotionPageSchema = z.object({
  id: z.string().min(1),
  url: z.string().optional(),
  properties: z.record(z.unknown()).default({}),
});

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Automation payloads sometimes omit the `type` tag; infer it from the
 * first known value key
 */
function withTypeTag(raw: Record<string, unknown>): Record<string, unknown> {
  if (typeof raw['type'] === 'string') {
    return raw;
  }
  const inferred = NOTION_TYPES.find((type) => type in raw);
  return inferred ? { ...raw, type: inferred } : raw;
}

function joinRichText(items: Array<z.infer<typeof RichTextItemSchema>>): string {
  return items.map((item) => item.plain_text ?? item.text?.content ?? '').join('');
}

/**
 * Convert one Notion property object; unsupported or malformed shapes
 * (formulas, relations, rollups) yield null
 */
export function fromNotionProperty(raw: unknown): PropertyValue | null {
  if (!isObject(raw)) {
    return null;
  }
  const parsed = NotionPropertySchema.safeParse(withTypeTag(raw));
  if (!parsed.success) {
    return null;
  }
  const p = parsed.data;
  switch (p.type) {
    case 'title':
      return { type: 'title', text: joinRichText(p.title) };
    case 'rich_text':
      return { type: 'richText', text: joinRichText(p.rich_text) };
    case 'select':
      return { type: 'select', name: p.select?.name ?? null };
    case 'multi_select':
      return { type: 'multiSelect', names: p.multi_select.map((o) => o.name) };
    case 'url':
      return { type: 'url', url: p.url };
    case 'email':
      return { type: 'email', email: p.email };
    case 'phone_number':
      return { type: 'phoneNumber', phone: p.phone_number };
    case 'number':
      return { type: 'number', value: p.number };
    case 'date':
      return { type: 'date', start: p.date?.start ?? null };
    case 'checkbox':
      return { type: 'checkbox', checked: p.checkbox };
    default:
      return assertNever(p);
  }
}

export function fromNotionProperties(raw: Record<string, unknown>): PropertyMap {
  const properties: PropertyMap = {};
  for (const [name, value] of Object.entries(raw)) {
    const converted = fromNotionProperty(value);
    if (converted) {
      properties[name] = converted;
    }
  }
  return properties;
}

/**
 * Convert a Notion page object into a StoreRecord
 *
 * @returns null when the object is not a page
 */
export function fromNotionPage(raw: unknown): StoreRecord | null {
  const parsed = NotionPageSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return {
    id: parsed.data.id,
    ...(parsed.data.url !== undefined ? { url: parsed.data.url } : {}),
    properties: fromNotionProperties(parsed.data.properties),
  };
}

function textItems(text: string): Array<{ text: { content: string } }> {
  return text.length > 0 ? [{ text: { content: truncateText(text, MAX_TEXT_LENGTH) } }] : [];
}

/** Request body shape of one property in a page create/update */
export function toNotionProperty(value: PropertyValue): Record<string, unknown> {
  switch (value.type) {
    case 'title':
      return { title: textItems(value.text) };
    case 'richText':
      return { rich_text: textItems(value.text) };
    case 'select':
      return { select: value.name === null ? null : { name: value.name } };
    case 'multiSelect':
      return { multi_select: value.names.map((name) => ({ name })) };
    case 'url':
      return { url: value.url };
    case 'email':
      return { email: value.email };
    case 'phoneNumber':
      return { phone_number: value.phone };
    case 'number':
      return { number: value.value };
    case 'date':
      return { date: value.start === null ? null : { start: value.start } };
    case 'checkbox':
      return { checkbox: value.checked };
    default:
      return assertNever(value);
  }
}

export function toNotionProperties(properties: PropertyMap): Record<string, Record<string, unknown>> {
  const payload: Record<string, Record<string, unknown>> = {};
  for (const [name, value] of Object.entries(properties)) {
    payload[name] = toNotionProperty(value);
  }
  return payload;
}
