/**
 * Record Store Module
 *
 * Responsibilities:
 * - Define the RecordStore interface the workflow reads and writes through
 * - Implement NotionRecordStore over the Notion REST API using axios
 * - Implement MemoryRecordStore for testing and local development
 *
 * Every write is partial: only the properties passed are touched. Failures
 * are thrown as PipelineError with kind ProviderError (or InputError for an
 * unconfigured collection); the orchestrator turns them into results.
 */

import axios from 'axios';
import { z } from 'zod';
import { DEFAULT_NOTION_VERSION, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/index.js';
import { createConsoleLogger, type Logger } from '../observability/index.js';
import {
  fromNotionPage,
  readText,
  toNotionProperties,
  type PropertyMap,
  type StoreRecord,
} from '../properties/index.js';
import { PipelineError } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type CollectionName = 'firms' | 'prospects' | 'outreachLog';

export interface PropertyFilter {
  property: string;
  kind: 'title' | 'richText';
  operator: 'equals' | 'contains';
  value: string;
}

export interface RecordQuery {
  /** Conjunction of property filters */
  filters?: PropertyFilter[];
  limit?: number;
  /** Sort by creation time, newest first */
  newestFirst?: boolean;
}

export interface RecordStore {
  /**
   * @throws PipelineError RECORD_NOT_FOUND when no record has this id
   */
  get(id: string): Promise<StoreRecord>;

  /** Partial update; properties not named are left as they are */
  update(id: string, properties: PropertyMap): Promise<void>;

  create(collection: CollectionName, properties: PropertyMap): Promise<StoreRecord>;

  query(collection: CollectionName, query?: RecordQuery): Promise<StoreRecord[]>;
}

// ============================================================================
// Notion Record Store
// ============================================================================

/**
 * The slice of an axios instance the Notion store calls
 */
export interface HttpClient {
  get(url: string): Promise<{ data: unknown }>;
  post(url: string, body: unknown): Promise<{ data: unknown }>;
  patch(url: string, body: unknown): Promise<{ data: unknown }>;
}

export interface NotionRecordStoreConfig {
  apiKey: string;
  /** Database id per collection; a query or create on a missing one fails */
  databases: Partial<Record<CollectionName, string>>;
  version?: string;
  timeoutMs?: number;
  baseUrl?: string;
  /** Pre-built HTTP client, used instead of constructing one */
  client?: HttpClient;
}

const NOTION_API_URL = 'https://api.notion.com/v1';
const NOTION_PAGE_SIZE_LIMIT = 100;

const QueryResponseSchema = z.object({
  results: z.array(z.unknown()),
});

/** Notion filter object for one property condition */
function toNotionFilter(filter: PropertyFilter): Record<string, unknown> {
  const key = filter.kind === 'title' ? 'title' : 'rich_text';
  return { property: filter.property, [key]: { [filter.operator]: filter.value } };
}

export function buildNotionQuery(query: RecordQuery = {}): Record<string, unknown> {
  const body: Record<string, unknown> = {
    page_size: Math.min(query.limit ?? NOTION_PAGE_SIZE_LIMIT, NOTION_PAGE_SIZE_LIMIT),
  };

  const filters = (query.filters ?? []).map(toNotionFilter);
  if (filters.length === 1) {
    body['filter'] = filters[0];
  } else if (filters.length > 1) {
    body['filter'] = { and: filters };
  }

  if (query.newestFirst) {
    body['sorts'] = [{ timestamp: 'created_time', direction: 'descending' }];
  }

  return body;
}

export class NotionRecordStore implements RecordStore {
  private readonly client: HttpClient;
  private readonly databases: Partial<Record<CollectionName, string>>;
  private readonly logger: Logger;

  constructor(config: NotionRecordStoreConfig, logger: Logger = createConsoleLogger('record-store')) {
    if (!config.apiKey && !config.client) {
      throw new Error('Notion API key is required');
    }
    this.databases = config.databases;
    this.logger = logger;
    this.client =
      config.client ??
      axios.create({
        baseURL: config.baseUrl ?? NOTION_API_URL,
        timeout: config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
          'Notion-Version': config.version ?? DEFAULT_NOTION_VERSION,
        },
      });
  }

  async get(id: string): Promise<StoreRecord> {
    const response = await this.send('get', () => this.client.get(`/pages/${id}`), { id });
    return this.toRecord(response.data);
  }

  async update(id: string, properties: PropertyMap): Promise<void> {
    await this.send(
      'update',
      () => this.client.patch(`/pages/${id}`, { properties: toNotionProperties(properties) }),
      { id, properties: Object.keys(properties) }
    );
  }

  async create(collection: CollectionName, properties: PropertyMap): Promise<StoreRecord> {
    const databaseId = this.databaseFor(collection);
    const response = await this.send(
      'create',
      () =>
        this.client.post('/pages', {
          parent: { database_id: databaseId },
          properties: toNotionProperties(properties),
        }),
      { collection }
    );
    return this.toRecord(response.data);
  }

  async query(collection: CollectionName, query: RecordQuery = {}): Promise<StoreRecord[]> {
    const databaseId = this.databaseFor(collection);
    const response = await this.send(
      'query',
      () => this.client.post(`/databases/${databaseId}/query`, buildNotionQuery(query)),
      { collection }
    );

    const parsed = QueryResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new PipelineError('ProviderError', 'INVALID_RESPONSE', 'Notion query response has no results array');
    }

    const records: StoreRecord[] = [];
    for (const page of parsed.data.results) {
      const record = fromNotionPage(page);
      if (record) {
        records.push(record);
      }
    }
    return query.limit !== undefined ? records.slice(0, query.limit) : records;
  }

  private databaseFor(collection: CollectionName): string {
    const databaseId = this.databases[collection];
    if (!databaseId) {
      throw new PipelineError(
        'InputError',
        'COLLECTION_NOT_CONFIGURED',
        `No database id configured for collection: ${collection}`
      );
    }
    return databaseId;
  }

  private toRecord(data: unknown): StoreRecord {
    const record = fromNotionPage(data);
    if (!record) {
      throw new PipelineError('ProviderError', 'INVALID_RESPONSE', 'Notion response is not a page object');
    }
    return record;
  }

  /**
   * Run one request, translating axios failures into PipelineErrors
   */
  private async send(
    operation: string,
    request: () => Promise<{ data: unknown }>,
    context: Record<string, unknown>
  ): Promise<{ data: unknown }> {
    try {
      return await request();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 404) {
          throw new PipelineError('ProviderError', 'RECORD_NOT_FOUND', `Record not found (${operation})`, {
            status,
            ...context,
          });
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          this.logger.error('Notion request timed out', { operation, ...context });
          throw new PipelineError('ProviderError', 'RECORD_STORE_TIMEOUT', `Notion ${operation} timed out`, context);
        }
        this.logger.error('Notion request failed', { operation, status, error: message, ...context });
        throw new PipelineError('ProviderError', 'RECORD_STORE_ERROR', `Notion ${operation} failed: ${message}`, {
          status,
          ...context,
        });
      }

      this.logger.error('Notion request failed', { operation, error: message, ...context });
      throw new PipelineError('ProviderError', 'RECORD_STORE_ERROR', `Notion ${operation} failed: ${message}`, context);
    }
  }
}

// ============================================================================
// Memory Record Store
// ============================================================================

interface StoredEntry {
  collection: CollectionName;
  record: StoreRecord;
  sequence: number;
}

function matches(record: StoreRecord, filter: PropertyFilter): boolean {
  const value = readText(record.properties, filter.property);
  if (filter.operator === 'equals') {
    return value === filter.value;
  }
  return value.toLowerCase().includes(filter.value.toLowerCase());
}

function copyRecord(record: StoreRecord): StoreRecord {
  return { ...record, properties: { ...record.properties } };
}

/**
 * In-memory record store for testing and development
 *
 * Provides the same interface as NotionRecordStore: equals is exact,
 * contains is case-insensitive, and records come back as copies.
 */
export class MemoryRecordStore implements RecordStore {
  private entries: Map<string, StoredEntry> = new Map();
  private sequence = 0;

  async get(id: string): Promise<StoreRecord> {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new PipelineError('ProviderError', 'RECORD_NOT_FOUND', `Record not found: ${id}`);
    }
    return copyRecord(entry.record);
  }

  async update(id: string, properties: PropertyMap): Promise<void> {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new PipelineError('ProviderError', 'RECORD_NOT_FOUND', `Record not found: ${id}`);
    }
    entry.record = { ...entry.record, properties: { ...entry.record.properties, ...properties } };
  }

  async create(collection: CollectionName, properties: PropertyMap): Promise<StoreRecord> {
    this.sequence++;
    const id = `${collection}-${this.sequence}`;
    return copyRecord(this.insert(collection, id, properties));
  }

  async query(collection: CollectionName, query: RecordQuery = {}): Promise<StoreRecord[]> {
    const filters = query.filters ?? [];
    const found = [...this.entries.values()]
      .filter((entry) => entry.collection === collection)
      .filter((entry) => filters.every((filter) => matches(entry.record, filter)))
      .sort((a, b) => (query.newestFirst ? b.sequence - a.sequence : a.sequence - b.sequence))
      .map((entry) => copyRecord(entry.record));

    return query.limit !== undefined ? found.slice(0, query.limit) : found;
  }

  /**
   * Insert a record with a chosen id
   */
  seed(collection: CollectionName, id: string, properties: PropertyMap): StoreRecord {
    this.sequence++;
    return copyRecord(this.insert(collection, id, properties));
  }

  /** Number of records in a collection */
  count(collection: CollectionName): number {
    return [...this.entries.values()].filter((entry) => entry.collection === collection).length;
  }

  clear(): void {
    this.entries.clear();
    this.sequence = 0;
  }

  private insert(collection: CollectionName, id: string, properties: PropertyMap): StoreRecord {
    const record: StoreRecord = {
      id,
      url: `memory://${collection}/${id}`,
      properties: { ...properties },
    };
    this.entries.set(id, { collection, record, sequence: this.sequence });
    return record;
  }
}
