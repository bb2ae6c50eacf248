/**
 * In-memory content store.
 *
 * Backs mock mode (POST_THUMBS_USE_MOCK=true) and the test suite. Records and
 * attachments come back newest first, which this store models as descending ID.
 */

import fs from 'fs';
import { logger } from './logger.js';
import {
  FEATURED_IMAGE_META_KEY,
  matchesMimeType,
  type AttachedMedia,
  type AttachmentQuery,
  type ContentStore,
  type MetaClause,
  type MetaQuery,
  type RecordQuery,
  type RecordQueryResult,
} from './content-store.js';

export interface MemoryRecord {
  id: number;
  type: string;
  meta: Record<string, string>;
}

export interface MemorySeed {
  records: Array<{ id: number; type?: string; meta?: Record<string, string> }>;
  media: AttachedMedia[];
}

function isRecordSeed(value: unknown): value is MemorySeed['records'][number] {
  if (typeof value !== 'object' || value === null) return false;
  const entry: { id?: unknown; type?: unknown; meta?: unknown } = value;
  if (typeof entry.id !== 'number') return false;
  if (entry.type !== undefined && typeof entry.type !== 'string') return false;
  if (entry.meta === undefined) return true;
  return typeof entry.meta === 'object' && entry.meta !== null
    && Object.values(entry.meta).every(v => typeof v === 'string');
}

function isMediaSeed(value: unknown): value is AttachedMedia {
  if (typeof value !== 'object' || value === null) return false;
  const entry: { id?: unknown; parentId?: unknown; mimeType?: unknown } = value;
  return typeof entry.id === 'number'
    && typeof entry.parentId === 'number'
    && typeof entry.mimeType === 'string';
}

/**
 * Validate parsed JSON as a store seed. Missing arrays count as empty.
 */
export function parseSeed(data: unknown): MemorySeed {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Mock data must be a JSON object with "records" and "media" arrays');
  }

  const { records = [], media = [] }: { records?: unknown; media?: unknown } = data;
  if (!Array.isArray(records) || !records.every(isRecordSeed)) {
    throw new Error('Mock data "records" must be an array of { id, type?, meta? } entries');
  }
  if (!Array.isArray(media) || !media.every(isMediaSeed)) {
    throw new Error('Mock data "media" must be an array of { id, parentId, mimeType } entries');
  }

  return { records, media };
}

export class MemoryContentStore implements ContentStore {
  private records = new Map<number, MemoryRecord>();
  private media = new Map<number, AttachedMedia>();

  static fromSeed(seed: MemorySeed): MemoryContentStore {
    const store = new MemoryContentStore();
    for (const record of seed.records) {
      store.addRecord(record.id, record.type ?? 'post', record.meta ?? {});
    }
    for (const item of seed.media) {
      store.addMedia(item.id, item.parentId, item.mimeType);
    }
    return store;
  }

  /**
   * Build a store from a JSON data file.
   */
  static loadMockData(filePath: string): MemoryContentStore {
    const content = fs.readFileSync(filePath, 'utf-8');
    const store = MemoryContentStore.fromSeed(parseSeed(JSON.parse(content)));
    logger.verbose(`[MOCK] Loaded ${store.records.size} records and ${store.media.size} media items from ${filePath}`);
    return store;
  }

  addRecord(id: number, type = 'post', meta: Record<string, string> = {}): MemoryRecord {
    const record: MemoryRecord = { id, type, meta: { ...meta } };
    this.records.set(id, record);
    return record;
  }

  addMedia(id: number, parentId: number, mimeType = 'image/jpeg'): AttachedMedia {
    const item: AttachedMedia = { id, parentId, mimeType };
    this.media.set(id, item);
    return item;
  }

  getRecord(id: number): MemoryRecord | undefined {
    return this.records.get(id);
  }

  async queryRecords(query: RecordQuery): Promise<RecordQueryResult> {
    const matching = [...this.records.values()]
      .filter(record => query.type === undefined || record.type === query.type)
      .filter(record => !query.metaQuery || matchesMetaQuery(record, query.metaQuery))
      .map(record => record.id)
      .sort((a, b) => b - a);

    const ids = query.perPage === 'all' ? matching : matching.slice(0, Math.max(0, query.perPage));
    return { ids, total: matching.length };
  }

  async getMeta(recordId: number, key: string): Promise<string | null> {
    const { meta } = this.requireRecord(recordId);
    return Object.hasOwn(meta, key) ? meta[key] : null;
  }

  async setMeta(recordId: number, key: string, value: string): Promise<void> {
    this.requireRecord(recordId).meta[key] = value;
  }

  async deleteMeta(recordId: number, key: string): Promise<boolean> {
    const record = this.requireRecord(recordId);
    if (!Object.hasOwn(record.meta, key)) {
      return false;
    }
    delete record.meta[key];
    return true;
  }

  async setFeaturedImage(recordId: number, mediaId: number): Promise<number> {
    const record = this.records.get(recordId);
    const item = this.media.get(mediaId);
    if (!record || !item || !matchesMimeType(item.mimeType, 'image')) {
      return 0;
    }
    record.meta[FEATURED_IMAGE_META_KEY] = String(mediaId);
    return mediaId;
  }

  async getAttachedMedia(query: AttachmentQuery): Promise<AttachedMedia[]> {
    const children = [...this.media.values()]
      .filter(item => item.parentId === query.parentId && matchesMimeType(item.mimeType, query.mimeType))
      .sort((a, b) => b.id - a.id);

    return query.limit < 0 ? children : children.slice(0, query.limit);
  }

  private requireRecord(recordId: number): MemoryRecord {
    const record = this.records.get(recordId);
    if (!record) {
      throw new Error(`Record with id ${recordId} not found`);
    }
    return record;
  }
}

function matchesClause(record: MemoryRecord, clause: MetaClause): boolean {
  const exists = Object.hasOwn(record.meta, clause.key);
  return clause.compare === 'EXISTS' ? exists : !exists;
}

function matchesMetaQuery(record: MemoryRecord, metaQuery: MetaQuery): boolean {
  if (metaQuery.clauses.length === 0) return true;
  return metaQuery.relation === 'AND'
    ? metaQuery.clauses.every(clause => matchesClause(record, clause))
    : metaQuery.clauses.some(clause => matchesClause(record, clause));
}
