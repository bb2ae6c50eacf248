/**
 * HTTP content store - the host platform's content API over axios.
 *
 * Failures other than authentication errors and expected 404s propagate to the
 * caller unchanged; nothing is retried.
 */

import axios, { type AxiosInstance } from 'axios';
import { attachApiLogger } from './api-logger.js';
import { AuthenticationError } from './errors.js';
import { logger } from './logger.js';
import type {
  AttachedMedia,
  AttachmentQuery,
  ContentStore,
  RecordQuery,
  RecordQueryResult,
} from './content-store.js';

export interface HttpContentStoreOptions {
  url: string;
  apiKey: string;
}

function statusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * Turn a 401 into an AuthenticationError; rethrow everything else as is.
 */
function rethrow(error: unknown): never {
  if (statusOf(error) === 401) {
    throw new AuthenticationError(error);
  }
  throw error;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number');
}

function isAttachedMedia(value: unknown): value is AttachedMedia {
  if (typeof value !== 'object' || value === null) return false;
  const entry: { id?: unknown; parentId?: unknown; mimeType?: unknown } = value;
  return typeof entry.id === 'number'
    && typeof entry.parentId === 'number'
    && typeof entry.mimeType === 'string';
}

export class HttpContentStore implements ContentStore {
  private readonly client: AxiosInstance;

  constructor(options: HttpContentStoreOptions) {
    this.client = axios.create({
      baseURL: options.url.replace(/\/+$/, ''),
      headers: {
        'Authorization': `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      },
    });
    attachApiLogger(this.client);
  }

  private recordPath(recordId: number, suffix = ''): string {
    return `/api/records/${recordId}${suffix}`;
  }

  private metaPath(recordId: number, key: string): string {
    return this.recordPath(recordId, `/meta/${encodeURIComponent(key)}`);
  }

  async queryRecords(query: RecordQuery): Promise<RecordQueryResult> {
    logger.verbose(`[API] Querying records: ${JSON.stringify(query)}`);
    try {
      const response = await this.client.post<{ ids?: unknown; total?: unknown }>('/api/records/query', query);
      const { ids, total } = response.data ?? {};
      if (!isNumberArray(ids)) {
        throw new Error('Content API returned an unexpected record query response (missing "ids" array)');
      }
      return { ids, total: typeof total === 'number' ? total : ids.length };
    } catch (error) {
      return rethrow(error);
    }
  }

  async getMeta(recordId: number, key: string): Promise<string | null> {
    try {
      const response = await this.client.get<{ value?: unknown }>(this.metaPath(recordId, key));
      const value = response.data?.value;
      return value === undefined || value === null ? null : String(value);
    } catch (error) {
      if (statusOf(error) === 404) {
        return null;
      }
      return rethrow(error);
    }
  }

  async setMeta(recordId: number, key: string, value: string): Promise<void> {
    try {
      await this.client.put(this.metaPath(recordId, key), { value });
    } catch (error) {
      rethrow(error);
    }
  }

  async deleteMeta(recordId: number, key: string): Promise<boolean> {
    try {
      await this.client.delete(this.metaPath(recordId, key));
      return true;
    } catch (error) {
      if (statusOf(error) === 404) {
        return false;
      }
      return rethrow(error);
    }
  }

  async setFeaturedImage(recordId: number, mediaId: number): Promise<number> {
    try {
      const response = await this.client.put<{ mediaId?: unknown }>(
        this.recordPath(recordId, '/featured-image'),
        { mediaId },
      );
      const assigned = response.data?.mediaId;
      return typeof assigned === 'number' ? assigned : 0;
    } catch (error) {
      return rethrow(error);
    }
  }

  async getAttachedMedia(query: AttachmentQuery): Promise<AttachedMedia[]> {
    try {
      const response = await this.client.get<unknown>(this.recordPath(query.parentId, '/attachments'), {
        params: { mimeType: query.mimeType, limit: query.limit },
      });
      const media = response.data;
      if (!Array.isArray(media) || !media.every(isAttachedMedia)) {
        throw new Error(
          'Content API returned an unexpected attachments response (expected an array of { id, parentId, mimeType })',
        );
      }
      return media;
    } catch (error) {
      return rethrow(error);
    }
  }
}
