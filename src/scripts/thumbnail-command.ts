/**
 * Thumbnail command - assigns featured images to records that lack one, using
 * the images attached to each record.
 *
 * Records that end up without a featured image are flagged so later runs skip
 * them; records that offered several candidates are flagged for manual review.
 * Subclasses can override the protected query builders to change which records
 * are selected.
 */

import {
  FEATURED_IMAGE_META_KEY,
  type ContentStore,
  type PageSize,
  type RecordQuery,
} from '../lib/content-store.js';
import { DEFAULT_ATTACHMENT_LIMIT, DEFAULT_BATCH_SIZE, DEFAULT_POST_TYPE } from '../lib/config.js';
import { logger } from '../lib/logger.js';

/** Set on records that were processed and have no usable image */
export const META_KEY_POST_NO_THUMBNAIL = 'set-post-thumbs--no-thumbnail';

/** Comma-separated candidate IDs for records that had several images to choose from */
export const META_KEY_MULTIPLE_IMAGES = 'set-post-thumbs--multiple-images';

export type ShowMode = 'unset' | 'multiple';

export const SHOW_MODES: readonly ShowMode[] = ['unset', 'multiple'];

export function isShowMode(value: string): value is ShowMode {
  return SHOW_MODES.some(mode => mode === value);
}

export interface ThumbnailCommandOptions {
  /**
   * Attached images fetched per record. With the default of 1 a record can
   * never be flagged as having multiple images.
   */
  attachmentLimit?: number;
}

export interface SetOptions {
  postType?: string;
  /** Records to process, or 'all' */
  amount?: PageSize;
  /** Called after each record is visited */
  onProgress?: (done: number, total: number) => void;
}

export interface SetResult {
  /** Records selected for this batch */
  found: number;
  assigned: Array<{ recordId: number; mediaId: number }>;
  /** Records flagged as having no thumbnail */
  unset: number[];
  /** Records flagged as having multiple candidate images */
  multiple: number[];
}

export interface ShowOptions {
  postType?: string;
}

export interface CleanupOptions {
  /** Restrict cleanup to one content type; every type when omitted */
  postType?: string;
}

interface ProcessingQueryOptions {
  postType: string;
  perPage: PageSize;
  mode: ShowMode;
  /** Select records already flagged for the mode instead of unflagged ones */
  processed: boolean;
}

export class ThumbnailCommand {
  protected readonly attachmentLimit: number;

  constructor(protected readonly store: ContentStore, options: ThumbnailCommandOptions = {}) {
    this.attachmentLimit = options.attachmentLimit ?? DEFAULT_ATTACHMENT_LIMIT;
  }

  /**
   * Attempt to set featured images on a batch of unprocessed records.
   */
  async set(options: SetOptions = {}): Promise<SetResult> {
    const postType = options.postType ?? DEFAULT_POST_TYPE;
    const amount = options.amount ?? DEFAULT_BATCH_SIZE;

    const { ids } = await this.store.queryRecords(
      this.buildProcessingQuery({ postType, perPage: amount, mode: 'unset', processed: false }),
    );
    const result: SetResult = { found: ids.length, assigned: [], unset: [], multiple: [] };

    if (ids.length === 0) {
      logger.success('All post thumbnails have been processed.');
      return result;
    }

    logger.info(`Processing ${ids.length} posts...`);

    for (const [index, recordId] of ids.entries()) {
      const { mediaId, candidates } = await this.maybeSetFeaturedImage(recordId);

      if (candidates.length > 1) {
        result.multiple.push(recordId);
      }

      if (mediaId) {
        result.assigned.push({ recordId, mediaId });
      } else {
        await this.store.setMeta(recordId, META_KEY_POST_NO_THUMBNAIL, 'true');
        result.unset.push(recordId);
      }

      options.onProgress?.(index + 1, ids.length);
    }

    logger.success(
      `Processed ${ids.length} ${ids.length === 1 ? 'post' : 'posts'}: ` +
      `${result.assigned.length} featured images set, ${result.unset.length} without images.`,
    );
    return result;
  }

  /**
   * List processed records that have no thumbnail (unset) or that had several
   * candidate images (multiple).
   */
  async show(mode: ShowMode, options: ShowOptions = {}): Promise<number[]> {
    const postType = options.postType ?? DEFAULT_POST_TYPE;
    const { ids } = await this.store.queryRecords(
      this.buildProcessingQuery({ postType, perPage: 'all', mode, processed: true }),
    );

    if (mode === 'multiple') {
      if (ids.length === 0) {
        logger.success('No processed posts found containing multiple available options for featured images.');
      } else {
        logger.success('Located the following processed posts with multiple images:');
        logger.log(`Post IDs: ${ids.join(', ')}`);
      }
      return ids;
    }

    if (ids.length === 0) {
      logger.success('All processed posts have thumbnails, but there may still be additional posts to process.');
      return ids;
    }

    logger.success('Located processed posts which contain no thumbnails:');
    logger.log(`Post IDs: ${ids.join(', ')}`);
    return ids;
  }

  /**
   * Delete the metadata this command writes. Both keys are always removed together.
   * Resolves to the number of records cleaned.
   */
  async cleanup(options: CleanupOptions = {}): Promise<number> {
    const { ids } = await this.store.queryRecords(this.buildCommandMetaQuery(options.postType));
    const count = ids.length;

    if (count === 0) {
      logger.success('No posts found with set-post-thumbs meta. Exiting.');
      return 0;
    }

    for (const recordId of ids) {
      await this.store.deleteMeta(recordId, META_KEY_MULTIPLE_IMAGES);
      await this.store.deleteMeta(recordId, META_KEY_POST_NO_THUMBNAIL);
    }

    logger.success(`Deleted metadata from ${count} ${count === 1 ? 'post' : 'posts'}.`);
    return count;
  }

  /**
   * Query for records by featured-image state and processing flag.
   *
   * 'unset' looks at records without a featured image and the no-thumbnail flag;
   * 'multiple' at records with a featured image and the multiple-images flag.
   */
  protected buildProcessingQuery(options: ProcessingQueryOptions): RecordQuery {
    const multiple = options.mode === 'multiple';

    return {
      type: options.postType,
      perPage: options.perPage,
      metaQuery: {
        relation: 'AND',
        clauses: [
          { key: FEATURED_IMAGE_META_KEY, compare: multiple ? 'EXISTS' : 'NOT EXISTS' },
          {
            key: multiple ? META_KEY_MULTIPLE_IMAGES : META_KEY_POST_NO_THUMBNAIL,
            compare: options.processed ? 'EXISTS' : 'NOT EXISTS',
          },
        ],
      },
    };
  }

  /**
   * Query for every record carrying either of this command's metadata keys.
   */
  protected buildCommandMetaQuery(postType?: string): RecordQuery {
    return {
      type: postType,
      perPage: 'all',
      metaQuery: {
        relation: 'OR',
        clauses: [
          { key: META_KEY_POST_NO_THUMBNAIL, compare: 'EXISTS' },
          { key: META_KEY_MULTIPLE_IMAGES, compare: 'EXISTS' },
        ],
      },
    };
  }

  /**
   * Set the record's featured image from its attached images.
   *
   * When several candidates are fetched, all of them are recorded for review and
   * the last one in host order is assigned. Resolves to the assigned media ID, or
   * 0 when there was nothing to assign or the host refused the candidate.
   */
  protected async maybeSetFeaturedImage(recordId: number): Promise<{ mediaId: number; candidates: number[] }> {
    const attached = await this.store.getAttachedMedia({
      parentId: recordId,
      mimeType: 'image',
      limit: this.attachmentLimit,
    });

    const candidates = attached.map(item => item.id);
    const last = candidates[candidates.length - 1];
    if (last === undefined) {
      logger.verbose(`[SET] Post ${recordId}: no attached images`);
      return { mediaId: 0, candidates };
    }

    if (candidates.length > 1) {
      await this.store.setMeta(recordId, META_KEY_MULTIPLE_IMAGES, candidates.join(','));
    }

    const mediaId = await this.store.setFeaturedImage(recordId, last);
    logger.verbose(`[SET] Post ${recordId}: candidates [${candidates.join(', ')}], assigned ${mediaId || 'none'}`);
    return { mediaId, candidates };
  }
}
