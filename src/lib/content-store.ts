/**
 * Content Store - the host platform's record, metadata and media services.
 *
 * The thumbnail command only ever talks to these interfaces, so the host can be
 * a remote content API (see http-content-store.ts) or an in-process store
 * (see memory-content-store.ts).
 */

/** Metadata key under which the host keeps a record's featured image ID */
export const FEATURED_IMAGE_META_KEY = '_thumbnail_id';

export type MetaCompare = 'EXISTS' | 'NOT EXISTS';

export interface MetaClause {
  key: string;
  compare: MetaCompare;
}

export interface MetaQuery {
  relation: 'AND' | 'OR';
  clauses: MetaClause[];
}

/** Page size for record queries; 'all' means unbounded */
export type PageSize = number | 'all';

export interface RecordQuery {
  /** Content type to match; undefined matches every type */
  type?: string;
  perPage: PageSize;
  metaQuery?: MetaQuery;
}

export interface RecordQueryResult {
  /** Matching record IDs, at most perPage of them, in host order */
  ids: number[];
  /** Total number of matching records, regardless of perPage */
  total: number;
}

export interface AttachedMedia {
  id: number;
  parentId: number;
  mimeType: string;
}

export interface AttachmentQuery {
  parentId: number;
  /** 'image' matches any image/* type; a full MIME type matches exactly */
  mimeType: string;
  /** Maximum number of results; -1 for no limit */
  limit: number;
}

export interface RecordQueryService {
  queryRecords(query: RecordQuery): Promise<RecordQueryResult>;
}

export interface MetadataStore {
  getMeta(recordId: number, key: string): Promise<string | null>;
  setMeta(recordId: number, key: string, value: string): Promise<void>;
  /** Resolves to false when there was nothing to delete */
  deleteMeta(recordId: number, key: string): Promise<boolean>;
}

export interface FeaturedImageService {
  /**
   * Associate a media item with a record as its featured image.
   * Resolves to the assigned media ID, or 0 when the host refused it.
   */
  setFeaturedImage(recordId: number, mediaId: number): Promise<number>;
}

export interface AttachmentService {
  getAttachedMedia(query: AttachmentQuery): Promise<AttachedMedia[]>;
}

export interface ContentStore
  extends RecordQueryService, MetadataStore, FeaturedImageService, AttachmentService {}

/**
 * Check a MIME type against an attachment filter.
 * A bare top-level type ("image") matches all of its subtypes.
 */
export function matchesMimeType(mimeType: string, filter: string): boolean {
  if (filter.includes('/')) {
    return mimeType === filter;
  }
  return mimeType.startsWith(`${filter}/`);
}
