import type { Watermark } from "../core/harvest/cursor";
import type { StoredRecord } from "../core/records/record.types";

export type SetFilterQuery = {
  spec: string;
  includeDescendants: boolean;
};

/**
 * Ordered range query over `(lastModified, identifier)`.
 * Implementations return at most `limit` rows, ascending, each strictly after `after`.
 */
export type RecordRangeQuery = {
  metadataFormat: string;
  fromInclusive?: Date;
  untilExclusive?: Date;
  after?: Watermark;
  set?: SetFilterQuery;
  includeDeleted: boolean;
  limit: number;
};

export type RecordQueryOptions = {
  timeoutMs: number;
};

export interface RecordStore {
  findRange(query: RecordRangeQuery, options: RecordQueryOptions): Promise<StoredRecord[]>;
}
