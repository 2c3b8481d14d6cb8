/**
 * Repository-wide deletion support, as advertised by Identify's `deletedRecord`.
 */
export type DeletedRecordPolicy = "no" | "transient" | "persistent";

export const deletedRecordPolicies: readonly DeletedRecordPolicy[] = ["no", "transient", "persistent"];

/**
 * A row returned by the record store. `metadata` holds the dissemination in the
 * requested format; it is absent when the record cannot disseminate that format
 * or has been deleted.
 */
export type StoredRecord = {
  identifier: string;
  lastModified: Date;
  setSpecs: readonly string[];
  deleted: boolean;
  metadata?: unknown;
};

export type HarvestedRecord = {
  identifier: string;
  lastModified: Date;
  setSpecs: readonly string[];
  deleted: boolean;
  metadata?: unknown;
};
