import {
  compareWatermarks,
  deriveSuccessor,
  isCursorExpired,
  watermarkOf,
  type Cursor,
  type Watermark
} from "../../core/harvest/cursor";
import { exclusiveUpperBound } from "../../core/harvest/granularity";
import { badResumptionToken, HarvestError } from "../../core/harvest/harvest.errors";
import type { DeletedRecordPolicy, HarvestedRecord, StoredRecord } from "../../core/records/record.types";
import type { Clock } from "../../ports/Clock";
import type { RecordRangeQuery, RecordStore } from "../../ports/RecordStore";
import type { SetHierarchyResolver } from "../../ports/SetHierarchyResolver";
import { OperationTimeoutError, withTimeout } from "../../shared/timeout/withTimeout";
import { wrapStoreFailure } from "./harvest.error-handler";

export type PageProducerDeps = {
  store: RecordStore;
  sets: SetHierarchyResolver;
  clock: Clock;
  deletedRecord: DeletedRecordPolicy;
  storeTimeoutMs: number;
};

export type ProducedPage = {
  cursor: Cursor;
  records: HarvestedRecord[];
  /** Absent once the harvest is complete. */
  next?: Cursor;
};

type EligibilityContext = {
  cursor: Cursor;
  untilExclusive?: Date;
  includeDeleted: boolean;
  sets: SetHierarchyResolver;
};

const buildRangeQuery = (
  cursor: Cursor,
  after: Watermark | undefined,
  limit: number,
  context: EligibilityContext
): RecordRangeQuery => {
  const query: RecordRangeQuery = {
    metadataFormat: cursor.metadataFormat,
    includeDeleted: context.includeDeleted,
    limit
  };
  if (cursor.fromInclusive) query.fromInclusive = cursor.fromInclusive;
  if (context.untilExclusive) query.untilExclusive = context.untilExclusive;
  if (after) query.after = after;
  if (cursor.setFilter != null) {
    query.set = { spec: cursor.setFilter, includeDescendants: context.sets.mode === "hierarchical" };
  }
  return query;
};

const isEligible = (record: StoredRecord, context: EligibilityContext): boolean => {
  const { cursor } = context;
  const at = record.lastModified.getTime();
  if (cursor.fromInclusive && at < cursor.fromInclusive.getTime()) return false;
  if (context.untilExclusive && at >= context.untilExclusive.getTime()) return false;
  if (cursor.setFilter != null && !context.sets.matches(cursor.setFilter, record.setSpecs)) return false;

  if (record.deleted) return context.includeDeleted;
  return record.metadata !== undefined;
};

const assertAscendingAfter = (rows: StoredRecord[], after: Watermark | undefined) => {
  let previous = after;
  for (const row of rows) {
    const current = watermarkOf(row);
    if (previous && compareWatermarks(current, previous) <= 0) {
      throw new HarvestError(
        "StoreUnavailable",
        `Record store returned ${row.identifier} outside (lastModified, identifier) order`
      );
    }
    previous = current;
  }
};

const toHarvestedRecord = (record: StoredRecord): HarvestedRecord => {
  const harvested: HarvestedRecord = {
    identifier: record.identifier,
    lastModified: record.lastModified,
    setSpecs: record.setSpecs,
    deleted: record.deleted
  };
  if (!record.deleted) harvested.metadata = record.metadata;
  return harvested;
};

const STORE_LABEL = "Record store query";

/**
 * Collects up to `wanted` eligible rows after the cursor's watermark. Rows the
 * eligibility check rejects are skipped and the scan resumes after the last
 * scanned row. Every round shares one deadline.
 */
const scanEligible = async (
  cursor: Cursor,
  context: EligibilityContext,
  deps: PageProducerDeps,
  wanted: number
): Promise<StoredRecord[]> => {
  const deadline = Date.now() + deps.storeTimeoutMs;
  const eligible: StoredRecord[] = [];
  let scanAfter = cursor.watermark;
  let remainingMs = deps.storeTimeoutMs;

  while (eligible.length < wanted) {
    if (remainingMs <= 0) throw new OperationTimeoutError(STORE_LABEL, deps.storeTimeoutMs);

    const rows = await deps.store.findRange(buildRangeQuery(cursor, scanAfter, wanted, context), {
      timeoutMs: remainingMs
    });

    assertAscendingAfter(rows, scanAfter);
    for (const row of rows) {
      if (eligible.length === wanted) break;
      if (isEligible(row, context)) eligible.push(row);
    }

    const lastRow = rows[rows.length - 1];
    if (rows.length < wanted || lastRow === undefined) break;
    scanAfter = watermarkOf(lastRow);
    remainingMs = deadline - Date.now();
  }

  return eligible;
};

/**
 * Produces the page a cursor points at, fetching one row beyond `pageSize` to
 * learn whether another page follows.
 */
export const producePage = async (cursor: Cursor, deps: PageProducerDeps): Promise<ProducedPage> => {
  const now = deps.clock.now();
  if (isCursorExpired(cursor, now)) {
    throw badResumptionToken();
  }

  const context: EligibilityContext = {
    cursor,
    untilExclusive: cursor.untilInclusive ? exclusiveUpperBound(cursor.untilInclusive, cursor.granularity) : undefined,
    includeDeleted: deps.deletedRecord !== "no",
    sets: deps.sets
  };
  let eligible: StoredRecord[];
  try {
    eligible = await withTimeout(
      scanEligible(cursor, context, deps, cursor.pageSize + 1),
      deps.storeTimeoutMs,
      STORE_LABEL
    );
  } catch (error) {
    throw wrapStoreFailure(error, {
      metadataFormat: cursor.metadataFormat,
      page: cursor.watermark ? "continuation" : "first"
    });
  }

  if (eligible.length === 0) {
    if (!cursor.watermark) {
      throw new HarvestError("NoRecordsMatch", "The combination of the given arguments results in an empty list");
    }
    return { cursor, records: [] };
  }

  const emitted = eligible.slice(0, cursor.pageSize);
  const records = emitted.map(toHarvestedRecord);
  const lastEmitted = emitted[emitted.length - 1];
  if (eligible.length <= cursor.pageSize || lastEmitted === undefined) {
    return { cursor, records };
  }

  return {
    cursor,
    records,
    next: deriveSuccessor(cursor, watermarkOf(lastEmitted), { emitted: emitted.length, issuedAt: now })
  };
};
