import { MongoClient, type Collection, type Filter } from "mongodb";
import type { StoredRecord } from "../../core/records/record.types";
import type { RecordQueryOptions, RecordRangeQuery, RecordStore } from "../../ports/RecordStore";
import { mongoIndexes } from "./mongo.indexes";

/**
 * One document per record; `metadata` maps a metadata prefix to the record's
 * dissemination in that format.
 */
export type RecordDocument = {
  _id: string;
  identifier: string;
  lastModified: Date;
  setSpecs: string[];
  deleted: boolean;
  metadata?: Record<string, unknown>;
};

export const recordSort = { lastModified: 1, identifier: 1 } as const;

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Keyset seek over `(lastModified, identifier)` combined with the harvest filters.
 */
export const buildRangeFilter = (query: RecordRangeQuery): Filter<RecordDocument> => {
  const clauses: Filter<RecordDocument>[] = [];

  const lastModifiedBounds: { $gte?: Date; $lt?: Date } = {};
  if (query.fromInclusive) lastModifiedBounds.$gte = query.fromInclusive;
  if (query.untilExclusive) lastModifiedBounds.$lt = query.untilExclusive;
  if (Object.keys(lastModifiedBounds).length > 0) {
    clauses.push({ lastModified: lastModifiedBounds });
  }

  if (query.after) {
    clauses.push({
      $or: [
        { lastModified: { $gt: query.after.lastModified } },
        { lastModified: query.after.lastModified, identifier: { $gt: query.after.identifier } }
      ]
    });
  }

  if (query.set) {
    clauses.push(
      query.set.includeDescendants
        ? { setSpecs: { $regex: `^${escapeRegex(query.set.spec)}(:|$)` } }
        : { setSpecs: query.set.spec }
    );
  }

  const formatPath = `metadata.${query.metadataFormat}`;
  if (query.includeDeleted) {
    clauses.push({ $or: [{ deleted: true }, { [formatPath]: { $exists: true } }] });
  } else {
    clauses.push({ deleted: { $ne: true } }, { [formatPath]: { $exists: true } });
  }

  return clauses.length === 1 && clauses[0] ? clauses[0] : { $and: clauses };
};

export const toStoredRecord = (doc: RecordDocument, metadataFormat: string): StoredRecord => {
  const record: StoredRecord = {
    identifier: doc.identifier,
    lastModified: doc.lastModified,
    setSpecs: doc.setSpecs ?? [],
    deleted: doc.deleted === true
  };
  const metadata = doc.metadata?.[metadataFormat];
  if (!record.deleted && metadata !== undefined) record.metadata = metadata;
  return record;
};

export class MongoRecordStore implements RecordStore {
  private client?: MongoClient;
  private connecting?: Promise<Collection<RecordDocument>>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "oai",
    private readonly collectionName = "records"
  ) {}

  private getCollection(): Promise<Collection<RecordDocument>> {
    // Concurrent first requests share one client.
    this.connecting ??= this.connect().catch(async (error: unknown) => {
      this.connecting = undefined;
      const client = this.client;
      this.client = undefined;
      await client?.close();
      throw error;
    });
    return this.connecting;
  }

  private async connect(): Promise<Collection<RecordDocument>> {
    const client = new MongoClient(this.mongoUri);
    this.client = client;
    await client.connect();

    const col = client.db(this.dbName).collection<RecordDocument>(this.collectionName);

    // The compound index serves both the keyset seek and the sort.
    for (const idx of mongoIndexes.recordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    return col;
  }

  async findRange(query: RecordRangeQuery, options: RecordQueryOptions): Promise<StoredRecord[]> {
    if (query.limit < 1) return [];

    const col = await this.getCollection();
    const docs = await col
      .find(buildRangeFilter(query), {
        projection: {
          identifier: 1,
          lastModified: 1,
          setSpecs: 1,
          deleted: 1,
          [`metadata.${query.metadataFormat}`]: 1
        }
      })
      .sort(recordSort)
      .limit(query.limit)
      .maxTimeMS(options.timeoutMs)
      .toArray();

    return docs.map((doc) => toStoredRecord(doc, query.metadataFormat));
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.connecting = undefined;
    await client?.close();
  }
}
