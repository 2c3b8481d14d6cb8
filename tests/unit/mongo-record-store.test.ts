import {
  buildRangeFilter,
  MongoRecordStore,
  recordSort,
  toStoredRecord,
  type RecordDocument
} from "../../src/infrastructure/mongo/MongoRecordStore";
import { mongoIndexes } from "../../src/infrastructure/mongo/mongo.indexes";
import type { RecordRangeQuery } from "../../src/ports/RecordStore";

const mockMongo = {
  connects: 0,
  closes: 0,
  failNextConnect: false,
  createIndex: jest.fn(),
  find: jest.fn()
};

jest.mock("mongodb", () => ({
  ...jest.requireActual("mongodb"),
  MongoClient: class {
    async connect() {
      mockMongo.connects += 1;
      await Promise.resolve();
      if (mockMongo.failNextConnect) {
        mockMongo.failNextConnect = false;
        throw new Error("connect ECONNREFUSED");
      }
      return this;
    }

    db() {
      return { collection: () => ({ createIndex: mockMongo.createIndex, find: mockMongo.find }) };
    }

    async close() {
      mockMongo.closes += 1;
    }
  }
}));

const at = (iso: string) => new Date(iso);

const stubCursor = (docs: RecordDocument[]) => {
  const cursor = {
    sort: jest.fn(),
    limit: jest.fn(),
    maxTimeMS: jest.fn(),
    toArray: jest.fn().mockResolvedValue(docs)
  };
  cursor.sort.mockReturnValue(cursor);
  cursor.limit.mockReturnValue(cursor);
  cursor.maxTimeMS.mockReturnValue(cursor);
  return cursor;
};

describe("buildRangeFilter", () => {
  it("only constrains format availability for an unbounded first page", () => {
    expect(buildRangeFilter({ metadataFormat: "oai_dc", includeDeleted: true, limit: 11 })).toEqual({
      $or: [{ deleted: true }, { "metadata.oai_dc": { $exists: true } }]
    });
  });

  it("combines date bounds, the keyset seek, a set subtree and live records", () => {
    const query: RecordRangeQuery = {
      metadataFormat: "marc21",
      fromInclusive: at("2024-01-01T00:00:00Z"),
      untilExclusive: at("2024-01-02T00:00:00Z"),
      after: { lastModified: at("2024-01-01T10:00:00Z"), identifier: "oai:x:7" },
      set: { spec: "math.ml", includeDescendants: true },
      includeDeleted: false,
      limit: 101
    };

    expect(buildRangeFilter(query)).toEqual({
      $and: [
        { lastModified: { $gte: at("2024-01-01T00:00:00Z"), $lt: at("2024-01-02T00:00:00Z") } },
        {
          $or: [
            { lastModified: { $gt: at("2024-01-01T10:00:00Z") } },
            { lastModified: at("2024-01-01T10:00:00Z"), identifier: { $gt: "oai:x:7" } }
          ]
        },
        { setSpecs: { $regex: "^math\\.ml(:|$)" } },
        { deleted: { $ne: true } },
        { "metadata.marc21": { $exists: true } }
      ]
    });
  });

  it("matches a flat set exactly", () => {
    expect(
      buildRangeFilter({
        metadataFormat: "oai_dc",
        set: { spec: "physics", includeDescendants: false },
        includeDeleted: true,
        limit: 5
      })
    ).toEqual({
      $and: [{ setSpecs: "physics" }, { $or: [{ deleted: true }, { "metadata.oai_dc": { $exists: true } }] }]
    });
  });

  it("keeps the seek index first in the sort", () => {
    expect(recordSort).toEqual({ lastModified: 1, identifier: 1 });
    expect(mongoIndexes.recordCollection[0]?.keys).toEqual(recordSort);
  });
});

describe("toStoredRecord", () => {
  const doc: RecordDocument = {
    _id: "oai:x:1",
    identifier: "oai:x:1",
    lastModified: at("2024-02-01T00:00:00Z"),
    setSpecs: ["physics"],
    deleted: false,
    metadata: { oai_dc: { title: "Waves" }, marc21: { leader: "00000" } }
  };

  it("projects the requested format only", () => {
    expect(toStoredRecord(doc, "oai_dc")).toEqual({
      identifier: "oai:x:1",
      lastModified: at("2024-02-01T00:00:00Z"),
      setSpecs: ["physics"],
      deleted: false,
      metadata: { title: "Waves" }
    });
  });

  it("leaves metadata off records that lack the format or are deleted", () => {
    expect(toStoredRecord(doc, "mods")).not.toHaveProperty("metadata");
    expect(toStoredRecord({ ...doc, deleted: true }, "oai_dc")).toEqual({
      identifier: "oai:x:1",
      lastModified: at("2024-02-01T00:00:00Z"),
      setSpecs: ["physics"],
      deleted: true
    });
  });
});

describe("MongoRecordStore", () => {
  it("returns early for a non-positive limit", async () => {
    const store = new MongoRecordStore("mongodb://localhost:27017/oai");
    const getCollection = jest.fn();
    (store as unknown as { getCollection: typeof getCollection }).getCollection = getCollection;

    await expect(store.findRange({ metadataFormat: "oai_dc", includeDeleted: true, limit: 0 }, { timeoutMs: 100 })).resolves.toEqual([]);
    expect(getCollection).not.toHaveBeenCalled();
  });

  describe("connection", () => {
    const query: RecordRangeQuery = { metadataFormat: "oai_dc", includeDeleted: true, limit: 3 };

    beforeEach(() => {
      mockMongo.connects = 0;
      mockMongo.closes = 0;
      mockMongo.failNextConnect = false;
      mockMongo.createIndex.mockReset().mockResolvedValue("idx");
      mockMongo.find.mockReset().mockImplementation(() => stubCursor([]));
    });

    it("shares one client between concurrent first queries", async () => {
      const store = new MongoRecordStore("mongodb://localhost:27017/oai");

      await Promise.all([
        store.findRange(query, { timeoutMs: 100 }),
        store.findRange(query, { timeoutMs: 100 }),
        store.findRange(query, { timeoutMs: 100 })
      ]);
      await store.close();

      expect(mockMongo.connects).toBe(1);
      expect(mockMongo.createIndex).toHaveBeenCalledTimes(mongoIndexes.recordCollection.length);
      expect(mockMongo.find).toHaveBeenCalledTimes(3);
      expect(mockMongo.closes).toBe(1);
    });

    it("reuses the connected collection for later queries", async () => {
      const store = new MongoRecordStore("mongodb://localhost:27017/oai");

      await store.findRange(query, { timeoutMs: 100 });
      await store.findRange(query, { timeoutMs: 100 });

      expect(mockMongo.connects).toBe(1);
    });

    it("closes a client that failed to connect and connects afresh on the next query", async () => {
      const store = new MongoRecordStore("mongodb://localhost:27017/oai");
      mockMongo.failNextConnect = true;

      await expect(store.findRange(query, { timeoutMs: 100 })).rejects.toThrow("connect ECONNREFUSED");
      expect(mockMongo.closes).toBe(1);

      await expect(store.findRange(query, { timeoutMs: 100 })).resolves.toEqual([]);
      await store.close();

      expect(mockMongo.connects).toBe(2);
      expect(mockMongo.closes).toBe(2);
    });

    it("connects again after close", async () => {
      const store = new MongoRecordStore("mongodb://localhost:27017/oai");

      await store.findRange(query, { timeoutMs: 100 });
      await store.close();
      await store.findRange(query, { timeoutMs: 100 });

      expect(mockMongo.connects).toBe(2);
    });
  });

  it("runs a sorted, limited, time-bounded range query", async () => {
    const store = new MongoRecordStore("mongodb://localhost:27017/oai");
    const cursor = stubCursor([
      {
        _id: "oai:x:2",
        identifier: "oai:x:2",
        lastModified: at("2024-02-02T00:00:00Z"),
        setSpecs: [],
        deleted: false,
        metadata: { oai_dc: { title: "Second" } }
      }
    ]);
    const find = jest.fn().mockReturnValue(cursor);
    (store as unknown as { getCollection: () => Promise<{ find: typeof find }> }).getCollection = async () => ({ find });

    const query: RecordRangeQuery = { metadataFormat: "oai_dc", includeDeleted: true, limit: 3 };
    const rows = await store.findRange(query, { timeoutMs: 750 });

    expect(find).toHaveBeenCalledWith(buildRangeFilter(query), {
      projection: { identifier: 1, lastModified: 1, setSpecs: 1, deleted: 1, "metadata.oai_dc": 1 }
    });
    expect(cursor.sort).toHaveBeenCalledWith(recordSort);
    expect(cursor.limit).toHaveBeenCalledWith(3);
    expect(cursor.maxTimeMS).toHaveBeenCalledWith(750);
    expect(rows).toEqual([
      {
        identifier: "oai:x:2",
        lastModified: at("2024-02-02T00:00:00Z"),
        setSpecs: [],
        deleted: false,
        metadata: { title: "Second" }
      }
    ]);
  });

  it("closes without ever having connected", async () => {
    await expect(new MongoRecordStore("mongodb://localhost:27017/oai").close()).resolves.toBeUndefined();
  });
});
