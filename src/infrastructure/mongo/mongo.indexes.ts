import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan for the record collection:
 * - compound { lastModified, identifier }: keyset seek + harvest sort order
 * - unique { identifier }
 * - { setSpecs }: set filters (multikey)
 */
export const mongoIndexes: {
  recordCollection: Array<{ keys: IndexSpecification; options: CreateIndexesOptions }>;
} = {
  recordCollection: [
    { keys: { lastModified: 1, identifier: 1 }, options: { name: "harvest_order" } },
    { keys: { identifier: 1 }, options: { unique: true } },
    { keys: { setSpecs: 1 }, options: {} }
  ]
};
