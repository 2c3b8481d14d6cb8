import { cursorDeadline, type Cursor } from "../../core/harvest/cursor";
import { HarvestError } from "../../core/harvest/harvest.errors";
import type { HarvestedRecord } from "../../core/records/record.types";
import type { Clock } from "../../ports/Clock";
import type { FormatRegistry } from "../../ports/FormatRegistry";
import type { RecordStore } from "../../ports/RecordStore";
import type { SetHierarchyResolver } from "../../ports/SetHierarchyResolver";
import type { HarvestConfig } from "./harvest.config";
import { producePage } from "./pageProducer";
import { normalizeQuery, type SelectiveHarvestParams } from "./queryNormalizer";
import type { TokenCodec } from "./tokenCodec";

export type ParsedRequest = SelectiveHarvestParams & {
  resumptionToken?: string;
};

export type Page = {
  records: HarvestedRecord[];
  /** Absent when the harvest is complete. */
  resumptionToken?: string;
  expiresAt?: Date;
  /** Records delivered by earlier pages of this harvest. */
  cursor: number;
  complete: boolean;
};

export type HarvestResult = { ok: true; page: Page } | { ok: false; error: HarvestError };

export type HarvestOrchestratorDeps = {
  store: RecordStore;
  formats: FormatRegistry;
  sets: SetHierarchyResolver;
  clock: Clock;
  codec: TokenCodec;
  config: HarvestConfig;
};

export type HarvestOrchestrator = {
  produceNextPage(request: ParsedRequest): Promise<HarvestResult>;
};

const selectiveArguments: Array<keyof SelectiveHarvestParams> = ["metadataPrefix", "from", "until", "set"];

const resolveCursor = (request: ParsedRequest, deps: HarvestOrchestratorDeps): Cursor => {
  if (request.resumptionToken !== undefined) {
    const conflicting = selectiveArguments.filter((name) => request[name] !== undefined);
    if (conflicting.length > 0) {
      throw new HarvestError(
        "BadArgument",
        `resumptionToken is exclusive of other parameters (received ${conflicting.join(", ")})`
      );
    }
    return deps.codec.decode(request.resumptionToken);
  }

  return normalizeQuery(request, deps);
};

/**
 * Single entry point for the transport layer. Holds nothing between calls:
 * every page is fully determined by the request and the record store.
 */
export const createHarvestOrchestrator = (deps: HarvestOrchestratorDeps): HarvestOrchestrator => ({
  produceNextPage: async (request) => {
    try {
      const cursor = resolveCursor(request, deps);
      const produced = await producePage(cursor, {
        store: deps.store,
        sets: deps.sets,
        clock: deps.clock,
        deletedRecord: deps.config.deletedRecord,
        storeTimeoutMs: deps.config.storeTimeoutMs
      });

      const page: Page = {
        records: produced.records,
        cursor: cursor.delivered,
        complete: produced.next === undefined
      };
      if (produced.next) {
        page.resumptionToken = deps.codec.encode(produced.next);
        page.expiresAt = cursorDeadline(produced.next);
      }

      console.log(
        JSON.stringify({
          event: "harvest.page_served",
          metadataPrefix: cursor.metadataFormat,
          set: cursor.setFilter ?? null,
          records: page.records.length,
          cursor: page.cursor,
          complete: page.complete
        })
      );
      return { ok: true, page };
    } catch (error) {
      if (!(error instanceof HarvestError)) throw error;

      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "harvest.rejected", code: error.code, retryable: error.retryable }));
      return { ok: false, error };
    }
  }
});
