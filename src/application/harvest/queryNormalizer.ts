import { createCursor, type Cursor } from "../../core/harvest/cursor";
import { InvalidDatestampError, parseUtcDatestamp, type Granularity, type UtcDatestamp } from "../../core/harvest/granularity";
import { HarvestError } from "../../core/harvest/harvest.errors";
import { isValidMetadataPrefix } from "../../core/formats/formatDescriptor";
import { isValidSetSpec } from "../../core/records/setSpec";
import type { Clock } from "../../ports/Clock";
import type { FormatRegistry } from "../../ports/FormatRegistry";
import type { SetHierarchyResolver } from "../../ports/SetHierarchyResolver";
import type { HarvestConfig } from "./harvest.config";

export type SelectiveHarvestParams = {
  metadataPrefix?: string;
  from?: string;
  until?: string;
  set?: string;
};

export type QueryNormalizerDeps = {
  formats: FormatRegistry;
  sets: SetHierarchyResolver;
  clock: Clock;
  config: Pick<HarvestConfig, "pageSize" | "tokenTtlMs" | "granularity">;
};

const parseBound = (name: "from" | "until", raw: string, repositoryGranularity: Granularity): UtcDatestamp => {
  let parsed: UtcDatestamp;
  try {
    parsed = parseUtcDatestamp(raw);
  } catch (error) {
    if (error instanceof InvalidDatestampError) {
      throw new HarvestError("InvalidDateRange", `Invalid ${name} argument: ${error.message}`, { cause: error });
    }
    throw error;
  }

  if (parsed.granularity === "second" && repositoryGranularity === "day") {
    throw new HarvestError(
      "InvalidDateRange",
      `Invalid ${name} argument: the repository only supports YYYY-MM-DD granularity`
    );
  }
  return parsed;
};

const resolveMetadataFormat = (raw: string | undefined, formats: FormatRegistry): string => {
  if (raw == null || raw.trim() === "") {
    throw new HarvestError("BadArgument", "metadataPrefix is required");
  }
  if (!isValidMetadataPrefix(raw)) {
    throw new HarvestError("BadArgument", `metadataPrefix "${raw}" is not syntactically valid`);
  }
  if (!formats.exists(raw)) {
    throw new HarvestError("InvalidFormat", `The metadata format "${raw}" is not supported by this repository`);
  }
  return raw;
};

const resolveSetFilter = (raw: string | undefined, sets: SetHierarchyResolver): string | undefined => {
  if (raw == null) return undefined;
  if (!isValidSetSpec(raw)) {
    throw new HarvestError("BadArgument", `set "${raw}" is not a valid setSpec`);
  }
  if (!sets.supportsSets()) {
    throw new HarvestError("NoSetHierarchy", "This repository does not support sets");
  }
  return raw;
};

/**
 * Turns fresh selective-harvesting arguments into the cursor of a harvest's first page.
 * Emptiness is not checked here; only the first page query can discover it.
 */
export const normalizeQuery = (params: SelectiveHarvestParams, deps: QueryNormalizerDeps): Cursor => {
  const { config } = deps;
  const metadataFormat = resolveMetadataFormat(params.metadataPrefix, deps.formats);
  const setFilter = resolveSetFilter(params.set, deps.sets);

  const from = params.from != null ? parseBound("from", params.from, config.granularity) : undefined;
  const until = params.until != null ? parseBound("until", params.until, config.granularity) : undefined;

  if (from && until && from.granularity !== until.granularity) {
    throw new HarvestError("InvalidDateRange", "from and until must have the same granularity");
  }
  if (from && until && from.instant > until.instant) {
    throw new HarvestError("InvalidDateRange", "from must not be later than until");
  }

  return createCursor({
    metadataFormat,
    setFilter,
    granularity: from?.granularity ?? until?.granularity ?? config.granularity,
    fromInclusive: from?.instant,
    untilInclusive: until?.instant,
    pageSize: config.pageSize,
    delivered: 0,
    issuedAt: deps.clock.now(),
    expiresAfterMs: config.tokenTtlMs
  });
};
