import type { Granularity } from "../../core/harvest/granularity";
import type { DeletedRecordPolicy } from "../../core/records/record.types";
import { deletedRecordPolicies } from "../../core/records/record.types";
import type { SetHierarchyMode } from "../../ports/SetHierarchyResolver";

export type HarvestConfig = {
  pageSize: number;
  tokenTtlMs: number;
  storeTimeoutMs: number;
  deletedRecord: DeletedRecordPolicy;
  granularity: Granularity;
  setHierarchy: SetHierarchyMode;
};

export type HarvestConfigInput = Partial<HarvestConfig>;

export const defaultHarvestConfig: HarvestConfig = {
  pageSize: 100,
  tokenTtlMs: 24 * 60 * 60 * 1000,
  storeTimeoutMs: 5000,
  deletedRecord: "persistent",
  granularity: "second",
  setHierarchy: "hierarchical"
};

/** Every allowed store timeout is shorter than every allowed token lifetime. */
export const harvestCaps = {
  pageSize: { min: 1, max: 1000 },
  tokenTtlMs: { min: 60 * 1000, max: 7 * 24 * 60 * 60 * 1000 },
  storeTimeoutMs: { min: 100, max: 30000 }
} as const;

export const granularities: readonly Granularity[] = ["day", "second"];
export const setHierarchyModes: readonly SetHierarchyMode[] = ["hierarchical", "flat", "none"];

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

const assertOneOf = <T extends string>(name: string, value: string, allowed: readonly T[]) => {
  if (!allowed.some((candidate) => candidate === value)) {
    throw new Error(`${name}=${value} must be one of ${allowed.join("|")}`);
  }
};

export const validateHarvestConfig = (config: HarvestConfig): HarvestConfig => {
  assertIntegerInRange("pageSize", config.pageSize, harvestCaps.pageSize.min, harvestCaps.pageSize.max);
  assertIntegerInRange("tokenTtlMs", config.tokenTtlMs, harvestCaps.tokenTtlMs.min, harvestCaps.tokenTtlMs.max);
  assertIntegerInRange(
    "storeTimeoutMs",
    config.storeTimeoutMs,
    harvestCaps.storeTimeoutMs.min,
    harvestCaps.storeTimeoutMs.max
  );
  assertOneOf("deletedRecord", config.deletedRecord, deletedRecordPolicies);
  assertOneOf("granularity", config.granularity, granularities);
  assertOneOf("setHierarchy", config.setHierarchy, setHierarchyModes);
  return config;
};

export const resolveHarvestConfig = (input: HarvestConfigInput = {}): HarvestConfig =>
  validateHarvestConfig({
    ...defaultHarvestConfig,
    ...input
  });
