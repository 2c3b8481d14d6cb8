import {
  defaultHarvestConfig,
  granularities,
  harvestCaps,
  setHierarchyModes,
  type HarvestConfig,
  validateHarvestConfig
} from "../../application/harvest/harvest.config";
import { deletedRecordPolicies } from "../../core/records/record.types";

export type RuntimeConfig = {
  harvestConfig: HarvestConfig;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalEnum = <T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  allowed: readonly T[]
): T | undefined => {
  const raw = env[name]?.trim();
  if (raw == null || raw === "") return undefined;

  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new Error(`${name}=${raw} must be one of ${allowed.join("|")}`);
  }
  return match;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const harvestConfig = validateHarvestConfig({
    pageSize: parseOptionalIntInRange(env, "HARVEST_PAGE_SIZE", harvestCaps.pageSize) ?? defaultHarvestConfig.pageSize,
    tokenTtlMs:
      parseOptionalIntInRange(env, "HARVEST_TOKEN_TTL_MS", harvestCaps.tokenTtlMs) ?? defaultHarvestConfig.tokenTtlMs,
    storeTimeoutMs:
      parseOptionalIntInRange(env, "HARVEST_STORE_TIMEOUT_MS", harvestCaps.storeTimeoutMs) ??
      defaultHarvestConfig.storeTimeoutMs,
    deletedRecord:
      parseOptionalEnum(env, "HARVEST_DELETED_RECORD", deletedRecordPolicies) ?? defaultHarvestConfig.deletedRecord,
    granularity: parseOptionalEnum(env, "HARVEST_GRANULARITY", granularities) ?? defaultHarvestConfig.granularity,
    setHierarchy:
      parseOptionalEnum(env, "HARVEST_SET_HIERARCHY", setHierarchyModes) ?? defaultHarvestConfig.setHierarchy
  });

  return { harvestConfig };
};
