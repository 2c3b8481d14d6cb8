import { createHarvestOrchestrator, type HarvestOrchestrator, type Page } from "../application/harvest/harvestOrchestrator";
import { harvestAll, type HarvestAllOptions } from "../application/harvest/harvestAll";
import type { SelectiveHarvestParams } from "../application/harvest/queryNormalizer";
import { createTokenCodec } from "../application/harvest/tokenCodec";
import { systemClock } from "../infrastructure/clock/systemClock";
import { StaticFormatRegistry } from "../infrastructure/formats/StaticFormatRegistry";
import { createStaticKeySource } from "../infrastructure/keys/staticKeySource";
import { MongoRecordStore } from "../infrastructure/mongo/MongoRecordStore";
import { createSetHierarchyResolver } from "../infrastructure/sets/setHierarchyResolver";
import { createServer } from "../server";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export type HarvestService = {
  orchestrator: HarvestOrchestrator;
  close(): Promise<void>;
};

export const createHarvestService = (env: Env, runtime: RuntimeConfig): HarvestService => {
  const store = new MongoRecordStore(env.MONGO_URI, env.MONGO_DB);
  const keys = createStaticKeySource(env);

  const orchestrator = createHarvestOrchestrator({
    store,
    formats: new StaticFormatRegistry(),
    sets: createSetHierarchyResolver(runtime.harvestConfig.setHierarchy),
    clock: systemClock,
    codec: createTokenCodec({ keys, clock: systemClock }),
    config: runtime.harvestConfig
  });

  return { orchestrator, close: () => store.close() };
};

export const runServer = async (): Promise<void> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const service = createHarvestService(env, runtime);

  const server = createServer({
    orchestrator: service.orchestrator,
    granularity: runtime.harvestConfig.granularity,
    baseUrl: env.OAI_BASE_URL,
    clock: systemClock
  });

  const shutdown = () => {
    server.close(() => {
      service.close().catch((err: unknown) => {
        console.error(JSON.stringify({ event: "server.close_failed", message: err instanceof Error ? err.message : String(err) }));
      });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await new Promise<void>((resolve) => server.listen(env.PORT, resolve));
  console.log(JSON.stringify({ event: "server.listening", port: env.PORT, baseUrl: env.OAI_BASE_URL }));
};

/**
 * Walks one complete harvest against the configured store, handing each page to `onPage`.
 */
export const runHarvest = async (
  params: SelectiveHarvestParams,
  onPage: (page: Page) => void,
  options: HarvestAllOptions = {}
): Promise<{ pages: number; records: number }> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const service = createHarvestService(env, runtime);

  let pages = 0;
  let records = 0;
  try {
    for await (const page of harvestAll(service.orchestrator, params, options)) {
      pages += 1;
      records += page.records.length;
      onPage(page);
    }
  } finally {
    await service.close();
  }

  return { pages, records };
};
