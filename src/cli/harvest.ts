#!/usr/bin/env node
import { parseArgs } from "util";
import type { SelectiveHarvestParams } from "../application/harvest/queryNormalizer";
import { runHarvest } from "../composition/root";
import { formatDatestamp } from "../core/harvest/granularity";

type CliErrorEnvelope = {
  event: "harvest.cli_failed";
  name: string;
  message: string;
  code?: string;
  retryable?: boolean;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const parseHarvestArgs = (argv: string[]): SelectiveHarvestParams => {
  const { values } = parseArgs({
    args: argv,
    options: {
      metadataPrefix: { type: "string", short: "m" },
      from: { type: "string" },
      until: { type: "string" },
      set: { type: "string", short: "s" }
    },
    strict: true,
    allowPositionals: false
  });

  const params: SelectiveHarvestParams = {};
  if (values.metadataPrefix !== undefined) params.metadataPrefix = values.metadataPrefix;
  if (values.from !== undefined) params.from = values.from;
  if (values.until !== undefined) params.until = values.until;
  if (values.set !== undefined) params.set = values.set;
  return params;
};

/**
 * Only the error's name, message and code reach the log; causes can carry store internals.
 */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "harvest.cli_failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }
  if (typeof errorRecord.retryable === "boolean") {
    envelope.retryable = errorRecord.retryable;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeHarvestCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const params = parseHarvestArgs(argv);
    const summary = await runHarvest(params, (page) => {
      for (const record of page.records) {
        process.stdout.write(
          `${JSON.stringify({
            identifier: record.identifier,
            datestamp: formatDatestamp(record.lastModified, "second"),
            setSpec: record.setSpecs,
            deleted: record.deleted,
            metadata: record.metadata ?? null
          })}\n`
        );
      }
    });
    console.log(JSON.stringify({ event: "harvest.completed", ...summary }));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeHarvestCli();
}
