import { HarvestError } from "../../core/harvest/harvest.errors";
import { retry, type RetryOptions } from "../../shared/retry/retry";
import type { HarvestOrchestrator, Page, ParsedRequest } from "./harvestOrchestrator";
import type { SelectiveHarvestParams } from "./queryNormalizer";

export type HarvestAllOptions = {
  retry?: Partial<Omit<RetryOptions, "shouldRetry">>;
  maxPages?: number;
};

const defaultRetry = {
  retries: 5,
  minDelayMs: 250,
  maxDelayMs: 5000
};

const isRetryable = (err: unknown): boolean => err instanceof HarvestError && err.retryable;

/**
 * Harvester side of the protocol: walks every page of one harvest by replaying
 * each returned token. A `StoreUnavailable` page is re-requested with the same
 * token; any other error ends the walk.
 */
export async function* harvestAll(
  orchestrator: HarvestOrchestrator,
  params: SelectiveHarvestParams,
  options: HarvestAllOptions = {}
): AsyncGenerator<Page, void, undefined> {
  let request: ParsedRequest = params;
  let pages = 0;

  while (options.maxPages === undefined || pages < options.maxPages) {
    const current = request;
    const page = await retry(
      async () => {
        const result = await orchestrator.produceNextPage(current);
        if (!result.ok) throw result.error;
        return result.page;
      },
      {
        ...defaultRetry,
        ...options.retry,
        shouldRetry: isRetryable,
        onRetry: (ctx) => {
          // eslint-disable-next-line no-console
          console.warn(
            JSON.stringify({
              event: "harvest.retry",
              page: pages + 1,
              attempt: ctx.attempt,
              maxAttempts: ctx.maxAttempts,
              delayMs: ctx.delayMs
            })
          );
          options.retry?.onRetry?.(ctx);
        },
        onGiveUp: (ctx) => {
          if (isRetryable(ctx.error)) {
            // eslint-disable-next-line no-console
            console.warn(
              JSON.stringify({ event: "harvest.give_up", page: pages + 1, attempt: ctx.attempt, maxAttempts: ctx.maxAttempts })
            );
          }
          options.retry?.onGiveUp?.(ctx);
        }
      }
    );

    pages += 1;
    yield page;

    if (page.resumptionToken === undefined) return;
    request = { resumptionToken: page.resumptionToken };
  }
}
