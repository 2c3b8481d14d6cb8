export type RetryOptions = {
  retries: number;          // extra attempts after the first one
  minDelayMs: number;       // base delay for exponential backoff
  maxDelayMs: number;       // cap applied before jitter
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const backoffDelayMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const backoff = Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const random = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * ratio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleep = defaultSleep } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err)) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = backoffDelayMs(attempt, opts);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
