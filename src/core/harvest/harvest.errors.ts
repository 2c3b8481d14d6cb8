export type HarvestErrorCode =
  | "BadArgument"
  | "InvalidFormat"
  | "InvalidDateRange"
  | "NoSetHierarchy"
  | "BadResumptionToken"
  | "NoRecordsMatch"
  | "StoreUnavailable";

/**
 * Expired, forged and malformed tokens all surface with this exact message.
 */
export const BAD_RESUMPTION_TOKEN_MESSAGE = "The value of the resumptionToken argument is invalid or expired";

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HarvestError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Only infrastructure failures may be retried, and only by re-issuing the identical request. */
  get retryable(): boolean {
    return this.code === "StoreUnavailable";
  }
}

export const badResumptionToken = (cause?: unknown): HarvestError =>
  new HarvestError("BadResumptionToken", BAD_RESUMPTION_TOKEN_MESSAGE, { cause });
