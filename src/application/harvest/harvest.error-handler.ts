import { HarvestError, type HarvestErrorCode } from "../../core/harvest/harvest.errors";

export type OaiErrorCode =
  | "badArgument"
  | "badResumptionToken"
  | "badVerb"
  | "cannotDisseminateFormat"
  | "idDoesNotExist"
  | "noRecordsMatch"
  | "noMetadataFormats"
  | "noSetHierarchy";

export type ProtocolError = {
  status: number;
  code: OaiErrorCode | "serviceUnavailable";
  message: string;
  retryAfterSeconds?: number;
};

const protocolCodes: Record<Exclude<HarvestErrorCode, "StoreUnavailable">, OaiErrorCode> = {
  BadArgument: "badArgument",
  InvalidFormat: "cannotDisseminateFormat",
  InvalidDateRange: "badArgument",
  NoSetHierarchy: "noSetHierarchy",
  BadResumptionToken: "badResumptionToken",
  NoRecordsMatch: "noRecordsMatch"
};

const STORE_RETRY_AFTER_SECONDS = 5;

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * One-to-one mapping of a harvest error onto the protocol's error envelope.
 * Protocol errors travel with HTTP 200; only an unavailable store changes the status.
 */
export const toProtocolError = (error: HarvestError): ProtocolError => {
  if (error.code === "StoreUnavailable") {
    return {
      status: 503,
      code: "serviceUnavailable",
      message: "The record store is temporarily unavailable; resubmit the same request later",
      retryAfterSeconds: STORE_RETRY_AFTER_SECONDS
    };
  }

  return { status: 200, code: protocolCodes[error.code], message: error.message };
};

export const wrapStoreFailure = (reason: unknown, context: { metadataFormat: string; page: "first" | "continuation" }) => {
  if (reason instanceof HarvestError) return reason;

  const message = `Record store query failed on ${context.page} page of ${context.metadataFormat}: ${toErrorMessage(reason)}`;
  return new HarvestError("StoreUnavailable", message, { cause: reason });
};
