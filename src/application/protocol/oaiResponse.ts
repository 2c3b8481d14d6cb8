import { formatDatestamp, type Granularity } from "../../core/harvest/granularity";
import type { HarvestedRecord } from "../../core/records/record.types";
import type { ProtocolError } from "../harvest/harvest.error-handler";
import type { Page } from "../harvest/harvestOrchestrator";
import type { ListVerb, OaiRequestArguments } from "./oaiRequest";

export type OaiRecordHeader = {
  identifier: string;
  datestamp: string;
  setSpec: string[];
  status?: "deleted";
};

export type OaiRecord = {
  header: OaiRecordHeader;
  metadata?: unknown;
};

export type OaiResumptionToken = {
  value: string;
  cursor: number;
  expirationDate?: string;
};

export type OaiListPayload = {
  records: OaiRecord[] | OaiRecordHeader[];
  resumptionToken?: OaiResumptionToken;
};

export type OaiEnvelope = {
  responseDate: string;
  request: OaiRequestArguments & { baseUrl: string; verb?: string };
  ListRecords?: OaiListPayload;
  ListIdentifiers?: OaiListPayload;
  error?: Array<{ code: ProtocolError["code"]; message: string }>;
};

const toHeader = (record: HarvestedRecord, granularity: Granularity): OaiRecordHeader => {
  const header: OaiRecordHeader = {
    identifier: record.identifier,
    datestamp: formatDatestamp(record.lastModified, granularity),
    setSpec: [...record.setSpecs]
  };
  if (record.deleted) header.status = "deleted";
  return header;
};

const toRecord = (record: HarvestedRecord, granularity: Granularity): OaiRecord => {
  const body: OaiRecord = { header: toHeader(record, granularity) };
  if (!record.deleted && record.metadata !== undefined) body.metadata = record.metadata;
  return body;
};

/**
 * The last page of a multi-page list carries an empty token; a list that fits
 * in one page carries none.
 */
const toResumptionToken = (page: Page): OaiResumptionToken | undefined => {
  if (page.resumptionToken !== undefined) {
    const token: OaiResumptionToken = { value: page.resumptionToken, cursor: page.cursor };
    if (page.expiresAt) token.expirationDate = formatDatestamp(page.expiresAt, "second");
    return token;
  }
  return page.cursor > 0 ? { value: "", cursor: page.cursor } : undefined;
};

export const renderListPayload = (verb: ListVerb, page: Page, granularity: Granularity): OaiListPayload => {
  const payload: OaiListPayload = {
    records:
      verb === "ListRecords"
        ? page.records.map((record) => toRecord(record, granularity))
        : page.records.map((record) => toHeader(record, granularity))
  };
  const token = toResumptionToken(page);
  if (token) payload.resumptionToken = token;
  return payload;
};
