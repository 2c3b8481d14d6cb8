import type { OaiErrorCode } from "../harvest/harvest.error-handler";
import type { ParsedRequest } from "../harvest/harvestOrchestrator";

export const oaiVerbs = [
  "Identify",
  "GetRecord",
  "ListIdentifiers",
  "ListMetadataFormats",
  "ListRecords",
  "ListSets"
] as const;

export type OaiVerb = (typeof oaiVerbs)[number];
export type ListVerb = Extract<OaiVerb, "ListRecords" | "ListIdentifiers">;

const oaiArguments = ["verb", "identifier", "metadataPrefix", "from", "until", "set", "resumptionToken"] as const;

type OaiArgument = (typeof oaiArguments)[number];

export type OaiRequestArguments = Partial<Record<Exclude<OaiArgument, "verb">, string>>;

export type OaiRequest = {
  verb: OaiVerb;
  arguments: OaiRequestArguments;
};

export type OaiRequestIssue = {
  code: Extract<OaiErrorCode, "badVerb" | "badArgument">;
  message: string;
};

export type OaiRequestParseResult = { ok: true; request: OaiRequest } | { ok: false; issues: OaiRequestIssue[] };

export const MAX_QUERY_LENGTH = 1000;

const isOaiVerb = (value: string): value is OaiVerb => oaiVerbs.some((verb) => verb === value);

const isOaiArgument = (value: string): value is OaiArgument => oaiArguments.some((name) => name === value);

const isListVerb = (verb: OaiVerb): verb is ListVerb => verb === "ListRecords" || verb === "ListIdentifiers";

/**
 * Validates a raw query string against the protocol's argument rules, collecting
 * every issue rather than stopping at the first.
 */
export const parseOaiQuery = (queryString: string): OaiRequestParseResult => {
  const raw = queryString.startsWith("?") ? queryString.slice(1) : queryString;
  if (raw.length > MAX_QUERY_LENGTH) {
    return { ok: false, issues: [{ code: "badArgument", message: "Request is too long" }] };
  }

  const pairs = Array.from(new URLSearchParams(raw).entries()).map(([key, value]) => [key.trim(), value.trim()] as const);
  const issues: OaiRequestIssue[] = [];
  const counts = new Map<string, number>();
  for (const [key] of pairs) counts.set(key, (counts.get(key) ?? 0) + 1);

  const verbs = pairs.filter(([key]) => key === "verb").map(([, value]) => value);
  const [verb] = verbs;
  if (verb === undefined) {
    issues.push({ code: "badVerb", message: "The verb argument is missing in the request" });
  } else if (verbs.length > 1) {
    issues.push({ code: "badVerb", message: "The verb argument is repeated in the request" });
  } else if (!isOaiVerb(verb)) {
    issues.push({ code: "badVerb", message: `The value "${verb}" of the verb argument is not supported` });
  }

  for (const [key] of pairs) {
    if (!isOaiArgument(key)) {
      issues.push({ code: "badArgument", message: `Illegal argument "${key}" in the request` });
    }
  }
  for (const name of oaiArguments) {
    if (name !== "verb" && (counts.get(name) ?? 0) > 1) {
      issues.push({ code: "badArgument", message: `Argument "${name}" is repeated in the request` });
    }
  }

  if (issues.length > 0 || verb === undefined || !isOaiVerb(verb)) {
    return { ok: false, issues };
  }

  const args: OaiRequestArguments = {};
  for (const [key, value] of pairs) {
    if (isOaiArgument(key) && key !== "verb") args[key] = value;
  }
  return { ok: true, request: { verb, arguments: args } };
};

/**
 * Narrows a list request to the harvest engine's input. `identifier` has no
 * meaning for the list verbs.
 */
export const toHarvestRequest = (
  request: OaiRequest
): { ok: true; verb: ListVerb; request: ParsedRequest } | { ok: false; issues: OaiRequestIssue[] } => {
  if (!isListVerb(request.verb)) {
    return { ok: false, issues: [{ code: "badVerb", message: `${request.verb} is not a list verb` }] };
  }

  const { identifier, ...selective } = request.arguments;
  if (identifier !== undefined) {
    return {
      ok: false,
      issues: [{ code: "badArgument", message: `Illegal argument "identifier" for ${request.verb}` }]
    };
  }
  return { ok: true, verb: request.verb, request: selective };
};
