import http from "http";
import type { Granularity } from "./core/harvest/granularity";
import { formatDatestamp } from "./core/harvest/granularity";
import { toProtocolError } from "./application/harvest/harvest.error-handler";
import type { HarvestOrchestrator } from "./application/harvest/harvestOrchestrator";
import { parseOaiQuery, toHarvestRequest, type OaiRequestArguments } from "./application/protocol/oaiRequest";
import { renderListPayload, type OaiEnvelope } from "./application/protocol/oaiResponse";
import type { Clock } from "./ports/Clock";

export type OaiHttpDeps = {
  orchestrator: HarvestOrchestrator;
  granularity: Granularity;
  baseUrl: string;
  clock: Clock;
};

export type OaiHttpResponse = {
  status: number;
  headers: Record<string, string>;
  body: unknown;
};

const jsonHeaders = { "content-type": "application/json" };

const envelope = (deps: OaiHttpDeps, request: OaiEnvelope["request"]): OaiEnvelope => ({
  responseDate: formatDatestamp(deps.clock.now(), "second"),
  request
});

/**
 * Request echo: only a syntactically valid request has its arguments echoed.
 */
const echo = (deps: OaiHttpDeps, verb?: string, args: OaiRequestArguments = {}): OaiEnvelope["request"] =>
  verb === undefined ? { baseUrl: deps.baseUrl } : { baseUrl: deps.baseUrl, verb, ...args };

export const handleOaiRequest = async (deps: OaiHttpDeps, rawUrl: string): Promise<OaiHttpResponse> => {
  const url = new URL(rawUrl, "http://localhost");

  if (url.pathname === "/health") {
    return { status: 200, headers: jsonHeaders, body: { ok: true } };
  }
  if (url.pathname !== "/oai") {
    return { status: 404, headers: jsonHeaders, body: { error: "not_found" } };
  }

  const parsed = parseOaiQuery(url.search);
  if (!parsed.ok) {
    return { status: 200, headers: jsonHeaders, body: { ...envelope(deps, echo(deps)), error: parsed.issues } };
  }

  const { verb, arguments: args } = parsed.request;
  const listRequest = toHarvestRequest(parsed.request);
  if (!listRequest.ok) {
    if (verb !== "ListRecords" && verb !== "ListIdentifiers") {
      return {
        status: 501,
        headers: jsonHeaders,
        body: {
          ...envelope(deps, echo(deps, verb, args)),
          error: [{ code: "notImplemented", message: `${verb} is not served by this endpoint` }]
        }
      };
    }
    return {
      status: 200,
      headers: jsonHeaders,
      body: { ...envelope(deps, echo(deps)), error: listRequest.issues }
    };
  }

  const result = await deps.orchestrator.produceNextPage(listRequest.request);
  if (!result.ok) {
    const protocolError = toProtocolError(result.error);
    const headers: Record<string, string> = { ...jsonHeaders };
    if (protocolError.retryAfterSeconds !== undefined) {
      headers["retry-after"] = String(protocolError.retryAfterSeconds);
    }
    return {
      status: protocolError.status,
      headers,
      body: {
        ...envelope(deps, echo(deps, verb, args)),
        error: [{ code: protocolError.code, message: protocolError.message }]
      }
    };
  }

  const body: OaiEnvelope = envelope(deps, echo(deps, verb, args));
  body[listRequest.verb] = renderListPayload(listRequest.verb, result.page, deps.granularity);
  return { status: 200, headers: jsonHeaders, body };
};

export const createServer = (deps: OaiHttpDeps) => {
  return http.createServer((req, res) => {
    if (req.method !== "GET") {
      res.writeHead(405, { ...jsonHeaders, allow: "GET" });
      res.end(JSON.stringify({ error: "method_not_allowed" }));
      return;
    }

    void handleOaiRequest(deps, req.url ?? "/")
      .then((response) => {
        res.writeHead(response.status, response.headers);
        res.end(JSON.stringify(response.body));
      })
      .catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(
          JSON.stringify({
            event: "http.request_failed",
            message: err instanceof Error ? err.message : String(err)
          })
        );
        res.writeHead(500, jsonHeaders);
        res.end(JSON.stringify({ error: "internal_error" }));
      });
  });
};

if (require.main === module) {
  void import("./composition/root")
    .then(({ runServer }) => runServer())
    .catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({ event: "server.start_failed", message: err instanceof Error ? err.message : String(err) })
      );
      process.exit(1);
    });
}
