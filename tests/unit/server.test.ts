import type { HarvestOrchestrator } from "../../src/application/harvest/harvestOrchestrator";
import { createServer, handleOaiRequest, type OaiHttpDeps } from "../../src/server";
import { createMutableClock, makeRecords } from "../support/fixtures";
import { createHarness } from "../support/harness";

const BASE_URL = "http://localhost:3000/oai";
const RESPONSE_DATE = "2024-06-01T12:00:00Z";

const depsFor = (orchestrator: HarvestOrchestrator): OaiHttpDeps => ({
  orchestrator,
  granularity: "second",
  baseUrl: BASE_URL,
  clock: createMutableClock()
});

describe("handleOaiRequest", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("answers health checks", async () => {
    const { orchestrator } = createHarness([]);
    await expect(handleOaiRequest(depsFor(orchestrator), "/health")).resolves.toEqual({
      status: 200,
      headers: { "content-type": "application/json" },
      body: { ok: true }
    });
  });

  it("returns 404 outside the endpoint", async () => {
    const { orchestrator } = createHarness([]);
    const response = await handleOaiRequest(depsFor(orchestrator), "/elsewhere?verb=ListRecords");
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "not_found" });
  });

  it("serves a list page and echoes the request", async () => {
    const { orchestrator } = createHarness(makeRecords(3));

    const response = await handleOaiRequest(depsFor(orchestrator), "/oai?verb=ListIdentifiers&metadataPrefix=oai_dc");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      responseDate: RESPONSE_DATE,
      request: { baseUrl: BASE_URL, verb: "ListIdentifiers", metadataPrefix: "oai_dc" },
      ListIdentifiers: {
        records: [
          { identifier: "oai:test:001", datestamp: "2024-03-01T00:00:00Z", setSpec: [] },
          { identifier: "oai:test:002", datestamp: "2024-03-01T00:01:00Z", setSpec: [] },
          { identifier: "oai:test:003", datestamp: "2024-03-01T00:02:00Z", setSpec: [] }
        ]
      }
    });
  });

  it("reports malformed requests without echoing their arguments", async () => {
    const { orchestrator, store } = createHarness(makeRecords(3));

    const response = await handleOaiRequest(depsFor(orchestrator), "/oai?verb=ListRecords&metadataPrefix=oai_dc&bogus=1");

    expect(response).toEqual({
      status: 200,
      headers: { "content-type": "application/json" },
      body: {
        responseDate: RESPONSE_DATE,
        request: { baseUrl: BASE_URL },
        error: [{ code: "badArgument", message: 'Illegal argument "bogus" in the request' }]
      }
    });
    expect(store.queries).toHaveLength(0);
  });

  it("refuses identifier on list verbs", async () => {
    const { orchestrator } = createHarness(makeRecords(3));

    const response = await handleOaiRequest(depsFor(orchestrator), "/oai?verb=ListRecords&identifier=oai:x:1");

    expect(response.body).toEqual({
      responseDate: RESPONSE_DATE,
      request: { baseUrl: BASE_URL },
      error: [{ code: "badArgument", message: 'Illegal argument "identifier" for ListRecords' }]
    });
  });

  it("answers verbs outside harvesting with 501", async () => {
    const { orchestrator } = createHarness(makeRecords(3));

    const response = await handleOaiRequest(depsFor(orchestrator), "/oai?verb=Identify");

    expect(response.status).toBe(501);
    expect(response.body).toEqual({
      responseDate: RESPONSE_DATE,
      request: { baseUrl: BASE_URL, verb: "Identify" },
      error: [{ code: "notImplemented", message: "Identify is not served by this endpoint" }]
    });
  });

  it("maps harvest errors onto protocol error codes", async () => {
    const { orchestrator } = createHarness(makeRecords(3));

    const response = await handleOaiRequest(depsFor(orchestrator), "/oai?verb=ListRecords&metadataPrefix=marc21");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      responseDate: RESPONSE_DATE,
      request: { baseUrl: BASE_URL, verb: "ListRecords", metadataPrefix: "marc21" },
      error: [
        { code: "cannotDisseminateFormat", message: 'The metadata format "marc21" is not supported by this repository' }
      ]
    });
  });

  it("asks the harvester to come back when the store is unavailable", async () => {
    const { orchestrator, store } = createHarness(makeRecords(3));
    store.failWith(new Error("connection reset"));

    const response = await handleOaiRequest(depsFor(orchestrator), "/oai?verb=ListRecords&metadataPrefix=oai_dc");

    expect(response.status).toBe(503);
    expect(response.headers).toEqual({ "content-type": "application/json", "retry-after": "5" });
  });
});

describe("server smoke", () => {
  type Handler = (req: unknown, res: unknown) => void;

  const responseMock = () => {
    const response = { writeHead: jest.fn(), end: jest.fn() };
    const ended = new Promise<void>((resolve) => {
      response.end.mockImplementation(() => resolve());
    });
    return { response, ended };
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("responds with health payload", async () => {
    const { orchestrator } = createHarness([]);
    const server = createServer(depsFor(orchestrator));
    const handler = server.listeners("request")[0] as Handler | undefined;
    expect(typeof handler).toBe("function");

    const { response, ended } = responseMock();
    handler?.({ method: "GET", url: "/health" }, response);
    await ended;

    expect(response.writeHead).toHaveBeenCalledWith(200, { "content-type": "application/json" });
    expect(response.end).toHaveBeenCalledWith(JSON.stringify({ ok: true }));
    server.close();
  });

  it("rejects methods other than GET", () => {
    const { orchestrator } = createHarness([]);
    const server = createServer(depsFor(orchestrator));
    const handler = server.listeners("request")[0] as Handler | undefined;

    const { response } = responseMock();
    handler?.({ method: "POST", url: "/oai" }, response);

    expect(response.writeHead).toHaveBeenCalledWith(405, { "content-type": "application/json", allow: "GET" });
    expect(response.end).toHaveBeenCalledWith(JSON.stringify({ error: "method_not_allowed" }));
    server.close();
  });

  it("logs unexpected failures and answers 500", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const orchestrator: HarvestOrchestrator = { produceNextPage: jest.fn().mockRejectedValue(new Error("boom")) };
    const server = createServer(depsFor(orchestrator));
    const handler = server.listeners("request")[0] as Handler | undefined;

    const { response, ended } = responseMock();
    handler?.({ method: "GET", url: "/oai?verb=ListRecords&metadataPrefix=oai_dc" }, response);
    await ended;

    expect(response.writeHead).toHaveBeenCalledWith(500, { "content-type": "application/json" });
    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify({ event: "http.request_failed", message: "boom" }));
    server.close();
  });
});
