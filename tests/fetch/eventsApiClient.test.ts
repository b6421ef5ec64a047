/**
 * Events API クライアント・データセット取得のテスト
 */

import { EventsApiClient, extractRecords } from "../../src/fetch/eventsApiClient";
import { createSourceClients, fetchAll } from "../../src/fetch/fetcher";
import { AepCatalogClient } from "../../src/fetch/aepCatalogClient";
import { SourceClient } from "../../src/fetch/types";
import { DatasetConfigSchema, EventsApiSourceSchema } from "../../src/config/pipelineConfigTypes";
import { AuthError, NetworkError } from "../../src/errors";
import { RawRecord, ReportingWindow } from "../../src/ingestion/types";
import { resetCircuitBreaker } from "../../src/utils/retry";
import { WINDOW, makePipelineConfig } from "../helpers/fixtures";

const mockFetch = jest.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function makeClient(overrides: Record<string, unknown> = {}): EventsApiClient {
  return new EventsApiClient(
    EventsApiSourceSchema.parse({
      type: "events_api",
      name: "events-test",
      baseUrl: "https://events.test/api/",
      ...overrides,
    }),
    { maxRetries: 0 }
  );
}

describe("extractRecords", () => {
  it("配列そのもの", () => {
    expect(extractRecords([{ a: 1 }])).toEqual([{ a: 1 }]);
  });

  it("items / data / records の順に探す", () => {
    expect(extractRecords({ data: [{ a: 1 }], records: [{ b: 2 }] })).toEqual([{ a: 1 }]);
    expect(extractRecords({ records: [{ b: 2 }] })).toEqual([{ b: 2 }]);
  });

  it("recordsPath を指定したらそのパスだけを見る", () => {
    expect(extractRecords({ result: { rows: [{ a: 1 }] }, items: [] }, "result.rows")).toEqual([
      { a: 1 },
    ]);
    expect(extractRecords({ items: [{ a: 1 }] }, "result.rows")).toBeUndefined();
  });

  it("オブジェクト以外の要素は value に包む", () => {
    expect(extractRecords([1, "x", { a: 1 }])).toEqual([{ value: 1 }, { value: "x" }, { a: 1 }]);
  });
});

describe("EventsApiClient", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    resetCircuitBreaker("source:events-test");
  });

  it("ISO形式の期間とデータセットをクエリに付ける", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ items: [{ id: "e1" }] }));

    const records = await makeClient({ token: "test-token" }).fetch("web", WINDOW);

    expect(records).toEqual([{ id: "e1" }]);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(
      "https://events.test/api/events?datasetId=web" +
        "&start=2024-03-01T00%3A00%3A00.000Z&end=2024-03-02T00%3A00%3A00.000Z"
    );
    expect(init.headers).toEqual({ Accept: "application/json", Authorization: "Bearer test-token" });
  });

  it("パラメータ名・エポックミリ秒・追加ヘッダーを設定できる", async () => {
    mockFetch.mockImplementation(async () => jsonResponse([]));

    await makeClient({
      path: "/v2/ingest",
      datasetParam: "ds",
      startParam: "from",
      endParam: "to",
      timeFormat: "epoch_ms",
      headers: { "X-Tenant": "acme" },
    }).fetch("web", WINDOW);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://events.test/api/v2/ingest?ds=web&from=1709251200000&to=1709337600000");
    expect(init.headers).toEqual({ Accept: "application/json", "X-Tenant": "acme" });
  });

  it("レコード配列がなければ再試行しない NetworkError", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ result: {} }));

    const error = await makeClient({ recordsPath: "result.rows" })
      .fetch("web", WINDOW)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: "events-test response has no record array at result.rows",
      retryable: false,
    });
  });
});

describe("createSourceClients", () => {
  it("ソース種別ごとのクライアントを名前で引ける", () => {
    const config = makePipelineConfig({
      sources: [
        {
          type: "aep_catalog",
          name: "aep",
          accessToken: "test-token",
          apiKey: "test-api-key",
          orgId: "test-org@AdobeOrg",
        },
        { type: "events_api", name: "events", baseUrl: "https://events.test" },
      ],
    });
    const clients = createSourceClients(config.sources, config.retry);

    expect(clients.get("aep")).toBeInstanceOf(AepCatalogClient);
    expect(clients.get("events")).toBeInstanceOf(EventsApiClient);
  });
});

describe("fetchAll", () => {
  class FakeClient implements SourceClient {
    readonly calls: Array<{ datasetId: string; window: ReportingWindow }> = [];

    constructor(
      readonly name: string,
      private readonly results: Record<string, RawRecord[] | Error>
    ) {}

    async fetch(datasetId: string, window: ReportingWindow): Promise<RawRecord[]> {
      this.calls.push({ datasetId, window });
      const result = this.results[datasetId];
      if (result instanceof Error) {
        throw result;
      }
      return result ?? [];
    }
  }

  const datasets = [
    DatasetConfigSchema.parse({ id: "sales", source: "aep", mapping: "m" }),
    DatasetConfigSchema.parse({ id: "orders", label: "Orders", source: "aep", mapping: "m" }),
    DatasetConfigSchema.parse({ id: "clicks", source: "missing", mapping: "m" }),
  ];

  it("一部の取得失敗は FetchFailure にして他を継続する", async () => {
    const client = new FakeClient("aep", {
      sales: [{ id: "b1" }],
      orders: new AuthError("aep", "aep authentication failed"),
    });

    const result = await fetchAll(datasets, new Map([["aep", client]]), WINDOW);

    expect(result.outcomes).toEqual([{ dataset: datasets[0], records: [{ id: "b1" }] }]);
    expect(result.failures).toEqual([
      {
        datasetId: "orders",
        label: "Orders",
        source: "aep",
        errorCode: "AUTH_FAILED",
        message: "aep authentication failed",
      },
      {
        datasetId: "clicks",
        label: undefined,
        source: "missing",
        errorCode: "CONFIGURATION_ERROR",
        message: "No client for source: missing",
      },
    ]);
    expect(client.calls.map((c) => c.datasetId)).toEqual(["sales", "orders"]);
  });

  it("AppError 以外は INTERNAL_ERROR", async () => {
    const client = new FakeClient("aep", { sales: new Error("boom") });

    const result = await fetchAll([datasets[0]], new Map([["aep", client]]), WINDOW);

    expect(result.outcomes).toEqual([]);
    expect(result.failures[0]).toMatchObject({ errorCode: "INTERNAL_ERROR", message: "boom" });
  });
});
