/**
 * AEP Catalog クライアントのテスト
 */

import {
  AepCatalogClient,
  extractFileLinks,
  flattenBatches,
  parseFailureSamples,
} from "../../src/fetch/aepCatalogClient";
import { AepCatalogSourceSchema } from "../../src/config/pipelineConfigTypes";
import { AuthError } from "../../src/errors";
import { getCircuitBreakerStatus, resetAllCircuitBreakers } from "../../src/utils/retry";
import { WINDOW } from "../helpers/fixtures";

const mockFetch = jest.fn();
global.fetch = mockFetch;

const NO_RETRY = { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function makeClient(overrides: Record<string, unknown> = {}): AepCatalogClient {
  const config = AepCatalogSourceSchema.parse({
    type: "aep_catalog",
    name: "aep-test",
    accessToken: "test-token",
    apiKey: "test-api-key",
    orgId: "test-org@AdobeOrg",
    sandboxName: "dev",
    limit: 2,
    ...overrides,
  });
  return new AepCatalogClient(config, NO_RETRY);
}

describe("flattenBatches", () => {
  it("バッチIDをキーとした応答をレコード配列にする", () => {
    expect(
      flattenBatches({
        _page: { count: 2 },
        b1: { status: "success" },
        b2: { status: "failed" },
        broken: "not-a-batch",
      })
    ).toEqual([
      { id: "b1", status: "success" },
      { id: "b2", status: "failed" },
    ]);
  });

  it("オブジェクト以外の応答は空配列", () => {
    expect(flattenBatches([{ id: "x" }])).toEqual([]);
    expect(flattenBatches(null)).toEqual([]);
  });
});

describe("extractFileLinks", () => {
  it("data[]._links.self.href を取り出す", () => {
    expect(
      extractFileLinks({
        data: [
          { _links: { self: { href: "https://files.test/f1" } } },
          { _links: {} },
          { _links: { self: { href: "https://files.test/f2" } } },
        ],
      })
    ).toEqual(["https://files.test/f1", "https://files.test/f2"]);
  });
});

describe("parseFailureSamples", () => {
  it("解析できない行を飛ばし、欠けた項目は N/A", () => {
    const ndjson = [
      JSON.stringify({
        body: { xdmEntity: { eventType: "web.click", web: { webPageDetails: { URL: "https://example.com/a" } } } },
      }),
      "{not json",
      "",
      JSON.stringify({ body: { xdmEntity: { eventType: "web.view" } } }),
    ].join("\n");

    expect(parseFailureSamples(ndjson, 5)).toEqual([
      { eventType: "web.click", pageUrl: "https://example.com/a" },
      { eventType: "web.view", pageUrl: "N/A" },
    ]);
  });

  it("上限件数で打ち切る", () => {
    const line = JSON.stringify({ body: { xdmEntity: { eventType: "web.click" } } });
    expect(parseFailureSamples([line, line, line].join("\n"), 2)).toHaveLength(2);
  });
});

describe("AepCatalogClient", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    resetAllCircuitBreakers();
  });

  it("期間・データセットを指定してバッチ一覧を取得する", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ b1: { status: "success", created: 1 } }));

    const records = await makeClient().fetch("ds1", WINDOW);

    expect(records).toEqual([{ id: "b1", status: "success", created: 1 }]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(
      "https://platform.adobe.io/data/foundation/catalog/batches" +
        "?dataSet=ds1&createdAfter=1709251200000&createdBefore=1709337600000" +
        "&orderBy=asc%3Acreated&limit=2&start=0"
    );
    expect(init.headers).toEqual({
      Authorization: "Bearer test-token",
      "x-api-key": "test-api-key",
      "x-gw-ims-org-id": "test-org@AdobeOrg",
      "x-sandbox-name": "dev",
      Accept: "application/json",
    });
  });

  it("statusFilter を指定したら status パラメータを付ける", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({}));

    await makeClient({ statusFilter: "failed" }).fetch("ds1", WINDOW);

    expect(mockFetch.mock.calls[0][0]).toContain("&status=failed&");
  });

  it("1ページが limit 件ならページングを続ける", async () => {
    mockFetch
      .mockImplementationOnce(async () =>
        jsonResponse({ _page: { count: 2 }, b1: { status: "success" }, b2: { status: "success" } })
      )
      .mockImplementationOnce(async () => jsonResponse({ b3: { status: "failed" } }));

    const records = await makeClient().fetch("ds1", WINDOW);

    expect(records.map((r) => r.id)).toEqual(["b1", "b2", "b3"]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls[1][0]).toMatch(/&start=2$/);
  });

  it("失敗バッチにサンプルを付与する", async () => {
    const sampleLine = (eventType: string) =>
      JSON.stringify({ body: { xdmEntity: { eventType, web: { webPageDetails: { URL: "https://example.com/p" } } } } });

    mockFetch.mockImplementation(async (url: string) => {
      if (url === "https://files.test/b2/failed") {
        return jsonResponse({ data: [{ _links: { self: { href: "https://files.test/b2/part-0" } } }] });
      }
      if (url === "https://files.test/b2/part-0") {
        return new Response([sampleLine("web.click"), sampleLine("web.view"), sampleLine("web.buy")].join("\n"));
      }
      return jsonResponse({
        b1: { status: "success" },
        b2: { status: "failed", failedBatchLocation: "https://files.test/b2/failed" },
      });
    });

    const records = await makeClient({ includeFailureSamples: true, maxSamplesPerBatch: 2, limit: 100 }).fetch(
      "ds1",
      WINDOW
    );

    expect(records[0]).toEqual({ id: "b1", status: "success" });
    expect(records[1].failureSamples).toEqual([
      { eventType: "web.click", pageUrl: "https://example.com/p" },
      { eventType: "web.view", pageUrl: "https://example.com/p" },
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("サンプル取得に失敗しても空のサンプルで続行する", async () => {
    mockFetch.mockImplementation(async (url: string) => {
      if (url === "https://files.test/b2/failed") {
        return jsonResponse({ message: "not found" }, 404);
      }
      return jsonResponse({
        b2: { status: "failed", failedBatchLocation: "https://files.test/b2/failed" },
      });
    });

    const records = await makeClient({ includeFailureSamples: true }).fetch("ds1", WINDOW);

    expect(records).toEqual([
      {
        id: "b2",
        status: "failed",
        failedBatchLocation: "https://files.test/b2/failed",
        failureSamples: [],
      },
    ]);
  });

  it("サンプル取得の失敗はバッチ一覧とは別のブレーカーに計上する", async () => {
    mockFetch.mockImplementation(async (url: string) => {
      if (url === "https://files.test/b2/failed") {
        return jsonResponse({ message: "not found" }, 404);
      }
      return jsonResponse({
        b2: { status: "failed", failedBatchLocation: "https://files.test/b2/failed" },
      });
    });

    await makeClient({ includeFailureSamples: true }).fetch("ds1", WINDOW);

    expect(getCircuitBreakerStatus("source:aep-test").failures).toBe(0);
    expect(getCircuitBreakerStatus("source:aep-test:samples").failures).toBe(1);
  });

  it("401 は AuthError で、再試行しない", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ error: "unauthorized" }, 401));

    const client = new AepCatalogClient(
      AepCatalogSourceSchema.parse({
        type: "aep_catalog",
        name: "aep-test",
        accessToken: "test-token",
        apiKey: "test-api-key",
        orgId: "test-org@AdobeOrg",
      }),
      { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 1 }
    );

    await expect(client.fetch("ds1", WINDOW)).rejects.toBeInstanceOf(AuthError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("5xx は再試行する", async () => {
    mockFetch
      .mockImplementationOnce(async () => new Response("unavailable", { status: 503 }))
      .mockImplementationOnce(async () => jsonResponse({ b1: { status: "success" } }));

    const client = new AepCatalogClient(
      AepCatalogSourceSchema.parse({
        type: "aep_catalog",
        name: "aep-test",
        accessToken: "test-token",
        apiKey: "test-api-key",
        orgId: "test-org@AdobeOrg",
      }),
      { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 }
    );

    await expect(client.fetch("ds1", WINDOW)).resolves.toEqual([{ id: "b1", status: "success" }]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("不正なJSONは NetworkError", async () => {
    mockFetch.mockImplementation(async () => new Response("<html>", { status: 200 }));

    await expect(makeClient().fetch("ds1", WINDOW)).rejects.toMatchObject({
      name: "NetworkError",
      message: "aep-test returned invalid JSON",
    });
  });
});
