/**
 * Cronエンドポイントのテスト
 */

import { createIngestionReportHandler, summarizeRunResult } from "../../src/routes/cron";
import { PipelineRunResult, PipelineRuntime } from "../../src/pipeline";
import { loadEnvConfig } from "../../src/config";
import { NoDataFetchedError } from "../../src/errors";
import { reportFingerprint } from "../../src/report";
import { ORDERS_FETCH_FAILURE, buildSalesReport, makePipelineConfig } from "../helpers/fixtures";

function makeRuntime(): PipelineRuntime {
  return {
    env: loadEnvConfig({}),
    config: makePipelineConfig(),
    clients: new Map(),
    sinks: {},
  };
}

function makeResult(overrides: Partial<PipelineRunResult> = {}): PipelineRunResult {
  const report = buildSalesReport({ fetchFailures: [ORDERS_FETCH_FAILURE] });
  return {
    runId: "run-1",
    status: "success",
    report,
    fingerprint: reportFingerprint(report),
    deliveries: [{ target: "alerts", type: "google_chat", status: "success" }],
    durationMs: 42,
    ...overrides,
  };
}

function mockResponse() {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe("summarizeRunResult", () => {
  it("データセットごとの状態と配信結果を要約する", () => {
    const result = makeResult();
    expect(summarizeRunResult(result)).toEqual({
      success: true,
      runId: "run-1",
      status: "success",
      overallStatus: "critical",
      fingerprint: result.fingerprint,
      datasets: [{ datasetId: "sales", status: "critical", totalEvents: 3, failureCount: 2 }],
      fetchFailures: [ORDERS_FETCH_FAILURE],
      deliveries: [{ target: "alerts", type: "google_chat", status: "success" }],
      durationMs: 42,
    });
  });
});

describe("POST /cron/ingestion-report", () => {
  it("パイプラインを実行して要約を返す", async () => {
    const run = jest.fn().mockResolvedValue(makeResult());
    const runtime = makeRuntime();
    const handler = createIngestionReportHandler({ runtime, run });
    const res = mockResponse();

    await handler({ body: { runId: "manual-1" } }, res);

    expect(run).toHaveBeenCalledWith(runtime, { runId: "manual-1" });
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json.mock.calls[0][0]).toMatchObject({ success: true, runId: "run-1" });
  });

  it("配信の一部失敗は 200 で success: false", async () => {
    const run = jest.fn().mockResolvedValue(
      makeResult({
        status: "partial_failure",
        deliveries: [
          {
            target: "alerts",
            type: "google_chat",
            status: "failed",
            errorCode: "DELIVERY_FAILED",
            error: "Google Chat webhook returned 500: oops",
          },
        ],
      })
    );
    const handler = createIngestionReportHandler({ runtime: makeRuntime(), run });
    const res = mockResponse();

    await handler({ body: {} }, res);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json.mock.calls[0][0]).toMatchObject({ success: false, status: "partial_failure" });
  });

  it("不正なリクエストボディは 400", async () => {
    const run = jest.fn();
    const handler = createIngestionReportHandler({ runtime: makeRuntime(), run });
    const res = mockResponse();

    await handler({ body: { runId: "" } }, res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json.mock.calls[0][0]).toMatchObject({
      success: false,
      error: "VALIDATION_ERROR",
      details: { errors: [{ field: "runId", message: "String must contain at least 1 character(s)" }] },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("未知のキーは 400", async () => {
    const handler = createIngestionReportHandler({ runtime: makeRuntime(), run: jest.fn() });
    const res = mockResponse();

    await handler({ body: { dryRun: true } }, res);

    expect(res.status).toHaveBeenCalledWith(400);
  });

  it("実行中の呼び出しは 409", async () => {
    let finish: (result: PipelineRunResult) => void = () => undefined;
    const run = jest.fn(
      () =>
        new Promise<PipelineRunResult>((resolve) => {
          finish = resolve;
        })
    );
    const handler = createIngestionReportHandler({ runtime: makeRuntime(), run });
    const first = mockResponse();
    const second = mockResponse();

    const pending = handler({ body: {} }, first);
    await handler({ body: {} }, second);

    expect(second.status).toHaveBeenCalledWith(409);
    expect(second.json).toHaveBeenCalledWith({
      success: false,
      error: "run-in-progress",
      message: "An ingestion report run is already in progress",
    });

    finish(makeResult());
    await pending;
    expect(first.status).toHaveBeenCalledWith(200);

    const third = mockResponse();
    run.mockResolvedValueOnce(makeResult());
    await handler({ body: {} }, third);
    expect(third.status).toHaveBeenCalledWith(200);
  });

  it("AppError はそのステータスコードで返す", async () => {
    const run = jest.fn().mockRejectedValue(
      new NoDataFetchedError([{ datasetId: "sales", message: "aep authentication failed" }])
    );
    const handler = createIngestionReportHandler({ runtime: makeRuntime(), run });
    const res = mockResponse();

    await handler({ body: {} }, res);

    expect(res.status).toHaveBeenCalledWith(502);
    expect(res.json.mock.calls[0][0]).toMatchObject({
      success: false,
      error: "NO_DATA_FETCHED",
      message: "All 1 dataset fetches failed",
    });
  });

  it("想定外のエラーは 500", async () => {
    const run = jest.fn().mockRejectedValue(new Error("boom"));
    const handler = createIngestionReportHandler({ runtime: makeRuntime(), run });
    const res = mockResponse();

    await handler({ body: {} }, res);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: "ingestion-report-failed" });
  });
});
