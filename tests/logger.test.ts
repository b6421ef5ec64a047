/**
 * 構造化ログのテスト
 */

import { createChildLogger, logger } from "../src/logger";

describe("StructuredLogger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("1行1JSONで出力する", () => {
    const spy = jest.spyOn(console, "log").mockImplementation(() => undefined);

    logger.info("Pipeline started", { datasets: 2 });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: "info",
      severity: "INFO",
      message: "Pipeline started",
      service: "aep-ingestion-alerts",
      datasets: 2,
    });
  });

  it("子ロガーはコンテキストを引き継ぐ", () => {
    const spy = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    createChildLogger({ runId: "run-1" }).child({ datasetId: "sales" }).warn("Batch listing truncated");

    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({ runId: "run-1", datasetId: "sales", severity: "WARN" });
  });

  it("Error は name / message / stack に展開する", () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => undefined);

    logger.error("Ingestion report run failed", { error: new TypeError("bad input") });

    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry.error.name).toBe("TypeError");
    expect(entry.error.message).toBe("bad input");
    expect(typeof entry.error.stack).toBe("string");
  });
});
