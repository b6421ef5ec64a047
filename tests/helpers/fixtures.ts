/**
 * テスト用フィクスチャ
 */

import { FieldMappingSchema, PipelineConfig, parsePipelineConfig } from "../../src/config";
import { IngestionEvent, ReportingWindow, classifyEvents } from "../../src/ingestion";
import { buildReport } from "../../src/report";
import { FetchFailure, Report } from "../../src/ingestion/types";

export const WINDOW: ReportingWindow = {
  start: new Date("2024-03-01T00:00:00.000Z"),
  end: new Date("2024-03-02T00:00:00.000Z"),
};

export const GENERATED_AT = new Date("2024-03-02T00:05:00.000Z");

export const TEST_ENV: NodeJS.ProcessEnv = {
  AEP_ACCESS_TOKEN: "test-token",
  AEP_API_KEY: "test-api-key",
  AEP_ORG_ID: "test-org@AdobeOrg",
  GOOGLE_CHAT_WEBHOOK_URL: "https://chat.googleapis.com/v1/spaces/TEST/messages?key=test-key",
};

export const AEP_MAPPING = FieldMappingSchema.parse({
  timestamp: ["created"],
  status: ["status"],
  errorCode: ["errors.0.code"],
  errorMessage: ["errors.0.description"],
  recordCount: ["metrics.inputRecordCount"],
  sourceId: ["id"],
  flowId: ["tags.flowId.0"],
  samples: ["failureSamples"],
});

export function makeEvent(overrides: Partial<IngestionEvent> = {}): IngestionEvent {
  return {
    datasetId: "sales",
    timestamp: new Date("2024-03-01T12:00:00.000Z"),
    status: "success",
    recordCount: 1,
    ...overrides,
  };
}

/**
 * success 1件・E1 の failure 2件
 */
export function salesEvents(): IngestionEvent[] {
  return [
    makeEvent({
      timestamp: new Date("2024-03-01T01:00:00.000Z"),
      status: "success",
      sourceId: "b1",
      recordCount: 5,
    }),
    makeEvent({
      timestamp: new Date("2024-03-01T02:00:00.000Z"),
      status: "failure",
      errorCode: "E1",
      errorMessage: "Schema mismatch",
      sourceId: "b2",
      flowId: "f1",
      recordCount: 3,
      samples: [{ eventType: "web.click", pageUrl: "https://example.com/p" }],
    }),
    makeEvent({
      timestamp: new Date("2024-03-01T03:00:00.000Z"),
      status: "failure",
      errorCode: "E1",
      errorMessage: "Schema mismatch",
      sourceId: "b3",
      recordCount: 2,
    }),
  ];
}

export const ORDERS_FETCH_FAILURE: FetchFailure = {
  datasetId: "orders",
  source: "aep",
  errorCode: "AUTH_FAILED",
  message: "aep authentication failed",
};

export function buildSalesReport(
  options: { fetchFailures?: FetchFailure[]; generatedAt?: Date; runId?: string } = {}
): Report {
  const summaries = classifyEvents(salesEvents(), WINDOW, {
    thresholds: { degraded: 0, critical: 0.5 },
    datasets: [{ id: "sales", label: "Sales events", expectation: "continuous" }],
  });
  return buildReport({
    runId: options.runId ?? "run-1",
    generatedAt: options.generatedAt ?? GENERATED_AT,
    window: WINDOW,
    summaries,
    fetchFailures: options.fetchFailures,
  });
}

export function makePipelineConfig(overrides: Record<string, unknown> = {}): PipelineConfig {
  return parsePipelineConfig(
    {
      sources: [
        {
          type: "aep_catalog",
          name: "aep",
          accessToken: "${AEP_ACCESS_TOKEN}",
          apiKey: "${AEP_API_KEY}",
          orgId: "${AEP_ORG_ID}",
        },
      ],
      fieldMappings: {
        aep_batch: {
          timestamp: ["created"],
          status: ["status"],
          errorCode: ["errors.0.code"],
          sourceId: ["id"],
        },
      },
      datasets: [
        { id: "sales", source: "aep", mapping: "aep_batch" },
        { id: "orders", source: "aep", mapping: "aep_batch" },
      ],
      ...overrides,
    },
    TEST_ENV
  );
}
