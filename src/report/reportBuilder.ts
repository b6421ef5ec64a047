/**
 * レポート作成
 *
 * 集計結果から不変の Report を作り、テキストに描画する。
 * 同じ入力からは常にバイト単位で同じ出力を返す（配信先での重複排除のため）。
 * ロケールや描画時刻に依存する内容は含めない（generatedAt を除く）
 */

import { createHash } from "crypto";
import {
  DatasetHealth,
  DatasetSummary,
  FailureExample,
  FetchFailure,
  HEALTH_SEVERITY,
  Report,
  ReportingWindow,
} from "../ingestion/types";

// =============================================================================
// 型定義
// =============================================================================

export interface BuildReportInput {
  runId: string;
  generatedAt: Date;
  window: ReportingWindow;
  summaries: readonly DatasetSummary[];
  fetchFailures?: readonly FetchFailure[];
}

// =============================================================================
// 並び順・全体判定
// =============================================================================

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * critical → degraded → healthy、同じ状態ならデータセットID昇順
 */
export function sortSummaries(summaries: readonly DatasetSummary[]): DatasetSummary[] {
  return [...summaries].sort(
    (a, b) =>
      HEALTH_SEVERITY[a.status] - HEALTH_SEVERITY[b.status] ||
      compareText(a.datasetId, b.datasetId)
  );
}

/**
 * 全体の状態
 * 最も重大なデータセットの状態。取得失敗があれば少なくとも degraded
 */
export function determineOverallStatus(
  summaries: readonly DatasetSummary[],
  fetchFailures: readonly FetchFailure[]
): DatasetHealth {
  let overall: DatasetHealth = fetchFailures.length > 0 ? "degraded" : "healthy";
  for (const summary of summaries) {
    if (HEALTH_SEVERITY[summary.status] < HEALTH_SEVERITY[overall]) {
      overall = summary.status;
    }
  }
  return overall;
}

/**
 * Report を作成する（不変オブジェクト）
 */
export function buildReport(input: BuildReportInput): Report {
  const fetchFailures = [...(input.fetchFailures ?? [])].sort(
    (a, b) => compareText(a.datasetId, b.datasetId) || compareText(a.source, b.source)
  );
  const summaries = sortSummaries(input.summaries);

  return Object.freeze({
    runId: input.runId,
    generatedAt: new Date(input.generatedAt.getTime()),
    window: Object.freeze({
      start: new Date(input.window.start.getTime()),
      end: new Date(input.window.end.getTime()),
    }),
    summaries: Object.freeze(summaries),
    fetchFailures: Object.freeze(fetchFailures),
    overallStatus: determineOverallStatus(summaries, fetchFailures),
  });
}

// =============================================================================
// 描画ヘルパー
// =============================================================================

/**
 * 失敗率（%表記、小数1桁）
 */
export function formatFailureRate(summary: DatasetSummary): string {
  if (summary.totalEvents === 0) {
    return "n/a";
  }
  return `${((summary.failureCount / summary.totalEvents) * 100).toFixed(1)}%`;
}

export function formatDatasetName(item: { datasetId: string; label?: string }): string {
  return item.label ? `${item.datasetId} (${item.label})` : item.datasetId;
}

export function countByStatus(summaries: readonly DatasetSummary[]): Record<DatasetHealth, number> {
  const counts: Record<DatasetHealth, number> = { critical: 0, degraded: 0, healthy: 0 };
  for (const summary of summaries) {
    counts[summary.status]++;
  }
  return counts;
}

function renderFailureExample(example: FailureExample): string[] {
  const flow = example.flowId ? ` (flow ${example.flowId})` : "";
  const lines = [
    `    - ${example.timestamp.toISOString()} ${example.sourceId ?? "-"}${flow} ${example.errorCode ?? "-"}: ${example.errorMessage ?? "-"}`,
  ];
  for (const sample of example.samples) {
    lines.push(`        sample: ${sample.eventType} ${sample.pageUrl}`);
  }
  return lines;
}

function renderSummary(summary: DatasetSummary): string[] {
  const lines = [`[${summary.status.toUpperCase()}] ${formatDatasetName(summary)}`];

  if (summary.totalEvents === 0) {
    lines.push(`  no events in window (expected ${summary.expectation} ingestion)`);
  } else {
    lines.push(
      `  events ${summary.totalEvents}: success ${summary.successCount}, warning ${summary.warningCount}, failure ${summary.failureCount} (${formatFailureRate(summary)} failed), records ${summary.recordCount}`
    );
  }

  if (summary.topErrors.length > 0) {
    lines.push(`  top errors: ${summary.topErrors.map((e) => `${e.code} x${e.count}`).join(", ")}`);
  }
  if (summary.anomalies.unmappedStatusCount > 0) {
    lines.push(
      `  unmapped statuses: ${summary.anomalies.unmappedStatusCount} [${summary.anomalies.unmappedStatusValues.join(", ")}]`
    );
  }
  if (summary.anomalies.droppedRecordCount > 0) {
    lines.push(`  dropped malformed records: ${summary.anomalies.droppedRecordCount}`);
  }
  if (summary.failureExamples.length > 0) {
    lines.push("  failures:");
    for (const example of summary.failureExamples) {
      lines.push(...renderFailureExample(example));
    }
  }

  return lines;
}

// =============================================================================
// テキスト描画
// =============================================================================

/**
 * レポートをプレーンテキストに描画する
 */
export function renderReportText(report: Report): string {
  const counts = countByStatus(report.summaries);
  const fetchFailed =
    report.fetchFailures.length > 0 ? `, fetch failed ${report.fetchFailures.length}` : "";

  const blocks: string[][] = [
    [
      `Ingestion report: ${report.overallStatus.toUpperCase()}`,
      `Generated: ${report.generatedAt.toISOString()}`,
      `Window: ${report.window.start.toISOString()} .. ${report.window.end.toISOString()}`,
      `Datasets: ${report.summaries.length} (critical ${counts.critical}, degraded ${counts.degraded}, healthy ${counts.healthy}${fetchFailed})`,
    ],
    ...report.summaries.map(renderSummary),
  ];

  if (report.fetchFailures.length > 0) {
    blocks.push([
      "FETCH FAILED",
      ...report.fetchFailures.map(
        (f) => `  - ${formatDatasetName(f)} via ${f.source}: ${f.errorCode} ${f.message}`
      ),
    ]);
  }

  return blocks.map((block) => block.join("\n")).join("\n\n") + "\n";
}

/**
 * 重複排除キー
 * generatedAt を除いた描画結果の SHA-256（同じ内容なら再実行しても同じ値）
 */
export function reportFingerprint(report: Report): string {
  const stable = renderReportText(report)
    .split("\n")
    .filter((line) => !line.startsWith("Generated: "))
    .join("\n");
  return createHash("sha256").update(stable).digest("hex");
}
