/**
 * スプレッドシート追記用の行データ
 *
 * データセット集計1件・取得失敗1件につき1行
 */

import { Report } from "../ingestion/types";
import { formatDatasetName } from "./reportBuilder";

export type SheetCell = string | number;

/**
 * 列の並び（シート側のヘッダー行と合わせる）
 */
export const SHEET_COLUMNS = [
  "generated_at",
  "run_id",
  "window_start",
  "window_end",
  "dataset",
  "status",
  "total_events",
  "success",
  "warning",
  "failure",
  "records",
  "top_errors",
  "unmapped_statuses",
  "dropped_records",
  "fingerprint",
] as const;

/**
 * レポートを行データに変換する
 */
export function buildSheetRows(report: Report, fingerprint: string): SheetCell[][] {
  const common = [
    report.generatedAt.toISOString(),
    report.runId,
    report.window.start.toISOString(),
    report.window.end.toISOString(),
  ];

  const summaryRows: SheetCell[][] = report.summaries.map((s) => [
    ...common,
    formatDatasetName(s),
    s.status,
    s.totalEvents,
    s.successCount,
    s.warningCount,
    s.failureCount,
    s.recordCount,
    s.topErrors.map((e) => `${e.code}:${e.count}`).join(";"),
    s.anomalies.unmappedStatusCount,
    s.anomalies.droppedRecordCount,
    fingerprint,
  ]);

  const failureRows: SheetCell[][] = report.fetchFailures.map((f) => [
    ...common,
    formatDatasetName(f),
    "fetch_failed",
    "",
    "",
    "",
    "",
    "",
    `${f.errorCode}: ${f.message}`,
    "",
    "",
    fingerprint,
  ]);

  return [...summaryRows, ...failureRows];
}
