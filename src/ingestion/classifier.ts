/**
 * 取込監視 - エラー分類
 *
 * 正規化イベントをデータセット単位に集計し、失敗率と閾値から
 * healthy / degraded / critical を判定する。純粋関数のみ
 */

import { Thresholds } from "../config/pipelineConfigTypes";
import { PIPELINE_DEFAULTS } from "../constants";
import { ValidationError } from "../errors";
import {
  DatasetExpectation,
  DatasetHealth,
  DatasetSummary,
  FailureExample,
  IngestionEvent,
  NormalizationAnomalies,
  ReportingWindow,
  TopError,
  emptyAnomalies,
} from "./types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 監視対象として登録済みのデータセット
 * イベントが0件でも集計を出すために使う
 */
export interface ExpectedDataset {
  id: string;
  label?: string;
  expectation: DatasetExpectation;
}

/**
 * 分類オプション
 */
export interface ClassifyOptions {
  thresholds: Thresholds;
  /** エラーコード上位の件数（デフォルト: 5） */
  maxTopErrors?: number;
  /** 失敗例の件数（デフォルト: 3） */
  maxFailureExamples?: number;
  /** 登録済みデータセット（未登録のデータセットは continuous として扱う） */
  datasets?: readonly ExpectedDataset[];
  /** 正規化時の異常件数（データセットID別） */
  anomalies?: Readonly<Record<string, NormalizationAnomalies>>;
}

// =============================================================================
// 判定
// =============================================================================

/**
 * 件数と閾値から健康状態を判定する
 *
 * - 0件: continuous なら degraded、sparse なら healthy
 * - 失敗率 > critical: critical
 * - 失敗あり かつ 失敗率 > degraded: degraded
 * - それ以外: healthy
 */
export function determineHealth(
  totalEvents: number,
  failureCount: number,
  expectation: DatasetExpectation,
  thresholds: Thresholds
): DatasetHealth {
  if (totalEvents === 0) {
    return expectation === "continuous" ? "degraded" : "healthy";
  }
  if (failureCount === 0) {
    return "healthy";
  }
  const failureRatio = failureCount / totalEvents;
  if (failureRatio > thresholds.critical) {
    return "critical";
  }
  if (failureRatio > thresholds.degraded) {
    return "degraded";
  }
  return "healthy";
}

/**
 * イベントが閉区間 [start, end] に含まれるか
 */
export function isWithinWindow(timestamp: Date, window: ReportingWindow): boolean {
  const t = timestamp.getTime();
  return t >= window.start.getTime() && t <= window.end.getTime();
}

/**
 * エラーコードを頻度順に並べる
 *
 * 同数の場合は最初に出現した順（時刻が早い順、同時刻ならコード昇順）。
 * 入力順に依存しないので、並列取得で順序が揺れても結果は変わらない
 */
export function rankTopErrors(events: readonly IngestionEvent[], limit: number): TopError[] {
  const stats = new Map<string, { count: number; firstSeen: number }>();

  for (const event of events) {
    if (event.status === "success" || event.errorCode === undefined) {
      continue;
    }
    const t = event.timestamp.getTime();
    const current = stats.get(event.errorCode);
    if (current) {
      current.count++;
      current.firstSeen = Math.min(current.firstSeen, t);
    } else {
      stats.set(event.errorCode, { count: 1, firstSeen: t });
    }
  }

  return [...stats.entries()]
    .sort(([codeA, a], [codeB, b]) => {
      if (a.count !== b.count) return b.count - a.count;
      if (a.firstSeen !== b.firstSeen) return a.firstSeen - b.firstSeen;
      return codeA < codeB ? -1 : codeA > codeB ? 1 : 0;
    })
    .slice(0, limit)
    .map(([code, { count }]) => ({ code, count }));
}

function compareOptional(a: string | undefined, b: string | undefined): number {
  const left = a ?? "";
  const right = b ?? "";
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * 失敗例を選ぶ（時刻の早い順、同時刻はソースID順）
 */
export function selectFailureExamples(
  events: readonly IngestionEvent[],
  limit: number
): FailureExample[] {
  return events
    .filter((event) => event.status === "failure")
    .sort(
      (a, b) =>
        a.timestamp.getTime() - b.timestamp.getTime() ||
        compareOptional(a.sourceId, b.sourceId) ||
        compareOptional(a.errorCode, b.errorCode)
    )
    .slice(0, limit)
    .map((event) => ({
      sourceId: event.sourceId,
      flowId: event.flowId,
      timestamp: event.timestamp,
      errorCode: event.errorCode,
      errorMessage: event.errorMessage,
      samples: event.samples ?? [],
    }));
}

// =============================================================================
// 集計
// =============================================================================

function summarizeDataset(
  datasetId: string,
  events: readonly IngestionEvent[],
  window: ReportingWindow,
  expected: ExpectedDataset | undefined,
  options: ClassifyOptions
): DatasetSummary {
  let successCount = 0;
  let warningCount = 0;
  let failureCount = 0;
  let recordCount = 0;

  for (const event of events) {
    recordCount += event.recordCount;
    switch (event.status) {
      case "success":
        successCount++;
        break;
      case "warning":
        warningCount++;
        break;
      case "failure":
        failureCount++;
        break;
    }
  }

  const expectation = expected?.expectation ?? "continuous";
  const anomalies = options.anomalies?.[datasetId];

  return {
    datasetId,
    label: expected?.label,
    windowStart: window.start,
    windowEnd: window.end,
    expectation,
    totalEvents: events.length,
    successCount,
    warningCount,
    failureCount,
    recordCount,
    topErrors: rankTopErrors(events, options.maxTopErrors ?? PIPELINE_DEFAULTS.MAX_TOP_ERRORS),
    failureExamples: selectFailureExamples(
      events,
      options.maxFailureExamples ?? PIPELINE_DEFAULTS.MAX_FAILURE_EXAMPLES
    ),
    anomalies: anomalies
      ? { ...anomalies, unmappedStatusValues: [...anomalies.unmappedStatusValues] }
      : emptyAnomalies(),
    status: determineHealth(events.length, failureCount, expectation, options.thresholds),
  };
}

/**
 * イベントをデータセット単位に集計する
 *
 * ウィンドウ外のイベントは捨てる。ウィンドウ内にイベントがあるデータセットと
 * 登録済みデータセットのそれぞれに1件ずつ集計を返す（データセットID昇順）
 *
 * @throws {ValidationError} ウィンドウの開始が終了より後の場合
 */
export function classifyEvents(
  events: readonly IngestionEvent[],
  window: ReportingWindow,
  options: ClassifyOptions
): DatasetSummary[] {
  if (window.start.getTime() > window.end.getTime()) {
    throw new ValidationError([
      {
        field: "window",
        message: "Window start must not be after window end",
        received: { start: window.start.toISOString(), end: window.end.toISOString() },
      },
    ]);
  }

  const grouped = new Map<string, IngestionEvent[]>();
  for (const dataset of options.datasets ?? []) {
    grouped.set(dataset.id, []);
  }
  for (const event of events) {
    if (!isWithinWindow(event.timestamp, window)) {
      continue;
    }
    const bucket = grouped.get(event.datasetId);
    if (bucket) {
      bucket.push(event);
    } else {
      grouped.set(event.datasetId, [event]);
    }
  }

  const expectedById = new Map((options.datasets ?? []).map((d) => [d.id, d]));

  return [...grouped.keys()]
    .sort()
    .map((datasetId) =>
      summarizeDataset(
        datasetId,
        grouped.get(datasetId) ?? [],
        window,
        expectedById.get(datasetId),
        options
      )
    );
}
