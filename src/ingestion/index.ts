/**
 * 取込監視モジュール
 *
 * 主要エクスポート:
 * - normalizeRecords: 生レコードを IngestionEvent に正規化
 * - classifyEvents: イベントをデータセット単位に集計・判定
 */

export {
  RawRecord,
  IngestionStatus,
  INGESTION_STATUSES,
  DatasetHealth,
  HEALTH_SEVERITY,
  DatasetExpectation,
  ReportingWindow,
  FailureSample,
  IngestionEvent,
  NormalizationAnomalies,
  TopError,
  FailureExample,
  DatasetSummary,
  FetchFailure,
  Report,
  emptyAnomalies,
} from "./types";

export {
  NormalizeContext,
  NormalizationResult,
  parseTimestamp,
  mapStatus,
  normalizeRecord,
  normalizeRecords,
} from "./normalizer";

export {
  ExpectedDataset,
  ClassifyOptions,
  determineHealth,
  isWithinWindow,
  rankTopErrors,
  selectFailureExamples,
  classifyEvents,
} from "./classifier";
