/**
 * 取込監視 - 型定義
 *
 * ソースAPIの生レコードを正規化したイベントと、
 * データセット単位の集計・レポートの型
 */

// =============================================================================
// 基本型
// =============================================================================

/**
 * 生レコード（ソースAPIの応答そのまま。データセットごとに形が異なる）
 */
export type RawRecord = Record<string, unknown>;

/**
 * 取込ステータス
 */
export type IngestionStatus = "success" | "warning" | "failure";

export const INGESTION_STATUSES: readonly IngestionStatus[] = ["success", "warning", "failure"];

/**
 * データセットの健康状態
 */
export type DatasetHealth = "healthy" | "degraded" | "critical";

/**
 * 健康状態の重大度（ソートと全体判定に使用。小さいほど重大）
 */
export const HEALTH_SEVERITY: Record<DatasetHealth, number> = {
  critical: 0,
  degraded: 1,
  healthy: 2,
};

/**
 * データセットの取込頻度の想定
 * - continuous: 常時取込される想定。ウィンドウ内のイベント0件は異常
 * - sparse: まばらな取込。0件でも正常
 */
export type DatasetExpectation = "continuous" | "sparse";

/**
 * レポート対象期間（閉区間 [start, end]）
 */
export interface ReportingWindow {
  start: Date;
  end: Date;
}

// =============================================================================
// 正規化イベント
// =============================================================================

/**
 * 失敗レコードのサンプル
 */
export interface FailureSample {
  eventType: string;
  pageUrl: string;
}

/**
 * 正規化された取込イベント（作成後は不変）
 */
export interface IngestionEvent {
  readonly datasetId: string;
  readonly timestamp: Date;
  readonly status: IngestionStatus;
  readonly errorCode?: string;
  readonly errorMessage?: string;
  readonly recordCount: number;
  /** ソース側の識別子（AEPのバッチIDなど） */
  readonly sourceId?: string;
  /** データフローID */
  readonly flowId?: string;
  readonly samples?: readonly FailureSample[];
}

/**
 * 正規化時に検出した異常の件数
 */
export interface NormalizationAnomalies {
  /** ステータス対応表にない値を warning として扱った件数 */
  unmappedStatusCount: number;
  /** 不正レコードとして除外した件数 */
  droppedRecordCount: number;
  /** 対応表になかったステータス値（重複なし・昇順） */
  unmappedStatusValues: string[];
}

// =============================================================================
// 集計
// =============================================================================

/**
 * エラーコード別件数
 */
export interface TopError {
  code: string;
  count: number;
}

/**
 * 失敗イベントの例（レポート表示用）
 */
export interface FailureExample {
  sourceId?: string;
  flowId?: string;
  timestamp: Date;
  errorCode?: string;
  errorMessage?: string;
  samples: readonly FailureSample[];
}

/**
 * データセット単位の集計
 *
 * 不変条件: successCount + warningCount + failureCount === totalEvents
 */
export interface DatasetSummary {
  datasetId: string;
  label?: string;
  windowStart: Date;
  windowEnd: Date;
  expectation: DatasetExpectation;
  totalEvents: number;
  successCount: number;
  warningCount: number;
  failureCount: number;
  /** イベントが表すレコード数の合計 */
  recordCount: number;
  topErrors: TopError[];
  failureExamples: FailureExample[];
  anomalies: NormalizationAnomalies;
  status: DatasetHealth;
}

/**
 * 取得に失敗したデータセット
 */
export interface FetchFailure {
  datasetId: string;
  label?: string;
  source: string;
  errorCode: string;
  message: string;
}

// =============================================================================
// レポート
// =============================================================================

/**
 * 1回の実行で作成されるレポート（作成後は不変）
 */
export interface Report {
  runId: string;
  generatedAt: Date;
  window: ReportingWindow;
  summaries: readonly DatasetSummary[];
  fetchFailures: readonly FetchFailure[];
  overallStatus: DatasetHealth;
}

export function emptyAnomalies(): NormalizationAnomalies {
  return { unmappedStatusCount: 0, droppedRecordCount: 0, unmappedStatusValues: [] };
}
