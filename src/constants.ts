/**
 * 取込監視ジョブ - 定数定義
 */

import type { IngestionStatus } from "./ingestion/types";

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  /** デフォルトポート番号 */
  DEFAULT_PORT: 8080,
} as const;

// =============================================================================
// パイプライン既定値
// =============================================================================
export const PIPELINE_DEFAULTS = {
  /** レポート対象期間（時間） */
  WINDOW_HOURS: 24,
  /** エラーコード上位件数 */
  MAX_TOP_ERRORS: 5,
  /** データセットごとに表示する失敗例の件数 */
  MAX_FAILURE_EXAMPLES: 3,
  /** 実行全体のタイムアウト（ミリ秒） */
  RUN_TIMEOUT_MS: 5 * 60 * 1000,
  /** 設定ファイルのパス */
  CONFIG_PATH: "config/pipeline.json",
} as const;

/**
 * 状態判定の閾値（失敗率）
 * - critical: 失敗率がこれを超えたら critical
 * - degraded: 失敗があり、失敗率がこれを超えたら degraded
 */
export const DEFAULT_THRESHOLDS = {
  degraded: 0,
  critical: 0.5,
} as const;

/**
 * 既定のステータス対応表（小文字で照合）
 * AEP Catalog のバッチステータスと一般的な表記
 */
export const DEFAULT_STATUS_MAP: Readonly<Record<string, IngestionStatus>> = {
  success: "success",
  succeeded: "success",
  ok: "success",
  active: "success",
  warning: "warning",
  failed: "failure",
  failure: "failure",
  error: "failure",
  aborted: "failure",
};

// =============================================================================
// AEP Catalog API
// =============================================================================
export const AEP_API = {
  /** デフォルトのベースURL */
  DEFAULT_BASE_URL: "https://platform.adobe.io",
  /** バッチ一覧のパス */
  BATCHES_PATH: "/data/foundation/catalog/batches",
  /** 1リクエストあたりの取得件数 */
  DEFAULT_LIMIT: 100,
  /** 失敗バッチごとのサンプル取得上限 */
  DEFAULT_MAX_SAMPLES_PER_BATCH: 5,
  /** リクエスト単位のタイムアウト（ミリ秒） */
  REQUEST_TIMEOUT_MS: 30000,
} as const;

// =============================================================================
// Google API
// =============================================================================
export const GOOGLE_API = {
  SCOPES: [
    "https://www.googleapis.com/auth/spreadsheets",
    "https://www.googleapis.com/auth/drive.file",
  ],
} as const;

/** サンプル値が取れなかった場合の表示 */
export const NOT_AVAILABLE = "N/A";
