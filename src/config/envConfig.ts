/**
 * 取込監視ジョブ - 環境変数設定
 *
 * 秘密情報とプロセス設定は環境変数から読み込む。
 * パイプライン定義（データセット・ソース・配信先）は設定ファイル側で
 * ${AEP_ACCESS_TOKEN} のように参照する
 */

import { PIPELINE_DEFAULTS, SERVER } from "../constants";
import { ConfigurationError } from "../errors";

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  /** パイプライン設定ファイルのパス */
  pipelineConfigPath: string;

  /**
   * 実行全体のタイムアウト上書き（ミリ秒）
   * - 環境変数 RUN_TIMEOUT_MS で設定
   * - 未設定または不正な値の場合は設定ファイルの値を使用
   */
  runTimeoutMs?: number;

  /** cronエンドポイントのAPIキー（未設定なら認証なし） */
  apiKey?: string;

  /**
   * Google サービスアカウントの認証情報（JSON文字列）
   * Sheets / Drive への配信で使用
   */
  googleServiceAccountJson?: string;
}

/**
 * 設定ファイルから参照される前提の環境変数
 */
const PIPELINE_ENV_VARS = [
  "AEP_ACCESS_TOKEN",
  "AEP_API_KEY",
  "AEP_ORG_ID",
  "GOOGLE_CHAT_WEBHOOK_URL",
] as const;

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

function getEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * 環境変数から設定オブジェクトを返す
 * @throws {ConfigurationError} PORT が不正な場合
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid PORT value: ${env.PORT}`);
  }

  return {
    port,
    nodeEnv: env.NODE_ENV || "development",
    pipelineConfigPath: env.PIPELINE_CONFIG_PATH || PIPELINE_DEFAULTS.CONFIG_PATH,
    runTimeoutMs: parsePositiveInt(env.RUN_TIMEOUT_MS),
    apiKey: getEnvString(env, "API_KEY"),
    googleServiceAccountJson: getEnvString(env, "GOOGLE_SERVICE_ACCOUNT_JSON"),
  };
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 * @returns 検証結果とエラーメッセージ
 */
export function validateEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid PORT value: ${env.PORT}`);
  }

  if (env.RUN_TIMEOUT_MS && parsePositiveInt(env.RUN_TIMEOUT_MS) === undefined) {
    errors.push(`Invalid RUN_TIMEOUT_MS value: ${env.RUN_TIMEOUT_MS}`);
  }

  for (const varName of PIPELINE_ENV_VARS) {
    if (!env[varName]) {
      warnings.push(`Environment variable ${varName} is not set`);
    }
  }

  if (env.NODE_ENV === "production" && !env.API_KEY) {
    warnings.push("API_KEY is not set; the cron endpoint is unauthenticated");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * 環境変数の設定例を出力（運用向け）
 */
export function printEnvTemplate(): void {
  console.log(`
# AEP Catalog API
AEP_BASE_URL=https://platform.adobe.io
AEP_ACCESS_TOKEN=your_access_token
AEP_API_KEY=your_client_id
AEP_ORG_ID=your_org_id@AdobeOrg
AEP_SANDBOX_NAME=prod

# Events API（使用する場合）
EVENTS_API_TOKEN=your_events_token

# 配信先
GOOGLE_CHAT_WEBHOOK_URL=https://chat.googleapis.com/v1/spaces/XXXX/messages?key=...&token=...
GOOGLE_SERVICE_ACCOUNT_JSON={"type":"service_account",...}

# パイプライン
PIPELINE_CONFIG_PATH=config/pipeline.json
RUN_TIMEOUT_MS=300000

# サーバー設定（オプション）
PORT=8080
NODE_ENV=production
API_KEY=your_api_key
LOG_LEVEL=info
  `);
}
