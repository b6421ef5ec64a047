/**
 * カスタムエラークラス
 *
 * 取込監視パイプラインのエラー分類を統一し、
 * リトライ可否・レコード単位の除外・配信先ごとの隔離を判定できるようにする
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 認証エラー
  AUTH_FAILED: "AUTH_FAILED",

  // バリデーションエラー
  VALIDATION_ERROR: "VALIDATION_ERROR",
  MALFORMED_RECORD: "MALFORMED_RECORD",

  // 外部サービスエラー
  NETWORK_ERROR: "NETWORK_ERROR",
  SOURCE_API_ERROR: "SOURCE_API_ERROR",
  DELIVERY_FAILED: "DELIVERY_FAILED",
  DELIVERY_ABORTED: "DELIVERY_ABORTED",

  // パイプライン
  PIPELINE_TIMEOUT: "PIPELINE_TIMEOUT",
  NO_DATA_FETCHED: "NO_DATA_FETCHED",

  // サーバーエラー
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",

  // サーキットブレーカー
  CIRCUIT_OPEN: "CIRCUIT_OPEN",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
  retryable?: boolean;
  retryAfterMs?: number;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// レコード単位のエラー
// =============================================================================

/**
 * 不正レコードエラー
 *
 * 1レコードだけに閉じたエラー。バッチ全体は中断せず、該当レコードを除外する
 */
export class MalformedRecordError extends AppError {
  public readonly datasetId: string;
  public readonly field: string;
  public readonly recordIndex: number;

  constructor(options: {
    datasetId: string;
    field: string;
    recordIndex: number;
    message: string;
    received?: unknown;
  }) {
    super({
      code: ErrorCode.MALFORMED_RECORD,
      message: options.message,
      statusCode: 422,
      details: {
        datasetId: options.datasetId,
        field: options.field,
        recordIndex: options.recordIndex,
        received: options.received,
      },
      retryable: false,
    });
    this.name = "MalformedRecordError";
    this.datasetId = options.datasetId;
    this.field = options.field;
    this.recordIndex = options.recordIndex;
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
      retryable: false,
    });
    this.name = "ValidationError";
    this.errors = errors;
  }

  static fromZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors: ValidationErrorDetail[] = zodError.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return new ValidationError(errors);
  }
}

// =============================================================================
// ソースAPIエラー
// =============================================================================

/**
 * 認証エラー
 * リトライしても無駄なエラー
 */
export class AuthError extends AppError {
  public readonly source: string;

  constructor(source: string, message: string = "Authentication failed", statusCode: number = 401) {
    super({
      code: ErrorCode.AUTH_FAILED,
      message,
      statusCode,
      details: { source },
      retryable: false,
    });
    this.name = "AuthError";
    this.source = source;
  }
}

/**
 * ネットワーク・ソースAPIエラー
 */
export class NetworkError extends AppError {
  public readonly source: string;
  public readonly httpStatus?: number;

  constructor(options: {
    source: string;
    message: string;
    httpStatus?: number;
    retryable?: boolean;
    retryAfterMs?: number;
    cause?: Error;
  }) {
    super({
      code: options.httpStatus !== undefined ? ErrorCode.SOURCE_API_ERROR : ErrorCode.NETWORK_ERROR,
      message: options.message,
      statusCode: 502,
      details: { source: options.source, httpStatus: options.httpStatus },
      retryable: options.retryable ?? true,
      retryAfterMs: options.retryAfterMs,
      cause: options.cause,
    });
    this.name = "NetworkError";
    this.source = options.source;
    this.httpStatus = options.httpStatus;
  }

  /**
   * HTTPステータスコードからエラーを生成
   */
  static fromHttpStatus(
    source: string,
    status: number,
    responseBody: string,
    retryAfterHeader?: string | null
  ): AuthError | NetworkError {
    switch (status) {
      case 401:
        return new AuthError(source, `${source} authentication failed`, 401);
      case 403:
        return new AuthError(source, `${source} access forbidden`, 403);
      case 408:
      case 429: {
        const retryAfterSec = retryAfterHeader ? parseInt(retryAfterHeader, 10) : NaN;
        return new NetworkError({
          source,
          message: `${source} rate limited: ${status}`,
          httpStatus: status,
          retryable: true,
          retryAfterMs: isNaN(retryAfterSec) ? 60000 : retryAfterSec * 1000,
        });
      }
      case 500:
      case 502:
      case 503:
      case 504:
        return new NetworkError({
          source,
          message: `${source} server error: ${status}`,
          httpStatus: status,
          retryable: true,
          retryAfterMs: 5000,
        });
      default:
        return new NetworkError({
          source,
          message: `${source} error ${status}: ${responseBody.substring(0, 500)}`,
          httpStatus: status,
          retryable: false,
        });
    }
  }
}

// =============================================================================
// 配信エラー
// =============================================================================

/**
 * 配信エラー
 * 配信先ごとに隔離され、他の配信先の試行を妨げない
 */
export class DeliveryError extends AppError {
  public readonly target: string;

  constructor(target: string, message: string, options?: { cause?: Error; aborted?: boolean }) {
    super({
      code: options?.aborted ? ErrorCode.DELIVERY_ABORTED : ErrorCode.DELIVERY_FAILED,
      message,
      statusCode: 502,
      details: { target },
      retryable: false,
      cause: options?.cause,
    });
    this.name = "DeliveryError";
    this.target = target;
  }
}

// =============================================================================
// パイプラインエラー
// =============================================================================

/**
 * 実行タイムアウト
 * 実行全体に致命的。部分的なレポートは配信しない
 */
export class PipelineTimeoutError extends AppError {
  public readonly timeoutMs: number;
  public readonly stage: string;

  constructor(timeoutMs: number, stage: string) {
    super({
      code: ErrorCode.PIPELINE_TIMEOUT,
      message: `Pipeline exceeded ${timeoutMs}ms during ${stage}`,
      statusCode: 504,
      details: { timeoutMs, stage },
      retryable: false,
    });
    this.name = "PipelineTimeoutError";
    this.timeoutMs = timeoutMs;
    this.stage = stage;
  }
}

/**
 * 全データセットの取得失敗
 * 空の「正常」レポートを出さないためにレポート作成前に停止する
 */
export class NoDataFetchedError extends AppError {
  constructor(failures: Array<{ datasetId: string; message: string }>) {
    super({
      code: ErrorCode.NO_DATA_FETCHED,
      message: `All ${failures.length} dataset fetches failed`,
      statusCode: 502,
      details: { failures },
      retryable: false,
    });
    this.name = "NoDataFetchedError";
  }
}

// =============================================================================
// サーキットブレーカーエラー
// =============================================================================

/**
 * サーキットオープンエラー
 */
export class CircuitOpenError extends AppError {
  public readonly serviceName: string;
  public readonly openedAt: Date;

  constructor(serviceName: string, retryAfterMs: number = 30000) {
    super({
      code: ErrorCode.CIRCUIT_OPEN,
      message: `Circuit breaker is open for ${serviceName}`,
      statusCode: 503,
      details: { serviceName },
      retryable: false,
      retryAfterMs,
    });
    this.name = "CircuitOpenError";
    this.serviceName = serviceName;
    this.openedAt = new Date();
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

/**
 * 設定エラー
 */
export class ConfigurationError extends AppError {
  constructor(message: string, problems?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: problems ? { problems } : undefined,
      retryable: false,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * エラーがリトライ可能か判定
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return false;
    }
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("enotfound") ||
      message.includes("fetch failed") ||
      message.includes("network")
    );
  }
  return false;
}

/**
 * unknown をメッセージ文字列に変換
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
      retryable: isRetryableError(error),
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
    retryable: false,
  });
}
