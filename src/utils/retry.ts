/**
 * リトライ・サーキットブレーカーユーティリティ
 *
 * ソースAPI（AEP Catalog, Events API）への呼び出しを
 * 指数バックオフでリトライし、障害が続く場合はサーキットブレーカーで遮断する。
 * AbortSignal が中断されたら待機中のリトライも含めて即座に打ち切る
 */

import { logger } from "../logger";
import { AppError, CircuitOpenError, isRetryableError } from "../errors";

// =============================================================================
// 設定
// =============================================================================

export interface RetryConfig {
  maxRetries: number; // 最大リトライ回数
  baseDelayMs: number; // 基本待機時間（ミリ秒）
  maxDelayMs: number; // 最大待機時間（ミリ秒）
  backoffMultiplier: number; // 指数バックオフ乗数
  retryableErrors?: string[]; // リトライ対象のエラーコード
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // オープンになる失敗回数
  resetTimeoutMs: number; // ハーフオープンまでの時間
  halfOpenRequests: number; // ハーフオープン時の試行回数
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableErrors: ["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ENOTFOUND"],
};

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 60000, // 1分
  halfOpenRequests: 1,
};

// =============================================================================
// サーキットブレーカー
// =============================================================================

type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

interface CircuitBreakerState {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  halfOpenAttempts: number;
}

const circuitBreakers = new Map<string, CircuitBreakerState>();

function getCircuitBreaker(name: string): CircuitBreakerState {
  let breaker = circuitBreakers.get(name);
  if (!breaker) {
    breaker = {
      state: "CLOSED",
      failures: 0,
      successes: 0,
      lastFailureTime: null,
      halfOpenAttempts: 0,
    };
    circuitBreakers.set(name, breaker);
  }
  return breaker;
}

function shouldAllowRequest(name: string, config: CircuitBreakerConfig): boolean {
  const breaker = getCircuitBreaker(name);

  switch (breaker.state) {
    case "CLOSED":
      return true;

    case "OPEN":
      // タイムアウト経過後、ハーフオープンに移行
      if (
        breaker.lastFailureTime !== null &&
        Date.now() - breaker.lastFailureTime >= config.resetTimeoutMs
      ) {
        breaker.state = "HALF_OPEN";
        breaker.halfOpenAttempts = 1;
        logger.info("Circuit breaker transitioning to HALF_OPEN", { name });
        return true;
      }
      return false;

    case "HALF_OPEN":
      if (breaker.halfOpenAttempts < config.halfOpenRequests) {
        breaker.halfOpenAttempts++;
        return true;
      }
      return false;
  }
}

function recordSuccess(name: string, config: CircuitBreakerConfig): void {
  const breaker = getCircuitBreaker(name);

  if (breaker.state === "HALF_OPEN") {
    breaker.successes++;
    if (breaker.successes >= config.halfOpenRequests) {
      breaker.state = "CLOSED";
      breaker.failures = 0;
      breaker.successes = 0;
      breaker.halfOpenAttempts = 0;
      logger.info("Circuit breaker CLOSED (recovered)", { name });
    }
  } else if (breaker.state === "CLOSED") {
    breaker.failures = 0;
  }
}

function recordFailure(name: string, config: CircuitBreakerConfig): void {
  const breaker = getCircuitBreaker(name);
  breaker.failures++;
  breaker.lastFailureTime = Date.now();

  if (breaker.state === "HALF_OPEN") {
    // ハーフオープン中の失敗は即座にオープンに戻す
    breaker.state = "OPEN";
    breaker.successes = 0;
    logger.warn("Circuit breaker OPEN (half-open failure)", { name });
  } else if (breaker.state === "CLOSED" && breaker.failures >= config.failureThreshold) {
    breaker.state = "OPEN";
    logger.warn("Circuit breaker OPEN", {
      name,
      failures: breaker.failures,
      threshold: config.failureThreshold,
    });
  }
}

// =============================================================================
// 中断
// =============================================================================

/**
 * 中断理由を Error として取り出す
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === "string" ? reason : "The operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * 待機（signal が中断されたら reject）
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function getErrorCode(error: unknown): string {
  if (error instanceof AppError) {
    return error.code;
  }
  if (error !== null && typeof error === "object" && "code" in error) {
    const code: unknown = error.code;
    if (typeof code === "string" || typeof code === "number") {
      return String(code);
    }
  }
  return "";
}

// =============================================================================
// リトライ関数
// =============================================================================

export interface RetryOptions {
  name: string;
  retryConfig?: Partial<RetryConfig>;
  circuitBreakerConfig?: Partial<CircuitBreakerConfig>;
  signal?: AbortSignal;
}

/**
 * 指数バックオフでリトライを実行
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig };
  const cbConfig = {
    ...DEFAULT_CIRCUIT_BREAKER_CONFIG,
    ...options.circuitBreakerConfig,
  };
  const { signal } = options;

  if (!shouldAllowRequest(options.name, cbConfig)) {
    throw new CircuitOpenError(options.name, cbConfig.resetTimeoutMs);
  }

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    try {
      const result = await fn(attempt);
      recordSuccess(options.name, cbConfig);
      return result;
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      // 中断はリトライもブレーカーの失敗計上もしない
      if (signal?.aborted) {
        throw lastError;
      }

      const errorCode = getErrorCode(error);
      // AppErrorの場合はretryableプロパティを優先
      const canRetry =
        error instanceof AppError
          ? error.retryable
          : isRetryableError(error) ||
            (retryConfig.retryableErrors ?? []).some(
              (code) => errorCode.includes(code) || lastError.message.includes(code)
            );

      if (!canRetry || attempt >= retryConfig.maxRetries) {
        recordFailure(options.name, cbConfig);
        logger.error("Request failed (no more retries)", {
          name: options.name,
          attempt,
          error: lastError.message,
          code: errorCode,
          retryable: canRetry,
        });
        throw lastError;
      }

      // AppErrorのretryAfterMsがあればそれを使用（上限あり）、なければ指数バックオフ
      const delay =
        error instanceof AppError && error.retryAfterMs
          ? Math.min(error.retryAfterMs, retryConfig.maxDelayMs)
          : Math.min(
              retryConfig.baseDelayMs * Math.pow(retryConfig.backoffMultiplier, attempt),
              retryConfig.maxDelayMs
            );

      // ジッター（0-20%）
      const waitTime = Math.round(delay + delay * Math.random() * 0.2);

      logger.warn("Retrying request", {
        name: options.name,
        attempt: attempt + 1,
        maxRetries: retryConfig.maxRetries,
        waitMs: waitTime,
        error: lastError.message,
        errorCode,
      });

      await sleep(waitTime, signal);
    }
  }
}

/**
 * タイムアウト付きで関数を実行
 *
 * fn には親の signal とタイムアウトを合成した signal を渡す。
 * タイムアウト時は合成 signal を中断して処理中のリクエストも止める
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  name: string,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => {
    controller.abort(parentSignal ? abortReason(parentSignal) : undefined);
  };

  if (parentSignal?.aborted) {
    throw abortReason(parentSignal);
  }
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = Object.assign(new Error(`Timeout after ${timeoutMs}ms: ${name}`), {
        code: "ETIMEDOUT",
      });
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

// =============================================================================
// サーキットブレーカー状態取得
// =============================================================================

export function getCircuitBreakerStatus(name: string): {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
} {
  const breaker = getCircuitBreaker(name);
  return {
    state: breaker.state,
    failures: breaker.failures,
    lastFailureTime: breaker.lastFailureTime,
  };
}

export function getAllCircuitBreakerStatuses(): Map<string, { state: CircuitState; failures: number }> {
  const statuses = new Map<string, { state: CircuitState; failures: number }>();
  circuitBreakers.forEach((breaker, name) => {
    statuses.set(name, {
      state: breaker.state,
      failures: breaker.failures,
    });
  });
  return statuses;
}

/**
 * 全ブレーカーを破棄する（パイプライン実行ごとに状態を持ち越さない）
 */
export function resetAllCircuitBreakers(): void {
  circuitBreakers.clear();
}

export function resetCircuitBreaker(name: string): void {
  const breaker = getCircuitBreaker(name);
  breaker.state = "CLOSED";
  breaker.failures = 0;
  breaker.successes = 0;
  breaker.lastFailureTime = null;
  breaker.halfOpenAttempts = 0;
  logger.info("Circuit breaker manually reset", { name });
}
