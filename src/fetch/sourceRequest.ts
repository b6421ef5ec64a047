/**
 * ソースAPIへのHTTPリクエスト共通処理
 *
 * タイムアウト・リトライ・サーキットブレーカーを掛け、
 * HTTPエラーは NetworkError.fromHttpStatus で分類する
 */

import { logger } from "../logger";
import { AppError, NetworkError } from "../errors";
import { RetryConfig, abortReason, withRetry, withTimeout } from "../utils/retry";

export interface SourceRequest {
  /** ソース名（ログ・エラー・サーキットブレーカー名に使用） */
  source: string;
  /** サーキットブレーカー名（省略時は source:<source>） */
  breakerName?: string;
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
  retryConfig?: Partial<RetryConfig>;
  signal?: AbortSignal;
}

/**
 * クエリ文字列付きURLを組み立てる（undefined の値は除外）
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params?: Record<string, string | number | undefined>
): string {
  const url = `${baseUrl.replace(/\/+$/, "")}${path}`;
  if (!params) {
    return url;
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.append(key, String(value));
    }
  }
  const queryString = searchParams.toString();
  return queryString ? `${url}?${queryString}` : url;
}

async function requestOnce(request: SourceRequest, signal: AbortSignal): Promise<string> {
  let response: Response;
  try {
    response = await fetch(request.url, { method: "GET", headers: request.headers, signal });
  } catch (error) {
    if (signal.aborted) {
      throw abortReason(signal);
    }
    throw new NetworkError({
      source: request.source,
      message: `${request.source} request failed: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const body = await response.text();
  if (!response.ok) {
    logger.warn("Source API request failed", {
      source: request.source,
      status: response.status,
    });
    throw NetworkError.fromHttpStatus(
      request.source,
      response.status,
      body,
      response.headers.get("retry-after")
    );
  }
  return body;
}

/**
 * GET してレスポンス本文をテキストで返す
 */
export async function getText(request: SourceRequest): Promise<string> {
  logger.debug("Source API request", { source: request.source, url: request.url });

  return withRetry(
    async () => {
      try {
        return await withTimeout(
          (signal) => requestOnce(request, signal),
          request.timeoutMs,
          request.source,
          request.signal
        );
      } catch (error) {
        if (error instanceof AppError || request.signal?.aborted) {
          throw error;
        }
        // リクエスト単位のタイムアウト
        throw new NetworkError({
          source: request.source,
          message: error instanceof Error ? error.message : String(error),
          cause: error instanceof Error ? error : undefined,
        });
      }
    },
    {
      name: request.breakerName ?? `source:${request.source}`,
      retryConfig: request.retryConfig,
      signal: request.signal,
    }
  );
}

/**
 * GET してJSONとして解析する
 */
export async function getJson(request: SourceRequest): Promise<unknown> {
  const body = await getText(request);
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    throw new NetworkError({
      source: request.source,
      message: `${request.source} returned invalid JSON`,
      httpStatus: 200,
      retryable: false,
    });
  }
}
