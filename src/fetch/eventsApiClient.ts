/**
 * 汎用 Events API クライアント
 *
 * GET {baseUrl}{path}?{datasetParam}=...&{startParam}=...&{endParam}=...
 * 応答は配列そのもの、recordsPath で指定した配列、または items / data / records
 */

import { logger } from "../logger";
import { NetworkError } from "../errors";
import { EventsApiSourceConfig } from "../config/pipelineConfigTypes";
import { RawRecord, ReportingWindow } from "../ingestion/types";
import { RetryConfig } from "../utils/retry";
import { getPathValue, isPlainObject } from "../utils/field-mapper";
import { SourceClient } from "./types";
import { buildUrl, getJson } from "./sourceRequest";

const FALLBACK_RECORD_KEYS = ["items", "data", "records"] as const;

/**
 * 応答からレコード配列を取り出す。見つからなければ undefined
 */
export function extractRecords(response: unknown, recordsPath?: string): RawRecord[] | undefined {
  let candidate: unknown;
  if (recordsPath) {
    candidate = getPathValue(response, recordsPath);
  } else if (Array.isArray(response)) {
    candidate = response;
  } else {
    candidate = FALLBACK_RECORD_KEYS.map((key) => getPathValue(response, key)).find((value) =>
      Array.isArray(value)
    );
  }

  if (!Array.isArray(candidate)) {
    return undefined;
  }
  // オブジェクト以外の要素は value に包む（正規化で不正レコードとして除外される）
  return candidate.map((item: unknown) => (isPlainObject(item) ? item : { value: item }));
}

export class EventsApiClient implements SourceClient {
  readonly name: string;
  private readonly config: EventsApiSourceConfig;
  private readonly retryConfig?: Partial<RetryConfig>;

  constructor(config: EventsApiSourceConfig, retryConfig?: Partial<RetryConfig>) {
    this.name = config.name;
    this.config = config;
    this.retryConfig = retryConfig;
  }

  private formatTime(date: Date): string | number {
    return this.config.timeFormat === "epoch_ms" ? date.getTime() : date.toISOString();
  }

  async fetch(
    datasetId: string,
    window: ReportingWindow,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    const url = buildUrl(this.config.baseUrl, this.config.path, {
      [this.config.datasetParam]: datasetId,
      [this.config.startParam]: this.formatTime(window.start),
      [this.config.endParam]: this.formatTime(window.end),
    });

    const headers: Record<string, string> = {
      Accept: "application/json",
      ...this.config.headers,
    };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    const response = await getJson({
      source: this.name,
      url,
      headers,
      timeoutMs: this.config.requestTimeoutMs,
      retryConfig: this.retryConfig,
      signal,
    });

    const records = extractRecords(response, this.config.recordsPath);
    if (!records) {
      throw new NetworkError({
        source: this.name,
        message: `${this.name} response has no record array${
          this.config.recordsPath ? ` at ${this.config.recordsPath}` : ""
        }`,
        httpStatus: 200,
        retryable: false,
      });
    }

    logger.info("Fetched events", { source: this.name, datasetId, recordCount: records.length });
    return records;
  }
}
