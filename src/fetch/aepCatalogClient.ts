/**
 * AEP Catalog Service クライアント
 *
 * データセットのバッチ一覧を取得し、1バッチ = 1生レコードとして返す。
 * includeFailureSamples が有効な場合、失敗バッチの failedBatchLocation から
 * 失敗ファイル（NDJSON）を辿って eventType / ページURL のサンプルを付与する
 */

import { logger } from "../logger";
import { AEP_API, NOT_AVAILABLE } from "../constants";
import { AepCatalogSourceConfig } from "../config/pipelineConfigTypes";
import { FailureSample, RawRecord, ReportingWindow } from "../ingestion/types";
import { RetryConfig, abortReason } from "../utils/retry";
import { getPathValue, getString, isPlainObject } from "../utils/field-mapper";
import { SourceClient } from "./types";
import { buildUrl, getJson, getText } from "./sourceRequest";

/** ページングの上限（limit × MAX_PAGES バッチまで取得） */
const MAX_PAGES = 20;

/** バッチ一覧の応答で、バッチ以外に混ざるキー */
const NON_BATCH_KEYS = new Set(["_page", "_links"]);

/**
 * Catalog の応答（バッチID → バッチ）をレコード配列に変換する
 */
export function flattenBatches(response: unknown): RawRecord[] {
  if (!isPlainObject(response)) {
    return [];
  }
  const records: RawRecord[] = [];
  for (const [batchId, batch] of Object.entries(response)) {
    if (NON_BATCH_KEYS.has(batchId) || !isPlainObject(batch)) {
      continue;
    }
    records.push({ id: batchId, ...batch });
  }
  return records;
}

/**
 * 失敗ファイルの一覧応答からファイルURLを取り出す
 */
export function extractFileLinks(response: unknown): string[] {
  const data = getPathValue(response, "data");
  if (!Array.isArray(data)) {
    return [];
  }
  const links: string[] = [];
  for (const item of data) {
    const href = getPathValue(item, "_links.self.href");
    if (typeof href === "string" && href.length > 0) {
      links.push(href);
    }
  }
  return links;
}

/**
 * NDJSON の各行から失敗サンプルを取り出す（解析できない行は飛ばす）
 */
export function parseFailureSamples(ndjson: string, limit: number): FailureSample[] {
  const samples: FailureSample[] = [];
  for (const line of ndjson.split(/\r?\n/)) {
    if (samples.length >= limit) {
      break;
    }
    if (line.trim().length === 0) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger.debug("Skipping unparsable failed-record line");
      continue;
    }
    if (!isPlainObject(parsed)) {
      continue;
    }
    samples.push({
      eventType: getString(parsed, ["body.xdmEntity.eventType"]) ?? NOT_AVAILABLE,
      pageUrl: getString(parsed, ["body.xdmEntity.web.webPageDetails.URL"]) ?? NOT_AVAILABLE,
    });
  }
  return samples;
}

export class AepCatalogClient implements SourceClient {
  readonly name: string;
  private readonly config: AepCatalogSourceConfig;
  private readonly retryConfig?: Partial<RetryConfig>;

  constructor(config: AepCatalogSourceConfig, retryConfig?: Partial<RetryConfig>) {
    this.name = config.name;
    this.config = config;
    this.retryConfig = retryConfig;
  }

  private get samplesBreakerName(): string {
    return `source:${this.name}:samples`;
  }

  private get headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.accessToken}`,
      "x-api-key": this.config.apiKey,
      "x-gw-ims-org-id": this.config.orgId,
      "x-sandbox-name": this.config.sandboxName,
      Accept: "application/json",
    };
  }

  async fetch(
    datasetId: string,
    window: ReportingWindow,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    const records: RawRecord[] = [];

    for (let page = 0; page < MAX_PAGES; page++) {
      const url = buildUrl(this.config.baseUrl, AEP_API.BATCHES_PATH, {
        dataSet: datasetId,
        createdAfter: window.start.getTime(),
        createdBefore: window.end.getTime(),
        status: this.config.statusFilter,
        orderBy: "asc:created",
        limit: this.config.limit,
        start: page * this.config.limit,
      });

      const response = await getJson({
        source: this.name,
        url,
        headers: this.headers,
        timeoutMs: this.config.requestTimeoutMs,
        retryConfig: this.retryConfig,
        signal,
      });
      const batches = flattenBatches(response);
      records.push(...batches);

      if (batches.length < this.config.limit) {
        break;
      }
      if (page === MAX_PAGES - 1) {
        logger.warn("Batch listing truncated", {
          source: this.name,
          datasetId,
          fetched: records.length,
        });
      }
    }

    logger.info("Fetched AEP batches", {
      source: this.name,
      datasetId,
      batchCount: records.length,
    });

    if (!this.config.includeFailureSamples || this.config.maxSamplesPerBatch === 0) {
      return records;
    }

    const withSamples: RawRecord[] = [];
    for (const record of records) {
      const location = getString(record, ["failedBatchLocation"]);
      if (!location) {
        withSamples.push(record);
        continue;
      }
      const failureSamples = await this.fetchFailureSamples(location, signal);
      withSamples.push({ ...record, failureSamples });
    }
    return withSamples;
  }

  /**
   * 失敗バッチのサンプルを取得する
   *
   * サンプル取得の失敗はバッチ一覧の取得結果に影響させない（空のサンプルを返す）
   */
  private async fetchFailureSamples(
    location: string,
    signal?: AbortSignal
  ): Promise<FailureSample[]> {
    const limit = this.config.maxSamplesPerBatch;
    const samples: FailureSample[] = [];

    try {
      const listing = await getJson({
        source: this.name,
        breakerName: this.samplesBreakerName,
        url: location,
        headers: this.headers,
        timeoutMs: this.config.requestTimeoutMs,
        retryConfig: this.retryConfig,
        signal,
      });

      for (const href of extractFileLinks(listing)) {
        if (samples.length >= limit) {
          break;
        }
        const content = await getText({
          source: this.name,
          breakerName: this.samplesBreakerName,
          url: href,
          headers: this.headers,
          timeoutMs: this.config.requestTimeoutMs,
          retryConfig: this.retryConfig,
          signal,
        });
        samples.push(...parseFailureSamples(content, limit - samples.length));
      }
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      logger.warn("Failed to fetch failure samples", {
        source: this.name,
        location,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return samples;
  }
}
