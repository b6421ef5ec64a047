/**
 * データセット取得（スキャッター・ギャザー）
 *
 * 全データセットを並列に取得し、全件の完了を待ってから結果をまとめる。
 * 個々の取得失敗は FetchFailure として返し、他のデータセットは継続する
 */

import { logger } from "../logger";
import { AppError, ErrorCode, toErrorMessage } from "../errors";
import { DatasetConfig, SourceConfig } from "../config/pipelineConfigTypes";
import { FetchFailure, RawRecord, ReportingWindow } from "../ingestion/types";
import { RetryConfig } from "../utils/retry";
import { SourceClient } from "./types";
import { AepCatalogClient } from "./aepCatalogClient";
import { EventsApiClient } from "./eventsApiClient";

export interface DatasetFetchOutcome {
  dataset: DatasetConfig;
  records: RawRecord[];
}

export interface FetchAllResult {
  outcomes: DatasetFetchOutcome[];
  failures: FetchFailure[];
}

/**
 * 設定からソースクライアントを作成する（ソース名 → クライアント）
 */
export function createSourceClients(
  sources: readonly SourceConfig[],
  retryConfig?: Partial<RetryConfig>
): Map<string, SourceClient> {
  const clients = new Map<string, SourceClient>();
  for (const source of sources) {
    switch (source.type) {
      case "aep_catalog":
        clients.set(source.name, new AepCatalogClient(source, retryConfig));
        break;
      case "events_api":
        clients.set(source.name, new EventsApiClient(source, retryConfig));
        break;
    }
  }
  return clients;
}

function toFetchFailure(dataset: DatasetConfig, error: unknown): FetchFailure {
  return {
    datasetId: dataset.id,
    label: dataset.label,
    source: dataset.source,
    errorCode: error instanceof AppError ? error.code : ErrorCode.INTERNAL_ERROR,
    message: toErrorMessage(error),
  };
}

/**
 * 全データセットを並列に取得する
 */
export async function fetchAll(
  datasets: readonly DatasetConfig[],
  clients: ReadonlyMap<string, SourceClient>,
  window: ReportingWindow,
  signal?: AbortSignal
): Promise<FetchAllResult> {
  const settled = await Promise.allSettled(
    datasets.map(async (dataset) => {
      const client = clients.get(dataset.source);
      if (!client) {
        throw new AppError({
          code: ErrorCode.CONFIGURATION_ERROR,
          message: `No client for source: ${dataset.source}`,
        });
      }
      return client.fetch(dataset.id, window, signal);
    })
  );

  const outcomes: DatasetFetchOutcome[] = [];
  const failures: FetchFailure[] = [];

  settled.forEach((result, index) => {
    const dataset = datasets[index];
    if (result.status === "fulfilled") {
      outcomes.push({ dataset, records: result.value });
      return;
    }
    const failure = toFetchFailure(dataset, result.reason);
    logger.error("Dataset fetch failed", {
      datasetId: failure.datasetId,
      source: failure.source,
      errorCode: failure.errorCode,
      error: failure.message,
    });
    failures.push(failure);
  });

  return { outcomes, failures };
}
