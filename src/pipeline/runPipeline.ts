/**
 * 取込監視パイプライン
 *
 * 取得 → 正規化 → 分類 → レポート作成 → 配信 を1回実行する。
 * 実行全体に期限（runTimeoutMs）を設け、期限切れは AbortSignal で各段に伝える
 */

import { v4 as uuidv4 } from "uuid";
import { createChildLogger } from "../logger";
import { ConfigurationError, NoDataFetchedError, PipelineTimeoutError } from "../errors";
import { PipelineConfig } from "../config/pipelineConfigTypes";
import {
  IngestionEvent,
  NormalizationAnomalies,
  Report,
  ReportingWindow,
  classifyEvents,
  normalizeRecords,
} from "../ingestion";
import { buildReport, reportFingerprint } from "../report";
import { SourceClient, fetchAll } from "../fetch";
import { DeliveryResult, SinkRegistry, deliverReport } from "../notify";
import { resetAllCircuitBreakers } from "../utils/retry";

// =============================================================================
// 型定義
// =============================================================================

export type PipelineStage = "fetch" | "normalize" | "classify" | "report" | "deliver";

export interface PipelineDependencies {
  config: PipelineConfig;
  /** ソース名 → クライアント */
  clients: ReadonlyMap<string, SourceClient>;
  sinks: SinkRegistry;
  /** 現在時刻（テスト用に差し替え可能） */
  now?: () => Date;
  /** 実行ID（省略時は自動生成） */
  runId?: string;
  /** 設定の runTimeoutMs を上書き */
  runTimeoutMs?: number;
}

export type PipelineRunStatus = "success" | "partial_failure";

export interface PipelineRunResult {
  runId: string;
  status: PipelineRunStatus;
  report: Report;
  fingerprint: string;
  deliveries: DeliveryResult[];
  durationMs: number;
}

// =============================================================================
// ヘルパー
// =============================================================================

/**
 * 現在時刻から windowHours 遡った閉区間
 */
export function computeWindow(now: Date, windowHours: number): ReportingWindow {
  return {
    start: new Date(now.getTime() - windowHours * 60 * 60 * 1000),
    end: new Date(now.getTime()),
  };
}

// =============================================================================
// 実行
// =============================================================================

/**
 * パイプラインを1回実行する
 *
 * @throws {PipelineTimeoutError} 配信開始前に期限を超えた場合（レポートは配信しない）
 * @throws {NoDataFetchedError} 全データセットの取得に失敗した場合
 */
export async function runPipeline(deps: PipelineDependencies): Promise<PipelineRunResult> {
  const { config } = deps;
  const runId = deps.runId ?? uuidv4();
  const clock = deps.now ?? (() => new Date());
  const timeoutMs = deps.runTimeoutMs ?? config.runTimeoutMs;
  const log = createChildLogger({ runId });

  const startedAt = Date.now();
  const window = computeWindow(clock(), config.windowHours);
  resetAllCircuitBreakers();

  let stage: PipelineStage = "fetch";
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new PipelineTimeoutError(timeoutMs, stage));
  }, timeoutMs);
  const { signal } = controller;

  const ensureWithinDeadline = (): void => {
    if (signal.aborted) {
      throw signal.reason instanceof PipelineTimeoutError
        ? signal.reason
        : new PipelineTimeoutError(timeoutMs, stage);
    }
  };

  log.info("Pipeline started", {
    windowStart: window.start.toISOString(),
    windowEnd: window.end.toISOString(),
    datasets: config.datasets.length,
    timeoutMs,
  });

  try {
    // 取得
    const fetched = await fetchAll(config.datasets, deps.clients, window, signal);
    ensureWithinDeadline();

    if (fetched.outcomes.length === 0) {
      throw new NoDataFetchedError(fetched.failures);
    }

    // 正規化
    stage = "normalize";
    const events: IngestionEvent[] = [];
    const anomalies: Record<string, NormalizationAnomalies> = {};
    for (const { dataset, records } of fetched.outcomes) {
      const mapping = Object.hasOwn(config.fieldMappings, dataset.mapping)
        ? config.fieldMappings[dataset.mapping]
        : undefined;
      if (!mapping) {
        throw new ConfigurationError(`Unknown field mapping: ${dataset.mapping}`);
      }
      const normalized = normalizeRecords(records, { datasetId: dataset.id, mapping });
      events.push(...normalized.events);
      anomalies[dataset.id] = normalized.anomalies;
      log.debug("Dataset normalized", {
        datasetId: dataset.id,
        records: records.length,
        events: normalized.events.length,
        dropped: normalized.errors.length,
      });
    }

    // 分類
    stage = "classify";
    const summaries = classifyEvents(events, window, {
      thresholds: config.thresholds,
      maxTopErrors: config.maxTopErrors,
      maxFailureExamples: config.maxFailureExamples,
      datasets: fetched.outcomes.map(({ dataset }) => ({
        id: dataset.id,
        label: dataset.label,
        expectation: dataset.expectation,
      })),
      anomalies,
    });

    // レポート
    stage = "report";
    const report = buildReport({
      runId,
      generatedAt: clock(),
      window,
      summaries,
      fetchFailures: fetched.failures,
    });
    const fingerprint = reportFingerprint(report);
    ensureWithinDeadline();

    // 配信（期限切れ時は未完了の配信先のみ失敗扱い）
    stage = "deliver";
    const deliveries = await deliverReport(report, config.sinks, deps.sinks, signal);
    const status: PipelineRunStatus = deliveries.every((d) => d.status === "success")
      ? "success"
      : "partial_failure";

    const durationMs = Date.now() - startedAt;
    log.info("Pipeline completed", {
      status,
      overallStatus: report.overallStatus,
      summaries: report.summaries.length,
      fetchFailures: report.fetchFailures.length,
      deliveries: deliveries.length,
      failedDeliveries: deliveries.filter((d) => d.status === "failed").length,
      fingerprint,
      durationMs,
    });

    return { runId, status, report, fingerprint, deliveries, durationMs };
  } catch (error) {
    log.error("Pipeline failed", {
      stage,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
