/**
 * Cronジョブエンドポイント
 *
 * Cloud Scheduler から POST /cron/ingestion-report で呼び出され、
 * パイプラインを1回実行して結果の要約を返す
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger } from "../logger";
import { AppError, ValidationError, toErrorMessage } from "../errors";
import { PipelineRunResult, PipelineRuntime, runConfiguredPipeline } from "../pipeline";

// =============================================================================
// 型定義
// =============================================================================

const IngestionReportRequestSchema = z
  .object({
    /** 実行ID（省略時は自動生成） */
    runId: z.string().min(1).max(128).optional(),
  })
  .strict();

export interface CronRouteDependencies {
  runtime: PipelineRuntime;
  /** 実行関数（テスト用に差し替え可能） */
  run?: (runtime: PipelineRuntime, options: { runId?: string }) => Promise<PipelineRunResult>;
}

type IngestionReportHandler = (
  req: Pick<Request, "body">,
  res: Pick<Response, "status" | "json">
) => Promise<void>;

// =============================================================================
// レスポンス
// =============================================================================

/**
 * 実行結果をレスポンス用に要約する
 */
export function summarizeRunResult(result: PipelineRunResult): Record<string, unknown> {
  return {
    success: result.status === "success",
    runId: result.runId,
    status: result.status,
    overallStatus: result.report.overallStatus,
    fingerprint: result.fingerprint,
    datasets: result.report.summaries.map((s) => ({
      datasetId: s.datasetId,
      status: s.status,
      totalEvents: s.totalEvents,
      failureCount: s.failureCount,
    })),
    fetchFailures: result.report.fetchFailures,
    deliveries: result.deliveries,
    durationMs: result.durationMs,
  };
}

// =============================================================================
// ハンドラー
// =============================================================================

/**
 * 取込レポート実行ハンドラーを作成する
 *
 * 同時実行は1件まで（実行中の呼び出しは 409）
 */
export function createIngestionReportHandler(deps: CronRouteDependencies): IngestionReportHandler {
  const run = deps.run ?? runConfiguredPipeline;
  let running = false;

  return async (req, res) => {
    const body: unknown = req.body ?? {};
    const parsed = IngestionReportRequestSchema.safeParse(body);
    if (!parsed.success) {
      const error = ValidationError.fromZodError(parsed.error);
      res.status(error.statusCode).json({ success: false, ...error.toJSON() });
      return;
    }

    if (running) {
      res.status(409).json({
        success: false,
        error: "run-in-progress",
        message: "An ingestion report run is already in progress",
      });
      return;
    }

    running = true;
    try {
      const result = await run(deps.runtime, { runId: parsed.data.runId });
      res.status(200).json(summarizeRunResult(result));
    } catch (err) {
      logger.error("Cron /ingestion-report error", { error: toErrorMessage(err) });
      if (err instanceof AppError) {
        res.status(err.statusCode).json({ success: false, ...err.toJSON() });
        return;
      }
      res.status(500).json({ success: false, error: "ingestion-report-failed" });
    } finally {
      running = false;
    }
  };
}

export function createCronRouter(deps: CronRouteDependencies): Router {
  const router = Router();
  const handler = createIngestionReportHandler(deps);

  router.post("/ingestion-report", (req: Request, res: Response) => {
    handler(req, res).catch((err: unknown) => {
      logger.error("Unhandled cron handler error", { error: toErrorMessage(err) });
    });
  });

  return router;
}
