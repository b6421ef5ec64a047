/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";
import { getAllCircuitBreakerStatuses } from "../utils/retry";

const router = Router();

// ルート一覧
router.get("/", (_req: Request, res: Response) => {
  return res.json({
    message: "AEP Ingestion Alerts",
    endpoints: {
      health: "GET /health",
      ingestion_report: "POST /cron/ingestion-report",
    },
  });
});

// ヘルスチェック（ソースAPIのサーキットブレーカーが開いていれば degraded）
router.get("/health", (_req: Request, res: Response) => {
  const circuitBreakers = getAllCircuitBreakerStatuses();
  const cbStatus: Record<string, { state: string; failures: number }> = {};

  circuitBreakers.forEach((status, name) => {
    cbStatus[name] = status;
  });

  const hasOpenCircuit = Array.from(circuitBreakers.values()).some(
    (cb) => cb.state === "OPEN"
  );

  return res.status(hasOpenCircuit ? 503 : 200).json({
    status: hasOpenCircuit ? "degraded" : "healthy",
    timestamp: new Date().toISOString(),
    circuitBreakers: cbStatus,
  });
});

export default router;
