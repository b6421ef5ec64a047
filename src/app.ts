/**
 * 取込監視ジョブ - Express アプリケーション
 */

import express, { Express, Request, Response, NextFunction } from "express";
import rateLimit from "express-rate-limit";
import { apiKeyAuth } from "./middleware/auth";
import { logger } from "./logger";
import { CronRouteDependencies, createCronRouter, healthRoutes } from "./routes";

export interface AppOptions extends CronRouteDependencies {
  apiKey?: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  app.use(express.json({ limit: "1mb" }));
  app.use(logger.requestLogger());

  // cron 用のレート制限（パイプライン実行は重いため）
  const cronLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1分間
    max: 10, // 10リクエスト/分
    message: {
      success: false,
      error: "rate-limit-exceeded",
      message: "Too many requests, please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ===========================================================================
  // ルート
  // ===========================================================================

  // ヘルスチェック（認証なし）
  app.use("/", healthRoutes);

  // Cronエンドポイント（API Key認証 + レート制限）
  app.use(
    "/cron",
    cronLimiter,
    apiKeyAuth(options.apiKey),
    createCronRouter({ runtime: options.runtime, run: options.run })
  );

  // エラーハンドリング
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled error", {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });
    res.status(500).json({
      error: "Internal Server Error",
      message: process.env.NODE_ENV === "production" ? "An error occurred" : err.message,
    });
  });

  return app;
}
