/**
 * 取込監視ジョブ - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import { createApp } from "./app";
import { validateEnvConfig } from "./config";
import { createPipelineRuntime } from "./pipeline";
import { logger } from "./logger";

/**
 * HTTPサーバーを起動する
 *
 * 設定は起動時に一度だけ読み込む。設定に問題があれば起動しない
 */
async function startServer(): Promise<void> {
  // 環境変数の検証
  const envValidation = validateEnvConfig();
  for (const warning of envValidation.warnings) {
    logger.warn(warning);
  }
  if (!envValidation.valid) {
    throw new Error(`Environment validation failed: ${envValidation.errors.join(", ")}`);
  }

  const runtime = createPipelineRuntime();
  const app = createApp({ runtime, apiKey: runtime.env.apiKey });

  return new Promise((resolve) => {
    app.listen(runtime.env.port, () => {
      logger.info("Server started", {
        port: runtime.env.port,
        environment: runtime.env.nodeEnv,
        datasets: runtime.config.datasets.length,
        sinks: runtime.config.sinks.length,
      });
      // app.listen() がソケットを保持するためプロセスは終了しない
      resolve();
    });
  });
}

startServer().catch((error: unknown) => {
  logger.error("Failed to start server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});

export { startServer };
