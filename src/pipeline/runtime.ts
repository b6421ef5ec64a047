/**
 * 実行環境の組み立て
 *
 * 環境変数とパイプライン設定ファイルを読み込み、ソースクライアントと配信先を作成する。
 * CLI と cron エンドポイントの両方から使う
 */

import { EnvConfig, PipelineConfig, loadEnvConfig, loadPipelineConfig } from "../config";
import { SourceClient, createSourceClients } from "../fetch";
import { SinkRegistry, createSinkRegistry } from "../notify";
import { PipelineRunResult, runPipeline } from "./runPipeline";

export interface PipelineRuntime {
  env: EnvConfig;
  config: PipelineConfig;
  clients: ReadonlyMap<string, SourceClient>;
  sinks: SinkRegistry;
}

/**
 * @throws {ConfigurationError} 環境変数・設定ファイルに問題がある場合
 */
export function createPipelineRuntime(env: NodeJS.ProcessEnv = process.env): PipelineRuntime {
  const envConfig = loadEnvConfig(env);
  const config = loadPipelineConfig(envConfig.pipelineConfigPath, env);

  return {
    env: envConfig,
    config,
    clients: createSourceClients(config.sources, config.retry),
    sinks: createSinkRegistry(envConfig.googleServiceAccountJson),
  };
}

export interface RunOptions {
  runId?: string;
  /** true の場合、配信先に送らない */
  dryRun?: boolean;
}

export function runConfiguredPipeline(
  runtime: PipelineRuntime,
  options: RunOptions = {}
): Promise<PipelineRunResult> {
  return runPipeline({
    config: options.dryRun ? { ...runtime.config, sinks: [] } : runtime.config,
    clients: runtime.clients,
    sinks: runtime.sinks,
    runId: options.runId,
    runTimeoutMs: runtime.env.runTimeoutMs,
  });
}
