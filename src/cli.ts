/**
 * 取込監視ジョブ - コマンドライン実行
 *
 * 実行方法: node dist/cli.js [--dry-run] [--run-id <id>] [--print-env-template]
 *
 * 終了コード:
 * - 0: レポートを作成し、全配信先に配信できた
 * - 1: 一部の配信先への配信に失敗した
 * - 2: 実行に失敗した（設定エラー・タイムアウト・全データセットの取得失敗など）
 */

import "dotenv/config";

import { logger } from "./logger";
import { AppError } from "./errors";
import { printEnvTemplate } from "./config";
import { renderReportText } from "./report";
import {
  PipelineRunResult,
  PipelineRuntime,
  RunOptions,
  createPipelineRuntime,
  runConfiguredPipeline,
} from "./pipeline";

export const EXIT_CODE = {
  SUCCESS: 0,
  PARTIAL_DELIVERY_FAILURE: 1,
  RUN_FAILED: 2,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

export interface CliArgs {
  dryRun: boolean;
  runId?: string;
  printEnvTemplate: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, printEnvTemplate: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--dry-run") {
      args.dryRun = true;
    } else if (arg === "--print-env-template") {
      args.printEnvTemplate = true;
    } else if (arg === "--run-id" && i + 1 < argv.length) {
      args.runId = argv[++i];
    } else if (arg.startsWith("--run-id=")) {
      args.runId = arg.slice("--run-id=".length);
    } else {
      logger.warn("Ignoring unknown argument", { arg });
    }
  }
  return args;
}

export function exitCodeFor(result: PipelineRunResult): ExitCode {
  return result.status === "success" ? EXIT_CODE.SUCCESS : EXIT_CODE.PARTIAL_DELIVERY_FAILURE;
}

export interface CliDependencies {
  createRuntime?: (env: NodeJS.ProcessEnv) => PipelineRuntime;
  run?: (runtime: PipelineRuntime, options: RunOptions) => Promise<PipelineRunResult>;
  write?: (text: string) => void;
}

/**
 * CLIを実行して終了コードを返す
 */
export async function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: CliDependencies = {}
): Promise<ExitCode> {
  const args = parseArgs(argv);
  if (args.printEnvTemplate) {
    printEnvTemplate();
    return EXIT_CODE.SUCCESS;
  }

  const createRuntime = deps.createRuntime ?? createPipelineRuntime;
  const run = deps.run ?? runConfiguredPipeline;
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  try {
    const runtime = createRuntime(env);
    const result = await run(runtime, { runId: args.runId, dryRun: args.dryRun });
    if (args.dryRun) {
      write(renderReportText(result.report));
    }
    return exitCodeFor(result);
  } catch (error) {
    logger.error("Ingestion report run failed", {
      error: error instanceof Error ? error : String(error),
      code: error instanceof AppError ? error.code : undefined,
      details: error instanceof AppError ? error.details : undefined,
    });
    return EXIT_CODE.RUN_FAILED;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error("Unexpected CLI failure", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = EXIT_CODE.RUN_FAILED;
    });
}
