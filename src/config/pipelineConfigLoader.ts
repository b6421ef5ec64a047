/**
 * パイプライン設定ローダー
 *
 * JSONファイルから設定を読み込み、${ENV_VAR} 形式のプレースホルダーを
 * 環境変数で置き換えてからスキーマで検証する。
 * 検証で見つかった問題はまとめて ConfigurationError として報告する
 */

import fs from "fs";
import path from "path";
import { ConfigurationError } from "../errors";
import { logger } from "../logger";
import { isPlainObject } from "../utils/field-mapper";
import { PipelineConfig, PipelineConfigSchema } from "./pipelineConfigTypes";

/** ${VAR} または ${VAR:-既定値} */
const PLACEHOLDER_PATTERN = /\$\{([A-Z0-9_]+)(?::-([^}]*))?\}/g;

// =============================================================================
// プレースホルダー解決
// =============================================================================

/**
 * 文字列中の ${VAR} を環境変数で置換する（再帰）
 * ${VAR:-既定値} は未設定時に既定値を使い、未設定扱いにしない
 *
 * @param value - 設定値
 * @param env - 環境変数
 * @param missing - 未設定だった変数名の収集先
 */
export function resolveEnvPlaceholders(
  value: unknown,
  env: NodeJS.ProcessEnv,
  missing: Set<string> = new Set()
): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER_PATTERN, (_match, name: string, fallback?: string) => {
      const resolved = env[name];
      if (resolved === undefined || resolved === "") {
        if (fallback !== undefined) {
          return fallback;
        }
        missing.add(name);
        return "";
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env, missing));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvPlaceholders(item, env, missing);
    }
    return result;
  }
  return value;
}

// =============================================================================
// 検証
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !(value instanceof Date)) {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * 設定オブジェクトを検証し、既定値を適用した不変の設定を返す
 *
 * @throws {ConfigurationError} 検証エラーがある場合
 */
export function parsePipelineConfig(
  input: unknown,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const missing = new Set<string>();
  const resolved = resolveEnvPlaceholders(input, env, missing);

  const problems: string[] = [...missing]
    .sort()
    .map((name) => `Environment variable ${name} is referenced but not set`);

  const result = PipelineConfigSchema.safeParse(resolved);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      problems.push(`${field}: ${issue.message}`);
    }
  }

  if (problems.length > 0 || !result.success) {
    throw new ConfigurationError("Invalid pipeline configuration", problems);
  }

  return deepFreeze(result.data);
}

// =============================================================================
// ファイル読み込み
// =============================================================================

/**
 * JSONファイルからパイプライン設定を読み込む
 *
 * @throws {ConfigurationError} ファイルが読めない・JSONが不正・検証エラーの場合
 */
export function loadPipelineConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const absolutePath = path.resolve(configPath);

  let text: string;
  try {
    text = fs.readFileSync(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read pipeline configuration: ${absolutePath}`,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Pipeline configuration is not valid JSON: ${absolutePath}`,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  const config = parsePipelineConfig(parsed, env);
  logger.info("Pipeline configuration loaded", {
    path: absolutePath,
    datasets: config.datasets.length,
    sources: config.sources.length,
    sinks: config.sinks.length,
  });
  return config;
}
