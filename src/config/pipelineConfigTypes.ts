/**
 * パイプライン設定 - スキーマと型定義
 *
 * 起動時に一度だけ解決し、以降は不変の値として各段に渡す
 */

import { z } from "zod";
import {
  AEP_API,
  DEFAULT_STATUS_MAP,
  DEFAULT_THRESHOLDS,
  PIPELINE_DEFAULTS,
} from "../constants";

// =============================================================================
// 基本スキーマ
// =============================================================================

export const IngestionStatusSchema = z.enum(["success", "warning", "failure"]);

export const DatasetExpectationSchema = z.enum(["continuous", "sparse"]);

const PathListSchema = z.array(z.string().min(1)).min(1);

// =============================================================================
// フィールドマッピング
// =============================================================================

/**
 * 生レコードのどのフィールドを正規化イベントのどの項目に対応させるか
 */
export const FieldMappingSchema = z.object({
  datasetId: PathListSchema.optional(),
  timestamp: PathListSchema,
  status: PathListSchema,
  errorCode: PathListSchema.optional(),
  errorMessage: PathListSchema.optional(),
  recordCount: PathListSchema.optional(),
  sourceId: PathListSchema.optional(),
  flowId: PathListSchema.optional(),
  samples: PathListSchema.optional(),
  /** ソース側ステータス値 → 取込ステータス（大文字小文字は区別しない） */
  statusMap: z
    .record(z.string(), IngestionStatusSchema)
    .default({ ...DEFAULT_STATUS_MAP })
    .transform(
      (map): Record<string, z.infer<typeof IngestionStatusSchema>> =>
        Object.fromEntries(
          Object.entries(map).map(([key, value]) => [key.trim().toLowerCase(), value])
        )
    ),
});

export type FieldMapping = z.infer<typeof FieldMappingSchema>;

// =============================================================================
// データセット
// =============================================================================

export const DatasetConfigSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  /** 取得元ソース名（sources[].name） */
  source: z.string().min(1),
  /** フィールドマッピング名（fieldMappings のキー） */
  mapping: z.string().min(1),
  expectation: DatasetExpectationSchema.default("continuous"),
});

export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;

// =============================================================================
// ソース
// =============================================================================

export const AepCatalogSourceSchema = z.object({
  type: z.literal("aep_catalog"),
  name: z.string().min(1),
  baseUrl: z.string().url().default(AEP_API.DEFAULT_BASE_URL),
  accessToken: z.string().min(1),
  apiKey: z.string().min(1),
  orgId: z.string().min(1),
  sandboxName: z.string().min(1).default("prod"),
  /** 指定時は該当ステータスのバッチのみ取得（例: "failed"） */
  statusFilter: z.string().min(1).optional(),
  limit: z.number().int().positive().default(AEP_API.DEFAULT_LIMIT),
  includeFailureSamples: z.boolean().default(false),
  maxSamplesPerBatch: z.number().int().nonnegative().default(AEP_API.DEFAULT_MAX_SAMPLES_PER_BATCH),
  requestTimeoutMs: z.number().int().positive().default(AEP_API.REQUEST_TIMEOUT_MS),
});

export type AepCatalogSourceConfig = z.infer<typeof AepCatalogSourceSchema>;

export const EventsApiSourceSchema = z.object({
  type: z.literal("events_api"),
  name: z.string().min(1),
  baseUrl: z.string().url(),
  path: z.string().startsWith("/").default("/events"),
  token: z.string().min(1).optional(),
  headers: z.record(z.string(), z.string()).default({}),
  datasetParam: z.string().min(1).default("datasetId"),
  startParam: z.string().min(1).default("start"),
  endParam: z.string().min(1).default("end"),
  timeFormat: z.enum(["epoch_ms", "iso"]).default("iso"),
  /** 応答内のレコード配列のパス（省略時は配列そのもの、または items / data / records） */
  recordsPath: z.string().min(1).optional(),
  requestTimeoutMs: z.number().int().positive().default(AEP_API.REQUEST_TIMEOUT_MS),
});

export type EventsApiSourceConfig = z.infer<typeof EventsApiSourceSchema>;

export const SourceConfigSchema = z.discriminatedUnion("type", [
  AepCatalogSourceSchema,
  EventsApiSourceSchema,
]);

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

// =============================================================================
// 配信先
// =============================================================================

export const GoogleChatTargetSchema = z.object({
  type: z.literal("google_chat"),
  name: z.string().min(1),
  webhookUrl: z.string().url(),
});

export const GoogleSheetsTargetSchema = z.object({
  type: z.literal("google_sheets"),
  name: z.string().min(1),
  spreadsheetId: z.string().min(1),
  range: z.string().min(1).default("Reports!A1"),
});

export const GoogleDriveTargetSchema = z.object({
  type: z.literal("google_drive"),
  name: z.string().min(1),
  folderId: z.string().min(1),
});

export const SinkTargetSchema = z.discriminatedUnion("type", [
  GoogleChatTargetSchema,
  GoogleSheetsTargetSchema,
  GoogleDriveTargetSchema,
]);

export type GoogleChatTarget = z.infer<typeof GoogleChatTargetSchema>;
export type GoogleSheetsTarget = z.infer<typeof GoogleSheetsTargetSchema>;
export type GoogleDriveTarget = z.infer<typeof GoogleDriveTargetSchema>;
export type SinkTarget = z.infer<typeof SinkTargetSchema>;
export type SinkType = SinkTarget["type"];

// =============================================================================
// リトライ
// =============================================================================

export const RetrySettingsSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
});

export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

// =============================================================================
// パイプライン設定
// =============================================================================

export const ThresholdsSchema = z
  .object({
    degraded: z.number().min(0).max(1).default(DEFAULT_THRESHOLDS.degraded),
    critical: z.number().min(0).max(1).default(DEFAULT_THRESHOLDS.critical),
  })
  .refine((t) => t.degraded <= t.critical, {
    message: "thresholds.degraded must not exceed thresholds.critical",
  });

export type Thresholds = z.infer<typeof ThresholdsSchema>;

export const PipelineConfigSchema = z
  .object({
    datasets: z.array(DatasetConfigSchema).min(1),
    windowHours: z.number().positive().default(PIPELINE_DEFAULTS.WINDOW_HOURS),
    thresholds: ThresholdsSchema.default({}),
    fieldMappings: z.record(z.string(), FieldMappingSchema),
    sources: z.array(SourceConfigSchema).min(1),
    sinks: z.array(SinkTargetSchema).default([]),
    maxTopErrors: z.number().int().positive().default(PIPELINE_DEFAULTS.MAX_TOP_ERRORS),
    maxFailureExamples: z.number().int().nonnegative().default(PIPELINE_DEFAULTS.MAX_FAILURE_EXAMPLES),
    runTimeoutMs: z.number().int().positive().default(PIPELINE_DEFAULTS.RUN_TIMEOUT_MS),
    retry: RetrySettingsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const sourceNames = new Set(config.sources.map((s) => s.name));
    const datasetIds = new Set<string>();

    config.datasets.forEach((dataset, index) => {
      if (datasetIds.has(dataset.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["datasets", index, "id"],
          message: `Duplicate dataset id: ${dataset.id}`,
        });
      }
      datasetIds.add(dataset.id);

      if (!sourceNames.has(dataset.source)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["datasets", index, "source"],
          message: `Unknown source: ${dataset.source}`,
        });
      }
      if (!Object.hasOwn(config.fieldMappings, dataset.mapping)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["datasets", index, "mapping"],
          message: `Unknown field mapping: ${dataset.mapping}`,
        });
      }
    });

    const names = new Set<string>();
    for (const item of [...config.sources, ...config.sinks]) {
      if (names.has(item.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sinks"],
          message: `Duplicate source/sink name: ${item.name}`,
        });
      }
      names.add(item.name);
    }
  });

/**
 * 解決済みのパイプライン設定
 */
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * 設定ファイル上の入力形（既定値の適用前）
 */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
