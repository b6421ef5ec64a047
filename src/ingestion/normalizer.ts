/**
 * 取込監視 - 正規化
 *
 * ソースAPIの生レコードをフィールドマッピングに従って IngestionEvent に変換する。
 * 必須項目が欠けたレコードは補完せずに除外する（レコード単位の失敗でバッチは止めない）
 */

import { z } from "zod";
import { FieldMapping } from "../config/pipelineConfigTypes";
import { MalformedRecordError } from "../errors";
import { logger } from "../logger";
import { NOT_AVAILABLE } from "../constants";
import {
  getArray,
  getFieldValue,
  getString,
  isPlainObject,
} from "../utils/field-mapper";
import {
  FailureSample,
  IngestionEvent,
  IngestionStatus,
  NormalizationAnomalies,
  RawRecord,
} from "./types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 正規化のコンテキスト
 */
export interface NormalizeContext {
  /** 取得対象のデータセットID（マッピングで上書きされなければこれを使う） */
  datasetId: string;
  mapping: FieldMapping;
}

/**
 * 正規化結果
 */
export interface NormalizationResult {
  events: IngestionEvent[];
  errors: MalformedRecordError[];
  anomalies: NormalizationAnomalies;
}

const RawRecordSchema = z.record(z.string(), z.unknown());

const FailureSampleSchema = z.object({
  eventType: z.string().optional(),
  pageUrl: z.string().optional(),
});

// ISO-8601 の日付・日時（タイムゾーン省略時は UTC として扱う）
const ISO_TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?(Z|[+-]\d{2}:?\d{2})?$/i;

// =============================================================================
// 値の変換
// =============================================================================

/**
 * タイムスタンプをUTCの Date に変換する
 *
 * - 数値 / 数字のみの文字列: エポックミリ秒
 * - ISO-8601 文字列: タイムゾーンがなければ UTC
 *
 * @returns 解釈できない場合は undefined
 */
export function parseTimestamp(value: unknown): Date | undefined {
  let date: Date | undefined;

  if (value instanceof Date) {
    date = new Date(value.getTime());
  } else if (typeof value === "number") {
    date = Number.isFinite(value) ? new Date(value) : undefined;
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
      date = new Date(Number(trimmed));
    } else {
      const match = ISO_TIMESTAMP_PATTERN.exec(trimmed);
      if (match) {
        const [, day, time, zone] = match;
        date = time
          ? new Date(`${day}T${time}${zone ?? "Z"}`)
          : new Date(`${day}T00:00:00${zone ?? "Z"}`);
      }
    }
  }

  if (!date || isNaN(date.getTime())) {
    return undefined;
  }
  return date;
}

/**
 * ソース側ステータス値を取込ステータスに変換する
 * 対応表にない値は warning に倒す（success には昇格させない）
 */
export function mapStatus(
  rawStatus: string,
  statusMap: Readonly<Record<string, IngestionStatus>>
): { status: IngestionStatus; mapped: boolean } {
  const key = rawStatus.trim().toLowerCase();
  // 継承プロパティ（constructor, __proto__ など）は対応表の値として扱わない
  if (!Object.hasOwn(statusMap, key)) {
    return { status: "warning", mapped: false };
  }
  return { status: statusMap[key], mapped: true };
}

function parseRecordCount(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function parseSamples(values: unknown[]): FailureSample[] {
  const samples: FailureSample[] = [];
  for (const value of values) {
    const result = FailureSampleSchema.safeParse(value);
    if (result.success) {
      samples.push(
        Object.freeze({
          eventType: result.data.eventType || NOT_AVAILABLE,
          pageUrl: result.data.pageUrl || NOT_AVAILABLE,
        })
      );
    }
  }
  return samples;
}

// =============================================================================
// 1レコードの正規化
// =============================================================================

/**
 * 生レコード1件を正規化する
 *
 * @throws {MalformedRecordError} ステータスが取れない・時刻が解釈できない・件数が不正な場合
 */
export function normalizeRecord(
  record: unknown,
  recordIndex: number,
  context: NormalizeContext
): { event: IngestionEvent; unmappedStatus?: string } {
  const { mapping } = context;
  const fail = (field: string, message: string, received?: unknown): MalformedRecordError =>
    new MalformedRecordError({
      datasetId: context.datasetId,
      field,
      recordIndex,
      message,
      received,
    });

  const parsed = RawRecordSchema.safeParse(record);
  if (!parsed.success || !isPlainObject(parsed.data)) {
    throw fail("(record)", "Record is not an object");
  }
  const raw: RawRecord = parsed.data;

  const rawStatus = getString(raw, mapping.status);
  if (rawStatus === undefined) {
    throw fail("status", `No status field found (${mapping.status.join(", ")})`);
  }
  const { status, mapped } = mapStatus(rawStatus, mapping.statusMap);

  const rawTimestamp = getFieldValue(raw, mapping.timestamp);
  if (rawTimestamp === undefined) {
    throw fail("timestamp", `No timestamp field found (${mapping.timestamp.join(", ")})`);
  }
  const timestamp = parseTimestamp(rawTimestamp);
  if (!timestamp) {
    throw fail("timestamp", "Timestamp could not be parsed", rawTimestamp);
  }

  let recordCount = 1;
  if (mapping.recordCount) {
    const rawCount = getFieldValue(raw, mapping.recordCount);
    if (rawCount !== undefined) {
      const count = parseRecordCount(rawCount);
      if (count === undefined) {
        throw fail("recordCount", "Record count is not a non-negative integer", rawCount);
      }
      recordCount = count;
    }
  }

  const datasetId =
    (mapping.datasetId && getString(raw, mapping.datasetId)) || context.datasetId;

  const event: IngestionEvent = {
    datasetId,
    timestamp,
    status,
    errorCode: mapping.errorCode ? getString(raw, mapping.errorCode) : undefined,
    errorMessage: mapping.errorMessage ? getString(raw, mapping.errorMessage) : undefined,
    recordCount,
    sourceId: mapping.sourceId ? getString(raw, mapping.sourceId) : undefined,
    flowId: mapping.flowId ? getString(raw, mapping.flowId) : undefined,
    samples: mapping.samples ? Object.freeze(parseSamples(getArray(raw, mapping.samples))) : undefined,
  };

  return {
    event: Object.freeze(event),
    unmappedStatus: mapped ? undefined : rawStatus,
  };
}

// =============================================================================
// バッチの正規化
// =============================================================================

/**
 * 生レコード列を正規化する
 *
 * 出力のイベント数は入力以下。不正レコードはエラーとして返し、
 * 対応表にないステータスは anomalies に計上する
 */
export function normalizeRecords(
  records: readonly unknown[],
  context: NormalizeContext
): NormalizationResult {
  const events: IngestionEvent[] = [];
  const errors: MalformedRecordError[] = [];
  const unmappedValues = new Set<string>();
  let unmappedStatusCount = 0;

  records.forEach((record, index) => {
    try {
      const { event, unmappedStatus } = normalizeRecord(record, index, context);
      events.push(event);
      if (unmappedStatus !== undefined) {
        unmappedStatusCount++;
        unmappedValues.add(unmappedStatus);
      }
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) {
        throw error;
      }
      logger.warn("Malformed record excluded", {
        datasetId: context.datasetId,
        recordIndex: index,
        field: error.field,
        reason: error.message,
      });
      errors.push(error);
    }
  });

  if (unmappedStatusCount > 0) {
    logger.warn("Unmapped status values treated as warning", {
      datasetId: context.datasetId,
      count: unmappedStatusCount,
      values: [...unmappedValues].sort(),
    });
  }

  return {
    events,
    errors,
    anomalies: {
      unmappedStatusCount,
      droppedRecordCount: errors.length,
      unmappedStatusValues: [...unmappedValues].sort(),
    },
  };
}
