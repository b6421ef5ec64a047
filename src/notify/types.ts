/**
 * 配信先 - 型定義
 */

import { Report } from "../ingestion/types";
import {
  GoogleChatTarget,
  GoogleDriveTarget,
  GoogleSheetsTarget,
  SinkTarget,
  SinkType,
} from "../config/pipelineConfigTypes";

/**
 * レポートの配信先
 *
 * 失敗時は DeliveryError を投げる
 */
export interface ReportSink<T extends SinkTarget> {
  deliver(report: Report, target: T, signal?: AbortSignal): Promise<void>;
}

/**
 * 配信先種別ごとの実装
 */
export interface SinkRegistry {
  google_chat?: ReportSink<GoogleChatTarget>;
  google_sheets?: ReportSink<GoogleSheetsTarget>;
  google_drive?: ReportSink<GoogleDriveTarget>;
}

export type DeliveryStatus = "success" | "failed";

/**
 * 配信先ごとの結果
 */
export interface DeliveryResult {
  target: string;
  type: SinkType;
  status: DeliveryStatus;
  errorCode?: string;
  error?: string;
}
