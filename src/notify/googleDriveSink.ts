/**
 * Google Drive 保存
 *
 * 描画済みテキストを指定フォルダにファイルとしてアップロードする
 */

import { logger } from "../logger";
import { DeliveryError } from "../errors";
import { GoogleDriveTarget } from "../config/pipelineConfigTypes";
import { Report } from "../ingestion/types";
import { renderReportText, reportFingerprint } from "../report";
import { ReportSink } from "./types";

export interface DriveUploadRequest {
  name: string;
  folderId: string;
  mimeType: string;
  content: string;
}

/**
 * files.create の呼び出し口。作成したファイルIDを返す
 */
export interface DriveUploader {
  upload(request: DriveUploadRequest, signal?: AbortSignal): Promise<string | undefined>;
}

/**
 * ファイル名: ingestion-report-<生成時刻>-<フィンガープリント先頭12文字>.txt
 */
export function buildReportFileName(report: Report, fingerprint: string): string {
  const stamp = report.generatedAt.toISOString().replace(/[:.]/g, "-");
  return `ingestion-report-${stamp}-${fingerprint.slice(0, 12)}.txt`;
}

export class GoogleDriveSink implements ReportSink<GoogleDriveTarget> {
  constructor(private readonly drive: DriveUploader) {}

  async deliver(report: Report, target: GoogleDriveTarget, signal?: AbortSignal): Promise<void> {
    const name = buildReportFileName(report, reportFingerprint(report));

    let fileId: string | undefined;
    try {
      fileId = await this.drive.upload(
        {
          name,
          folderId: target.folderId,
          mimeType: "text/plain",
          content: renderReportText(report),
        },
        signal
      );
    } catch (error) {
      throw new DeliveryError(
        target.name,
        `Google Drive upload failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined, aborted: signal?.aborted }
      );
    }

    logger.debug("Report uploaded to Drive", { target: target.name, name, fileId });
  }
}
