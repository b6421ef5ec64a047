/**
 * Google Sheets 追記
 *
 * レポートをデータセット1件につき1行としてシートに追記する
 */

import { logger } from "../logger";
import { DeliveryError } from "../errors";
import { GoogleSheetsTarget } from "../config/pipelineConfigTypes";
import { Report } from "../ingestion/types";
import { SheetCell, buildSheetRows, reportFingerprint } from "../report";
import { ReportSink } from "./types";

export interface SheetsAppendRequest {
  spreadsheetId: string;
  range: string;
  values: SheetCell[][];
}

/**
 * spreadsheets.values.append の呼び出し口
 */
export interface SheetsAppender {
  append(request: SheetsAppendRequest, signal?: AbortSignal): Promise<void>;
}

export class GoogleSheetsSink implements ReportSink<GoogleSheetsTarget> {
  constructor(private readonly sheets: SheetsAppender) {}

  async deliver(report: Report, target: GoogleSheetsTarget, signal?: AbortSignal): Promise<void> {
    const values = buildSheetRows(report, reportFingerprint(report));
    if (values.length === 0) {
      logger.debug("No rows to append", { target: target.name });
      return;
    }

    try {
      await this.sheets.append(
        { spreadsheetId: target.spreadsheetId, range: target.range, values },
        signal
      );
    } catch (error) {
      throw new DeliveryError(
        target.name,
        `Google Sheets append failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined, aborted: signal?.aborted }
      );
    }

    logger.debug("Rows appended to spreadsheet", { target: target.name, rows: values.length });
  }
}
