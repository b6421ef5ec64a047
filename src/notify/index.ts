/**
 * 配信モジュール
 */

export {
  ReportSink,
  SinkRegistry,
  DeliveryStatus,
  DeliveryResult,
} from "./types";
export { GoogleChatSink, buildWebhookUrl } from "./googleChatSink";
export { GoogleSheetsSink, SheetsAppender, SheetsAppendRequest } from "./googleSheetsSink";
export {
  GoogleDriveSink,
  DriveUploader,
  DriveUploadRequest,
  buildReportFileName,
} from "./googleDriveSink";
export {
  ServiceAccountCredentials,
  parseServiceAccountJson,
  createSheetsAppender,
  createDriveUploader,
  createSinkRegistry,
} from "./googleClients";
export { deliverReport } from "./notifier";
