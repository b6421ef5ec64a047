/**
 * レポートモジュール
 *
 * 主要エクスポート:
 * - buildReport: 集計結果から不変の Report を作成
 * - renderReportText: 決定的なテキスト描画
 * - buildChatCard: Google Chat カード
 * - buildSheetRows: スプレッドシート追記用の行
 */

export {
  BuildReportInput,
  buildReport,
  sortSummaries,
  determineOverallStatus,
  renderReportText,
  reportFingerprint,
  formatFailureRate,
  formatDatasetName,
  countByStatus,
} from "./reportBuilder";

export {
  ChatCardMessage,
  ChatSection,
  ChatWidget,
  buildChatCard,
  escapeChatHtml,
} from "./chatCard";

export { SheetCell, SHEET_COLUMNS, buildSheetRows } from "./sheetRows";
