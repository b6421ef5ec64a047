/**
 * Google Chat カードメッセージの作成
 *
 * レポートを Chat の cards 形式（ヘッダー + データセットごとのセクション）に変換する。
 * テキストは Chat が解釈する簡易HTMLのため、値はエスケープする
 */

import { DatasetHealth, DatasetSummary, FetchFailure, Report } from "../ingestion/types";
import { countByStatus, formatDatasetName, formatFailureRate } from "./reportBuilder";

// =============================================================================
// 型定義
// =============================================================================

export interface ChatTextParagraph {
  textParagraph: { text: string };
}

export interface ChatKeyValue {
  keyValue: { topLabel: string; content: string; contentMultiline: boolean };
}

export type ChatWidget = ChatTextParagraph | ChatKeyValue;

export interface ChatSection {
  header?: string;
  widgets: ChatWidget[];
}

export interface ChatCardMessage {
  text: string;
  cards: Array<{
    header: { title: string; subtitle: string };
    sections: ChatSection[];
  }>;
}

const STATUS_LABEL: Record<DatasetHealth, string> = {
  critical: "🔴 CRITICAL",
  degraded: "🟡 DEGRADED",
  healthy: "🟢 HEALTHY",
};

// =============================================================================
// ヘルパー
// =============================================================================

export function escapeChatHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function paragraph(text: string): ChatTextParagraph {
  return { textParagraph: { text } };
}

function buildDatasetSection(summary: DatasetSummary): ChatSection {
  const widgets: ChatWidget[] = [];

  if (summary.totalEvents === 0) {
    widgets.push(
      paragraph(`No events in window (expected <b>${summary.expectation}</b> ingestion)`)
    );
  } else {
    widgets.push(
      paragraph(
        [
          `<b>Events:</b> ${summary.totalEvents} (records ${summary.recordCount})`,
          `<b>Success / Warning / Failure:</b> ${summary.successCount} / ${summary.warningCount} / ${summary.failureCount}`,
          `<b>Failure rate:</b> ${formatFailureRate(summary)}`,
        ].join("<br>")
      )
    );
  }

  if (summary.topErrors.length > 0) {
    widgets.push(
      paragraph(
        `<b>Top errors:</b><br>${summary.topErrors
          .map((e) => `&nbsp;&nbsp;• ${escapeChatHtml(e.code)} × ${e.count}`)
          .join("<br>")}`
      )
    );
  }

  const { unmappedStatusCount, unmappedStatusValues, droppedRecordCount } = summary.anomalies;
  if (unmappedStatusCount > 0 || droppedRecordCount > 0) {
    const parts: string[] = [];
    if (unmappedStatusCount > 0) {
      parts.push(
        `Unmapped statuses: ${unmappedStatusCount} (${escapeChatHtml(unmappedStatusValues.join(", "))})`
      );
    }
    if (droppedRecordCount > 0) {
      parts.push(`Dropped malformed records: ${droppedRecordCount}`);
    }
    widgets.push(paragraph(`<b>Anomalies:</b><br>${parts.join("<br>")}`));
  }

  for (const example of summary.failureExamples) {
    const details = [
      `<b>Batch ID:</b> ${escapeChatHtml(example.sourceId ?? "-")}`,
      `&nbsp;&nbsp;• <b>Dataflow:</b> ${escapeChatHtml(example.flowId ?? "-")}`,
      `&nbsp;&nbsp;• <b>Time:</b> ${example.timestamp.toISOString()}`,
      `&nbsp;&nbsp;• <b>Error code:</b> ${escapeChatHtml(example.errorCode ?? "-")}`,
      `&nbsp;&nbsp;• <b>Description:</b> ${escapeChatHtml(example.errorMessage ?? "-")}`,
    ];
    widgets.push(paragraph(details.join("<br>")));

    for (const sample of example.samples) {
      widgets.push({
        keyValue: {
          topLabel: `Event type: ${escapeChatHtml(sample.eventType)}`,
          content: escapeChatHtml(sample.pageUrl),
          contentMultiline: true,
        },
      });
    }
  }

  return {
    header: `${STATUS_LABEL[summary.status]} ${escapeChatHtml(formatDatasetName(summary))}`,
    widgets,
  };
}

function buildFetchFailureSection(failures: readonly FetchFailure[]): ChatSection {
  return {
    header: "⚠️ Fetch failed",
    widgets: failures.map((f) =>
      paragraph(
        `<b>${escapeChatHtml(formatDatasetName(f))}</b> via ${escapeChatHtml(f.source)}<br>${escapeChatHtml(
          f.errorCode
        )}: ${escapeChatHtml(f.message)}`
      )
    ),
  };
}

// =============================================================================
// カード作成
// =============================================================================

/**
 * Chat カードメッセージを作成する
 */
export function buildChatCard(report: Report): ChatCardMessage {
  const counts = countByStatus(report.summaries);
  const title = `Ingestion report: ${report.overallStatus.toUpperCase()}`;

  const overview = [
    `<b>Window:</b> ${report.window.start.toISOString()} – ${report.window.end.toISOString()}`,
    `<b>Datasets:</b> ${report.summaries.length} (critical ${counts.critical}, degraded ${counts.degraded}, healthy ${counts.healthy})`,
  ];
  if (report.fetchFailures.length > 0) {
    overview.push(`<b>Fetch failed:</b> ${report.fetchFailures.length}`);
  }

  const sections: ChatSection[] = [
    { widgets: [paragraph(overview.join("<br>"))] },
    ...report.summaries.map(buildDatasetSection),
  ];
  if (report.fetchFailures.length > 0) {
    sections.push(buildFetchFailureSection(report.fetchFailures));
  }

  return {
    text: title,
    cards: [
      {
        header: {
          title,
          subtitle: `Generated: ${report.generatedAt.toISOString()}`,
        },
        sections,
      },
    ],
  };
}
