/**
 * Google Chat 通知
 *
 * Incoming Webhook にカードメッセージを POST する。
 * 同じ内容のレポートは同じスレッドにまとまるよう threadKey にフィンガープリントを使う
 */

import { logger } from "../logger";
import { DeliveryError } from "../errors";
import { GoogleChatTarget } from "../config/pipelineConfigTypes";
import { Report } from "../ingestion/types";
import { buildChatCard, reportFingerprint } from "../report";
import { ReportSink } from "./types";

const THREAD_KEY_LENGTH = 32;

/**
 * Webhook URL に threadKey を付与する
 */
export function buildWebhookUrl(webhookUrl: string, fingerprint: string): string {
  const url = new URL(webhookUrl);
  url.searchParams.set("threadKey", fingerprint.slice(0, THREAD_KEY_LENGTH));
  url.searchParams.set("messageReplyOption", "REPLY_MESSAGE_FALLBACK_TO_NEW_THREAD");
  return url.toString();
}

export class GoogleChatSink implements ReportSink<GoogleChatTarget> {
  async deliver(report: Report, target: GoogleChatTarget, signal?: AbortSignal): Promise<void> {
    const card = buildChatCard(report);
    const url = buildWebhookUrl(target.webhookUrl, reportFingerprint(report));

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json; charset=UTF-8" },
        body: JSON.stringify(card),
        signal,
      });
    } catch (error) {
      throw new DeliveryError(
        target.name,
        `Google Chat request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined, aborted: signal?.aborted }
      );
    }

    if (!response.ok) {
      const body = await response.text();
      logger.error("Google Chat webhook rejected the message", {
        target: target.name,
        status: response.status,
      });
      throw new DeliveryError(
        target.name,
        `Google Chat webhook returned ${response.status}: ${body.substring(0, 200)}`
      );
    }

    logger.debug("Google Chat message sent", { target: target.name });
  }
}
