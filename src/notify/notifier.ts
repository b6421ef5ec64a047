/**
 * レポート配信
 *
 * 全配信先へ並列に配信し、配信先ごとの成否を返す。
 * 1つの配信先の失敗は他に影響しない。例外はまとめて投げない
 */

import { logger } from "../logger";
import { AppError, DeliveryError, ErrorCode, toErrorMessage } from "../errors";
import { SinkTarget } from "../config/pipelineConfigTypes";
import { Report } from "../ingestion/types";
import { abortReason } from "../utils/retry";
import { DeliveryResult, SinkRegistry } from "./types";

function dispatch(
  report: Report,
  target: SinkTarget,
  registry: SinkRegistry,
  signal?: AbortSignal
): Promise<void> {
  const missing = (): Promise<void> =>
    Promise.reject(new DeliveryError(target.name, `No sink registered for ${target.type}`));

  switch (target.type) {
    case "google_chat":
      return registry.google_chat ? registry.google_chat.deliver(report, target, signal) : missing();
    case "google_sheets":
      return registry.google_sheets
        ? registry.google_sheets.deliver(report, target, signal)
        : missing();
    case "google_drive":
      return registry.google_drive
        ? registry.google_drive.deliver(report, target, signal)
        : missing();
  }
}

/**
 * signal が中断されたら、配信の完了を待たずに reject する
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function toDeliveryFailure(target: SinkTarget, error: unknown, aborted: boolean): DeliveryResult {
  let errorCode: string = error instanceof AppError ? error.code : ErrorCode.DELIVERY_FAILED;
  let message = toErrorMessage(error);
  if (aborted && !(error instanceof DeliveryError)) {
    errorCode = ErrorCode.DELIVERY_ABORTED;
    message = `Delivery aborted: ${message}`;
  }
  return { target: target.name, type: target.type, status: "failed", errorCode, error: message };
}

/**
 * レポートを全配信先へ配信する
 */
export async function deliverReport(
  report: Report,
  targets: readonly SinkTarget[],
  registry: SinkRegistry,
  signal?: AbortSignal
): Promise<DeliveryResult[]> {
  const settled = await Promise.allSettled(
    targets.map((target) => untilAborted(dispatch(report, target, registry, signal), signal))
  );

  return settled.map((result, index): DeliveryResult => {
    const target = targets[index];
    if (result.status === "fulfilled") {
      logger.info("Report delivered", { target: target.name, type: target.type });
      return { target: target.name, type: target.type, status: "success" };
    }

    const failure = toDeliveryFailure(target, result.reason, signal?.aborted ?? false);
    logger.error("Report delivery failed", {
      target: failure.target,
      type: failure.type,
      errorCode: failure.errorCode,
      error: failure.error,
    });
    return failure;
  });
}
