/**
 * ソースクライアント - 型定義
 */

import { RawRecord, ReportingWindow } from "../ingestion/types";

/**
 * データセット単位で生レコードを取得するクライアント
 *
 * NetworkError / AuthError を投げる。リトライは内部で行う
 */
export interface SourceClient {
  readonly name: string;
  fetch(datasetId: string, window: ReportingWindow, signal?: AbortSignal): Promise<RawRecord[]>;
}
