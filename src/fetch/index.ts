/**
 * ソース取得モジュール
 */

export { SourceClient } from "./types";
export { SourceRequest, buildUrl, getText, getJson } from "./sourceRequest";
export {
  AepCatalogClient,
  flattenBatches,
  extractFileLinks,
  parseFailureSamples,
} from "./aepCatalogClient";
export { EventsApiClient, extractRecords } from "./eventsApiClient";
export {
  DatasetFetchOutcome,
  FetchAllResult,
  createSourceClients,
  fetchAll,
} from "./fetcher";
