/**
 * 設定モジュール
 */

export {
  EnvConfig,
  loadEnvConfig,
  validateEnvConfig,
  printEnvTemplate,
} from "./envConfig";

export {
  resolveEnvPlaceholders,
  parsePipelineConfig,
  loadPipelineConfig,
} from "./pipelineConfigLoader";

export {
  PipelineConfig,
  PipelineConfigInput,
  PipelineConfigSchema,
  DatasetConfig,
  FieldMapping,
  FieldMappingSchema,
  SourceConfig,
  AepCatalogSourceConfig,
  EventsApiSourceConfig,
  SinkTarget,
  SinkType,
  GoogleChatTarget,
  GoogleSheetsTarget,
  GoogleDriveTarget,
  RetrySettings,
  Thresholds,
} from "./pipelineConfigTypes";
