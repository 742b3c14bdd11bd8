export * from "./agents";
export {
  ConfigurationError,
  loadPipelineConfig,
  parseModelList,
  MODEL_PROVIDERS,
} from "./config/pipeline-config";
export type {
  ModelDefinition,
  ModelProvider,
  PipelineConfig,
  PipelineEnvironment,
  ProviderCredentials,
} from "./config/pipeline-config";
export { calculateTokenCost, getModelPricing } from "./config/ai-model-pricing";
export { LogConfigManager } from "./logging/log-config";
export { LogLevel, WorkflowLogger, scrubSensitiveData } from "./logging/logging";
export type { AIUsageData, ExecutionSummary, LogEntry, WorkflowLoggerConfig } from "./logging/logging";
export { convertToIcd10Schema, toIcd10SchemaEntry } from "./output/icd10-schema";
export type { Icd10SchemaDocument, Icd10SchemaEntry } from "./output/icd10-schema";
export {
  AIModelService,
  AIModelServiceError,
  createChatCompletionsClient,
  createModelService,
} from "./services/ai-model-service";
export type { ChatCompletionsClient } from "./services/ai-model-service";
export { StaticIcdDescriptionService } from "./services/icd-description-service";
export {
  ServiceRegistry,
  ServiceRegistryError,
  getServices,
  initializeServices,
  resetServices,
} from "./services/service-registry";
export type { ServiceOverrides } from "./services/service-registry";
export type {
  IcdDescriptionService,
  ModelClient,
  PipelineServices,
  SummarySource,
} from "./services/service-types";
export {
  FileSummarySource,
  SummaryIngestionError,
  TextSummarySource,
  VectorStoreSummarySource,
  summaryIdFor,
} from "./services/summary-source";
export { IcdCodingPipeline } from "./workflow/pipeline-orchestrator";
export type { PipelineRunReport, PipelineRunResult } from "./workflow/pipeline-orchestrator";
