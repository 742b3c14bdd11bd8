/**
 * Service Registry
 *
 * Process-wide container for the services a pipeline run needs. Built once
 * through `initializeServices` and read through `getServices`; nothing is
 * created lazily or from module-level state.
 */

import {
  ERROR_CODES,
  ProcessingError,
  ProcessingErrorSeverity,
} from "../agents/types";
import type { ModelProvider, PipelineConfig } from "../config/pipeline-config";
import { WorkflowLogger } from "../logging/logging";
import { ChatCompletionsClient, createModelService } from "./ai-model-service";
import { StaticIcdDescriptionService } from "./icd-description-service";
import {
  FileSummarySource,
  VectorStoreSearchClient,
  VectorStoreSummarySource,
  createVectorStoreSearchClient,
} from "./summary-source";
import type {
  ConnectionTestResult,
  IcdDescriptionService,
  ModelClient,
  PipelineServices,
  SummarySource,
} from "./service-types";

export interface ServiceOverrides {
  /** Replaces the model clients built from the configuration, matched by label */
  models?: ModelClient[];
  /** Chat clients used when building model services, per provider */
  chatClients?: Partial<Record<ModelProvider, ChatCompletionsClient>>;
  vectorStoreClient?: VectorStoreSearchClient;
  summarySource?: SummarySource;
  descriptions?: IcdDescriptionService;
  logger?: WorkflowLogger;
}

// ============================================================================
// SERVICE REGISTRY IMPLEMENTATION
// ============================================================================

export class ServiceRegistry implements PipelineServices {
  public readonly config: PipelineConfig;
  public readonly models: ModelClient[];
  public readonly validator?: ModelClient;
  public readonly scorer?: ModelClient;
  public readonly summarySource: SummarySource;
  public readonly descriptions: IcdDescriptionService;

  private readonly internalLogger?: WorkflowLogger;

  constructor(config: PipelineConfig, overrides: ServiceOverrides = {}) {
    this.config = config;
    this.internalLogger = overrides.logger;

    this.models = config.models.map((definition) => {
      const override = overrides.models?.find((model) => model.label === definition.label);
      if (override) {
        return override;
      }
      return createModelService(
        definition,
        config,
        overrides.chatClients?.[definition.provider],
        overrides.logger,
      );
    });

    this.validator = this.findModel(config.validatorModel);
    this.scorer = this.findModel(config.scorerModel);
    this.summarySource = overrides.summarySource ?? this.createSummarySource(overrides.vectorStoreClient);
    this.descriptions = overrides.descriptions ?? new StaticIcdDescriptionService();

    this.internalLogger?.logInfo("ServiceRegistry.constructor", "ServiceRegistry created.", {
      models: this.models.map((model) => `${model.label}=${model.provider}:${model.model}`),
      validator: this.validator?.label ?? "source model",
      scorer: this.scorer?.label ?? "source model",
      summarySource: this.summarySource.kind,
    });
  }

  /**
   * Runs a connection test against every model that supports one.
   */
  async validateServices(): Promise<ProcessingError[]> {
    const errors: ProcessingError[] = [];

    for (const model of this.models) {
      if (!model.testConnection) {
        continue;
      }
      const result: ConnectionTestResult = await model.testConnection();
      if (!result.success) {
        errors.push(
          new ServiceRegistryError(
            ERROR_CODES.SERVICE_UNAVAILABLE,
            `Model '${model.label}' validation failed: ${result.error ?? "unknown error"}`,
            ProcessingErrorSeverity.HIGH,
            { label: model.label, responseTime: result.responseTime },
          ),
        );
      }
    }

    return errors;
  }

  private findModel(label: string | undefined): ModelClient | undefined {
    if (label === undefined) {
      return undefined;
    }
    const model = this.models.find((candidate) => candidate.label === label);
    if (!model) {
      throw new ServiceRegistryError(
        ERROR_CODES.CONFIGURATION_INVALID,
        `No configured model is labelled '${label}'`,
        ProcessingErrorSeverity.CRITICAL,
      );
    }
    return model;
  }

  private createSummarySource(client?: VectorStoreSearchClient): SummarySource {
    if (!this.config.vectorStoreId) {
      return new FileSummarySource();
    }
    if (client) {
      return new VectorStoreSummarySource(client, this.config.vectorStoreId);
    }

    const credentials = this.config.credentials.openai;
    if (!credentials) {
      throw new ServiceRegistryError(
        ERROR_CODES.CONFIGURATION_INVALID,
        "ICD_VECTOR_STORE_ID is set but OPENAI_API_KEY is not configured",
        ProcessingErrorSeverity.CRITICAL,
      );
    }
    return new VectorStoreSummarySource(
      createVectorStoreSearchClient(credentials.apiKey, credentials.baseURL),
      this.config.vectorStoreId,
    );
  }
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export class ServiceRegistryError extends Error implements ProcessingError {
  public readonly code: ProcessingError["code"];
  public readonly severity: ProcessingErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ProcessingError["code"],
    message: string,
    severity: ProcessingErrorSeverity,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ServiceRegistryError";
    this.code = code;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
  }
}

// ============================================================================
// PROCESS-WIDE ACCESS
// ============================================================================

let registry: ServiceRegistry | undefined;

export function initializeServices(config: PipelineConfig, overrides?: ServiceOverrides): ServiceRegistry {
  registry = new ServiceRegistry(config, overrides);
  return registry;
}

export function getServices(): ServiceRegistry {
  if (!registry) {
    throw new ServiceRegistryError(
      ERROR_CODES.SERVICE_UNAVAILABLE,
      "Services have not been initialized; call initializeServices() first",
      ProcessingErrorSeverity.CRITICAL,
    );
  }
  return registry;
}

export function resetServices(): void {
  registry = undefined;
}
