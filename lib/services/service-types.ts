/**
 * Service contracts shared by the agents, the registry and the pipeline.
 */

import type { PipelineConfig, ModelProvider } from "../config/pipeline-config";
import type { WorkflowLogger } from "../logging/logging";
import type { Summary } from "../agents/types";

/**
 * A configured chat model. `label` is the key the model's codes appear under
 * in the output record.
 */
export interface ModelClient {
  readonly label: string;
  readonly provider: ModelProvider;
  readonly model: string;
  generateText(prompt: string, logger?: WorkflowLogger): Promise<string>;
  testConnection?(): Promise<ConnectionTestResult>;
}

export interface ConnectionTestResult {
  success: boolean;
  responseTime: number;
  error?: string;
}

export interface ModelUsageStats {
  requestCount: number;
  failedRequestCount: number;
  totalTokensUsed: number;
  averageTokensPerRequest: number;
}

export interface SummarySource {
  readonly kind: "text" | "file" | "vector-store";
  /**
   * Resolves a reference (literal text, a path or a search query, depending
   * on the source) to a summary with a content-derived id.
   */
  fetchSummary(reference: string): Promise<Summary>;
}

export interface IcdDescriptionService {
  describe(code: string): string;
}

export interface PipelineServices {
  config: PipelineConfig;
  /** Generator models in configuration order */
  models: ModelClient[];
  /** When unset, each candidate is validated by its source model */
  validator?: ModelClient;
  /** When unset, each code is scored by its source model */
  scorer?: ModelClient;
  summarySource: SummarySource;
  descriptions: IcdDescriptionService;
}
