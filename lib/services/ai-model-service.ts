/**
 * AI Model Service
 *
 * Unified text-generation interface over OpenAI-compatible chat completion
 * endpoints. OpenAI and Groq are both reached through the `openai` client;
 * Groq only differs by base URL.
 */

import OpenAI, { APIConnectionTimeoutError } from "openai";

import {
  ERROR_CODES,
  ErrorCode,
  ProcessingError,
  ProcessingErrorSeverity,
} from "../agents/types";
import type { ModelDefinition, ModelProvider, PipelineConfig } from "../config/pipeline-config";
import { calculateTokenCost } from "../config/ai-model-pricing";
import { AIUsageData, WorkflowLogger, describeError } from "../logging/logging";
import type { ConnectionTestResult, ModelClient, ModelUsageStats } from "./service-types";

// ============================================================================
// CLIENT CONTRACT
// ============================================================================

export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: "system" | "user"; content: string }>;
  temperature: number;
  max_tokens: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  } | null;
}

export interface ChatRequestOptions {
  timeout?: number;
  maxRetries?: number;
}

/**
 * The slice of the `openai` client the service calls. Tests substitute an
 * in-process fake.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest, options?: ChatRequestOptions): Promise<ChatCompletionResponse>;
    };
  };
}

export interface AIModelConfig {
  label: string;
  provider: ModelProvider;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number;
}

// ============================================================================
// AI MODEL SERVICE IMPLEMENTATION
// ============================================================================

export class AIModelService implements ModelClient {
  private config: AIModelConfig;
  private requestCount = 0;
  private failedRequestCount = 0;
  private totalTokensUsed = 0;
  private readonly client: ChatCompletionsClient;
  private readonly logger?: WorkflowLogger;

  constructor(config: AIModelConfig, client: ChatCompletionsClient, logger?: WorkflowLogger) {
    this.config = { ...config };
    this.client = client;
    this.logger = logger;
  }

  get label(): string {
    return this.config.label;
  }

  get provider(): ModelProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  async generateText(prompt: string, logger?: WorkflowLogger): Promise<string> {
    const activeLogger = logger ?? this.logger;
    this.requestCount++;
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [{ role: "user", content: prompt }],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { timeout: this.config.timeout, maxRetries: 0 },
      );

      const requestDuration = Date.now() - startTime;
      const text = response.choices[0]?.message?.content ?? "";

      if (response.usage?.total_tokens) {
        this.totalTokensUsed += response.usage.total_tokens;
        this.logAiUsage(
          activeLogger,
          "AIModelService.generateText",
          response.usage.prompt_tokens || 0,
          response.usage.completion_tokens || 0,
          requestDuration,
        );
      }

      activeLogger?.logDebug("AIModelService.generateText", "Request successful", {
        label: this.config.label,
        model: this.config.model,
        responseTime: requestDuration,
        responseLength: text.length,
      });

      return text;
    } catch (error) {
      this.failedRequestCount++;
      const serviceError = this.toServiceError(error, Date.now() - startTime);
      activeLogger?.logError("AIModelService.generateText", serviceError.message, {
        label: this.config.label,
        model: this.config.model,
        code: serviceError.code,
        error: describeError(error),
      });
      throw serviceError;
    }
  }

  async testConnection(): Promise<ConnectionTestResult> {
    const startTime = Date.now();

    try {
      await this.generateText("Hello, this is a connection test. Please respond with 'OK'.");
      return { success: true, responseTime: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        responseTime: Date.now() - startTime,
        error: error instanceof Error ? error.message : "Unknown error",
      };
    }
  }

  getUsageStats(): ModelUsageStats {
    return {
      requestCount: this.requestCount,
      failedRequestCount: this.failedRequestCount,
      totalTokensUsed: this.totalTokensUsed,
      averageTokensPerRequest: this.requestCount > 0 ? this.totalTokensUsed / this.requestCount : 0,
    };
  }

  resetStats(): void {
    this.requestCount = 0;
    this.failedRequestCount = 0;
    this.totalTokensUsed = 0;
  }

  private logAiUsage(
    logger: WorkflowLogger | undefined,
    functionName: string,
    inputTokens: number,
    outputTokens: number,
    requestDuration: number,
  ): void {
    if (!logger) return;

    const costs = calculateTokenCost(this.config.model, inputTokens, outputTokens);
    const aiUsage: AIUsageData = {
      model: this.config.model,
      provider: this.config.provider,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      inputCost: costs.inputCost,
      outputCost: costs.outputCost,
      totalCost: costs.totalCost,
      requestDuration,
    };

    logger.logAiUsage(functionName, aiUsage);
  }

  private toServiceError(error: unknown, elapsed: number): AIModelServiceError {
    const context = { label: this.config.label, model: this.config.model, elapsed };

    if (error instanceof AIModelServiceError) {
      return error;
    }
    if (error instanceof APIConnectionTimeoutError) {
      return new AIModelServiceError(
        ERROR_CODES.TIMEOUT_EXCEEDED,
        `Request to ${this.config.label} timed out after ${this.config.timeout}ms`,
        ProcessingErrorSeverity.MEDIUM,
        context,
      );
    }

    const status = statusOf(error);
    const message = error instanceof Error ? error.message : String(error);
    if (status === 429) {
      return new AIModelServiceError(
        ERROR_CODES.RATE_LIMITED,
        `Rate limit hit (429) for ${this.config.label}: ${message}`,
        ProcessingErrorSeverity.MEDIUM,
        { ...context, status },
      );
    }

    return new AIModelServiceError(
      ERROR_CODES.EXTERNAL_API_ERROR,
      `Request to ${this.config.label} failed: ${message}`,
      ProcessingErrorSeverity.HIGH,
      status === undefined ? context : { ...context, status },
    );
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export class AIModelServiceError extends Error implements ProcessingError {
  public readonly code: ErrorCode;
  public readonly severity: ProcessingErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    severity: ProcessingErrorSeverity,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AIModelServiceError";
    this.code = code;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

/**
 * Builds the `openai` client for a provider. Retries are left to the caller,
 * so the client itself never retries.
 */
export function createChatCompletionsClient(
  provider: ModelProvider,
  config: PipelineConfig,
): ChatCompletionsClient {
  const credentials = config.credentials[provider];
  if (!credentials) {
    throw new AIModelServiceError(
      ERROR_CODES.SERVICE_UNAVAILABLE,
      `No credentials configured for provider '${provider}'`,
      ProcessingErrorSeverity.CRITICAL,
      { provider },
    );
  }

  const openai = new OpenAI({
    apiKey: credentials.apiKey,
    baseURL: credentials.baseURL,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });

  return {
    chat: {
      completions: {
        create: (body, options) => openai.chat.completions.create(body, options),
      },
    },
  };
}

export function createModelService(
  definition: ModelDefinition,
  config: PipelineConfig,
  client: ChatCompletionsClient = createChatCompletionsClient(definition.provider, config),
  logger?: WorkflowLogger,
): AIModelService {
  return new AIModelService(
    {
      label: definition.label,
      provider: definition.provider,
      model: definition.model,
      temperature: 0.1,
      maxTokens: config.maxTokens,
      timeout: config.requestTimeoutMs,
    },
    client,
    logger,
  );
}
