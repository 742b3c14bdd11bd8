/**
 * Pipeline Configuration
 *
 * Builds the validated configuration for a pipeline run from environment
 * variables and an optional JSON config file. Every problem is collected and
 * raised together as a ConfigurationError before any summary is processed.
 */

import * as fs from "fs";
import { z } from "zod";
import {
  DEFAULT_MAX_CODES_PER_MODEL,
  DEFAULT_TIMEOUTS,
  ERROR_CODES,
} from "../agents/types";

export const MODEL_PROVIDERS = ["openai", "groq"] as const;
export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

export const DEFAULT_BASE_URLS: Record<ModelProvider, string | undefined> = {
  openai: undefined,
  groq: "https://api.groq.com/openai/v1",
};

const API_KEY_VARIABLES: Record<ModelProvider, string> = {
  openai: "OPENAI_API_KEY",
  groq: "GROQ_API_KEY",
};

const BASE_URL_VARIABLES: Record<ModelProvider, string> = {
  openai: "OPENAI_BASE_URL",
  groq: "GROQ_BASE_URL",
};

const modelDefinitionSchema = z.object({
  label: z.string().min(1).optional(),
  provider: z.enum(MODEL_PROVIDERS, {
    errorMap: () => ({ message: `provider must be one of: ${MODEL_PROVIDERS.join(", ")}` }),
  }),
  model: z.string().min(1, "model name cannot be empty"),
});

const pipelineSettingsSchema = z.object({
  models: z
    .array(modelDefinitionSchema, { required_error: "ICD_PIPELINE_MODELS is not configured" })
    .min(1, "at least one model must be configured"),
  validatorModel: z.string().min(1).optional(),
  scorerModel: z.string().min(1).optional(),
  requestTimeoutMs: z.coerce
    .number()
    .int()
    .min(DEFAULT_TIMEOUTS.MINIMUM_SERVICE_CALL)
    .default(DEFAULT_TIMEOUTS.SERVICE_CALL),
  maxTokens: z.coerce.number().int().min(1).max(8000).default(1024),
  maxCodesPerModel: z.coerce.number().int().min(1).default(DEFAULT_MAX_CODES_PER_MODEL),
  scoringFormatRetries: z.coerce.number().int().min(0).max(2).default(0),
  parallelModels: z
    .boolean({ invalid_type_error: "ICD_PIPELINE_PARALLEL_MODELS must be true, false, 1 or 0" })
    .default(false),
  vectorStoreId: z.string().min(1).optional(),
});

export interface ModelDefinition {
  /** Unique label used as the model key in the output record */
  label: string;
  provider: ModelProvider;
  model: string;
}

export interface ProviderCredentials {
  apiKey: string;
  baseURL?: string;
}

export interface PipelineConfig {
  models: ModelDefinition[];
  credentials: Partial<Record<ModelProvider, ProviderCredentials>>;
  validatorModel?: string;
  scorerModel?: string;
  requestTimeoutMs: number;
  maxTokens: number;
  maxCodesPerModel: number;
  scoringFormatRetries: number;
  parallelModels: boolean;
  vectorStoreId?: string;
}

export type PipelineEnvironment = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  public readonly code = ERROR_CODES.CONFIGURATION_INVALID;
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration:\n - ${issues.join("\n - ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Parses `label=provider:model` entries separated by commas. The label is
 * optional and defaults to the model name.
 */
export function parseModelList(value: string): Array<{ label?: string; provider: string; model: string }> {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const equalsIndex = entry.indexOf("=");
      const label = equalsIndex >= 0 ? entry.slice(0, equalsIndex).trim() : undefined;
      const target = equalsIndex >= 0 ? entry.slice(equalsIndex + 1).trim() : entry;
      const colonIndex = target.indexOf(":");
      if (colonIndex < 0) {
        return { label, provider: "", model: target };
      }
      return {
        label,
        provider: target.slice(0, colonIndex).trim(),
        model: target.slice(colonIndex + 1).trim(),
      };
    });
}

/**
 * Loads and validates the pipeline configuration. Settings in the JSON config
 * file (`options.configPath` or ICD_PIPELINE_CONFIG) take precedence over the
 * matching environment variables; credentials are only read from the
 * environment.
 *
 * @throws ConfigurationError listing every problem found
 */
export function loadPipelineConfig(
  env: PipelineEnvironment = process.env,
  options: { configPath?: string } = {},
): PipelineConfig {
  const configPath = options.configPath ?? nonEmpty(env.ICD_PIPELINE_CONFIG);
  const fileSettings = configPath ? readConfigFile(configPath) : {};

  const modelList = nonEmpty(env.ICD_PIPELINE_MODELS);
  const envSettings: Record<string, unknown> = {
    models: modelList ? parseModelList(modelList) : undefined,
    validatorModel: nonEmpty(env.ICD_PIPELINE_VALIDATOR_MODEL),
    scorerModel: nonEmpty(env.ICD_PIPELINE_SCORER_MODEL),
    requestTimeoutMs: nonEmpty(env.ICD_PIPELINE_REQUEST_TIMEOUT_MS),
    maxTokens: nonEmpty(env.ICD_PIPELINE_MAX_TOKENS),
    maxCodesPerModel: nonEmpty(env.ICD_PIPELINE_MAX_CODES_PER_MODEL),
    scoringFormatRetries: nonEmpty(env.ICD_PIPELINE_SCORING_FORMAT_RETRIES),
    parallelModels: parseBoolean(nonEmpty(env.ICD_PIPELINE_PARALLEL_MODELS)),
    vectorStoreId: nonEmpty(env.ICD_VECTOR_STORE_ID),
  };

  const merged = { ...dropUndefined(envSettings), ...fileSettings };
  const result = pipelineSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }

  const settings = result.data;
  const issues: string[] = [];
  const models: ModelDefinition[] = settings.models.map((definition) => ({
    label: definition.label ?? definition.model,
    provider: definition.provider,
    model: definition.model,
  }));

  const labels = models.map((definition) => definition.label);
  const duplicates = labels.filter((label, index) => labels.indexOf(label) !== index);
  if (duplicates.length > 0) {
    issues.push(`models: duplicate model labels: ${[...new Set(duplicates)].join(", ")}`);
  }

  for (const [key, label] of [
    ["validatorModel", settings.validatorModel],
    ["scorerModel", settings.scorerModel],
  ] as const) {
    if (label !== undefined && !labels.includes(label)) {
      issues.push(`${key}: '${label}' does not name a configured model`);
    }
  }

  const credentials: Partial<Record<ModelProvider, ProviderCredentials>> = {};
  const requiredProviders = new Map<ModelProvider, string>();
  for (const definition of models) {
    if (!requiredProviders.has(definition.provider)) {
      requiredProviders.set(definition.provider, `provider '${definition.provider}'`);
    }
  }
  // Vector store search goes through the OpenAI client.
  if (settings.vectorStoreId !== undefined && !requiredProviders.has("openai")) {
    requiredProviders.set("openai", "the vector store (ICD_VECTOR_STORE_ID)");
  }
  for (const [provider, purpose] of requiredProviders) {
    const apiKey = nonEmpty(env[API_KEY_VARIABLES[provider]]);
    if (!apiKey) {
      issues.push(`${API_KEY_VARIABLES[provider]} is required for ${purpose}`);
      continue;
    }
    credentials[provider] = {
      apiKey,
      baseURL: nonEmpty(env[BASE_URL_VARIABLES[provider]]) ?? DEFAULT_BASE_URLS[provider],
    };
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return {
    models,
    credentials,
    validatorModel: settings.validatorModel,
    scorerModel: settings.scorerModel,
    requestTimeoutMs: settings.requestTimeoutMs,
    maxTokens: settings.maxTokens,
    maxCodesPerModel: settings.maxCodesPerModel,
    scoringFormatRetries: settings.scoringFormatRetries,
    parallelModels: settings.parallelModels,
    vectorStoreId: settings.vectorStoreId,
  };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    throw new ConfigurationError([
      `cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  let parsedContent: unknown;
  try {
    parsedContent = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError([
      `config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  if (typeof parsedContent !== "object" || parsedContent === null || Array.isArray(parsedContent)) {
    throw new ConfigurationError([`config file ${configPath} must contain a JSON object`]);
  }
  return Object.fromEntries(Object.entries(parsedContent));
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Unrecognized strings pass through so the schema reports them. */
function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return value;
}

function dropUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
