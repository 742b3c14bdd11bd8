import { AgentContext } from '../../lib/agents/agent-core';
import { Summary } from '../../lib/agents/types';
import { ModelProvider, PipelineConfig } from '../../lib/config/pipeline-config';
import { WorkflowLogger } from '../../lib/logging/logging';
import { ServiceOverrides, ServiceRegistry } from '../../lib/services/service-registry';
import { ModelClient } from '../../lib/services/service-types';
import { TextSummarySource, createSummary } from '../../lib/services/summary-source';

export type PromptStage = 'extraction' | 'validation' | 'refinement' | 'scoring' | 'reminder';

/**
 * Identifies which prompt template produced a prompt.
 */
export function stageOf(prompt: string): PromptStage {
  if (prompt.includes('could not be read')) return 'reminder';
  if (prompt.includes('Rate how well')) return 'scoring';
  if (prompt.includes('was judged not to match')) return 'refinement';
  if (prompt.includes('Decide whether')) return 'validation';
  return 'extraction';
}

/** The code a validation, refinement or scoring prompt is about. */
export function codeOf(prompt: string): string | undefined {
  return /ICD-10 Code: (\S+)/.exec(prompt)?.[1] ?? /The code (\S+) \(/.exec(prompt)?.[1];
}

export type Reply = string | Error;
export type Responder = (prompt: string, stage: PromptStage) => Reply;

/**
 * In-process model client that answers from a responder function and
 * records every prompt it receives.
 */
export class ScriptedModelClient implements ModelClient {
  readonly prompts: string[] = [];

  constructor(
    readonly label: string,
    private readonly responder: Responder,
    readonly provider: ModelProvider = 'openai',
    readonly model: string = `${label}-model`,
  ) {}

  async generateText(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.responder(prompt, stageOf(prompt));
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  promptsFor(stage: PromptStage): string[] {
    return this.prompts.filter((prompt) => stageOf(prompt) === stage);
  }
}

/**
 * Builds a responder from per-stage replies. Functions receive the code the
 * prompt is about.
 */
export function byStage(replies: Partial<Record<PromptStage, Reply | ((code: string) => Reply)>>): Responder {
  return (prompt, stage) => {
    const reply = replies[stage];
    if (reply === undefined) {
      return new Error(`no scripted reply for ${stage}`);
    }
    return typeof reply === 'function' ? reply(codeOf(prompt) ?? '') : reply;
  };
}

export function makeConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    models: [{ label: 'A', provider: 'openai', model: 'gpt-4o' }],
    credentials: { openai: { apiKey: 'test-secret' }, groq: { apiKey: 'test-secret' } },
    requestTimeoutMs: 60000,
    maxTokens: 1024,
    maxCodesPerModel: 5,
    scoringFormatRetries: 0,
    parallelModels: false,
    ...overrides,
  };
}

export function makeServices(
  models: ScriptedModelClient[],
  configOverrides: Partial<PipelineConfig> = {},
  overrides: ServiceOverrides = {},
): ServiceRegistry {
  const config = makeConfig({
    models: models.map((model) => ({ label: model.label, provider: model.provider, model: model.model })),
    ...configOverrides,
  });
  return new ServiceRegistry(config, { models, summarySource: new TextSummarySource(), ...overrides });
}

export function makeLogger(id = 'test-workflow'): WorkflowLogger {
  return new WorkflowLogger(id, { enableConsoleLogging: false, enableFileLogging: false });
}

export const DIABETES_SUMMARY_TEXT =
  'Patient is a 58 year old with type 2 diabetes mellitus without complications, managed with metformin.';

export function makeSummary(text = DIABETES_SUMMARY_TEXT): Summary {
  return createSummary(text, 'test');
}

export function makeContext(services: ServiceRegistry, summary: Summary = makeSummary()): AgentContext {
  return { summary, services, logger: makeLogger(summary.id) };
}
