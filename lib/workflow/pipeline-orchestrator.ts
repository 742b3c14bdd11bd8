/**
 * Pipeline Orchestrator
 *
 * Runs one summary through extraction, validation/refinement and confidence
 * scoring for every configured model, then assembles the output record.
 * Failures inside a model's chain are recorded in the run report and never
 * abort the other models.
 */

import { AgentContext } from "../agents/agent-core";
import { CodeExtractionAgent } from "../agents/code-extraction-agent";
import { ConfidenceScoringAgent } from "../agents/confidence-agent";
import { SchemaAssemblyAgent } from "../agents/schema-assembler";
import { CodeValidationAgent } from "../agents/validation-agent";
import {
  Agents,
  OutputRecord,
  ProcessingError,
  ScoredCode,
  StandardizedAgentResult,
  Summary,
} from "../agents/types";
import { ExecutionSummary, WorkflowLogger } from "../logging/logging";
import { getServices } from "../services/service-registry";
import type { ModelClient, PipelineServices } from "../services/service-types";

export interface ModelRunReport {
  label: string;
  candidates: number;
  validated: number;
  dropped: number;
  scored: number;
}

export interface AgentRunSummary {
  agentName: Agents;
  model?: string;
  success: boolean;
  executionTime: number;
  errorCount: number;
}

export interface PipelineRunReport {
  summaryId: string;
  models: ModelRunReport[];
  errors: ProcessingError[];
  agentResults: AgentRunSummary[];
  executionSummary: ExecutionSummary;
}

export interface PipelineRunResult {
  record: OutputRecord;
  report: PipelineRunReport;
}

export interface PipelineAgents {
  extraction: CodeExtractionAgent;
  validation: CodeValidationAgent;
  confidence: ConfidenceScoringAgent;
  assembly: SchemaAssemblyAgent;
}

interface ModelChainResult {
  scored: ScoredCode[];
  report: ModelRunReport;
  errors: ProcessingError[];
  agentResults: AgentRunSummary[];
}

export class IcdCodingPipeline {
  private readonly services: PipelineServices;
  private readonly agents: PipelineAgents;

  constructor(services: PipelineServices = getServices(), agents: Partial<PipelineAgents> = {}) {
    this.services = services;
    this.agents = {
      extraction: agents.extraction ?? new CodeExtractionAgent(),
      validation: agents.validation ?? new CodeValidationAgent(),
      confidence: agents.confidence ?? new ConfidenceScoringAgent(),
      assembly: agents.assembly ?? new SchemaAssemblyAgent(),
    };
  }

  /**
   * Fetches the summary through the configured source, then processes it.
   */
  async processReference(reference: string, logger?: WorkflowLogger): Promise<PipelineRunResult> {
    const summary = await this.services.summarySource.fetchSummary(reference);
    return this.process(summary, logger);
  }

  async process(summary: Summary, logger?: WorkflowLogger): Promise<PipelineRunResult> {
    const ownsLogger = logger === undefined;
    const workflowLogger = logger ?? new WorkflowLogger(summary.id);
    const context: AgentContext = { summary, services: this.services, logger: workflowLogger };
    const models = this.services.models;

    workflowLogger.logWorkflow("IcdCodingPipeline.process", `Processing summary ${summary.id}`, {
      models: models.map((model) => model.label),
      parallelModels: this.services.config.parallelModels,
      summaryLength: summary.text.length,
    });

    try {
      const chains = this.services.config.parallelModels
        ? await Promise.all(models.map((model) => this.runModelChain(context, model)))
        : await this.runSequentially(context, models);

      const scoredByModel = new Map(models.map((model, index) => [model.label, chains[index].scored]));
      const assembly = await this.agents.assembly.execute(context, {
        summaryId: summary.id,
        modelLabels: models.map((model) => model.label),
        scoredByModel,
      });

      const errors = [...chains.flatMap((chain) => chain.errors), ...assembly.errors];
      const report: PipelineRunReport = {
        summaryId: summary.id,
        models: chains.map((chain) => chain.report),
        errors,
        agentResults: [...chains.flatMap((chain) => chain.agentResults), summarize(assembly)],
        executionSummary: workflowLogger.generateExecutionSummary(),
      };

      workflowLogger.logWorkflow("IcdCodingPipeline.process", `Finished summary ${summary.id}`, {
        models: report.models,
        errorCount: errors.length,
        totalAiCost: report.executionSummary.totalAiCost,
      });

      return { record: assembly.data, report };
    } finally {
      if (ownsLogger) {
        await workflowLogger.close();
      }
    }
  }

  private async runSequentially(context: AgentContext, models: readonly ModelClient[]): Promise<ModelChainResult[]> {
    const chains: ModelChainResult[] = [];
    for (const model of models) {
      chains.push(await this.runModelChain(context, model));
    }
    return chains;
  }

  private async runModelChain(context: AgentContext, model: ModelClient): Promise<ModelChainResult> {
    const extraction = await this.agents.extraction.execute(context, { model });
    const candidates = extraction.data;

    const validation = await this.agents.validation.execute(context, { model, candidates });
    const confidence = await this.agents.confidence.execute(context, { model, codes: validation.data });

    const validated = validation.data.filter((code) => code.valid).length;
    return {
      scored: confidence.data,
      report: {
        label: model.label,
        candidates: candidates.length,
        validated,
        dropped: validation.data.length - validated,
        scored: confidence.data.length,
      },
      errors: [...extraction.errors, ...validation.errors, ...confidence.errors],
      agentResults: [
        summarize(extraction, model.label),
        summarize(validation, model.label),
        summarize(confidence, model.label),
      ],
    };
  }
}

function summarize<T>(result: StandardizedAgentResult<T>, model?: string): AgentRunSummary {
  return {
    agentName: result.metadata.agentName,
    model,
    success: result.success,
    executionTime: result.metadata.executionTime,
    errorCount: result.errors.length,
  };
}
