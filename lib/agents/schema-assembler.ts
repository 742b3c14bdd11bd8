import { Agent, AgentContext } from "./agent-core";
import {
  Agents,
  OutputEntry,
  OutputRecord,
  ScoredCode,
  StandardizedAgentResult,
  effectiveCode,
} from "./types";

export interface SchemaAssemblyInput {
  summaryId: string;
  /** Configured model labels, in configuration order */
  modelLabels: readonly string[];
  scoredByModel: ReadonlyMap<string, readonly ScoredCode[]>;
}

export function toOutputEntry(code: ScoredCode): OutputEntry {
  return { code: effectiveCode(code), confidence: code.confidence, evidence: code.evidence };
}

/**
 * Builds the record for one summary. Every configured model gets a key, even
 * when it produced nothing; there is no de-duplication across models.
 */
export function assembleOutputRecord(input: SchemaAssemblyInput): OutputRecord {
  const byModel: Record<string, OutputEntry[]> = {};
  for (const label of input.modelLabels) {
    byModel[label] = (input.scoredByModel.get(label) ?? []).map(toOutputEntry);
  }
  return { [input.summaryId]: byModel };
}

export function serializeOutputRecord(record: OutputRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}

export class SchemaAssemblyAgent extends Agent<SchemaAssemblyInput, OutputRecord> {
  readonly name = Agents.ASSEMBLY;
  readonly description = "Assembles scored codes into the output record";
  readonly requiredServices = [] as const;

  protected fallbackOutput(input: SchemaAssemblyInput): OutputRecord {
    return assembleOutputRecord({ ...input, scoredByModel: new Map() });
  }

  protected async executeInternal(
    context: AgentContext,
    input: SchemaAssemblyInput,
  ): Promise<StandardizedAgentResult<OutputRecord>> {
    const record = assembleOutputRecord(input);
    const total = input.modelLabels.reduce((sum, label) => sum + (record[input.summaryId]?.[label]?.length ?? 0), 0);
    context.logger.logInfo("SchemaAssemblyAgent.executeInternal", `Assembled ${total} code(s) for summary ${input.summaryId}`, {
      models: input.modelLabels,
    });
    return this.createSuccessResult(record);
  }
}
