import { Agent, AgentContext } from "./agent-core";
import { codeExtractionPrompt } from "./prompts/icd-prompts";
import { extractIcdCodes } from "./response-parsers";
import {
  Agents,
  CandidateCode,
  ERROR_CODES,
  ProcessingErrorSeverity,
  StandardizedAgentResult,
} from "./types";
import type { ModelClient } from "../services/service-types";

export interface CodeExtractionInput {
  model: ModelClient;
}

/**
 * Asks one model for the ICD-10 codes a summary documents. An API failure or
 * a reply without codes yields no candidates and a recorded error.
 */
export class CodeExtractionAgent extends Agent<CodeExtractionInput, CandidateCode[]> {
  readonly name = Agents.CODE_EXTRACTION;
  readonly description = "Extracts candidate ICD-10 codes from a summary with one model";
  readonly requiredServices = ["config"] as const;

  protected fallbackOutput(): CandidateCode[] {
    return [];
  }

  protected async executeInternal(
    context: AgentContext,
    input: CodeExtractionInput,
  ): Promise<StandardizedAgentResult<CandidateCode[]>> {
    const { summary, services, logger } = context;
    const { model } = input;
    const maxCodes = services.config.maxCodesPerModel;

    let reply: string;
    try {
      reply = await this.loggedApiCall(
        context,
        model.label,
        "generateText",
        () => model.generateText(codeExtractionPrompt(summary.text, maxCodes), logger),
        { stage: "extraction", summaryId: summary.id },
      );
    } catch (error) {
      return this.createFailureResult(
        [this.createErrorFromException(error, `Extraction failed for model ${model.label}`, { model: model.label })],
        [],
      );
    }

    const result = extractIcdCodes(reply, maxCodes);
    if (result.kind === "unparseable") {
      logger.logWarn("CodeExtractionAgent.executeInternal", `No parseable codes from ${model.label}`, {
        reason: result.reason,
        reply: reply.slice(0, 200),
      });
      return this.createFailureResult(
        [
          this.createError(
            `Model ${model.label} returned no parseable ICD-10 codes`,
            ProcessingErrorSeverity.LOW,
            { model: model.label, reason: result.reason },
            ERROR_CODES.NO_CANDIDATES,
          ),
        ],
        [],
      );
    }

    const candidates = result.value.map((code) => ({ code, sourceModel: model.label }));
    logger.logInfo("CodeExtractionAgent.executeInternal", `Extracted ${candidates.length} candidate(s) from ${model.label}`, {
      codes: result.value,
    });
    return this.createSuccessResult(candidates);
  }
}
