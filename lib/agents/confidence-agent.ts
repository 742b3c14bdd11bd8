import { Agent, AgentContext } from "./agent-core";
import { confidenceScoringPrompt, scoringFormatReminderPrompt } from "./prompts/icd-prompts";
import { ConfidenceReading, parseConfidence } from "./response-parsers";
import {
  Agents,
  ERROR_CODES,
  ParseResult,
  ProcessingError,
  ProcessingErrorSeverity,
  ScoredCode,
  StandardizedAgentResult,
  ValidatedCode,
  effectiveCode,
} from "./types";
import type { ModelClient } from "../services/service-types";

export interface ConfidenceScoringInput {
  /** The model that proposed the codes */
  model: ModelClient;
  codes: ValidatedCode[];
}

const UNSCORED = { confidence: 0, evidence: "" } as const;

/**
 * Scores every validated code. Codes are never dropped here: an API failure
 * or an unreadable reply leaves the code with confidence 0 and no evidence.
 */
export class ConfidenceScoringAgent extends Agent<ConfidenceScoringInput, ScoredCode[]> {
  readonly name = Agents.CONFIDENCE;
  readonly description = "Assigns a 0-100 confidence and an evidence excerpt to each validated code";
  readonly requiredServices = ["descriptions", "config"] as const;

  protected fallbackOutput(input: ConfidenceScoringInput): ScoredCode[] {
    return input.codes.filter((code) => code.valid).map((code) => ({ ...code, ...UNSCORED }));
  }

  protected async executeInternal(
    context: AgentContext,
    input: ConfidenceScoringInput,
  ): Promise<StandardizedAgentResult<ScoredCode[]>> {
    const scorer = context.services.scorer ?? input.model;
    const errors: ProcessingError[] = [];
    const scored: ScoredCode[] = [];

    for (const code of input.codes.filter((candidate) => candidate.valid)) {
      const reading = await this.scoreCode(context, scorer, effectiveCode(code), errors);
      scored.push({ ...code, confidence: reading.score, evidence: reading.evidence });
    }

    return this.createSuccessResult(scored, errors);
  }

  private async scoreCode(
    context: AgentContext,
    scorer: ModelClient,
    code: string,
    errors: ProcessingError[],
  ): Promise<ConfidenceReading> {
    const { summary, services, logger } = context;
    const prompts = [confidenceScoringPrompt(code, services.descriptions.describe(code), summary.text)];
    let result: ParseResult<ConfidenceReading> | undefined;

    for (let attempt = 0; attempt <= services.config.scoringFormatRetries; attempt++) {
      const prompt = prompts[attempt];
      let reply: string;
      try {
        reply = await this.loggedApiCall(context, scorer.label, "generateText", () => scorer.generateText(prompt, logger), {
          stage: attempt === 0 ? "scoring" : "scoring-format-retry",
          code,
        });
      } catch (error) {
        errors.push(this.createErrorFromException(error, `Scoring of ${code} skipped`, { code, scorer: scorer.label }));
        return { score: UNSCORED.confidence, evidence: UNSCORED.evidence };
      }

      result = parseConfidence(reply);
      if (result.kind === "success") {
        return result.value;
      }
      logger.logWarn("ConfidenceScoringAgent.scoreCode", `Unparseable confidence reply for ${code}`, {
        attempt,
        reason: result.reason,
      });
      prompts.push(scoringFormatReminderPrompt(code, reply));
    }

    errors.push(
      this.createError(
        `Confidence for ${code} could not be parsed; defaulting to 0`,
        ProcessingErrorSeverity.LOW,
        { code, scorer: scorer.label, reason: result?.kind === "unparseable" ? result.reason : undefined },
        ERROR_CODES.PARSE_FAILED,
      ),
    );
    return { score: UNSCORED.confidence, evidence: UNSCORED.evidence };
  }
}
