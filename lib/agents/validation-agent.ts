import { Agent, AgentContext } from "./agent-core";
import { codeRefinementPrompt, codeValidationPrompt } from "./prompts/icd-prompts";
import { extractIcdCodes, parseVerdict } from "./response-parsers";
import {
  Agents,
  CandidateCode,
  ERROR_CODES,
  ProcessingError,
  ProcessingErrorSeverity,
  StandardizedAgentResult,
  ValidatedCode,
  ValidationState,
  ValidationStatus,
  effectiveCode,
} from "./types";
import type { ModelClient } from "../services/service-types";

export interface CodeValidationInput {
  /** The model that proposed the candidates */
  model: ModelClient;
  candidates: CandidateCode[];
}

const ALLOWED_TRANSITIONS: Record<ValidationStatus, readonly ValidationStatus[]> = {
  pending: ["validated", "rejected", "dropped"],
  rejected: ["retried", "dropped"],
  retried: ["validated", "dropped"],
  validated: [],
  dropped: [],
};

export class InvalidTransitionError extends Error {
  constructor(from: ValidationStatus, to: ValidationStatus) {
    super(`Illegal validation transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function assertTransition(from: ValidationStatus, to: ValidationStatus): void {
  if (!ALLOWED_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Confirms each candidate with the validator model. A rejected candidate gets
 * exactly one refinement: the model proposes a replacement, which must itself
 * be confirmed. Candidates that end up dropped are reported with
 * `valid: false`.
 */
export class CodeValidationAgent extends Agent<CodeValidationInput, ValidatedCode[]> {
  readonly name = Agents.VALIDATION;
  readonly description = "Validates candidate codes and refines rejected ones once";
  readonly requiredServices = ["descriptions"] as const;

  protected fallbackOutput(input: CodeValidationInput): ValidatedCode[] {
    return input.candidates.map((candidate) => ({ ...candidate, valid: false }));
  }

  protected async executeInternal(
    context: AgentContext,
    input: CodeValidationInput,
  ): Promise<StandardizedAgentResult<ValidatedCode[]>> {
    const validator = context.services.validator ?? input.model;
    const errors: ProcessingError[] = [];
    const results: ValidatedCode[] = [];
    const originalCodes = input.candidates.map((candidate) => candidate.code);

    for (const candidate of input.candidates) {
      const taken = new Set([
        ...originalCodes.filter((code) => code !== candidate.code),
        ...results.filter((result) => result.valid).map(effectiveCode),
      ]);
      const finalState = await this.runStateMachine(context, validator, candidate, taken, errors);

      results.push(
        finalState.status === "validated"
          ? { ...candidate, valid: true, replacementCode: finalState.replacementCode }
          : { ...candidate, valid: false },
      );
    }

    const validCount = results.filter((result) => result.valid).length;
    context.logger.logInfo("CodeValidationAgent.executeInternal", `${validCount}/${results.length} candidate(s) validated for ${input.model.label}`, {
      validator: validator.label,
    });
    return this.createSuccessResult(results, errors);
  }

  private async runStateMachine(
    context: AgentContext,
    validator: ModelClient,
    candidate: CandidateCode,
    taken: ReadonlySet<string>,
    errors: ProcessingError[],
  ): Promise<ValidationState> {
    let state: ValidationState = { status: "pending", candidate };

    const move = (next: ValidationState): ValidationState => {
      assertTransition(state.status, next.status);
      this.logStateUpdate(context, state.status, next.status, {
        code: candidate.code,
        sourceModel: candidate.sourceModel,
        ...(next.status === "dropped" || next.status === "rejected" ? { reason: next.reason } : {}),
        ...(next.status === "retried" ? { replacementCode: next.replacementCode } : {}),
      });
      state = next;
      return next;
    };

    const verdict = await this.askVerdict(context, validator, candidate.code);
    if (!verdict.ok) {
      errors.push(this.createErrorFromException(verdict.error, `Validation of ${candidate.code} skipped`, { code: candidate.code, validator: validator.label }));
      return move({ status: "dropped", candidate, reason: "validation call failed" });
    }
    if (verdict.value === "confirmed") {
      return move({ status: "validated", candidate });
    }

    move({ status: "rejected", candidate, reason: verdict.value });

    const refinement = await this.askReplacement(context, validator, candidate.code);
    if (!refinement.ok) {
      errors.push(this.createErrorFromException(refinement.error, `Refinement of ${candidate.code} skipped`, { code: candidate.code, validator: validator.label }));
      return move({ status: "dropped", candidate, reason: "refinement call failed" });
    }
    const replacementCode = refinement.value;
    if (replacementCode === undefined) {
      errors.push(this.rejectionError(candidate, "no usable alternative"));
      return move({ status: "dropped", candidate, reason: "no usable alternative" });
    }
    if (taken.has(replacementCode)) {
      errors.push(
        this.createError(
          `Replacement ${replacementCode} for ${candidate.code} duplicates another code from ${candidate.sourceModel}`,
          ProcessingErrorSeverity.LOW,
          { code: candidate.code, replacementCode },
          ERROR_CODES.DUPLICATE_CODE,
        ),
      );
      return move({ status: "dropped", candidate, reason: `duplicate replacement ${replacementCode}` });
    }

    move({ status: "retried", candidate, replacementCode });

    const retryVerdict = await this.askVerdict(context, validator, replacementCode);
    if (!retryVerdict.ok) {
      errors.push(this.createErrorFromException(retryVerdict.error, `Validation of replacement ${replacementCode} skipped`, { code: candidate.code, replacementCode }));
      return move({ status: "dropped", candidate, reason: "validation call failed" });
    }
    if (retryVerdict.value === "confirmed") {
      return move({ status: "validated", candidate, replacementCode });
    }

    errors.push(this.rejectionError(candidate, `replacement ${replacementCode} rejected`));
    return move({ status: "dropped", candidate, reason: `replacement ${replacementCode} ${retryVerdict.value}` });
  }

  /**
   * Unparseable verdicts count as rejections.
   */
  private async askVerdict(
    context: AgentContext,
    validator: ModelClient,
    code: string,
  ): Promise<Outcome<"confirmed" | "rejected" | "unparseable">> {
    const { summary, services, logger } = context;
    const prompt = codeValidationPrompt(code, services.descriptions.describe(code), summary.text);

    try {
      const reply = await this.loggedApiCall(context, validator.label, "generateText", () => validator.generateText(prompt, logger), {
        stage: "validation",
        code,
      });
      const verdict = parseVerdict(reply);
      return { ok: true, value: verdict.kind === "success" ? verdict.value : "unparseable" };
    } catch (error) {
      return { ok: false, error };
    }
  }

  /**
   * Resolves to the first valid code in the reply that differs from the
   * rejected one, or undefined when there is none.
   */
  private async askReplacement(
    context: AgentContext,
    validator: ModelClient,
    rejectedCode: string,
  ): Promise<Outcome<string | undefined>> {
    const { summary, services, logger } = context;
    const prompt = codeRefinementPrompt(rejectedCode, services.descriptions.describe(rejectedCode), summary.text);

    try {
      const reply = await this.loggedApiCall(context, validator.label, "generateText", () => validator.generateText(prompt, logger), {
        stage: "refinement",
        code: rejectedCode,
      });
      const codes = extractIcdCodes(reply, Number.MAX_SAFE_INTEGER);
      const replacement = codes.kind === "success" ? codes.value.find((code) => code !== rejectedCode) : undefined;
      return { ok: true, value: replacement };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private rejectionError(candidate: CandidateCode, reason: string): ProcessingError {
    return this.createError(
      `Candidate ${candidate.code} from ${candidate.sourceModel} dropped: ${reason}`,
      ProcessingErrorSeverity.LOW,
      { code: candidate.code, sourceModel: candidate.sourceModel },
      ERROR_CODES.VALIDATION_REJECTED,
    );
  }
}
