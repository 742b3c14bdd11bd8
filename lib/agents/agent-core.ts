/**
 * Agent Core Abstract Base Class
 *
 * Every pipeline stage is an agent. The public `execute` method wraps the
 * stage's `executeInternal` with required-service checks, workflow logging
 * and conversion of unexpected exceptions into a failure result, so one
 * failing stage never aborts the run.
 */

import type { WorkflowLogger } from "../logging/logging";
import type { PipelineServices } from "../services/service-types";
import {
  Agents,
  ERROR_CODES,
  ErrorCode,
  ProcessingError,
  ProcessingErrorSeverity,
  StandardizedAgentResult,
  Summary,
  ValidationStatus,
} from "./types";

export interface AgentContext {
  summary: Summary;
  services: PipelineServices;
  logger: WorkflowLogger;
}

const AGENT_VERSION = "1.0.0";

export abstract class Agent<TInput, TOutput> {
  abstract readonly name: Agents;
  abstract readonly description: string;
  abstract readonly requiredServices: readonly (keyof PipelineServices)[];

  /**
   * The stage logic. Wrapped by `execute`.
   */
  protected abstract executeInternal(
    context: AgentContext,
    input: TInput,
  ): Promise<StandardizedAgentResult<TOutput>>;

  /**
   * The output reported when the stage cannot run at all.
   */
  protected abstract fallbackOutput(input: TInput): TOutput;

  public async execute(context: AgentContext, input: TInput): Promise<StandardizedAgentResult<TOutput>> {
    const { logger } = context;
    const startTime = Date.now();

    logger.logWorkflow("Agent.execute.start", `Starting execution for agent: ${this.name}`, {
      agent: this.name,
      summaryId: context.summary.id,
    });

    try {
      const serviceErrors = this.validateRequiredServices(context);
      if (serviceErrors.length > 0) {
        logger.logError("Agent.execute", `Service validation failed for agent: ${this.name}`, {
          errors: serviceErrors,
        });
        return this.createFailureResult(serviceErrors, this.fallbackOutput(input), Date.now() - startTime);
      }

      const result = await this.executeInternal(context, input);
      result.metadata.executionTime = Date.now() - startTime;

      if (result.errors.length === 0) {
        logger.logWorkflow("Agent.execute.success", `Agent ${this.name} completed successfully.`, {
          executionTime: result.metadata.executionTime,
        });
      } else {
        logger.logWarn("Agent.execute.partial", `Agent ${this.name} completed with ${result.errors.length} recorded error(s).`, {
          errors: result.errors,
        });
      }
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "An unknown error occurred";
      logger.logError("Agent.execute.unhandledException", `Unhandled exception in agent ${this.name}: ${errorMessage}`, {
        error,
        stack: error instanceof Error ? error.stack : undefined,
      });

      const processingError = this.createError(
        `Unhandled exception during ${this.name} execution: ${errorMessage}`,
        ProcessingErrorSeverity.CRITICAL,
        { errorType: error instanceof Error ? error.constructor.name : typeof error },
        ERROR_CODES.AGENT_EXECUTION_FAILED,
      );
      return this.createFailureResult([processingError], this.fallbackOutput(input), Date.now() - startTime);
    }
  }

  protected createSuccessResult(
    data: TOutput,
    errors: ProcessingError[] = [],
    executionTime = 0,
  ): StandardizedAgentResult<TOutput> {
    return {
      success: true,
      data,
      errors,
      metadata: { executionTime, version: AGENT_VERSION, agentName: this.name },
    };
  }

  protected createFailureResult(
    errors: ProcessingError[],
    data: TOutput,
    executionTime = 0,
  ): StandardizedAgentResult<TOutput> {
    return {
      success: false,
      data,
      errors,
      metadata: { executionTime, version: AGENT_VERSION, agentName: this.name },
    };
  }

  protected createError(
    message: string,
    severity: ProcessingErrorSeverity = ProcessingErrorSeverity.MEDIUM,
    context?: Record<string, unknown>,
    code?: ErrorCode,
  ): ProcessingError {
    return {
      code,
      message,
      severity,
      timestamp: new Date(),
      source: this.name,
      context,
    };
  }

  /**
   * Builds a ProcessingError from a caught exception, keeping the error code
   * a service attached to it.
   */
  protected createErrorFromException(
    error: unknown,
    message: string,
    context?: Record<string, unknown>,
  ): ProcessingError {
    const detail = error instanceof Error ? error.message : String(error);
    const code = errorCodeOf(error) ?? ERROR_CODES.EXTERNAL_API_ERROR;
    return this.createError(`${message}: ${detail}`, ProcessingErrorSeverity.MEDIUM, context, code);
  }

  /**
   * Wraps an outbound call with request/response logging. Errors are
   * re-thrown for the stage to handle.
   */
  protected async loggedApiCall<T>(
    context: AgentContext,
    serviceName: string,
    methodName: string,
    apiCall: () => Promise<T>,
    input?: unknown,
  ): Promise<T> {
    const { logger } = context;
    const startTime = Date.now();
    const callId = logger.logApiCall(serviceName, methodName, input, startTime);

    try {
      const response = await apiCall();
      logger.logApiResponse(callId, serviceName, methodName, response, null, Date.now() - startTime);
      return response;
    } catch (error) {
      logger.logApiResponse(callId, serviceName, methodName, null, error, Date.now() - startTime);
      throw error;
    }
  }

  protected logStateUpdate(
    context: AgentContext,
    previousState: ValidationStatus,
    newState: ValidationStatus,
    details: Record<string, unknown>,
  ): void {
    context.logger.logStateTransition(previousState, newState, this.name, details);
  }

  private validateRequiredServices(context: AgentContext): ProcessingError[] {
    const errors: ProcessingError[] = [];

    for (const serviceName of this.requiredServices) {
      if (context.services[serviceName] === undefined) {
        const error = this.createError(
          `Required service '${serviceName}' is not available for agent '${this.name}'`,
          ProcessingErrorSeverity.CRITICAL,
          { requiredService: serviceName },
          ERROR_CODES.SERVICE_UNAVAILABLE,
        );
        context.logger.logError("Agent.validateRequiredServices", error.message, { error });
        errors.push(error);
      }
    }
    return errors;
  }
}

function errorCodeOf(error: unknown): ErrorCode | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return Object.values(ERROR_CODES).find((known) => known === code);
}
