/**
 * Standardized Types for the ICD-10 Coding Pipeline
 *
 * Shared data model for every stage: summaries, candidate/validated/scored
 * codes, the assembled output record, tagged parse results and the error
 * shapes recorded when a stage skips a unit of work.
 */

// ============================================================================
// ENUMS AND CONSTANTS
// ============================================================================

export enum Agents {
  CODE_EXTRACTION = "code_extraction_agent",
  VALIDATION = "code_validation_agent",
  CONFIDENCE = "confidence_scoring_agent",
  ASSEMBLY = "schema_assembly_agent",
}

export enum ProcessingErrorSeverity { LOW, MEDIUM, HIGH, CRITICAL }

export const ERROR_CODES = {
  AGENT_EXECUTION_FAILED: "AGENT_EXECUTION_FAILED",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
  EXTERNAL_API_ERROR: "EXTERNAL_API_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  TIMEOUT_EXCEEDED: "TIMEOUT_EXCEEDED",
  PARSE_FAILED: "PARSE_FAILED",
  NO_CANDIDATES: "NO_CANDIDATES",
  VALIDATION_REJECTED: "VALIDATION_REJECTED",
  DUPLICATE_CODE: "DUPLICATE_CODE",
  CONFIGURATION_INVALID: "CONFIGURATION_INVALID",
  INGESTION_FAILED: "INGESTION_FAILED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const DEFAULT_TIMEOUTS = {
  SERVICE_CALL: 60000, // per outbound LLM request
  MINIMUM_SERVICE_CALL: 1000,
} as const;

export const DEFAULT_MAX_CODES_PER_MODEL = 5;
export const DESCRIPTION_NOT_FOUND = "Description not found";

// ============================================================================
// PIPELINE DATA MODEL
// ============================================================================

/** Clinical text handed to the pipeline. Immutable once ingested. */
export interface Summary {
  readonly id: string;
  readonly text: string;
}

export interface CandidateCode {
  code: string;
  /** Label of the configured model that proposed the code */
  sourceModel: string;
}

export interface ValidatedCode extends CandidateCode {
  valid: boolean;
  /** Set when the original candidate was rejected and a refinement was accepted */
  replacementCode?: string;
}

export interface ScoredCode extends ValidatedCode {
  /** Integer in [0, 100] */
  confidence: number;
  evidence: string;
}

export interface OutputEntry {
  code: string;
  confidence: number;
  evidence: string;
}

/** summary id → model label → ordered entries */
export type OutputRecord = Readonly<Record<string, Readonly<Record<string, readonly OutputEntry[]>>>>;

/**
 * Returns the code a validated candidate finally stands for: the replacement
 * when refinement produced one, otherwise the original.
 */
export function effectiveCode(code: ValidatedCode): string {
  return code.replacementCode ?? code.code;
}

// ============================================================================
// PARSE RESULTS
// ============================================================================

export type ParseResult<T> =
  | { kind: "success"; value: T }
  | { kind: "unparseable"; reason: string };

export function parsed<T>(value: T): ParseResult<T> {
  return { kind: "success", value };
}

export function unparseable<T>(reason: string): ParseResult<T> {
  return { kind: "unparseable", reason };
}

// ============================================================================
// VALIDATION STATE MACHINE
// ============================================================================

export type ValidationState =
  | { status: "pending"; candidate: CandidateCode }
  | { status: "validated"; candidate: CandidateCode; replacementCode?: string }
  | { status: "rejected"; candidate: CandidateCode; reason: string }
  | { status: "retried"; candidate: CandidateCode; replacementCode: string }
  | { status: "dropped"; candidate: CandidateCode; reason: string };

export type ValidationStatus = ValidationState["status"];

// ============================================================================
// RESULTS AND ERRORS
// ============================================================================

export interface ProcessingError {
  code?: ErrorCode;
  message: string;
  severity: ProcessingErrorSeverity;
  timestamp: Date;
  source?: string;
  context?: Record<string, unknown>;
}

/**
 * Standardized result format for all agents
 */
export interface StandardizedAgentResult<T> {
  success: boolean;
  data: T;
  errors: ProcessingError[];
  metadata: {
    executionTime: number;
    version: string;
    agentName: Agents;
  };
}
