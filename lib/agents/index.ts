export { Agent } from "./agent-core";
export type { AgentContext } from "./agent-core";
export { CodeExtractionAgent } from "./code-extraction-agent";
export type { CodeExtractionInput } from "./code-extraction-agent";
export { CodeValidationAgent, InvalidTransitionError, assertTransition } from "./validation-agent";
export type { CodeValidationInput } from "./validation-agent";
export { ConfidenceScoringAgent } from "./confidence-agent";
export type { ConfidenceScoringInput } from "./confidence-agent";
export { SchemaAssemblyAgent, assembleOutputRecord, serializeOutputRecord, toOutputEntry } from "./schema-assembler";
export type { SchemaAssemblyInput } from "./schema-assembler";
export * from "./response-parsers";
export * from "./types";
