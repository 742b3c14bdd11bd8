import { randomUUID } from "crypto";
import * as path from "path";
import { FileLogWriter, FileLogWriterImpl } from "./file-log-writer";
import { LogConfigManager } from "./log-config";
import { LogLevel, meetsThreshold } from "./log-level";

export { LogLevel } from "./log-level";

// --- Structured workflow logging for pipeline runs ---

export interface AIUsageData {
  model: string;
  provider: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputCost: number;
  outputCost: number;
  totalCost: number;
  requestDuration: number;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  workflowId: string;
  stepNumber: number;
  functionName: string;
  message: string;
  metadata?: Record<string, unknown>;
  aiUsage?: AIUsageData;
}

export interface WorkflowLoggerConfig {
  enableFileLogging: boolean;
  enableConsoleLogging: boolean;
  logDirectory: string;
  logLevel: LogLevel;
}

interface ApiCallTrace {
  callId: string;
  component: string;
  success: boolean;
  executionTime: number;
}

export interface ExecutionSummary {
  workflowId: string;
  totalExecutionTime: number;
  totalSteps: number;
  apiCalls: number;
  successfulApiCalls: number;
  failedApiCalls: number;
  averageApiExecutionTime: number;
  stateTransitions: number;
  totalTokens: number;
  totalAiCost: number;
}

const REDACTED_KEYS = ["password", "token", "apikey", "api_key", "authorization", "secret"];

export class WorkflowLogger {
  private readonly workflowId: string;
  private readonly workflowStartTime = Date.now();
  private readonly config: WorkflowLoggerConfig;
  private stepCounter = 0;
  private apiCallCounter = 0;
  private stateTransitionCounter = 0;
  private totalAiCost = 0;
  private totalTokens = 0;
  private readonly apiCalls: ApiCallTrace[] = [];
  private readonly entries: LogEntry[] = [];

  private fileWriter?: FileLogWriter;
  private fileReady: Promise<boolean>;

  constructor(workflowId?: string, config?: Partial<WorkflowLoggerConfig>) {
    this.workflowId = workflowId || randomUUID();

    const globalConfig = LogConfigManager.getConfig();
    this.config = {
      enableFileLogging: config?.enableFileLogging ?? globalConfig.fileLoggingEnabled,
      enableConsoleLogging: config?.enableConsoleLogging ?? globalConfig.consoleLoggingEnabled,
      logDirectory: config?.logDirectory ?? globalConfig.logDirectory,
      logLevel: config?.logLevel ?? globalConfig.logLevel,
    };

    this.fileReady = this.config.enableFileLogging
      ? this.initializeFileLogging()
      : Promise.resolve(false);

    this.logWorkflow("WorkflowLogger.constructor", "Initialized workflow logger", {
      workflowId: this.workflowId,
      fileLoggingEnabled: this.config.enableFileLogging,
      logLevel: this.config.logLevel,
    });
  }

  public getFullLog(): readonly LogEntry[] {
    return this.entries;
  }

  public logDebug(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.write(this.createLogEntry(LogLevel.DEBUG, functionName, message, metadata));
  }

  public logInfo(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.write(this.createLogEntry(LogLevel.INFO, functionName, message, metadata));
  }

  public logWarn(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.write(this.createLogEntry(LogLevel.WARN, functionName, message, metadata));
  }

  public logError(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.write(this.createLogEntry(LogLevel.ERROR, functionName, message, metadata));
  }

  public logWorkflow(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.write(this.createLogEntry(LogLevel.WORKFLOW, functionName, message, metadata));
  }

  public logAiUsage(functionName: string, aiUsage: AIUsageData) {
    this.totalAiCost += aiUsage.totalCost;
    this.totalTokens += aiUsage.totalTokens;

    const entry = this.createLogEntry(
      LogLevel.AI_USAGE,
      functionName,
      `AI API call completed - Model: ${aiUsage.model}, Tokens: ${aiUsage.totalTokens}, Cost: $${aiUsage.totalCost.toFixed(4)}`,
      { ...aiUsage, cumulativeCost: this.totalAiCost },
    );
    entry.aiUsage = aiUsage;
    this.write(entry);
  }

  /**
   * Records the start of an outbound call and returns the id to pass to
   * `logApiResponse`.
   */
  public logApiCall(service: string, method: string, input: unknown, startTime: number): string {
    const callId = `${this.workflowId}-api-${++this.apiCallCounter}`;
    this.write(
      this.createLogEntry(LogLevel.DEBUG, `API.${service}.${method}.start`, "Starting API call", {
        service,
        method,
        callId,
        input,
        startTime: new Date(startTime).toISOString(),
      }),
    );
    return callId;
  }

  public logApiResponse(
    callId: string,
    service: string,
    method: string,
    response: unknown,
    error: unknown,
    executionTime: number,
  ): void {
    const failed = error !== null && error !== undefined;
    this.write(
      this.createLogEntry(
        failed ? LogLevel.ERROR : LogLevel.DEBUG,
        `API.${service}.${method}.end`,
        `API call ${failed ? "failed" : "completed"}`,
        {
          service,
          method,
          callId,
          executionTime,
          success: !failed,
          response: failed ? undefined : response,
          error: failed ? describeError(error) : undefined,
        },
      ),
    );
    this.apiCalls.push({ callId, component: `${service}.${method}`, success: !failed, executionTime });
  }

  public logStateTransition(
    fromStatus: string,
    toStatus: string,
    agentName: string,
    context: Record<string, unknown>,
  ): void {
    this.stateTransitionCounter++;
    this.write(
      this.createLogEntry(
        LogLevel.STATE_TRANSITION,
        `State.${agentName}`,
        `${fromStatus} -> ${toStatus}`,
        { agentName, fromStatus, toStatus, ...context },
      ),
    );
  }

  public generateExecutionSummary(): ExecutionSummary {
    const successful = this.apiCalls.filter((call) => call.success).length;
    const totalApiTime = this.apiCalls.reduce((sum, call) => sum + call.executionTime, 0);

    return {
      workflowId: this.workflowId,
      totalExecutionTime: Date.now() - this.workflowStartTime,
      totalSteps: this.stepCounter,
      apiCalls: this.apiCalls.length,
      successfulApiCalls: successful,
      failedApiCalls: this.apiCalls.length - successful,
      averageApiExecutionTime: this.apiCalls.length > 0 ? totalApiTime / this.apiCalls.length : 0,
      stateTransitions: this.stateTransitionCounter,
      totalTokens: this.totalTokens,
      totalAiCost: Math.round(this.totalAiCost * 10000) / 10000,
    };
  }

  /**
   * Flushes pending file writes and releases the log file.
   */
  public async close(): Promise<void> {
    await this.fileReady;
    if (this.fileWriter) {
      await this.fileWriter.close();
      this.fileWriter = undefined;
    }
  }

  private createLogEntry(
    level: LogLevel,
    functionName: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      workflowId: this.workflowId,
      stepNumber: ++this.stepCounter,
      functionName,
      message: scrubSensitiveData(message),
      metadata: metadata ? scrubRecord(metadata, new WeakSet()) : undefined,
    };
  }

  private write(entry: LogEntry): void {
    this.entries.push(entry);
    if (!meetsThreshold(entry.level, this.config.logLevel)) {
      return;
    }

    if (this.config.enableConsoleLogging) {
      const formatted = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;
      const args = entry.metadata ? [formatted, entry.metadata] : [formatted];
      switch (entry.level) {
        case LogLevel.ERROR:
          console.error(...args);
          break;
        case LogLevel.WARN:
          console.warn(...args);
          break;
        case LogLevel.DEBUG:
        case LogLevel.TRACE:
        case LogLevel.STATE_TRANSITION:
          console.debug(...args);
          break;
        default:
          console.log(...args);
      }
    }

    if (this.config.enableFileLogging) {
      this.fileReady
        .then((ready) => (ready && this.fileWriter ? this.fileWriter.writeEntry(entry) : undefined))
        .catch((error: unknown) => {
          console.warn(`[WorkflowLogger] File write failed: ${describeError(error).message}`);
        });
    }
  }

  private async initializeFileLogging(): Promise<boolean> {
    const writer = new FileLogWriterImpl();
    const timestamp = new Date().toISOString().replace(/[:.]/g, "-").replace("Z", "");
    const safeId = this.workflowId.replace(/[^a-zA-Z0-9\-_]/g, "-").substring(0, 50);
    const logFilePath = path.join(this.config.logDirectory || "logs", `pipeline-${timestamp}-${safeId}.log`);

    const initialized = await writer.initialize(logFilePath);
    if (initialized) {
      this.fileWriter = writer;
    } else {
      console.warn("[WorkflowLogger] File logging initialization failed, falling back to console only");
    }
    return initialized;
  }
}

// --- Sanitization helpers ---

export function scrubSensitiveData(text: string): string {
  return text
    .replace(/\b\d{3}-\d{2}-\d{4}\b/g, "[SSN-REDACTED]")
    .replace(/\b\d{4}\s?\d{4}\s?\d{4}\s?\d{4}\b/g, "[CARD-REDACTED]")
    .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, "[EMAIL-REDACTED]")
    .replace(/\b\d{10,}\b/g, "[PHONE-REDACTED]");
}

function scrubRecord(record: Record<string, unknown>, visited: WeakSet<object>): Record<string, unknown> {
  const scrubbed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    const lowered = key.toLowerCase();
    if (lowered.includes("ssn")) {
      scrubbed[key] = "[SSN-REDACTED]";
    } else if (REDACTED_KEYS.includes(lowered)) {
      scrubbed[key] = "[REDACTED]";
    } else {
      scrubbed[key] = scrubValue(value, visited);
    }
  }
  return scrubbed;
}

function scrubValue(value: unknown, visited: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return scrubSensitiveData(value);
  }
  if (value instanceof Error) {
    return scrubRecord(describeError(value), visited);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object" && value !== null) {
    if (visited.has(value)) {
      return "[CIRCULAR-REFERENCE]";
    }
    visited.add(value);

    if (Array.isArray(value)) {
      return value.map((item: unknown) => scrubValue(item, visited));
    }
    return scrubRecord(Object.fromEntries(Object.entries(value)), visited);
  }
  return value;
}

export function describeError(error: unknown): { name: string; message: string } & Record<string, unknown> {
  if (error instanceof Error) {
    const described: { name: string; message: string } & Record<string, unknown> = {
      name: error.name,
      message: error.message,
    };
    if ("code" in error && typeof error.code === "string") {
      described.code = error.code;
    }
    if ("status" in error && typeof error.status === "number") {
      described.status = error.status;
    }
    return described;
  }
  return { name: "UnknownError", message: String(error) };
}
