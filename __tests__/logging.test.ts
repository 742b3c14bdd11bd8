import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { calculateTokenCost, getModelPricing } from '../lib/config/ai-model-pricing';
import { LogConfigManager } from '../lib/logging/log-config';
import { FileLogWriterImpl, formatLogLine } from '../lib/logging/file-log-writer';
import { LogLevel, WorkflowLogger, scrubSensitiveData } from '../lib/logging/logging';
import { makeLogger } from './helpers/fakes';

describe('WorkflowLogger', () => {
  it('numbers entries and tags them with the workflow id', () => {
    const logger = makeLogger('wf-1');
    logger.logInfo('test.fn', 'hello');

    const entries = logger.getFullLog();
    const last = entries[entries.length - 1];
    expect(last).toMatchObject({ level: LogLevel.INFO, workflowId: 'wf-1', functionName: 'test.fn', message: 'hello' });
    expect(last.stepNumber).toBe(entries.length);
  });

  it('redacts secrets in metadata and personal data in messages', () => {
    const logger = makeLogger();
    logger.logInfo('test.fn', 'Contact jane.doe@example.com', { apiKey: 'test-secret', nested: { token: 'abc' }, note: 'SSN 123-45-6789' });

    const entry = logger.getFullLog()[logger.getFullLog().length - 1];
    expect(entry.message).toBe('Contact [EMAIL-REDACTED]');
    expect(entry.metadata).toEqual({
      apiKey: '[REDACTED]',
      nested: { token: '[REDACTED]' },
      note: 'SSN [SSN-REDACTED]',
    });
  });

  it('summarizes api calls, state transitions and AI cost', () => {
    const logger = makeLogger();
    const okCall = logger.logApiCall('A', 'generateText', {}, Date.now());
    logger.logApiResponse(okCall, 'A', 'generateText', 'CONFIRMED', null, 20);
    const failedCall = logger.logApiCall('A', 'generateText', {}, Date.now());
    logger.logApiResponse(failedCall, 'A', 'generateText', null, new Error('boom'), 40);
    logger.logStateTransition('pending', 'validated', 'code_validation_agent', { code: 'I10' });
    logger.logAiUsage('test.fn', {
      model: 'gpt-4o',
      provider: 'openai',
      inputTokens: 1000,
      outputTokens: 100,
      totalTokens: 1100,
      inputCost: 0.0025,
      outputCost: 0.001,
      totalCost: 0.0035,
      requestDuration: 20,
    });

    expect(logger.generateExecutionSummary()).toMatchObject({
      apiCalls: 2,
      successfulApiCalls: 1,
      failedApiCalls: 1,
      averageApiExecutionTime: 30,
      stateTransitions: 1,
      totalTokens: 1100,
      totalAiCost: 0.0035,
    });
  });

  it('writes entries to a log file when file logging is enabled', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'icd-logs-'));
    try {
      const logger = new WorkflowLogger('file-run', { enableFileLogging: true, enableConsoleLogging: false, logDirectory: dir });
      logger.logInfo('test.fn', 'written to disk');
      await logger.close();

      const files = fs.readdirSync(dir);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^pipeline-.*-file-run\.log$/);
      expect(fs.readFileSync(path.join(dir, files[0]), 'utf8')).toContain('[test.fn] written to disk');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('formatLogLine', () => {
  it('appends metadata as JSON', () => {
    const line = formatLogLine({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: LogLevel.WARN,
      workflowId: 'wf',
      stepNumber: 3,
      functionName: 'fn',
      message: 'careful',
      metadata: { code: 'I10' },
    });

    expect(line).toBe('[2024-01-01T00:00:00.000Z] [WARN] [WF:wf] [Step:3] [fn] careful {"code":"I10"}\n');
  });
});

describe('logging surface', () => {
  it('exposes only the methods the pipeline calls', () => {
    expect(Object.getOwnPropertyNames(FileLogWriterImpl.prototype)).not.toContain('isHealthy');
    expect(Object.getOwnPropertyNames(WorkflowLogger.prototype)).not.toContain('logTrace');
    expect(Object.getOwnPropertyNames(WorkflowLogger.prototype)).not.toContain('getWorkflowId');
    expect(Object.getOwnPropertyNames(LogConfigManager)).not.toContain('validateConfig');
  });
});

describe('LogConfigManager', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
    LogConfigManager.resetConfig();
  });

  it('reads logging settings from the environment', () => {
    process.env.WORKFLOW_FILE_LOGGING_ENABLED = '1';
    process.env.WORKFLOW_LOG_LEVEL = 'debug';
    process.env.WORKFLOW_LOG_DIRECTORY = '/tmp/icd-logs';
    LogConfigManager.resetConfig();

    expect(LogConfigManager.getConfig()).toMatchObject({
      fileLoggingEnabled: true,
      logLevel: LogLevel.DEBUG,
      logDirectory: '/tmp/icd-logs',
    });
  });

  it('falls back to INFO for unknown levels', () => {
    process.env.WORKFLOW_LOG_LEVEL = 'verbose';
    LogConfigManager.resetConfig();

    expect(LogConfigManager.getConfig().logLevel).toBe(LogLevel.INFO);
  });
});

describe('pricing', () => {
  it('matches model names by substring', () => {
    expect(getModelPricing('gpt-4o-mini-2024-07-18')).toEqual({ inputTokenPrice: 0.00015, outputTokenPrice: 0.0006 });
    expect(getModelPricing('unknown-model')).toEqual({ inputTokenPrice: 0.001, outputTokenPrice: 0.002 });
  });

  it('prices tokens per thousand', () => {
    expect(calculateTokenCost('gpt-4o', 2000, 1000).totalCost).toBeCloseTo(0.015);
  });

  it('leaves unrelated text untouched when scrubbing', () => {
    expect(scrubSensitiveData('E11.9 confirmed')).toBe('E11.9 confirmed');
  });
});
