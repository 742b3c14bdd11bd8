/**
 * File Log Writer
 *
 * Appends formatted log entries to a per-run log file. Write failures disable
 * file output for the rest of the run; console logging is unaffected.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LogEntry } from './logging';

export interface FileLogWriter {
  initialize(logFilePath: string): Promise<boolean>;
  writeEntry(entry: LogEntry): Promise<void>;
  close(): Promise<void>;
}

export class FileLogWriterImpl implements FileLogWriter {
  private writeStream?: fs.WriteStream;
  private isInitialized = false;
  private hasErrors = false;
  private writeQueue: LogEntry[] = [];
  private pending: Promise<void> = Promise.resolve();

  async initialize(logFilePath: string): Promise<boolean> {
    try {
      await fs.promises.mkdir(path.dirname(logFilePath), { recursive: true, mode: 0o755 });

      this.writeStream = fs.createWriteStream(logFilePath, { flags: 'a', encoding: 'utf8' });
      this.writeStream.on('error', (error) => this.handleWriteError(error));

      await this.writeToStream(
        `=== ICD PIPELINE LOG ===\nStart Time: ${new Date().toISOString()}\n========================\n\n`,
      );

      this.isInitialized = true;
      return true;
    } catch (error) {
      this.hasErrors = true;
      console.warn(
        `[FileLogWriter] Failed to initialize file logging: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  writeEntry(entry: LogEntry): Promise<void> {
    if (!this.isInitialized || this.hasErrors) {
      return Promise.resolve();
    }

    this.writeQueue.push(entry);
    // Chain drains so entries land in the order they were logged.
    this.pending = this.pending.then(() => this.drainQueue());
    return this.pending;
  }

  async close(): Promise<void> {
    await this.pending;

    const stream = this.writeStream;
    this.writeStream = undefined;
    this.isInitialized = false;

    if (stream && !stream.destroyed) {
      await new Promise<void>((resolve) => stream.end(() => resolve()));
    }
  }

  private async drainQueue(): Promise<void> {
    try {
      let entry = this.writeQueue.shift();
      while (entry && !this.hasErrors) {
        await this.writeToStream(formatLogLine(entry));
        entry = this.writeQueue.shift();
      }
    } catch (error) {
      this.handleWriteError(error);
    }
  }

  private writeToStream(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.writeStream) {
        reject(new Error('Write stream not available'));
        return;
      }
      this.writeStream.write(data, (error) => (error ? reject(error) : resolve()));
    });
  }

  private handleWriteError(error: unknown): void {
    console.error(
      `[FileLogWriter] Write error: ${error instanceof Error ? error.message : String(error)}. Disabling file logging.`,
    );
    this.hasErrors = true;
    this.writeQueue = [];

    if (this.writeStream && !this.writeStream.destroyed) {
      this.writeStream.destroy();
    }
    this.writeStream = undefined;
  }
}

export function formatLogLine(entry: LogEntry): string {
  let line = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;
  if (entry.metadata) {
    line += ` ${JSON.stringify(entry.metadata)}`;
  }
  return line + '\n';
}
