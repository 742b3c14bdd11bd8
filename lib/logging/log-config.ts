/**
 * Log Configuration Management
 *
 * Reads logging settings from the environment once and caches them for every
 * logger created in the process.
 */

import { LogLevel } from './log-level';

export interface LogConfig {
  fileLoggingEnabled: boolean;
  consoleLoggingEnabled: boolean;
  logDirectory: string;
  logLevel: LogLevel;
}

export class LogConfigManager {
  private static config: LogConfig | null = null;

  static getConfig(): LogConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  private static loadConfig(): LogConfig {
    return {
      fileLoggingEnabled: this.parseBoolean(process.env.WORKFLOW_FILE_LOGGING_ENABLED, false),
      consoleLoggingEnabled: this.parseBoolean(process.env.WORKFLOW_CONSOLE_LOGGING_ENABLED, true),
      logDirectory: process.env.WORKFLOW_LOG_DIRECTORY || 'logs/',
      logLevel: this.parseLogLevel(process.env.WORKFLOW_LOG_LEVEL, LogLevel.INFO),
    };
  }

  /**
   * Resets the configuration cache (useful for testing).
   */
  static resetConfig(): void {
    this.config = null;
  }

  private static parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined || value === '') return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  private static parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
    if (!value) return defaultValue;

    const upperValue = value.toUpperCase();
    const match = Object.values(LogLevel).find((level) => level === upperValue);
    return match ?? defaultValue;
  }
}
