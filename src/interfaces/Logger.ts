import { RetentionDecision } from './RetentionManager';
import { RunSummary } from './BackupManager';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup runs
  logConfigurationStart(config: LogMeta): void;
  logBackupCreated(namespace: string, vmName: string, backupName: string, dryRun: boolean): void;
  logBackupError(operation: string, error: Error, meta?: LogMeta): void;
  logRetentionDecision(decision: RetentionDecision): void;
  logRetentionCleanup(namespace: string, vmName: string, deletedCount: number, evaluatedCount: number): void;
  logRunSummary(summary: RunSummary): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}
