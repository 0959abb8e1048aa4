import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { RetentionDecision } from '../interfaces/RetentionManager';
import { RunSummary } from '../interfaces/BackupManager';
import { backupKey } from '../types/BackupRecord';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'kubeconfig', 'authorization'];

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = this.sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (this.isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  private isPlainObject(value: unknown): value is LogMeta {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...('code' in error && error.code !== undefined && { code: error.code }),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Backup run starting with configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config),
    });
  }

  logBackupCreated(namespace: string, vmName: string, backupName: string, dryRun: boolean): void {
    this.info(dryRun ? 'Dry run: would create backup' : 'Backup created', {
      operation: 'backup_create',
      namespace,
      vmName,
      backupName,
      dryRun,
    });
  }

  logBackupError(operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Backup operation failed: ${operation}`, error, {
      operation: 'backup_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logRetentionDecision(decision: RetentionDecision): void {
    this.debug(`${decision.action === 'keep' ? 'Keeping' : 'Deleting'} ${backupKey(decision.record)}`, {
      operation: 'retention_decision',
      backup: backupKey(decision.record),
      createdAt: decision.record.createdAt.toISOString(),
      action: decision.action,
      tier: decision.tier,
      ...(decision.bucket !== undefined && { bucket: decision.bucket }),
      reason: decision.reason,
    });
  }

  logRetentionCleanup(namespace: string, vmName: string, deletedCount: number, evaluatedCount: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      namespace,
      vmName,
      deletedCount,
      evaluatedCount,
    });
  }

  logRunSummary(summary: RunSummary): void {
    const message = summary.noMatchingVirtualMachines
      ? 'Backup run completed: no matching virtual machines'
      : 'Backup run completed';

    this.info(message, {
      operation: 'run_summary',
      virtualMachines: summary.virtualMachines,
      backupsCreated: summary.backupsCreated,
      backupsEvaluated: summary.backupsEvaluated,
      backupsMarkedForDeletion: summary.backupsMarkedForDeletion,
      backupsDeleted: summary.backupsDeleted,
      failures: summary.failures,
      dryRun: summary.dryRun,
      duration: summary.duration,
    });
  }
}
