import { BackupConfig } from '../interfaces/BackupConfig';
import { RetentionOffsets } from '../interfaces/RetentionManager';
import { Duration, DurationUnit, formatDuration } from '../types/Duration';
import { EnvironmentConfig } from '../types/EnvironmentConfig';
import { TimeSource } from '../utils/TimeSource';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_RETENTION: RetentionOffsets = {
  weekly: { amount: 2, unit: 'weeks' },
  monthly: { amount: 2, unit: 'months' },
  delete: { amount: 1, unit: 'years' },
};

const VALID_LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

const DURATION_UNITS: Record<string, DurationUnit> = {
  d: 'days',
  day: 'days',
  days: 'days',
  w: 'weeks',
  week: 'weeks',
  weeks: 'weeks',
  m: 'months',
  month: 'months',
  months: 'months',
  y: 'years',
  year: 'years',
  years: 'years',
};

// Kubernetes qualified name, with optional DNS subdomain prefix
const LABEL_NAME_PATTERN = /^[A-Za-z0-9]([-A-Za-z0-9_.]{0,61}[A-Za-z0-9])?$/;
const DNS_SUBDOMAIN_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$/;

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): BackupConfig {
    const requiredVars: Array<keyof EnvironmentConfig> = ['BACKUP_LABEL'];

    const missingVars = requiredVars.filter(varName => !env[varName]?.trim());
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const label = (env.BACKUP_LABEL ?? '').trim();
    if (!this.isValidLabelKey(label)) {
      throw new ConfigurationError(
        `Invalid BACKUP_LABEL: ${label}. Must be a valid Kubernetes label key`,
        'BACKUP_LABEL'
      );
    }

    const namespace = env.BACKUP_NAMESPACE?.trim() || undefined;
    if (namespace !== undefined && !NAMESPACE_PATTERN.test(namespace)) {
      throw new ConfigurationError(
        `Invalid BACKUP_NAMESPACE: ${namespace}. Must be a valid Kubernetes namespace name`,
        'BACKUP_NAMESPACE'
      );
    }

    const retention: RetentionOffsets = {
      weekly: this.parseDurationVariable(env, 'WEEKLY_RETENTION', DEFAULT_RETENTION.weekly),
      monthly: this.parseDurationVariable(env, 'MONTHLY_RETENTION', DEFAULT_RETENTION.monthly),
      delete: this.parseDurationVariable(env, 'DELETE_RETENTION', DEFAULT_RETENTION.delete),
    };
    this.validateRetentionOrdering(retention);

    let logLevel: string | undefined;
    if (env.LOG_LEVEL) {
      logLevel = env.LOG_LEVEL.toLowerCase();
      if (!VALID_LOG_LEVELS.includes(logLevel)) {
        throw new ConfigurationError(
          `Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Must be one of: ${VALID_LOG_LEVELS.join(', ')}`,
          'LOG_LEVEL'
        );
      }
    }

    const config: BackupConfig = {
      label,
      verbose: this.parseBoolean(env, 'VERBOSE'),
      dryRun: this.parseBoolean(env, 'DRY_RUN'),
      retention,
      kubectlPath: env.KUBECTL_PATH?.trim() || 'kubectl',
      kubectlTimeoutSeconds: this.parsePositiveInteger(env, 'KUBECTL_TIMEOUT_SECONDS', 60),
      kubectlMaxAttempts: this.parsePositiveInteger(env, 'KUBECTL_MAX_ATTEMPTS', 3),
    };

    // Add optional properties only if they exist
    if (namespace !== undefined) {
      config.namespace = namespace;
    }
    if (env.KUBECTL_CONTEXT?.trim()) {
      config.kubectlContext = env.KUBECTL_CONTEXT.trim();
    }
    if (logLevel !== undefined) {
      config.logLevel = logLevel;
    }

    return config;
  }

  /**
   * Parse a duration such as "2w", "14d", "2 months" or "1y"
   */
  static parseDuration(value: string): Duration | null {
    const match = value.trim().toLowerCase().match(/^(\d+)\s*([a-z]+)$/);
    if (!match) {
      return null;
    }

    const amount = parseInt(match[1], 10);
    const unit = DURATION_UNITS[match[2]];
    if (unit === undefined || amount <= 0) {
      return null;
    }

    return { amount, unit };
  }

  /**
   * Reject offsets that would not yield deleteBoundary < monthlyBoundary < weeklyBoundary
   */
  static validateRetentionOrdering(retention: RetentionOffsets, timeSource = new TimeSource()): void {
    const now = timeSource.now();
    const thresholds = timeSource.deriveThresholds(retention, now);

    if (!timeSource.thresholdsAreOrdered(thresholds, now)) {
      throw new ConfigurationError(
        `Invalid retention offsets: expected WEEKLY_RETENTION (${formatDuration(retention.weekly)}) < ` +
          `MONTHLY_RETENTION (${formatDuration(retention.monthly)}) < ` +
          `DELETE_RETENTION (${formatDuration(retention.delete)})`,
        'RETENTION'
      );
    }
  }

  /**
   * Produce a log-friendly view of the configuration
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    return {
      label: config.label,
      namespace: config.namespace ?? 'all namespaces',
      verbose: config.verbose,
      dryRun: config.dryRun,
      weeklyRetention: formatDuration(config.retention.weekly),
      monthlyRetention: formatDuration(config.retention.monthly),
      deleteRetention: formatDuration(config.retention.delete),
      kubectlPath: config.kubectlPath,
      kubectlContext: config.kubectlContext ?? 'current context',
      kubectlTimeoutSeconds: config.kubectlTimeoutSeconds,
      kubectlMaxAttempts: config.kubectlMaxAttempts,
      logLevel: config.logLevel ?? (config.verbose ? 'debug' : 'info'),
    };
  }

  private static isValidLabelKey(label: string): boolean {
    const parts = label.split('/');
    if (parts.length > 2) {
      return false;
    }

    const name = parts[parts.length - 1];
    if (!LABEL_NAME_PATTERN.test(name)) {
      return false;
    }

    if (parts.length === 2) {
      const prefix = parts[0];
      return prefix.length <= 253 && DNS_SUBDOMAIN_PATTERN.test(prefix);
    }

    return true;
  }

  private static parseDurationVariable(
    env: NodeJS.ProcessEnv,
    name: keyof EnvironmentConfig,
    fallback: Duration
  ): Duration {
    const raw = env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    const duration = this.parseDuration(raw);
    if (!duration) {
      throw new ConfigurationError(
        `Invalid ${name}: ${raw}. Expected a positive amount with unit d, w, m or y (e.g. "2w")`,
        name
      );
    }

    return duration;
  }

  private static parseBoolean(env: NodeJS.ProcessEnv, name: keyof EnvironmentConfig): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) {
      return false;
    }

    if (['true', '1', 'yes'].includes(raw)) {
      return true;
    }
    if (['false', '0', 'no'].includes(raw)) {
      return false;
    }

    throw new ConfigurationError(`Invalid ${name}: ${env[name]}. Must be true or false`, name);
  }

  private static parsePositiveInteger(
    env: NodeJS.ProcessEnv,
    name: keyof EnvironmentConfig,
    fallback: number
  ): number {
    const raw = env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    if (!/^\d+$/.test(raw) || parseInt(raw, 10) <= 0) {
      throw new ConfigurationError(`Invalid ${name}: ${raw}. Must be a positive integer`, name);
    }

    return parseInt(raw, 10);
  }
}
