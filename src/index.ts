#!/usr/bin/env node
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager, DiscoveryError } from './clients/BackupManager';
import { KubectlClient } from './clients/KubectlClient';
import { RetentionManager } from './clients/RetentionManager';
import { BackupConfig } from './interfaces/BackupConfig';
import { RunSummary } from './interfaces/BackupManager';
import { LogLevel, parseLogLevel } from './interfaces/Logger';

export const EXIT_CONFIGURATION_ERROR = 1;
export const EXIT_DISCOVERY_ERROR = 2;
export const EXIT_UNEXPECTED_ERROR = 3;

/**
 * Main application class: loads configuration, wires the components and runs
 * one backup pass over every labelled virtual machine.
 */
class AutoBackupApplication {
  private logger: Logger;
  private backupManager: BackupManager | null = null;

  constructor() {
    // Initialize logger first (will be reconfigured after loading config)
    this.logger = new Logger(LogLevel.INFO);
  }

  /**
   * Load configuration, build the components and verify cluster access
   */
  async initialize(): Promise<void> {
    try {
      this.logger.info('Harvester auto-backup starting...');

      const config = ConfigurationManager.loadConfiguration();

      const logLevel = this.resolveLogLevel(config);
      if (logLevel !== LogLevel.INFO) {
        this.logger = new Logger(logLevel);
      }

      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const clusterClient = new KubectlClient(
        {
          kubectlPath: config.kubectlPath,
          context: config.kubectlContext,
          timeoutSeconds: config.kubectlTimeoutSeconds,
          maxAttempts: config.kubectlMaxAttempts,
        },
        this.logger
      );
      const retentionManager = new RetentionManager(config.retention);
      this.backupManager = new BackupManager(clusterClient, retentionManager, config, this.logger);

      const isValid = await this.backupManager.validateConfiguration();
      if (!isValid) {
        throw new DiscoveryError('Cluster access check failed: cannot list virtual machines');
      }

      this.logger.info('Application initialized successfully');
    } catch (error) {
      this.exitOnError(error, 'Failed to initialize application');
    }
  }

  /**
   * Execute the backup run. Per-VM failures are reported in the summary and do
   * not change the exit code.
   */
  async run(): Promise<RunSummary> {
    try {
      if (!this.backupManager) {
        throw new Error('Application not initialized. Call initialize() first.');
      }

      return await this.backupManager.executeRun();
    } catch (error) {
      this.exitOnError(error, 'Backup run failed');
    }
  }

  /**
   * Setup handlers for interruption and unexpected failures
   */
  setupSignalHandlers(): void {
    const signals = [
      ['SIGINT', 130],
      ['SIGTERM', 143],
    ] as const;

    signals.forEach(([signal, exitCode]) => {
      process.on(signal, () => {
        this.logger.warn(`Received ${signal}, aborting backup run`);
        process.exit(exitCode);
      });
    });

    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception', error);
      process.exit(EXIT_UNEXPECTED_ERROR);
    });

    process.on('unhandledRejection', reason => {
      this.logger.error(
        'Unhandled promise rejection',
        reason instanceof Error ? reason : new Error(String(reason))
      );
      process.exit(EXIT_UNEXPECTED_ERROR);
    });
  }

  private resolveLogLevel(config: BackupConfig): LogLevel {
    if (config.verbose) {
      return LogLevel.DEBUG;
    }
    return parseLogLevel(config.logLevel) ?? LogLevel.INFO;
  }

  private exitOnError(error: unknown, context: string): never {
    if (error instanceof ConfigurationError) {
      this.logger.error('Configuration error', error);
      process.exit(EXIT_CONFIGURATION_ERROR);
    }

    if (error instanceof DiscoveryError) {
      this.logger.error('Virtual machine discovery failed', error);
      process.exit(EXIT_DISCOVERY_ERROR);
    }

    this.logger.error(context, error instanceof Error ? error : new Error(String(error)));
    process.exit(EXIT_UNEXPECTED_ERROR);
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new AutoBackupApplication();

  app.setupSignalHandlers();

  await app.initialize();
  await app.run();
}

// Export for testing
export { AutoBackupApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running backup:', error);
    process.exit(EXIT_UNEXPECTED_ERROR);
  });
}
