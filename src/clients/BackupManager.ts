import {
  BackupManager as IBackupManager,
  RunSummary,
  VirtualMachineResult,
} from '../interfaces/BackupManager';
import { BackupConfig } from '../interfaces/BackupConfig';
import { ClusterClient } from '../interfaces/ClusterClient';
import { Logger } from '../interfaces/Logger';
import { RetentionManager, RetentionThresholds } from '../interfaces/RetentionManager';
import { BackupRecord, VirtualMachineRef, backupKey } from '../types/BackupRecord';
import { TimeSource } from '../utils/TimeSource';

/**
 * Custom error classes for better error handling and categorization
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/** Virtual machines could not be listed; aborts the run */
export class DiscoveryError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'discovery', cause);
    this.name = 'DiscoveryError';
  }
}

export class BackupCreationError extends BackupError {
  constructor(
    message: string,
    public readonly vm: VirtualMachineRef,
    cause?: Error
  ) {
    super(message, 'backup_creation', cause);
    this.name = 'BackupCreationError';
  }
}

export class ListingError extends BackupError {
  constructor(
    message: string,
    public readonly vm: VirtualMachineRef,
    cause?: Error
  ) {
    super(message, 'listing', cause);
    this.name = 'ListingError';
  }
}

export class DeletionError extends BackupError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'deletion', cause);
    this.name = 'DeletionError';
  }
}

/**
 * BackupManager implementation that drives one backup run.
 * Each labelled VM is backed up and then has its backup history pruned.
 * VMs are processed one at a time; a failure only affects its own VM (or backup).
 */
export class BackupManager implements IBackupManager {
  private clusterClient: ClusterClient;
  private retentionManager: RetentionManager;
  private config: BackupConfig;
  private logger: Logger;
  private timeSource: TimeSource;

  constructor(
    clusterClient: ClusterClient,
    retentionManager: RetentionManager,
    config: BackupConfig,
    logger: Logger,
    timeSource: TimeSource = new TimeSource()
  ) {
    this.clusterClient = clusterClient;
    this.retentionManager = retentionManager;
    this.config = config;
    this.logger = logger;
    this.timeSource = timeSource;
  }

  async executeRun(): Promise<RunSummary> {
    const startTime = Date.now();

    // Thresholds are fixed for the whole run; a bad ordering aborts before any cluster call
    const thresholds = this.retentionManager.computeThresholds(this.timeSource.now());
    this.logger.info('Retention boundaries computed', {
      weeklyBoundary: thresholds.weeklyBoundary.toISOString(),
      monthlyBoundary: thresholds.monthlyBoundary.toISOString(),
      deleteBoundary: thresholds.deleteBoundary.toISOString(),
    });

    const summary: RunSummary = {
      virtualMachines: 0,
      noMatchingVirtualMachines: false,
      backupsCreated: 0,
      backupsEvaluated: 0,
      backupsMarkedForDeletion: 0,
      backupsDeleted: 0,
      failures: { creation: 0, listing: 0, deletion: 0 },
      dryRun: this.config.dryRun,
      duration: 0,
      results: [],
    };

    const virtualMachines = await this.discoverVirtualMachines();
    summary.virtualMachines = virtualMachines.length;

    if (virtualMachines.length === 0) {
      this.logger.info('No matching virtual machines found', {
        label: `${this.config.label}=true`,
        namespace: this.config.namespace ?? 'all namespaces',
      });
      summary.noMatchingVirtualMachines = true;
    }

    for (const vm of virtualMachines) {
      const result = await this.processVirtualMachine(vm, thresholds);
      this.accumulate(summary, result);
    }

    summary.duration = Date.now() - startTime;
    this.logger.logRunSummary(summary);

    return summary;
  }

  async validateConfiguration(): Promise<boolean> {
    try {
      this.logger.info('Checking cluster access...');
      const allowed = await this.clusterClient.testConnection(this.config.namespace);

      if (!allowed) {
        this.logger.warn('Current identity is not allowed to list virtual machines', {
          namespace: this.config.namespace ?? 'all namespaces',
        });
        return false;
      }

      this.logger.info('Cluster access check passed');
      return true;
    } catch (error) {
      this.logger.error('Cluster access check failed', this.toError(error));
      return false;
    }
  }

  private async discoverVirtualMachines(): Promise<VirtualMachineRef[]> {
    try {
      const virtualMachines = await this.clusterClient.listVirtualMachines(
        this.config.label,
        this.config.namespace
      );
      this.logger.info(`Found ${virtualMachines.length} virtual machines to back up`, {
        virtualMachines: virtualMachines.map(vm => `${vm.namespace}/${vm.name}`),
      });
      return virtualMachines;
    } catch (error) {
      throw new DiscoveryError(
        `Failed to list virtual machines with label ${this.config.label}=true: ${this.formatError(error)}`,
        this.toError(error)
      );
    }
  }

  private async processVirtualMachine(
    vm: VirtualMachineRef,
    thresholds: RetentionThresholds
  ): Promise<VirtualMachineResult> {
    const result: VirtualMachineResult = {
      namespace: vm.namespace,
      name: vm.name,
      state: 'discovering',
      evaluatedCount: 0,
      markedForDeletion: [],
      deletedKeys: [],
      errors: [],
    };

    result.state = 'creating_backup';
    const backupName = this.generateBackupName(vm.name);
    result.backupName = backupName;

    try {
      if (!this.config.dryRun) {
        await this.clusterClient.createBackup(vm.namespace, vm.name, backupName);
      }
      this.logger.logBackupCreated(vm.namespace, vm.name, backupName, this.config.dryRun);
    } catch (error) {
      const creationError = new BackupCreationError(
        `Failed to create backup ${backupName} for ${vm.namespace}/${vm.name}: ${this.formatError(error)}`,
        vm,
        this.toError(error)
      );
      this.logger.logBackupError('create', creationError, { namespace: vm.namespace, vmName: vm.name });
      result.state = 'backup_failed';
      result.errors.push(creationError.message);
      return result;
    }

    result.state = 'listing_backups';
    let records: BackupRecord[];
    try {
      records = await this.clusterClient.listBackups(vm.namespace, vm.name);
    } catch (error) {
      const listingError = new ListingError(
        `Failed to list backups for ${vm.namespace}/${vm.name}: ${this.formatError(error)}`,
        vm,
        this.toError(error)
      );
      this.logger.logBackupError('list', listingError, { namespace: vm.namespace, vmName: vm.name });
      result.state = 'listing_failed';
      result.errors.push(listingError.message);
      return result;
    }

    if (records.length === 0) {
      this.logger.info(`No backups found for ${vm.namespace}/${vm.name}`);
      result.state = 'no_backups';
      return result;
    }

    result.state = 'classifying';
    result.evaluatedCount = records.length;
    const plan = this.retentionManager.planRetention(records, thresholds);

    result.state = 'reducing';
    if (this.config.verbose) {
      plan.decisions.forEach(decision => this.logger.logRetentionDecision(decision));
    }
    result.markedForDeletion = plan.delete.map(backupKey);

    result.state = 'deleting';
    for (const record of plan.delete) {
      const key = backupKey(record);

      if (this.config.dryRun) {
        this.logger.info(`Dry run: would delete backup ${key}`, {
          createdAt: record.createdAt.toISOString(),
        });
        continue;
      }

      try {
        await this.clusterClient.deleteBackup(record.namespace, record.name);
        result.deletedKeys.push(key);
        this.logger.info(`Deleted backup ${key}`, { createdAt: record.createdAt.toISOString() });
      } catch (error) {
        const deletionError = new DeletionError(
          `Failed to delete backup ${key}: ${this.formatError(error)}`,
          key,
          this.toError(error)
        );
        this.logger.logBackupError('delete', deletionError, { namespace: vm.namespace, vmName: vm.name });
        result.errors.push(deletionError.message);
      }
    }

    this.logger.logRetentionCleanup(vm.namespace, vm.name, result.deletedKeys.length, result.evaluatedCount);
    result.state = 'done';
    return result;
  }

  private accumulate(summary: RunSummary, result: VirtualMachineResult): void {
    summary.results.push(result);

    if (result.state === 'backup_failed') {
      summary.failures.creation++;
      return;
    }

    if (!this.config.dryRun) {
      summary.backupsCreated++;
    }

    if (result.state === 'listing_failed') {
      summary.failures.listing++;
      return;
    }

    summary.backupsEvaluated += result.evaluatedCount;
    summary.backupsMarkedForDeletion += result.markedForDeletion.length;
    summary.backupsDeleted += result.deletedKeys.length;
    summary.failures.deletion += result.errors.length;
  }

  /**
   * Backup name of the form <vm>-<YYYYMMDD-HHMMSS>, unique per second
   */
  private generateBackupName(vmName: string): string {
    return `${vmName}-${this.timeSource.formatBackupTimestamp(this.timeSource.now())}`;
  }

  private toError(error: unknown): Error | undefined {
    return error instanceof Error ? error : undefined;
  }

  private formatError(error: unknown): string {
    if (error instanceof Error) {
      return `${error.name}: ${error.message}`;
    }
    return String(error);
  }
}
