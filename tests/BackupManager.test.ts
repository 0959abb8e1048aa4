import { BackupManager, DiscoveryError } from '../src/clients/BackupManager';
import { RetentionManager } from '../src/clients/RetentionManager';
import { ConfigurationError, DEFAULT_RETENTION } from '../src/config/ConfigurationManager';
import { BackupConfig } from '../src/interfaces/BackupConfig';
import { ClusterClient } from '../src/interfaces/ClusterClient';
import { Logger } from '../src/interfaces/Logger';
import { BackupRecord, createBackupRecord } from '../src/types/BackupRecord';
import { TimeSource } from '../src/utils/TimeSource';

function backup(name: string, createdAt: string, vmName: string): BackupRecord {
  return createBackupRecord({ namespace: 'default', name, vmName, createdAt: new Date(createdAt) });
}

describe('BackupManager', () => {
  const now = new Date('2024-06-16T12:00:00Z');

  let backupManager: BackupManager;
  let mockClusterClient: jest.Mocked<ClusterClient>;
  let mockLogger: jest.Mocked<Logger>;
  let timeSource: TimeSource;
  let config: BackupConfig;

  const createManager = (overrides: Partial<BackupConfig> = {}): BackupManager => {
    config = { ...config, ...overrides };
    return new BackupManager(
      mockClusterClient,
      new RetentionManager(config.retention, timeSource),
      config,
      mockLogger,
      timeSource
    );
  };

  beforeEach(() => {
    jest.clearAllMocks();

    timeSource = new TimeSource(() => now);

    mockClusterClient = {
      testConnection: jest.fn(),
      listVirtualMachines: jest.fn(),
      createBackup: jest.fn(),
      listBackups: jest.fn(),
      deleteBackup: jest.fn(),
    };

    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
      logConfigurationStart: jest.fn(),
      logBackupCreated: jest.fn(),
      logBackupError: jest.fn(),
      logRetentionDecision: jest.fn(),
      logRetentionCleanup: jest.fn(),
      logRunSummary: jest.fn(),
    };

    config = {
      label: 'backup',
      verbose: false,
      dryRun: false,
      retention: DEFAULT_RETENTION,
      kubectlPath: 'kubectl',
      kubectlTimeoutSeconds: 60,
      kubectlMaxAttempts: 3,
    };

    mockClusterClient.createBackup.mockResolvedValue(undefined);
    mockClusterClient.deleteBackup.mockResolvedValue(undefined);

    backupManager = createManager();
  });

  describe('executeRun', () => {
    const vmBBackups = [
      backup('vm-b-20240616-120000', '2024-06-16T12:00:00Z', 'vm-b'),
      backup('vm-b-old-1', '2024-05-28T02:00:00Z', 'vm-b'),
      backup('vm-b-old-2', '2024-05-30T02:00:00Z', 'vm-b'),
    ];

    it('should create a timestamped backup for each virtual machine', async () => {
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-a' }]);
      mockClusterClient.listBackups.mockResolvedValue([]);

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.listVirtualMachines).toHaveBeenCalledWith('backup', undefined);
      expect(mockClusterClient.createBackup).toHaveBeenCalledWith('default', 'vm-a', 'vm-a-20240616-120000');
      expect(mockLogger.logBackupCreated).toHaveBeenCalledWith('default', 'vm-a', 'vm-a-20240616-120000', false);
      expect(summary.backupsCreated).toBe(1);
      expect(summary.results[0].state).toBe('no_backups');
      expect(mockLogger.info).toHaveBeenCalledWith('No backups found for default/vm-a');
    });

    it('should prune superseded backups after creating a new one', async () => {
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-b' }]);
      mockClusterClient.listBackups.mockResolvedValue(vmBBackups);

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.listBackups).toHaveBeenCalledWith('default', 'vm-b');
      expect(mockClusterClient.deleteBackup).toHaveBeenCalledTimes(1);
      expect(mockClusterClient.deleteBackup).toHaveBeenCalledWith('default', 'vm-b-old-1');
      expect(mockLogger.logRetentionCleanup).toHaveBeenCalledWith('default', 'vm-b', 1, 3);
      expect(summary).toMatchObject({
        virtualMachines: 1,
        noMatchingVirtualMachines: false,
        backupsCreated: 1,
        backupsEvaluated: 3,
        backupsMarkedForDeletion: 1,
        backupsDeleted: 1,
        failures: { creation: 0, listing: 0, deletion: 0 },
        dryRun: false,
      });
      expect(summary.results[0]).toMatchObject({
        state: 'done',
        backupName: 'vm-b-20240616-120000',
        markedForDeletion: ['default/vm-b-old-1'],
        deletedKeys: ['default/vm-b-old-1'],
        errors: [],
      });
    });

    it('should continue with the next virtual machine when backup creation fails', async () => {
      mockClusterClient.listVirtualMachines.mockResolvedValue([
        { namespace: 'default', name: 'vm-a' },
        { namespace: 'default', name: 'vm-b' },
      ]);
      mockClusterClient.createBackup.mockRejectedValueOnce(new Error('admission webhook denied'));
      mockClusterClient.listBackups.mockResolvedValue(vmBBackups);

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.listBackups).toHaveBeenCalledTimes(1);
      expect(mockClusterClient.listBackups).toHaveBeenCalledWith('default', 'vm-b');
      expect(summary.failures).toEqual({ creation: 1, listing: 0, deletion: 0 });
      expect(summary.backupsCreated).toBe(1);
      expect(summary.backupsDeleted).toBe(1);
      expect(summary.results[0]).toMatchObject({
        name: 'vm-a',
        state: 'backup_failed',
        errors: [
          'Failed to create backup vm-a-20240616-120000 for default/vm-a: Error: admission webhook denied',
        ],
      });
      expect(mockLogger.logBackupError).toHaveBeenCalledWith('create', expect.any(Error), {
        namespace: 'default',
        vmName: 'vm-a',
      });
    });

    it('should skip retention for a virtual machine whose backups cannot be listed', async () => {
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-b' }]);
      mockClusterClient.listBackups.mockRejectedValue(new Error('etcd unavailable'));

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.deleteBackup).not.toHaveBeenCalled();
      expect(summary.backupsCreated).toBe(1);
      expect(summary.failures).toEqual({ creation: 0, listing: 1, deletion: 0 });
      expect(summary.results[0]).toMatchObject({
        state: 'listing_failed',
        errors: ['Failed to list backups for default/vm-b: Error: etcd unavailable'],
      });
    });

    it('should keep deleting after a single deletion fails', async () => {
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-b' }]);
      mockClusterClient.listBackups.mockResolvedValue([
        ...vmBBackups,
        backup('vm-b-old-3', '2024-05-27T02:00:00Z', 'vm-b'),
      ]);
      mockClusterClient.deleteBackup.mockRejectedValueOnce(new Error('boom'));

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.deleteBackup).toHaveBeenNthCalledWith(1, 'default', 'vm-b-old-1');
      expect(mockClusterClient.deleteBackup).toHaveBeenNthCalledWith(2, 'default', 'vm-b-old-3');
      expect(summary.backupsMarkedForDeletion).toBe(2);
      expect(summary.backupsDeleted).toBe(1);
      expect(summary.failures.deletion).toBe(1);
      expect(summary.results[0]).toMatchObject({
        state: 'done',
        deletedKeys: ['default/vm-b-old-3'],
        errors: ['Failed to delete backup default/vm-b-old-1: Error: boom'],
      });
    });

    it('should make no changes in dry run mode', async () => {
      backupManager = createManager({ dryRun: true });
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-b' }]);
      mockClusterClient.listBackups.mockResolvedValue(vmBBackups);

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.createBackup).not.toHaveBeenCalled();
      expect(mockClusterClient.deleteBackup).not.toHaveBeenCalled();
      expect(mockLogger.logBackupCreated).toHaveBeenCalledWith('default', 'vm-b', 'vm-b-20240616-120000', true);
      expect(mockLogger.info).toHaveBeenCalledWith('Dry run: would delete backup default/vm-b-old-1', {
        createdAt: '2024-05-28T02:00:00.000Z',
      });
      expect(summary).toMatchObject({
        backupsCreated: 0,
        backupsEvaluated: 3,
        backupsMarkedForDeletion: 1,
        backupsDeleted: 0,
        dryRun: true,
      });
    });

    it('should log every retention decision when verbose', async () => {
      backupManager = createManager({ verbose: true });
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-b' }]);
      mockClusterClient.listBackups.mockResolvedValue(vmBBackups);

      await backupManager.executeRun();

      expect(mockLogger.logRetentionDecision).toHaveBeenCalledTimes(3);
      expect(mockLogger.logRetentionDecision).toHaveBeenCalledWith({
        record: vmBBackups[1],
        action: 'delete',
        tier: 'weekly',
        bucket: 22,
        reason: 'superseded in week 22 by vm-b-old-2',
      });
    });

    it('should not log retention decisions by default', async () => {
      mockClusterClient.listVirtualMachines.mockResolvedValue([{ namespace: 'default', name: 'vm-b' }]);
      mockClusterClient.listBackups.mockResolvedValue(vmBBackups);

      await backupManager.executeRun();

      expect(mockLogger.logRetentionDecision).not.toHaveBeenCalled();
    });

    it('should report a run with no matching virtual machines', async () => {
      backupManager = createManager({ namespace: 'vms' });
      mockClusterClient.listVirtualMachines.mockResolvedValue([]);

      const summary = await backupManager.executeRun();

      expect(mockClusterClient.listVirtualMachines).toHaveBeenCalledWith('backup', 'vms');
      expect(mockClusterClient.createBackup).not.toHaveBeenCalled();
      expect(mockLogger.info).toHaveBeenCalledWith('No matching virtual machines found', {
        label: 'backup=true',
        namespace: 'vms',
      });
      expect(summary.noMatchingVirtualMachines).toBe(true);
      expect(summary.virtualMachines).toBe(0);
      expect(mockLogger.logRunSummary).toHaveBeenCalledWith(summary);
    });

    it('should abort with a discovery error when virtual machines cannot be listed', async () => {
      mockClusterClient.listVirtualMachines.mockRejectedValue(new Error('connection refused'));

      const run = backupManager.executeRun();

      await expect(run).rejects.toThrow(DiscoveryError);
      await expect(run).rejects.toThrow(
        'Failed to list virtual machines with label backup=true: Error: connection refused'
      );
      expect(mockClusterClient.createBackup).not.toHaveBeenCalled();
      expect(mockLogger.logRunSummary).not.toHaveBeenCalled();
    });

    it('should reject misordered retention offsets before touching the cluster', async () => {
      backupManager = createManager({
        retention: { ...DEFAULT_RETENTION, weekly: { amount: 3, unit: 'months' } },
      });

      await expect(backupManager.executeRun()).rejects.toThrow(ConfigurationError);
      expect(mockClusterClient.listVirtualMachines).not.toHaveBeenCalled();
    });
  });

  describe('validateConfiguration', () => {
    it('should pass when the identity may list virtual machines', async () => {
      mockClusterClient.testConnection.mockResolvedValue(true);

      const result = await backupManager.validateConfiguration();

      expect(result).toBe(true);
      expect(mockClusterClient.testConnection).toHaveBeenCalledWith(undefined);
      expect(mockLogger.info).toHaveBeenCalledWith('Cluster access check passed');
    });

    it('should fail when the identity may not list virtual machines', async () => {
      mockClusterClient.testConnection.mockResolvedValue(false);

      const result = await backupManager.validateConfiguration();

      expect(result).toBe(false);
      expect(mockLogger.warn).toHaveBeenCalledWith('Current identity is not allowed to list virtual machines', {
        namespace: 'all namespaces',
      });
    });

    it('should fail when the access check throws', async () => {
      const error = new Error('kubectl missing');
      mockClusterClient.testConnection.mockRejectedValue(error);

      const result = await backupManager.validateConfiguration();

      expect(result).toBe(false);
      expect(mockLogger.error).toHaveBeenCalledWith('Cluster access check failed', error);
    });
  });
});
