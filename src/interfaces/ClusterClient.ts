import { BackupRecord, VirtualMachineRef } from '../types/BackupRecord';

/**
 * Operations the backup run needs from the cluster
 */
export interface ClusterClient {
  /** Check that the current identity may list virtual machines */
  testConnection(namespace?: string): Promise<boolean>;

  /** List virtual machines labelled `<label>=true`, optionally in one namespace */
  listVirtualMachines(label: string, namespace?: string): Promise<VirtualMachineRef[]>;

  /** Create a VirtualMachineBackup; fails if the name is taken */
  createBackup(namespace: string, vmName: string, backupName: string): Promise<void>;

  /** List all backups taken from the given VM */
  listBackups(namespace: string, vmName: string): Promise<BackupRecord[]>;

  /** Delete a backup; deleting a missing backup succeeds */
  deleteBackup(namespace: string, name: string): Promise<void>;
}
