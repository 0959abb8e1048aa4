/**
 * A single VirtualMachineBackup as seen by the retention logic
 */
export interface BackupRecord {
  /** Namespace of the backup resource */
  readonly namespace: string;

  /** Name of the backup resource, unique within its namespace */
  readonly name: string;

  /** Name of the virtual machine the backup was taken from */
  readonly vmName: string;

  /** Creation time (UTC, second precision) */
  readonly createdAt: Date;
}

/**
 * A virtual machine selected for backup
 */
export interface VirtualMachineRef {
  readonly namespace: string;
  readonly name: string;
}

export function createBackupRecord(fields: BackupRecord): BackupRecord {
  return Object.freeze({
    namespace: fields.namespace,
    name: fields.name,
    vmName: fields.vmName,
    createdAt: new Date(fields.createdAt.getTime()),
  });
}

/**
 * Identity of a backup across namespaces
 */
export function backupKey(record: Pick<BackupRecord, 'namespace' | 'name'>): string {
  return `${record.namespace}/${record.name}`;
}
