/**
 * Lifecycle states of a single virtual machine within a run
 */
export type VirtualMachineState =
  | 'discovering'
  | 'creating_backup'
  | 'backup_failed'
  | 'listing_backups'
  | 'listing_failed'
  | 'no_backups'
  | 'classifying'
  | 'reducing'
  | 'deleting'
  | 'done';

/**
 * Outcome of processing one virtual machine
 */
export interface VirtualMachineResult {
  namespace: string;
  name: string;

  /** Terminal state reached */
  state: VirtualMachineState;

  /** Name of the backup created (or planned, in dry-run) */
  backupName?: string;

  /** Number of existing backups run through retention */
  evaluatedCount: number;

  /** Keys (`namespace/name`) of backups marked for deletion */
  markedForDeletion: string[];

  /** Keys of backups actually deleted */
  deletedKeys: string[];

  /** Error messages collected for this VM */
  errors: string[];
}

export interface FailureCounts {
  creation: number;
  listing: number;
  deletion: number;
}

/**
 * Aggregate report of a backup run
 */
export interface RunSummary {
  /** Number of virtual machines matched by the label */
  virtualMachines: number;

  /** True when the label matched nothing */
  noMatchingVirtualMachines: boolean;

  backupsCreated: number;
  backupsEvaluated: number;
  backupsMarkedForDeletion: number;
  backupsDeleted: number;
  failures: FailureCounts;

  /** Whether mutating calls were suppressed */
  dryRun: boolean;

  /** Duration of the run in milliseconds */
  duration: number;

  results: VirtualMachineResult[];
}

/**
 * Interface for the backup run orchestrator
 */
export interface BackupManager {
  /** Back up every labelled VM and prune its history */
  executeRun(): Promise<RunSummary>;

  /** Check that the cluster is reachable with sufficient permissions */
  validateConfiguration(): Promise<boolean>;
}
