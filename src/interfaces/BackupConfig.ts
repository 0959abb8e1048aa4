import { RetentionOffsets } from './RetentionManager';

export interface BackupConfig {
  label: string; // label key, selects VMs where <label>=true
  namespace?: string; // all namespaces when unset
  verbose: boolean;
  dryRun: boolean;
  retention: RetentionOffsets;
  kubectlPath: string;
  kubectlContext?: string;
  kubectlTimeoutSeconds: number;
  kubectlMaxAttempts: number;
  logLevel?: string;
}
