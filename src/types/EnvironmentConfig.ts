export interface EnvironmentConfig {
  // Required
  BACKUP_LABEL: string;

  // Optional
  BACKUP_NAMESPACE?: string;
  VERBOSE?: string;
  DRY_RUN?: string;
  WEEKLY_RETENTION?: string;
  MONTHLY_RETENTION?: string;
  DELETE_RETENTION?: string;
  LOG_LEVEL?: string;
  KUBECTL_PATH?: string;
  KUBECTL_CONTEXT?: string;
  KUBECTL_TIMEOUT_SECONDS?: string;
  KUBECTL_MAX_ATTEMPTS?: string;
}
