import { spawn } from 'child_process';
import { z } from 'zod';
import { ClusterClient } from '../interfaces/ClusterClient';
import { Logger } from '../interfaces/Logger';
import { BackupRecord, VirtualMachineRef, createBackupRecord } from '../types/BackupRecord';

export const VIRTUAL_MACHINE_RESOURCE = 'virtualmachines.kubevirt.io';
export const BACKUP_RESOURCE = 'virtualmachinebackups.harvesterhci.io';

/**
 * Custom error classes for kubectl operations
 */
export class KubectlError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'KubectlError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class KubectlCommandError extends KubectlError {
  constructor(
    message: string,
    operation: string,
    public readonly exitCode?: number,
    public readonly stderr: string = '',
    public readonly retryable: boolean = true,
    cause?: Error
  ) {
    super(message, operation, cause);
    this.name = 'KubectlCommandError';
  }
}

export class KubectlOutputError extends KubectlError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'KubectlOutputError';
  }
}

export interface KubectlClientOptions {
  kubectlPath: string;
  context?: string;
  timeoutSeconds: number;
  /** Attempts for read-only commands; mutating commands run once */
  maxAttempts: number;
  /** Base delay of the exponential backoff between attempts */
  retryDelayMs?: number;
}

const metadataSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
  creationTimestamp: z.string().optional(),
});

const virtualMachineListSchema = z.object({
  items: z.array(z.object({ metadata: metadataSchema.extend({ namespace: z.string() }) })),
});

const backupListSchema = z.object({
  items: z.array(
    z.object({
      metadata: metadataSchema,
      spec: z
        .object({
          source: z.object({ name: z.string() }).optional(),
        })
        .optional(),
    })
  ),
});

interface KubectlFailure {
  message: string;
  retryable: boolean;
}

/**
 * Cluster client that drives Harvester and KubeVirt resources through kubectl.
 * Credentials come from the environment (KUBECONFIG or the in-cluster service account).
 */
export class KubectlClient implements ClusterClient {
  private options: KubectlClientOptions;
  private logger: Logger;

  constructor(options: KubectlClientOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
  }

  async testConnection(namespace?: string): Promise<boolean> {
    try {
      const output = await this.withRetry(
        () =>
          this.execute(
            ['auth', 'can-i', 'list', VIRTUAL_MACHINE_RESOURCE, ...this.scopeArgs(namespace)],
            'access check'
          ),
        'access check'
      );
      return output.trim() === 'yes';
    } catch (error) {
      this.logger.warn('Cluster access check failed', {
        namespace: namespace ?? 'all namespaces',
        error: this.formatError(error),
      });
      return false;
    }
  }

  async listVirtualMachines(label: string, namespace?: string): Promise<VirtualMachineRef[]> {
    const operation = 'list virtual machines';
    const output = await this.withRetry(
      () =>
        this.execute(
          ['get', VIRTUAL_MACHINE_RESOURCE, '-l', `${label}=true`, '-o', 'json', ...this.scopeArgs(namespace)],
          operation
        ),
      operation
    );

    const list = this.parseOutput(output, virtualMachineListSchema, operation);

    return list.items.map(item => ({
      namespace: item.metadata.namespace,
      name: item.metadata.name,
    }));
  }

  async createBackup(namespace: string, vmName: string, backupName: string): Promise<void> {
    const manifest = this.buildBackupManifest(namespace, vmName, backupName);

    await this.execute(['create', '-f', '-', '-o', 'name'], 'create backup', JSON.stringify(manifest));
  }

  async listBackups(namespace: string, vmName: string): Promise<BackupRecord[]> {
    const operation = 'list backups';
    const output = await this.withRetry(
      () => this.execute(['get', BACKUP_RESOURCE, '-n', namespace, '-o', 'json'], operation),
      operation
    );

    const list = this.parseOutput(output, backupListSchema, operation);
    const records: BackupRecord[] = [];

    for (const item of list.items) {
      if (item.spec?.source?.name !== vmName) {
        continue;
      }

      const createdAt = item.metadata.creationTimestamp
        ? new Date(item.metadata.creationTimestamp)
        : null;

      if (!createdAt || isNaN(createdAt.getTime())) {
        this.logger.warn(`Skipping backup without a valid creation timestamp: ${item.metadata.name}`, {
          namespace,
          vmName,
          creationTimestamp: item.metadata.creationTimestamp,
        });
        continue;
      }

      records.push(
        createBackupRecord({
          namespace: item.metadata.namespace ?? namespace,
          name: item.metadata.name,
          vmName,
          createdAt,
        })
      );
    }

    return records;
  }

  async deleteBackup(namespace: string, name: string): Promise<void> {
    await this.execute(
      ['delete', BACKUP_RESOURCE, name, '-n', namespace, '--ignore-not-found'],
      'delete backup'
    );
  }

  buildBackupManifest(namespace: string, vmName: string, backupName: string): Record<string, unknown> {
    return {
      apiVersion: 'harvesterhci.io/v1beta1',
      kind: 'VirtualMachineBackup',
      metadata: {
        name: backupName,
        namespace,
      },
      spec: {
        type: 'backup',
        source: {
          apiGroup: 'kubevirt.io',
          kind: 'VirtualMachine',
          name: vmName,
        },
      },
    };
  }

  private scopeArgs(namespace?: string): string[] {
    return namespace ? ['-n', namespace] : ['--all-namespaces'];
  }

  private parseOutput<T>(output: string, schema: z.ZodType<T>, operation: string): T {
    let json: unknown;
    try {
      json = JSON.parse(output);
    } catch (error) {
      throw new KubectlOutputError(
        `kubectl returned invalid JSON for ${operation}: ${this.formatError(error)}`,
        operation,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new KubectlOutputError(
        `kubectl returned unexpected output for ${operation}: ${parsed.error.message}`,
        operation,
        parsed.error
      );
    }

    return parsed.data;
  }

  /**
   * Run kubectl and resolve with its stdout
   */
  private execute(args: string[], operation: string, input?: string): Promise<string> {
    const fullArgs = this.options.context ? ['--context', this.options.context, ...args] : args;

    return new Promise((resolve, reject) => {
      this.logger.debug(`Executing ${this.options.kubectlPath} ${fullArgs.join(' ')}`, { operation });

      const kubectl = spawn(this.options.kubectlPath, fullArgs, {
        env: { ...process.env },
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timeout = setTimeout(() => {
        settled = true;
        this.logger.warn(`kubectl ${operation} timed out, terminating process...`);
        kubectl.kill('SIGTERM');
        reject(
          new KubectlCommandError(
            `kubectl ${operation} timed out after ${this.options.timeoutSeconds}s`,
            operation
          )
        );
      }, this.options.timeoutSeconds * 1000);

      kubectl.stdout.on('data', data => {
        stdout += data.toString();
      });

      kubectl.stderr.on('data', data => {
        stderr += data.toString();
      });

      kubectl.on('close', code => {
        clearTimeout(timeout);
        if (settled) {
          return;
        }
        settled = true;

        if (code === 0) {
          resolve(stdout);
        } else {
          const exitCode = code ?? -1;
          const failure = this.analyzeKubectlError(operation, exitCode, stderr, stdout);
          reject(new KubectlCommandError(failure.message, operation, exitCode, stderr, failure.retryable));
        }
      });

      kubectl.on('error', error => {
        clearTimeout(timeout);
        if (settled) {
          return;
        }
        settled = true;

        const failure = this.analyzeSpawnError(error);
        reject(new KubectlCommandError(failure.message, operation, undefined, '', failure.retryable, error));
      });

      // kubectl may exit before reading its input; the close handler reports that exit
      kubectl.stdin.on('error', error => {
        if (settled || ('code' in error && error.code === 'EPIPE')) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        reject(
          new KubectlCommandError(
            `Failed to write input to kubectl ${operation}: ${error.message}`,
            operation,
            undefined,
            '',
            true,
            error
          )
        );
      });

      if (input !== undefined) {
        kubectl.stdin.write(input);
      }
      kubectl.stdin.end();
    });
  }

  /**
   * Map common kubectl failures to readable messages
   */
  private analyzeKubectlError(
    operation: string,
    exitCode: number,
    stderr: string,
    stdout: string
  ): KubectlFailure {
    const lowerStderr = stderr.toLowerCase();

    if (lowerStderr.includes('forbidden')) {
      return {
        message: `kubectl ${operation} forbidden (exit code ${exitCode}). Check the service account's RBAC permissions.`,
        retryable: false,
      };
    }

    if (lowerStderr.includes('unauthorized') || lowerStderr.includes('must be logged in')) {
      return {
        message: `kubectl ${operation} unauthorized (exit code ${exitCode}). Check cluster credentials.`,
        retryable: false,
      };
    }

    if (lowerStderr.includes('alreadyexists') || lowerStderr.includes('already exists')) {
      return {
        message: `kubectl ${operation} failed: resource already exists (exit code ${exitCode}).`,
        retryable: false,
      };
    }

    if (lowerStderr.includes("doesn't have a resource type") || lowerStderr.includes('no matches for kind')) {
      return {
        message: `kubectl ${operation} failed: resource type not available in the cluster (exit code ${exitCode}). Is Harvester installed?`,
        retryable: false,
      };
    }

    if (
      lowerStderr.includes('connection refused') ||
      lowerStderr.includes('unable to connect') ||
      lowerStderr.includes('i/o timeout')
    ) {
      return {
        message: `kubectl ${operation} failed: unable to reach the cluster API (exit code ${exitCode}).`,
        retryable: true,
      };
    }

    const errorContext = stderr.trim() || stdout.trim() || 'No additional error information available';
    return {
      message: `kubectl ${operation} failed with exit code ${exitCode}. Error details: ${errorContext}`,
      retryable: true,
    };
  }

  private analyzeSpawnError(error: Error): KubectlFailure {
    const errorMessage = error.message.toLowerCase();

    if (errorMessage.includes('enoent')) {
      return {
        message: `kubectl not found at ${this.options.kubectlPath}. Please ensure kubectl is installed.`,
        retryable: false,
      };
    }

    if (errorMessage.includes('eacces')) {
      return {
        message: `Permission denied executing ${this.options.kubectlPath}.`,
        retryable: false,
      };
    }

    return { message: `Failed to execute kubectl: ${error.message}`, retryable: true };
  }

  /**
   * Execute a read-only operation with retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    const baseDelay = this.options.retryDelayMs ?? 1000;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= maxAttempts || this.isNonRetryableError(error)) {
          throw error;
        }

        const delay = baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Attempt ${attempt} failed for ${operationName}: ${this.formatError(error)}. Retrying in ${delay}ms...`
        );

        await this.sleep(delay);
      }
    }
  }

  private isNonRetryableError(error: unknown): boolean {
    if (error instanceof KubectlCommandError) {
      return !error.retryable;
    }
    return error instanceof KubectlOutputError;
  }

  private formatError(error: unknown): string {
    if (error instanceof Error) {
      return `${error.name}: ${error.message}`;
    }
    return String(error);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
