/**
 * HarborGate ContainerGateway
 * Policy-checked access to sibling containers
 *
 * Every method consults the SecurityPolicy before the runtime is touched.
 * A refusal is a thrown PermissionDeniedError, never an empty result.
 */

import { ExecResult, FileAccessResult } from '../types';
import { AuditEvent, AuditSink } from '../storage/AuditLog';
import { SecurityPolicy } from './SecurityPolicy';
import { splitWhitespace } from './CommandParser';
import {
  ExecutionFailureError,
  HarborGateError,
  ParseError,
  PermissionDeniedError,
  errorMessage,
} from './errors';
import { logger } from './Logger';

export interface ContainerSummary {
  id: string;
  name: string;
  image: string;
  state: string;
  status: string;
  created: number;
  labels: Record<string, string>;
  ports: string[];
}

export interface ContainerStats {
  name: string;
  cpuPercent: number;
  memoryUsageBytes: number;
  memoryLimitBytes: number;
  memoryPercent: number;
  networkRxBytes: number;
  networkTxBytes: number;
  pids: number;
}

export interface LogOptions {
  tail?: number;
  since?: string;
}

/**
 * What the gateway needs from a container engine. Implementations throw
 * NotFoundError for unknown containers, TimeoutError for an exec past its
 * deadline and ExecutionFailureError for anything else.
 */
export interface ContainerRuntime {
  listContainers(): Promise<ContainerSummary[]>;
  logs(name: string, options: LogOptions): Promise<string>;
  stats(name: string): Promise<ContainerStats>;
  inspect(name: string): Promise<unknown>;
  exec(name: string, argv: string[], options: { timeoutMs: number }): Promise<ExecResult>;
  start(name: string): Promise<void>;
  stop(name: string): Promise<void>;
  restart(name: string): Promise<void>;
}

export interface ExecOptions {
  dangerously?: boolean;
  timeoutMs?: number;
}

export interface ContainerGatewayOptions {
  execTimeoutMs?: number;
  audit?: AuditSink;
}

const DEFAULT_TAIL = 100;
const DEFAULT_EXEC_TIMEOUT_MS = 60_000;

export class ContainerGateway {
  private readonly execTimeoutMs: number;
  private readonly auditSink?: AuditSink;

  constructor(
    private readonly policy: SecurityPolicy,
    private readonly runtime: ContainerRuntime,
    options: ContainerGatewayOptions = {}
  ) {
    this.execTimeoutMs = options.execTimeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS;
    this.auditSink = options.audit;
  }

  // ---------------------------------------------------------------------------
  // Read-only operations
  // ---------------------------------------------------------------------------

  /** Containers the policy lets the assistant see. */
  async listContainers(): Promise<ContainerSummary[]> {
    if (!this.policy.canInspect()) {
      await this.refuse('list', '*', new PermissionDeniedError('inspect is disabled in security policy'));
    }
    const all = await this.call('list', '*', () => this.runtime.listContainers());
    return all.filter((container) => this.policy.canAccessContainer(container.name));
  }

  async getLogs(name: string, options: LogOptions = {}): Promise<string> {
    await this.requireAccess('logs', name);
    if (!this.policy.canGetLogs()) {
      await this.refuse('logs', name, new PermissionDeniedError('logs are disabled in security policy'));
    }

    const logs = await this.call('logs', name, () =>
      this.runtime.logs(name, { tail: options.tail ?? DEFAULT_TAIL, since: options.since })
    );
    await this.audit({ operation: 'logs', target: name, decision: 'ALLOWED' });
    return this.policy.maskOutput(logs, 'logs');
  }

  async getStats(name: string): Promise<ContainerStats> {
    await this.requireAccess('stats', name);
    if (!this.policy.canGetStats()) {
      await this.refuse('stats', name, new PermissionDeniedError('stats are disabled in security policy'));
    }

    const stats = await this.call('stats', name, () => this.runtime.stats(name));
    await this.audit({ operation: 'stats', target: name, decision: 'ALLOWED' });
    return stats;
  }

  /** Inspect data as pretty JSON, with secrets and host home paths masked. */
  async inspectContainer(name: string): Promise<string> {
    await this.requireAccess('inspect', name);
    if (!this.policy.canInspect()) {
      await this.refuse('inspect', name, new PermissionDeniedError('inspect is disabled in security policy'));
    }

    const data = await this.call('inspect', name, () => this.runtime.inspect(name));
    await this.audit({ operation: 'inspect', target: name, decision: 'ALLOWED' });
    const rendered = JSON.stringify(data, null, 2);
    return this.policy.maskHostPaths(this.policy.maskOutput(rendered, 'inspect'));
  }

  // ---------------------------------------------------------------------------
  // Exec
  // ---------------------------------------------------------------------------

  /**
   * Run a command in a container. The command is split on whitespace only;
   * quotes are passed through untouched.
   */
  async exec(name: string, command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const operation = options.dangerously ? 'exec-dangerously' : 'exec';
    const auth = options.dangerously
      ? this.policy.canExecDangerously(name, command)
      : this.policy.canExec(name, command);

    if (!auth.allowed) {
      await this.refuse(operation, name, auth.error, command);
    }

    const argv = splitWhitespace(command);
    if (argv.length === 0) {
      throw new ParseError('empty command');
    }

    const started = Date.now();
    const result = await this.call(
      operation,
      name,
      () => this.runtime.exec(name, argv, { timeoutMs: options.timeoutMs ?? this.execTimeoutMs }),
      command
    );

    await this.audit({
      operation,
      target: name,
      detail: command,
      decision: 'ALLOWED',
      durationMs: Date.now() - started,
    });
    logger.info('Container exec finished', { container: name, command, exitCode: result.exitCode });

    return { exitCode: result.exitCode, output: this.policy.maskOutput(result.output, 'exec') };
  }

  // ---------------------------------------------------------------------------
  // Internal file access
  // ---------------------------------------------------------------------------

  /** `ls -la` inside the container. Not subject to the exec whitelist. */
  async listFiles(name: string, path: string): Promise<FileAccessResult> {
    return this.internalRead('list-files', name, path, ['ls', '-la', '--', path]);
  }

  /**
   * `cat`, or `head -n maxLines` when a positive limit is given. `--` keeps a
   * path starting with `-` from being read as an option.
   */
  async readFile(name: string, path: string, maxLines?: number): Promise<FileAccessResult> {
    const argv =
      maxLines !== undefined && maxLines > 0
        ? ['head', '-n', String(maxLines), '--', path]
        : ['cat', '--', path];
    return this.internalRead('read-file', name, path, argv);
  }

  private async internalRead(
    operation: string,
    name: string,
    path: string,
    argv: string[]
  ): Promise<FileAccessResult> {
    await this.requireAccess(operation, name);

    const rule = this.policy.isPathBlocked(name, path);
    if (rule) {
      logger.warn('Blocked path access refused', { container: name, path, reason: rule.reason });
      await this.audit({ operation, target: name, detail: path, decision: 'DENIED', reason: rule.reason });
      return { status: 'blocked', rule };
    }

    try {
      const result = await this.runtime.exec(name, argv, { timeoutMs: this.execTimeoutMs });
      if (result.exitCode !== 0) {
        const output = this.policy.maskHostPaths(this.policy.maskOutput(result.output, 'exec')).trim();
        const message = output || `exit code ${result.exitCode}`;
        await this.audit({ operation, target: name, detail: path, decision: 'FAILED', reason: message });
        return { status: 'error', message };
      }
      await this.audit({ operation, target: name, detail: path, decision: 'ALLOWED' });
      return { status: 'ok', data: this.policy.maskOutput(result.output, 'exec') };
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Internal file access failed', { container: name, path, error: message });
      await this.audit({ operation, target: name, detail: path, decision: 'FAILED', reason: message });
      return { status: 'error', message };
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async startContainer(name: string): Promise<void> {
    await this.lifecycle('start', name, () => this.runtime.start(name));
  }

  async stopContainer(name: string): Promise<void> {
    await this.lifecycle('stop', name, () => this.runtime.stop(name));
  }

  async restartContainer(name: string): Promise<void> {
    await this.lifecycle('restart', name, () => this.runtime.restart(name));
  }

  private async lifecycle(operation: string, name: string, action: () => Promise<void>): Promise<void> {
    const auth = this.policy.canLifecycle(name);
    if (!auth.allowed) {
      await this.refuse(operation, name, auth.error);
    }
    await this.call(operation, name, action);
    await this.audit({ operation, target: name, decision: 'ALLOWED' });
    logger.info(`Container ${operation} completed`, { container: name });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async requireAccess(operation: string, name: string): Promise<void> {
    if (!this.policy.canAccessContainer(name)) {
      await this.refuse(
        operation,
        name,
        new PermissionDeniedError(`container not in allowed list: ${name}`, { rule: name })
      );
    }
  }

  private async refuse(
    operation: string,
    target: string,
    error: PermissionDeniedError,
    detail?: string
  ): Promise<never> {
    logger.warn('Container operation denied', { operation, target, reason: error.message });
    await this.audit({ operation, target, detail, decision: 'DENIED', reason: error.message });
    throw error;
  }

  /** Run a runtime call, normalising anything untyped into ExecutionFailureError. */
  private async call<T>(operation: string, target: string, fn: () => Promise<T>, detail?: string): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      await this.audit({ operation, target, detail, decision: 'FAILED', reason: errorMessage(error) });
      if (error instanceof HarborGateError) {
        throw error;
      }
      throw new ExecutionFailureError(`${operation} failed for ${target}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async audit(event: Omit<AuditEvent, 'surface'>): Promise<void> {
    if (!this.auditSink) {
      return;
    }
    try {
      await this.auditSink.record({ surface: 'container', ...event });
    } catch (error) {
      logger.error('Audit sink failed', { error: errorMessage(error) });
    }
  }
}
