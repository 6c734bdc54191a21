/**
 * HarborGate HostToolRegistry
 * Discovery and execution of host tool scripts
 *
 * - disabled: every call is refused
 * - legacy:   tools are read straight from `directories`
 * - secure:   staging dirs (dev mode only), then the project's approved dir,
 *             then the shared `_common` dir
 */

import fs from 'fs-extra';
import path from 'path';
import { HostToolsConfig, ProcessResult, ToolInfo } from '../types';
import { AuditEvent, AuditSink } from '../storage/AuditLog';
import { NotFoundError, PermissionDeniedError, errorMessage } from '../core/errors';
import { logger } from '../core/Logger';
import { runProcess } from '../core/ProcessRunner';
import { SecurityPolicy } from '../core/SecurityPolicy';
import { parseToolFile } from './ToolParser';
import {
  commonApprovedDir,
  projectApprovedDir,
  resolveWorkspaceDir,
  stagingDirectories,
  validateName,
} from './ToolStore';

export type RegistryState = 'disabled' | 'legacy' | 'secure';

const INTERPRETERS: Record<string, { command: string; prefixArgs: string[] }> = {
  '.sh': { command: 'bash', prefixArgs: [] },
  '.py': { command: 'python3', prefixArgs: [] },
  '.go': { command: 'go', prefixArgs: ['run'] },
};

export interface HostToolRegistryOptions {
  workspaceRoot: string;
  /** Serve tools straight from the staging directories as well. */
  devMode?: boolean;
  /** When given, tool output is masked like exec output. */
  policy?: SecurityPolicy;
  audit?: AuditSink;
}

/**
 * Tools in one directory: regular, non-hidden, non-`_` files with an allowed
 * extension whose header parses. A missing or unreadable directory yields
 * nothing.
 */
export async function listToolsInDir(dir: string, allowedExtensions: readonly string[]): Promise<ToolInfo[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.debug('Skipping tool directory', { dir, error: errorMessage(error) });
    return [];
  }

  const tools: ToolInfo[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const name = entry.name;
    if (!entry.isFile() || name.startsWith('.') || name.startsWith('_')) {
      continue;
    }
    if (!allowedExtensions.includes(path.extname(name))) {
      continue;
    }
    try {
      tools.push(await parseToolFile(path.join(dir, name)));
    } catch (error) {
      logger.warn('Skipping tool with unreadable header', { file: path.join(dir, name), error: errorMessage(error) });
    }
  }
  return tools;
}

export class HostToolRegistry {
  private readonly workspaceRoot: string;
  private readonly devMode: boolean;
  private readonly policy?: SecurityPolicy;
  private readonly auditSink?: AuditSink;

  constructor(private readonly config: HostToolsConfig, options: HostToolRegistryOptions) {
    this.workspaceRoot = options.workspaceRoot;
    this.devMode = options.devMode ?? false;
    this.policy = options.policy;
    this.auditSink = options.audit;
  }

  get state(): RegistryState {
    if (!this.config.enabled) {
      return 'disabled';
    }
    return this.config.approvedDir ? 'secure' : 'legacy';
  }

  /** Directories searched for tools, highest priority first. */
  toolDirectories(): string[] {
    if (this.state === 'legacy') {
      return this.config.directories.map((dir) => resolveWorkspaceDir(this.workspaceRoot, dir));
    }

    const dirs: string[] = [];
    if (this.devMode) {
      dirs.push(...stagingDirectories(this.config, this.workspaceRoot));
    }
    dirs.push(projectApprovedDir(this.config.approvedDir, this.workspaceRoot));
    if (this.config.common) {
      dirs.push(commonApprovedDir(this.config.approvedDir));
    }
    return dirs;
  }

  /** Every visible tool, deduplicated by name; the first directory wins. */
  async listTools(): Promise<ToolInfo[]> {
    this.requireEnabled();

    const seen = new Set<string>();
    const tools: ToolInfo[] = [];
    for (const dir of this.toolDirectories()) {
      for (const tool of await listToolsInDir(dir, this.config.allowedExtensions)) {
        if (!seen.has(tool.name)) {
          seen.add(tool.name);
          tools.push(tool);
        }
      }
    }
    return tools;
  }

  async getToolInfo(name: string): Promise<ToolInfo> {
    return (await this.locate(name)).info;
  }

  /**
   * Run a tool through its interpreter with the workspace root as cwd.
   * A non-zero exit is a normal result.
   */
  async runTool(name: string, args: readonly string[] = [], options: { timeoutMs?: number } = {}): Promise<ProcessResult> {
    let toolPath: string;
    try {
      toolPath = (await this.locate(name)).path;
    } catch (error) {
      await this.audit({ operation: 'run', target: name, decision: 'DENIED', reason: errorMessage(error) });
      throw error;
    }

    const interpreter = INTERPRETERS[path.extname(name)];
    const started = Date.now();
    let result: ProcessResult;
    try {
      result = await runProcess(interpreter.command, [...interpreter.prefixArgs, toolPath, ...args], {
        cwd: this.workspaceRoot,
        timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      });
    } catch (error) {
      await this.audit({ operation: 'run', target: name, decision: 'FAILED', reason: errorMessage(error) });
      throw error;
    }

    await this.audit({
      operation: 'run',
      target: name,
      detail: args.join(' '),
      decision: 'ALLOWED',
      durationMs: Date.now() - started,
    });
    logger.info('Host tool finished', { tool: name, exitCode: result.exitCode });

    return { stdout: this.mask(result.stdout), stderr: this.mask(result.stderr), exitCode: result.exitCode };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private requireEnabled(): void {
    if (this.state === 'disabled') {
      throw new PermissionDeniedError('host tools are disabled');
    }
  }

  /**
   * The first directory's copy whose header parses, so a broken staged file
   * never shadows an approved one that `listTools` would show.
   */
  private async locate(name: string): Promise<{ path: string; info: ToolInfo }> {
    this.requireEnabled();
    validateName(name);

    const extension = path.extname(name);
    if (!this.config.allowedExtensions.includes(extension) || !INTERPRETERS[extension]) {
      throw new PermissionDeniedError(`extension not allowed: ${extension || name}`, { rule: extension });
    }

    for (const dir of this.toolDirectories()) {
      const candidate = path.join(dir, name);
      if (!(await fs.pathExists(candidate)) || !(await fs.stat(candidate)).isFile()) {
        continue;
      }
      try {
        return { path: candidate, info: await parseToolFile(candidate) };
      } catch (error) {
        logger.warn('Skipping tool with unreadable header', { file: candidate, error: errorMessage(error) });
      }
    }
    throw new NotFoundError(`tool not found: ${name}`);
  }

  private mask(text: string): string {
    if (!this.policy) {
      return text;
    }
    return this.policy.maskHostPaths(this.policy.maskOutput(text, 'exec'));
  }

  private async audit(event: Omit<AuditEvent, 'surface'>): Promise<void> {
    if (!this.auditSink) {
      return;
    }
    try {
      await this.auditSink.record({ surface: 'host-tool', ...event });
    } catch (error) {
      logger.error('Audit sink failed', { error: errorMessage(error) });
    }
  }
}
