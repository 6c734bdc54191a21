/**
 * HarborGate HostCommandExecutor
 * Whitelisted host CLI commands, run without a shell
 */

import { HostCommandsConfig, ProcessResult } from '../types';
import { AuditEvent, AuditSink } from '../storage/AuditLog';
import { extractPathArguments, findShellMetacharacter, tokenize } from './CommandParser';
import { ParseError, PermissionDeniedError, errorMessage } from './errors';
import { logger } from './Logger';
import { matchCommandPattern, matchGlob } from './PatternMatcher';
import { runProcess } from './ProcessRunner';
import { DANGEROUS_HINT, SecurityPolicy } from './SecurityPolicy';

export type HostAuthorization =
  | { allowed: true; argv: string[]; via: 'whitelist' | 'dangerous' }
  | { allowed: false; error: PermissionDeniedError };

export interface HostCommandOptions {
  dangerously?: boolean;
  /** Container whose blocked paths apply; global rules only when omitted. */
  container?: string;
  timeoutMs?: number;
}

export interface HostCommandExecutorOptions {
  workspaceRoot: string;
  audit?: AuditSink;
}

const DOCKER_COMMANDS = new Set(['docker', 'docker-compose']);
const PROJECT_FLAGS = new Set(['-p', '--project-name']);

function deny(message: string, rule?: string, hint?: string): HostAuthorization {
  return { allowed: false, error: new PermissionDeniedError(message, { rule, hint }) };
}

export class HostCommandExecutor {
  private readonly workspaceRoot: string;
  private readonly auditSink?: AuditSink;

  constructor(
    private readonly config: HostCommandsConfig,
    private readonly policy: SecurityPolicy,
    options: HostCommandExecutorOptions
  ) {
    this.workspaceRoot = options.workspaceRoot;
    this.auditSink = options.audit;
  }

  /**
   * Decide whether `command` may run. Malformed input (empty, unterminated
   * quote) throws ParseError; policy refusals are returned, not thrown.
   */
  authorize(command: string, options: HostCommandOptions = {}): HostAuthorization {
    if (!this.config.enabled) {
      return deny('host commands are disabled');
    }
    if (options.dangerously && !this.config.dangerously.enabled) {
      return deny('dangerous mode is not enabled for host commands');
    }

    const meta = findShellMetacharacter(command);
    if (meta !== undefined) {
      return deny(`shell meta-characters are not allowed: ${command}`, meta);
    }

    const argv = tokenize(command);
    if (argv.length === 0) {
      throw new ParseError('empty command');
    }

    const traversal = argv.find((token) => token.includes('..'));
    if (traversal !== undefined) {
      return deny(`path traversal detected: ${command}`, traversal);
    }

    const [base, ...rest] = argv;
    const args = rest.join(' ');

    const denied = (this.config.deny[base] ?? []).find((pattern) => matchCommandPattern(pattern, args));
    if (denied !== undefined) {
      return deny(`command denied: ${command}`, `${base} ${denied}`);
    }

    let via: 'whitelist' | 'dangerous';
    if ((this.config.whitelist[base] ?? []).some((pattern) => matchCommandPattern(pattern, args))) {
      via = 'whitelist';
    } else if (options.dangerously) {
      if (!this.isDangerousCommand(base, rest)) {
        return deny(`command not allowed in dangerous mode: ${command}`, base);
      }
      via = 'dangerous';
    } else {
      const hint =
        this.config.dangerously.enabled && this.isDangerousCommand(base, rest) ? DANGEROUS_HINT : undefined;
      return deny(`command not whitelisted: ${command}`, base, hint);
    }

    const scope = options.container ?? '*';
    for (const candidate of extractPathArguments(argv)) {
      const rule = this.policy.isPathBlocked(scope, candidate);
      if (rule) {
        return {
          allowed: false,
          error: new PermissionDeniedError(`path is blocked: ${candidate} (reason: ${rule.reason})`, { rule }),
        };
      }
    }

    if (DOCKER_COMMANDS.has(base)) {
      const restriction = this.checkDockerRestrictions(argv);
      if (restriction) {
        return restriction;
      }
    }

    return { allowed: true, argv, via };
  }

  /**
   * Authorize and run. Output is masked like container exec output.
   */
  async execute(command: string, options: HostCommandOptions = {}): Promise<ProcessResult> {
    const operation = options.dangerously ? 'exec-dangerously' : 'exec';
    const auth = this.authorize(command, options);

    if (!auth.allowed) {
      logger.warn('Host command denied', { command, reason: auth.error.message });
      await this.audit({ operation, target: command, decision: 'DENIED', reason: auth.error.message });
      throw auth.error;
    }

    const [base, ...args] = auth.argv;
    const started = Date.now();
    let result: ProcessResult;
    try {
      result = await runProcess(base, args, {
        cwd: this.workspaceRoot,
        timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      });
    } catch (error) {
      await this.audit({ operation, target: command, decision: 'FAILED', reason: errorMessage(error) });
      throw error;
    }

    await this.audit({
      operation,
      target: command,
      decision: 'ALLOWED',
      reason: auth.via,
      durationMs: Date.now() - started,
    });
    logger.info('Host command finished', { command, exitCode: result.exitCode });

    return {
      stdout: this.mask(result.stdout),
      stderr: this.mask(result.stderr),
      exitCode: result.exitCode,
    };
  }

  getWhitelist(): Record<string, string[]> {
    return structuredClone(this.config.whitelist);
  }

  getDangerousCommands(): Record<string, string[]> {
    return this.config.dangerously.enabled ? structuredClone(this.config.dangerously.commands) : {};
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Dangerous commands list permitted first arguments; `*` permits any. */
  private isDangerousCommand(base: string, args: string[]): boolean {
    const permitted = this.config.dangerously.commands[base];
    if (!permitted) {
      return false;
    }
    if (permitted.includes('*')) {
      return true;
    }
    return args.length > 0 && permitted.includes(args[0]);
  }

  private checkDockerRestrictions(argv: string[]): HostAuthorization | undefined {
    const { allowedContainers, allowedProjects } = this.config;
    if (allowedContainers.length === 0 && allowedProjects.length === 0) {
      return undefined;
    }

    const isCompose = argv[0] === 'docker-compose' || argv[1] === 'compose';
    // operands begin at the subcommand (`compose <sub>` for the plugin form)
    const subcommandIndex = argv[0] === 'docker' && argv[1] === 'compose' ? 2 : 1;

    let project: string | undefined;
    const operands: string[] = [];
    for (let i = 1; i < argv.length; i++) {
      const token = argv[i];
      if (PROJECT_FLAGS.has(token)) {
        project = argv[i + 1];
        i++;
        continue;
      }
      const inline = /^(?:-p|--project-name)=(.+)$/.exec(token);
      if (inline) {
        project = inline[1];
        continue;
      }
      if (token.startsWith('-')) {
        continue;
      }
      operands.push(token);
    }

    if (allowedProjects.length > 0) {
      const named = project;
      if (named !== undefined && !allowedProjects.some((pattern) => matchGlob(pattern, named))) {
        return deny(`project not in allowed list: ${named}`, named);
      }
      if (named === undefined && isCompose) {
        return deny(`compose commands must name an allowed project with -p (allowed: ${allowedProjects.join(', ')})`);
      }
    }

    if (allowedContainers.length > 0) {
      const targets = operands.slice(subcommandIndex);
      for (const target of targets) {
        if (!allowedContainers.some((pattern) => matchGlob(pattern, target))) {
          return deny(
            `container not in allowed list: ${target} (allowed: ${allowedContainers.join(', ')})`,
            target
          );
        }
      }
    }

    return undefined;
  }

  private mask(text: string): string {
    return this.policy.maskHostPaths(this.policy.maskOutput(text, 'exec'));
  }

  private async audit(event: Omit<AuditEvent, 'surface'>): Promise<void> {
    if (!this.auditSink) {
      return;
    }
    try {
      await this.auditSink.record({ surface: 'host-command', ...event });
    } catch (error) {
      logger.error('Audit sink failed', { error: errorMessage(error) });
    }
  }
}
