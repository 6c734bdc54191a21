/**
 * HarborGate SecurityPolicy
 * The decision engine: every container operation is checked here first
 *
 * A policy is frozen once built. Checks are pure queries, so one instance
 * can be shared by every concurrent request.
 */

import {
  BlockedPath,
  ContainerPermissions,
  MaskingRule,
  OutputTarget,
  SecurityConfig,
  SecurityMode,
} from '../types';
import { BlockedPathIndex } from './BlockedPathIndex';
import { loadBlockedPaths } from './AutoImport';
import { extractPathArguments, findShellMetacharacter, splitWhitespace, tokenize } from './CommandParser';
import { PermissionDeniedError, ParseError } from './errors';
import { logger } from './Logger';
import { applyMasking, compileMaskingRules, createHostPathMasker } from './OutputMasker';
import { matchCommandPattern, matchGlob } from './PatternMatcher';

export type Authorization = { allowed: true } | { allowed: false; error: PermissionDeniedError };

export const DANGEROUS_HINT = 'this command is available with dangerously=true';

const ALLOWED: Authorization = Object.freeze({ allowed: true });

function deny(message: string, details: { rule?: string | BlockedPath; hint?: string } = {}): Authorization {
  return { allowed: false, error: new PermissionDeniedError(message, details) };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export interface PolicySummary {
  mode: SecurityMode;
  allowedContainers: string[];
  permissions: ContainerPermissions;
  execWhitelist: Record<string, string[]>;
  dangerousMode: { enabled: boolean; commands: Record<string, string[]> };
  outputMasking: { enabled: boolean; patternCount: number };
  hostPathMasking: boolean;
  blockedPathCount: number;
}

export interface SecurityPolicyOptions {
  /** Pre-computed blocked paths; skips manual loading and auto-import. */
  blockedPaths?: readonly BlockedPath[];
}

export class SecurityPolicy {
  private readonly config: SecurityConfig;
  private readonly blocked: BlockedPathIndex;
  private readonly maskingRules: readonly MaskingRule[];
  private readonly hostPathMasker: (text: string) => string;

  constructor(config: SecurityConfig, options: SecurityPolicyOptions = {}) {
    this.config = deepFreeze(structuredClone(config));
    this.blocked = new BlockedPathIndex(
      options.blockedPaths ?? loadBlockedPaths(this.config.blockedPaths, this.config.allowedContainers)
    );
    this.maskingRules = Object.freeze(compileMaskingRules(this.config.outputMasking));
    this.hostPathMasker = createHostPathMasker(this.config.hostPathMasking);

    logger.debug('Security policy built', {
      mode: this.config.mode,
      blockedPaths: this.blocked.size,
      maskingRules: this.maskingRules.length,
    });

    Object.freeze(this);
  }

  /**
   * A copy of this policy with dangerous mode switched on. Blocked paths are
   * carried over rather than scanned again.
   */
  withDangerousMode(): SecurityPolicy {
    return new SecurityPolicy(
      {
        ...this.config,
        execDangerously: { ...this.config.execDangerously, enabled: true },
      },
      { blockedPaths: this.blocked.list() }
    );
  }

  get mode(): SecurityMode {
    return this.config.mode;
  }

  // ---------------------------------------------------------------------------
  // Container access
  // ---------------------------------------------------------------------------

  canAccessContainer(name: string): boolean {
    const patterns = this.config.allowedContainers;
    return patterns.length === 0 || patterns.some((pattern) => matchGlob(pattern, name));
  }

  canGetLogs(): boolean {
    return this.config.permissions.logs;
  }

  canInspect(): boolean {
    return this.config.permissions.inspect;
  }

  canGetStats(): boolean {
    return this.config.permissions.stats;
  }

  canLifecycle(container: string): Authorization {
    if (!this.config.permissions.lifecycle) {
      return deny('lifecycle operations are disabled in security policy');
    }
    if (!this.canAccessContainer(container)) {
      return deny(`container not in allowed list: ${container}`, { rule: container });
    }
    if (this.config.mode === 'strict') {
      return deny('lifecycle operations are not allowed in strict mode');
    }
    return ALLOWED;
  }

  // ---------------------------------------------------------------------------
  // Exec
  // ---------------------------------------------------------------------------

  /**
   * Normal exec. In moderate mode the command must match a whitelist entry
   * for the container or for `*` verbatim (or by `*` prefix).
   */
  canExec(container: string, command: string): Authorization {
    if (!this.config.permissions.exec) {
      return deny('exec is disabled in security policy');
    }
    if (!this.canAccessContainer(container)) {
      return deny(`container not in allowed list: ${container}`, { rule: container });
    }

    switch (this.config.mode) {
      case 'strict':
        return deny('exec is not allowed in strict mode');
      case 'permissive':
        return ALLOWED;
      case 'moderate': {
        const whitelisted = this.getAllowedCommands(container).some((pattern) =>
          matchCommandPattern(pattern, command)
        );
        if (whitelisted) {
          return ALLOWED;
        }
        const base = splitWhitespace(command)[0];
        const hint =
          this.config.execDangerously.enabled && base !== undefined && this.isDangerousCommand(container, base)
            ? DANGEROUS_HINT
            : undefined;
        return deny(`command not whitelisted: ${command}`, { rule: command, hint });
      }
    }
  }

  /**
   * Dangerous exec: the first token must be a listed dangerous command, no
   * shell meta-characters or `..`, and no path argument may be blocked.
   */
  canExecDangerously(container: string, command: string): Authorization {
    if (!this.config.execDangerously.enabled) {
      return deny('dangerous mode is not enabled in security policy');
    }
    if (!this.config.permissions.exec) {
      return deny('exec is disabled in security policy');
    }
    if (!this.canAccessContainer(container)) {
      return deny(`container not in allowed list: ${container}`, { rule: container });
    }
    if (this.config.mode === 'strict') {
      return deny('dangerous exec is not allowed in strict mode');
    }

    const meta = findShellMetacharacter(command);
    if (meta !== undefined) {
      return deny(
        'shell meta-characters (pipes, redirects, chaining, substitution, newlines) are not allowed in dangerous mode',
        { rule: meta }
      );
    }
    if (command.includes('..')) {
      return deny('path traversal (..) is not allowed in dangerous mode', { rule: '..' });
    }

    const base = splitWhitespace(command)[0];
    if (base === undefined) {
      return deny('empty command');
    }
    if (!this.isDangerousCommand(container, base)) {
      return deny(`command '${base}' is not in the dangerous command list for container '${container}'`, {
        rule: base,
      });
    }

    let args: string[];
    try {
      args = tokenize(command);
    } catch (error) {
      if (error instanceof ParseError) {
        return deny(error.message);
      }
      throw error;
    }

    for (const candidate of extractPathArguments(args)) {
      const rule = this.isPathBlocked(container, candidate);
      if (rule) {
        return deny(`path is blocked: ${candidate} (reason: ${rule.reason})`, { rule });
      }
    }

    return ALLOWED;
  }

  private isDangerousCommand(container: string, base: string): boolean {
    return this.getDangerousCommands(container).includes(base);
  }

  // ---------------------------------------------------------------------------
  // Paths and masking
  // ---------------------------------------------------------------------------

  isPathBlocked(container: string, path: string): BlockedPath | undefined {
    return this.blocked.find(container, path);
  }

  maskOutput(text: string, target: OutputTarget): string {
    return applyMasking(this.maskingRules, text, target);
  }

  maskHostPaths(text: string): string {
    return this.hostPathMasker(text);
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  getAllowedCommands(container: string): string[] {
    const whitelist = this.config.execWhitelist;
    return [...(whitelist[container] ?? []), ...(container === '*' ? [] : whitelist['*'] ?? [])];
  }

  getDangerousCommands(container: string): string[] {
    const commands = this.config.execDangerously.commands;
    return [...(commands[container] ?? []), ...(container === '*' ? [] : commands['*'] ?? [])];
  }

  getBlockedPaths(container?: string): BlockedPath[] {
    return this.blocked.list(container);
  }

  describe(): PolicySummary {
    return {
      mode: this.config.mode,
      allowedContainers: [...this.config.allowedContainers],
      permissions: { ...this.config.permissions },
      execWhitelist: structuredClone(this.config.execWhitelist),
      dangerousMode: structuredClone(this.config.execDangerously),
      outputMasking: {
        enabled: this.config.outputMasking.enabled,
        patternCount: this.maskingRules.length,
      },
      hostPathMasking: this.config.hostPathMasking.enabled,
      blockedPathCount: this.blocked.size,
    };
  }
}
