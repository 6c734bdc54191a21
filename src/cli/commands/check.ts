/**
 * HarborGate Check Commands
 * Explain whether an action would be allowed, without running it
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { Authorization, SecurityPolicy } from '../../core/SecurityPolicy';
import { HostAuthorization } from '../../core/HostCommandExecutor';
import { logger } from '../../core/Logger';
import { loadGateway } from '../context';

function report(subject: string, auth: Authorization | HostAuthorization): void {
  if (auth.allowed) {
    const via = 'via' in auth ? chalk.dim(` (${auth.via})`) : '';
    console.log(`${chalk.green('✅ ALLOWED')}  ${subject}${via}`);
    return;
  }
  console.log(`${chalk.red('❌ DENIED')}   ${subject}`);
  console.log(chalk.dim(`   reason: ${auth.error.message}`));
  process.exitCode = 2;
}

function fail(error: unknown): never {
  console.error(chalk.red('❌ Check failed:'), error);
  logger.error('Check command failed', { error });
  process.exit(1);
}

/**
 * Dry-run of a container exec. `dangerously` only picks the predicate; the
 * configured `execDangerously.enabled` still has to allow it.
 */
export function explainExec(policy: SecurityPolicy, container: string, line: string, dangerously = false): Authorization {
  return dangerously ? policy.canExecDangerously(container, line) : policy.canExec(container, line);
}

export async function checkExecCommand(
  container: string,
  words: string[],
  options: { dangerously?: boolean },
  command: Command
): Promise<void> {
  try {
    const gateway = await loadGateway(command);
    const line = words.join(' ');
    const auth = explainExec(gateway.policy, container, line, options.dangerously);
    report(`${container}: ${line}`, auth);
  } catch (error) {
    fail(error);
  }
}

export async function checkPathCommand(container: string, target: string, _options: object, command: Command): Promise<void> {
  try {
    const gateway = await loadGateway(command);
    if (!gateway.policy.canAccessContainer(container)) {
      console.log(`${chalk.red('❌ DENIED')}   ${container}: container not in allowed list`);
      process.exitCode = 2;
      return;
    }
    const rule = gateway.policy.isPathBlocked(container, target);
    if (!rule) {
      console.log(`${chalk.green('✅ ALLOWED')}  ${container}:${target}`);
      return;
    }
    console.log(`${chalk.red('❌ BLOCKED')}  ${container}:${target}`);
    console.log(chalk.dim(`   pattern: ${rule.pattern} (scope ${rule.scope})`));
    console.log(chalk.dim(`   reason:  ${rule.reason}${rule.origin ? ` from ${rule.origin}` : ''}`));
    process.exitCode = 2;
  } catch (error) {
    fail(error);
  }
}

export async function checkHostCommand(
  words: string[],
  options: { dangerously?: boolean; container?: string },
  command: Command
): Promise<void> {
  try {
    const gateway = await loadGateway(command);
    const line = words.join(' ');
    const auth = gateway.hostCommands.authorize(line, {
      dangerously: options.dangerously,
      container: options.container,
    });
    report(`host: ${line}`, auth);
  } catch (error) {
    fail(error);
  }
}
