/**
 * HarborGate Policy Command
 * Prints the effective policy built from harborgate.json
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { BlockedPath } from '../../types';
import { logger } from '../../core/Logger';
import { loadGateway } from '../context';

function printCommandMap(title: string, map: Record<string, string[]>): void {
  console.log(chalk.bold(title));
  const entries = Object.entries(map);
  if (entries.length === 0) {
    console.log(chalk.dim('  (none)'));
  }
  for (const [scope, commands] of entries) {
    console.log(chalk.cyan(`  ${scope}:`));
    for (const command of commands) {
      console.log(`    ${command}`);
    }
  }
  console.log('');
}

function describeBlockedPath(rule: BlockedPath): string {
  const origin = rule.origin ? chalk.dim(` (${rule.origin})`) : '';
  return `  ${chalk.yellow(rule.scope.padEnd(20))} ${rule.pattern.padEnd(30)} ${chalk.dim(rule.reason)}${origin}`;
}

export async function policyCommand(options: { container?: string }, command: Command): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   🔒 HarborGate Policy'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const gateway = await loadGateway(command);
    const summary = gateway.policy.describe();

    const modeColor =
      summary.mode === 'strict' ? chalk.red : summary.mode === 'moderate' ? chalk.yellow : chalk.green;

    console.log(chalk.bold('Container Access:'));
    console.log(`  Mode:               ${modeColor(summary.mode)}`);
    console.log(
      `  Allowed containers: ${
        summary.allowedContainers.length > 0 ? summary.allowedContainers.join(', ') : chalk.dim('(all)')
      }`
    );
    const permissions = Object.entries(summary.permissions)
      .map(([name, enabled]) => (enabled ? chalk.green(name) : chalk.dim.strikethrough(name)))
      .join(' ');
    console.log(`  Permissions:        ${permissions}`);
    console.log(
      `  Output masking:     ${
        summary.outputMasking.enabled ? `${summary.outputMasking.patternCount} pattern(s)` : chalk.dim('off')
      }`
    );
    console.log(`  Host path masking:  ${summary.hostPathMasking ? 'on' : chalk.dim('off')}`);
    console.log(`  Dangerous mode:     ${summary.dangerousMode.enabled ? chalk.red('on') : chalk.dim('off')}`);
    console.log('');

    printCommandMap('Exec Whitelist:', summary.execWhitelist);
    printCommandMap('Dangerous Commands:', summary.dangerousMode.commands);

    const blocked = gateway.policy.getBlockedPaths(options.container);
    console.log(chalk.bold(`Blocked Paths (${blocked.length}):`));
    if (blocked.length === 0) {
      console.log(chalk.dim('  (none)'));
    }
    for (const rule of blocked) {
      console.log(describeBlockedPath(rule));
    }
    console.log('');

    const hostCommands = gateway.config.hostAccess.hostCommands;
    console.log(chalk.bold('Host Access:'));
    console.log(`  Workspace root:     ${gateway.config.hostAccess.workspaceRoot || chalk.dim('(cwd)')}`);
    console.log(`  Host commands:      ${hostCommands.enabled ? chalk.green('enabled') : chalk.dim('disabled')}`);
    console.log(`  Host tools:         ${gateway.hostTools.state}`);
    console.log('');

    if (hostCommands.enabled) {
      printCommandMap('Host Whitelist:', gateway.hostCommands.getWhitelist());
      printCommandMap('Host Deny List:', hostCommands.deny);
      printCommandMap('Host Dangerous Commands:', gateway.hostCommands.getDangerousCommands());
    }
  } catch (error) {
    console.error(chalk.red('❌ Failed to load policy:'), error);
    logger.error('Policy command failed', { error });
    process.exit(1);
  }
}
