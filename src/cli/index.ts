#!/usr/bin/env node

/**
 * HarborGate CLI Entry Point
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { initWizard } from './init';
import { policyCommand } from './commands/policy';
import { auditCommand } from './commands/audit';
import { checkExecCommand, checkHostCommand, checkPathCommand } from './commands/check';
import { toolsListCommand, toolsRunCommand, toolsSyncCommand } from './commands/tools';
import { logger } from '../core/Logger';

const program = new Command();

program
  .name('harborgate')
  .description('⚓ Least-privilege gateway for sandboxed AI assistants')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to harborgate.json');

// Create a configuration
program
  .command('init')
  .description('Create harborgate.json (interactive wizard)')
  .option('-p, --path <path>', 'Where to write the configuration')
  .option('-f, --force', 'Overwrite an existing configuration without asking')
  .action(initWizard);

// Show the effective policy
program
  .command('policy')
  .description('Show the effective security policy')
  .option('--container <name>', 'Only blocked paths that apply to this container')
  .action(policyCommand);

// Dry-run authorization
const check = program.command('check').description('Explain whether an action would be allowed');

check
  .command('exec')
  .description('Check a container exec command')
  .argument('<container>', 'Container name')
  .argument('<command...>', 'Command line')
  .option('--dangerously', 'Check against the dangerous command list')
  .allowUnknownOption()
  .action(checkExecCommand);

check
  .command('path')
  .description('Check whether a path in a container is blocked')
  .argument('<container>', 'Container name')
  .argument('<path>', 'Path inside the container')
  .action(checkPathCommand);

check
  .command('host')
  .description('Check a host command')
  .argument('<command...>', 'Command line')
  .option('--dangerously', 'Check against the dangerous command list')
  .option('--container <name>', 'Container whose blocked paths apply')
  .allowUnknownOption()
  .action(checkHostCommand);

// Host tools
const tools = program.command('tools').description('Manage host tools');

tools
  .command('list')
  .description('List available host tools')
  .option('--dev', 'Include staging directories')
  .action(toolsListCommand);

tools
  .command('sync')
  .description('Review staged tools and copy approved ones into the store')
  .option('--stdin', 'Read y/N/d answers line by line from stdin')
  .action(toolsSyncCommand);

tools
  .command('run')
  .description('Run an approved host tool')
  .argument('<name>', 'Tool file name')
  .argument('[args...]', 'Tool arguments')
  .option('--dev', 'Include staging directories')
  .option('-t, --timeout <ms>', 'Timeout in milliseconds')
  .allowUnknownOption()
  .action(toolsRunCommand);

// View audit trail
program
  .command('audit')
  .description('View the audit trail')
  .option('-n, --lines <number>', 'Number of recent decisions to show', '50')
  .action(auditCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('❌ Command failed:'), error);
  logger.error('CLI failed', { error });
  process.exit(1);
});
