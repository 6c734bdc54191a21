/**
 * HarborGate Tools Commands
 * List, approve and run host tools
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { ToolInfo } from '../../types';
import { logger } from '../../core/Logger';
import { ApprovalPrompter, InquirerApprovalPrompter, LineApprovalPrompter } from '../../hosttools/ApprovalPrompter';
import { loadGateway } from '../context';

function printTool(tool: ToolInfo): void {
  console.log(`  ${chalk.cyan(tool.name)} ${chalk.dim(`- ${tool.description}`)}`);
  if (tool.usage) {
    console.log(chalk.dim(`      usage: ${tool.usage.split('\n').join('\n             ')}`));
  }
}

export async function toolsListCommand(options: { dev?: boolean }, command: Command): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   🧰 HarborGate Host Tools'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const gateway = await loadGateway(command, { devMode: options.dev });
    const registry = gateway.hostTools;

    console.log(chalk.dim(`State: ${registry.state}`));
    for (const dir of registry.toolDirectories()) {
      console.log(chalk.dim(`  ${dir}`));
    }
    console.log('');

    const tools = await registry.listTools();
    if (tools.length === 0) {
      console.log(chalk.yellow('No tools available.'));
      console.log('');
      return;
    }

    tools.forEach(printTool);
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Failed to list tools:'), error);
    logger.error('Tools list command failed', { error });
    process.exit(1);
  }
}

export async function toolsSyncCommand(options: { stdin?: boolean }, command: Command): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   🔏 HarborGate Tool Approval'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  const prompter: ApprovalPrompter =
    options.stdin || !process.stdin.isTTY ? new LineApprovalPrompter() : new InquirerApprovalPrompter();

  try {
    const gateway = await loadGateway(command);
    console.log(chalk.dim(`Approved store: ${gateway.approval.approvedDir}`));
    console.log('');

    const report = await gateway.approval.runInteractiveSync(prompter);

    console.log('');
    console.log(chalk.bold('Summary:'));
    console.log(`  ${chalk.green(`${report.approved.length} approved`)}`);
    console.log(`  ${chalk.dim(`${report.rejected.length} skipped`)}`);
    console.log(`  ${chalk.dim(`${report.unchanged.length} unchanged`)}`);
    if (report.failed.length > 0) {
      console.log(`  ${chalk.red(`${report.failed.length} failed`)}`);
      process.exitCode = 1;
    }
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Sync failed:'), error);
    logger.error('Tools sync command failed', { error });
    process.exit(1);
  } finally {
    prompter.close();
  }
}

/** `--timeout` in milliseconds; a positive integer or absent. */
export function parseTimeout(value?: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const timeoutMs = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`invalid timeout: ${value} (expected a positive number of milliseconds)`);
  }
  return timeoutMs;
}

export async function toolsRunCommand(
  name: string,
  args: string[],
  options: { dev?: boolean; timeout?: string },
  command: Command
): Promise<void> {
  try {
    const gateway = await loadGateway(command, { devMode: options.dev });
    const timeoutMs = parseTimeout(options.timeout);
    const result = await gateway.hostTools.runTool(name, args, { timeoutMs });

    process.stdout.write(result.stdout);
    process.stderr.write(result.stderr);
    process.exitCode = result.exitCode;
  } catch (error) {
    console.error(chalk.red(`❌ Failed to run ${name}:`), error);
    logger.error('Tools run command failed', { name, error });
    process.exit(1);
  }
}
