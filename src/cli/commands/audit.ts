/**
 * HarborGate Audit Command
 */

import chalk from 'chalk';
import { AuditLog, AuditRecord } from '../../storage/AuditLog';
import { logger } from '../../core/Logger';

export function formatAuditRecord(record: AuditRecord): string {
  const timestamp = new Date(record.timestamp).toLocaleTimeString();
  const decisionColor =
    record.decision === 'ALLOWED' || record.decision === 'APPROVED'
      ? chalk.green
      : record.decision === 'FAILED'
        ? chalk.yellow
        : chalk.red;

  const decisionText = decisionColor(record.decision.padEnd(9));
  const surfaceText = chalk.cyan(`${record.surface}.${record.operation}`.padEnd(28));
  const durationText =
    record.durationMs !== undefined ? chalk.dim(` ${(record.durationMs / 1000).toFixed(1)}s`) : '';
  const reasonText = record.reason ? chalk.dim(` - ${record.reason}`) : '';

  return `${chalk.dim(timestamp)} | ${surfaceText} | ${decisionText} | ${record.target}${durationText}${reasonText}`;
}

export async function auditCommand(options: { lines: string }): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   📋 HarborGate Audit Trail'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const lineCount = parseInt(options.lines, 10);
    if (Number.isNaN(lineCount) || lineCount <= 0) {
      throw new Error(`invalid line count: ${options.lines}`);
    }
    const records = await AuditLog.readLast(lineCount);

    if (records.length === 0) {
      console.log(chalk.yellow('No decisions recorded yet.'));
      console.log('');
      return;
    }

    console.log(chalk.dim(`Showing last ${records.length} decision(s):`));
    console.log('');

    records.forEach((record) => console.log(formatAuditRecord(record)));

    console.log('');
    console.log(chalk.dim(`Audit log: ${AuditLog.getPath()}`));
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Failed to load audit trail:'), error);
    logger.error('Audit command failed', { error });
    process.exit(1);
  }
}
