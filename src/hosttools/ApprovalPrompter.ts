/**
 * HarborGate Approval Prompters
 * The human side of the tool approval pipeline
 *
 * Two prompters speak the same request/decision protocol:
 *  1. LineApprovalPrompter     → one answer per line on any stream (scripts, tests)
 *  2. InquirerApprovalPrompter → interactive list prompt on a TTY
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import readline from 'readline';
import { Readable, Writable } from 'stream';
import { SyncItem } from '../types';

export type ApprovalDecision = 'approve' | 'reject' | 'diff';

export interface ApprovalRequest {
  item: SyncItem;
  /** Whether `diff` is a valid answer (updated items, before a diff was shown). */
  diffAvailable: boolean;
}

export interface ApprovalPrompter {
  present(request: ApprovalRequest): Promise<ApprovalDecision>;
  showDiff(item: SyncItem, diff: string): Promise<void>;
  /** Progress and outcome messages. */
  notify(message: string): Promise<void>;
  close(): void;
}

/** `y`/`yes` approve, `d`/`diff` diff (when offered), anything else rejects. */
export function parseAnswer(answer: string, diffAvailable: boolean): ApprovalDecision {
  const normalized = answer.trim().toLowerCase();
  if (normalized === 'y' || normalized === 'yes') {
    return 'approve';
  }
  if (diffAvailable && (normalized === 'd' || normalized === 'diff')) {
    return 'diff';
  }
  return 'reject';
}

// ---------------------------------------------------------------------------
// Line protocol
// ---------------------------------------------------------------------------

export class LineApprovalPrompter implements ApprovalPrompter {
  private readonly rl: readline.Interface;
  private readonly buffered: string[] = [];
  private readonly waiting: Array<(line: string | undefined) => void> = [];
  private ended = false;

  constructor(input: Readable = process.stdin, private readonly output: Writable = process.stdout) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on('line', (line) => {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on('close', () => {
      this.ended = true;
      for (const waiter of this.waiting.splice(0)) {
        waiter(undefined);
      }
    });
  }

  async present(request: ApprovalRequest): Promise<ApprovalDecision> {
    const { item } = request;
    const description = item.description ? ` - "${item.description}"` : '';

    if (item.status === 'new') {
      this.write(`  New tool found:\n    ${item.name}${description}\n    Source: ${item.stagingPath}\n`);
      this.write(`    → Copy to ${item.approvedPath}? [y/N] `);
    } else if (request.diffAvailable) {
      this.write(`  Updated tool found:\n    ${item.name}${description}\n    Source: ${item.stagingPath}\n`);
      this.write(`    → Update ${item.approvedPath}? [y/N/d(iff)] `);
    } else {
      this.write('    → Update? [y/N] ');
    }

    const answer = await this.nextLine();
    // EOF counts as a rejection
    return answer === undefined ? 'reject' : parseAnswer(answer, request.diffAvailable);
  }

  async showDiff(_item: SyncItem, diff: string): Promise<void> {
    this.write(`\n${diff}\n`);
  }

  async notify(message: string): Promise<void> {
    this.write(`${message}\n`);
  }

  close(): void {
    this.rl.close();
  }

  private write(text: string): void {
    this.output.write(text);
  }

  private nextLine(): Promise<string | undefined> {
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }
}

// ---------------------------------------------------------------------------
// Interactive TTY prompt
// ---------------------------------------------------------------------------

export class InquirerApprovalPrompter implements ApprovalPrompter {
  async present(request: ApprovalRequest): Promise<ApprovalDecision> {
    const { item } = request;
    this.displayItem(item);

    const choices: Array<{ name: string; value: ApprovalDecision }> = [
      {
        name: chalk.green(item.status === 'new' ? '✓ Approve - Copy into the approved store' : '✓ Approve - Update'),
        value: 'approve',
      },
      { name: chalk.red('✗ Reject - Leave it unapproved'), value: 'reject' },
    ];
    if (request.diffAvailable) {
      choices.push({ name: chalk.cyan('± Show diff'), value: 'diff' });
    }

    const answer = await inquirer.prompt<{ decision: ApprovalDecision }>([
      {
        type: 'list',
        name: 'decision',
        message: chalk.bold.yellow(`⚠️  Approve ${item.name}?`),
        choices,
        default: 1, // Reject
      },
    ]);

    return answer.decision;
  }

  async showDiff(_item: SyncItem, diff: string): Promise<void> {
    console.log('');
    for (const line of diff.split('\n')) {
      if (line.startsWith('+') && !line.startsWith('+++')) {
        console.log(chalk.green(line));
      } else if (line.startsWith('-') && !line.startsWith('---')) {
        console.log(chalk.red(line));
      } else {
        console.log(chalk.dim(line));
      }
    }
    console.log('');
  }

  async notify(message: string): Promise<void> {
    console.log(message);
  }

  close(): void {
    // inquirer holds no resources between prompts
  }

  private displayItem(item: SyncItem): void {
    console.log('');
    console.log(chalk.bold.cyan('─'.repeat(80)));
    console.log(chalk.bold.cyan('🔧 Tool:'), chalk.white(item.name));
    console.log(chalk.bold.cyan('📋 Status:'), item.status === 'new' ? chalk.green('new') : chalk.yellow('updated'));
    if (item.description) {
      console.log(chalk.bold.cyan('📝 Description:'), chalk.white(item.description));
    }
    console.log(chalk.bold.cyan('📂 Source:'), chalk.gray(item.stagingPath));
    console.log(chalk.bold.cyan('📦 Target:'), chalk.gray(item.approvedPath));
    console.log('');
  }
}
