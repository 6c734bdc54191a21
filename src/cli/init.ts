/**
 * HarborGate Init Wizard
 * Interactive creation of harborgate.json
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import { HarborGateConfig, SecurityMode } from '../types';
import { DEFAULT_CONFIG } from '../config';
import { ConfigStore, CONFIG_FILE_NAME } from '../storage/ConfigStore';
import { AuditLog } from '../storage/AuditLog';
import { logger, LOG_PATH } from '../core/Logger';

const SECURITY_MODES: SecurityMode[] = ['strict', 'moderate', 'permissive'];

export const SECURITY_PRESETS: Record<SecurityMode, { name: string; description: string }> = {
  strict: {
    name: '🔴 Strict',
    description: 'logs, inspect and stats only; no exec of any kind',
  },
  moderate: {
    name: '🟡 Moderate (Recommended)',
    description: 'exec limited to a per-container whitelist',
  },
  permissive: {
    name: '🟢 Permissive',
    description: 'any exec command in allowed containers',
  },
};

export interface InitAnswers {
  mode: SecurityMode;
  allowedContainers: string[];
  workspaceRoot: string;
  enableHostCommands: boolean;
  enableHostTools: boolean;
  approvedDir: string;
}

/** The default configuration with the wizard's answers applied. */
export function buildPresetConfig(answers: InitAnswers): HarborGateConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.security.mode = answers.mode;
  config.security.allowedContainers = answers.allowedContainers;
  config.security.permissions.exec = answers.mode !== 'strict';

  if (answers.mode === 'moderate') {
    config.security.execWhitelist = { '*': ['pwd', 'whoami', 'env', 'ps aux', 'ls *'] };
  }

  config.security.blockedPaths.autoImport.workspaceRoot = answers.workspaceRoot;
  config.hostAccess.workspaceRoot = answers.workspaceRoot;
  config.hostAccess.hostCommands.enabled = answers.enableHostCommands;
  if (answers.enableHostCommands) {
    config.hostAccess.hostCommands.whitelist = { git: ['status', 'log *', 'diff *'] };
    config.hostAccess.hostCommands.deny = { git: ['push *', 'reset --hard *'] };
  }
  config.hostAccess.hostTools.enabled = answers.enableHostTools;
  config.hostAccess.hostTools.approvedDir = answers.enableHostTools ? answers.approvedDir : '';
  return config;
}

function splitList(input: string): string[] {
  return input
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export async function initWizard(options: { path?: string; force?: boolean }): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   ⚓ HarborGate Setup Wizard'));
  console.log(chalk.bold.cyan('   Least-privilege access for sandboxed AI assistants'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const target = path.resolve(options.path ?? CONFIG_FILE_NAME);

    if ((await fs.pathExists(target)) && !options.force) {
      const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
        {
          type: 'confirm',
          name: 'overwrite',
          message: `${target} already exists. Overwrite?`,
          default: false,
        },
      ]);

      if (!overwrite) {
        console.log(chalk.yellow('Setup cancelled.'));
        return;
      }
    }

    // Step 1: Choose security level
    console.log(chalk.bold('Step 1: Choose your security level'));
    console.log('');

    const { mode } = await inquirer.prompt<{ mode: SecurityMode }>([
      {
        type: 'list',
        name: 'mode',
        message: 'Which security mode should container access use?',
        choices: SECURITY_MODES.map((key) => ({
          name: `${SECURITY_PRESETS[key].name} - ${SECURITY_PRESETS[key].description}`,
          value: key,
        })),
        default: 'moderate',
      },
    ]);

    console.log('');

    // Step 2: Scope
    console.log(chalk.bold('Step 2: Define the scope'));
    console.log('');

    const scope = await inquirer.prompt<{
      containers: string;
      workspaceRoot: string;
      enableHostCommands: boolean;
      enableHostTools: boolean;
    }>([
      {
        type: 'input',
        name: 'containers',
        message: 'Allowed containers (comma-separated globs, empty for all):',
        default: '',
      },
      {
        type: 'input',
        name: 'workspaceRoot',
        message: 'Workspace root:',
        default: path.dirname(target),
      },
      {
        type: 'confirm',
        name: 'enableHostCommands',
        message: 'Enable whitelisted host commands?',
        default: false,
      },
      {
        type: 'confirm',
        name: 'enableHostTools',
        message: 'Enable approved host tools?',
        default: false,
      },
    ]);

    let approvedDir = '';
    if (scope.enableHostTools) {
      const answer = await inquirer.prompt<{ approvedDir: string }>([
        {
          type: 'input',
          name: 'approvedDir',
          message: 'Approved tool store:',
          default: '~/.harborgate/tools',
        },
      ]);
      approvedDir = answer.approvedDir;
    }

    console.log('');

    // Step 3: Write the configuration
    console.log(chalk.bold('Step 3: Writing configuration...'));

    const config = buildPresetConfig({
      mode,
      allowedContainers: splitList(scope.containers),
      workspaceRoot: path.resolve(scope.workspaceRoot),
      enableHostCommands: scope.enableHostCommands,
      enableHostTools: scope.enableHostTools,
      approvedDir,
    });

    await ConfigStore.init(config, target, true);
    console.log(chalk.green(`✅ Configuration saved to ${target}`));
    console.log('');

    // Success summary
    console.log(chalk.bold.green('═'.repeat(80)));
    console.log(chalk.bold.green('   ✅ HarborGate configured successfully!'));
    console.log(chalk.bold.green('═'.repeat(80)));
    console.log('');

    console.log(chalk.bold('Configuration:'));
    console.log(chalk.dim(`  Config:     ${target}`));
    console.log(chalk.dim(`  Audit log:  ${AuditLog.getPath()}`));
    console.log(chalk.dim(`  Log file:   ${LOG_PATH}`));
    console.log('');

    console.log(chalk.bold('Next steps:'));
    console.log(chalk.cyan('  1. Review policy:') + chalk.dim('     harborgate policy'));
    console.log(chalk.cyan('  2. Try a command:') + chalk.dim('     harborgate check exec <container> <command>'));
    if (scope.enableHostTools) {
      console.log(chalk.cyan('  3. Approve tools:') + chalk.dim('     harborgate tools sync'));
    }
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Setup failed:'), error);
    logger.error('Init wizard failed', { error });
    process.exit(1);
  }
}
