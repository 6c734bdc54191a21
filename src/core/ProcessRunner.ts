/**
 * HarborGate ProcessRunner
 * Runs a host process without a shell, bounded by a timeout
 */

import { spawn } from 'child_process';
import { ProcessResult } from '../types';
import { ExecutionFailureError, TimeoutError } from './errors';
import { logger } from './Logger';

export interface RunOptions {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Spawn `command` with `args` and collect its output. A non-zero exit code is
 * a normal result. On timeout the child is killed and a TimeoutError thrown;
 * a process that cannot be started is an ExecutionFailureError.
 */
export function runProcess(command: string, args: readonly string[], options: RunOptions): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    // Grandchildren may keep the pipes open after the kill, so settle here
    // rather than waiting for 'close'.
    const timer = setTimeout(() => {
      logger.warn('Process timed out, killing', { command, timeoutMs: options.timeoutMs });
      child.kill('SIGKILL');
      child.stdout.destroy();
      child.stderr.destroy();
      settled = true;
      reject(new TimeoutError(`${command} timed out after ${options.timeoutMs}ms`, options.timeoutMs));
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      clearTimeout(timer);
      if (settled) {
        return;
      }
      settled = true;
      reject(new ExecutionFailureError(`failed to start ${command}: ${error.message}`, { cause: error }));
    });

    child.on('close', (code, signal) => {
      clearTimeout(timer);
      if (settled) {
        return;
      }
      settled = true;
      resolve({ stdout, stderr, exitCode: code ?? (signal ? 128 : -1) });
    });
  });
}
