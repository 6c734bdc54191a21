/**
 * HarborGate error taxonomy
 *
 * A policy refusal, a missing target and a broken runtime are different
 * outcomes and callers report them differently, so each has its own class.
 * A non-zero exit code is a normal result and has no error class.
 */

import type { BlockedPath } from '../types';

export type HarborGateErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'TIMEOUT'
  | 'EXECUTION_FAILURE'
  | 'CONFIG_ERROR';

export class HarborGateError extends Error {
  readonly code: HarborGateErrorCode;

  constructor(code: HarborGateErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarborGateError';
    this.code = code;
  }
}

/**
 * Policy refusal. `rule` is whatever matched (a blocked path entry, a deny
 * pattern, a meta-character), so the assistant can explain the refusal.
 */
export class PermissionDeniedError extends HarborGateError {
  readonly rule?: string | BlockedPath;
  readonly hint?: string;

  constructor(message: string, details: { rule?: string | BlockedPath; hint?: string } = {}) {
    super('PERMISSION_DENIED', details.hint ? `${message} (hint: ${details.hint})` : message);
    this.name = 'PermissionDeniedError';
    this.rule = details.rule;
    this.hint = details.hint;
  }
}

export class NotFoundError extends HarborGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
    this.name = 'NotFoundError';
  }
}

export class ParseError extends HarborGateError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
    this.name = 'ParseError';
  }
}

export class TimeoutError extends HarborGateError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ExecutionFailureError extends HarborGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXECUTION_FAILURE', message, options);
    this.name = 'ExecutionFailureError';
  }
}

export class ConfigError extends HarborGateError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
