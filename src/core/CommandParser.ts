/**
 * HarborGate CommandParser
 * Tokenizers and argument helpers shared by the container and host surfaces
 */

import { ParseError } from './errors';

const SHELL_METACHARACTERS = ['|', '>', '<', ';', '&', '`', '\n'];

/**
 * Return the first shell meta-character (or `$(`) found in the command.
 */
export function findShellMetacharacter(command: string): string | undefined {
  for (const ch of SHELL_METACHARACTERS) {
    if (command.includes(ch)) {
      return ch;
    }
  }
  if (command.includes('$(')) {
    return '$(';
  }
  return undefined;
}

/**
 * Whitespace-only split used for container exec. Quotes are not interpreted.
 */
export function splitWhitespace(command: string): string[] {
  return command.split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Quote-aware tokenizer.
 *
 * Single quotes are literal. Inside double quotes a backslash only escapes
 * `"`, `\`, `$` and backtick. Outside quotes a backslash escapes any character.
 * `""` yields an empty argument.
 */
export function tokenize(command: string): string[] {
  const args: string[] = [];
  let current = '';
  let inSingle = false;
  let inDouble = false;
  let hasContent = false;

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];

    if (inSingle) {
      if (ch === "'") {
        inSingle = false;
      } else {
        current += ch;
      }
      continue;
    }

    if (inDouble) {
      if (ch === '"') {
        inDouble = false;
      } else if (ch === '\\' && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) {
        current += command[i + 1];
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '\\') {
      if (i + 1 < command.length) {
        current += command[i + 1];
        i++;
        hasContent = true;
      }
      continue;
    }

    if (ch === "'") {
      inSingle = true;
      hasContent = true;
      continue;
    }

    if (ch === '"') {
      inDouble = true;
      hasContent = true;
      continue;
    }

    if (/\s/.test(ch)) {
      if (hasContent) {
        args.push(current);
        current = '';
        hasContent = false;
      }
      continue;
    }

    current += ch;
    hasContent = true;
  }

  if (inSingle || inDouble) {
    throw new ParseError(`unterminated quote in command: ${command}`);
  }

  if (hasContent) {
    args.push(current);
  }

  return args;
}

/**
 * Every argument that may name a file: each operand after the command name,
 * plus the value of `--opt=value` options. Bare names count, since blocked
 * patterns such as `*.key` match them too.
 */
export function extractPathArguments(args: string[]): string[] {
  const candidates: string[] = [];
  for (const arg of args.slice(1)) {
    if (!arg.startsWith('-')) {
      candidates.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq !== -1 && eq < arg.length - 1) {
      candidates.push(arg.slice(eq + 1));
    }
  }
  return candidates;
}
