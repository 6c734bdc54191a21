/**
 * HarborGate Tool Header Parser
 * Reads a host tool's description, usage and examples from its leading comments
 */

import fs from 'fs-extra';
import path from 'path';
import readline from 'readline';
import { ToolInfo } from '../types';
import { ParseError } from '../core/errors';

type LineAction = 'skip' | 'stop' | 'comment';

interface HeaderDialect {
  prefix: string;
  maxLines: number;
  /** Classify a raw line; `comment` lines are fed to the section parser. */
  classify(line: string, lineNumber: number): LineAction;
  /** Comment text that should never become the description. */
  ignoreAsDescription?(content: string): boolean;
}

const SHELL: HeaderDialect = {
  prefix: '#',
  maxLines: 50,
  classify: (line, lineNumber) => {
    if (lineNumber === 1 && line.startsWith('#!')) {
      return 'skip';
    }
    return line.startsWith('#') ? 'comment' : 'stop';
  },
  ignoreAsDescription: (content) => content.endsWith('.sh') && !content.includes(' '),
};

const PYTHON: HeaderDialect = {
  prefix: '#',
  maxLines: 30,
  classify: (line, lineNumber) => {
    if (lineNumber === 1 && line.startsWith('#!')) {
      return 'skip';
    }
    if (/coding[:=]/.test(line)) {
      return 'skip';
    }
    if (line.startsWith('#')) {
      return 'comment';
    }
    return line.trim() === '' ? 'skip' : 'stop';
  },
};

const GO: HeaderDialect = {
  prefix: '//',
  maxLines: 100,
  classify: (line) => {
    if (line.startsWith('package ')) {
      return 'stop';
    }
    return line.startsWith('//') ? 'comment' : 'skip';
  },
};

const DIALECTS: Record<string, HeaderDialect> = {
  '.sh': SHELL,
  '.py': PYTHON,
  '.go': GO,
};

export function supportedExtensions(): string[] {
  return Object.keys(DIALECTS);
}

function dialectFor(name: string): HeaderDialect {
  const extension = path.extname(name);
  const dialect = DIALECTS[extension];
  if (!dialect) {
    throw new ParseError(`unsupported tool extension: ${extension || name}`);
  }
  return dialect;
}

/**
 * Parse the header of a tool script from its text.
 */
export function parseToolHeader(name: string, content: string): ToolInfo {
  const dialect = dialectFor(name);
  return parseHeaderLines(name, dialect, content.split(/\r?\n/).slice(0, dialect.maxLines));
}

function parseHeaderLines(name: string, dialect: HeaderDialect, lines: readonly string[]): ToolInfo {
  const extension = path.extname(name);
  let description = '';
  const usage: string[] = [];
  const examples: string[] = [];
  let section: 'usage' | 'examples' | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const action = dialect.classify(line, i + 1);
    if (action === 'stop') {
      break;
    }
    if (action === 'skip') {
      continue;
    }

    const text = line.slice(dialect.prefix.length).trim();
    if (text.startsWith('---')) {
      break;
    }

    if (!description) {
      if (text && !dialect.ignoreAsDescription?.(text)) {
        description = text;
      }
      continue;
    }

    if (text.startsWith('Usage:')) {
      section = 'usage';
      const inline = text.slice('Usage:'.length).trim();
      if (inline) {
        usage.push(inline);
      }
      continue;
    }
    if (text.startsWith('Examples:')) {
      section = 'examples';
      continue;
    }
    if (!text) {
      continue;
    }

    if (section === 'usage') {
      usage.push(text);
    } else if (section === 'examples') {
      examples.push(text);
    }
  }

  if (!description) {
    throw new ParseError(`no description found in ${name}`);
  }

  return { name, description, usage: usage.join('\n'), examples, extension };
}

/** The first `limit` lines of a file. Reading stops there. */
export async function readLeadingLines(filePath: string, limit: number): Promise<string[]> {
  const handle = await fs.promises.open(filePath, 'r');
  const input = handle.createReadStream({ encoding: 'utf8' });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  const lines: string[] = [];
  try {
    for await (const line of rl) {
      lines.push(line);
      if (lines.length >= limit) {
        break;
      }
    }
  } finally {
    rl.close();
    input.destroy();
  }
  return lines;
}

export async function parseToolFile(filePath: string): Promise<ToolInfo> {
  const name = path.basename(filePath);
  const dialect = dialectFor(name);
  return parseHeaderLines(name, dialect, await readLeadingLines(filePath, dialect.maxLines));
}
