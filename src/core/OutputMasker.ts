/**
 * HarborGate OutputMasker
 * Secret masking for container output and host home-directory masking
 */

import { DEFAULT_HOST_PATH_REPLACEMENT, DEFAULT_MASK_REPLACEMENT } from '../config';
import {
  HostPathMaskingConfig,
  MaskingPatternConfig,
  MaskingRule,
  OutputMaskingConfig,
  OutputTarget,
} from '../types';
import { logger } from './Logger';
import { errorMessage } from './errors';

/**
 * Compile a pattern string. A leading `(?i)` becomes the `i` flag.
 */
export function compilePattern(source: string): RegExp {
  let flags = 'g';
  let body = source;
  if (body.startsWith('(?i)')) {
    flags += 'i';
    body = body.slice(4);
  }
  return new RegExp(body, flags);
}

function matchesText(pattern: RegExp, text: string): boolean {
  return new RegExp(pattern.source, pattern.flags.replace('g', '')).test(text);
}

/**
 * Turn masking configuration into ordered rules.
 * Rules whose pattern would re-match a replacement are skipped so masking
 * a second time changes nothing.
 */
export function compileMaskingRules(config: OutputMaskingConfig): MaskingRule[] {
  if (!config.enabled) {
    return [];
  }

  const globalReplacement = config.replacement || DEFAULT_MASK_REPLACEMENT;
  const candidates: MaskingRule[] = [];

  for (const entry of config.patterns) {
    const configured: MaskingPatternConfig = typeof entry === 'string' ? { pattern: entry } : entry;
    try {
      candidates.push({
        pattern: compilePattern(configured.pattern),
        replacement: configured.replacement || globalReplacement,
        applyTo: { ...config.applyTo, ...configured.applyTo },
      });
    } catch (error) {
      logger.warn('Skipping invalid masking pattern', {
        pattern: configured.pattern,
        error: errorMessage(error),
      });
    }
  }

  const replacements = candidates.map((rule) => rule.replacement);
  return candidates.filter((rule) => {
    const clash = replacements.find((replacement) => matchesText(rule.pattern, replacement));
    if (clash !== undefined) {
      logger.warn('Skipping masking pattern that matches a replacement', {
        pattern: rule.pattern.source,
        replacement: clash,
      });
      return false;
    }
    return true;
  });
}

/** Apply every rule flagged for `target`, in declaration order. */
export function applyMasking(rules: readonly MaskingRule[], text: string, target: OutputTarget): string {
  let result = text;
  for (const rule of rules) {
    if (rule.applyTo[target]) {
      result = result.replace(rule.pattern, rule.replacement);
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Host path masking
// ---------------------------------------------------------------------------

const PATH_TERMINATORS = '"\' ,]}\n\t';

const UNIX_HOME_PREFIXES = ['/c/Users/', '/C/Users/', '/Users/', '/home/'];

const WINDOWS_HOME_PREFIXES = [
  'C:\\Users\\',
  'c:\\Users\\',
  'D:\\Users\\',
  'd:\\Users\\',
  'C:/Users/',
  'c:/Users/',
  'D:/Users/',
  'd:/Users/',
];

function maskPrefix(input: string, prefix: string, replacement: string, separators: string): string {
  let result = input;
  let start = 0;

  for (;;) {
    const idx = result.indexOf(prefix, start);
    if (idx === -1) {
      break;
    }

    const userStart = idx + prefix.length;
    let userEnd = userStart;
    while (
      userEnd < result.length &&
      !separators.includes(result[userEnd]) &&
      !PATH_TERMINATORS.includes(result[userEnd])
    ) {
      userEnd++;
    }

    if (userEnd > userStart) {
      result = result.slice(0, idx) + replacement + result.slice(userEnd);
      start = idx + replacement.length;
    } else {
      start = idx + 1;
    }
  }

  return result;
}

/**
 * Replace `<home-prefix><user>` with the replacement, keeping the rest of the path.
 * `/Users/alice/work` becomes `[HOST_PATH]/work`.
 */
export function maskHostPathsInText(text: string, replacement = DEFAULT_HOST_PATH_REPLACEMENT): string {
  // Longer prefixes first, or `/Users/` would match inside `C:/Users/` and `/c/Users/`
  let result = text;
  for (const prefix of WINDOWS_HOME_PREFIXES) {
    result = maskPrefix(result, prefix, replacement, '\\/');
  }
  for (const prefix of UNIX_HOME_PREFIXES) {
    result = maskPrefix(result, prefix, replacement, '/');
  }
  return result;
}

export function createHostPathMasker(config: HostPathMaskingConfig): (text: string) => string {
  if (!config.enabled) {
    return (text) => text;
  }
  const replacement = config.replacement || DEFAULT_HOST_PATH_REPLACEMENT;
  return (text) => maskHostPathsInText(text, replacement);
}
