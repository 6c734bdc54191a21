/**
 * HarborGate PatternMatcher
 * Glob, command-pattern and blocked-path matching
 */

import path from 'path';
import { minimatch, MinimatchOptions } from 'minimatch';

// Plain shell globbing: `*` stays inside one segment, dot-files are ordinary names.
const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  noglobstar: true,
  nocomment: true,
  nonegate: true,
};

/**
 * Shell-style glob match (`*`, `?`, `[...]`). `*` does not cross `/`.
 */
export function matchGlob(pattern: string, value: string): boolean {
  if (pattern === value) {
    return true;
  }
  return minimatch(value, pattern, GLOB_OPTIONS);
}

/**
 * Whitelist entry match: exact equality, or when the pattern contains `*`,
 * the value starts with everything before the first `*`. Never trims.
 */
export function matchCommandPattern(pattern: string, value: string): boolean {
  if (pattern === value) {
    return true;
  }
  const star = pattern.indexOf('*');
  if (star === -1) {
    return false;
  }
  return value.startsWith(pattern.slice(0, star));
}

function normalizePath(p: string): string {
  let cleaned = path.posix.normalize(p);
  while (cleaned.length > 1 && cleaned.endsWith('/')) {
    cleaned = cleaned.slice(0, -1);
  }
  return cleaned;
}

/**
 * Match a path against a blocked-path pattern.
 *
 * - `.env` or `*.key` (no slash) match the basename anywhere
 * - `secrets/*` matches any path with a `secrets/` segment
 * - anything else is a glob over the whole path
 */
export function matchBlockedPath(pattern: string, target: string): boolean {
  let cleanPattern = normalizePath(pattern);
  const cleanPath = normalizePath(target);

  // `**/x` means x at any depth; `dir/**` means everything under dir
  while (cleanPattern.startsWith('**/')) {
    cleanPattern = cleanPattern.slice(3);
  }
  if (cleanPattern.endsWith('/**')) {
    cleanPattern = `${cleanPattern.slice(0, -3)}/*`;
  }

  if (cleanPattern === cleanPath) {
    return true;
  }

  if (!cleanPattern.includes('/')) {
    return matchGlob(cleanPattern, path.posix.basename(cleanPath));
  }

  if (cleanPattern.endsWith('/*')) {
    const dir = cleanPattern.slice(0, -2);
    const bare = dir.startsWith('/') ? dir.slice(1) : dir;
    if (cleanPath.startsWith(`${dir}/`) || cleanPath.includes(`/${bare}/`)) {
      return true;
    }
    if (!dir.startsWith('/') && cleanPath.startsWith(`${bare}/`)) {
      return true;
    }
  }

  return matchGlob(cleanPattern, cleanPath);
}
