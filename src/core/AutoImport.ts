/**
 * HarborGate Blocked Path Auto-Import
 * Derives blocked paths from compose files, devcontainer.json and AI-tool settings
 */

import fs from 'fs-extra';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { BlockedPath, BlockedPathsConfig, SettingsScanConfig } from '../types';
import { logger } from './Logger';
import { errorMessage } from './errors';
import { matchGlob } from './PatternMatcher';

const CONFIG_ORIGIN = 'harborgate.json';

const SKIPPED_DIRS = new Set(['node_modules', 'vendor', '__pycache__']);

const COMPOSE_FILE_NAMES = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml'];

const DEVCONTAINER_DEV_NULL = /source=\/dev\/null[^"]*target=([^,"]+)/g;
const DEVCONTAINER_TMPFS = /type=(?:tmpfs|volume)[^"]*target=([^,"]+)/g;
const CLAUDE_READ_DENY = /^Read\(([^)]+)\)$/;

type ParseFn = (filePath: string, containers: readonly string[]) => BlockedPath[];

function matchesContainer(segment: string, containers: readonly string[]): boolean {
  return containers.some((container) =>
    container.includes('*') ? matchGlob(container, segment) : segment === container
  );
}

/**
 * Attribute a mount target to a known container when one of its path
 * segments names one; the rest of the path becomes the pattern.
 * Unattributed targets block their basename everywhere.
 */
export function attributeMountTarget(
  target: string,
  origin: string,
  reason: string,
  containers: readonly string[]
): BlockedPath | undefined {
  const parts = target.split('/');

  for (let i = 0; i < parts.length; i++) {
    if (parts[i] && matchesContainer(parts[i], containers)) {
      const remaining = parts.slice(i + 1).join('/');
      return {
        pattern: remaining ? `/${remaining}` : '/*',
        scope: parts[i],
        source: 'auto-imported',
        reason,
        origin,
        originalPath: target,
      };
    }
  }

  const base = path.posix.basename(target);
  if (!base || base === '.' || base === '/') {
    return undefined;
  }
  return {
    pattern: base,
    scope: '*',
    source: 'auto-imported',
    reason,
    origin,
    originalPath: target,
  };
}

// ---------------------------------------------------------------------------
// Compose files
// ---------------------------------------------------------------------------

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value === undefined || value === null ? [] : [value];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseComposeFile(filePath: string, containers: readonly string[]): BlockedPath[] {
  const doc: unknown = parseYaml(fs.readFileSync(filePath, 'utf8'));
  if (!isRecord(doc) || !isRecord(doc.services)) {
    return [];
  }

  const blocked: BlockedPath[] = [];
  const add = (target: string, reason: string): void => {
    const entry = attributeMountTarget(target, filePath, reason, containers);
    if (entry) {
      blocked.push(entry);
    }
  };

  for (const service of Object.values(doc.services)) {
    if (!isRecord(service)) {
      continue;
    }

    for (const volume of asList(service.volumes)) {
      if (typeof volume === 'string') {
        if (volume.startsWith('/dev/null:')) {
          const target = volume.split(':')[1];
          if (target) {
            add(target, 'volume_mount_to_dev_null');
          }
        }
      } else if (isRecord(volume)) {
        if (volume.source === '/dev/null' && typeof volume.target === 'string') {
          add(volume.target, 'volume_mount_to_dev_null');
        } else if (volume.type === 'tmpfs' && typeof volume.target === 'string') {
          add(volume.target, 'tmpfs_mount');
        }
      }
    }

    for (const tmpfs of asList(service.tmpfs)) {
      if (typeof tmpfs === 'string') {
        add(tmpfs.split(':')[0], 'tmpfs_mount');
      }
    }
  }

  return blocked;
}

// ---------------------------------------------------------------------------
// devcontainer.json
// ---------------------------------------------------------------------------

export function parseDevcontainerFile(filePath: string, containers: readonly string[]): BlockedPath[] {
  const content = fs.readFileSync(filePath, 'utf8');
  const blocked: BlockedPath[] = [];

  const collect = (regex: RegExp, reason: string): void => {
    for (const match of content.matchAll(regex)) {
      const entry = attributeMountTarget(match[1], filePath, reason, containers);
      if (entry) {
        blocked.push(entry);
      }
    }
  };

  collect(DEVCONTAINER_DEV_NULL, 'devcontainer_bind_mount');
  collect(DEVCONTAINER_TMPFS, 'devcontainer_tmpfs_mount');
  return blocked;
}

// ---------------------------------------------------------------------------
// AI-tool settings
// ---------------------------------------------------------------------------

function convertClaudePattern(
  rawPattern: string,
  origin: string,
  containers: readonly string[]
): BlockedPath {
  const pattern = rawPattern.startsWith('./') ? rawPattern.slice(2) : rawPattern;
  const parts = pattern.split('/');

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (!part || part.includes('*')) {
      continue;
    }
    if (matchesContainer(part, containers)) {
      const remaining = parts.slice(i + 1).join('/');
      return {
        pattern: remaining || pattern,
        scope: part,
        source: 'auto-imported',
        reason: 'claude_settings_deny',
        origin,
        originalPath: pattern,
      };
    }
  }

  return {
    pattern,
    scope: '*',
    source: 'auto-imported',
    reason: 'claude_settings_deny',
    origin,
    originalPath: pattern,
  };
}

/** `permissions.deny` entries of the form `Read(<pattern>)`. */
export function parseClaudeSettingsFile(filePath: string, containers: readonly string[]): BlockedPath[] {
  const settings: unknown = fs.readJsonSync(filePath);
  if (!isRecord(settings) || !isRecord(settings.permissions)) {
    return [];
  }

  const blocked: BlockedPath[] = [];
  for (const deny of asList(settings.permissions.deny)) {
    if (typeof deny !== 'string') {
      continue;
    }
    const match = CLAUDE_READ_DENY.exec(deny);
    if (match) {
      blocked.push(convertClaudePattern(match[1], filePath, containers));
    }
  }
  return blocked;
}

/** Gitignore-style exclude file; every entry is global. */
export function parseGeminiExcludeFile(filePath: string): BlockedPath[] {
  const blocked: BlockedPath[] = [];

  for (const rawLine of fs.readFileSync(filePath, 'utf8').split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) {
      continue;
    }

    let pattern = line.endsWith('/') ? `${line}*` : line;
    if (pattern.startsWith('/')) {
      pattern = pattern.slice(1);
    }

    blocked.push({
      pattern,
      scope: '*',
      source: 'auto-imported',
      reason: 'gemini_exclude_file',
      origin: filePath,
      originalPath: line,
    });
  }

  return blocked;
}

// ---------------------------------------------------------------------------
// Scanning
// ---------------------------------------------------------------------------

function importFile(filePath: string, containers: readonly string[], parse: ParseFn): BlockedPath[] {
  try {
    const entries = parse(filePath, containers);
    logger.debug('Imported blocked paths', { file: filePath, count: entries.length });
    return entries;
  } catch (error) {
    logger.warn('Skipping unreadable blocked-path source', {
      file: filePath,
      error: errorMessage(error),
    });
    return [];
  }
}

function subdirectories(dir: string): string[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => !name.startsWith('.') && !SKIPPED_DIRS.has(name))
      .sort()
      .map((name) => path.join(dir, name));
  } catch (error) {
    logger.debug('Cannot read directory', { dir, error: errorMessage(error) });
    return [];
  }
}

/**
 * Look for settings files at the workspace root and in sub-directories up to
 * `maxDepth` levels down.
 */
export function scanSettings(
  root: string,
  settings: SettingsScanConfig,
  containers: readonly string[],
  parse: ParseFn
): BlockedPath[] {
  const found: BlockedPath[] = [];

  const visit = (dir: string, depth: number): void => {
    for (const settingsFile of settings.settingsFiles) {
      const fullPath = path.join(dir, settingsFile);
      if (fs.pathExistsSync(fullPath)) {
        found.push(...importFile(fullPath, containers, parse));
      }
    }
    if (depth < settings.maxDepth) {
      for (const sub of subdirectories(dir)) {
        visit(sub, depth + 1);
      }
    }
  };

  visit(root, 0);
  return found;
}

/**
 * Build the full blocked-path list: manual rules, global patterns, then
 * everything auto-import finds. Auto-import problems are logged and skipped.
 */
export function loadBlockedPaths(config: BlockedPathsConfig, containers: readonly string[]): BlockedPath[] {
  const entries: BlockedPath[] = [];

  for (const [scope, patterns] of Object.entries(config.manual)) {
    for (const pattern of patterns) {
      entries.push({ pattern, scope, source: 'manual', reason: 'manual_block', origin: CONFIG_ORIGIN });
    }
  }

  const autoImport = config.autoImport;
  for (const pattern of autoImport.globalPatterns) {
    entries.push({
      pattern,
      scope: '*',
      source: 'manual',
      reason: 'global_pattern',
      origin: CONFIG_ORIGIN,
    });
  }

  if (!autoImport.enabled) {
    return entries;
  }

  const root = autoImport.workspaceRoot || '.';

  for (const scanFile of autoImport.scanFiles) {
    const fullPath = path.join(root, scanFile);
    if (!fs.pathExistsSync(fullPath)) {
      continue;
    }
    const base = path.basename(scanFile);
    if (COMPOSE_FILE_NAMES.includes(base)) {
      entries.push(...importFile(fullPath, containers, parseComposeFile));
    } else if (base === 'devcontainer.json') {
      entries.push(...importFile(fullPath, containers, parseDevcontainerFile));
    } else {
      logger.warn('Unrecognised scan file, skipping', { file: fullPath });
    }
  }

  if (autoImport.claudeSettings.enabled) {
    entries.push(...scanSettings(root, autoImport.claudeSettings, containers, parseClaudeSettingsFile));
  }

  if (autoImport.geminiSettings.enabled) {
    entries.push(
      ...scanSettings(root, autoImport.geminiSettings, containers, (file) => parseGeminiExcludeFile(file))
    );
  }

  return entries;
}
