/**
 * HarborGate Tool Store
 * Layout of the approved tool store and the file helpers around it
 *
 *   <approved-root>/_common/<files>
 *   <approved-root>/<project-id>/{.project, <files>}
 */

import { createHash } from 'crypto';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { HostToolsConfig, SyncStatus } from '../types';
import { PermissionDeniedError } from '../core/errors';

export const COMMON_DIR_NAME = '_common';
export const PROJECT_MARKER = '.project';

/**
 * Stable identifier for a workspace: its sanitised directory name plus the
 * first 8 hex digits of the SHA-256 of its absolute path.
 */
export function projectId(workspacePath: string): string {
  const absolute = path.resolve(workspacePath);
  const name = path.basename(absolute).replace(/[^A-Za-z0-9_-]/g, '') || 'project';
  const digest = createHash('sha256').update(absolute).digest('hex');
  return `${name}-${digest.slice(0, 8)}`;
}

export function expandHome(dir: string): string {
  if (dir === '~') {
    return os.homedir();
  }
  if (dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return dir;
}

export function resolveApprovedRoot(approvedDir: string): string {
  return path.resolve(expandHome(approvedDir));
}

export function projectApprovedDir(approvedDir: string, workspacePath: string): string {
  return path.join(resolveApprovedRoot(approvedDir), projectId(workspacePath));
}

export function commonApprovedDir(approvedDir: string): string {
  return path.join(resolveApprovedRoot(approvedDir), COMMON_DIR_NAME);
}

/** Resolve a configured directory against the workspace root. */
export function resolveWorkspaceDir(workspaceRoot: string, dir: string): string {
  const expanded = expandHome(dir);
  return path.isAbsolute(expanded) ? expanded : path.join(workspaceRoot, expanded);
}

/** Where unapproved tools are written: `stagingDirs`, else `directories`. */
export function stagingDirectories(config: HostToolsConfig, workspaceRoot: string): string[] {
  const dirs = config.stagingDirs.length > 0 ? config.stagingDirs : config.directories;
  return dirs.map((dir) => resolveWorkspaceDir(workspaceRoot, dir));
}

/**
 * Tool names are bare file names: no separators, no traversal.
 */
export function validateName(name: string): void {
  if (name === '') {
    throw new PermissionDeniedError('empty tool name');
  }
  if (name.includes('/') || name.includes('\\') || name.includes('..')) {
    throw new PermissionDeniedError(`invalid tool name (path traversal): ${name}`, { rule: name });
  }
}

async function sha256File(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return createHash('sha256').update(content).digest('hex');
}

/**
 * `new` when nothing is approved yet, `updated` when sizes differ or the
 * digests do, otherwise `unchanged`.
 */
export async function compareFiles(stagingPath: string, approvedPath: string): Promise<SyncStatus> {
  if (!(await fs.pathExists(approvedPath))) {
    return 'new';
  }

  const [staging, approved] = await Promise.all([fs.stat(stagingPath), fs.stat(approvedPath)]);
  if (staging.size !== approved.size) {
    return 'updated';
  }

  const [stagingHash, approvedHash] = await Promise.all([sha256File(stagingPath), sha256File(approvedPath)]);
  return stagingHash === approvedHash ? 'unchanged' : 'updated';
}

/** Copy a file, creating parent directories and keeping its mode. */
export async function copyTool(source: string, destination: string): Promise<void> {
  const { mode } = await fs.stat(source);
  await fs.ensureDir(path.dirname(destination));
  await fs.copyFile(source, destination);
  await fs.chmod(destination, mode);
}

export async function writeProjectMarker(projectDir: string, workspacePath: string): Promise<void> {
  await fs.writeJson(path.join(projectDir, PROJECT_MARKER), { workspace: path.resolve(workspacePath) }, { spaces: 2 });
}
