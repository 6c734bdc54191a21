/**
 * HarborGate Type Definitions
 * The vocabulary shared by the policy engine and its enforcement surfaces
 */

/**
 * Security modes
 * - strict: read-only operations, no exec of any kind
 * - moderate: exec limited to the whitelist
 * - permissive: any exec command in an accessible container
 */
export type SecurityMode = 'strict' | 'moderate' | 'permissive';

/** Output categories that masking rules can be switched on for. */
export type OutputTarget = 'logs' | 'exec' | 'inspect';

export type OutputTargets = Record<OutputTarget, boolean>;

/** Global permission flags for container operations. */
export interface ContainerPermissions {
  logs: boolean;
  inspect: boolean;
  stats: boolean;
  exec: boolean;
  lifecycle: boolean;
}

/**
 * A filesystem pattern denied regardless of otherwise-successful authorization.
 * `scope` is a container name or "*" for every container.
 */
export interface BlockedPath {
  pattern: string;
  scope: string;
  source: 'manual' | 'auto-imported';
  reason: string;
  origin?: string; // file the rule was read from
  originalPath?: string;
}

export interface MaskingRule {
  pattern: RegExp;
  replacement: string;
  applyTo: OutputTargets;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface MaskingPatternConfig {
  pattern: string;
  replacement?: string;
  applyTo?: Partial<OutputTargets>;
}

export interface OutputMaskingConfig {
  enabled: boolean;
  replacement: string;
  patterns: Array<string | MaskingPatternConfig>;
  applyTo: OutputTargets;
}

export interface HostPathMaskingConfig {
  enabled: boolean;
  replacement: string;
}

export interface SettingsScanConfig {
  enabled: boolean;
  maxDepth: number;
  settingsFiles: string[];
}

export interface AutoImportConfig {
  enabled: boolean;
  workspaceRoot: string;
  scanFiles: string[];
  globalPatterns: string[];
  claudeSettings: SettingsScanConfig;
  geminiSettings: SettingsScanConfig;
}

export interface BlockedPathsConfig {
  manual: Record<string, string[]>;
  autoImport: AutoImportConfig;
}

export interface DangerousModeConfig {
  enabled: boolean;
  commands: Record<string, string[]>;
}

export interface SecurityConfig {
  mode: SecurityMode;
  allowedContainers: string[];
  permissions: ContainerPermissions;
  execWhitelist: Record<string, string[]>;
  blockedPaths: BlockedPathsConfig;
  outputMasking: OutputMaskingConfig;
  hostPathMasking: HostPathMaskingConfig;
  execDangerously: DangerousModeConfig;
}

export interface HostToolsConfig {
  enabled: boolean;
  directories: string[];
  /** Setting this switches the registry into secure mode. */
  approvedDir: string;
  stagingDirs: string[];
  common: boolean;
  allowedExtensions: string[];
  timeoutMs: number;
}

export interface HostCommandsConfig {
  enabled: boolean;
  allowedContainers: string[];
  allowedProjects: string[];
  whitelist: Record<string, string[]>;
  deny: Record<string, string[]>;
  dangerously: DangerousModeConfig;
  timeoutMs: number;
}

export interface HostAccessConfig {
  workspaceRoot: string;
  hostTools: HostToolsConfig;
  hostCommands: HostCommandsConfig;
}

export interface DockerConfig {
  socketPath?: string;
  apiVersion?: string;
  execTimeoutMs: number;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface HarborGateConfig {
  version: string;
  logLevel: LogLevel;
  security: SecurityConfig;
  docker: DockerConfig;
  hostAccess: HostAccessConfig;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Result of a command that ran to completion, whatever its exit code. */
export interface ExecResult {
  exitCode: number;
  output: string;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Outcome of an internal file listing or read inside a container. */
export type FileAccessResult =
  | { status: 'ok'; data: string }
  | { status: 'blocked'; rule: BlockedPath }
  | { status: 'error'; message: string };

export interface ToolInfo {
  name: string;
  description: string;
  usage: string;
  examples: string[];
  extension: string;
}

export type SyncStatus = 'new' | 'updated' | 'unchanged';

export interface SyncItem {
  name: string;
  description: string;
  status: SyncStatus;
  stagingPath: string;
  approvedPath: string;
}
