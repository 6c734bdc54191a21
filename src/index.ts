/**
 * HarborGate - least-privilege gateway for sandboxed AI assistants
 * Public API Exports
 */

// Bootstrap
export { createGateway } from './gateway';
export type { Gateway, GatewayOptions } from './gateway';

// Core Components
export { SecurityPolicy, DANGEROUS_HINT } from './core/SecurityPolicy';
export type { Authorization, PolicySummary } from './core/SecurityPolicy';
export { ContainerGateway } from './core/ContainerGateway';
export type {
  ContainerRuntime,
  ContainerStats,
  ContainerSummary,
  ExecOptions,
  LogOptions,
} from './core/ContainerGateway';
export { HostCommandExecutor } from './core/HostCommandExecutor';
export type { HostAuthorization, HostCommandOptions } from './core/HostCommandExecutor';
export { BlockedPathIndex } from './core/BlockedPathIndex';
export { loadBlockedPaths } from './core/AutoImport';
export { matchGlob, matchCommandPattern, matchBlockedPath } from './core/PatternMatcher';
export { tokenize, splitWhitespace, findShellMetacharacter } from './core/CommandParser';
export { maskHostPathsInText } from './core/OutputMasker';
export { runProcess } from './core/ProcessRunner';
export { logger, setLogLevel, LOG_PATH, HARBORGATE_DATA_DIR } from './core/Logger';
export * from './core/errors';

// Docker
export { DockerRuntime, createDockerClient } from './docker/DockerRuntime';

// Host tools
export { HostToolRegistry } from './hosttools/HostToolRegistry';
export type { RegistryState } from './hosttools/HostToolRegistry';
export { ApprovalPipeline } from './hosttools/ApprovalPipeline';
export type { SyncReport } from './hosttools/ApprovalPipeline';
export { LineApprovalPrompter, InquirerApprovalPrompter } from './hosttools/ApprovalPrompter';
export type { ApprovalDecision, ApprovalPrompter, ApprovalRequest } from './hosttools/ApprovalPrompter';
export { parseToolHeader } from './hosttools/ToolParser';
export { projectId, validateName, compareFiles } from './hosttools/ToolStore';

// Storage
export { ConfigStore } from './storage/ConfigStore';
export { AuditLog } from './storage/AuditLog';
export type { AuditRecord, AuditSink, AuditEvent } from './storage/AuditLog';

// Configuration
export { DEFAULT_CONFIG } from './config';

// Types
export * from './types';
