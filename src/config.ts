/**
 * HarborGate Default Configuration
 * Philosophy: "Secure by Default"
 */

import { HarborGateConfig } from './types';

export const CONFIG_VERSION = '1.0.0';

export const DEFAULT_MASK_REPLACEMENT = '[MASKED]';
export const DEFAULT_HOST_PATH_REPLACEMENT = '[HOST_PATH]';

/** Secret shapes masked out of container output unless the operator overrides them. */
export const DEFAULT_MASKING_PATTERNS: string[] = [
  `(?i)(password|passwd|pwd)\\s*[=:]\\s*["']?[^\\s"'\\n]+["']?`,
  `(?i)(api[_-]?key|apikey|secret[_-]?key)\\s*[=:]\\s*["']?[^\\s"'\\n]+["']?`,
  `(?i)(secret|token|credential)\\s*[=:]\\s*["']?[^\\s"'\\n]+["']?`,
  '(?i)bearer\\s+[a-zA-Z0-9._-]+',
  'sk-[a-zA-Z0-9]{20,}',
  `(?i)(aws[_-]?access[_-]?key[_-]?id|aws[_-]?secret[_-]?access[_-]?key)\\s*[=:]\\s*["']?[A-Z0-9/+=]+["']?`,
  '(?i)(postgres|mysql|mongodb|redis)://[^:]+:[^@]+@',
];

export const DEFAULT_CONFIG: HarborGateConfig = {
  version: CONFIG_VERSION,
  logLevel: 'info',

  security: {
    // Exec is limited to the whitelist; strict removes it entirely.
    mode: 'moderate',
    allowedContainers: [],
    permissions: {
      logs: true,
      inspect: true,
      stats: true,
      exec: true,
      lifecycle: false,
    },
    execWhitelist: {},
    blockedPaths: {
      manual: {},
      autoImport: {
        enabled: true,
        workspaceRoot: '.',
        scanFiles: [
          '.devcontainer/docker-compose.yml',
          '.devcontainer/devcontainer.json',
          'cli_sandbox/docker-compose.yml',
        ],
        globalPatterns: ['.env', '*.key', '*.pem', 'secrets/*'],
        claudeSettings: {
          enabled: true,
          maxDepth: 1,
          settingsFiles: ['.claude/settings.json', '.claude/settings.local.json'],
        },
        geminiSettings: {
          enabled: true,
          maxDepth: 1,
          settingsFiles: ['.aiexclude', '.geminiignore'],
        },
      },
    },
    outputMasking: {
      enabled: true,
      replacement: DEFAULT_MASK_REPLACEMENT,
      patterns: DEFAULT_MASKING_PATTERNS,
      applyTo: { logs: true, exec: true, inspect: true },
    },
    hostPathMasking: {
      enabled: true,
      replacement: DEFAULT_HOST_PATH_REPLACEMENT,
    },
    execDangerously: {
      enabled: false,
      commands: {},
    },
  },

  docker: {
    execTimeoutMs: 60_000,
  },

  hostAccess: {
    workspaceRoot: '',
    hostTools: {
      enabled: false,
      directories: ['.sandbox/host-tools'],
      approvedDir: '',
      stagingDirs: [],
      common: true,
      allowedExtensions: ['.sh', '.go', '.py'],
      timeoutMs: 60_000,
    },
    hostCommands: {
      enabled: false,
      allowedContainers: [],
      allowedProjects: [],
      whitelist: {},
      deny: {},
      dangerously: {
        enabled: false,
        commands: {},
      },
      timeoutMs: 60_000,
    },
  },
};
