/**
 * HarborGate configuration schema
 */

import { z } from 'zod';
import { HarborGateConfig } from '../types';

const targetsSchema = z.object({
  logs: z.boolean(),
  exec: z.boolean(),
  inspect: z.boolean(),
});

const commandMapSchema = z.record(z.array(z.string()));

const settingsScanSchema = z.object({
  enabled: z.boolean(),
  maxDepth: z.number().int().min(0),
  settingsFiles: z.array(z.string()),
});

const dangerousSchema = z.object({
  enabled: z.boolean(),
  commands: commandMapSchema,
});

const securitySchema = z.object({
  mode: z.enum(['strict', 'moderate', 'permissive']),
  allowedContainers: z.array(z.string()),
  permissions: z.object({
    logs: z.boolean(),
    inspect: z.boolean(),
    stats: z.boolean(),
    exec: z.boolean(),
    lifecycle: z.boolean(),
  }),
  execWhitelist: commandMapSchema,
  blockedPaths: z.object({
    manual: commandMapSchema,
    autoImport: z.object({
      enabled: z.boolean(),
      workspaceRoot: z.string(),
      scanFiles: z.array(z.string()),
      globalPatterns: z.array(z.string()),
      claudeSettings: settingsScanSchema,
      geminiSettings: settingsScanSchema,
    }),
  }),
  outputMasking: z.object({
    enabled: z.boolean(),
    replacement: z.string(),
    patterns: z.array(
      z.union([
        z.string(),
        z.object({
          pattern: z.string(),
          replacement: z.string().optional(),
          applyTo: targetsSchema.partial().optional(),
        }),
      ])
    ),
    applyTo: targetsSchema,
  }),
  hostPathMasking: z.object({
    enabled: z.boolean(),
    replacement: z.string(),
  }),
  execDangerously: dangerousSchema,
});

const hostAccessSchema = z.object({
  workspaceRoot: z.string(),
  hostTools: z.object({
    enabled: z.boolean(),
    directories: z.array(z.string()),
    approvedDir: z.string(),
    stagingDirs: z.array(z.string()),
    common: z.boolean(),
    allowedExtensions: z.array(z.string().startsWith('.')),
    timeoutMs: z.number().int(),
  }),
  hostCommands: z.object({
    enabled: z.boolean(),
    allowedContainers: z.array(z.string()),
    allowedProjects: z.array(z.string()),
    whitelist: commandMapSchema,
    deny: commandMapSchema,
    dangerously: dangerousSchema,
    timeoutMs: z.number().int().positive(),
  }),
});

export const configSchema: z.ZodType<HarborGateConfig> = z
  .object({
    version: z.string(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    security: securitySchema,
    docker: z.object({
      socketPath: z.string().optional(),
      apiVersion: z.string().optional(),
      execTimeoutMs: z.number().int().positive(),
    }),
    hostAccess: hostAccessSchema,
  })
  .superRefine((config, ctx) => {
    const { hostTools, hostCommands, workspaceRoot } = config.hostAccess;
    if (hostTools.enabled && hostTools.timeoutMs <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hostAccess', 'hostTools', 'timeoutMs'],
        message: 'must be greater than 0 when host tools are enabled',
      });
    }
    if ((hostCommands.enabled || hostTools.enabled) && !workspaceRoot) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hostAccess', 'workspaceRoot'],
        message: 'is required when host commands or host tools are enabled',
      });
    }
  });
