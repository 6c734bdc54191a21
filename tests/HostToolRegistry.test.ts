import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HostToolRegistry, listToolsInDir } from '../src/hosttools/HostToolRegistry';
import { commonApprovedDir, projectApprovedDir } from '../src/hosttools/ToolStore';
import { SecurityPolicy } from '../src/core/SecurityPolicy';
import { NotFoundError, PermissionDeniedError, TimeoutError } from '../src/core/errors';
import { DEFAULT_CONFIG } from '../src/config';
import { HostToolsConfig } from '../src/types';
import { MemoryAuditSink } from './helpers';

const HELLO = '#!/bin/bash\n# Say hello\n# Usage: hello.sh <name>\necho "hello $1"\n';

describe('HostToolRegistry', () => {
  let workspace: string;
  let store: string;
  let audit: MemoryAuditSink;

  function config(overrides: Partial<HostToolsConfig> = {}): HostToolsConfig {
    return {
      ...structuredClone(DEFAULT_CONFIG.hostAccess.hostTools),
      enabled: true,
      directories: ['tools'],
      ...overrides,
    };
  }

  function registry(overrides: Partial<HostToolsConfig> = {}, devMode = false): HostToolRegistry {
    return new HostToolRegistry(config(overrides), { workspaceRoot: workspace, devMode, audit });
  }

  async function tool(dir: string, name: string, content: string): Promise<void> {
    await fs.outputFile(path.join(dir, name), content);
  }

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'harborgate-ws-'));
    store = await fs.mkdtemp(path.join(os.tmpdir(), 'harborgate-approved-'));
    audit = new MemoryAuditSink();
  });

  afterEach(async () => {
    await fs.remove(workspace);
    await fs.remove(store);
  });

  describe('state', () => {
    it('follows enabled and approvedDir', () => {
      expect(registry({ enabled: false }).state).toBe('disabled');
      expect(registry().state).toBe('legacy');
      expect(registry({ approvedDir: store }).state).toBe('secure');
    });

    it('refuses every call while disabled', async () => {
      const disabled = registry({ enabled: false });
      await expect(disabled.listTools()).rejects.toThrow('host tools are disabled');
      await expect(disabled.runTool('hello.sh')).rejects.toBeInstanceOf(PermissionDeniedError);
    });
  });

  describe('legacy mode', () => {
    beforeEach(async () => {
      const dir = path.join(workspace, 'tools');
      await tool(dir, 'hello.sh', HELLO);
      await tool(dir, '_helper.sh', '# Internal helper\n');
      await tool(dir, '.hidden.sh', '# Hidden\n');
      await tool(dir, 'notes.txt', '# Not a tool\n');
      await tool(dir, 'broken.sh', '#!/bin/bash\necho no header\n');
      await tool(dir, 'secret.sh', '# Print a token\necho "token=abc"\n');
      await tool(dir, 'fail.sh', '# Always fails\nexit 3\n');
      await tool(dir, 'slow.sh', '# Sleeps\nexec sleep 5\n');
      await tool(dir, 'where.sh', '# List the working directory\nls\n');
      await fs.ensureDir(path.join(dir, 'sub.sh'));
    });

    it('lists tools with a readable header', async () => {
      const tools = await registry().listTools();
      expect(tools.map((info) => info.name)).toEqual([
        'fail.sh',
        'hello.sh',
        'secret.sh',
        'slow.sh',
        'where.sh',
      ]);
    });

    it('describes a tool', async () => {
      expect(await registry().getToolInfo('hello.sh')).toEqual({
        name: 'hello.sh',
        description: 'Say hello',
        usage: 'hello.sh <name>',
        examples: [],
        extension: '.sh',
      });
    });

    it('runs a tool through its interpreter', async () => {
      const result = await registry().runTool('hello.sh', ['world']);
      expect(result).toEqual({ stdout: 'hello world\n', stderr: '', exitCode: 0 });
      expect(audit.events[0]).toMatchObject({
        surface: 'host-tool',
        operation: 'run',
        target: 'hello.sh',
        detail: 'world',
        decision: 'ALLOWED',
      });
    });

    it('runs with the workspace root as working directory', async () => {
      expect((await registry().runTool('where.sh')).stdout).toBe('tools\n');
    });

    it('returns non-zero exit codes', async () => {
      expect((await registry().runTool('fail.sh')).exitCode).toBe(3);
    });

    it('masks output when a policy is given', async () => {
      const security = structuredClone(DEFAULT_CONFIG.security);
      security.blockedPaths.autoImport.enabled = false;
      const masked = new HostToolRegistry(config(), { workspaceRoot: workspace, policy: new SecurityPolicy(security) });
      expect((await masked.runTool('secret.sh')).stdout).toBe('[MASKED]\n');
    });

    it('enforces the timeout', async () => {
      await expect(registry().runTool('slow.sh', [], { timeoutMs: 200 })).rejects.toBeInstanceOf(TimeoutError);
      expect(audit.decisions()).toEqual(['run:FAILED']);
    });

    it('rejects bad names and extensions', async () => {
      await expect(registry().runTool('../hello.sh')).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(registry().runTool('notes.txt')).rejects.toThrow('extension not allowed: .txt');
      await expect(registry({ allowedExtensions: ['.py'] }).runTool('hello.sh')).rejects.toThrow(
        'extension not allowed: .sh'
      );
      expect(audit.decisions()).toEqual(['run:DENIED', 'run:DENIED', 'run:DENIED']);
    });

    it('reports missing tools', async () => {
      await expect(registry().runTool('missing.sh')).rejects.toBeInstanceOf(NotFoundError);
      await expect(registry().runTool('sub.sh')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('refuses tools whose header does not parse', async () => {
      await expect(registry().runTool('broken.sh')).rejects.toBeInstanceOf(NotFoundError);
      await expect(registry().getToolInfo('broken.sh')).rejects.toThrow('tool not found: broken.sh');
    });
  });

  describe('secure mode', () => {
    it('reads the project store, then the common store', async () => {
      const secure = registry({ approvedDir: store });
      await tool(projectApprovedDir(store, workspace), 'build.sh', '# Project build\n');
      await tool(projectApprovedDir(store, workspace), 'shared.sh', '# Project override\n');
      await tool(commonApprovedDir(store), 'shared.sh', '# Common version\n');
      await tool(commonApprovedDir(store), 'lint.sh', '# Common lint\n');

      const tools = await secure.listTools();
      expect(tools.map((info) => `${info.name}: ${info.description}`)).toEqual([
        'build.sh: Project build',
        'shared.sh: Project override',
        'lint.sh: Common lint',
      ]);
    });

    it('skips the common store when disabled', async () => {
      const secure = registry({ approvedDir: store, common: false });
      expect(secure.toolDirectories()).toEqual([projectApprovedDir(store, workspace)]);
    });

    it('never serves unapproved staged tools outside dev mode', async () => {
      await tool(path.join(workspace, 'tools'), 'hello.sh', HELLO);

      await expect(registry({ approvedDir: store }).runTool('hello.sh')).rejects.toBeInstanceOf(NotFoundError);
      const dev = registry({ approvedDir: store }, true);
      expect((await dev.runTool('hello.sh', ['dev'])).stdout).toBe('hello dev\n');
    });

    it('falls back to the approved copy when the staged one has no header', async () => {
      await tool(path.join(workspace, 'tools'), 'greet.sh', '#!/bin/bash\necho staged\n');
      await tool(projectApprovedDir(store, workspace), 'greet.sh', '# Greet\necho approved\n');

      const dev = registry({ approvedDir: store }, true);
      expect((await dev.runTool('greet.sh')).stdout).toBe('approved\n');
      expect((await dev.listTools()).map((info) => info.name)).toEqual(['greet.sh']);
    });

    it('puts staging directories first in dev mode', () => {
      const dev = registry({ approvedDir: store, stagingDirs: ['stage'] }, true);
      expect(dev.toolDirectories()).toEqual([
        path.join(workspace, 'stage'),
        projectApprovedDir(store, workspace),
        commonApprovedDir(store),
      ]);
    });
  });
});

describe('listToolsInDir', () => {
  it('returns nothing for a missing directory', async () => {
    expect(await listToolsInDir(path.join(os.tmpdir(), 'harborgate-does-not-exist'), ['.sh'])).toEqual([]);
  });
});
