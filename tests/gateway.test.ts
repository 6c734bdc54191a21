import path from 'path';
import { describe, expect, it } from 'vitest';
import { createGateway } from '../src/gateway';
import { setLogLevel } from '../src/core/Logger';
import { buildPresetConfig, InitAnswers } from '../src/cli/init';
import { ConfigStore } from '../src/storage/ConfigStore';
import { DEFAULT_CONFIG } from '../src/config';
import { PermissionDeniedError } from '../src/core/errors';
import { HarborGateConfig } from '../src/types';
import { FakeRuntime, MemoryAuditSink, summary } from './helpers';

const ANSWERS: InitAnswers = {
  mode: 'moderate',
  allowedContainers: ['web'],
  workspaceRoot: '/srv/project',
  enableHostCommands: false,
  enableHostTools: false,
  approvedDir: '~/.harborgate/tools',
};

function isolated(config: HarborGateConfig): HarborGateConfig {
  config.security.blockedPaths.autoImport.enabled = false;
  return config;
}

describe('buildPresetConfig', () => {
  it('turns exec off in strict mode', () => {
    const config = buildPresetConfig({ ...ANSWERS, mode: 'strict' });
    expect(config.security.permissions.exec).toBe(false);
    expect(config.security.execWhitelist).toEqual({});
  });

  it('gives moderate mode a read-only whitelist', () => {
    const config = buildPresetConfig(ANSWERS);
    expect(config.security.execWhitelist).toEqual({ '*': ['pwd', 'whoami', 'env', 'ps aux', 'ls *'] });
    expect(config.security.allowedContainers).toEqual(['web']);
    expect(config.hostAccess.workspaceRoot).toBe('/srv/project');
  });

  it('only keeps the approved store when host tools are enabled', () => {
    expect(buildPresetConfig(ANSWERS).hostAccess.hostTools.approvedDir).toBe('');
    const withTools = buildPresetConfig({ ...ANSWERS, enableHostTools: true });
    expect(withTools.hostAccess.hostTools).toMatchObject({ enabled: true, approvedDir: '~/.harborgate/tools' });
  });

  it('produces a valid configuration', () => {
    const config = buildPresetConfig({ ...ANSWERS, enableHostCommands: true, enableHostTools: true });
    const parsed = ConfigStore.parse(config);
    expect(parsed.hostAccess.hostCommands.whitelist).toEqual({ git: ['status', 'log *', 'diff *'] });
    expect(parsed.hostAccess.hostCommands.deny).toEqual({ git: ['push *', 'reset --hard *'] });
  });
});

describe('createGateway', () => {
  it('wires the policy into the container surface', async () => {
    const runtime = new FakeRuntime([summary('web')]);
    const audit = new MemoryAuditSink();
    const gateway = createGateway(isolated(buildPresetConfig(ANSWERS)), { runtime, audit });

    expect(await gateway.containers.exec('web', 'pwd')).toEqual({ exitCode: 0, output: '' });
    expect(runtime.execCalls).toEqual([
      { name: 'web', argv: ['pwd'], timeoutMs: DEFAULT_CONFIG.docker.execTimeoutMs },
    ]);
    await expect(gateway.containers.exec('web', 'rm -rf /')).rejects.toBeInstanceOf(PermissionDeniedError);
    await expect(gateway.containers.exec('db', 'pwd')).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(audit.decisions()).toEqual(['exec:ALLOWED', 'exec:DENIED', 'exec:DENIED']);
  });

  it('enables dangerous mode on request', () => {
    const config = isolated(buildPresetConfig(ANSWERS));
    const options = { runtime: new FakeRuntime(), audit: new MemoryAuditSink() };

    expect(createGateway(config, options).policy.describe().dangerousMode.enabled).toBe(false);
    expect(createGateway(config, { ...options, dangerously: true }).policy.describe().dangerousMode.enabled).toBe(true);
  });

  it('falls back to the working directory for host access', () => {
    const config = isolated(structuredClone(DEFAULT_CONFIG));
    config.hostAccess.hostTools.enabled = true;

    const gateway = createGateway(config, { runtime: new FakeRuntime(), audit: new MemoryAuditSink() });
    expect(gateway.hostTools.state).toBe('legacy');
    expect(gateway.hostTools.toolDirectories()).toEqual([path.join(process.cwd(), '.sandbox/host-tools')]);
  });
});

describe('setLogLevel', () => {
  it('keeps a level pinned by LOG_LEVEL', () => {
    expect(process.env.LOG_LEVEL).toBe('error');
    expect(setLogLevel('debug')).toBe('error');
  });
});
