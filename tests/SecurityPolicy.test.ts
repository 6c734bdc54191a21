import { describe, expect, it } from 'vitest';
import { DANGEROUS_HINT, SecurityPolicy } from '../src/core/SecurityPolicy';
import { PermissionDeniedError } from '../src/core/errors';
import { DEFAULT_CONFIG } from '../src/config';
import { SecurityConfig } from '../src/types';

function securityConfig(overrides: Partial<SecurityConfig> = {}): SecurityConfig {
  const config = structuredClone(DEFAULT_CONFIG.security);
  config.blockedPaths.autoImport.enabled = false;
  config.blockedPaths.manual = { web: ['/app/private/*'] };
  config.execWhitelist = { web: ['npm test', 'ls *'], '*': ['pwd'] };
  config.execDangerously = { enabled: false, commands: { web: ['cat', 'tail'] } };
  return { ...config, ...overrides };
}

function denial(auth: ReturnType<SecurityPolicy['canExec']>): PermissionDeniedError {
  if (auth.allowed) {
    throw new Error('expected a denial');
  }
  return auth.error;
}

describe('SecurityPolicy', () => {
  describe('canAccessContainer', () => {
    it('allows every container when the list is empty', () => {
      const policy = new SecurityPolicy(securityConfig({ allowedContainers: [] }));
      expect(policy.canAccessContainer('anything')).toBe(true);
    });

    it('matches names and globs', () => {
      const policy = new SecurityPolicy(securityConfig({ allowedContainers: ['app-*', 'db'] }));
      expect(policy.canAccessContainer('app-web')).toBe(true);
      expect(policy.canAccessContainer('db')).toBe(true);
      expect(policy.canAccessContainer('cache')).toBe(false);
    });
  });

  describe('canExec', () => {
    const policy = new SecurityPolicy(securityConfig());

    it('allows whitelisted commands verbatim', () => {
      expect(policy.canExec('web', 'npm test').allowed).toBe(true);
      expect(policy.canExec('web', 'ls -la /app').allowed).toBe(true);
    });

    it('denies any one-character difference', () => {
      expect(policy.canExec('web', 'npm test ').allowed).toBe(false);
      expect(policy.canExec('web', 'npm tests').allowed).toBe(false);
      expect(policy.canExec('web', ' npm test').allowed).toBe(false);
    });

    it('falls back to the * whitelist', () => {
      expect(policy.canExec('db', 'pwd').allowed).toBe(true);
      expect(policy.canExec('db', 'ls -la').allowed).toBe(false);
    });

    it('reports the rejected command', () => {
      const error = denial(policy.canExec('web', 'whoami'));
      expect(error.message).toBe('command not whitelisted: whoami');
      expect(error.rule).toBe('whoami');
      expect(error.code).toBe('PERMISSION_DENIED');
    });

    it('denies everything in strict mode', () => {
      const strict = new SecurityPolicy(securityConfig({ mode: 'strict' }));
      expect(denial(strict.canExec('web', 'npm test')).message).toBe('exec is not allowed in strict mode');
    });

    it('allows anything in permissive mode', () => {
      const permissive = new SecurityPolicy(securityConfig({ mode: 'permissive' }));
      expect(permissive.canExec('web', 'rm -rf /tmp/x').allowed).toBe(true);
    });

    it('checks the exec permission and container list first', () => {
      const config = securityConfig({ mode: 'permissive', allowedContainers: ['web'] });
      config.permissions.exec = false;
      expect(denial(new SecurityPolicy(config).canExec('web', 'pwd')).message).toBe(
        'exec is disabled in security policy'
      );

      const restricted = new SecurityPolicy(securityConfig({ mode: 'permissive', allowedContainers: ['web'] }));
      expect(denial(restricted.canExec('db', 'pwd')).message).toBe('container not in allowed list: db');
    });
  });

  describe('dangerous mode', () => {
    const policy = new SecurityPolicy(securityConfig());
    const dangerous = policy.withDangerousMode();

    it('does not let canExec run a dangerous-only command', () => {
      expect(policy.canExec('web', 'cat /etc/hosts').allowed).toBe(false);
      expect(dangerous.canExec('web', 'cat /etc/hosts').allowed).toBe(false);
    });

    it('hints at dangerous mode only when it is enabled', () => {
      expect(denial(policy.canExec('web', 'cat /etc/hosts')).hint).toBeUndefined();
      const error = denial(dangerous.canExec('web', 'cat /etc/hosts'));
      expect(error.hint).toBe(DANGEROUS_HINT);
      expect(error.message).toBe(`command not whitelisted: cat /etc/hosts (hint: ${DANGEROUS_HINT})`);
    });

    it('denies the dangerous path unless enabled', () => {
      expect(denial(policy.canExecDangerously('web', 'cat /etc/hosts')).message).toBe(
        'dangerous mode is not enabled in security policy'
      );
      expect(dangerous.canExecDangerously('web', 'cat /etc/hosts').allowed).toBe(true);
    });

    it('leaves the original policy untouched', () => {
      expect(policy.describe().dangerousMode.enabled).toBe(false);
      expect(dangerous.describe().dangerousMode.enabled).toBe(true);
    });

    it('only runs listed commands', () => {
      expect(denial(dangerous.canExecDangerously('web', 'rm /tmp/x')).message).toBe(
        "command 'rm' is not in the dangerous command list for container 'web'"
      );
      expect(dangerous.canExecDangerously('db', 'cat /etc/hosts').allowed).toBe(false);
    });

    it.each([
      ['cat a | grep b', '|'],
      ['cat a; rm -rf /', ';'],
      ['cat `whoami`', '`'],
      ['cat $(id)', '$('],
      ['cat a && tail b', '&'],
      ['cat a || tail b', '|'],
      ['cat a > /tmp/out', '>'],
    ])('rejects shell meta-characters in %s', (command, meta) => {
      const error = denial(dangerous.canExecDangerously('web', command));
      expect(error.rule).toBe(meta);
    });

    it('rejects path traversal', () => {
      expect(denial(dangerous.canExecDangerously('web', 'cat /app/../etc/shadow')).rule).toBe('..');
    });

    it('rejects unparseable commands', () => {
      expect(dangerous.canExecDangerously('web', 'cat "/app/log').allowed).toBe(false);
    });

    it('refuses blocked path arguments', () => {
      const privateFile = denial(dangerous.canExecDangerously('web', 'tail -n 5 /app/private/key.txt'));
      expect(privateFile.message).toBe('path is blocked: /app/private/key.txt (reason: manual_block)');

      const envFile = denial(dangerous.canExecDangerously('web', 'cat /app/.env'));
      expect(envFile.rule).toMatchObject({ pattern: '.env', scope: '*', reason: 'global_pattern' });
    });

    it('checks bare file names and option values against blocked paths', () => {
      expect(denial(dangerous.canExecDangerously('web', 'cat server.key')).message).toBe(
        'path is blocked: server.key (reason: global_pattern)'
      );
      expect(denial(dangerous.canExecDangerously('web', 'tail --file=id.pem')).message).toBe(
        'path is blocked: id.pem (reason: global_pattern)'
      );
      expect(policy.isPathBlocked('web', 'server.key')?.pattern).toBe('*.key');
    });

    it('is never available in strict mode', () => {
      const strict = new SecurityPolicy(securityConfig({ mode: 'strict' })).withDangerousMode();
      expect(denial(strict.canExecDangerously('web', 'cat /etc/hosts')).message).toBe(
        'dangerous exec is not allowed in strict mode'
      );
    });
  });

  describe('lifecycle', () => {
    it('is disabled by default', () => {
      const policy = new SecurityPolicy(securityConfig());
      expect(denial(policy.canLifecycle('web')).message).toBe('lifecycle operations are disabled in security policy');
    });

    it('is allowed outside strict mode when enabled', () => {
      const config = securityConfig();
      config.permissions.lifecycle = true;
      expect(new SecurityPolicy(config).canLifecycle('web').allowed).toBe(true);
      expect(new SecurityPolicy({ ...config, mode: 'strict' }).canLifecycle('web').allowed).toBe(false);
    });
  });

  describe('paths and masking', () => {
    const policy = new SecurityPolicy(securityConfig());

    it('applies container rules only to their container', () => {
      expect(policy.isPathBlocked('web', '/app/private/a')?.reason).toBe('manual_block');
      expect(policy.isPathBlocked('db', '/app/private/a')).toBeUndefined();
      expect(policy.isPathBlocked('db', '/srv/tls/server.key')?.reason).toBe('global_pattern');
    });

    it('masks only flagged targets', () => {
      const config = securityConfig();
      config.outputMasking.applyTo = { logs: false, exec: true, inspect: true };
      const masked = new SecurityPolicy(config);
      expect(masked.maskOutput('password=hunter2', 'exec')).toBe('[MASKED]');
      expect(masked.maskOutput('password=hunter2', 'logs')).toBe('password=hunter2');
    });

    it('masks host home directories', () => {
      expect(policy.maskHostPaths('/home/alice/project')).toBe('[HOST_PATH]/project');
    });
  });

  describe('immutability', () => {
    it('is unaffected by later changes to its configuration', () => {
      const config = securityConfig();
      const policy = new SecurityPolicy(config);
      config.execWhitelist.web.push('whoami');
      config.mode = 'permissive';

      expect(policy.mode).toBe('moderate');
      expect(policy.canExec('web', 'whoami').allowed).toBe(false);
      expect(Object.isFrozen(policy)).toBe(true);
    });
  });

  describe('introspection', () => {
    const policy = new SecurityPolicy(securityConfig());

    it('merges container and * command lists', () => {
      expect(policy.getAllowedCommands('web')).toEqual(['npm test', 'ls *', 'pwd']);
      expect(policy.getAllowedCommands('*')).toEqual(['pwd']);
      expect(policy.getDangerousCommands('web')).toEqual(['cat', 'tail']);
      expect(policy.getDangerousCommands('db')).toEqual([]);
    });

    it('summarizes the policy', () => {
      const summary = policy.describe();
      expect(summary.mode).toBe('moderate');
      expect(summary.blockedPathCount).toBe(5);
      expect(summary.outputMasking).toEqual({ enabled: true, patternCount: 7 });
      expect(summary.hostPathMasking).toBe(true);
    });

    it('accepts precomputed blocked paths', () => {
      const custom = new SecurityPolicy(securityConfig(), {
        blockedPaths: [{ pattern: '/data/*', scope: '*', source: 'manual', reason: 'manual_block' }],
      });
      expect(custom.getBlockedPaths().map((entry) => entry.pattern)).toEqual(['/data/*']);
      expect(custom.isPathBlocked('web', '/app/.env')).toBeUndefined();
    });
  });
});
