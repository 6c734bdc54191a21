import { describe, expect, it } from 'vitest';
import {
  applyMasking,
  compileMaskingRules,
  compilePattern,
  createHostPathMasker,
  maskHostPathsInText,
} from '../src/core/OutputMasker';
import { DEFAULT_CONFIG } from '../src/config';
import { OutputMaskingConfig } from '../src/types';

function maskingConfig(overrides: Partial<OutputMaskingConfig> = {}): OutputMaskingConfig {
  return { ...structuredClone(DEFAULT_CONFIG.security.outputMasking), ...overrides };
}

describe('compilePattern', () => {
  it('turns a leading (?i) into the i flag', () => {
    const pattern = compilePattern('(?i)token');
    expect(pattern.flags).toBe('gi');
    expect(pattern.source).toBe('token');
  });
});

describe('default masking rules', () => {
  const rules = compileMaskingRules(maskingConfig());

  it('compiles every default pattern', () => {
    expect(rules).toHaveLength(7);
  });

  it('masks passwords, keys, bearer tokens and connection strings', () => {
    expect(applyMasking(rules, 'password=hunter2', 'exec')).toBe('[MASKED]');
    expect(applyMasking(rules, 'API_KEY: abc123 ok', 'logs')).toBe('[MASKED] ok');
    expect(applyMasking(rules, 'Authorization: Bearer abc.def', 'inspect')).toBe('Authorization: [MASKED]');
    expect(applyMasking(rules, 'postgres://user:pw@db:5432/app', 'exec')).toBe('[MASKED]db:5432/app');
    expect(applyMasking(rules, 'key sk-abcdefghijklmnopqrstuvwx', 'exec')).toBe('key [MASKED]');
  });

  it('is idempotent', () => {
    const once = applyMasking(rules, 'PASSWORD: "s3cret" and token=abc', 'exec');
    expect(applyMasking(rules, once, 'exec')).toBe(once);
  });

  it('leaves ordinary output alone', () => {
    expect(applyMasking(rules, 'total 12\ndrwxr-xr-x app', 'exec')).toBe('total 12\ndrwxr-xr-x app');
  });
});

describe('compileMaskingRules', () => {
  it('returns no rules when masking is disabled', () => {
    expect(compileMaskingRules(maskingConfig({ enabled: false }))).toEqual([]);
  });

  it('skips invalid patterns', () => {
    const rules = compileMaskingRules(maskingConfig({ patterns: ['(', 'abc'] }));
    expect(rules).toHaveLength(1);
    expect(rules[0].pattern.source).toBe('abc');
  });

  it('skips patterns that would match a replacement', () => {
    const rules = compileMaskingRules(maskingConfig({ patterns: ['MASK', 'abc'] }));
    expect(rules.map((rule) => rule.pattern.source)).toEqual(['abc']);
  });

  it('honours per-pattern replacement and targets', () => {
    const rules = compileMaskingRules(
      maskingConfig({
        patterns: [{ pattern: 'internal-\\d+', replacement: '<id>', applyTo: { logs: false } }],
      })
    );
    expect(applyMasking(rules, 'id internal-42', 'exec')).toBe('id <id>');
    expect(applyMasking(rules, 'id internal-42', 'logs')).toBe('id internal-42');
  });
});

describe('maskHostPathsInText', () => {
  it('masks the user segment of home directories', () => {
    expect(maskHostPathsInText('/Users/alice/work/app')).toBe('[HOST_PATH]/work/app');
    expect(maskHostPathsInText('/home/bob')).toBe('[HOST_PATH]');
    expect(maskHostPathsInText('C:\\Users\\carol\\dev')).toBe('[HOST_PATH]\\dev');
    expect(maskHostPathsInText('D:/Users/dan/src')).toBe('[HOST_PATH]/src');
    expect(maskHostPathsInText('/c/Users/erin/x')).toBe('[HOST_PATH]/x');
  });

  it('stops at quotes and separators', () => {
    expect(maskHostPathsInText('{"Source":"/home/dave","x":1}')).toBe('{"Source":"[HOST_PATH]","x":1}');
    expect(maskHostPathsInText('[/home/a, /home/b]')).toBe('[[HOST_PATH], [HOST_PATH]]');
  });

  it('leaves a bare prefix alone', () => {
    expect(maskHostPathsInText('cd /home/')).toBe('cd /home/');
  });

  it('uses the configured replacement or none at all', () => {
    expect(createHostPathMasker({ enabled: true, replacement: '~' })('/home/bob/x')).toBe('~/x');
    expect(createHostPathMasker({ enabled: false, replacement: '~' })('/home/bob/x')).toBe('/home/bob/x');
  });
});
