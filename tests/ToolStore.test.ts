import { createHash } from 'crypto';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  commonApprovedDir,
  compareFiles,
  copyTool,
  expandHome,
  projectApprovedDir,
  projectId,
  stagingDirectories,
  validateName,
  writeProjectMarker,
} from '../src/hosttools/ToolStore';
import { PermissionDeniedError } from '../src/core/errors';
import { DEFAULT_CONFIG } from '../src/config';

describe('projectId', () => {
  it('combines the sanitised directory name with a path digest', () => {
    const digest = createHash('sha256').update('/work/my app!').digest('hex').slice(0, 8);
    expect(projectId('/work/my app!')).toBe(`myapp-${digest}`);
  });

  it('is stable per path and distinct across paths', () => {
    expect(projectId('/a/site')).toBe(projectId('/a/site'));
    expect(projectId('/a/site')).not.toBe(projectId('/b/site'));
  });

  it('falls back to a generic name', () => {
    expect(projectId('/')).toMatch(/^project-[0-9a-f]{8}$/);
  });
});

describe('store layout', () => {
  it('places project and common directories under the approved root', () => {
    expect(projectApprovedDir('/store', '/work/site')).toBe(path.join('/store', projectId('/work/site')));
    expect(commonApprovedDir('/store')).toBe(path.join('/store', '_common'));
  });

  it('expands the home directory', () => {
    expect(expandHome('~/tools')).toBe(path.join(os.homedir(), 'tools'));
    expect(expandHome('/abs')).toBe('/abs');
  });

  it('prefers stagingDirs over directories', () => {
    const config = structuredClone(DEFAULT_CONFIG.hostAccess.hostTools);
    expect(stagingDirectories(config, '/ws')).toEqual(['/ws/.sandbox/host-tools']);
    config.stagingDirs = ['/abs/stage', 'rel'];
    expect(stagingDirectories(config, '/ws')).toEqual(['/abs/stage', '/ws/rel']);
  });
});

describe('validateName', () => {
  it('accepts bare file names', () => {
    expect(() => validateName('tool.sh')).not.toThrow();
  });

  it.each(['', '../x', 'a/b', 'a\\b', '..'])('rejects %j', (name) => {
    expect(() => validateName(name)).toThrow(PermissionDeniedError);
  });
});

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'harborgate-store-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  async function write(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.outputFile(file, content);
    return file;
  }

  it('compares by size and digest', async () => {
    const staged = await write('staged.sh', 'abc');

    expect(await compareFiles(staged, path.join(dir, 'missing.sh'))).toBe('new');
    expect(await compareFiles(staged, await write('same.sh', 'abc'))).toBe('unchanged');
    expect(await compareFiles(staged, await write('longer.sh', 'abcd'))).toBe('updated');
    expect(await compareFiles(staged, await write('differs.sh', 'abd'))).toBe('updated');
  });

  it('copies tools with their mode', async () => {
    const source = await write('run.sh', '# Run\n');
    await fs.chmod(source, 0o750);
    const destination = path.join(dir, 'approved/nested/run.sh');

    await copyTool(source, destination);
    expect(await fs.readFile(destination, 'utf8')).toBe('# Run\n');
    expect((await fs.stat(destination)).mode & 0o777).toBe(0o750);
  });

  it('records the workspace in the project marker', async () => {
    await writeProjectMarker(dir, '/work/site');
    expect(await fs.readJson(path.join(dir, '.project'))).toEqual({ workspace: '/work/site' });
  });
});
