import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { inspectEnvFile, mergeEnv, withPythonPath } from '../../src/env/dotenv.js';
import { createTempProject, type TempProject } from '../helpers/project.js';

describe('inspectEnvFile', () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should report a missing file', () => {
    const path = join(project.dir, '.env');

    expect(inspectEnvFile(path)).toEqual({ path, exists: false, variables: {} });
  });

  it('should parse variables, skipping comments', () => {
    const path = project.write('.env', '# provider keys\nBOOKS_API_KEY=test-secret\nLIBRARY_NAME="Home shelf"\n');

    expect(inspectEnvFile(path)).toEqual({
      path,
      exists: true,
      variables: { BOOKS_API_KEY: 'test-secret', LIBRARY_NAME: 'Home shelf' },
    });
  });

  it('should not read the file when reading is turned off', () => {
    const path = project.write('.env', 'BOOKS_API_KEY=test-secret\n');

    expect(inspectEnvFile(path, { read: false })).toEqual({ path, exists: true, variables: {} });
  });

  it('should report a file that cannot be read instead of throwing', () => {
    const path = project.mkdir('.env');

    const info = inspectEnvFile(path);

    expect(info.exists).toBe(true);
    expect(info.variables).toEqual({});
    expect(info.error).toContain('EISDIR');
  });
});

describe('mergeEnv', () => {
  it('should only add keys that are not already set', () => {
    const env = mergeEnv({ LIBRARY_NAME: 'shell' }, { LIBRARY_NAME: 'file', BOOKS_API_KEY: 'test-secret' });

    expect(env).toEqual({ LIBRARY_NAME: 'shell', BOOKS_API_KEY: 'test-secret' });
  });
});

describe('withPythonPath', () => {
  it('should replace an existing PYTHONPATH', () => {
    expect(withPythonPath({ PYTHONPATH: '/elsewhere' }, '/srv/app')).toEqual({ PYTHONPATH: '/srv/app' });
  });
});
