import { describe, it, expect } from 'vitest';
import { InterpreterNotFoundError } from '../../src/errors.js';
import { detectInterpreter, parsePythonVersion } from '../../src/python/interpreter.js';
import { FakeRunner, noPython } from '../helpers/fake-runner.js';

describe('parsePythonVersion', () => {
  it('should read the version from the banner', () => {
    expect(parsePythonVersion('Python 3.11.4\n')).toBe('3.11.4');
  });

  it('should keep pre-release suffixes', () => {
    expect(parsePythonVersion('Python 3.13.0rc1')).toBe('3.13.0rc1');
  });

  it('should return null for unrelated output', () => {
    expect(parsePythonVersion('command not found')).toBeNull();
  });
});

describe('detectInterpreter', () => {
  it('should return the first candidate that runs', async () => {
    const runner = new FakeRunner((call) =>
      call.file === 'python3' ? { exitCode: 127 } : { stdout: 'Python 3.10.12\n' }
    );

    const interpreter = await detectInterpreter(['python3', 'python'], runner);

    expect(interpreter).toEqual({ command: 'python', file: 'python', args: [], version: '3.10.12' });
    expect(runner.commandLines()).toEqual(['python3 --version', 'python --version']);
  });

  it('should pass leading arguments of the candidate', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'Python 3.12.2' }));

    const interpreter = await detectInterpreter(['py -3'], runner);

    expect(interpreter.file).toBe('py');
    expect(interpreter.args).toEqual(['-3']);
    expect(runner.commandLines()).toEqual(['py -3 --version']);
  });

  it('should read a version printed on stderr', async () => {
    const runner = new FakeRunner(() => ({ stderr: 'Python 2.7.18' }));

    const interpreter = await detectInterpreter(['python'], runner);

    expect(interpreter.version).toBe('2.7.18');
  });

  it('should throw InterpreterNotFoundError listing the candidates', async () => {
    const runner = new FakeRunner(noPython);

    const attempt = detectInterpreter(['python3', 'python'], runner);

    await expect(attempt).rejects.toBeInstanceOf(InterpreterNotFoundError);
    await expect(attempt).rejects.toMatchObject({
      exitCode: 1,
      candidates: ['python3', 'python'],
      message: 'Python was not found on PATH (tried: python3, python). Install Python 3 and make sure it is on PATH.',
    });
  });
});
