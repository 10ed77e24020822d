import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runCli, withExitCode, type CliDeps } from '../src/commands.js';
import { clearSettingsCache } from '../src/config/settings.js';
import { ConfigurationError } from '../src/errors.js';
import { FakeRunner, noPython, type Responder } from './helpers/fake-runner.js';
import { createTempProject, type TempProject } from './helpers/project.js';

describe('CLI commands', () => {
  let project: TempProject;

  beforeEach(() => {
    clearSettingsCache();
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  function createDeps(respond?: Responder) {
    const runner = new FakeRunner(respond);
    const out = { log: vi.fn<(message: string) => void>(), error: vi.fn<(message: string) => void>() };
    const openUrl = vi.fn<(url: string) => Promise<unknown>>().mockResolvedValue(undefined);
    const deps: CliDeps = { runner, out, openUrl, interactive: false };
    return { runner, out, openUrl, deps };
  }

  function cli(deps: CliDeps, ...args: string[]) {
    return runCli(['node', 'pylaunch', ...args, '--dir', project.dir, '--python', 'python3'], deps);
  }

  describe('without an interpreter', () => {
    it('should exit with code 1 and print the error', async () => {
      const { out, runner, deps } = createDeps(noPython);

      const code = await cli(deps, 'setup', '--plain');

      expect(code).toBe(1);
      expect(out.error).toHaveBeenCalledTimes(1);
      expect(out.error).toHaveBeenCalledWith(
        'Error: Python was not found on PATH (tried: python3). Install Python 3 and make sure it is on PATH.'
      );
      expect(runner.commandLines()).toEqual(['python3 --version']);
    });

    it('should not launch or open the browser from start', async () => {
      const { openUrl, runner, deps } = createDeps(noPython);

      const code = await cli(deps, 'start', '--plain');

      expect(code).toBe(1);
      expect(openUrl).not.toHaveBeenCalled();
      expect(runner.calls).toHaveLength(1);
    });
  });

  describe('strict mode', () => {
    it("should exit with the failing command's code", async () => {
      const { out, openUrl, deps } = createDeps((call) =>
        call.args.includes('--upgrade') ? { exitCode: 2, stderr: 'network unreachable' } : undefined
      );

      const code = await cli(deps, 'start', '--plain', '--strict');

      expect(code).toBe(2);
      expect(out.error).toHaveBeenCalledWith(
        expect.stringMatching(/^Error: Step "pip" failed: .* exited with code 2\nnetwork unreachable$/)
      );
      expect(openUrl).not.toHaveBeenCalled();
    });
  });

  describe('start', () => {
    it("should open the browser, then exit with Streamlit's code", async () => {
      const { runner, openUrl, out, deps } = createDeps((call) =>
        call.args.includes('streamlit') ? { exitCode: 3 } : undefined
      );
      const launchedBeforeOpen: boolean[] = [];
      openUrl.mockImplementation(async () => {
        launchedBeforeOpen.push(runner.calls.some((call) => call.args.includes('streamlit')));
      });

      const code = await cli(deps, 'start', '--plain', '--port', '9000');

      expect(code).toBe(3);
      expect(openUrl).toHaveBeenCalledWith('http://localhost:9000');
      expect(launchedBeforeOpen).toEqual([false]);
      expect(out.log).toHaveBeenCalledWith('Starting Streamlit at http://localhost:9000');
    });

    it('should skip the browser with --no-open', async () => {
      const { openUrl, deps } = createDeps();

      const code = await cli(deps, 'start', '--plain', '--no-open');

      expect(code).toBe(0);
      expect(openUrl).not.toHaveBeenCalled();
    });

    it('should skip the browser when the settings turn it off', async () => {
      project.write('pylaunch.yaml', 'streamlit:\n  open_browser: false\n');
      const { openUrl, deps } = createDeps();

      await cli(deps, 'start', '--plain');

      expect(openUrl).not.toHaveBeenCalled();
    });

    it('should launch even when the browser cannot be opened', async () => {
      const { runner, openUrl, deps } = createDeps();
      openUrl.mockRejectedValue(new Error('no browser'));

      const code = await cli(deps, 'start', '--plain');

      expect(code).toBe(0);
      expect(runner.calls[runner.calls.length - 1]?.args.slice(0, 3)).toEqual(['-m', 'streamlit', 'run']);
    });
  });

  describe('doctor', () => {
    it('should print the report and fail when the UI script is missing', async () => {
      const { out, deps } = createDeps();

      const code = await cli(deps, 'doctor');

      expect(code).toBe(1);
      expect(out.log).toHaveBeenCalledWith(expect.stringContaining('❌ script: UI script not found:'));
    });
  });

  describe('withExitCode', () => {
    it('should return the exit code of a LauncherError', async () => {
      const out = { log: vi.fn<(message: string) => void>(), error: vi.fn<(message: string) => void>() };

      const code = await withExitCode(async () => {
        throw new ConfigurationError('Invalid configuration in pylaunch.yaml');
      }, out);

      expect(code).toBe(1);
      expect(out.error).toHaveBeenCalledWith('Error: Invalid configuration in pylaunch.yaml');
    });

    it('should return 1 for an unexpected error', async () => {
      const out = { log: vi.fn<(message: string) => void>(), error: vi.fn<(message: string) => void>() };

      const code = await withExitCode(async () => {
        throw new TypeError('boom');
      }, out);

      expect(code).toBe(1);
      expect(out.error).toHaveBeenCalledWith(expect.stringContaining('TypeError: boom'));
    });
  });
});
