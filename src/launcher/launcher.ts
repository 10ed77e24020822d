/**
 * Launcher
 *
 * Runs the bootstrap pipeline strictly in order (interpreter, venv, pip,
 * requirements, .env, data directories) and then hands the terminal to
 * Streamlit. A missing interpreter always stops the run. Other step failures
 * are reported as warnings and the run continues, unless strict mode is on.
 */
import { existsSync, mkdirSync } from 'node:fs';
import type { LaunchOptions } from '../config/options.js';
import { LauncherError, StepFailedError, toError } from '../errors.js';
import { inspectEnvFile, mergeEnv, withPythonPath } from '../env/dotenv.js';
import { detectInterpreter, type PythonInterpreter } from '../python/interpreter.js';
import { installRequirements, upgradePip } from '../python/pip.js';
import { activationEnv, ensureVirtualEnvironment } from '../python/venv.js';
import { outputTail, type CommandRunner } from '../process/runner.js';
import { launcherLogger } from '../utils/logger.js';
import { streamlitArgs } from './streamlit.js';
import type { BootstrapResult, LaunchEvent, LaunchEventStream, StepId } from './types.js';

export interface LauncherDeps {
  runner: CommandRunner;
  /** Environment the child processes start from. Defaults to process.env. */
  baseEnv?: NodeJS.ProcessEnv;
}

export interface BootstrapOptions {
  /** Aborting stops the running command and ends the run with "Setup interrupted". */
  signal?: AbortSignal;
}

export class Launcher {
  constructor(
    readonly options: LaunchOptions,
    private readonly deps: LauncherDeps
  ) {}

  /**
   * Report a failed step. Yields the events and returns true when the run
   * must stop.
   */
  private *stepFailed(
    step: StepId,
    failure: { command: string; exitCode: number; stderr: string },
    failedSteps: StepId[]
  ): Generator<LaunchEvent, boolean, unknown> {
    const output = outputTail(failure.stderr);
    const error = new StepFailedError(step, failure.command, failure.exitCode, output);
    launcherLogger.error({ step, command: failure.command, exitCode: failure.exitCode, stderr: output }, 'Step failed');
    yield { type: 'step_end', step, status: 'failed', detail: `exit code ${failure.exitCode}` };

    if (this.options.strict) {
      yield { type: 'error', error };
      return true;
    }

    failedSteps.push(step);
    const message = `${error.summary}; continuing`;
    yield { type: 'warning', message: output ? `${message}\n${output}` : message };
    return false;
  }

  async *bootstrap(options: BootstrapOptions = {}): LaunchEventStream {
    try {
      yield* this.runSteps(options.signal);
    } catch (error) {
      const err = toError(error);
      launcherLogger.error({ error: err.message, stack: err.stack }, 'Bootstrap crashed');
      yield {
        type: 'error',
        error: err instanceof LauncherError ? err : new LauncherError(err.message, 1, { cause: err }),
      };
    }
  }

  private async *runSteps(signal?: AbortSignal): LaunchEventStream {
    const { options } = this;
    const { runner } = this.deps;
    const baseEnv = this.deps.baseEnv ?? process.env;
    const failedSteps: StepId[] = [];

    launcherLogger.info({ projectDir: options.projectDir, strict: options.strict }, 'Bootstrap started');

    // Interpreter
    yield { type: 'step_start', step: 'interpreter' };
    let interpreter: PythonInterpreter;
    try {
      interpreter = await detectInterpreter(options.candidates, runner, baseEnv);
    } catch (error) {
      const err = error instanceof LauncherError ? error : new LauncherError(toError(error).message);
      yield { type: 'step_end', step: 'interpreter', status: 'failed', detail: 'not found' };
      yield { type: 'error', error: err };
      return;
    }
    yield {
      type: 'step_end',
      step: 'interpreter',
      status: 'ok',
      detail: interpreter.version ? `${interpreter.command} (Python ${interpreter.version})` : interpreter.command,
    };

    // Virtual environment
    yield { type: 'step_start', step: 'venv' };
    const venv = await ensureVirtualEnvironment(interpreter, options.venvDir, runner, {
      platform: options.platform,
      cwd: options.projectDir,
      env: baseEnv,
      signal,
    });
    if (signal?.aborted) {
      yield interrupted();
      return;
    }
    if (venv.failure) {
      if (yield* this.stepFailed('venv', venv.failure, failedSteps)) return;
    } else {
      yield {
        type: 'step_end',
        step: 'venv',
        status: venv.created ? 'ok' : 'skipped',
        detail: venv.created ? `created ${options.venvDir}` : `reusing ${options.venvDir}`,
      };
    }

    const activated = activationEnv(venv.layout, baseEnv, options.platform);
    const pipOptions = { cwd: options.projectDir, env: activated, signal };

    // pip upgrade
    yield { type: 'step_start', step: 'pip' };
    if (options.skipInstall || !options.upgradePip) {
      yield { type: 'step_end', step: 'pip', status: 'skipped' };
    } else {
      const outcome = await upgradePip(venv.layout.python, runner, pipOptions);
      if (signal?.aborted) {
        yield interrupted();
        return;
      }
      if (outcome.exitCode !== 0) {
        if (yield* this.stepFailed('pip', outcome, failedSteps)) return;
      } else {
        yield { type: 'step_end', step: 'pip', status: 'ok' };
      }
    }

    // requirements
    yield { type: 'step_start', step: 'requirements' };
    if (options.skipInstall) {
      yield { type: 'step_end', step: 'requirements', status: 'skipped' };
    } else if (!existsSync(options.requirementsFile)) {
      yield { type: 'step_end', step: 'requirements', status: 'skipped', detail: 'no requirements file' };
      yield { type: 'warning', message: `Requirements file not found: ${options.requirementsFile}` };
    } else {
      const outcome = await installRequirements(venv.layout.python, options.requirementsFile, runner, {
        ...pipOptions,
        indexUrl: options.indexUrl,
      });
      if (signal?.aborted) {
        yield interrupted();
        return;
      }
      if (outcome.exitCode !== 0) {
        if (yield* this.stepFailed('requirements', outcome, failedSteps)) return;
      } else {
        yield { type: 'step_end', step: 'requirements', status: 'ok' };
      }
    }

    // .env
    yield { type: 'step_start', step: 'env' };
    const envFile = inspectEnvFile(options.envFile, { read: options.loadEnvFile });
    let env = activated;
    if (envFile.error) {
      launcherLogger.warn({ envFile: options.envFile, error: envFile.error }, 'Could not read .env file');
      yield { type: 'info', message: `Found ${options.envFile}` };
      yield { type: 'warning', message: `Could not read ${options.envFile}: ${envFile.error}; continuing without it` };
      yield { type: 'step_end', step: 'env', status: 'ok' };
    } else if (envFile.exists) {
      if (options.loadEnvFile) {
        env = mergeEnv(env, envFile.variables);
        const count = Object.keys(envFile.variables).length;
        yield { type: 'info', message: `Found ${options.envFile}; loaded ${count} variable(s)` };
      } else {
        yield { type: 'info', message: `Found ${options.envFile}` };
      }
      yield { type: 'step_end', step: 'env', status: 'ok' };
    } else {
      yield { type: 'step_end', step: 'env', status: 'skipped', detail: 'no .env file' };
    }
    env = withPythonPath(env, options.pythonPath);

    // data directories
    yield { type: 'step_start', step: 'dirs' };
    if (options.ensureDirs.length === 0) {
      yield { type: 'step_end', step: 'dirs', status: 'skipped' };
    } else {
      for (const dir of options.ensureDirs) {
        mkdirSync(dir, { recursive: true });
      }
      yield { type: 'step_end', step: 'dirs', status: 'ok' };
    }

    launcherLogger.info({ failedSteps }, 'Bootstrap finished');

    const result: BootstrapResult = {
      interpreter,
      venv: venv.layout,
      venvCreated: venv.created,
      env,
      failedSteps,
    };
    yield { type: 'done', result };
  }

  /**
   * Start Streamlit in the foreground with the terminal attached. Resolves
   * with Streamlit's exit code once it stops.
   */
  async launch(result: BootstrapResult): Promise<number> {
    const args = streamlitArgs(this.options.script, this.options.streamlit);
    launcherLogger.info({ python: result.venv.python, args }, 'Launching Streamlit');

    const outcome = await this.deps.runner.run(result.venv.python, args, {
      cwd: this.options.projectDir,
      env: result.env,
      stdio: 'inherit',
    });

    launcherLogger.info({ exitCode: outcome.exitCode }, 'Streamlit exited');
    return outcome.exitCode;
  }
}

function interrupted(): LaunchEvent {
  launcherLogger.warn('Bootstrap interrupted');
  return { type: 'error', error: new LauncherError('Setup interrupted', 130) };
}

/**
 * Drain a bootstrap event stream, forwarding each event. Resolves with the
 * result, or rejects with the error that stopped the run.
 */
export async function runBootstrap(
  launcher: Launcher,
  onEvent?: (event: LaunchEvent) => void
): Promise<BootstrapResult> {
  for await (const event of launcher.bootstrap()) {
    onEvent?.(event);
    if (event.type === 'error') throw event.error;
    if (event.type === 'done') return event.result;
  }
  throw new LauncherError('Bootstrap ended without a result');
}
