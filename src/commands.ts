/**
 * CLI Commands
 *
 * Builds the commander program for `start`, `setup` and `doctor`. The process
 * concerns (real runner, browser, TTY detection, exit code) are passed in by
 * cli.ts, so the commands run the same way under test.
 *
 * Dependencies:
 * - commander: argument parsing and subcommands
 */
import { Command, InvalidArgumentError } from 'commander';
import {
  loadSettings,
  getSettingsPath,
  resolveLaunchOptions,
  type LaunchOptions,
} from './config/index.js';
import { doctorExitCode, formatReport, runDoctor } from './doctor/doctor.js';
import { LauncherError, toError } from './errors.js';
import { Launcher, runBootstrap } from './launcher/launcher.js';
import { createConsoleReporter, type ConsoleLike } from './launcher/reporter.js';
import { appUrl } from './launcher/streamlit.js';
import type { BootstrapResult } from './launcher/types.js';
import type { CommandRunner } from './process/runner.js';
import { launcherLogger } from './utils/logger.js';

export interface CliDeps {
  runner: CommandRunner;
  /** Opens a URL in the user's browser */
  openUrl: (url: string) => Promise<unknown>;
  /** Render the Ink UI instead of plain lines; false when stdout is not a terminal */
  interactive?: boolean;
  out?: ConsoleLike;
}

interface CommonOptions {
  dir: string;
  config?: string;
  python?: string;
}

interface SetupOptions extends CommonOptions {
  strict?: boolean;
  skipInstall?: boolean;
  plain?: boolean;
}

interface StartOptions extends SetupOptions {
  port?: number;
  // --no-open
  open: boolean;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function launchOptions(options: CommonOptions & Partial<StartOptions>): LaunchOptions {
  const settings = loadSettings(options.config, options.dir);
  return resolveLaunchOptions(settings, options.dir, {
    port: options.port,
    python: options.python,
    strict: options.strict,
    skipInstall: options.skipInstall,
    // Only an explicit --no-open overrides the settings file
    openBrowser: options.open === false ? false : undefined,
  });
}

/** Run a command body and turn its outcome into the process exit code. */
export async function withExitCode(body: () => Promise<number>, out: ConsoleLike = console): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof LauncherError) {
      launcherLogger.error({ error: error.message, exitCode: error.exitCode }, 'Command failed');
      out.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    const err = toError(error);
    launcherLogger.fatal({ error: err.message, stack: err.stack }, 'Unexpected failure');
    out.error(err.stack ?? err.message);
    return 1;
  }
}

async function openBrowser(url: string, deps: CliDeps): Promise<void> {
  try {
    await deps.openUrl(url);
  } catch (error) {
    // No browser is not a reason to stop; the URL is printed anyway
    launcherLogger.warn({ url, error: toError(error).message }, 'Could not open the browser');
  }
}

export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const out = deps.out ?? console;
  const program = new Command();

  async function bootstrap(launcher: Launcher, plain: boolean): Promise<BootstrapResult> {
    if (plain || !deps.interactive) {
      return runBootstrap(launcher, createConsoleReporter(out));
    }
    const { renderBootstrap } = await import('./ui/index.js');
    return renderBootstrap(launcher);
  }

  program
    .name('pylaunch')
    .description('Bootstrap a Python virtual environment and launch a Streamlit app')
    .version('1.0.0');

  program
    .command('start', { isDefault: true })
    .description('Prepare the environment, then launch the Streamlit app')
    .option('-d, --dir <path>', 'Project directory', '.')
    .option('-c, --config <path>', 'Settings file (default: nearest pylaunch.yaml)')
    .option('--python <command>', 'Python interpreter to use instead of the candidates')
    .option('-p, --port <number>', 'Port for the Streamlit server', parsePort)
    .option('--strict', 'Stop at the first failed step')
    .option('--skip-install', 'Do not upgrade pip or install requirements')
    .option('--no-open', 'Do not open the app in the browser')
    .option('--plain', 'Plain line output instead of the terminal UI')
    .action(async (options: StartOptions) => {
      const code = await withExitCode(async () => {
        const launcher = new Launcher(launchOptions(options), { runner: deps.runner });
        const result = await bootstrap(launcher, options.plain ?? false);
        const url = appUrl(launcher.options.streamlit);

        out.log(`Starting Streamlit at ${url}`);
        if (launcher.options.streamlit.open_browser) {
          await openBrowser(url, deps);
        }

        // Ctrl+C reaches Streamlit directly; wait for it to shut down
        const ignore = () => launcherLogger.info('Interrupt received, waiting for Streamlit to exit');
        process.on('SIGINT', ignore);
        try {
          return await launcher.launch(result);
        } finally {
          process.off('SIGINT', ignore);
        }
      }, out);
      setExitCode(code);
    });

  program
    .command('setup')
    .description('Prepare the environment without launching the app')
    .option('-d, --dir <path>', 'Project directory', '.')
    .option('-c, --config <path>', 'Settings file (default: nearest pylaunch.yaml)')
    .option('--python <command>', 'Python interpreter to use instead of the candidates')
    .option('--strict', 'Stop at the first failed step')
    .option('--skip-install', 'Do not upgrade pip or install requirements')
    .option('--plain', 'Plain line output instead of the terminal UI')
    .action(async (options: SetupOptions) => {
      const code = await withExitCode(async () => {
        const launcher = new Launcher(launchOptions(options), { runner: deps.runner });
        await bootstrap(launcher, options.plain ?? false);
        return 0;
      }, out);
      setExitCode(code);
    });

  program
    .command('doctor')
    .description('Check the interpreter, virtual environment and project files')
    .option('-d, --dir <path>', 'Project directory', '.')
    .option('-c, --config <path>', 'Settings file (default: nearest pylaunch.yaml)')
    .option('--python <command>', 'Python interpreter to use instead of the candidates')
    .action(async (options: CommonOptions) => {
      const code = await withExitCode(async () => {
        const checks = await runDoctor(launchOptions(options), {
          runner: deps.runner,
          settingsPath: getSettingsPath(),
        });
        out.log(formatReport(checks));
        return doctorExitCode(checks);
      }, out);
      setExitCode(code);
    });

  return program;
}

/** Parse argv (node, script, ...args), run the command, and resolve with its exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });
  await program.parseAsync([...argv]);
  return exitCode;
}
