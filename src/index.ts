/**
 * Library entry point. The CLI lives in cli.ts; everything it is built from is
 * exported here for programmatic use.
 */
export { createProgram, runCli, withExitCode, type CliDeps } from './commands.js';
export * from './config/index.js';
export * from './errors.js';
export { Launcher, runBootstrap, type LauncherDeps, type BootstrapOptions } from './launcher/launcher.js';
export { createConsoleReporter, formatEvent, type ConsoleLike } from './launcher/reporter.js';
export { streamlitArgs, appUrl } from './launcher/streamlit.js';
export * from './launcher/types.js';
export { runDoctor, formatReport, doctorExitCode, type DoctorCheck, type CheckLevel } from './doctor/doctor.js';
export {
  ExecaRunner,
  parseCommand,
  formatCommand,
  outputTail,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from './process/runner.js';
export { detectInterpreter, parsePythonVersion, type PythonInterpreter } from './python/interpreter.js';
export { venvLayout, ensureVirtualEnvironment, activationEnv, type VenvLayout } from './python/venv.js';
export { upgradePip, installRequirements, pipInstallArgs } from './python/pip.js';
export { inspectEnvFile, mergeEnv, withPythonPath } from './env/dotenv.js';
