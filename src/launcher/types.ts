/**
 * Launcher Type Definitions
 *
 * The bootstrap pipeline reports progress as a stream of LaunchEvents. Both
 * the plain console reporter and the Ink UI are driven from the same stream.
 */
import type { LauncherError } from '../errors.js';
import type { PythonInterpreter } from '../python/interpreter.js';
import type { VenvLayout } from '../python/venv.js';

export type StepId = 'interpreter' | 'venv' | 'pip' | 'requirements' | 'env' | 'dirs';

export type StepStatus = 'pending' | 'running' | 'ok' | 'skipped' | 'failed';

export type FinishedStepStatus = Exclude<StepStatus, 'pending' | 'running'>;

export interface StepDefinition {
  id: StepId;
  label: string;
}

/** Bootstrap steps, in the order they run. */
export const STEPS: readonly StepDefinition[] = [
  { id: 'interpreter', label: 'Find Python interpreter' },
  { id: 'venv', label: 'Create or reuse virtual environment' },
  { id: 'pip', label: 'Upgrade pip' },
  { id: 'requirements', label: 'Install requirements' },
  { id: 'env', label: 'Check .env file' },
  { id: 'dirs', label: 'Prepare data directories' },
];

export function stepLabel(id: StepId): string {
  return STEPS.find((step) => step.id === id)?.label ?? id;
}

export interface BootstrapResult {
  interpreter: PythonInterpreter;
  venv: VenvLayout;
  venvCreated: boolean;
  /** Activated venv environment plus PYTHONPATH and .env variables */
  env: NodeJS.ProcessEnv;
  /** Steps that failed without stopping the run (non-strict mode) */
  failedSteps: StepId[];
}

export type LaunchEvent =
  | { type: 'step_start'; step: StepId }
  | { type: 'step_end'; step: StepId; status: FinishedStepStatus; detail?: string }
  | { type: 'info'; message: string }
  | { type: 'warning'; message: string }
  | { type: 'error'; error: LauncherError }
  | { type: 'done'; result: BootstrapResult };

export type LaunchEventStream = AsyncGenerator<LaunchEvent, void, unknown>;
