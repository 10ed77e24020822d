/**
 * useBootstrap Hook
 *
 * Runs the launcher's bootstrap pipeline on mount and folds its events into
 * UI state. Unmounting aborts the command that is running. The folding itself is the pure bootstrapReducer so it can be
 * tested without rendering.
 */
import { useEffect, useReducer, useRef } from 'react';
import { LauncherError, toError } from '../../errors.js';
import type { Launcher } from '../../launcher/launcher.js';
import type { BootstrapResult, LaunchEvent, StepId } from '../../launcher/types.js';
import type { StepState } from '../components/StepList.js';

export type BootstrapPhase = 'running' | 'done' | 'failed';

export interface BootstrapNotice {
  level: 'info' | 'warning';
  text: string;
}

export interface BootstrapState {
  phase: BootstrapPhase;
  current: StepId | null;
  steps: Record<StepId, StepState>;
  notices: BootstrapNotice[];
  result: BootstrapResult | null;
  error: LauncherError | null;
}

export function initialBootstrapState(): BootstrapState {
  const pending = (): StepState => ({ status: 'pending' });
  return {
    phase: 'running',
    current: null,
    steps: {
      interpreter: pending(),
      venv: pending(),
      pip: pending(),
      requirements: pending(),
      env: pending(),
      dirs: pending(),
    },
    notices: [],
    result: null,
    error: null,
  };
}

export function bootstrapReducer(state: BootstrapState, event: LaunchEvent): BootstrapState {
  switch (event.type) {
    case 'step_start':
      return {
        ...state,
        current: event.step,
        steps: { ...state.steps, [event.step]: { status: 'running' } },
      };
    case 'step_end':
      return {
        ...state,
        current: state.current === event.step ? null : state.current,
        steps: { ...state.steps, [event.step]: { status: event.status, detail: event.detail } },
      };
    case 'info':
      return { ...state, notices: [...state.notices, { level: 'info', text: event.message }] };
    case 'warning':
      return { ...state, notices: [...state.notices, { level: 'warning', text: event.message }] };
    case 'error':
      return { ...state, phase: 'failed', current: null, error: event.error };
    case 'done':
      return { ...state, phase: 'done', current: null, result: event.result };
  }
}

export interface UseBootstrapOptions {
  onEvent?: (event: LaunchEvent) => void;
}

export function useBootstrap(launcher: Launcher, options: UseBootstrapOptions = {}): BootstrapState {
  const [state, dispatch] = useReducer(bootstrapReducer, initialBootstrapState());
  const onEventRef = useRef(options.onEvent);
  onEventRef.current = options.onEvent;

  useEffect(() => {
    let cancelled = false;
    // Ctrl+C unmounts Ink; stop whatever command is still running
    const controller = new AbortController();

    async function run() {
      for await (const event of launcher.bootstrap({ signal: controller.signal })) {
        if (cancelled) return;
        onEventRef.current?.(event);
        dispatch(event);
      }
    }

    run().catch((error: unknown) => {
      if (!cancelled) {
        const err = toError(error);
        dispatch({ type: 'error', error: new LauncherError(err.message, 1, { cause: err }) });
      }
    });

    return () => {
      cancelled = true;
      controller.abort();
    };
  }, [launcher]);

  return state;
}
