/**
 * Bootstrap App Component
 *
 * Root component of the terminal UI. Runs the bootstrap pipeline, reports the
 * outcome through onFinish, and exits Ink so the terminal is free for
 * Streamlit.
 */
import { useEffect } from 'react';
import { useApp } from 'ink';
import type { LauncherError } from '../errors.js';
import type { Launcher } from '../launcher/launcher.js';
import type { BootstrapResult } from '../launcher/types.js';
import { appUrl } from '../launcher/streamlit.js';
import { BootstrapScreen } from './components/index.js';
import { useBootstrap } from './hooks/index.js';
import { uiLogger } from '../utils/logger.js';

export type BootstrapOutcome = { result: BootstrapResult } | { error: LauncherError };

interface AppProps {
  launcher: Launcher;
  onFinish: (outcome: BootstrapOutcome) => void;
}

export function App({ launcher, onFinish }: AppProps) {
  const { exit } = useApp();
  const state = useBootstrap(launcher, {
    onEvent: (event) => uiLogger.debug({ event: event.type }, 'Bootstrap event'),
  });

  useEffect(() => {
    if (state.result) {
      onFinish({ result: state.result });
      exit();
    } else if (state.error) {
      uiLogger.error({ error: state.error.message }, 'Bootstrap failed');
      onFinish({ error: state.error });
      exit();
    }
  }, [state.result, state.error, onFinish, exit]);

  return (
    <BootstrapScreen
      state={state}
      projectDir={launcher.options.projectDir}
      appUrl={appUrl(launcher.options.streamlit)}
    />
  );
}
