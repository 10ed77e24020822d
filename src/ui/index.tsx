/**
 * UI Entry Point
 *
 * Renders the bootstrap screen with Ink and resolves once the environment is
 * ready. Ink is unmounted before the promise settles, so Streamlit gets a
 * clean terminal.
 *
 * Dependencies:
 * - ink: React for CLIs - builds terminal UIs with React components
 */
import { render } from 'ink';
import { LauncherError } from '../errors.js';
import type { Launcher } from '../launcher/launcher.js';
import type { BootstrapResult } from '../launcher/types.js';
import { App, type BootstrapOutcome } from './app.js';
import { uiLogger } from '../utils/logger.js';

export async function renderBootstrap(launcher: Launcher): Promise<BootstrapResult> {
  const finished: { outcome?: BootstrapOutcome } = {};

  uiLogger.info('Rendering bootstrap UI');
  const instance = render(
    <App
      launcher={launcher}
      onFinish={(value) => {
        finished.outcome = value;
      }}
    />
  );
  await instance.waitUntilExit();

  // Ctrl+C unmounts Ink before the pipeline reports back
  const { outcome } = finished;
  if (!outcome) {
    throw new LauncherError('Setup interrupted', 130);
  }
  if ('error' in outcome) {
    throw outcome.error;
  }
  return outcome.result;
}
