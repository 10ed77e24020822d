/**
 * Bootstrap Screen Component
 *
 * Displayed while the environment is prepared: the step list, any notices
 * raised along the way, and a status bar. On failure the error replaces the
 * status bar.
 */
import { Box, Text } from 'ink';
import { stepLabel } from '../../launcher/types.js';
import type { BootstrapState } from '../hooks/useBootstrap.js';
import { Header } from './Header.js';
import { StatusBar } from './StatusBar.js';
import { StepList } from './StepList.js';

interface BootstrapScreenProps {
  state: BootstrapState;
  projectDir?: string;
  appUrl?: string;
}

export function BootstrapScreen({ state, projectDir, appUrl }: BootstrapScreenProps) {
  const status =
    state.phase === 'done'
      ? 'Environment ready, starting Streamlit'
      : state.current
        ? stepLabel(state.current)
        : 'Preparing';

  return (
    <Box flexDirection="column">
      <Header subtitle={projectDir} />
      <StepList steps={state.steps} />
      {state.notices.length > 0 ? (
        <Box flexDirection="column" paddingX={1} marginTop={1}>
          {state.notices.map((notice, index) => (
            <Text key={index} color={notice.level === 'warning' ? 'yellow' : undefined}>
              {notice.level === 'warning' ? '! ' : 'i '}
              {notice.text}
            </Text>
          ))}
        </Box>
      ) : null}
      {state.error ? (
        <Box flexDirection="column" paddingX={1} marginTop={1}>
          <Text color="red" bold>
            Setup Failed
          </Text>
          <Text color="red">{state.error.message}</Text>
        </Box>
      ) : (
        <Box marginTop={1}>
          <StatusBar isLoading={state.phase === 'running'} status={status} appUrl={appUrl} />
        </Box>
      )}
    </Box>
  );
}
