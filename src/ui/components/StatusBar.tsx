/**
 * Status Bar Component
 *
 * Bottom bar showing the current status, the URL the app will be served on,
 * and the exit hint. Displays a spinner while a step is running.
 *
 * Dependencies:
 * - @inkjs/ui: Provides the Spinner component for loading indication
 */
import { Box, Text } from 'ink';
import { Spinner } from '@inkjs/ui';

interface StatusBarProps {
  isLoading?: boolean;
  status?: string;
  appUrl?: string;
}

export function StatusBar({
  isLoading = false,
  status = 'Ready',
  appUrl = 'http://localhost:8501',
}: StatusBarProps) {
  return (
    <Box justifyContent="space-between" paddingX={1}>
      <Box gap={1}>
        {isLoading ? (
          <Spinner label={status} />
        ) : (
          <Text dimColor>{status}</Text>
        )}
      </Box>
      <Box gap={2}>
        <Text dimColor>App: {appUrl}</Text>
        <Text dimColor>Ctrl+C to quit</Text>
      </Box>
    </Box>
  );
}
