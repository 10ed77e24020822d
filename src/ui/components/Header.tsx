import { Box, Text } from 'ink';

interface HeaderProps {
  title?: string;
  subtitle?: string;
}

export function Header({ title = 'pylaunch', subtitle }: HeaderProps) {
  return (
    <Box
      borderStyle="round"
      borderColor="cyan"
      paddingX={2}
      justifyContent="space-between"
    >
      <Text bold color="cyan">
        {title}
      </Text>
      {subtitle ? <Text dimColor>{subtitle}</Text> : null}
    </Box>
  );
}
