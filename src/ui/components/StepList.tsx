/**
 * Step List Component
 *
 * One row per bootstrap step: a status mark, the step label, and the detail
 * reported when the step finished.
 */
import { Box, Text } from 'ink';
import { STEPS, type StepId, type StepStatus } from '../../launcher/types.js';

export interface StepState {
  status: StepStatus;
  detail?: string;
}

interface StepListProps {
  steps: Record<StepId, StepState>;
}

const MARKS: Record<StepStatus, { mark: string; color?: string }> = {
  pending: { mark: '○' },
  running: { mark: '›', color: 'cyan' },
  ok: { mark: '✔', color: 'green' },
  skipped: { mark: '–', color: 'yellow' },
  failed: { mark: '✖', color: 'red' },
};

function StepRow({ label, state }: { label: string; state: StepState }) {
  const { mark, color } = MARKS[state.status];
  return (
    <Box gap={1}>
      <Text color={color} dimColor={state.status === 'pending'}>
        {mark}
      </Text>
      <Text dimColor={state.status === 'pending'} bold={state.status === 'running'}>
        {label}
      </Text>
      {state.status === 'skipped' ? <Text dimColor>(skipped)</Text> : null}
      {state.detail ? <Text dimColor>· {state.detail}</Text> : null}
    </Box>
  );
}

export function StepList({ steps }: StepListProps) {
  return (
    <Box flexDirection="column" paddingX={1}>
      {STEPS.map((step) => (
        <StepRow key={step.id} label={step.label} state={steps[step.id]} />
      ))}
    </Box>
  );
}
