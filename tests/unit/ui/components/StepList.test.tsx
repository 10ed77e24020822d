/**
 * StepList Component Tests
 */
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { StepList } from '../../../../src/ui/components/StepList.js';
import { initialBootstrapState } from '../../../../src/ui/hooks/useBootstrap.js';

describe('StepList', () => {
  it('renders every step label in order', () => {
    const { lastFrame } = render(<StepList steps={initialBootstrapState().steps} />);
    const frame = lastFrame() ?? '';

    const labels = [
      'Find Python interpreter',
      'Create or reuse virtual environment',
      'Upgrade pip',
      'Install requirements',
      'Check .env file',
      'Prepare data directories',
    ];
    const positions = labels.map((label) => frame.indexOf(label));
    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('shows marks and details for finished steps', () => {
    const steps = {
      ...initialBootstrapState().steps,
      interpreter: { status: 'ok' as const, detail: 'python3 (Python 3.12.1)' },
      venv: { status: 'skipped' as const, detail: 'reusing /srv/app/.venv' },
      pip: { status: 'failed' as const, detail: 'exit code 2' },
    };

    const { lastFrame } = render(<StepList steps={steps} />);
    const frame = lastFrame() ?? '';

    expect(frame).toContain('✔');
    expect(frame).toContain('· python3 (Python 3.12.1)');
    expect(frame).toContain('(skipped)');
    expect(frame).toContain('· reusing /srv/app/.venv');
    expect(frame).toContain('✖');
    expect(frame).toContain('· exit code 2');
  });

  it('marks the running step', () => {
    const steps = { ...initialBootstrapState().steps, requirements: { status: 'running' as const } };

    const { lastFrame } = render(<StepList steps={steps} />);

    expect(lastFrame()).toContain('›');
  });
});
