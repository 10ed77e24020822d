/**
 * Header Component Tests
 */
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { Header } from '../../../../src/ui/components/Header.js';

describe('Header', () => {
  it('renders with the default title', () => {
    const { lastFrame } = render(<Header />);

    expect(lastFrame()).toContain('pylaunch');
  });

  it('renders with a custom title', () => {
    const { lastFrame } = render(<Header title="Library" />);

    expect(lastFrame()).toContain('Library');
    expect(lastFrame()).not.toContain('pylaunch');
  });

  it('renders the subtitle when given', () => {
    const { lastFrame } = render(<Header subtitle="/srv/library" />);

    expect(lastFrame()).toContain('/srv/library');
  });

  it('draws a rounded border', () => {
    const frame = render(<Header />).lastFrame() ?? '';

    expect(frame).toContain('╭');
    expect(frame).toContain('╯');
  });
});
