import { describe, it, expect } from 'vitest';
import { StreamlitConfigSchema } from '../../src/config/schema.js';
import { appUrl, streamlitArgs } from '../../src/launcher/streamlit.js';

describe('streamlitArgs', () => {
  it('should pass the default server options', () => {
    const config = StreamlitConfigSchema.parse({});

    expect(streamlitArgs('/srv/app/ui/web.py', config)).toEqual([
      '-m',
      'streamlit',
      'run',
      '/srv/app/ui/web.py',
      '--server.port',
      '8501',
      '--server.headless',
      'true',
      '--browser.gatherUsageStats',
      'false',
      '--client.toolbarMode',
      'viewer',
    ]);
  });

  it('should append the address and extra arguments', () => {
    const config = StreamlitConfigSchema.parse({
      port: 9000,
      headless: false,
      address: '0.0.0.0',
      extra_args: ['--theme.base', 'dark'],
    });

    expect(streamlitArgs('ui/web.py', config).slice(4)).toEqual([
      '--server.port',
      '9000',
      '--server.headless',
      'false',
      '--browser.gatherUsageStats',
      'false',
      '--client.toolbarMode',
      'viewer',
      '--server.address',
      '0.0.0.0',
      '--theme.base',
      'dark',
    ]);
  });
});

describe('appUrl', () => {
  it('should use localhost unless an address is set', () => {
    expect(appUrl(StreamlitConfigSchema.parse({}))).toBe('http://localhost:8501');
    expect(appUrl(StreamlitConfigSchema.parse({ address: '0.0.0.0', port: 9000 }))).toBe('http://localhost:9000');
    expect(appUrl(StreamlitConfigSchema.parse({ address: '192.168.1.20' }))).toBe('http://192.168.1.20:8501');
  });
});
