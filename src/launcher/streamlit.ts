import type { StreamlitConfig } from '../config/schema.js';

/**
 * Arguments for `<venv python> -m streamlit run <script> ...`. Streamlit's
 * config options are passed as `--section.option value` pairs.
 */
export function streamlitArgs(script: string, config: StreamlitConfig): string[] {
  const args = [
    '-m',
    'streamlit',
    'run',
    script,
    '--server.port',
    String(config.port),
    '--server.headless',
    String(config.headless),
    '--browser.gatherUsageStats',
    String(config.gather_usage_stats),
    '--client.toolbarMode',
    config.toolbar_mode,
  ];

  if (config.address) {
    args.push('--server.address', config.address);
  }

  return [...args, ...config.extra_args];
}

export function appUrl(config: StreamlitConfig): string {
  const host = !config.address || config.address === '0.0.0.0' ? 'localhost' : config.address;
  return `http://${host}:${config.port}`;
}
