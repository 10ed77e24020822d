/**
 * Launch Options
 *
 * Resolves validated settings plus command line overrides into absolute paths
 * and concrete values. Everything downstream of the CLI works from
 * LaunchOptions and never reads settings directly.
 */
import { resolve } from 'node:path';
import type { AppSettings, StreamlitConfig } from './schema.js';

export interface LaunchOptions {
  projectDir: string;
  platform: NodeJS.Platform;
  candidates: string[];
  venvDir: string;
  upgradePip: boolean;
  requirementsFile: string;
  indexUrl?: string;
  script: string;
  pythonPath: string;
  envFile: string;
  loadEnvFile: boolean;
  ensureDirs: string[];
  streamlit: StreamlitConfig;
  strict: boolean;
  skipInstall: boolean;
}

export interface LaunchOverrides {
  port?: number;
  python?: string;
  strict?: boolean;
  skipInstall?: boolean;
  openBrowser?: boolean;
  platform?: NodeJS.Platform;
}

export function defaultCandidates(platform: NodeJS.Platform): string[] {
  if (platform === 'win32') {
    return ['python', 'py -3', 'python3'];
  }
  return ['python3', 'python'];
}

export function resolveLaunchOptions(
  settings: AppSettings,
  projectDir: string,
  overrides: LaunchOverrides = {}
): LaunchOptions {
  const root = resolve(projectDir);
  const platform = overrides.platform ?? process.platform;
  const at = (p: string) => resolve(root, p);

  const candidates = overrides.python
    ? [overrides.python]
    : settings.python.candidates ?? defaultCandidates(platform);

  return {
    projectDir: root,
    platform,
    candidates,
    venvDir: at(settings.python.venv_dir),
    upgradePip: settings.python.upgrade_pip,
    requirementsFile: at(settings.python.requirements),
    indexUrl: settings.python.index_url,
    script: at(settings.app.script),
    pythonPath: at(settings.app.pythonpath),
    envFile: at(settings.app.env_file),
    loadEnvFile: settings.app.load_env_file,
    ensureDirs: settings.app.ensure_dirs.map(at),
    streamlit: {
      ...settings.streamlit,
      port: overrides.port ?? settings.streamlit.port,
      open_browser: overrides.openBrowser ?? settings.streamlit.open_browser,
    },
    strict: overrides.strict ?? settings.launcher.strict,
    skipInstall: overrides.skipInstall ?? false,
  };
}
