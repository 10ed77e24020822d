/**
 * Settings Loader
 *
 * Loads and caches launcher configuration from pylaunch.yaml. Searches for the
 * file starting from the project directory up to the filesystem root. Unlike a
 * required config file, a missing pylaunch.yaml is not an error: the schema
 * defaults describe the stock project layout.
 *
 * Dependencies:
 * - yaml: YAML parser for reading configuration files
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { AppSettingsSchema, type AppSettings } from './schema.js';
import { ConfigurationError, toError } from '../errors.js';

export const DEFAULT_SETTINGS_FILENAME = 'pylaunch.yaml';

let cachedSettings: AppSettings | null = null;
let settingsPath: string | null = null;

export function findSettingsFile(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = resolve(dir, DEFAULT_SETTINGS_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export function defaultSettings(): AppSettings {
  return AppSettingsSchema.parse({});
}

function parseSettingsFile(configPath: string): unknown {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Could not read ${configPath}: ${toError(error).message}`, { cause: error });
  }

  try {
    // An empty document parses to null
    return parseYaml(content) ?? {};
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigurationError(`Could not parse ${configPath}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Load settings from an explicit path, or from the nearest pylaunch.yaml
 * above startDir. An explicit path that does not exist is an error.
 */
export function loadSettings(path?: string, startDir?: string): AppSettings {
  if (path && !existsSync(path)) {
    throw new ConfigurationError(`Configuration file not found: ${path}`);
  }

  const configPath = path ? resolve(path) : findSettingsFile(startDir);

  if (!configPath) {
    settingsPath = null;
    return defaultSettings();
  }

  if (cachedSettings && settingsPath === configPath) {
    return cachedSettings;
  }

  const raw = parseSettingsFile(configPath);
  const result = AppSettingsSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration in ${configPath}:\n${errors}`);
  }

  cachedSettings = result.data;
  settingsPath = configPath;

  return result.data;
}

export function clearSettingsCache(): void {
  cachedSettings = null;
  settingsPath = null;
}

/**
 * Get the path of the settings file last loaded, if any.
 */
export function getSettingsPath(): string | null {
  return settingsPath;
}
