/**
 * Environment File Handling
 *
 * The project's .env file is optional. When present its variables are added to
 * the child environment, but only for keys the environment does not already
 * define, so anything set in the shell wins.
 *
 * Dependencies:
 * - dotenv: .env parser (quoting, comments, `export` prefixes)
 */
import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { toError } from '../errors.js';

export interface EnvFileInfo {
  path: string;
  exists: boolean;
  variables: Record<string, string>;
  /** Why the file could not be read; variables is empty then */
  error?: string;
}

/**
 * Check for the .env file and, unless `read` is false, parse it. A file that
 * exists but cannot be read is reported through `error` instead of throwing.
 */
export function inspectEnvFile(path: string, { read = true }: { read?: boolean } = {}): EnvFileInfo {
  if (!existsSync(path)) {
    return { path, exists: false, variables: {} };
  }
  if (!read) {
    return { path, exists: true, variables: {} };
  }
  try {
    return { path, exists: true, variables: parse(readFileSync(path)) };
  } catch (error) {
    return { path, exists: true, variables: {}, error: toError(error).message };
  }
}

export function mergeEnv(base: NodeJS.ProcessEnv, variables: Record<string, string>): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  for (const [key, value] of Object.entries(variables)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return env;
}

/** PYTHONPATH is replaced, not appended to. */
export function withPythonPath(env: NodeJS.ProcessEnv, dir: string): NodeJS.ProcessEnv {
  return { ...env, PYTHONPATH: dir };
}
