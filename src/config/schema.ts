/**
 * Configuration Schema
 *
 * Zod validation schemas for pylaunch.yaml. Every field has a default, so an
 * empty file (or no file at all) describes the stock layout: a `.venv` beside
 * `requirements.txt`, and a Streamlit script at `ui/web.py`.
 *
 * Dependencies:
 * - zod: TypeScript-first schema validation with static type inference
 */
import { z } from 'zod';

export const PythonConfigSchema = z.object({
  // Interpreter commands tried in order; the platform default applies when unset
  candidates: z.array(z.string().trim().min(1)).min(1).optional(),
  venv_dir: z.string().min(1).default('.venv'),
  upgrade_pip: z.boolean().default(true),
  requirements: z.string().min(1).default('requirements.txt'),
  index_url: z.string().url().optional(),
});

export const AppConfigSchema = z.object({
  script: z.string().min(1).default('ui/web.py'),
  pythonpath: z.string().min(1).default('.'),
  env_file: z.string().min(1).default('.env'),
  load_env_file: z.boolean().default(true),
  ensure_dirs: z.array(z.string().min(1)).default(['data/covers']),
});

export const ToolbarModeSchema = z.enum(['auto', 'developer', 'viewer', 'minimal']);

export const StreamlitConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8501),
  headless: z.boolean().default(true),
  address: z.string().min(1).optional(),
  gather_usage_stats: z.boolean().default(false),
  toolbar_mode: ToolbarModeSchema.default('viewer'),
  extra_args: z.array(z.string()).default([]),
  // Open the app URL in the default browser once the environment is ready
  open_browser: z.boolean().default(true),
});

export const LauncherConfigSchema = z.object({
  strict: z.boolean().default(false),
});

export const AppSettingsSchema = z.object({
  python: PythonConfigSchema.default({}),
  app: AppConfigSchema.default({}),
  streamlit: StreamlitConfigSchema.default({}),
  launcher: LauncherConfigSchema.default({}),
});

export type PythonConfig = z.infer<typeof PythonConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ToolbarMode = z.infer<typeof ToolbarModeSchema>;
export type StreamlitConfig = z.infer<typeof StreamlitConfigSchema>;
export type LauncherConfig = z.infer<typeof LauncherConfigSchema>;
export type AppSettings = z.infer<typeof AppSettingsSchema>;
