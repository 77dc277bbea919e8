import { resolve } from 'node:path';
import { access, readFile } from 'node:fs/promises';
import { configSchema, type AutoframeConfig } from './config-schema.js';
import { CONFIG_FILE_NAME, defaultConfig } from './defaults.js';

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config path; a missing file is an error rather than a fallback. */
  path?: string;
}

/**
 * Load autoframe.config.json from the project root.
 * Falls back to defaults if the file is missing.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<AutoframeConfig> {
  const configPath = opts.path
    ? resolve(opts.cwd ?? process.cwd(), opts.path)
    : resolve(opts.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  try {
    await access(configPath);
  } catch {
    if (opts.path) throw new Error(`Config file not found: ${configPath}`);
    return structuredClone(defaultConfig);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to load ${CONFIG_FILE_NAME}: ${message}`);
  }

  return configSchema.parse(raw);
}
