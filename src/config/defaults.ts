import { configSchema, type AutoframeConfig } from './config-schema.js';

export const CONFIG_FILE_NAME = 'autoframe.config.json';

export const defaultConfig: AutoframeConfig = configSchema.parse({});

export function serializeConfig(config: AutoframeConfig): string {
  return `${JSON.stringify(config, null, 2)}\n`;
}
