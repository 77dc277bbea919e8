import { Command } from 'commander';
import { access, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { CONFIG_FILE_NAME, defaultConfig, serializeConfig } from '../config/defaults.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Write the default config unless one is already there. Returns whether it wrote. */
export async function writeDefaultConfig(cwd: string = process.cwd()): Promise<boolean> {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);
  if (await exists(configPath)) return false;
  await writeFile(configPath, serializeConfig(defaultConfig), 'utf-8');
  return true;
}

export const initCommand = new Command('init')
  .description(`Write a default ${CONFIG_FILE_NAME}`)
  .action(async () => {
    try {
      const created = await writeDefaultConfig();
      if (created) {
        console.log(chalk.green(`Created ${CONFIG_FILE_NAME}`));
      } else {
        console.log(chalk.dim(`${CONFIG_FILE_NAME} already exists, skipping.`));
      }
    } catch (err) {
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }

    console.log(chalk.dim('Next: autoframe analyze <recording.json>'));
  });
