import { Command } from 'commander';
import { resolve } from 'node:path';
import { writeFile } from 'node:fs/promises';
import { number, select } from '@inquirer/prompts';
import chalk from 'chalk';
import { loadConfig } from '../config/load-config.js';
import { CONFIG_FILE_NAME, serializeConfig } from '../config/defaults.js';
import { configSchema, type AutoframeConfig, type EasingCurve } from '../config/config-schema.js';

export type TransitionFeel = 'snappy' | 'smooth' | 'bouncy';

const feelEasings: Record<TransitionFeel, { pan: EasingCurve; zoomOut: EasingCurve; zoomIn: EasingCurve }> = {
  snappy: {
    pan: { type: 'easeOut' },
    zoomOut: { type: 'easeOut' },
    zoomIn: { type: 'easeOut' },
  },
  smooth: {
    pan: { type: 'spring', dampingRatio: 1.0, response: 0.6 },
    zoomOut: { type: 'spring', dampingRatio: 1.0, response: 0.5 },
    zoomIn: { type: 'spring', dampingRatio: 0.92, response: 0.55 },
  },
  bouncy: {
    pan: { type: 'spring', dampingRatio: 0.75, response: 0.6 },
    zoomOut: { type: 'spring', dampingRatio: 0.8, response: 0.5 },
    zoomIn: { type: 'spring', dampingRatio: 0.7, response: 0.55 },
  },
};

export interface ConfigAnswers {
  maxZoom: number;
  idleZoomDecay: number;
  minSceneDuration: number;
  feel: TransitionFeel;
}

/** Fold prompt answers into a config and re-validate the result. */
export function applyAnswers(current: AutoframeConfig, answers: ConfigAnswers): AutoframeConfig {
  const easings = feelEasings[answers.feel];
  return configSchema.parse({
    ...current,
    shot: { ...current.shot, maxZoom: answers.maxZoom, idleZoomDecay: answers.idleZoomDecay },
    segmenter: { ...current.segmenter, minSceneDuration: answers.minSceneDuration },
    transition: {
      ...current.transition,
      panEasing: easings.pan,
      zoomOutEasing: easings.zoomOut,
      zoomInEasing: easings.zoomIn,
    },
  });
}

async function askNumber(message: string, current: number, min: number, max: number): Promise<number> {
  const answer = await number({ message, default: current, min, max, step: 'any', required: true });
  return answer ?? current;
}

export const configCommand = new Command('config')
  .description('Interactively tune the most common autoframe settings')
  .action(async () => {
    let current: AutoframeConfig;
    try {
      current = await loadConfig();
    } catch (err) {
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }
    console.log(chalk.bold.underline('Autoframe Configuration\n'));

    const answers: ConfigAnswers = {
      maxZoom: await askNumber('Maximum zoom', current.shot.maxZoom, current.shot.minZoom, 8),
      idleZoomDecay: await askNumber('Idle zoom retention (0-1)', current.shot.idleZoomDecay, 0.05, 0.95),
      minSceneDuration: await askNumber('Minimum scene length (s)', current.segmenter.minSceneDuration, 0, 5),
      feel: await select({
        message: 'Transition feel',
        choices: [
          { value: 'snappy' as const, description: 'Quick eased moves, no overshoot' },
          { value: 'smooth' as const, description: 'Critically damped springs' },
          { value: 'bouncy' as const, description: 'Springs with a little overshoot' },
        ],
        default: 'smooth',
      }),
    };

    const configPath = resolve(process.cwd(), CONFIG_FILE_NAME);
    try {
      await writeFile(configPath, serializeConfig(applyAnswers(current, answers)), 'utf-8');
    } catch (err) {
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }

    console.log('');
    console.log(chalk.green(`Saved to ${configPath}`));
  });
