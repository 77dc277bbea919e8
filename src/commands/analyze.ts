import { Command } from 'commander';
import { basename, extname, resolve } from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import ora from 'ora';
import chalk from 'chalk';
import type { AutoframeConfig } from '../config/config-schema.js';
import { loadConfig } from '../config/load-config.js';
import { parseRecording } from '../recording/schema.js';
import { runSmartZoom, type SmartZoomResult } from '../pipeline/smart-zoom.js';
import { describeResult } from '../pipeline/diagnostics.js';

interface AnalyzeOptions {
  out?: string;
  config?: string;
  verbose?: boolean;
}

export interface AnalyzedRecording {
  inputPath: string;
  outputPath: string;
  result: SmartZoomResult;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `demo.recording.json` -> `demo.plans.json`. */
export function plansFileName(inputPath: string): string {
  let name = basename(inputPath, extname(inputPath));
  if (name.endsWith('.recording')) name = name.slice(0, -'.recording'.length);
  return `${name}.plans.json`;
}

/** Read one recording, plan its camera, and write the plans next to `outDir`. */
export async function analyzeFile(
  inputPath: string,
  outDir: string,
  config: AutoframeConfig,
): Promise<AnalyzedRecording> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(inputPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Could not read ${inputPath}: ${errorMessage(err)}`);
  }

  const result = runSmartZoom(parseRecording(raw), config);
  const outputPath = resolve(outDir, plansFileName(inputPath));
  const plans = { scenes: result.scenes, shots: result.shots, transitions: result.transitions };
  await writeFile(outputPath, `${JSON.stringify(plans, null, 2)}\n`, 'utf-8');

  return { inputPath, outputPath, result };
}

export const analyzeCommand = new Command('analyze')
  .description('Plan camera shots and transitions for recorded sessions')
  .argument('<recordings...>', 'Recording JSON files')
  .option('--out <dir>', 'Directory for plan files', './output')
  .option('--config <path>', 'Config file (defaults to ./autoframe.config.json)')
  .option('--verbose', 'Print a per-shot breakdown')
  .action(async (recordings: string[], opts: AnalyzeOptions) => {
    let config: AutoframeConfig;
    try {
      config = await loadConfig({ path: opts.config });
    } catch (err) {
      console.error(chalk.red(errorMessage(err)));
      console.error(chalk.dim('Run "autoframe init" to write a fresh config.'));
      process.exit(1);
    }

    const outDir = resolve(opts.out ?? './output');
    await mkdir(outDir, { recursive: true });

    const spinner = ora(`Analyzing ${recordings.length} recording(s)`).start();
    const settled = await Promise.allSettled(
      recordings.map(file => analyzeFile(resolve(file), outDir, config)),
    );

    const failures = settled.filter(s => s.status === 'rejected').length;
    if (failures === 0) {
      spinner.succeed(`Analyzed ${recordings.length} recording(s)`);
    } else {
      spinner.fail(`${failures} of ${recordings.length} recording(s) failed`);
    }

    settled.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        console.error(chalk.red(`${recordings[i]}: ${errorMessage(outcome.reason)}`));
        return;
      }
      const { outputPath, result } = outcome.value;
      console.log(chalk.green(
        `${recordings[i]}: ${result.scenes.length} scenes, ${result.transitions.length} transitions -> ${outputPath}`,
      ));
      if (opts.verbose) console.log(chalk.dim(describeResult(result)));
    });

    if (failures > 0) process.exit(1);
  });
