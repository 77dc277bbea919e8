#!/usr/bin/env node

import { Command } from 'commander';
import { VERSION } from '../src/version.js';
import { analyzeCommand } from '../src/commands/analyze.js';
import { initCommand } from '../src/commands/init.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('autoframe')
  .description('Plan automatic camera zoom and pan for screen recordings')
  .version(VERSION);

program.addCommand(analyzeCommand);
program.addCommand(initCommand);
program.addCommand(configCommand);

program.parse();
