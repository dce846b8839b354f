#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line front end for the fisheye → equirectangular converter.
 * The pipeline does the work; commands only validate arguments, follow the
 * run's status channel and print the outcome.
 */

// Loads .env and settles LOG_LEVEL before any logger is created
import { config } from './config/index.js';

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { convertCommand, type ConvertOptions } from './commands/convert.js';
import { resumeCommand } from './commands/resume.js';
import { inspectCommand } from './commands/inspect.js';

interface GlobalOptions {
  json?: boolean;
}

const program = new Command();

program
  .name('fisheye-equirect')
  .description('Convert side-by-side fisheye video to side-by-side equirectangular')
  .version('1.0.0')
  .option('--json', 'Output in JSON format');

const json = (): boolean => program.opts<GlobalOptions>().json === true;

// ============================================
// CONVERSION COMMANDS
// ============================================

program
  .command('convert <input>')
  .description('Start a new conversion')
  .option('-o, --output <dir>', 'Directory that receives the job directory (default: next to the input)')
  .option('--fov <degrees>', `Lens field of view, 1-360 (default: ${config.defaultFov})`)
  .action((input: string, options: ConvertOptions) =>
    convertCommand(input, { ...options, json: json() })
  );

program
  .command('resume <jobDir>')
  .description('Continue an interrupted conversion')
  .action((jobDir: string) => resumeCommand(jobDir, { json: json() }));

program
  .command('inspect <jobDir>')
  .description('Show the saved state of a job directory')
  .option('-v, --verbose', 'List pending chunks')
  .action((jobDir: string, options: { verbose?: boolean }) =>
    inspectCommand(jobDir, { ...options, json: json() })
  );

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('fisheye-equirect --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
