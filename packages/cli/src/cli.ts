#!/usr/bin/env node
/**
 * CLI interface for the lifeguard lifecycle demo
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger, isResourceError, loadConfig, type LogLevelName } from '@lifeguard/core';
import { runDemo } from './demo';

const logger = createLogger('lifeguard:cli');

interface DemoCommandOptions {
  dir?: string;
  logLevel?: LogLevelName;
  color: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('lifeguard')
    .description('Deterministic resource lifecycle walkthrough')
    .version('0.1.0');

  program
    .command('demo')
    .description('Acquire, use and release files and a simulated connection')
    .option('-d, --dir <dir>', 'Directory the demo files are written to')
    .option('-l, --log-level <level>', 'Log level (error, warn, info, debug, trace)')
    .option('--no-color', 'Disable colored output')
    .action((options: DemoCommandOptions) => {
      try {
        const config = loadConfig({ workDir: options.dir, logLevel: options.logLevel });
        const summary = runDemo({ config, color: options.color });
        console.log(chalk.green(`\nDone: ${summary.queriesExecuted} queries, ${summary.liveAtEnd} live resources left`));
      } catch (error) {
        const message = isResourceError(error) ? error.getDescription() : String(error);
        logger.error(`Demo failed: ${message}`);
        console.error(chalk.red(message));
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram().parse(process.argv);
}
