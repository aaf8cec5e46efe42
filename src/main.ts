#!/usr/bin/env node
/**
 * pretask - run named tasks after their prerequisites
 */

import { program } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { config as loadEnv } from 'dotenv';
import type { CLIOptions, Config, Kwargs } from './types';
import { loadConfig, validateConfig } from './config';
import { initLogger, getLogger } from './utils/logger';
import { getMetrics, resetMetrics } from './utils/metrics';
import { Context } from './core/context';
import type { Collection } from './core/collection';
import { Executor } from './core/executor';
import { Validator } from './core/validator';
import { MissingResultError, toErrorDetails } from './core/errors';
import { loadTasksModule, parseKwargs } from './loader';

loadEnv();

const VERSION = '0.1.0';

interface ProgramOptions {
  file?: string;
  config?: string;
  list: boolean;
  check: boolean;
  dryRun: boolean;
  dedupe: boolean;
  set: string[];
  verbose: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function printTaskList(collection: Collection): void {
  const defaultName = collection.getDefaultTaskName();
  console.log(chalk.bold('Available tasks:\n'));

  for (const [name, task] of collection.entries()) {
    const marker = name === defaultName ? chalk.green(' (default)') : '';
    const help = task.help ? chalk.dim(`  ${task.help}`) : '';
    console.log(`  ${chalk.cyan(name)}${marker}${help}`);
    if (task.pre.length > 0) {
      console.log(chalk.dim(`      pre: ${task.pre.join(', ')}`));
    }
    if (task.aliases.length > 0) {
      console.log(chalk.dim(`      aliases: ${task.aliases.join(', ')}`));
    }
  }
}

function runCheck(collection: Collection): boolean {
  const result = new Validator().validate(collection);

  for (const warning of result.warnings) {
    console.log(chalk.yellow(`  ! ${warning}`));
  }
  for (const error of result.errors) {
    console.log(chalk.red(`  ✗ ${error}`));
  }
  if (result.valid) {
    console.log(chalk.green(`  ✓ ${collection.taskNames().length} tasks checked`));
  }
  return result.valid;
}

function runTasks(
  collection: Collection,
  config: Config,
  taskNames: string[],
  kwargs: Kwargs,
  dryRun: boolean
): void {
  const logger = getLogger();
  const executor = new Executor(collection, new Context(config.context));
  const dedupe = config.tasks.dedupe;

  for (const name of taskNames) {
    if (dryRun) {
      const plan = executor.expand(name, dedupe);
      const steps = plan.length > 0 ? plan.join(' → ') : chalk.dim('nothing to run');
      console.log(`${chalk.cyan(name || '(default)')}: ${steps}`);
      continue;
    }

    try {
      const result = executor.execute(name, kwargs, dedupe);
      logger.debug('Task returned', { task: name, resultType: typeof result });
    } catch (error) {
      // Naming a task that already ran as a prerequisite earlier in the session
      if (error instanceof MissingResultError) {
        logger.info('Task already ran this session', { task: name });
        continue;
      }
      throw error;
    }
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  program
    .name('pretask')
    .description('Run named tasks after their prerequisites, each at most once per session')
    .version(VERSION)
    .argument('[tasks...]', 'Tasks to run, in order (dotted names select namespaces)')
    .option('-f, --file <path>', 'Tasks module to load')
    .option('-c, --config <path>', 'Path to config file')
    .option('-l, --list', 'List available tasks', false)
    .option('--check', 'Validate the task collection and exit', false)
    .option('--dry-run', 'Print what would run, without running it', false)
    .option('--no-dedupe', 'Run every task of each chain, even if it already ran')
    .option('-s, --set <key=value>', 'Keyword argument handed to every task', collect, [])
    .option('-v, --verbose', 'Enable verbose logging', false)
    .parse(process.argv);

  const opts = program.opts<ProgramOptions>();

  const cliOptions: CLIOptions = {
    file: opts.file,
    config: opts.config,
    noDedupe: opts.dedupe === false,
    verbose: opts.verbose,
  };

  const config = loadConfig(cliOptions);

  initLogger({
    level: config.logging.level,
    file: config.logging.file,
    console: config.logging.console,
  });

  const logger = getLogger();

  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    console.error(chalk.red('Configuration errors:'));
    for (const error of configErrors) {
      console.error(chalk.red(`  • ${error}`));
    }
    process.exit(1);
  }

  const spinner = ora(`Loading tasks from ${config.tasks.file}...`).start();
  let collection: Collection;
  try {
    collection = await loadTasksModule(config.tasks.file);
  } catch (error) {
    spinner.fail(`Could not load ${config.tasks.file}`);
    throw error;
  }
  spinner.succeed(`Loaded ${collection.taskNames().length} tasks`);

  if (opts.list) {
    printTaskList(collection);
    return;
  }

  if (opts.check) {
    if (!runCheck(collection)) {
      process.exit(1);
    }
    return;
  }

  let taskNames = program.args;
  if (taskNames.length === 0) {
    if (collection.getDefaultTaskName() === null) {
      printTaskList(collection);
      console.error(chalk.red('\nNo task given and no default task defined'));
      process.exit(1);
    }
    taskNames = [''];
  }

  resetMetrics();
  runTasks(collection, config, taskNames, parseKwargs(opts.set), opts.dryRun);

  if (!opts.dryRun) {
    const summary = getMetrics().generateSummary();
    logger.info('Execution completed', {
      invoked: summary.totalInvocations,
      skipped: summary.skippedTasks,
      durationMs: summary.totalDurationMs,
    });
  }
}

main().catch((error: unknown) => {
  const details = toErrorDetails(error);
  getLogger().critical('Fatal error', {
    code: details.code,
    error: details.message,
    stack: error instanceof Error ? error.stack : undefined,
  });
  console.error(chalk.red('\nFatal error:'), details.message);
  process.exit(1);
});
