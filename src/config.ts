/**
 * Configuration management for the pretask runner
 */

import { parse as parseYaml } from 'yaml';
import { existsSync, readFileSync } from 'fs';
import type {
  Config,
  CLIOptions,
  ContextValues,
  LoggingConfig,
  LogLevel,
  TasksConfig,
} from './types';
import { ConfigError } from './core/errors';
import { isLogLevel } from './utils/logger';

interface PartialConfig {
  tasks?: Partial<TasksConfig>;
  context?: ContextValues;
  logging?: Partial<LoggingConfig>;
}

const DEFAULT_CONFIG_PATH = 'pretask.yaml';

const DEFAULT_CONFIG: Config = {
  tasks: {
    file: 'tasks.js',
    dedupe: true,
  },
  context: {},
  logging: {
    level: 'info',
    file: undefined,
    console: true,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Only defined values are copied, so an absent setting never overrides a
 * lower-priority source
 */
function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function mergeConfig(base: Config, patch: PartialConfig): Config {
  return {
    tasks: { ...base.tasks, ...patch.tasks },
    context: { ...base.context, ...patch.context },
    logging: { ...base.logging, ...patch.logging },
  };
}

function readSection(
  raw: Record<string, unknown>,
  key: string,
  path: string
): Record<string, unknown> | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`'${key}' must be a mapping`, { path });
  }
  return value;
}

function expectType<T>(
  value: unknown,
  check: (v: unknown) => v is T,
  field: string,
  path: string
): T | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!check(value)) {
    throw new ConfigError(`Invalid value for '${field}'`, { path, value });
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isLevel = (v: unknown): v is LogLevel => typeof v === 'string' && isLogLevel(v);

/**
 * Load configuration from a YAML file. A missing file is only an error when
 * it was asked for explicitly.
 */
function loadConfigFile(path: string, explicit: boolean): PartialConfig {
  if (!existsSync(path)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${path}`, { path });
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Could not parse config file ${path}: ${error instanceof Error ? error.message : error}`,
      { path }
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Config file must contain a mapping', { path });
  }

  const config: PartialConfig = {};

  const tasks = readSection(parsed, 'tasks', path);
  if (tasks) {
    const section: Partial<TasksConfig> = {};
    setIfDefined(section, 'file', expectType(tasks.file, isString, 'tasks.file', path));
    setIfDefined(section, 'dedupe', expectType(tasks.dedupe, isBoolean, 'tasks.dedupe', path));
    config.tasks = section;
  }

  // Context values are handed to tasks verbatim
  const context = readSection(parsed, 'context', path);
  if (context) {
    config.context = context;
  }

  const logging = readSection(parsed, 'logging', path);
  if (logging) {
    const section: Partial<LoggingConfig> = {};
    setIfDefined(section, 'level', expectType(logging.level, isLevel, 'logging.level', path));
    setIfDefined(section, 'file', expectType(logging.file, isString, 'logging.file', path));
    setIfDefined(section, 'console', expectType(logging.console, isBoolean, 'logging.console', path));
    config.logging = section;
  }

  return config;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PartialConfig {
  const tasks: Partial<TasksConfig> = {};
  const logging: Partial<LoggingConfig> = {};

  if (env.PRETASK_TASKS_FILE) {
    tasks.file = env.PRETASK_TASKS_FILE;
  }
  if (env.PRETASK_DEDUPE) {
    tasks.dedupe = !['false', '0', 'no', 'off'].includes(env.PRETASK_DEDUPE.toLowerCase());
  }

  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`Unknown LOG_LEVEL: ${env.LOG_LEVEL}`);
    }
    logging.level = level;
  }
  if (env.PRETASK_LOG_FILE) {
    logging.file = env.PRETASK_LOG_FILE;
  }

  const config: PartialConfig = {};
  if (Object.keys(tasks).length > 0) config.tasks = tasks;
  if (Object.keys(logging).length > 0) config.logging = logging;

  return config;
}

/**
 * Load and merge configuration from all sources
 * Priority (highest to lowest): CLI options > Environment > Config file > Defaults
 */
export function loadConfig(options: CLIOptions, env: NodeJS.ProcessEnv = process.env): Config {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const configPath = options.config || DEFAULT_CONFIG_PATH;
  config = mergeConfig(config, loadConfigFile(configPath, Boolean(options.config)));

  config = mergeConfig(config, loadEnvConfig(env));

  if (options.file) {
    config.tasks.file = options.file;
  }
  if (options.noDedupe) {
    config.tasks.dedupe = false;
  }
  if (options.verbose) {
    config.logging.level = 'debug';
  }

  return config;
}

/**
 * Validate configuration and return any errors
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.tasks.file.trim()) {
    errors.push('A tasks file is required (--file or PRETASK_TASKS_FILE)');
  }

  if (!isLogLevel(config.logging.level)) {
    errors.push(`Unknown log level: ${config.logging.level}`);
  }

  if (!config.logging.console && !config.logging.file) {
    errors.push('Logging needs a console or a file destination');
  }

  return errors;
}

export { DEFAULT_CONFIG };
