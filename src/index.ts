/**
 * pretask - public API
 */

export * from './core';
export * from './utils';
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config';
export { loadTasksModule, parseKwargs } from './loader';
export type * from './types';
