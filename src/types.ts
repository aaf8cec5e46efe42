/**
 * Core types and interfaces for the pretask runner
 */

// ============================================================================
// Task & Execution Types
// ============================================================================

/**
 * Keyword arguments handed to every task of one execution chain
 */
export type Kwargs = Record<string, unknown>;

/**
 * Plain configuration mapping, as stored by a Context or a Collection
 */
export type ContextValues = Record<string, unknown>;

export interface TaskOptions {
  name?: string;
  pre?: string[];
  aliases?: string[];
  isDefault?: boolean;
  help?: string;
  // Accepted keyword names; when omitted any keyword is accepted
  params?: string[];
}

export interface ErrorDetails {
  code: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface InvocationRecord {
  taskName: string;
  startTime: number;
  endTime?: number;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface ExecutionSummary {
  totalInvocations: number;
  completedInvocations: number;
  failedInvocations: number;
  skippedTasks: number;
  totalDurationMs: number;
  errors: Array<{ taskName: string; error: string }>;
}

// ============================================================================
// Validation Types
// ============================================================================

export interface CollectionValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface Config {
  tasks: TasksConfig;
  context: ContextValues;
  logging: LoggingConfig;
}

export interface TasksConfig {
  file: string;
  dedupe: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  file?: string;
  config?: string;
  noDedupe: boolean;
  verbose: boolean;
}
