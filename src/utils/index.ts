/**
 * Utility modules export
 */

export { Logger, initLogger, getLogger, isLogLevel } from './logger';
export type { LoggerConfig } from './logger';
export { MetricsCollector, getMetrics, resetMetrics } from './metrics';
