/**
 * Main export file for library consumption
 * Provides the reconciler tools, infrastructure clients and types
 */

export * from './domain/types';
export * from './errors';
export {
  createAppConfig,
  withOverrides,
  getConfigSummary,
  type AppConfig,
  type ConfigOverrides,
} from './config';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';

// Manifest Store
export * from './manifests';

// Infrastructure
export {
  CommandExecutor,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
} from './infrastructure/command-executor';
export * from './infrastructure/kubernetes';
export * from './infrastructure/helm';
export { retryTransient, isTransient, type RetryPolicy } from './shared/transient';

// Tools
export * from './tools/apply-manifest';
export * from './tools/install-chart';
export * from './tools/diagnose';

// Machine Profile Registry
export * from './profiles';
