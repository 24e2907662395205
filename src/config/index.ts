/**
 * Configuration exports
 */

export {
  createAppConfig,
  withOverrides,
  getConfigSummary,
  type AppConfig,
  type ConfigOverrides,
} from './app-config';
export * from './defaults';
