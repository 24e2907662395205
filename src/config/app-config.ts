/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Environment variables are read once; CLI flags override the parsed result.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import {
  DEFAULT_NAMESPACES,
  DEFAULT_PROFILES_PATH,
  DEFAULT_RETRY,
  DEFAULT_TIMEOUTS,
  KEPLER_DEFAULTS,
} from './defaults';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
  }),
  kubernetes: z.object({
    kubeconfig: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
    keplerNamespace: z.string().min(1).default(DEFAULT_NAMESPACES.kepler),
    monitoringNamespace: z.string().min(1).default(DEFAULT_NAMESPACES.monitoring),
    keplerMetricsPort: z.coerce
      .number()
      .int()
      .min(1)
      .max(65535)
      .default(KEPLER_DEFAULTS.metricsPort),
  }),
  readiness: z.object({
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.readiness),
    pollIntervalMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.readinessPoll),
  }),
  retry: z.object({
    attempts: z.coerce.number().int().min(1).max(10).default(DEFAULT_RETRY.attempts),
    delayMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY.delayMs),
  }),
  helm: z.object({
    binary: z.string().min(1).default('helm'),
    commandTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.command),
  }),
  profiles: z.object({
    path: z.string().min(1).default(DEFAULT_PROFILES_PATH),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Empty strings count as unset so `FOO= cmd` falls back to the default
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function createAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      logLevel: getEnvValue(env, 'LOG_LEVEL'),
    },
    kubernetes: {
      kubeconfig: getEnvValue(env, 'KUBECONFIG'),
      context: getEnvValue(env, 'KUBE_CONTEXT'),
      keplerNamespace: getEnvValue(env, 'KEPLER_NAMESPACE'),
      monitoringNamespace: getEnvValue(env, 'MONITORING_NAMESPACE'),
      keplerMetricsPort: getEnvValue(env, 'KEPLER_METRICS_PORT'),
    },
    readiness: {
      timeoutMs: getEnvValue(env, 'READINESS_TIMEOUT_MS'),
      pollIntervalMs: getEnvValue(env, 'READINESS_POLL_INTERVAL_MS'),
    },
    retry: {
      attempts: getEnvValue(env, 'RETRY_ATTEMPTS'),
      delayMs: getEnvValue(env, 'RETRY_DELAY_MS'),
    },
    helm: {
      binary: getEnvValue(env, 'HELM_BINARY'),
      commandTimeoutMs: getEnvValue(env, 'HELM_TIMEOUT_MS'),
    },
    profiles: {
      path: getEnvValue(env, 'MACHINE_PROFILES_PATH'),
    },
  };

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}

export interface ConfigOverrides {
  kubeconfig?: string;
  context?: string;
  logLevel?: string;
  profilesPath?: string;
}

/**
 * Apply CLI flag overrides on top of an environment-derived config
 */
export function withOverrides(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  let logLevel = config.server.logLevel;
  if (overrides.logLevel !== undefined) {
    const parsed = LogLevelSchema.safeParse(overrides.logLevel);
    if (!parsed.success) {
      throw new ValidationError(`Invalid log level: ${overrides.logLevel}`, [
        { field: 'server.logLevel', message: parsed.error.issues[0]?.message ?? 'invalid value' },
      ]);
    }
    logLevel = parsed.data;
  }

  return {
    ...config,
    server: {
      ...config.server,
      logLevel,
    },
    kubernetes: {
      ...config.kubernetes,
      kubeconfig: overrides.kubeconfig ?? config.kubernetes.kubeconfig,
      context: overrides.context ?? config.kubernetes.context,
    },
    profiles: {
      path: overrides.profilesPath ?? config.profiles.path,
    },
  };
}

/**
 * Get a summary of the configuration for logging
 */
export function getConfigSummary(config: AppConfig): Record<string, unknown> {
  return {
    nodeEnv: config.server.nodeEnv,
    logLevel: config.server.logLevel,
    kubeContext: config.kubernetes.context ?? '(current)',
    keplerNamespace: config.kubernetes.keplerNamespace,
    monitoringNamespace: config.kubernetes.monitoringNamespace,
    readinessTimeoutMs: config.readiness.timeoutMs,
    retryAttempts: config.retry.attempts,
  };
}
