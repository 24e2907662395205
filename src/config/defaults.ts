/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for default values used throughout the reconciler.
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  command: 120000, // 2 minutes (helm upgrade can be slow)
  commandProbe: 5000, // 5 seconds (which / version probes)
  readiness: 300000, // 5 minutes, as `kubectl wait --timeout=300s`
  readinessPoll: 5000, // 5 seconds (between pod readiness checks)
  exec: 30000, // 30 seconds
} as const;

/**
 * Default retry policy for transport failures
 */
export const DEFAULT_RETRY = {
  attempts: 3,
  delayMs: 1000,
  backoff: 2,
  maxDelayMs: 10000,
} as const;

/**
 * Default namespaces of the monitored stack
 */
export const DEFAULT_NAMESPACES = {
  kepler: 'kepler',
  monitoring: 'monitoring',
} as const;

/**
 * Kepler exporter defaults
 */
export const KEPLER_DEFAULTS = {
  metricsPort: 9102,
  podSelector: 'app.kubernetes.io/name=kepler',
  repoName: 'kepler',
  repoURL: 'https://sustainable-computing-io.github.io/kepler-helm-chart',
  chartName: 'kepler',
  releaseName: 'kepler',
} as const;

/**
 * Prometheus (kube-prometheus) defaults
 */
export const PROMETHEUS_DEFAULTS = {
  podSelector: 'app.kubernetes.io/name=prometheus',
  container: 'prometheus',
  logTailLines: 50,
} as const;

export const DEFAULT_PROFILES_PATH = 'configs/machine_profiles.json';
