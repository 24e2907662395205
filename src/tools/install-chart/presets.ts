/**
 * Built-in chart releases
 */

import { DEFAULT_NAMESPACES, DEFAULT_TIMEOUTS, KEPLER_DEFAULTS } from '../../config/defaults';
import type { ChartRelease } from './schema';

export interface ChartPresetOptions {
  namespace?: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

/**
 * Kepler exporter with a ServiceMonitor for Prometheus and a NodePort service
 */
export function keplerRelease(options: ChartPresetOptions = {}): ChartRelease {
  return {
    name: KEPLER_DEFAULTS.releaseName,
    repoName: KEPLER_DEFAULTS.repoName,
    repoURL: KEPLER_DEFAULTS.repoURL,
    chartName: KEPLER_DEFAULTS.chartName,
    namespace: options.namespace ?? DEFAULT_NAMESPACES.kepler,
    values: {
      'serviceMonitor.enabled': 'true',
      'service.type': 'NodePort',
    },
    waitCondition: {
      labelSelector: KEPLER_DEFAULTS.podSelector,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUTS.readiness,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_TIMEOUTS.readinessPoll,
    },
  };
}

export const CHART_PRESETS = {
  kepler: keplerRelease,
} as const;

export type ChartPresetName = keyof typeof CHART_PRESETS;

export const isChartPreset = (name: string): name is ChartPresetName =>
  Object.prototype.hasOwnProperty.call(CHART_PRESETS, name);
