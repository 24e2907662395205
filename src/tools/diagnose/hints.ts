/**
 * Common causes of Prometheus not scraping Kepler, and their fixes
 */

export interface Hint {
  problem: string;
  solution: string;
}

export const HINTS = {
  'label-mismatch': {
    problem: 'The ServiceMonitor selects labels that the Kepler Service does not carry.',
    solution: "Make the Service labels match the ServiceMonitor's selector.matchLabels.",
  },
  'namespace-mismatch': {
    problem: 'The ServiceMonitor lives in a namespace Prometheus does not watch.',
    solution:
      'Move the ServiceMonitor to the monitoring namespace, or set ' +
      'serviceMonitorNamespaceSelector on the Prometheus resource.',
  },
  'empty-selector': {
    problem: 'Prometheus has no serviceMonitorSelector, so it picks up no ServiceMonitor at all.',
    solution: 'Set prometheus.spec.serviceMonitorSelector: {} (or a selector matching Kepler).',
  },
  'port-mismatch': {
    problem: 'The ServiceMonitor endpoint names a port the Service does not expose.',
    solution: 'Use the name of a port declared on the Kepler Service in the ServiceMonitor endpoint.',
  },
  'no-endpoints': {
    problem: 'The Kepler Service has no ready endpoints; it points at nothing.',
    solution: "Check that the Service selector matches the Kepler pods' labels and that they are Ready.",
  },
  'pod-not-ready': {
    problem: 'Kepler pods are missing or not Ready.',
    solution: 'Inspect the DaemonSet and pod events (kubectl describe pod -n <namespace>).',
  },
  'cluster-unreachable': {
    problem: 'The Kubernetes API could not be reached.',
    solution: 'Check the kubeconfig context and network access to the API server.',
  },
} as const satisfies Record<string, Hint>;

export type HintId = keyof typeof HINTS;

export function hintFor(id: HintId): Hint {
  return HINTS[id];
}
