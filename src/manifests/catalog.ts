/**
 * Built-in manifest sets for the Kepler / kube-prometheus lab stack.
 *
 * These open the exporter, Grafana and Prometheus to 0.0.0.0/0. That suits a
 * throwaway testbed cluster; the apply tool logs a warning for every such rule.
 */

import type { Manifest } from '../domain/types/manifest';
import { DEFAULT_NAMESPACES } from '../config/defaults';
import { cidrPeer, namespacePeer, networkPolicy, podPeer, tcp } from './builders';
import { ManifestStore } from './store';

const ANY_IPV4 = '0.0.0.0/0';

export interface PresetOptions {
  keplerNamespace?: string;
  monitoringNamespace?: string;
}

/**
 * Lets Prometheus and external NodePort clients reach the Kepler exporter
 */
export function keplerAccessManifests(options: PresetOptions = {}): Manifest[] {
  const keplerNamespace = options.keplerNamespace ?? DEFAULT_NAMESPACES.kepler;
  const monitoringNamespace = options.monitoringNamespace ?? DEFAULT_NAMESPACES.monitoring;

  return [
    networkPolicy(
      { name: 'allow-access-to-kepler', namespace: keplerNamespace },
      {
        podSelector: {
          matchLabels: {
            'app.kubernetes.io/component': 'exporter',
            'app.kubernetes.io/name': 'kepler',
          },
        },
        policyTypes: ['Ingress', 'Egress'],
        ingress: [{ from: [namespacePeer(monitoringNamespace), cidrPeer(ANY_IPV4)] }],
        egress: [{ to: [cidrPeer(ANY_IPV4)] }],
      },
    ),
  ];
}

/**
 * Opens Grafana to external clients and keeps Prometheus reachable from its
 * usual consumers (itself, prometheus-adapter, Grafana)
 */
export function monitoringAccessManifests(options: PresetOptions = {}): Manifest[] {
  const namespace = options.monitoringNamespace ?? DEFAULT_NAMESPACES.monitoring;

  const grafanaLabels = {
    'app.kubernetes.io/component': 'grafana',
    'app.kubernetes.io/name': 'grafana',
    'app.kubernetes.io/part-of': 'kube-prometheus',
  };

  const grafana = networkPolicy(
    {
      name: 'grafana',
      namespace,
      labels: { ...grafanaLabels, 'app.kubernetes.io/version': '12.2.0' },
    },
    {
      podSelector: { matchLabels: grafanaLabels },
      policyTypes: ['Ingress', 'Egress'],
      ingress: [
        {
          from: [cidrPeer(ANY_IPV4), podPeer({ 'app.kubernetes.io/name': 'prometheus' })],
          ports: [tcp(3000)],
        },
      ],
      egress: [{}],
    },
  );

  const prometheus = networkPolicy(
    { name: 'prometheus-k8s', namespace },
    {
      podSelector: {
        matchLabels: {
          'app.kubernetes.io/component': 'prometheus',
          'app.kubernetes.io/instance': 'k8s',
          'app.kubernetes.io/name': 'prometheus',
          'app.kubernetes.io/part-of': 'kube-prometheus',
        },
      },
      policyTypes: ['Ingress', 'Egress'],
      ingress: [
        {
          from: [podPeer({ 'app.kubernetes.io/name': 'prometheus' }, true)],
          ports: [tcp(8080), tcp(9090)],
        },
        {
          from: [podPeer({ 'app.kubernetes.io/name': 'prometheus-adapter' }, true)],
          ports: [tcp(9090)],
        },
        {
          from: [podPeer({ 'app.kubernetes.io/name': 'grafana' }, true)],
          ports: [tcp(9090)],
        },
      ],
      egress: [{ to: [{ podSelector: {} }] }],
    },
  );

  return [grafana, prometheus];
}

export const MANIFEST_PRESETS = {
  'kepler-access': keplerAccessManifests,
  'monitoring-access': monitoringAccessManifests,
} as const;

export type ManifestPresetName = keyof typeof MANIFEST_PRESETS;

export const isManifestPreset = (name: string): name is ManifestPresetName =>
  Object.prototype.hasOwnProperty.call(MANIFEST_PRESETS, name);

export function presetStore(name: ManifestPresetName, options: PresetOptions = {}): ManifestStore {
  return new ManifestStore(MANIFEST_PRESETS[name](options));
}
