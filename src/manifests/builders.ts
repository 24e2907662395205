/**
 * Typed manifest construction.
 * Manifests are built as records and serialized to the wire form, never
 * assembled from interpolated YAML.
 */

import {
  API_VERSIONS,
  type KubeObject,
  type Labels,
  type Manifest,
  type NetworkPolicyPeer,
  type NetworkPolicyPort,
  type NetworkPolicySpec,
  type ServiceMonitorSpec,
  type ServiceSpec,
} from '../domain/types/manifest';

export interface ManifestMeta {
  name: string;
  namespace: string;
  labels?: Labels;
}

export function networkPolicy(
  meta: ManifestMeta,
  spec: NetworkPolicySpec,
): Manifest<NetworkPolicySpec> {
  return {
    apiVersion: API_VERSIONS.NetworkPolicy,
    kind: 'NetworkPolicy',
    name: meta.name,
    namespace: meta.namespace,
    labels: meta.labels ?? {},
    spec,
  };
}

export function serviceMonitor(
  meta: ManifestMeta,
  spec: ServiceMonitorSpec,
): Manifest<ServiceMonitorSpec> {
  return {
    apiVersion: API_VERSIONS.ServiceMonitor,
    kind: 'ServiceMonitor',
    name: meta.name,
    namespace: meta.namespace,
    labels: meta.labels ?? {},
    spec,
  };
}

export function service(meta: ManifestMeta, spec: ServiceSpec): Manifest<ServiceSpec> {
  return {
    apiVersion: API_VERSIONS.Service,
    kind: 'Service',
    name: meta.name,
    namespace: meta.namespace,
    labels: meta.labels ?? {},
    spec,
  };
}

/**
 * Serialize to the API object; a JSON round-trip drops undefined members so
 * the result compares equal to what the API server echoes back.
 */
export function toKubeObject(manifest: Manifest): KubeObject {
  const metadata: KubeObject['metadata'] = {
    name: manifest.name,
    namespace: manifest.namespace,
  };
  if (Object.keys(manifest.labels).length > 0) {
    metadata.labels = { ...manifest.labels };
  }

  return {
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    metadata,
    spec: JSON.parse(JSON.stringify(manifest.spec ?? {})),
  };
}

// Peer and port helpers

export const namespacePeer = (namespace: string): NetworkPolicyPeer => ({
  namespaceSelector: { matchLabels: { 'kubernetes.io/metadata.name': namespace } },
});

export const cidrPeer = (cidr: string): NetworkPolicyPeer => ({ ipBlock: { cidr } });

/**
 * Pods matching `labels`; with `anyNamespace` the peer spans every namespace
 */
export const podPeer = (labels: Labels, anyNamespace = false): NetworkPolicyPeer =>
  anyNamespace
    ? { namespaceSelector: {}, podSelector: { matchLabels: labels } }
    : { podSelector: { matchLabels: labels } };

export const tcp = (port: number): NetworkPolicyPort => ({ protocol: 'TCP', port });
