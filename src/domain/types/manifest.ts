/**
 * Manifest types - declarative target state for one cluster object
 */

export type Labels = Record<string, string>;

export interface LabelSelectorRequirement {
  key: string;
  operator: 'In' | 'NotIn' | 'Exists' | 'DoesNotExist';
  values?: string[];
}

export interface LabelSelector {
  matchLabels?: Labels;
  matchExpressions?: LabelSelectorRequirement[];
}

/**
 * Identity of a manifest within a target set
 */
export interface ObjectRef {
  kind: string;
  namespace: string;
  name: string;
}

export interface Manifest<S = unknown> extends ObjectRef {
  apiVersion: string;
  labels: Labels;
  spec: S;
}

/**
 * Wire form as sent to and returned by the API server
 */
export interface KubeObject {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Labels;
    annotations?: Record<string, string>;
    resourceVersion?: string;
    uid?: string;
  };
  spec?: unknown;
  status?: unknown;
}

export const refKey = (ref: ObjectRef): string => `${ref.namespace}/${ref.kind}/${ref.name}`;

export const describeRef = (ref: ObjectRef): string =>
  `${ref.kind} ${ref.namespace}/${ref.name}`;

// ===== NetworkPolicy =====

export type Protocol = 'TCP' | 'UDP' | 'SCTP';

export interface NetworkPolicyPort {
  protocol?: Protocol;
  port?: number | string;
  endPort?: number;
}

export interface IPBlock {
  cidr: string;
  except?: string[];
}

export interface NetworkPolicyPeer {
  namespaceSelector?: LabelSelector;
  podSelector?: LabelSelector;
  ipBlock?: IPBlock;
}

export interface NetworkPolicyIngressRule {
  from?: NetworkPolicyPeer[];
  ports?: NetworkPolicyPort[];
}

export interface NetworkPolicyEgressRule {
  to?: NetworkPolicyPeer[];
  ports?: NetworkPolicyPort[];
}

export interface NetworkPolicySpec {
  podSelector: LabelSelector;
  policyTypes?: Array<'Ingress' | 'Egress'>;
  ingress?: NetworkPolicyIngressRule[];
  egress?: NetworkPolicyEgressRule[];
}

/**
 * Direction-agnostic view of one NetworkPolicy rule
 */
export interface SelectorRule {
  direction: 'ingress' | 'egress';
  peers: NetworkPolicyPeer[];
  ports: NetworkPolicyPort[];
}

// ===== ServiceMonitor (prometheus-operator) =====

export interface ServiceMonitorEndpoint {
  port?: string;
  targetPort?: number | string;
  path?: string;
  interval?: string;
  scheme?: 'http' | 'https';
}

export interface ServiceMonitorSpec {
  selector: LabelSelector;
  namespaceSelector?: { any?: boolean; matchNames?: string[] };
  endpoints: ServiceMonitorEndpoint[];
  jobLabel?: string;
}

// ===== Service =====

export interface ServicePort {
  name?: string;
  port: number;
  targetPort?: number | string;
  nodePort?: number;
  protocol?: Protocol;
}

export interface ServiceSpec {
  type?: 'ClusterIP' | 'NodePort' | 'LoadBalancer' | 'ExternalName';
  selector?: Labels;
  ports: ServicePort[];
}

export const API_VERSIONS = {
  NetworkPolicy: 'networking.k8s.io/v1',
  ServiceMonitor: 'monitoring.coreos.com/v1',
  Service: 'v1',
} as const;

export type KnownKind = keyof typeof API_VERSIONS;
