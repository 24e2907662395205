/**
 * Kubernetes infrastructure - External K8s client interface
 */

export {
  type KubernetesClient,
  type KubernetesClientOptions,
  type ObjectHeader,
  type ListOptions,
  type PodSummary,
  type EndpointsSummary,
  type ExecResult,
  type LogOptions,
  createKubernetesClient,
  summarizePod,
  summarizeEndpoints,
  exitCodeFromStatus,
} from './client';
export { classifyKubernetesError, statusCodeOf } from './errors';
