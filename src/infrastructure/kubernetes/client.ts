/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Generic object operations through KubernetesObjectApi, plus the pod reads,
 * logs and exec calls the diagnostic checks need. Every failure leaves this
 * module as a classified ApplicationError.
 */

import { PassThrough } from 'node:stream';
import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { ErrorCodes, KubernetesError } from '../../errors';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import type { KubeObject, Labels, ObjectRef } from '../../domain/types/manifest';
import { classifyKubernetesError } from './errors';

export interface ObjectHeader extends ObjectRef {
  apiVersion: string;
}

export interface ListOptions {
  /** Omit to list across all namespaces */
  namespace?: string;
  labelSelector?: string;
}

export interface PodSummary {
  name: string;
  namespace: string;
  phase: string;
  ready: boolean;
  labels: Labels;
  containers: string[];
  restarts: number;
}

export interface EndpointsSummary {
  name: string;
  namespace: string;
  readyAddresses: number;
  notReadyAddresses: number;
  ports: Array<{ name?: string; port: number }>;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface LogOptions {
  container?: string;
  tailLines?: number;
}

export interface KubernetesClient {
  /** Resolves undefined when the object does not exist */
  readObject: (header: ObjectHeader) => Promise<KubeObject | undefined>;
  createObject: (object: KubeObject) => Promise<KubeObject>;
  replaceObject: (object: KubeObject) => Promise<KubeObject>;
  listObjects: (apiVersion: string, kind: string, options?: ListOptions) => Promise<KubeObject[]>;
  listPods: (namespace: string, labelSelector?: string) => Promise<PodSummary[]>;
  listEndpoints: (namespace: string) => Promise<EndpointsSummary[]>;
  execInPod: (
    namespace: string,
    pod: string,
    container: string | undefined,
    command: string[],
  ) => Promise<ExecResult>;
  readPodLogs: (namespace: string, pod: string, options?: LogOptions) => Promise<string>;
  ping: () => Promise<boolean>;
}

export interface KubernetesClientOptions {
  /** Path to a kubeconfig file; the default loading rules apply when absent */
  kubeconfig?: string;
  context?: string;
  execTimeoutMs?: number;
}

export function summarizePod(pod: k8s.V1Pod): PodSummary {
  const statuses = pod.status?.containerStatuses ?? [];
  const readyCondition = pod.status?.conditions?.find((c) => c.type === 'Ready');
  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? '',
    phase: pod.status?.phase ?? 'Unknown',
    ready: readyCondition?.status === 'True',
    labels: pod.metadata?.labels ?? {},
    containers: (pod.spec?.containers ?? []).map((c) => c.name),
    restarts: statuses.reduce((sum, s) => sum + s.restartCount, 0),
  };
}

export function summarizeEndpoints(endpoints: k8s.V1Endpoints): EndpointsSummary {
  const subsets = endpoints.subsets ?? [];
  return {
    name: endpoints.metadata?.name ?? '',
    namespace: endpoints.metadata?.namespace ?? '',
    readyAddresses: subsets.reduce((sum, s) => sum + (s.addresses?.length ?? 0), 0),
    notReadyAddresses: subsets.reduce((sum, s) => sum + (s.notReadyAddresses?.length ?? 0), 0),
    ports: subsets.flatMap((s) =>
      (s.ports ?? []).map((p) => (p.name ? { name: p.name, port: p.port } : { port: p.port })),
    ),
  };
}

/**
 * Exit code from the Status object the exec channel reports on completion
 */
export function exitCodeFromStatus(status: k8s.V1Status): number {
  if (status.status === 'Success') {
    return 0;
  }
  const cause = status.details?.causes?.find((c) => c.reason === 'ExitCode');
  const code = Number.parseInt(cause?.message ?? '', 10);
  return Number.isNaN(code) ? 1 : code;
}

function loadKubeConfig(options: KubernetesClientOptions): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (options.kubeconfig) {
    kc.loadFromFile(options.kubeconfig);
  } else {
    kc.loadFromDefault();
  }
  if (options.context) {
    kc.setCurrentContext(options.context);
  }
  return kc;
}

/**
 * Create a Kubernetes client with core operations
 */
export const createKubernetesClient = (
  logger: Logger,
  options: KubernetesClientOptions = {},
): KubernetesClient => {
  const kc = loadKubeConfig(options);
  const objectApi = k8s.KubernetesObjectApi.makeApiClient(kc);
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const versionApi = kc.makeApiClient(k8s.VersionApi);
  const exec = new k8s.Exec(kc);
  const execTimeoutMs = options.execTimeoutMs ?? DEFAULT_TIMEOUTS.exec;

  logger.debug({ context: kc.getCurrentContext() }, 'Kubernetes client created');

  const refOf = (object: KubeObject): ObjectRef => ({
    kind: object.kind,
    namespace: object.metadata.namespace ?? 'default',
    name: object.metadata.name,
  });

  return {
    async readObject(header: ObjectHeader): Promise<KubeObject | undefined> {
      try {
        const response = await objectApi.read<KubeObject>({
          apiVersion: header.apiVersion,
          kind: header.kind,
          metadata: { name: header.name, namespace: header.namespace },
        });
        return response.body;
      } catch (error) {
        const classified = classifyKubernetesError(error, header);
        if (classified.code === ErrorCodes.NOT_FOUND) {
          return undefined;
        }
        throw classified;
      }
    },

    async createObject(object: KubeObject): Promise<KubeObject> {
      try {
        const response = await objectApi.create(object);
        logger.debug({ kind: object.kind, name: object.metadata.name }, 'Object created');
        return response.body;
      } catch (error) {
        throw classifyKubernetesError(error, refOf(object));
      }
    },

    async replaceObject(object: KubeObject): Promise<KubeObject> {
      try {
        const response = await objectApi.replace(object);
        logger.debug({ kind: object.kind, name: object.metadata.name }, 'Object replaced');
        return response.body;
      } catch (error) {
        throw classifyKubernetesError(error, refOf(object));
      }
    },

    async listObjects(
      apiVersion: string,
      kind: string,
      listOptions: ListOptions = {},
    ): Promise<KubeObject[]> {
      try {
        const response = await objectApi.list<KubeObject>(
          apiVersion,
          kind,
          listOptions.namespace,
          undefined,
          undefined,
          undefined,
          undefined,
          listOptions.labelSelector,
        );
        return response.body.items;
      } catch (error) {
        throw classifyKubernetesError(error, {
          kind,
          namespace: listOptions.namespace ?? '*',
          name: '*',
        });
      }
    },

    async listPods(namespace: string, labelSelector?: string): Promise<PodSummary[]> {
      try {
        const response = await coreApi.listNamespacedPod(
          namespace,
          undefined,
          undefined,
          undefined,
          undefined,
          labelSelector,
        );
        return response.body.items.map(summarizePod);
      } catch (error) {
        throw classifyKubernetesError(error, { kind: 'Pod', namespace, name: '*' });
      }
    },

    async listEndpoints(namespace: string): Promise<EndpointsSummary[]> {
      try {
        const response = await coreApi.listNamespacedEndpoints(namespace);
        return response.body.items.map(summarizeEndpoints);
      } catch (error) {
        throw classifyKubernetesError(error, { kind: 'Endpoints', namespace, name: '*' });
      }
    },

    async execInPod(
      namespace: string,
      pod: string,
      container: string | undefined,
      command: string[],
    ): Promise<ExecResult> {
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      const out: Buffer[] = [];
      const err: Buffer[] = [];
      stdout.on('data', (chunk: Buffer) => out.push(chunk));
      stderr.on('data', (chunk: Buffer) => err.push(chunk));

      let timer: NodeJS.Timeout | undefined;
      try {
        const status = await new Promise<k8s.V1Status>((resolve, reject) => {
          exec
            .exec(
              namespace,
              pod,
              container ?? '',
              command,
              stdout,
              stderr,
              null,
              false,
              resolve,
            )
            .then((socket) => {
              timer = setTimeout(() => {
                socket.close();
                reject(
                  new KubernetesError(
                    `exec in ${namespace}/${pod} timed out after ${execTimeoutMs}ms`,
                    ErrorCodes.K8S_ERROR,
                    'Pod',
                    namespace,
                  ),
                );
              }, execTimeoutMs);
            })
            .catch(reject);
        });

        const result: ExecResult = {
          stdout: Buffer.concat(out).toString('utf-8'),
          stderr: Buffer.concat(err).toString('utf-8'),
          exitCode: exitCodeFromStatus(status),
        };
        logger.debug({ namespace, pod, command, exitCode: result.exitCode }, 'exec finished');
        return result;
      } catch (error) {
        throw classifyKubernetesError(error, { kind: 'Pod', namespace, name: pod });
      } finally {
        if (timer) {
          clearTimeout(timer);
        }
      }
    },

    async readPodLogs(namespace: string, pod: string, logOptions: LogOptions = {}): Promise<string> {
      try {
        const response = await coreApi.readNamespacedPodLog(
          pod,
          namespace,
          logOptions.container,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          logOptions.tailLines,
        );
        return response.body;
      } catch (error) {
        throw classifyKubernetesError(error, { kind: 'Pod', namespace, name: pod });
      }
    },

    /**
     * Check cluster connectivity
     */
    async ping(): Promise<boolean> {
      try {
        await versionApi.getCode();
        return true;
      } catch (error) {
        logger.debug({ error }, 'Cluster ping failed');
        return false;
      }
    },
  };
};
