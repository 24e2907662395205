import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import type { Logger } from 'pino';
import {
  applyAll,
  applyManifest,
  coversDesired,
  isUpToDate,
  resolveTargetStore,
  type ApplyDeps,
  type ApplyOutcome,
} from '../../../src/tools/apply-manifest';
import {
  ManifestStore,
  networkPolicy,
  presetStore,
  service,
  toKubeObject,
} from '../../../src/manifests';
import {
  ClusterUnreachableError,
  ErrorCodes,
  NotAuthorizedError,
  ValidationError,
} from '../../../src/errors';
import type { KubeObject, Labels, Manifest } from '../../../src/domain/types/manifest';
import { FakeCluster } from '../../utils/fake-cluster';
import { createTestLogger } from '../../utils/logger';

const exporterService = (port = 9102, labels: Labels = { 'app.kubernetes.io/name': 'kepler' }) =>
  service(
    { name: 'kepler-exporter', namespace: 'kepler', labels },
    { type: 'NodePort', ports: [{ name: 'http', port }] },
  );

describe('applyManifest', () => {
  let cluster: FakeCluster;
  let logger: Logger;
  let deps: ApplyDeps;

  beforeEach(() => {
    cluster = new FakeCluster();
    logger = createTestLogger();
    deps = { client: cluster, logger, retryPolicy: { attempts: 3, delayMs: 0 } };
  });

  it('should create an absent object and leave it alone the second time', async () => {
    const first = await applyManifest(exporterService(), deps);
    const second = await applyManifest(exporterService(), deps);

    expect(first.ok && first.value.action).toBe('created');
    expect(first.ok && first.value.changed).toBe(true);
    expect(second.ok && second.value.action).toBe('unchanged');
    expect(second.ok && second.value.changed).toBe(false);
    expect(cluster.calls).toEqual([
      'read Service kepler/kepler-exporter',
      'create Service kepler/kepler-exporter',
      'read Service kepler/kepler-exporter',
    ]);
  });

  it('should replace a drifted object, carrying the live resourceVersion', async () => {
    cluster.seed(toKubeObject(exporterService(8080)));

    const result = await applyManifest(exporterService(), deps);

    expect(result.ok && result.value.action).toBe('updated');
    expect(cluster.calls).toEqual([
      'read Service kepler/kepler-exporter',
      'replace Service kepler/kepler-exporter',
    ]);
    expect(cluster.get('Service', 'kepler', 'kepler-exporter')?.spec).toEqual({
      type: 'NodePort',
      ports: [{ name: 'http', port: 9102 }],
    });
  });

  it('should replace an object whose labels differ', async () => {
    cluster.seed(toKubeObject(exporterService(9102, { 'app.kubernetes.io/name': 'other' })));

    const result = await applyManifest(exporterService(), deps);

    expect(result.ok && result.value.action).toBe('updated');
    expect(cluster.get('Service', 'kepler', 'kepler-exporter')?.metadata.labels).toEqual({
      'app.kubernetes.io/name': 'kepler',
    });
  });

  it('should ignore fields the API server filled in', async () => {
    const live = toKubeObject(exporterService());
    live.spec = {
      type: 'NodePort',
      clusterIP: '10.96.0.12',
      ports: [{ name: 'http', port: 9102, protocol: 'TCP', targetPort: 9102, nodePort: 31000 }],
    };
    cluster.seed(live);

    const result = await applyManifest(exporterService(), deps);

    expect(result.ok && result.value.action).toBe('unchanged');
    expect(cluster.calls).toEqual(['read Service kepler/kepler-exporter']);
  });

  it('should fail validation before touching the cluster', async () => {
    const result = await applyManifest(
      service({ name: 'Bad Name', namespace: 'kepler' }, { ports: [{ port: 80 }] }),
      deps,
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.code).toBe(ErrorCodes.INVALID_SPEC);
    expect(cluster.calls).toEqual([]);
  });

  it('should retry a transient read failure', async () => {
    cluster.failNext('readObject', new ClusterUnreachableError('connect ECONNREFUSED'));
    const warn = jest.spyOn(logger, 'warn');

    const result = await applyManifest(exporterService(), deps);

    expect(result.ok && result.value.action).toBe('created');
    expect(cluster.calls.filter((c) => c.startsWith('read'))).toHaveLength(2);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'read Service kepler/kepler-exporter', attempt: 1 }),
      'read Service kepler/kepler-exporter failed, retrying',
    );
  });

  it('should surface ClusterUnreachable once the attempts are spent', async () => {
    const down = new ClusterUnreachableError('connect ECONNREFUSED');
    cluster.failNext('readObject', down, down, down);

    const result = await applyManifest(exporterService(), deps);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe(ErrorCodes.CLUSTER_UNREACHABLE);
    expect(cluster.calls).toHaveLength(3);
  });

  it('should not retry an authorization failure', async () => {
    cluster.failNext('createObject', new NotAuthorizedError('forbidden', 'Service', 'kepler'));

    const result = await applyManifest(exporterService(), deps);

    expect(!result.ok && result.error.code).toBe(ErrorCodes.NOT_AUTHORIZED);
    expect(cluster.calls).toEqual([
      'read Service kepler/kepler-exporter',
      'create Service kepler/kepler-exporter',
    ]);
  });

  it('should warn about every rule open to any address', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const [policy] = presetStore('kepler-access').list();
    if (!policy) throw new Error('preset is empty');

    await applyManifest(policy, deps);

    const messages = warn.mock.calls.map((call) => call[1]);
    expect(messages).toEqual([
      'NetworkPolicy rule admits traffic from any address',
      'NetworkPolicy rule admits traffic from any address',
    ]);
  });
});

/** Labels every Namespace with its own name on write, as the API server does */
class NamespaceLabellingCluster extends FakeCluster {
  private withNameLabel(object: KubeObject): KubeObject {
    if (object.kind !== 'Namespace') {
      return object;
    }
    return {
      ...object,
      metadata: {
        ...object.metadata,
        labels: { ...object.metadata.labels, 'kubernetes.io/metadata.name': object.metadata.name },
      },
    };
  }

  override createObject(object: KubeObject): Promise<KubeObject> {
    return super.createObject(this.withNameLabel(object));
  }

  override replaceObject(object: KubeObject): Promise<KubeObject> {
    return super.replaceObject(this.withNameLabel(object));
  }
}

describe('applyManifest with server-managed labels', () => {
  const namespace: Manifest = {
    apiVersion: 'v1',
    kind: 'Namespace',
    namespace: 'default',
    name: 'kepler',
    labels: { team: 'power' },
    spec: {},
  };

  it('should report a re-applied Namespace as unchanged', async () => {
    const cluster = new NamespaceLabellingCluster();
    const deps: ApplyDeps = { client: cluster, logger: createTestLogger() };

    const actions: string[] = [];
    for (let i = 0; i < 3; i++) {
      const result = await applyManifest(namespace, deps);
      actions.push(result.ok ? result.value.action : result.error.code);
    }

    expect(actions).toEqual(['created', 'unchanged', 'unchanged']);
    expect(cluster.get('Namespace', 'default', 'kepler')?.metadata.labels).toEqual({
      team: 'power',
      'kubernetes.io/metadata.name': 'kepler',
    });
  });

  it('should still replace when a label the manifest sets has drifted', async () => {
    const cluster = new NamespaceLabellingCluster();
    const deps: ApplyDeps = { client: cluster, logger: createTestLogger() };
    await applyManifest(namespace, deps);

    const result = await applyManifest({ ...namespace, labels: { team: 'energy' } }, deps);

    expect(result.ok && result.value.action).toBe('updated');
  });
});

describe('applyAll', () => {
  const policy = (name: string) =>
    networkPolicy({ name, namespace: 'kepler' }, { podSelector: {}, policyTypes: ['Ingress'] });

  it('should apply in store order and report each outcome', async () => {
    const cluster = new FakeCluster();
    cluster.seed(toKubeObject(policy('b')));
    const seen: ApplyOutcome[] = [];

    const result = await applyAll(new ManifestStore([policy('a'), policy('b')]), {
      client: cluster,
      logger: createTestLogger(),
      onApplied: (outcome) => seen.push(outcome),
    });

    expect(result.ok && result.value.map((o) => o.action)).toEqual(['created', 'unchanged']);
    expect(seen.map((o) => o.ref.name)).toEqual(['a', 'b']);
  });

  it('should stop at the first failure', async () => {
    const cluster = new FakeCluster();
    cluster.seed(toKubeObject(policy('a')));
    cluster.failNext('createObject', new NotAuthorizedError('forbidden', 'NetworkPolicy'));
    const store = new ManifestStore([policy('a'), policy('b'), policy('c')]);
    const seen: string[] = [];

    const result = await applyAll(store, {
      client: cluster,
      logger: createTestLogger(),
      onApplied: (outcome) => seen.push(outcome.ref.name),
    });

    expect(!result.ok && result.error.code).toBe(ErrorCodes.NOT_AUTHORIZED);
    expect(seen).toEqual(['a']);
    expect(cluster.calls).toEqual([
      'read NetworkPolicy kepler/a',
      'read NetworkPolicy kepler/b',
      'create NetworkPolicy kepler/b',
    ]);
  });
});

describe('drift comparison', () => {
  it('should accept extra live fields at any depth', () => {
    expect(coversDesired({ a: { b: 1 } }, { a: { b: 1, c: 2 }, d: 3 })).toBe(true);
    expect(coversDesired([{ port: 80 }], [{ port: 80, protocol: 'TCP' }])).toBe(true);
  });

  it('should require arrays to match element for element', () => {
    expect(coversDesired([1, 2], [1, 2, 3])).toBe(false);
    expect(coversDesired([2, 1], [1, 2])).toBe(false);
    expect(coversDesired({ a: [] }, { a: {} })).toBe(false);
  });

  it('should compare labels exactly', () => {
    const desired = toKubeObject(exporterService());
    const live = toKubeObject(
      exporterService(9102, { 'app.kubernetes.io/name': 'kepler', tier: 'exporter' }),
    );
    expect(isUpToDate(desired, live)).toBe(false);
    expect(isUpToDate(desired, toKubeObject(exporterService()))).toBe(true);
  });

  it('should ignore server-managed labels the manifest does not set', () => {
    const desired = toKubeObject(exporterService());
    const live = toKubeObject(
      exporterService(9102, {
        'app.kubernetes.io/name': 'kepler',
        'kubernetes.io/metadata.name': 'kepler-exporter',
      }),
    );
    expect(isUpToDate(desired, live)).toBe(true);

    const pinned = toKubeObject(
      exporterService(9102, {
        'app.kubernetes.io/name': 'kepler',
        'kubernetes.io/metadata.name': 'x',
      }),
    );
    expect(isUpToDate(pinned, live)).toBe(false);
  });
});

describe('resolveTargetStore', () => {
  it('should build a preset for the configured namespaces', async () => {
    const store = await resolveTargetStore({
      preset: 'kepler-access',
      keplerNamespace: 'power',
      monitoringNamespace: 'prom',
    });
    expect(store.list().map((m) => `${m.namespace}/${m.name}`)).toEqual([
      'power/allow-access-to-kepler',
    ]);
  });

  it('should require a file or a preset', async () => {
    await expect(resolveTargetStore({})).rejects.toBeInstanceOf(ValidationError);
  });
});
