import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  installChart,
  keplerRelease,
  waitForPods,
  type InstallDeps,
} from '../../../src/tools/install-chart';
import { createHelmClient } from '../../../src/infrastructure/helm';
import {
  ClusterUnreachableError,
  ErrorCodes,
  NotAuthorizedError,
  ReadinessTimeoutError,
} from '../../../src/errors';
import { FakeCluster, pod } from '../../utils/fake-cluster';
import { FakeCommandRunner, failed, ok } from '../../utils/fake-command-runner';
import { createTestLogger } from '../../utils/logger';

const KEPLER_LABELS = { 'app.kubernetes.io/name': 'kepler' };

const releaseJson = (revision: number, status = 'deployed'): string =>
  JSON.stringify({
    name: 'kepler',
    namespace: 'kepler',
    version: revision,
    info: { status },
    chart: { metadata: { name: 'kepler', version: '0.5.0' } },
  });

const REPO_DOWN =
  'Error: looks like "https://charts.example.test" is not a valid chart repository ' +
  'or cannot be reached: dial tcp: lookup charts.example.test: no such host';

describe('installChart', () => {
  let runner: FakeCommandRunner;
  let cluster: FakeCluster;
  let deps: InstallDeps;
  const release = keplerRelease({ timeoutMs: 40, pollIntervalMs: 10 });

  beforeEach(() => {
    const logger = createTestLogger();
    runner = new FakeCommandRunner(['helm']);
    runner.on('helm', ['repo', 'add'], ok()).on('helm', ['repo', 'update'], ok());
    cluster = new FakeCluster();
    cluster.pods = [pod('kepler-x7k2p', 'kepler', { labels: KEPLER_LABELS })];
    deps = {
      helm: createHelmClient(logger, runner),
      client: cluster,
      logger,
      retryPolicy: { attempts: 3, delayMs: 0 },
    };
  });

  const argsOf = (sub: string): string[][] =>
    runner.calls.filter((c) => c.args[0] === sub).map((c) => c.args);

  it('should install a release that does not exist yet', async () => {
    runner
      .on('helm', ['status'], failed('Error: release: not found'))
      .on('helm', ['upgrade'], ok(releaseJson(1)));

    const result = await installChart(release, deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      release: {
        name: 'kepler',
        namespace: 'kepler',
        revision: 1,
        status: 'deployed',
        chart: 'kepler-0.5.0',
      },
      changed: true,
      ready: true,
      pods: cluster.pods,
      warnings: [],
    });
    expect(argsOf('repo')).toEqual([
      [
        'repo',
        'add',
        'kepler',
        'https://sustainable-computing-io.github.io/kepler-helm-chart',
        '--force-update',
      ],
      ['repo', 'update', 'kepler'],
    ]);
    expect(argsOf('upgrade')).toEqual([
      [
        'upgrade',
        '--install',
        'kepler',
        'kepler/kepler',
        '--namespace',
        'kepler',
        '--create-namespace',
        '--set',
        'service.type=NodePort',
        '--set',
        'serviceMonitor.enabled=true',
        '--output',
        'json',
      ],
    ]);
  });

  it('should skip the upgrade when the deployed values already match', async () => {
    runner
      .on('helm', ['status'], ok(releaseJson(3)))
      .on(
        'helm',
        ['get', 'values'],
        ok('{"service":{"type":"NodePort"},"serviceMonitor":{"enabled":true}}'),
      );

    const result = await installChart(release, deps);

    expect(result.ok && result.value.changed).toBe(false);
    expect(result.ok && result.value.release.revision).toBe(3);
    expect(argsOf('upgrade')).toEqual([]);
  });

  it('should upgrade when the deployed values differ', async () => {
    runner
      .on('helm', ['status'], ok(releaseJson(3)))
      .on('helm', ['get', 'values'], ok('{"service":{"type":"ClusterIP"}}'))
      .on('helm', ['upgrade'], ok(releaseJson(4)));

    const result = await installChart(release, deps);

    expect(result.ok && result.value.changed).toBe(true);
    expect(result.ok && result.value.release.revision).toBe(4);
  });

  it('should upgrade a release that is not deployed', async () => {
    runner
      .on('helm', ['status'], ok(releaseJson(2, 'failed')))
      .on(
        'helm',
        ['get', 'values'],
        ok('{"service":{"type":"NodePort"},"serviceMonitor":{"enabled":true}}'),
      )
      .on('helm', ['upgrade'], ok(releaseJson(3)));

    const result = await installChart(release, deps);

    expect(result.ok && result.value.changed).toBe(true);
  });

  it('should fail with DependencyMissing when helm is not installed', async () => {
    runner.available.clear();

    const result = await installChart(release, deps);

    expect(!result.ok && result.error.code).toBe(ErrorCodes.DEPENDENCY_MISSING);
    expect(!result.ok && result.error.message).toBe(
      'helm not found on PATH; install Helm 3 first',
    );
    expect(runner.calls).toEqual([]);
  });

  it('should retry an unreachable repository, then give up', async () => {
    const down = new FakeCommandRunner(['helm']).on('helm', ['repo', 'add'], failed(REPO_DOWN));
    const logger = createTestLogger();

    const result = await installChart(release, {
      ...deps,
      helm: createHelmClient(logger, down),
    });

    expect(!result.ok && result.error.code).toBe(ErrorCodes.REPO_UNREACHABLE);
    expect(down.calls).toHaveLength(3);
  });

  it('should recover from a single repository hiccup', async () => {
    const flaky = new FakeCommandRunner(['helm'])
      .once('helm', ['repo', 'add'], failed(REPO_DOWN))
      .on('helm', ['repo', 'add'], ok())
      .on('helm', ['repo', 'update'], ok())
      .on('helm', ['status'], failed('Error: release: not found'))
      .on('helm', ['upgrade'], ok(releaseJson(1)));

    const result = await installChart(release, {
      ...deps,
      helm: createHelmClient(createTestLogger(), flaky),
    });

    expect(result.ok).toBe(true);
    expect(flaky.calls.filter((c) => c.args[1] === 'add')).toHaveLength(2);
  });

  it('should retry a release lookup while the cluster is unreachable', async () => {
    runner
      .once(
        'helm',
        ['status'],
        failed('Error: Kubernetes cluster unreachable: dial tcp 10.0.0.1:6443: connection refused'),
      )
      .on('helm', ['status'], failed('Error: release: not found'))
      .on('helm', ['upgrade'], ok(releaseJson(1)));

    const result = await installChart(release, deps);

    expect(result.ok && result.value.changed).toBe(true);
    expect(argsOf('status')).toHaveLength(2);
  });

  it('should surface ClusterUnreachable once the lookup attempts are spent', async () => {
    runner.on('helm', ['status'], failed('Error: Kubernetes cluster unreachable: i/o timeout'));

    const result = await installChart(release, deps);

    expect(!result.ok && result.error.code).toBe(ErrorCodes.CLUSTER_UNREACHABLE);
    expect(argsOf('status')).toHaveLength(3);
    expect(argsOf('upgrade')).toEqual([]);
  });

  it('should retry an upgrade interrupted by an unreachable cluster', async () => {
    runner
      .on('helm', ['status'], failed('Error: release: not found'))
      .once('helm', ['upgrade'], failed('Error: Kubernetes cluster unreachable: i/o timeout'))
      .on('helm', ['upgrade'], ok(releaseJson(1)));

    const result = await installChart(release, deps);

    expect(result.ok && result.value.release.revision).toBe(1);
    expect(argsOf('upgrade')).toHaveLength(2);
  });

  it('should report a missing chart', async () => {
    runner
      .on('helm', ['status'], failed('Error: release: not found'))
      .on('helm', ['upgrade'], failed('Error: chart "kepler" not found in kepler index'));

    const result = await installChart(release, deps);

    expect(!result.ok && result.error.code).toBe(ErrorCodes.CHART_NOT_FOUND);
  });

  it('should return a readiness warning and keep the release', async () => {
    cluster.pods = [pod('kepler-x7k2p', 'kepler', { labels: KEPLER_LABELS, ready: false })];
    runner
      .on('helm', ['status'], failed('Error: release: not found'))
      .on('helm', ['upgrade'], ok(releaseJson(1)));

    const result = await installChart(release, deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.ready).toBe(false);
    expect(result.value.changed).toBe(true);
    expect(result.value.warnings).toHaveLength(1);
    expect(result.value.warnings[0]).toBeInstanceOf(ReadinessTimeoutError);
    expect(result.value.warnings[0]?.message).toBe(
      'Pods matching app.kubernetes.io/name=kepler in kepler not Ready after 40ms',
    );
  });

  it('should reject an invalid release before running helm', async () => {
    const result = await installChart({ ...release, name: 'Kepler_Release' }, deps);

    expect(!result.ok && result.error.code).toBe(ErrorCodes.VALIDATION_FAILED);
    expect(!result.ok && result.error.context.violations).toEqual([
      { field: 'name', message: 'must be a DNS label' },
    ]);
    expect(runner.calls).toEqual([]);
  });
});

describe('waitForPods', () => {
  const condition = {
    labelSelector: 'app.kubernetes.io/name=kepler',
    timeoutMs: 50,
    pollIntervalMs: 5,
  };

  it('should keep polling through transient listing failures', async () => {
    const cluster = new FakeCluster();
    cluster.pods = [pod('kepler-a', 'kepler', { labels: KEPLER_LABELS })];
    cluster.failNext('listPods', new ClusterUnreachableError('i/o timeout'));

    const outcome = await waitForPods(cluster, 'kepler', condition, createTestLogger());

    expect(outcome.ready).toBe(true);
    expect(cluster.calls).toEqual(['list Pod kepler', 'list Pod kepler']);
  });

  it('should not count an empty pod list as ready', async () => {
    const cluster = new FakeCluster();

    const outcome = await waitForPods(cluster, 'kepler', condition, createTestLogger());

    expect(outcome).toEqual({ ready: false, pods: [] });
  });

  it('should rethrow errors that are not transient', async () => {
    const cluster = new FakeCluster();
    cluster.failNext('listPods', new NotAuthorizedError('forbidden', 'Pod', 'kepler'));

    await expect(
      waitForPods(cluster, 'kepler', condition, createTestLogger()),
    ).rejects.toBeInstanceOf(NotAuthorizedError);
  });
});
