/**
 * Install Chart Tool
 *
 * Upgrade-or-install of a Helm release with a fixed value set, followed by a
 * bounded wait for its pods. A release that is already deployed with the
 * requested values is left untouched.
 *
 * @example
 * ```typescript
 * const result = await installChart(keplerRelease(), { helm, client, logger });
 * if (result.ok && !result.value.ready) {
 *   logger.warn('Kepler pods are not Ready yet');
 * }
 * ```
 */

import type { Logger } from 'pino';
import type { HelmClient, HelmRelease } from '../../infrastructure/helm';
import type { KubernetesClient, PodSummary } from '../../infrastructure/kubernetes';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result } from '../../domain/types/result';
import {
  DependencyMissingError,
  ReadinessTimeoutError,
  ValidationError,
  getErrorMessage,
  toApplicationError,
  type ApplicationError,
} from '../../errors';
import { sleep } from '../../shared/async';
import { isTransient, retryTransient, type RetryPolicy } from '../../shared/transient';
import { chartReleaseSchema, type ChartReleaseInput } from './schema';
import { valuesMatch } from './values';

export interface InstallDeps {
  helm: HelmClient;
  client: KubernetesClient;
  logger: Logger;
  retryPolicy?: RetryPolicy;
}

export interface InstallOutcome {
  release: HelmRelease;
  changed: boolean;
  ready: boolean;
  pods: PodSummary[];
  /** Non-fatal problems; the release stays installed */
  warnings: ApplicationError[];
}

export interface WaitCondition {
  labelSelector: string;
  timeoutMs: number;
  pollIntervalMs: number;
}

/**
 * Poll matching pods until all of them are Ready or the timeout elapses.
 * Transport failures while polling count as "not ready yet".
 */
export async function waitForPods(
  client: KubernetesClient,
  namespace: string,
  condition: WaitCondition,
  logger: Logger,
): Promise<{ ready: boolean; pods: PodSummary[] }> {
  const started = Date.now();
  let pods: PodSummary[] = [];

  for (;;) {
    try {
      pods = await client.listPods(namespace, condition.labelSelector);
    } catch (error) {
      if (!isTransient(error)) {
        throw error;
      }
      logger.debug({ error: getErrorMessage(error) }, 'Pod listing failed while waiting');
    }

    if (pods.length > 0 && pods.every((pod) => pod.ready)) {
      return { ready: true, pods };
    }

    const elapsed = Date.now() - started;
    if (elapsed >= condition.timeoutMs) {
      return { ready: false, pods };
    }
    logger.debug(
      { ready: pods.filter((p) => p.ready).length, total: pods.length },
      'Waiting for pods',
    );
    await sleep(Math.min(condition.pollIntervalMs, condition.timeoutMs - elapsed));
  }
}

/**
 * Install or upgrade a chart release and wait for it
 */
export async function installChart(
  input: ChartReleaseInput,
  deps: InstallDeps,
): Promise<Result<InstallOutcome, ApplicationError>> {
  const { helm, client, logger, retryPolicy } = deps;
  const timer = createTimer(logger, 'install-chart', { release: input.name });

  try {
    const parsed = chartReleaseSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid chart release',
        parsed.error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
      );
    }
    const release = parsed.data;

    if (!(await helm.isAvailable())) {
      throw new DependencyMissingError(
        `${helm.binary} not found on PATH; install Helm 3 first`,
        helm.binary,
      );
    }

    await retryTransient(
      () => helm.addRepo(release.repoName, release.repoURL),
      logger,
      `helm repo add ${release.repoName}`,
      retryPolicy,
    );
    await retryTransient(
      () => helm.updateRepo(release.repoName),
      logger,
      `helm repo update ${release.repoName}`,
      retryPolicy,
    );
    timer.checkpoint('repository ready');

    const existing = await retryTransient(
      () => helm.getRelease(release.name, release.namespace),
      logger,
      `helm status ${release.name}`,
      retryPolicy,
    );
    let installed: HelmRelease;
    let changed: boolean;

    if (existing?.status === 'deployed' && valuesMatch(release.values, existing.values)) {
      installed = {
        name: existing.name,
        namespace: existing.namespace,
        revision: existing.revision,
        status: existing.status,
        chart: existing.chart,
      };
      changed = false;
      logger.info(
        { release: release.name, revision: existing.revision },
        'Release already deployed with the requested values',
      );
    } else {
      installed = await retryTransient(
        () =>
          helm.upgradeInstall({
            release: release.name,
            chart: `${release.repoName}/${release.chartName}`,
            namespace: release.namespace,
            values: release.values,
          }),
        logger,
        `helm upgrade --install ${release.name}`,
        retryPolicy,
      );
      changed = true;
    }
    timer.checkpoint('release applied', { changed });

    const { ready, pods } = await waitForPods(
      client,
      release.namespace,
      release.waitCondition,
      logger,
    );

    const warnings: ApplicationError[] = [];
    if (!ready) {
      const warning = new ReadinessTimeoutError(
        `Pods matching ${release.waitCondition.labelSelector} in ${release.namespace} ` +
          `not Ready after ${release.waitCondition.timeoutMs}ms`,
        release.waitCondition.labelSelector,
        release.waitCondition.timeoutMs,
      );
      logger.warn({ pods: pods.map((p) => p.name) }, warning.message);
      warnings.push(warning);
    }

    timer.end({ changed, ready });
    return Success({ release: installed, changed, ready, pods, warnings });
  } catch (error) {
    const appError = toApplicationError(error);
    timer.error(appError, { code: appError.code });
    return Failure(appError);
  }
}
