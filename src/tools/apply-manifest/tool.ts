/**
 * Apply Manifest Tool
 *
 * Reconciles target manifests against live cluster state: absent objects are
 * created, drifted ones replaced in full, matching ones left alone.
 *
 * @example
 * ```typescript
 * const result = await applyAll(presetStore('kepler-access'), { client, logger });
 * if (result.ok) {
 *   result.value.forEach((o) => logger.info({ action: o.action }, describeRef(o.ref)));
 * }
 * ```
 */

import { isDeepStrictEqual } from 'node:util';
import type { Logger } from 'pino';
import type { KubernetesClient } from '../../infrastructure/kubernetes';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result } from '../../domain/types/result';
import {
  describeRef,
  type KubeObject,
  type Labels,
  type Manifest,
  type ObjectRef,
} from '../../domain/types/manifest';
import { ValidationError, toApplicationError, type ApplicationError } from '../../errors';
import {
  ManifestStore,
  findPermissiveRules,
  loadManifestStore,
  parseManifest,
  presetStore,
  toKubeObject,
} from '../../manifests';
import { retryTransient, type RetryPolicy } from '../../shared/transient';
import type { ApplyManifestsParams } from './schema';

export type ApplyAction = 'created' | 'updated' | 'unchanged';

export interface ApplyOutcome {
  ref: ObjectRef;
  object: KubeObject;
  changed: boolean;
  action: ApplyAction;
}

export interface ApplyDeps {
  client: KubernetesClient;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  /** Called after each manifest of `applyAll` is reconciled */
  onApplied?: (outcome: ApplyOutcome) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when every field set in `desired` holds the same value in `live`.
 * Fields only the live object carries are server-side defaults; arrays must
 * match element for element.
 */
export function coversDesired(desired: unknown, live: unknown): boolean {
  if (Array.isArray(desired)) {
    return (
      Array.isArray(live) &&
      live.length === desired.length &&
      desired.every((item, index) => coversDesired(item, live[index]))
    );
  }
  if (isRecord(desired)) {
    return (
      isRecord(live) &&
      Object.keys(desired).every((key) => coversDesired(desired[key], live[key]))
    );
  }
  return desired === live;
}

/** Labels the API server sets on its own, e.g. on every Namespace */
export const SERVER_MANAGED_LABELS: ReadonlySet<string> = new Set(['kubernetes.io/metadata.name']);

/**
 * Live labels minus the server-managed ones the manifest does not set itself
 */
function comparableLabels(live: Labels, desired: Labels): Labels {
  return Object.fromEntries(
    Object.entries(live).filter(([key]) => key in desired || !SERVER_MANAGED_LABELS.has(key)),
  );
}

export function isUpToDate(desired: KubeObject, live: KubeObject): boolean {
  const desiredLabels = desired.metadata.labels ?? {};
  return (
    isDeepStrictEqual(desiredLabels, comparableLabels(live.metadata.labels ?? {}, desiredLabels)) &&
    coversDesired(desired.spec ?? {}, live.spec ?? {})
  );
}

/**
 * Apply one manifest
 */
export async function applyManifest(
  manifest: Manifest,
  deps: ApplyDeps,
): Promise<Result<ApplyOutcome, ApplicationError>> {
  const { client, logger, retryPolicy } = deps;
  const label = describeRef(manifest);
  const timer = createTimer(logger, 'apply-manifest', { manifest: label });

  try {
    const validated = parseManifest(toKubeObject(manifest), label);
    for (const rule of findPermissiveRules(validated)) {
      logger.warn(
        { manifest: label, ...rule },
        'NetworkPolicy rule admits traffic from any address',
      );
    }

    const ref: ObjectRef = {
      kind: validated.kind,
      namespace: validated.namespace,
      name: validated.name,
    };
    const desired = toKubeObject(validated);

    const live = await retryTransient(
      () => client.readObject({ apiVersion: validated.apiVersion, ...ref }),
      logger,
      `read ${label}`,
      retryPolicy,
    );

    let outcome: ApplyOutcome;
    if (!live) {
      const created = await retryTransient(
        () => client.createObject(desired),
        logger,
        `create ${label}`,
        retryPolicy,
      );
      outcome = { ref, object: created, changed: true, action: 'created' };
    } else if (isUpToDate(desired, live)) {
      outcome = { ref, object: live, changed: false, action: 'unchanged' };
    } else {
      const replacement: KubeObject = {
        ...desired,
        metadata: { ...desired.metadata },
      };
      if (live.metadata.resourceVersion) {
        replacement.metadata.resourceVersion = live.metadata.resourceVersion;
      }
      const updated = await retryTransient(
        () => client.replaceObject(replacement),
        logger,
        `replace ${label}`,
        retryPolicy,
      );
      outcome = { ref, object: updated, changed: true, action: 'updated' };
    }

    timer.end({ action: outcome.action });
    return Success(outcome);
  } catch (error) {
    const appError = toApplicationError(error);
    timer.error(appError, { code: appError.code });
    return Failure(appError);
  }
}

/**
 * Apply every manifest of a store in insertion order, stopping at the first failure
 */
export async function applyAll(
  store: ManifestStore,
  deps: ApplyDeps,
): Promise<Result<ApplyOutcome[], ApplicationError>> {
  const outcomes: ApplyOutcome[] = [];

  for (const manifest of store.list()) {
    const result = await applyManifest(manifest, deps);
    if (!result.ok) {
      deps.logger.error(
        {
          manifest: describeRef(manifest),
          applied: outcomes.length,
          remaining: store.size - outcomes.length,
        },
        'Stopping after failed apply',
      );
      return Failure(result.error);
    }
    outcomes.push(result.value);
    deps.onApplied?.(result.value);
  }

  deps.logger.info(
    { total: outcomes.length, changed: outcomes.filter((o) => o.changed).length },
    'Manifests applied',
  );
  return Success(outcomes);
}

/**
 * Build the target set named by validated apply parameters
 */
export async function resolveTargetStore(params: ApplyManifestsParams): Promise<ManifestStore> {
  if (params.preset) {
    return presetStore(params.preset, {
      keplerNamespace: params.keplerNamespace,
      monitoringNamespace: params.monitoringNamespace,
    });
  }
  if (params.file) {
    return loadManifestStore(params.file);
  }
  throw new ValidationError('Provide either a manifest file or a preset', [
    { field: 'file', message: 'required when no preset is given' },
  ]);
}
