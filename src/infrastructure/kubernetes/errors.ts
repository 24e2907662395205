/**
 * Maps @kubernetes/client-node failures onto the reconciler's error classes
 */

import {
  ApplicationError,
  ClusterUnreachableError,
  ErrorCodes,
  KubernetesError,
  NotAuthorizedError,
  NotFoundError,
  ValidationError,
  getErrorMessage,
} from '../../errors';
import { describeRef, type ObjectRef } from '../../domain/types/manifest';

const TRANSPORT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
]);

/**
 * HTTP status of a failed API call, when the error carries one
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * The `message` of the API server's Status body, when present
 */
function apiMessageOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const body = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body) {
      return typeof body.message === 'string' ? body.message : undefined;
    }
  }
  return undefined;
}

function isTransportError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    if (typeof error.code === 'string' && TRANSPORT_CODES.has(error.code)) {
      return true;
    }
  }
  return /ECONNREFUSED|ENOTFOUND|ETIMEDOUT|ECONNRESET|EHOSTUNREACH|socket hang up/i.test(
    getErrorMessage(error),
  );
}

/**
 * Classify a raw client error. `ref` names the object the call targeted.
 */
export function classifyKubernetesError(error: unknown, ref?: ObjectRef): ApplicationError {
  if (error instanceof ApplicationError) {
    return error;
  }

  const statusCode = statusCodeOf(error);
  const detail = apiMessageOf(error) ?? getErrorMessage(error);
  const target = ref ? describeRef(ref) : 'cluster';
  const cause = error instanceof Error ? error : undefined;

  if (statusCode === 401 || statusCode === 403) {
    return new NotAuthorizedError(
      `Not authorized to access ${target}: ${detail}`,
      ref?.kind,
      ref?.namespace,
      cause,
    );
  }
  if (statusCode === 400 || statusCode === 422) {
    return ValidationError.invalidSpec(`API server rejected ${target}`, [
      { field: target, message: detail },
    ]);
  }
  if (statusCode === 404) {
    return new NotFoundError(`${target} not found: ${detail}`, ref?.kind);
  }
  if (statusCode === 409) {
    return new KubernetesError(
      `Conflict on ${target}: ${detail}`,
      ErrorCodes.CONFLICT,
      ref?.kind,
      ref?.namespace,
      cause,
      statusCode,
    );
  }
  if ((statusCode !== undefined && statusCode >= 500) || statusCode === 429) {
    return new ClusterUnreachableError(
      `Cluster API unavailable (${statusCode}): ${detail}`,
      cause,
      statusCode,
    );
  }
  if (statusCode === undefined && isTransportError(error)) {
    return new ClusterUnreachableError(`Cannot reach cluster API: ${detail}`, cause);
  }

  return new KubernetesError(
    `Kubernetes call on ${target} failed: ${detail}`,
    ErrorCodes.K8S_ERROR,
    ref?.kind,
    ref?.namespace,
    cause,
    statusCode,
  );
}
