/**
 * Error types for the reconciler.
 * Infrastructure adapters throw these; tools convert them into Result failures
 * at their boundary and the CLI maps them onto exit codes.
 */

/**
 * Error codes shared by every error class
 */
export const ErrorCodes = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_SPEC: 'INVALID_SPEC',
  NOT_FOUND: 'NOT_FOUND',
  NOT_AUTHORIZED: 'NOT_AUTHORIZED',
  CLUSTER_UNREACHABLE: 'CLUSTER_UNREACHABLE',
  REPO_UNREACHABLE: 'REPO_UNREACHABLE',
  CHART_NOT_FOUND: 'CHART_NOT_FOUND',
  READINESS_TIMEOUT: 'READINESS_TIMEOUT',
  DEPENDENCY_MISSING: 'DEPENDENCY_MISSING',
  CONFLICT: 'CONFLICT',
  K8S_ERROR: 'K8S_ERROR',
  HELM_ERROR: 'HELM_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Transport failures are worth another attempt; everything else is final.
   */
  get retryable(): boolean {
    return false;
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

export interface Violation {
  field: string;
  message: string;
}

/**
 * Error thrown when a manifest, profile or configuration value is malformed.
 * Carries every violation found, not just the first one.
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly violations: Violation[] = [],
    code: ErrorCode = ErrorCodes.VALIDATION_FAILED,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, violations });
    this.name = 'ValidationError';
  }

  /**
   * Manifest failed schema validation, locally or on the API server
   */
  static invalidSpec(message: string, violations: Violation[] = []): ValidationError {
    return new ValidationError(message, violations, ErrorCodes.INVALID_SPEC);
  }
}

/**
 * Error thrown when a named entity does not exist
 */
export class NotFoundError extends ApplicationError {
  constructor(
    message: string,
    public readonly resource?: string,
  ) {
    super(message, ErrorCodes.NOT_FOUND, { resource });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when Kubernetes operations fail
 */
export class KubernetesError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.K8S_ERROR,
    public readonly resource?: string,
    public readonly namespace?: string,
    cause?: Error,
    public readonly statusCode?: number,
  ) {
    super(message, code, { resource, namespace, statusCode }, cause);
    this.name = 'KubernetesError';
  }
}

export class NotAuthorizedError extends KubernetesError {
  constructor(message: string, resource?: string, namespace?: string, cause?: Error) {
    super(message, ErrorCodes.NOT_AUTHORIZED, resource, namespace, cause);
    this.name = 'NotAuthorizedError';
  }
}

export class ClusterUnreachableError extends KubernetesError {
  constructor(message: string, cause?: Error, statusCode?: number) {
    super(message, ErrorCodes.CLUSTER_UNREACHABLE, undefined, undefined, cause, statusCode);
    this.name = 'ClusterUnreachableError';
  }

  override get retryable(): boolean {
    return true;
  }
}

/**
 * Error thrown when a helm invocation fails
 */
export class HelmError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.HELM_ERROR,
    public readonly stderr?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, stderr });
    this.name = 'HelmError';
  }
}

export class RepoUnreachableError extends HelmError {
  constructor(message: string, stderr?: string, repoURL?: string) {
    super(message, ErrorCodes.REPO_UNREACHABLE, stderr, { repoURL });
    this.name = 'RepoUnreachableError';
  }

  override get retryable(): boolean {
    return true;
  }
}

export class ChartNotFoundError extends HelmError {
  constructor(message: string, stderr?: string, chart?: string) {
    super(message, ErrorCodes.CHART_NOT_FOUND, stderr, { chart });
    this.name = 'ChartNotFoundError';
  }
}

/**
 * Raised as a warning: the change it waited for stays applied
 */
export class ReadinessTimeoutError extends ApplicationError {
  constructor(
    message: string,
    public readonly labelSelector: string,
    public readonly timeoutMs: number,
  ) {
    super(message, ErrorCodes.READINESS_TIMEOUT, { labelSelector, timeoutMs });
    this.name = 'ReadinessTimeoutError';
  }
}

/**
 * Error thrown when a required external binary is absent
 */
export class DependencyMissingError extends ApplicationError {
  constructor(
    message: string,
    public readonly binary: string,
  ) {
    super(message, ErrorCodes.DEPENDENCY_MISSING, { binary });
    this.name = 'DependencyMissingError';
  }
}

/**
 * Catch-all for failures that carry no better classification
 */
export class InternalError extends ApplicationError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCodes.INTERNAL_ERROR, {}, cause);
    this.name = 'InternalError';
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Normalize anything thrown into an ApplicationError
 */
export function toApplicationError(error: unknown): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, error);
  }
  return new InternalError(String(error));
}

/**
 * Get error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
