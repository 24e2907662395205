/**
 * Diagnose Tool
 *
 * Runs the Kepler checklist strictly in order, one check at a time. A check
 * that throws is recorded as failed; the run itself only fails on invalid
 * parameters.
 *
 * @example
 * ```typescript
 * const result = await runDiagnostics({ keplerNamespace: 'kepler' }, { client, logger }, {
 *   onCheckComplete: (r) => console.error(`${r.id}: ${r.verdict}`),
 * });
 * ```
 */

import type { Logger } from 'pino';
import type { KubernetesClient } from '../../infrastructure/kubernetes';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result } from '../../domain/types/result';
import {
  ErrorCodes,
  ValidationError,
  toApplicationError,
  type ApplicationError,
} from '../../errors';
import { DIAGNOSTIC_CHECKS } from './checks';
import type { HintId } from './hints';
import { diagnoseSchema, type DiagnoseInput } from './schema';
import type {
  CheckOutcome,
  CheckResult,
  CheckVerdict,
  DiagnosticCheck,
  DiagnosticContext,
  DiagnosticReport,
} from './types';

export interface DiagnoseDeps {
  client: KubernetesClient;
  logger: Logger;
  /** Defaults to the built-in checklist */
  checks?: readonly DiagnosticCheck[];
}

export interface DiagnoseCallbacks {
  onCheckStart?: (check: DiagnosticCheck) => void;
  /** Emitted before the next check starts */
  onCheckComplete?: (result: CheckResult) => void;
}

export const MANUAL_STEPS = [
  'Open the Prometheus UI at Status -> Targets and confirm a kepler target is UP',
  'Or query the API: curl http://<prometheus-host>:<port>/api/v1/targets',
] as const;

async function runCheck(
  check: DiagnosticCheck,
  context: DiagnosticContext,
): Promise<{ outcome: CheckOutcome; hint?: HintId }> {
  try {
    const outcome = await check.run(context);
    const hint = outcome.verdict === 'failed' ? (outcome.hint ?? check.hint) : undefined;
    return { outcome, hint };
  } catch (error) {
    const appError = toApplicationError(error);
    context.logger.warn({ check: check.id, code: appError.code }, 'Diagnostic check threw');
    return {
      outcome: { verdict: 'failed', details: [`Check could not run: ${appError.message}`] },
      hint: appError.code === ErrorCodes.CLUSTER_UNREACHABLE ? 'cluster-unreachable' : undefined,
    };
  }
}

/**
 * Run every check and build the report
 */
export async function runDiagnostics(
  input: DiagnoseInput,
  deps: DiagnoseDeps,
  callbacks: DiagnoseCallbacks = {},
): Promise<Result<DiagnosticReport, ApplicationError>> {
  const parsed = diagnoseSchema.safeParse(input);
  if (!parsed.success) {
    return Failure(
      new ValidationError(
        'Invalid diagnostic parameters',
        parsed.error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
      ),
    );
  }
  const params = parsed.data;
  const { client, logger } = deps;
  const timer = createTimer(logger, 'diagnose', {
    keplerNamespace: params.keplerNamespace,
    monitoringNamespace: params.monitoringNamespace,
  });

  const context: DiagnosticContext = {
    client,
    logger,
    keplerNamespace: params.keplerNamespace,
    monitoringNamespace: params.monitoringNamespace,
    metricsPort: params.metricsPort,
    state: {},
  };

  const checks = [...(deps.checks ?? DIAGNOSTIC_CHECKS)].sort((a, b) => a.order - b.order);
  const startedAt = new Date().toISOString();
  const results: CheckResult[] = [];

  for (const check of checks) {
    callbacks.onCheckStart?.(check);
    const started = Date.now();
    const { outcome, hint } = await runCheck(check, context);

    const result: CheckResult = {
      order: check.order,
      id: check.id,
      description: check.description,
      verdict: outcome.verdict,
      details: outcome.details,
      durationMs: Date.now() - started,
    };
    if (hint) {
      result.hint = hint;
    }
    logger.debug({ check: check.id, verdict: result.verdict }, 'Diagnostic check finished');
    results.push(result);
    callbacks.onCheckComplete?.(result);
  }

  const summary: Record<CheckVerdict, number> = { passed: 0, failed: 0, skipped: 0 };
  for (const result of results) {
    summary[result.verdict]++;
  }

  timer.end(summary);
  return Success({
    keplerNamespace: params.keplerNamespace,
    monitoringNamespace: params.monitoringNamespace,
    startedAt,
    results,
    summary,
    manualSteps: [...MANUAL_STEPS],
  });
}

export const reportPassed = (report: DiagnosticReport): boolean => report.summary.failed === 0;
