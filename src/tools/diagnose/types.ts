/**
 * Diagnostic Runner types
 */

import type { Logger } from 'pino';
import type {
  EndpointsSummary,
  KubernetesClient,
  PodSummary,
} from '../../infrastructure/kubernetes';
import type { KubeObject } from '../../domain/types/manifest';
import type { HintId } from './hints';

/**
 * Final state of a check; before it a check is pending, then running
 */
export type CheckVerdict = 'passed' | 'failed' | 'skipped';

export interface CheckOutcome {
  verdict: CheckVerdict;
  details: string[];
  hint?: HintId;
}

/**
 * Data gathered by earlier checks for later ones. A key left unset means the
 * check that fetches it did not get that far.
 */
export interface DiagnosticState {
  keplerPods?: PodSummary[];
  services?: KubeObject[];
  serviceMonitors?: KubeObject[];
  /** ServiceMonitor name -> names of the Services its selector matches */
  monitorTargets?: Map<string, string[]>;
  endpoints?: EndpointsSummary[];
}

export interface DiagnosticContext {
  client: KubernetesClient;
  logger: Logger;
  keplerNamespace: string;
  monitoringNamespace: string;
  metricsPort: number;
  state: DiagnosticState;
}

export interface DiagnosticCheck {
  order: number;
  id: string;
  description: string;
  /** Hint attached when the check fails without naming one */
  hint?: HintId;
  run: (context: DiagnosticContext) => Promise<CheckOutcome>;
}

export interface CheckResult {
  order: number;
  id: string;
  description: string;
  verdict: CheckVerdict;
  details: string[];
  hint?: HintId;
  durationMs: number;
}

export interface DiagnosticReport {
  keplerNamespace: string;
  monitoringNamespace: string;
  startedAt: string;
  results: CheckResult[];
  summary: Record<CheckVerdict, number>;
  manualSteps: string[];
}
