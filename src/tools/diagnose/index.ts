/**
 * Diagnose Tool
 *
 * Exports the runner, checklist, hints and renderers
 */

export { runDiagnostics, reportPassed, MANUAL_STEPS } from './tool';
export type { DiagnoseDeps, DiagnoseCallbacks } from './tool';
export { DIAGNOSTIC_CHECKS } from './checks';
export { HINTS, hintFor, type Hint, type HintId } from './hints';
export { renderText, renderJson, renderReport } from './report';
export { diagnoseSchema, type DiagnoseParams, type DiagnoseInput } from './schema';
export type {
  CheckVerdict,
  CheckOutcome,
  CheckResult,
  DiagnosticCheck,
  DiagnosticContext,
  DiagnosticReport,
  DiagnosticState,
} from './types';
