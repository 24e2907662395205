/**
 * Text and JSON renderers for diagnostic reports
 */

import { hintFor } from './hints';
import type { CheckVerdict, DiagnosticReport } from './types';

const MARKERS: Record<CheckVerdict, string> = {
  passed: 'PASS',
  failed: 'FAIL',
  skipped: 'SKIP',
};

const INDENT = '       ';

export function renderText(report: DiagnosticReport): string {
  const lines = [
    `Kepler diagnostics (kepler namespace: ${report.keplerNamespace}, ` +
      `monitoring namespace: ${report.monitoringNamespace})`,
    '',
  ];

  for (const result of report.results) {
    lines.push(`[${MARKERS[result.verdict]}] ${result.order}. ${result.id} - ${result.description}`);
    lines.push(...result.details.map((detail) => `${INDENT}${detail}`));
    if (result.hint) {
      const hint = hintFor(result.hint);
      lines.push(`${INDENT}hint (${result.hint}): ${hint.problem}`);
      lines.push(`${INDENT}fix: ${hint.solution}`);
    }
  }

  const { passed, failed, skipped } = report.summary;
  lines.push('', `Summary: ${passed} passed, ${failed} failed, ${skipped} skipped`, '');
  lines.push('Manual checks:', ...report.manualSteps.map((step) => `  - ${step}`));
  return lines.join('\n');
}

/**
 * JSON form; failed checks carry their remediation text next to the hint id
 */
export function renderJson(report: DiagnosticReport): string {
  return JSON.stringify(
    {
      ...report,
      results: report.results.map((result) =>
        result.hint ? { ...result, remediation: hintFor(result.hint) } : result,
      ),
    },
    null,
    2,
  );
}

export function renderReport(report: DiagnosticReport, format: 'text' | 'json'): string {
  return format === 'json' ? renderJson(report) : renderText(report);
}
