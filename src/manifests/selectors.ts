/**
 * Label selector evaluation
 */

import type { LabelSelector, LabelSelectorRequirement, Labels } from '../domain/types/manifest';

function requirementMatches(requirement: LabelSelectorRequirement, labels: Labels): boolean {
  const present = Object.prototype.hasOwnProperty.call(labels, requirement.key);
  const values = requirement.values ?? [];

  switch (requirement.operator) {
    case 'In':
      return present && values.includes(labels[requirement.key] ?? '');
    case 'NotIn':
      return !present || !values.includes(labels[requirement.key] ?? '');
    case 'Exists':
      return present;
    case 'DoesNotExist':
      return !present;
  }
}

/**
 * Whether `labels` satisfy `selector`. The empty selector matches everything.
 */
export function selectorMatches(selector: LabelSelector, labels: Labels): boolean {
  const byLabel = Object.entries(selector.matchLabels ?? {}).every(
    ([key, value]) => labels[key] === value,
  );
  return byLabel && (selector.matchExpressions ?? []).every((r) => requirementMatches(r, labels));
}

/**
 * `a=b,c=d` form of a selector's matchLabels, as kubectl prints it
 */
export function formatSelector(selector: LabelSelector): string {
  const parts = Object.entries(selector.matchLabels ?? {}).map(([k, v]) => `${k}=${v}`);
  for (const r of selector.matchExpressions ?? []) {
    parts.push(
      r.operator === 'Exists'
        ? r.key
        : r.operator === 'DoesNotExist'
          ? `!${r.key}`
          : `${r.key} ${r.operator.toLowerCase()} (${(r.values ?? []).join(',')})`,
    );
  }
  return parts.length > 0 ? parts.join(',') : '(everything)';
}
