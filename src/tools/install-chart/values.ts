/**
 * `--set` value handling with helm's parsing rules for scalars and dotted keys
 */

import { isDeepStrictEqual } from 'node:util';
import { ValidationError, type Violation } from '../../errors';

export type HelmScalar = string | number | boolean | null;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Type a `--set` value the way helm does: `true`, `false` and `null` in any
 * case, and base-10 integers in the int64 range (optionally signed, no
 * leading zero) become typed values. Everything else stays a string.
 */
export function helmScalar(value: string): HelmScalar {
  const lower = value.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (lower === 'null') return null;
  if (value === '0') return 0;
  if (/^[+-]?\d+$/.test(value) && !value.startsWith('0')) {
    const big = BigInt(value);
    if (big >= INT64_MIN && big <= INT64_MAX) {
      // -0 parses to 0 in helm
      return Number(big);
    }
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand dotted keys into nested values, e.g. `service.type=NodePort` into
 * `{ service: { type: 'NodePort' } }`. Later keys win on conflicts.
 */
export function toNestedValues(values: Record<string, string>): Record<string, unknown> {
  const root: Record<string, unknown> = {};

  for (const [key, raw] of Object.entries(values)) {
    const path = key.split('.');
    const leaf = path.pop() ?? key;
    let node = root;
    for (const segment of path) {
      const next = node[segment];
      if (isRecord(next)) {
        node = next;
      } else {
        const created: Record<string, unknown> = {};
        node[segment] = created;
        node = created;
      }
    }
    node[leaf] = helmScalar(raw);
  }
  return root;
}

/**
 * Whether a release's user values are exactly the requested `--set` values
 */
export function valuesMatch(
  requested: Record<string, string>,
  current: Record<string, unknown>,
): boolean {
  return isDeepStrictEqual(toNestedValues(requested), current);
}

/**
 * Parse repeated `key=value` flags into a values record
 */
export function parseSetFlags(flags: string[]): Record<string, string> {
  const values: Record<string, string> = {};
  const violations: Violation[] = [];

  for (const flag of flags) {
    const index = flag.indexOf('=');
    const key = index > 0 ? flag.slice(0, index) : '';
    if (!key || key.split('.').some((segment) => segment === '')) {
      violations.push({ field: flag, message: 'expected key=value with a non-empty dotted key' });
      continue;
    }
    values[key] = flag.slice(index + 1);
  }

  if (violations.length > 0) {
    throw new ValidationError('Invalid --set values', violations);
  }
  return values;
}
