/**
 * NetworkPolicy inspection helpers
 */

import type { Manifest, NetworkPolicySpec, SelectorRule } from '../domain/types/manifest';
import { NetworkPolicySpecSchema } from './schemas';

const ANY_IP = new Set(['0.0.0.0/0', '::/0']);

export interface PermissiveRule {
  direction: SelectorRule['direction'];
  ruleIndex: number;
  reason: 'any-ip' | 'allow-all';
  cidr?: string;
}

/**
 * Flatten ingress and egress rules into one ordered list
 */
export function selectorRules(spec: NetworkPolicySpec): SelectorRule[] {
  const ingress: SelectorRule[] = (spec.ingress ?? []).map((rule) => ({
    direction: 'ingress',
    peers: rule.from ?? [],
    ports: rule.ports ?? [],
  }));
  const egress: SelectorRule[] = (spec.egress ?? []).map((rule) => ({
    direction: 'egress',
    peers: rule.to ?? [],
    ports: rule.ports ?? [],
  }));
  return [...ingress, ...egress];
}

/**
 * A rule without peers and without ports (`- {}`) admits all traffic
 */
export const isAllowAll = (rule: SelectorRule): boolean =>
  rule.peers.length === 0 && rule.ports.length === 0;

/**
 * Rules of a NetworkPolicy manifest that open it to any address.
 * Returns an empty list for other kinds or malformed specs.
 */
export function findPermissiveRules(manifest: Manifest): PermissiveRule[] {
  if (manifest.kind !== 'NetworkPolicy') {
    return [];
  }
  const parsed = NetworkPolicySpecSchema.safeParse(manifest.spec);
  if (!parsed.success) {
    return [];
  }

  const found: PermissiveRule[] = [];
  const counters = { ingress: 0, egress: 0 };

  for (const rule of selectorRules(parsed.data)) {
    const ruleIndex = counters[rule.direction]++;
    if (isAllowAll(rule)) {
      found.push({ direction: rule.direction, ruleIndex, reason: 'allow-all' });
      continue;
    }
    for (const peer of rule.peers) {
      if (peer.ipBlock && ANY_IP.has(peer.ipBlock.cidr)) {
        found.push({
          direction: rule.direction,
          ruleIndex,
          reason: 'any-ip',
          cidr: peer.ipBlock.cidr,
        });
      }
    }
  }
  return found;
}
