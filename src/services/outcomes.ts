import type { CrackOutcome } from '../core/types.js';
import { itemsResolvedTotal } from '../metrics/index.js';

export type OutcomeMap = Record<string, CrackOutcome>;

export function pendingOutcome(identity: string): CrackOutcome {
  return { identity, status: 'Pending' };
}

/**
 * Applies a terminal status to a Pending outcome. Outcomes never leave a
 * terminal status; returns false when nothing changed.
 */
export function settleOutcome(
  outcomes: OutcomeMap,
  identity: string,
  next: Omit<CrackOutcome, 'identity'>,
): boolean {
  const current = outcomes[identity];
  if (!current || current.status !== 'Pending' || next.status === 'Pending') return false;
  outcomes[identity] = { identity, ...next };
  itemsResolvedTotal.inc({ status: next.status });
  return true;
}

export function pendingIdentities(outcomes: OutcomeMap, identities: Iterable<string>): string[] {
  const out: string[] = [];
  for (const id of identities) {
    if (outcomes[id]?.status === 'Pending') out.push(id);
  }
  return out;
}
