import { PhaseTransitionError } from './errors.js';
import type { BatchSession, Phase } from './types.js';

const ORDER: readonly Phase[] = ['Scanning', 'Extracting', 'Cracking', 'Reconciling', 'Done'];

export function isTerminal(phase: Phase): boolean {
  return phase === 'Done' || phase === 'Failed';
}

function phaseRank(phase: Phase): number {
  return phase === 'Failed' ? ORDER.length : ORDER.indexOf(phase);
}

// Failed is reachable from any live phase; everything else only moves forward.
export function canTransition(from: Phase, to: Phase): boolean {
  if (isTerminal(from)) return false;
  if (to === 'Failed') return true;
  return phaseRank(to) >= phaseRank(from);
}

/**
 * Moves the session forward and records the step in its history.
 * Re-entering the current phase is a no-op.
 */
export function advancePhase(session: BatchSession, to: Phase, at = new Date()): boolean {
  if (session.phase === to && !isTerminal(to)) return false;
  if (!canTransition(session.phase, to)) {
    throw new PhaseTransitionError(session.phase, to);
  }
  const stamp = at.toISOString();
  session.phase = to;
  session.phaseHistory.push({ phase: to, at: stamp });
  session.updatedAt = stamp;
  return true;
}
