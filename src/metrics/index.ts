import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const toolInvocationsTotal = new Counter({
  name: 'tool_invocations_total',
  help: 'External tool invocations by tool and outcome kind',
  labelNames: ['tool', 'outcome'] as const,
  registers: [registry],
});

export const toolInvocationDurationSeconds = new Histogram({
  name: 'tool_invocation_duration_seconds',
  help: 'Wall time of a single external tool invocation (seconds)',
  labelNames: ['tool'] as const,
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 30, 60],
  registers: [registry],
});

export const itemsExtractedTotal = new Counter({
  name: 'items_extracted_total',
  help: 'Hash extraction attempts by result (extracted|failed)',
  labelNames: ['result'] as const,
  registers: [registry],
});

export const itemsResolvedTotal = new Counter({
  name: 'items_resolved_total',
  help: 'Crack outcomes leaving Pending, by final status',
  labelNames: ['status'] as const,
  registers: [registry],
});

// Engine progress of the active run: recovered / total hashes
export const engineRecoveredRatio = new Gauge({
  name: 'engine_recovered_ratio',
  help: 'Recovered hashes divided by corpus size for the active engine run',
  registers: [registry],
});

export const enginePollLastTickSeconds = new Gauge({
  name: 'engine_poll_last_tick_seconds',
  help: 'Unix timestamp (seconds) of the last engine status poll',
  registers: [registry],
});

export const phaseTransitionsTotal = new Counter({
  name: 'phase_transitions_total',
  help: 'Batch session phase transitions by target phase',
  labelNames: ['phase'] as const,
  registers: [registry],
});

export const sessionWritesTotal = new Counter({
  name: 'session_writes_total',
  help: 'Session file writes by result (ok|error)',
  labelNames: ['result'] as const,
  registers: [registry],
});

export const sessionsPurgedTotal = new Counter({
  name: 'sessions_purged_total',
  help: 'Finished session documents deleted by retention cleanup',
  registers: [registry],
});
