import { z } from 'zod';
import type { BatchSession } from '../../core/types.js';
import type { BatchReport } from '../../reports/buildReport.js';

export const listSessionsQuerySchema = z.object({
  phase: z.enum(['Scanning', 'Extracting', 'Cracking', 'Reconciling', 'Done', 'Failed']).optional(),
  limit: z.coerce.number().int().positive().max(500).default(50),
});

export const reportQuerySchema = z.object({
  // recovered passwords are withheld unless asked for explicitly
  includeSecrets: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
});

export function toPublicSession(s: BatchSession) {
  const counts = { Pending: 0, Cracked: 0, Exhausted: 0, Error: 0 };
  for (const o of Object.values(s.outcomes)) counts[o.status]++;
  return {
    sessionId: s.sessionId,
    rootPath: s.rootPath,
    scanMode: s.scanMode,
    attack: s.attack,
    phase: s.phase,
    phaseHistory: s.phaseHistory,
    createdAt: s.createdAt,
    updatedAt: s.updatedAt,
    interruptedAt: s.interruptedAt ?? null,
    failure: s.failure ?? null,
    stages: s.stages,
    progress: s.progress,
    items: s.items.length,
    extracted: Object.keys(s.hashes).length,
    outcomes: counts,
  };
}

export function redactReport(report: BatchReport): BatchReport {
  return {
    ...report,
    records: report.records.map((r) => ({
      ...r,
      recoveredSecret: r.recoveredSecret === null ? null : '***',
    })),
  };
}
