import type {
  AttackSpec,
  BatchSession,
  CrackStatus,
  Phase,
  ScanMode,
  SessionFailure,
  StageName,
} from '../core/types.js';

export type Resolution =
  | 'not_attempted'
  | 'extraction_failed'
  | 'engine_failed'
  | 'pending'
  | 'exhausted'
  | 'cracked'
  | 'cracked_metadata_failed';

export interface ReportRecord {
  identity: string;
  filePath: string;
  status: CrackStatus | null;
  resolution: Resolution;
  recoveredSecret: string | null;
  alias: string | null;
  fingerprintMD5: string | null;
  fingerprintSHA1: string | null;
  keystoreFormat: string | null;
  error: string | null;
  elapsedMs: number | null;
}

export interface ReportSummary {
  total: number;
  cracked: number;
  exhausted: number;
  errored: number;
  pending: number;
  notAttempted: number;
  extractionFailed: number;
  metadataFailed: number;
  /** cracked / total, 0 for an empty batch */
  successRate: number;
}

export interface BatchReport {
  sessionId: string;
  rootPath: string;
  scanMode: ScanMode | null;
  phase: Phase;
  attack: AttackSpec;
  generatedAt: string;
  failure: SessionFailure | null;
  summary: ReportSummary;
  stageElapsedMs: Record<StageName, number | null>;
  records: ReportRecord[];
}

function resolve(session: BatchSession, identity: string): Resolution {
  const extraction = session.extraction[identity];
  const outcome = session.outcomes[identity];
  if (extraction?.status === 'failed') return 'extraction_failed';
  if (!outcome) return 'not_attempted';
  switch (outcome.status) {
    case 'Pending':
      return 'pending';
    case 'Exhausted':
      return 'exhausted';
    case 'Error':
      return outcome.error?.stage === 'extraction' ? 'extraction_failed' : 'engine_failed';
    case 'Cracked':
      return session.certificates[identity]?.extractionError ? 'cracked_metadata_failed' : 'cracked';
  }
}

/** One record per scanned item, in scan order. Pure. */
export function buildReport(session: BatchSession, now = new Date()): BatchReport {
  const records = session.items.map((item): ReportRecord => {
    const outcome = session.outcomes[item.identity];
    const extraction = session.extraction[item.identity];
    const cert = session.certificates[item.identity];
    const hash = session.hashes[item.identity];
    const resolution = resolve(session, item.identity);
    const error = outcome?.error ?? extraction?.error ?? null;
    return {
      identity: item.identity,
      filePath: item.filePath,
      status: outcome?.status ?? null,
      resolution,
      recoveredSecret: outcome?.recoveredSecret ?? null,
      alias: cert?.alias ?? hash?.alias ?? null,
      fingerprintMD5: cert?.fingerprintMD5 ?? null,
      fingerprintSHA1: cert?.fingerprintSHA1 ?? null,
      keystoreFormat: cert?.keystoreFormat ?? null,
      error: error ? `${error.code}: ${error.message}` : (cert?.extractionError ?? null),
      elapsedMs: outcome?.elapsedMs ?? null,
    };
  });

  const count = (...r: Resolution[]) => records.filter((x) => r.includes(x.resolution)).length;
  const cracked = count('cracked', 'cracked_metadata_failed');
  const summary: ReportSummary = {
    total: records.length,
    cracked,
    exhausted: count('exhausted'),
    errored: count('extraction_failed', 'engine_failed'),
    pending: count('pending'),
    notAttempted: count('not_attempted'),
    extractionFailed: count('extraction_failed'),
    metadataFailed: count('cracked_metadata_failed'),
    successRate: records.length ? Math.round((cracked / records.length) * 10_000) / 10_000 : 0,
  };

  const elapsed = (name: StageName) => session.stages[name]?.elapsedMs ?? null;
  return {
    sessionId: session.sessionId,
    rootPath: session.rootPath,
    scanMode: session.scanMode,
    phase: session.phase,
    attack: session.attack,
    generatedAt: now.toISOString(),
    failure: session.failure ?? null,
    summary,
    stageElapsedMs: {
      scanning: elapsed('scanning'),
      extracting: elapsed('extracting'),
      cracking: elapsed('cracking'),
      reconciling: elapsed('reconciling'),
    },
    records,
  };
}
