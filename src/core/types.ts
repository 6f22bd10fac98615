// Domain model for one batch run, decoupled from the session file layout

export type ScanMode = 'single' | 'group' | 'batch' | 'empty';

export type Phase = 'Scanning' | 'Extracting' | 'Cracking' | 'Reconciling' | 'Done' | 'Failed';

export type CrackStatus = 'Pending' | 'Cracked' | 'Exhausted' | 'Error';

export type StageName = 'scanning' | 'extracting' | 'cracking' | 'reconciling';

export type ErrorStage = 'extraction' | 'cracking' | 'metadata';

export interface Item {
  identity: string;
  filePath: string;
  discoveredAt: string;
}

export interface HashRecord {
  identity: string;
  hash: string;
  algorithmTag: string;
  alias?: string;
  extractedAt: string;
}

export interface ItemError {
  stage: ErrorStage;
  code: string;
  message: string;
}

export interface CrackOutcome {
  identity: string;
  status: CrackStatus;
  recoveredSecret?: string;
  elapsedMs?: number;
  error?: ItemError;
}

export interface CertificateInfo {
  alias: string | null;
  fingerprintMD5: string | null;
  fingerprintSHA1: string | null;
  keystoreFormat: string | null;
  extractionError?: string;
}

export type AttackSpec =
  | { mode: 'mask'; mask: string; charset1?: string }
  | { mode: 'wordlist'; wordlist: string; rules: string[] };

export interface ExtractionEntry {
  identity: string;
  status: 'extracted' | 'failed';
  attemptedAt: string;
  attempts: number;
  elapsedMs: number;
  error?: ItemError;
}

export interface StageTiming {
  startedAt: string;
  finishedAt?: string;
  elapsedMs?: number;
  result?: string;
}

export interface EngineProgress {
  recovered: number;
  total: number;
  progressDone: number;
  progressTotal: number;
  speed: number;
  /** ISO time the run is expected to finish, when it can be told */
  estimatedCompletion: string | null;
  updatedAt: string;
}

export interface CorpusRef {
  file: string;
  lines: number;
}

export interface SessionFailure {
  code: string;
  message: string;
  at: string;
}

export interface BatchSession {
  sessionId: string;
  rootPath: string;
  scanMode: ScanMode | null;
  attack: AttackSpec;
  phase: Phase;
  phaseHistory: { phase: Phase; at: string }[];
  createdAt: string;
  updatedAt: string;
  stages: Partial<Record<StageName, StageTiming>>;
  items: Item[];
  extraction: Record<string, ExtractionEntry>;
  hashes: Record<string, HashRecord>;
  corpus: CorpusRef | null;
  outcomes: Record<string, CrackOutcome>;
  certificates: Record<string, CertificateInfo>;
  progress: EngineProgress | null;
  failure?: SessionFailure;
  interruptedAt?: string;
}

// zod-style result for pure parsers
export type ParseResult<T, E = ParseError> = { success: true; data: T } | { success: false; error: E };

export interface ParseError {
  code: string;
  message: string;
}
