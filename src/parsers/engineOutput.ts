import { z } from 'zod';
import { EngineCorrelationError } from '../core/errors.js';
import type { ParseResult } from '../core/types.js';

const pair = z.tuple([z.number(), z.number()]);

// Subset of the engine's --status-json object that the monitor reads
const statusSchema = z.object({
  progress: pair,
  recovered_hashes: pair,
  devices: z.array(z.object({ speed: z.number() }).passthrough()).default([]),
  time_start: z.number().optional(),
  estimated_stop: z.number().optional(),
});

export interface EngineStatus {
  progressDone: number;
  progressTotal: number;
  recovered: number;
  total: number;
  speed: number;
  /** Unix seconds */
  startedAt: number | null;
  /** Unix seconds, as predicted by the engine */
  estimatedStop: number | null;
}

export function parseStatusLine(line: string): EngineStatus | null {
  const start = line.indexOf('{');
  if (start < 0) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(line.slice(start));
  } catch {
    return null;
  }
  const parsed = statusSchema.safeParse(raw);
  if (!parsed.success) return null;
  const s = parsed.data;
  return {
    progressDone: s.progress[0],
    progressTotal: s.progress[1],
    recovered: s.recovered_hashes[0],
    total: s.recovered_hashes[1],
    speed: s.devices.reduce((sum, d) => sum + d.speed, 0),
    startedAt: s.time_start ?? null,
    estimatedStop: s.estimated_stop ?? null,
  };
}

/**
 * Expected completion time. The engine's own prediction wins; otherwise the
 * rate since `startedAt` is extrapolated over the remaining keyspace.
 */
export function estimateCompletion(status: EngineStatus, now: Date): string | null {
  if (status.estimatedStop !== null && status.estimatedStop > 0) {
    return new Date(status.estimatedStop * 1000).toISOString();
  }
  const { progressDone: done, progressTotal: total, startedAt } = status;
  if (startedAt === null || done <= 0 || done >= total) return null;
  const elapsedMs = now.getTime() - startedAt * 1000;
  if (elapsedMs <= 0) return null;
  return new Date(now.getTime() + Math.round((elapsedMs * (total - done)) / done)).toISOString();
}

export interface RecoveredLine {
  hash: string;
  identities: string[];
  secret: string;
}

// Non-printable plaintexts are reported as $HEX[...]
function decodeSecret(raw: string): string {
  const hex = /^\$HEX\[([0-9a-fA-F]*)\]$/.exec(raw);
  return hex ? Buffer.from(hex[1], 'hex').toString('utf8') : raw;
}

/**
 * Maps corpus hash strings back to item identities. Several items may share
 * one hash; they all resolve together.
 */
export class CorpusIndex {
  private exact = new Map<string, string[]>();
  private folded = new Map<string, string>();

  constructor(records: Iterable<{ identity: string; hash: string }>) {
    for (const r of records) {
      const list = this.exact.get(r.hash);
      if (list) list.push(r.identity);
      else this.exact.set(r.hash, [r.identity]);
      if (!this.folded.has(r.hash.toLowerCase())) this.folded.set(r.hash.toLowerCase(), r.hash);
    }
  }

  identitiesFor(hash: string): string[] {
    return this.exact.get(hash) ?? [];
  }

  resolve(candidate: string): string | null {
    if (this.exact.has(candidate)) return candidate;
    return this.folded.get(candidate.toLowerCase()) ?? null;
  }

  /** Splits a `hash:secret` line at the first colon that yields a known hash. */
  match(line: string): RecoveredLine | null {
    for (let i = line.indexOf(':'); i >= 0; i = line.indexOf(':', i + 1)) {
      const hash = this.resolve(line.slice(0, i));
      if (hash) {
        return { hash, identities: this.identitiesFor(hash), secret: decodeSecret(line.slice(i + 1)) };
      }
    }
    return null;
  }
}

/**
 * Parses `--show` output. Every non-empty line must correlate with the corpus;
 * any stray line fails the whole parse.
 */
export function parseShowOutput(
  raw: string,
  index: CorpusIndex,
): ParseResult<RecoveredLine[], EngineCorrelationError> {
  const recovered: RecoveredLine[] = [];
  const unmatched: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const hit = index.match(line);
    if (hit) recovered.push(hit);
    else unmatched.push(line);
  }
  if (unmatched.length) return { success: false, error: new EngineCorrelationError(unmatched) };
  return { success: true, data: recovered };
}
