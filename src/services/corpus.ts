import fs from 'fs';
import { z } from 'zod';
import { InputNotFoundError, RepositoryError } from '../core/errors.js';
import type { CorpusRef, HashRecord } from '../core/types.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';

const sidecarSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.object({ identity: z.string(), hash: z.string(), line: z.number().int().positive() })),
});

export interface CorpusEntry {
  identity: string;
  hash: string;
}

export function sidecarPath(corpusFile: string): string {
  return `${corpusFile}.map.json`;
}

/**
 * Writes the engine input file: one line per distinct hash, first-seen order.
 * The sidecar keeps identity -> line so a standalone crack run can report by item.
 */
export async function writeCorpus(records: readonly HashRecord[], file: string): Promise<CorpusRef> {
  const lineOf = new Map<string, number>();
  const entries: { identity: string; hash: string; line: number }[] = [];
  for (const r of records) {
    let line = lineOf.get(r.hash);
    if (line === undefined) {
      line = lineOf.size + 1;
      lineOf.set(r.hash, line);
    }
    entries.push({ identity: r.identity, hash: r.hash, line });
  }
  const body = [...lineOf.keys()].map((h) => `${h}\n`).join('');
  await writeFileAtomic(file, body);
  await writeFileAtomic(sidecarPath(file), JSON.stringify({ version: 1, entries }, null, 2));
  return { file, lines: lineOf.size };
}

export async function readCorpus(file: string): Promise<CorpusEntry[]> {
  let body: string;
  try {
    body = await fs.promises.readFile(file, 'utf8');
  } catch {
    throw new InputNotFoundError(file);
  }
  const hashes = body.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const mapFile = sidecarPath(file);
  if (!fs.existsSync(mapFile)) {
    return hashes.map((hash, i) => ({ identity: `line-${i + 1}`, hash }));
  }
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(mapFile, 'utf8'));
  } catch (err) {
    throw new RepositoryError(`Corpus map ${mapFile} is not valid JSON`, err);
  }
  const parsed = sidecarSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RepositoryError(`Corpus map ${mapFile} is malformed: ${parsed.error.message}`);
  }
  return parsed.data.entries.map(({ identity, hash }) => ({ identity, hash }));
}
