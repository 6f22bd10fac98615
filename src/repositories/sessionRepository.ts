import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { loadConfig } from '../config/index.js';
import {
  PersistenceWriteError,
  RepositoryError,
  SessionImmutableError,
  SessionNotFoundError,
} from '../core/errors.js';
import { isTerminal } from '../core/phase.js';
import type { AttackSpec, BatchSession, Phase } from '../core/types.js';
import { sessionsPurgedTotal, sessionWritesTotal } from '../metrics/index.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { getLogger } from '../utils/logging.js';

const phaseSchema = z.enum(['Scanning', 'Extracting', 'Cracking', 'Reconciling', 'Done', 'Failed']);
const itemErrorSchema = z.object({
  stage: z.enum(['extraction', 'cracking', 'metadata']),
  code: z.string(),
  message: z.string(),
});
const timingSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  elapsedMs: z.number().optional(),
  result: z.string().optional(),
});

const attackSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('mask'), mask: z.string().min(1), charset1: z.string().optional() }),
  z.object({ mode: z.literal('wordlist'), wordlist: z.string().min(1), rules: z.array(z.string()) }),
]);

const sessionSchema = z.object({
  sessionId: z.string(),
  rootPath: z.string(),
  scanMode: z.enum(['single', 'group', 'batch', 'empty']).nullable(),
  attack: attackSchema,
  phase: phaseSchema,
  phaseHistory: z.array(z.object({ phase: phaseSchema, at: z.string() })),
  createdAt: z.string(),
  updatedAt: z.string(),
  stages: z.object({
    scanning: timingSchema.optional(),
    extracting: timingSchema.optional(),
    cracking: timingSchema.optional(),
    reconciling: timingSchema.optional(),
  }),
  items: z.array(z.object({ identity: z.string(), filePath: z.string(), discoveredAt: z.string() })),
  extraction: z.record(
    z.string(),
    z.object({
      identity: z.string(),
      status: z.enum(['extracted', 'failed']),
      attemptedAt: z.string(),
      attempts: z.number().int(),
      elapsedMs: z.number(),
      error: itemErrorSchema.optional(),
    }),
  ),
  hashes: z.record(
    z.string(),
    z.object({
      identity: z.string(),
      hash: z.string(),
      algorithmTag: z.string(),
      alias: z.string().optional(),
      extractedAt: z.string(),
    }),
  ),
  corpus: z.object({ file: z.string(), lines: z.number().int() }).nullable(),
  outcomes: z.record(
    z.string(),
    z.object({
      identity: z.string(),
      status: z.enum(['Pending', 'Cracked', 'Exhausted', 'Error']),
      recoveredSecret: z.string().optional(),
      elapsedMs: z.number().optional(),
      error: itemErrorSchema.optional(),
    }),
  ),
  certificates: z.record(
    z.string(),
    z.object({
      alias: z.string().nullable(),
      fingerprintMD5: z.string().nullable(),
      fingerprintSHA1: z.string().nullable(),
      keystoreFormat: z.string().nullable(),
      extractionError: z.string().optional(),
    }),
  ),
  progress: z
    .object({
      recovered: z.number(),
      total: z.number(),
      progressDone: z.number(),
      progressTotal: z.number(),
      speed: z.number(),
      estimatedCompletion: z.string().nullable().default(null),
      updatedAt: z.string(),
    })
    .nullable(),
  failure: z.object({ code: z.string(), message: z.string(), at: z.string() }).optional(),
  interruptedAt: z.string().optional(),
});

export interface SessionSummary {
  sessionId: string;
  rootPath: string;
  phase: Phase;
  items: number;
  createdAt: string;
  updatedAt: string;
  interruptedAt: string | null;
}

const SESSION_ID = /^[A-Za-z0-9][A-Za-z0-9-]*$/;

export function newSession(rootPath: string, attack: AttackSpec, now = new Date()): BatchSession {
  const stamp = now.toISOString();
  return {
    sessionId: randomUUID(),
    rootPath,
    scanMode: null,
    attack,
    phase: 'Scanning',
    phaseHistory: [{ phase: 'Scanning', at: stamp }],
    createdAt: stamp,
    updatedAt: stamp,
    stages: {},
    items: [],
    extraction: {},
    hashes: {},
    corpus: null,
    outcomes: {},
    certificates: {},
    progress: null,
  };
}

/**
 * One JSON document per session under the session directory. Writes for the
 * same session are queued, and each lands through a temp file and rename.
 */
export class SessionRepository {
  private chains = new Map<string, Promise<void>>();
  private persistedPhase = new Map<string, Phase>();

  constructor(private dir: string = loadConfig().paths.sessionDir) {}

  get directory(): string {
    return this.dir;
  }

  filePath(sessionId: string): string {
    return path.join(this.dir, `${sessionId}.json`);
  }

  async create(rootPath: string, attack: AttackSpec, now = new Date()): Promise<BatchSession> {
    const session = newSession(rootPath, attack, now);
    await this.save(session);
    getLogger().info({ sessionId: session.sessionId, rootPath }, 'session-created');
    return session;
  }

  save(session: BatchSession): Promise<void> {
    // snapshot now so later in-memory changes cannot leak into a queued write
    const body = JSON.stringify(session, null, 2);
    const { sessionId, phase } = session;
    const prev = this.chains.get(sessionId) ?? Promise.resolve();
    const next = prev
      .catch(() => undefined)
      .then(() => this.write(sessionId, phase, body));
    this.chains.set(sessionId, next);
    return next;
  }

  private async write(sessionId: string, phase: Phase, body: string): Promise<void> {
    const persisted = this.persistedPhase.get(sessionId) ?? (await this.readPhase(sessionId));
    if (persisted && isTerminal(persisted)) {
      throw new SessionImmutableError(sessionId, persisted);
    }
    try {
      await writeFileAtomic(this.filePath(sessionId), body);
    } catch (err) {
      sessionWritesTotal.inc({ result: 'error' });
      if (err instanceof PersistenceWriteError) throw err;
      throw new PersistenceWriteError(this.filePath(sessionId), err);
    }
    sessionWritesTotal.inc({ result: 'ok' });
    this.persistedPhase.set(sessionId, phase);
  }

  private async readPhase(sessionId: string): Promise<Phase | null> {
    if (!fs.existsSync(this.filePath(sessionId))) return null;
    return (await this.get(sessionId)).phase;
  }

  async get(sessionId: string): Promise<BatchSession> {
    if (!SESSION_ID.test(sessionId)) throw new SessionNotFoundError(sessionId);
    return this.load(this.filePath(sessionId), sessionId);
  }

  private async load(file: string, sessionId: string): Promise<BatchSession> {
    let text: string;
    try {
      text = await fs.promises.readFile(file, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new SessionNotFoundError(sessionId);
      }
      throw new RepositoryError(`Failed to read session ${sessionId}`, err);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new RepositoryError(`Session file ${file} is not valid JSON`, err);
    }
    const parsed = sessionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RepositoryError(`Session file ${file} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async list(): Promise<SessionSummary[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw new RepositoryError('Failed to list sessions', err);
    }
    const out: SessionSummary[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      const sessionId = name.slice(0, -'.json'.length);
      try {
        const s = await this.load(path.join(this.dir, name), sessionId);
        out.push({
          sessionId: s.sessionId,
          rootPath: s.rootPath,
          phase: s.phase,
          items: s.items.length,
          createdAt: s.createdAt,
          updatedAt: s.updatedAt,
          interruptedAt: s.interruptedAt ?? null,
        });
      } catch (err) {
        if (!(err instanceof RepositoryError)) throw err;
        getLogger().warn({ file: name, err: err.message }, 'session-unreadable');
      }
    }
    return out.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async archive(sessionId: string): Promise<string> {
    const session = await this.get(sessionId);
    await (this.chains.get(sessionId) ?? Promise.resolve()).catch(() => undefined);
    const target = path.join(this.dir, 'archive', `${session.sessionId}.json`);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.rename(this.filePath(sessionId), target);
    } catch (err) {
      throw new PersistenceWriteError(target, err);
    }
    this.persistedPhase.delete(sessionId);
    this.chains.delete(sessionId);
    getLogger().info({ sessionId, target }, 'session-archived');
    return target;
  }

  /**
   * Deletes finished (Done or Failed) sessions last updated before `olderThan`.
   * Active and interrupted sessions are never touched.
   */
  async purge(criteria: {
    olderThan: Date;
    dryRun?: boolean;
  }): Promise<{ count: number; sessionIds: string[] }> {
    const cutoff = criteria.olderThan.getTime();
    const victims = (await this.list())
      .filter((s) => isTerminal(s.phase) && Date.parse(s.updatedAt) < cutoff)
      .map((s) => s.sessionId);
    if (criteria.dryRun) return { count: victims.length, sessionIds: victims };
    for (const sessionId of victims) {
      try {
        await fs.promises.unlink(this.filePath(sessionId));
      } catch (err) {
        throw new RepositoryError(`Failed to purge session ${sessionId}`, err);
      }
      this.persistedPhase.delete(sessionId);
      this.chains.delete(sessionId);
    }
    sessionsPurgedTotal.inc(victims.length);
    getLogger().info(
      { count: victims.length, olderThan: criteria.olderThan.toISOString() },
      'sessions-purged',
    );
    return { count: victims.length, sessionIds: victims };
  }
}
