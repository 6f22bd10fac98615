import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../config/index.js';
import { InputNotFoundError, PrerequisiteMissingError, describeError } from '../core/errors.js';
import { advancePhase, isTerminal } from '../core/phase.js';
import type { AttackSpec, BatchSession, HashRecord, Phase, StageName } from '../core/types.js';
import { EventBus } from '../events/eventBus.js';
import type { PipelineEvents } from '../events/pipelineEvents.js';
import { phaseTransitionsTotal } from '../metrics/index.js';
import { buildReport, type BatchReport } from '../reports/buildReport.js';
import { reportDir, writeJsonReport, writeXlsxReport } from '../reports/writers.js';
import { SessionRepository } from '../repositories/sessionRepository.js';
import type { EngineLauncher } from '../tools/engineProcess.js';
import type { ToolRunner } from '../tools/invoker.js';
import { getLogger } from '../utils/logging.js';
import { writeCorpus } from './corpus.js';
import { CrackingStage } from './crackingStage.js';
import { ExtractionStage } from './extractionStage.js';
import { pendingOutcome } from './outcomes.js';
import { checkPrerequisites } from './prerequisites.js';
import { Reconciler } from './reconciler.js';
import { scanItems } from './scanner.js';

export interface PipelineDeps {
  config: AppConfig;
  store?: SessionRepository;
  runner?: ToolRunner;
  launcher?: EngineLauncher;
  bus?: EventBus<PipelineEvents>;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Fetch certificate metadata for cracked items; defaults to certificate.enabled */
  enrich?: boolean;
  /** Engine deadline override in ms */
  timeoutMs?: number;
  /** Stop (resumably) once this stage has finished */
  stopAfter?: 'scan' | 'extract';
  /** Report formats; `false` writes nothing */
  reports?: 'all' | 'json' | false;
  /** Check that the external tools can be launched first; defaults to true */
  preflight?: boolean;
}

export type PipelineStatus = 'done' | 'failed' | 'interrupted' | 'stopped';

export interface PipelineResult {
  status: PipelineStatus;
  session: BatchSession;
  report: BatchReport;
  reportFiles: string[];
}

/**
 * Sequences Scanning -> Extracting -> Cracking -> Reconciling -> Done for one
 * session, persisting after every transition. A stage failure moves the
 * session to Failed; cancellation leaves it in its current phase for resume.
 */
export class BatchPipeline {
  readonly bus: EventBus<PipelineEvents>;
  readonly store: SessionRepository;
  private now: () => Date;
  private extraction: ExtractionStage;
  private cracking: CrackingStage;
  private reconciler: Reconciler;

  constructor(private deps: PipelineDeps) {
    this.bus = deps.bus || new EventBus<PipelineEvents>();
    this.store = deps.store || new SessionRepository(deps.config.paths.sessionDir);
    this.now = deps.now || (() => new Date());
    this.extraction = new ExtractionStage({ config: deps.config, runner: deps.runner, now: this.now });
    this.cracking = new CrackingStage({
      config: deps.config,
      runner: deps.runner,
      launcher: deps.launcher,
      bus: this.bus,
      now: this.now,
    });
    this.reconciler = new Reconciler({ config: deps.config, runner: deps.runner });
  }

  async start(rootPath: string, attack: AttackSpec, opts: RunOptions = {}): Promise<PipelineResult> {
    if (!fs.existsSync(rootPath)) throw new InputNotFoundError(rootPath);
    await this.preflight(opts);
    const session = await this.store.create(path.resolve(rootPath), attack, this.now());
    return this.drive(session, opts);
  }

  async resume(sessionId: string, opts: RunOptions = {}): Promise<PipelineResult> {
    const session = await this.store.get(sessionId);
    if (isTerminal(session.phase)) {
      getLogger().info({ sessionId, phase: session.phase }, 'session-already-finished');
      return this.finish(session, session.phase === 'Done' ? 'done' : 'failed', opts);
    }
    await this.preflight(opts);
    getLogger().info({ sessionId, phase: session.phase }, 'session-resume');
    return this.drive(session, opts);
  }

  private async preflight(opts: RunOptions) {
    if (opts.preflight === false) return;
    const { certificate } = this.deps.config;
    const checks = await checkPrerequisites(this.deps.config, {
      runner: this.deps.runner,
      certificate: certificate.enabled && (opts.enrich ?? true),
      signal: opts.signal,
    });
    const missing = checks.filter((c) => !c.ok);
    if (missing.length > 0) throw new PrerequisiteMissingError(missing);
  }

  private async drive(session: BatchSession, opts: RunOptions): Promise<PipelineResult> {
    let status: PipelineStatus;
    try {
      status = await this.execute(session, opts);
    } catch (err) {
      if (isTerminal(session.phase)) throw err;
      await this.fail(session, describeError(err));
      status = 'failed';
    }
    return this.finish(session, status, opts);
  }

  private async execute(session: BatchSession, opts: RunOptions): Promise<PipelineStatus> {
    const log = getLogger();
    const cfg = this.deps.config;
    delete session.interruptedAt;

    // Scanning
    if (session.scanMode === null) {
      const t = this.beginStage(session, 'scanning');
      const scan = await scanItems(session.rootPath, { extensions: cfg.scanner.extensions, now: this.now });
      session.scanMode = scan.mode;
      session.items = scan.items;
      this.endStage(session, 'scanning', t, scan.reason ?? scan.mode);
      await this.persist(session);
    }
    if (session.items.length === 0) {
      log.warn({ sessionId: session.sessionId, code: 'NoItemsDiscovered' }, 'batch-empty');
      await this.transition(session, 'Done');
      return 'done';
    }
    if (opts.stopAfter === 'scan') return 'stopped';

    // Extracting
    if (session.phase === 'Scanning' || session.phase === 'Extracting') {
      await this.transition(session, 'Extracting');
      const t = this.beginStage(session, 'extracting');
      const todo = session.items.filter((i) => !session.extraction[i.identity]);
      const result = await this.extraction.run(todo, {
        existing: session.hashes,
        signal: opts.signal,
        onItem: (entry) =>
          this.bus.emit('itemExtracted', {
            sessionId: session.sessionId,
            identity: entry.identity,
            status: entry.status,
          }),
      });
      for (const entry of result.log) {
        session.extraction[entry.identity] = entry;
        const current = session.outcomes[entry.identity];
        if (entry.status === 'failed' && entry.error && (!current || current.status === 'Pending')) {
          session.outcomes[entry.identity] = {
            identity: entry.identity,
            status: 'Error',
            error: entry.error,
          };
        }
      }
      Object.assign(session.hashes, result.records);
      const records = session.items
        .map((i) => session.hashes[i.identity])
        .filter((r): r is HashRecord => Boolean(r));
      for (const r of records) {
        if (!session.outcomes[r.identity]) session.outcomes[r.identity] = pendingOutcome(r.identity);
      }
      if (result.failure) throw result.failure.reason;
      if (result.cancelled) return this.interrupt(session);

      if (records.length > 0) {
        session.corpus = await writeCorpus(records, this.corpusFile(session));
      }
      this.endStage(session, 'extracting', t, `${records.length}/${session.items.length}`);
      await this.persist(session);
      if (records.length === 0) {
        log.warn({ sessionId: session.sessionId }, 'no-hashes-extracted');
        await this.transition(session, 'Done');
        return 'done';
      }
    }
    if (opts.stopAfter === 'extract') return 'stopped';

    // Cracking
    if (session.phase === 'Extracting' || session.phase === 'Cracking') {
      await this.transition(session, 'Cracking');
      const t = this.beginStage(session, 'cracking');
      const entries = session.items
        .filter((i) => session.hashes[i.identity])
        .map((i) => ({ identity: i.identity, hash: session.hashes[i.identity].hash }));
      const outcome = await this.cracking.run({
        sessionId: session.sessionId,
        corpusFile: session.corpus?.file ?? this.corpusFile(session),
        entries,
        outcomes: session.outcomes,
        attack: session.attack,
        potfile: path.join(reportDir(cfg.paths.outputDir, session.sessionId), 'engine.potfile'),
        timeoutMs: opts.timeoutMs,
        signal: opts.signal,
        onFlush: () => this.persist(session),
        onProgress: (p) => {
          session.progress = p;
        },
      });
      this.endStage(session, 'cracking', t, outcome.result);
      if (outcome.result === 'failed') {
        await this.fail(session, outcome.failure ?? { code: 'EngineFailure', message: 'Engine failed' });
        return 'failed';
      }
      if (outcome.result === 'cancelled' || outcome.result === 'timedOut') return this.interrupt(session);
      await this.persist(session);
    }

    // Reconciling
    await this.transition(session, 'Reconciling');
    const enrich = opts.enrich ?? cfg.certificate.enabled;
    if (enrich) {
      const t = this.beginStage(session, 'reconciling');
      const r = await this.reconciler.enrich(session, { signal: opts.signal });
      this.endStage(session, 'reconciling', t, `${r.enriched} enriched, ${r.failed} failed`);
      if (r.cancelled) return this.interrupt(session);
      await this.persist(session);
    }
    await this.transition(session, 'Done');
    return 'done';
  }

  private corpusFile(session: BatchSession): string {
    return path.join(reportDir(this.deps.config.paths.outputDir, session.sessionId), 'hashes.txt');
  }

  private beginStage(session: BatchSession, name: StageName): number {
    session.stages[name] = { ...session.stages[name], startedAt: this.now().toISOString() };
    return Date.now();
  }

  // elapsed time accumulates across resumed runs of the same stage
  private endStage(session: BatchSession, name: StageName, startedMs: number, result: string) {
    const prev = session.stages[name];
    session.stages[name] = {
      startedAt: prev?.startedAt ?? this.now().toISOString(),
      finishedAt: this.now().toISOString(),
      elapsedMs: (prev?.elapsedMs ?? 0) + (Date.now() - startedMs),
      result,
    };
  }

  private async persist(session: BatchSession) {
    session.updatedAt = this.now().toISOString();
    await this.store.save(session);
  }

  private async transition(session: BatchSession, to: Phase) {
    const from = session.phase;
    if (!advancePhase(session, to, this.now())) return;
    phaseTransitionsTotal.inc({ phase: to });
    await this.store.save(session);
    getLogger().info({ sessionId: session.sessionId, from, to }, 'phase-changed');
    await this.bus.emit('phaseChanged', { sessionId: session.sessionId, from, to, at: session.updatedAt });
  }

  // every item still without an outcome is recorded as Pending
  private async interrupt(session: BatchSession): Promise<PipelineStatus> {
    for (const item of session.items) {
      if (!session.outcomes[item.identity]) session.outcomes[item.identity] = pendingOutcome(item.identity);
    }
    session.interruptedAt = this.now().toISOString();
    await this.persist(session);
    getLogger().warn({ sessionId: session.sessionId, phase: session.phase }, 'session-interrupted');
    return 'interrupted';
  }

  private async fail(session: BatchSession, { code, message }: { code: string; message: string }) {
    session.failure = { code, message, at: this.now().toISOString() };
    getLogger().error({ sessionId: session.sessionId, code, message }, 'session-failed');
    await this.transition(session, 'Failed');
  }

  private async finish(
    session: BatchSession,
    status: PipelineStatus,
    opts: RunOptions,
  ): Promise<PipelineResult> {
    const report = buildReport(session, this.now());
    const reportFiles: string[] = [];
    const formats = opts.reports ?? (status === 'stopped' ? false : 'all');
    if (formats) {
      reportFiles.push(await writeJsonReport(report, this.deps.config.paths.outputDir));
      if (formats === 'all') {
        reportFiles.push(await writeXlsxReport(report, this.deps.config.paths.outputDir));
      }
    }
    getLogger().info(
      { sessionId: session.sessionId, status, phase: session.phase, summary: report.summary },
      'batch-finished',
    );
    return { status, session, report, reportFiles };
  }
}
