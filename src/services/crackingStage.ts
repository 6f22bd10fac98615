import fs from 'fs';
import type { AppConfig } from '../config/index.js';
import { EngineFailureError, describeError } from '../core/errors.js';
import type { AttackSpec, EngineProgress, ItemError } from '../core/types.js';
import { EventBus } from '../events/eventBus.js';
import type { PipelineEvents } from '../events/pipelineEvents.js';
import { engineRecoveredRatio, enginePollLastTickSeconds } from '../metrics/index.js';
import {
  CorpusIndex,
  estimateCompletion,
  parseShowOutput,
  parseStatusLine,
  type RecoveredLine,
} from '../parsers/engineOutput.js';
import { launchEngine, type EngineExit, type EngineLauncher } from '../tools/engineProcess.js';
import { invokeTool, type ToolRunner } from '../tools/invoker.js';
import { getLogger } from '../utils/logging.js';
import type { CorpusEntry } from './corpus.js';
import { pendingIdentities, settleOutcome, type OutcomeMap } from './outcomes.js';

export type CrackingResult = 'completed' | 'timedOut' | 'cancelled' | 'failed' | 'skipped';

type StopReason = 'timeout' | 'cancel' | 'fatal';

export interface CrackingStageDeps {
  config: AppConfig;
  runner?: ToolRunner;
  launcher?: EngineLauncher;
  bus?: EventBus<PipelineEvents>;
  now?: () => Date;
}

export interface CrackingInput {
  sessionId: string;
  corpusFile: string;
  entries: readonly CorpusEntry[];
  /** Mutated in place: Pending outcomes are settled as the engine reports */
  outcomes: OutcomeMap;
  attack: AttackSpec;
  potfile: string;
  /** Overrides engine.timeoutMs; 0 means no deadline */
  timeoutMs?: number;
  signal?: AbortSignal;
  onFlush?: () => Promise<void>;
  onProgress?: (progress: EngineProgress) => void;
}

export interface CrackingStageResult {
  result: CrackingResult;
  cracked: number;
  progress: EngineProgress | null;
  failure?: { code: string; message: string };
}

export function buildEngineArgs(
  config: AppConfig['engine'],
  input: Pick<CrackingInput, 'sessionId' | 'corpusFile' | 'attack' | 'potfile'>,
): string[] {
  const args = [
    '-m',
    config.hashMode,
    '-a',
    input.attack.mode === 'mask' ? '3' : '0',
    '--potfile-path',
    input.potfile,
    '--session',
    input.sessionId,
    '--status',
    '--status-json',
    '--status-timer',
    String(config.statusTimerSec),
  ];
  if (input.attack.mode === 'mask' && input.attack.charset1) {
    args.push('-1', input.attack.charset1);
  }
  args.push(...config.extraArgs, input.corpusFile);
  if (input.attack.mode === 'mask') {
    args.push(input.attack.mask);
  } else {
    args.push(input.attack.wordlist);
    for (const rule of input.attack.rules) args.push('-r', rule);
  }
  return args;
}

function describeExit(exit: EngineExit): string {
  switch (exit.kind) {
    case 'launchFailed':
      return `Engine could not be started: ${exit.message}`;
    case 'signaled':
      return `Engine was killed by ${exit.signal}`;
    case 'exited':
      return exit.stderrTail
        ? `Engine exited with code ${exit.exitCode}: ${exit.stderrTail.split('\n').slice(-3).join(' | ')}`
        : `Engine exited with code ${exit.exitCode}`;
  }
}

/**
 * Drives one engine process over the whole corpus. A poll loop drains the
 * engine's stdout, applies live recoveries, publishes progress and flushes.
 * When the engine stops, the potfile query decides the final cracked set.
 */
export class CrackingStage {
  private runner: ToolRunner;
  private launcher: EngineLauncher;
  private bus: EventBus<PipelineEvents>;
  private now: () => Date;

  constructor(private deps: CrackingStageDeps) {
    this.runner = deps.runner || invokeTool;
    this.launcher = deps.launcher || launchEngine;
    this.bus = deps.bus || new EventBus<PipelineEvents>();
    this.now = deps.now || (() => new Date());
  }

  async run(input: CrackingInput): Promise<CrackingStageResult> {
    const log = getLogger();
    const cfg = this.deps.config.engine;
    const index = new CorpusIndex(input.entries);
    const identities = input.entries.map((e) => e.identity);
    let cracked = 0;
    let progress: EngineProgress | null = null;
    const started = Date.now();

    const applyRecovered = async (hits: readonly RecoveredLine[], elapsedMs: number) => {
      let changed = 0;
      for (const hit of hits) {
        for (const identity of hit.identities) {
          const next = { status: 'Cracked' as const, recoveredSecret: hit.secret, elapsedMs };
          if (settleOutcome(input.outcomes, identity, next)) {
            changed++;
            await this.bus.emit('itemCracked', { sessionId: input.sessionId, identity, elapsedMs });
          }
        }
      }
      cracked += changed;
      return changed;
    };

    const failPending = (error: ItemError) => {
      for (const id of pendingIdentities(input.outcomes, identities)) {
        settleOutcome(input.outcomes, id, { status: 'Error', error });
      }
    };

    const fatal = (err: unknown): CrackingStageResult => {
      const failure = describeError(err);
      failPending({ stage: 'cracking', ...failure });
      log.error({ err, sessionId: input.sessionId }, 'cracking-failed');
      return { result: 'failed', cracked, progress, failure };
    };

    // authoritative recovered set from the potfile
    const show = async (): Promise<RecoveredLine[]> => {
      const outcome = await this.runner(
        { name: 'engine-show', command: cfg.command, cwd: cfg.cwd },
        ['-m', cfg.hashMode, '--potfile-path', input.potfile, '--show', input.corpusFile],
        { timeoutMs: cfg.showTimeoutMs },
      );
      if (outcome.kind !== 'Success') {
        const detail = outcome.kind === 'LaunchFailure' ? outcome.message : outcome.kind;
        throw new EngineFailureError(`Potfile query failed: ${detail}`);
      }
      const parsed = parseShowOutput(outcome.stdout, index);
      if (!parsed.success) throw parsed.error;
      return parsed.data;
    };

    if (pendingIdentities(input.outcomes, identities).length === 0) {
      return { result: 'skipped', cracked, progress };
    }

    if (fs.existsSync(input.potfile)) {
      try {
        const prior = await applyRecovered(await show(), 0);
        log.info({ sessionId: input.sessionId, recovered: prior }, 'cracking-precheck');
      } catch (err) {
        return fatal(err);
      }
      if (input.onFlush) await input.onFlush();
      if (pendingIdentities(input.outcomes, identities).length === 0) {
        return { result: 'completed', cracked, progress };
      }
    }

    if (input.signal?.aborted) return { result: 'cancelled', cracked, progress };

    const args = buildEngineArgs(cfg, input);
    log.info({ sessionId: input.sessionId, command: cfg.command, args }, 'engine-launch');
    const handle = this.launcher(cfg.command, args, { cwd: cfg.cwd });
    const buffered: string[] = [];
    handle.onLine((line) => buffered.push(line));

    const state: { stopReason: StopReason | null; loopError: unknown } = {
      stopReason: null,
      loopError: null,
    };
    const stop = (reason: StopReason) => {
      if (state.stopReason) return;
      state.stopReason = reason;
      handle.kill();
    };

    const onAbort = () => stop('cancel');
    input.signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutMs = input.timeoutMs ?? cfg.timeoutMs;
    const deadline = timeoutMs > 0 ? setTimeout(() => stop('timeout'), timeoutMs) : null;

    let sinceFlush = 0;
    const flush = async () => {
      sinceFlush = 0;
      if (input.onFlush) await input.onFlush();
    };

    const tick = async () => {
      enginePollLastTickSeconds.set(Date.now() / 1000);
      const lines = buffered.splice(0, buffered.length);
      let dirty = false;
      for (const line of lines) {
        const status = parseStatusLine(line);
        if (status) {
          const at = this.now();
          progress = {
            recovered: status.recovered,
            total: status.total,
            progressDone: status.progressDone,
            progressTotal: status.progressTotal,
            speed: status.speed,
            estimatedCompletion: estimateCompletion(status, at),
            updatedAt: at.toISOString(),
          };
          dirty = true;
          continue;
        }
        const hit = index.match(line);
        if (!hit) continue;
        const changed = await applyRecovered([hit], Date.now() - started);
        if (changed > 0) {
          dirty = true;
          sinceFlush += changed;
          if (sinceFlush >= cfg.flushEvery) await flush();
        }
      }
      if (progress && dirty) {
        engineRecoveredRatio.set(progress.total > 0 ? progress.recovered / progress.total : 0);
        input.onProgress?.(progress);
        await this.bus.emit('progress', { sessionId: input.sessionId, progress });
      }
      if (dirty) await flush();
    };

    let exited = false;
    const loop = (async () => {
      while (!exited) {
        await new Promise((r) => setTimeout(r, cfg.pollIntervalMs));
        try {
          await tick();
        } catch (err) {
          state.loopError = err;
          stop('fatal');
          return;
        }
      }
    })();

    const exit = await handle.exited;
    exited = true;
    if (deadline) clearTimeout(deadline);
    input.signal?.removeEventListener('abort', onAbort);
    await loop;
    if (state.loopError) throw state.loopError;
    // lines that arrived after the last tick
    await tick();

    const elapsed = Date.now() - started;
    log.info(
      { sessionId: input.sessionId, exit, stopReason: state.stopReason, elapsedMs: elapsed },
      'engine-exit',
    );

    if (state.stopReason === 'cancel') {
      return { result: 'cancelled', cracked, progress };
    }

    if (state.stopReason === 'timeout') {
      try {
        await applyRecovered(await show(), elapsed);
      } catch (err) {
        return fatal(err);
      }
      return { result: 'timedOut', cracked, progress };
    }

    if (exit.kind === 'exited' && (exit.exitCode === 0 || exit.exitCode === 1)) {
      try {
        await applyRecovered(await show(), elapsed);
      } catch (err) {
        return fatal(err);
      }
      for (const id of pendingIdentities(input.outcomes, identities)) {
        settleOutcome(input.outcomes, id, { status: 'Exhausted', elapsedMs: elapsed });
      }
      return { result: 'completed', cracked, progress };
    }

    return fatal(new EngineFailureError(describeExit(exit)));
  }
}
