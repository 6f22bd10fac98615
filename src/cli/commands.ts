import path from 'path';
import { randomUUID } from 'crypto';
import type { AppConfig } from '../config/index.js';
import { PipelineError, describeError } from '../core/errors.js';
import type { AttackSpec, CrackOutcome } from '../core/types.js';
import { buildReport } from '../reports/buildReport.js';
import { writeJsonReport, writeXlsxReport } from '../reports/writers.js';
import { SessionRepository } from '../repositories/sessionRepository.js';
import { readCorpus } from '../services/corpus.js';
import { CrackingStage } from '../services/crackingStage.js';
import { pendingOutcome } from '../services/outcomes.js';
import { checkPrerequisites } from '../services/prerequisites.js';
import { BatchPipeline, type PipelineResult, type RunOptions } from '../services/pipeline.js';
import { scanItems } from '../services/scanner.js';
import type { EngineLauncher } from '../tools/engineProcess.js';
import type { ToolRunner } from '../tools/invoker.js';

export interface CliContext {
  config: AppConfig;
  out: (line: string) => void;
  err: (line: string) => void;
  signal?: AbortSignal;
  runner?: ToolRunner;
  launcher?: EngineLauncher;
}

export interface AttackFlags {
  mask?: string;
  charset?: string;
  wordlist?: string;
  rule?: string[];
}

export interface RunFlags extends AttackFlags {
  timeout?: string;
  enrich?: boolean;
  jsonOnly?: boolean;
}

// --wordlist beats --mask; without flags the configured attack applies
export function attackFromFlags(flags: AttackFlags, cfg: AppConfig['attack']): AttackSpec {
  if (flags.wordlist) return { mode: 'wordlist', wordlist: flags.wordlist, rules: flags.rule ?? [] };
  if (flags.mask) return { mode: 'mask', mask: flags.mask, charset1: flags.charset ?? cfg.charset1 };
  if (cfg.wordlist) return { mode: 'wordlist', wordlist: cfg.wordlist, rules: flags.rule ?? cfg.rules };
  return { mode: 'mask', mask: cfg.mask, charset1: flags.charset ?? cfg.charset1 };
}

export function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new PipelineError('InvalidArgument', `--timeout expects seconds, got "${raw}"`);
  }
  return Math.round(seconds * 1000);
}

function json(ctx: CliContext, value: unknown) {
  ctx.out(JSON.stringify(value, null, 2));
}

export function reportError(ctx: CliContext, err: unknown): number {
  const { code, message } = describeError(err);
  ctx.err(`error: ${code}: ${message}`);
  return 1;
}

function pipeline(ctx: CliContext): BatchPipeline {
  return new BatchPipeline({ config: ctx.config, runner: ctx.runner, launcher: ctx.launcher });
}

function summarize(ctx: CliContext, result: PipelineResult): number {
  json(ctx, {
    sessionId: result.session.sessionId,
    status: result.status,
    phase: result.session.phase,
    failure: result.session.failure ?? null,
    summary: result.report.summary,
    reports: result.reportFiles,
  });
  return result.status === 'failed' ? 1 : 0;
}

function runOptions(ctx: CliContext, flags: RunFlags): RunOptions {
  return {
    signal: ctx.signal,
    timeoutMs: parseTimeout(flags.timeout),
    enrich: flags.enrich,
    reports: flags.jsonOnly ? 'json' : 'all',
  };
}

export async function scanCommand(ctx: CliContext, target: string): Promise<number> {
  try {
    const scan = await scanItems(target, { extensions: ctx.config.scanner.extensions });
    json(ctx, {
      mode: scan.mode,
      reason: scan.reason ?? null,
      items: scan.items.map(({ identity, filePath }) => ({ identity, filePath })),
    });
    return 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function extractCommand(ctx: CliContext, target: string, flags: RunFlags): Promise<number> {
  try {
    const attack = attackFromFlags(flags, ctx.config.attack);
    const result = await pipeline(ctx).start(target, attack, {
      signal: ctx.signal,
      stopAfter: 'extract',
    });
    json(ctx, {
      sessionId: result.session.sessionId,
      status: result.status,
      corpus: result.session.corpus,
      extracted: Object.keys(result.session.hashes).length,
      failed: Object.values(result.session.extraction).filter((e) => e.status === 'failed').length,
    });
    return result.status === 'failed' ? 1 : 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function crackCommand(
  ctx: CliContext,
  corpusFile: string,
  flags: RunFlags & { potfile?: string },
): Promise<number> {
  try {
    const entries = await readCorpus(corpusFile);
    const outcomes: Record<string, CrackOutcome> = {};
    for (const e of entries) outcomes[e.identity] = pendingOutcome(e.identity);
    const stage = new CrackingStage({ config: ctx.config, runner: ctx.runner, launcher: ctx.launcher });
    const result = await stage.run({
      sessionId: `ksrecover-${randomUUID()}`,
      corpusFile: path.resolve(corpusFile),
      entries,
      outcomes,
      attack: attackFromFlags(flags, ctx.config.attack),
      potfile: path.resolve(flags.potfile ?? `${corpusFile}.potfile`),
      timeoutMs: parseTimeout(flags.timeout),
      signal: ctx.signal,
    });
    json(ctx, {
      result: result.result,
      failure: result.failure ?? null,
      cracked: result.cracked,
      outcomes: entries.map((e) => outcomes[e.identity]),
    });
    return result.result === 'failed' ? 1 : 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function runCommand(ctx: CliContext, target: string, flags: RunFlags): Promise<number> {
  try {
    const attack = attackFromFlags(flags, ctx.config.attack);
    return summarize(ctx, await pipeline(ctx).start(target, attack, runOptions(ctx, flags)));
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function resumeCommand(ctx: CliContext, sessionId: string, flags: RunFlags): Promise<number> {
  try {
    return summarize(ctx, await pipeline(ctx).resume(sessionId, runOptions(ctx, flags)));
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function sessionsCommand(ctx: CliContext): Promise<number> {
  try {
    const sessions = await new SessionRepository(ctx.config.paths.sessionDir).list();
    if (!sessions.length) {
      ctx.out('No sessions found');
      return 0;
    }
    for (const s of sessions) {
      const flag = s.interruptedAt ? ' (interrupted)' : '';
      ctx.out(`${s.sessionId}  ${s.phase}${flag}  items=${s.items}  ${s.createdAt}  ${s.rootPath}`);
    }
    return 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function reportCommand(
  ctx: CliContext,
  sessionId: string,
  flags: { jsonOnly?: boolean },
): Promise<number> {
  try {
    const session = await new SessionRepository(ctx.config.paths.sessionDir).get(sessionId);
    const report = buildReport(session);
    const files = [await writeJsonReport(report, ctx.config.paths.outputDir)];
    if (!flags.jsonOnly) files.push(await writeXlsxReport(report, ctx.config.paths.outputDir));
    json(ctx, { sessionId, phase: session.phase, summary: report.summary, reports: files });
    return 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function archiveCommand(ctx: CliContext, sessionId: string): Promise<number> {
  try {
    const target = await new SessionRepository(ctx.config.paths.sessionDir).archive(sessionId);
    ctx.out(`Archived ${sessionId} to ${target}`);
    return 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}

export async function doctorCommand(ctx: CliContext): Promise<number> {
  try {
    const checks = await checkPrerequisites(ctx.config, { runner: ctx.runner, signal: ctx.signal });
    const ok = checks.every((c) => c.ok);
    json(ctx, { ok, checks });
    return ok ? 0 : 1;
  } catch (err) {
    return reportError(ctx, err);
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

export async function purgeCommand(
  ctx: CliContext,
  flags: { olderThan?: string; dryRun?: boolean },
  now: () => Date = () => new Date(),
): Promise<number> {
  try {
    const days = Number(flags.olderThan ?? '7');
    if (!Number.isInteger(days) || days < 0) {
      throw new PipelineError('InvalidArgument', `--older-than expects whole days, got "${flags.olderThan}"`);
    }
    const dryRun = Boolean(flags.dryRun);
    const olderThan = new Date(now().getTime() - days * DAY_MS);
    const { count, sessionIds } = await new SessionRepository(ctx.config.paths.sessionDir).purge({
      olderThan,
      dryRun,
    });
    json(ctx, {
      deleted: dryRun ? 0 : count,
      wouldDelete: dryRun ? count : undefined,
      sessionIds,
      criteria: { olderThanDays: days, dryRun },
    });
    return 0;
  } catch (err) {
    return reportError(ctx, err);
  }
}
