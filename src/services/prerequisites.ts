import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../config/index.js';
import { invokeTool, type ToolOutcome, type ToolRunner } from '../tools/invoker.js';
import { getLogger } from '../utils/logging.js';

export type PrerequisiteTool = 'extractor' | 'engine' | 'certificate';

export interface PrerequisiteCheck {
  tool: PrerequisiteTool;
  command: string;
  ok: boolean;
  /** First output line of the tool, or why it is unusable */
  detail: string;
}

interface Target {
  tool: PrerequisiteTool;
  command: string;
  cwd?: string;
  args: string[];
  probeArgs: string[];
  timeoutMs: number;
}

function firstLine(text: string): string {
  return text.split(/\r?\n/).find((l) => l.trim())?.trim() ?? '';
}

function launchDetail(outcome: ToolOutcome): { ok: boolean; detail: string } {
  switch (outcome.kind) {
    case 'LaunchFailure':
      return { ok: false, detail: `cannot be started: ${outcome.message}` };
    case 'TimedOut':
      return { ok: false, detail: `no response after ${outcome.elapsedMs}ms` };
    case 'Cancelled':
      return { ok: false, detail: 'check cancelled' };
    case 'Success':
      return { ok: true, detail: firstLine(outcome.stdout) || firstLine(outcome.stderr) || 'exit code 0' };
    case 'NonZeroExit':
      // the command exists; usage errors on the version flag still count
      return {
        ok: true,
        detail: firstLine(outcome.stdout) || firstLine(outcome.stderr) || `exit code ${outcome.exitCode}`,
      };
  }
}

// `java -jar <file>` style templates also need the archive on disk
function missingArchive(target: Target): string | null {
  const i = target.args.indexOf('-jar');
  const archive = i >= 0 ? target.args[i + 1] : undefined;
  if (!archive || archive.includes('{')) return null;
  const full = path.resolve(target.cwd ?? process.cwd(), archive);
  return fs.existsSync(full) ? null : `missing ${full}`;
}

/**
 * Verifies that every external tool a batch needs can be launched. The
 * certificate tool is only checked when metadata will be fetched.
 */
export async function checkPrerequisites(
  config: AppConfig,
  opts: { runner?: ToolRunner; certificate?: boolean; signal?: AbortSignal } = {},
): Promise<PrerequisiteCheck[]> {
  const runner = opts.runner || invokeTool;
  const targets: Target[] = [
    { tool: 'extractor', ...config.extractor },
    {
      tool: 'engine',
      command: config.engine.command,
      cwd: config.engine.cwd,
      args: [],
      probeArgs: config.engine.probeArgs,
      timeoutMs: config.engine.showTimeoutMs,
    },
  ];
  if (opts.certificate ?? config.certificate.enabled) {
    targets.push({ tool: 'certificate', ...config.certificate });
  }

  const checks = await Promise.all(
    targets.map(async (t): Promise<PrerequisiteCheck> => {
      const outcome = await runner(
        { name: `preflight:${t.tool}`, command: t.command, cwd: t.cwd },
        t.probeArgs,
        { timeoutMs: t.timeoutMs, signal: opts.signal },
      );
      const launched = launchDetail(outcome);
      const missing = launched.ok ? missingArchive(t) : null;
      return {
        tool: t.tool,
        command: t.command,
        ok: launched.ok && missing === null,
        detail: missing ?? launched.detail,
      };
    }),
  );
  for (const c of checks) {
    if (c.ok) getLogger().debug({ tool: c.tool, detail: c.detail }, 'prerequisite-ok');
    else getLogger().warn({ tool: c.tool, command: c.command, detail: c.detail }, 'prerequisite-missing');
  }
  return checks;
}
