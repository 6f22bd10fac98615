import { execa, ExecaError } from 'execa';
import { getLogger } from '../utils/logging.js';
import { toolInvocationsTotal, toolInvocationDurationSeconds } from '../metrics/index.js';

export interface ToolCommand {
  /** Short label used in logs and metrics, e.g. `extractor` */
  name: string;
  command: string;
  cwd?: string;
}

export interface InvokeOptions {
  timeoutMs?: number;
  cwd?: string;
  signal?: AbortSignal;
}

interface Captured {
  stdout: string;
  stderr: string;
  elapsedMs: number;
}

export type ToolOutcome =
  | ({ kind: 'Success'; exitCode: 0 } & Captured)
  | ({ kind: 'NonZeroExit'; exitCode: number | null; signal: string | null } & Captured)
  | ({ kind: 'TimedOut' } & Captured)
  | ({ kind: 'Cancelled' } & Captured)
  | { kind: 'LaunchFailure'; message: string; elapsedMs: number };

export type ToolRunner = (
  tool: ToolCommand,
  args: string[],
  options?: InvokeOptions,
) => Promise<ToolOutcome>;

// Grace period between SIGTERM and SIGKILL once a tool is timed out or cancelled
export const FORCE_KILL_AFTER_MS = 2000;

export type ArgVars = Partial<Record<'keystore' | 'password' | 'alias', string>>;

export function expandArgs(template: readonly string[], vars: ArgVars): string[] {
  return template.map((arg) =>
    arg.replace(/\{(keystore|password|alias)\}/g, (_m, key: keyof ArgVars) => {
      const value = vars[key];
      if (value === undefined) {
        throw new Error(`Argument template needs {${key}} but no value was given`);
      }
      return value;
    }),
  );
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function classify(err: ExecaError, elapsedMs: number): ToolOutcome {
  const captured = { stdout: text(err.stdout), stderr: text(err.stderr), elapsedMs };
  if (err.timedOut) return { kind: 'TimedOut', ...captured };
  if (err.isCanceled) return { kind: 'Cancelled', ...captured };
  if (err.exitCode !== undefined || err.signal !== undefined) {
    return {
      kind: 'NonZeroExit',
      exitCode: err.exitCode ?? null,
      signal: err.signal ?? null,
      ...captured,
    };
  }
  return { kind: 'LaunchFailure', message: err.code ?? err.shortMessage, elapsedMs };
}

/**
 * Runs one external command to completion. Never throws for process-level
 * failures; they come back as a tagged outcome.
 */
export const invokeTool: ToolRunner = async (tool, args, options = {}) => {
  const started = Date.now();
  let outcome: ToolOutcome;
  try {
    const result = await execa(tool.command, args, {
      cwd: options.cwd ?? tool.cwd,
      timeout: options.timeoutMs || undefined,
      cancelSignal: options.signal,
      forceKillAfterDelay: FORCE_KILL_AFTER_MS,
      stdin: 'ignore',
    });
    outcome = {
      kind: 'Success',
      exitCode: 0,
      stdout: text(result.stdout),
      stderr: text(result.stderr),
      elapsedMs: Date.now() - started,
    };
  } catch (err) {
    if (!(err instanceof ExecaError)) throw err;
    outcome = classify(err, Date.now() - started);
  }
  toolInvocationsTotal.inc({ tool: tool.name, outcome: outcome.kind });
  toolInvocationDurationSeconds.observe({ tool: tool.name }, outcome.elapsedMs / 1000);
  getLogger().debug(
    { tool: tool.name, command: tool.command, outcome: outcome.kind, elapsedMs: outcome.elapsedMs },
    'tool-invocation',
  );
  return outcome;
};
