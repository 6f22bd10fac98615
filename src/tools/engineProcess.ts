import readline from 'readline';
import { execa, ExecaError } from 'execa';
import { FORCE_KILL_AFTER_MS } from './invoker.js';

export type EngineExit =
  | { kind: 'exited'; exitCode: number; stderrTail: string }
  | { kind: 'signaled'; signal: string; stderrTail: string }
  | { kind: 'launchFailed'; message: string };

/**
 * Handle to the single long-running engine process. Stdout is delivered line
 * by line; `exited` resolves once the process is gone and stdout is drained.
 */
export interface EngineHandle {
  onLine(listener: (line: string) => void): void;
  readonly exited: Promise<EngineExit>;
  kill(): void;
}

export interface EngineLaunchOptions {
  cwd?: string;
}

export type EngineLauncher = (
  command: string,
  args: string[],
  options?: EngineLaunchOptions,
) => EngineHandle;

const STDERR_TAIL_LINES = 20;

export const launchEngine: EngineLauncher = (command, args, options = {}) => {
  const listeners: ((line: string) => void)[] = [];
  const stderrTail: string[] = [];
  const subprocess = execa(command, args, {
    cwd: options.cwd,
    buffer: false,
    stdin: 'ignore',
    forceKillAfterDelay: FORCE_KILL_AFTER_MS,
  });

  const stdoutLines = readline.createInterface({ input: subprocess.stdout });
  stdoutLines.on('line', (line) => {
    for (const l of listeners) l(line);
  });
  const stdoutDrained = new Promise<void>((resolve) => stdoutLines.once('close', resolve));

  // drain stderr, keeping only the tail for failure messages
  const stderrLines = readline.createInterface({ input: subprocess.stderr });
  stderrLines.on('line', (line) => {
    stderrTail.push(line);
    if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
  });

  const exited = (async (): Promise<EngineExit> => {
    try {
      await subprocess;
      await stdoutDrained;
      return { kind: 'exited', exitCode: 0, stderrTail: stderrTail.join('\n') };
    } catch (err) {
      if (!(err instanceof ExecaError)) throw err;
      if (err.exitCode !== undefined) {
        await stdoutDrained;
        return { kind: 'exited', exitCode: err.exitCode, stderrTail: stderrTail.join('\n') };
      }
      if (err.signal !== undefined) {
        await stdoutDrained;
        return { kind: 'signaled', signal: err.signal, stderrTail: stderrTail.join('\n') };
      }
      stdoutLines.close();
      return { kind: 'launchFailed', message: err.code ?? err.shortMessage };
    }
  })();

  return {
    onLine(listener) {
      listeners.push(listener);
    },
    exited,
    kill() {
      subprocess.kill();
    },
  };
};
