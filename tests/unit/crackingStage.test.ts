import { describe, it, expect, beforeEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { CrackingStage, buildEngineArgs, type CrackingInput } from '../../src/services/crackingStage.js';
import { pendingOutcome } from '../../src/services/outcomes.js';
import { EventBus } from '../../src/events/eventBus.js';
import type { PipelineEvents } from '../../src/events/pipelineEvents.js';
import type { EngineExit, EngineHandle, EngineLauncher } from '../../src/tools/engineProcess.js';
import type { ToolRunner } from '../../src/tools/invoker.js';
import type { AppConfig } from '../../src/config/index.js';
import type { EngineProgress } from '../../src/core/types.js';
import { hashFor, makeTmpDir, testConfig } from '../utils/fixtures.js';

const HASH_A = hashFor('pw-a', 'alpha');
const HASH_B = hashFor('pw-b', 'beta');
const STATUS = JSON.stringify({
  progress: [50, 100],
  recovered_hashes: [1, 2],
  devices: [{ speed: 1000 }, { speed: 500 }],
});

interface Script {
  lines?: string[];
  exit?: EngineExit;
  afterMs?: number;
}

class FakeEngine implements EngineHandle {
  readonly exited: Promise<EngineExit>;
  killed = false;
  private listeners: ((line: string) => void)[] = [];
  private resolveExit: (exit: EngineExit) => void = () => undefined;

  constructor(script: Script) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
    setTimeout(() => {
      for (const line of script.lines ?? []) this.listeners.forEach((l) => l(line));
      if (script.exit) this.resolveExit(script.exit);
    }, script.afterMs ?? 30);
  }

  onLine(listener: (line: string) => void) {
    this.listeners.push(listener);
  }

  kill() {
    this.killed = true;
    this.resolveExit({ kind: 'signaled', signal: 'SIGTERM', stderrTail: '' });
  }
}

function scripted(script: Script) {
  const engines: FakeEngine[] = [];
  const calls: string[][] = [];
  const launcher: EngineLauncher = (_command, args) => {
    calls.push(args);
    const engine = new FakeEngine(script);
    engines.push(engine);
    return engine;
  };
  return { launcher, engines, calls };
}

function showing(stdout: string) {
  return vi.fn<Parameters<ToolRunner>, ReturnType<ToolRunner>>(async () => ({
    kind: 'Success',
    exitCode: 0,
    stdout,
    stderr: '',
    elapsedMs: 2,
  }));
}

describe('CrackingStage', () => {
  let config: AppConfig;
  let input: CrackingInput;

  beforeEach(() => {
    const root = makeTmpDir('ksr-crack-');
    config = testConfig(root);
    input = {
      sessionId: 'sess-1',
      corpusFile: path.join(root, 'hashes.txt'),
      entries: [
        { identity: 'alpha', hash: HASH_A },
        { identity: 'beta', hash: HASH_B },
      ],
      outcomes: { alpha: pendingOutcome('alpha'), beta: pendingOutcome('beta') },
      attack: { mode: 'mask', mask: '?1?1?1?1' },
      potfile: path.join(root, 'engine.potfile'),
    };
  });

  it('settles live hits as Cracked and the rest as Exhausted on a normal exit', async () => {
    const { launcher } = scripted({
      lines: [STATUS, `${HASH_A}:pw-a`],
      exit: { kind: 'exited', exitCode: 1, stderrTail: '' },
    });
    const runner = showing(`${HASH_A}:pw-a\n`);
    const flushes = vi.fn(async () => undefined);
    const seen: EngineProgress[] = [];
    const stage = new CrackingStage({ config, launcher, runner });
    const result = await stage.run({ ...input, onFlush: flushes, onProgress: (p) => seen.push(p) });

    expect(result.result).toBe('completed');
    expect(result.cracked).toBe(1);
    expect(input.outcomes.alpha).toMatchObject({ status: 'Cracked', recoveredSecret: 'pw-a' });
    expect(input.outcomes.beta.status).toBe('Exhausted');
    expect(result.progress).toMatchObject({ progressDone: 50, progressTotal: 100, recovered: 1, total: 2, speed: 1500 });
    expect(seen).toHaveLength(1);
    expect(flushes).toHaveBeenCalled();
    expect(runner.mock.calls[0][1]).toEqual([
      '-m', '15500', '--potfile-path', input.potfile, '--show', input.corpusFile,
    ]);
  });

  it('carries the expected completion time on progress', async () => {
    const now = () => new Date('2024-05-01T10:00:00.000Z');
    const startedAt = now().getTime() / 1000 - 120;
    const line = JSON.stringify({
      progress: [50, 100],
      recovered_hashes: [0, 2],
      devices: [{ speed: 10 }],
      time_start: startedAt,
    });
    const { launcher } = scripted({ lines: [line], exit: { kind: 'exited', exitCode: 1, stderrTail: '' } });
    const result = await new CrackingStage({ config, launcher, runner: showing(''), now }).run(input);
    expect(result.progress).toEqual({
      recovered: 0,
      total: 2,
      progressDone: 50,
      progressTotal: 100,
      speed: 10,
      estimatedCompletion: '2024-05-01T10:02:00.000Z',
      updatedAt: '2024-05-01T10:00:00.000Z',
    });
  });

  it('publishes progress and cracked events on the bus', async () => {
    const { launcher } = scripted({
      lines: [STATUS, `${HASH_A}:pw-a`],
      exit: { kind: 'exited', exitCode: 1, stderrTail: '' },
    });
    const bus = new EventBus<PipelineEvents>();
    const cracked: string[] = [];
    const progress: number[] = [];
    bus.on('itemCracked', (e) => {
      cracked.push(e.identity);
    });
    bus.on('progress', (e) => {
      progress.push(e.progress.progressDone);
    });
    await new CrackingStage({ config, launcher, runner: showing(''), bus }).run(input);
    expect(cracked).toEqual(['alpha']);
    expect(progress).toEqual([50]);
  });

  it('applies potfile results for every item sharing a hash', async () => {
    const { launcher } = scripted({ exit: { kind: 'exited', exitCode: 0, stderrTail: '' } });
    const shared: CrackingInput = {
      ...input,
      entries: [...input.entries, { identity: 'gamma', hash: HASH_A }],
      outcomes: { ...input.outcomes, gamma: pendingOutcome('gamma') },
    };
    const result = await new CrackingStage({ config, launcher, runner: showing(`${HASH_A}:pw-a\n`) }).run(shared);
    expect(result.cracked).toBe(2);
    expect(shared.outcomes.gamma).toMatchObject({ status: 'Cracked', recoveredSecret: 'pw-a' });
    expect(shared.outcomes.beta.status).toBe('Exhausted');
  });

  it('stops the engine at the deadline and keeps unresolved items Pending', async () => {
    const { launcher, engines } = scripted({ lines: [STATUS] });
    const runner = showing(`${HASH_B}:pw-b\n`);
    const result = await new CrackingStage({ config, launcher, runner }).run({ ...input, timeoutMs: 80 });
    expect(result.result).toBe('timedOut');
    expect(engines[0].killed).toBe(true);
    expect(input.outcomes.beta).toMatchObject({ status: 'Cracked', recoveredSecret: 'pw-b' });
    expect(input.outcomes.alpha.status).toBe('Pending');
  });

  it('kills the engine on cancel without touching outcomes', async () => {
    const { launcher, engines } = scripted({});
    const runner = showing('');
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 50);
    const result = await new CrackingStage({ config, launcher, runner }).run({ ...input, signal: ac.signal });
    expect(result.result).toBe('cancelled');
    expect(engines[0].killed).toBe(true);
    expect(runner).not.toHaveBeenCalled();
    expect(input.outcomes.alpha.status).toBe('Pending');
    expect(input.outcomes.beta.status).toBe('Pending');
  });

  it('fails the stage and marks pending items on an engine crash', async () => {
    const { launcher } = scripted({
      lines: [`${HASH_A}:pw-a`],
      exit: { kind: 'exited', exitCode: 255, stderrTail: 'device lost' },
    });
    const runner = showing('');
    const result = await new CrackingStage({ config, launcher, runner }).run(input);
    expect(result.result).toBe('failed');
    expect(result.failure).toEqual({ code: 'EngineFailure', message: 'Engine exited with code 255: device lost' });
    expect(input.outcomes.alpha.status).toBe('Cracked');
    expect(input.outcomes.beta).toMatchObject({
      status: 'Error',
      error: { stage: 'cracking', code: 'EngineFailure' },
    });
    expect(runner).not.toHaveBeenCalled();
  });

  it('fails when the potfile query reports a hash outside the corpus', async () => {
    const { launcher } = scripted({ exit: { kind: 'exited', exitCode: 0, stderrTail: '' } });
    const runner = showing('$jksprivk$*FFFF*00FF*other:secret\n');
    const result = await new CrackingStage({ config, launcher, runner }).run(input);
    expect(result.result).toBe('failed');
    expect(result.failure?.code).toBe('EngineCorrelationFailure');
    expect(input.outcomes.alpha.status).toBe('Error');
  });

  it('resolves everything from an existing potfile without launching', async () => {
    fs.writeFileSync(input.potfile, '');
    const { launcher, calls } = scripted({});
    const runner = showing(`${HASH_A}:pw-a\n${HASH_B}:$HEX[70772d62]\n`);
    const result = await new CrackingStage({ config, launcher, runner }).run(input);
    expect(result.result).toBe('completed');
    expect(calls).toEqual([]);
    expect(input.outcomes.beta).toMatchObject({ status: 'Cracked', recoveredSecret: 'pw-b' });
  });

  it('skips when nothing is pending', async () => {
    const { launcher, calls } = scripted({});
    input.outcomes.alpha = { identity: 'alpha', status: 'Exhausted' };
    input.outcomes.beta = { identity: 'beta', status: 'Exhausted' };
    const result = await new CrackingStage({ config, launcher, runner: showing('') }).run(input);
    expect(result.result).toBe('skipped');
    expect(calls).toEqual([]);
  });
});

describe('buildEngineArgs', () => {
  const engine = testConfig(makeTmpDir()).engine;
  const base = { sessionId: 's1', corpusFile: '/w/hashes.txt', potfile: '/w/engine.potfile' };

  it('builds a mask attack with a custom charset', () => {
    expect(buildEngineArgs(engine, { ...base, attack: { mode: 'mask', mask: '?1?1', charset1: 'ab' } })).toEqual([
      '-m', '15500', '-a', '3', '--potfile-path', '/w/engine.potfile', '--session', 's1',
      '--status', '--status-json', '--status-timer', '1', '-1', 'ab', '/w/hashes.txt', '?1?1',
    ]);
  });

  it('builds a wordlist attack with rules', () => {
    const args = buildEngineArgs(engine, {
      ...base,
      attack: { mode: 'wordlist', wordlist: '/w/words.txt', rules: ['best64.rule'] },
    });
    expect(args.slice(2, 4)).toEqual(['-a', '0']);
    expect(args.slice(-4)).toEqual(['/w/hashes.txt', '/w/words.txt', '-r', 'best64.rule']);
  });
});
