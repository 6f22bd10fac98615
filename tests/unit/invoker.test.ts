import { describe, it, expect } from 'vitest';
import { expandArgs, invokeTool } from '../../src/tools/invoker.js';

const node = { name: 'node-script', command: process.execPath };

describe('invokeTool', () => {
  it('captures stdout and stderr separately on success', async () => {
    const r = await invokeTool(node, ['-e', 'process.stdout.write("out"); process.stderr.write("err")']);
    expect(r.kind).toBe('Success');
    if (r.kind === 'Success') {
      expect(r.stdout).toBe('out');
      expect(r.stderr).toBe('err');
      expect(r.elapsedMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('reports a non-zero exit with its code and stderr', async () => {
    const r = await invokeTool(node, ['-e', 'process.stderr.write("bad input"); process.exit(3)']);
    expect(r.kind).toBe('NonZeroExit');
    if (r.kind === 'NonZeroExit') {
      expect(r.exitCode).toBe(3);
      expect(r.stderr).toBe('bad input');
    }
  });

  it('kills a process that outlives its timeout', async () => {
    const r = await invokeTool(node, ['-e', 'setTimeout(() => {}, 30000)'], { timeoutMs: 200 });
    expect(r.kind).toBe('TimedOut');
    expect(r.elapsedMs).toBeLessThan(10_000);
  });

  it('reports a missing binary as a launch failure', async () => {
    const r = await invokeTool({ name: 'missing', command: '/nonexistent/tool-binary' }, []);
    expect(r.kind).toBe('LaunchFailure');
    if (r.kind === 'LaunchFailure') expect(r.message).toBe('ENOENT');
  });

  it('cancels through an abort signal', async () => {
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 100);
    const r = await invokeTool(node, ['-e', 'setTimeout(() => {}, 30000)'], { signal: ac.signal });
    expect(r.kind).toBe('Cancelled');
  });
});

describe('expandArgs', () => {
  it('fills placeholders inside arguments', () => {
    expect(
      expandArgs(['-keystore', '{keystore}', '-storepass', '{password}', '--alias={alias}'], {
        keystore: '/k/a.jks',
        password: 'test-secret',
        alias: 'release',
      }),
    ).toEqual(['-keystore', '/k/a.jks', '-storepass', 'test-secret', '--alias=release']);
  });

  it('throws when a placeholder has no value', () => {
    expect(() => expandArgs(['{alias}'], { keystore: 'x' })).toThrow(/needs \{alias\}/);
  });
});
