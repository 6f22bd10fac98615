import { describe, it, expect, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { checkPrerequisites } from '../../src/services/prerequisites.js';
import type { ToolOutcome, ToolRunner } from '../../src/tools/invoker.js';
import { makeTmpDir, testConfig } from '../utils/fixtures.js';

const version = (stdout: string): ToolOutcome => ({ kind: 'Success', exitCode: 0, stdout, stderr: '', elapsedMs: 2 });

describe('checkPrerequisites', () => {
  it('launches each tool with its version arguments', async () => {
    const config = testConfig(makeTmpDir());
    const runner = vi.fn<Parameters<ToolRunner>, ReturnType<ToolRunner>>(async () => version('v1\n'));
    const checks = await checkPrerequisites(config, { runner });
    expect(checks.map((c) => [c.tool, c.ok])).toEqual([
      ['extractor', true],
      ['engine', true],
      ['certificate', true],
    ]);
    expect(runner.mock.calls.map((c) => [c[0].name, c[1]])).toEqual([
      ['preflight:extractor', ['-version']],
      ['preflight:engine', ['--version']],
      ['preflight:certificate', ['-help']],
    ]);
  });

  it('accepts a tool that exits non-zero on the version flag', async () => {
    const config = testConfig(makeTmpDir());
    const runner: ToolRunner = async () => ({
      kind: 'NonZeroExit',
      exitCode: 2,
      signal: null,
      stdout: '',
      stderr: '\nUsage: tool [options]\n',
      elapsedMs: 1,
    });
    const checks = await checkPrerequisites(config, { runner, certificate: false });
    expect(checks).toEqual([
      { tool: 'extractor', command: config.extractor.command, ok: true, detail: 'Usage: tool [options]' },
      { tool: 'engine', command: config.engine.command, ok: true, detail: 'Usage: tool [options]' },
    ]);
  });

  it('reports a tool that does not answer in time', async () => {
    const config = testConfig(makeTmpDir());
    const runner: ToolRunner = async (tool) =>
      tool.name === 'preflight:extractor'
        ? { kind: 'TimedOut', stdout: '', stderr: '', elapsedMs: 5000 }
        : version('ok');
    const [extractor] = await checkPrerequisites(config, { runner });
    expect(extractor).toMatchObject({ ok: false, detail: 'no response after 5000ms' });
  });

  it('requires the archive named after -jar', async () => {
    const root = makeTmpDir();
    const config = testConfig(root, {
      extractor: { command: 'java', args: ['-jar', 'prepare.jar', '{keystore}'], cwd: root },
    });
    const runner: ToolRunner = async () => version('openjdk 17');
    const [missing] = await checkPrerequisites(config, { runner });
    expect(missing).toMatchObject({
      tool: 'extractor',
      ok: false,
      detail: `missing ${path.join(root, 'prepare.jar')}`,
    });

    fs.writeFileSync(path.join(root, 'prepare.jar'), 'jar');
    const [present] = await checkPrerequisites(config, { runner });
    expect(present).toMatchObject({ ok: true, detail: 'openjdk 17' });
  });
});
