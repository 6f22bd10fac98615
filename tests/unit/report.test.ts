import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import ExcelJS from 'exceljs';
import { buildReport } from '../../src/reports/buildReport.js';
import { writeJsonReport, writeXlsxReport } from '../../src/reports/writers.js';
import { makeTmpDir } from '../utils/fixtures.js';
import { sessionWith } from '../utils/sessions.js';

const now = new Date('2024-05-02T00:00:00Z');

function mixedSession() {
  const s = sessionWith({
    identities: ['a', 'b', 'c', 'd', 'e', 'f'],
    outcomes: {
      a: { status: 'Cracked', recoveredSecret: 'pw-a', elapsedMs: 120 },
      b: { status: 'Cracked', recoveredSecret: 'pw-b', elapsedMs: 80 },
      c: { status: 'Exhausted', elapsedMs: 900 },
      d: { status: 'Error', error: { stage: 'cracking', code: 'EngineFailure', message: 'boom' } },
    },
    extractionFailed: ['e'],
  });
  s.certificates.a = { alias: 'a-key', fingerprintMD5: 'AA', fingerprintSHA1: 'BB', keystoreFormat: 'JKS' };
  s.certificates.b = {
    alias: null,
    fingerprintMD5: null,
    fingerprintSHA1: null,
    keystoreFormat: null,
    extractionError: 'ExternalToolTimeout: no output after 30000ms',
  };
  s.stages.cracking = { startedAt: '2024-05-01T10:00:00.000Z', elapsedMs: 1500 };
  return s;
}

describe('buildReport', () => {
  it('resolves one record per item in scan order', () => {
    const report = buildReport(mixedSession(), now);
    expect(report.records.map((r) => [r.identity, r.resolution])).toEqual([
      ['a', 'cracked'],
      ['b', 'cracked_metadata_failed'],
      ['c', 'exhausted'],
      ['d', 'engine_failed'],
      ['e', 'extraction_failed'],
      ['f', 'not_attempted'],
    ]);
    expect(report.records[0]).toEqual({
      identity: 'a',
      filePath: '/keys/a/release.jks',
      status: 'Cracked',
      resolution: 'cracked',
      recoveredSecret: 'pw-a',
      alias: 'a-key',
      fingerprintMD5: 'AA',
      fingerprintSHA1: 'BB',
      keystoreFormat: 'JKS',
      error: null,
      elapsedMs: 120,
    });
    expect(report.records[1].error).toBe('ExternalToolTimeout: no output after 30000ms');
    expect(report.records[1].alias).toBe('b-key');
    expect(report.records[3].error).toBe('EngineFailure: boom');
    expect(report.records[4].error).toBe('HashFormatMismatch: no hash');
  });

  it('summarizes counts and the success rate', () => {
    const report = buildReport(mixedSession(), now);
    expect(report.summary).toEqual({
      total: 6,
      cracked: 2,
      exhausted: 1,
      errored: 2,
      pending: 0,
      notAttempted: 1,
      extractionFailed: 1,
      metadataFailed: 1,
      successRate: 0.3333,
    });
    expect(report.stageElapsedMs).toEqual({ scanning: null, extracting: null, cracking: 1500, reconciling: null });
    expect(report.generatedAt).toBe('2024-05-02T00:00:00.000Z');
    expect(report.failure).toBeNull();
  });

  it('reports an empty batch with a zero success rate', () => {
    const report = buildReport(sessionWith({ identities: [] }), now);
    expect(report.records).toEqual([]);
    expect(report.summary.successRate).toBe(0);
  });
});

describe('report writers', () => {
  it('writes the JSON report under the session directory', async () => {
    const out = makeTmpDir('ksr-report-');
    const report = buildReport(mixedSession(), now);
    const file = await writeJsonReport(report, out);
    expect(file).toBe(path.join(out, 'sess-fixture', 'report.json'));
    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual(report);
  });

  it('writes a spreadsheet with a results row per item and a summary sheet', async () => {
    const out = makeTmpDir('ksr-report-');
    const file = await writeXlsxReport(buildReport(mixedSession(), now), out);
    expect(file).toBe(path.join(out, 'sess-fixture', 'report.xlsx'));

    const wb = new ExcelJS.Workbook();
    await wb.xlsx.readFile(file);
    const results = wb.getWorksheet('Results');
    const summary = wb.getWorksheet('Summary');
    expect(results?.rowCount).toBe(7);
    expect(results?.getRow(1).getCell(1).value).toBe('Identity');
    expect(results?.getRow(2).getCell(1).value).toBe('a');
    expect(results?.getRow(2).getCell(3).value).toBe('cracked');
    expect(results?.getRow(2).getCell(4).value).toBe('pw-a');
    expect(results?.getRow(2).getCell(9).value).toBe(120);
    expect(summary?.getRow(2).getCell(2).value).toBe('sess-fixture');
    expect(summary?.getRow(6).getCell(1).value).toBe('Total');
    expect(summary?.getRow(6).getCell(2).value).toBe(6);
  });
});
