import path from 'path';
import ExcelJS from 'exceljs';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import type { BatchReport, ReportRecord } from './buildReport.js';

export function reportDir(outputDir: string, sessionId: string): string {
  return path.join(outputDir, sessionId);
}

export async function writeJsonReport(report: BatchReport, outputDir: string): Promise<string> {
  const file = path.join(reportDir(outputDir, report.sessionId), 'report.json');
  await writeFileAtomic(file, JSON.stringify(report, null, 2));
  return file;
}

const RESULT_COLUMNS: { header: string; key: keyof ReportRecord; width: number }[] = [
  { header: 'Identity', key: 'identity', width: 28 },
  { header: 'File', key: 'filePath', width: 48 },
  { header: 'Resolution', key: 'resolution', width: 24 },
  { header: 'Password', key: 'recoveredSecret', width: 18 },
  { header: 'Alias', key: 'alias', width: 18 },
  { header: 'MD5', key: 'fingerprintMD5', width: 36 },
  { header: 'SHA1', key: 'fingerprintSHA1', width: 44 },
  { header: 'Keystore type', key: 'keystoreFormat', width: 14 },
  { header: 'Elapsed (ms)', key: 'elapsedMs', width: 14 },
  { header: 'Error', key: 'error', width: 60 },
];

export function buildWorkbook(report: BatchReport): ExcelJS.Workbook {
  const wb = new ExcelJS.Workbook();
  wb.created = new Date(report.generatedAt);

  const results = wb.addWorksheet('Results');
  results.columns = RESULT_COLUMNS;
  for (const r of report.records) {
    results.addRow({ ...r });
  }
  results.getRow(1).font = { bold: true };
  results.views = [{ state: 'frozen', ySplit: 1 }];

  const summary = wb.addWorksheet('Summary');
  summary.columns = [
    { header: 'Metric', key: 'metric', width: 24 },
    { header: 'Value', key: 'value', width: 40 },
  ];
  const rows: [string, string | number][] = [
    ['Session', report.sessionId],
    ['Root path', report.rootPath],
    ['Phase', report.phase],
    ['Generated at', report.generatedAt],
    ['Total', report.summary.total],
    ['Cracked', report.summary.cracked],
    ['Exhausted', report.summary.exhausted],
    ['Errored', report.summary.errored],
    ['Pending', report.summary.pending],
    ['Not attempted', report.summary.notAttempted],
    ['Extraction failed', report.summary.extractionFailed],
    ['Metadata failed', report.summary.metadataFailed],
    ['Success rate', report.summary.successRate],
  ];
  for (const [stage, ms] of Object.entries(report.stageElapsedMs)) {
    rows.push([`${stage} (ms)`, ms ?? '']);
  }
  if (report.failure) rows.push(['Failure', `${report.failure.code}: ${report.failure.message}`]);
  for (const [metric, value] of rows) summary.addRow({ metric, value });
  summary.getRow(1).font = { bold: true };
  return wb;
}

export async function writeXlsxReport(report: BatchReport, outputDir: string): Promise<string> {
  const file = path.join(reportDir(outputDir, report.sessionId), 'report.xlsx');
  const buffer = await buildWorkbook(report).xlsx.writeBuffer();
  await writeFileAtomic(file, new Uint8Array(buffer));
  return file;
}
