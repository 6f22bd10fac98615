#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import {
  archiveCommand,
  crackCommand,
  doctorCommand,
  extractCommand,
  purgeCommand,
  reportCommand,
  resumeCommand,
  runCommand,
  scanCommand,
  sessionsCommand,
  type CliContext,
  type RunFlags,
} from './commands.js';

// stdout carries command output; logs go to stderr
process.env.LOG_TO_STDERR = process.env.LOG_TO_STDERR || '1';

const program = new Command();
const controller = new AbortController();

// First Ctrl-C stops scheduling and kills child tools; the session stays resumable
process.once('SIGINT', () => {
  getLogger().warn('Interrupt received, stopping after in-flight work is killed');
  controller.abort();
});

function context(): CliContext {
  return {
    config: loadConfig(),
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    signal: controller.signal,
  };
}

function attackOptions(cmd: Command): Command {
  return cmd
    .option('--mask <mask>', 'Mask attack, e.g. ?1?1?1?1?1?1')
    .option('--charset <chars>', 'Custom charset bound to ?1')
    .option('--wordlist <file>', 'Wordlist attack instead of a mask')
    .option('--rule <file...>', 'Rule files for the wordlist attack');
}

async function exitWith(code: Promise<number>) {
  process.exitCode = await code;
}

program
  .name('ksrecover')
  .description('Batch keystore password recovery: scan, extract, crack, reconcile, report')
  .version('0.1.0');

program
  .command('scan')
  .argument('<path>', 'Keystore file, directory of keystores, or directory of item directories')
  .description('List the items a batch over <path> would contain')
  .action((target: string) => exitWith(scanCommand(context(), target)));

attackOptions(
  program
    .command('extract')
    .argument('<path>', 'Input path')
    .description('Scan and extract hashes into a corpus; continue later with resume'),
).action((target: string, opts: RunFlags) => exitWith(extractCommand(context(), target, opts)));

attackOptions(
  program
    .command('crack')
    .argument('<corpus>', 'Hash corpus file (one hash per line)')
    .option('--timeout <seconds>', 'Stop the engine after this many seconds')
    .option('--potfile <file>', 'Engine potfile (default <corpus>.potfile)')
    .description('Run the engine over an existing hash corpus'),
).action((corpus: string, opts: RunFlags & { potfile?: string }) =>
  exitWith(crackCommand(context(), corpus, opts)),
);

attackOptions(
  program
    .command('run')
    .argument('<path>', 'Input path')
    .option('--timeout <seconds>', 'Stop the engine after this many seconds')
    .option('--no-enrich', 'Skip certificate metadata for cracked items')
    .option('--json-only', 'Write only the JSON report')
    .description('Full pipeline: scan, extract, crack, reconcile, report'),
).action((target: string, opts: RunFlags) => exitWith(runCommand(context(), target, opts)));

program
  .command('resume')
  .argument('<sessionId>', 'Session to continue')
  .option('--timeout <seconds>', 'Stop the engine after this many seconds')
  .option('--no-enrich', 'Skip certificate metadata for cracked items')
  .option('--json-only', 'Write only the JSON report')
  .description('Continue an interrupted or stopped session')
  .action((sessionId: string, opts: RunFlags) => exitWith(resumeCommand(context(), sessionId, opts)));

program
  .command('sessions')
  .description('List stored sessions, newest first')
  .action(() => exitWith(sessionsCommand(context())));

program
  .command('report')
  .argument('<sessionId>', 'Session to report on')
  .option('--json-only', 'Write only the JSON report')
  .description('Rebuild the JSON and spreadsheet reports for a session')
  .action((sessionId: string, opts: { jsonOnly?: boolean }) =>
    exitWith(reportCommand(context(), sessionId, opts)),
  );

program
  .command('archive')
  .argument('<sessionId>', 'Session to move into the archive directory')
  .description('Archive a session file')
  .action((sessionId: string) => exitWith(archiveCommand(context(), sessionId)));

program
  .command('doctor')
  .description('Check that the extractor, engine and certificate tools can be launched')
  .action(() => exitWith(doctorCommand(context())));

program
  .command('purge')
  .description('Delete finished sessions by age')
  .option('--older-than <days>', 'Delete Done/Failed sessions last updated more than N days ago', '7')
  .option('--dry-run', 'Do not delete, only report what would go', false)
  .action((opts: { olderThan?: string; dryRun?: boolean }) =>
    exitWith(purgeCommand(context(), opts)),
  );

program.parseAsync(process.argv).catch((err) => {
  console.error(err);
  process.exit(1);
});
