import type { AppConfig } from '../config/index.js';
import type { BatchSession, CertificateInfo } from '../core/types.js';
import { parseCertificateOutput } from '../parsers/certificateOutput.js';
import { expandArgs, invokeTool, type ToolOutcome, type ToolRunner } from '../tools/invoker.js';
import { getLogger } from '../utils/logging.js';
import { runPool } from '../utils/pool.js';

export interface ReconcilerDeps {
  config: AppConfig;
  runner?: ToolRunner;
}

export interface EnrichResult {
  enriched: number;
  failed: number;
  cancelled: boolean;
}

function emptyInfo(extractionError: string): CertificateInfo {
  return {
    alias: null,
    fingerprintMD5: null,
    fingerprintSHA1: null,
    keystoreFormat: null,
    extractionError,
  };
}

function outcomeError(outcome: Exclude<ToolOutcome, { kind: 'Success' }>): string {
  switch (outcome.kind) {
    case 'LaunchFailure':
      return `ExternalToolLaunchFailure: ${outcome.message}`;
    case 'TimedOut':
      return `ExternalToolTimeout: no output after ${outcome.elapsedMs}ms`;
    case 'Cancelled':
      return 'Cancelled';
    case 'NonZeroExit': {
      const tail = outcome.stderr.trim().split(/\r?\n/).slice(-1)[0] ?? '';
      const how = `exit code ${outcome.exitCode ?? outcome.signal}`;
      return `ExternalToolNonZeroExit: ${how}${tail ? ` (${tail})` : ''}`;
    }
  }
}

/**
 * Fetches certificate metadata for cracked items. A failure only marks that
 * item's CertificateInfo; it never changes the crack outcome.
 */
export class Reconciler {
  private runner: ToolRunner;

  constructor(private deps: ReconcilerDeps) {
    this.runner = deps.runner || invokeTool;
  }

  async enrich(session: BatchSession, opts: { signal?: AbortSignal } = {}): Promise<EnrichResult> {
    const cfg = this.deps.config.certificate;
    const targets = session.items.filter(
      (i) => session.outcomes[i.identity]?.status === 'Cracked' && !session.certificates[i.identity],
    );
    if (!cfg.enabled || targets.length === 0) return { enriched: 0, failed: 0, cancelled: false };

    const settled = await runPool(
      targets,
      this.deps.config.concurrency.workers,
      async (item): Promise<CertificateInfo | null> => {
        const secret = session.outcomes[item.identity].recoveredSecret ?? '';
        const alias = session.hashes[item.identity]?.alias;
        const vars = { keystore: item.filePath, password: secret, alias };
        const args = expandArgs(cfg.args, vars);
        if (alias) args.push(...expandArgs(cfg.aliasArgs, vars));
        const outcome = await this.runner(
          { name: 'certificate', command: cfg.command, cwd: cfg.cwd },
          args,
          { timeoutMs: cfg.timeoutMs, signal: opts.signal },
        );
        if (outcome.kind === 'Cancelled') return null;
        let info: CertificateInfo;
        if (outcome.kind === 'Success') {
          const parsed = parseCertificateOutput(outcome.stdout);
          info = parsed.success ? parsed.data : emptyInfo(`${parsed.error.code}: ${parsed.error.message}`);
        } else {
          info = emptyInfo(outcomeError(outcome));
        }
        getLogger().info(
          { identity: item.identity, ok: !info.extractionError, error: info.extractionError },
          'certificate-metadata',
        );
        return info;
      },
      opts.signal,
    );

    // results are merged into the session only after every task has settled
    let enriched = 0;
    let failed = 0;
    let cancelled = false;
    let failure: { reason: unknown } | null = null;
    for (const [i, s] of settled.entries()) {
      if (s.status === 'rejected') {
        failure = failure ?? { reason: s.reason };
        continue;
      }
      if (s.status === 'skipped' || s.value === null) {
        cancelled = true;
        continue;
      }
      session.certificates[targets[i].identity] = s.value;
      if (s.value.extractionError) failed++;
      else enriched++;
    }
    if (failure) throw failure.reason;
    return { enriched, failed, cancelled };
  }
}
