import type { AppConfig } from '../config/index.js';
import type { ExtractionEntry, HashRecord, Item, ItemError } from '../core/types.js';
import { itemsExtractedTotal } from '../metrics/index.js';
import { parseExtractorOutput } from '../parsers/extractorOutput.js';
import { expandArgs, invokeTool, type ToolOutcome, type ToolRunner } from '../tools/invoker.js';
import { getLogger } from '../utils/logging.js';
import { runPool } from '../utils/pool.js';

export interface ExtractionStageDeps {
  config: AppConfig;
  runner?: ToolRunner;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ExtractionRunOptions {
  /** Records from an earlier run; their items are not attempted again */
  existing?: Record<string, HashRecord>;
  signal?: AbortSignal;
  onItem?: (entry: ExtractionEntry, record: HashRecord | undefined) => void | Promise<void>;
}

export interface ExtractionStageResult {
  /** Newly extracted records only */
  records: Record<string, HashRecord>;
  log: ExtractionEntry[];
  cancelled: boolean;
  /** First task rejection; the fulfilled results above are still complete */
  failure: { reason: unknown } | null;
}

interface ItemResult {
  entry: ExtractionEntry;
  record?: HashRecord;
}

const RETRY_BASE_MS = 50;

function toolError(outcome: Exclude<ToolOutcome, { kind: 'Success' } | { kind: 'Cancelled' }>): ItemError {
  switch (outcome.kind) {
    case 'LaunchFailure':
      return {
        stage: 'extraction',
        code: 'ExternalToolLaunchFailure',
        message: `Extractor could not be started: ${outcome.message}`,
      };
    case 'TimedOut':
      return {
        stage: 'extraction',
        code: 'ExternalToolTimeout',
        message: `Extractor timed out after ${outcome.elapsedMs}ms`,
      };
    case 'NonZeroExit': {
      const how = outcome.exitCode !== null ? `exit code ${outcome.exitCode}` : `signal ${outcome.signal}`;
      const detail = outcome.stderr.trim().split(/\r?\n/).slice(-3).join(' | ');
      return {
        stage: 'extraction',
        code: 'ExternalToolNonZeroExit',
        message: detail ? `Extractor failed with ${how}: ${detail}` : `Extractor failed with ${how}`,
      };
    }
  }
}

export class ExtractionStage {
  private runner: ToolRunner;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(private deps: ExtractionStageDeps) {
    this.runner = deps.runner || invokeTool;
    this.sleep = deps.sleep || ((ms) => new Promise((r) => setTimeout(r, ms)));
    this.now = deps.now || (() => new Date());
  }

  async run(items: readonly Item[], opts: ExtractionRunOptions = {}): Promise<ExtractionStageResult> {
    const existing = opts.existing ?? {};
    const todo = items.filter((i) => !existing[i.identity]);
    const log = getLogger();
    log.info(
      { total: items.length, todo: todo.length, workers: this.deps.config.concurrency.workers },
      'extraction-start',
    );

    const settled = await runPool(
      todo,
      this.deps.config.concurrency.workers,
      async (item) => {
        const result = await this.extractOne(item, opts.signal);
        if (result && opts.onItem) await opts.onItem(result.entry, result.record);
        return result;
      },
      opts.signal,
    );

    // merge owned per-item results after the barrier
    const records: Record<string, HashRecord> = {};
    const entries: ExtractionEntry[] = [];
    let cancelled = false;
    let failure: { reason: unknown } | null = null;
    for (const s of settled) {
      // tool failures are per-item outcomes; a rejection here is a stage failure
      if (s.status === 'rejected') {
        failure = failure ?? { reason: s.reason };
        continue;
      }
      if (s.status === 'skipped' || s.value === null) {
        cancelled = true;
        continue;
      }
      entries.push(s.value.entry);
      if (s.value.record) records[s.value.record.identity] = s.value.record;
    }

    log.info(
      {
        extracted: Object.keys(records).length,
        failed: entries.filter((e) => e.status === 'failed').length,
        cancelled,
        stageFailed: failure !== null,
      },
      'extraction-complete',
    );
    return { records, log: entries, cancelled, failure };
  }

  private async extractOne(item: Item, signal?: AbortSignal): Promise<ItemResult | null> {
    const cfg = this.deps.config.extractor;
    const tool = { name: 'extractor', command: cfg.command, cwd: cfg.cwd };
    const args = expandArgs(cfg.args, { keystore: item.filePath });
    const attemptedAt = this.now().toISOString();
    let attempts = 0;
    let elapsedMs = 0;
    let outcome: ToolOutcome;
    for (;;) {
      attempts++;
      outcome = await this.runner(tool, args, { timeoutMs: cfg.timeoutMs, signal });
      elapsedMs += outcome.elapsedMs;
      if (outcome.kind !== 'TimedOut' || attempts > cfg.retries || signal?.aborted) break;
      const delay = RETRY_BASE_MS * 3 ** (attempts - 1);
      getLogger().warn({ identity: item.identity, attempt: attempts, delay }, 'extraction-retry');
      await this.sleep(delay);
    }
    if (outcome.kind === 'Cancelled') return null;

    let result: ItemResult;
    if (outcome.kind === 'Success') {
      const parsed = parseExtractorOutput(outcome.stdout, cfg.marker);
      if (parsed.success) {
        const extractedAt = this.now().toISOString();
        result = {
          entry: { identity: item.identity, status: 'extracted', attemptedAt, attempts, elapsedMs },
          record: {
            identity: item.identity,
            hash: parsed.data.hash,
            algorithmTag: cfg.algorithmTag,
            ...(parsed.data.alias ? { alias: parsed.data.alias } : {}),
            extractedAt,
          },
        };
      } else {
        result = this.failed(item, attemptedAt, attempts, elapsedMs, {
          stage: 'extraction',
          ...parsed.error,
        });
      }
    } else {
      result = this.failed(item, attemptedAt, attempts, elapsedMs, toolError(outcome));
    }

    itemsExtractedTotal.inc({ result: result.entry.status });
    getLogger().info(
      {
        identity: item.identity,
        status: result.entry.status,
        attempts,
        elapsedMs,
        error: result.entry.error?.code,
      },
      'extraction-attempt',
    );
    return result;
  }

  private failed(
    item: Item,
    attemptedAt: string,
    attempts: number,
    elapsedMs: number,
    error: ItemError,
  ): ItemResult {
    return {
      entry: { identity: item.identity, status: 'failed', attemptedAt, attempts, elapsedMs, error },
    };
  }
}
