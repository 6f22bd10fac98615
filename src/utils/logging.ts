import pino, { type Logger } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: Logger | null = null;
let collected: string[] | null = null;

function collectorSink(logs: string[]): Writable {
  return new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      collected = [];
      loggerInstance = pino({ level: cfg.logging.level }, collectorSink(collected));
    } else {
      const fd = cfg.logging.stderr ? 2 : 1;
      loggerInstance = cfg.logging.json
        ? pino({ level: cfg.logging.level }, pino.destination(fd))
        : pino({
            level: cfg.logging.level,
            transport: { target: 'pino-pretty', options: { destination: fd } },
          });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
  collected = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level = 'debug') {
  collected = [];
  loggerInstance = pino({ level }, collectorSink(collected));
  return collected;
}

export function collectedLogs(): string[] {
  return collected ?? [];
}
