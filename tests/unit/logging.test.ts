import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getLogger,
  __resetLoggerForTests,
  __enableTestLogCollector,
  collectedLogs,
} from '../../src/utils/logging.js';

describe('logging singleton', () => {
  const saved = process.env.LOG_LEVEL;

  beforeEach(() => {
    __resetLoggerForTests();
  });

  afterEach(() => {
    process.env.LOG_LEVEL = saved;
    __resetLoggerForTests();
  });

  it('returns same instance', () => {
    const a = getLogger();
    const b = getLogger();
    expect(a).toBe(b);
  });

  it('honors LOG_LEVEL env', () => {
    process.env.LOG_LEVEL = 'debug';
    __resetLoggerForTests();
    const l = getLogger();
    expect(l.level).toBe('debug');
  });

  it('collects structured lines in memory when enabled', () => {
    const logs = __enableTestLogCollector('info');
    getLogger().info({ identity: 'app-one' }, 'extraction-attempt');
    getLogger().debug('below level');
    expect(logs).toHaveLength(1);
    const line = JSON.parse(logs[0]);
    expect(line.msg).toBe('extraction-attempt');
    expect(line.identity).toBe('app-one');
    expect(collectedLogs()).toBe(logs);
  });
});
