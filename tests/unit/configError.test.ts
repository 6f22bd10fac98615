import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/index.js';

describe('config error handling', () => {
  it('throws on invalid JSON', () => {
    const tmp = path.join(process.cwd(), 'bad-ksrecover-config.json');
    fs.writeFileSync(tmp, '{ invalid');
    try {
      expect(() => loadConfig('bad-ksrecover-config.json')).toThrow(/Failed to parse config file/);
    } finally {
      fs.unlinkSync(tmp);
    }
  });

  it('merges a valid file over the defaults', () => {
    const tmp = path.join(process.cwd(), 'good-ksrecover-config.json');
    fs.writeFileSync(tmp, JSON.stringify({ scanner: { extensions: ['.bks'] }, server: { port: 8088 } }));
    try {
      const cfg = loadConfig('good-ksrecover-config.json');
      expect(cfg.scanner.extensions).toEqual(['.bks']);
      expect(cfg.server.port).toBe(8088);
    } finally {
      fs.unlinkSync(tmp);
    }
  });
});
