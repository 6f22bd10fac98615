import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseConfig, type AppConfig } from '../../src/config/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const BIN_DIR = path.resolve(__dirname, '../fixtures/bin');

export function bin(name: 'fake-extractor.mjs' | 'fake-engine.mjs' | 'fake-cert.mjs'): string {
  const file = path.join(BIN_DIR, name);
  fs.chmodSync(file, 0o755);
  return file;
}

export function makeTmpDir(prefix = 'ksr-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export interface KeystoreFixture {
  password: string;
  alias: string;
  mode?: 'garbage' | 'fail' | 'hang';
  certMode?: 'fail';
}

// Fixture "keystores" are JSON documents read by the fake tools
export function writeKeystore(dir: string, name: string, spec: KeystoreFixture): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(spec));
  return file;
}

export function hashFor(password: string, alias: string): string {
  return `$jksprivk$*${Buffer.from(password, 'utf8').toString('hex')}*00FF*${alias}`;
}

type Section = Record<string, unknown>;

export function testConfig(
  root: string,
  overrides: { extractor?: Section; engine?: Section; certificate?: Section; attack?: Section } = {},
): AppConfig {
  return parseConfig({
    paths: { sessionDir: path.join(root, 'sessions'), outputDir: path.join(root, 'output') },
    extractor: {
      command: bin('fake-extractor.mjs'),
      args: ['{keystore}'],
      timeoutMs: 5000,
      retries: 0,
      ...overrides.extractor,
    },
    engine: {
      command: bin('fake-engine.mjs'),
      pollIntervalMs: 20,
      statusTimerSec: 1,
      flushEvery: 1,
      ...overrides.engine,
    },
    certificate: { command: bin('fake-cert.mjs'), timeoutMs: 5000, ...overrides.certificate },
    attack: { mask: '?1?1?1?1?1?1', ...overrides.attack },
    concurrency: { workers: 2 },
  });
}
