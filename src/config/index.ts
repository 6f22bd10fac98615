import { z } from 'zod';
import fs from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const ToolSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive(),
});

const ConfigSchema = z.object({
  paths: z.object({
    sessionDir: z.string().min(1),
    outputDir: z.string().min(1),
  }),
  scanner: z.object({
    extensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/)).min(1),
  }),
  extractor: ToolSchema.extend({
    marker: z.string().min(1),
    algorithmTag: z.string().min(1),
    retries: z.number().int().min(0).default(1),
    // arguments for the pre-flight launch check
    probeArgs: z.array(z.string()).default(['-version']),
  }).refine((t) => t.args.some((a) => a.includes('{keystore}')), {
    message: 'extractor.args must reference {keystore}',
  }),
  engine: z.object({
    command: z.string().min(1),
    cwd: z.string().optional(),
    hashMode: z.string().regex(/^\d+$/),
    // 0 disables the engine deadline
    timeoutMs: z.number().int().min(0).default(0),
    showTimeoutMs: z.number().int().positive().default(60_000),
    pollIntervalMs: z.number().int().positive().default(1000),
    statusTimerSec: z.number().int().positive().default(5),
    flushEvery: z.number().int().positive().default(5),
    extraArgs: z.array(z.string()).default([]),
    probeArgs: z.array(z.string()).default(['--version']),
  }),
  certificate: ToolSchema.extend({
    enabled: z.boolean().default(true),
    aliasArgs: z.array(z.string()).default([]),
    probeArgs: z.array(z.string()).default(['-help']),
  }),
  attack: z.object({
    mask: z.string().min(1).default('?1?1?1?1?1?1'),
    charset1: z.string().optional(),
    wordlist: z.string().optional(),
    rules: z.array(z.string()).default([]),
  }),
  concurrency: z.object({
    workers: z.number().int().positive(),
  }),
  server: z.object({
    port: z.number().int().positive().default(3000),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    json: z.boolean().default(true),
    stderr: z.boolean().default(false),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CHARSET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export function defaultWorkers(): number {
  return Math.max(1, os.availableParallelism() - 1);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function parseConfig(fileRaw: Record<string, unknown> = {}): AppConfig {
  const pollIntervalMs = envNumber('KSR_POLL_INTERVAL_MS');
  const port = envNumber('PORT');
  const merged = {
    paths: {
      sessionDir: process.env.KSR_SESSION_DIR || './sessions',
      outputDir: process.env.KSR_OUTPUT_DIR || './output',
      ...section(fileRaw, 'paths'),
    },
    scanner: {
      extensions: ['.keystore', '.jks', '.p12', '.pfx'],
      ...section(fileRaw, 'scanner'),
    },
    extractor: {
      command: process.env.KSR_EXTRACTOR_CMD || 'java',
      args: ['-jar', 'JksPrivkPrepare.jar', '{keystore}'],
      timeoutMs: 30_000,
      marker: '$jksprivk$',
      algorithmTag: 'jksprivk',
      ...section(fileRaw, 'extractor'),
    },
    engine: {
      command: process.env.KSR_ENGINE_CMD || 'hashcat',
      hashMode: '15500',
      ...(pollIntervalMs ? { pollIntervalMs } : {}),
      ...section(fileRaw, 'engine'),
    },
    certificate: {
      command: process.env.KSR_CERT_CMD || 'keytool',
      args: ['-list', '-rfc', '-keystore', '{keystore}', '-storepass', '{password}'],
      aliasArgs: ['-alias', '{alias}'],
      timeoutMs: 30_000,
      ...section(fileRaw, 'certificate'),
    },
    attack: {
      charset1: DEFAULT_CHARSET,
      ...section(fileRaw, 'attack'),
    },
    concurrency: {
      workers: envNumber('KSR_WORKERS') || defaultWorkers(),
      ...section(fileRaw, 'concurrency'),
    },
    server: {
      ...(port ? { port } : {}),
      ...section(fileRaw, 'server'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: true,
      stderr: process.env.LOG_TO_STDERR === '1',
      ...section(fileRaw, 'logging'),
    },
  };
  return ConfigSchema.parse(merged);
}

export function loadConfig(configPath = process.env.KSR_CONFIG || 'ksrecover.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(full, 'utf8'));
      fileRaw = parsed && typeof parsed === 'object' ? Object.fromEntries(Object.entries(parsed)) : {};
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  return parseConfig(fileRaw);
}
