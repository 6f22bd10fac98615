import fs from 'fs';
import path from 'path';
import { InputNotFoundError } from '../core/errors.js';
import type { Item, ScanMode } from '../core/types.js';
import { getLogger } from '../utils/logging.js';

export interface ScanOptions {
  extensions: readonly string[];
  now?: () => Date;
}

export interface ScanResult {
  mode: ScanMode;
  items: Item[];
  /** Set when mode is `empty` */
  reason?: 'unsupported-file' | 'no-items';
}

function isKeystore(name: string, extensions: readonly string[]): boolean {
  const ext = path.extname(name).toLowerCase();
  return extensions.some((e) => e.toLowerCase() === ext);
}

// Default Array#sort compares UTF-16 code units, independent of locale
async function keystoreFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && isKeystore(e.name, extensions))
    .map((e) => e.name)
    .sort();
}

// Identities key plain-object maps in the session document; names that
// collide with Object.prototype members (`__proto__`, `constructor`, ...)
// get a `./` prefix, which no directory name can carry.
function itemIdentity(name: string): string {
  if (!(name in Object.prototype)) return name;
  const identity = `./${name}`;
  getLogger().warn({ name, identity }, 'scan-identity-escaped');
  return identity;
}

/**
 * Discovers keystore items under `rootPath`. Layouts:
 * a single file, a directory of keystores (group), or a directory of
 * per-item directories (batch). Output order is stable for an unchanged tree.
 */
export async function scanItems(rootPath: string, options: ScanOptions): Promise<ScanResult> {
  const log = getLogger();
  const root = path.resolve(rootPath);
  const stamp = (options.now ?? (() => new Date()))().toISOString();
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(root);
  } catch {
    throw new InputNotFoundError(rootPath);
  }

  if (stat.isFile()) {
    if (!isKeystore(root, options.extensions)) {
      log.warn({ path: root }, 'scan-unsupported-file');
      return { mode: 'empty', items: [], reason: 'unsupported-file' };
    }
    const parent = path.dirname(root);
    const identity = itemIdentity(
      parent === path.parse(root).root ? path.basename(root) : path.basename(parent),
    );
    return { mode: 'single', items: [{ identity, filePath: root, discoveredAt: stamp }] };
  }

  const dirName = path.basename(root);
  const direct = await keystoreFiles(root, options.extensions);
  if (direct.length > 0) {
    const items = direct.map((name) => ({
      identity: direct.length === 1 ? itemIdentity(dirName) : `${dirName}/${name}`,
      filePath: path.join(root, name),
      discoveredAt: stamp,
    }));
    log.info({ root, items: items.length }, 'scan-group');
    return { mode: 'group', items };
  }

  const children = (await fs.promises.readdir(root, { withFileTypes: true }))
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
  const items: Item[] = [];
  for (const child of children) {
    const files = await keystoreFiles(path.join(root, child), options.extensions);
    if (files.length === 0) {
      log.info({ dir: child }, 'scan-skip-no-keystore');
      continue;
    }
    if (files.length > 1) {
      log.warn({ dir: child, selected: files[0], ignored: files.slice(1) }, 'scan-multiple-keystores');
    }
    items.push({
      identity: itemIdentity(child),
      filePath: path.join(root, child, files[0]),
      discoveredAt: stamp,
    });
  }
  if (items.length === 0) {
    log.warn({ root }, 'scan-no-items');
    return { mode: 'empty', items: [], reason: 'no-items' };
  }
  log.info({ root, items: items.length, skipped: children.length - items.length }, 'scan-batch');
  return { mode: 'batch', items };
}
