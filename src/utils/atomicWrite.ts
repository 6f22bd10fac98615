import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { PersistenceWriteError } from '../core/errors.js';

/**
 * Writes to a sibling temp file, then renames over the target, so readers
 * never see a half-written file.
 */
export async function writeFileAtomic(target: string, data: string | Uint8Array): Promise<void> {
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(tmp, data);
    await fs.promises.rename(tmp, target);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true }).catch(() => undefined);
    throw new PersistenceWriteError(target, err);
  }
}
