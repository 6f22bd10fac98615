import type { ParseResult } from '../core/types.js';

export interface ExtractedHash {
  hash: string;
  alias?: string;
}

/**
 * Picks the first stdout line that starts with `marker`. The keystore alias,
 * when present, is the last `*`-separated field of that line.
 */
export function parseExtractorOutput(raw: string, marker: string): ParseResult<ExtractedHash> {
  for (const line of raw.split(/\r?\n/)) {
    const hash = line.trim();
    if (!hash.startsWith(marker)) continue;
    const fields = hash.slice(marker.length).split('*');
    const alias = fields.length > 1 ? fields[fields.length - 1] : '';
    return { success: true, data: alias ? { hash, alias } : { hash } };
  }
  return {
    success: false,
    error: {
      code: 'HashFormatMismatch',
      message: `No line starting with ${marker} in extractor output`,
    },
  };
}
