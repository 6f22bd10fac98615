import crypto from 'crypto';

export type DigestAlgorithm = 'md5' | 'sha1';

export function certificateDigest(algorithm: DigestAlgorithm, der: Buffer): string {
  return crypto.createHash(algorithm).update(der).digest('hex').toUpperCase();
}

// "AB:cd:01" -> "ABCD01"
export function normalizeFingerprint(raw: string): string {
  return raw.replace(/[^0-9a-fA-F]/g, '').toUpperCase();
}

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----([\s\S]*?)-----END CERTIFICATE-----/;

export function pemToDer(text: string): Buffer | null {
  const match = PEM_BLOCK.exec(text);
  if (!match) return null;
  const body = match[1].replace(/\s+/g, '');
  if (!body) return null;
  return Buffer.from(body, 'base64');
}
