import type { CertificateInfo, ParseResult } from '../core/types.js';
import { certificateDigest, normalizeFingerprint, pemToDer } from '../utils/fingerprint.js';

function field(raw: string, label: string): string | null {
  const re = new RegExp(`^\\s*${label}:\\s*(.+?)\\s*$`, 'im');
  const m = re.exec(raw);
  return m ? m[1] : null;
}

/**
 * Reads the certificate tool's listing: alias, keystore type, and the MD5/SHA1
 * fingerprints. Missing digests are computed from the first PEM certificate.
 */
export function parseCertificateOutput(raw: string): ParseResult<CertificateInfo> {
  const alias = field(raw, 'Alias name');
  if (!alias) {
    return {
      success: false,
      error: { code: 'CertificateOutputMismatch', message: 'No alias found in certificate output' },
    };
  }
  const keystoreFormat = field(raw, 'Keystore type');
  const md5 = field(raw, 'MD5');
  const sha1 = field(raw, 'SHA1');
  const der = md5 && sha1 ? null : pemToDer(raw);
  return {
    success: true,
    data: {
      alias,
      keystoreFormat: keystoreFormat ? keystoreFormat.toUpperCase() : null,
      fingerprintMD5: md5 ? normalizeFingerprint(md5) : der ? certificateDigest('md5', der) : null,
      fingerprintSHA1: sha1 ? normalizeFingerprint(sha1) : der ? certificateDigest('sha1', der) : null,
    },
  };
}
