import { createRequire } from 'module';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

const require = createRequire(import.meta.url);
const canonicalizeFn = require('canonicalize') as (input: unknown) => string | undefined;

export class Canonicalizer {
  /**
   * Canonicalize a JSON-serializable object per RFC 8785 (JCS).
   * @throws if input cannot be serialized.
   */
  static canonicalize(obj: unknown): string {
    const result = canonicalizeFn(obj);
    if (result === undefined) {
      throw new Error('Cannot canonicalize input: result is undefined');
    }
    return result;
  }

  /** Hex SHA-256 of the canonical form. Equal for objects that differ only in key order. */
  static digest(obj: unknown): string {
    return bytesToHex(sha256(utf8ToBytes(Canonicalizer.canonicalize(obj))));
  }
}
