import { createHash } from "node:crypto"

/**
 * Hash a lock key to an unsigned 32-bit integer.
 *
 * Uses SHA-256 truncated to 32 bits, interpreted as big-endian.
 */
export function hashLockKeyUint32(key: string): number {
  const hash = createHash("sha256").update(key, "utf8").digest()

  return hash.readUInt32BE(0)
}
