/**
 * Chunk ID Utilities
 *
 * Deterministic name-based UUIDs (version 5) for stored chunks. The same
 * (country, law type, article, part) always maps to the same point ID, so
 * re-ingesting a law overwrites its earlier points.
 */

import { createHash } from 'crypto';

/** RFC 4122 DNS namespace */
export const DNS_NAMESPACE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

function uuidToBytes(uuid: string): Buffer {
  const hex = uuid.replace(/-/g, '');
  if (!/^[0-9a-f]{32}$/i.test(hex)) {
    throw new Error(`Invalid UUID: ${uuid}`);
  }
  return Buffer.from(hex, 'hex');
}

function bytesToUuid(bytes: Buffer): string {
  const hex = bytes.toString('hex');
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
}

/**
 * UUID v5: SHA-1 of namespace bytes + name, with version and variant bits set
 */
export function uuidV5(name: string, namespace: string = DNS_NAMESPACE): string {
  const hash = createHash('sha1')
    .update(uuidToBytes(namespace))
    .update(name, 'utf8')
    .digest()
    .subarray(0, 16);
  hash[6] = (hash[6] & 0x0f) | 0x50;
  hash[8] = (hash[8] & 0x3f) | 0x80;
  return bytesToUuid(hash);
}

export function chunkIdName(country: string, lawType: string, articleNumber: number, part: number): string {
  return `${country}_${lawType}_art${articleNumber}_p${part}`;
}

export function generateChunkId(country: string, lawType: string, articleNumber: number, part: number): string {
  return uuidV5(chunkIdName(country, lawType, articleNumber, part));
}
