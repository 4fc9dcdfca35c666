/**
 * Gzip helpers shared by archives and file-backed blocks
 */

import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import type { CompressionMode } from '../core/types.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

/**
 * Whether the bytes start with the gzip magic number
 */
export function isGzipped(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

export async function compress(bytes: Uint8Array, mode: CompressionMode): Promise<Buffer> {
  if (mode === 'gzip') {
    return gzipAsync(bytes);
  }
  return Buffer.from(bytes);
}

/**
 * Undo gzip compression when present; other bytes pass through unchanged
 */
export async function decompress(bytes: Uint8Array): Promise<Buffer> {
  if (isGzipped(bytes)) {
    return gunzipAsync(bytes);
  }
  return Buffer.from(bytes);
}
