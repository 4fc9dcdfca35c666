/**
 * Storage contracts for the content-addressed knowledge graph
 *
 * Blocks are immutable byte strings keyed by the SHA-256 address of their
 * contents. A blob store is shared and append-only: storing the same bytes
 * twice yields the same address, and nothing is ever overwritten.
 */

import type { CompressionMode, ContentAddress } from '../core/types.js';

export interface BlobStore {
  /**
   * Persist a block, returning its content address (idempotent)
   */
  store(bytes: Uint8Array): Promise<ContentAddress>;

  /**
   * Fetch a block; rejects with `NotFoundError` when the address is unknown
   */
  retrieve(address: ContentAddress): Promise<Uint8Array>;

  /**
   * Whether a block is present
   */
  has(address: ContentAddress): Promise<boolean>;
}

/**
 * Storage statistics for monitoring
 */
export interface BlobStoreStats {
  /** Number of distinct blocks */
  blockCount: number;
  /** Total payload bytes (before compression) */
  totalBytes: number;
}

/**
 * Configuration of the file-backed blob store
 */
export interface FileBlobStoreConfig {
  /** Base directory for block files */
  directory: string;
  /** Compression applied to block files */
  compression: CompressionMode;
}
