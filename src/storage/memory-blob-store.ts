/**
 * In-memory blob store
 *
 * Keeps every block in a map keyed by its content address. Suitable for
 * tests and for graphs whose blocks fit in memory; several graphs can share
 * one instance.
 */

import { NotFoundError } from '../core/errors.js';
import { computeAddress } from '../core/identity.js';
import type { ContentAddress } from '../core/types.js';
import type { BlobStore, BlobStoreStats } from './types.js';

export class MemoryBlobStore implements BlobStore {
  private blocks: Map<ContentAddress, Uint8Array> = new Map();
  private retrievals = 0;

  async store(bytes: Uint8Array): Promise<ContentAddress> {
    const address = computeAddress(bytes);
    if (!this.blocks.has(address)) {
      this.blocks.set(address, new Uint8Array(bytes));
    }
    return address;
  }

  async retrieve(address: ContentAddress): Promise<Uint8Array> {
    const block = this.blocks.get(address);
    if (!block) {
      throw new NotFoundError(`Block ${address} not found`, { address });
    }
    this.retrievals++;
    return new Uint8Array(block);
  }

  async has(address: ContentAddress): Promise<boolean> {
    return this.blocks.has(address);
  }

  /**
   * Number of successful `retrieve` calls, for observing lazy loading
   */
  get retrievalCount(): number {
    return this.retrievals;
  }

  getStats(): BlobStoreStats {
    let totalBytes = 0;
    for (const block of this.blocks.values()) {
      totalBytes += block.byteLength;
    }
    return { blockCount: this.blocks.size, totalBytes };
  }
}
