/**
 * File-backed blob store
 *
 * One file per block under `<directory>/blocks/<aa>/<address>`, where `aa`
 * is the first two hex digits of the digest. Files are written to a
 * temporary name and renamed into place, so a reader never observes a
 * partially written block. Blocks may be gzip-compressed on disk; the
 * address always covers the uncompressed bytes.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { InvalidArgumentError, NotFoundError } from '../core/errors.js';
import { ADDRESS_PREFIX, computeAddress, isContentAddress } from '../core/identity.js';
import type { ContentAddress } from '../core/types.js';
import { compress, decompress } from './compression.js';
import type { BlobStore, BlobStoreStats, FileBlobStoreConfig } from './types.js';

export class FileBlobStore implements BlobStore {
  private readonly config: FileBlobStoreConfig;
  private initialized = false;

  constructor(config: Partial<FileBlobStoreConfig> & { directory: string }) {
    if (config.directory.trim().length === 0) {
      throw new InvalidArgumentError('Blob store directory is required');
    }
    this.config = {
      directory: config.directory,
      compression: config.compression ?? 'none'
    };
  }

  /**
   * Create the storage directory if it doesn't exist
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    await fs.mkdir(join(this.config.directory, 'blocks'), { recursive: true });
    this.initialized = true;
  }

  async store(bytes: Uint8Array): Promise<ContentAddress> {
    await this.initialize();

    const address = computeAddress(bytes);
    const filePath = this.pathFor(address);

    if (await this.exists(filePath)) {
      return address;
    }

    await fs.mkdir(join(filePath, '..'), { recursive: true });
    const payload = await compress(bytes, this.config.compression);
    const tempPath = `${filePath}.${uuidv4()}.tmp`;
    await fs.writeFile(tempPath, payload);
    await fs.rename(tempPath, filePath);

    return address;
  }

  async retrieve(address: ContentAddress): Promise<Uint8Array> {
    if (!isContentAddress(address)) {
      throw new NotFoundError(`Block ${address} not found`, { address });
    }

    let raw: Buffer;
    try {
      raw = await fs.readFile(this.pathFor(address));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Block ${address} not found`, { address });
      }
      throw error;
    }

    return decompress(raw);
  }

  async has(address: ContentAddress): Promise<boolean> {
    return isContentAddress(address) && this.exists(this.pathFor(address));
  }

  /**
   * Get storage statistics
   */
  async getStats(): Promise<BlobStoreStats> {
    await this.initialize();

    let blockCount = 0;
    let totalBytes = 0;
    const root = join(this.config.directory, 'blocks');

    for (const shard of await fs.readdir(root)) {
      for (const file of await fs.readdir(join(root, shard))) {
        if (!file.startsWith(ADDRESS_PREFIX) || file.endsWith('.tmp')) continue;
        const block = await decompress(await fs.readFile(join(root, shard, file)));
        blockCount++;
        totalBytes += block.byteLength;
      }
    }

    return { blockCount, totalBytes };
  }

  private pathFor(address: ContentAddress): string {
    const digest = address.slice(ADDRESS_PREFIX.length);
    return join(this.config.directory, 'blocks', digest.slice(0, 2), address);
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
