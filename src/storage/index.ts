/**
 * Storage module for the knowledge graph
 *
 * Blob stores hold content-addressed blocks; the archive and root block
 * codecs move whole graphs between stores and files.
 */

export type { BlobStore, BlobStoreStats, FileBlobStoreConfig } from './types.js';
export { MemoryBlobStore } from './memory-blob-store.js';
export { FileBlobStore } from './file-blob-store.js';
export { encodeArchive, decodeArchive, ARCHIVE_FORMAT, ARCHIVE_VERSION } from './archive.js';
export type { DecodedArchive } from './archive.js';
export { encodeRootBlock, decodeRootBlock } from './root-block.js';
export type { RootContent, EncodedBlock, EncodedRoot } from './root-block.js';
export { isGzipped, compress, decompress } from './compression.js';
