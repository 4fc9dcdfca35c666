/**
 * Portable graph archive
 *
 * An archive is a JSON Lines file. The first line is a header naming the
 * root block; every following line carries one block as
 * `{"address": ..., "data": <base64>}`, sorted by address. The whole file
 * may be gzip-compressed, which readers detect from its magic bytes.
 *
 * Readers recompute every block's address and reject the archive on the
 * first mismatch.
 */

import { CorruptArchiveError } from '../core/errors.js';
import { canonicalStringify } from '../core/identity.js';
import { verifyBlock } from '../core/records.js';
import { ArchiveBlockLineSchema, ArchiveHeaderSchema } from '../core/schemas.js';
import type { CompressionMode, ContentAddress } from '../core/types.js';
import { compareIds } from '../utils/compare.js';
import { compress, decompress } from './compression.js';
import type { EncodedBlock } from './root-block.js';

export const ARCHIVE_FORMAT = 'kg-archive';
export const ARCHIVE_VERSION = 1;

export interface DecodedArchive {
  root: ContentAddress;
  /** Verified blocks keyed by address */
  blocks: Map<ContentAddress, Uint8Array>;
}

/**
 * Serialize a root address and its blocks into archive bytes
 * Identical inputs always produce identical bytes.
 */
export async function encodeArchive(
  root: ContentAddress,
  blocks: Iterable<EncodedBlock>,
  compression: CompressionMode = 'none'
): Promise<Buffer> {
  const unique = new Map<ContentAddress, Uint8Array>();
  for (const block of blocks) {
    unique.set(block.address, block.bytes);
  }

  const lines = [canonicalStringify({ format: ARCHIVE_FORMAT, roots: [root], version: ARCHIVE_VERSION })];
  for (const address of [...unique.keys()].sort(compareIds)) {
    const bytes = unique.get(address) ?? new Uint8Array();
    lines.push(canonicalStringify({ address, data: Buffer.from(bytes).toString('base64') }));
  }

  return compress(Buffer.from(`${lines.join('\n')}\n`, 'utf8'), compression);
}

/**
 * Parse and verify archive bytes
 */
export async function decodeArchive(bytes: Uint8Array): Promise<DecodedArchive> {
  let text: string;
  try {
    text = (await decompress(bytes)).toString('utf8');
  } catch (error) {
    throw new CorruptArchiveError('Archive could not be decompressed', undefined, { cause: error });
  }

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  const [headerLine, ...blockLines] = lines;
  if (headerLine === undefined || headerLine.length === 0) {
    throw new CorruptArchiveError('Archive is empty');
  }

  const header = ArchiveHeaderSchema.safeParse(parseLine(headerLine, 1));
  if (!header.success) {
    throw new CorruptArchiveError(`Archive header is invalid: ${header.error.message}`);
  }

  const blocks = new Map<ContentAddress, Uint8Array>();
  blockLines.forEach((line, index) => {
    const lineNumber = index + 2;
    const parsed = ArchiveBlockLineSchema.safeParse(parseLine(line, lineNumber));
    if (!parsed.success) {
      throw new CorruptArchiveError(`Archive line ${lineNumber} is not a block: ${parsed.error.message}`, {
        line: lineNumber
      });
    }

    const data = Buffer.from(parsed.data.data, 'base64');
    if (data.toString('base64') !== parsed.data.data) {
      throw new CorruptArchiveError(`Archive line ${lineNumber} carries malformed base64 data`, {
        line: lineNumber,
        address: parsed.data.address
      });
    }

    verifyBlock(parsed.data.address, data);
    blocks.set(parsed.data.address, new Uint8Array(data));
  });

  const [root] = header.data.roots;
  if (root === undefined || !blocks.has(root)) {
    throw new CorruptArchiveError(`Archive does not contain its root block ${String(root)}`);
  }

  return { root, blocks };
}

function parseLine(line: string, lineNumber: number): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    throw new CorruptArchiveError(`Archive line ${lineNumber} is not valid JSON`, { line: lineNumber }, { cause: error });
  }
}
