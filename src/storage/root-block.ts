/**
 * Root block codec
 *
 * The root block summarizes a graph's logical content: the sorted
 * `(id, address)` pairs of its entities and relationships, the sorted type
 * indices, and the vector references it registered. Because every list is
 * sorted and the encoding is canonical, the root address depends only on
 * what the graph contains and never on the order it was built in.
 *
 * Pair lists whose encoding exceeds the inline limit are stored as their
 * own block and referenced as `{ "$chunk": address }`.
 */

import { CorruptArchiveError, NotFoundError } from '../core/errors.js';
import { encodeBlock } from '../core/identity.js';
import { parseBlockJson, verifyBlock } from '../core/records.js';
import { PairListBlockSchema, RootBlockSchema, type PairList, type RootBlock } from '../core/schemas.js';
import type { ContentAddress, EntityId, VectorRef } from '../core/types.js';

export const ROOT_BLOCK_KIND = 'knowledge_graph';
export const ROOT_BLOCK_VERSION = 1;

/**
 * Logical content summarized by a root block
 */
export interface RootContent {
  name: string;
  entities: PairList;
  relationships: PairList;
  entityTypes: Record<string, string[]>;
  relationshipTypes: Record<string, string[]>;
  vectorRefs: Array<[VectorRef, EntityId]>;
}

export interface EncodedBlock {
  address: ContentAddress;
  bytes: Uint8Array;
}

/**
 * The root block plus any pair-list chunks it references
 */
export interface EncodedRoot extends EncodedBlock {
  chunks: EncodedBlock[];
}

/**
 * Encode a root block, moving oversized pair lists into chunk blocks
 */
export function encodeRootBlock(content: RootContent, maxInlineBlockBytes: number): EncodedRoot {
  const chunks: EncodedBlock[] = [];

  const inlineOrChunk = (pairs: PairList): PairList | { $chunk: ContentAddress } => {
    const encoded = encodeBlock(pairs);
    if (encoded.bytes.byteLength <= maxInlineBlockBytes) {
      return pairs;
    }
    chunks.push(encoded);
    return { $chunk: encoded.address };
  };

  const root: RootBlock = {
    kind: ROOT_BLOCK_KIND,
    version: ROOT_BLOCK_VERSION,
    name: content.name,
    entity_count: content.entities.length,
    relationship_count: content.relationships.length,
    entity_types: content.entityTypes,
    relationship_types: content.relationshipTypes,
    entities: inlineOrChunk(content.entities),
    relationships: inlineOrChunk(content.relationships),
    vector_refs: content.vectorRefs
  };

  const encoded = encodeBlock(root);
  return { address: encoded.address, bytes: encoded.bytes, chunks };
}

/**
 * Verify and decode a root block, fetching chunk blocks through `fetchBlock`
 */
export async function decodeRootBlock(
  address: ContentAddress,
  bytes: Uint8Array,
  fetchBlock: (address: ContentAddress) => Promise<Uint8Array>
): Promise<RootContent> {
  verifyBlock(address, bytes);

  const parsed = RootBlockSchema.safeParse(parseBlockJson(address, bytes));
  if (!parsed.success) {
    throw new CorruptArchiveError(`Block ${address} is not a knowledge graph root: ${parsed.error.message}`, {
      address
    });
  }
  const root = parsed.data;

  const entities = await resolvePairs(root.entities, fetchBlock);
  const relationships = await resolvePairs(root.relationships, fetchBlock);

  if (entities.length !== root.entity_count || relationships.length !== root.relationship_count) {
    throw new CorruptArchiveError(`Root block ${address} declares counts that do not match its pair lists`, {
      address,
      entityCount: root.entity_count,
      relationshipCount: root.relationship_count
    });
  }

  return {
    name: root.name,
    entities,
    relationships,
    entityTypes: root.entity_types,
    relationshipTypes: root.relationship_types,
    vectorRefs: root.vector_refs
  };
}

async function resolvePairs(
  value: PairList | { $chunk: ContentAddress },
  fetchBlock: (address: ContentAddress) => Promise<Uint8Array>
): Promise<PairList> {
  if (Array.isArray(value)) {
    return value;
  }

  const chunkAddress = value.$chunk;
  let bytes: Uint8Array;
  try {
    bytes = await fetchBlock(chunkAddress);
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new CorruptArchiveError(`Pair list chunk ${chunkAddress} is missing`, { address: chunkAddress }, {
        cause: error
      });
    }
    throw error;
  }
  verifyBlock(chunkAddress, bytes);

  const parsed = PairListBlockSchema.safeParse(parseBlockJson(chunkAddress, bytes));
  if (!parsed.success) {
    throw new CorruptArchiveError(`Block ${chunkAddress} is not a pair list: ${parsed.error.message}`, {
      address: chunkAddress
    });
  }
  return parsed.data;
}
