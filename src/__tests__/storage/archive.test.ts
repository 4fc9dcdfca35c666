/**
 * Unit tests for the archive and root block codecs
 */

import { ContentMismatchError, CorruptArchiveError } from '../../core/errors.js';
import { computeAddress, encodeEntity, encodeRelationship } from '../../core/identity.js';
import { decodeArchive, encodeArchive } from '../../storage/archive.js';
import { isGzipped } from '../../storage/compression.js';
import { decodeRootBlock, encodeRootBlock, type RootContent } from '../../storage/root-block.js';
import { MemoryBlobStore } from '../../storage/memory-blob-store.js';

const alice = encodeEntity({ type: 'person', name: 'Alice', properties: {}, confidence: 1 });
const bob = encodeEntity({ type: 'person', name: 'Bob', properties: {}, confidence: 1 });
const knows = encodeRelationship({ type: 'knows', sourceId: 'alice', targetId: 'bob', properties: {}, confidence: 1 });

function rootContent(overrides: Partial<RootContent> = {}): RootContent {
  return {
    name: 'people',
    entities: [
      ['alice', alice.address],
      ['bob', bob.address]
    ],
    relationships: [['r1', knows.address]],
    entityTypes: { person: ['alice', 'bob'] },
    relationshipTypes: { knows: ['r1'] },
    vectorRefs: [],
    ...overrides
  };
}

function blockLine(address: string, bytes: Uint8Array): string {
  return JSON.stringify({ address, data: Buffer.from(bytes).toString('base64') });
}

describe('Root block codec', () => {
  test('should keep small pair lists inline', () => {
    const root = encodeRootBlock(rootContent(), 1024);
    const block = JSON.parse(Buffer.from(root.bytes).toString());

    expect(root.chunks).toEqual([]);
    expect(block).toMatchObject({
      kind: 'knowledge_graph',
      version: 1,
      name: 'people',
      entity_count: 2,
      relationship_count: 1
    });
    expect(block.entities).toEqual([
      ['alice', alice.address],
      ['bob', bob.address]
    ]);
  });

  test('should move oversized pair lists into chunk blocks', async () => {
    const root = encodeRootBlock(rootContent(), 50);
    const store = new MemoryBlobStore();
    for (const chunk of root.chunks) await store.store(chunk.bytes);

    expect(root.chunks).toHaveLength(2);
    expect(JSON.parse(Buffer.from(root.bytes).toString()).entities).toEqual({ $chunk: root.chunks[0]?.address });

    const decoded = await decodeRootBlock(root.address, root.bytes, address => store.retrieve(address));
    expect(decoded).toEqual(rootContent());
  });

  test('should report a missing chunk as a corrupt archive', async () => {
    const root = encodeRootBlock(rootContent(), 50);
    const empty = new MemoryBlobStore();

    await expect(decodeRootBlock(root.address, root.bytes, address => empty.retrieve(address))).rejects.toThrow(
      CorruptArchiveError
    );
  });

  test('should reject blocks that are not roots', async () => {
    await expect(decodeRootBlock(alice.address, alice.bytes, async () => new Uint8Array())).rejects.toThrow(
      CorruptArchiveError
    );
  });

  test('should reject roots whose counts disagree with their pair lists', async () => {
    const forged = encodeRootBlock(rootContent({ entities: [['alice', alice.address]] }), 1024);
    const bytes = Buffer.from(JSON.stringify({ ...JSON.parse(Buffer.from(forged.bytes).toString()), entity_count: 2 }));

    await expect(decodeRootBlock(computeAddress(bytes), bytes, async () => new Uint8Array())).rejects.toThrow(
      'declares counts that do not match'
    );
  });
});

describe('Archive codec', () => {
  const root = encodeRootBlock(rootContent(), 1024);
  const blocks = [root, alice, bob, knows];

  test('should write a header line followed by blocks sorted by address', async () => {
    const bytes = await encodeArchive(root.address, blocks);
    const lines = bytes.toString('utf8').split('\n');

    expect(lines[0]).toBe(`{"format":"kg-archive","roots":["${root.address}"],"version":1}`);
    expect(lines).toHaveLength(6);
    expect(lines[5]).toBe('');

    const addresses = lines.slice(1, 5).map(line => JSON.parse(line).address);
    expect(addresses).toEqual([...addresses].sort());
  });

  test('should write each block once', async () => {
    const bytes = await encodeArchive(root.address, [...blocks, alice, alice]);

    expect(bytes.toString('utf8').split('\n')).toHaveLength(6);
  });

  test('should produce identical bytes for identical input', async () => {
    const first = await encodeArchive(root.address, blocks);
    const second = await encodeArchive(root.address, [...blocks].reverse());

    expect(second.equals(first)).toBe(true);
  });

  test('should decode what it encodes, with or without gzip', async () => {
    for (const compression of ['none', 'gzip'] as const) {
      const bytes = await encodeArchive(root.address, blocks, compression);
      expect(isGzipped(bytes)).toBe(compression === 'gzip');

      const decoded = await decodeArchive(bytes);
      expect(decoded.root).toBe(root.address);
      expect(decoded.blocks.size).toBe(4);
      expect(Buffer.from(decoded.blocks.get(alice.address) ?? []).equals(alice.bytes)).toBe(true);
    }
  });

  describe('rejection', () => {
    const header = `{"format":"kg-archive","roots":["${alice.address}"],"version":1}`;

    test.each([
      ['an empty file', ''],
      ['a non-JSON header', 'not json\n'],
      ['a foreign header', `{"format":"tar","roots":["${alice.address}"],"version":1}\n`],
      ['an unsupported version', `{"format":"kg-archive","roots":["${alice.address}"],"version":2}\n`],
      ['a missing root block', `${header}\n${blockLine(bob.address, bob.bytes)}\n`],
      ['a line without data', `${header}\n{"address":"${alice.address}"}\n`],
      ['malformed base64', `${header}\n{"address":"${alice.address}","data":"abc"}\n`]
    ])('should reject %s', async (_label, text) => {
      await expect(decodeArchive(Buffer.from(text, 'utf8'))).rejects.toThrow(CorruptArchiveError);
    });

    test('should reject a block whose bytes do not match its address', async () => {
      const text = `${header}\n${blockLine(alice.address, bob.bytes)}\n`;

      await expect(decodeArchive(Buffer.from(text, 'utf8'))).rejects.toThrow(ContentMismatchError);
    });

    test('should reject truncated gzip data', async () => {
      const bytes = await encodeArchive(root.address, blocks, 'gzip');

      await expect(decodeArchive(bytes.subarray(0, 20))).rejects.toThrow(CorruptArchiveError);
    });
  });
});
