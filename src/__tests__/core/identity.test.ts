/**
 * Unit tests for canonical encoding and content addressing
 */

import {
  canonicalStringify,
  computeAddress,
  encodeEntity,
  encodeRelationship,
  isContentAddress
} from '../../core/identity.js';
import { decodeEntity, decodeRelationship } from '../../core/records.js';
import { ContentMismatchError, CorruptArchiveError } from '../../core/errors.js';

describe('Identity codec', () => {
  describe('canonicalStringify', () => {
    test('should sort object keys at every level', () => {
      const encoded = canonicalStringify({ b: 1, a: [true, null, 'x'], c: { z: 1, y: 2 } });
      expect(encoded).toBe('{"a":[true,null,"x"],"b":1,"c":{"y":2,"z":1}}');
    });

    test('should keep array order', () => {
      expect(canonicalStringify([3, 1, 2])).toBe('[3,1,2]');
    });

    test('should produce the same text for maps built in different orders', () => {
      const first: Record<string, number> = {};
      first.alpha = 1;
      first.beta = 2;
      const second: Record<string, number> = {};
      second.beta = 2;
      second.alpha = 1;

      expect(canonicalStringify(first)).toBe(canonicalStringify(second));
    });
  });

  describe('computeAddress', () => {
    test('should prefix the hex SHA-256 digest', () => {
      expect(computeAddress(new Uint8Array())).toBe(
        'sha256-e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
      );
    });

    test('should recognise well-formed addresses only', () => {
      expect(isContentAddress(computeAddress(Buffer.from('block')))).toBe(true);
      expect(isContentAddress('sha256-xyz')).toBe(false);
      expect(isContentAddress('md5-e3b0c44298fc1c149afbf4c8996fb924')).toBe(false);
    });
  });

  describe('entity encoding', () => {
    test('should encode every content field with absent optionals as null', () => {
      const { bytes } = encodeEntity({ type: 'person', name: 'Alice', properties: { age: 30 }, confidence: 0.9 });

      expect(bytes.toString('utf8')).toBe(
        '{"confidence":0.9,"kind":"entity","name":"Alice","properties":{"age":30},"source_text":null,"type":"person","vector_ref":null}'
      );
    });

    test('should give identical content the same address', () => {
      const first = encodeEntity({
        type: 'person',
        name: 'Alice',
        properties: { role: 'engineer', team: 'search' },
        confidence: 0.9,
        sourceText: 'Alice is an engineer'
      });
      const second = encodeEntity({
        type: 'person',
        name: 'Alice',
        properties: { team: 'search', role: 'engineer' },
        confidence: 0.9,
        sourceText: 'Alice is an engineer'
      });

      expect(second.address).toBe(first.address);
    });

    test('should give different content different addresses', () => {
      const base = { type: 'person', name: 'Alice', properties: {}, confidence: 0.9 };

      const addresses = new Set([
        encodeEntity(base).address,
        encodeEntity({ ...base, confidence: 0.8 }).address,
        encodeEntity({ ...base, name: 'Bob' }).address,
        encodeEntity({ ...base, vectorRef: 'vec-1' }).address,
        encodeEntity({ ...base, sourceText: 'text' }).address
      ]);

      expect(addresses.size).toBe(5);
    });
  });

  describe('relationship encoding', () => {
    test('should include both endpoints', () => {
      const { bytes } = encodeRelationship({
        type: 'knows',
        sourceId: 'alice',
        targetId: 'bob',
        properties: {},
        confidence: 0.95
      });

      expect(bytes.toString('utf8')).toBe(
        '{"confidence":0.95,"kind":"relationship","properties":{},"source_id":"alice","source_text":null,"target_id":"bob","type":"knows"}'
      );
    });
  });

  describe('decoding', () => {
    test('should rebuild a frozen entity from its block', () => {
      const content = { type: 'person', name: 'Alice', properties: { tags: ['a', 'b'] }, confidence: 0.9 };
      const { bytes, address } = encodeEntity(content);

      const entity = decodeEntity('alice', address, bytes);

      expect(entity).toEqual({ id: 'alice', ...content, address });
      expect(Object.isFrozen(entity)).toBe(true);
      expect(Object.isFrozen(entity.properties.tags)).toBe(true);
    });

    test('should reject bytes that do not match the address', () => {
      const { address } = encodeEntity({ type: 'person', name: 'Alice', properties: {}, confidence: 0.9 });
      const tampered = encodeEntity({ type: 'person', name: 'Mallory', properties: {}, confidence: 0.9 });

      expect(() => decodeEntity('alice', address, tampered.bytes)).toThrow(ContentMismatchError);
    });

    test('should reject a relationship block decoded as an entity', () => {
      const { bytes, address } = encodeRelationship({
        type: 'knows',
        sourceId: 'a',
        targetId: 'b',
        properties: {},
        confidence: 1
      });

      expect(() => decodeEntity('a', address, bytes)).toThrow(CorruptArchiveError);
      expect(decodeRelationship('r1', address, bytes).targetId).toBe('b');
    });
  });
});
