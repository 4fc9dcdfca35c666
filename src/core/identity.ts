/**
 * Canonical encoding and content addressing
 *
 * The canonical encoding is JSON with object keys sorted at every level,
 * so two values with the same content always serialize to the same bytes
 * no matter how their maps were built. The content address is the SHA-256
 * digest of those bytes. Logical IDs are not part of an entity's or a
 * relationship's encoding: identical content shares one address.
 */

import { createHash } from 'crypto';
import type { ContentAddress, PropertyMap, PropertyValue, VectorRef } from './types.js';
import type { EntityBlock, RelationshipBlock } from './schemas.js';

export const ADDRESS_PREFIX = 'sha256-';

type Encodable = PropertyValue;

/**
 * Serialize a value with object keys in sorted order
 */
export function canonicalStringify(value: Encodable): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalStringify(item)).join(',')}]`;
  }

  const keys = Object.keys(value).sort();
  const members: string[] = [];
  for (const key of keys) {
    const member = value[key];
    if (member === undefined) continue;
    members.push(`${JSON.stringify(key)}:${canonicalStringify(member)}`);
  }
  return `{${members.join(',')}}`;
}

export function canonicalBytes(value: Encodable): Buffer {
  return Buffer.from(canonicalStringify(value), 'utf8');
}

/**
 * Compute the content address of a block
 */
export function computeAddress(bytes: Uint8Array): ContentAddress {
  return ADDRESS_PREFIX + createHash('sha256').update(bytes).digest('hex');
}

export function isContentAddress(value: string): boolean {
  return /^sha256-[0-9a-f]{64}$/.test(value);
}

/**
 * Fields that make up an entity's content
 */
export interface EntityContent {
  type: string;
  name: string;
  properties: PropertyMap;
  confidence: number;
  sourceText?: string;
  vectorRef?: VectorRef;
}

/**
 * Fields that make up a relationship's content
 */
export interface RelationshipContent {
  type: string;
  sourceId: string;
  targetId: string;
  properties: PropertyMap;
  confidence: number;
  sourceText?: string;
}

export function entityBlock(content: EntityContent): EntityBlock {
  return {
    kind: 'entity',
    type: content.type,
    name: content.name,
    properties: content.properties,
    confidence: content.confidence,
    source_text: content.sourceText ?? null,
    vector_ref: content.vectorRef ?? null
  };
}

export function relationshipBlock(content: RelationshipContent): RelationshipBlock {
  return {
    kind: 'relationship',
    type: content.type,
    source_id: content.sourceId,
    target_id: content.targetId,
    properties: content.properties,
    confidence: content.confidence,
    source_text: content.sourceText ?? null
  };
}

/**
 * Canonical bytes and address of an entity
 */
export function encodeEntity(content: EntityContent): { bytes: Buffer; address: ContentAddress } {
  const bytes = canonicalBytes(entityBlock(content));
  return { bytes, address: computeAddress(bytes) };
}

/**
 * Canonical bytes and address of a relationship
 */
export function encodeRelationship(content: RelationshipContent): { bytes: Buffer; address: ContentAddress } {
  const bytes = canonicalBytes(relationshipBlock(content));
  return { bytes, address: computeAddress(bytes) };
}

/**
 * Canonical bytes and address of any JSON-compatible block
 */
export function encodeBlock(value: Encodable): { bytes: Buffer; address: ContentAddress } {
  const bytes = canonicalBytes(value);
  return { bytes, address: computeAddress(bytes) };
}
