/**
 * Construction and decoding of immutable entity and relationship records
 */

import { ContentMismatchError, CorruptArchiveError } from './errors.js';
import { computeAddress, type EntityContent, type RelationshipContent } from './identity.js';
import { EntityBlockSchema, RelationshipBlockSchema } from './schemas.js';
import type { ContentAddress, Entity, EntityId, PropertyValue, Relationship, RelationshipId } from './types.js';

/**
 * Recursively freeze a property value
 */
export function deepFreeze<T extends PropertyValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
    Object.freeze(value);
  }
  return value;
}

function clonePropertyMap(properties: { [key: string]: PropertyValue }): { [key: string]: PropertyValue } {
  return structuredClone(properties);
}

export function createEntity(id: EntityId, content: EntityContent, address: ContentAddress): Entity {
  const entity: Entity = {
    id,
    type: content.type,
    name: content.name,
    properties: deepFreeze(clonePropertyMap(content.properties)),
    confidence: content.confidence,
    ...(content.sourceText !== undefined ? { sourceText: content.sourceText } : {}),
    ...(content.vectorRef !== undefined ? { vectorRef: content.vectorRef } : {}),
    address
  };
  return Object.freeze(entity);
}

export function createRelationship(
  id: RelationshipId,
  content: RelationshipContent,
  address: ContentAddress
): Relationship {
  const relationship: Relationship = {
    id,
    type: content.type,
    sourceId: content.sourceId,
    targetId: content.targetId,
    properties: deepFreeze(clonePropertyMap(content.properties)),
    confidence: content.confidence,
    ...(content.sourceText !== undefined ? { sourceText: content.sourceText } : {}),
    address
  };
  return Object.freeze(relationship);
}

/**
 * Content fields of an entity, as encoded into its block
 */
export function entityContent(entity: Entity): EntityContent {
  return {
    type: entity.type,
    name: entity.name,
    properties: entity.properties,
    confidence: entity.confidence,
    ...(entity.sourceText !== undefined ? { sourceText: entity.sourceText } : {}),
    ...(entity.vectorRef !== undefined ? { vectorRef: entity.vectorRef } : {})
  };
}

export function relationshipContent(relationship: Relationship): RelationshipContent {
  return {
    type: relationship.type,
    sourceId: relationship.sourceId,
    targetId: relationship.targetId,
    properties: relationship.properties,
    confidence: relationship.confidence,
    ...(relationship.sourceText !== undefined ? { sourceText: relationship.sourceText } : {})
  };
}

/**
 * Check a block against the address it was stored under
 */
export function verifyBlock(address: ContentAddress, bytes: Uint8Array): void {
  const actual = computeAddress(bytes);
  if (actual !== address) {
    throw new ContentMismatchError(address, actual);
  }
}

export function parseBlockJson(address: ContentAddress, bytes: Uint8Array): unknown {
  try {
    return JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch (error) {
    throw new CorruptArchiveError(`Block ${address} is not valid JSON`, { address }, { cause: error });
  }
}

/**
 * Verify and decode an entity block
 */
export function decodeEntity(id: EntityId, address: ContentAddress, bytes: Uint8Array): Entity {
  verifyBlock(address, bytes);
  const parsed = EntityBlockSchema.safeParse(parseBlockJson(address, bytes));
  if (!parsed.success) {
    throw new CorruptArchiveError(`Block ${address} is not an entity: ${parsed.error.message}`, { address, id });
  }

  const block = parsed.data;
  return createEntity(
    id,
    {
      type: block.type,
      name: block.name,
      properties: block.properties,
      confidence: block.confidence,
      sourceText: block.source_text ?? undefined,
      vectorRef: block.vector_ref ?? undefined
    },
    address
  );
}

/**
 * Verify and decode a relationship block
 */
export function decodeRelationship(id: RelationshipId, address: ContentAddress, bytes: Uint8Array): Relationship {
  verifyBlock(address, bytes);
  const parsed = RelationshipBlockSchema.safeParse(parseBlockJson(address, bytes));
  if (!parsed.success) {
    throw new CorruptArchiveError(`Block ${address} is not a relationship: ${parsed.error.message}`, {
      address,
      id
    });
  }

  const block = parsed.data;
  return createRelationship(
    id,
    {
      type: block.type,
      sourceId: block.source_id,
      targetId: block.target_id,
      properties: block.properties,
      confidence: block.confidence,
      sourceText: block.source_text ?? undefined
    },
    address
  );
}
