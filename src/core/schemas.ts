/**
 * Zod schemas for values crossing the graph boundary
 *
 * Property maps are checked when entities and relationships are added;
 * entity, relationship and root blocks are checked when decoded from a
 * blob store or an archive.
 */

import { z } from 'zod';
import type { PropertyValue } from './types.js';

export const PropertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(PropertyValueSchema),
    z.record(z.string(), PropertyValueSchema)
  ])
);

export const PropertyMapSchema = z.record(z.string(), PropertyValueSchema);

export const ConfidenceSchema = z.number().finite().min(0).max(1);

const AddressSchema = z.string().regex(/^sha256-[0-9a-f]{64}$/, 'malformed content address');

export const EntityBlockSchema = z.object({
  kind: z.literal('entity'),
  type: z.string().min(1),
  name: z.string(),
  properties: PropertyMapSchema,
  confidence: ConfidenceSchema,
  source_text: z.string().nullable(),
  vector_ref: z.string().nullable()
});

export const RelationshipBlockSchema = z.object({
  kind: z.literal('relationship'),
  type: z.string().min(1),
  source_id: z.string().min(1),
  target_id: z.string().min(1),
  properties: PropertyMapSchema,
  confidence: ConfidenceSchema,
  source_text: z.string().nullable()
});

const PairListSchema = z.array(z.tuple([z.string().min(1), AddressSchema]));

const ChunkRefSchema = z.object({ $chunk: AddressSchema });

export const RootBlockSchema = z.object({
  kind: z.literal('knowledge_graph'),
  version: z.literal(1),
  name: z.string().min(1),
  entity_count: z.number().int().nonnegative(),
  relationship_count: z.number().int().nonnegative(),
  entity_types: z.record(z.string(), z.array(z.string())),
  relationship_types: z.record(z.string(), z.array(z.string())),
  entities: z.union([PairListSchema, ChunkRefSchema]),
  relationships: z.union([PairListSchema, ChunkRefSchema]),
  vector_refs: z.array(z.tuple([z.string().min(1), z.string().min(1)]))
});

export const PairListBlockSchema = PairListSchema;

export const ArchiveHeaderSchema = z.object({
  format: z.literal('kg-archive'),
  version: z.literal(1),
  roots: z.array(AddressSchema).min(1)
});

export const ArchiveBlockLineSchema = z.object({
  address: AddressSchema,
  data: z.string()
});

export type EntityBlock = z.infer<typeof EntityBlockSchema>;
export type RelationshipBlock = z.infer<typeof RelationshipBlockSchema>;
export type RootBlock = z.infer<typeof RootBlockSchema>;
export type PairList = z.infer<typeof PairListSchema>;
export type ArchiveHeader = z.infer<typeof ArchiveHeaderSchema>;
