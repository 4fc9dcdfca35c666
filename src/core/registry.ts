/**
 * Entity and relationship registries
 *
 * Each registry maps logical IDs to content addresses, caches decoded
 * records, and keeps a per-type index of IDs in registration order. A
 * record may be registered before it is decoded (lazy loading); it is then
 * fetched from the blob store, verified and cached on first access.
 */

import { compareIds } from '../utils/compare.js';
import { ErrorHandler } from '../utils/error-handler.js';
import type { BlobStore } from '../storage/types.js';
import { CorruptArchiveError } from './errors.js';
import { decodeEntity, decodeRelationship } from './records.js';
import type { ContentAddress, Entity, EntityId, Relationship, RelationshipId, VectorRef } from './types.js';

type Pair = [string, ContentAddress];

abstract class ContentRegistry<T extends { id: string; type: string; address: ContentAddress }> {
  private addresses: Map<string, ContentAddress> = new Map();
  private types: Map<string, string> = new Map();
  private typeIndex: Map<string, string[]> = new Map();
  private cache: Map<string, T> = new Map();
  private pendingLoads: Map<string, Promise<T>> = new Map();

  protected abstract decode(id: string, address: ContentAddress, bytes: Uint8Array): T;

  /**
   * Register a record's ID, type and address; `decoded` fills the cache
   */
  register(id: string, type: string, address: ContentAddress, decoded?: T): void {
    this.addresses.set(id, address);
    this.types.set(id, type);

    const ids = this.typeIndex.get(type);
    if (ids) {
      ids.push(id);
    } else {
      this.typeIndex.set(type, [id]);
    }

    if (decoded) {
      this.cache.set(id, decoded);
    }
  }

  has(id: string): boolean {
    return this.addresses.has(id);
  }

  addressOf(id: string): ContentAddress | undefined {
    return this.addresses.get(id);
  }

  typeOf(id: string): string | undefined {
    return this.types.get(id);
  }

  /**
   * Decoded record if it is already cached
   */
  cached(id: string): T | undefined {
    return this.cache.get(id);
  }

  get size(): number {
    return this.addresses.size;
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  /**
   * Snapshot of the IDs registered under `type`, in registration order
   */
  idsByType(type: string): string[] {
    return [...(this.typeIndex.get(type) ?? [])];
  }

  typeNames(): string[] {
    return [...this.typeIndex.keys()];
  }

  ids(): string[] {
    return [...this.addresses.keys()];
  }

  /**
   * `(id, address)` pairs sorted by ID
   */
  sortedPairs(): Pair[] {
    return [...this.addresses.entries()].sort((a, b) => compareIds(a[0], b[0]));
  }

  /**
   * Type index with sorted type names and sorted ID lists
   */
  sortedTypeIndex(): Record<string, string[]> {
    const snapshot: Record<string, string[]> = {};
    for (const type of [...this.typeIndex.keys()].sort(compareIds)) {
      snapshot[type] = [...(this.typeIndex.get(type) ?? [])].sort(compareIds);
    }
    return snapshot;
  }

  /**
   * Return the decoded record, fetching and verifying it on a cache miss
   * Returns undefined for unknown IDs.
   */
  async resolve(id: string, blobStore: BlobStore): Promise<T | undefined> {
    const hit = this.cache.get(id);
    if (hit) return hit;

    const address = this.addresses.get(id);
    if (!address) return undefined;

    const pending = this.pendingLoads.get(id);
    if (pending) return pending;

    const load = ErrorHandler.wrapCollaborator('blob_store', 'retrieve block', () => blobStore.retrieve(address), {
      id,
      address
    })
      .then(bytes => {
        const decoded = this.decode(id, address, bytes);
        const registeredType = this.types.get(id);
        if (decoded.type !== registeredType) {
          throw new CorruptArchiveError(`Block ${address} has type ${decoded.type}, but ${id} is indexed as ${registeredType}`, {
            id,
            address
          });
        }
        this.cache.set(id, decoded);
        return decoded;
      })
      .finally(() => {
        this.pendingLoads.delete(id);
      });

    this.pendingLoads.set(id, load);
    return load;
  }
}

/**
 * Registry of entities, with a reverse index from vector references
 */
export class EntityRegistry extends ContentRegistry<Entity> {
  private vectorOwners: Map<VectorRef, EntityId> = new Map();

  protected decode(id: EntityId, address: ContentAddress, bytes: Uint8Array): Entity {
    return decodeEntity(id, address, bytes);
  }

  registerVectorRef(vectorRef: VectorRef, entityId: EntityId): void {
    this.vectorOwners.set(vectorRef, entityId);
  }

  ownerOf(vectorRef: VectorRef): EntityId | undefined {
    return this.vectorOwners.get(vectorRef);
  }

  get vectorCount(): number {
    return this.vectorOwners.size;
  }

  /**
   * `(vectorRef, entityId)` pairs sorted by reference
   */
  sortedVectorRefs(): Array<[VectorRef, EntityId]> {
    return [...this.vectorOwners.entries()].sort((a, b) => compareIds(a[0], b[0]));
  }
}

/**
 * Registry of relationships
 */
export class RelationshipRegistry extends ContentRegistry<Relationship> {
  protected decode(id: RelationshipId, address: ContentAddress, bytes: Uint8Array): Relationship {
    return decodeRelationship(id, address, bytes);
  }
}
