/**
 * Adjacency index using per-entity, per-type relationship lists
 *
 * Adjacency lists keep memory at O(n + m) for sparse knowledge graphs.
 * Both forward (outgoing) and reverse (incoming) lists are maintained so
 * traversal can walk edges in either direction. Every list is in the order
 * relationships were added.
 */

import type { Direction, EntityId, RelationshipId } from './types.js';

interface DirectedLists {
  /** All relationship IDs, in addition order */
  all: RelationshipId[];
  /** Relationship IDs keyed by relationship type, in addition order */
  byType: Map<string, RelationshipId[]>;
}

/**
 * Minimal relationship shape the index needs
 */
export interface AdjacencyEdge {
  id: RelationshipId;
  type: string;
  sourceId: EntityId;
  targetId: EntityId;
}

export class AdjacencyIndex {
  private outgoing: Map<EntityId, DirectedLists> = new Map();
  private incoming: Map<EntityId, DirectedLists> = new Map();
  private sequence: Map<RelationshipId, number> = new Map();

  /**
   * Create empty lists for an entity
   */
  addEntity(entityId: EntityId): void {
    if (!this.outgoing.has(entityId)) {
      this.outgoing.set(entityId, { all: [], byType: new Map() });
    }
    if (!this.incoming.has(entityId)) {
      this.incoming.set(entityId, { all: [], byType: new Map() });
    }
  }

  hasEntity(entityId: EntityId): boolean {
    return this.outgoing.has(entityId);
  }

  /**
   * Record a relationship in the source's outgoing and the target's incoming lists
   */
  addRelationship(edge: AdjacencyEdge): void {
    this.addEntity(edge.sourceId);
    this.addEntity(edge.targetId);
    this.sequence.set(edge.id, this.sequence.size);

    appendTo(this.listsFor(this.outgoing, edge.sourceId), edge);
    appendTo(this.listsFor(this.incoming, edge.targetId), edge);
  }

  /**
   * Relationship IDs touching an entity
   *
   * `both` is the outgoing list followed by the incoming list. A type filter
   * keeps addition order across the requested types; unknown types
   * contribute nothing.
   */
  relationshipIds(entityId: EntityId, direction: Direction = 'both', relationshipTypes?: readonly string[]): RelationshipId[] {
    const result: RelationshipId[] = [];

    if (direction === 'outgoing' || direction === 'both') {
      result.push(...this.select(this.outgoing.get(entityId), relationshipTypes));
    }
    if (direction === 'incoming' || direction === 'both') {
      result.push(...this.select(this.incoming.get(entityId), relationshipTypes));
    }

    return result;
  }

  /**
   * Number of relationships touching an entity in the given direction
   */
  degree(entityId: EntityId, direction: Direction = 'both'): number {
    const out = this.outgoing.get(entityId)?.all.length ?? 0;
    const inc = this.incoming.get(entityId)?.all.length ?? 0;
    if (direction === 'outgoing') return out;
    if (direction === 'incoming') return inc;
    return out + inc;
  }

  get entityCount(): number {
    return this.outgoing.size;
  }

  get relationshipCount(): number {
    return this.sequence.size;
  }

  /**
   * Consistency check against a lookup of known relationships
   * Returns one message per problem found.
   */
  validate(lookup: (id: RelationshipId) => AdjacencyEdge | undefined): string[] {
    const errors: string[] = [];

    for (const [entityId, lists] of this.outgoing) {
      for (const id of lists.all) {
        const edge = lookup(id);
        if (!edge) {
          errors.push(`Outgoing list of ${entityId} references unknown relationship ${id}`);
        } else if (edge.sourceId !== entityId) {
          errors.push(`Relationship ${id} has mismatched source node`);
        }
      }
    }

    for (const [entityId, lists] of this.incoming) {
      for (const id of lists.all) {
        const edge = lookup(id);
        if (!edge) {
          errors.push(`Incoming list of ${entityId} references unknown relationship ${id}`);
        } else if (edge.targetId !== entityId) {
          errors.push(`Relationship ${id} has mismatched target node`);
        }
      }
    }

    return errors;
  }

  private listsFor(side: Map<EntityId, DirectedLists>, entityId: EntityId): DirectedLists {
    let lists = side.get(entityId);
    if (!lists) {
      lists = { all: [], byType: new Map() };
      side.set(entityId, lists);
    }
    return lists;
  }

  private select(lists: DirectedLists | undefined, relationshipTypes?: readonly string[]): RelationshipId[] {
    if (!lists) return [];
    if (!relationshipTypes) return [...lists.all];

    const selected: RelationshipId[] = [];
    for (const type of new Set(relationshipTypes)) {
      selected.push(...(lists.byType.get(type) ?? []));
    }
    return selected.sort((a, b) => (this.sequence.get(a) ?? 0) - (this.sequence.get(b) ?? 0));
  }
}

function appendTo(lists: DirectedLists, edge: AdjacencyEdge): void {
  lists.all.push(edge.id);
  const typed = lists.byType.get(edge.type);
  if (typed) {
    typed.push(edge.id);
  } else {
    lists.byType.set(edge.type, [edge.id]);
  }
}
