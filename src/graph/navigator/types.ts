import { EntityRecord, EntityType, RelationType } from '../../ontology/types';

/**
 * Declares that an attribute on an entity encodes outgoing relationships
 * to entities of `targetType`.
 */
export interface EdgeRule {
  attribute: string;
  relation: RelationType;
  targetType: EntityType;
  /** Type rules run before the shared rules unless placed after them */
  position?: 'beforeShared' | 'afterShared';
}

/** An outgoing edge resolved against the entity index */
export interface DerivedEdge {
  relation: RelationType;
  targetId: string;
  targetType: EntityType;
  target: EntityRecord;
}

export interface TraversalNode {
  readonly entityId: string;
  readonly entityType: EntityType;
  /** Shared with the snapshot; never copied */
  readonly entity: EntityRecord;
  readonly depth: number;
  /** Relationship types followed from the start node, in order */
  readonly path: readonly RelationType[];
  readonly parentId: string | null;
  readonly parentType: EntityType | null;
}

/** An edge the traversal actually followed */
export interface TraversedEdge {
  readonly relation: RelationType;
  readonly targetId: string;
  readonly targetType: EntityType;
}

export interface TraversalStatistics {
  readonly nodesVisited: number;
  readonly nodesReturned: number;
  readonly maxDepthReached: number;
  readonly relationshipsTraversed: number;
}

export interface SerializedTraversalNode {
  entity_id: string;
  entity_type: EntityType;
  depth: number;
  path: RelationType[];
  parent_id: string | null;
  parent_type: EntityType | null;
}

export interface SerializedTraversalResult {
  nodes: SerializedTraversalNode[];
  relationships: Record<string, Array<[RelationType, string]>>;
  depth_map: Record<string, string[]>;
  statistics: {
    nodes_visited: number;
    nodes_returned: number;
    max_depth_reached: number;
    relationships_traversed: number;
  };
}

export interface CacheStats {
  entries: number;
  maxEntries: number;
  hits: number;
  misses: number;
  hitRate: number;
}

/** Composite identity of a node: ids are only unique within a type */
export function nodeKey(type: EntityType, id: string): string {
  return `${type}:${id}`;
}
