import { EntityType } from '../../ontology/types';
import {
  SerializedTraversalResult,
  TraversalNode,
  TraversalStatistics,
  TraversedEdge,
  nodeKey,
} from './types';

export interface TraversalResultData {
  nodes: TraversalNode[];
  relationships: Map<string, TraversedEdge[]>;
  depthMap: Map<number, string[]>;
  statistics: TraversalStatistics;
}

/**
 * Output of one traversal. Read-only once built; results may be shared
 * between callers through the navigator cache.
 */
export class TraversalResult {
  /** Accepted nodes in discovery order (non-decreasing depth) */
  readonly nodes: readonly TraversalNode[];
  readonly statistics: TraversalStatistics;
  private readonly edgesBySource: ReadonlyMap<string, readonly TraversedEdge[]>;
  private readonly idsByDepth: ReadonlyMap<number, readonly string[]>;

  constructor(data: TraversalResultData) {
    this.nodes = Object.freeze(
      data.nodes.map(node => Object.freeze({ ...node, path: Object.freeze([...node.path]) }))
    );
    this.edgesBySource = new Map(
      Array.from(data.relationships, ([key, edges]) => [
        key,
        Object.freeze(edges.map(edge => Object.freeze({ ...edge }))),
      ])
    );
    this.idsByDepth = new Map(
      Array.from(data.depthMap, ([depth, ids]) => [depth, Object.freeze([...ids])])
    );
    this.statistics = Object.freeze({ ...data.statistics });
    Object.freeze(this);
  }

  static empty(): TraversalResult {
    return new TraversalResult({
      nodes: [],
      relationships: new Map(),
      depthMap: new Map(),
      statistics: {
        nodesVisited: 0,
        nodesReturned: 0,
        maxDepthReached: 0,
        relationshipsTraversed: 0,
      },
    });
  }

  /** Followed edges keyed by the composite key of their source node; a fresh copy per read */
  get relationships(): Map<string, readonly TraversedEdge[]> {
    return new Map(this.edgesBySource);
  }

  /** Accepted entity ids per depth; a fresh copy per read */
  get depthMap(): Map<number, readonly string[]> {
    return new Map(this.idsByDepth);
  }

  isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  getNodesAtDepth(depth: number): TraversalNode[] {
    return this.nodes.filter(node => node.depth === depth);
  }

  getNodesByType(type: EntityType): TraversalNode[] {
    return this.nodes.filter(node => node.entityType === type);
  }

  /** Without a type, the first accepted node carrying the id */
  getNode(entityId: string, entityType?: EntityType): TraversalNode | undefined {
    return this.nodes.find(
      node => node.entityId === entityId && (entityType === undefined || node.entityType === entityType)
    );
  }

  getEdgesFrom(entityId: string, entityType: EntityType): readonly TraversedEdge[] {
    return this.edgesBySource.get(nodeKey(entityType, entityId)) ?? [];
  }

  toJSON(): SerializedTraversalResult {
    const relationships: SerializedTraversalResult['relationships'] = {};
    for (const [key, edges] of this.edgesBySource) {
      relationships[key] = edges.map(edge => [edge.relation, edge.targetId]);
    }

    const depthMap: SerializedTraversalResult['depth_map'] = {};
    for (const [depth, ids] of this.idsByDepth) {
      depthMap[String(depth)] = [...ids];
    }

    return {
      nodes: this.nodes.map(node => ({
        entity_id: node.entityId,
        entity_type: node.entityType,
        depth: node.depth,
        path: [...node.path],
        parent_id: node.parentId,
        parent_type: node.parentType,
      })),
      relationships,
      depth_map: depthMap,
      statistics: {
        nodes_visited: this.statistics.nodesVisited,
        nodes_returned: this.statistics.nodesReturned,
        max_depth_reached: this.statistics.maxDepthReached,
        relationships_traversed: this.statistics.relationshipsTraversed,
      },
    };
  }
}
