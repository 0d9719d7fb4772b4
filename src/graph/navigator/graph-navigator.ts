import { EntityType, OntologySnapshot } from '../../ontology/types';
import { config } from '../../utils/config';
import { createComponentLogger } from '../../utils/logger';
import { EdgeDerivationTable, createDefaultEdgeTable } from './edge-derivation';
import { EntityIndex } from './entity-index';
import { TraversalCache } from './traversal-cache';
import { TraversalPolicy } from './traversal-policy';
import { TraversalResult } from './traversal-result';
import { CacheStats, TraversalNode, TraversedEdge, nodeKey } from './types';

const logger = createComponentLogger('graph-navigator');

export interface GraphNavigatorOptions {
  edgeTable?: EdgeDerivationTable;
  cacheMaxEntries?: number;
}

/**
 * GraphNavigator answers "what is reachable from entity X under policy P"
 * with a breadth-first traversal over edges derived from entity attributes.
 * The snapshot is read-only for the navigator's lifetime; results are cached
 * per instance.
 */
export class GraphNavigator {
  private readonly index: EntityIndex;
  private readonly edgeTable: EdgeDerivationTable;
  private readonly cache: TraversalCache;

  constructor(source: OntologySnapshot | EntityIndex, options: GraphNavigatorOptions = {}) {
    this.index = source instanceof EntityIndex ? source : new EntityIndex(source);
    this.edgeTable = options.edgeTable ?? createDefaultEdgeTable();
    this.cache = new TraversalCache(options.cacheMaxEntries ?? config.navigator.cacheMaxEntries);
  }

  get entityIndex(): EntityIndex {
    return this.index;
  }

  traverseFromNode(
    startId: string,
    startType: EntityType,
    policy: TraversalPolicy = TraversalPolicy.create()
  ): TraversalResult {
    const cacheKey = policy.cacheEnabled ? policy.getCacheKey(startId, startType) : null;
    if (cacheKey) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        logger.debug('Traversal served from cache', { startId, startType });
        return cached;
      }
    }

    const startEntity = this.index.lookup(startType, startId);
    if (!startEntity) {
      logger.debug('Start entity not found', { startId, startType });
      return TraversalResult.empty();
    }

    const startTime = Date.now();
    const visited = new Set<string>([nodeKey(startType, startId)]);
    const nodes: TraversalNode[] = [];
    const relationships = new Map<string, TraversedEdge[]>();
    const depthMap = new Map<number, string[]>();

    const queue: TraversalNode[] = [
      {
        entityId: startId,
        entityType: startType,
        entity: startEntity,
        depth: 0,
        path: [],
        parentId: null,
        parentType: null,
      },
    ];
    let head = 0;

    while (head < queue.length && (policy.maxResults === null || nodes.length < policy.maxResults)) {
      const current = queue[head++];

      if (policy.allowsEntityType(current.entityType) && policy.matchesNodeFilters(current.entity)) {
        nodes.push(current);
        const atDepth = depthMap.get(current.depth);
        if (atDepth) {
          atDepth.push(current.entityId);
        } else {
          depthMap.set(current.depth, [current.entityId]);
        }
      }

      if (current.depth >= policy.maxDepth) {
        continue;
      }

      const sourceKey = nodeKey(current.entityType, current.entityId);
      const edges = this.edgeTable.deriveEdges(current.entity, current.entityType, this.index);

      for (const edge of edges) {
        if (!policy.allowsRelationship(edge.relation)) {
          continue;
        }

        const targetKey = nodeKey(edge.targetType, edge.targetId);
        if (policy.deduplicateResults && visited.has(targetKey)) {
          continue;
        }
        visited.add(targetKey);

        const followed: TraversedEdge = {
          relation: edge.relation,
          targetId: edge.targetId,
          targetType: edge.targetType,
        };
        const outgoing = relationships.get(sourceKey);
        if (outgoing) {
          outgoing.push(followed);
        } else {
          relationships.set(sourceKey, [followed]);
        }

        queue.push({
          entityId: edge.targetId,
          entityType: edge.targetType,
          entity: edge.target,
          depth: current.depth + 1,
          path: [...current.path, edge.relation],
          parentId: current.entityId,
          parentType: current.entityType,
        });
      }
    }

    let relationshipsTraversed = 0;
    for (const edges of relationships.values()) {
      relationshipsTraversed += edges.length;
    }

    const result = new TraversalResult({
      nodes,
      relationships,
      depthMap,
      statistics: {
        nodesVisited: visited.size,
        nodesReturned: nodes.length,
        maxDepthReached: depthMap.size > 0 ? Math.max(...depthMap.keys()) : 0,
        relationshipsTraversed,
      },
    });

    logger.debug('Traversal complete', {
      startId,
      startType,
      ...result.statistics,
      executionTimeMs: Date.now() - startTime,
    });

    if (cacheKey) {
      this.cache.set(cacheKey, result);
    }

    return result;
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }
}
