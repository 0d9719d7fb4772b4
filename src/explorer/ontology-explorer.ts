import { GraphNavigator, GraphNavigatorOptions } from '../graph/navigator/graph-navigator';
import { TraversalPolicy, TraversalPolicyOptions } from '../graph/navigator/traversal-policy';
import { TraversalResult } from '../graph/navigator/traversal-result';
import { CacheStats } from '../graph/navigator/types';
import { QueryPatternName, getPatternPolicy } from '../graph/query-patterns';
import {
  EntityRecord,
  EntityRef,
  EntityType,
  OntologySnapshot,
  RelationType,
} from '../ontology/types';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('ontology-explorer');

const TAXONOMY_ATTRIBUTE = 'isDefinedByTaxonomy';

/** How a traversal policy is chosen for `navigate` */
export type NavigateQuery =
  | { pattern: string }
  | { policy: TraversalPolicy }
  | { options: TraversalPolicyOptions };

/**
 * Picks one entity for lookups and for the `*For*` helpers. Every given
 * criterion must match, so `{ id, name }` with a name that belongs to a
 * different entity selects nothing. An empty selector matches nothing.
 */
export interface EntitySelector {
  id?: string;
  tag?: string;
  name?: string;
}

export interface TaxonomyFilter {
  taxonomy?: string;
}

export interface RelatedOptions extends TaxonomyFilter {
  targetType?: EntityType;
  maxDepth?: number;
}

export interface IntrinsicOptions extends TaxonomyFilter {
  includeAdapters?: boolean;
}

export interface TaskTrace {
  task: EntityRecord;
  capabilities: EntityRecord[];
  intrinsicsByCapability: Map<string, EntityRecord[]>;
  allIntrinsics: EntityRecord[];
}

function inTaxonomy(entity: EntityRecord, taxonomy: string | undefined): boolean {
  return taxonomy === undefined || entity[TAXONOMY_ATTRIBUTE] === taxonomy;
}

/**
 * Domain-named queries over the knowledge graph, each one a navigator call
 * with a named pattern.
 */
export class OntologyExplorer {
  private readonly navigator: GraphNavigator;

  constructor(snapshot: OntologySnapshot, options: GraphNavigatorOptions = {}) {
    this.navigator = new GraphNavigator(snapshot, options);
  }

  // ========================================
  // Generic navigation
  // ========================================

  navigate(startId: string, startType: EntityType, query?: NavigateQuery): TraversalResult {
    return this.navigator.traverseFromNode(startId, startType, this.resolvePolicy(query));
  }

  /**
   * Entities reachable over a single relationship type, excluding the start.
   */
  getRelated(start: EntityRef, relation: RelationType, options: RelatedOptions = {}): EntityRecord[] {
    const policy = TraversalPolicy.create({
      maxDepth: options.maxDepth ?? 1,
      includedRelationships: [relation],
      includedEntityTypes: options.targetType ? [options.targetType] : null,
      nodePropertyFilters:
        options.taxonomy !== undefined ? { [TAXONOMY_ATTRIBUTE]: options.taxonomy } : null,
    });

    const result = this.navigator.traverseFromNode(start.id, start.type, policy);
    return result.nodes.filter(node => node.depth > 0).map(node => node.entity);
  }

  clearCache(): void {
    this.navigator.clearCache();
  }

  getCacheStats(): CacheStats {
    return this.navigator.getCacheStats();
  }

  // ========================================
  // Lookups
  // ========================================

  getAll(type: EntityType, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.navigator.entityIndex
      .entitiesOf(type)
      .filter(entity => inTaxonomy(entity, filter.taxonomy));
  }

  find(type: EntityType, selector: EntitySelector & TaxonomyFilter): EntityRecord | undefined {
    if (selector.id === undefined && selector.tag === undefined && selector.name === undefined) {
      return undefined;
    }

    return this.navigator.entityIndex
      .entitiesOf(type)
      .find(
        entity =>
          (selector.id === undefined || entity.id === selector.id) &&
          (selector.tag === undefined || entity.tag === selector.tag) &&
          (selector.name === undefined || entity.name === selector.name) &&
          inTaxonomy(entity, selector.taxonomy)
      );
  }

  getAllCapabilities(filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.getAll(EntityType.CAPABILITY, filter);
  }

  getCapability(selector: EntitySelector & TaxonomyFilter): EntityRecord | undefined {
    return this.find(EntityType.CAPABILITY, selector);
  }

  getAllTasks(filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.getAll(EntityType.AI_TASK, filter);
  }

  getTask(selector: EntitySelector & TaxonomyFilter): EntityRecord | undefined {
    return this.find(EntityType.AI_TASK, selector);
  }

  getAllRisks(filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.getAll(EntityType.RISK, filter);
  }

  getRisk(selector: EntitySelector & TaxonomyFilter): EntityRecord | undefined {
    return this.find(EntityType.RISK, selector);
  }

  getAllBenchmarks(filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.getAll(EntityType.BENCHMARK, filter);
  }

  getBenchmark(selector: EntitySelector & TaxonomyFilter): EntityRecord | undefined {
    return this.find(EntityType.BENCHMARK, selector);
  }

  // ========================================
  // Capabilities and tasks
  // ========================================

  getCapabilitiesForTask(task: EntitySelector, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.collectByPattern(EntityType.AI_TASK, task, 'capabilities_for_task', [
      EntityType.CAPABILITY,
    ]).filter(entity => inTaxonomy(entity, filter.taxonomy));
  }

  getIntrinsicsForCapability(
    capability: EntitySelector,
    options: IntrinsicOptions = {}
  ): EntityRecord[] {
    const includeAdapters = options.includeAdapters ?? true;
    const types = includeAdapters
      ? [EntityType.LLM_INTRINSIC, EntityType.ADAPTER]
      : [EntityType.LLM_INTRINSIC];

    return this.collectByPattern(
      EntityType.CAPABILITY,
      capability,
      'intrinsics_for_capability',
      types
    ).filter(entity => inTaxonomy(entity, options.taxonomy));
  }

  getTasksForCapability(capability: EntitySelector, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.collectByPattern(EntityType.CAPABILITY, capability, 'tasks_for_capability', [
      EntityType.AI_TASK,
    ]).filter(entity => inTaxonomy(entity, filter.taxonomy));
  }

  getIntrinsicsForTask(task: EntitySelector, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.collectByPattern(EntityType.AI_TASK, task, 'intrinsics_for_task', [
      EntityType.LLM_INTRINSIC,
    ]).filter(entity => inTaxonomy(entity, filter.taxonomy));
  }

  /**
   * Task → required capabilities → implementing intrinsics and adapters,
   * with intrinsics grouped under the capability that discovered them.
   */
  traceTaskToIntrinsics(selector: EntitySelector): TaskTrace | undefined {
    const task = this.find(EntityType.AI_TASK, selector);
    if (!task) return undefined;

    const result = this.navigate(task.id, EntityType.AI_TASK, {
      pattern: 'end_to_end_task_to_intrinsics',
    });

    const capabilities: EntityRecord[] = [];
    const intrinsicsByCapability = new Map<string, EntityRecord[]>();
    const allIntrinsics: EntityRecord[] = [];

    for (const node of result.getNodesAtDepth(1)) {
      if (node.entityType === EntityType.CAPABILITY) {
        capabilities.push(node.entity);
        intrinsicsByCapability.set(node.entityId, []);
      }
    }

    for (const node of result.getNodesAtDepth(2)) {
      if (node.entityType !== EntityType.LLM_INTRINSIC && node.entityType !== EntityType.ADAPTER) {
        continue;
      }
      if (node.parentType === EntityType.CAPABILITY && node.parentId !== null) {
        intrinsicsByCapability.get(node.parentId)?.push(node.entity);
      }
      allIntrinsics.push(node.entity);
    }

    return { task, capabilities, intrinsicsByCapability, allIntrinsics };
  }

  // ========================================
  // Risks
  // ========================================

  getRelatedRisks(risk: EntitySelector, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.collectByPattern(EntityType.RISK, risk, 'related_risks', [EntityType.RISK], 1).filter(
      entity => inTaxonomy(entity, filter.taxonomy)
    );
  }

  getControlsForRisk(risk: EntitySelector, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.collectByPattern(EntityType.RISK, risk, 'controls_for_risk', [
      EntityType.RISK_CONTROL,
    ]).filter(entity => inTaxonomy(entity, filter.taxonomy));
  }

  getActionsForRisk(risk: EntitySelector, filter: TaxonomyFilter = {}): EntityRecord[] {
    return this.collectByPattern(EntityType.RISK, risk, 'actions_for_risk', [
      EntityType.ACTION,
    ]).filter(entity => inTaxonomy(entity, filter.taxonomy));
  }

  private resolvePolicy(query: NavigateQuery | undefined): TraversalPolicy {
    if (!query) return TraversalPolicy.create();
    if ('pattern' in query) return getPatternPolicy(query.pattern);
    if ('policy' in query) return query.policy;
    return TraversalPolicy.create(query.options);
  }

  /**
   * Runs a named pattern from the selected entity and keeps the nodes of the
   * wanted types at or beyond `minDepth`.
   */
  private collectByPattern(
    startType: EntityType,
    selector: EntitySelector,
    pattern: QueryPatternName,
    types: readonly EntityType[],
    minDepth = 0
  ): EntityRecord[] {
    const start = this.find(startType, selector);
    if (!start) {
      logger.debug('No entity matches selector', { startType, ...selector });
      return [];
    }

    const result = this.navigate(start.id, startType, { pattern });
    return result.nodes
      .filter(node => types.includes(node.entityType) && node.depth >= minDepth)
      .map(node => node.entity);
  }
}
