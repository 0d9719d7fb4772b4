import {
  AttributeValue,
  EntityRecord,
  EntityType,
  RelationType,
  SKOS_RELATIONS,
} from '../../ontology/types';
import { EntityIndex } from './entity-index';
import { DerivedEdge, EdgeRule } from './types';

/**
 * Normalizes a relationship attribute to its list of target ids. Missing and
 * empty values yield no ids; non-string entries are ignored.
 */
export function targetIds(value: AttributeValue): string[] {
  if (typeof value === 'string') {
    return value.length > 0 ? [value] : [];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

/**
 * Registry of which attributes encode outgoing relationships, per entity
 * type, plus rules that apply to every type. A type's rules run in
 * registration order around the shared ones: those marked `afterShared`
 * follow them, the rest precede them.
 */
export class EdgeDerivationTable {
  private readonly typeRules = new Map<EntityType, EdgeRule[]>();
  private readonly sharedRules: EdgeRule[] = [];

  register(sourceType: EntityType | null, rule: EdgeRule): this {
    if (sourceType === null) {
      this.sharedRules.push(rule);
      return this;
    }

    const rules = this.typeRules.get(sourceType);
    if (rules) {
      rules.push(rule);
    } else {
      this.typeRules.set(sourceType, [rule]);
    }
    return this;
  }

  registerAll(sourceType: EntityType | null, rules: readonly EdgeRule[]): this {
    for (const rule of rules) {
      this.register(sourceType, rule);
    }
    return this;
  }

  rulesFor(type: EntityType): EdgeRule[] {
    const own = this.typeRules.get(type) ?? [];
    return [
      ...own.filter(rule => rule.position !== 'afterShared'),
      ...this.sharedRules,
      ...own.filter(rule => rule.position === 'afterShared'),
    ];
  }

  /**
   * Outgoing edges of `entity`, in rule-then-list order. Targets missing
   * from the index are dropped.
   */
  deriveEdges(entity: EntityRecord, type: EntityType, index: EntityIndex): DerivedEdge[] {
    const edges: DerivedEdge[] = [];

    for (const rule of this.rulesFor(type)) {
      for (const targetId of targetIds(entity[rule.attribute])) {
        const target = index.lookup(rule.targetType, targetId);
        if (!target) continue;

        edges.push({
          relation: rule.relation,
          targetId,
          targetType: rule.targetType,
          target,
        });
      }
    }

    return edges;
  }
}

function skosRules(targetType: EntityType): EdgeRule[] {
  return SKOS_RELATIONS.map(relation => ({ attribute: relation, relation, targetType }));
}

/**
 * Edge rules of the knowledge graph's own vocabulary
 */
export function createDefaultEdgeTable(): EdgeDerivationTable {
  return new EdgeDerivationTable()
    .registerAll(EntityType.AI_TASK, [
      {
        attribute: 'requiresCapability',
        relation: RelationType.REQUIRES_CAPABILITY,
        targetType: EntityType.CAPABILITY,
      },
      {
        attribute: 'hasRelatedLLMIntrinsic',
        relation: RelationType.HAS_RELATED_LLM_INTRINSIC,
        targetType: EntityType.LLM_INTRINSIC,
        position: 'afterShared',
      },
    ])
    .registerAll(EntityType.CAPABILITY, [
      {
        attribute: 'requiredByTask',
        relation: RelationType.REQUIRED_BY_TASK,
        targetType: EntityType.AI_TASK,
      },
      {
        attribute: 'implementedByAdapter',
        relation: RelationType.IMPLEMENTED_BY_ADAPTER,
        targetType: EntityType.ADAPTER,
      },
      {
        attribute: 'implementedByIntrinsic',
        relation: RelationType.IMPLEMENTED_BY_INTRINSIC,
        targetType: EntityType.LLM_INTRINSIC,
      },
      {
        attribute: 'isPartOf',
        relation: RelationType.IS_PART_OF,
        targetType: EntityType.CAPABILITY_GROUP,
      },
      ...skosRules(EntityType.CAPABILITY),
    ])
    // Adapters and intrinsics persist the inverse under distinct attribute names
    .register(EntityType.ADAPTER, {
      attribute: 'implementsCapability_adapter',
      relation: RelationType.IMPLEMENTS_CAPABILITY,
      targetType: EntityType.CAPABILITY,
    })
    .register(EntityType.LLM_INTRINSIC, {
      attribute: 'implementsCapability_intrinsic',
      relation: RelationType.IMPLEMENTS_CAPABILITY,
      targetType: EntityType.CAPABILITY,
    })
    .registerAll(EntityType.RISK, [
      {
        attribute: 'hasRelatedAction',
        relation: RelationType.HAS_RELATED_ACTION,
        targetType: EntityType.ACTION,
      },
      {
        attribute: 'isDetectedBy',
        relation: RelationType.IS_DETECTED_BY,
        targetType: EntityType.RISK_CONTROL,
      },
      ...skosRules(EntityType.RISK),
    ])
    .registerAll(EntityType.CAPABILITY_GROUP, [
      {
        attribute: 'hasPart',
        relation: RelationType.HAS_PART,
        targetType: EntityType.CAPABILITY,
      },
      {
        attribute: 'belongsToDomain',
        relation: RelationType.BELONGS_TO_DOMAIN,
        targetType: EntityType.CAPABILITY_DOMAIN,
      },
    ])
    .register(EntityType.CAPABILITY_DOMAIN, {
      attribute: 'hasPart',
      relation: RelationType.HAS_PART,
      targetType: EntityType.CAPABILITY_GROUP,
    })
    .register(EntityType.QUESTION_POLICY, {
      attribute: 'hasRule',
      relation: RelationType.HAS_RULE,
      targetType: EntityType.RULE,
      position: 'afterShared',
    })
    .registerAll(null, [
      {
        attribute: 'hasDocumentation',
        relation: RelationType.HAS_DOCUMENTATION,
        targetType: EntityType.DOCUMENTATION,
      },
      {
        attribute: 'hasLicense',
        relation: RelationType.HAS_LICENSE,
        targetType: EntityType.LICENSE,
      },
    ]);
}
