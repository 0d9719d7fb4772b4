import { EntityType, RelationType, SKOS_RELATIONS } from '../ontology/types';
import { PolicyNotFoundError } from './navigator/errors';
import { TraversalPolicy, TraversalPolicyOptions } from './navigator/traversal-policy';

export interface QueryPattern {
  description: string;
  policy: TraversalPolicyOptions;
}

/**
 * Named traversal policies for common query shapes
 */
export const QUERY_PATTERNS = {
  // Capabilities
  capabilities_for_task: {
    description: 'Get all capabilities required by a specific AI task',
    policy: {
      maxDepth: 1,
      includedRelationships: [RelationType.REQUIRES_CAPABILITY],
      includedEntityTypes: [EntityType.CAPABILITY],
    },
  },
  intrinsics_for_capability: {
    description: 'Get all intrinsics/adapters that implement a capability',
    policy: {
      maxDepth: 1,
      includedRelationships: [
        RelationType.IMPLEMENTED_BY_INTRINSIC,
        RelationType.IMPLEMENTED_BY_ADAPTER,
      ],
      includedEntityTypes: [EntityType.LLM_INTRINSIC, EntityType.ADAPTER],
    },
  },
  tasks_for_capability: {
    description: 'Get all tasks that require a capability',
    policy: {
      maxDepth: 1,
      includedRelationships: [RelationType.REQUIRED_BY_TASK],
      includedEntityTypes: [EntityType.AI_TASK],
    },
  },
  capability_hierarchy: {
    description: 'Get the full capability hierarchy (domain → groups → capabilities)',
    policy: {
      maxDepth: 2,
      includedRelationships: [
        RelationType.HAS_PART,
        RelationType.IS_PART_OF,
        RelationType.BELONGS_TO_DOMAIN,
      ],
      includedEntityTypes: [
        EntityType.CAPABILITY_DOMAIN,
        EntityType.CAPABILITY_GROUP,
        EntityType.CAPABILITY,
      ],
    },
  },
  end_to_end_task_to_intrinsics: {
    description: 'Complete path: task → capabilities → intrinsics',
    policy: {
      maxDepth: 2,
      includedRelationships: [
        RelationType.REQUIRES_CAPABILITY,
        RelationType.IMPLEMENTED_BY_INTRINSIC,
        RelationType.IMPLEMENTED_BY_ADAPTER,
      ],
      includedEntityTypes: [EntityType.CAPABILITY, EntityType.LLM_INTRINSIC, EntityType.ADAPTER],
    },
  },

  // Risks
  controls_for_risk: {
    description: 'Get all controls that detect a specific risk',
    policy: {
      maxDepth: 1,
      includedRelationships: [RelationType.IS_DETECTED_BY],
      includedEntityTypes: [EntityType.RISK_CONTROL],
    },
  },
  actions_for_risk: {
    description: 'Get all actions for a specific risk',
    policy: {
      maxDepth: 1,
      includedRelationships: [RelationType.HAS_RELATED_ACTION],
      includedEntityTypes: [EntityType.ACTION],
    },
  },
  related_risks: {
    description: 'Get all risks related via SKOS relationships',
    policy: {
      maxDepth: 1,
      includedRelationships: [...SKOS_RELATIONS],
      includedEntityTypes: [EntityType.RISK],
    },
  },
  risk_neighborhood: {
    description: 'Comprehensive neighborhood of a risk (controls, actions, related risks)',
    policy: {
      maxDepth: 2,
      includedRelationships: [
        RelationType.IS_DETECTED_BY,
        RelationType.HAS_RELATED_ACTION,
        ...SKOS_RELATIONS,
      ],
      includedEntityTypes: [EntityType.RISK_CONTROL, EntityType.ACTION, EntityType.RISK],
    },
  },

  // Evaluation
  intrinsics_for_task: {
    description: 'Get intrinsics related to a task',
    policy: {
      maxDepth: 1,
      includedRelationships: [RelationType.HAS_RELATED_LLM_INTRINSIC],
      includedEntityTypes: [EntityType.LLM_INTRINSIC],
    },
  },

  // Documentation
  documentation_for_entity: {
    description: 'Get all documentation for an entity',
    policy: {
      maxDepth: 1,
      includedRelationships: [RelationType.HAS_DOCUMENTATION],
      includedEntityTypes: [EntityType.DOCUMENTATION],
    },
  },

  // Cross-taxonomy
  skos_matches: {
    description: 'Get all SKOS-matched entities (works for risks, capabilities, etc.)',
    policy: {
      maxDepth: 1,
      includedRelationships: [...SKOS_RELATIONS],
    },
  },
} satisfies Record<string, QueryPattern>;

export type QueryPatternName = keyof typeof QUERY_PATTERNS;

export function hasPattern(name: string): name is QueryPatternName {
  return Object.prototype.hasOwnProperty.call(QUERY_PATTERNS, name);
}

const PATTERN_NAMES: readonly QueryPatternName[] = Object.keys(QUERY_PATTERNS).filter(hasPattern);

/**
 * Policy for a named pattern. Unknown names fail with the full list of
 * valid ones.
 */
export function getPatternPolicy(name: string): TraversalPolicy {
  if (!hasPattern(name)) {
    throw new PolicyNotFoundError(name, PATTERN_NAMES);
  }
  const pattern: QueryPattern = QUERY_PATTERNS[name];
  return TraversalPolicy.create(pattern.policy);
}

/** Pattern name to description, in declaration order */
export function listPatterns(): Record<string, string> {
  const patterns: Record<string, string> = {};
  for (const name of PATTERN_NAMES) {
    patterns[name] = QUERY_PATTERNS[name].description;
  }
  return patterns;
}
