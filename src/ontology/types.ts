/**
 * Entity and relationship vocabulary of the knowledge graph
 */

export enum EntityType {
  // Risk entities
  RISK = 'Risk',
  RISK_GROUP = 'RiskGroup',
  RISK_TAXONOMY = 'RiskTaxonomy',
  RISK_CONTROL = 'RiskControl',
  RISK_INCIDENT = 'RiskIncident',
  ACTION = 'Action',

  // AI system entities
  AI_SYSTEM = 'AiSystem',
  AI_MODEL = 'AiModel',
  AI_TASK = 'AiTask',
  USE_CASE = 'UseCase',

  // Capability entities
  CAPABILITY = 'Capability',
  CAPABILITY_GROUP = 'CapabilityGroup',
  CAPABILITY_DOMAIN = 'CapabilityDomain',
  CAPABILITY_TAXONOMY = 'CapabilityTaxonomy',

  // Intrinsic entities
  LLM_INTRINSIC = 'LLMIntrinsic',
  ADAPTER = 'Adapter',

  // Evaluation entities
  EVALUATION = 'Evaluation',
  AI_EVAL_RESULT = 'AiEvalResult',
  BENCHMARK = 'BenchmarkMetadataCard',

  // Supporting entities
  STAKEHOLDER = 'Stakeholder',
  STAKEHOLDER_GROUP = 'StakeholderGroup',
  DOCUMENTATION = 'Documentation',
  DATASET = 'Dataset',
  PRINCIPLE = 'Principle',
  QUESTION_POLICY = 'LLMQuestionPolicy',
  RULE = 'Rule',
  LICENSE = 'License',
  ORGANIZATION = 'Organization',
}

export enum RelationType {
  // Risk relationships
  HAS_RELATED_RISK = 'hasRelatedRisk',
  HAS_RELATED_ACTION = 'hasRelatedAction',
  IS_DETECTED_BY = 'isDetectedBy',
  DETECTS_RISK_CONCEPT = 'detectsRiskConcept',
  REFERS_TO_RISK = 'refersToRisk',

  // Task ↔ capability
  REQUIRES_CAPABILITY = 'requiresCapability',
  REQUIRED_BY_TASK = 'requiredByTask',

  // Capability ↔ intrinsic/adapter
  IMPLEMENTS_CAPABILITY = 'implementsCapability',
  IMPLEMENTED_BY_INTRINSIC = 'implementedByIntrinsic',
  IMPLEMENTED_BY_ADAPTER = 'implementedByAdapter',

  // Capability ↔ benchmark
  EVALUATES_CAPABILITY = 'evaluatesCapability',
  EVALUATED_BY_BENCHMARK = 'evaluatedByBenchmark',

  // Hierarchy
  IS_PART_OF = 'isPartOf',
  HAS_PART = 'hasPart',
  BELONGS_TO_DOMAIN = 'belongsToDomain',
  IS_DEFINED_BY_TAXONOMY = 'isDefinedByTaxonomy',

  // SKOS mappings
  EXACT_MATCH = 'exactMatch',
  CLOSE_MATCH = 'closeMatch',
  BROAD_MATCH = 'broadMatch',
  NARROW_MATCH = 'narrowMatch',
  RELATED_MATCH = 'relatedMatch',

  // Evaluation
  HAS_EVALUATION = 'hasEvaluation',
  EVALUATES_RISK = 'evaluatesRisk',
  HAS_RELATED_LLM_INTRINSIC = 'hasRelatedLLMIntrinsic',

  // Documentation
  HAS_DOCUMENTATION = 'hasDocumentation',
  HAS_LICENSE = 'hasLicense',

  // AI systems
  HAS_AI_TASK = 'hasAiTask',
  HAS_STAKEHOLDER = 'hasStakeholder',

  // Rules
  HAS_RULE = 'hasRule',
}

export const SKOS_RELATIONS: readonly RelationType[] = [
  RelationType.EXACT_MATCH,
  RelationType.CLOSE_MATCH,
  RelationType.BROAD_MATCH,
  RelationType.NARROW_MATCH,
  RelationType.RELATED_MATCH,
];

/** JSON-like value held by a named entity attribute */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly AttributeValue[]
  | { readonly [key: string]: AttributeValue };

/**
 * A record loaded from the ontology. Relationship attributes hold the id (or a
 * list of ids) of entities of another type.
 */
export interface EntityRecord {
  readonly id: string;
  readonly [attribute: string]: AttributeValue;
}

export type OntologySnapshot = Partial<Record<EntityType, readonly EntityRecord[]>>;

/** An entity reference always travels with its type */
export interface EntityRef {
  id: string;
  type: EntityType;
}

const ENTITY_TYPE_VALUES = new Set<string>(Object.values(EntityType));
const RELATION_TYPE_VALUES = new Set<string>(Object.values(RelationType));

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPE_VALUES.has(value);
}

export function isRelationType(value: string): value is RelationType {
  return RELATION_TYPE_VALUES.has(value);
}
