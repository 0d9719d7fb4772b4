import { EntityType } from './types';

/**
 * Top-level collection key under which each entity type is persisted
 */
export const COLLECTION_KEYS: Readonly<Record<EntityType, string>> = {
  [EntityType.RISK]: 'risks',
  [EntityType.RISK_GROUP]: 'riskgroups',
  [EntityType.RISK_TAXONOMY]: 'taxonomies',
  [EntityType.RISK_CONTROL]: 'riskcontrols',
  [EntityType.RISK_INCIDENT]: 'riskincidents',
  [EntityType.ACTION]: 'actions',
  [EntityType.AI_SYSTEM]: 'aisystems',
  [EntityType.AI_MODEL]: 'aimodels',
  [EntityType.AI_TASK]: 'aitasks',
  [EntityType.USE_CASE]: 'usecases',
  [EntityType.CAPABILITY]: 'capabilities',
  [EntityType.CAPABILITY_GROUP]: 'capabilitygroups',
  [EntityType.CAPABILITY_DOMAIN]: 'capabilitydomains',
  [EntityType.CAPABILITY_TAXONOMY]: 'capabilitytaxonomies',
  [EntityType.LLM_INTRINSIC]: 'llmintrinsics',
  [EntityType.ADAPTER]: 'adapters',
  [EntityType.EVALUATION]: 'evaluations',
  [EntityType.AI_EVAL_RESULT]: 'aievalresults',
  [EntityType.BENCHMARK]: 'benchmarkmetadatacards',
  [EntityType.STAKEHOLDER]: 'stakeholders',
  [EntityType.STAKEHOLDER_GROUP]: 'stakeholdergroups',
  [EntityType.DOCUMENTATION]: 'documents',
  [EntityType.DATASET]: 'datasets',
  [EntityType.PRINCIPLE]: 'principles',
  [EntityType.QUESTION_POLICY]: 'llmquestionpolicies',
  [EntityType.RULE]: 'rules',
  [EntityType.LICENSE]: 'licenses',
  [EntityType.ORGANIZATION]: 'organizations',
};

const TYPE_BY_COLLECTION = new Map<string, EntityType>(
  Object.values(EntityType).map(type => [COLLECTION_KEYS[type], type])
);

export function entityTypeForCollection(collectionKey: string): EntityType | undefined {
  return TYPE_BY_COLLECTION.get(collectionKey);
}
