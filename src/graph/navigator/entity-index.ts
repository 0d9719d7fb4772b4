import { EntityRecord, EntityType, OntologySnapshot } from '../../ontology/types';
import { createComponentLogger } from '../../utils/logger';

const logger = createComponentLogger('entity-index');

/**
 * Per-type id lookup over a loaded ontology snapshot. Built once; a missing
 * id is reported as `undefined`, never as an error.
 */
export class EntityIndex {
  private readonly byType = new Map<EntityType, Map<string, EntityRecord>>();
  private readonly ordered = new Map<EntityType, readonly EntityRecord[]>();
  private entityCount = 0;

  constructor(snapshot: OntologySnapshot) {
    for (const type of Object.values(EntityType)) {
      const records = snapshot[type];
      if (!records) continue;
      const lookup = new Map<string, EntityRecord>();
      const kept: EntityRecord[] = [];

      for (const record of records) {
        if (lookup.has(record.id)) {
          logger.warn('Duplicate entity id, keeping first occurrence', {
            entityType: type,
            entityId: record.id,
          });
          continue;
        }
        lookup.set(record.id, record);
        kept.push(record);
      }

      this.byType.set(type, lookup);
      this.ordered.set(type, kept);
      this.entityCount += kept.length;
    }

    logger.debug('Entity index built', {
      types: this.byType.size,
      entities: this.entityCount,
    });
  }

  lookup(type: EntityType, id: string): EntityRecord | undefined {
    return this.byType.get(type)?.get(id);
  }

  has(type: EntityType, id: string): boolean {
    return this.byType.get(type)?.has(id) ?? false;
  }

  /** Records of one type in load order */
  entitiesOf(type: EntityType): readonly EntityRecord[] {
    return this.ordered.get(type) ?? [];
  }

  types(): EntityType[] {
    return Array.from(this.byType.keys());
  }

  get size(): number {
    return this.entityCount;
  }
}
