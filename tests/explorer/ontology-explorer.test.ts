import { OntologyExplorer } from '../../src/explorer';
import { PolicyNotFoundError } from '../../src/graph/navigator/errors';
import { TraversalPolicy } from '../../src/graph/navigator/traversal-policy';
import { EntityRecord, EntityType, RelationType } from '../../src/ontology/types';
import { buildOntologyFixture } from '../fixtures/ontology-fixture';

const ids = (entities: readonly EntityRecord[]): string[] => entities.map(entity => entity.id);

describe('OntologyExplorer', () => {
  let explorer: OntologyExplorer;

  beforeEach(() => {
    explorer = new OntologyExplorer(buildOntologyFixture());
  });

  describe('navigate', () => {
    it('should use the default policy without a query', () => {
      const result = explorer.navigate('t1', EntityType.AI_TASK);

      expect(result.getNode('t1')?.depth).toBe(0);
      expect(result.statistics.maxDepthReached).toBe(2);
    });

    it('should accept a named pattern', () => {
      const result = explorer.navigate('t1', EntityType.AI_TASK, { pattern: 'capabilities_for_task' });

      expect(result.nodes.map(node => node.entityId)).toEqual(['c1', 'c2']);
    });

    it('should accept a policy or raw options', () => {
      const byPolicy = explorer.navigate('t1', EntityType.AI_TASK, {
        policy: TraversalPolicy.create({ maxDepth: 0 }),
      });
      const byOptions = explorer.navigate('t1', EntityType.AI_TASK, { options: { maxDepth: 0 } });

      expect(byPolicy.nodes.map(node => node.entityId)).toEqual(['t1']);
      expect(byOptions.toJSON()).toEqual(byPolicy.toJSON());
    });

    it('should reject an unknown pattern', () => {
      expect(() => explorer.navigate('t1', EntityType.AI_TASK, { pattern: 'nope' })).toThrow(
        PolicyNotFoundError
      );
    });
  });

  describe('getRelated', () => {
    it('should return entities over one relationship, excluding the start', () => {
      const related = explorer.getRelated(
        { id: 't1', type: EntityType.AI_TASK },
        RelationType.REQUIRES_CAPABILITY
      );

      expect(ids(related)).toEqual(['c1', 'c2']);
    });

    it('should filter by taxonomy and target type', () => {
      expect(
        ids(
          explorer.getRelated({ id: 't1', type: EntityType.AI_TASK }, RelationType.REQUIRES_CAPABILITY, {
            taxonomy: 'tax-b',
          })
        )
      ).toEqual(['c2']);
      expect(
        explorer.getRelated({ id: 't1', type: EntityType.AI_TASK }, RelationType.REQUIRES_CAPABILITY, {
          targetType: EntityType.RISK,
        })
      ).toEqual([]);
    });
  });

  describe('Lookups', () => {
    it('should list entities of a type with an optional taxonomy', () => {
      expect(ids(explorer.getAllCapabilities())).toEqual(['c1', 'c2']);
      expect(ids(explorer.getAllCapabilities({ taxonomy: 'tax-a' }))).toEqual(['c1']);
      expect(ids(explorer.getAllTasks())).toEqual(['t1', 't2']);
      expect(ids(explorer.getAllRisks({ taxonomy: 'other-tax' }))).toEqual(['r2']);
      expect(ids(explorer.getAllBenchmarks())).toEqual(['bm1']);
    });

    it('should find an entity by id, tag or name', () => {
      expect(explorer.getCapability({ name: 'Retrieval' })?.id).toBe('c2');
      expect(explorer.getCapability({ tag: 'reasoning' })?.id).toBe('c1');
      expect(explorer.getTask({ id: 't2' })?.name).toBe('Translation');
      expect(explorer.getRisk({ name: 'Confabulation' })?.id).toBe('r2');
      expect(explorer.getBenchmark({ id: 'bm1' })?.name).toBe('Sample benchmark');
    });

    it('should combine selector criteria', () => {
      expect(explorer.getTask({ id: 't1', taxonomy: 'tax-b' })).toBeUndefined();
      expect(explorer.getCapability({ id: 'c1', name: 'Retrieval' })).toBeUndefined();
    });

    it('should match nothing with an empty selector', () => {
      expect(explorer.getCapability({})).toBeUndefined();
    });
  });

  describe('Capabilities and tasks', () => {
    it('should return capabilities required by a task', () => {
      expect(ids(explorer.getCapabilitiesForTask({ id: 't1' }))).toEqual(['c1', 'c2']);
      expect(ids(explorer.getCapabilitiesForTask({ id: 't1' }, { taxonomy: 'tax-a' }))).toEqual(['c1']);
    });

    it('should return intrinsics and adapters implementing a capability', () => {
      expect(ids(explorer.getIntrinsicsForCapability({ tag: 'reasoning' }))).toEqual(['a1', 'i1']);
      expect(
        ids(explorer.getIntrinsicsForCapability({ tag: 'reasoning' }, { includeAdapters: false }))
      ).toEqual(['i1']);
    });

    it('should return tasks requiring a capability', () => {
      expect(ids(explorer.getTasksForCapability({ id: 'c2' }))).toEqual(['t1']);
    });

    it('should return intrinsics related to a task', () => {
      expect(ids(explorer.getIntrinsicsForTask({ name: 'Summarization' }))).toEqual(['i1']);
    });

    it('should return nothing for an unknown subject', () => {
      expect(explorer.getCapabilitiesForTask({ id: 'nope' })).toEqual([]);
    });

    it('should require every selector criterion to match the start entity', () => {
      expect(ids(explorer.getCapabilitiesForTask({ id: 't1', name: 'Summarization' }))).toEqual([
        'c1',
        'c2',
      ]);
      expect(explorer.getCapabilitiesForTask({ id: 't1', name: 'Translation' })).toEqual([]);
      expect(explorer.getCapabilitiesForTask({ id: 't1', tag: 'other-tag' })).toEqual([]);
    });
  });

  describe('traceTaskToIntrinsics', () => {
    it('should group intrinsics under the capability that found them', () => {
      const trace = explorer.traceTaskToIntrinsics({ id: 't1' });

      expect(trace).toBeDefined();
      if (!trace) return;

      expect(trace.task.id).toBe('t1');
      expect(ids(trace.capabilities)).toEqual(['c1', 'c2']);
      expect(Array.from(trace.intrinsicsByCapability, ([id, found]) => [id, ids(found)])).toEqual([
        ['c1', ['a1', 'i1']],
        ['c2', ['i2']],
      ]);
      expect(ids(trace.allIntrinsics)).toEqual(['a1', 'i1', 'i2']);
    });

    it('should return undefined for an unknown task', () => {
      expect(explorer.traceTaskToIntrinsics({ id: 'nope' })).toBeUndefined();
    });

    it('should return an empty trace for a task with dangling requirements', () => {
      const trace = explorer.traceTaskToIntrinsics({ id: 't2' });

      expect(trace?.capabilities).toEqual([]);
      expect(trace?.allIntrinsics).toEqual([]);
    });
  });

  describe('Risks', () => {
    it('should return related risks without the start risk', () => {
      expect(ids(explorer.getRelatedRisks({ id: 'r1' }))).toEqual(['r2']);
    });

    it('should return controls and actions for a risk', () => {
      expect(ids(explorer.getControlsForRisk({ id: 'r1' }))).toEqual(['rc1']);
      expect(ids(explorer.getActionsForRisk({ name: 'Hallucination' }))).toEqual(['act1']);
    });
  });

  it('should expose and clear the traversal cache', () => {
    explorer.getCapabilitiesForTask({ id: 't1' });
    explorer.getCapabilitiesForTask({ id: 't1' });

    expect(explorer.getCacheStats()).toMatchObject({ entries: 1, hits: 1 });

    explorer.clearCache();

    expect(explorer.getCacheStats()).toMatchObject({ entries: 0, hits: 0, misses: 0 });
  });
});
