import {
  EdgeDerivationTable,
  createDefaultEdgeTable,
  targetIds,
} from '../../src/graph/navigator/edge-derivation';
import { EntityIndex } from '../../src/graph/navigator/entity-index';
import { EntityType, RelationType } from '../../src/ontology/types';
import { buildOntologyFixture } from '../fixtures/ontology-fixture';

describe('targetIds', () => {
  it('should wrap a single id', () => {
    expect(targetIds('c1')).toEqual(['c1']);
  });

  it('should ignore empty and missing values', () => {
    expect(targetIds('')).toEqual([]);
    expect(targetIds(null)).toEqual([]);
    expect(targetIds(undefined)).toEqual([]);
    expect(targetIds(3)).toEqual([]);
  });

  it('should keep only string entries of a list', () => {
    expect(targetIds(['c1', 2, null, 'c2'])).toEqual(['c1', 'c2']);
  });
});

describe('EdgeDerivationTable', () => {
  const index = new EntityIndex(buildOntologyFixture());

  it('should list type rules before shared rules', () => {
    const table = new EdgeDerivationTable()
      .register(null, {
        attribute: 'hasLicense',
        relation: RelationType.HAS_LICENSE,
        targetType: EntityType.LICENSE,
      })
      .register(EntityType.RISK, {
        attribute: 'isDetectedBy',
        relation: RelationType.IS_DETECTED_BY,
        targetType: EntityType.RISK_CONTROL,
      });

    expect(table.rulesFor(EntityType.RISK).map(rule => rule.attribute)).toEqual([
      'isDetectedBy',
      'hasLicense',
    ]);
    expect(table.rulesFor(EntityType.ACTION).map(rule => rule.attribute)).toEqual(['hasLicense']);
  });

  it('should derive edges in rule then list order', () => {
    const table = createDefaultEdgeTable();
    const task = index.lookup(EntityType.AI_TASK, 't1');
    expect(task).toBeDefined();
    if (!task) return;

    const edges = table.deriveEdges(task, EntityType.AI_TASK, index);

    expect(edges.map(edge => [edge.relation, edge.targetId])).toEqual([
      [RelationType.REQUIRES_CAPABILITY, 'c1'],
      [RelationType.REQUIRES_CAPABILITY, 'c2'],
      [RelationType.HAS_RELATED_LLM_INTRINSIC, 'i1'],
    ]);
    expect(edges[0].target).toBe(index.lookup(EntityType.CAPABILITY, 'c1'));
  });

  it('should apply shared rules to every type', () => {
    const table = createDefaultEdgeTable();
    const risk = index.lookup(EntityType.RISK, 'r1');
    expect(risk).toBeDefined();
    if (!risk) return;

    const edges = table.deriveEdges(risk, EntityType.RISK, index);

    expect(edges.map(edge => `${edge.relation}:${edge.targetType}:${edge.targetId}`)).toEqual([
      'hasRelatedAction:Action:act1',
      'isDetectedBy:RiskControl:rc1',
      'closeMatch:Risk:r2',
      'hasDocumentation:Documentation:doc1',
    ]);
  });

  it('should map inverse attributes of adapters and intrinsics to implementsCapability', () => {
    const table = createDefaultEdgeTable();

    expect(table.rulesFor(EntityType.ADAPTER)[0]).toEqual({
      attribute: 'implementsCapability_adapter',
      relation: RelationType.IMPLEMENTS_CAPABILITY,
      targetType: EntityType.CAPABILITY,
    });
    expect(table.rulesFor(EntityType.LLM_INTRINSIC)[0]).toEqual({
      attribute: 'implementsCapability_intrinsic',
      relation: RelationType.IMPLEMENTS_CAPABILITY,
      targetType: EntityType.CAPABILITY,
    });
  });

  it('should place related intrinsics of a task after its documentation', () => {
    const table = createDefaultEdgeTable();
    const documented = new EntityIndex({
      [EntityType.AI_TASK]: [
        { id: 't', requiresCapability: ['c'], hasRelatedLLMIntrinsic: ['i'], hasDocumentation: ['d'] },
      ],
      [EntityType.CAPABILITY]: [{ id: 'c' }],
      [EntityType.LLM_INTRINSIC]: [{ id: 'i' }],
      [EntityType.DOCUMENTATION]: [{ id: 'd' }],
    });
    const task = documented.lookup(EntityType.AI_TASK, 't');
    expect(task).toBeDefined();
    if (!task) return;

    const edges = table.deriveEdges(task, EntityType.AI_TASK, documented);

    expect(edges.map(edge => edge.relation)).toEqual([
      RelationType.REQUIRES_CAPABILITY,
      RelationType.HAS_DOCUMENTATION,
      RelationType.HAS_RELATED_LLM_INTRINSIC,
    ]);
  });

  it('should place question policy rules after the shared rules', () => {
    expect(
      createDefaultEdgeTable()
        .rulesFor(EntityType.QUESTION_POLICY)
        .map(rule => rule.attribute)
    ).toEqual(['hasDocumentation', 'hasLicense', 'hasRule']);
  });

  it('should keep registration order within each position', () => {
    const table = new EdgeDerivationTable()
      .register(EntityType.RISK, {
        attribute: 'late',
        relation: RelationType.HAS_RELATED_ACTION,
        targetType: EntityType.ACTION,
        position: 'afterShared',
      })
      .register(null, {
        attribute: 'hasLicense',
        relation: RelationType.HAS_LICENSE,
        targetType: EntityType.LICENSE,
      })
      .register(EntityType.RISK, {
        attribute: 'early',
        relation: RelationType.IS_DETECTED_BY,
        targetType: EntityType.RISK_CONTROL,
      });

    expect(table.rulesFor(EntityType.RISK).map(rule => rule.attribute)).toEqual([
      'early',
      'hasLicense',
      'late',
    ]);
  });

  it('should drop targets that are not in the index', () => {
    const table = createDefaultEdgeTable();

    expect(
      table.deriveEdges({ id: 'tx', requiresCapability: ['c1', 'c-missing'] }, EntityType.AI_TASK, index)
    ).toHaveLength(1);
  });

  it('should derive nothing for types without rules beyond the shared ones', () => {
    const table = createDefaultEdgeTable();

    expect(table.deriveEdges({ id: 'act1', requiresCapability: 'c1' }, EntityType.ACTION, index)).toEqual(
      []
    );
  });
});
