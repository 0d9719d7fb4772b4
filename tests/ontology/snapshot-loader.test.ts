import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  loadOntologySnapshot,
  mergeEntityRecords,
  snapshotFromDocuments,
} from '../../src/ontology/snapshot-loader';
import { EntityType } from '../../src/ontology/types';

describe('Snapshot loader', () => {
  describe('mergeEntityRecords', () => {
    it('should concatenate lists and keep the first scalar', () => {
      const merged = mergeEntityRecords([
        { id: 'r1', name: 'first', keywords: ['a'], description: null },
        { id: 'r1', name: 'second', keywords: ['b'], description: 'filled' },
        { id: 'r2' },
      ]);

      expect(merged).toEqual([
        { id: 'r1', name: 'first', keywords: ['a', 'b'], description: 'filled' },
        { id: 'r2' },
      ]);
    });
  });

  describe('snapshotFromDocuments', () => {
    it('should map collection keys to entity types', () => {
      const snapshot = snapshotFromDocuments([
        { aitasks: [{ id: 't1' }], llmintrinsics: [{ id: 'i1' }] },
        { aitasks: [{ id: 't2' }] },
      ]);

      expect(snapshot[EntityType.AI_TASK]).toEqual([{ id: 't1' }, { id: 't2' }]);
      expect(snapshot[EntityType.LLM_INTRINSIC]).toEqual([{ id: 'i1' }]);
    });

    it('should skip malformed documents, collections and records', () => {
      const snapshot = snapshotFromDocuments([
        'not a document',
        { widgets: [{ id: 'w1' }] },
        { risks: 'not a list' },
        { risks: [{ name: 'no id' }, { id: '' }, { id: 'r1' }] },
      ]);

      expect(Object.keys(snapshot)).toEqual([EntityType.RISK]);
      expect(snapshot[EntityType.RISK]).toEqual([{ id: 'r1' }]);
    });
  });

  describe('loadOntologySnapshot', () => {
    let dataDir: string;

    beforeEach(async () => {
      dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ontology-loader-'));
    });

    afterEach(async () => {
      await fs.rm(dataDir, { recursive: true, force: true });
    });

    it('should merge JSON documents found recursively', async () => {
      await fs.mkdir(path.join(dataDir, 'nested'));
      await fs.writeFile(
        path.join(dataDir, 'a.json'),
        JSON.stringify({
          risks: [{ id: 'r1', name: 'One', keywords: ['a'] }],
          capabilities: [{ id: 'c1' }],
        })
      );
      await fs.writeFile(
        path.join(dataDir, 'nested', 'b.json'),
        JSON.stringify({
          risks: [{ id: 'r1', name: 'Ignored', description: 'desc', keywords: ['b'] }],
        })
      );
      await fs.writeFile(path.join(dataDir, 'notes.txt'), 'risks: []');

      const snapshot = await loadOntologySnapshot(dataDir);

      expect(snapshot[EntityType.RISK]).toEqual([
        { id: 'r1', name: 'One', keywords: ['a', 'b'], description: 'desc' },
      ]);
      expect(snapshot[EntityType.CAPABILITY]).toEqual([{ id: 'c1' }]);
    });

    it('should skip files that are not valid JSON', async () => {
      await fs.writeFile(path.join(dataDir, 'broken.json'), '{ not json');
      await fs.writeFile(path.join(dataDir, 'ok.json'), JSON.stringify({ actions: [{ id: 'act1' }] }));

      const snapshot = await loadOntologySnapshot([dataDir]);

      expect(snapshot[EntityType.ACTION]).toEqual([{ id: 'act1' }]);
    });

    it('should fail for a missing directory', async () => {
      await expect(loadOntologySnapshot(path.join(dataDir, 'missing'))).rejects.toThrow(
        /^Failed to read ontology directory /
      );
    });
  });
});
