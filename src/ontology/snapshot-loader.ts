import * as fs from 'fs/promises';
import * as path from 'path';
import { createComponentLogger } from '../utils/logger';
import { entityTypeForCollection } from './collections';
import { AttributeValue, EntityRecord, EntityType, OntologySnapshot } from './types';

const logger = createComponentLogger('snapshot-loader');

type MutableRecord = { id: string } & Record<string, AttributeValue>;

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
  }
  if (Array.isArray(value)) return value.every(isAttributeValue);
  if (isPlainObject(value)) return Object.values(value).every(isAttributeValue);
  return false;
}

function toEntityRecord(value: unknown): MutableRecord | undefined {
  if (!isPlainObject(value)) return undefined;

  const { id, ...attributes } = value;
  if (typeof id !== 'string' || id.length === 0) return undefined;

  const record: MutableRecord = { id };
  for (const [key, attribute] of Object.entries(attributes)) {
    if (isAttributeValue(attribute)) {
      record[key] = attribute;
    }
  }
  return record;
}

/**
 * Combines records that share an id. List attributes are concatenated in
 * load order; for anything else the first non-null value wins.
 */
export function mergeEntityRecords(records: readonly EntityRecord[]): EntityRecord[] {
  const combined = new Map<string, MutableRecord>();

  for (const record of records) {
    const existing = combined.get(record.id);
    if (!existing) {
      combined.set(record.id, { ...record });
      continue;
    }

    for (const [key, value] of Object.entries(record)) {
      if (key === 'id') continue;

      const current = existing[key];
      if (current === null || current === undefined) {
        existing[key] = value;
      } else if (Array.isArray(current) && Array.isArray(value)) {
        existing[key] = [...current, ...value];
      }
    }
  }

  return Array.from(combined.values());
}

/**
 * Builds a snapshot from parsed documents whose top-level keys are
 * collection names (`risks`, `capabilities`, `aitasks`, ...).
 */
export function snapshotFromDocuments(documents: readonly unknown[]): OntologySnapshot {
  const collected = new Map<EntityType, EntityRecord[]>();

  for (const document of documents) {
    if (!isPlainObject(document)) {
      logger.warn('Skipping document that is not an object');
      continue;
    }

    for (const [collectionKey, instances] of Object.entries(document)) {
      const type = entityTypeForCollection(collectionKey);
      if (!type) {
        logger.warn('Skipping unknown collection', { collection: collectionKey });
        continue;
      }
      if (!Array.isArray(instances)) {
        logger.warn('Skipping collection that is not a list', { collection: collectionKey });
        continue;
      }

      const records = collected.get(type) ?? [];
      for (const instance of instances) {
        const record = toEntityRecord(instance);
        if (!record) {
          logger.warn('Skipping record without a string id', { collection: collectionKey });
          continue;
        }
        records.push(record);
      }
      collected.set(type, records);
    }
  }

  const snapshot: OntologySnapshot = {};
  for (const [type, records] of collected) {
    snapshot[type] = mergeEntityRecords(records);
  }
  return snapshot;
}

async function collectJsonFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectJsonFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

/**
 * Loads every `*.json` document found (recursively) under the given
 * directories into one merged, read-only snapshot.
 */
export async function loadOntologySnapshot(directories: string | string[]): Promise<OntologySnapshot> {
  const roots = Array.isArray(directories) ? directories : [directories];
  const documents: unknown[] = [];

  for (const root of roots) {
    let files: string[];
    try {
      files = await collectJsonFiles(root);
    } catch (error) {
      throw new Error(
        `Failed to read ontology directory ${root}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    for (const file of files) {
      try {
        const content = await fs.readFile(file, 'utf-8');
        documents.push(JSON.parse(content));
      } catch (error) {
        logger.info('Document ignored, failed to load', {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  const snapshot = snapshotFromDocuments(documents);

  logger.info('Ontology snapshot loaded', {
    documents: documents.length,
    entityTypes: Object.keys(snapshot).length,
  });

  return snapshot;
}
