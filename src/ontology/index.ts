export * from './types';
export { COLLECTION_KEYS, entityTypeForCollection } from './collections';
export { loadOntologySnapshot, snapshotFromDocuments, mergeEntityRecords } from './snapshot-loader';
