/**
 * Ontology Navigator - policy-driven traversal over an AI risk and
 * capability knowledge graph.
 */

// Re-export all modules for library usage
export * from './ontology';
export * from './graph';
export * from './explorer';

export { logger, createComponentLogger } from './utils/logger';
export { config } from './utils/config';
