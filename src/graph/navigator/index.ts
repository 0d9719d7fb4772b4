export * from './types';
export { NavigatorError, PolicyNotFoundError, InvalidPolicyError } from './errors';
export { EntityIndex } from './entity-index';
export { EdgeDerivationTable, createDefaultEdgeTable, targetIds } from './edge-derivation';
export { TraversalPolicy, TraversalPolicySchema } from './traversal-policy';
export type { TraversalPolicyOptions } from './traversal-policy';
export { TraversalResult } from './traversal-result';
export type { TraversalResultData } from './traversal-result';
export { TraversalCache } from './traversal-cache';
export { GraphNavigator } from './graph-navigator';
export type { GraphNavigatorOptions } from './graph-navigator';
