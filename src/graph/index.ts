export * from './navigator';
export {
  QUERY_PATTERNS,
  getPatternPolicy,
  hasPattern,
  listPatterns,
} from './query-patterns';
export type { QueryPattern, QueryPatternName } from './query-patterns';
