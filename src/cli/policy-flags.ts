import { InvalidPolicyError } from '../graph/navigator/errors';
import { TraversalPolicy, TraversalPolicyOptions } from '../graph/navigator/traversal-policy';
import { getPatternPolicy } from '../graph/query-patterns';
import { EntityType, RelationType, isEntityType, isRelationType } from '../ontology/types';

/** Raw option values as commander hands them over */
export interface PolicyFlags {
  pattern?: string;
  maxDepth?: string;
  includeRel?: string;
  excludeRel?: string;
  includeType?: string;
  excludeType?: string;
  maxResults?: string;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parseList<T extends string>(
  flag: string,
  value: string,
  guard: (item: string) => item is T
): T[] {
  const items = splitList(value);
  const unknown = items.filter(item => !guard(item));
  if (unknown.length > 0) {
    throw new InvalidPolicyError(unknown.map(item => `${flag}: unknown value '${item}'`));
  }
  return items.filter(guard);
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidPolicyError([`${flag}: expected an integer, got '${value}'`]);
  }
  return parseInt(value, 10);
}

export function parseEntityType(value: string): EntityType {
  if (!isEntityType(value)) {
    throw new InvalidPolicyError([
      `--type: unknown entity type '${value}'. Expected one of: ${Object.values(EntityType).join(', ')}`,
    ]);
  }
  return value;
}

/**
 * Turns command-line flags into a policy. With `--pattern` the named policy
 * is the base and explicit flags override its fields.
 */
export function policyFromFlags(flags: PolicyFlags): TraversalPolicy {
  const overrides: TraversalPolicyOptions = {};

  if (flags.maxDepth !== undefined) {
    overrides.maxDepth = parseInteger('--max-depth', flags.maxDepth);
  }
  if (flags.maxResults !== undefined) {
    overrides.maxResults = parseInteger('--max-results', flags.maxResults);
  }
  if (flags.includeRel !== undefined) {
    overrides.includedRelationships = parseList<RelationType>(
      '--include-rel',
      flags.includeRel,
      isRelationType
    );
  }
  if (flags.excludeRel !== undefined) {
    overrides.excludedRelationships = parseList<RelationType>(
      '--exclude-rel',
      flags.excludeRel,
      isRelationType
    );
  }
  if (flags.includeType !== undefined) {
    overrides.includedEntityTypes = parseList<EntityType>(
      '--include-type',
      flags.includeType,
      isEntityType
    );
  }
  if (flags.excludeType !== undefined) {
    overrides.excludedEntityTypes = parseList<EntityType>(
      '--exclude-type',
      flags.excludeType,
      isEntityType
    );
  }

  if (flags.pattern !== undefined) {
    return getPatternPolicy(flags.pattern).with(overrides);
  }
  return TraversalPolicy.create(overrides);
}
