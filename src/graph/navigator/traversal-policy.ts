import crypto from 'crypto';
import { isDeepStrictEqual } from 'util';
import { z } from 'zod';
import { AttributeValue, EntityRecord, EntityType, RelationType } from '../../ontology/types';
import { InvalidPolicyError } from './errors';

const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.undefined(),
    z.array(attributeValueSchema),
    z.record(attributeValueSchema),
  ])
);

export const TraversalPolicySchema = z.object({
  maxDepth: z.number().int().min(0).default(2),
  includedRelationships: z.array(z.nativeEnum(RelationType)).nullish(),
  excludedRelationships: z.array(z.nativeEnum(RelationType)).nullish(),
  includedEntityTypes: z.array(z.nativeEnum(EntityType)).nullish(),
  excludedEntityTypes: z.array(z.nativeEnum(EntityType)).nullish(),
  nodePropertyFilters: z.record(attributeValueSchema).nullish(),
  followBidirectional: z.boolean().default(true),
  deduplicateResults: z.boolean().default(true),
  maxResults: z.number().int().positive().nullish(),
  cacheEnabled: z.boolean().default(true),
});

export type TraversalPolicyOptions = z.input<typeof TraversalPolicySchema>;

/**
 * Folds -0 into 0 so that filter matching agrees with the JSON cache key,
 * which cannot tell them apart
 */
function withoutNegativeZero(value: AttributeValue): AttributeValue {
  if (typeof value === 'number') return value === 0 ? 0 : value;
  if (Array.isArray(value)) return value.map(withoutNegativeZero);
  if (value !== null && typeof value === 'object') {
    const folded: Record<string, AttributeValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      folded[key] = withoutNegativeZero(entry);
    }
    return folded;
  }
  return value;
}

function normalizeFilters(
  filters: Readonly<Record<string, AttributeValue>>
): Record<string, AttributeValue> {
  const normalized: Record<string, AttributeValue> = {};
  for (const [attribute, expected] of Object.entries(filters)) {
    normalized[attribute] = withoutNegativeZero(expected);
  }
  return normalized;
}

/** Empty lists place no restriction, same as an absent list */
function toSet<T>(values: readonly T[] | null | undefined): ReadonlySet<T> | null {
  return values && values.length > 0 ? new Set(values) : null;
}

function sortedOrNull<T extends string>(values: ReadonlySet<T> | null): T[] | null {
  return values ? Array.from(values).sort() : null;
}

/**
 * Recursively sorts object keys for a canonical serialization
 */
function sortObject(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(item => sortObject(item));

  const sorted: Record<string, unknown> = {};
  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, entry] of entries) {
    sorted[key] = sortObject(entry);
  }
  return sorted;
}

/**
 * Immutable configuration of one traversal: how deep to go, which edges to
 * follow and which nodes to keep. Construct through `TraversalPolicy.create`,
 * which rejects malformed options up front.
 */
export class TraversalPolicy {
  readonly maxDepth: number;
  readonly includedRelationships: ReadonlySet<RelationType> | null;
  readonly excludedRelationships: ReadonlySet<RelationType> | null;
  readonly includedEntityTypes: ReadonlySet<EntityType> | null;
  readonly excludedEntityTypes: ReadonlySet<EntityType> | null;
  readonly nodePropertyFilters: Readonly<Record<string, AttributeValue>> | null;
  /** Informational only: direction always comes from the edge table */
  readonly followBidirectional: boolean;
  readonly deduplicateResults: boolean;
  readonly maxResults: number | null;
  readonly cacheEnabled: boolean;

  private constructor(options: z.output<typeof TraversalPolicySchema>) {
    this.maxDepth = options.maxDepth;
    this.includedRelationships = toSet(options.includedRelationships);
    this.excludedRelationships = toSet(options.excludedRelationships);
    this.includedEntityTypes = toSet(options.includedEntityTypes);
    this.excludedEntityTypes = toSet(options.excludedEntityTypes);
    this.nodePropertyFilters =
      options.nodePropertyFilters && Object.keys(options.nodePropertyFilters).length > 0
        ? Object.freeze(normalizeFilters(options.nodePropertyFilters))
        : null;
    this.followBidirectional = options.followBidirectional;
    this.deduplicateResults = options.deduplicateResults;
    this.maxResults = options.maxResults ?? null;
    this.cacheEnabled = options.cacheEnabled;
    Object.freeze(this);
  }

  static create(options: TraversalPolicyOptions = {}): TraversalPolicy {
    const parsed = TraversalPolicySchema.safeParse(options);
    if (!parsed.success) {
      throw new InvalidPolicyError(
        parsed.error.issues.map(issue =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        )
      );
    }
    return new TraversalPolicy(parsed.data);
  }

  with(overrides: TraversalPolicyOptions): TraversalPolicy {
    return TraversalPolicy.create({ ...this.toOptions(), ...overrides });
  }

  /** Exclusion always wins over inclusion */
  allowsRelationship(relation: RelationType): boolean {
    if (this.excludedRelationships?.has(relation)) return false;
    if (this.includedRelationships && !this.includedRelationships.has(relation)) return false;
    return true;
  }

  allowsEntityType(type: EntityType): boolean {
    if (this.excludedEntityTypes?.has(type)) return false;
    if (this.includedEntityTypes && !this.includedEntityTypes.has(type)) return false;
    return true;
  }

  /**
   * Every filter must match exactly. A missing attribute reads as null and
   * only satisfies a filter expecting null.
   */
  matchesNodeFilters(entity: EntityRecord): boolean {
    if (!this.nodePropertyFilters) return true;

    for (const [attribute, expected] of Object.entries(this.nodePropertyFilters)) {
      const actual = withoutNegativeZero(entity[attribute] ?? null);
      if (!isDeepStrictEqual(actual, expected ?? null)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Deterministic key over the start node and every field that shapes the
   * result. `cacheEnabled` is the only field left out.
   */
  getCacheKey(startId: string, startType: EntityType): string {
    const canonical = {
      startId,
      startType,
      maxDepth: this.maxDepth,
      includedRelationships: sortedOrNull(this.includedRelationships),
      excludedRelationships: sortedOrNull(this.excludedRelationships),
      includedEntityTypes: sortedOrNull(this.includedEntityTypes),
      excludedEntityTypes: sortedOrNull(this.excludedEntityTypes),
      nodePropertyFilters: this.nodePropertyFilters,
      followBidirectional: this.followBidirectional,
      deduplicateResults: this.deduplicateResults,
      maxResults: this.maxResults,
    };

    return crypto.createHash('md5').update(JSON.stringify(sortObject(canonical))).digest('hex');
  }

  toOptions(): TraversalPolicyOptions {
    return {
      maxDepth: this.maxDepth,
      includedRelationships: sortedOrNull(this.includedRelationships),
      excludedRelationships: sortedOrNull(this.excludedRelationships),
      includedEntityTypes: sortedOrNull(this.includedEntityTypes),
      excludedEntityTypes: sortedOrNull(this.excludedEntityTypes),
      nodePropertyFilters: this.nodePropertyFilters ? { ...this.nodePropertyFilters } : null,
      followBidirectional: this.followBidirectional,
      deduplicateResults: this.deduplicateResults,
      maxResults: this.maxResults,
      cacheEnabled: this.cacheEnabled,
    };
  }
}
