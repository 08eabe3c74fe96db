/**
 * Filter types
 */
import type { NormalizedItem } from '../normalizers/types.js';

export type FilterDimension = 'maker' | 'actress' | 'genre' | 'title' | 'productCode';

export interface PatternSet {
    readonly include: readonly RegExp[];
    readonly exclude: readonly RegExp[];
}

/**
 * Immutable, compiled filter configuration for one run
 */
export interface FilterCriteria {
    readonly patterns: Readonly<Record<FilterDimension, PatternSet>>;
    readonly minSamples: number;
    readonly releaseCutoff: Date | null;
}

export type FilterDecision =
    | { retain: true }
    | { retain: false; rejectedBy: string; detail: string };

/**
 * Named predicate; evaluated in a fixed order by the chain
 */
export interface FilterPredicate {
    readonly name: string;
    test(item: NormalizedItem, criteria: FilterCriteria): FilterDecision;
}
