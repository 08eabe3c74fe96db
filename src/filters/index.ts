/**
 * FilterChain
 * Runs the named predicates in order and stops at the first rejection
 */
import { DEFAULT_PREDICATES } from './predicates.js';
import type { ImageAssessment } from '../images/types.js';
import type { NormalizedItem } from '../normalizers/types.js';
import type { FilterCriteria, FilterDecision, FilterPredicate } from './types.js';

export interface FilterChain {
    readonly criteria: FilterCriteria;
    readonly predicates: readonly FilterPredicate[];
    evaluate(item: NormalizedItem): FilterDecision;
    retains(item: NormalizedItem): boolean;
}

export function evaluate(
    item: NormalizedItem,
    criteria: FilterCriteria,
    predicates: readonly FilterPredicate[] = DEFAULT_PREDICATES
): FilterDecision {
    for (const predicate of predicates) {
        const decision = predicate.test(item, criteria);
        if (!decision.retain) return decision;
    }
    return { retain: true };
}

export function createFilterChain(
    criteria: FilterCriteria,
    predicates: readonly FilterPredicate[] = DEFAULT_PREDICATES
): FilterChain {
    return {
        criteria,
        predicates,
        evaluate: (item) => evaluate(item, criteria, predicates),
        retains: (item) => evaluate(item, criteria, predicates).retain,
    };
}

/**
 * Post-classification check: drop items whose chosen cover is still a placeholder
 */
export function evaluatePlaceholder(assessment: ImageAssessment, skipPlaceholder: boolean): FilterDecision {
    if (skipPlaceholder && assessment.isPlaceholder) {
        return { retain: false, rejectedBy: 'skip-placeholder', detail: 'cover is a placeholder' };
    }
    return { retain: true };
}

export { compileCriteria } from './criteria.js';
export { DEFAULT_PREDICATES, minSamplesPredicate, releaseCutoffPredicate, valuesOf } from './predicates.js';
export * from './types.js';
