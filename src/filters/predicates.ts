/**
 * Filter predicates
 * Each predicate looks at one dimension; the chain fixes their order.
 */
import type { NormalizedItem } from '../normalizers/types.js';
import type { FilterDecision, FilterDimension, FilterPredicate } from './types.js';

const RETAIN: FilterDecision = { retain: true };

const DIMENSIONS: readonly FilterDimension[] = ['maker', 'actress', 'genre', 'title', 'productCode'];

const LABELS: Record<FilterDimension, string> = {
    maker: 'maker',
    actress: 'actress',
    genre: 'genre',
    title: 'title',
    productCode: 'product-code',
};

/**
 * Field values for a dimension; multi-valued fields are tested value by value
 */
export function valuesOf(item: NormalizedItem, dimension: FilterDimension): string[] {
    switch (dimension) {
        case 'maker':
            return item.maker ? [item.maker] : [];
        case 'actress':
            return item.actresses;
        case 'genre':
            return item.genres;
        case 'title':
            return [item.title];
        case 'productCode':
            return [item.productCode];
    }
}

function findMatch(patterns: readonly RegExp[], values: string[]): { pattern: RegExp; value: string } | null {
    for (const pattern of patterns) {
        const value = values.find(candidate => pattern.test(candidate));
        if (value !== undefined) return { pattern, value };
    }
    return null;
}

function excludePredicate(dimension: FilterDimension): FilterPredicate {
    const name = `exclude-${LABELS[dimension]}`;
    return {
        name,
        test(item, criteria) {
            const { exclude } = criteria.patterns[dimension];
            if (exclude.length === 0) return RETAIN;

            const match = findMatch(exclude, valuesOf(item, dimension));
            return match
                ? { retain: false, rejectedBy: name, detail: `${match.pattern.source} matched "${match.value}"` }
                : RETAIN;
        },
    };
}

function includePredicate(dimension: FilterDimension): FilterPredicate {
    const name = `include-${LABELS[dimension]}`;
    return {
        name,
        test(item, criteria) {
            const { include } = criteria.patterns[dimension];
            if (include.length === 0) return RETAIN;

            return findMatch(include, valuesOf(item, dimension))
                ? RETAIN
                : { retain: false, rejectedBy: name, detail: 'no include pattern matched' };
        },
    };
}

export const minSamplesPredicate: FilterPredicate = {
    name: 'min-samples',
    test(item, criteria) {
        const count = item.sampleImageUrls.length;
        return count < criteria.minSamples
            ? { retain: false, rejectedBy: 'min-samples', detail: `${count} < ${criteria.minSamples}` }
            : RETAIN;
    },
};

export const releaseCutoffPredicate: FilterPredicate = {
    name: 'release-cutoff',
    test(item, criteria) {
        if (!criteria.releaseCutoff || !item.releaseDate) return RETAIN;
        return item.releaseDate.getTime() > criteria.releaseCutoff.getTime()
            ? {
                retain: false,
                rejectedBy: 'release-cutoff',
                detail: `released ${item.releaseDate.toISOString().slice(0, 10)}`,
            }
            : RETAIN;
    },
};

/**
 * Evaluation order: every exclude, then every include, then thresholds
 */
export const DEFAULT_PREDICATES: readonly FilterPredicate[] = Object.freeze([
    ...DIMENSIONS.map(excludePredicate),
    ...DIMENSIONS.map(includePredicate),
    minSamplesPredicate,
    releaseCutoffPredicate,
]);
