/**
 * Compile filter settings into immutable FilterCriteria
 */
import { parseReleaseDate } from '../normalizers/catalog.normalizer.js';
import type { FiltersConfig } from '../config/index.js';
import type { FilterCriteria, FilterDimension, PatternSet } from './types.js';

function compile(patterns: readonly string[]): readonly RegExp[] {
    return Object.freeze(patterns.map(pattern => new RegExp(pattern, 'i')));
}

function patternSet(include: readonly RegExp[], exclude: readonly RegExp[]): PatternSet {
    return Object.freeze({ include, exclude });
}

export function compileCriteria(filters: FiltersConfig): FilterCriteria {
    const patterns: Record<FilterDimension, PatternSet> = {
        maker: patternSet(compile(filters.includeMaker), compile(filters.excludeMaker)),
        actress: patternSet(compile(filters.includeActress), compile(filters.excludeActress)),
        genre: patternSet(compile(filters.includeGenre), compile(filters.excludeGenre)),
        title: patternSet(compile(filters.includeTitle), compile(filters.excludeTitle)),
        productCode: patternSet(compile(filters.includeProductCode), compile(filters.excludeProductCode)),
    };

    return Object.freeze({
        patterns: Object.freeze(patterns),
        minSamples: filters.minSamples,
        releaseCutoff: parseReleaseDate(filters.releaseCutoff ?? undefined),
    });
}
