/**
 * Fetcher types and interfaces
 */
import type { CatalogConfig } from '../config/index.js';
import type { RequestPacer } from '../services/rate-limiter.js';

/**
 * Raw catalog record - one element of `result.items`
 * Opaque until normalized.
 */
export type RawRecord = Record<string, unknown>;

/**
 * One page of catalog results
 */
export interface CatalogPage {
    items: RawRecord[];
    totalCount: number | null;
    offset: number;
    requested: number;
}

/**
 * Why the fetcher stopped requesting pages
 */
export type FetchStopReason = 'cap-reached' | 'end-of-results' | 'total-exhausted';

export interface FetchOptions {
    pacer?: RequestPacer;
    onStop?: (reason: FetchStopReason, stats: { pages: number; emitted: number }) => void;
}

/**
 * Fetcher interface - lazy, finite sequence of raw records
 */
export interface Fetcher {
    fetch(config: CatalogConfig, options?: FetchOptions): AsyncGenerator<RawRecord, void, undefined>;
}
