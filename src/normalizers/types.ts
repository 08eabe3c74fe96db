/**
 * Normalizer types and interfaces
 */
import type { RawRecord } from '../fetchers/types.js';

/**
 * Canonical catalog item
 * `externalId` is never empty and is stable for the same work across runs.
 */
export interface NormalizedItem {
    externalId: string;
    productCode: string;

    // Core fields
    title: string;
    maker: string;
    actresses: string[];
    genres: string[];   // de-duplicated, first-seen order
    releaseDate: Date | null;

    // Links & media
    productUrl: string;
    coverImageUrl: string | null;
    sampleImageUrls: string[];
}

/**
 * Normalizer interface
 */
export interface Normalizer {
    normalize(record: RawRecord): NormalizedItem;
}
