/**
 * Normalizer entry point
 */
export { catalogNormalizer, normalizeRecord, parseReleaseDate } from './catalog.normalizer.js';
export { extractSampleImages, upgradeImageUrl, isImageUrl } from './image-urls.js';

// Re-export types
export * from './types.js';
