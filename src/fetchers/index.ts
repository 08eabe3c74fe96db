/**
 * Fetcher entry point
 */
export { catalogFetcher, fetchCatalog, fetchCatalogPage, buildPageUrl } from './catalog.fetcher.js';

// Re-export types
export * from './types.js';
