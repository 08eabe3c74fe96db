/**
 * Content rendering entry point
 */
export { buildContent, escapeHtml, type ContentDocument } from './builder.js';
export { buildExcerpt, truncate, EXCERPT_MAX_LENGTH } from './seo.js';
export { makeAffiliateUrl, unwrapAffiliateUrl } from './affiliate.js';
