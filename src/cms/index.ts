/**
 * CMS publishing entry point
 */
export { createCmsClient, parseErrorBody, toConnection, type CmsConnection } from './client.js';
export { createPublisher, resolvePostStatus, type Publisher } from './upsert.js';
export * from './types.js';
