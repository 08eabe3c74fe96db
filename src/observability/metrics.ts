/**
 * Prometheus metrics for a publishing run
 * Written to a text file at the end of the run when configured
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// ============================================================================
// FETCH METRICS
// ============================================================================

/**
 * Counter: Catalog page requests by outcome
 */
export const catalogPages = new client.Counter({
    name: 'catalog_pages_total',
    help: 'Catalog API page requests',
    labelNames: ['status'] as const,
    registers: [registry],
});

/**
 * Histogram: Catalog page request duration in seconds
 */
export const catalogPageDuration = new client.Histogram({
    name: 'catalog_page_duration_seconds',
    help: 'Catalog API page request duration in seconds',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
    registers: [registry],
});

// ============================================================================
// ITEM METRICS
// ============================================================================

/**
 * Counter: Items leaving each stage, by outcome
 */
export const itemsProcessed = new client.Counter({
    name: 'catalog_items_total',
    help: 'Items processed per pipeline stage and outcome',
    labelNames: ['stage', 'outcome'] as const,
    registers: [registry],
});

/**
 * Counter: Filter rejections by predicate name
 */
export const filterRejections = new client.Counter({
    name: 'catalog_filter_rejections_total',
    help: 'Items rejected per filter predicate',
    labelNames: ['predicate'] as const,
    registers: [registry],
});

/**
 * Counter: Image checks by kind (heuristic/head) and result
 */
export const imageChecks = new client.Counter({
    name: 'catalog_image_checks_total',
    help: 'Image placeholder checks by kind and result',
    labelNames: ['kind', 'result'] as const,
    registers: [registry],
});

// ============================================================================
// CMS METRICS
// ============================================================================

/**
 * Counter: CMS requests by method and status class
 */
export const cmsRequests = new client.Counter({
    name: 'cms_requests_total',
    help: 'CMS REST requests by method and status',
    labelNames: ['method', 'status'] as const,
    registers: [registry],
});

/**
 * Counter: Publish operations (created/updated/skipped)
 */
export const publishOperations = new client.Counter({
    name: 'cms_publish_operations_total',
    help: 'Publish operations by operation and post status',
    labelNames: ['operation', 'status'] as const,
    registers: [registry],
});

/**
 * Get metrics in Prometheus exposition format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}
