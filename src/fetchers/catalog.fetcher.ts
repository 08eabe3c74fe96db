/**
 * Catalog API Fetcher
 * Pages through the product catalog (ItemList) with a fixed delay between pages
 */
import { z } from 'zod';
import { UpstreamError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { catalogPageDuration, catalogPages } from '../observability/metrics.js';
import { createPacer } from '../services/rate-limiter.js';
import type { CatalogConfig } from '../config/index.js';
import type { CatalogPage, FetchOptions, FetchStopReason, Fetcher, RawRecord } from './types.js';

const log = createLogger({ stage: 'fetch' });

const catalogResponseSchema = z.object({
    result: z.object({
        status: z.union([z.number(), z.string()]).optional(),
        message: z.string().optional(),
        total_count: z.coerce.number().int().optional(),
        items: z.array(z.record(z.unknown())),
    }),
});

const errorResultSchema = z.object({
    result: z.object({
        status: z.union([z.number(), z.string()]),
        message: z.string().optional(),
    }),
});

/**
 * Build the ItemList request URL for one page
 */
export function buildPageUrl(catalog: CatalogConfig, offset: number, hits: number): string {
    const url = new URL(catalog.endpoint);
    url.searchParams.set('api_id', catalog.apiId);
    url.searchParams.set('affiliate_id', catalog.affiliateId);
    url.searchParams.set('output', 'json');
    url.searchParams.set('site', catalog.site);
    url.searchParams.set('service', catalog.service);
    url.searchParams.set('floor', catalog.floor);
    url.searchParams.set('sort', catalog.sort);
    url.searchParams.set('hits', String(hits));
    url.searchParams.set('offset', String(offset));

    if (catalog.keyword) url.searchParams.set('keyword', catalog.keyword);
    if (catalog.productCode) url.searchParams.set('cid', catalog.productCode);
    if (catalog.gteDate) url.searchParams.set('gte_date', `${catalog.gteDate}T00:00:00`);
    if (catalog.lteDate) url.searchParams.set('lte_date', `${catalog.lteDate}T23:59:59`);

    return url.toString();
}

/**
 * Fetch a single catalog page
 * Any transport, status or payload problem is an UpstreamError
 */
export async function fetchCatalogPage(
    catalog: CatalogConfig,
    offset: number,
    hits: number
): Promise<CatalogPage> {
    const url = buildPageUrl(catalog, offset, hits);
    const endTimer = catalogPageDuration.startTimer();

    let response: Response;
    try {
        response = await fetch(url, {
            headers: { 'Accept': 'application/json' },
            signal: AbortSignal.timeout(catalog.timeoutMs),
        });
    } catch (error) {
        endTimer();
        catalogPages.labels('network_error').inc();
        throw new UpstreamError(
            `Catalog request failed: ${error instanceof Error ? error.message : String(error)}`,
            { offset }
        );
    }
    endTimer();

    if (!response.ok) {
        catalogPages.labels(String(response.status)).inc();
        throw new UpstreamError(`Catalog API error: ${response.status}`, { offset, status: response.status });
    }

    let body: unknown;
    try {
        body = await response.json();
    } catch {
        catalogPages.labels('malformed').inc();
        throw new UpstreamError('Catalog API returned a non-JSON body', { offset });
    }

    // The API reports request errors inside a 200 response
    const errorResult = errorResultSchema.safeParse(body);
    if (errorResult.success && Number(errorResult.data.result.status) !== 200) {
        catalogPages.labels('api_error').inc();
        throw new UpstreamError(
            `Catalog API rejected the request: ${errorResult.data.result.message ?? errorResult.data.result.status}`,
            { offset, status: errorResult.data.result.status }
        );
    }

    const parsed = catalogResponseSchema.safeParse(body);
    if (!parsed.success) {
        catalogPages.labels('malformed').inc();
        throw new UpstreamError('Catalog API returned a malformed payload', {
            offset,
            issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
    }

    catalogPages.labels('ok').inc();

    return {
        items: parsed.data.result.items,
        totalCount: parsed.data.result.total_count ?? null,
        offset,
        requested: hits,
    };
}

/**
 * Lazily yield raw records until the cap, the end of results, or an error
 * Records of earlier pages are yielded before a failing page throws.
 */
export async function* fetchCatalog(
    catalog: CatalogConfig,
    options: FetchOptions = {}
): AsyncGenerator<RawRecord, void, undefined> {
    const pacer = options.pacer ?? createPacer(catalog.requestIntervalMs);
    let offset = 1;
    let emitted = 0;
    let pages = 0;

    const stop = (reason: FetchStopReason): void => {
        log.info('Catalog fetch finished', { reason, pages, emitted });
        options.onStop?.(reason, { pages, emitted });
    };

    while (emitted < catalog.max) {
        const hits = Math.min(catalog.hits, catalog.max - emitted);

        await pacer.acquire();
        const page = await fetchCatalogPage(catalog, offset, hits);
        pages++;

        log.debug('Catalog page fetched', {
            offset,
            requested: hits,
            received: page.items.length,
            totalCount: page.totalCount,
        });

        for (const item of page.items) {
            if (emitted >= catalog.max) break;
            yield item;
            emitted++;
        }

        if (page.items.length < hits) {
            stop('end-of-results');
            return;
        }

        offset += page.items.length;
        if (page.totalCount !== null && offset > page.totalCount) {
            stop('total-exhausted');
            return;
        }
    }

    stop('cap-reached');
}

export const catalogFetcher: Fetcher = {
    fetch: fetchCatalog,
};
