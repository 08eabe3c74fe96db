/**
 * Catalog Fetcher Tests
 * Pagination, cap and failure behaviour against a stubbed fetch
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildPageUrl, fetchCatalog } from '../../src/fetchers/catalog.fetcher.js';
import { UpstreamError } from '../../src/errors.js';
import { RequestPacer, type PacerClock } from '../../src/services/rate-limiter.js';
import type { RawRecord } from '../../src/fetchers/types.js';
import { makeConfig, makeRawRecord } from '../helpers/fixtures.js';

const mockFetch = vi.fn();

function page(count: number, startAt: number, totalCount = 1000): Response {
    const items = Array.from({ length: count }, (_, i) => makeRawRecord(`abc${String(startAt + i).padStart(5, '0')}`));
    return new Response(JSON.stringify({
        request: { parameters: {} },
        result: { status: 200, result_count: count, total_count: totalCount, first_position: startAt, items },
    }), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function requestedUrl(call: number): URL {
    return new URL(String(mockFetch.mock.calls[call]?.[0]));
}

async function drain(generator: AsyncGenerator<RawRecord>, sink: RawRecord[]): Promise<void> {
    for await (const record of generator) sink.push(record);
}

describe('Catalog Fetcher', () => {
    beforeEach(() => {
        vi.stubGlobal('fetch', mockFetch);
        mockFetch.mockReset();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('buildPageUrl', () => {
        it('should include credentials, paging and optional filters', () => {
            const { catalog } = makeConfig({
                catalog: { keyword: 'summer', productCode: 'abc00123', gteDate: '2024-01-01', lteDate: '2024-01-31', sort: '-date' },
            });
            const url = new URL(buildPageUrl(catalog, 101, 50));

            expect(url.origin + url.pathname).toBe('http://catalog.test/affiliate/v3/ItemList');
            expect(url.searchParams.get('api_id')).toBe('test-api-id');
            expect(url.searchParams.get('affiliate_id')).toBe('test-affiliate-990');
            expect(url.searchParams.get('output')).toBe('json');
            expect(url.searchParams.get('site')).toBe('FANZA');
            expect(url.searchParams.get('service')).toBe('digital');
            expect(url.searchParams.get('floor')).toBe('videoa');
            expect(url.searchParams.get('sort')).toBe('-date');
            expect(url.searchParams.get('hits')).toBe('50');
            expect(url.searchParams.get('offset')).toBe('101');
            expect(url.searchParams.get('keyword')).toBe('summer');
            expect(url.searchParams.get('cid')).toBe('abc00123');
            expect(url.searchParams.get('gte_date')).toBe('2024-01-01T00:00:00');
            expect(url.searchParams.get('lte_date')).toBe('2024-01-31T23:59:59');
        });

        it('should omit filters that are not set', () => {
            const url = new URL(buildPageUrl(makeConfig().catalog, 1, 100));

            expect(url.searchParams.has('keyword')).toBe(false);
            expect(url.searchParams.has('cid')).toBe(false);
            expect(url.searchParams.has('gte_date')).toBe(false);
        });
    });

    describe('fetchCatalog', () => {
        it('should page with increasing offsets and stop at the cap', async () => {
            mockFetch
                .mockResolvedValueOnce(page(2, 1))
                .mockResolvedValueOnce(page(2, 3))
                .mockResolvedValueOnce(page(1, 5));
            const { catalog } = makeConfig({ catalog: { hits: 2, max: 5 } });
            const stops: string[] = [];
            const records: RawRecord[] = [];

            await drain(fetchCatalog(catalog, { onStop: reason => stops.push(reason) }), records);

            expect(records.map(record => record['content_id'])).toEqual([
                'abc00001', 'abc00002', 'abc00003', 'abc00004', 'abc00005',
            ]);
            expect(mockFetch).toHaveBeenCalledTimes(3);
            expect([0, 1, 2].map(call => requestedUrl(call).searchParams.get('offset'))).toEqual(['1', '3', '5']);
            expect([0, 1, 2].map(call => requestedUrl(call).searchParams.get('hits'))).toEqual(['2', '2', '1']);
            expect(stops).toEqual(['cap-reached']);
        });

        it('should never emit more than max even if a page over-delivers', async () => {
            mockFetch.mockResolvedValueOnce(page(5, 1));
            const { catalog } = makeConfig({ catalog: { hits: 10, max: 3 } });
            const records: RawRecord[] = [];

            await drain(fetchCatalog(catalog), records);

            expect(records).toHaveLength(3);
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should stop when a page returns fewer records than requested', async () => {
            mockFetch
                .mockResolvedValueOnce(page(3, 1))
                .mockResolvedValueOnce(page(1, 4));
            const { catalog } = makeConfig({ catalog: { hits: 3, max: 100 } });
            const stops: string[] = [];
            const records: RawRecord[] = [];

            await drain(fetchCatalog(catalog, { onStop: reason => stops.push(reason) }), records);

            expect(records).toHaveLength(4);
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(stops).toEqual(['end-of-results']);
        });

        it('should stop when the offset passes the total count', async () => {
            mockFetch
                .mockResolvedValueOnce(page(2, 1, 4))
                .mockResolvedValueOnce(page(2, 3, 4));
            const { catalog } = makeConfig({ catalog: { hits: 2, max: 100 } });
            const stops: string[] = [];
            const records: RawRecord[] = [];

            await drain(fetchCatalog(catalog, { onStop: reason => stops.push(reason) }), records);

            expect(records).toHaveLength(4);
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(stops).toEqual(['total-exhausted']);
        });

        it('should stop on an empty first page', async () => {
            mockFetch.mockResolvedValueOnce(page(0, 1, 0));
            const records: RawRecord[] = [];

            await drain(fetchCatalog(makeConfig().catalog), records);

            expect(records).toEqual([]);
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should yield earlier pages before an HTTP error surfaces', async () => {
            mockFetch
                .mockResolvedValueOnce(page(2, 1))
                .mockResolvedValueOnce(new Response('upstream down', { status: 500 }));
            const { catalog } = makeConfig({ catalog: { hits: 2, max: 10 } });
            const records: RawRecord[] = [];

            const error = await drain(fetchCatalog(catalog), records).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ message: 'Catalog API error: 500', fatal: true });
            expect(records).toHaveLength(2);
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should raise UpstreamError on a network failure', async () => {
            mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

            const error = await drain(fetchCatalog(makeConfig().catalog), []).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ message: 'Catalog request failed: fetch failed' });
        });

        it('should raise UpstreamError for an error result inside a 200 response', async () => {
            mockFetch.mockResolvedValueOnce(new Response(JSON.stringify({
                result: { status: 400, message: 'LOGIN ERROR' },
            }), { status: 200 }));

            const error = await drain(fetchCatalog(makeConfig().catalog), []).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ message: 'Catalog API rejected the request: LOGIN ERROR' });
        });

        it('should raise UpstreamError for a non-JSON body', async () => {
            mockFetch.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));

            const error = await drain(fetchCatalog(makeConfig().catalog), []).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ message: 'Catalog API returned a non-JSON body' });
        });

        it('should raise UpstreamError when items are missing', async () => {
            mockFetch.mockResolvedValueOnce(new Response(JSON.stringify({ result: { status: 200 } }), { status: 200 }));

            const error = await drain(fetchCatalog(makeConfig().catalog), []).catch((caught: unknown) => caught);

            expect(error).toMatchObject({ kind: 'UPSTREAM_ERROR', message: 'Catalog API returned a malformed payload' });
        });

        it('should pace every page after the first', async () => {
            mockFetch
                .mockResolvedValueOnce(page(2, 1))
                .mockResolvedValueOnce(page(2, 3))
                .mockResolvedValueOnce(page(0, 5));
            const sleeps: number[] = [];
            const clock: PacerClock = {
                now: () => 0,
                sleep: async (ms) => { sleeps.push(ms); },
            };
            const { catalog } = makeConfig({ catalog: { hits: 2, max: 10 } });

            await drain(fetchCatalog(catalog, { pacer: new RequestPacer(700, clock) }), []);

            expect(sleeps).toEqual([700, 700]);
        });

        it('should be lazy and request nothing until iterated', () => {
            fetchCatalog(makeConfig().catalog);

            expect(mockFetch).not.toHaveBeenCalled();
        });
    });
});
