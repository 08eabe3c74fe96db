/**
 * Shared test data builders
 */
import { mergeConfigInput, parseConfig, type ConfigInput, type PipelineConfig } from '../../src/config/index.js';
import type { ImageAssessment } from '../../src/images/types.js';
import type { NormalizedItem } from '../../src/normalizers/types.js';
import type { RawRecord } from '../../src/fetchers/types.js';

export const TEST_CREDENTIALS = {
    apiId: 'test-api-id',
    affiliateId: 'test-affiliate-990',
};

export function makeConfig(overrides: ConfigInput = {}): PipelineConfig {
    const base: ConfigInput = {
        catalog: {
            ...TEST_CREDENTIALS,
            endpoint: 'http://catalog.test/affiliate/v3/ItemList',
            requestIntervalMs: 0,
        },
        images: { networkCheck: false },
        output: { csvPath: null },
    };
    return parseConfig(mergeConfigInput(base, overrides));
}

export function makeItem(overrides: Partial<NormalizedItem> = {}): NormalizedItem {
    return {
        externalId: 'abc00123',
        productCode: 'abc00123',
        title: 'Sample Title',
        maker: 'Example Maker',
        actresses: ['Actress One', 'Actress Two'],
        genres: ['Drama', 'Comedy'],
        releaseDate: new Date(Date.UTC(2024, 4, 10)),
        productUrl: 'https://www.example.test/detail/cid=abc00123/',
        coverImageUrl: 'https://pics.example.test/abc00123/abc00123pl.jpg',
        sampleImageUrls: [
            'https://pics.example.test/abc00123/abc00123jp-1.jpg',
            'https://pics.example.test/abc00123/abc00123jp-2.jpg',
        ],
        ...overrides,
    };
}

export function makeAssessment(item: NormalizedItem, overrides: Partial<ImageAssessment> = {}): ImageAssessment {
    return {
        isPlaceholder: false,
        chosenCoverUrl: item.coverImageUrl,
        originalCoverUrl: item.coverImageUrl,
        coverReplaced: false,
        verdict: { source: 'HEURISTIC_ONLY', placeholder: false },
        inconclusive: [],
        ...overrides,
    };
}

/**
 * Raw catalog record shaped like an ItemList entry
 */
export function makeRawRecord(cid: string, overrides: RawRecord = {}): RawRecord {
    return {
        content_id: cid,
        title: `Title ${cid}`,
        URL: `https://www.example.test/detail/cid=${cid}/`,
        date: '2024-05-10 10:00:00',
        iteminfo: {
            maker: [{ id: 1, name: 'Example Maker' }],
            actress: [{ id: 10, name: 'Actress One' }],
            genre: [{ id: 100, name: 'Drama' }],
        },
        imageURL: {
            list: `https://pics.example.test/${cid}/${cid}pt.jpg`,
            large: `https://pics.example.test/${cid}/${cid}pl.jpg`,
        },
        sampleImageURL: {
            sample_s: { image: [`https://pics.example.test/${cid}/${cid}-1.jpg`] },
            sample_l: { image: [`https://pics.example.test/${cid}/${cid}jp-1.jpg`] },
        },
        ...overrides,
    };
}
