/**
 * Catalog Normalizer
 * Maps a raw ItemList record to the canonical NormalizedItem
 */
import { z } from 'zod';
import { MalformedRecordError } from '../errors.js';
import { extractSampleImages, upgradeImageUrl } from './image-urls.js';
import type { RawRecord } from '../fetchers/types.js';
import type { Normalizer, NormalizedItem } from './types.js';

// Optional fields never fail the record; a wrong type reads as absent
const optionalString = z.string().optional().catch(undefined);
const optionalList = z.array(z.unknown()).optional().catch(undefined);

const rawRecordSchema = z.object({
    content_id: optionalString,
    cid: optionalString,
    title: optionalString,
    URL: optionalString,
    affiliateURL: optionalString,
    date: optionalString,
    maker: z.object({ name: optionalString }).optional().catch(undefined),
    iteminfo: z.object({
        maker: optionalList,
        actress: optionalList,
        genre: optionalList,
    }).optional().catch(undefined),
    imageURL: z.object({
        large: optionalString,
        list: optionalString,
    }).optional().catch(undefined),
    sampleImageURL: z.unknown().optional(),
});

type ParsedRecord = z.infer<typeof rawRecordSchema>;

const namedEntrySchema = z.object({ name: z.string() });

/**
 * Pull the `name` of each `{ name }` entry, trimmed, blanks and repeats removed
 */
function namesOf(entries: unknown[] | undefined): string[] {
    const names: string[] = [];
    for (const entry of entries ?? []) {
        const parsed = namedEntrySchema.safeParse(entry);
        if (!parsed.success) continue;
        const name = parsed.data.name.trim();
        if (name && !names.includes(name)) names.push(name);
    }
    return names;
}

function firstNonEmpty(...values: (string | undefined)[]): string {
    for (const value of values) {
        const trimmed = value?.trim();
        if (trimmed) return trimmed;
    }
    return '';
}

/**
 * Date part of "YYYY-MM-DD hh:mm:ss" as UTC midnight; null when absent or invalid
 */
export function parseReleaseDate(value: string | undefined): Date | null {
    const match = value?.trim().match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (!match) return null;

    const [, year, month, day] = match;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
        return null;
    }
    return date;
}

function resolveMaker(record: ParsedRecord): string {
    const direct = record.maker?.name?.trim();
    if (direct) return direct;
    return namesOf(record.iteminfo?.maker)[0] ?? '';
}

function resolveCover(record: ParsedRecord): string | null {
    const cover = firstNonEmpty(record.imageURL?.large, record.imageURL?.list);
    return cover ? upgradeImageUrl(cover) : null;
}

/**
 * Normalize one raw record
 * Throws MalformedRecordError when the product code or title is missing.
 */
export function normalizeRecord(raw: RawRecord): NormalizedItem {
    const record = rawRecordSchema.parse(raw);

    const productCode = firstNonEmpty(record.content_id, record.cid);
    if (!productCode) {
        throw new MalformedRecordError('Record has no content_id', { title: record.title ?? null });
    }

    const title = firstNonEmpty(record.title);
    if (!title) {
        throw new MalformedRecordError('Record has no title', { externalId: productCode });
    }

    return {
        externalId: productCode,
        productCode,
        title,
        maker: resolveMaker(record),
        actresses: namesOf(record.iteminfo?.actress),
        genres: namesOf(record.iteminfo?.genre),
        releaseDate: parseReleaseDate(record.date),
        productUrl: firstNonEmpty(record.URL, record.affiliateURL),
        coverImageUrl: resolveCover(record),
        sampleImageUrls: extractSampleImages(record.sampleImageURL),
    };
}

export const catalogNormalizer: Normalizer = {
    normalize: normalizeRecord,
};
