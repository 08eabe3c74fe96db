/**
 * CSV export of pipeline rows
 * UTF-8 with BOM so spreadsheet tools pick the encoding up.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { PipelineRow } from '../pipeline/types.js';

export const CSV_COLUMNS = [
    'external_id',
    'product_code',
    'title',
    'url',
    'release_date',
    'maker',
    'actresses',
    'genres',
    'sample_images',
    'cover_image',
    'cover_placeholder',
    'post_id',
    'post_status',
    'post_operation',
] as const;

export interface CsvOptions {
    includeContent: boolean;
}

type CsvRecord = Record<string, string>;

function toRecord(row: PipelineRow, includeContent: boolean): CsvRecord {
    const { item, assessment, publish } = row;
    const record: CsvRecord = {
        external_id: item.externalId,
        product_code: item.productCode,
        title: item.title,
        url: item.productUrl,
        release_date: item.releaseDate ? item.releaseDate.toISOString().slice(0, 10) : '',
        maker: item.maker,
        actresses: item.actresses.join(', '),
        genres: item.genres.join(', '),
        sample_images: item.sampleImageUrls.join('|'),
        cover_image: assessment.chosenCoverUrl ?? '',
        cover_placeholder: String(assessment.isPlaceholder),
        post_id: publish ? String(publish.postId) : '',
        post_status: publish?.status ?? '',
        post_operation: publish?.operation ?? '',
    };
    if (includeContent) {
        record['content'] = row.content.html;
    }
    return record;
}

export function toCsv(rows: readonly PipelineRow[], options: CsvOptions): string {
    const columns: string[] = [...CSV_COLUMNS];
    if (options.includeContent) columns.push('content');

    return stringify(rows.map(row => toRecord(row, options.includeContent)), {
        bom: true,
        header: true,
        columns,
    });
}

export async function writeCsv(path: string, rows: readonly PipelineRow[], options: CsvOptions): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, toCsv(rows, options), 'utf8');
}
