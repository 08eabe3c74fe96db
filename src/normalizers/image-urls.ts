/**
 * Catalog image URL helpers
 * Upgrades thumbnail URLs to their large variants and collects sample frames
 */
import { hasPlaceholderMarker } from '../images/heuristics.js';

const IMAGE_FILE = /\.(jpe?g|png|webp)(\?|$)/i;
const SMALL_PACKAGE = /ps\.jpg(\?.*)?$/i;
const SAMPLE_FRAME = /\/([^/]+)\/\1-(\d+)\.(?:jpe?g|png|webp)/i;
const SAMPLE_CDN_HOST = 'awsimgsrc.dmm.co.jp';

export function isImageUrl(url: string): boolean {
    return IMAGE_FILE.test(url);
}

/**
 * Keep only `f=webp` in the query string; the CDN ignores everything else
 */
function keepWebpQuery(url: string): string {
    try {
        const parsed = new URL(url);
        const format = parsed.searchParams.get('f');
        parsed.search = format && format.toLowerCase() === 'webp' ? '?f=webp' : '';
        return parsed.toString();
    } catch {
        return url;
    }
}

/**
 * Normalize one image URL to its large variant
 * - protocol-relative URLs get https
 * - package art `...ps.jpg` becomes `...pl.jpg`
 * - CDN sample frames `/<cid>/<cid>-N.jpg` become `/<cid>/<cid>jp-N.jpg`
 */
export function upgradeImageUrl(raw: string): string {
    let url = raw.trim();
    if (!url) return url;

    if (url.startsWith('//')) url = `https:${url}`;
    url = url.replace(SMALL_PACKAGE, 'pl.jpg');

    if (url.includes(SAMPLE_CDN_HOST)) {
        const match = url.match(SAMPLE_FRAME);
        if (match) {
            const [frame, cid, index] = match;
            url = keepWebpQuery(url.replace(frame, `/${cid}/${cid}jp-${index}.jpg`));
        }
    }

    return url;
}

function collectStrings(value: unknown, out: string[]): void {
    if (typeof value === 'string') {
        out.push(value);
        return;
    }
    if (Array.isArray(value)) {
        for (const entry of value) collectStrings(entry, out);
        return;
    }
    if (typeof value === 'object' && value !== null) {
        for (const entry of Object.values(value)) collectStrings(entry, out);
    }
}

/**
 * Collect sample image URLs from a raw record's `sampleImageURL` block
 * Large frames are visited before small ones; duplicates and placeholders are dropped.
 */
export function extractSampleImages(sampleBlock: unknown): string[] {
    const candidates: string[] = [];

    if (typeof sampleBlock === 'object' && sampleBlock !== null && !Array.isArray(sampleBlock)) {
        const entries = Object.entries(sampleBlock);
        entries.sort(([a], [b]) => Number(b === 'sample_l') - Number(a === 'sample_l'));
        for (const [, value] of entries) collectStrings(value, candidates);
    } else {
        collectStrings(sampleBlock, candidates);
    }

    const seen = new Set<string>();
    const samples: string[] = [];

    for (const candidate of candidates) {
        const url = upgradeImageUrl(candidate);
        if (!url || !isImageUrl(url) || hasPlaceholderMarker(url)) continue;
        if (seen.has(url)) continue;
        seen.add(url);
        samples.push(url);
    }

    return samples;
}
