/**
 * URL-only placeholder heuristics (no network)
 */

/**
 * Filename/path markers the catalog uses for stand-in artwork
 */
export const PLACEHOLDER_MARKERS = [
    'now_print',
    'nowprinting',
    'noimage',
    'no_image',
    'comingsoon',
    'coming_soon',
] as const;

export function hasPlaceholderMarker(url: string): boolean {
    const lower = url.toLowerCase();
    return PLACEHOLDER_MARKERS.some(marker => lower.includes(marker));
}

/**
 * Heuristic verdict: an absent or marker-bearing URL is a placeholder
 */
export function isPlaceholderUrl(url: string | null | undefined): boolean {
    if (!url || url.trim().length === 0) return true;
    return hasPlaceholderMarker(url);
}
