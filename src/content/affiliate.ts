/**
 * Affiliate link helpers
 * Unwraps nested affiliate redirects and wraps the final URL exactly once.
 */
import type { AffiliateConfig } from '../config/index.js';

const REDIRECT_HOSTS = ['al.dmm.com', 'al.fanza.co.jp', 'al.dmm.co.jp'];
const MAX_HOPS = 5;

function isAffiliateRedirect(url: string): boolean {
    try {
        const host = new URL(url).hostname.toLowerCase();
        return REDIRECT_HOSTS.some(redirectHost => host.endsWith(redirectHost));
    } catch {
        return false;
    }
}

function extractTarget(url: string): string | null {
    try {
        return new URL(url).searchParams.get('lurl');
    } catch {
        return null;
    }
}

export function unwrapAffiliateUrl(url: string, maxHops: number = MAX_HOPS): string {
    let inner = url;
    for (let hops = 0; hops < maxHops && isAffiliateRedirect(inner); hops++) {
        const next = extractTarget(inner);
        if (!next) break;
        inner = next;
    }
    return inner;
}

/**
 * Affiliate URL for a product page; the page URL itself when no affiliate id is set
 */
export function makeAffiliateUrl(base: string, affiliate: AffiliateConfig): string {
    if (!base) return '';
    if (!affiliate.affiliateId) return base;

    const target = unwrapAffiliateUrl(base);
    const redirect = affiliate.redirectBase.replace(/\/+$/, '');
    let url = `${redirect}/?lurl=${encodeURIComponent(target)}&af_id=${encodeURIComponent(affiliate.affiliateId)}`;
    if (affiliate.channel) {
        url += `&ch=${encodeURIComponent(affiliate.channel)}`;
    }
    return url;
}
