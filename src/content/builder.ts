/**
 * ContentBuilder
 * Renders the post body: lead image, credits, capped gallery, product link.
 * Output depends only on its inputs.
 */
import { makeAffiliateUrl } from './affiliate.js';
import { buildExcerpt } from './seo.js';
import type { ContentConfig } from '../config/index.js';
import type { ImageAssessment } from '../images/types.js';
import type { NormalizedItem } from '../normalizers/types.js';

export interface ContentDocument {
    html: string;
    /** Sample images embedded in the gallery, in catalog order */
    galleryUrls: string[];
    excerpt: string;
}

const LABELS = {
    actresses: '出演',
    maker: 'メーカー',
    genres: 'ジャンル',
    productLink: '公式ページはこちら',
} as const;

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

function img(url: string, alt: string): string {
    return `<img src="${escapeHtml(url)}" loading="lazy" decoding="async" alt="${escapeHtml(alt)}">`;
}

function leadImageOf(assessment: ImageAssessment, galleryUrls: string[]): string | null {
    if (!assessment.isPlaceholder && assessment.chosenCoverUrl) {
        return assessment.chosenCoverUrl;
    }
    return galleryUrls[0] ?? null;
}

export function buildContent(
    item: NormalizedItem,
    assessment: ImageAssessment,
    options: ContentConfig
): ContentDocument {
    const galleryUrls = item.sampleImageUrls.slice(0, options.maxGallery);
    const parts: string[] = [];

    if (options.prependHtml) parts.push(options.prependHtml);

    const lead = leadImageOf(assessment, galleryUrls);
    if (lead) {
        parts.push(`<figure class="lead-image">${img(lead, item.title)}</figure>`);
    }

    const credits: string[] = [];
    if (item.actresses.length > 0) {
        credits.push(`<strong>${LABELS.actresses}:</strong> ${escapeHtml(item.actresses.join(', '))}`);
    }
    if (item.maker) {
        credits.push(`<strong>${LABELS.maker}:</strong> ${escapeHtml(item.maker)}`);
    }
    if (item.genres.length > 0) {
        credits.push(`<strong>${LABELS.genres}:</strong> ${escapeHtml(item.genres.join(', '))}`);
    }
    if (credits.length > 0) {
        parts.push(`<p>${credits.join('<br>')}</p>`);
    }

    if (galleryUrls.length > 0) {
        const figures = galleryUrls
            .map(url => `<figure class="gallery__item">${img(url, item.title)}</figure>`)
            .join('\n');
        parts.push(`<div class="gallery">\n${figures}\n</div>`);
    }

    const link = makeAffiliateUrl(item.productUrl, options.affiliate);
    if (link) {
        parts.push(`<p><a href="${escapeHtml(link)}" rel="nofollow sponsored" target="_blank">${LABELS.productLink}</a></p>`);
    }

    if (options.appendHtml) parts.push(options.appendHtml);

    return {
        html: parts.join('\n'),
        galleryUrls,
        excerpt: buildExcerpt(item),
    };
}
