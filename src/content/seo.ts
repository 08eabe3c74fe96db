/**
 * SEO excerpt for a catalog post
 */
import type { NormalizedItem } from '../normalizers/types.js';

export const EXCERPT_MAX_LENGTH = 120;
const CALL_TO_ACTION = '公式でサンプル動画と特典をチェック。';

export function truncate(text: string, max: number): string {
    const trimmed = text.trim();
    return trimmed.length <= max ? trimmed : `${trimmed.slice(0, max).trimEnd()}…`;
}

/**
 * "[CODE]Title（Maker）。出演：A、B。" followed by the call to action
 */
export function buildExcerpt(item: NormalizedItem): string {
    let lead = `[${item.productCode}]${item.title}`;
    if (item.maker) lead += `（${item.maker}）`;

    let tail = '。';
    if (item.actresses.length > 0) tail += `出演：${item.actresses.join('、')}。`;
    tail += CALL_TO_ACTION;

    return truncate(lead + tail, EXCERPT_MAX_LENGTH);
}
