/**
 * Idempotent post upsert keyed by `meta.external_id`
 * The CMS is the only record of what has been published; nothing is cached
 * across runs.
 */
import { PublishValidationError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { publishOperations } from '../observability/metrics.js';
import type { ContentDocument } from '../content/builder.js';
import type { CmsConfig } from '../config/index.js';
import type { NormalizedItem } from '../normalizers/types.js';
import { POST_STATUSES, type CmsClient, type PostStatus, type PublishRecord, type Taxonomy, type WritePostRequest } from './types.js';

const log = createLogger({ stage: 'publish' });

export interface Publisher {
    publish(item: NormalizedItem, content: ContentDocument): Promise<PublishRecord>;
}

/**
 * A scheduled date wins over publish-now
 */
export function resolvePostStatus(options: { futureAt: string | null; publishNow: boolean }): PostStatus {
    if (options.futureAt) return 'future';
    return options.publishNow ? 'publish' : 'draft';
}

function isPostStatus(value: string): value is PostStatus {
    return POST_STATUSES.some(status => status === value);
}

function termIdFromError(error: PublishValidationError): number | null {
    const termId = error.details['termId'];
    return typeof termId === 'number' ? termId : null;
}

export function createPublisher(client: CmsClient, cms: CmsConfig): Publisher {
    const status = resolvePostStatus(cms);
    const termCache = new Map<string, number>();

    async function findTermId(taxonomy: Taxonomy, name: string): Promise<number | null> {
        const wanted = name.toLowerCase();
        const terms = await client.findTerms(taxonomy, name);
        const match = terms.find(term => term.name.toLowerCase() === wanted);
        return match ? match.id : null;
    }

    async function resolveTerm(taxonomy: Taxonomy, name: string): Promise<number> {
        const key = `${taxonomy}:${name.toLowerCase()}`;
        const cached = termCache.get(key);
        if (cached !== undefined) return cached;

        let id = await findTermId(taxonomy, name);
        if (id === null) {
            try {
                id = (await client.createTerm(taxonomy, name)).id;
                log.info('CMS term created', { taxonomy, name, termId: id });
            } catch (error) {
                if (!(error instanceof PublishValidationError) || error.code !== 'term_exists') {
                    throw error;
                }
                // Created concurrently, or the search missed an HTML-escaped name
                id = (await findTermId(taxonomy, name)) ?? termIdFromError(error);
                if (id === null) throw error;
            }
        }

        termCache.set(key, id);
        return id;
    }

    async function resolveTerms(taxonomy: Taxonomy, names: readonly string[]): Promise<number[]> {
        const ids: number[] = [];
        for (const name of names) {
            const id = await resolveTerm(taxonomy, name);
            if (!ids.includes(id)) ids.push(id);
        }
        return ids;
    }

    return {
        async publish(item: NormalizedItem, content: ContentDocument): Promise<PublishRecord> {
            const existing = await client.findPostByExternalId(item.externalId);

            if (existing && cms.skipExisting) {
                // Report what the post is, not what this run would have made it
                const current = isPostStatus(existing.status) ? existing.status : status;
                publishOperations.labels('skipped', current).inc();
                log.info('Existing post left untouched', { externalId: item.externalId, postId: existing.id });
                return {
                    postId: existing.id,
                    status: current,
                    operation: 'skipped',
                    link: existing.link,
                };
            }

            const data: WritePostRequest = {
                title: item.title,
                content: content.html,
                excerpt: content.excerpt,
                status,
                categories: await resolveTerms('categories', cms.categories),
                tags: await resolveTerms('tags', cms.tags),
                meta: { external_id: item.externalId },
            };
            if (status === 'future' && cms.futureAt) {
                data.date = cms.futureAt;
            }

            const post = existing
                ? await client.updatePost(existing.id, data)
                : await client.createPost(data);
            const operation = existing ? 'updated' : 'created';

            publishOperations.labels(operation, status).inc();
            log.info(`Post ${operation}`, { externalId: item.externalId, postId: post.id, status });

            return {
                postId: post.id,
                status,
                operation,
                link: post.link,
            };
        },
    };
}
