/**
 * WordPress REST API client
 * Basic auth with an application password; every call carries an X-Request-ID.
 */
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { PublishAuthError, PublishValidationError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { cmsRequests } from '../observability/metrics.js';
import type { CmsConfig } from '../config/index.js';
import type { CmsClient, Taxonomy, WpErrorBody, WpPost, WpTerm, WritePostRequest } from './types.js';

const API_PREFIX = '/wp-json/wp/v2';
const LOOKUP_STATUSES = 'publish,draft,future,pending,private';

// Credentials rejected, or the CMS is not reachable right now
const FATAL_STATUSES = new Set([401, 403, 502, 503, 504]);

/**
 * A 404 without a WordPress error code, or with `rest_no_route`, means the
 * REST namespace itself is missing: the base URL is wrong for every item
 */
function isMissingNamespace(status: number, code: string | null): boolean {
    return status === 404 && (code === null || code === 'rest_no_route');
}

const postSchema = z.object({
    id: z.number().int(),
    link: z.string().catch(''),
    status: z.string().catch(''),
    // WordPress serializes empty meta as []
    meta: z.record(z.unknown()).catch({}),
});

const termSchema = z.object({
    id: z.number().int(),
    name: z.string(),
});

const errorBodySchema = z.object({
    code: z.string().optional().catch(undefined),
    message: z.string().optional().catch(undefined),
    data: z.object({
        term_id: z.coerce.number().int().optional().catch(undefined),
    }).optional().catch(undefined),
});

export interface CmsConnection {
    baseUrl: string;
    username: string;
    appPassword: string;
    timeoutMs: number;
}

/**
 * Connection settings from the validated CMS config
 */
export function toConnection(cms: CmsConfig): CmsConnection {
    if (!cms.baseUrl || !cms.username || !cms.appPassword) {
        throw new PublishAuthError('CMS publishing needs a base URL, username and application password');
    }
    return {
        baseUrl: cms.baseUrl.replace(/\/+$/, ''),
        username: cms.username,
        appPassword: cms.appPassword,
        timeoutMs: cms.timeoutMs,
    };
}

export function parseErrorBody(text: string): WpErrorBody {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        return { code: null, message: null, termId: null };
    }
    const parsed = errorBodySchema.safeParse(json);
    if (!parsed.success) {
        return { code: null, message: null, termId: null };
    }
    return {
        code: parsed.data.code ?? null,
        message: parsed.data.message ?? null,
        termId: parsed.data.data?.term_id ?? null,
    };
}

function parsePost(body: unknown, path: string): WpPost {
    const parsed = postSchema.safeParse(body);
    if (!parsed.success) {
        throw new PublishValidationError(`CMS response for ${path} has no numeric post id`, 200, null);
    }
    return parsed.data;
}

export function createCmsClient(connection: CmsConnection): CmsClient {
    const authorization = `Basic ${Buffer.from(`${connection.username}:${connection.appPassword}`).toString('base64')}`;

    async function request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
        const url = `${connection.baseUrl}${API_PREFIX}${path}`;
        const requestId = uuidv4();
        const reqLogger = createLogger({ stage: 'publish', requestId });

        reqLogger.debug(`CMS API ${method} ${path}`);

        let response: Response;
        try {
            response = await fetch(url, {
                method,
                headers: {
                    'Accept': 'application/json',
                    'Content-Type': 'application/json',
                    'Authorization': authorization,
                    'X-Request-ID': requestId,
                },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: AbortSignal.timeout(connection.timeoutMs),
            });
        } catch (error) {
            cmsRequests.labels(method, 'network_error').inc();
            const reason = error instanceof Error && error.name === 'TimeoutError'
                ? `timed out after ${connection.timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            throw new PublishAuthError(`CMS request failed: ${reason}`, { method, path, requestId });
        }

        cmsRequests.labels(method, String(response.status)).inc();

        if (!response.ok) {
            const errorBody = parseErrorBody(await response.text());
            reqLogger.warn(`CMS API error: ${response.status}`, {
                status: response.status,
                code: errorBody.code,
            });

            const message = `CMS API error: ${response.status}${errorBody.code ? ` (${errorBody.code})` : ''}` +
                (errorBody.message ? ` - ${errorBody.message}` : '');
            if (FATAL_STATUSES.has(response.status) || isMissingNamespace(response.status, errorBody.code)) {
                throw new PublishAuthError(message, { method, path, status: response.status, requestId });
            }
            throw new PublishValidationError(message, response.status, errorBody.code, {
                method,
                path,
                requestId,
                termId: errorBody.termId,
            });
        }

        try {
            return await response.json();
        } catch {
            throw new PublishValidationError(`CMS returned a non-JSON body for ${path}`, response.status, null);
        }
    }

    return {
        /**
         * GET /{taxonomy}?search=<name>
         */
        async findTerms(taxonomy: Taxonomy, search: string): Promise<WpTerm[]> {
            const query = new URLSearchParams({ search, per_page: '100' });
            const body = await request('GET', `/${taxonomy}?${query.toString()}`);
            const parsed = z.array(termSchema).safeParse(body);
            return parsed.success ? parsed.data : [];
        },

        async createTerm(taxonomy: Taxonomy, name: string): Promise<WpTerm> {
            const path = `/${taxonomy}`;
            const parsed = termSchema.safeParse(await request('POST', path, { name }));
            if (!parsed.success) {
                throw new PublishValidationError(`CMS response for ${path} has no numeric term id`, 200, null);
            }
            return parsed.data;
        },

        /**
         * Post whose `meta.external_id` equals the given id, in any editable status
         */
        async findPostByExternalId(externalId: string): Promise<WpPost | null> {
            const query = new URLSearchParams({
                meta_key: 'external_id',
                meta_value: externalId,
                status: LOOKUP_STATUSES,
                context: 'edit',
                per_page: '10',
            });
            const body = await request('GET', `/posts?${query.toString()}`);
            const parsed = z.array(z.unknown()).safeParse(body);
            if (!parsed.success) return null;

            for (const candidate of parsed.data) {
                const post = postSchema.safeParse(candidate);
                // The meta query is advisory on sites that do not register the key
                if (post.success && post.data.meta['external_id'] === externalId) {
                    return post.data;
                }
            }
            return null;
        },

        async createPost(data: WritePostRequest): Promise<WpPost> {
            return parsePost(await request('POST', '/posts', data), '/posts');
        },

        async updatePost(id: number, data: WritePostRequest): Promise<WpPost> {
            const path = `/posts/${id}`;
            return parsePost(await request('POST', path, data), path);
        },
    };
}
