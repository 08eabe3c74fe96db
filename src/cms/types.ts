/**
 * WordPress REST API type definitions
 */

export type Taxonomy = 'categories' | 'tags';
export const POST_STATUSES = ['draft', 'future', 'publish'] as const;
export type PostStatus = typeof POST_STATUSES[number];
export type PublishOperation = 'created' | 'updated' | 'skipped';

/**
 * Post fields the publisher reads back
 */
export interface WpPost {
    id: number;
    link: string;
    status: string;
    meta: Record<string, unknown>;
}

/**
 * Category or tag
 */
export interface WpTerm {
    id: number;
    name: string;
}

/**
 * Error body WordPress returns with a 4xx/5xx
 * `data.term_id` is set on `term_exists`
 */
export interface WpErrorBody {
    code: string | null;
    message: string | null;
    termId: number | null;
}

/**
 * POST /posts and POST /posts/:id body
 */
export interface WritePostRequest {
    title: string;
    content: string;
    excerpt: string;
    status: PostStatus;
    categories: number[];
    tags: number[];
    meta: { external_id: string };
    date?: string;
}

/**
 * Outcome of publishing one item
 */
export interface PublishRecord {
    postId: number;
    status: PostStatus;
    operation: PublishOperation;
    link: string;
}

export interface CmsClient {
    findTerms(taxonomy: Taxonomy, search: string): Promise<WpTerm[]>;
    createTerm(taxonomy: Taxonomy, name: string): Promise<WpTerm>;
    findPostByExternalId(externalId: string): Promise<WpPost | null>;
    createPost(data: WritePostRequest): Promise<WpPost>;
    updatePost(id: number, data: WritePostRequest): Promise<WpPost>;
}
