/**
 * Configuration module with Zod schema validation
 *
 * The run configuration is built once (environment first, CLI flags on top),
 * validated, frozen, and then passed explicitly to every pipeline stage.
 */
import { z } from 'zod';
import { ConfigError } from '../errors.js';

export const DEFAULT_CATALOG_ENDPOINT = 'https://api.dmm.com/affiliate/v3/ItemList';
export const DEFAULT_AFFILIATE_REDIRECT = 'https://al.dmm.com';

export const SORT_ORDERS = ['date', '-date', 'rank', '-rank', 'price', '-price'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const positiveIntSchema = z.coerce.number().int().positive();
const nonNegativeIntSchema = z.coerce.number().int().min(0);
const YMD_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ymdSchema = z
    .string()
    .regex(YMD_PATTERN, 'Must be a date in YYYY-MM-DD form')
    .refine(value => !YMD_PATTERN.test(value) || isCalendarDate(value), 'Must be a real calendar date');

function isCalendarDate(value: string): boolean {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

const patternListSchema = z
    .array(z.string().min(1, 'Pattern must not be empty'))
    .superRefine((patterns, ctx) => {
        patterns.forEach((pattern, index) => {
            try {
                new RegExp(pattern, 'i');
            } catch (error) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [index],
                    message: `Invalid regular expression: ${error instanceof Error ? error.message : pattern}`,
                });
            }
        });
    })
    .readonly()
    .default([]);

const nameListSchema = z.array(z.string().trim().min(1)).readonly().default([]);

const catalogSchema = z.object({
    endpoint: urlSchema.default(DEFAULT_CATALOG_ENDPOINT),
    apiId: z.string().min(1, 'Catalog API id is required'),
    affiliateId: z.string().min(1, 'Catalog affiliate id is required'),
    site: z.string().min(1).default('FANZA'),
    service: z.string().min(1).default('digital'),
    floor: z.string().min(1).default('videoa'),
    keyword: z.string().min(1).nullable().default(null),
    productCode: z.string().min(1).nullable().default(null),
    gteDate: ymdSchema.nullable().default(null),
    lteDate: ymdSchema.nullable().default(null),
    sort: z.enum(SORT_ORDERS).default('date'),
    hits: z.coerce.number().int().min(1, 'Page size must be at least 1').max(100, 'Page size must be at most 100').default(100),
    max: positiveIntSchema.default(500),
    requestIntervalMs: nonNegativeIntSchema.default(700),
    timeoutMs: positiveIntSchema.default(30000),
}).readonly();

const filtersSchema = z.object({
    includeMaker: patternListSchema,
    excludeMaker: patternListSchema,
    includeActress: patternListSchema,
    excludeActress: patternListSchema,
    includeGenre: patternListSchema,
    excludeGenre: patternListSchema,
    includeTitle: patternListSchema,
    excludeTitle: patternListSchema,
    includeProductCode: patternListSchema,
    excludeProductCode: patternListSchema,
    minSamples: nonNegativeIntSchema.default(1),
    releaseCutoff: ymdSchema.nullable().default(null),
}).readonly();

const imagesSchema = z.object({
    verifyImages: z.boolean().default(false),
    networkCheck: z.boolean().default(true),
    headTimeoutMs: positiveIntSchema.default(3000),
    verifyTls: z.boolean().default(true),
    minImageBytes: nonNegativeIntSchema.default(15000),
    skipPlaceholder: z.boolean().default(false),
}).readonly();

const affiliateSchema = z.object({
    affiliateId: z.string().min(1).nullable().default(null),
    redirectBase: urlSchema.default(DEFAULT_AFFILIATE_REDIRECT),
    channel: z.string().min(1).nullable().default(null),
}).readonly();

const contentSchema = z.object({
    enabled: z.boolean().default(true),
    maxGallery: nonNegativeIntSchema.default(12),
    prependHtml: z.string().default(''),
    appendHtml: z.string().default(''),
    affiliate: affiliateSchema.default({}),
}).readonly();

const cmsSchema = z.object({
    enabled: z.boolean().default(false),
    baseUrl: urlSchema.nullable().default(null),
    username: z.string().min(1).nullable().default(null),
    appPassword: z.string().min(1).nullable().default(null),
    categories: nameListSchema,
    tags: nameListSchema,
    publishNow: z.boolean().default(false),
    futureAt: z.string().datetime({ local: true, offset: true, message: 'Must be an ISO date-time' }).nullable().default(null),
    skipExisting: z.boolean().default(false),
    timeoutMs: positiveIntSchema.default(30000),
}).superRefine((cms, ctx) => {
    if (!cms.enabled) return;
    for (const key of ['baseUrl', 'username', 'appPassword'] as const) {
        if (!cms[key]) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [key],
                message: 'Required when publishing to the CMS',
            });
        }
    }
}).readonly();

const outputSchema = z.object({
    csvPath: z.string().min(1).nullable().default('out/catalog_items.csv'),
    metricsPath: z.string().min(1).nullable().default(null),
}).readonly();

// Configuration schema
export const configSchema = z.object({
    catalog: catalogSchema,
    filters: filtersSchema.default({}),
    images: imagesSchema.default({}),
    content: contentSchema.default({}),
    cms: cmsSchema.default({}),
    output: outputSchema.default({}),
    logLevel: z.enum(LOG_LEVELS).default('info'),
}).readonly();

export type PipelineConfig = z.infer<typeof configSchema>;
export type CatalogConfig = PipelineConfig['catalog'];
export type FiltersConfig = PipelineConfig['filters'];
export type ImagesConfig = PipelineConfig['images'];
export type ContentConfig = PipelineConfig['content'];
export type AffiliateConfig = ContentConfig['affiliate'];
export type CmsConfig = PipelineConfig['cms'];
export type LogLevel = PipelineConfig['logLevel'];

/**
 * Unvalidated, partially filled config object (env or CLI layer)
 */
export type ConfigInput = { [key: string]: unknown };

/**
 * Where a config path usually comes from, for error messages
 */
const PATH_HINTS: Record<string, string> = {
    'catalog.apiId': 'API_ID / --api-id',
    'catalog.affiliateId': 'AFFILIATE_ID / --affiliate-id',
    'cms.baseUrl': 'WP_URL / --wp-url',
    'cms.username': 'WP_USER / --wp-user',
    'cms.appPassword': 'WP_APP_PASS / --wp-app-pass',
    logLevel: 'LOG_LEVEL',
};

function describePath(path: string): string {
    const hint = PATH_HINTS[path];
    return hint ? `${path} (${hint})` : path;
}

/**
 * Map environment variables to a partial config object
 */
export function mapEnvToConfig(env: NodeJS.ProcessEnv): ConfigInput {
    return {
        catalog: {
            apiId: env.API_ID || env.DMM_API_ID || undefined,
            affiliateId: env.FANZA_API_AFFILIATE_ID || env.AFFILIATE_ID || undefined,
            endpoint: env.CATALOG_ENDPOINT || undefined,
        },
        content: {
            affiliate: {
                affiliateId: env.AFFILIATE_ID || null,
                redirectBase: env.AFFILIATE_REDIRECT || undefined,
                channel: env.AFFILIATE_CH || null,
            },
        },
        cms: {
            baseUrl: env.WP_URL || null,
            username: env.WP_USER || null,
            appPassword: env.WP_APP_PASS || null,
            categories: splitList(env.WP_CATEGORIES),
            tags: splitList(env.WP_TAGS),
        },
        logLevel: env.LOG_LEVEL || undefined,
    };
}

/**
 * Deep-merge config inputs; `undefined` in an override keeps the base value
 */
export function mergeConfigInput(base: ConfigInput, override: ConfigInput): ConfigInput {
    const merged: ConfigInput = { ...base };
    for (const [key, value] of Object.entries(override)) {
        if (value === undefined) continue;
        const current = merged[key];
        merged[key] = isPlainObject(current) && isPlainObject(value)
            ? mergeConfigInput(current, value)
            : value;
    }
    return merged;
}

function isPlainObject(value: unknown): value is ConfigInput {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string | undefined | null): string[] {
    if (!value) return [];
    return value.split(',').map(part => part.trim()).filter(part => part.length > 0);
}

/**
 * Validate a raw config object
 * Throws ConfigError listing every invalid path
 */
export function parseConfig(raw: unknown): PipelineConfig {
    const result = configSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            return `  - ${describePath(path)}: ${issue.message}`;
        });
        throw new ConfigError(issues);
    }

    return result.data;
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: PipelineConfig): Record<string, unknown> {
    return {
        catalog: {
            ...cfg.catalog,
            apiId: '[REDACTED]',
            affiliateId: '[REDACTED]',
        },
        filters: cfg.filters,
        images: cfg.images,
        content: {
            enabled: cfg.content.enabled,
            maxGallery: cfg.content.maxGallery,
            affiliate: cfg.content.affiliate.affiliateId ? '[CONFIGURED]' : null,
        },
        cms: {
            enabled: cfg.cms.enabled,
            baseUrl: cfg.cms.baseUrl,
            username: cfg.cms.username,
            appPassword: cfg.cms.appPassword ? '[REDACTED]' : null,
            categories: cfg.cms.categories,
            tags: cfg.cms.tags,
            publishNow: cfg.cms.publishNow,
            futureAt: cfg.cms.futureAt,
            skipExisting: cfg.cms.skipExisting,
        },
        output: cfg.output,
        logLevel: cfg.logLevel,
    };
}
