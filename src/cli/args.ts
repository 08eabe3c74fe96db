/**
 * Command-line flags mapped onto the config input layer
 */
import { parseArgs } from 'node:util';
import { ConfigError } from '../errors.js';
import { splitList, type ConfigInput } from '../config/index.js';

const OPTIONS = {
    // catalog
    'api-id': { type: 'string' },
    'affiliate-id': { type: 'string' },
    'endpoint': { type: 'string' },
    'site': { type: 'string' },
    'service': { type: 'string' },
    'floor': { type: 'string' },
    'keyword': { type: 'string' },
    'cid': { type: 'string' },
    'gte-date': { type: 'string' },
    'lte-date': { type: 'string' },
    'sort': { type: 'string' },
    'hits': { type: 'string' },
    'max': { type: 'string' },
    'sleep': { type: 'string' },
    'timeout': { type: 'string' },

    // filters
    'include-maker': { type: 'string', multiple: true },
    'exclude-maker': { type: 'string', multiple: true },
    'include-actress': { type: 'string', multiple: true },
    'exclude-actress': { type: 'string', multiple: true },
    'include-genre': { type: 'string', multiple: true },
    'exclude-genre': { type: 'string', multiple: true },
    'include-title': { type: 'string', multiple: true },
    'exclude-title': { type: 'string', multiple: true },
    'include-cid-prefix': { type: 'string', multiple: true },
    'exclude-cid-prefix': { type: 'string', multiple: true },
    'min-samples': { type: 'string' },
    'release-after': { type: 'string' },

    // images
    'verify-images': { type: 'boolean' },
    'skip-placeholder': { type: 'boolean' },
    'no-head-check': { type: 'boolean' },
    'head-timeout': { type: 'string' },
    'head-insecure': { type: 'boolean' },
    'min-image-bytes': { type: 'string' },

    // content
    'no-content': { type: 'boolean' },
    'max-gallery': { type: 'string' },
    'prepend-html': { type: 'string' },
    'append-html': { type: 'string' },

    // WordPress
    'wp-post': { type: 'boolean' },
    'wp-url': { type: 'string' },
    'wp-user': { type: 'string' },
    'wp-app-pass': { type: 'string' },
    'wp-categories': { type: 'string' },
    'wp-tags': { type: 'string' },
    'publish': { type: 'boolean' },
    'future-datetime': { type: 'string' },
    'no-update-existing': { type: 'boolean' },

    // output
    'outfile': { type: 'string' },
    'metrics-file': { type: 'string' },
    'log-level': { type: 'string' },
    'debug': { type: 'boolean' },
    'help': { type: 'boolean', short: 'h' },
} as const;

export const USAGE = `Usage: catalog-publisher [options]

Catalog
  --api-id <id>             Catalog API id (API_ID)
  --affiliate-id <id>       Affiliate id sent to the catalog API (AFFILIATE_ID)
  --site, --service, --floor <name>
  --keyword <text>          Free-text search
  --cid <code>              Exact product code
  --gte-date, --lte-date <YYYY-MM-DD>
  --sort <date|-date|rank|-rank|price|-price>
  --hits <1-100>            Page size (default 100)
  --max <n>                 Maximum records to fetch (default 500)
  --sleep <seconds>         Pause between page requests (default 0.7)

Filters (patterns are case-insensitive regular expressions, repeatable)
  --include-maker, --exclude-maker, --include-actress, --exclude-actress,
  --include-genre, --exclude-genre, --include-title, --exclude-title,
  --include-cid-prefix, --exclude-cid-prefix <pattern>
                            Product-code patterns; anchor with ^ for a prefix
  --min-samples <n>         Minimum sample images (default 1)
  --release-after <YYYY-MM-DD>  Drop items released after this date

Images
  --verify-images           Replace placeholder covers with a sample image
  --skip-placeholder        Drop items whose cover is still a placeholder
  --no-head-check           URL heuristics only
  --head-timeout <seconds>  HEAD timeout (default 3)
  --head-insecure           Skip TLS verification on HEAD requests

Content
  --no-content              Do not render post HTML
  --max-gallery <n>         Gallery size (default 12)
  --prepend-html, --append-html <html>

WordPress
  --wp-post                 Publish to WordPress
  --wp-url, --wp-user, --wp-app-pass <value>
  --wp-categories, --wp-tags <a,b,c>
  --publish                 Publish immediately instead of saving drafts
  --future-datetime <ISO>   Schedule posts (wins over --publish)
  --no-update-existing      Leave existing posts untouched

Output
  --outfile <path>          CSV path (default out/catalog_items.csv)
  --metrics-file <path>     Write Prometheus metrics at the end of the run
  --log-level <level>       debug, info, warn, error or silent
  --debug                   Same as --log-level debug
`;

export interface CliArgs {
    help: boolean;
    input: ConfigInput;
}

function secondsToMs(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Math.round(Number(value) * 1000);
}

function listOption(values: string[] | undefined): string[] | undefined {
    return values && values.length > 0 ? values : undefined;
}

function readFlags(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
    } catch (error) {
        throw new ConfigError([`  - ${error instanceof Error ? error.message : String(error)}`]);
    }
}

/**
 * Parse argv into a partial config; absent flags stay undefined so the
 * environment layer shows through
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const values = readFlags(argv);
    const flag = (value: boolean | undefined): true | undefined => (value ? true : undefined);

    const input: ConfigInput = {
        catalog: {
            apiId: values['api-id'],
            affiliateId: values['affiliate-id'],
            endpoint: values['endpoint'],
            site: values['site'],
            service: values['service'],
            floor: values['floor'],
            keyword: values['keyword'],
            productCode: values['cid'],
            gteDate: values['gte-date'],
            lteDate: values['lte-date'],
            sort: values['sort'],
            hits: values['hits'],
            max: values['max'],
            requestIntervalMs: secondsToMs(values['sleep']),
            timeoutMs: secondsToMs(values['timeout']),
        },
        filters: {
            includeMaker: listOption(values['include-maker']),
            excludeMaker: listOption(values['exclude-maker']),
            includeActress: listOption(values['include-actress']),
            excludeActress: listOption(values['exclude-actress']),
            includeGenre: listOption(values['include-genre']),
            excludeGenre: listOption(values['exclude-genre']),
            includeTitle: listOption(values['include-title']),
            excludeTitle: listOption(values['exclude-title']),
            includeProductCode: listOption(values['include-cid-prefix']),
            excludeProductCode: listOption(values['exclude-cid-prefix']),
            minSamples: values['min-samples'],
            releaseCutoff: values['release-after'],
        },
        images: {
            verifyImages: flag(values['verify-images']),
            skipPlaceholder: flag(values['skip-placeholder']),
            networkCheck: values['no-head-check'] ? false : undefined,
            headTimeoutMs: secondsToMs(values['head-timeout']),
            verifyTls: values['head-insecure'] ? false : undefined,
            minImageBytes: values['min-image-bytes'],
        },
        content: {
            enabled: values['no-content'] ? false : undefined,
            maxGallery: values['max-gallery'],
            prependHtml: values['prepend-html'],
            appendHtml: values['append-html'],
        },
        cms: {
            enabled: flag(values['wp-post']),
            baseUrl: values['wp-url'],
            username: values['wp-user'],
            appPassword: values['wp-app-pass'],
            categories: values['wp-categories'] === undefined ? undefined : splitList(values['wp-categories']),
            tags: values['wp-tags'] === undefined ? undefined : splitList(values['wp-tags']),
            publishNow: flag(values['publish']),
            futureAt: values['future-datetime'],
            skipExisting: flag(values['no-update-existing']),
        },
        output: {
            csvPath: values['outfile'],
            metricsPath: values['metrics-file'],
        },
        logLevel: values['debug'] ? 'debug' : values['log-level'],
    };

    return { help: values['help'] === true, input };
}
