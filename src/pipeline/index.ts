/**
 * Pipeline orchestrator
 * fetch -> normalize -> filter -> classify -> render -> publish, one item at a
 * time in catalog order. Item failures are recorded and skipped; an
 * UpstreamError or PublishAuthError stops the run and keeps what was done.
 */
import { v4 as uuidv4 } from 'uuid';
import { createCmsClient, createPublisher, toConnection, type Publisher } from '../cms/index.js';
import { buildContent, buildExcerpt, type ContentDocument } from '../content/index.js';
import { isFatal, toFailureEvent, type FailureEvent } from '../errors.js';
import { catalogFetcher, type Fetcher, type RawRecord } from '../fetchers/index.js';
import { compileCriteria, createFilterChain, evaluatePlaceholder, type FilterDecision } from '../filters/index.js';
import { createImageClassifier, type ImageAssessment } from '../images/index.js';
import { catalogNormalizer, type NormalizedItem } from '../normalizers/index.js';
import { createLogger, type Logger } from '../observability/logger.js';
import { filterRejections, itemsProcessed } from '../observability/metrics.js';
import type { ContentConfig, PipelineConfig } from '../config/index.js';
import type { ItemClassifier, PipelineRow, RunReport } from './types.js';

export interface PipelineDeps {
    fetcher?: Fetcher;
    classifier?: ItemClassifier;
    /** null disables publishing even when the config enables it */
    publisher?: Publisher | null;
    runId?: string;
}

class RunHalted extends Error {
    constructor(readonly event: FailureEvent) {
        super(event.message);
    }
}

function renderContent(item: NormalizedItem, assessment: ImageAssessment, content: ContentConfig): ContentDocument {
    if (!content.enabled) {
        return { html: '', galleryUrls: [], excerpt: buildExcerpt(item) };
    }
    return buildContent(item, assessment, content);
}

function defaultPublisher(config: PipelineConfig): Publisher | null {
    if (!config.cms.enabled) return null;
    return createPublisher(createCmsClient(toConnection(config.cms)), config.cms);
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<RunReport> {
    const runId = deps.runId ?? uuidv4();
    const log = createLogger({ runId });
    const fetcher = deps.fetcher ?? catalogFetcher;
    const classifier = deps.classifier ?? createImageClassifier(config.images);
    const publisher = deps.publisher === undefined ? defaultPublisher(config) : deps.publisher;
    const chain = createFilterChain(compileCriteria(config.filters));

    const report: RunReport = {
        runId,
        counters: { fetched: 0, normalized: 0, retained: 0, published: 0, created: 0, updated: 0, skipped: 0 },
        rows: [],
        failures: [],
        rejections: {},
        haltedBy: null,
    };

    const recordFailure = (itemLog: Logger, error: unknown, externalId: string | null): FailureEvent => {
        const event = toFailureEvent(error, externalId);
        report.failures.push(event);
        itemLog.warn('Item failed', { ...event });
        return event;
    };

    const reject = (item: NormalizedItem, decision: Exclude<FilterDecision, { retain: true }>): void => {
        report.rejections[decision.rejectedBy] = (report.rejections[decision.rejectedBy] ?? 0) + 1;
        filterRejections.labels(decision.rejectedBy).inc();
        itemsProcessed.labels('filter', 'rejected').inc();
        log.debug('Item rejected', {
            externalId: item.externalId,
            predicate: decision.rejectedBy,
            detail: decision.detail,
        });
    };

    async function processRecord(raw: RawRecord): Promise<void> {
        let item: NormalizedItem;
        try {
            item = catalogNormalizer.normalize(raw);
        } catch (error) {
            itemsProcessed.labels('normalize', 'failed').inc();
            recordFailure(log.child({ stage: 'normalize' }), error, null);
            return;
        }
        report.counters.normalized++;
        itemsProcessed.labels('normalize', 'ok').inc();

        const itemLog = log.child({ externalId: item.externalId });

        const decision = chain.evaluate(item);
        if (!decision.retain) {
            reject(item, decision);
            return;
        }

        let row: PipelineRow;
        try {
            const assessment = await classifier.assess(item);
            for (const check of assessment.inconclusive) {
                report.failures.push({
                    kind: 'CLASSIFICATION_INCONCLUSIVE',
                    externalId: item.externalId,
                    message: `${check.url}: ${check.reason}`,
                });
            }

            const placeholderDecision = evaluatePlaceholder(assessment, config.images.skipPlaceholder);
            if (!placeholderDecision.retain) {
                reject(item, placeholderDecision);
                return;
            }

            row = {
                item,
                assessment,
                content: renderContent(item, assessment, config.content),
                publish: null,
            };
        } catch (error) {
            itemsProcessed.labels('render', 'failed').inc();
            recordFailure(itemLog, error, item.externalId);
            return;
        }

        report.rows.push(row);
        report.counters.retained++;
        itemsProcessed.labels('filter', 'retained').inc();

        if (!publisher) return;

        try {
            const record = await publisher.publish(item, row.content);
            row.publish = record;
            if (record.operation === 'skipped') {
                report.counters.skipped++;
            } else {
                report.counters.published++;
                report.counters[record.operation]++;
            }
            itemsProcessed.labels('publish', record.operation).inc();
        } catch (error) {
            itemsProcessed.labels('publish', 'failed').inc();
            const event = recordFailure(itemLog.child({ stage: 'publish' }), error, item.externalId);
            if (isFatal(error)) throw new RunHalted(event);
        }
    }

    log.info('Run started', {
        floor: config.catalog.floor,
        max: config.catalog.max,
        publishing: publisher !== null,
    });

    try {
        for await (const raw of fetcher.fetch(config.catalog)) {
            report.counters.fetched++;
            await processRecord(raw);
        }
    } catch (error) {
        if (error instanceof RunHalted) {
            report.haltedBy = error.event;
        } else if (isFatal(error)) {
            const event = toFailureEvent(error);
            report.failures.push(event);
            report.haltedBy = event;
        } else {
            throw error;
        }
        log.error('Run halted', error instanceof RunHalted ? undefined : error, { ...report.haltedBy });
    }

    log.info('Run finished', { ...report.counters, failures: report.failures.length, halted: report.haltedBy !== null });

    return report;
}

export * from './types.js';
