/**
 * Pipeline run types
 */
import type { PublishRecord } from '../cms/types.js';
import type { ContentDocument } from '../content/builder.js';
import type { FailureEvent } from '../errors.js';
import type { ImageAssessment } from '../images/types.js';
import type { NormalizedItem } from '../normalizers/types.js';

/**
 * One retained item, in catalog order
 * `publish` is null when publishing is off or failed for this item.
 */
export interface PipelineRow {
    item: NormalizedItem;
    assessment: ImageAssessment;
    content: ContentDocument;
    publish: PublishRecord | null;
}

export interface RunCounters {
    fetched: number;
    normalized: number;
    retained: number;
    /** created + updated */
    published: number;
    created: number;
    updated: number;
    skipped: number;
}

export interface RunReport {
    runId: string;
    counters: RunCounters;
    rows: PipelineRow[];
    failures: FailureEvent[];
    /** Rejection count per predicate name */
    rejections: Record<string, number>;
    /** The run-level failure that stopped the run, if any */
    haltedBy: FailureEvent | null;
}

export interface ItemClassifier {
    assess(item: NormalizedItem): Promise<ImageAssessment>;
}
