/**
 * ImageClassifier
 * Decides whether the cover is a placeholder and, when it is, promotes the
 * first acceptable sample image.
 *
 * Stage 1 (always): URL heuristics.
 * Stage 2 (networkCheck, with verifyImages or skipPlaceholder): HEAD probe.
 * An inconclusive probe leaves the heuristic verdict in place, so a dead
 * endpoint yields the same assessment as running with the network pass
 * disabled.
 */
import { createLogger, type Logger } from '../observability/logger.js';
import { imageChecks } from '../observability/metrics.js';
import { isPlaceholderUrl } from './heuristics.js';
import { headProbe } from './probe.js';
import type { ImagesConfig } from '../config/index.js';
import type { NormalizedItem } from '../normalizers/types.js';
import type { CoverVerdict, ImageAssessment, ImageProbe, InconclusiveCheck } from './types.js';

export class ImageClassifier {
    private readonly log: Logger;

    constructor(
        private readonly options: ImagesConfig,
        private readonly probe: ImageProbe = headProbe,
        log?: Logger
    ) {
        this.log = log ?? createLogger({ stage: 'classify' });
    }

    /**
     * HEAD checks only run when the verdict can change the outcome
     */
    private get probing(): boolean {
        return this.options.networkCheck && (this.options.verifyImages || this.options.skipPlaceholder);
    }

    async assess(item: NormalizedItem): Promise<ImageAssessment> {
        const inconclusive: InconclusiveCheck[] = [];
        const original = item.coverImageUrl;
        const verdict = await this.classifyUrl(original, inconclusive);

        if (!verdict.placeholder) {
            return {
                isPlaceholder: false,
                chosenCoverUrl: original,
                originalCoverUrl: original,
                coverReplaced: false,
                verdict,
                inconclusive,
            };
        }

        const replacement = this.options.verifyImages
            ? await this.findReplacement(item.sampleImageUrls, inconclusive)
            : null;

        if (replacement) {
            this.log.debug('Cover replaced with sample image', {
                externalId: item.externalId,
                from: original,
                to: replacement,
            });
        }

        return {
            isPlaceholder: replacement === null,
            chosenCoverUrl: replacement ?? original,
            originalCoverUrl: original,
            coverReplaced: replacement !== null,
            verdict,
            inconclusive,
        };
    }

    /**
     * Two-stage verdict for one URL
     * The network never turns a heuristic "not placeholder" into "placeholder"
     * unless the HEAD response itself says so.
     */
    async classifyUrl(url: string | null, inconclusive: InconclusiveCheck[] = []): Promise<CoverVerdict> {
        const heuristic = isPlaceholderUrl(url);
        imageChecks.labels('heuristic', heuristic ? 'placeholder' : 'genuine').inc();

        if (heuristic || !url || !this.probing) {
            return { source: 'HEURISTIC_ONLY', placeholder: heuristic };
        }

        const result = await this.probe(url, {
            timeoutMs: this.options.headTimeoutMs,
            verifyTls: this.options.verifyTls,
            minImageBytes: this.options.minImageBytes,
        });
        imageChecks.labels('head', result.outcome).inc();

        switch (result.outcome) {
            case 'placeholder':
                return { source: 'NETWORK_CONFIRMED', placeholder: true, httpStatus: result.status };
            case 'genuine':
                return { source: 'NETWORK_CONFIRMED', placeholder: false, httpStatus: result.status };
            case 'inconclusive':
                inconclusive.push({ url, reason: result.reason });
                this.log.warn('Image check inconclusive', {
                    kind: 'CLASSIFICATION_INCONCLUSIVE',
                    url,
                    message: result.reason,
                });
                return { source: 'HEURISTIC_ONLY', placeholder: heuristic };
        }
    }

    /**
     * First sample, in catalog order, that is not judged a placeholder
     */
    private async findReplacement(samples: string[], inconclusive: InconclusiveCheck[]): Promise<string | null> {
        for (const sample of samples) {
            const verdict = await this.classifyUrl(sample, inconclusive);
            if (!verdict.placeholder) return sample;
        }
        return null;
    }
}

export function createImageClassifier(options: ImagesConfig, probe?: ImageProbe): ImageClassifier {
    return new ImageClassifier(options, probe);
}
