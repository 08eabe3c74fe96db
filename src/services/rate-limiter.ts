/**
 * Request pacer
 * Enforces a fixed minimum interval between successive outbound requests
 */
import { setTimeout as delay } from 'node:timers/promises';
import { logger } from '../observability/logger.js';

export interface PacerClock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

const systemClock: PacerClock = {
    now: () => Date.now(),
    sleep: async (ms) => {
        await delay(ms);
    },
};

export class RequestPacer {
    private lastRequestAt: number | null = null;

    constructor(
        private readonly minIntervalMs: number,
        private readonly clock: PacerClock = systemClock
    ) { }

    /**
     * Block until the next request may go out, then record it
     * The first call never waits.
     */
    async acquire(): Promise<number> {
        let waitedMs = 0;

        if (this.lastRequestAt !== null) {
            const elapsed = this.clock.now() - this.lastRequestAt;
            waitedMs = Math.max(0, this.minIntervalMs - elapsed);
            if (waitedMs > 0) {
                logger.debug('Pacing request', { waitMs: waitedMs });
                await this.clock.sleep(waitedMs);
            }
        }

        this.lastRequestAt = this.clock.now();
        return waitedMs;
    }

    getMinIntervalMs(): number {
        return this.minIntervalMs;
    }
}

export function createPacer(minIntervalMs: number, clock?: PacerClock): RequestPacer {
    return new RequestPacer(minIntervalMs, clock);
}
