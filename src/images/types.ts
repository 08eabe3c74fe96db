/**
 * Image classification types
 */

/**
 * How a placeholder verdict was reached
 * HEURISTIC_ONLY: URL patterns alone; NETWORK_CONFIRMED: a HEAD response backed it.
 */
export type CoverVerdict =
    | { source: 'HEURISTIC_ONLY'; placeholder: boolean }
    | { source: 'NETWORK_CONFIRMED'; placeholder: boolean; httpStatus: number };

export type ProbeResult =
    | { outcome: 'placeholder'; status: number; reason: string }
    | { outcome: 'genuine'; status: number }
    | { outcome: 'inconclusive'; status: number | null; reason: string };

export interface ProbeOptions {
    timeoutMs: number;
    verifyTls: boolean;
    minImageBytes: number;
}

export type ImageProbe = (url: string, options: ProbeOptions) => Promise<ProbeResult>;

export interface InconclusiveCheck {
    url: string;
    reason: string;
}

export interface ImageAssessment {
    /** Describes the chosen cover, after any replacement */
    isPlaceholder: boolean;
    chosenCoverUrl: string | null;
    originalCoverUrl: string | null;
    coverReplaced: boolean;
    /** Verdict for the original cover */
    verdict: CoverVerdict;
    inconclusive: InconclusiveCheck[];
}
