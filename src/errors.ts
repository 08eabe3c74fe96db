/**
 * Error taxonomy for the publishing pipeline
 *
 * Run-level errors carry `fatal: true` and halt the run; everything else is
 * recorded against the item and the batch continues.
 */

export type ErrorKind =
    | 'CONFIG_ERROR'
    | 'UPSTREAM_ERROR'
    | 'MALFORMED_RECORD'
    | 'CLASSIFICATION_INCONCLUSIVE'
    | 'PUBLISH_AUTH_ERROR'
    | 'PUBLISH_VALIDATION_ERROR'
    | 'ITEM_ERROR';

export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly kind: ErrorKind,
        public readonly fatal: boolean,
        public readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigError extends PipelineError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.join('\n')}`, 'CONFIG_ERROR', true, { issues });
    }
}

/**
 * Catalog API unreachable, non-2xx, or malformed top-level payload
 */
export class UpstreamError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'UPSTREAM_ERROR', true, details);
    }
}

export class MalformedRecordError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'MALFORMED_RECORD', false, details);
    }
}

/**
 * CMS rejected the credentials or could not be reached
 */
export class PublishAuthError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'PUBLISH_AUTH_ERROR', true, details);
    }
}

/**
 * CMS rejected a single request; `code` is the WordPress error code when present
 */
export class PublishValidationError extends PipelineError {
    constructor(
        message: string,
        public readonly status: number,
        public readonly code: string | null,
        details?: Record<string, unknown>
    ) {
        super(message, 'PUBLISH_VALIDATION_ERROR', false, { ...details, status, code });
    }
}

/**
 * Structured, machine-parseable failure event
 */
export interface FailureEvent {
    kind: ErrorKind;
    externalId: string | null;
    message: string;
}

export function toFailureEvent(error: unknown, externalId: string | null = null): FailureEvent {
    if (error instanceof PipelineError) {
        return { kind: error.kind, externalId, message: error.message };
    }
    return {
        kind: 'ITEM_ERROR',
        externalId,
        message: error instanceof Error ? error.message : String(error),
    };
}

export function isFatal(error: unknown): boolean {
    return error instanceof PipelineError && error.fatal;
}
