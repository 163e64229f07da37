/**
 * Error taxonomy for the fetch → transform → write cycle.
 *
 * NetworkError and ParseError are retryable by the poller. DataShapeError is
 * returned (not thrown) by the transform. RetryExhaustedError is fatal.
 */

export class NetworkError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'NetworkError';
        this.status = status;
    }
}

export class ParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParseError';
    }
}

export type DataShapeDetail = {
    side?: 'CE' | 'PE';
    strikePrice?: number;
    path?: string;
};

export class DataShapeError extends Error {
    readonly detail: DataShapeDetail;

    constructor(message: string, detail: DataShapeDetail = {}) {
        super(message);
        this.name = 'DataShapeError';
        this.detail = detail;
    }
}

export class RetryExhaustedError extends Error {
    readonly attempts: number;

    constructor(symbol: string, attempts: number, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Giving up on ${symbol} after ${attempts} failed attempts: ${reason}`, { cause });
        this.name = 'RetryExhaustedError';
        this.attempts = attempts;
    }
}

export class PollCancelledError extends Error {
    constructor() {
        super('Polling cancelled');
        this.name = 'PollCancelledError';
    }
}

export const isRetryable = (error: unknown): error is NetworkError | ParseError =>
    error instanceof NetworkError || error instanceof ParseError;

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}
