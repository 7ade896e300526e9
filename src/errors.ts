/**
 * Error types shared across the pipeline.
 *
 * Per-URL failures (PageFetchError, SummarizerError) are caught by the batch
 * runner and recorded in the report. Everything else propagates to the CLI.
 */

export class PageFetchError extends Error {
    readonly url: string;
    /** HTTP status when the server answered with a non-2xx response */
    readonly status?: number;

    constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'PageFetchError';
        this.url = url;
        this.status = options?.status;
    }
}

export class SummarizerError extends Error {
    /** HTTP status of the API response, if there was one */
    readonly status?: number;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'SummarizerError';
        this.status = options?.status;
    }
}

export class SummarizerConnectionError extends SummarizerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SummarizerConnectionError';
    }
}

export class SummarizerRateLimitError extends SummarizerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, { status: 429, cause: options?.cause });
        this.name = 'SummarizerRateLimitError';
    }
}

export class SummarizerAuthError extends SummarizerError {
    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super(message, options);
        this.name = 'SummarizerAuthError';
    }
}

export class SummarizerApiError extends SummarizerError {
    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super(message, options);
        this.name = 'SummarizerApiError';
    }
}

/** Raised under the `abort` failure policy for the first URL that fails. */
export class BatchAbortedError extends Error {
    readonly url: string;

    constructor(url: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Batch aborted at ${url}: ${reason}`, { cause });
        this.name = 'BatchAbortedError';
        this.url = url;
    }
}

export class EmptyInputError extends Error {
    readonly file: string;

    constructor(file: string) {
        super(`No content found in ${file}`);
        this.name = 'EmptyInputError';
        this.file = file;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/** Short human-readable reason for a caught value. */
export function describeError(err: unknown): string {
    if (err instanceof Error) return `${err.name}: ${err.message}`;
    return String(err);
}
