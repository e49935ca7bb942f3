/**
 * Upstream HTTP failure with endpoint and status context.
 * Status 0 means the request never produced a response.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly url: string,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * HTTP 429 persisted through every retry attempt.
 */
export class RateLimitError extends HttpError {
    constructor(url: string, public readonly attempts: number, response?: unknown) {
        super(`Rate limit exceeded after ${attempts} attempts: ${url}`, 429, true, url, response);
        this.name = 'RateLimitError';
    }
}

/**
 * Transient connection failure or timeout persisted through every retry attempt.
 */
export class NetworkError extends HttpError {
    constructor(message: string, url: string, public readonly attempts: number) {
        super(message, 0, true, url);
        this.name = 'NetworkError';
    }
}

/**
 * User input error (bad field name, unknown institution, no author match, missing query).
 */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class FieldValidationError extends ValidationError {
    constructor(public readonly invalidFields: string[]) {
        super(`Unknown field${invalidFields.length === 1 ? '' : 's'}: ${invalidFields.join(', ')}. Run 'alexport fields' to list available fields.`);
        this.name = 'FieldValidationError';
    }
}

export class LookupError extends ValidationError {
    constructor(message: string) {
        super(message);
        this.name = 'LookupError';
    }
}

/**
 * Misconfiguration the caller explicitly opted into failing on (strict mode).
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Whether an error is the result of an AbortSignal firing.
 */
export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export const EXIT_CODES = {
    failure: 1,
    validation: 2,
    rateLimit: 3,
    upstream: 4,
    configuration: 5,
    aborted: 130,
} as const;

/**
 * Map a raised error to a process exit code. Used only at the CLI boundary.
 */
export function exitCodeFor(error: unknown): number {
    if (error instanceof ValidationError) return EXIT_CODES.validation;
    if (error instanceof RateLimitError) return EXIT_CODES.rateLimit;
    if (error instanceof HttpError) return EXIT_CODES.upstream;
    if (error instanceof ConfigurationError) return EXIT_CODES.configuration;
    if (isAbortError(error)) return EXIT_CODES.aborted;
    return EXIT_CODES.failure;
}
