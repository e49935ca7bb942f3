import { getLogger } from './logger.js';
import { HttpError, NetworkError, RateLimitError } from './errors.js';

/**
 * Error classification for HTTP responses.
 * Only 429 is retried among HTTP statuses; other 4xx/5xx surface immediately.
 */
const RETRYABLE_STATUS_CODES = new Set([429]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs, signal);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },  // 10/s with polite pool
    tavily: { tokensPerSecond: 2, maxBurst: 2 },
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

const DEFAULT_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    /** Total attempts per request, including the first */
    maxAttempts?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    rateLimits?: Record<string, RateLimit>;
    /** Replaces the backoff sleep (tests) */
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * States of the bounded retry loop. Every transition goes through `request()`.
 */
export type RetryState<T> =
    | { phase: 'attempting'; attempt: number }
    | { phase: 'waiting'; attempt: number; delayMs: number; failure: RetryableFailure }
    | { phase: 'succeeded'; attempt: number; response: HttpResponse<T> }
    | { phase: 'exhausted'; attempt: number; failure: RetryableFailure };

export type RetryableFailure =
    | { kind: 'rate-limited'; status: number; retryAfterMs: number | null; response: unknown }
    | { kind: 'network'; code: string; message: string };

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxAttempts: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        const version = options.version ?? '1.0.0';
        this.userAgent = options.email
            ? `alexport/${version} (mailto:${options.email})`
            : `alexport/${version}`;
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
        this.initialBackoff = options.initialBackoffMs ?? 1000;
        this.maxBackoff = options.maxBackoffMs ?? 30000;
        this.rateLimits = { ...RATE_LIMITS, ...options.rateLimits };
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
        } = options;

        const logger = getLogger();

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            'Accept': 'application/json',
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        let state: RetryState<T> = { phase: 'attempting', attempt: 1 };

        for (;;) {
            switch (state.phase) {
                case 'attempting': {
                    await this.getBucket(source).acquire(signal);
                    this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

                    const outcome = await this.attempt<T>(url, method, requestHeaders, requestBody, timeout, signal);
                    if (outcome.ok) {
                        state = { phase: 'succeeded', attempt: state.attempt, response: outcome.response };
                    } else if (state.attempt >= this.maxAttempts) {
                        state = { phase: 'exhausted', attempt: state.attempt, failure: outcome.failure };
                    } else {
                        const delayMs: number = outcome.failure.kind === 'rate-limited' && outcome.failure.retryAfterMs !== null
                            ? outcome.failure.retryAfterMs
                            : this.calculateBackoff(state.attempt);
                        state = { phase: 'waiting', attempt: state.attempt, delayMs, failure: outcome.failure };
                    }
                    break;
                }
                case 'waiting': {
                    const { failure, attempt, delayMs }: Extract<RetryState<T>, { phase: 'waiting' }> = state;
                    logger.warn(
                        failure.kind === 'rate-limited'
                            ? { status: failure.status, attempt, backoffMs: delayMs, url }
                            : { errorCode: failure.code, attempt, backoffMs: delayMs, url },
                        failure.kind === 'rate-limited' ? 'Rate limited, backing off' : 'Retryable network error, backing off'
                    );
                    await this.sleep(delayMs, signal);
                    state = { phase: 'attempting', attempt: attempt + 1 };
                    break;
                }
                case 'succeeded':
                    return state.response;
                case 'exhausted': {
                    const { failure, attempt }: Extract<RetryState<T>, { phase: 'exhausted' }> = state;
                    if (failure.kind === 'rate-limited') {
                        throw new RateLimitError(url, attempt, failure.response);
                    }
                    throw new NetworkError(`Network error after ${attempt} attempts (${failure.code}): ${failure.message}`, url, attempt);
                }
            }
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    /**
     * One network round trip. Resolves with either a response or a retryable failure;
     * throws for everything that must not be retried.
     */
    private async attempt<T>(
        url: string,
        method: string,
        headers: Record<string, string>,
        body: string | undefined,
        timeout: number,
        signal: AbortSignal | undefined
    ): Promise<{ ok: true; response: HttpResponse<T> } | { ok: false; failure: RetryableFailure }> {
        signal?.throwIfAborted();

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);
        const onAbort = (): void => controller.abort(signal?.reason);
        signal?.addEventListener('abort', onAbort, { once: true });

        let response: Response;
        let data: T;
        try {
            response = await fetch(url, {
                method,
                headers,
                body,
                signal: controller.signal,
            });

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            if (contentType.includes('application/json')) {
                data = (await response.json()) as T;
            } else {
                data = (await response.text()) as T;
            }
        } catch (error) {
            if (signal?.aborted) {
                throw signal.reason;
            }
            if (error instanceof Error && error.name === 'AbortError') {
                return { ok: false, failure: { kind: 'network', code: 'ETIMEDOUT', message: `Request timeout after ${timeout}ms` } };
            }

            const code = errorCode(error);
            if (code && RETRYABLE_ERROR_CODES.has(code)) {
                return { ok: false, failure: { kind: 'network', code, message: errorMessage(error) } };
            }

            throw new HttpError(`Network error: ${errorMessage(error)}`, 0, false, url);
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }

        // Build headers map
        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });

        if (!response.ok) {
            if (RETRYABLE_STATUS_CODES.has(response.status)) {
                return {
                    ok: false,
                    failure: {
                        kind: 'rate-limited',
                        status: response.status,
                        retryAfterMs: this.parseRetryAfter(response.headers.get('retry-after')),
                        response: data,
                    },
                };
            }

            throw new HttpError(
                `HTTP ${response.status}: ${response.statusText} (${method} ${url})`,
                response.status,
                false,
                url,
                data
            );
        }

        return { ok: true, response: { status: response.status, headers: responseHeaders, data, ok: true } };
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? this.rateLimits['default'] ?? DEFAULT_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = Number(header.trim());
        if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    /**
     * Exponential backoff: initial * 2^(attempt-1), capped.
     */
    calculateBackoff(attempt: number): number {
        return Math.min(this.maxBackoff, this.initialBackoff * Math.pow(2, attempt - 1));
    }
}

function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    // undici wraps socket errors: TypeError('fetch failed', { cause })
    const cause = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Sleep for the specified number of milliseconds. Rejects with the abort reason if `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
