import { vi } from 'vitest';
import { HttpClient, type HttpClientOptions } from '../utils/http-client.js';

const UNLIMITED = { tokensPerSecond: 1_000_000, maxBurst: 1_000_000 };

export function jsonResponse(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
    return new Response(JSON.stringify(body), {
        status: init.status ?? 200,
        headers: { 'content-type': 'application/json', ...init.headers },
    });
}

export function toUrl(input: string | URL | Request): URL {
    if (typeof input === 'string') return new URL(input);
    if (input instanceof URL) return input;
    return new URL(input.url);
}

/**
 * HttpClient without rate limiting or real backoff sleeps.
 */
export function testHttpClient(options: HttpClientOptions = {}): HttpClient {
    return new HttpClient({
        rateLimits: { openalex: UNLIMITED, tavily: UNLIMITED, default: UNLIMITED },
        sleep: async () => {},
        ...options,
    });
}

/**
 * Stub the global fetch with a URL → JSON body router.
 */
export function stubFetch(route: (url: URL, init?: RequestInit) => unknown) {
    const fetchMock = vi.fn<typeof fetch>(async (input, init) => jsonResponse(route(toUrl(input), init)));
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

/**
 * URLs of every request made through a fetch mock.
 */
export function requestedUrls(fetchMock: ReturnType<typeof stubFetch>): URL[] {
    return fetchMock.mock.calls.map(([input]) => toUrl(input));
}

export function page<T>(results: T[], count = results.length) {
    return { meta: { count }, results };
}
