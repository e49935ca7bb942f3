import type { SearchBackend, SearchOptions, SearchResponse, SearchResult } from '../types/index.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

/**
 * Tavily search API response (subset).
 */
interface TavilySearchResponse {
    answer?: string | null;
    results?: Array<{ title?: string; url?: string; content?: string }>;
}

export interface TavilyBackendOptions {
    apiKey: string;
    httpClient?: HttpClient;
    signal?: AbortSignal;
}

/**
 * Contextual web search through Tavily.
 *
 * @see https://docs.tavily.com/
 */
export class TavilySearchBackend implements SearchBackend {
    readonly name = 'tavily';
    private readonly apiKey: string;
    private readonly httpClient: HttpClient;
    private readonly signal?: AbortSignal;

    constructor(options: TavilyBackendOptions) {
        this.apiKey = options.apiKey;
        this.httpClient = options.httpClient ?? createHttpClient();
        this.signal = options.signal;
    }

    async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
        const body: Record<string, unknown> = {
            query,
            include_answer: 'advanced',
            max_results: options.maxResults ?? 5,
        };
        if (options.includeDomains?.length) {
            body['include_domains'] = options.includeDomains;
        }

        getLogger().debug({ query, includeDomains: options.includeDomains }, 'Tavily search');

        const response = await this.httpClient.post<TavilySearchResponse>(TAVILY_SEARCH_URL, body, {
            source: 'tavily',
            headers: { Authorization: `Bearer ${this.apiKey}` },
            signal: this.signal,
        });

        const results: SearchResult[] = (response.data.results ?? []).map((result) => ({
            title: result.title ?? '',
            url: result.url ?? '',
            content: result.content ?? '',
        }));

        return { answer: response.data.answer ?? null, results };
    }
}
