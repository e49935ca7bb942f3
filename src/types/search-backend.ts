/**
 * Interface for contextual web-search backends used by the name resolver.
 * Query in, ranked results out.
 */
export interface SearchBackend {
    /** Backend name */
    readonly name: string;

    /**
     * Run a search.
     * @param query - Free-text query
     * @param options - Optional domain restriction and result count
     */
    search(query: string, options?: SearchOptions): Promise<SearchResponse>;
}

export interface SearchOptions {
    /** Only return results from these domains */
    includeDomains?: string[];
    maxResults?: number;
}

export interface SearchResult {
    title: string;
    url: string;
    content: string;
}

/**
 * Ranked search results. `answer` is a synthesized summary when the backend provides one.
 */
export interface SearchResponse {
    answer: string | null;
    results: SearchResult[];
}
