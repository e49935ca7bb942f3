import type {
    AuthorIdResolution,
    OpenAlexAuthor,
    OpenAlexInstitution,
    OpenAlexListResponse,
    OpenAlexWork,
} from '../types/index.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { LookupError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { QueryFilter } from './query-filter.js';
import { isOrcid, normalizeOpenAlexId, normalizeOrcid } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

export const MAX_PER_PAGE = 200;
export const DEFAULT_PER_PAGE = 25;
/** Filter values per request before a clause is split into batches (URL length) */
export const MAX_FILTER_VALUES = 25;
export const DEFAULT_INSTITUTION_AUTHOR_CAP = 1000;

export interface OpenAlexClientOptions {
    /** Contact email for the polite pool */
    email?: string;
    apiKey?: string;
    baseUrl?: string;
    httpClient?: HttpClient;
    /** Aborts in-flight requests and backoff sleeps */
    signal?: AbortSignal;
}

export interface WorkSearch {
    search?: string;
    filter?: QueryFilter;
    sort?: string;
    perPage?: number;
    /** 0 or unset = no cap */
    maxResults?: number;
}

export interface InstitutionMatch {
    id: string;
    displayName: string;
}

/**
 * Ordered, identifier-keyed accumulator. A work seen twice is kept once, at its first position.
 */
export class WorkAccumulator {
    private readonly works = new Map<string, OpenAlexWork>();

    /** @returns false when the work was already present */
    add(work: OpenAlexWork): boolean {
        if (this.works.has(work.id)) return false;
        this.works.set(work.id, work);
        return true;
    }

    get size(): number {
        return this.works.size;
    }

    values(): OpenAlexWork[] {
        return [...this.works.values()];
    }
}

/**
 * Client for the OpenAlex works, authors and institutions endpoints.
 * All calls are sequential; pagination and batches never overlap.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexClient {
    private readonly httpClient: HttpClient;
    private readonly email?: string;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly signal?: AbortSignal;
    private readonly logger = getLogger();

    constructor(options: OpenAlexClientOptions = {}) {
        this.email = options.email;
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? OPENALEX_BASE;
        this.signal = options.signal;
        this.httpClient = options.httpClient ?? createHttpClient({ email: options.email });
    }

    /**
     * Page through works matching the search, splitting oversized filter clauses into batches.
     * Returns works deduplicated by ID in first-seen order, capped at `maxResults` when set.
     */
    async searchWorks(query: WorkSearch): Promise<OpenAlexWork[]> {
        const filter = query.filter ?? QueryFilter.empty();
        const perPage = clampPerPage(query.perPage ?? DEFAULT_PER_PAGE);
        const maxResults = query.maxResults && query.maxResults > 0 ? query.maxResults : 0;
        const accumulator = new WorkAccumulator();

        const batches = filter.batches(MAX_FILTER_VALUES);
        if (batches.length > 1) {
            this.logger.info({ batches: batches.length, batchSize: MAX_FILTER_VALUES }, 'Splitting filter values into batches');
        }

        for (const [index, batch] of batches.entries()) {
            if (batches.length > 1) {
                this.logger.debug({ batch: index + 1, of: batches.length }, 'Processing batch');
            }
            await this.paginateWorks({ ...query, filter: batch }, perPage, maxResults, accumulator);
            if (maxResults > 0 && accumulator.size >= maxResults) break;
        }

        const works = accumulator.values();
        return maxResults > 0 ? works.slice(0, maxResults) : works;
    }

    /**
     * Resolve a mix of OpenAlex author IDs, ORCIDs and plain names to OpenAlex author ID URLs.
     * Names take the top-ranked match; ties are left to the source's ranking.
     */
    async resolveAuthorIds(
        inputs: readonly string[],
        options: { institutionId?: string } = {}
    ): Promise<AuthorIdResolution[]> {
        const resolutions: AuthorIdResolution[] = [];

        for (const input of inputs) {
            const openAlexId = normalizeOpenAlexId(input, 'A');
            if (openAlexId) {
                resolutions.push({ input, via: 'openalex-id', id: openAlexId });
            } else if (isOrcid(input)) {
                resolutions.push({ input, via: 'orcid', id: await this.lookupAuthorByOrcid(input) });
            } else {
                resolutions.push({ input, via: 'name', id: await this.lookupAuthorId(input, options) });
            }
        }

        return resolutions;
    }

    /**
     * Top author match for a display name, preferring authors last seen at `institutionId`.
     */
    async lookupAuthorId(name: string, options: { institutionId?: string } = {}): Promise<string | null> {
        const byName = QueryFilter.empty().with('display_name', name, 'search');

        if (options.institutionId) {
            const scoped = await this.topResult<OpenAlexAuthor>(
                'authors',
                byName.with('last_known_institutions.id', options.institutionId)
            );
            if (scoped) return scoped.id;
            this.logger.debug({ name }, 'No author at institution, retrying without institution filter');
        }

        const match = await this.topResult<OpenAlexAuthor>('authors', byName);
        return match?.id ?? null;
    }

    /**
     * OpenAlex author ID for an ORCID, or null when OpenAlex has no such author.
     */
    async lookupAuthorByOrcid(orcid: string): Promise<string | null> {
        const match = await this.topResult<OpenAlexAuthor>(
            'authors',
            QueryFilter.empty().with('orcid', normalizeOrcid(orcid))
        );
        return match?.id ?? null;
    }

    /**
     * Fuzzy institution lookup. Accepts an institution ID directly.
     * @throws LookupError when nothing matches
     */
    async resolveInstitution(nameOrId: string): Promise<InstitutionMatch> {
        const directId = normalizeOpenAlexId(nameOrId, 'I');
        if (directId) {
            return { id: directId, displayName: nameOrId };
        }

        const match = await this.topResult<OpenAlexInstitution>(
            'institutions',
            QueryFilter.empty().with('display_name', nameOrId, 'search')
        );
        if (!match) {
            throw new LookupError(
                `Institution '${nameOrId}' not found. Please check the spelling or use an institution ID instead.`
            );
        }

        return { id: match.id, displayName: match.display_name ?? nameOrId };
    }

    /**
     * IDs of authors whose last known institution is `institutionId`, capped at `cap`.
     */
    async fetchInstitutionAuthors(institutionId: string, cap = DEFAULT_INSTITUTION_AUTHOR_CAP): Promise<string[]> {
        const authorIds: string[] = [];
        const filter = QueryFilter.empty().with('last_known_institutions.id', institutionId);
        let page = 1;

        while (authorIds.length < cap) {
            const params = new URLSearchParams({
                filter: filter.toString(),
                per_page: String(MAX_PER_PAGE),
                page: String(page),
                select: 'id',
            });
            const data = await this.list<Pick<OpenAlexAuthor, 'id'>>('authors', params);

            for (const author of data.results) {
                if (author.id) authorIds.push(author.id);
            }

            const total = data.meta.count;
            if (data.results.length < MAX_PER_PAGE || (total !== undefined && authorIds.length >= total)) break;
            page++;
        }

        this.logger.debug({ institutionId, authors: Math.min(authorIds.length, cap), cap }, 'Fetched institution authors');
        return authorIds.slice(0, cap);
    }

    getRequestCounts(): Record<string, number> {
        return this.httpClient.getAllRequestCounts();
    }

    // ─── Private helpers ──────────────────────────────────────

    private async paginateWorks(
        query: WorkSearch,
        perPage: number,
        maxResults: number,
        accumulator: WorkAccumulator
    ): Promise<void> {
        let page = 1;
        let fetched = 0;

        for (;;) {
            const params = new URLSearchParams();
            if (query.search) params.set('search', query.search);
            if (query.filter && !query.filter.isEmpty) params.set('filter', query.filter.toString());
            if (query.sort) params.set('sort', query.sort);
            params.set('per_page', String(perPage));
            params.set('page', String(page));

            const data = await this.list<OpenAlexWork>('works', params);
            const { results } = data;
            const total = data.meta.count;
            if (results.length === 0 || total === 0) break;

            fetched += results.length;
            for (const work of results) {
                accumulator.add(work);
                if (maxResults > 0 && accumulator.size >= maxResults) return;
            }

            if (results.length < perPage) break;
            if (total !== undefined && fetched >= total) break;

            page++;
        }
    }

    private async topResult<T>(endpoint: 'authors' | 'institutions', filter: QueryFilter): Promise<T | null> {
        const params = new URLSearchParams({ filter: filter.toString(), per_page: '1', select: 'id,display_name' });
        const data = await this.list<T>(endpoint, params);
        return data.results[0] ?? null;
    }

    private async list<T>(endpoint: 'works' | 'authors' | 'institutions', params: URLSearchParams): Promise<OpenAlexListResponse<T>> {
        this.addAuthParams(params);
        const url = `${this.baseUrl}/${endpoint}?${params.toString()}`;
        this.logger.debug({ url }, `OpenAlex ${endpoint} request`);

        const response = await this.httpClient.get<OpenAlexListResponse<T>>(url, { source: 'openalex', signal: this.signal });
        return {
            meta: { count: response.data.meta?.count },
            results: response.data.results ?? [],
        };
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

export function clampPerPage(perPage: number): number {
    return Math.max(1, Math.min(Math.floor(perPage), MAX_PER_PAGE));
}
