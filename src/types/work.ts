/**
 * OpenAlex work record as returned by the works endpoint (subset of relevant fields).
 * Other keys are carried through untouched so direct fields can be copied verbatim.
 */
export interface OpenAlexWork {
    id: string;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_date?: string | null;
    publication_year?: number | null;
    type?: string | null;
    language?: string | null;
    /** Plain-text abstract; most records carry only the inverted index */
    abstract?: string | null;
    abstract_inverted_index?: Record<string, number[]> | null;
    cited_by_count?: number;
    authorships?: OpenAlexAuthorship[];
    concepts?: Array<{ id?: string; display_name?: string; score?: number; level?: number }>;
    keywords?: Array<{ id?: string; display_name?: string; keyword?: string; score?: number }>;
    primary_location?: OpenAlexLocation | null;
    open_access?: { is_oa?: boolean; oa_status?: string; oa_url?: string | null } | null;
    [key: string]: unknown;
}

export type AuthorPosition = 'first' | 'middle' | 'last';

export interface OpenAlexAuthorship {
    author_position?: AuthorPosition;
    author?: {
        id?: string;
        display_name?: string;
        orcid?: string | null;
    } | null;
    institutions?: Array<{ id?: string; display_name?: string }>;
}

export interface OpenAlexLocation {
    landing_page_url?: string | null;
    source?: {
        id?: string;
        display_name?: string;
        issn_l?: string | null;
        issn?: string[] | string | null;
        type?: string;
    } | null;
}

export interface OpenAlexAuthor {
    id: string;
    display_name?: string;
    orcid?: string | null;
}

export interface OpenAlexInstitution {
    id: string;
    display_name?: string;
}

/**
 * List envelope shared by the works, authors and institutions endpoints.
 * `meta.count` is undefined when the response carries no total.
 */
export interface OpenAlexListResponse<T> {
    meta: { count?: number; per_page?: number; page?: number | null };
    results: T[];
}

/**
 * Author as emitted in a formatted work (exactly one per work, or none).
 */
export interface FormattedAuthor {
    id: string;
    name: string;
    orcid: string | null;
    position?: AuthorPosition;
}

export interface FormattedSource {
    id: string;
    name: string;
    issn: string;
    type: string;
}

export interface FormattedConcept {
    id: string;
    name: string;
    score: number;
}

/**
 * Formatted work: output key → value. Keys depend on the resolved field set.
 */
export type FormattedWork = Record<string, unknown>;

/**
 * Output artifact written by the exporter. Stable field-for-field.
 */
export interface ExportDocument {
    works: FormattedWork[];
    metadata: {
        total: number;
        timestamp: string;
        query: Record<string, unknown>;
    };
}
