/**
 * A raw author name, optionally with institutional context used for disambiguation.
 */
export interface AuthorQuery {
    name: string;
    lastName?: string;
    firstInitial?: string;
    department?: string;
    college?: string;
}

/**
 * Outcome of abbreviated-name resolution. `value` is always usable:
 * the full name when resolved, otherwise the original query name.
 */
export type NameResolution =
    | { resolved: true; value: string; reason: 'search-match' }
    | {
        resolved: false;
        value: string;
        reason: 'not-abbreviated' | 'backend-unavailable' | 'no-candidate' | 'search-failed';
    };

/**
 * AuthorQuery after name resolution and ID lookup.
 */
export interface ResolvedAuthor {
    query: AuthorQuery;
    /** Name used for the lookup (full name when resolution succeeded) */
    name: string;
    nameResolution: NameResolution;
    /** OpenAlex author ID URL, or null when no author matched */
    id: string | null;
}

/**
 * How an author input was turned into an OpenAlex author ID.
 */
export type AuthorIdSource = 'openalex-id' | 'orcid' | 'name';

export interface AuthorIdResolution {
    input: string;
    via: AuthorIdSource;
    id: string | null;
}
