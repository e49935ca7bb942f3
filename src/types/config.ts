/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * User-facing sort options accepted by the CLI.
 */
export type SortOption = 'year' | 'year-desc' | 'year-asc' | 'citations' | 'citations-desc' | 'citations-asc';

/**
 * Sort options mapped to OpenAlex `sort` parameter values.
 */
export const SORT_PARAMS: Record<SortOption, string> = {
    'year': 'publication_year:desc',
    'year-desc': 'publication_year:desc',
    'year-asc': 'publication_year:asc',
    'citations': 'cited_by_count:desc',
    'citations-desc': 'cited_by_count:desc',
    'citations-asc': 'cited_by_count:asc',
};

/**
 * Institution used for the "restricted to this institution" mode.
 */
export interface AffiliationConfig {
    institution: string;
    /** Upper bound on the affiliation allow-list size */
    maxAuthors: number;
}

/**
 * Abbreviated-name resolution settings.
 */
export interface NameResolutionConfig {
    enabled: boolean;
    /** Raise instead of degrading when no search backend is configured */
    strict: boolean;
    /** Institution display name → web domain used to narrow the first search */
    institutionDomains: Record<string, string>;
}

/**
 * Full export configuration merged from CLI flags, env vars, config files and defaults.
 */
export interface ExportConfig {
    // Query
    search?: string;
    authorIds: string[];
    authorFile?: string;
    compReport?: string;
    department?: string;
    jobTitle?: string;
    institution?: string;
    institutionOnly: boolean;
    yearFrom?: number;
    yearTo?: number;

    // Output
    fields?: string[];
    excludeFields?: string[];
    sort?: SortOption;
    maxResults: number;
    perPage: number;
    out: string;

    // Upstream
    email?: string;
    apiKey?: string;
    searchApiKey?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    affiliation: AffiliationConfig;
    nameResolution: NameResolutionConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ExportConfig = {
    authorIds: [],
    institutionOnly: false,
    maxResults: 100,
    perPage: 25,
    out: 'openalex_results.json',
    logLevel: 'info',
    jsonLogs: false,
    affiliation: {
        institution: 'Colorado State University',
        maxAuthors: 1000,
    },
    nameResolution: {
        enabled: true,
        strict: false,
        institutionDomains: {
            'Colorado State University': 'colostate.edu',
        },
    },
};
