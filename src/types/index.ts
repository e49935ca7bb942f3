/**
 * Barrel export for all shared types.
 */
export type {
    OpenAlexWork,
    OpenAlexAuthorship,
    OpenAlexLocation,
    OpenAlexAuthor,
    OpenAlexInstitution,
    OpenAlexListResponse,
    AuthorPosition,
    FormattedAuthor,
    FormattedSource,
    FormattedConcept,
    FormattedWork,
    ExportDocument,
} from './work.js';
export type {
    AuthorQuery,
    NameResolution,
    ResolvedAuthor,
    AuthorIdSource,
    AuthorIdResolution,
} from './author.js';
export { DEFAULT_CONFIG, SORT_PARAMS } from './config.js';
export type {
    ExportConfig,
    LogLevel,
    SortOption,
    AffiliationConfig,
    NameResolutionConfig,
} from './config.js';
export type { SearchBackend, SearchOptions, SearchResult, SearchResponse } from './search-backend.js';
