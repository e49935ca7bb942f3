import { parseFieldList } from '../formatter/field-resolver.js';
import type { CliFlags } from '../utils/config.js';
import type { LogLevel, SortOption } from '../types/index.js';

/**
 * Options of the `search` command as commander parses them.
 */
export interface SearchOptions {
    search?: string;
    authorId?: string[];
    authorFile?: string;
    compReport?: string;
    department?: string;
    jobTitle?: string;
    institution?: string;
    csuOnly?: boolean;
    fields?: string;
    excludeFields?: string;
    sort?: SortOption;
    maxResults?: number;
    perPage?: number;
    yearFrom?: number;
    yearTo?: number;
    out?: string;
    email?: string;
    searchApiKey?: string;
    nameResolution: boolean;
    strictNames?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Map parsed options onto config flags. Unset flags stay undefined so config files and env vars are not shadowed.
 */
export function toCliFlags(opts: SearchOptions): CliFlags {
    return {
        search: opts.search,
        authorIds: opts.authorId,
        authorFile: opts.authorFile,
        compReport: opts.compReport,
        department: opts.department,
        jobTitle: opts.jobTitle,
        institution: opts.institution,
        institutionOnly: opts.csuOnly,
        fields: opts.fields ? parseFieldList(opts.fields) : undefined,
        excludeFields: opts.excludeFields ? parseFieldList(opts.excludeFields) : undefined,
        sort: opts.sort,
        maxResults: opts.maxResults,
        perPage: opts.perPage,
        yearFrom: opts.yearFrom,
        yearTo: opts.yearTo,
        out: opts.out,
        email: opts.email,
        searchApiKey: opts.searchApiKey,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        nameResolution: { enabled: opts.nameResolution ? undefined : false, strict: opts.strictNames },
    };
}
