import type {
    AuthorQuery,
    ExportConfig,
    ExportDocument,
    ResolvedAuthor,
} from '../types/index.js';
import { SORT_PARAMS } from '../types/index.js';
import { OpenAlexClient, type InstitutionMatch } from '../sources/openalex.js';
import { QueryFilter } from '../sources/query-filter.js';
import { resolveFields } from '../formatter/field-resolver.js';
import { formatWork } from '../formatter/work-formatter.js';
import { NameResolver } from '../names/name-resolver.js';
import { buildExportDocument, writeExport } from '../exporters/export.js';
import { LookupError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ExportDeps {
    client: OpenAlexClient;
    nameResolver: NameResolver;
    now?: () => Date;
}

/**
 * Main export pipeline:
 *
 * 1. Validate inputs and resolve the field set (before any network call)
 * 2. Resolve the institution and, in institution-only mode, the affiliation allow-list
 * 3. Resolve abbreviated names, then author IDs
 * 4. Build filters and page through matching works
 * 5. Format each work and assemble the output document
 */
export async function collectWorks(
    config: ExportConfig,
    authorQueries: readonly AuthorQuery[],
    deps: ExportDeps
): Promise<ExportDocument> {
    const logger = getLogger();
    const { client, nameResolver } = deps;
    const now = deps.now ?? (() => new Date());

    // ──────────────────────────────────────────────────
    // Step 1: Validate
    // ──────────────────────────────────────────────────
    const hasAuthors = config.authorIds.length > 0 || authorQueries.length > 0;
    if (!config.search && !hasAuthors && !config.institution && !config.institutionOnly) {
        throw new ValidationError(
            'At least one search parameter (--search, --author-id, --author-file, --comp-report, --institution, or --csu-only) must be provided'
        );
    }

    const fields = resolveFields(config.fields, config.excludeFields);
    const query = queryEcho(config);
    const emptyDocument = (): ExportDocument => buildExportDocument([], query, now());

    // ──────────────────────────────────────────────────
    // Step 2: Institutions
    // ──────────────────────────────────────────────────
    let institution: InstitutionMatch | null = null;
    if (config.institution) {
        institution = await client.resolveInstitution(config.institution);
        logger.info({ institution: institution.displayName, id: institution.id }, 'Resolved institution');
    }

    let allowList: Set<string> | null = null;
    let lookupInstitution = institution;
    if (config.institutionOnly) {
        const affiliation = await client.resolveInstitution(config.affiliation.institution);
        logger.info({ institution: affiliation.displayName }, 'Finding authors whose last known institution matches');

        const ids = await client.fetchInstitutionAuthors(affiliation.id, config.affiliation.maxAuthors);
        if (ids.length === 0) {
            logger.warn({ institution: affiliation.displayName }, 'No authors found with this last known institution');
            return emptyDocument();
        }

        allowList = new Set(ids);
        lookupInstitution = affiliation;
        logger.info({ authors: allowList.size }, 'Built affiliation allow-list');
    }

    // ──────────────────────────────────────────────────
    // Step 3: Authors
    // ──────────────────────────────────────────────────
    let authorIds: string[] = [];
    if (hasAuthors) {
        const explicit = await client.resolveAuthorIds(config.authorIds, { institutionId: lookupInstitution?.id });
        for (const resolution of explicit) {
            if (resolution.id) {
                authorIds.push(resolution.id);
            } else {
                logger.warn({ input: resolution.input, via: resolution.via }, 'Author not found');
            }
        }

        const resolved = await resolveAuthorQueries(authorQueries, client, nameResolver, lookupInstitution);
        for (const author of resolved) {
            if (author.id) authorIds.push(author.id);
        }

        authorIds = [...new Set(authorIds)];
        if (authorIds.length === 0) {
            throw new LookupError('No authors found for the given author IDs or names');
        }
        logger.info({ found: authorIds.length, requested: config.authorIds.length + authorQueries.length }, 'Resolved authors');
    }

    if (allowList) {
        if (authorIds.length > 0) {
            const scoped = allowList;
            authorIds = authorIds.filter((id) => scoped.has(id));
            if (authorIds.length === 0) {
                logger.warn('No works found: specified authors are not affiliated with the institution');
                return emptyDocument();
            }
        } else {
            authorIds = [...allowList];
        }
    }

    // ──────────────────────────────────────────────────
    // Step 4: Search works
    // ──────────────────────────────────────────────────
    let filter = QueryFilter.empty().with('authorships.author.id', authorIds);
    if (institution) {
        filter = filter.with('authorships.institutions.id', institution.id);
    }
    if (config.yearFrom !== undefined) {
        filter = filter.with('from_publication_date', `${config.yearFrom}-01-01`);
    }
    if (config.yearTo !== undefined) {
        filter = filter.with('to_publication_date', `${config.yearTo}-12-31`);
    }

    logger.info({ search: config.search, filter: filter.toString().slice(0, 200) }, 'Searching OpenAlex');
    const works = await client.searchWorks({
        search: config.search,
        filter,
        sort: config.sort ? SORT_PARAMS[config.sort] : undefined,
        perPage: config.perPage,
        maxResults: config.maxResults,
    });
    logger.info({ works: works.length }, 'Works retrieved');

    // ──────────────────────────────────────────────────
    // Step 5: Format
    // ──────────────────────────────────────────────────
    const context = { scopedAuthorIds: new Set(authorIds) };
    const formatted = works.map((work) => formatWork(work, fields, context));

    return buildExportDocument(formatted, query, now());
}

/**
 * Run the pipeline and write the document to `config.out`.
 */
export async function buildExport(
    config: ExportConfig,
    authorQueries: readonly AuthorQuery[],
    deps: ExportDeps
): Promise<ExportDocument> {
    const document = await collectWorks(config, authorQueries, deps);
    writeExport(config.out, document);
    getLogger().info({ requests: deps.client.getRequestCounts() }, 'Request summary');
    return document;
}

/**
 * Name resolution then ID lookup for each query, sequentially.
 */
export async function resolveAuthorQueries(
    queries: readonly AuthorQuery[],
    client: OpenAlexClient,
    nameResolver: NameResolver,
    institution: InstitutionMatch | null
): Promise<ResolvedAuthor[]> {
    const logger = getLogger();
    const resolved: ResolvedAuthor[] = [];

    for (const query of queries) {
        const nameResolution = await nameResolver.resolve(query, institution?.displayName);
        const id = await client.lookupAuthorId(nameResolution.value, { institutionId: institution?.id });

        if (id) {
            logger.info({ name: nameResolution.value, id }, 'Found author');
        } else {
            logger.warn({ name: nameResolution.value }, 'Author not found');
        }

        resolved.push({ query, name: nameResolution.value, nameResolution, id });
    }

    return resolved;
}

/**
 * Effective query parameters echoed into the output metadata.
 */
function queryEcho(config: ExportConfig): Record<string, unknown> {
    const query: Record<string, unknown> = {};
    if (config.search) query['search'] = config.search;
    if (config.authorIds.length > 0) query['author_ids'] = config.authorIds;
    if (config.authorFile) query['author_file'] = config.authorFile;
    if (config.compReport) query['comp_report'] = config.compReport;
    if (config.institution) query['institution'] = config.institution;
    if (config.institutionOnly) query['csu_only'] = true;
    if (config.sort) query['sort'] = config.sort;
    if (config.yearFrom !== undefined) query['year_from'] = config.yearFrom;
    if (config.yearTo !== undefined) query['year_to'] = config.yearTo;
    return query;
}
