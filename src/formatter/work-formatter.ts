import type {
    FormattedAuthor,
    FormattedConcept,
    FormattedSource,
    FormattedWork,
    OpenAlexAuthorship,
    OpenAlexWork,
} from '../types/index.js';
import { isWorkField, type WorkField } from '../types/fields.js';
import { invertedIndexToText } from '../sources/utils.js';

/**
 * Per-invocation formatting context.
 */
export interface FormatContext {
    /** Author IDs (or ORCID URLs) the search was scoped to; empty when unscoped */
    scopedAuthorIds: ReadonlySet<string>;
}

interface FieldExtractor {
    /** Output key; defaults to the field name */
    key?: string;
    extract(work: OpenAlexWork, context: FormatContext): unknown;
}

const direct = (field: string): FieldExtractor => ({
    extract: (work) => work[field] ?? null,
});

/**
 * Canonical field → extraction function. Adding a field means adding an entry here.
 */
const FIELD_EXTRACTORS: Record<WorkField, FieldExtractor> = {
    id: direct('id'),
    title: direct('title'),
    abstract: { extract: (work) => extractAbstract(work) },
    authors: { extract: (work, context) => selectAuthor(work.authorships ?? [], context.scopedAuthorIds) },
    publication_date: direct('publication_date'),
    doi: direct('doi'),
    type: direct('type'),
    concepts: { extract: (work) => extractConcepts(work) },
    keywords: { extract: (work) => extractKeywords(work) },
    cited_by_count: direct('cited_by_count'),
    institutions: { extract: (work) => extractInstitutions(work.authorships ?? []) },
    sources: { key: 'source', extract: (work) => extractSource(work) },
    publisher: { extract: (work) => extractSource(work)?.name ?? null },
    language: direct('language'),
    is_oa: { extract: (work) => work.open_access?.is_oa ?? null },
    primary_location: direct('primary_location'),
    locations: direct('locations'),
    referenced_works: direct('referenced_works'),
    related_works: direct('related_works'),
    year: { extract: (work) => work.publication_year ?? null },
    created_date: direct('created_date'),
    updated_date: direct('updated_date'),
    publication_year: direct('publication_year'),
    cited_by_api_url: direct('cited_by_api_url'),
    related_works_api_url: direct('related_works_api_url'),
};

/**
 * Project one raw work onto a pre-validated field set.
 * Throws on an unrecognized field: callers must resolve fields first.
 */
export function formatWork(
    work: OpenAlexWork,
    fields: readonly string[],
    context: FormatContext = { scopedAuthorIds: new Set() }
): FormattedWork {
    const formatted: FormattedWork = {};

    for (const field of fields) {
        if (!isWorkField(field)) {
            throw new Error(`formatWork received unresolved field '${field}'`);
        }
        const extractor = FIELD_EXTRACTORS[field];
        formatted[extractor.key ?? field] = extractor.extract(work, context);
    }

    return formatted;
}

/**
 * One-author rule: the scoped author when they appear on the work, otherwise the first-listed author.
 * An empty authorship list yields an empty list.
 */
export function selectAuthor(
    authorships: readonly OpenAlexAuthorship[],
    scopedAuthorIds: ReadonlySet<string>
): FormattedAuthor[] {
    const listed = authorships.filter((authorship) => authorship.author);
    if (listed.length === 0) return [];

    const scoped = scopedAuthorIds.size > 0
        ? listed.find(({ author }) =>
            (author?.id && scopedAuthorIds.has(author.id)) || (author?.orcid && scopedAuthorIds.has(author.orcid)))
        : undefined;

    const chosen = scoped ?? listed[0];
    return chosen ? [toFormattedAuthor(chosen)] : [];
}

function toFormattedAuthor(authorship: OpenAlexAuthorship): FormattedAuthor {
    const author: FormattedAuthor = {
        id: authorship.author?.id ?? '',
        name: authorship.author?.display_name ?? '',
        orcid: authorship.author?.orcid ?? null,
    };
    if (authorship.author_position) {
        author.position = authorship.author_position;
    }
    return author;
}

function extractAbstract(work: OpenAlexWork): string | null {
    if (typeof work.abstract === 'string' && work.abstract.length > 0) {
        return work.abstract;
    }
    return invertedIndexToText(work.abstract_inverted_index);
}

/**
 * Distinct institution names across all authorships, in first-seen order.
 */
function extractInstitutions(authorships: readonly OpenAlexAuthorship[]): string[] {
    const names = new Set<string>();
    for (const authorship of authorships) {
        for (const institution of authorship.institutions ?? []) {
            if (institution.display_name) names.add(institution.display_name);
        }
    }
    return [...names];
}

function extractConcepts(work: OpenAlexWork): FormattedConcept[] {
    return (work.concepts ?? []).map((concept) => ({
        id: concept.id ?? '',
        name: concept.display_name ?? '',
        score: concept.score ?? 0,
    }));
}

function extractKeywords(work: OpenAlexWork): string[] {
    return (work.keywords ?? [])
        .map((keyword) => keyword.display_name ?? keyword.keyword)
        .filter((keyword): keyword is string => !!keyword);
}

function extractSource(work: OpenAlexWork): FormattedSource | null {
    const source = work.primary_location?.source;
    if (!source) return null;

    const issn = source.issn_l || (Array.isArray(source.issn) ? source.issn[0] : source.issn) || '';
    return {
        id: source.id ?? '',
        name: source.display_name ?? '',
        issn,
        type: source.type ?? '',
    };
}
