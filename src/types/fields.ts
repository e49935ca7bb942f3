/**
 * Work fields available in the export.
 *
 * Core (included by default):
 *   id, title, abstract, authors, publication_date, doi, type
 *
 * Extended (opt-in via --fields):
 *   citation, venue, access and linkage attributes
 */
export const CORE_FIELDS = [
    'id',
    'title',
    'abstract',
    'authors',
    'publication_date',
    'doi',
    'type',
] as const;

export const EXTENDED_FIELDS = [
    'concepts',
    'keywords',
    'cited_by_count',
    'institutions',
    'sources',
    'publisher',
    'language',
    'is_oa',
    'primary_location',
    'locations',
    'referenced_works',
    'related_works',
    'year',
    'created_date',
    'updated_date',
    'publication_year',
    'cited_by_api_url',
    'related_works_api_url',
] as const;

export type CoreField = (typeof CORE_FIELDS)[number];
export type ExtendedField = (typeof EXTENDED_FIELDS)[number];
export type WorkField = CoreField | ExtendedField;

export const ALL_FIELDS: readonly WorkField[] = [...CORE_FIELDS, ...EXTENDED_FIELDS];

/**
 * Alternate user spellings → canonical field names.
 */
export const FIELD_ALIASES: ReadonlyMap<string, WorkField> = new Map<string, WorkField>([
    ['author', 'authors'],
    ['date', 'publication_date'],
    ['pub_date', 'publication_date'],
    ['citation_count', 'cited_by_count'],
    ['citations', 'cited_by_count'],
    ['institution', 'institutions'],
    ['source', 'sources'],
    ['journal', 'sources'],
    ['venue', 'sources'],
    ['open_access', 'is_oa'],
    ['oa', 'is_oa'],
]);

export function isWorkField(name: string): name is WorkField {
    return ALL_FIELDS.some((field) => field === name);
}
