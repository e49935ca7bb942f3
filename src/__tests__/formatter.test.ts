import { describe, it, expect } from 'vitest';
import { canonicalField, parseFieldList, resolveFields } from '../formatter/field-resolver.js';
import { formatWork, selectAuthor } from '../formatter/work-formatter.js';
import { CORE_FIELDS } from '../types/fields.js';
import { FieldValidationError } from '../utils/errors.js';
import type { OpenAlexAuthorship, OpenAlexWork } from '../types/index.js';

const authorships: OpenAlexAuthorship[] = [
    {
        author_position: 'first',
        author: { id: 'https://openalex.org/A1', display_name: 'Ada Author', orcid: 'https://orcid.org/0000-0001-0000-0001' },
        institutions: [{ id: 'https://openalex.org/I1', display_name: 'First University' }],
    },
    {
        author_position: 'middle',
        author: { id: 'https://openalex.org/A2', display_name: 'Ben Builder', orcid: null },
        institutions: [
            { id: 'https://openalex.org/I1', display_name: 'First University' },
            { id: 'https://openalex.org/I2', display_name: 'Second Institute' },
        ],
    },
    {
        author_position: 'last',
        author: { id: 'https://openalex.org/A3', display_name: 'Cleo Closer', orcid: 'https://orcid.org/0000-0003-0000-0003' },
    },
];

const work: OpenAlexWork = {
    id: 'https://openalex.org/W100',
    title: 'Soil carbon under drought',
    doi: 'https://doi.org/10.1234/soil',
    type: 'article',
    publication_date: '2021-06-15',
    publication_year: 2021,
    cited_by_count: 12,
    language: 'en',
    abstract_inverted_index: { Soil: [0], carbon: [1], declines: [2] },
    authorships,
    open_access: { is_oa: true, oa_status: 'gold' },
    primary_location: {
        source: { id: 'https://openalex.org/S1', display_name: 'Journal of Soils', issn_l: '1234-5678', type: 'journal' },
    },
    concepts: [{ id: 'https://openalex.org/C1', display_name: 'Soil science', score: 0.9 }],
    keywords: [{ display_name: 'drought' }, { keyword: 'carbon' }, {}],
};

describe('field resolution', () => {
    it('should default to the core fields', () => {
        expect(resolveFields()).toEqual([...CORE_FIELDS]);
    });

    it('should expand aliases case-insensitively and keep order', () => {
        expect(resolveFields(['Title', ' author ', 'citations'])).toEqual(['title', 'authors', 'cited_by_count']);
    });

    it('should resolve date and citation aliases', () => {
        expect(resolveFields(['date', 'citations'], [])).toEqual(['publication_date', 'cited_by_count']);
    });

    it('should dedupe aliases of the same field', () => {
        expect(resolveFields(['journal', 'venue', 'title', 'source'])).toEqual(['sources', 'title']);
    });

    it('should remove excluded fields from the defaults', () => {
        expect(resolveFields([], ['abstract', 'date'])).toEqual(['id', 'title', 'authors', 'doi', 'type']);
    });

    it('should report every unknown name from both lists', () => {
        let error: unknown;
        try {
            resolveFields(['title', 'bogus'], ['nope']);
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(FieldValidationError);
        expect(error).toMatchObject({
            invalidFields: ['bogus', 'nope'],
            message: "Unknown fields: bogus, nope. Run 'alexport fields' to list available fields.",
        });
    });

    it('should not treat object prototype keys as fields', () => {
        expect(canonicalField('constructor')).toBeNull();
        expect(canonicalField('toString')).toBeNull();
        expect(canonicalField('OA')).toBe('is_oa');
    });

    it('should split comma-separated lists', () => {
        expect(parseFieldList('title, doi,,  ')).toEqual(['title', 'doi']);
        expect(parseFieldList(undefined)).toEqual([]);
    });
});

describe('selectAuthor', () => {
    it('should pick the scoped author when present', () => {
        expect(selectAuthor(authorships, new Set(['https://openalex.org/A2']))).toEqual([
            { id: 'https://openalex.org/A2', name: 'Ben Builder', orcid: null, position: 'middle' },
        ]);
    });

    it('should match scoped authors by ORCID', () => {
        expect(selectAuthor(authorships, new Set(['https://orcid.org/0000-0003-0000-0003']))).toEqual([
            { id: 'https://openalex.org/A3', name: 'Cleo Closer', orcid: 'https://orcid.org/0000-0003-0000-0003', position: 'last' },
        ]);
    });

    it('should fall back to the first listed author', () => {
        const expected = [
            { id: 'https://openalex.org/A1', name: 'Ada Author', orcid: 'https://orcid.org/0000-0001-0000-0001', position: 'first' },
        ];
        expect(selectAuthor(authorships, new Set())).toEqual(expected);
        expect(selectAuthor(authorships, new Set(['https://openalex.org/A99']))).toEqual(expected);
    });

    it('should return an empty list for works without authors', () => {
        expect(selectAuthor([], new Set(['https://openalex.org/A1']))).toEqual([]);
        expect(selectAuthor([{ author: null }], new Set())).toEqual([]);
    });
});

describe('formatWork', () => {
    it('should emit exactly the requested core fields', () => {
        const formatted = formatWork(work, resolveFields(), { scopedAuthorIds: new Set(['https://openalex.org/A2']) });

        expect(formatted).toEqual({
            id: 'https://openalex.org/W100',
            title: 'Soil carbon under drought',
            abstract: 'Soil carbon declines',
            authors: [{ id: 'https://openalex.org/A2', name: 'Ben Builder', orcid: null, position: 'middle' }],
            publication_date: '2021-06-15',
            doi: 'https://doi.org/10.1234/soil',
            type: 'article',
        });
    });

    it('should derive extended fields', () => {
        const formatted = formatWork(
            work,
            resolveFields(['sources', 'publisher', 'is_oa', 'year', 'institutions', 'concepts', 'keywords', 'cited_by_count'])
        );

        expect(formatted).toEqual({
            source: { id: 'https://openalex.org/S1', name: 'Journal of Soils', issn: '1234-5678', type: 'journal' },
            publisher: 'Journal of Soils',
            is_oa: true,
            year: 2021,
            institutions: ['First University', 'Second Institute'],
            concepts: [{ id: 'https://openalex.org/C1', name: 'Soil science', score: 0.9 }],
            keywords: ['drought', 'carbon'],
            cited_by_count: 12,
        });
    });

    it('should prefer a plain abstract and emit null for missing values', () => {
        const sparse: OpenAlexWork = { id: 'https://openalex.org/W2', abstract: 'Already plain.' };

        expect(formatWork(sparse, ['abstract', 'doi', 'sources', 'is_oa', 'authors'])).toEqual({
            abstract: 'Already plain.',
            doi: null,
            source: null,
            is_oa: null,
            authors: [],
        });
    });

    it('should reject unresolved field names', () => {
        expect(() => formatWork(work, ['citations'])).toThrow("formatWork received unresolved field 'citations'");
    });
});
