import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { AuthorQuery } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Header columns of a TSV author file, or null for a plain name-per-line file.
 * A TSV header must contain a LastName / Last_Name column.
 */
export function detectFileFormat(firstLine: string): string[] | null {
    if (!firstLine.includes('\t')) return null;

    const columns = firstLine.split('\t').map((column) => column.trim());
    const lower = columns.map((column) => column.toLowerCase());
    if (lower.includes('lastname') || lower.includes('last_name')) {
        return columns;
    }

    return null;
}

const tsvRowsSchema = z.array(z.array(z.string()));

/**
 * Build a query from one TSV row. Returns null for rows without a last name.
 */
export function parseAuthorRow(values: readonly string[], headers: readonly string[]): AuthorQuery | null {
    const index = new Map(headers.map((header, i) => [header.trim().toLowerCase(), i]));
    const get = (...keys: string[]): string => {
        for (const key of keys) {
            const i = index.get(key);
            const value = i === undefined ? undefined : values[i]?.trim();
            if (value) return value;
        }
        return '';
    };

    const lastName = get('lastname', 'last_name');
    if (!lastName) return null;

    const firstInitial = get('firstinitial', 'first_initial', 'firstname', 'first_name');
    const department = get('department');
    const college = get('college');

    const query: AuthorQuery = {
        name: firstInitial ? `${firstInitial.replace(/\.+$/, '')}. ${lastName}` : lastName,
        lastName,
    };
    if (firstInitial) query.firstInitial = firstInitial;
    if (department) query.department = department;
    if (college) query.college = college;

    return query;
}

/**
 * Rows of a tab-separated author file starting at its header row. Quoted cells may hold tabs.
 */
function parseTsv(content: string): { headers: string[]; rows: string[][] } {
    const [headers = [], ...rows] = tsvRowsSchema.parse(
        parse(content, { bom: true, delimiter: '\t', skip_empty_lines: true, relax_column_count: true, relax_quotes: true })
    );
    return { headers, rows };
}

/**
 * Parse author-file contents (plain text or TSV with a header row).
 * @throws ValidationError when the file holds no usable entries
 */
export function parseAuthorFile(content: string): AuthorQuery[] {
    const lines = content.split(/\r?\n/);
    const firstLine = lines.find((line) => line.trim().length > 0);
    if (firstLine === undefined) {
        throw new ValidationError('Author file is empty');
    }

    let queries: AuthorQuery[];
    if (detectFileFormat(firstLine)) {
        const { headers, rows } = parseTsv(content.slice(content.indexOf(firstLine)));
        queries = rows
            .map((row) => parseAuthorRow(row, headers))
            .filter((query): query is AuthorQuery => query !== null);
    } else {
        queries = lines
            .map((line) => line.trim())
            .filter((line) => line.length > 0)
            .map((name) => ({ name }));
    }

    if (queries.length === 0) {
        throw new ValidationError('No valid author entries in author file');
    }

    return queries;
}

export function readAuthorFile(path: string): AuthorQuery[] {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ValidationError(`Cannot read author file '${path}': ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseAuthorFile(content);
}
