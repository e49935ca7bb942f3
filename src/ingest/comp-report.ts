import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { AuthorQuery } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export type CompReportRow = Record<string, string>;

export const REQUIRED_COLUMNS = ['Last Name', 'First Initial', 'Department', 'Job Title'] as const;

/** Common header variants → canonical column names */
const HEADER_ALIASES = new Map<string, string>([
    ['lastname', 'Last Name'],
    ['last name', 'Last Name'],
    ['firstinitial', 'First Initial'],
    ['first initial', 'First Initial'],
    ['jobtitle', 'Job Title'],
    ['job title', 'Job Title'],
    ['department', 'Department'],
    ['unitname', 'Unit Name'],
    ['unit name', 'Unit Name'],
    ['college', 'Unit Name'],
]);

const csvRowsSchema = z.array(z.array(z.string()));

export function normalizeHeader(header: string): string {
    const trimmed = header.trim();
    return HEADER_ALIASES.get(trimmed.toLowerCase()) ?? trimmed;
}

/**
 * Parse compensation report CSV contents into rows keyed by canonical column name.
 * Quoted fields may contain commas.
 * @throws ValidationError on missing required columns or an empty report
 */
export function parseCompReport(content: string): CompReportRow[] {
    const rows = csvRowsSchema.parse(
        parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true })
    );

    const [header, ...data] = rows;
    if (!header) {
        throw new ValidationError('Compensation report is empty');
    }

    const columns = header.map(normalizeHeader);
    const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
        throw new ValidationError(`Compensation report missing required columns: ${[...missing].sort().join(', ')}`);
    }

    if (data.length === 0) {
        throw new ValidationError('Compensation report contains no data rows');
    }

    return data.map((values) => {
        const row: CompReportRow = {};
        columns.forEach((column, i) => {
            row[column] = values[i] ?? '';
        });
        return row;
    });
}

/**
 * Sorted unique non-empty values of a column.
 */
export function uniqueValues(rows: readonly CompReportRow[], column: string): string[] {
    const values = new Set<string>();
    for (const row of rows) {
        const value = row[column]?.trim();
        if (value) values.add(value);
    }
    return [...values].sort();
}

/**
 * Case-insensitive substring filter on department and/or job title (both must match when given).
 */
export function filterRows(
    rows: readonly CompReportRow[],
    filters: { department?: string; jobTitle?: string }
): CompReportRow[] {
    const department = filters.department?.toLowerCase();
    const jobTitle = filters.jobTitle?.toLowerCase();

    return rows.filter((row) =>
        (!department || (row['Department'] ?? '').toLowerCase().includes(department)) &&
        (!jobTitle || (row['Job Title'] ?? '').toLowerCase().includes(jobTitle))
    );
}

/**
 * Convert rows to author queries, deduplicated by (last name, first initial, department).
 * Rows missing a last name or initial are dropped.
 */
export function rowsToAuthorQueries(rows: readonly CompReportRow[]): AuthorQuery[] {
    const seen = new Set<string>();
    const queries: AuthorQuery[] = [];

    for (const row of rows) {
        const lastName = (row['Last Name'] ?? '').trim();
        const firstInitial = (row['First Initial'] ?? '').trim();
        const department = (row['Department'] ?? '').trim();
        const college = (row['Unit Name'] ?? '').trim();

        if (!lastName || !firstInitial) continue;

        const key = [lastName, firstInitial, department].map((part) => part.toLowerCase()).join('\u0000');
        if (seen.has(key)) continue;
        seen.add(key);

        queries.push({
            name: `${firstInitial.replace(/\.+$/, '')}. ${lastName}`,
            lastName,
            firstInitial,
            department,
            college,
        });
    }

    return queries;
}

/**
 * Load a compensation report, apply filters, and return author queries.
 * @throws ValidationError when no rows or no usable authors remain
 */
export function loadCompReport(path: string, filters: { department?: string; jobTitle?: string } = {}): AuthorQuery[] {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ValidationError(`Cannot read compensation report '${path}': ${error instanceof Error ? error.message : String(error)}`);
    }

    const rows = parseCompReport(content);
    if (!filters.department && !filters.jobTitle) {
        getLogger().debug({ departments: uniqueValues(rows, 'Department') }, 'No report filters given, using all rows');
    }

    const filtered = filterRows(rows, filters);
    if (filtered.length === 0) {
        throw new ValidationError('No compensation report rows match the specified filters');
    }

    const queries = rowsToAuthorQueries(filtered);
    if (queries.length === 0) {
        throw new ValidationError('No valid author entries after filtering');
    }

    return queries;
}
