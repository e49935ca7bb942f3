import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { detectFileFormat, parseAuthorFile, parseAuthorRow, readAuthorFile } from '../ingest/author-file.js';
import {
    filterRows,
    loadCompReport,
    normalizeHeader,
    parseCompReport,
    rowsToAuthorQueries,
    uniqueValues,
} from '../ingest/comp-report.js';
import { ValidationError } from '../utils/errors.js';

const REPORT = [
    'Last Name,First Initial,Department,Job Title,Unit Name',
    'Kelly,E,Chemistry,Professor,College of Natural Sciences',
    'Kelly,E,Chemistry,Professor,College of Natural Sciences',
    'Nguyen,T,"Soil and Crop Sciences, Dept of",Associate Professor,College of Agricultural Sciences',
    'Ortiz,M,Chemistry,Lab Coordinator,College of Natural Sciences',
    ',A,Chemistry,Professor,College of Natural Sciences',
].join('\n');

describe('author file', () => {
    it('should read one name per line', () => {
        expect(parseAuthorFile('Emily Kelly\n\n  E. Kelly  \r\nJ. R. Smith\n')).toEqual([
            { name: 'Emily Kelly' },
            { name: 'E. Kelly' },
            { name: 'J. R. Smith' },
        ]);
    });

    it('should detect TSV files by their LastName header', () => {
        expect(detectFileFormat('LastName\tFirstInitial\tDepartment')).toEqual(['LastName', 'FirstInitial', 'Department']);
        expect(detectFileFormat('Name\tDepartment')).toBeNull();
        expect(detectFileFormat('E. Kelly')).toBeNull();
    });

    it('should build queries with context from TSV rows', () => {
        const content = 'LastName\tFirstInitial\tDepartment\tCollege\nKelly\tE.\tChemistry\tNatural Sciences\nSmith\t\t\t\n\t\tOrphan\t\n';

        expect(parseAuthorFile(content)).toEqual([
            { name: 'E. Kelly', lastName: 'Kelly', firstInitial: 'E.', department: 'Chemistry', college: 'Natural Sciences' },
            { name: 'Smith', lastName: 'Smith' },
        ]);
    });

    it('should skip rows without a last name', () => {
        expect(parseAuthorRow(['', 'E'], ['LastName', 'FirstInitial'])).toBeNull();
        expect(parseAuthorRow(['  '], ['LastName', 'FirstInitial'])).toBeNull();
    });

    it('should keep quoted TSV cells intact', () => {
        const content = '\nLastName\tFirstInitial\tDepartment\r\nNguyen\tT\t"Soil\tand Crop ""Sciences"""\r\n';

        expect(parseAuthorFile(content)).toEqual([
            { name: 'T. Nguyen', lastName: 'Nguyen', firstInitial: 'T', department: 'Soil\tand Crop "Sciences"' },
        ]);
    });

    it('should reject empty files', () => {
        expect(() => parseAuthorFile('\n  \n')).toThrow(new ValidationError('Author file is empty'));
        expect(() => parseAuthorFile('LastName\tFirstInitial\n')).toThrow('No valid author entries in author file');
    });

    it('should report unreadable files as validation errors', () => {
        expect(() => readAuthorFile('/nonexistent/authors.txt')).toThrow(ValidationError);
    });
});

describe('compensation report', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'alexport-report-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should parse quoted fields into rows keyed by column', () => {
        const rows = parseCompReport(REPORT);

        expect(rows).toHaveLength(5);
        expect(rows[2]).toEqual({
            'Last Name': 'Nguyen',
            'First Initial': 'T',
            'Department': 'Soil and Crop Sciences, Dept of',
            'Job Title': 'Associate Professor',
            'Unit Name': 'College of Agricultural Sciences',
        });
    });

    it('should accept header variants', () => {
        expect(normalizeHeader(' lastname ')).toBe('Last Name');
        expect(normalizeHeader('College')).toBe('Unit Name');
        expect(normalizeHeader('Salary')).toBe('Salary');

        const rows = parseCompReport('LastName,FirstInitial,department,JobTitle\nKelly,E,Chemistry,Professor\n');
        expect(rows).toEqual([{ 'Last Name': 'Kelly', 'First Initial': 'E', 'Department': 'Chemistry', 'Job Title': 'Professor' }]);
    });

    it('should list missing required columns', () => {
        expect(() => parseCompReport('Last Name,Department\nKelly,Chemistry\n')).toThrow(
            'Compensation report missing required columns: First Initial, Job Title'
        );
    });

    it('should reject reports without data rows', () => {
        expect(() => parseCompReport('')).toThrow('Compensation report is empty');
        expect(() => parseCompReport('Last Name,First Initial,Department,Job Title\n')).toThrow(
            'Compensation report contains no data rows'
        );
    });

    it('should filter by department and job title substrings', () => {
        const rows = parseCompReport(REPORT);

        expect(filterRows(rows, { department: 'chem' })).toHaveLength(4);
        expect(filterRows(rows, { department: 'CHEM', jobTitle: 'professor' })).toHaveLength(3);
        expect(filterRows(rows, { jobTitle: 'associate' }).map((row) => row['Last Name'])).toEqual(['Nguyen']);
        expect(filterRows(rows, {})).toHaveLength(5);
    });

    it('should list unique values of a column', () => {
        expect(uniqueValues(parseCompReport(REPORT), 'Department')).toEqual(['Chemistry', 'Soil and Crop Sciences, Dept of']);
    });

    it('should dedupe authors and drop rows without a last name', () => {
        const queries = rowsToAuthorQueries(parseCompReport(REPORT));

        expect(queries).toEqual([
            { name: 'E. Kelly', lastName: 'Kelly', firstInitial: 'E', department: 'Chemistry', college: 'College of Natural Sciences' },
            {
                name: 'T. Nguyen',
                lastName: 'Nguyen',
                firstInitial: 'T',
                department: 'Soil and Crop Sciences, Dept of',
                college: 'College of Agricultural Sciences',
            },
            { name: 'M. Ortiz', lastName: 'Ortiz', firstInitial: 'M', department: 'Chemistry', college: 'College of Natural Sciences' },
        ]);
    });

    it('should load, filter and convert a report file', () => {
        const path = join(dir, 'report.csv');
        writeFileSync(path, `\uFEFF${REPORT}\n`);

        expect(loadCompReport(path, { jobTitle: 'coordinator' }).map((query) => query.name)).toEqual(['M. Ortiz']);
        expect(() => loadCompReport(path, { department: 'History' })).toThrow(
            'No compensation report rows match the specified filters'
        );
    });
});
