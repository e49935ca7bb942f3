/**
 * Shared utilities for OpenAlex identifiers and record payloads.
 */

export const OPENALEX_ID_PREFIX = 'https://openalex.org/';
export const ORCID_PREFIX = 'https://orcid.org/';

const ORCID_PATTERN = /^\d{4}-?\d{4}-?\d{4}-?\d{3}[\dX]$/i;

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * Words are ordered by position; words sharing a position keep insertion order.
 *
 * @returns Reconstructed abstract text, or null when there is nothing to reconstruct
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex || typeof invertedIndex !== 'object') {
        return null;
    }

    const words: Array<[number, string]> = [];

    for (const [word, positions] of Object.entries(invertedIndex)) {
        if (!Array.isArray(positions)) continue;
        for (const pos of positions) {
            if (typeof pos === 'number' && pos >= 0) {
                words.push([pos, word]);
            }
        }
    }

    if (words.length === 0) return null;

    // Array.prototype.sort is stable, so ties stay in insertion order
    words.sort((a, b) => a[0] - b[0]);

    return words.map(([, word]) => word).join(' ');
}

/**
 * Whether the input is an ORCID, bare or as an orcid.org URL.
 */
export function isOrcid(input: string): boolean {
    const trimmed = input.trim();
    if (/orcid\.org\//i.test(trimmed)) return true;
    return ORCID_PATTERN.test(trimmed);
}

/**
 * Canonical ORCID query form.
 * "0000-0002-1825-0097" / "https://orcid.org/0000-0002-1825-0097" → "https://orcid.org/0000-0002-1825-0097"
 */
export function normalizeOrcid(input: string): string {
    const trimmed = input.trim().replace(/\/+$/, '');
    const bare = trimmed.split('/').pop() ?? trimmed;
    return `${ORCID_PREFIX}${bare.toUpperCase()}`;
}

/**
 * Match an OpenAlex entity ID with the given prefix letter, bare or as a URL.
 * ("A", "A5023888391") → "https://openalex.org/A5023888391"
 */
export function normalizeOpenAlexId(input: string, prefix: 'A' | 'I' | 'W'): string | null {
    const trimmed = input.trim();
    const match = trimmed.match(new RegExp(`^(?:https?://)?(?:openalex\\.org/)?(${prefix}\\d+)$`, 'i'));
    if (!match?.[1]) return null;
    return `${OPENALEX_ID_PREFIX}${match[1].toUpperCase()}`;
}

/**
 * Strip characters that carry meaning inside an OpenAlex `filter` value.
 */
export function sanitizeFilterValue(value: string): string {
    return value.replace(/[,|]/g, ' ').replace(/\s+/g, ' ').trim();
}
