import { CORE_FIELDS, FIELD_ALIASES, isWorkField, type WorkField } from '../types/fields.js';
import { FieldValidationError } from '../utils/errors.js';

/**
 * Canonical name for a user-supplied field name or alias, or null when unknown.
 * Names are lowercased and trimmed, then matched exactly.
 */
export function canonicalField(name: string): WorkField | null {
    const normalized = name.trim().toLowerCase();
    const aliased = FIELD_ALIASES.get(normalized);
    if (aliased) return aliased;
    return isWorkField(normalized) ? normalized : null;
}

/**
 * Resolve the ordered field set for an export.
 *
 * Starts from the core fields when `include` is empty, otherwise from the alias-expanded
 * `include` list, then drops alias-expanded `exclude` entries. Duplicates keep their first position.
 *
 * @throws FieldValidationError listing every unrecognized name across both lists
 */
export function resolveFields(
    include: readonly string[] = [],
    exclude: readonly string[] = []
): WorkField[] {
    const invalid: string[] = [];

    const expand = (names: readonly string[]): WorkField[] => {
        const fields: WorkField[] = [];
        for (const name of names) {
            if (!name.trim()) continue;
            const field = canonicalField(name);
            if (field) {
                fields.push(field);
            } else {
                invalid.push(name.trim());
            }
        }
        return fields;
    };

    const included = expand(include);
    const excluded = new Set(expand(exclude));

    if (invalid.length > 0) {
        throw new FieldValidationError(invalid);
    }

    const base: readonly WorkField[] = included.length > 0 ? included : CORE_FIELDS;
    return [...new Set(base)].filter((field) => !excluded.has(field));
}

/**
 * Split a comma-separated field list. Empty entries are dropped.
 */
export function parseFieldList(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map((field) => field.trim()).filter(Boolean);
}
