import { sanitizeFilterValue } from './utils.js';

/**
 * One `field[.operator]:value1|value2` clause of an OpenAlex filter.
 * Values within a clause are ORed.
 */
export interface FilterClause {
    readonly field: string;
    readonly operator?: string;
    readonly values: readonly string[];
}

/**
 * Immutable AND-combination of filter clauses.
 * `with()` returns a new filter; the receiver is never modified.
 */
export class QueryFilter {
    private constructor(readonly clauses: readonly FilterClause[]) {}

    static empty(): QueryFilter {
        return new QueryFilter([]);
    }

    /**
     * Add a clause. Empty value lists are ignored.
     */
    with(field: string, values: string | readonly string[], operator?: string): QueryFilter {
        const list = (typeof values === 'string' ? [values] : values)
            .map(sanitizeFilterValue)
            .filter((value) => value.length > 0);

        if (list.length === 0) return this;

        const clause: FilterClause = operator
            ? { field, operator, values: Object.freeze(list) }
            : { field, values: Object.freeze(list) };
        return new QueryFilter(Object.freeze([...this.clauses, Object.freeze(clause)]));
    }

    /**
     * Replace the values of the clause at `index`.
     */
    withClauseValues(index: number, values: readonly string[]): QueryFilter {
        const clauses = this.clauses.map((clause, i) =>
            i === index ? Object.freeze({ ...clause, values: Object.freeze([...values]) }) : clause
        );
        return new QueryFilter(Object.freeze(clauses));
    }

    get isEmpty(): boolean {
        return this.clauses.length === 0;
    }

    /**
     * Values of the first clause on `field`, or an empty list.
     */
    valuesOf(field: string): readonly string[] {
        return this.clauses.find((clause) => clause.field === field)?.values ?? [];
    }

    /**
     * Split every clause holding more than `maxValues` values into consecutive batches.
     * Returns one filter per combination of batches, in order.
     */
    batches(maxValues: number): QueryFilter[] {
        let filters: QueryFilter[] = [this];

        this.clauses.forEach((clause, index) => {
            if (clause.values.length <= maxValues) return;

            const chunks = chunk(clause.values, maxValues);
            filters = filters.flatMap((filter) => chunks.map((values) => filter.withClauseValues(index, values)));
        });

        return filters;
    }

    /**
     * Serialize to the OpenAlex `filter` parameter.
     */
    toString(): string {
        return this.clauses
            .map((clause) => {
                const key = clause.operator ? `${clause.field}.${clause.operator}` : clause.field;
                return `${key}:${clause.values.join('|')}`;
            })
            .join(',');
    }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const result: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        result.push(items.slice(i, i + size));
    }
    return result;
}
