/**
 * @fileoverview Column profiler
 *
 * Turns a sample of records into one Column per dataset column, carrying the
 * fingerprint the evidence-weighted mapper compares against ontology
 * reference vectors.
 *
 * Numeric features:
 * - null_rate, distinct_ratio, mean_length
 * - numeric_ratio, date_ratio, boolean_ratio
 * - min, max, mean (only when every present value is numeric)
 *
 * Categorical features:
 * - pattern: most frequent value signature (digits → 9, letters → A/a)
 * - inferred_type
 *
 * @module ontocheck/profiling/profileColumns
 */

import {
    conformsToType,
    createColumn,
    createFeatureVector,
    isAbsent,
    toNumber,
    type Column,
    type DataRecord,
    type PrimitiveType,
} from "@ontocheck/engine";

/**
 * Records examined when no sample size is given.
 */
export const DEFAULT_SAMPLE_SIZE = 1000;

/**
 * Signature of a value's shape: digits become 9, upper-case letters A,
 * lower-case letters a; everything else is kept.
 *
 * @example
 * ```typescript
 * valuePattern("1985-02-13"); // "9999-99-99"
 * valuePattern("Smith");      // "Aaaaa"
 * ```
 */
export function valuePattern(text: string): string {
    return text
        .replace(/[0-9]/g, "9")
        .replace(/[A-Z]/g, "A")
        .replace(/[a-z]/g, "a");
}

/**
 * Narrowest primitive type every value conforms to.
 */
export function inferType(values: readonly unknown[]): PrimitiveType {
    if (values.length === 0) {
        return "unknown";
    }

    const candidates: PrimitiveType[] = ["boolean", "integer", "number", "date", "datetime"];
    for (const type of candidates) {
        if (values.every(v => conformsToType(v, type))) {
            return type;
        }
    }
    return "string";
}

function ratio(count: number, total: number): number {
    return total === 0 ? 0 : count / total;
}

function mostFrequent(values: readonly string[]): string | undefined {
    const counts = new Map<string, number>();
    let best: string | undefined;
    let bestCount = 0;

    for (const value of values) {
        const count = (counts.get(value) ?? 0) + 1;
        counts.set(value, count);
        // First value to reach the highest count wins ties
        if (count > bestCount) {
            best = value;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Column names in first-seen order.
 */
export function columnNames(records: readonly DataRecord[]): string[] {
    const names: string[] = [];
    const seen = new Set<string>();

    for (const record of records) {
        for (const key of Object.keys(record)) {
            if (!seen.has(key)) {
                seen.add(key);
                names.push(key);
            }
        }
    }
    return names;
}

/**
 * Profile a single column over a record sample.
 *
 * @param name - Column name
 * @param records - Sample records (a missing key counts as null)
 */
export function profileColumn(name: string, records: readonly DataRecord[]): Column {
    const present = records
        .map(record => record[name])
        .filter(value => !isAbsent(value));
    const texts = present.map(value => (typeof value === "string" ? value.trim() : String(value)));

    const type = inferType(present);
    const numeric: Record<string, number> = {
        null_rate     : ratio(records.length - present.length, records.length),
        distinct_ratio: ratio(new Set(texts).size, present.length),
        mean_length   : ratio(texts.reduce((sum, t) => sum + t.length, 0), present.length),
        numeric_ratio : ratio(present.filter(v => conformsToType(v, "number")).length, present.length),
        date_ratio    : ratio(present.filter(v => conformsToType(v, "date")).length, present.length),
        boolean_ratio : ratio(present.filter(v => conformsToType(v, "boolean")).length, present.length),
    };

    if (type === "integer" || type === "number") {
        const numbers = present
            .map(value => toNumber(value))
            .filter((value): value is number => value !== null);
        numeric.min = numbers.reduce((low, n) => Math.min(low, n), Infinity);
        numeric.max = numbers.reduce((high, n) => Math.max(high, n), -Infinity);
        numeric.mean = numbers.reduce((sum, n) => sum + n, 0) / numbers.length;
    }

    const categorical: Record<string, string> = { inferred_type: type };
    const pattern = mostFrequent(texts.map(valuePattern));
    if (pattern !== undefined) {
        categorical.pattern = pattern;
    }

    return createColumn(name, type, createFeatureVector(numeric, categorical));
}

/**
 * Profile every column found in a record sample.
 *
 * @param records - Records to examine; only the first `sampleSize` are used
 * @param sampleSize - Sample bound (default: 1000)
 * @param names - Column order to use instead of first-seen order
 */
export function profileColumns(
    records: readonly DataRecord[],
    sampleSize: number = DEFAULT_SAMPLE_SIZE,
    names?: readonly string[]
): Column[] {
    const sample = records.slice(0, sampleSize);
    return (names ?? columnNames(sample)).map(name => profileColumn(name, sample));
}
