/**
 * @fileoverview Similarity primitives
 *
 * Deterministic scoring helpers used by the mapping strategies. Every
 * function returns a value in [0, 1]; helpers that can have no evidence
 * return undefined instead of guessing.
 *
 * @module @ontocheck/engine/mapping/similarity
 */

import type { PrimitiveType } from "../contracts/Column.js";

/**
 * Normalise an identifier for comparison.
 *
 * Splits camelCase, turns separators into spaces and lower-cases.
 *
 * @example
 * ```typescript
 * normalizeName("birthDate");    // "birth date"
 * normalizeName("BIRTH_DATE");   // "birth date"
 * normalizeName("HTTPStatus");   // "http status"
 * ```
 */
export function normalizeName(name: string): string {
    return name
        .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
        .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, " ")
        .trim();
}

/**
 * Tokens of a normalised name.
 */
export function tokenize(name: string): string[] {
    const normalized = normalizeName(name);
    return normalized.length === 0 ? [] : normalized.split(" ");
}

/**
 * Levenshtein edit distance.
 */
export function levenshtein(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    if (a.length === 0) {
        return b.length;
    }
    if (b.length === 0) {
        return a.length;
    }

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
            current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
        }
        previous = current;
    }
    return previous[b.length];
}

/**
 * Edit distance scaled to [0, 1]; 1 means identical.
 */
export function levenshteinRatio(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) {
        return 1;
    }
    return 1 - levenshtein(a, b) / longest;
}

/**
 * Jaccard index of the token sets of two names.
 */
export function tokenJaccard(a: string, b: string): number {
    const left = new Set(tokenize(a));
    const right = new Set(tokenize(b));

    if (left.size === 0 && right.size === 0) {
        return 1;
    }

    let shared = 0;
    for (const token of left) {
        if (right.has(token)) {
            shared++;
        }
    }
    return shared / (left.size + right.size - shared);
}

/**
 * Similarity of two identifiers.
 *
 * Names that normalise to the same text (ignoring spaces) score 1.
 * Otherwise the better of the compact edit-distance ratio and the token
 * Jaccard index.
 */
export function nameSimilarity(a: string, b: string): number {
    const compactA = normalizeName(a).replace(/ /g, "");
    const compactB = normalizeName(b).replace(/ /g, "");

    if (compactA === compactB) {
        return 1;
    }

    return Math.max(levenshteinRatio(compactA, compactB), tokenJaccard(a, b));
}

/**
 * Last segment of a URI, after the final "#" or "/".
 *
 * @example
 * ```typescript
 * uriFragment("http://hl7.org/fhir/Patient.birthDate"); // "Patient.birthDate"
 * ```
 */
export function uriFragment(uri: string): string {
    const cut = Math.max(uri.lastIndexOf("#"), uri.lastIndexOf("/"));
    return cut >= 0 ? uri.slice(cut + 1) : uri;
}

/**
 * Cosine similarity clamped to [0, 1].
 *
 * Vectors of different length or zero norm have no comparable direction
 * and score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length === 0 || a.length !== b.length) {
        return 0;
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }

    return Math.min(1, Math.max(0, dot / (Math.sqrt(normA) * Math.sqrt(normB))));
}

/**
 * Mean closeness of the numeric features both vectors carry.
 *
 * Per feature: `1 - |x - y| / (|x| + |y|)`, with two zeros counting as equal.
 *
 * @returns undefined when the vectors share no feature
 */
export function numericProximity(
    a: Readonly<Record<string, number>>,
    b: Readonly<Record<string, number>>
): number | undefined {
    let total = 0;
    let shared = 0;

    for (const key of Object.keys(a).sort()) {
        const right = b[key];
        if (right === undefined) {
            continue;
        }
        const left = a[key];
        const scale = Math.abs(left) + Math.abs(right);
        total += scale === 0 ? 1 : 1 - Math.abs(left - right) / scale;
        shared++;
    }

    return shared === 0 ? undefined : total / shared;
}

/**
 * Fraction of shared categorical features with equal values.
 *
 * @returns undefined when the vectors share no feature
 */
export function categoricalOverlap(
    a: Readonly<Record<string, string>>,
    b: Readonly<Record<string, string>>
): number | undefined {
    let equal = 0;
    let shared = 0;

    for (const key of Object.keys(a)) {
        const right = b[key];
        if (right === undefined) {
            continue;
        }
        shared++;
        if (a[key] === right) {
            equal++;
        }
    }

    return shared === 0 ? undefined : equal / shared;
}

const TYPE_AFFINITY: Readonly<Record<string, number>> = {
    "integer:number" : 0.8,
    "number:integer" : 0.8,
    "date:datetime"  : 0.8,
    "datetime:date"  : 0.8,
};

/**
 * Compatibility of a column type with a property's expected type.
 *
 * - same type: 1
 * - either side unknown: 0.5
 * - integer/number or date/datetime: 0.8
 * - a string column against any property: 0.3 (formatted values)
 * - anything else: 0
 */
export function typeCompatibility(columnType: PrimitiveType, propertyType: PrimitiveType): number {
    if (columnType === propertyType) {
        return 1;
    }
    if (columnType === "unknown" || propertyType === "unknown") {
        return 0.5;
    }
    const affinity = TYPE_AFFINITY[`${columnType}:${propertyType}`];
    if (affinity !== undefined) {
        return affinity;
    }
    return columnType === "string" ? 0.3 : 0;
}
