/**
 * Column Contract
 *
 * A dataset column as seen by the mapping engine: its name, the primitive
 * type the profiler inferred, and the statistical fingerprint of its values.
 *
 * Columns are created once at profiling time and never mutated.
 */

/**
 * Primitive value shapes shared by columns and ontology properties.
 */
export type PrimitiveType =
    | "string"
    | "integer"
    | "number"
    | "boolean"
    | "date"
    | "datetime"
    | "unknown";

/**
 * Statistical and semantic summary of one column.
 *
 * @example
 * ```typescript
 * const features: FeatureVector = {
 *     numeric    : { null_rate: 0.02, distinct_ratio: 0.97, mean_length: 10 },
 *     categorical: { pattern: "9999-99-99", inferred_type: "date" },
 * };
 * ```
 */
export interface FeatureVector {
    /** Named numeric features (null rate, cardinality ratio, summary statistics) */
    readonly numeric: Readonly<Record<string, number>>;

    /** Named categorical features (value pattern signatures, inferred type) */
    readonly categorical: Readonly<Record<string, string>>;

    /** Optional semantic embedding */
    readonly embedding?: readonly number[];
}

/**
 * A profiled dataset column.
 */
export interface Column {
    /** Column name, unique within a dataset */
    readonly name: string;

    /** Declared or inferred primitive type */
    readonly type: PrimitiveType;

    /** Feature vector produced by the profiler */
    readonly features: FeatureVector;
}

/**
 * Create a frozen FeatureVector.
 *
 * @param numeric - Numeric features
 * @param categorical - Categorical features
 * @param embedding - Optional embedding
 */
export function createFeatureVector(
    numeric: Record<string, number> = {},
    categorical: Record<string, string> = {},
    embedding?: readonly number[]
): FeatureVector {
    return Object.freeze({
        numeric    : Object.freeze({ ...numeric }),
        categorical: Object.freeze({ ...categorical }),
        ...(embedding && { embedding: Object.freeze([...embedding]) }),
    });
}

/**
 * Create a frozen Column.
 *
 * @param name - Column name
 * @param type - Primitive type
 * @param features - Feature vector (defaults to an empty one)
 */
export function createColumn(
    name: string,
    type: PrimitiveType = "unknown",
    features: FeatureVector = createFeatureVector()
): Column {
    return Object.freeze({ name, type, features });
}
