/**
 * Field Mapping Contract
 *
 * The resolved column → property assignment for a dataset. Built once per
 * run by a FieldMapper and read-only afterwards; re-mapping produces a new
 * FieldMapping.
 *
 * Invariants:
 * - A column maps to at most one property
 * - A property is the target of at most one column, unless the mapping was
 *   built with `allowManyToOne`
 * - Confidence is within [0, 1]
 */

import type { Column } from "./Column.js";
import type { OntologySchema } from "./OntologySchema.js";
import { MappingError } from "./errors.js";

/**
 * Identifier of the strategy that produced a mapping.
 */
export type MappingStrategy = "evidence" | "heuristic" | "explicit";

/**
 * One column → property assignment.
 */
export interface MappingEntry {
    readonly column: string;
    readonly propertyUri: string;
    readonly confidence: number;
}

/**
 * Result of a mapping pass.
 */
export interface FieldMapping {
    /** Strategy that produced the mapping */
    readonly strategy: MappingStrategy;

    /** Assignments, in column declaration order */
    readonly entries: readonly MappingEntry[];

    /** Columns left without a property */
    readonly unmappedColumns: readonly string[];

    /** Required properties no column was assigned to */
    readonly unmappedRequired: readonly string[];

    /** Non-fatal findings (unmapped required properties, ignored dictionary keys) */
    readonly warnings: readonly string[];

    /** Whether several columns may target one property */
    readonly allowManyToOne: boolean;
}

/**
 * Options shared by all mapping strategies.
 */
export interface MappingOptions {
    /** Pairs scoring below this are never assigned (default: 0.5) */
    readonly minConfidence?: number;

    /** Fail when a required property stays unmapped (default: false) */
    readonly strict?: boolean;

    /** Permit several columns to map to one property (default: false) */
    readonly allowManyToOne?: boolean;
}

/**
 * Mapping options with defaults applied.
 */
export type ResolvedMappingOptions = Required<MappingOptions>;

export const DEFAULT_MIN_CONFIDENCE = 0.5;

/**
 * Apply defaults and validate mapping options.
 *
 * @throws RangeError if minConfidence is outside [0, 1]
 */
export function resolveMappingOptions(options: MappingOptions = {}): ResolvedMappingOptions {
    const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;

    if (!(minConfidence >= 0 && minConfidence <= 1)) {
        throw new RangeError(`minConfidence must be within [0, 1], got ${minConfidence}`);
    }

    return {
        minConfidence,
        strict        : options.strict ?? false,
        allowManyToOne: options.allowManyToOne ?? false,
    };
}

/**
 * FieldMapper capability.
 *
 * Strategies are independent implementations selected by configuration,
 * not subclasses of a common base.
 *
 * @example
 * ```typescript
 * const mapper: FieldMapper = new HeuristicMapper();
 * const mapping = await mapper.map(columns, schema, { minConfidence: 0.6 });
 * ```
 */
export interface FieldMapper {
    /** Strategy identifier */
    readonly id: MappingStrategy;

    /**
     * Map dataset columns onto schema properties.
     *
     * @throws MappingError on an empty schema, on strict-mode violations,
     *         or when an external similarity service fails
     */
    map(
        columns: readonly Column[],
        schema: OntologySchema,
        options?: MappingOptions
    ): Promise<FieldMapping>;
}

/**
 * Type guard for FieldMapper implementations.
 */
export function isFieldMapper(obj: unknown): obj is FieldMapper {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "map" in obj &&
        typeof obj.map === "function"
    );
}

/**
 * Build a frozen FieldMapping, enforcing the uniqueness invariants.
 *
 * Entries are reordered to follow `columns`. Required properties without a
 * column become warnings, or a MappingError when `options.strict` is set.
 *
 * @param strategy - Producing strategy
 * @param columns - Dataset columns in declaration order
 * @param schema - Ontology schema the entries point into
 * @param entries - Assignments
 * @param options - Resolved mapping options
 * @param warnings - Warnings collected by the strategy
 * @throws MappingError if an invariant is violated or strict mode fails
 */
export function createFieldMapping(
    strategy: MappingStrategy,
    columns: readonly Column[],
    schema: OntologySchema,
    entries: readonly MappingEntry[],
    options: ResolvedMappingOptions,
    warnings: readonly string[] = []
): FieldMapping {
    const byColumn = new Map<string, MappingEntry>();
    const targets = new Set<string>();

    for (const entry of entries) {
        if (byColumn.has(entry.column)) {
            throw new MappingError("invalid-mapping", `Column mapped twice: ${entry.column}`);
        }
        if (!options.allowManyToOne && targets.has(entry.propertyUri)) {
            throw new MappingError(
                "invalid-mapping",
                `Property targeted by more than one column: ${entry.propertyUri}`
            );
        }
        if (!(entry.confidence >= 0 && entry.confidence <= 1)) {
            throw new MappingError(
                "invalid-mapping",
                `Confidence out of range for column ${entry.column}: ${entry.confidence}`
            );
        }
        byColumn.set(entry.column, Object.freeze({ ...entry }));
        targets.add(entry.propertyUri);
    }

    const ordered: MappingEntry[] = [];
    const unmappedColumns: string[] = [];
    for (const column of columns) {
        const entry = byColumn.get(column.name);
        if (entry) {
            ordered.push(entry);
        }
        else {
            unmappedColumns.push(column.name);
        }
    }

    const unmappedRequired = schema.properties()
        .filter(p => p.required === true && !targets.has(p.uri))
        .map(p => p.uri);

    if (options.strict && unmappedRequired.length > 0) {
        throw new MappingError(
            "required-unmapped",
            `Required properties without a column at or above ${options.minConfidence}: ${unmappedRequired.join(", ")}`
        );
    }

    const allWarnings = [
        ...warnings,
        ...unmappedRequired.map(uri => `Required property not mapped: ${uri}`),
    ];

    return Object.freeze({
        strategy,
        entries         : Object.freeze(ordered),
        unmappedColumns : Object.freeze(unmappedColumns),
        unmappedRequired: Object.freeze(unmappedRequired),
        warnings        : Object.freeze(allWarnings),
        allowManyToOne  : options.allowManyToOne,
    });
}

/**
 * Look up the entry for a column.
 */
export function getMappingEntry(mapping: FieldMapping, column: string): MappingEntry | undefined {
    return mapping.entries.find(e => e.column === column);
}
