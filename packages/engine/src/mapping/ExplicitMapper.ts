/**
 * @fileoverview Explicit mapper
 *
 * Uses a caller-supplied column → property dictionary as ground truth.
 * Every entry gets confidence 1.0; no inference happens.
 *
 * @module @ontocheck/engine/mapping/ExplicitMapper
 */

import type { Column } from "../contracts/Column.js";
import type {
    FieldMapper,
    FieldMapping,
    MappingEntry,
    MappingOptions,
} from "../contracts/FieldMapping.js";
import { createFieldMapping, resolveMappingOptions } from "../contracts/FieldMapping.js";
import type { OntologySchema } from "../contracts/OntologySchema.js";
import { MappingError } from "../contracts/errors.js";
import { sortedProperties } from "./scoredMapping.js";

/**
 * Maps columns from a fixed dictionary.
 *
 * - Unknown property URIs are rejected with MappingError
 * - Dictionary keys that are not dataset columns become warnings
 * - Two columns on one property are rejected unless allowManyToOne is set
 */
export class ExplicitMapper implements FieldMapper {
    readonly id = "explicit";

    private readonly dictionary: ReadonlyMap<string, string>;

    /**
     * @param dictionary - column name → property URI
     */
    constructor(dictionary: Readonly<Record<string, string>>) {
        this.dictionary = new Map(Object.entries(dictionary));
    }

    async map(
        columns: readonly Column[],
        schema: OntologySchema,
        options?: MappingOptions
    ): Promise<FieldMapping> {
        const resolved = resolveMappingOptions(options);
        const known = new Set(sortedProperties(schema).map(p => p.uri));
        const present = new Set(columns.map(c => c.name));

        const entries: MappingEntry[] = [];
        const warnings: string[] = [];

        for (const [column, propertyUri] of this.dictionary) {
            if (!known.has(propertyUri)) {
                throw new MappingError(
                    "invalid-mapping",
                    `Column ${column} is mapped to unknown property: ${propertyUri}`
                );
            }
            if (!present.has(column)) {
                warnings.push(`Mapped column not present in dataset: ${column}`);
                continue;
            }
            entries.push({ column, propertyUri, confidence: 1.0 });
        }

        return createFieldMapping(this.id, columns, schema, entries, resolved, warnings);
    }
}
