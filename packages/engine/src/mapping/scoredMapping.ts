/**
 * @fileoverview Score-matrix → FieldMapping
 *
 * Shared tail of the evidence-weighted and heuristic strategies: given a
 * complete columns × properties score matrix, run the assignment and build
 * the FieldMapping.
 *
 * @module @ontocheck/engine/mapping/scoredMapping
 */

import type { Column } from "../contracts/Column.js";
import type {
    FieldMapping,
    MappingEntry,
    MappingStrategy,
    ResolvedMappingOptions,
} from "../contracts/FieldMapping.js";
import { createFieldMapping } from "../contracts/FieldMapping.js";
import type { OntologyProperty, OntologySchema } from "../contracts/OntologySchema.js";
import { MappingError } from "../contracts/errors.js";
import { bestPerRow, maximumWeightAssignment } from "./assignment.js";

/**
 * Schema properties ordered by URI, the column order of every score matrix.
 *
 * @throws MappingError if the schema has no properties
 */
export function sortedProperties(schema: OntologySchema): OntologyProperty[] {
    const properties = [...schema.properties()];

    if (properties.length === 0) {
        throw new MappingError("empty-schema", `Ontology schema has no properties: ${schema.id}`);
    }

    return properties.sort((a, b) => (a.uri < b.uri ? -1 : a.uri > b.uri ? 1 : 0));
}

/**
 * Assign columns to properties from a score matrix.
 *
 * @param strategy - Producing strategy
 * @param columns - Dataset columns (matrix rows)
 * @param properties - Properties ordered by URI (matrix columns)
 * @param scores - Score matrix
 * @param schema - Schema the properties come from
 * @param options - Resolved mapping options
 */
export function mappingFromScores(
    strategy: MappingStrategy,
    columns: readonly Column[],
    properties: readonly OntologyProperty[],
    scores: readonly (readonly number[])[],
    schema: OntologySchema,
    options: ResolvedMappingOptions
): FieldMapping {
    const pairs = options.allowManyToOne
        ? bestPerRow(scores, options.minConfidence)
        : maximumWeightAssignment(scores, options.minConfidence);

    const entries: MappingEntry[] = pairs.map(pair => ({
        column     : columns[pair.row].name,
        propertyUri: properties[pair.col].uri,
        confidence : pair.score,
    }));

    return createFieldMapping(strategy, columns, schema, entries, options);
}
