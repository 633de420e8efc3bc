/**
 * @fileoverview Heuristic mapper
 *
 * Name-based mapping: no external service, always available.
 *
 * @module @ontocheck/engine/mapping/HeuristicMapper
 */

import type { Column } from "../contracts/Column.js";
import type {
    FieldMapper,
    FieldMapping,
    MappingOptions,
} from "../contracts/FieldMapping.js";
import { resolveMappingOptions } from "../contracts/FieldMapping.js";
import type { OntologyProperty, OntologySchema } from "../contracts/OntologySchema.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";
import { mappingFromScores, sortedProperties } from "./scoredMapping.js";
import { nameSimilarity, uriFragment } from "./similarity.js";

/**
 * Labels a column name is compared against: the property name, its
 * aliases and the URI fragment.
 */
export function propertyLabels(property: OntologyProperty): string[] {
    return [property.name, ...(property.aliases ?? []), uriFragment(property.uri)];
}

/**
 * Best name similarity between a column and any label of a property.
 */
export function heuristicScore(column: Column, property: OntologyProperty): number {
    let best = 0;
    for (const label of propertyLabels(property)) {
        best = Math.max(best, nameSimilarity(column.name, label));
    }
    return best;
}

export interface HeuristicMapperConfig {
    readonly logger?: EngineLogger;
}

/**
 * Maps columns by fuzzy name similarity.
 *
 * @example
 * ```typescript
 * const mapper = new HeuristicMapper();
 * const mapping = await mapper.map(columns, schema);
 * // "birth_date" → http://hl7.org/fhir/Patient.birthDate (1.0)
 * ```
 */
export class HeuristicMapper implements FieldMapper {
    readonly id = "heuristic";

    private readonly logger: EngineLogger;

    constructor(config: HeuristicMapperConfig = {}) {
        this.logger = config.logger ?? silentLogger;
    }

    async map(
        columns: readonly Column[],
        schema: OntologySchema,
        options?: MappingOptions
    ): Promise<FieldMapping> {
        const resolved = resolveMappingOptions(options);
        const properties = sortedProperties(schema);

        const scores = columns.map(column =>
            properties.map(property => heuristicScore(column, property))
        );

        const mapping = mappingFromScores(this.id, columns, properties, scores, schema, resolved);

        this.logger.debug("Heuristic mapping resolved", {
            columns : columns.length,
            mapped  : mapping.entries.length,
            unmapped: mapping.unmappedColumns.length,
        });

        return mapping;
    }
}
