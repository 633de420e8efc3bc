/**
 * @fileoverview Evidence-weighted mapper
 *
 * Scores every (column, property) pair from statistical evidence and,
 * optionally, an external similarity service, then solves the optimal
 * one-to-one assignment.
 *
 * Evidence components, each in [0, 1]:
 * - semantic: SimilarityService score (only when a service is configured)
 * - embedding: cosine of column embedding vs. property reference embedding
 * - numeric: proximity of shared numeric features to the reference vector
 * - categorical: agreement of shared categorical features with the reference
 * - type: primitive type compatibility
 *
 * A pair's score is the weighted mean of the components that have evidence.
 *
 * @module @ontocheck/engine/mapping/EvidenceWeightedMapper
 */

import type { Column } from "../contracts/Column.js";
import type {
    FieldMapper,
    FieldMapping,
    MappingOptions,
} from "../contracts/FieldMapping.js";
import { resolveMappingOptions } from "../contracts/FieldMapping.js";
import type { OntologyProperty, OntologySchema } from "../contracts/OntologySchema.js";
import type { SimilarityService } from "../contracts/SimilarityService.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";
import { MappingError, describeError } from "../contracts/errors.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { mappingFromScores, sortedProperties } from "./scoredMapping.js";
import {
    categoricalOverlap,
    cosineSimilarity,
    numericProximity,
    typeCompatibility,
} from "./similarity.js";

/**
 * Relative weight of each evidence component.
 */
export interface EvidenceWeights {
    readonly semantic: number;
    readonly embedding: number;
    readonly numeric: number;
    readonly categorical: number;
    readonly type: number;
}

export const DEFAULT_EVIDENCE_WEIGHTS: EvidenceWeights = Object.freeze({
    semantic   : 0.4,
    embedding  : 0.25,
    numeric    : 0.15,
    categorical: 0.1,
    type       : 0.1,
});

/**
 * Evidence-weighted mapper configuration.
 */
export interface EvidenceWeightedMapperConfig {
    /** External semantic similarity service */
    readonly similarityService?: SimilarityService;

    /** Component weights; missing keys take the defaults */
    readonly weights?: Partial<EvidenceWeights>;

    /** Maximum concurrent similarity-service calls (default: 4) */
    readonly serviceConcurrency?: number;

    readonly logger?: EngineLogger;
}

/**
 * Blend the available evidence components.
 *
 * @param column - Candidate column
 * @param property - Candidate property
 * @param weights - Component weights
 * @param semantic - Similarity-service score, if one was obtained
 */
export function evidenceScore(
    column: Column,
    property: OntologyProperty,
    weights: EvidenceWeights,
    semantic?: number
): number {
    const components: Array<[number, number]> = [];
    const reference = property.reference;

    if (semantic !== undefined) {
        components.push([weights.semantic, semantic]);
    }
    if (column.features.embedding && reference?.embedding) {
        components.push([weights.embedding, cosineSimilarity(column.features.embedding, reference.embedding)]);
    }
    if (reference) {
        const numeric = numericProximity(column.features.numeric, reference.numeric);
        if (numeric !== undefined) {
            components.push([weights.numeric, numeric]);
        }
        const categorical = categoricalOverlap(column.features.categorical, reference.categorical);
        if (categorical !== undefined) {
            components.push([weights.categorical, categorical]);
        }
    }
    components.push([weights.type, typeCompatibility(column.type, property.type)]);

    let weighted = 0;
    let totalWeight = 0;
    for (const [weight, value] of components) {
        weighted += weight * value;
        totalWeight += weight;
    }

    return totalWeight === 0 ? 0 : weighted / totalWeight;
}

/**
 * Evidence-weighted FieldMapper.
 *
 * The only strategy allowed to call a SimilarityService. Service failures
 * surface as MappingError with the original error as `cause`; callers
 * wanting a fallback catch it and re-run with the HeuristicMapper.
 *
 * @example
 * ```typescript
 * const mapper = new EvidenceWeightedMapper({
 *     similarityService: new OpenAISimilarityService(),
 *     weights          : { semantic: 0.6 },
 * });
 * const mapping = await mapper.map(columns, schema, { minConfidence: 0.55 });
 * ```
 */
export class EvidenceWeightedMapper implements FieldMapper {
    readonly id = "evidence";

    private readonly service?: SimilarityService;
    private readonly weights: EvidenceWeights;
    private readonly serviceConcurrency: number;
    private readonly logger: EngineLogger;

    constructor(config: EvidenceWeightedMapperConfig = {}) {
        this.service = config.similarityService;
        this.weights = { ...DEFAULT_EVIDENCE_WEIGHTS, ...config.weights };
        this.serviceConcurrency = config.serviceConcurrency ?? 4;
        this.logger = config.logger ?? silentLogger;

        for (const [name, weight] of Object.entries(this.weights)) {
            if (!(weight >= 0)) {
                throw new RangeError(`Evidence weight must be non-negative: ${name}=${weight}`);
            }
        }
    }

    async map(
        columns: readonly Column[],
        schema: OntologySchema,
        options?: MappingOptions
    ): Promise<FieldMapping> {
        const resolved = resolveMappingOptions(options);
        const properties = sortedProperties(schema);

        const semantic = await this.semanticScores(columns, properties);

        const scores = columns.map((column, row) =>
            properties.map((property, col) =>
                evidenceScore(column, property, this.weights, semantic?.[row][col])
            )
        );

        const mapping = mappingFromScores(this.id, columns, properties, scores, schema, resolved);

        this.logger.debug("Evidence mapping resolved", {
            columns          : columns.length,
            properties       : properties.length,
            mapped           : mapping.entries.length,
            similarityService: this.service?.id ?? null,
        });

        return mapping;
    }

    /**
     * Query the similarity service for every pair.
     *
     * @returns Matrix of service scores, or undefined without a service
     * @throws MappingError when the service fails or returns an invalid score
     */
    private async semanticScores(
        columns: readonly Column[],
        properties: readonly OntologyProperty[]
    ): Promise<number[][] | undefined> {
        const service = this.service;
        if (!service) {
            return undefined;
        }

        const pairs = columns.flatMap(column => properties.map(property => ({ column, property })));

        let flat: number[];
        try {
            flat = await mapWithConcurrency(pairs, this.serviceConcurrency, async ({ column, property }) => {
                const score = await service.score(column, property);
                if (!(score >= 0 && score <= 1)) {
                    throw new RangeError(
                        `Similarity score out of range for ${column.name} → ${property.uri}: ${score}`
                    );
                }
                return score;
            });
        }
        catch (error) {
            this.logger.error("Similarity service failed", {
                serviceId: service.id,
                error    : describeError(error),
            });
            throw new MappingError(
                "similarity-service",
                `Similarity service ${service.id} failed: ${describeError(error)}`,
                { cause: error }
            );
        }

        return columns.map((_, row) => flat.slice(row * properties.length, (row + 1) * properties.length));
    }
}
