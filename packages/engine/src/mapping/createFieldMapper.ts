/**
 * @fileoverview Mapper selection by configuration
 *
 * @module @ontocheck/engine/mapping/createFieldMapper
 */

import type { FieldMapper } from "../contracts/FieldMapping.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type { SimilarityService } from "../contracts/SimilarityService.js";
import { EvidenceWeightedMapper, type EvidenceWeights } from "./EvidenceWeightedMapper.js";
import { ExplicitMapper } from "./ExplicitMapper.js";
import { HeuristicMapper } from "./HeuristicMapper.js";

/**
 * Declarative mapper configuration.
 */
export type FieldMapperConfig =
    | {
        readonly strategy: "evidence";
        readonly similarityService?: SimilarityService;
        readonly weights?: Partial<EvidenceWeights>;
        readonly serviceConcurrency?: number;
        readonly logger?: EngineLogger;
    }
    | {
        readonly strategy: "heuristic";
        readonly logger?: EngineLogger;
    }
    | {
        readonly strategy: "explicit";
        readonly mapping: Readonly<Record<string, string>>;
    };

/**
 * Build the FieldMapper a configuration asks for.
 *
 * @example
 * ```typescript
 * const mapper = createFieldMapper({ strategy: "explicit", mapping: { dob: BIRTH_DATE_URI } });
 * ```
 */
export function createFieldMapper(config: FieldMapperConfig): FieldMapper {
    switch (config.strategy) {
        case "evidence":
            return new EvidenceWeightedMapper({
                similarityService : config.similarityService,
                weights           : config.weights,
                serviceConcurrency: config.serviceConcurrency,
                logger            : config.logger,
            });
        case "heuristic":
            return new HeuristicMapper({ logger: config.logger });
        case "explicit":
            return new ExplicitMapper(config.mapping);
    }
}
