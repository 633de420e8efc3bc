/**
 * @fileoverview Field mapping barrel exports
 *
 * @module @ontocheck/engine/mapping
 */

export {
    normalizeName,
    tokenize,
    levenshtein,
    levenshteinRatio,
    tokenJaccard,
    nameSimilarity,
    uriFragment,
    cosineSimilarity,
    numericProximity,
    categoricalOverlap,
    typeCompatibility,
} from "./similarity.js";
export {
    type AssignmentPair,
    SCORE_SCALE,
    maximumWeightAssignment,
    bestPerRow,
    assignmentTotal,
} from "./assignment.js";
export { sortedProperties, mappingFromScores } from "./scoredMapping.js";
export {
    HeuristicMapper,
    type HeuristicMapperConfig,
    propertyLabels,
    heuristicScore,
} from "./HeuristicMapper.js";
export { ExplicitMapper } from "./ExplicitMapper.js";
export {
    EvidenceWeightedMapper,
    type EvidenceWeightedMapperConfig,
    type EvidenceWeights,
    DEFAULT_EVIDENCE_WEIGHTS,
    evidenceScore,
} from "./EvidenceWeightedMapper.js";
export { createFieldMapper, type FieldMapperConfig } from "./createFieldMapper.js";
