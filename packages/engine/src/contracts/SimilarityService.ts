/**
 * SimilarityService Contract
 *
 * Optional external semantic comparison of a column against an ontology
 * property (an embedding model, an LLM, a lookup service). Only the
 * evidence-weighted mapper consults it.
 *
 * Implementations must be safe to call concurrently and must be idempotent.
 * Failures are not swallowed: the mapper turns them into a MappingError.
 */

import type { Column } from "./Column.js";
import type { OntologyProperty } from "./OntologySchema.js";

export interface SimilarityService {
    /** Unique identifier for this service */
    readonly id: string;

    /**
     * Score how well a column's values and fingerprint match a property.
     *
     * @param column - The profiled column (its FeatureVector is the evidence)
     * @param property - The candidate property
     * @returns Similarity in [0, 1]
     */
    score(column: Column, property: OntologyProperty): Promise<number>;
}
