/**
 * Ontology Schema Contract
 *
 * A read-only catalog of canonical properties (FHIR, Schema.org, ...) that
 * validation rules attach to.
 */

import type { FeatureVector, PrimitiveType } from "./Column.js";

/**
 * A canonical, URI-identified field definition.
 *
 * @example
 * ```typescript
 * const birthDate: OntologyProperty = {
 *     uri     : "http://hl7.org/fhir/Patient.birthDate",
 *     name    : "birthDate",
 *     type    : "date",
 *     aliases : ["dob", "date of birth"],
 *     required: true,
 * };
 * ```
 */
export interface OntologyProperty {
    /** Property identifier */
    readonly uri: string;

    /** Human-readable name */
    readonly name: string;

    /** Expected primitive type */
    readonly type: PrimitiveType;

    /** Alternative names used by the heuristic mapper */
    readonly aliases?: readonly string[];

    /** Textual description, used by semantic similarity services */
    readonly description?: string;

    /** Whether a dataset is expected to carry this property */
    readonly required?: boolean;

    /** Reference fingerprint of typical values */
    readonly reference?: FeatureVector;
}

/**
 * Read-only property catalog.
 */
export interface OntologySchema {
    /** Schema identifier */
    readonly id: string;

    /** All properties of the schema */
    properties(): readonly OntologyProperty[];
}

/**
 * Create an in-memory OntologySchema over a fixed property list.
 *
 * @param id - Schema identifier
 * @param properties - Properties (duplicated URIs are rejected)
 * @throws Error if two properties share a URI
 */
export function createOntologySchema(
    id: string,
    properties: readonly OntologyProperty[]
): OntologySchema {
    const seen = new Set<string>();
    for (const property of properties) {
        if (seen.has(property.uri)) {
            throw new Error(`Duplicate ontology property: ${property.uri}`);
        }
        seen.add(property.uri);
    }

    const frozen = Object.freeze(properties.map(p => Object.freeze({ ...p })));

    return {
        id,
        properties: () => frozen,
    };
}
