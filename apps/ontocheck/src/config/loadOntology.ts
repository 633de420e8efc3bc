/**
 * @fileoverview Ontology loader
 *
 * Loads an ontology schema from a YAML file:
 *
 * ```yaml
 * id: fhir-patient
 * properties:
 *   - uri: http://hl7.org/fhir/Patient.birthDate
 *     name: birthDate
 *     type: date
 *     aliases: [dob, date of birth]
 *     required: true
 *     reference:
 *       numeric: { null_rate: 0 }
 *       categorical: { pattern: "9999-99-99" }
 * ```
 *
 * @module config/loadOntology
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
    createFeatureVector,
    createOntologySchema,
    type OntologyProperty,
    type OntologySchema,
} from "@ontocheck/engine";
import { formatIssues } from "./loadSettings.js";

const PrimitiveTypeSchema = z.enum(["string", "integer", "number", "boolean", "date", "datetime", "unknown"]);

const PropertySchema = z.object({
    uri        : z.string().min(1),
    name       : z.string().min(1),
    type       : PrimitiveTypeSchema.default("unknown"),
    aliases    : z.array(z.string()).optional(),
    description: z.string().optional(),
    required   : z.boolean().optional(),
    reference  : z.object({
        numeric    : z.record(z.number()).default({}),
        categorical: z.record(z.string()).default({}),
        embedding  : z.array(z.number()).optional(),
    }).optional(),
});

const OntologyFileSchema = z.object({
    id        : z.string().min(1),
    properties: z.array(PropertySchema).min(1),
});

/**
 * Parse ontology YAML text.
 *
 * @param content - YAML text
 * @param where - Name used in error messages
 * @throws Error on invalid content or duplicate property URIs
 */
export function parseOntology(content: string, where: string): OntologySchema {
    const result = OntologyFileSchema.safeParse(parseYaml(content));
    if (!result.success) {
        throw new Error(`Invalid ontology file ${where}: ${formatIssues(result.error)}`);
    }

    const properties: OntologyProperty[] = result.data.properties.map(raw => ({
        uri : raw.uri,
        name: raw.name,
        type: raw.type,
        ...(raw.aliases && { aliases: raw.aliases }),
        ...(raw.description !== undefined && { description: raw.description }),
        ...(raw.required !== undefined && { required: raw.required }),
        ...(raw.reference && {
            reference: createFeatureVector(raw.reference.numeric, raw.reference.categorical, raw.reference.embedding),
        }),
    }));

    return createOntologySchema(result.data.id, properties);
}

/**
 * Load an ontology schema from a YAML file.
 *
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadOntology(filePath: string): OntologySchema {
    if (!existsSync(filePath)) {
        throw new Error(`Ontology file not found: ${filePath}`);
    }
    return parseOntology(readFileSync(filePath, "utf-8"), filePath);
}
