/**
 * @fileoverview Explicit mapping loader
 *
 * Reads a column → property URI dictionary for the explicit strategy:
 *
 * ```yaml
 * mapping:
 *   dob: http://hl7.org/fhir/Patient.birthDate
 *   sex: http://hl7.org/fhir/Patient.gender
 * ```
 *
 * @module config/loadMapping
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { formatIssues } from "./loadSettings.js";

const MappingFileSchema = z.object({
    mapping: z.record(z.string().min(1)),
});

/**
 * Load an explicit mapping dictionary.
 *
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadMapping(filePath: string): Record<string, string> {
    if (!existsSync(filePath)) {
        throw new Error(`Mapping file not found: ${filePath}`);
    }

    const result = MappingFileSchema.safeParse(parseYaml(readFileSync(filePath, "utf-8")));
    if (!result.success) {
        throw new Error(`Invalid mapping file ${filePath}: ${formatIssues(result.error)}`);
    }
    return result.data.mapping;
}
