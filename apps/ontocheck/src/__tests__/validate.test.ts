/**
 * @fileoverview Integration tests for the validation pipeline
 *
 * Runs the bundled ontology and rule pack against temporary JSON Lines
 * files, end to end.
 *
 * Tests cover:
 * - Explicit mapping run with failing records and exit code 1
 * - Report file output
 * - Record stream failure after profiling (partial report, exit code 2)
 * - Mapper selection
 *
 * @module __tests__/validate
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import type { SimilarityService } from "@ontocheck/engine";
import type { ValidateArgs } from "../cli/parseArgs.js";
import { SettingsSchema } from "../config/loadSettings.js";
import { FallbackMapper } from "../mapping/FallbackMapper.js";
import { buildMapper, runValidation } from "../validate.js";

const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

/**
 * Create a mock logger for testing.
 */
function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

const PATIENTS = [
    { mrn: "MRN-1", dob: "1985-02-13", sex: "female" },
    { mrn: "MRN-2", dob: "02/31/1985", sex: "male" },
    { mrn: "MRN-3", dob: "1990-07-04", sex: "F" },
];

const MAPPING_YAML = `mapping:
  mrn: http://hl7.org/fhir/Patient.identifier
  dob: http://hl7.org/fhir/Patient.birthDate
  sex: http://hl7.org/fhir/Patient.gender
`;

describe("runValidation", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "ontocheck-validate-"));
        writeFileSync(join(dir, "mapping.yml"), MAPPING_YAML);
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function writeRecords(lines: string[]): string {
        const filePath = join(dir, "patients.jsonl");
        writeFileSync(filePath, `${lines.join("\n")}\n`);
        return filePath;
    }

    function createArgs(source: string, overrides: Partial<ValidateArgs> = {}): ValidateArgs {
        return {
            command : "validate",
            source,
            ontology: join(CONFIG_DIR, "ontology.yml"),
            rules   : [join(CONFIG_DIR, "rules")],
            strategy: "explicit",
            mapping : join(dir, "mapping.yml"),
            config  : join(dir, "ontocheck.yml"),
            ...overrides,
        };
    }

    // Scenario: Two of three patients fail a rule
    it("should validate the records and return exit code 1", async () => {
        const source = writeRecords(PATIENTS.map(p => JSON.stringify(p)));
        const out = join(dir, "reports", "report.json");

        const outcome = await runValidation(createArgs(source, { out }), {
            env   : {},
            logger: createMockLogger(),
        });

        expect(outcome.exitCode).toBe(1);
        expect(outcome.mapping?.strategy).toBe("explicit");

        const { records, rules } = outcome.report.summary;
        expect(records.total_count).toBe(3);
        expect(records.passed_count).toBe(1);
        expect(records.failed_indices).toEqual([1, 2]);
        expect(rules.total_count).toBe(12);
        expect(rules.failed_count).toBe(2);

        expect(outcome.report.error_records[0]).toEqual({
            index : 1,
            record: PATIENTS[1],
            errors: [{
                rule_id : "birth-date-format",
                field   : "dob",
                message : "Invalid calendar date in dob: 02/31/1985",
                severity: "error",
                status  : "fail",
            }],
        });
        expect(outcome.report.error_records[1].errors[0].rule_id).toBe("gender-code");

        expect(existsSync(out)).toBe(true);
        expect(JSON.parse(readFileSync(out, "utf-8"))).toHaveProperty("status", "complete");
    });

    // Scenario: Every record passes
    it("should return exit code 0 when all records pass", async () => {
        const source = writeRecords([JSON.stringify(PATIENTS[0])]);

        const outcome = await runValidation(createArgs(source), { env: {}, logger: createMockLogger() });

        expect(outcome.exitCode).toBe(0);
        expect(outcome.report.status).toBe("complete");
    });

    // Scenario: The file breaks after the profiled sample
    it("should return the partial report when the record stream fails", async () => {
        writeFileSync(join(dir, "ontocheck.yml"), "sampleSize: 1\n");
        const source = writeRecords([
            JSON.stringify(PATIENTS[0]),
            JSON.stringify(PATIENTS[1]),
            "{ truncated",
        ]);
        const logger = createMockLogger();

        const outcome = await runValidation(createArgs(source), { env: {}, logger });

        expect(outcome.exitCode).toBe(2);
        expect(outcome.mapping).toBeUndefined();
        expect(outcome.report.status).toBe("failed");
        expect(outcome.report.complete).toBe(false);
        expect(outcome.report.summary.records.total_count).toBe(2);
        expect(logger.error).toHaveBeenCalledWith("Validation failed", {
            error: expect.stringContaining("Record stream failed after 2 records"),
        });
    });

    // Scenario: Nothing says where the ontology is
    it("should require an ontology", async () => {
        const source = writeRecords([JSON.stringify(PATIENTS[0])]);

        await expect(runValidation(createArgs(source, { ontology: undefined }), {
            env   : {},
            logger: createMockLogger(),
        })).rejects.toThrow("No ontology given: pass --ontology or set 'ontology' in the settings file");
    });
});

describe("buildMapper", () => {
    const settings = SettingsSchema.parse({});
    const service: SimilarityService = { id: "stub", score: async () => 0.5 };

    // Scenario: Strategy by flag
    it("should build the requested strategy", () => {
        const logger = createMockLogger();

        expect(buildMapper(settings, {}, logger).id).toBe("heuristic");
        expect(buildMapper(settings, { strategy: "evidence" }, logger).id).toBe("evidence");
    });

    // Scenario: Evidence mapping with a similarity service
    it("should wrap the evidence mapper with a heuristic fallback", () => {
        const mapper = buildMapper(settings, { strategy: "evidence" }, createMockLogger(), service);

        expect(mapper).toBeInstanceOf(FallbackMapper);
        expect(mapper.id).toBe("evidence");
    });

    // Scenario: Fallback disabled
    it("should not wrap when the fallback is disabled", () => {
        const mapper = buildMapper(
            { ...settings, fallbackToHeuristic: false },
            { strategy: "evidence" },
            createMockLogger(),
            service
        );

        expect(mapper).not.toBeInstanceOf(FallbackMapper);
    });

    // Scenario: Explicit strategy without a dictionary
    it("should require a mapping file for the explicit strategy", () => {
        expect(() => buildMapper(settings, { strategy: "explicit" }, createMockLogger())).toThrow(
            "The explicit strategy needs a mapping file: pass --mapping or set 'mapping' in the settings file"
        );
    });
});
