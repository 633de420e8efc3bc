/**
 * @fileoverview Unit tests for command-line parsing
 *
 * @module __tests__/parseArgs
 */

import { describe, it, expect } from "vitest";
import { parseArgs, UsageError } from "../cli/parseArgs.js";

describe("parseArgs", () => {
    // Scenario: Full validate invocation
    it("should parse every validate option", () => {
        const args = parseArgs([
            "validate", "patients.jsonl",
            "--ontology", "ontology.yml",
            "--rules", "rules/core",
            "--rules", "rules/extra",
            "--strategy", "explicit",
            "--mapping", "mapping.yml",
            "--strict",
            "--concurrency", "4",
            "--min-confidence", "0.65",
            "--config", "ontocheck.yml",
            "--out", "report.json",
        ]);

        expect(args).toEqual({
            command      : "validate",
            source       : "patients.jsonl",
            ontology     : "ontology.yml",
            rules        : ["rules/core", "rules/extra"],
            strategy     : "explicit",
            mapping      : "mapping.yml",
            strict       : true,
            concurrency  : 4,
            minConfidence: 0.65,
            config       : "ontocheck.yml",
            out          : "report.json",
        });
    });

    // Scenario: SQLite source options
    it("should parse table and query options", () => {
        expect(parseArgs(["validate", "data.db", "--table", "patients"])).toEqual({
            command: "validate",
            source : "data.db",
            rules  : [],
            table  : "patients",
        });
        expect(parseArgs(["validate", "data.db", "--query", "SELECT * FROM patients"]))
            .toHaveProperty("query", "SELECT * FROM patients");
    });

    // Scenario: No command or an explicit help request
    it("should return help", () => {
        expect(parseArgs([])).toEqual({ command: "help" });
        expect(parseArgs(["--help"])).toEqual({ command: "help" });
        expect(parseArgs(["validate", "x.jsonl", "--help"])).toEqual({ command: "help" });
    });

    // Scenario: Invalid command lines
    it("should reject invalid input with UsageError", () => {
        expect(() => parseArgs(["check"])).toThrow(new UsageError("Unknown command: check"));
        expect(() => parseArgs(["validate"])).toThrow("Missing <source>");
        expect(() => parseArgs(["validate", "a.jsonl", "b.jsonl"])).toThrow("Unexpected arguments: b.jsonl");
        expect(() => parseArgs(["validate", "a.jsonl", "--ontology"])).toThrow("--ontology requires a value");
        expect(() => parseArgs(["validate", "a.jsonl", "--out", "--strict"])).toThrow("--out requires a value");
        expect(() => parseArgs(["validate", "a.jsonl", "--verbose", "yes"])).toThrow("Unknown option: --verbose");
    });

    // Scenario: Bad option values
    it("should validate strategy and numeric values", () => {
        expect(() => parseArgs(["validate", "a.jsonl", "--strategy", "magic"]))
            .toThrow('--strategy must be evidence, heuristic or explicit, got "magic"');
        expect(() => parseArgs(["validate", "a.jsonl", "--concurrency", "four"]))
            .toThrow('--concurrency expects a number, got "four"');
    });
});
