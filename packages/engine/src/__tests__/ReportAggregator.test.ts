/**
 * @fileoverview Unit tests for ReportAggregator
 *
 * Tests cover:
 * - Record, rule and field roll-ups
 * - Informational fields and unmapped columns
 * - Empty runs and percentages
 * - Fold order validation
 *
 * @module @ontocheck/engine/__tests__/ReportAggregator
 */

import { describe, it, expect } from "vitest";
import type { FieldMapping } from "../contracts/FieldMapping.js";
import type { RuleOutcome } from "../contracts/Rule.js";
import { fail, pass, ruleError } from "../contracts/Rule.js";
import { createRecordResult, percentage, type RuleEvaluation } from "../contracts/ResultReport.js";
import { ReportAggregator, aggregateRecordResults } from "../execution/ReportAggregator.js";

const BIRTH_DATE = "http://hl7.org/fhir/Patient.birthDate";
const NAME = "http://hl7.org/fhir/HumanName.text";

const mapping: FieldMapping = {
    strategy        : "explicit",
    entries         : [
        { column: "birth_date", propertyUri: BIRTH_DATE, confidence: 1 },
        { column: "name", propertyUri: NAME, confidence: 0.9 },
    ],
    unmappedColumns : ["notes"],
    unmappedRequired: [],
    warnings        : [],
    allowManyToOne  : false,
};

function evaluation(ruleId: string, outcome: RuleOutcome, message = ""): RuleEvaluation {
    return {
        ruleId,
        field      : "birth_date",
        propertyUri: BIRTH_DATE,
        severity   : "error",
        outcome,
        message,
    };
}

const results = [
    createRecordResult(0, { birth_date: "01/02/1990", name: "Ada", notes: "x" }, [
        evaluation("valid-date", pass()),
        evaluation("not-future", pass()),
    ], ["name"]),
    createRecordResult(1, { birth_date: "02/31/1985", name: "Bob" }, [
        evaluation("valid-date", fail("day 31 does not exist in 1985-02"), "bad date"),
        evaluation("not-future", ruleError("clock unavailable"), "rule broke"),
    ], ["name"]),
    createRecordResult(2, { birth_date: "03/04/1970", name: "Cy" }, [
        evaluation("valid-date", pass()),
        evaluation("not-future", pass()),
    ], ["name"]),
];

describe("ReportAggregator", () => {
    // Scenario: Mixed passes and failures
    it("should roll up records, rules and fields", () => {
        const report = aggregateRecordResults(results, mapping);

        expect(report.status).toBe("complete");
        expect(report.complete).toBe(true);
        expect(report.summary.records).toEqual({
            total_count      : 3,
            passed_count     : 2,
            failed_count     : 1,
            failed_percentage: (1 / 3) * 100,
            pass_percentage  : (2 / 3) * 100,
            failed_indices   : [1],
        });
        expect(report.summary.rules.total_count).toBe(6);
        expect(report.summary.rules.failed_count).toBe(2);
        expect(report.summary.rules.failed_indices).toEqual([1]);
        expect(Object.keys(report.summary.rules.by_rule)).toEqual([BIRTH_DATE]);
        expect(report.summary.rules.by_rule[BIRTH_DATE]["valid-date"]).toEqual({
            severity         : "error",
            total_count      : 3,
            passed_count     : 2,
            failed_count     : 1,
            failed_percentage: (1 / 3) * 100,
            pass_percentage  : (2 / 3) * 100,
            failed_indices   : [1],
        });
    });

    // Scenario: Two properties each carry a rule with the same id
    it("should keep same-id rules on different properties apart", () => {
        const twoProperties: FieldMapping = {
            ...mapping,
            entries: [
                { column: "a", propertyUri: "urn:A", confidence: 1 },
                { column: "b", propertyUri: "urn:B", confidence: 1 },
            ],
        };
        const required = (field: string, propertyUri: string, outcome: RuleOutcome): RuleEvaluation => ({
            ruleId  : "required",
            field,
            propertyUri,
            severity: propertyUri === "urn:A" ? "error" : "warning",
            outcome,
            message : outcome.status === "pass" ? "" : `${field} is required`,
        });

        const report = aggregateRecordResults([
            createRecordResult(0, { a: "x", b: "" }, [
                required("a", "urn:A", pass()),
                required("b", "urn:B", fail("missing")),
            ], []),
        ], twoProperties);

        expect(report.summary.rules.by_rule).toEqual({
            "urn:A": {
                required: {
                    severity         : "error",
                    total_count      : 1,
                    passed_count     : 1,
                    failed_count     : 0,
                    failed_percentage: 0,
                    pass_percentage  : 100,
                    failed_indices   : [],
                },
            },
            "urn:B": {
                required: {
                    severity         : "warning",
                    total_count      : 1,
                    passed_count     : 0,
                    failed_count     : 1,
                    failed_percentage: 100,
                    pass_percentage  : 0,
                    failed_indices   : [0],
                },
            },
        });
        expect(report.error_records[0].errors).toEqual([{
            rule_id : "required",
            field   : "b",
            message : "b is required",
            severity: "warning",
            status  : "fail",
        }]);
    });

    // Scenario: Field counters move once per (record, rule) pair
    it("should count field outcomes per rule evaluation", () => {
        const report = aggregateRecordResults(results, mapping);

        expect(report.summary.fields.birth_date).toEqual({
            mapped_property_uri: BIRTH_DATE,
            confidence         : 1,
            total_count        : 6,
            passed_count       : 4,
            failed_count       : 2,
            failed_percentage  : (1 / 3) * 100,
            pass_percentage    : (2 / 3) * 100,
        });
    });

    // Scenario: A mapped field without rules passes once per record
    it("should count informational fields as passes", () => {
        const report = aggregateRecordResults(results, mapping);

        expect(report.summary.fields.name).toMatchObject({
            mapped_property_uri: NAME,
            confidence         : 0.9,
            total_count        : 3,
            passed_count       : 3,
            failed_count       : 0,
        });
        expect(Object.keys(report.summary.fields)).toEqual(["birth_date", "name"]);
    });

    // Scenario: Error records list every non-passing outcome
    it("should collect error records with failures and faults", () => {
        const report = aggregateRecordResults(results, mapping);

        expect(report.error_records).toEqual([
            {
                index : 1,
                record: { birth_date: "02/31/1985", name: "Bob" },
                errors: [
                    { rule_id: "valid-date", field: "birth_date", message: "bad date", severity: "error", status: "fail" },
                    {
                        rule_id : "not-future",
                        field   : "birth_date",
                        message : "rule broke",
                        severity: "error",
                        status  : "error",
                        cause   : "clock unavailable",
                    },
                ],
            },
        ]);
        expect(report.mapping).toEqual([
            { column: "birth_date", property_uri: BIRTH_DATE, confidence: 1 },
            { column: "name", property_uri: NAME, confidence: 0.9 },
        ]);
    });

    // Scenario: No records
    it("should report zero percentages for an empty run", () => {
        const report = new ReportAggregator(mapping).toReport("complete");

        expect(report.summary.records).toEqual({
            total_count      : 0,
            passed_count     : 0,
            failed_count     : 0,
            failed_percentage: 0,
            pass_percentage  : 0,
            failed_indices   : [],
        });
        expect(report.summary.fields.birth_date.total_count).toBe(0);
        expect(report.error_records).toEqual([]);
        expect(percentage(0, 0)).toBe(0);
    });

    // Scenario: total = passed + failed at every level
    it("should keep totals consistent", () => {
        const report = aggregateRecordResults(results, mapping);
        const summaries = [
            report.summary.records,
            report.summary.rules,
            ...Object.values(report.summary.rules.by_rule).flatMap(rules => Object.values(rules)),
            ...Object.values(report.summary.fields),
        ];

        for (const summary of summaries) {
            expect(summary.total_count).toBe(summary.passed_count + summary.failed_count);
        }
    });

    // Scenario: Input order does not matter to the batch helper
    it("should give the same report regardless of result order", () => {
        const shuffled = [results[2], results[0], results[1]];

        expect(aggregateRecordResults(shuffled, mapping)).toEqual(aggregateRecordResults(results, mapping));
    });

    // Scenario: Records folded out of order
    it("should reject out-of-order folds", () => {
        const aggregator = new ReportAggregator(mapping);
        aggregator.fold(results[1]);

        expect(() => aggregator.fold(results[0])).toThrow("Record 0 folded out of order (last: 1)");
        expect(aggregator.count).toBe(1);
    });

    // Scenario: Outcome for a column the mapping does not contain
    it("should reject evaluations of unmapped fields", () => {
        const aggregator = new ReportAggregator(mapping);
        const stray = createRecordResult(0, {}, [{ ...evaluation("r", pass()), field: "notes" }]);

        expect(() => aggregator.fold(stray)).toThrow("Record 0 evaluated unmapped field: notes");
        expect(aggregator.count).toBe(0);
    });

    // Scenario: Records left out of the report
    it("should omit record copies when includeRecords is false", () => {
        const report = aggregateRecordResults(results, mapping, "cancelled", { includeRecords: false });

        expect(report.status).toBe("cancelled");
        expect(report.complete).toBe(false);
        expect(report.error_records[0].record).toBeNull();
    });

    // Scenario: Report is immutable
    it("should freeze the report", () => {
        const report = aggregateRecordResults(results, mapping);

        expect(Object.isFrozen(report)).toBe(true);
        expect(Object.isFrozen(report.summary.records.failed_indices)).toBe(true);
        expect(Object.isFrozen(report.error_records[0].errors[0])).toBe(true);
    });
});
