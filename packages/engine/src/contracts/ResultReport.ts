/**
 * Result Report Contract
 *
 * The externally consumed output of a validation run. Field names are
 * snake_case and form a compatibility surface for rendering and reporting
 * collaborators; renaming any of them needs a migration note.
 *
 * Reports carry no timestamps or generated ids, so equal inputs serialise to
 * identical JSON.
 */

import type { DataRecord, RuleOutcome, RuleSeverity } from "./Rule.js";

/**
 * Outcome of one rule on one record, with the rendered failure message.
 */
export interface RuleEvaluation {
    readonly ruleId: string;
    readonly field: string;
    readonly propertyUri: string;
    readonly severity: RuleSeverity;
    readonly outcome: RuleOutcome;

    /** Rendered message template; empty for passing outcomes */
    readonly message: string;
}

/**
 * Every rule outcome for one input record.
 */
export interface RecordResult {
    /** Position of the record in the input */
    readonly index: number;

    /** The record as read from the source */
    readonly record: DataRecord;

    /** Outcomes in evaluation order */
    readonly evaluations: readonly RuleEvaluation[];

    /** Columns that were mapped but had no rules */
    readonly informationalFields: readonly string[];

    /** True when every outcome is a pass */
    readonly passed: boolean;
}

/**
 * Create a frozen RecordResult with the derived `passed` flag.
 */
export function createRecordResult(
    index: number,
    record: DataRecord,
    evaluations: readonly RuleEvaluation[],
    informationalFields: readonly string[] = []
): RecordResult {
    return Object.freeze({
        index,
        record,
        evaluations        : Object.freeze([...evaluations]),
        informationalFields: Object.freeze([...informationalFields]),
        passed             : evaluations.every(e => e.outcome.status === "pass"),
    });
}

/**
 * Pass/fail counters shared by the three roll-ups.
 */
export interface CountSummary {
    total_count: number;
    passed_count: number;
    failed_count: number;
    failed_percentage: number;
    pass_percentage: number;
}

/**
 * Per-record roll-up.
 */
export interface RecordSummary extends CountSummary {
    /** Indices of failed records, ascending */
    failed_indices: number[];
}

/**
 * Roll-up of a single rule on a single property.
 */
export interface RuleBreakdown extends RecordSummary {
    severity: RuleSeverity;
}

/**
 * Per-rule roll-up: totals over every (record, rule) pair plus a breakdown
 * keyed by property URI, then rule id. Rule ids are only unique per property.
 */
export interface RuleSummary extends RecordSummary {
    by_rule: Record<string, Record<string, RuleBreakdown>>;
}

/**
 * Per-field roll-up, keyed by column name.
 */
export interface FieldSummary extends CountSummary {
    mapped_property_uri: string;
    confidence: number;
}

/**
 * One failure entry of an error record.
 */
export interface RecordError {
    rule_id: string;
    field: string;
    message: string;
    severity: RuleSeverity;
    status: "fail" | "error";
    cause?: string;
    /** Present when the rule hit its timeout */
    timed_out?: true;
}

/**
 * A record with at least one non-passing outcome.
 */
export interface ErrorRecord {
    index: number;
    record: DataRecord | null;
    errors: RecordError[];
}

/**
 * How a run ended.
 */
export type RunStatus = "complete" | "cancelled" | "failed";

/**
 * The mapping a report was produced under.
 */
export interface ReportMappingEntry {
    column: string;
    property_uri: string;
    confidence: number;
}

/**
 * Validation run output.
 */
export interface ResultReport {
    status: RunStatus;

    /** False unless every record of the source was aggregated */
    complete: boolean;

    mapping: ReportMappingEntry[];

    summary: {
        records: RecordSummary;
        rules: RuleSummary;
        fields: Record<string, FieldSummary>;
    };

    /** Failed records in input order */
    error_records: ErrorRecord[];
}

/**
 * Percentage of `count` in `total`, 0 when total is 0.
 */
export function percentage(count: number, total: number): number {
    return total === 0 ? 0 : (count / total) * 100;
}
