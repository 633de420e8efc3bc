/**
 * @fileoverview Report aggregation
 *
 * A pure fold of RecordResults into the three roll-ups (records, rules,
 * fields) plus the error-record list. The aggregator holds counters only;
 * `aggregateRecordResults` rebuilds the same report from the results alone.
 *
 * Counting:
 * - record counters move once per record
 * - rule and field counters move once per (record, rule) pair
 * - a mapped field without rules counts one pass per record
 * - unmapped columns never appear in field statistics
 *
 * @module @ontocheck/engine/execution/ReportAggregator
 */

import type { FieldMapping } from "../contracts/FieldMapping.js";
import type { RuleSeverity } from "../contracts/Rule.js";
import type {
    CountSummary,
    ErrorRecord,
    FieldSummary,
    RecordError,
    RecordResult,
    RecordSummary,
    ResultReport,
    RuleBreakdown,
    RunStatus,
} from "../contracts/ResultReport.js";
import { percentage } from "../contracts/ResultReport.js";

interface Counter {
    total: number;
    passed: number;
    failed: number;
}

interface IndexedCounter extends Counter {
    failedIndices: number[];
}

interface RuleCounter extends IndexedCounter {
    severity: RuleSeverity;
}

interface FieldCounter extends Counter {
    propertyUri: string;
    confidence: number;
}

function countSummary(counter: Counter): CountSummary {
    return {
        total_count      : counter.total,
        passed_count     : counter.passed,
        failed_count     : counter.failed,
        failed_percentage: percentage(counter.failed, counter.total),
        pass_percentage  : percentage(counter.passed, counter.total),
    };
}

function indexedSummary(counter: IndexedCounter): RecordSummary {
    return {
        ...countSummary(counter),
        failed_indices: [...counter.failedIndices],
    };
}

function pushIndex(indices: number[], index: number): void {
    if (indices[indices.length - 1] !== index) {
        indices.push(index);
    }
}

/**
 * Freeze a report tree. Already frozen objects (record copies) are not
 * descended into, so caller-owned nested values stay untouched.
 */
function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Aggregator options.
 */
export interface AggregatorOptions {
    /** Copy the input record into each error record (default: true) */
    readonly includeRecords?: boolean;
}

/**
 * Incremental report builder.
 *
 * `fold` must be called once per record, in ascending index order. Each
 * call commits one record's outcomes to all three roll-ups together.
 *
 * @example
 * ```typescript
 * const aggregator = new ReportAggregator(mapping);
 * for (const result of results) {
 *     aggregator.fold(result);
 * }
 * const report = aggregator.toReport("complete");
 * ```
 */
export class ReportAggregator {
    private readonly mapping: FieldMapping;
    private readonly includeRecords: boolean;

    private readonly records: IndexedCounter = { total: 0, passed: 0, failed: 0, failedIndices: [] };
    private readonly rules: IndexedCounter = { total: 0, passed: 0, failed: 0, failedIndices: [] };
    /** property URI → rule id → counter */
    private readonly byRule: Map<string, Map<string, RuleCounter>> = new Map();
    private readonly fields: Map<string, FieldCounter> = new Map();
    private readonly errorRecords: ErrorRecord[] = [];
    private lastIndex = -1;

    constructor(mapping: FieldMapping, options: AggregatorOptions = {}) {
        this.mapping = mapping;
        this.includeRecords = options.includeRecords ?? true;

        for (const entry of mapping.entries) {
            this.fields.set(entry.column, {
                total      : 0,
                passed     : 0,
                failed     : 0,
                propertyUri: entry.propertyUri,
                confidence : entry.confidence,
            });
        }
    }

    /**
     * Number of records folded so far.
     */
    get count(): number {
        return this.records.total;
    }

    /**
     * Commit one record.
     *
     * @throws Error if records arrive out of order or twice
     */
    fold(result: RecordResult): void {
        if (result.index <= this.lastIndex) {
            throw new Error(`Record ${result.index} folded out of order (last: ${this.lastIndex})`);
        }
        for (const evaluation of result.evaluations) {
            if (!this.fields.has(evaluation.field)) {
                throw new Error(`Record ${result.index} evaluated unmapped field: ${evaluation.field}`);
            }
        }
        this.lastIndex = result.index;

        this.records.total++;
        if (result.passed) {
            this.records.passed++;
        }
        else {
            this.records.failed++;
            this.records.failedIndices.push(result.index);
        }

        const errors: RecordError[] = [];

        for (const evaluation of result.evaluations) {
            const passed = evaluation.outcome.status === "pass";

            const rule = this.ruleCounter(evaluation.propertyUri, evaluation.ruleId, evaluation.severity);
            const field = this.fields.get(evaluation.field);

            this.rules.total++;
            rule.total++;
            if (field) {
                field.total++;
            }

            if (passed) {
                this.rules.passed++;
                rule.passed++;
                if (field) {
                    field.passed++;
                }
                continue;
            }

            this.rules.failed++;
            rule.failed++;
            pushIndex(this.rules.failedIndices, result.index);
            pushIndex(rule.failedIndices, result.index);
            if (field) {
                field.failed++;
            }

            const outcome = evaluation.outcome;
            errors.push({
                rule_id : evaluation.ruleId,
                field   : evaluation.field,
                message : evaluation.message,
                severity: evaluation.severity,
                status  : outcome.status === "error" ? "error" : "fail",
                ...(outcome.status === "error" && { cause: outcome.cause }),
                ...(outcome.status === "error" && outcome.timedOut && { timed_out: true as const }),
            });
        }

        for (const name of result.informationalFields) {
            const field = this.fields.get(name);
            if (field) {
                field.total++;
                field.passed++;
            }
        }

        if (errors.length > 0) {
            this.errorRecords.push({
                index : result.index,
                record: this.includeRecords ? { ...result.record } : null,
                errors,
            });
        }
    }

    private ruleCounter(propertyUri: string, ruleId: string, severity: RuleSeverity): RuleCounter {
        let counters = this.byRule.get(propertyUri);
        if (!counters) {
            counters = new Map();
            this.byRule.set(propertyUri, counters);
        }

        let counter = counters.get(ruleId);
        if (!counter) {
            counter = { total: 0, passed: 0, failed: 0, failedIndices: [], severity };
            counters.set(ruleId, counter);
        }
        return counter;
    }

    /**
     * Snapshot the current state as a frozen report.
     *
     * @param status - How the run ended; anything but "complete" marks the report incomplete
     */
    toReport(status: RunStatus): ResultReport {
        const byRule: Record<string, Record<string, RuleBreakdown>> = {};
        for (const [propertyUri, counters] of this.byRule) {
            const breakdowns: Record<string, RuleBreakdown> = {};
            for (const [ruleId, counter] of counters) {
                breakdowns[ruleId] = {
                    severity: counter.severity,
                    ...indexedSummary(counter),
                };
            }
            byRule[propertyUri] = breakdowns;
        }

        const fields: Record<string, FieldSummary> = {};
        for (const [column, counter] of this.fields) {
            fields[column] = {
                mapped_property_uri: counter.propertyUri,
                confidence         : counter.confidence,
                ...countSummary(counter),
            };
        }

        const report: ResultReport = {
            status,
            complete: status === "complete",
            mapping : this.mapping.entries.map(entry => ({
                column      : entry.column,
                property_uri: entry.propertyUri,
                confidence  : entry.confidence,
            })),
            summary: {
                records: indexedSummary(this.records),
                rules  : { ...indexedSummary(this.rules), by_rule: byRule },
                fields,
            },
            error_records: this.errorRecords.map(record => ({
                index : record.index,
                record: record.record === null ? null : Object.freeze({ ...record.record }),
                errors: record.errors.map(error => ({ ...error })),
            })),
        };

        return deepFreeze(report);
    }
}

/**
 * Recompute a report from RecordResults alone.
 *
 * @param results - Record results in any order
 * @param mapping - Mapping the results were produced under
 * @param status - Run status to stamp on the report
 * @param options - Aggregator options
 */
export function aggregateRecordResults(
    results: readonly RecordResult[],
    mapping: FieldMapping,
    status: RunStatus = "complete",
    options: AggregatorOptions = {}
): ResultReport {
    const aggregator = new ReportAggregator(mapping, options);
    for (const result of [...results].sort((a, b) => a.index - b.index)) {
        aggregator.fold(result);
    }
    return aggregator.toReport(status);
}
