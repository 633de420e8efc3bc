/**
 * @fileoverview RuleExecutor
 *
 * The orchestration engine of a validation run.
 *
 * Pipeline flow:
 * 1. Columns profiled by the record source
 * 2. FieldMapper resolves column → property (once per run, then read-only)
 * 3. Rule plan built from the RuleStore, once per mapped property
 * 4. Records streamed through the plan, each rule evaluated in isolation
 * 5. Results folded into the report in input order
 *
 * Design principles:
 * - One bad rule never sinks a run: rule faults become `error` outcomes
 * - Streaming: records are pulled lazily; only counters and failures are kept
 * - Ordered: parallel record tasks are re-sequenced before aggregation
 * - Observable: emits events at each lifecycle stage
 *
 * @module @ontocheck/engine/execution/RuleExecutor
 */

import type { Column } from "../contracts/Column.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { FieldMapping } from "../contracts/FieldMapping.js";
import type { RecordSource } from "../contracts/RecordSource.js";
import type { DataRecord, Rule } from "../contracts/Rule.js";
import type { RuleStore } from "../contracts/RuleStore.js";
import type { RecordResult, ResultReport, RuleEvaluation } from "../contracts/ResultReport.js";
import { createRecordResult } from "../contracts/ResultReport.js";
import { ConnectorError, RunError, describeError } from "../contracts/errors.js";
import { evaluateRule } from "./evaluateRule.js";
import { renderMessage } from "./messageTemplate.js";
import { ReportAggregator } from "./ReportAggregator.js";
import type { RuleExecutionContext } from "./RuleExecutionContext.js";

/**
 * Per-run options.
 */
export interface RunOptions {
    /** Cancels the run at record granularity */
    readonly signal?: AbortSignal;

    /** Rule store for this run (default: the context's) */
    readonly ruleStore?: RuleStore;
}

/**
 * Result of validate(): the mapping used and the report produced.
 */
export interface ValidationResult {
    readonly mapping: FieldMapping;
    readonly report: ResultReport;
}

/**
 * A mapped field and the rules that govern it.
 */
interface PlannedField {
    readonly field: string;
    readonly propertyUri: string;
    readonly rules: readonly Rule[];
}

/**
 * Generate a trace ID for run events.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `run_${timestamp}_${random}`;
}

function isAsyncIterable(
    records: Iterable<DataRecord> | AsyncIterable<DataRecord>
): records is AsyncIterable<DataRecord> {
    return Symbol.asyncIterator in records;
}

function toAsyncIterator(records: Iterable<DataRecord> | AsyncIterable<DataRecord>): AsyncIterator<DataRecord> {
    if (isAsyncIterable(records)) {
        return records[Symbol.asyncIterator]();
    }
    const iterable: Iterable<DataRecord> = records;
    return (async function* () {
        yield* iterable;
    })();
}

const ABORTED = Symbol("aborted");

/**
 * A promise that resolves once the signal aborts, and a way to stop
 * listening when the run ends first.
 */
interface AbortWatch {
    readonly aborted: Promise<typeof ABORTED>;
    dispose(): void;
}

function watchAbort(signal: AbortSignal | undefined): AbortWatch {
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<typeof ABORTED>(resolve => {
        if (!signal) {
            return;
        }
        if (signal.aborted) {
            resolve(ABORTED);
            return;
        }
        onAbort = () => resolve(ABORTED);
        signal.addEventListener("abort", onAbort, { once: true });
    });

    return {
        aborted,
        dispose: () => {
            if (signal && onAbort) {
                signal.removeEventListener("abort", onAbort);
            }
        },
    };
}

/**
 * RuleExecutor - validates record streams against mapped ontology rules.
 *
 * @example
 * ```typescript
 * const executor = new RuleExecutor(createExecutionContext({
 *     mapper   : new HeuristicMapper(),
 *     ruleStore: new InMemoryRuleStore(rules),
 *     schema,
 * }));
 *
 * executor.eventBus.subscribe("rule:error", (event) => {
 *     console.warn("Rule fault:", event.data);
 * });
 *
 * const { mapping, report } = await executor.validate(source);
 * console.log(report.summary.records.failed_count);
 * ```
 */
export class RuleExecutor {
    readonly context: RuleExecutionContext;

    /** Public access to the event bus for external subscriptions */
    readonly eventBus: EventBus;

    constructor(context: RuleExecutionContext) {
        this.context = context;
        this.eventBus = context.eventBus;
    }

    /**
     * Map columns with the context's mapper and schema.
     *
     * @throws Error if the context has no schema
     * @throws MappingError from the mapper
     */
    async resolveMapping(columns: readonly Column[]): Promise<FieldMapping> {
        const schema = this.context.schema;
        if (!schema) {
            throw new Error("Execution context has no ontology schema; pass a FieldMapping to run() instead");
        }

        const mapping = await this.context.mapper.map(columns, schema, this.context.options.mapping);

        for (const warning of mapping.warnings) {
            this.context.logger.warn("Mapping warning", { warning });
        }

        this.context.logger.info("Columns mapped", {
            strategy: mapping.strategy,
            mapped  : mapping.entries.length,
            unmapped: mapping.unmappedColumns.length,
        });

        return mapping;
    }

    /**
     * Profile, map and validate a record source.
     *
     * @throws ConnectorError if profiling fails
     * @throws MappingError if mapping fails
     * @throws RunError if the record stream fails mid-run
     */
    async validate(source: RecordSource, options: RunOptions = {}): Promise<ValidationResult> {
        let columns: readonly Column[];
        try {
            columns = await source.profile();
        }
        catch (error) {
            if (error instanceof ConnectorError) {
                throw error;
            }
            throw new ConnectorError(source.id, `Profiling failed: ${describeError(error)}`, { cause: error });
        }

        const mapping = await this.resolveMapping(columns);
        const report = await this.run(source.open(), mapping, options);

        return { mapping, report };
    }

    /**
     * Evaluate every record against the rules of its mapped fields.
     *
     * Returns a complete report. When `options.signal` aborts, returns the
     * records finished so far instead, with status "cancelled".
     *
     * @param records - Record stream, consumed lazily
     * @param mapping - Resolved mapping (read-only for the whole run)
     * @param options - Cancellation signal and rule store override
     * @throws RunError carrying the partial report if the stream fails
     */
    async run(
        records: Iterable<DataRecord> | AsyncIterable<DataRecord>,
        mapping: FieldMapping,
        options: RunOptions = {}
    ): Promise<ResultReport> {
        const { concurrency, batchSize, includeRecords } = this.context.options;
        const logger = this.context.logger;
        const traceId = generateTraceId();
        const signal = options.signal;

        const plan = this.buildPlan(mapping, options.ruleStore ?? this.context.ruleStore);
        const aggregator = new ReportAggregator(mapping, { includeRecords });

        this.emit(createEvent("run:starting", {
            strategy   : mapping.strategy,
            fields     : plan.length,
            rules      : plan.reduce((sum, p) => sum + p.rules.length, 0),
            concurrency,
        }, traceId));

        this.emit(createEvent("run:mapped", {
            mapping: mapping.entries.map(e => ({ ...e })),
        }, traceId));

        // Aborts in-flight rule predicates when the run is cancelled
        const ruleController = new AbortController();
        const abortWatch = watchAbort(signal);
        const cancelled = abortWatch.aborted;

        const completed = new Map<number, RecordResult>();
        const inFlight = new Set<Promise<void>>();
        let nextToFold = 0;
        let nextIndex = 0;
        let settled = false;
        let sourceFailed = false;
        let sourceError: unknown;
        let exhausted = false;
        // A read still pending when the run was cancelled
        let readPending = false;

        const flush = (): void => {
            let result = completed.get(nextToFold);
            while (result) {
                completed.delete(nextToFold);
                this.commit(aggregator, result, traceId);
                nextToFold++;
                result = completed.get(nextToFold);
            }
        };

        const iterator = toAsyncIterator(records);

        try {
            while (!signal?.aborted) {
                while (
                    inFlight.size >= concurrency ||
                    (inFlight.size > 0 && completed.size >= batchSize)
                ) {
                    await Promise.race([...inFlight, cancelled]);
                    if (signal?.aborted) {
                        break;
                    }
                }
                if (signal?.aborted) {
                    break;
                }

                let next: IteratorResult<DataRecord> | typeof ABORTED;
                try {
                    next = await Promise.race([iterator.next(), cancelled]);
                }
                catch (error) {
                    sourceFailed = true;
                    sourceError = error;
                    exhausted = true;
                    break;
                }

                if (next === ABORTED) {
                    readPending = true;
                    break;
                }
                if (next.done) {
                    exhausted = true;
                    break;
                }

                const index = nextIndex++;
                const record: DataRecord = Object.freeze({ ...next.value });

                const task: Promise<void> = this.evaluateRecord(plan, index, record, ruleController.signal, traceId)
                    .then(result => {
                        if (settled) {
                            return;
                        }
                        completed.set(index, result);
                        flush();
                    })
                    .finally(() => {
                        inFlight.delete(task);
                    });
                inFlight.add(task);
            }

            if (signal?.aborted) {
                settled = true;
                ruleController.abort(signal.reason);

                // Finished records past a gap are still whole; fold them in order
                for (const index of [...completed.keys()].sort((a, b) => a - b)) {
                    const result = completed.get(index);
                    if (result) {
                        this.commit(aggregator, result, traceId);
                    }
                }
                completed.clear();

                const report = aggregator.toReport("cancelled");
                this.emit(createEvent("run:cancelled", {
                    aggregated: report.summary.records.total_count,
                    abandoned : inFlight.size,
                }, traceId));
                logger.warn("Run cancelled", {
                    traceId,
                    aggregated: report.summary.records.total_count,
                    abandoned : inFlight.size,
                });
                return report;
            }

            await Promise.all(inFlight);
            settled = true;
            flush();

            if (sourceFailed) {
                const report = aggregator.toReport("failed");
                this.emit(createEvent("run:failed", {
                    aggregated: report.summary.records.total_count,
                    error     : describeError(sourceError),
                }, traceId));
                logger.error("Record source failed", {
                    traceId,
                    aggregated: report.summary.records.total_count,
                    error     : describeError(sourceError),
                });
                throw new RunError(
                    `Record stream failed after ${report.summary.records.total_count} records: ${describeError(sourceError)}`,
                    report,
                    { cause: sourceError }
                );
            }

            const report = aggregator.toReport("complete");
            this.emit(createEvent("run:completed", {
                records: report.summary.records.total_count,
                failed : report.summary.records.failed_count,
            }, traceId));
            logger.info("Run completed", {
                traceId,
                records: report.summary.records.total_count,
                failed : report.summary.records.failed_count,
            });
            return report;
        }
        finally {
            settled = true;
            abortWatch.dispose();
            if (!exhausted && iterator.return) {
                if (readPending) {
                    // Queued behind the stalled read; the source closes once it settles
                    iterator.return().catch(error => {
                        logger.warn("Record source did not close cleanly", {
                            traceId,
                            error: describeError(error),
                        });
                    });
                }
                else {
                    await iterator.return();
                }
            }
        }
    }

    /**
     * Resolve the rules of every mapped field, once per run.
     */
    private buildPlan(mapping: FieldMapping, ruleStore: RuleStore): PlannedField[] {
        return mapping.entries.map(entry => ({
            field      : entry.column,
            propertyUri: entry.propertyUri,
            rules      : [...ruleStore.rulesFor(entry.propertyUri)],
        }));
    }

    /**
     * Evaluate one record. Rules run sequentially and share a memo scope.
     * Never rejects: every rule outcome is contained by evaluateRule().
     */
    private async evaluateRecord(
        plan: readonly PlannedField[],
        index: number,
        record: DataRecord,
        signal: AbortSignal,
        traceId: string
    ): Promise<RecordResult> {
        const scope = {};
        const evaluations: RuleEvaluation[] = [];
        const informational: string[] = [];

        for (const planned of plan) {
            if (planned.rules.length === 0) {
                informational.push(planned.field);
                continue;
            }

            const value = record[planned.field];

            for (const rule of planned.rules) {
                const outcome = await evaluateRule(
                    rule,
                    value,
                    record,
                    {
                        field      : planned.field,
                        propertyUri: planned.propertyUri,
                        recordIndex: index,
                        scope,
                    },
                    rule.timeoutMs ?? this.context.options.ruleTimeoutMs,
                    signal
                );

                if (outcome.status === "error") {
                    this.context.logger.warn("Rule evaluation error", {
                        traceId,
                        ruleId     : rule.id,
                        field      : planned.field,
                        recordIndex: index,
                        cause      : outcome.cause,
                        timedOut   : outcome.timedOut,
                    });
                    this.emit(createEvent("rule:error", {
                        ruleId     : rule.id,
                        field      : planned.field,
                        recordIndex: index,
                        cause      : outcome.cause,
                        timedOut   : outcome.timedOut,
                    }, traceId));
                }

                evaluations.push({
                    ruleId     : rule.id,
                    field      : planned.field,
                    propertyUri: planned.propertyUri,
                    severity   : rule.severity,
                    outcome,
                    message    : outcome.status === "pass"
                        ? ""
                        : renderMessage(rule.message, {
                            value,
                            field   : planned.field,
                            property: planned.propertyUri,
                            rule    : rule.id,
                            reason  : outcome.status === "fail" ? outcome.reason : outcome.cause,
                        }),
                });
            }
        }

        return createRecordResult(index, record, evaluations, informational);
    }

    /**
     * Fold one record and announce it.
     */
    private commit(aggregator: ReportAggregator, result: RecordResult, traceId: string): void {
        aggregator.fold(result);
        this.emit(createEvent("record:evaluated", {
            index : result.index,
            passed: result.passed,
        }, traceId));
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
