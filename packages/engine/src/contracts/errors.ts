/**
 * @fileoverview Error taxonomy
 *
 * - MappingError: fatal to the mapping phase, raised before any record is read
 * - ConnectorError: raised by record sources when the stream itself fails
 * - RunError: a run could not finish; carries the partial report
 *
 * Rule faults are not errors at this level; they become `error` outcomes.
 *
 * @module @ontocheck/engine/contracts/errors
 */

import type { ResultReport } from "./ResultReport.js";

/**
 * Render an unknown thrown value as text.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Mapping phase failure reasons.
 */
export type MappingErrorReason =
    | "empty-schema"
    | "required-unmapped"
    | "similarity-service"
    | "invalid-mapping";

/**
 * Raised when a FieldMapping cannot be produced.
 */
export class MappingError extends Error {
    readonly reason: MappingErrorReason;

    constructor(reason: MappingErrorReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "MappingError";
        this.reason = reason;
    }
}

/**
 * Raised by a record source when reading or profiling fails.
 */
export class ConnectorError extends Error {
    /** Identifier of the failing source */
    readonly sourceId: string;

    constructor(sourceId: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConnectorError";
        this.sourceId = sourceId;
    }
}

/**
 * Raised when the record stream fails mid-run.
 *
 * The report holds every record that was fully aggregated before the failure
 * and is marked incomplete.
 */
export class RunError extends Error {
    readonly report: ResultReport;

    constructor(message: string, report: ResultReport, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RunError";
        this.report = report;
    }
}
