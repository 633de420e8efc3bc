/**
 * @fileoverview Report output
 *
 * Writes the ResultReport as JSON and renders a short console summary.
 *
 * @module report/writeReport
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { FieldMapping, ResultReport } from "@ontocheck/engine";

/**
 * Process exit codes
 */
export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_ERROR = 2;

/**
 * Write a report as pretty-printed JSON, creating parent directories.
 */
export function writeReport(report: ResultReport, filePath: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
}

/**
 * Exit code for a finished run: 0 when every record passed, 1 when some
 * failed, 2 when the run did not cover the whole source.
 */
export function exitCodeFor(report: ResultReport): number {
    if (!report.complete) {
        return EXIT_ERROR;
    }
    return report.summary.records.failed_count > 0 ? EXIT_FAILURES : EXIT_OK;
}

function formatPercentage(value: number): string {
    return `${value.toFixed(1)}%`;
}

/**
 * Human-readable summary lines.
 *
 * @example
 * ```typescript
 * formatSummary(report, mapping).forEach(line => console.log(line));
 * ```
 */
export function formatSummary(report: ResultReport, mapping: FieldMapping): string[] {
    const { records, rules } = report.summary;
    const lines = [
        `Status: ${report.status}${report.complete ? "" : " (incomplete)"}`,
        `Mapping (${mapping.strategy}):`,
    ];

    for (const entry of mapping.entries) {
        lines.push(`  ${entry.column} -> ${entry.propertyUri} (${entry.confidence.toFixed(2)})`);
    }
    for (const column of mapping.unmappedColumns) {
        lines.push(`  ${column} -> (unmapped)`);
    }

    lines.push(
        `Records: ${records.total_count} total, ${records.passed_count} passed, ` +
        `${records.failed_count} failed (${formatPercentage(records.failed_percentage)})`
    );
    lines.push(
        `Rule checks: ${rules.total_count} total, ${rules.failed_count} failed ` +
        `(${formatPercentage(rules.failed_percentage)})`
    );

    for (const [propertyUri, breakdowns] of Object.entries(rules.by_rule)) {
        for (const [ruleId, breakdown] of Object.entries(breakdowns)) {
            if (breakdown.failed_count > 0) {
                lines.push(`  ${ruleId} on ${propertyUri} [${breakdown.severity}]: ${breakdown.failed_count} failed`);
            }
        }
    }

    return lines;
}
