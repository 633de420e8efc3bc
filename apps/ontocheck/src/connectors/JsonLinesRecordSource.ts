/**
 * @fileoverview JSON Lines record source
 *
 * Reads one JSON object per line. Blank lines are skipped; a line that is
 * not a JSON object fails the stream with a ConnectorError naming the line.
 *
 * @module ontocheck/connectors/JsonLinesRecordSource
 */

import { createReadStream, existsSync } from "fs";
import { basename } from "path";
import { createInterface } from "readline";
import {
    ConnectorError,
    describeError,
    type Column,
    type DataRecord,
    type RecordSource,
} from "@ontocheck/engine";
import { DEFAULT_SAMPLE_SIZE, profileColumns } from "../profiling/profileColumns.js";

/**
 * Options for the JSON Lines source
 */
export interface JsonLinesRecordSourceOptions {
    /** Records sampled by profile() (default: 1000) */
    sampleSize?: number;
}

export function isDataRecord(value: unknown): value is DataRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Record source over a `.jsonl` / `.ndjson` file.
 *
 * @example
 * ```typescript
 * const source = new JsonLinesRecordSource("./patients.jsonl");
 * for await (const record of source.open()) {
 *     console.log(record);
 * }
 * ```
 */
export class JsonLinesRecordSource implements RecordSource {
    readonly id: string;
    readonly name: string;

    private readonly filePath: string;
    private readonly sampleSize: number;

    constructor(filePath: string, options: JsonLinesRecordSourceOptions = {}) {
        this.filePath = filePath;
        this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
        this.id = `jsonl:${basename(filePath)}`;
        this.name = `JSON Lines (${basename(filePath)})`;
    }

    async *open(): AsyncIterable<DataRecord> {
        if (!existsSync(this.filePath)) {
            throw new ConnectorError(this.id, `Record file not found: ${this.filePath}`);
        }

        const lines = createInterface({
            input    : createReadStream(this.filePath, { encoding: "utf-8" }),
            crlfDelay: Infinity,
        });

        let lineNumber = 0;
        try {
            for await (const line of lines) {
                lineNumber++;
                if (line.trim() === "") {
                    continue;
                }
                yield this.parseLine(line, lineNumber);
            }
        }
        catch (error) {
            if (error instanceof ConnectorError) {
                throw error;
            }
            throw new ConnectorError(
                this.id,
                `Failed reading ${this.filePath}: ${describeError(error)}`,
                { cause: error }
            );
        }
        finally {
            lines.close();
        }
    }

    async profile(): Promise<readonly Column[]> {
        const sample: DataRecord[] = [];
        for await (const record of this.open()) {
            sample.push(record);
            if (sample.length >= this.sampleSize) {
                break;
            }
        }
        return profileColumns(sample, this.sampleSize);
    }

    private parseLine(line: string, lineNumber: number): DataRecord {
        let parsed: unknown;
        try {
            parsed = JSON.parse(line);
        }
        catch (error) {
            throw new ConnectorError(
                this.id,
                `Invalid JSON on line ${lineNumber} of ${this.filePath}: ${describeError(error)}`,
                { cause: error }
            );
        }

        if (!isDataRecord(parsed)) {
            throw new ConnectorError(
                this.id,
                `Line ${lineNumber} of ${this.filePath} is not a JSON object`
            );
        }
        return parsed;
    }
}
