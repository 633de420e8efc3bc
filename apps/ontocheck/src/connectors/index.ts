/**
 * Record source connectors
 */

import { extname } from "path";
import type { RecordSource } from "@ontocheck/engine";
import { JsonLinesRecordSource } from "./JsonLinesRecordSource.js";
import { SqliteRecordSource } from "./SqliteRecordSource.js";

export { JsonLinesRecordSource, isDataRecord, type JsonLinesRecordSourceOptions } from "./JsonLinesRecordSource.js";
export { SqliteRecordSource, buildSelect, type SqliteRecordSourceOptions } from "./SqliteRecordSource.js";

const JSON_LINES_EXTENSIONS = [".jsonl", ".ndjson"];
const SQLITE_EXTENSIONS = [".db", ".sqlite", ".sqlite3"];

/**
 * Options for picking a connector from a path
 */
export interface OpenSourceOptions {
    table?: string;
    query?: string;
    sampleSize?: number;
}

/**
 * Pick a record source by file extension.
 *
 * @throws Error for unsupported extensions
 */
export function openRecordSource(path: string, options: OpenSourceOptions = {}): RecordSource {
    const extension = extname(path).toLowerCase();

    if (JSON_LINES_EXTENSIONS.includes(extension)) {
        return new JsonLinesRecordSource(path, { sampleSize: options.sampleSize });
    }
    if (SQLITE_EXTENSIONS.includes(extension)) {
        return new SqliteRecordSource(path, options);
    }

    throw new Error(
        `Unsupported source ${path}: expected one of ${[...JSON_LINES_EXTENSIONS, ...SQLITE_EXTENSIONS].join(", ")}`
    );
}
