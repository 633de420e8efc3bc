/**
 * RecordSource Contract
 *
 * Record sources (connectors) are passive, finite, restartable sequences of
 * records. The executor pulls records lazily and never needs the whole
 * dataset in memory.
 *
 * Design principles:
 * - Restartable: every call to open() starts from the first record
 * - Ordered: records come out in the same order on every pass
 * - Typed failures: read errors surface as ConnectorError
 */

import type { Column } from "./Column.js";
import type { DataRecord } from "./Rule.js";

/**
 * RecordSource interface.
 *
 * @example
 * ```typescript
 * class ArraySource implements RecordSource {
 *     readonly id = "array";
 *     readonly name = "Array Source";
 *
 *     constructor(private readonly rows: DataRecord[]) {}
 *
 *     async *open() {
 *         yield* this.rows;
 *     }
 *
 *     async profile() {
 *         return profileColumns(this.rows);
 *     }
 * }
 * ```
 */
export interface RecordSource {
    /** Unique identifier for this source */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /**
     * Open a fresh pass over the records.
     * Each call yields the same sequence from the beginning.
     */
    open(): AsyncIterable<DataRecord>;

    /**
     * Profile the columns once, yielding one Column per dataset column.
     */
    profile(): Promise<readonly Column[]>;

    /**
     * Release held resources (file handles, DB connections).
     */
    close?(): Promise<void>;
}
