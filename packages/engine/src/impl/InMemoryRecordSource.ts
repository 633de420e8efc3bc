/**
 * @fileoverview In-Memory RecordSource
 *
 * Array-backed record source for tests and embedded use.
 *
 * @module @ontocheck/engine/impl/InMemoryRecordSource
 */

import type { Column } from "../contracts/Column.js";
import { createColumn } from "../contracts/Column.js";
import type { RecordSource } from "../contracts/RecordSource.js";
import type { DataRecord } from "../contracts/Rule.js";

/**
 * RecordSource over a fixed list of records.
 *
 * When no columns are given, profile() returns one untyped column per key,
 * in first-seen order.
 */
export class InMemoryRecordSource implements RecordSource {
    readonly id: string;
    readonly name = "In-Memory Record Source";

    private readonly records: readonly DataRecord[];
    private readonly columns?: readonly Column[];

    constructor(records: readonly DataRecord[], columns?: readonly Column[], id = "memory") {
        this.id = id;
        this.records = Object.freeze(records.map(r => Object.freeze({ ...r })));
        this.columns = columns;
    }

    async *open(): AsyncIterable<DataRecord> {
        yield* this.records;
    }

    async profile(): Promise<readonly Column[]> {
        if (this.columns) {
            return this.columns;
        }

        const names: string[] = [];
        const seen = new Set<string>();
        for (const record of this.records) {
            for (const key of Object.keys(record)) {
                if (!seen.has(key)) {
                    seen.add(key);
                    names.push(key);
                }
            }
        }

        return names.map(name => createColumn(name));
    }
}
