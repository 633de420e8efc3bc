/**
 * SQLite Record Source
 *
 * Streams rows of a table (or the result of a query) from a SQLite
 * database. The database is opened read-only and never modified.
 */

import Database from "better-sqlite3";
import { existsSync } from "fs";
import { basename } from "path";
import {
    ConnectorError,
    describeError,
    type Column,
    type DataRecord,
    type RecordSource,
} from "@ontocheck/engine";
import { DEFAULT_SAMPLE_SIZE, profileColumns } from "../profiling/profileColumns.js";
import { isDataRecord } from "./JsonLinesRecordSource.js";

/**
 * Options for the SQLite source. Exactly one of `table` or `query` is needed.
 */
export interface SqliteRecordSourceOptions {
    /** Table to read in rowid order */
    table?: string;

    /** SELECT statement to read instead of a table */
    query?: string;

    /** Rows sampled by profile() (default: 1000) */
    sampleSize?: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build the SELECT statement for a source configuration.
 *
 * @throws Error on an invalid table name or when neither/both of table and query are set
 */
export function buildSelect(options: SqliteRecordSourceOptions): string {
    if (options.query && options.table) {
        throw new Error("Pass either a table or a query, not both");
    }
    if (options.query) {
        return options.query;
    }
    if (!options.table) {
        throw new Error("A table or a query is required");
    }
    if (!IDENTIFIER.test(options.table)) {
        throw new Error(`Invalid table name: ${options.table}`);
    }
    return `SELECT * FROM "${options.table}" ORDER BY rowid`;
}

/**
 * Read-only SQLite record source
 */
export class SqliteRecordSource implements RecordSource {
    readonly id: string;
    readonly name: string;

    private db: Database.Database | null = null;
    private readonly dbPath: string;
    private readonly sql: string;
    private readonly sampleSize: number;

    constructor(dbPath: string, options: SqliteRecordSourceOptions) {
        this.dbPath = dbPath;
        this.sql = buildSelect(options);
        this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
        this.id = `sqlite:${basename(dbPath)}${options.table ? `/${options.table}` : ""}`;
        this.name = `SQLite (${basename(dbPath)})`;
    }

    /**
     * Ensure the database is open
     */
    private ensureOpen(): Database.Database {
        if (this.db) {
            return this.db;
        }

        if (!existsSync(this.dbPath)) {
            throw new ConnectorError(this.id, `SQLite database not found at ${this.dbPath}`);
        }

        try {
            this.db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
        }
        catch (error) {
            throw new ConnectorError(
                this.id,
                `Cannot open SQLite database ${this.dbPath}: ${describeError(error)}`,
                { cause: error }
            );
        }
        return this.db;
    }

    async *open(): AsyncIterable<DataRecord> {
        const db = this.ensureOpen();

        let rows: IterableIterator<unknown>;
        try {
            rows = db.prepare(this.sql).iterate();
        }
        catch (error) {
            throw new ConnectorError(this.id, `Query failed: ${describeError(error)}`, { cause: error });
        }

        // Leaving the loop early (cancellation, profiling) returns the iterator and frees the statement
        for (const row of rows) {
            if (!isDataRecord(row)) {
                throw new ConnectorError(this.id, "Query returned a non-object row");
            }
            yield row;
        }
    }

    async profile(): Promise<readonly Column[]> {
        const db = this.ensureOpen();

        let names: string[];
        try {
            names = db.prepare(this.sql).columns().map(column => column.name);
        }
        catch (error) {
            throw new ConnectorError(this.id, `Query failed: ${describeError(error)}`, { cause: error });
        }

        const sample: DataRecord[] = [];
        for await (const record of this.open()) {
            sample.push(record);
            if (sample.length >= this.sampleSize) {
                break;
            }
        }
        return profileColumns(sample, this.sampleSize, names);
    }

    /**
     * Close the database connection
     */
    async close(): Promise<void> {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}
