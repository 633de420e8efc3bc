/**
 * @fileoverview Unit tests for SqliteRecordSource
 *
 * Uses a temporary database file created for each test.
 *
 * @module __tests__/SqliteRecordSource
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConnectorError, type DataRecord } from "@ontocheck/engine";
import { SqliteRecordSource, buildSelect } from "../connectors/SqliteRecordSource.js";

async function collect(records: AsyncIterable<DataRecord>): Promise<DataRecord[]> {
    const out: DataRecord[] = [];
    for await (const record of records) {
        out.push(record);
    }
    return out;
}

describe("SqliteRecordSource", () => {
    let dir: string;
    let dbPath: string;
    let source: SqliteRecordSource | undefined;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "ontocheck-sqlite-"));
        dbPath = join(dir, "patients.db");

        const db = new Database(dbPath);
        db.exec("CREATE TABLE patients (mrn TEXT, dob TEXT, age INTEGER)");
        const insert = db.prepare("INSERT INTO patients (mrn, dob, age) VALUES (?, ?, ?)");
        insert.run("MRN-1", "1985-02-13", 39);
        insert.run("MRN-2", "02/31/1985", 41);
        insert.run("MRN-3", null, 12);
        db.close();
    });

    afterEach(async () => {
        await source?.close();
        source = undefined;
        rmSync(dir, { recursive: true, force: true });
    });

    // Scenario: Read a table in rowid order, twice
    it("should stream table rows and restart on every open", async () => {
        source = new SqliteRecordSource(dbPath, { table: "patients" });

        const first = await collect(source.open());
        const second = await collect(source.open());

        expect(first).toEqual([
            { mrn: "MRN-1", dob: "1985-02-13", age: 39 },
            { mrn: "MRN-2", dob: "02/31/1985", age: 41 },
            { mrn: "MRN-3", dob: null, age: 12 },
        ]);
        expect(second).toEqual(first);
        expect(source.id).toBe("sqlite:patients.db/patients");
    });

    // Scenario: Custom query
    it("should read the rows of a query", async () => {
        source = new SqliteRecordSource(dbPath, { query: "SELECT mrn FROM patients WHERE age > 20 ORDER BY age" });

        expect(await collect(source.open())).toEqual([{ mrn: "MRN-1" }, { mrn: "MRN-2" }]);
    });

    // Scenario: Profile in declared column order
    it("should profile columns in query order", async () => {
        source = new SqliteRecordSource(dbPath, { table: "patients" });

        const columns = await source.profile();

        expect(columns.map(c => c.name)).toEqual(["mrn", "dob", "age"]);
        expect(columns[2].type).toBe("integer");
        expect(columns[1].features.numeric.null_rate).toBe(1 / 3);
    });

    // Scenario: Missing table
    it("should wrap query failures in ConnectorError", async () => {
        source = new SqliteRecordSource(dbPath, { table: "visits" });

        await expect(collect(source.open())).rejects.toThrow(/^Query failed: no such table: visits/);
    });

    // Scenario: Database file does not exist
    it("should fail with a ConnectorError for a missing database", async () => {
        const missing = join(dir, "missing.db");
        source = new SqliteRecordSource(missing, { table: "patients" });

        const error = await collect(source.open()).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConnectorError);
        expect(String(error)).toContain(`SQLite database not found at ${missing}`);
    });

    // Scenario: Reading after close reopens the database
    it("should reopen after close", async () => {
        source = new SqliteRecordSource(dbPath, { table: "patients" });

        await collect(source.open());
        await source.close();

        expect(await collect(source.open())).toHaveLength(3);
    });

    describe("buildSelect", () => {
        // Scenario: Table names are validated identifiers
        it("should quote valid table names and reject others", () => {
            expect(buildSelect({ table: "patients" })).toBe('SELECT * FROM "patients" ORDER BY rowid');
            expect(() => buildSelect({ table: "patients; DROP TABLE patients" }))
                .toThrow("Invalid table name: patients; DROP TABLE patients");
        });

        // Scenario: Neither or both of table and query
        it("should require exactly one of table and query", () => {
            expect(() => buildSelect({})).toThrow("A table or a query is required");
            expect(() => buildSelect({ table: "a", query: "SELECT 1" })).toThrow("Pass either a table or a query, not both");
        });
    });
});
