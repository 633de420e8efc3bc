/**
 * @fileoverview Unit tests for the JSON Lines and SQLite record sources
 *
 * Tests cover:
 * - Restartable streaming
 * - Read and parse failures as ConnectorError
 * - Profiling by sampling
 * - Source selection by file extension
 *
 * @module __tests__/JsonLinesRecordSource
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConnectorError, type DataRecord } from "@ontocheck/engine";
import {
    JsonLinesRecordSource,
    SqliteRecordSource,
    openRecordSource,
} from "../connectors/index.js";

async function collect(records: AsyncIterable<DataRecord>): Promise<DataRecord[]> {
    const out: DataRecord[] = [];
    for await (const record of records) {
        out.push(record);
    }
    return out;
}

describe("JsonLinesRecordSource", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "ontocheck-jsonl-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function writeLines(name: string, content: string): string {
        const filePath = join(dir, name);
        writeFileSync(filePath, content);
        return filePath;
    }

    // Scenario: Two passes over the same file
    it("should yield the same records on every open", async () => {
        const source = new JsonLinesRecordSource(
            writeLines("people.jsonl", '{"id": 1, "name": "Ada"}\n\n{"id": 2, "name": "Erik"}\n')
        );

        const first = await collect(source.open());
        const second = await collect(source.open());

        expect(first).toEqual([{ id: 1, name: "Ada" }, { id: 2, name: "Erik" }]);
        expect(second).toEqual(first);
        expect(source.id).toBe("jsonl:people.jsonl");
    });

    // Scenario: Broken JSON after a blank line
    it("should report the physical line of invalid JSON", async () => {
        const filePath = writeLines("broken.jsonl", '{"id": 1}\n\nnot json\n');
        const source = new JsonLinesRecordSource(filePath);

        const error = await collect(source.open()).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConnectorError);
        expect(error).toHaveProperty("sourceId", "jsonl:broken.jsonl");
        expect(String(error)).toContain(`Invalid JSON on line 3 of ${filePath}`);
    });

    // Scenario: A JSON value that is not an object
    it("should reject non-object lines", async () => {
        const filePath = writeLines("arrays.jsonl", "[1, 2]\n");
        const source = new JsonLinesRecordSource(filePath);

        await expect(collect(source.open())).rejects.toThrow(`Line 1 of ${filePath} is not a JSON object`);
    });

    // Scenario: File does not exist
    it("should fail with a ConnectorError for a missing file", async () => {
        const filePath = join(dir, "missing.jsonl");
        const source = new JsonLinesRecordSource(filePath);

        await expect(collect(source.open())).rejects.toThrow(`Record file not found: ${filePath}`);
        await expect(source.profile()).rejects.toBeInstanceOf(ConnectorError);
    });

    // Scenario: Profiling samples the first records only
    it("should profile the sampled records", async () => {
        const source = new JsonLinesRecordSource(
            writeLines("sample.jsonl", '{"dob": "1985-02-13"}\n{"dob": "1990-07-04"}\nnot json\n'),
            { sampleSize: 2 }
        );

        const columns = await source.profile();

        expect(columns).toHaveLength(1);
        expect(columns[0].name).toBe("dob");
        expect(columns[0].type).toBe("date");
    });
});

describe("openRecordSource", () => {
    // Scenario: Extension decides the connector
    it("should pick the connector by extension", () => {
        expect(openRecordSource("data/people.ndjson")).toBeInstanceOf(JsonLinesRecordSource);
        expect(openRecordSource("data/people.JSONL")).toBeInstanceOf(JsonLinesRecordSource);
        expect(openRecordSource("data/people.db", { table: "people" })).toBeInstanceOf(SqliteRecordSource);
    });

    // Scenario: Unsupported file type
    it("should reject unknown extensions", () => {
        expect(() => openRecordSource("data/people.xlsx")).toThrow(
            "Unsupported source data/people.xlsx: expected one of .jsonl, .ndjson, .db, .sqlite, .sqlite3"
        );
    });
});
