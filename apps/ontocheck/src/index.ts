/**
 * @fileoverview ontocheck - Main Entry Point
 *
 * Validates a dataset against ontology-defined data quality rules:
 * profiles the source, maps its columns onto ontology properties, runs
 * every rule pack and writes a ResultReport.
 *
 * Rule loading order:
 * 1. Bundled rule packs (../user/rules) - code rules shipped with the app
 * 2. Directories listed under `rules` in the settings file
 * 3. Directories passed with --rules
 *
 * Exit codes: 0 all records passed, 1 some records failed, 2 error.
 *
 * @module ontocheck
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { MappingError, ConnectorError, describeError } from "@ontocheck/engine";
import { parseArgs, UsageError, USAGE, type CliArgs } from "./cli/parseArgs.js";
import { EXIT_ERROR, EXIT_OK } from "./report/writeReport.js";
import { runValidation } from "./validate.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 *
 * @returns Process exit code
 */
async function main(argv: string[]): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    }
    catch (error) {
        if (error instanceof UsageError) {
            console.error(`[ERROR] ${error.message}\n\n${USAGE}`);
            return EXIT_ERROR;
        }
        throw error;
    }

    if (args.command === "help") {
        console.log(USAGE);
        return EXIT_OK;
    }

    // First Ctrl+C cancels the run and keeps the partial report
    const controller = new AbortController();
    process.once("SIGINT", () => {
        console.log("\n[INFO] Cancelling validation...");
        controller.abort();
    });

    try {
        const outcome = await runValidation(args, {
            signal         : controller.signal,
            defaultRuleDirs: [join(__dirname, "..", "user", "rules")],
        });
        return outcome.exitCode;
    }
    catch (error) {
        if (error instanceof MappingError) {
            console.error(`[ERROR] Mapping failed (${error.reason}): ${error.message}`);
        }
        else if (error instanceof ConnectorError) {
            console.error(`[ERROR] Source ${error.sourceId} failed: ${error.message}`);
        }
        else {
            console.error(`[FATAL] ${describeError(error)}`);
        }
        return EXIT_ERROR;
    }
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[FATAL]", error);
        process.exitCode = EXIT_ERROR;
    });
