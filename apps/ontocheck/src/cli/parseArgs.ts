/**
 * @fileoverview Command-line argument parsing
 *
 * ```
 * ontocheck validate <source> --ontology <file> --rules <dir>
 *     [--rules <dir> ...] [--strategy evidence|heuristic|explicit]
 *     [--mapping <file>] [--strict] [--concurrency <n>]
 *     [--min-confidence <x>] [--table <name> | --query <sql>]
 *     [--config <file>] [--out <file>]
 * ```
 *
 * @module cli/parseArgs
 */

export type StrategyName = "evidence" | "heuristic" | "explicit";

/**
 * Parsed `validate` invocation. Unset options fall back to settings.
 */
export interface ValidateArgs {
    command: "validate";
    source: string;
    ontology?: string;
    rules: string[];
    strategy?: StrategyName;
    mapping?: string;
    strict?: boolean;
    concurrency?: number;
    minConfidence?: number;
    table?: string;
    query?: string;
    config?: string;
    out?: string;
}

export type CliArgs = ValidateArgs | { command: "help" };

export const USAGE = `Usage: ontocheck validate <source> --ontology <file> --rules <dir> [options]

Options:
  --ontology <file>        Ontology YAML file
  --rules <dir>            Rule pack directory (repeatable)
  --strategy <name>        evidence | heuristic | explicit
  --mapping <file>         Column mapping YAML (explicit strategy)
  --strict                 Fail when a required property stays unmapped
  --concurrency <n>        Records validated in parallel
  --min-confidence <x>     Minimum mapping confidence in [0, 1]
  --table <name>           SQLite table to read
  --query <sql>            SQLite query to read
  --config <file>          Settings file (default: ontocheck.yml)
  --out <file>             Write the JSON report to this file`;

/**
 * Invalid command line
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

function isStrategy(value: string): value is StrategyName {
    return value === "evidence" || value === "heuristic" || value === "explicit";
}

function parseNumber(flag: string, value: string): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed)) {
        throw new UsageError(`${flag} expects a number, got "${value}"`);
    }
    return parsed;
}

/**
 * Parse process arguments (without the node and script entries).
 *
 * @throws UsageError on unknown flags, missing values or a missing source
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const [command, ...rest] = argv;

    if (command === undefined || command === "help" || command === "--help" || command === "-h") {
        return { command: "help" };
    }
    if (command !== "validate") {
        throw new UsageError(`Unknown command: ${command}`);
    }

    const parsed: ValidateArgs = { command: "validate", source: "", rules: [] };
    const positional: string[] = [];

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];

        if (!arg.startsWith("--")) {
            positional.push(arg);
            continue;
        }
        if (arg === "--strict") {
            parsed.strict = true;
            continue;
        }
        if (arg === "--help") {
            return { command: "help" };
        }

        const value = rest[i + 1];
        if (value === undefined || value.startsWith("--")) {
            throw new UsageError(`${arg} requires a value`);
        }
        i++;

        switch (arg) {
            case "--ontology":
                parsed.ontology = value;
                break;
            case "--rules":
                parsed.rules.push(value);
                break;
            case "--strategy":
                if (!isStrategy(value)) {
                    throw new UsageError(`--strategy must be evidence, heuristic or explicit, got "${value}"`);
                }
                parsed.strategy = value;
                break;
            case "--mapping":
                parsed.mapping = value;
                break;
            case "--concurrency":
                parsed.concurrency = parseNumber(arg, value);
                break;
            case "--min-confidence":
                parsed.minConfidence = parseNumber(arg, value);
                break;
            case "--table":
                parsed.table = value;
                break;
            case "--query":
                parsed.query = value;
                break;
            case "--config":
                parsed.config = value;
                break;
            case "--out":
                parsed.out = value;
                break;
            default:
                throw new UsageError(`Unknown option: ${arg}`);
        }
    }

    if (positional.length !== 1) {
        throw new UsageError(
            positional.length === 0 ? "Missing <source>" : `Unexpected arguments: ${positional.slice(1).join(" ")}`
        );
    }
    parsed.source = positional[0];

    return parsed;
}
