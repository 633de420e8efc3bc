/**
 * @fileoverview Rule pack loader
 *
 * Loads validation rules from:
 * - YAML files (declarative checks built on the built-in rule factories)
 * - Code files (JS modules exporting Rule objects)
 *
 * @module @ontocheck/engine/plugins/RuleLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { PrimitiveType } from "../contracts/Column.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import type { Rule, RuleSeverity } from "../contracts/Rule.js";
import { isRule } from "../contracts/Rule.js";
import { describeError } from "../contracts/errors.js";
import type { Bounds, RuleDefinitionBase } from "../rules/builtins.js";
import {
    dateRule,
    lengthRule,
    oneOfRule,
    patternRule,
    rangeRule,
    requiredRule,
    typeRule,
} from "../rules/builtins.js";

/**
 * Declarative check of a YAML rule. Exactly one kind per rule.
 */
export type YamlCheck =
    | { readonly required: true }
    | { readonly pattern: string; readonly flags?: string }
    | { readonly oneOf: readonly (string | number | boolean)[]; readonly caseSensitive?: boolean }
    | { readonly range: Bounds }
    | { readonly length: Bounds }
    | { readonly date: string }
    | { readonly type: PrimitiveType };

/**
 * YAML rule definition.
 *
 * @example
 * ```yaml
 * - id: birth-date-calendar
 *   property: http://hl7.org/fhir/Patient.birthDate
 *   severity: error
 *   message: "{{field}} '{{value}}' is not a real date: {{reason}}"
 *   check:
 *     date: MM/DD/YYYY
 * ```
 */
export interface YamlRuleDefinition {
    readonly id: string;
    readonly property: string;
    readonly severity?: RuleSeverity;
    readonly message?: string;
    readonly description?: string;
    readonly timeoutMs?: number;
    readonly check: YamlCheck;
}

/**
 * A file that could not be loaded.
 */
export interface RuleLoadFailure {
    readonly filePath: string;
    readonly error: string;
}

/**
 * Loaded rules result.
 */
export interface LoadedRules {
    rules: Rule[];
    failures: RuleLoadFailure[];
}

/**
 * Rule loader configuration.
 */
export interface RuleLoaderConfig {
    /** Logger for rule loading */
    logger?: EngineLogger;
}

const CHECK_KINDS = ["required", "pattern", "oneOf", "range", "length", "date", "type"] as const;
const SEVERITIES: readonly RuleSeverity[] = ["error", "warning", "info"];
const PRIMITIVE_TYPES: readonly PrimitiveType[] = [
    "string",
    "integer",
    "number",
    "boolean",
    "date",
    "datetime",
    "unknown",
];

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
    const value = obj[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== "string") {
        throw new Error(`${where}: "${key}" must be a string`);
    }
    return value;
}

function parseBounds(value: unknown, where: string): Bounds {
    if (!isObject(value)) {
        throw new Error(`${where}: bounds must be an object with min and/or max`);
    }
    const bound = (key: "min" | "max"): number | undefined => {
        const raw = value[key];
        if (raw === undefined) {
            return undefined;
        }
        if (typeof raw !== "number") {
            throw new Error(`${where}: ${key} must be a number`);
        }
        return raw;
    };
    const min = bound("min");
    const max = bound("max");
    if (min === undefined && max === undefined) {
        throw new Error(`${where}: bounds need min or max`);
    }
    return {
        ...(min !== undefined && { min }),
        ...(max !== undefined && { max }),
    };
}

function parseCheck(value: unknown, where: string): YamlCheck {
    if (!isObject(value)) {
        throw new Error(`${where}: "check" must be an object`);
    }

    const kinds = CHECK_KINDS.filter(kind => kind in value);
    if (kinds.length !== 1) {
        throw new Error(`${where}: "check" needs exactly one of ${CHECK_KINDS.join(", ")}`);
    }

    switch (kinds[0]) {
        case "required":
            if (value.required !== true) {
                throw new Error(`${where}: "required" must be true`);
            }
            return { required: true };

        case "pattern": {
            const pattern = value.pattern;
            const flags = optionalString(value, "flags", where);
            if (typeof pattern !== "string") {
                throw new Error(`${where}: "pattern" must be a string`);
            }
            // Surface invalid expressions at load time
            new RegExp(pattern, flags);
            return flags === undefined ? { pattern } : { pattern, flags };
        }

        case "oneOf": {
            const list = value.oneOf;
            if (!Array.isArray(list) || list.length === 0) {
                throw new Error(`${where}: "oneOf" must be a non-empty list`);
            }
            const allowed: (string | number | boolean)[] = [];
            for (const item of list) {
                if (typeof item !== "string" && typeof item !== "number" && typeof item !== "boolean") {
                    throw new Error(`${where}: "oneOf" entries must be scalars`);
                }
                allowed.push(item);
            }
            const caseSensitive = value.caseSensitive;
            if (caseSensitive !== undefined && typeof caseSensitive !== "boolean") {
                throw new Error(`${where}: "caseSensitive" must be a boolean`);
            }
            return caseSensitive === undefined ? { oneOf: allowed } : { oneOf: allowed, caseSensitive };
        }

        case "range":
            return { range: parseBounds(value.range, `${where} range`) };

        case "length":
            return { length: parseBounds(value.length, `${where} length`) };

        case "date": {
            const format = value.date;
            if (typeof format !== "string" || !format.includes("YYYY")) {
                throw new Error(`${where}: "date" must be a format such as YYYY-MM-DD`);
            }
            return { date: format };
        }

        case "type": {
            const type = PRIMITIVE_TYPES.find(t => t === value.type);
            if (type === undefined) {
                throw new Error(`${where}: "type" must be one of ${PRIMITIVE_TYPES.join(", ")}`);
            }
            return { type };
        }
    }
}

/**
 * Validate one raw YAML entry.
 *
 * @param raw - Parsed YAML value
 * @param where - Location used in error messages
 * @throws Error describing the first problem found
 */
export function parseYamlRuleDefinition(raw: unknown, where: string): YamlRuleDefinition {
    if (!isObject(raw)) {
        throw new Error(`${where}: rule must be an object`);
    }

    const id = raw.id;
    const property = raw.property;
    if (typeof id !== "string" || id === "") {
        throw new Error(`${where}: "id" is required`);
    }
    if (typeof property !== "string" || property === "") {
        throw new Error(`${where} (${id}): "property" is required`);
    }

    const at = `${where} (${id})`;
    const severity = SEVERITIES.find(s => s === raw.severity);
    if (raw.severity !== undefined && severity === undefined) {
        throw new Error(`${at}: "severity" must be one of ${SEVERITIES.join(", ")}`);
    }

    const timeoutMs = raw.timeoutMs;
    if (timeoutMs !== undefined && (typeof timeoutMs !== "number" || !Number.isInteger(timeoutMs) || timeoutMs < 1)) {
        throw new Error(`${at}: "timeoutMs" must be a positive integer`);
    }

    const message = optionalString(raw, "message", at);
    const description = optionalString(raw, "description", at);

    return {
        id,
        property,
        check: parseCheck(raw.check, at),
        ...(severity !== undefined && { severity }),
        ...(message !== undefined && { message }),
        ...(description !== undefined && { description }),
        ...(timeoutMs !== undefined && { timeoutMs }),
    };
}

/**
 * Create a Rule from a YAML definition.
 *
 * @param def - Validated definition
 */
export function createRuleFromYaml(def: YamlRuleDefinition): Rule {
    const base: RuleDefinitionBase = {
        id         : def.id,
        propertyUri: def.property,
        severity   : def.severity,
        message    : def.message,
        description: def.description,
        timeoutMs  : def.timeoutMs,
    };
    const check = def.check;

    if ("required" in check) {
        return requiredRule(base);
    }
    if ("pattern" in check) {
        return patternRule(base, new RegExp(check.pattern, check.flags));
    }
    if ("oneOf" in check) {
        return oneOfRule(base, check.oneOf, check.caseSensitive ?? true);
    }
    if ("range" in check) {
        return rangeRule(base, check.range);
    }
    if ("length" in check) {
        return lengthRule(base, check.length);
    }
    if ("date" in check) {
        return dateRule(base, check.date);
    }
    return typeRule(base, check.type);
}

/**
 * Rule Loader
 *
 * Loads rule packs from directories containing YAML and/or code files.
 * A file that fails to load is logged and reported in `failures`; the
 * remaining files still load.
 *
 * @example
 * ```typescript
 * const loader = new RuleLoader();
 * const { rules, failures } = await loader.loadFromDirectory("./config/rules");
 * const store = new InMemoryRuleStore(rules);
 * ```
 */
export class RuleLoader {
    private readonly logger: EngineLogger;

    constructor(config: RuleLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("RuleLoader");
    }

    /**
     * Load all rules from a directory, in file-name order.
     *
     * Scans for:
     * - .yml/.yaml files: declarative rules
     * - .js/.mjs files: code rules
     *
     * @param dirPath - Path to the rules directory
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedRules> {
        const result: LoadedRules = { rules: [], failures: [] };

        if (!existsSync(dirPath)) {
            this.logger.warn("Rule directory does not exist", { dirPath });
            return result;
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Rule path is not a directory", { dirPath });
            return result;
        }

        const files = readdirSync(dirPath).sort();

        for (const file of files) {
            const filePath = join(dirPath, file);
            const ext = extname(file).toLowerCase();

            try {
                if (ext === ".yml" || ext === ".yaml") {
                    result.rules.push(...this.loadYamlFile(filePath));
                }
                else if (ext === ".js" || ext === ".mjs") {
                    result.rules.push(...(await this.loadCodeFile(filePath)));
                }
            }
            catch (error) {
                const message = describeError(error);
                this.logger.error("Failed to load rule file", { filePath, error: message });
                result.failures.push({ filePath, error: message });
            }
        }

        this.logger.info("Rules loaded from directory", {
            dirPath,
            rules   : result.rules.length,
            failures: result.failures.length,
        });

        return result;
    }

    /**
     * Load rules from a YAML file holding one definition or a list.
     *
     * @param filePath - Path to YAML file
     * @throws Error if any definition in the file is invalid
     */
    loadYamlFile(filePath: string): Rule[] {
        const content = readFileSync(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);

        if (parsed === null || parsed === undefined) {
            return [];
        }

        const definitions: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

        return definitions.map((raw, i) => {
            const rule = createRuleFromYaml(parseYamlRuleDefinition(raw, `${filePath}[${i}]`));
            this.logger.debug("Loaded YAML rule", { id: rule.id, property: rule.propertyUri });
            return rule;
        });
    }

    /**
     * Load rules from a code module.
     *
     * Named exports and the default export are checked; a default export
     * may also be an array of rules.
     *
     * @param filePath - Path to JS module
     */
    async loadCodeFile(filePath: string): Promise<Rule[]> {
        const rules: Rule[] = [];
        const exports: Record<string, unknown> = await import(pathToFileURL(filePath).href);

        for (const [key, exported] of Object.entries(exports)) {
            const candidates: unknown[] = key === "default" && Array.isArray(exported) ? exported : [exported];
            for (const candidate of candidates) {
                // A rule exported both by name and as default loads once
                if (isRule(candidate) && !rules.includes(candidate)) {
                    rules.push(candidate);
                    this.logger.debug("Loaded code rule", { id: candidate.id, export: key });
                }
            }
        }

        return rules;
    }

    /**
     * Load rules from several directories, in order.
     *
     * @param dirPaths - Directory paths
     */
    async loadFromDirectories(dirPaths: readonly string[]): Promise<LoadedRules> {
        const result: LoadedRules = { rules: [], failures: [] };

        for (const dirPath of dirPaths) {
            const loaded = await this.loadFromDirectory(dirPath);
            result.rules.push(...loaded.rules);
            result.failures.push(...loaded.failures);
        }

        return result;
    }
}
