/**
 * @fileoverview Settings loader
 *
 * Reads `ontocheck.yml`, applies environment overrides and validates the
 * result. Precedence, lowest first: defaults, settings file, environment,
 * command-line flags (applied by the CLI).
 *
 * Paths in the settings file are resolved against the file's directory.
 *
 * @module config/loadSettings
 */

import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const WeightsSchema = z.object({
    semantic   : z.number().min(0),
    embedding  : z.number().min(0),
    numeric    : z.number().min(0),
    categorical: z.number().min(0),
    type       : z.number().min(0),
}).partial();

/**
 * Settings file schema
 */
export const SettingsSchema = z.object({
    strategy           : z.enum(["evidence", "heuristic", "explicit"]).default("heuristic"),
    minConfidence      : z.number().min(0).max(1).default(0.5),
    strict             : z.boolean().default(false),
    allowManyToOne     : z.boolean().default(false),
    fallbackToHeuristic: z.boolean().default(true),
    concurrency        : z.number().int().positive().default(1),
    batchSize          : z.number().int().positive().default(100),
    ruleTimeoutMs      : z.number().int().positive().default(5000),
    includeRecords     : z.boolean().default(true),
    sampleSize         : z.number().int().positive().default(1000),
    ontology           : z.string().optional(),
    mapping            : z.string().optional(),
    rules              : z.array(z.string()).default([]),
    weights            : WeightsSchema.optional(),
    openai             : z.object({
        apiKey: z.string().optional(),
        model : z.string().default("text-embedding-3-small"),
    }).default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Environment variables that override settings
 */
export type SettingsEnv = Readonly<Record<string, string | undefined>>;

function numberFromEnv(value: string | undefined): number | undefined {
    return value === undefined || value.trim() === "" ? undefined : Number(value);
}

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ");
}

function readSettingsFile(filePath: string): Record<string, unknown> {
    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));

    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
        throw new Error(`Invalid settings file ${filePath}: expected a mapping at the top level`);
    }

    const raw: Record<string, unknown> = { ...parsed };
    const base = dirname(filePath);

    // Paths are relative to the settings file, not to the working directory
    for (const key of ["ontology", "mapping"]) {
        const value = raw[key];
        if (typeof value === "string") {
            raw[key] = resolve(base, value);
        }
    }
    const rules = raw.rules;
    if (Array.isArray(rules)) {
        raw.rules = rules.map(entry => (typeof entry === "string" ? resolve(base, entry) : entry));
    }

    return raw;
}

/**
 * Overrides taken from the environment.
 */
export function settingsFromEnv(env: SettingsEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    const concurrency = numberFromEnv(env.ONTOCHECK_CONCURRENCY);
    if (concurrency !== undefined) {
        overrides.concurrency = concurrency;
    }
    const minConfidence = numberFromEnv(env.ONTOCHECK_MIN_CONFIDENCE);
    if (minConfidence !== undefined) {
        overrides.minConfidence = minConfidence;
    }
    const ruleTimeoutMs = numberFromEnv(env.ONTOCHECK_RULE_TIMEOUT_MS);
    if (ruleTimeoutMs !== undefined) {
        overrides.ruleTimeoutMs = ruleTimeoutMs;
    }
    if (env.ONTOCHECK_STRATEGY) {
        overrides.strategy = env.ONTOCHECK_STRATEGY;
    }

    return overrides;
}

/**
 * Load and validate settings.
 *
 * @param filePath - Settings file; a missing file means defaults only
 * @param env - Environment (defaults to process.env)
 * @throws Error naming every invalid setting
 *
 * @example
 * ```typescript
 * const settings = loadSettings("./ontocheck.yml");
 * console.log(settings.strategy, settings.concurrency);
 * ```
 */
export function loadSettings(filePath?: string, env: SettingsEnv = process.env): Settings {
    const fromFile = filePath && existsSync(filePath) ? readSettingsFile(filePath) : {};
    const fileOpenAI = fromFile.openai;

    const openai: Record<string, unknown> = typeof fileOpenAI === "object" && fileOpenAI !== null
        ? { ...fileOpenAI }
        : {};
    if (env.OPENAI_API_KEY) {
        openai.apiKey = env.OPENAI_API_KEY;
    }
    if (env.OPENAI_EMBEDDING_MODEL) {
        openai.model = env.OPENAI_EMBEDDING_MODEL;
    }

    const result = SettingsSchema.safeParse({
        ...fromFile,
        ...settingsFromEnv(env),
        openai,
    });

    if (!result.success) {
        const where = filePath && existsSync(filePath) ? filePath : "environment";
        throw new Error(`Invalid settings (${where}): ${formatIssues(result.error)}`);
    }

    return result.data;
}
