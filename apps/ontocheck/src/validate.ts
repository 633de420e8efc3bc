/**
 * @fileoverview Validation pipeline wiring
 *
 * Builds the engine components for one `ontocheck validate` invocation:
 * settings, ontology, rule packs, mapper, execution context and record
 * source, then runs the validation and writes the report.
 *
 * @module validate
 */

import { resolve } from "path";
import {
    createConsoleLogger,
    createExecutionContext,
    createFieldMapper,
    HeuristicMapper,
    InMemoryRuleStore,
    RuleExecutor,
    RuleLoader,
    RunError,
    type EngineLogger,
    type FieldMapper,
    type FieldMapping,
    type ResultReport,
    type SimilarityService,
} from "@ontocheck/engine";
import type { ValidateArgs } from "./cli/parseArgs.js";
import { loadMapping, loadOntology, loadSettings, type Settings, type SettingsEnv } from "./config/index.js";
import { openRecordSource } from "./connectors/index.js";
import { FallbackMapper } from "./mapping/FallbackMapper.js";
import { OpenAISimilarityService } from "./similarity/OpenAISimilarityService.js";
import { EXIT_ERROR, exitCodeFor, formatSummary, writeReport } from "./report/writeReport.js";

/**
 * Settings file looked up in the working directory when --config is absent
 */
export const DEFAULT_SETTINGS_FILE = "ontocheck.yml";

/**
 * Collaborators a caller may supply instead of the defaults
 */
export interface ValidationDependencies {
    env?: SettingsEnv;
    logger?: EngineLogger;
    signal?: AbortSignal;

    /** Replaces the OpenAI service for the evidence strategy */
    similarityService?: SimilarityService;

    /** Rule pack directories loaded before the command-line ones */
    defaultRuleDirs?: string[];
}

/**
 * What a validation invocation produced
 */
export interface ValidationOutcome {
    report: ResultReport;

    /** Absent when the run failed before the mapping was returned */
    mapping?: FieldMapping;

    exitCode: number;
}

/**
 * Build the mapper for the selected strategy.
 *
 * @throws Error when the explicit strategy has no mapping file
 */
export function buildMapper(
    settings: Settings,
    args: Pick<ValidateArgs, "strategy" | "mapping">,
    logger: EngineLogger,
    similarityService?: SimilarityService
): FieldMapper {
    const strategy = args.strategy ?? settings.strategy;

    if (strategy === "explicit") {
        const mappingPath = args.mapping ?? settings.mapping;
        if (!mappingPath) {
            throw new Error("The explicit strategy needs a mapping file: pass --mapping or set 'mapping' in the settings file");
        }
        return createFieldMapper({ strategy: "explicit", mapping: loadMapping(mappingPath) });
    }

    if (strategy === "heuristic") {
        return createFieldMapper({ strategy: "heuristic", logger });
    }

    const service = similarityService ?? (settings.openai.apiKey
        ? new OpenAISimilarityService({ apiKey: settings.openai.apiKey, model: settings.openai.model, logger })
        : undefined);

    if (!service) {
        logger.warn("No similarity service configured; evidence mapping uses profile evidence only");
    }

    const mapper = createFieldMapper({
        strategy         : "evidence",
        similarityService: service,
        weights          : settings.weights,
        logger,
    });

    return settings.fallbackToHeuristic && service
        ? new FallbackMapper(mapper, new HeuristicMapper({ logger }), logger)
        : mapper;
}

/**
 * Run one validation.
 *
 * A record stream failure still yields an outcome: the partial report is
 * written and the exit code is 2. Configuration, mapping and connector
 * errors raised before any record is read propagate.
 */
export async function runValidation(
    args: ValidateArgs,
    deps: ValidationDependencies = {}
): Promise<ValidationOutcome> {
    const logger = deps.logger ?? createConsoleLogger("ontocheck");
    const settings = loadSettings(resolve(args.config ?? DEFAULT_SETTINGS_FILE), deps.env ?? process.env);

    const ontologyPath = args.ontology ?? settings.ontology;
    if (!ontologyPath) {
        throw new Error("No ontology given: pass --ontology or set 'ontology' in the settings file");
    }
    const schema = loadOntology(ontologyPath);
    logger.info("Ontology loaded", { id: schema.id, properties: schema.properties().length });

    const ruleDirs = [...(deps.defaultRuleDirs ?? []), ...settings.rules, ...args.rules];
    if (ruleDirs.length === 0) {
        logger.warn("No rule directories given; every mapped field will pass");
    }
    const loaded = await new RuleLoader({ logger }).loadFromDirectories(ruleDirs);

    const context = createExecutionContext({
        mapper   : buildMapper(settings, args, logger, deps.similarityService),
        ruleStore: new InMemoryRuleStore(loaded.rules),
        schema,
        logger,
        options  : {
            concurrency   : args.concurrency ?? settings.concurrency,
            batchSize     : settings.batchSize,
            ruleTimeoutMs : settings.ruleTimeoutMs,
            includeRecords: settings.includeRecords,
            mapping       : {
                minConfidence : args.minConfidence ?? settings.minConfidence,
                strict        : args.strict ?? settings.strict,
                allowManyToOne: settings.allowManyToOne,
            },
        },
    });

    const executor = new RuleExecutor(context);

    executor.eventBus.subscribe("rule:error", (event) => {
        logger.warn("Rule error", event.data);
    });
    executor.eventBus.subscribe("run:cancelled", (event) => {
        logger.warn("Validation cancelled", event.data);
    });

    const source = openRecordSource(args.source, {
        table     : args.table,
        query     : args.query,
        sampleSize: settings.sampleSize,
    });

    let outcome: ValidationOutcome;
    try {
        const { mapping, report } = await executor.validate(source, { signal: deps.signal });
        outcome = { mapping, report, exitCode: exitCodeFor(report) };

        for (const line of formatSummary(report, mapping)) {
            logger.info(line);
        }
    }
    catch (error) {
        if (!(error instanceof RunError)) {
            throw error;
        }
        logger.error("Validation failed", { error: error.message });
        outcome = { report: error.report, exitCode: EXIT_ERROR };
    }
    finally {
        await source.close?.();
    }

    if (args.out) {
        writeReport(outcome.report, args.out);
        logger.info("Report written", { path: args.out });
    }

    return outcome;
}
