/**
 * @fileoverview Rule execution context
 *
 * Immutable bundle of everything a run shares: the chosen FieldMapper, the
 * RuleStore, the ontology schema, execution options, logger and event bus.
 * Built once with createExecutionContext() and passed to the RuleExecutor;
 * there is no process-wide configuration.
 *
 * @module @ontocheck/engine/execution/RuleExecutionContext
 */

import type { EventBus } from "../contracts/EventBus.js";
import type { FieldMapper, MappingOptions } from "../contracts/FieldMapping.js";
import { resolveMappingOptions } from "../contracts/FieldMapping.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import type { OntologySchema } from "../contracts/OntologySchema.js";
import type { RuleStore } from "../contracts/RuleStore.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Execution settings.
 */
export interface ExecutionOptions {
    /** Records evaluated in parallel (default: 1) */
    readonly concurrency: number;

    /**
     * Completed records that may wait in the reorder buffer behind a slower
     * earlier record before reading pauses (default: 100)
     */
    readonly batchSize: number;

    /** Default timeout for asynchronous rule predicates, in ms (default: 5000) */
    readonly ruleTimeoutMs: number;

    /** Copy input records into error records (default: true) */
    readonly includeRecords: boolean;

    /** Options handed to the mapper */
    readonly mapping: Required<MappingOptions>;
}

/**
 * Input to createExecutionContext().
 */
export interface RuleExecutionContextConfig {
    readonly mapper: FieldMapper;
    readonly ruleStore: RuleStore;

    /** Required for mapping; run() alone works without it */
    readonly schema?: OntologySchema;

    readonly options?: Partial<Omit<ExecutionOptions, "mapping">> & { readonly mapping?: MappingOptions };
    readonly logger?: EngineLogger;
    readonly eventBus?: EventBus;
}

/**
 * Immutable run configuration.
 */
export interface RuleExecutionContext {
    readonly mapper: FieldMapper;
    readonly ruleStore: RuleStore;
    readonly schema?: OntologySchema;
    readonly options: ExecutionOptions;
    readonly logger: EngineLogger;
    readonly eventBus: EventBus;
}

export const DEFAULT_EXECUTION_OPTIONS = Object.freeze({
    concurrency   : 1,
    batchSize     : 100,
    ruleTimeoutMs : 5000,
    includeRecords: true,
});

function positiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

/**
 * Validate configuration and freeze it into a RuleExecutionContext.
 *
 * @throws RangeError on invalid options
 *
 * @example
 * ```typescript
 * const context = createExecutionContext({
 *     mapper   : new HeuristicMapper(),
 *     ruleStore: new InMemoryRuleStore(rules),
 *     schema,
 *     options  : { concurrency: 4, ruleTimeoutMs: 2000 },
 * });
 * ```
 */
export function createExecutionContext(config: RuleExecutionContextConfig): RuleExecutionContext {
    const options = config.options ?? {};
    const logger = config.logger ?? createConsoleLogger("RuleExecutor");

    const concurrency = positiveInteger("concurrency", options.concurrency ?? DEFAULT_EXECUTION_OPTIONS.concurrency);
    const batchSize = positiveInteger("batchSize", options.batchSize ?? DEFAULT_EXECUTION_OPTIONS.batchSize);
    const ruleTimeoutMs = positiveInteger("ruleTimeoutMs", options.ruleTimeoutMs ?? DEFAULT_EXECUTION_OPTIONS.ruleTimeoutMs);

    return Object.freeze({
        mapper   : config.mapper,
        ruleStore: config.ruleStore,
        schema   : config.schema,
        options  : Object.freeze({
            concurrency,
            batchSize,
            ruleTimeoutMs,
            includeRecords: options.includeRecords ?? DEFAULT_EXECUTION_OPTIONS.includeRecords,
            mapping       : Object.freeze(resolveMappingOptions(options.mapping)),
        }),
        logger,
        eventBus: config.eventBus ?? new InMemoryEventBus(logger),
    });
}
