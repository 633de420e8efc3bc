/**
 * @fileoverview ontocheck engine
 *
 * Ontology-driven data-quality validation.
 *
 * The engine provides:
 * - Field mapping from dataset columns to ontology properties
 *   (evidence-weighted, heuristic or explicit), solved as a one-to-one assignment
 * - Isolated rule evaluation with timeouts and cancellation
 * - Streaming aggregation into a ResultReport
 * - Built-in rules and a YAML/code rule-pack loader
 *
 * @module @ontocheck/engine
 * @example
 * ```typescript
 * import {
 *     createExecutionContext,
 *     HeuristicMapper,
 *     InMemoryRuleStore,
 *     RuleExecutor,
 *     RuleLoader,
 * } from "@ontocheck/engine";
 *
 * const { rules } = await new RuleLoader().loadFromDirectory("./rules");
 * const executor = new RuleExecutor(createExecutionContext({
 *     mapper   : new HeuristicMapper(),
 *     ruleStore: new InMemoryRuleStore(rules),
 *     schema,
 * }));
 * const { report } = await executor.validate(source);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

// ============================================================================
// Mapping exports
// ============================================================================

export * from "./mapping/index.js";

// ============================================================================
// Execution exports
// ============================================================================

export * from "./execution/index.js";

// ============================================================================
// Rules and rule packs
// ============================================================================

export * from "./rules/index.js";
export * from "./plugins/index.js";

export { mapWithConcurrency } from "./utils/concurrency.js";
