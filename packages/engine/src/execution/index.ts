/**
 * @fileoverview Rule execution barrel exports
 *
 * @module @ontocheck/engine/execution
 */

export {
    createExecutionContext,
    DEFAULT_EXECUTION_OPTIONS,
    type ExecutionOptions,
    type RuleExecutionContext,
    type RuleExecutionContextConfig,
} from "./RuleExecutionContext.js";
export { RuleExecutor, type RunOptions, type ValidationResult } from "./RuleExecutor.js";
export { evaluateRule, normalizeVerdict, type EvaluationTarget } from "./evaluateRule.js";
export {
    ReportAggregator,
    aggregateRecordResults,
    type AggregatorOptions,
} from "./ReportAggregator.js";
export { renderMessage, formatValue, type MessageValues } from "./messageTemplate.js";
