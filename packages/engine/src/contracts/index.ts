/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and types that define the ontocheck engine contract.
 *
 * @module @ontocheck/engine/contracts
 */

// Columns and ontology
export type { PrimitiveType, FeatureVector, Column } from "./Column.js";
export { createFeatureVector, createColumn } from "./Column.js";
export type { OntologyProperty, OntologySchema } from "./OntologySchema.js";
export { createOntologySchema } from "./OntologySchema.js";

// Field mapping
export type {
    MappingStrategy,
    MappingEntry,
    FieldMapping,
    MappingOptions,
    ResolvedMappingOptions,
    FieldMapper,
} from "./FieldMapping.js";
export {
    DEFAULT_MIN_CONFIDENCE,
    resolveMappingOptions,
    isFieldMapper,
    createFieldMapping,
    getMappingEntry,
} from "./FieldMapping.js";

// Rules
export type {
    DataRecord,
    RuleSeverity,
    RuleOutcome,
    RuleContext,
    RuleVerdict,
    RulePredicate,
    Rule,
} from "./Rule.js";
export { MemoKey, pass, fail, ruleError, isRuleOutcome, isRule } from "./Rule.js";
export type { RuleStore } from "./RuleStore.js";

// Collaborators
export type { RecordSource } from "./RecordSource.js";
export type { SimilarityService } from "./SimilarityService.js";

// Report
export type {
    RuleEvaluation,
    RecordResult,
    CountSummary,
    RecordSummary,
    RuleBreakdown,
    RuleSummary,
    FieldSummary,
    RecordError,
    ErrorRecord,
    RunStatus,
    ReportMappingEntry,
    ResultReport,
} from "./ResultReport.js";
export { createRecordResult, percentage } from "./ResultReport.js";

// Errors
export type { MappingErrorReason } from "./errors.js";
export { describeError, MappingError, ConnectorError, RunError } from "./errors.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    RunEventType,
    RecordEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Logging
export type { EngineLogger } from "./Logger.js";
export { createConsoleLogger, silentLogger } from "./Logger.js";
