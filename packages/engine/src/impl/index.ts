/**
 * @fileoverview Implementation barrel exports
 *
 * In-memory implementations of engine contracts.
 *
 * @module @ontocheck/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { InMemoryRuleStore } from "./InMemoryRuleStore.js";
export { InMemoryRecordSource } from "./InMemoryRecordSource.js";
