/**
 * RuleStore Contract
 *
 * Read-only index from property URI to its ordered rule set. Callers may
 * assume lookups are cheap; the executor resolves each mapped property once
 * per run.
 */

import type { Rule } from "./Rule.js";

export interface RuleStore {
    /**
     * Rules attached to a property, in evaluation order.
     * Unknown properties yield an empty list.
     */
    rulesFor(propertyUri: string): readonly Rule[];
}
