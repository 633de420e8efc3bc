/**
 * @fileoverview In-Memory RuleStore
 *
 * Indexes rules by property URI, keeping registration order.
 *
 * @module @ontocheck/engine/impl/InMemoryRuleStore
 */

import type { Rule } from "../contracts/Rule.js";
import type { RuleStore } from "../contracts/RuleStore.js";

/**
 * RuleStore backed by a Map.
 *
 * Rules are added while setting up a run; the executor only reads.
 *
 * @example
 * ```typescript
 * const store = new InMemoryRuleStore([validDateRule, requiredRule]);
 * store.rulesFor("http://hl7.org/fhir/Patient.birthDate");
 * ```
 */
export class InMemoryRuleStore implements RuleStore {
    private readonly rules: Map<string, Rule[]> = new Map();

    constructor(rules: Iterable<Rule> = []) {
        for (const rule of rules) {
            this.add(rule);
        }
    }

    /**
     * Register a rule.
     *
     * @throws Error if the property already has a rule with the same id
     */
    add(rule: Rule): this {
        let list = this.rules.get(rule.propertyUri);
        if (!list) {
            list = [];
            this.rules.set(rule.propertyUri, list);
        }

        if (list.some(r => r.id === rule.id)) {
            throw new Error(`Duplicate rule id for ${rule.propertyUri}: ${rule.id}`);
        }

        list.push(rule);
        return this;
    }

    rulesFor(propertyUri: string): readonly Rule[] {
        return this.rules.get(propertyUri) ?? [];
    }

    /**
     * Property URIs that have at least one rule.
     */
    properties(): string[] {
        return Array.from(this.rules.keys());
    }

    /**
     * Total number of registered rules.
     */
    get size(): number {
        let total = 0;
        for (const list of this.rules.values()) {
            total += list.length;
        }
        return total;
    }
}
