/**
 * @fileoverview Isolated rule evaluation
 *
 * Every predicate call goes through evaluateRule(), which turns any
 * throw, rejection, timeout or malformed verdict into a tagged
 * RuleOutcome. Nothing a predicate does can escape as an exception.
 *
 * Synchronous predicates run to completion; the timeout applies to the
 * asynchronous part of a predicate.
 *
 * @module @ontocheck/engine/execution/evaluateRule
 */

import type {
    DataRecord,
    MemoKey,
    Rule,
    RuleContext,
    RuleOutcome,
    RuleVerdict,
} from "../contracts/Rule.js";
import { fail, isRuleOutcome, pass, ruleError } from "../contracts/Rule.js";
import { describeError } from "../contracts/errors.js";

/**
 * Where a rule is being evaluated.
 */
export interface EvaluationTarget {
    readonly field: string;
    readonly propertyUri: string;
    readonly recordIndex: number;

    /** Per-record scope for memoised values */
    readonly scope: object;
}

class RuleTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Rule timed out after ${timeoutMs}ms`);
        this.name = "RuleTimeoutError";
    }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
    return (
        typeof value === "object" &&
        value !== null &&
        "then" in value &&
        typeof value.then === "function"
    );
}

/**
 * Convert whatever a predicate produced into a RuleOutcome.
 */
export function normalizeVerdict(verdict: unknown): RuleOutcome {
    if (verdict === true) {
        return pass();
    }
    if (verdict === false) {
        return fail("Predicate returned false");
    }
    if (isRuleOutcome(verdict)) {
        switch (verdict.status) {
            case "pass":
                return pass();
            case "fail":
                return fail(verdict.reason);
            case "error":
                return ruleError(verdict.cause, verdict.timedOut === true);
        }
    }
    return ruleError(`Rule returned an invalid verdict: ${typeof verdict}`);
}

/**
 * Evaluate one rule against one value, contained.
 *
 * @param rule - The rule
 * @param value - Field value
 * @param record - Full record (frozen)
 * @param target - Field/record coordinates and memo scope
 * @param timeoutMs - Timeout for asynchronous predicates
 * @param runSignal - Run-level cancellation signal
 */
export async function evaluateRule(
    rule: Rule,
    value: unknown,
    record: DataRecord,
    target: EvaluationTarget,
    timeoutMs: number,
    runSignal?: AbortSignal
): Promise<RuleOutcome> {
    const controller = new AbortController();
    const onRunAbort = () => controller.abort(runSignal?.reason);
    runSignal?.addEventListener("abort", onRunAbort, { once: true });

    const context: RuleContext = {
        field      : target.field,
        propertyUri: target.propertyUri,
        recordIndex: target.recordIndex,
        signal     : controller.signal,
        memo       : <T>(key: MemoKey<T>, compute: () => T): T => key.resolve(target.scope, compute),
    };

    let timer: NodeJS.Timeout | undefined;

    try {
        const verdict: RuleVerdict | Promise<RuleVerdict> = rule.evaluate(value, record, context);

        if (!isPromiseLike(verdict)) {
            return normalizeVerdict(verdict);
        }

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new RuleTimeoutError(timeoutMs);
                controller.abort(error);
                reject(error);
            }, timeoutMs);
        });

        return normalizeVerdict(await Promise.race([verdict, timeout]));
    }
    catch (error) {
        if (error instanceof RuleTimeoutError) {
            return ruleError(error.message, true);
        }
        return ruleError(describeError(error));
    }
    finally {
        if (timer !== undefined) {
            clearTimeout(timer);
        }
        runSignal?.removeEventListener("abort", onRunAbort);
    }
}
