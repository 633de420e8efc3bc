/**
 * Rule Contract
 *
 * A validation rule is a plain function value attached to one ontology
 * property. The executor wraps every evaluation with a timeout and exception
 * containment, so a predicate only has to answer "does this value pass".
 *
 * Design principles:
 * - Pure: the outcome depends only on (value, record)
 * - Isolated: a throwing rule affects only its own outcome
 * - No retries: an `error` outcome is terminal for that (record, rule) pair
 */

/**
 * A single input record: column name → raw value.
 */
export type DataRecord = Readonly<Record<string, unknown>>;

/**
 * Rule severity, carried into the report for consumers.
 */
export type RuleSeverity = "error" | "warning" | "info";

/**
 * Result of evaluating one rule against one record.
 */
export type RuleOutcome =
    | { readonly status: "pass" }
    | { readonly status: "fail"; readonly reason: string }
    | { readonly status: "error"; readonly cause: string; readonly timedOut: boolean };

/**
 * Per-record context handed to predicates.
 */
export interface RuleContext {
    /** Column being validated */
    readonly field: string;

    /** Property the column is mapped to */
    readonly propertyUri: string;

    /** Position of the record in the input */
    readonly recordIndex: number;

    /** Aborted when the rule times out or the run is cancelled */
    readonly signal: AbortSignal;

    /**
     * Per-record cache shared by all rules evaluated on the same record.
     * `compute` runs at most once per key and record.
     */
    memo<T>(key: MemoKey<T>, compute: () => T): T;
}

/**
 * Typed key for values derived once per record and shared between rules,
 * e.g. a parsed date used by several date rules.
 *
 * @example
 * ```typescript
 * const PARSED_BIRTH_DATE = new MemoKey<Date | null>("parsed-birth-date");
 *
 * evaluate(value, record, context) {
 *     const date = context.memo(PARSED_BIRTH_DATE, () => parseDate(value));
 *     return date !== null;
 * }
 * ```
 */
export class MemoKey<T> {
    readonly name: string;
    private readonly values = new WeakMap<object, { readonly value: T }>();

    constructor(name: string) {
        this.name = name;
    }

    /**
     * Return the value cached for `scope`, computing it on first use.
     *
     * @param scope - Per-record scope object owned by the executor
     * @param compute - Producer of the value
     */
    resolve(scope: object, compute: () => T): T {
        const hit = this.values.get(scope);
        if (hit) {
            return hit.value;
        }
        const value = compute();
        this.values.set(scope, { value });
        return value;
    }
}

/**
 * What a predicate may return: a boolean, or a full outcome.
 */
export type RuleVerdict = boolean | RuleOutcome;

/**
 * Rule predicate signature.
 */
export type RulePredicate = (
    value: unknown,
    record: DataRecord,
    context: RuleContext
) => RuleVerdict | Promise<RuleVerdict>;

/**
 * Validation rule.
 *
 * @example
 * ```typescript
 * const nonEmptyFamilyName: Rule = {
 *     id         : "family-name-present",
 *     propertyUri: "http://hl7.org/fhir/HumanName.family",
 *     severity   : "error",
 *     message    : "Family name is empty: '{{value}}'",
 *     evaluate   : (value) => typeof value === "string" && value.trim().length > 0,
 * };
 * ```
 */
export interface Rule {
    /** Rule identifier */
    readonly id: string;

    /** Property this rule belongs to */
    readonly propertyUri: string;

    /** Severity reported for failures */
    readonly severity: RuleSeverity;

    /**
     * Failure message template. Placeholders: {{value}}, {{field}},
     * {{property}}, {{rule}}, {{reason}}.
     */
    readonly message: string;

    /** Optional human-readable description */
    readonly description?: string;

    /** Per-rule timeout in milliseconds; overrides the run default */
    readonly timeoutMs?: number;

    /** The predicate */
    readonly evaluate: RulePredicate;
}

const PASS: RuleOutcome = Object.freeze({ status: "pass" });

/**
 * Create a passing outcome.
 */
export function pass(): RuleOutcome {
    return PASS;
}

/**
 * Create a failing outcome.
 *
 * @param reason - Why the value failed
 */
export function fail(reason: string): RuleOutcome {
    return Object.freeze({ status: "fail", reason });
}

/**
 * Create an error outcome: the rule itself could not be evaluated.
 *
 * @param cause - Description of the fault
 * @param timedOut - Whether the fault was a timeout
 */
export function ruleError(cause: string, timedOut = false): RuleOutcome {
    return Object.freeze({ status: "error", cause, timedOut });
}

/**
 * Type guard for rule outcomes.
 */
export function isRuleOutcome(obj: unknown): obj is RuleOutcome {
    if (typeof obj !== "object" || obj === null || !("status" in obj)) {
        return false;
    }
    switch (obj.status) {
        case "pass":
            return true;
        case "fail":
            return "reason" in obj && typeof obj.reason === "string";
        case "error":
            return "cause" in obj && typeof obj.cause === "string";
        default:
            return false;
    }
}

const SEVERITIES: readonly string[] = ["error", "warning", "info"];

/**
 * Type guard for Rule objects, used when loading rule modules.
 */
export function isRule(obj: unknown): obj is Rule {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "propertyUri" in obj &&
        typeof obj.propertyUri === "string" &&
        "severity" in obj &&
        typeof obj.severity === "string" &&
        SEVERITIES.includes(obj.severity) &&
        "message" in obj &&
        typeof obj.message === "string" &&
        "evaluate" in obj &&
        typeof obj.evaluate === "function"
    );
}
