/**
 * @fileoverview Built-in rule factories
 *
 * Common data-quality checks as ready-made Rule values. Apart from
 * requiredRule, every check passes on absent values (undefined, null or an
 * empty string); presence is the required rule's concern.
 *
 * @module @ontocheck/engine/rules/builtins
 */

import type { PrimitiveType } from "../contracts/Column.js";
import type { Rule, RuleOutcome, RuleSeverity } from "../contracts/Rule.js";
import { fail, pass } from "../contracts/Rule.js";
import { formatValue } from "../execution/messageTemplate.js";

/**
 * Fields every built-in rule accepts.
 */
export interface RuleDefinitionBase {
    readonly id: string;
    readonly propertyUri: string;
    readonly severity?: RuleSeverity;
    readonly message?: string;
    readonly description?: string;
    readonly timeoutMs?: number;
}

/**
 * Inclusive numeric bounds.
 */
export interface Bounds {
    readonly min?: number;
    readonly max?: number;
}

export function isAbsent(value: unknown): boolean {
    return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function buildRule(
    base: RuleDefinitionBase,
    defaultMessage: string,
    check: (value: unknown) => RuleOutcome
): Rule {
    return Object.freeze({
        id         : base.id,
        propertyUri: base.propertyUri,
        severity   : base.severity ?? "error",
        message    : base.message ?? defaultMessage,
        ...(base.description !== undefined && { description: base.description }),
        ...(base.timeoutMs !== undefined && { timeoutMs: base.timeoutMs }),
        evaluate   : (value: unknown) => check(value),
    });
}

/**
 * Value must be present and non-blank.
 */
export function requiredRule(base: RuleDefinitionBase): Rule {
    return buildRule(base, "{{field}} is required", value =>
        isAbsent(value) ? fail("value is missing") : pass()
    );
}

/**
 * String form of the value must match a regular expression.
 */
export function patternRule(base: RuleDefinitionBase, pattern: string | RegExp): Rule {
    const regex = typeof pattern === "string" ? new RegExp(pattern) : pattern;

    return buildRule(base, "{{field}} value '{{value}}' does not match the expected format", value => {
        if (isAbsent(value)) {
            return pass();
        }
        // Stateful (global/sticky) regexes would carry lastIndex between records
        regex.lastIndex = 0;
        return regex.test(formatValue(value)) ? pass() : fail(`does not match ${regex.source}`);
    });
}

/**
 * Value must be one of an allowed list.
 */
export function oneOfRule(
    base: RuleDefinitionBase,
    allowed: readonly (string | number | boolean)[],
    caseSensitive = true
): Rule {
    const normalize = (v: string) => (caseSensitive ? v : v.toLowerCase());
    const accepted = new Set(allowed.map(v => normalize(String(v))));

    return buildRule(base, "{{field}} value '{{value}}' is not an allowed value", value => {
        if (isAbsent(value)) {
            return pass();
        }
        return accepted.has(normalize(formatValue(value)))
            ? pass()
            : fail(`expected one of: ${allowed.join(", ")}`);
    });
}

/**
 * Parse a number from a number or numeric string.
 */
export function toNumber(value: unknown): number | null {
    if (typeof value === "number") {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Numeric value within inclusive bounds.
 */
export function rangeRule(base: RuleDefinitionBase, bounds: Bounds): Rule {
    return buildRule(base, "{{field}} value '{{value}}' is out of range ({{reason}})", value => {
        if (isAbsent(value)) {
            return pass();
        }
        const number = toNumber(value);
        if (number === null) {
            return fail("not a number");
        }
        if (bounds.min !== undefined && number < bounds.min) {
            return fail(`below minimum ${bounds.min}`);
        }
        if (bounds.max !== undefined && number > bounds.max) {
            return fail(`above maximum ${bounds.max}`);
        }
        return pass();
    });
}

/**
 * String length within inclusive bounds.
 */
export function lengthRule(base: RuleDefinitionBase, bounds: Bounds): Rule {
    return buildRule(base, "{{field}} has an invalid length ({{reason}})", value => {
        if (isAbsent(value)) {
            return pass();
        }
        const length = formatValue(value).length;
        if (bounds.min !== undefined && length < bounds.min) {
            return fail(`shorter than ${bounds.min}`);
        }
        if (bounds.max !== undefined && length > bounds.max) {
            return fail(`longer than ${bounds.max}`);
        }
        return pass();
    });
}

/**
 * Calendar date parsed from text.
 */
export interface CalendarDate {
    readonly year: number;
    readonly month: number;
    readonly day: number;
}

export function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        return isLeapYear(year) ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse a date against a format built from YYYY, MM and DD tokens; any
 * other character must appear literally.
 *
 * @returns The date, or a reason the text is not a valid calendar date
 *
 * @example
 * ```typescript
 * parseCalendarDate("02/31/1985", "MM/DD/YYYY");
 * // { ok: false, reason: "day 31 does not exist in 1985-02" }
 * ```
 */
export function parseCalendarDate(
    text: string,
    format: string
): { ok: true; date: CalendarDate } | { ok: false; reason: string } {
    const order: Array<"YYYY" | "MM" | "DD"> = [];
    const source = format.replace(/YYYY|MM|DD|[.*+?^${}()|[\]\\]/g, token => {
        if (token === "YYYY" || token === "MM" || token === "DD") {
            order.push(token);
            return token === "YYYY" ? "(\\d{4})" : "(\\d{2})";
        }
        return `\\${token}`;
    });

    const match = new RegExp(`^${source}$`).exec(text.trim());
    if (!match) {
        return { ok: false, reason: `does not match format ${format}` };
    }

    const parts = { YYYY: 0, MM: 1, DD: 1 };
    order.forEach((token, i) => {
        parts[token] = Number(match[i + 1]);
    });

    const year = parts.YYYY;
    const month = parts.MM;
    const day = parts.DD;
    const pad = (n: number) => String(n).padStart(2, "0");

    if (month < 1 || month > 12) {
        return { ok: false, reason: `month ${month} does not exist` };
    }
    if (day < 1 || day > daysInMonth(year, month)) {
        return { ok: false, reason: `day ${day} does not exist in ${year}-${pad(month)}` };
    }

    return { ok: true, date: { year, month, day } };
}

/**
 * Value must be a real calendar date in the given format.
 *
 * @param format - Format made of YYYY, MM, DD and literal characters (default "YYYY-MM-DD")
 */
export function dateRule(base: RuleDefinitionBase, format = "YYYY-MM-DD"): Rule {
    return buildRule(base, "{{field}} value '{{value}}' is not a valid calendar date: {{reason}}", value => {
        if (isAbsent(value)) {
            return pass();
        }
        if (typeof value !== "string") {
            return fail("not a string");
        }
        const parsed = parseCalendarDate(value, format);
        return parsed.ok ? pass() : fail(parsed.reason);
    });
}

/**
 * Whether a value conforms to a primitive type. Numeric, boolean and date
 * types also accept their canonical string forms.
 */
export function conformsToType(value: unknown, type: PrimitiveType): boolean {
    switch (type) {
        case "string":
            return typeof value === "string";
        case "integer":
            return typeof value === "number"
                ? Number.isInteger(value)
                : typeof value === "string" && /^-?\d+$/.test(value.trim());
        case "number":
            return toNumber(value) !== null;
        case "boolean":
            return typeof value === "boolean" || value === "true" || value === "false";
        case "date":
            return typeof value === "string" && parseCalendarDate(value, "YYYY-MM-DD").ok;
        case "datetime":
            return typeof value === "string" && value.includes("T") && !Number.isNaN(Date.parse(value));
        case "unknown":
            return true;
    }
}

/**
 * Value must conform to a primitive type.
 */
export function typeRule(base: RuleDefinitionBase, type: PrimitiveType): Rule {
    return buildRule(base, "{{field}} value '{{value}}' is not of type " + type, value => {
        if (isAbsent(value)) {
            return pass();
        }
        return conformsToType(value, type) ? pass() : fail(`expected ${type}`);
    });
}
