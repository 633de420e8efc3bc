/**
 * Example Code Rules
 * ==================
 *
 * Rules written in TypeScript, for checks the declarative YAML forms cannot
 * express. Use this file as a template for your own rule packs.
 *
 * To add your own rules:
 * 1. Copy this file and rename it (e.g., my-rules.ts)
 * 2. Export one `Rule` object per check (named exports, a default export,
 *    or a default-exported array)
 * 3. Rebuild; compiled rule files in this directory load automatically
 *
 * Predicates may return a boolean, or `fail(reason)` to fill the
 * {{reason}} placeholder of the message.
 *
 * @example
 * Reject placeholder postal codes:
 * ```typescript
 * export const realPostalCode: Rule = {
 *     id         : "postal-code-not-placeholder",
 *     propertyUri: "http://hl7.org/fhir/Address.postalCode",
 *     severity   : "warning",
 *     message    : "{{field}} looks like a placeholder: '{{value}}'",
 *     evaluate   : (value) => value !== "00000",
 * };
 * ```
 */

import {
    fail,
    isAbsent,
    MemoKey,
    parseCalendarDate,
    pass,
    type CalendarDate,
    type Rule,
} from "@ontocheck/engine";

const BIRTH_DATE = "http://hl7.org/fhir/Patient.birthDate";
const FAMILY_NAME = "http://hl7.org/fhir/HumanName.family";

/**
 * Parsed birth date, shared by every rule that inspects the same record.
 */
export const PARSED_BIRTH_DATE = new MemoKey<CalendarDate | null>("parsed-birth-date");

function parseBirthDate(value: unknown): CalendarDate | null {
    if (typeof value !== "string") {
        return null;
    }
    const parsed = parseCalendarDate(value, "YYYY-MM-DD");
    return parsed.ok ? parsed.date : null;
}

function compareDates(a: CalendarDate, b: CalendarDate): number {
    return (a.year - b.year) || (a.month - b.month) || (a.day - b.day);
}

/**
 * Birth dates may not lie in the future.
 */
export const birthDateNotInFuture: Rule = {
    id         : "birth-date-not-in-future",
    propertyUri: BIRTH_DATE,
    severity   : "error",
    message    : "{{field}} is in the future: {{value}}",
    description: "Birth date must not be later than today",

    evaluate(value, _record, context) {
        const date = context.memo(PARSED_BIRTH_DATE, () => parseBirthDate(value));
        // Unparseable dates are the date-format rule's concern
        if (date === null) {
            return pass();
        }

        const now = new Date();
        const today = { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
        return compareDates(date, today) <= 0 ? pass() : fail("later than today");
    },
};

/**
 * Birth dates before 1900 are almost always data entry errors.
 */
export const birthDatePlausible: Rule = {
    id         : "birth-date-plausible",
    propertyUri: BIRTH_DATE,
    severity   : "warning",
    message    : "{{field}} is implausibly old: {{value}}",

    evaluate(value, _record, context) {
        const date = context.memo(PARSED_BIRTH_DATE, () => parseBirthDate(value));
        return date === null || date.year >= 1900;
    },
};

/**
 * Family names start with a capital letter.
 */
export const familyNameCapitalized: Rule = {
    id         : "family-name-capitalized",
    propertyUri: FAMILY_NAME,
    severity   : "info",
    message    : "{{field}} should start with a capital letter: '{{value}}'",

    evaluate(value) {
        if (isAbsent(value)) {
            return true;
        }
        return typeof value === "string" && /^\p{Lu}/u.test(value.trim());
    },
};
