/**
 * @fileoverview Unit tests for the bundled example code rules
 *
 * @module __tests__/exampleRules
 */

import { describe, it, expect } from "vitest";
import { fail, isRule, MemoKey, pass, type RuleContext } from "@ontocheck/engine";
import {
    birthDateNotInFuture,
    birthDatePlausible,
    familyNameCapitalized,
} from "../../user/rules/example-rules.js";

/**
 * Create a rule context with its own memo scope, like one record gets.
 */
function createContext(field = "dob"): RuleContext {
    const scope = {};
    return {
        field,
        propertyUri: "http://hl7.org/fhir/Patient.birthDate",
        recordIndex: 0,
        signal     : new AbortController().signal,
        memo<T>(key: MemoKey<T>, compute: () => T): T {
            return key.resolve(scope, compute);
        },
    };
}

describe("example rules", () => {
    // Scenario: Exports are loadable rules
    it("should export valid rules", () => {
        expect(isRule(birthDateNotInFuture)).toBe(true);
        expect(isRule(birthDatePlausible)).toBe(true);
        expect(isRule(familyNameCapitalized)).toBe(true);
    });

    describe("birthDateNotInFuture", () => {
        // Scenario: Past, future and unparseable dates
        it("should fail only dates after today", async () => {
            expect(await birthDateNotInFuture.evaluate("1985-02-13", {}, createContext())).toEqual(pass());
            expect(await birthDateNotInFuture.evaluate("2999-01-01", {}, createContext()))
                .toEqual(fail("later than today"));
            expect(await birthDateNotInFuture.evaluate("02/31/1985", {}, createContext())).toEqual(pass());
        });
    });

    describe("birthDatePlausible", () => {
        // Scenario: Nineteenth-century birth date
        it("should flag birth dates before 1900", async () => {
            expect(await birthDatePlausible.evaluate("1850-06-01", {}, createContext())).toBe(false);
            expect(await birthDatePlausible.evaluate("1900-01-01", {}, createContext())).toBe(true);
        });

        // Scenario: Both birth date rules run on one record
        it("should reuse the date parsed by an earlier rule on the same record", async () => {
            const context = createContext();

            await birthDateNotInFuture.evaluate("1850-06-01", {}, context);

            // The memoized 1850 date is used, not the value passed here
            expect(await birthDatePlausible.evaluate("1990-01-01", {}, context)).toBe(false);
        });
    });

    describe("familyNameCapitalized", () => {
        // Scenario: Capitalization of family names
        it("should require a leading capital letter", async () => {
            const context = createContext("last_name");

            expect(await familyNameCapitalized.evaluate("Okafor", {}, context)).toBe(true);
            expect(await familyNameCapitalized.evaluate("Émile", {}, context)).toBe(true);
            expect(await familyNameCapitalized.evaluate("garcia", {}, context)).toBe(false);
            expect(await familyNameCapitalized.evaluate("", {}, context)).toBe(true);
            expect(await familyNameCapitalized.evaluate(42, {}, context)).toBe(false);
        });
    });
});
