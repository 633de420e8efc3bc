/**
 * @fileoverview Unit tests for similarity primitives
 *
 * @module @ontocheck/engine/__tests__/similarity
 */

import { describe, it, expect } from "vitest";
import {
    categoricalOverlap,
    cosineSimilarity,
    levenshtein,
    levenshteinRatio,
    nameSimilarity,
    normalizeName,
    numericProximity,
    tokenJaccard,
    tokenize,
    typeCompatibility,
    uriFragment,
} from "../mapping/similarity.js";

describe("normalizeName", () => {
    it("should split camelCase, acronyms and separators", () => {
        expect(normalizeName("birthDate")).toBe("birth date");
        expect(normalizeName("BIRTH_DATE")).toBe("birth date");
        expect(normalizeName("HTTPStatus")).toBe("http status");
        expect(normalizeName("  patient-id ")).toBe("patient id");
    });

    it("should tokenize normalised names", () => {
        expect(tokenize("familyName")).toEqual(["family", "name"]);
        expect(tokenize("__")).toEqual([]);
    });
});

describe("edit distance", () => {
    it("should compute Levenshtein distance", () => {
        expect(levenshtein("kitten", "sitting")).toBe(3);
        expect(levenshtein("", "abc")).toBe(3);
        expect(levenshtein("same", "same")).toBe(0);
    });

    it("should scale the distance to a ratio", () => {
        expect(levenshteinRatio("kitten", "sitting")).toBeCloseTo(4 / 7);
        expect(levenshteinRatio("", "")).toBe(1);
    });
});

describe("tokenJaccard", () => {
    it("should compare token sets", () => {
        expect(tokenJaccard("first_name", "name first")).toBe(1);
        expect(tokenJaccard("given_name", "family_name")).toBeCloseTo(1 / 3);
    });
});

describe("nameSimilarity", () => {
    // Scenario: Different spellings of one identifier
    it("should score identical normalised names as 1", () => {
        expect(nameSimilarity("birth_date", "birthDate")).toBe(1);
        expect(nameSimilarity("Birth Date", "BIRTHDATE")).toBe(1);
    });

    it("should score unrelated names low", () => {
        expect(nameSimilarity("dob", "birthDate")).toBeLessThan(0.5);
    });
});

describe("uriFragment", () => {
    it("should take the segment after the last slash or hash", () => {
        expect(uriFragment("http://hl7.org/fhir/Patient.birthDate")).toBe("Patient.birthDate");
        expect(uriFragment("http://schema.org/Person#name")).toBe("name");
        expect(uriFragment("plain")).toBe("plain");
    });
});

describe("cosineSimilarity", () => {
    it("should be 1 for parallel and 0 for orthogonal vectors", () => {
        expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it("should clamp negative similarity and reject incomparable vectors", () => {
        expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
        expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
        expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    });
});

describe("feature comparison", () => {
    it("should average numeric closeness over shared features", () => {
        expect(numericProximity({ a: 1, b: 0 }, { a: 3, b: 0, c: 5 })).toBe(0.75);
        expect(numericProximity({ a: 1 }, { b: 1 })).toBeUndefined();
    });

    it("should count equal categorical features", () => {
        expect(categoricalOverlap({ p: "x", q: "y" }, { p: "x", q: "z" })).toBe(0.5);
        expect(categoricalOverlap({ p: "x" }, {})).toBeUndefined();
    });

    it("should grade type compatibility", () => {
        expect(typeCompatibility("date", "date")).toBe(1);
        expect(typeCompatibility("integer", "number")).toBe(0.8);
        expect(typeCompatibility("unknown", "date")).toBe(0.5);
        expect(typeCompatibility("string", "date")).toBe(0.3);
        expect(typeCompatibility("boolean", "date")).toBe(0);
    });
});
