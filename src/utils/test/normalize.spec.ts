// src/utils/test/normalize.spec.ts
import { floatOrNull, intOrNull, normalizeNameToken, strOrNull, teamNamesMatch, truthy } from "../normalize";
import { parseUtc } from "../date";

describe("normalize helpers", () => {
    test("name token keeps only a-z and digits", () => {
        expect(normalizeNameToken("Sea Eagles!")).toBe("seaeagles");
        expect(normalizeNameToken("St. George-Illawarra 2")).toBe("stgeorgeillawarra2");
    });

    test("team names match by containment either way", () => {
        expect(teamNamesMatch("Manly Warringah Sea Eagles", "Sea Eagles")).toBe(true);
        expect(teamNamesMatch("Storm", "Melbourne Storm")).toBe(true);
        expect(teamNamesMatch("Storm", "Broncos")).toBe(false);
        expect(teamNamesMatch("", "Broncos")).toBe(false);
    });

    test("scalar coercions", () => {
        expect(strOrNull("  x ")).toBe("x");
        expect(strOrNull("   ")).toBeNull();
        expect(strOrNull(7)).toBe("7");
        expect(intOrNull("12")).toBe(12);
        expect(intOrNull(1.5)).toBeNull();
        expect(floatOrNull("1.85")).toBe(1.85);
        expect(floatOrNull("")).toBeNull();
        expect(truthy("Yes")).toBe(true);
        expect(truthy(0)).toBe(false);
    });

    test("timestamps without a zone are UTC", () => {
        expect(parseUtc("2026-03-05 19:30:00")?.toISOString()).toBe("2026-03-05T19:30:00.000Z");
        expect(parseUtc("2026-03-05T19:30:00+10:00")?.toISOString()).toBe("2026-03-05T09:30:00.000Z");
        expect(parseUtc("garbage")).toBeNull();
    });
});
