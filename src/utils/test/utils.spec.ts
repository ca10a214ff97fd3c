// src/utils/test/utils.spec.ts
import { charLength, digitRuns, isNumericToken, normalizeName, wordSet } from "../normalize";
import { parseBounded, parseNumber } from "../validators";
import { qid, tableList } from "../../data/sql";

describe("normalize", () => {
    test("normalizeName lowercases, splits underscores and collapses whitespace", () => {
        expect(normalizeName("  Med__99\t Tabs ")).toBe("med 99 tabs");
        expect(normalizeName("___")).toBe("");
    });

    test("wordSet, numeric tokens and digit runs", () => {
        expect([...wordSet("med 99 med")]).toEqual(["med", "99"]);
        expect(isNumericToken("500")).toBe(true);
        expect(isNumericToken("500mg")).toBe(false);
        expect(digitRuns("med 5 x500mg 5")).toEqual(["5", "500", "5"]);
        expect(digitRuns("none")).toEqual([]);
    });

    test("charLength counts code points", () => {
        expect(charLength("💊x")).toBe(2);
    });
});

describe("validators", () => {
    test("parseNumber ignores blanks and junk", () => {
        expect(parseNumber("3")).toBe(3);
        expect(parseNumber("")).toBeUndefined();
        expect(parseNumber("abc")).toBeUndefined();
        expect(parseNumber(undefined)).toBeUndefined();
    });

    test("parseBounded clamps", () => {
        expect(parseBounded("500", 1, 50)).toBe(50);
        expect(parseBounded("-1", 0, 1)).toBe(0);
        expect(parseBounded("0.4", 0, 1)).toBe(0.4);
        expect(parseBounded(undefined, 0, 1)).toBeUndefined();
    });
});

describe("sql identifiers", () => {
    test("quotes safe identifiers and rejects the rest", () => {
        expect(tableList(["order_items", "orders"])).toBe("`order_items`, `orders`");
        expect(() => qid("orders; DROP TABLE users")).toThrow("Invalid identifier");
    });
});
