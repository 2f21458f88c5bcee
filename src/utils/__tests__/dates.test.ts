import { parseDate, parseDurationSeconds } from "../dates";
import { parseEnvInt, parseEnvString } from "../envParsers";

describe("parseDate", () => {
    it("parses timestamps with a compact UTC offset", () => {
        expect(parseDate("2017-07-21T00:00:00.000+0000")?.toISOString()).toBe(
            "2017-07-21T00:00:00.000Z",
        );
    });

    it("parses timestamps with a colon offset", () => {
        expect(parseDate("2020-01-02T03:04:05+01:00")?.toISOString()).toBe(
            "2020-01-02T02:04:05.000Z",
        );
    });

    it("returns null for missing, empty and invalid values", () => {
        expect(parseDate(undefined)).toBeNull();
        expect(parseDate(null)).toBeNull();
        expect(parseDate("")).toBeNull();
        expect(parseDate("not a date")).toBeNull();
        expect(parseDate(1500000000)).toBeNull();
    });
});

describe("parseDurationSeconds", () => {
    it.each([
        ["PT0M13.5S", 13.5],
        ["PT3M30S", 210],
        ["PT1H0M0.000S", 3600],
        ["P1DT1S", 86401],
        ["PT4.011S", 4.011],
    ])("parses %s", (value, expected) => {
        expect(parseDurationSeconds(value)).toBeCloseTo(expected, 6);
    });

    it("returns 0 for missing or malformed durations", () => {
        expect(parseDurationSeconds(undefined)).toBe(0);
        expect(parseDurationSeconds("13.5")).toBe(0);
        expect(parseDurationSeconds("PTxS")).toBe(0);
    });
});

describe("env parsers", () => {
    it("parses integers with a fallback for empty values", () => {
        expect(parseEnvInt("250", 1000)).toBe(250);
        expect(parseEnvInt(" 42 ", 1000)).toBe(42);
        expect(parseEnvInt("", 1000)).toBe(1000);
        expect(parseEnvInt(undefined, 1000)).toBe(1000);
    });

    it("trims strings and drops blank ones", () => {
        expect(parseEnvString(" test-client-id ")).toBe("test-client-id");
        expect(parseEnvString("")).toBeUndefined();
        expect(parseEnvString(undefined)).toBeUndefined();
    });
});
