import { describe, expect, it } from "vitest";
import { matchIso8601 } from "../iso8601";

function datetime(
	year: number,
	month: number,
	day: number,
	hour: number,
	minute: number,
	second: number,
	microsecond = 0,
	offset: number | null = null,
) {
	return {
		status: "matched",
		value: { kind: "datetime", year, month, day, hour, minute, second, microsecond, offset },
	};
}

function date(year: number, month: number, day: number) {
	return { status: "matched", value: { kind: "date", year, month, day } };
}

function time(hour: number, minute: number, second: number, microsecond = 0, offset: number | null = null) {
	return { status: "matched", value: { kind: "time", hour, minute, second, microsecond, offset } };
}

describe("matchIso8601", () => {
	describe("dates", () => {
		it.each([
			["2016", date(2016, 1, 1)],
			["2016-06", date(2016, 6, 1)],
			["2016-06-05", date(2016, 6, 5)],
			["20160605", date(2016, 6, 5)],
			["2016-157", date(2016, 6, 5)],
			["2016157", date(2016, 6, 5)],
			["2016-W22", date(2016, 5, 30)],
			["2016-W22-7", date(2016, 6, 5)],
			["2016W227", date(2016, 6, 5)],
		])("reads '%s'", (text, expected) => {
			expect(matchIso8601(text)).toEqual(expected);
		});

		it("does not mix basic and extended separators", () => {
			expect(matchIso8601("2016-0605")).toEqual({ status: "no-match" });
			expect(matchIso8601("2016-W227")).toEqual({ status: "no-match" });
		});
	});

	describe("date-times", () => {
		it("reads a T-separated date-time", () => {
			expect(matchIso8601("2016-06-05T12:30:45")).toEqual(datetime(2016, 6, 5, 12, 30, 45));
		});

		it("accepts a space separator", () => {
			expect(matchIso8601("2016-06-05 12:30")).toEqual(datetime(2016, 6, 5, 12, 30, 0));
		});

		it("truncates fractional seconds to microseconds", () => {
			expect(matchIso8601("2016-06-05 12:30:45.123456789")).toEqual(
				datetime(2016, 6, 5, 12, 30, 45, 123_456),
			);
		});

		it("pads short fractions and accepts a comma", () => {
			expect(matchIso8601("2016-06-05T12:30:45,5")).toEqual(
				datetime(2016, 6, 5, 12, 30, 45, 500_000),
			);
		});

		it("reads basic format date-times", () => {
			expect(matchIso8601("20160605T123045")).toEqual(datetime(2016, 6, 5, 12, 30, 45));
		});

		it("reads a bare hour after the separator", () => {
			expect(matchIso8601("2016-06-05T12")).toEqual(datetime(2016, 6, 5, 12, 0, 0));
		});

		it.each([
			["2016-06-05T12:30:45Z", 0],
			["2016-06-05T12:30:45+02:00", 120],
			["2016-06-05T12:30:45-0530", -330],
			["2016-06-05T12:30:45+02", 120],
		])("carries the offset of '%s'", (text, offset) => {
			expect(matchIso8601(text)).toEqual(datetime(2016, 6, 5, 12, 30, 45, 0, offset));
		});

		it("accepts ordinal and week dates as the date half", () => {
			expect(matchIso8601("2016-157T08:00")).toEqual(datetime(2016, 6, 5, 8, 0, 0));
			expect(matchIso8601("2016-W22-7T08:00")).toEqual(datetime(2016, 6, 5, 8, 0, 0));
		});

		it("refuses reduced-precision dates as the date half", () => {
			expect(matchIso8601("2016-06T12:00")).toEqual({ status: "no-match" });
			expect(matchIso8601("2016T12:00")).toEqual({ status: "no-match" });
		});
	});

	describe("times", () => {
		it("reads an extended time on its own", () => {
			expect(matchIso8601("12:30")).toEqual(time(12, 30, 0));
			expect(matchIso8601("12:30:45.25")).toEqual(time(12, 30, 45, 250_000));
		});

		it("reads any time form behind a T designator", () => {
			expect(matchIso8601("T1230")).toEqual(time(12, 30, 0));
			expect(matchIso8601("T12")).toEqual(time(12, 0, 0));
		});

		it("carries an offset on a time", () => {
			expect(matchIso8601("12:30Z")).toEqual(time(12, 30, 0, 0, 0));
		});

		it("reads four bare digits as a year, not a time", () => {
			expect(matchIso8601("1230")).toEqual(date(1230, 1, 1));
		});
	});

	describe("failures", () => {
		it.each(["not a date", "", "2016/06/05", "12", "2016-06-05T", "June 5 2016", "2016-06-05T12:30:45+2"])(
			"does not recognize '%s'",
			(text) => {
				expect(matchIso8601(text)).toEqual({ status: "no-match" });
			},
		);

		it.each([
			"2016-13-01",
			"2016-02-30",
			"2016-06-05T24:00",
			"2016-06-05T12:60",
			"2016-367",
			"2016-W53",
			"2016-06-05T12:00+05:60",
			"2016-06-05T12:00-0599",
			"12:00+01:75",
		])(
			"reports '%s' as an invalid value",
			(text) => {
				expect(matchIso8601(text).status).toBe("invalid");
			},
		);

		it("does not report an invalid date when the time part is unrecognized", () => {
			expect(matchIso8601("2016-13-01Tnoon")).toEqual({ status: "no-match" });
		});
	});
});
