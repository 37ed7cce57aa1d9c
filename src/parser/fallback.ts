import * as chrono from "chrono-node";
import type { DateTimeValue, FallbackHints, FallbackParser } from "./types";
import { buildDate, buildDateTime } from "./values";

const TWO_DIGIT_TRIPLE = /^(\d{2})([-/.])(\d{2})\2(\d{2})$/;

/** Place a two-digit year within 50 years of the reference year. */
function expandYear(twoDigits: number, referenceYear: number): number {
	let year = Math.floor(referenceYear / 100) * 100 + twoDigits;
	if (year >= referenceYear + 50) year -= 100;
	else if (year < referenceYear - 50) year += 100;
	return year;
}

function midnight(year: number, month: number, day: number): DateTimeValue | null {
	const date = buildDate(year, month, day);
	if (date.status !== "matched") return null;
	const built = buildDateTime(date.value, {
		hour: 0,
		minute: 0,
		second: 0,
		microsecond: 0,
		offset: null,
	});
	return built.status === "matched" ? built.value : null;
}

/**
 * "10-09-03" style dates with the year leading. chrono reads three short
 * numeric groups month or day first, so year-first is settled here.
 */
function parseYearFirst(text: string, hints: FallbackHints): DateTimeValue | null | undefined {
	const match = text.match(TWO_DIGIT_TRIPLE);
	if (!match) return undefined;
	const year = expandYear(Number.parseInt(match[1], 10), hints.now.getFullYear());
	const second = Number.parseInt(match[3], 10);
	const third = Number.parseInt(match[4], 10);
	return hints.dayFirst ? midnight(year, third, second) : midnight(year, second, third);
}

type TimeComponent = "hour" | "minute" | "second" | "millisecond";

function certain(components: chrono.ParsedResult["start"], name: TimeComponent): number {
	return components.isCertain(name) ? (components.get(name) ?? 0) : 0;
}

function fromChrono(text: string, hints: FallbackHints): DateTimeValue | null {
	const parser = hints.dayFirst ? chrono.en.GB : chrono.casual;
	const [first] = parser.parse(text, hints.now, { forwardDate: false });
	if (!first || first.index !== 0 || first.text.length !== text.length) return null;

	const { start } = first;
	const year = start.get("year");
	const month = start.get("month");
	const day = start.get("day");
	if (year === null || month === null || day === null) return null;

	const date = buildDate(year, month, day);
	if (date.status !== "matched") return null;
	const built = buildDateTime(date.value, {
		hour: certain(start, "hour"),
		minute: certain(start, "minute"),
		second: certain(start, "second"),
		microsecond: certain(start, "millisecond") * 1000,
		offset: start.isCertain("timezoneOffset") ? start.get("timezoneOffset") : null,
	});
	return built.status === "matched" ? built.value : null;
}

/**
 * Natural-language fallback backed by chrono-node. The whole input must be
 * consumed by chrono's first result; anything partial is a failure.
 */
export const chronoFallback: FallbackParser = {
	parse(text, hints) {
		const trimmed = text.trim();
		if (!trimmed) return null;
		if (hints.yearFirst) {
			const yearFirst = parseYearFirst(trimmed, hints);
			if (yearFirst !== undefined) return yearFirst;
		}
		return fromChrono(trimmed, hints);
	},
};
