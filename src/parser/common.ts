import type { DateValue, MatchOutcome, ParsedValue, TimeValue } from "./types";
import { buildDate, buildDateTime, buildTime, fractionToMicrosecond } from "./values";

/**
 * Raw fields read by the scanner, before the day/month ordering and the
 * fraction padding are applied.
 */
interface CommonFields {
	date: {
		year: number;
		monthDay: [first: number, second: number] | null;
	} | null;
	time: {
		hour: number;
		minute: number;
		second: number;
		fraction: string | null;
	} | null;
}

type Scan<T> = { value: T; end: number } | null;

const DATE_SEPARATORS = "/:";
const FRACTION_SEPARATORS = ".,";

function isDigit(char: string | undefined): boolean {
	return char !== undefined && char >= "0" && char <= "9";
}

/** Read between `min` and `max` digits at `pos`, greedily. */
function digits(text: string, pos: number, min: number, max: number): Scan<string> {
	let end = pos;
	while (end - pos < max && isDigit(text[end])) end++;
	if (end - pos < min) return null;
	return { value: text.slice(pos, end), end };
}

function optionalChar(text: string, pos: number, allowed: string): number {
	const char = text[pos];
	return char !== undefined && allowed.includes(char) ? pos + 1 : pos;
}

function scanMonthDay(text: string, pos: number): Scan<[number, number]> {
	const first = digits(text, optionalChar(text, pos, DATE_SEPARATORS), 2, 2);
	if (!first) return null;
	const second = digits(text, optionalChar(text, first.end, DATE_SEPARATORS), 2, 2);
	if (!second) return null;
	return {
		value: [Number.parseInt(first.value, 10), Number.parseInt(second.value, 10)],
		end: second.end,
	};
}

function scanTime(text: string, pos: number): Scan<NonNullable<CommonFields["time"]>> {
	const start = text[pos] === " " ? pos + 1 : pos;
	const hour = digits(text, start, 1, 2);
	if (!hour || text[hour.end] !== ":") return null;

	let cursor = hour.end + 1;
	const minute = digits(text, cursor, 1, 2);
	if (minute) cursor = minute.end;

	let second: Scan<string> = null;
	if (text[cursor] === ":") {
		second = digits(text, cursor + 1, 1, 2);
		cursor = second ? second.end : cursor + 1;
	}

	// A fraction only ever qualifies the second.
	let fraction: Scan<string> = null;
	if (second && FRACTION_SEPARATORS.includes(text[cursor] ?? "")) {
		fraction = digits(text, cursor + 1, 1, 9);
		if (!fraction) return null;
		cursor = fraction.end;
	}

	return {
		value: {
			hour: Number.parseInt(hour.value, 10),
			minute: minute ? Number.parseInt(minute.value, 10) : 0,
			second: second ? Number.parseInt(second.value, 10) : 0,
			fraction: fraction ? fraction.value : null,
		},
		end: cursor,
	};
}

/**
 * Scan the whole text as `[date][ ][time]`. Date readings are tried from the
 * longest (year plus month/day) to none at all, and the first reading whose
 * remainder is an optional time running to the end of the text wins.
 */
export function scanCommon(text: string): CommonFields | null {
	const readings: Array<{ value: CommonFields["date"]; end: number }> = [];
	const year = digits(text, 0, 4, 4);
	if (year) {
		const yearValue = Number.parseInt(year.value, 10);
		const monthDay = scanMonthDay(text, year.end);
		if (monthDay) {
			readings.push({ value: { year: yearValue, monthDay: monthDay.value }, end: monthDay.end });
		}
		readings.push({ value: { year: yearValue, monthDay: null }, end: year.end });
	}
	readings.push({ value: null, end: 0 });

	for (const reading of readings) {
		if (reading.end === text.length) {
			return reading.value ? { date: reading.value, time: null } : null;
		}
		const time = scanTime(text, reading.end);
		if (time && time.end === text.length) {
			return { date: reading.value, time: time.value };
		}
	}
	return null;
}

function interpretDate(
	date: NonNullable<CommonFields["date"]>,
	dayFirst: boolean,
): MatchOutcome<DateValue> {
	if (!date.monthDay) return buildDate(date.year, 1, 1);
	const [first, second] = date.monthDay;
	return dayFirst ? buildDate(date.year, second, first) : buildDate(date.year, first, second);
}

function interpretTime(time: NonNullable<CommonFields["time"]>): MatchOutcome<TimeValue> {
	const microsecond = time.fraction === null ? 0 : fractionToMicrosecond(time.fraction);
	return buildTime(time.hour, time.minute, time.second, microsecond);
}

/**
 * Recognize the loosely delimited `YYYY[/:]MM[/:]DD HH:mm:ss.f` format. Every
 * part is optional but at least a year or a time must be present.
 */
export function matchCommon(text: string, dayFirst: boolean): MatchOutcome<ParsedValue> {
	const fields = scanCommon(text);
	if (!fields) return { status: "no-match" };

	const date = fields.date ? interpretDate(fields.date, dayFirst) : null;
	const time = fields.time ? interpretTime(fields.time) : null;
	if (date?.status === "invalid") return date;
	if (time?.status === "invalid") return time;

	if (date?.status === "matched" && time?.status === "matched") {
		return buildDateTime(date.value, time.value);
	}
	if (date?.status === "matched") return date;
	if (time?.status === "matched") return time;
	return { status: "no-match" };
}
