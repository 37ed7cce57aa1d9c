import type { DateTimeValue, DateValue, MatchOutcome, TimeValue } from "./types";

const MIN_YEAR = 1;
const MAX_YEAR = 9999;
const MAX_OFFSET_MINUTES = 24 * 60;
const MS_PER_DAY = 86_400_000;

type Built<T> = Exclude<MatchOutcome<T>, { status: "no-match" }>;

function invalid(message: string): { status: "invalid"; message: string } {
	return { status: "invalid", message };
}

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
	if (month === 2) return isLeapYear(year) ? 29 : 28;
	return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Convert a fractional-second digit string to microseconds: digits past the
 * sixth are dropped, shorter strings are right-padded with zeros.
 */
export function fractionToMicrosecond(digits: string): number {
	return Number.parseInt(digits.slice(0, 6).padEnd(6, "0"), 10);
}

function checkDate(year: number, month: number, day: number): string | null {
	if (year < MIN_YEAR || year > MAX_YEAR) return `year ${year} is out of range`;
	if (month < 1 || month > 12) return "month must be in 1..12";
	const last = daysInMonth(year, month);
	if (day < 1 || day > last) return `day is out of range for month (1..${last})`;
	return null;
}

function checkTime(
	hour: number,
	minute: number,
	second: number,
	microsecond: number,
	offset: number | null,
): string | null {
	if (hour > 23) return "hour must be in 0..23";
	if (minute > 59) return "minute must be in 0..59";
	if (second > 59) return "second must be in 0..59";
	if (microsecond < 0 || microsecond > 999_999) return "microsecond must be in 0..999999";
	if (offset !== null && Math.abs(offset) >= MAX_OFFSET_MINUTES) {
		return "offset must be strictly between -24:00 and +24:00";
	}
	return null;
}

export function buildDate(year: number, month: number, day: number): Built<DateValue> {
	const problem = checkDate(year, month, day);
	if (problem) return invalid(problem);
	return { status: "matched", value: { kind: "date", year, month, day } };
}

export function buildTime(
	hour: number,
	minute: number,
	second: number,
	microsecond: number,
	offset: number | null = null,
): Built<TimeValue> {
	const problem = checkTime(hour, minute, second, microsecond, offset);
	if (problem) return invalid(problem);
	return {
		status: "matched",
		value: { kind: "time", hour, minute, second, microsecond, offset },
	};
}

export function buildDateTime(
	date: DateValue,
	time: Omit<TimeValue, "kind">,
): Built<DateTimeValue> {
	const dateProblem = checkDate(date.year, date.month, date.day);
	if (dateProblem) return invalid(dateProblem);
	const { hour, minute, second, microsecond, offset } = time;
	const timeProblem = checkTime(hour, minute, second, microsecond, offset);
	if (timeProblem) return invalid(timeProblem);
	return {
		status: "matched",
		value: {
			kind: "datetime",
			year: date.year,
			month: date.month,
			day: date.day,
			hour,
			minute,
			second,
			microsecond,
			offset,
		},
	};
}

// Date.UTC maps years 0..99 onto 1900..1999, so set the full year explicitly.
function utcMidnight(year: number, monthIndex: number, day: number): number {
	const date = new Date(0);
	date.setUTCFullYear(year, monthIndex, day);
	return date.getTime();
}

function fromUtcMillis(millis: number): Built<DateValue> {
	const date = new Date(millis);
	return buildDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/** Calendar date for the given day of the year (1-based). */
export function buildOrdinalDate(year: number, ordinal: number): Built<DateValue> {
	if (year < MIN_YEAR || year > MAX_YEAR) return invalid(`year ${year} is out of range`);
	const length = isLeapYear(year) ? 366 : 365;
	if (ordinal < 1 || ordinal > length) return invalid(`ordinal day must be in 1..${length}`);
	return fromUtcMillis(utcMidnight(year, 0, ordinal));
}

/** ISO weekday of the given date, Monday = 1 .. Sunday = 7. */
function isoWeekday(year: number, monthIndex: number, day: number): number {
	const weekday = new Date(utcMidnight(year, monthIndex, day)).getUTCDay();
	return weekday === 0 ? 7 : weekday;
}

export function weeksInIsoYear(year: number): number {
	const jan1 = isoWeekday(year, 0, 1);
	return jan1 === 4 || (jan1 === 3 && isLeapYear(year)) ? 53 : 52;
}

/**
 * Calendar date for an ISO week date. Week 1 is the week containing January
 * 4th, so the result can fall in the neighbouring calendar year.
 */
export function buildWeekDate(year: number, week: number, weekday: number): Built<DateValue> {
	if (year < MIN_YEAR || year > MAX_YEAR) return invalid(`year ${year} is out of range`);
	const weeks = weeksInIsoYear(year);
	if (week < 1 || week > weeks) return invalid(`week must be in 1..${weeks}`);
	if (weekday < 1 || weekday > 7) return invalid("weekday must be in 1..7");
	const firstMonday = utcMidnight(year, 0, 4) - (isoWeekday(year, 0, 4) - 1) * MS_PER_DAY;
	return fromUtcMillis(firstMonday + ((week - 1) * 7 + (weekday - 1)) * MS_PER_DAY);
}
