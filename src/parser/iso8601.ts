import type { DateValue, MatchOutcome, ParsedValue, TimeValue } from "./types";
import {
	buildDate,
	buildDateTime,
	buildOrdinalDate,
	buildTime,
	buildWeekDate,
	fractionToMicrosecond,
} from "./values";

type DateOutcome = MatchOutcome<DateValue>;
type TimeFields = Omit<TimeValue, "kind">;

const NO_MATCH = { status: "no-match" } as const;

// Complete dates: usable on their own or as the date half of a date-time.
const CALENDAR_EXTENDED = /^(\d{4})-(\d{2})-(\d{2})$/;
const CALENDAR_BASIC = /^(\d{4})(\d{2})(\d{2})$/;
const ORDINAL = /^(\d{4})-?(\d{3})$/;
const WEEK_EXTENDED = /^(\d{4})-W(\d{2})(?:-(\d))?$/;
const WEEK_BASIC = /^(\d{4})W(\d{2})(\d)?$/;

// Reduced precision: only valid as a standalone date.
const YEAR_ONLY = /^(\d{4})$/;
const YEAR_MONTH = /^(\d{4})-(\d{2})$/;

const TIME_EXTENDED = /^(\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?$/;
const TIME_BASIC = /^(\d{2})(?:(\d{2})(?:(\d{2})(?:[.,](\d+))?)?)?$/;
const OFFSET = /^(?:Z|([+-])(\d{2})(?::?(\d{2}))?)$/;

function int(group: string | undefined, fallback = 0): number {
	return group === undefined ? fallback : Number.parseInt(group, 10);
}

function matchCompleteDate(text: string): DateOutcome {
	const calendar = text.match(CALENDAR_EXTENDED) ?? text.match(CALENDAR_BASIC);
	if (calendar) return buildDate(int(calendar[1]), int(calendar[2]), int(calendar[3]));

	const ordinal = text.match(ORDINAL);
	if (ordinal) return buildOrdinalDate(int(ordinal[1]), int(ordinal[2]));

	const week = text.match(WEEK_EXTENDED) ?? text.match(WEEK_BASIC);
	if (week) return buildWeekDate(int(week[1]), int(week[2]), int(week[3], 1));

	return NO_MATCH;
}

function matchDate(text: string): DateOutcome {
	const reduced = text.match(YEAR_MONTH) ?? text.match(YEAR_ONLY);
	if (reduced) return buildDate(int(reduced[1]), int(reduced[2], 1), 1);
	return matchCompleteDate(text);
}

function parseOffset(text: string): MatchOutcome<number | null> {
	if (text === "") return { status: "matched", value: null };
	const match = text.match(OFFSET);
	if (!match) return NO_MATCH;
	if (!match[1]) return { status: "matched", value: 0 };
	const offsetMinutes = int(match[3]);
	if (offsetMinutes > 59) return { status: "invalid", message: "offset minutes must be in 0..59" };
	const minutes = int(match[2]) * 60 + offsetMinutes;
	return { status: "matched", value: match[1] === "-" ? -minutes : minutes };
}

/**
 * Match a time of day with an optional UTC offset. When `extendedOnly` is set
 * the basic (colon-less) forms and the bare hour are refused, which keeps
 * "1230" readable as a year.
 */
function matchTime(text: string, extendedOnly: boolean): MatchOutcome<TimeFields> {
	const designator = text.search(/[Z+-]/);
	const body = designator === -1 ? text : text.slice(0, designator);
	const offset = parseOffset(designator === -1 ? "" : text.slice(designator));
	if (offset.status === "no-match") return NO_MATCH;

	const match = extendedOnly
		? body.match(TIME_EXTENDED)
		: (body.match(TIME_EXTENDED) ?? body.match(TIME_BASIC));
	if (!match) return NO_MATCH;
	if (extendedOnly && match[2] === undefined) return NO_MATCH;
	if (offset.status === "invalid") return offset;

	const microsecond = match[4] === undefined ? 0 : fractionToMicrosecond(match[4]);
	const built = buildTime(int(match[1]), int(match[2]), int(match[3]), microsecond, offset.value);
	if (built.status !== "matched") return built;
	const { kind: _kind, ...fields } = built.value;
	return { status: "matched", value: fields };
}

function toTimeValue(outcome: MatchOutcome<TimeFields>): MatchOutcome {
	if (outcome.status !== "matched") return outcome;
	return { status: "matched", value: { kind: "time", ...outcome.value } };
}

/**
 * Recognize an ISO 8601 date, time or date-time.
 *
 * Reduced-precision dates (`2016`, `2016-06`) are accepted on their own but
 * not as the date half of a date-time. Only fractional seconds are accepted.
 */
export function matchIso8601(text: string): MatchOutcome<ParsedValue> {
	if (text.startsWith("T")) return toTimeValue(matchTime(text.slice(1), false));

	const separator = text.search(/[T ]/);
	if (separator === -1) {
		const date = matchDate(text);
		if (date.status !== "no-match") return date;
		return toTimeValue(matchTime(text, true));
	}

	const date = matchCompleteDate(text.slice(0, separator));
	if (date.status === "no-match") return NO_MATCH;
	const time = matchTime(text.slice(separator + 1), false);
	if (time.status === "no-match") return NO_MATCH;
	if (date.status === "invalid") return date;
	if (time.status === "invalid") return time;
	return buildDateTime(date.value, time.value);
}
