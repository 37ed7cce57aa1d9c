import type { DateTimeValue, ParsedValue } from "./types";

/**
 * Complete a parsed value into a date-time. Times take their calendar date
 * from `now` (local time); dates are placed at midnight.
 */
export function normalize(value: ParsedValue, now: Date): DateTimeValue {
	switch (value.kind) {
		case "datetime":
			return value;
		case "date":
			return {
				kind: "datetime",
				year: value.year,
				month: value.month,
				day: value.day,
				hour: 0,
				minute: 0,
				second: 0,
				microsecond: 0,
				offset: null,
			};
		case "time":
			return {
				kind: "datetime",
				year: now.getFullYear(),
				month: now.getMonth() + 1,
				day: now.getDate(),
				hour: value.hour,
				minute: value.minute,
				second: value.second,
				microsecond: value.microsecond,
				offset: value.offset,
			};
	}
}
