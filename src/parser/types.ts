export interface DateValue {
	kind: "date";
	year: number;
	month: number;
	day: number;
}

export interface TimeValue {
	kind: "time";
	hour: number;
	minute: number;
	second: number;
	microsecond: number; // Fractional second, always 6 digits of precision
	offset: number | null; // Minutes east of UTC as written in the text, null if absent
}

export interface DateTimeValue {
	kind: "datetime";
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	microsecond: number;
	offset: number | null;
}

export type ParsedValue = DateValue | TimeValue | DateTimeValue;

/**
 * Outcome of a single recognition strategy. `no-match` means the grammar did
 * not recognize the text and the next strategy may try; `invalid` means it did
 * but the fields are out of range, which ends the parse.
 */
export type MatchOutcome<T = ParsedValue> =
	| { status: "matched"; value: T }
	| { status: "no-match" }
	| { status: "invalid"; message: string };

export interface FallbackHints {
	dayFirst: boolean;
	yearFirst: boolean;
	now: Date;
}

/** Permissive parser consulted last, when strict mode is off. */
export interface FallbackParser {
	parse(text: string, hints: FallbackHints): DateTimeValue | null;
}

export interface ParseDefaults {
	dayFirst: boolean;
	yearFirst: boolean;
	strict: boolean;
	exact: boolean;
}

export interface ParseOptions extends Partial<ParseDefaults> {
	now?: Date; // Reference instant for normalization, defaults to the wall clock
	fallback?: FallbackParser;
}

export type ResolvedParseOptions = Readonly<
	ParseDefaults & {
		now: Date;
		fallback: FallbackParser;
	}
>;

export interface DateTimeParseError {
	code: "PARSE_ERROR" | "INVALID_VALUE";
	message: string;
	input: string;
}

export type ParseResult =
	| { ok: true; value: ParsedValue }
	| { ok: false; error: DateTimeParseError };
