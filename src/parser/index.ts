import { logger } from "../logger";
import { matchCommon } from "./common";
import { ParserError } from "./errors";
import { matchIso8601 } from "./iso8601";
import { normalize } from "./normalize";
import { DEFAULT_PARSE_OPTIONS, resolveOptions } from "./options";
import type {
	MatchOutcome,
	ParseDefaults,
	ParseOptions,
	ParseResult,
	ParsedValue,
	ResolvedParseOptions,
} from "./types";

export type {
	DateTimeParseError,
	DateTimeValue,
	DateValue,
	FallbackHints,
	FallbackParser,
	ParseDefaults,
	ParseOptions,
	ParseResult,
	ParsedValue,
	TimeValue,
} from "./types";
export { ParserError } from "./errors";
export { chronoFallback } from "./fallback";
export { formatIso } from "./format";
export { normalize } from "./normalize";
export { DEFAULT_PARSE_OPTIONS } from "./options";

interface ParseStrategy {
	name: string;
	applies(options: ResolvedParseOptions): boolean;
	attempt(text: string, options: ResolvedParseOptions): MatchOutcome;
}

/**
 * Recognition strategies in priority order. The first `matched` wins, an
 * `invalid` ends the parse, and `no-match` hands over to the next one.
 */
const STRATEGIES: readonly ParseStrategy[] = [
	{
		name: "iso8601",
		applies: () => true,
		attempt: (text) => matchIso8601(text),
	},
	{
		name: "common",
		applies: () => true,
		attempt: (text, options) => matchCommon(text, options.dayFirst),
	},
	{
		name: "fallback",
		applies: (options) => !options.strict,
		attempt: (text, options) => {
			logger.debug(`Delegating "${text}" to the fallback parser`);
			const value = options.fallback.parse(text, {
				dayFirst: options.dayFirst,
				yearFirst: options.yearFirst,
				now: options.now,
			});
			return value ? { status: "matched", value } : { status: "no-match" };
		},
	},
];

function failure(text: string, options: ResolvedParseOptions): ParseResult {
	const message = options.strict
		? `Unable to parse string [${text}]`
		: `Invalid date string: ${text}`;
	logger.debug(message);
	return { ok: false, error: { code: "PARSE_ERROR", message, input: text } };
}

function run(text: string, options: ResolvedParseOptions): ParseResult {
	for (const strategy of STRATEGIES) {
		if (!strategy.applies(options)) continue;
		const outcome = strategy.attempt(text, options);
		if (outcome.status === "no-match") continue;
		if (outcome.status === "invalid") {
			logger.debug(`${strategy.name} rejected "${text}": ${outcome.message}`);
			return {
				ok: false,
				error: {
					code: "INVALID_VALUE",
					message: `Invalid value in "${text}": ${outcome.message}`,
					input: text,
				},
			};
		}
		const value = options.exact ? outcome.value : normalize(outcome.value, options.now);
		return { ok: true, value };
	}
	return failure(text, options);
}

/**
 * Build a parse function over a fixed set of defaults. Per-call options are
 * merged over them without touching the defaults themselves.
 */
export function createParser(
	defaults: Partial<ParseDefaults> = {},
): (text: string, options?: ParseOptions) => ParseResult {
	const base: Readonly<ParseDefaults> = Object.freeze({
		dayFirst: defaults.dayFirst ?? DEFAULT_PARSE_OPTIONS.dayFirst,
		yearFirst: defaults.yearFirst ?? DEFAULT_PARSE_OPTIONS.yearFirst,
		strict: defaults.strict ?? DEFAULT_PARSE_OPTIONS.strict,
		exact: defaults.exact ?? DEFAULT_PARSE_OPTIONS.exact,
	});
	return (text, options) => run(text, resolveOptions(options, base));
}

/**
 * Parse a date, time or date-time string. Tries ISO 8601, then the common
 * `YYYY/MM/DD HH:mm:ss` format, then (with `strict: false`) the natural
 * language fallback. Unless `exact` is set the result is always a date-time.
 */
export const parse = createParser();

/** Like {@link parse} but throws a {@link ParserError} on failure. */
export function parseOrThrow(text: string, options?: ParseOptions): ParsedValue {
	const result = parse(text, options);
	if (!result.ok) throw new ParserError(result.error);
	return result.value;
}
