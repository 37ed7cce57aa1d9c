import { chronoFallback } from "./fallback";
import type { ParseDefaults, ParseOptions, ResolvedParseOptions } from "./types";

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseDefaults> = Object.freeze({
	dayFirst: false,
	yearFirst: true,
	strict: true,
	exact: false,
});

/**
 * Merge per-call options over a default set into a fresh frozen object. The
 * clock is read here, once, and only when the caller gave no `now`.
 */
export function resolveOptions(
	options: ParseOptions = {},
	defaults: Readonly<ParseDefaults> = DEFAULT_PARSE_OPTIONS,
): ResolvedParseOptions {
	return Object.freeze({
		dayFirst: options.dayFirst ?? defaults.dayFirst,
		yearFirst: options.yearFirst ?? defaults.yearFirst,
		strict: options.strict ?? defaults.strict,
		exact: options.exact ?? defaults.exact,
		now: options.now ?? new Date(),
		fallback: options.fallback ?? chronoFallback,
	});
}
