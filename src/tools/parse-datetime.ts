import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { logger } from "../logger.js";
import { type ParseOptions, type ParseResult, formatIso, parse } from "../parser/index.js";
import { errorResponse, successResponse } from "../types.js";

type Parser = (text: string, options?: ParseOptions) => ParseResult;

/**
 * Turn the optional `reference` argument into a local Date. Only dates and
 * date-times read by the strict grammars are accepted; a lone time is not.
 * The reference is local wall-clock time, so a UTC offset is refused.
 */
function resolveReference(reference: string): Date | null {
	const result = parse(reference, { strict: true, exact: true });
	if (!result.ok || result.value.kind === "time") return null;
	const value = result.value;
	if (value.kind === "datetime" && value.offset !== null) return null;
	const date = new Date(0);
	date.setFullYear(value.year, value.month - 1, value.day);
	if (value.kind === "datetime") {
		date.setHours(value.hour, value.minute, value.second, Math.floor(value.microsecond / 1000));
	} else {
		date.setHours(0, 0, 0, 0);
	}
	return date;
}

export function registerParseDateTimeTool(server: McpServer, parser: Parser = parse): void {
	server.registerTool(
		"parse_datetime",
		{
			description:
				"Parse a date, time or date-time string. Tries ISO 8601 first, then the common 'YYYY/MM/DD HH:mm:ss' format, then (with strict=false) natural language. Returns the structured value and its ISO 8601 rendering.",
			inputSchema: {
				text: z.string().min(1).describe("Text to parse, e.g. '2016-06-05T12:30:45'"),
				dayFirst: z
					.boolean()
					.optional()
					.describe("Read ambiguous month/day groups as day first"),
				yearFirst: z
					.boolean()
					.optional()
					.describe("Read three two-digit groups as year first (fallback parser only)"),
				strict: z
					.boolean()
					.optional()
					.describe("When false, fall back to the natural-language parser"),
				exact: z
					.boolean()
					.optional()
					.describe("Return dates and times as parsed instead of completing them"),
				reference: z
					.string()
					.min(1)
					.optional()
					.describe(
						"Local ISO 8601 date or date-time without a UTC offset, used to complete partial values; defaults to now",
					),
			},
		},
		async ({ text, dayFirst, yearFirst, strict, exact, reference }) => {
			let now: Date | undefined;
			if (reference !== undefined) {
				const resolved = resolveReference(reference);
				if (!resolved) {
					return errorResponse(
						"INVALID_REFERENCE",
						`Could not read reference "${reference}" as a local ISO 8601 date or date-time`,
					);
				}
				now = resolved;
			}

			const result = parser(text, { dayFirst, yearFirst, strict, exact, now });
			if (!result.ok) {
				logger.debug("parse_datetime failed:", result.error.message);
				return errorResponse(result.error.code, result.error.message);
			}
			return successResponse({ ...result.value, iso: formatIso(result.value) });
		},
	);
}
