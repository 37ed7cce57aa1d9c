import { z } from "zod";
import { logger } from "./logger.js";
import type { ParseDefaults } from "./parser/index.js";

const flag = (fallback: boolean) =>
	z
		.enum(["true", "false"])
		.default(fallback ? "true" : "false")
		.transform((value) => value === "true");

export const ConfigSchema = z.object({
	PORT: z.coerce.number().default(3000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	PARSE_DAY_FIRST: flag(false),
	PARSE_YEAR_FIRST: flag(true),
	PARSE_STRICT: flag(true),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(): Config {
	const result = ConfigSchema.safeParse(process.env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}

/** Server-wide parser defaults; tool calls may still override each flag. */
export function parserDefaults(config: Config): Partial<ParseDefaults> {
	return {
		dayFirst: config.PARSE_DAY_FIRST,
		yearFirst: config.PARSE_YEAR_FIRST,
		strict: config.PARSE_STRICT,
	};
}
