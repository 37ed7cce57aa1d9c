import type { DateTimeParseError } from "./types";

export class ParserError extends Error {
	public readonly code: DateTimeParseError["code"];
	public readonly input: string;

	constructor(error: DateTimeParseError) {
		super(error.message);
		this.name = "ParserError";
		this.code = error.code;
		this.input = error.input;
	}
}
