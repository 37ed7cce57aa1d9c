import { describe, expect, it } from "vitest";
import {
	type ToolResponseEnvelope,
	createToolResponse,
	errorResponse,
	successResponse,
} from "../types.js";

describe("Response envelope format", () => {
	it("createToolResponse returns content array with one text item", () => {
		const result = createToolResponse({
			valid: true,
			metadata: { foo: "bar" },
			error: null,
		});
		expect(result.content).toHaveLength(1);
		expect(result.content[0].type).toBe("text");
		expect(typeof result.content[0].text).toBe("string");
	});

	it("text content parses to the original envelope", () => {
		const envelope: ToolResponseEnvelope = {
			valid: true,
			metadata: { foo: "bar" },
			error: null,
		};
		const parsed = JSON.parse(createToolResponse(envelope).content[0].text);
		expect(parsed).toEqual(envelope);
	});

	it("successResponse wraps metadata", () => {
		const parsed = JSON.parse(successResponse({ iso: "2016-06-05" }).content[0].text);
		expect(parsed).toEqual({ valid: true, metadata: { iso: "2016-06-05" }, error: null });
	});

	it("errorResponse omits details unless given", () => {
		const plain = JSON.parse(errorResponse("PARSE_ERROR", "fail").content[0].text);
		expect(plain).toEqual({
			valid: false,
			metadata: null,
			error: { code: "PARSE_ERROR", message: "fail" },
		});
		const detailed = JSON.parse(errorResponse("PARSE_ERROR", "fail", { at: 3 }).content[0].text);
		expect(detailed.error).toEqual({ code: "PARSE_ERROR", message: "fail", details: { at: 3 } });
	});

	it("envelope always has exactly three top-level keys: valid, metadata, error", () => {
		const parsed = JSON.parse(errorResponse("X", "y").content[0].text);
		expect(Object.keys(parsed).sort()).toEqual(["error", "metadata", "valid"]);
	});
});
