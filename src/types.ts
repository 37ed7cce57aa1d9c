/** JSON body every tool answers with, serialized into a single text item. */
export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: { code: string; message: string; details?: unknown } | null;
}

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}

export function successResponse(metadata: Record<string, unknown>) {
	return createToolResponse({ valid: true, metadata, error: null });
}

export function errorResponse(code: string, message: string, details?: unknown) {
	const error = details === undefined ? { code, message } : { code, message, details };
	return createToolResponse({ valid: false, metadata: null, error });
}
