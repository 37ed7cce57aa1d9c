import type { Server } from "node:http";
import { createApp } from "../../transport";

export const mcpHeaders = {
	"Content-Type": "application/json",
	Accept: "application/json, text/event-stream",
};

/** Start the express app on an ephemeral port and return its base URL. */
export async function startApp(): Promise<{ server: Server; baseUrl: string }> {
	const app = createApp();
	return new Promise((resolve) => {
		const server = app.listen(0, () => {
			const addr = server.address();
			const port = addr && typeof addr === "object" ? addr.port : 0;
			resolve({ server, baseUrl: `http://localhost:${port}` });
		});
	});
}

export function stopApp(server: Server): Promise<void> {
	return new Promise((resolve) => {
		server.close(() => resolve());
	});
}

export function jsonRpc(method: string, params: unknown, id: number) {
	return { jsonrpc: "2.0", method, params, id };
}

/**
 * Parse SSE response body and extract JSON-RPC messages from `data:` lines.
 * The SDK returns SSE format for Streamable HTTP POST responses.
 */
async function parseSseResponse(res: Response): Promise<unknown[]> {
	const text = await res.text();
	const messages: unknown[] = [];
	for (const line of text.split("\n")) {
		if (line.startsWith("data: ")) {
			messages.push(JSON.parse(line.slice(6)));
		}
	}
	return messages;
}

export async function mcpPost(
	baseUrl: string,
	body: unknown,
): Promise<{ status: number; messages: unknown[] }> {
	const res = await fetch(`${baseUrl}/mcp`, {
		method: "POST",
		headers: mcpHeaders,
		body: JSON.stringify(body),
	});
	if (res.status !== 200) {
		return { status: res.status, messages: [] };
	}
	return { status: res.status, messages: await parseSseResponse(res) };
}

/** Call a tool and decode the envelope from its first text content item. */
export async function callTool(
	baseUrl: string,
	name: string,
	args: Record<string, unknown>,
	id = 1,
): Promise<{ status: number; body: Record<string, unknown>; envelope: Record<string, unknown> | null }> {
	const { status, messages } = await mcpPost(baseUrl, jsonRpc("tools/call", { name, arguments: args }, id));
	const body = (messages[0] ?? {}) as Record<string, unknown>;
	const result = body.result as { content?: Array<{ text: string }>; isError?: boolean } | undefined;
	if (!result?.content || result.isError) {
		return { status, body, envelope: null };
	}
	return { status, body, envelope: JSON.parse(result.content[0].text) };
}
