import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Request, type RequestHandler, type Response } from "express";
import { type Config, loadConfig } from "./config";
import { logger } from "./logger";
import { SERVER_INFO, createServer } from "./server";

function jsonRpcError(code: number, message: string) {
	return { jsonrpc: "2.0", error: { code, message }, id: null };
}

/**
 * One server and one transport per request: `parse_datetime` holds no state
 * between calls, so there are no sessions to track.
 */
function handleMcpPost(config: Config): RequestHandler {
	return async (req: Request, res: Response) => {
		const server = createServer(config);
		const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
		res.on("close", () => {
			Promise.all([transport.close(), server.close()]).catch((error: unknown) =>
				logger.warn("Closing MCP request failed:", error),
			);
		});

		try {
			await server.connect(transport);
			await transport.handleRequest(req, res, req.body);
		} catch (error) {
			logger.error("MCP request failed:", error);
			if (!res.headersSent) {
				res.status(500).json(jsonRpcError(-32603, "Internal server error"));
			}
		}
	};
}

// Stateless mode has no stream to resume and no session to end.
const rejectMethod: RequestHandler = (_req, res) => {
	res.status(405).set("Allow", "POST").json(jsonRpcError(-32000, "Method not allowed."));
};

export function createApp(config: Config = loadConfig()) {
	const app = express();
	app.use(express.json());

	app.post("/mcp", handleMcpPost(config));
	app.get("/mcp", rejectMethod);
	app.delete("/mcp", rejectMethod);

	app.get("/health", (_req, res) => {
		res.json({ status: "ok", server: SERVER_INFO.name });
	});

	return app;
}
