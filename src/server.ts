import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "./config";
import { parserDefaults } from "./config";
import { logger } from "./logger";
import { createParser } from "./parser/index";
import { registerParseDateTimeTool } from "./tools/parse-datetime";

export const SERVER_INFO = { name: "timeparse", version: "0.1.0" } as const;

/**
 * Register all timeparse tools on the given MCP server. The parser is bound
 * to the configured defaults once per registration.
 */
export function registerTools(server: McpServer, config: Config): void {
	registerParseDateTimeTool(server, createParser(parserDefaults(config)));
	logger.debug("Registered tools: parse_datetime");
}

export function createServer(config: Config): McpServer {
	const server = new McpServer(SERVER_INFO, { capabilities: { logging: {} } });

	registerTools(server, config);

	return server;
}
