import { loadConfig } from "./config";
import { logger } from "./logger";
import { createApp } from "./transport";

const config = loadConfig();
const app = createApp(config);

app.listen(config.PORT, () => {
	logger.info(`timeparse MCP server listening on port ${config.PORT} (${config.NODE_ENV})`);
});
