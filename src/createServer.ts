import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ConfigurationManager } from "./config/ConfigurationManager.js";
import type { HelldiversService } from "./services/HelldiversService.js";
import { registerTools } from "./tools/index.js";
import { logger } from "./utils/index.js";

/**
 * Result object containing the created server and the service behind its tools
 */
export interface ServerCreationResult {
  server: McpServer;
  helldiversService: HelldiversService;
}

export interface CreateServerOptions {
  /** Service to back the tools; one is built from configuration when omitted */
  helldiversService?: HelldiversService;
}

/**
 * Creates and configures an MCP server instance with every Helldivers tool registered.
 */
export function createServer(
  options: CreateServerOptions = {}
): ServerCreationResult {
  logger.info("Creating MCP server instance...");

  const mcpConfig = ConfigurationManager.getInstance().getMcpConfig();

  const server = new McpServer({
    name: mcpConfig.serverName,
    version: mcpConfig.serverVersion,
  });

  const { helldiversService } = registerTools(
    server,
    options.helldiversService
  );

  logger.info("MCP server instance created successfully.");
  return { server, helldiversService };
}
