import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { HelldiversService } from "../services/HelldiversService.js";
import {
  registerAllTools,
  type ServiceContainer,
} from "./registration/index.js";

/**
 * Register all defined tools with the MCP server instance.
 * @returns The service container backing the tools
 */
export function registerTools(
  server: McpServer,
  helldiversService?: HelldiversService
): ServiceContainer {
  return registerAllTools(server, helldiversService);
}

export * from "./warTools.js";
export * from "./planetTools.js";
export * from "./referenceDataTools.js";
export * from "./toolResponse.js";

// Re-export schema components
export * from "./schemas/index.js";

// Re-export registration utilities
export * from "./registration/index.js";
