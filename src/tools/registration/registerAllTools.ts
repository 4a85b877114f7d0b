/**
 * Tool Registration - Central registration point for all tools
 */
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { HelldiversService } from "../../services/HelldiversService.js";
import { logger } from "../../utils/logger.js";
import { ToolRegistry, type ServiceContainer } from "./ToolRegistry.js";
import { adaptHelldiversServiceTool } from "./ToolAdapter.js";
import {
  GetBiomesTool,
  GetCampaignInfoTool,
  GetFactionsTool,
  GetPlanetStatusTool,
  GetPlanetsTool,
  GetStatisticsTool,
  GetWarStatusTool,
} from "../schemas/helldiversToolParams.js";
import {
  getCampaignInfoTool,
  getStatisticsTool,
  getWarStatusTool,
} from "../warTools.js";
import { getPlanetStatusTool, getPlanetsTool } from "../planetTools.js";
import { getBiomesTool, getFactionsTool } from "../referenceDataTools.js";

/**
 * Register all tools with the MCP server
 * @param helldiversService Service shared by the tools; created from configuration when omitted
 * @returns The service container, so the caller can release the services on shutdown
 */
export function registerAllTools(
  server: McpServer,
  helldiversService: HelldiversService = new HelldiversService()
): ServiceContainer {
  logger.info("Initializing services and tool registry...");

  const registry = new ToolRegistry(helldiversService);

  // War-wide data
  registry.registerTool(
    GetWarStatusTool.TOOL_NAME,
    adaptHelldiversServiceTool(getWarStatusTool)
  );
  registry.registerTool(
    GetStatisticsTool.TOOL_NAME,
    adaptHelldiversServiceTool(getStatisticsTool)
  );
  registry.registerTool(
    GetCampaignInfoTool.TOOL_NAME,
    adaptHelldiversServiceTool(getCampaignInfoTool)
  );

  // Planets
  registry.registerTool(
    GetPlanetsTool.TOOL_NAME,
    adaptHelldiversServiceTool(getPlanetsTool)
  );
  registry.registerTool(
    GetPlanetStatusTool.TOOL_NAME,
    adaptHelldiversServiceTool(getPlanetStatusTool)
  );

  // Reference data
  registry.registerTool(
    GetBiomesTool.TOOL_NAME,
    adaptHelldiversServiceTool(getBiomesTool)
  );
  registry.registerTool(
    GetFactionsTool.TOOL_NAME,
    adaptHelldiversServiceTool(getFactionsTool)
  );

  registry.registerAllTools(server);

  return registry.getServices();
}
