import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { HelldiversService } from "../services/HelldiversService.js";
import { logger } from "../utils/logger.js";
import type { ToolParams } from "./schemas/BaseToolSchema.js";
import {
  GetPlanetStatusTool,
  GetPlanetsTool,
} from "./schemas/helldiversToolParams.js";
import { toPaginationParams, toToolResult } from "./toolResponse.js";

type GetPlanetsArgs = ToolParams<typeof GetPlanetsTool>;
type GetPlanetStatusArgs = ToolParams<typeof GetPlanetStatusTool>;

/**
 * Registers the get_planets tool with the MCP server.
 */
export const getPlanetsTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  const processRequest = async (
    args: GetPlanetsArgs
  ): Promise<CallToolResult> => {
    logger.debug(`Received ${GetPlanetsTool.TOOL_NAME} request:`, args);
    return toToolResult(await service.getPlanets(toPaginationParams(args)));
  };

  server.tool(
    GetPlanetsTool.TOOL_NAME,
    GetPlanetsTool.TOOL_DESCRIPTION,
    GetPlanetsTool.TOOL_PARAMS,
    processRequest
  );
};

/**
 * Registers the get_planet_status tool with the MCP server.
 */
export const getPlanetStatusTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  const processRequest = async (
    args: GetPlanetStatusArgs
  ): Promise<CallToolResult> => {
    logger.debug(`Received ${GetPlanetStatusTool.TOOL_NAME} request:`, {
      planetIndex: args.planet_index,
    });
    return toToolResult(await service.getPlanetStatus(args.planet_index));
  };

  server.tool(
    GetPlanetStatusTool.TOOL_NAME,
    GetPlanetStatusTool.TOOL_DESCRIPTION,
    GetPlanetStatusTool.TOOL_PARAMS,
    processRequest
  );
};
