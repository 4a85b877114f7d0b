import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { HelldiversService } from "../services/HelldiversService.js";
import { logger } from "../utils/logger.js";
import type { ToolParams } from "./schemas/BaseToolSchema.js";
import {
  GetCampaignInfoTool,
  GetStatisticsTool,
  GetWarStatusTool,
} from "./schemas/helldiversToolParams.js";
import { toPaginationParams, toToolResult } from "./toolResponse.js";

type GetStatisticsArgs = ToolParams<typeof GetStatisticsTool>;

/**
 * Registers the get_war_status tool with the MCP server.
 */
export const getWarStatusTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  const processRequest = async (): Promise<CallToolResult> => {
    logger.debug(`Received ${GetWarStatusTool.TOOL_NAME} request`);
    return toToolResult(await service.getWarStatus());
  };

  server.tool(
    GetWarStatusTool.TOOL_NAME,
    GetWarStatusTool.TOOL_DESCRIPTION,
    GetWarStatusTool.TOOL_PARAMS,
    processRequest
  );
};

/**
 * Registers the get_statistics tool with the MCP server.
 */
export const getStatisticsTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  const processRequest = async (
    args: GetStatisticsArgs
  ): Promise<CallToolResult> => {
    logger.debug(`Received ${GetStatisticsTool.TOOL_NAME} request:`, args);
    return toToolResult(
      await service.getStatistics(toPaginationParams(args))
    );
  };

  server.tool(
    GetStatisticsTool.TOOL_NAME,
    GetStatisticsTool.TOOL_DESCRIPTION,
    GetStatisticsTool.TOOL_PARAMS,
    processRequest
  );
};

/**
 * Registers the get_campaign_info tool. The API has no campaigns endpoint,
 * so every call answers with an error envelope.
 */
export const getCampaignInfoTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  const processRequest = async (): Promise<CallToolResult> => {
    logger.debug(`Received ${GetCampaignInfoTool.TOOL_NAME} request`);
    return toToolResult(await service.getCampaignInfo());
  };

  server.tool(
    GetCampaignInfoTool.TOOL_NAME,
    GetCampaignInfoTool.TOOL_DESCRIPTION,
    GetCampaignInfoTool.TOOL_PARAMS,
    processRequest
  );
};
