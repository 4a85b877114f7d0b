import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { HelldiversService } from "../services/HelldiversService.js";
import { logger } from "../utils/logger.js";
import type { ToolParams } from "./schemas/BaseToolSchema.js";
import {
  GetBiomesTool,
  GetFactionsTool,
} from "./schemas/helldiversToolParams.js";
import { toPaginationParams, toToolResult } from "./toolResponse.js";

// Both list tools take the same pagination arguments
type ReferenceListArgs = ToolParams<typeof GetBiomesTool>;

export const getBiomesTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  server.tool(
    GetBiomesTool.TOOL_NAME,
    GetBiomesTool.TOOL_DESCRIPTION,
    GetBiomesTool.TOOL_PARAMS,
    async (args: ReferenceListArgs): Promise<CallToolResult> => {
      logger.debug(`Received ${GetBiomesTool.TOOL_NAME} request:`, args);
      return toToolResult(await service.getBiomes(toPaginationParams(args)));
    }
  );
};

export const getFactionsTool = (
  server: McpServer,
  service: HelldiversService
): void => {
  server.tool(
    GetFactionsTool.TOOL_NAME,
    GetFactionsTool.TOOL_DESCRIPTION,
    GetFactionsTool.TOOL_PARAMS,
    async (args: ReferenceListArgs): Promise<CallToolResult> => {
      logger.debug(`Received ${GetFactionsTool.TOOL_NAME} request:`, args);
      return toToolResult(
        await service.getFactions(toPaginationParams(args))
      );
    }
  );
};
