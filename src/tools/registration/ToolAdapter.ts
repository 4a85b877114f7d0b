/**
 * Tool Adapter
 *
 * Converts tool functions that take a single service into registry entries.
 */
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { HelldiversService } from "../../services/HelldiversService.js";
import type { ServiceContainer, ToolRegistrationFn } from "./ToolRegistry.js";

/**
 * Tool function that accepts server and HelldiversService
 */
export type HelldiversServiceTool = (
  server: McpServer,
  service: HelldiversService
) => void;

/**
 * Adapts a tool that uses HelldiversService to the registration system
 */
export function adaptHelldiversServiceTool(
  tool: HelldiversServiceTool
): ToolRegistrationFn {
  return (server: McpServer, services: ServiceContainer) => {
    tool(server, services.helldiversService);
  };
}
