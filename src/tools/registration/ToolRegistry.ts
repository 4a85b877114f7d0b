/**
 * Tool Registry - Central management for MCP tools
 */
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { HelldiversService } from "../../services/HelldiversService.js";
import { logger } from "../../utils/logger.js";

/**
 * Container with services available for tools
 */
export interface ServiceContainer {
  helldiversService: HelldiversService;
}

/**
 * Tool registration function type - for standalone functions
 */
export type ToolRegistrationFn = (
  server: McpServer,
  services: ServiceContainer
) => void;

interface NamedRegistration {
  name: string;
  register: ToolRegistrationFn;
}

/**
 * Registry that manages tool registration
 */
export class ToolRegistry {
  private toolRegistrations: NamedRegistration[] = [];
  private registeredNames: string[] = [];
  private services: ServiceContainer;

  constructor(helldiversService: HelldiversService) {
    this.services = {
      helldiversService,
    };
  }

  /**
   * Adds a tool to the registry
   * @param name Tool name, used for logging and getRegisteredToolNames()
   */
  public registerTool(name: string, registration: ToolRegistrationFn): void {
    this.toolRegistrations.push({ name, register: registration });
  }

  /**
   * Registers all tools with the MCP server. A failing registration is logged and skipped.
   */
  public registerAllTools(server: McpServer): void {
    logger.info(`Registering ${this.toolRegistrations.length} tools...`);

    for (const { name, register } of this.toolRegistrations) {
      try {
        register(server, this.services);
        this.registeredNames.push(name);
        logger.debug(`Registered tool: ${name}`);
      } catch (error) {
        logger.error(
          `Failed to register tool ${name}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    logger.info(
      `${this.registeredNames.length}/${this.toolRegistrations.length} tools registered`
    );
  }

  /**
   * Names of the tools that registered successfully
   */
  public getRegisteredToolNames(): string[] {
    return [...this.registeredNames];
  }

  public getServices(): ServiceContainer {
    return this.services;
  }
}
