#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ConfigurationManager } from "./config/ConfigurationManager.js";
import { createServer } from "./createServer.js";
import {
  logger,
  setServerState,
  startHealthCheckServer,
  type ServerState,
} from "./utils/index.js";

// Server state tracking
const serverState: ServerState = {
  isRunning: false,
  startTime: null,
  transport: null,
  server: null,
  healthCheckServer: null,
  helldiversService: null,
};

// Share server state with the health check module
setServerState(serverState);

export const main = async (): Promise<void> => {
  try {
    const configManager = ConfigurationManager.getInstance();
    const healthCheckConfig = configManager.getHealthCheckConfig();

    const { server, helldiversService } = createServer();
    serverState.server = server;
    serverState.helldiversService = helldiversService;

    if (healthCheckConfig.enabled) {
      serverState.healthCheckServer = startHealthCheckServer(
        healthCheckConfig.port
      );
    }

    const transport = new StdioServerTransport();
    serverState.transport = transport;
    logger.info("Connecting stdio transport...");
    await server.connect(transport);

    serverState.isRunning = true;
    serverState.startTime = Date.now();

    logger.info("MCP Server connected and listening.");
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1); // Exit if server fails to start
  }
};

// Graceful shutdown handling
const shutdown = async (signal: string): Promise<void> => {
  logger.info(`${signal} signal received: closing MCP server`);

  // Track if any shutdown step fails
  let hasError = false;

  if (serverState.server) {
    try {
      await serverState.server.close();
      serverState.isRunning = false;
      logger.info("MCP Server shutdown completed successfully");
    } catch (error) {
      hasError = true;
      logger.error("Error during MCP server shutdown:", error);
    }
  }

  if (serverState.helldiversService) {
    try {
      await serverState.helldiversService.close();
      logger.info("HellHub response cache released.");
    } catch (error) {
      hasError = true;
      logger.error("Error releasing HellHub response cache:", error);
    }
  }

  if (serverState.healthCheckServer) {
    try {
      logger.info("Closing health check server...");
      serverState.healthCheckServer.close();
      logger.info("Health check server closed successfully");
    } catch (error) {
      hasError = true;
      logger.error("Error during health check server shutdown:", error);
    }
  }

  process.exit(hasError ? 1 : 0);
};

// If this is the main module, start the server
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  void main();
}
