import http from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ConfigurationManager } from "../config/ConfigurationManager.js";
import type { HelldiversService } from "../services/HelldiversService.js";
import { logger } from "./logger.js";

export interface ServerState {
  isRunning: boolean;
  startTime: number | null;
  transport: Transport | null;
  server: McpServer | null;
  healthCheckServer: http.Server | null;
  helldiversService: HelldiversService | null;
}

export interface HealthStatus {
  status: "running" | "stopped";
  uptime: number;
  transport?: string;
  version?: string;
}

// Reference to the server state owned by server.ts
let serverStateRef: ServerState | null = null;

export const setServerState = (state: ServerState | null): void => {
  serverStateRef = state;
};

export const getHealthStatus = (): HealthStatus => {
  if (!serverStateRef || !serverStateRef.isRunning) {
    return {
      status: "stopped",
      uptime: 0,
    };
  }

  const uptime = serverStateRef.startTime
    ? Math.floor((Date.now() - serverStateRef.startTime) / 1000)
    : 0;

  return {
    status: "running",
    uptime,
    transport: serverStateRef.transport?.constructor.name || "unknown",
    version: ConfigurationManager.getInstance().getMcpConfig().serverVersion,
  };
};

/**
 * Starts an HTTP server for health checks.
 * This runs independently of the MCP server transport.
 */
export const startHealthCheckServer = (port: number): http.Server => {
  const server = http.createServer((req, res) => {
    if (req.url === "/health" || req.url === "/") {
      const health = getHealthStatus();
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(health));
    } else {
      res.writeHead(404, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Not found" }));
    }
  });

  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE") {
      logger.error(`Health check server port ${port} is already in use`);
    } else {
      logger.error(`Health check server error: ${error.message}`);
    }
  });

  server.listen(port, () => {
    logger.info(`Health check server listening on port ${port}`);
  });

  return server;
};
