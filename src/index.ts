export { createServer } from "./createServer.js";
export type {
  CreateServerOptions,
  ServerCreationResult,
} from "./createServer.js";
export {
  ConfigurationManager,
  DEFAULT_HELLHUB_BASE_URL,
} from "./config/ConfigurationManager.js";
export * from "./services/index.js";
export type {
  CacheConfig,
  HealthCheckConfig,
  HellHubApiConfig,
  McpConfig,
  PaginationParams,
  RetryConfig,
  ToolEnvelope,
  ToolStatus,
} from "./types/index.js";
export * from "./tools/index.js";
export * from "./utils/index.js";
