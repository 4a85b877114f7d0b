import type { LogLevelName } from "../utils/logger.js";

export type {
  PaginationInfo,
  HellHubResponse,
  WarInfo,
  PlanetInfo,
  Statistics,
  CampaignInfo,
  Biome,
  Faction,
  HellHubErrorBody,
} from "../services/hellhub/HellHubSchemas.js";

export interface HellHubApiConfig {
  /** API root, without a trailing slash */
  baseUrl: string;
  timeoutMs: number;
  /** Sent as X-Super-Client when set */
  clientId?: string;
  /** Sent as X-Super-Contact when set */
  contactEmail?: string;
}

export interface RetryConfig {
  /** Retries after the first attempt */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
}

export interface McpConfig {
  serverName: string;
  serverVersion: string;
  logLevel: LogLevelName;
}

export interface HealthCheckConfig {
  enabled: boolean;
  port: number;
}

/**
 * Query parameters accepted by the list endpoints.
 */
export interface PaginationParams {
  page?: number;
  pageSize?: number;
}

export type ToolStatus = "success" | "error";

/**
 * Uniform result returned by every tool.
 */
export interface ToolEnvelope<T> {
  status: ToolStatus;
  data: T | null;
  error: string | null;
}
