import type {
  CacheConfig,
  HealthCheckConfig,
  HellHubApiConfig,
  McpConfig,
  RetryConfig,
} from "../types/index.js";
import { logger, parseLogLevel, setLogLevel } from "../utils/logger.js";

export const DEFAULT_HELLHUB_BASE_URL =
  "https://api-hellhub-collective.koyeb.app/api";

// Define the structure for all configurations managed
interface ManagedConfigs {
  hellhubApi: HellHubApiConfig;
  retry: RetryConfig;
  cache: CacheConfig;
  mcpConfig: McpConfig;
  healthCheck: HealthCheckConfig;
}

/**
 * Centralized configuration management for all services.
 * Implements singleton pattern to ensure consistent configuration.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | null = null;

  private config: ManagedConfigs;

  private constructor() {
    this.config = {
      hellhubApi: {
        baseUrl: DEFAULT_HELLHUB_BASE_URL,
        timeoutMs: 30000,
        clientId: undefined,
        contactEmail: undefined,
      },
      retry: {
        maxAttempts: 2,
        initialDelayMs: 250,
        maxDelayMs: 4000,
      },
      cache: {
        enabled: true,
        ttlSeconds: 60,
      },
      mcpConfig: {
        serverName: "helldivers-mcp-server",
        serverVersion: process.env.npm_package_version || "0.1.0",
        logLevel: "info",
      },
      healthCheck: {
        enabled: false,
        port: 3000,
      },
    };

    this.loadEnvironmentOverrides();
  }

  /**
   * Get the singleton instance of ConfigurationManager.
   */
  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the cached instance so the next getInstance() re-reads the environment.
   */
  public static resetInstance(): void {
    ConfigurationManager.instance = null;
  }

  // --- Getters for specific configurations ---
  // Each returns a copy to prevent accidental modification of the internal state

  public getHellHubApiConfig(): HellHubApiConfig {
    return { ...this.config.hellhubApi };
  }

  public getRetryConfig(): RetryConfig {
    return { ...this.config.retry };
  }

  public getCacheConfig(): CacheConfig {
    return { ...this.config.cache };
  }

  public getMcpConfig(): McpConfig {
    return { ...this.config.mcpConfig };
  }

  public getHealthCheckConfig(): HealthCheckConfig {
    return { ...this.config.healthCheck };
  }

  private loadEnvironmentOverrides(): void {
    // HellHub API
    if (process.env.HELLHUB_API_BASE_URL) {
      const baseUrl = process.env.HELLHUB_API_BASE_URL.trim();
      if (this.isHttpUrl(baseUrl)) {
        this.config.hellhubApi.baseUrl = baseUrl.replace(/\/+$/, "");
        logger.info(`[ConfigurationManager] HellHub API base URL set to: ${this.config.hellhubApi.baseUrl}`);
      } else {
        logger.warn(
          `[ConfigurationManager] Invalid HELLHUB_API_BASE_URL: '${baseUrl}'. Using default ${this.config.hellhubApi.baseUrl}.`
        );
      }
    }

    this.config.hellhubApi.timeoutMs = this.readInteger(
      "HELLHUB_API_TIMEOUT_MS",
      this.config.hellhubApi.timeoutMs,
      1000,
      120000
    );

    // Identification headers are optional; the API is public
    if (process.env.X_SUPER_CLIENT) {
      this.config.hellhubApi.clientId = process.env.X_SUPER_CLIENT;
    }
    if (process.env.X_SUPER_CONTACT) {
      this.config.hellhubApi.contactEmail = process.env.X_SUPER_CONTACT;
    }

    // Retry
    this.config.retry.maxAttempts = this.readInteger(
      "HELLHUB_RETRY_MAX_ATTEMPTS",
      this.config.retry.maxAttempts,
      0,
      10
    );
    this.config.retry.initialDelayMs = this.readInteger(
      "HELLHUB_RETRY_INITIAL_DELAY_MS",
      this.config.retry.initialDelayMs,
      0,
      60000
    );

    // Cache
    if (process.env.HELLHUB_CACHE_ENABLED) {
      this.config.cache.enabled =
        process.env.HELLHUB_CACHE_ENABLED.toLowerCase() === "true";
      logger.info(
        `[ConfigurationManager] HellHub response cache enabled: ${this.config.cache.enabled}`
      );
    }
    this.config.cache.ttlSeconds = this.readInteger(
      "HELLHUB_CACHE_TTL_SECONDS",
      this.config.cache.ttlSeconds,
      1,
      86400
    );

    // MCP
    const rawLogLevel = process.env.MCP_LOG_LEVEL ?? process.env.LOG_LEVEL;
    if (rawLogLevel) {
      const logLevel = parseLogLevel(rawLogLevel);
      if (logLevel) {
        this.config.mcpConfig.logLevel = logLevel;
      } else {
        logger.warn(
          `[ConfigurationManager] Invalid log level: '${rawLogLevel}'. Using default '${this.config.mcpConfig.logLevel}'.`
        );
      }
    }
    setLogLevel(this.config.mcpConfig.logLevel);

    // Health check
    if (process.env.ENABLE_HEALTH_CHECK) {
      this.config.healthCheck.enabled =
        process.env.ENABLE_HEALTH_CHECK.toLowerCase() === "true";
    }
    this.config.healthCheck.port = this.readInteger(
      "HEALTH_CHECK_PORT",
      this.config.healthCheck.port,
      1,
      65535
    );

    logger.debug("[ConfigurationManager] Configuration loaded.");
  }

  /**
   * Reads an integer environment variable within [min, max], keeping the fallback otherwise.
   */
  private readInteger(
    envVarName: string,
    fallback: number,
    min: number,
    max: number
  ): number {
    const raw = process.env[envVarName];
    if (raw === undefined || raw.trim() === "") {
      return fallback;
    }

    const value = Number(raw);
    if (Number.isInteger(value) && value >= min && value <= max) {
      logger.info(`[ConfigurationManager] ${envVarName} set to: ${value}`);
      return value;
    }

    logger.warn(
      `[ConfigurationManager] Invalid ${envVarName}: '${raw}'. Must be an integer between ${min} and ${max}. Using default ${fallback}.`
    );
    return fallback;
  }

  private isHttpUrl(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }
}
