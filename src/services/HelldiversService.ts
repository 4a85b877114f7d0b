import KeyV from "keyv";
import { ConfigurationManager } from "../config/ConfigurationManager.js";
import type {
  Biome,
  Faction,
  HellHubResponse,
  PaginationParams,
  PlanetInfo,
  Statistics,
  ToolEnvelope,
  WarInfo,
} from "../types/index.js";
import { errorEnvelope, successEnvelope } from "../utils/envelope.js";
import { describeError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import {
  HellHubApiClient,
  type HellHubApiClientOptions,
} from "./hellhub/HellHubApiClient.js";

export type HellHubApiClientFactory = (
  options: HellHubApiClientOptions
) => HellHubApiClient;

export interface HelldiversServiceOptions {
  /** Builds the client used for one operation; defaults to `new HellHubApiClient(options)` */
  clientFactory?: HellHubApiClientFactory;
  /** Pass `null` to disable response caching regardless of configuration */
  cache?: KeyV<unknown> | null;
}

/**
 * Operations behind the Helldivers tools.
 *
 * Each call opens its own HellHub client, runs one request inside that session
 * and reports the outcome as a {@link ToolEnvelope}. Nothing here throws.
 */
export class HelldiversService {
  private readonly clientFactory: HellHubApiClientFactory;
  private readonly cache: KeyV<unknown> | null;

  constructor(options: HelldiversServiceOptions = {}) {
    this.clientFactory =
      options.clientFactory ?? ((clientOptions) => new HellHubApiClient(clientOptions));

    if (options.cache !== undefined) {
      this.cache = options.cache;
    } else {
      const cacheConfig = ConfigurationManager.getInstance().getCacheConfig();
      this.cache = cacheConfig.enabled
        ? new KeyV<unknown>({
            namespace: "hellhub-api-cache",
            ttl: cacheConfig.ttlSeconds * 1000, // Convert to milliseconds
          })
        : null;
    }
  }

  public async getWarStatus(): Promise<ToolEnvelope<HellHubResponse<WarInfo>>> {
    return this.execute("get_war_status", (client) => client.getWarStatus());
  }

  public async getPlanets(
    pagination?: PaginationParams
  ): Promise<ToolEnvelope<HellHubResponse<PlanetInfo[]>>> {
    return this.execute("get_planets", (client) =>
      client.getPlanets(pagination)
    );
  }

  public async getPlanetStatus(
    planetIndex: number
  ): Promise<ToolEnvelope<HellHubResponse<PlanetInfo>>> {
    return this.execute("get_planet_status", (client) =>
      client.getPlanetStatus(planetIndex)
    );
  }

  public async getStatistics(
    pagination?: PaginationParams
  ): Promise<ToolEnvelope<HellHubResponse<Statistics[]>>> {
    return this.execute("get_statistics", (client) =>
      client.getStatistics(pagination)
    );
  }

  public async getCampaignInfo(): Promise<ToolEnvelope<never>> {
    return this.execute("get_campaign_info", (client) =>
      client.getCampaignInfo()
    );
  }

  public async getBiomes(
    pagination?: PaginationParams
  ): Promise<ToolEnvelope<HellHubResponse<Biome[]>>> {
    return this.execute("get_biomes", (client) => client.getBiomes(pagination));
  }

  public async getFactions(
    pagination?: PaginationParams
  ): Promise<ToolEnvelope<HellHubResponse<Faction[]>>> {
    return this.execute("get_factions", (client) =>
      client.getFactions(pagination)
    );
  }

  /**
   * Releases the response cache. Call once on shutdown.
   */
  public async close(): Promise<void> {
    if (this.cache) {
      await this.cache.disconnect();
    }
  }

  private async execute<T>(
    operation: string,
    call: (client: HellHubApiClient) => Promise<T>
  ): Promise<ToolEnvelope<T>> {
    try {
      const client = this.clientFactory(
        this.cache ? { cache: this.cache } : {}
      );
      const data = await client.withSession(call);
      return successEnvelope(data);
    } catch (error: unknown) {
      const { kind, message, code } = describeError(error);
      logger.error(`[HelldiversService] ${operation} failed (${kind})`, {
        code,
        message,
      });
      return errorEnvelope(message);
    }
  }
}
