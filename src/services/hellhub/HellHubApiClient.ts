import type KeyV from "keyv";
import { z } from "zod";
import { ConfigurationManager } from "../../config/ConfigurationManager.js";
import type {
  Biome,
  Faction,
  HellHubResponse,
  PaginationParams,
  PlanetInfo,
  Statistics,
  WarInfo,
} from "../../types/index.js";
import {
  BaseError,
  HellHubClientStateError,
  HellHubEndpointUnavailableError,
  HellHubHttpError,
  HellHubNetworkError,
  HellHubResponseError,
  HellHubTimeoutError,
  ValidationError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { type RetryOptions, RetryService } from "../../utils/RetryService.js";
import {
  BiomeListResponseSchema,
  FactionListResponseSchema,
  HellHubErrorBodySchema,
  PlanetListResponseSchema,
  PlanetResponseSchema,
  StatisticsListResponseSchema,
  WarResponseSchema,
} from "./HellHubSchemas.js";

export const CAMPAIGNS_UNAVAILABLE_MESSAGE =
  "Campaigns endpoint is not available in the HellHub Collective API";

export interface HellHubApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  clientId?: string;
  contactEmail?: string;
  /** Overrides the configured retry policy */
  retry?: RetryOptions;
  /** Response cache shared between client instances; omit to disable caching */
  cache?: KeyV<unknown>;
}

/**
 * Lifetime of an open client. Closing it aborts whatever is still in flight.
 */
interface ClientSession {
  controller: AbortController;
  openedAt: number;
}

type QueryValue = string | number | undefined;

function paginationQuery({
  page,
  pageSize,
}: PaginationParams): Record<string, QueryValue> {
  return { page, pageSize };
}

/**
 * Client for the HellHub Collective API (Helldivers 2 game data).
 *
 * Requests may only be issued between `open()` and `close()`; `withSession()`
 * wraps a callback in that scope and always releases it.
 */
export class HellHubApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly clientId?: string;
  private readonly contactEmail?: string;
  private readonly retryService: RetryService;
  private readonly cache?: KeyV<unknown>;
  private session: ClientSession | null = null;

  constructor(options: HellHubApiClientOptions = {}) {
    const configManager = ConfigurationManager.getInstance();
    const apiConfig = configManager.getHellHubApiConfig();
    const retryConfig = configManager.getRetryConfig();

    this.baseUrl = (options.baseUrl ?? apiConfig.baseUrl).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? apiConfig.timeoutMs;
    this.clientId = options.clientId ?? apiConfig.clientId;
    this.contactEmail = options.contactEmail ?? apiConfig.contactEmail;
    this.cache = options.cache;
    this.retryService = new RetryService({
      maxAttempts: retryConfig.maxAttempts,
      initialDelayMs: retryConfig.initialDelayMs,
      maxDelayMs: retryConfig.maxDelayMs,
      backoffFactor: 2,
      onRetry: (error, attempt) => {
        logger.warn(
          `[HellHubApiClient] Retrying request (attempt ${attempt}): ${error instanceof Error ? error.message : String(error)}`
        );
      },
      ...options.retry,
    });
  }

  /**
   * Headers sent with every request. The API needs no authentication.
   */
  public get headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.clientId) {
      headers["X-Super-Client"] = this.clientId;
    }
    if (this.contactEmail) {
      headers["X-Super-Contact"] = this.contactEmail;
    }
    return headers;
  }

  public get isOpen(): boolean {
    return this.session !== null;
  }

  public async open(): Promise<this> {
    if (this.session) {
      throw new HellHubClientStateError("Client is already open");
    }
    this.session = { controller: new AbortController(), openedAt: Date.now() };
    logger.debug(`[HellHubApiClient] Session opened for ${this.baseUrl}`);
    return this;
  }

  public async close(): Promise<void> {
    if (!this.session) {
      return;
    }
    const { controller, openedAt } = this.session;
    this.session = null;
    controller.abort();
    logger.debug(
      `[HellHubApiClient] Session closed after ${Date.now() - openedAt}ms`
    );
  }

  /**
   * Opens the client, runs the callback and closes the client again, even on failure.
   */
  public async withSession<T>(
    fn: (client: this) => Promise<T>
  ): Promise<T> {
    await this.open();
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  public async getWarStatus(): Promise<HellHubResponse<WarInfo>> {
    logger.info("Fetching war status");
    return this.request("/war", WarResponseSchema);
  }

  public async getPlanets(
    pagination: PaginationParams = {}
  ): Promise<HellHubResponse<PlanetInfo[]>> {
    logger.info("Fetching planets", pagination);
    return this.request(
      "/planets",
      PlanetListResponseSchema,
      paginationQuery(pagination)
    );
  }

  public async getPlanetStatus(
    planetIndex: number
  ): Promise<HellHubResponse<PlanetInfo>> {
    this.requireSession();
    if (!Number.isInteger(planetIndex) || planetIndex < 0) {
      throw new ValidationError(
        `planet_index must be a non-negative integer, got ${planetIndex}`
      );
    }
    logger.info("Fetching planet status", { planetIndex });
    return this.request(`/planets/${planetIndex}`, PlanetResponseSchema);
  }

  public async getStatistics(
    pagination: PaginationParams = {}
  ): Promise<HellHubResponse<Statistics[]>> {
    logger.info("Fetching statistics", pagination);
    return this.request(
      "/statistics",
      StatisticsListResponseSchema,
      paginationQuery(pagination)
    );
  }

  public async getBiomes(
    pagination: PaginationParams = {}
  ): Promise<HellHubResponse<Biome[]>> {
    logger.info("Fetching biomes", pagination);
    return this.request(
      "/biomes",
      BiomeListResponseSchema,
      paginationQuery(pagination)
    );
  }

  public async getFactions(
    pagination: PaginationParams = {}
  ): Promise<HellHubResponse<Faction[]>> {
    logger.info("Fetching factions", pagination);
    return this.request(
      "/factions",
      FactionListResponseSchema,
      paginationQuery(pagination)
    );
  }

  /**
   * The HellHub Collective API exposes no campaigns endpoint; this always fails.
   */
  public async getCampaignInfo(): Promise<never> {
    this.requireSession();
    logger.info("Campaign info not available in HellHub API");
    throw new HellHubEndpointUnavailableError(
      "/campaigns",
      CAMPAIGNS_UNAVAILABLE_MESSAGE
    );
  }

  private requireSession(): ClientSession {
    if (!this.session) {
      throw new HellHubClientStateError(
        "Client not initialized. Open it with open() or withSession() before making requests."
      );
    }
    return this.session;
  }

  private buildUrl(path: string, query: Record<string, QueryValue>): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const search = params.toString();
    return `${this.baseUrl}${path}${search ? `?${search}` : ""}`;
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    query: Record<string, QueryValue> = {}
  ): Promise<z.infer<S>> {
    const session = this.requireSession();
    const url = this.buildUrl(path, query);
    // Only unpaginated requests are cached
    const cacheable = Object.values(query).every((value) => value === undefined);

    try {
      return await this.getCachedOrFetch(cacheable ? url : null, schema, async () =>
        this.validate(
          path,
          schema,
          await this.retryService.execute(() =>
            this.fetchJson(url, path, session)
          )
        )
      );
    } catch (error) {
      logger.error(`Failed to fetch ${path}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private validate<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    raw: unknown
  ): z.infer<S> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new HellHubResponseError(
        `Unexpected response shape from ${path}: ${parsed.error.issues
          .slice(0, 3)
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
        parsed.error.issues
      );
    }
    return parsed.data;
  }

  /**
   * Only values that `fetchFn` returned, which are already validated, reach the cache.
   */
  private async getCachedOrFetch<S extends z.ZodTypeAny>(
    cacheKey: string | null,
    schema: S,
    fetchFn: () => Promise<z.infer<S>>
  ): Promise<z.infer<S>> {
    if (this.cache && cacheKey) {
      const cached = schema.safeParse(await this.cache.get(cacheKey));
      if (cached.success) {
        logger.debug(`Cache hit for ${cacheKey}`);
        return cached.data;
      }
    }

    const freshValue = await fetchFn();

    if (this.cache && cacheKey) {
      await this.cache.set(cacheKey, freshValue);
    }
    return freshValue;
  }

  /**
   * Issues one GET with a timeout tied to the session, and parses the JSON body.
   */
  private async fetchJson(
    url: string,
    path: string,
    session: ClientSession
  ): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const abortOnClose = () => controller.abort();
    session.controller.signal.addEventListener("abort", abortOnClose, {
      once: true,
    });

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal,
      });
      const body = await response.text();

      if (!response.ok) {
        throw new HellHubHttpError(
          path,
          response.status,
          response.statusText,
          this.extractApiMessage(body)
        );
      }

      try {
        return JSON.parse(body);
      } catch (error) {
        throw new HellHubResponseError(
          `HellHub API returned a non-JSON body for ${path}`,
          { cause: error instanceof Error ? error.message : String(error) }
        );
      }
    } catch (error) {
      if (error instanceof BaseError) {
        throw error;
      }
      if (timedOut) {
        throw new HellHubTimeoutError(path, this.timeoutMs);
      }
      if (session.controller.signal.aborted) {
        throw new HellHubClientStateError(
          `Request to ${path} was aborted because the client was closed`
        );
      }
      throw new HellHubNetworkError(
        `HellHub API request to ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    } finally {
      clearTimeout(timeoutId);
      session.controller.signal.removeEventListener("abort", abortOnClose);
    }
  }

  private extractApiMessage(body: string): string | undefined {
    if (!body) {
      return undefined;
    }
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      return undefined;
    }
    const parsed = HellHubErrorBodySchema.safeParse(json);
    if (!parsed.success) {
      return undefined;
    }
    return parsed.data.message ?? parsed.data.error;
  }
}
