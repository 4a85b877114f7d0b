import { z } from "zod";
import { createToolSchema } from "./BaseToolSchema.js";

// --- Shared parameters ---

export const PageSchema = z
  .number()
  .int()
  .min(1)
  .optional()
  .describe("Optional 1-based page number for paginated results.");

export const PageSizeSchema = z
  .number()
  .int()
  .min(1)
  .max(100)
  .optional()
  .describe("Optional number of records per page (1-100).");

const PAGINATION_PARAMS = {
  page: PageSchema,
  page_size: PageSizeSchema,
};

// --- Tool definitions ---

export const GetWarStatusTool = createToolSchema(
  "get_war_status",
  "Get the current Helldivers 2 war status: war id, index, start and end dates and the current in-game time.",
  {}
);

export const GetPlanetsTool = createToolSchema(
  "get_planets",
  "List the planets of the Helldivers 2 galaxy with their sector, position, biome, hazards and liberation status.",
  PAGINATION_PARAMS
);

export const GetPlanetStatusTool = createToolSchema(
  "get_planet_status",
  "Get the status of a single Helldivers 2 planet by its index.",
  {
    planet_index: z
      .number()
      .int()
      .min(0)
      .describe("Index of the planet to look up (non-negative integer)."),
  }
);

export const GetStatisticsTool = createToolSchema(
  "get_statistics",
  "Get global Helldivers 2 statistics: missions won and lost, kills per faction, accuracy, deaths and more.",
  PAGINATION_PARAMS
);

export const GetCampaignInfoTool = createToolSchema(
  "get_campaign_info",
  "Get information about active Helldivers 2 campaigns. The HellHub Collective API does not currently provide this data.",
  {}
);

export const GetBiomesTool = createToolSchema(
  "get_biomes",
  "List the biomes found on Helldivers 2 planets.",
  PAGINATION_PARAMS
);

export const GetFactionsTool = createToolSchema(
  "get_factions",
  "List the factions taking part in the Helldivers 2 war.",
  PAGINATION_PARAMS
);

export const HELLDIVERS_TOOL_NAMES = [
  GetWarStatusTool.TOOL_NAME,
  GetPlanetsTool.TOOL_NAME,
  GetPlanetStatusTool.TOOL_NAME,
  GetStatisticsTool.TOOL_NAME,
  GetCampaignInfoTool.TOOL_NAME,
  GetBiomesTool.TOOL_NAME,
  GetFactionsTool.TOOL_NAME,
] as const;
