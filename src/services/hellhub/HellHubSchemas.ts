import { z } from "zod";

/**
 * Validation schemas for HellHub Collective API responses.
 * Objects are passthrough: fields the API adds later are kept, not stripped.
 */

const IsoDateTime = z.string().datetime({ offset: true });

export const PaginationInfoSchema = z
  .object({
    page: z.number().int(),
    pageSize: z.number().int(),
    pageCount: z.number().int(),
    total: z.number().int(),
  })
  .passthrough();

export const WarInfoSchema = z
  .object({
    id: z.number().int(),
    index: z.number().int(),
    startDate: IsoDateTime,
    endDate: IsoDateTime,
    time: IsoDateTime,
    createdAt: IsoDateTime,
    updatedAt: IsoDateTime,
  })
  .passthrough();

export const PlanetInfoSchema = z
  .object({
    index: z.number().int(),
    name: z.string(),
    sector: z.string().optional(),
    position: z.record(z.number()).optional(),
    biome: z.record(z.unknown()).default({}),
    hazards: z.array(z.record(z.unknown())).default([]),
    status: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export const StatisticsSchema = z
  .object({
    id: z.number().int(),
    missionsWon: z.number().int(),
    missionsLost: z.number().int(),
    missionTime: z.number().int(),
    bugKills: z.number().int(),
    automatonKills: z.number().int(),
    illuminateKills: z.number().int(),
    bulletsFired: z.number().int(),
    bulletsHit: z.number().int(),
    timePlayed: z.number().int(),
    deaths: z.number().int(),
    revives: z.number().int(),
    friendlyKills: z.number().int(),
    missionSuccessRate: z.number().int(),
    accuracy: z.number().int(),
    createdAt: IsoDateTime,
    updatedAt: IsoDateTime,
  })
  .passthrough();

export const CampaignInfoSchema = z
  .object({
    id: z.number().int(),
    planet: z.number().int(),
    type: z.number().int(),
    count: z.number().int(),
    createdAt: IsoDateTime,
    updatedAt: IsoDateTime,
  })
  .passthrough();

export const BiomeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string().optional(),
  })
  .passthrough();

export const FactionSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
  })
  .passthrough();

/**
 * Body the API sends alongside non-2xx statuses.
 */
export const HellHubErrorBodySchema = z
  .object({
    error: z.string(),
    message: z.string().optional(),
    statusCode: z.number().int().optional(),
  })
  .passthrough();

/**
 * Wraps a record schema in the API's standard `{ data, error, pagination }` envelope.
 */
export function hellhubResponseSchema<T extends z.ZodTypeAny>(dataSchema: T) {
  return z
    .object({
      data: dataSchema,
      error: z.string().nullable().optional(),
      pagination: PaginationInfoSchema.optional(),
    })
    .passthrough();
}

export const WarResponseSchema = hellhubResponseSchema(WarInfoSchema);
export const PlanetResponseSchema = hellhubResponseSchema(PlanetInfoSchema);
export const PlanetListResponseSchema = hellhubResponseSchema(
  z.array(PlanetInfoSchema)
);
export const StatisticsListResponseSchema = hellhubResponseSchema(
  z.array(StatisticsSchema)
);
export const BiomeListResponseSchema = hellhubResponseSchema(
  z.array(BiomeSchema)
);
export const FactionListResponseSchema = hellhubResponseSchema(
  z.array(FactionSchema)
);

export type PaginationInfo = z.infer<typeof PaginationInfoSchema>;
export type WarInfo = z.infer<typeof WarInfoSchema>;
export type PlanetInfo = z.infer<typeof PlanetInfoSchema>;
export type Statistics = z.infer<typeof StatisticsSchema>;
export type CampaignInfo = z.infer<typeof CampaignInfoSchema>;
export type Biome = z.infer<typeof BiomeSchema>;
export type Faction = z.infer<typeof FactionSchema>;
export type HellHubErrorBody = z.infer<typeof HellHubErrorBodySchema>;

export interface HellHubResponse<T> {
  data: T;
  error?: string | null;
  pagination?: PaginationInfo;
}
