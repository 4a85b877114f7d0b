// Using vitest globals - see vitest.config.ts globals: true
import { z } from "zod";
import {
  HellHubErrorBodySchema,
  PlanetInfoSchema,
  PlanetListResponseSchema,
  StatisticsSchema,
  WarInfoSchema,
  hellhubResponseSchema,
} from "../../../../src/services/hellhub/HellHubSchemas.js";
import {
  paginationFixture,
  planetFixture,
  statisticsFixture,
  warFixture,
} from "../../../utils/hellhub-fixtures.js";

describe("HellHubSchemas", () => {
  describe("WarInfoSchema", () => {
    it("should accept a war record", () => {
      expect(WarInfoSchema.parse(warFixture)).toEqual(warFixture);
    });

    it("should accept date-times with an offset", () => {
      const result = WarInfoSchema.safeParse({
        ...warFixture,
        time: "2024-03-10T09:00:00+01:00",
      });

      expect(result.success).toBe(true);
    });

    it("should reject dates that are not ISO date-times", () => {
      const result = WarInfoSchema.safeParse({
        ...warFixture,
        startDate: "23/01/2024",
      });

      expect(result.success).toBe(false);
    });

    it("should keep fields it does not know", () => {
      const parsed = WarInfoSchema.parse({ ...warFixture, season: 3 });

      expect(parsed.season).toBe(3);
    });
  });

  describe("PlanetInfoSchema", () => {
    it("should default the biome and hazards", () => {
      const parsed = PlanetInfoSchema.parse({ index: 4, name: "Orrin Test" });

      expect(parsed).toEqual({
        index: 4,
        name: "Orrin Test",
        biome: {},
        hazards: [],
      });
    });

    it("should allow a missing status", () => {
      expect(PlanetInfoSchema.parse({ ...planetFixture, status: null }).status).toBeNull();
    });

    it("should require an integer index", () => {
      expect(
        PlanetInfoSchema.safeParse({ ...planetFixture, index: 2.5 }).success
      ).toBe(false);
    });
  });

  describe("StatisticsSchema", () => {
    it("should require every counter", () => {
      const { deaths: _deaths, ...withoutDeaths } = statisticsFixture;

      expect(StatisticsSchema.safeParse(statisticsFixture).success).toBe(true);
      expect(StatisticsSchema.safeParse(withoutDeaths).success).toBe(false);
    });
  });

  describe("hellhubResponseSchema", () => {
    it("should wrap a record schema in the response envelope", () => {
      const schema = hellhubResponseSchema(z.object({ id: z.number() }));

      expect(schema.parse({ data: { id: 1 }, error: null })).toEqual({
        data: { id: 1 },
        error: null,
      });
      expect(schema.safeParse({ error: "missing data" }).success).toBe(false);
    });

    it("should validate the pagination block of list responses", () => {
      const parsed = PlanetListResponseSchema.parse({
        data: [planetFixture],
        pagination: paginationFixture,
      });

      expect(parsed.pagination).toEqual(paginationFixture);
      expect(
        PlanetListResponseSchema.safeParse({
          data: [],
          pagination: { page: "1" },
        }).success
      ).toBe(false);
    });
  });

  describe("HellHubErrorBodySchema", () => {
    it("should read the API error body", () => {
      expect(
        HellHubErrorBodySchema.parse({
          error: "Not Found",
          message: "No planet with index 999",
          statusCode: 404,
        })
      ).toEqual({
        error: "Not Found",
        message: "No planet with index 999",
        statusCode: 404,
      });
    });
  });
});
