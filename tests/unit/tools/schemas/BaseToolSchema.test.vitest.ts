// Using vitest globals - see vitest.config.ts globals: true
import { z } from "zod";
import {
  createToolSchema,
  type ToolParams,
} from "../../../../src/tools/schemas/BaseToolSchema.js";

describe("BaseToolSchema", () => {
  describe("createToolSchema", () => {
    const lookupParams = {
      planet_index: z.number().int().min(0),
      verbose: z.boolean().optional(),
    };

    it("should keep the name, description and raw shape together", () => {
      const definition = createToolSchema(
        "lookup_planet",
        "Looks up a planet",
        lookupParams
      );

      expect(definition.TOOL_NAME).toBe("lookup_planet");
      expect(definition.TOOL_DESCRIPTION).toBe("Looks up a planet");
      expect(definition.TOOL_PARAMS).toBe(lookupParams);
      expect(Object.keys(definition.toolSchema.shape)).toEqual([
        "planet_index",
        "verbose",
      ]);
    });

    it("should validate arguments against the shape", () => {
      const { toolSchema } = createToolSchema(
        "lookup_planet",
        "Looks up a planet",
        lookupParams
      );

      expect(toolSchema.safeParse({ planet_index: 3 }).success).toBe(true);
      expect(toolSchema.safeParse({}).success).toBe(false);
      expect(toolSchema.safeParse({ planet_index: -1 }).success).toBe(false);
      expect(
        toolSchema.safeParse({ planet_index: 3, verbose: "yes" }).success
      ).toBe(false);
    });

    it("should accept an empty shape", () => {
      const { toolSchema } = createToolSchema("ping", "No arguments", {});

      expect(toolSchema.parse({})).toEqual({});
    });

    it("should infer the argument type from the definition", () => {
      const definition = createToolSchema(
        "lookup_planet",
        "Looks up a planet",
        lookupParams
      );
      const args: ToolParams<typeof definition> = definition.toolSchema.parse({
        planet_index: 12,
      });

      expect(args.planet_index).toBe(12);
      expect(args.verbose).toBeUndefined();
    });
  });
});
