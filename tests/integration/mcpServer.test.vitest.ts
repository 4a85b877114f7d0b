// Using vitest globals - see vitest.config.ts globals: true
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Mock } from "vitest";
import { createServer } from "../../src/createServer.js";
import { HelldiversService } from "../../src/services/HelldiversService.js";
import { HellHubApiClient } from "../../src/services/hellhub/HellHubApiClient.js";
import {
  TEST_BASE_URL,
  jsonResponse,
  planetFixture,
  requestedUrl,
  warFixture,
} from "../utils/hellhub-fixtures.js";

describe("MCP server over an in-memory transport", () => {
  let server: McpServer;
  let client: Client;
  let fetchMock: Mock<typeof fetch>;

  beforeEach(async () => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => {});

    const helldiversService = new HelldiversService({
      cache: null,
      clientFactory: (options) =>
        new HellHubApiClient({
          ...options,
          baseUrl: TEST_BASE_URL,
          retry: { maxAttempts: 0 },
        }),
    });
    ({ server } = createServer({ helldiversService }));

    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    client = new Client({ name: "integration-test-client", version: "1.0.0" });
    await Promise.all([
      server.connect(serverTransport),
      client.connect(clientTransport),
    ]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("should list every Helldivers tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "get_biomes",
      "get_campaign_info",
      "get_factions",
      "get_planet_status",
      "get_planets",
      "get_statistics",
      "get_war_status",
    ]);
    const planetStatus = tools.find((tool) => tool.name === "get_planet_status");
    expect(planetStatus?.inputSchema.required).toEqual(["planet_index"]);
  });

  it("should return the war status envelope", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ data: warFixture, error: null })
    );

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: "get_war_status", arguments: {} })
    );

    expect(requestedUrl(fetchMock)).toBe(`${TEST_BASE_URL}/war`);
    expect(result.isError).toBeFalsy();
    expect(result.content).toHaveLength(1);
    const [block] = result.content;
    expect(block.type).toBe("text");
    expect(block.type === "text" ? JSON.parse(block.text) : null).toEqual({
      status: "success",
      data: { data: warFixture, error: null },
      error: null,
    });
  });

  it("should look up a planet by index", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: planetFixture }));

    const result = CallToolResultSchema.parse(
      await client.callTool({
        name: "get_planet_status",
        arguments: { planet_index: 0 },
      })
    );

    expect(requestedUrl(fetchMock)).toBe(`${TEST_BASE_URL}/planets/0`);
    const [block] = result.content;
    expect(block.type === "text" ? JSON.parse(block.text).data.data : null).toEqual(
      planetFixture
    );
  });

  it("should report API failures in the envelope", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { error: "Not Found", message: "No planet with index 999" },
        404,
        "Not Found"
      )
    );

    const result = CallToolResultSchema.parse(
      await client.callTool({
        name: "get_planet_status",
        arguments: { planet_index: 999 },
      })
    );

    expect(result.isError).toBe(true);
    const [block] = result.content;
    expect(block.type === "text" ? JSON.parse(block.text) : null).toEqual({
      status: "error",
      data: null,
      error: "Resource not found at /planets/999: No planet with index 999",
    });
  });

  it("should answer get_campaign_info without calling the API", async () => {
    const result = CallToolResultSchema.parse(
      await client.callTool({ name: "get_campaign_info", arguments: {} })
    );

    expect(result.isError).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should reject invalid arguments before calling the API", async () => {
    const rejected = await client
      .callTool({ name: "get_planet_status", arguments: { planet_index: -1 } })
      .then(
        (result) => CallToolResultSchema.parse(result).isError === true,
        () => true
      );

    expect(rejected).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should reject unknown tools", async () => {
    const rejected = await client
      .callTool({ name: "get_galactic_war_effects", arguments: {} })
      .then(
        (result) => CallToolResultSchema.parse(result).isError === true,
        () => true
      );

    expect(rejected).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
