export * from "./HelldiversService.js";
export * from "./hellhub/HellHubApiClient.js";
export * from "./hellhub/HellHubSchemas.js";
