/**
 * Tool Registration Index
 */
export * from "./ToolRegistry.js";
export * from "./ToolAdapter.js";
export * from "./registerAllTools.js";
