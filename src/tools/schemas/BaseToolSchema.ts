/**
 * Base Tool Schema Pattern
 *
 * Every tool parameter definition is built with createToolSchema so that the
 * name, description, raw zod shape and full object schema travel together.
 */
import { z } from "zod";

/**
 * Interface that defines the standard exports for all tool parameter definitions
 */
export interface ToolSchemaDefinition<T extends z.ZodRawShape> {
  /**
   * The tool name used for registration
   */
  TOOL_NAME: string;

  /**
   * The tool description
   */
  TOOL_DESCRIPTION: string;

  /**
   * The tool parameters as a raw zod shape for direct use with McpServer.tool()
   */
  TOOL_PARAMS: T;

  /**
   * Complete zod schema for validation (z.object(TOOL_PARAMS))
   */
  toolSchema: z.ZodObject<T>;
}

/**
 * Parameter type of a tool derived from its schema definition
 */
export type ToolParams<D> =
  D extends ToolSchemaDefinition<infer T> ? z.infer<z.ZodObject<T>> : never;

/**
 * Helper function to create a standardized tool schema definition
 */
export function createToolSchema<T extends z.ZodRawShape>(
  name: string,
  description: string,
  params: T
): ToolSchemaDefinition<T> {
  return {
    TOOL_NAME: name,
    TOOL_DESCRIPTION: description,
    TOOL_PARAMS: params,
    toolSchema: z.object(params),
  };
}
