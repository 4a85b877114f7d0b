export * from "./BaseToolSchema.js";
export * from "./helldiversToolParams.js";
