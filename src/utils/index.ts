// Export all utility functions and modules from this barrel file
export * from "./logger.js";
export * from "./errors.js";
export * from "./envelope.js";
export * from "./RetryService.js";
export * from "./healthCheck.js";
