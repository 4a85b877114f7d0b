import type { ToolEnvelope } from "../types/index.js";

export function successEnvelope<T>(data: T): ToolEnvelope<T> {
  return { status: "success", data, error: null };
}

export function errorEnvelope<T = never>(message: string): ToolEnvelope<T> {
  return { status: "error", data: null, error: message };
}
