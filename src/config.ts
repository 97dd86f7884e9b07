/**
 * Centralized configuration for the Unity asset MCP server.
 * Values are read once from the environment at startup.
 */
import { homedir } from "node:os";
import { join } from "node:path";

function envBool(name: string, defaultValue: boolean): boolean {
  const v = (process.env[name] ?? "").trim().toLowerCase();
  if (v === "") return defaultValue;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return defaultValue;
}

/**
 * Parse a non-negative integer environment variable, falling back to
 * `defaultValue` when unset or invalid.
 */
export function envInt(name: string, defaultValue: number): number {
  const raw = process.env[name];
  const parsed = raw != null && raw.trim() !== "" ? Number(raw) : NaN;
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : defaultValue;
}

function envString(name: string, defaultValue: string): string {
  const v = process.env[name];
  return v != null && v.trim() !== "" ? v : defaultValue;
}

export const CONFIG = Object.freeze({
  APP_NAME: "unity-asset-mcp-server",
  APP_VERSION: "0.3.0",

  // Unity Editor link
  WS_PORT: envInt("UNITY_MCP_PORT", 8080),
  COMMAND_TIMEOUT_MS: envInt("UNITY_MCP_COMMAND_TIMEOUT_MS", 60_000),

  // Remote asset downloads
  DOWNLOAD_TIMEOUT_MS: envInt("UNITY_MCP_DOWNLOAD_TIMEOUT_MS", 120_000),
  DOWNLOAD_CACHE_DIR: envString(
    "UNITY_MCP_DOWNLOAD_DIR",
    join(homedir(), ".unity_mcp_downloads")
  ),

  DEBUG: envBool("UNITY_MCP_DEBUG", false),
});
