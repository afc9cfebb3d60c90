// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.js";

const ENV_OVERRIDES: ReadonlyArray<readonly [string, string]> = [
  ["IGLOO_COMMUNITY", "community"],
  ["IGLOO_COMMUNITY_KEY", "community_key"],
  ["IGLOO_APP_ID", "app_id"],
  ["IGLOO_APP_PASS", "app_pass"],
  ["IGLOO_USERNAME", "username"],
  ["IGLOO_PASSWORD", "password"],
];

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed = TOML.parse(raw);

  // Environment variable overrides for credentials and the community address
  const iglooObj = asRecord(parsed["igloo"]);
  for (const [envName, key] of ENV_OVERRIDES) {
    const value = process.env[envName];
    if (value) {
      iglooObj[key] = value;
    }
  }

  const merged = { ...parsed, igloo: iglooObj };
  return AppConfigSchema.parse(merged);
}

export type { AppConfig };
