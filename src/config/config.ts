// pattern: Imperative Shell

import * as TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.ts";

const DEFAULT_CONFIG_FILE = "config.toml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = parsed[name];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Load configuration from a TOML file, apply environment overrides, validate.
 * An explicit path must exist; without one, a missing `config.toml` means defaults.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_FILE);
  const parsed: Record<string, unknown> =
    configPath !== undefined || existsSync(resolvedPath)
      ? TOML.parse(readFileSync(resolvedPath, "utf-8"))
      : {};

  // Environment variable overrides for secrets and deployment settings
  const envOverrides: Record<string, unknown> = {};

  if (process.env["GITHUB_TOKEN"] || process.env["GITHUB_BASE_URL"]) {
    const githubObj = section(parsed, "github");
    githubObj["token"] = process.env["GITHUB_TOKEN"] || githubObj["token"];
    githubObj["base_url"] = process.env["GITHUB_BASE_URL"] || githubObj["base_url"];
    envOverrides["github"] = githubObj;
  }

  if (process.env["PORT"]) {
    const serverObj = section(parsed, "server");
    serverObj["port"] = Number(process.env["PORT"]);
    envOverrides["server"] = serverObj;
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}
