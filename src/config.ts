/**
 * urikit configuration
 *
 * All settings come from the environment. dotenv loads here so that any
 * module importing `config` sees values from a local .env file.
 */

import { config as dotenvConfig } from "dotenv";
dotenvConfig();

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface UriConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  logConsole: boolean;
  /** Default allow-list for validateSchemeOneOf when the caller passes none */
  allowedSchemes: readonly string[];
}

const DEFAULT_ALLOWED_SCHEMES = ["http", "https"];

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === raw?.trim().toLowerCase());
  return level ?? "info";
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return fallback;
  const items = raw.split(",").map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): UriConfig {
  return {
    nodeEnv: env.NODE_ENV || "development",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logConsole: env.LOG_CONSOLE !== "false",
    allowedSchemes: parseList(env.URI_ALLOWED_SCHEMES, DEFAULT_ALLOWED_SCHEMES),
  };
}

export const config: UriConfig = loadConfig();
