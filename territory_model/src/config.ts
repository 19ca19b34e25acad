import { z } from "zod";
import type { AmbiguityPolicy, LocaleName } from "./types.js";
import type { LogFormat, LogThreshold } from "./logger.js";

export interface TerritoryConfig {
  defaultLocale: LocaleName;
  ambiguousNames: AmbiguityPolicy;
  logLevel: LogThreshold;
  logFormat: LogFormat;
}

const ENV_KEYS: Record<keyof TerritoryConfig, string> = {
  defaultLocale: "TERRITORY_DEFAULT_LOCALE",
  ambiguousNames: "TERRITORY_AMBIGUOUS_NAMES",
  logLevel: "LOG_LEVEL",
  logFormat: "LOG_FORMAT",
};

const ConfigSchema = z.object({
  defaultLocale: z.string().min(1).default("en"),
  ambiguousNames: z.enum(["first", "error"]).default("first"),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  logFormat: z.enum(["pretty", "json"]).default("pretty"),
});

function isConfigKey(key: PropertyKey): key is keyof TerritoryConfig {
  return typeof key === "string" && key in ENV_KEYS;
}

/** Reads the knowledge-base settings from environment variables; blank values fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TerritoryConfig {
  const read = (key: keyof TerritoryConfig): string | undefined => {
    const value = env[ENV_KEYS[key]]?.trim();
    return value ? value : undefined;
  };

  const parsed = ConfigSchema.safeParse({
    defaultLocale: read("defaultLocale"),
    ambiguousNames: read("ambiguousNames"),
    logLevel: read("logLevel")?.toLowerCase(),
    logFormat: read("logFormat"),
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = issue.path[0];
      const variable = key !== undefined && isConfigKey(key) ? ENV_KEYS[key] : String(key);
      return `${variable}: ${issue.message}`;
    });
    throw new Error(`Invalid territory configuration: ${problems.join("; ")}`);
  }
  return parsed.data;
}
