import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { parse, stringify } from "ini";
import { DEFAULT_DISCORD_CLIENT_ID } from "./constants";
import { ConfigError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";

export type MediaType = "Movies" | "Shows" | "Music";

export const MEDIA_TYPES: readonly MediaType[] = ["Movies", "Shows", "Music"];

export interface RpcConfig {
  jellyfinHost: string;
  jellyfinApiKey: string;
  jellyfinUsername: string;
  tmdbApiKey: string | null;
  discordClientId: string;
  posterLanguages: string[];
  mediaTypes: MediaType[];
  seasonOverSeries: boolean;
  releaseOverGroup: boolean;
  findBestMatch: boolean;
  showWhenPaused: boolean;
  showServerName: boolean;
  showJellyfinIcon: boolean;
  connectOnLaunch: boolean;
  logLevel: LogLevel;
  refreshRate: number;
}

export type IniValue = string | number | boolean;

const SECTION = "DEFAULT";

// Older releases used the short key names
const LEGACY_ALIASES: Record<string, string> = {
  API_TOKEN: "JELLYFIN_API_KEY",
  USERNAME: "JELLYFIN_USERNAME",
};

const TRUE_VALUES = new Set(["1", "yes", "true", "on"]);
const FALSE_VALUES = new Set(["0", "no", "false", "off"]);

type Section = Map<string, string | boolean>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(text: string): Section {
  const parsed: Record<string, unknown> = parse(text);
  const section: Section = new Map();

  const collect = (entries: Record<string, unknown>) => {
    for (const [key, value] of Object.entries(entries)) {
      if (typeof value === "string" || typeof value === "boolean") {
        section.set(key.toUpperCase(), value);
      }
    }
  };

  // Keys above the first section header count as defaults too
  collect(parsed);
  const defaults = parsed[SECTION];
  if (isRecord(defaults)) {
    collect(defaults);
  }

  for (const [legacy, current] of Object.entries(LEGACY_ALIASES)) {
    const value = section.get(legacy);
    if (typeof value === "string" && value) {
      section.set(current, value);
    }
  }
  return section;
}

export function parseBoolean(key: string, value: string | boolean | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;

  const normalized = value.trim().toLowerCase();
  if (normalized === "") return fallback;
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(`Not a boolean in INI Config: ${key} = ${value}`);
}

/** Splits on commas and whitespace, dropping empty entries. */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/[\s,]+/).filter((entry) => entry.length > 0);
}

export function parseMediaTypes(value: string | undefined): MediaType[] {
  if (value === undefined) return [...MEDIA_TYPES];
  const requested = value.split(",").map((entry) => entry.trim().toLowerCase());
  return MEDIA_TYPES.filter((type) => requested.includes(type.toLowerCase()));
}

export function parseRefreshRate(value: string | number | undefined, fallback = 5): number {
  if (value === undefined || value === "") return fallback;
  const seconds = typeof value === "number" ? value : Number.parseInt(String(value).replace(/s$/i, ""), 10);
  if (!Number.isFinite(seconds)) {
    throw new ConfigError(`Not an integer in INI Config: REFRESH_RATE = ${value}`);
  }
  return Math.max(1, Math.trunc(seconds));
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || "INFO").trim().toUpperCase();
  const normalized = level === "WARN" ? "WARNING" : level;
  if (!isLogLevel(normalized)) {
    throw new ConfigError(`Unknown LOG_LEVEL in INI Config: ${value}`);
  }
  return normalized;
}

export function loadConfig(iniPath: string): RpcConfig {
  if (!existsSync(iniPath)) {
    throw new ConfigError(`INI Config Not Found: ${iniPath}`);
  }
  const section = readSection(readFileSync(iniPath, "utf-8"));

  const text = (key: string): string | undefined => {
    const value = section.get(key);
    if (value === undefined) return undefined;
    return String(value).trim();
  };
  const required = (key: string): string => {
    const value = text(key);
    if (!value) {
      throw new ConfigError(`Missing Key in INI Config: '${key}'`);
    }
    return value;
  };
  const flag = (key: string, fallback: boolean) => parseBoolean(key, section.get(key), fallback);

  return {
    jellyfinHost: required("JELLYFIN_HOST").replace(/\/+$/, ""),
    jellyfinApiKey: required("JELLYFIN_API_KEY"),
    jellyfinUsername: required("JELLYFIN_USERNAME"),
    tmdbApiKey: text("TMDB_API_KEY") || null,
    discordClientId: text("DISCORD_CLIENT_ID") || DEFAULT_DISCORD_CLIENT_ID,
    posterLanguages: parseList(text("POSTER_LANGUAGES")),
    mediaTypes: parseMediaTypes(text("MEDIA_TYPES")),
    seasonOverSeries: flag("SEASON_OVER_SERIES", true),
    releaseOverGroup: flag("RELEASE_OVER_GROUP", true),
    findBestMatch: flag("FIND_BEST_MATCH", true),
    showWhenPaused: flag("SHOW_WHEN_PAUSED", true),
    showServerName: flag("SHOW_SERVER_NAME", false),
    showJellyfinIcon: flag("SHOW_JELLYFIN_ICON", false),
    connectOnLaunch: flag("CONNECT_ON_LAUNCH", true),
    logLevel: parseLogLevel(text("LOG_LEVEL")),
    refreshRate: parseRefreshRate(text("REFRESH_RATE")),
  };
}

/**
 * Merges `changes` into the `[DEFAULT]` section of the file, keeping every
 * other key and section as it was. Creates the file when it is missing.
 */
export function saveConfig(iniPath: string, changes: Record<string, IniValue>): void {
  const parsed: Record<string, unknown> = existsSync(iniPath) ? parse(readFileSync(iniPath, "utf-8")) : {};
  const current = parsed[SECTION];
  const defaults: Record<string, unknown> = isRecord(current) ? { ...current } : {};

  for (const [key, value] of Object.entries(changes)) {
    defaults[key.toUpperCase()] = typeof value === "string" ? value : String(value);
  }
  parsed[SECTION] = defaults;

  writeFileSync(iniPath, stringify(parsed), "utf-8");
}
