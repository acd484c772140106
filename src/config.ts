import { readFileSync, existsSync } from "fs";
import { homedir, availableParallelism } from "os";
import { join } from "path";
import yaml from "yaml";
import dotenv from "dotenv";
import { isFrequency } from "./types/index.ts";
import type { Config, ConfigOverrides, Frequency } from "./types/index.ts";

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_PATH = join(homedir(), ".pricekit", "config.yml");
export const DEFAULT_TOKEN_FILE = join(homedir(), ".pricekit", "tiingo_token");

export const TIINGO_DAILY_URL = "https://api.tiingo.com/tiingo/daily";
export const TIINGO_API_URL = "https://api.tiingo.com";

function positiveInt(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function frequency(value: unknown): Frequency | undefined {
  return isFrequency(value) ? value : undefined;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function readConfigFile(path: string): ConfigOverrides {
  if (!existsSync(path)) return {};

  try {
    const parsed: ConfigOverrides | null = yaml.parse(
      readFileSync(path, "utf-8")
    );
    return parsed && typeof parsed === "object" ? parsed : {};
  } catch (error) {
    console.warn(`Failed to load config from ${path}:`, error);
    return {};
  }
}

export function loadConfig(
  configPath?: string,
  overrides?: ConfigOverrides
): Config {
  const path = configPath || DEFAULT_CONFIG_PATH;
  const fileConfig = readConfigFile(path);

  const fileTiingo = fileConfig.sources?.tiingo;
  const fileDefaults = fileConfig.defaults;
  const tiingo = overrides?.sources?.tiingo;
  const defaults = overrides?.defaults;

  // Merge file config with environment variables and overrides
  return {
    sources: {
      tiingo: {
        tokenFile:
          nonEmpty(tiingo?.tokenFile) ||
          nonEmpty(process.env.TIINGO_TOKEN_FILE) ||
          nonEmpty(fileTiingo?.tokenFile) ||
          DEFAULT_TOKEN_FILE,
        baseUrl:
          nonEmpty(tiingo?.baseUrl) ||
          nonEmpty(fileTiingo?.baseUrl) ||
          TIINGO_DAILY_URL,
        testUrl:
          nonEmpty(tiingo?.testUrl) ||
          nonEmpty(fileTiingo?.testUrl) ||
          TIINGO_API_URL,
        timeout:
          positiveInt(tiingo?.timeout) ||
          positiveInt(fileTiingo?.timeout) ||
          30000,
      },
    },
    defaults: {
      startDate:
        nonEmpty(defaults?.startDate) ||
        nonEmpty(fileDefaults?.startDate) ||
        "2000-01-01",
      frequency:
        frequency(defaults?.frequency) ||
        frequency(fileDefaults?.frequency) ||
        "daily",
      parallel:
        positiveInt(defaults?.parallel) ||
        positiveInt(fileDefaults?.parallel) ||
        availableParallelism(),
      adjCloseOnly:
        bool(defaults?.adjCloseOnly) ?? bool(fileDefaults?.adjCloseOnly) ?? true,
    },
  };
}

// Process-wide instance, read once at startup
const configInstance: Config = loadConfig();

export const getConfig = () => configInstance;
