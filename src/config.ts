import fs from "fs";
import path from "path";
import type { LoggerPort } from "./ports/sys/LoggerPort";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";

export interface ThermostatConfig {
  minTemperature?: number;
  maxTemperature?: number;
  initialTemperature?: number;
}

export interface AppConfig {
  thermostat?: ThermostatConfig;
}

const DEFAULT_CONFIG_FILENAMES = ["devices.config.json", "config.json"];

const THERMOSTAT_KEYS = ["minTemperature", "maxTemperature", "initialTemperature"] as const;

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(
  configPath?: string,
  logger: LoggerPort = new ConsoleLogger()
): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    const resolved = path.resolve(candidate);
    if (!fs.existsSync(resolved)) continue;
    try {
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed, logger), path: resolved };
    } catch (err) {
      logger.warn(`Failed to load config from ${candidate}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { config: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeConfig(input: unknown, logger: LoggerPort): AppConfig {
  if (!isRecord(input)) {
    logger.warn("Config root must be a JSON object; ignoring it.");
    return {};
  }

  const out: AppConfig = {};
  if (input.thermostat !== undefined) {
    out.thermostat = normalizeThermostat(input.thermostat, logger);
  }
  return out;
}

function normalizeThermostat(input: unknown, logger: LoggerPort): ThermostatConfig {
  if (!isRecord(input)) {
    logger.warn('Invalid "thermostat" configuration; expected an object.');
    return {};
  }

  const out: ThermostatConfig = {};
  for (const key of THERMOSTAT_KEYS) {
    const value = input[key];
    if (value === undefined) continue;
    if (typeof value === "number" && Number.isFinite(value)) {
      out[key] = value;
      continue;
    }
    logger.warn(`Ignoring thermostat.${key}; expected a number.`, { value });
  }
  return out;
}
