import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parse } from "yaml";
import { validateRawConfig } from "./validator.js";
import {
  DEFAULT_HOST,
  DEFAULT_RETRIES,
  type Config,
  type RawConfig,
} from "./types.js";

/**
 * Load and validate the raw config without applying defaults.
 */
export function loadRawConfig(filePath: string): RawConfig {
  const content = readFileSync(filePath, "utf-8");

  let rawConfig: unknown;
  try {
    rawConfig = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse YAML config at ${filePath}: ${message}`);
  }

  validateRawConfig(rawConfig);
  return rawConfig;
}

/**
 * Applies defaults and resolves `rulesetsDir` against the config file's
 * directory.
 */
export function normalizeConfig(raw: RawConfig, configDir: string): Config {
  return {
    rulesetsDir: resolve(configDir, raw.rulesetsDir),
    host: raw.host ?? DEFAULT_HOST,
    retries: raw.retries ?? DEFAULT_RETRIES,
    ignoreSenders: raw.ignoreSenders ?? [],
  };
}

export function loadConfig(filePath: string): Config {
  return normalizeConfig(loadRawConfig(filePath), dirname(resolve(filePath)));
}
