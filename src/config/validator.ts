import type { RawConfig } from "./types.js";

const KNOWN_KEYS = ["rulesetsDir", "host", "retries", "ignoreSenders"];

// Hostname without scheme or path, e.g. github.com or ghe.example.com
const HOST_PATTERN = /^[a-zA-Z0-9.-]+(:\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates the parsed config file.
 * @throws Error describing the first problem found
 */
export function validateRawConfig(
  config: unknown
): asserts config is RawConfig {
  if (!isRecord(config)) {
    throw new Error("Config must be a YAML mapping");
  }

  for (const key of Object.keys(config)) {
    if (!KNOWN_KEYS.includes(key)) {
      throw new Error(
        `Unknown config key '${key}'. Valid keys: ${KNOWN_KEYS.join(", ")}`
      );
    }
  }

  if (typeof config.rulesetsDir !== "string" || config.rulesetsDir === "") {
    throw new Error(
      "Config requires a 'rulesetsDir' field naming the directory of ruleset JSON files"
    );
  }

  if (config.host !== undefined) {
    if (typeof config.host !== "string" || !HOST_PATTERN.test(config.host)) {
      throw new Error(
        `Config 'host' must be a hostname such as github.com, got: ${JSON.stringify(config.host)}`
      );
    }
  }

  if (config.retries !== undefined) {
    if (
      typeof config.retries !== "number" ||
      !Number.isInteger(config.retries) ||
      config.retries < 0
    ) {
      throw new Error("Config 'retries' must be a non-negative integer");
    }
  }

  if (config.ignoreSenders !== undefined) {
    if (
      !Array.isArray(config.ignoreSenders) ||
      !config.ignoreSenders.every((sender) => typeof sender === "string")
    ) {
      throw new Error("Config 'ignoreSenders' must be an array of strings");
    }
  }
}
