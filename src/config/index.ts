export type { RawConfig, Config } from "./types.js";
export { DEFAULT_HOST, DEFAULT_RETRIES } from "./types.js";
export { loadRawConfig, loadConfig, normalizeConfig } from "./loader.js";
export { validateRawConfig } from "./validator.js";
