import { readdirSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";
import { DecodeError, ReadError, errorMessage } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import type {
  BypassActor,
  JsonObject,
  JsonValue,
  RulesetDocument,
  RulesetEnforcement,
  RulesetRule,
  RulesetTarget,
} from "./types.js";

const VALID_ENFORCEMENT_LEVELS: RulesetEnforcement[] = [
  "active",
  "disabled",
  "evaluate",
];
const VALID_TARGETS: RulesetTarget[] = ["branch", "tag", "push"];

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEnforcement(value: JsonValue): value is RulesetEnforcement {
  return VALID_ENFORCEMENT_LEVELS.some((level) => level === value);
}

function isTarget(value: JsonValue): value is RulesetTarget {
  return VALID_TARGETS.some((target) => target === value);
}

function decodeRule(value: JsonValue, context: string): RulesetRule {
  if (!isObject(value)) {
    throw new DecodeError(`${context}: rule must be an object`);
  }
  if (typeof value.type !== "string" || value.type === "") {
    throw new DecodeError(`${context}: rule must have a 'type' string field`);
  }
  if (value.parameters === undefined || value.parameters === null) {
    return { type: value.type };
  }
  if (!isObject(value.parameters)) {
    throw new DecodeError(`${context}: rule parameters must be an object`);
  }
  return { type: value.type, parameters: value.parameters };
}

function decodeBypassActor(value: JsonValue, context: string): BypassActor {
  if (!isObject(value)) {
    throw new DecodeError(`${context}: bypass actor must be an object`);
  }
  const { actor_id, actor_type, bypass_mode } = value;
  if (
    actor_id !== null &&
    (typeof actor_id !== "number" || !Number.isInteger(actor_id))
  ) {
    throw new DecodeError(`${context}: 'actor_id' must be an integer or null`);
  }
  if (typeof actor_type !== "string") {
    throw new DecodeError(`${context}: 'actor_type' must be a string`);
  }
  if (bypass_mode !== undefined && typeof bypass_mode !== "string") {
    throw new DecodeError(`${context}: 'bypass_mode' must be a string`);
  }
  return {
    actor_id,
    actor_type,
    ...(bypass_mode !== undefined && { bypass_mode }),
  };
}

/**
 * Validates parsed JSON against the ruleset document schema.
 * @throws DecodeError describing the first problem found
 */
export function decodeRulesetDocument(value: unknown): RulesetDocument {
  if (!isObject(value)) {
    throw new DecodeError("Ruleset must be a JSON object");
  }

  const { name, enforcement, source, target, conditions, rules } = value;
  const bypassActors = value.bypass_actors;

  if (typeof name !== "string" || name === "") {
    throw new DecodeError("Ruleset requires a non-empty 'name' string");
  }
  const context = `Ruleset '${name}'`;

  if (!isEnforcement(enforcement)) {
    throw new DecodeError(
      `${context}: 'enforcement' must be one of: ${VALID_ENFORCEMENT_LEVELS.join(", ")}`
    );
  }
  if (typeof source !== "string" || source === "") {
    throw new DecodeError(
      `${context}: 'source' must name the source organization`
    );
  }
  if (target !== undefined && !isTarget(target)) {
    throw new DecodeError(
      `${context}: 'target' must be one of: ${VALID_TARGETS.join(", ")}`
    );
  }
  if (conditions !== undefined && !isObject(conditions)) {
    throw new DecodeError(`${context}: 'conditions' must be an object`);
  }
  if (rules !== undefined && !Array.isArray(rules)) {
    throw new DecodeError(`${context}: 'rules' must be an array`);
  }
  if (bypassActors !== undefined && !Array.isArray(bypassActors)) {
    throw new DecodeError(`${context}: 'bypass_actors' must be an array`);
  }

  return {
    name,
    enforcement,
    source,
    ...(target !== undefined && { target }),
    ...(conditions !== undefined && { conditions }),
    rules: (rules ?? []).map((rule, index) =>
      decodeRule(rule, `${context} rules[${index}]`)
    ),
    bypass_actors: (bypassActors ?? []).map((actor, index) =>
      decodeBypassActor(actor, `${context} bypass_actors[${index}]`)
    ),
  };
}

/**
 * Reads and decodes one ruleset definition file.
 * @throws ReadError if the file cannot be read
 * @throws DecodeError if it is not a valid ruleset document
 */
export function loadRulesetFile(file: string): RulesetDocument {
  let content: string;
  try {
    content = readFileSync(file, "utf-8");
  } catch (error) {
    throw new ReadError(`Failed to read ruleset file ${file}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new DecodeError(
      `Failed to parse ruleset file ${file}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  try {
    return decodeRulesetDocument(parsed);
  } catch (error) {
    throw new DecodeError(
      `Invalid ruleset file ${file}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export interface RulesetStorageOptions {
  logger?: ILogger;
}

/**
 * Ruleset definitions kept as `*.json` files, one ruleset per file, in a
 * single directory.
 */
export class RulesetStorage {
  private readonly dir: string;
  private readonly logger: ILogger;

  constructor(dir: string, options?: RulesetStorageOptions) {
    this.dir = dir;
    this.logger = options?.logger ?? defaultLogger;
  }

  /**
   * Lists definition files, sorted by file name.
   */
  listFiles(): string[] {
    let entries: string[];
    try {
      entries = readdirSync(this.dir);
    } catch (error) {
      throw new ReadError(`Failed to list ruleset directory ${this.dir}`, {
        cause: error,
      });
    }
    return entries
      .filter((entry) => entry.toLowerCase().endsWith(".json"))
      .sort()
      .map((entry) => join(this.dir, entry));
  }

  /**
   * Loads every ruleset definition. A fresh copy is returned on each call,
   * so documents are never shared between processing passes.
   */
  loadCandidates(): RulesetDocument[] {
    return this.listFiles().map((file) => {
      this.logger.debug(`Loading ruleset file ${basename(file)}`);
      return loadRulesetFile(file);
    });
  }
}
