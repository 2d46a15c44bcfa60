import { DecodeError } from "../shared/errors.js";
import type {
  ClassifiedRule,
  JsonObject,
  JsonValue,
  RulesetRule,
  WorkflowRef,
  WorkflowsParameters,
} from "./types.js";

export const WORKFLOWS_RULE_TYPE = "workflows";

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeWorkflowRef(value: JsonValue, index: number): WorkflowRef {
  const context = `workflows[${index}]`;
  if (!isObject(value)) {
    throw new DecodeError(`${context}: workflow must be an object`);
  }

  const { repository_id, path, ref, sha } = value;
  if (typeof repository_id !== "number" || !Number.isInteger(repository_id)) {
    throw new DecodeError(
      `${context}: 'repository_id' must be an integer, got ${JSON.stringify(repository_id)}`
    );
  }
  if (typeof path !== "string") {
    throw new DecodeError(`${context}: 'path' must be a string`);
  }
  if (ref !== undefined && typeof ref !== "string") {
    throw new DecodeError(`${context}: 'ref' must be a string`);
  }
  if (sha !== undefined && typeof sha !== "string") {
    throw new DecodeError(`${context}: 'sha' must be a string`);
  }

  return {
    repository_id,
    path,
    ...(ref !== undefined && { ref }),
    ...(sha !== undefined && { sha }),
  };
}

/**
 * Decodes the parameters of a `workflows` rule.
 * @throws DecodeError if the payload is not `{ workflows: [...] }`
 */
export function decodeWorkflowsParameters(
  parameters: JsonObject | undefined
): WorkflowsParameters {
  if (parameters === undefined) {
    throw new DecodeError("workflows rule has no parameters");
  }

  const { workflows, ...extra } = parameters;
  if (!Array.isArray(workflows)) {
    throw new DecodeError(
      "workflows rule parameters must contain a 'workflows' array"
    );
  }

  return {
    workflows: workflows.map(decodeWorkflowRef),
    extra,
  };
}

function encodeWorkflowRef(workflow: WorkflowRef): JsonObject {
  const encoded: JsonObject = {
    repository_id: workflow.repository_id,
    path: workflow.path,
  };
  if (workflow.ref !== undefined) {
    encoded.ref = workflow.ref;
  }
  if (workflow.sha !== undefined) {
    encoded.sha = workflow.sha;
  }
  return encoded;
}

export function encodeWorkflowsParameters(
  parameters: WorkflowsParameters
): JsonObject {
  return {
    ...parameters.extra,
    workflows: parameters.workflows.map(encodeWorkflowRef),
  };
}

/**
 * Classifies a rule by its `type`. Only `workflows` parameters are decoded.
 */
export function classifyRule(rule: RulesetRule): ClassifiedRule {
  if (rule.type === WORKFLOWS_RULE_TYPE) {
    return {
      kind: "workflows",
      rule,
      parameters: decodeWorkflowsParameters(rule.parameters),
    };
  }
  return { kind: "passthrough", rule };
}
