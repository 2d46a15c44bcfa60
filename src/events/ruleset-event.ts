import { readFileSync } from "node:fs";
import { DecodeError, ReadError, errorMessage } from "../shared/errors.js";

export type RulesetEventAction = "created" | "edited" | "deleted";

const RULESET_EVENT_ACTIONS: RulesetEventAction[] = [
  "created",
  "edited",
  "deleted",
];

/**
 * The parts of a `ruleset` webhook payload the bot reads.
 */
export interface RulesetEvent {
  action: RulesetEventAction;
  ruleset: {
    id: number;
    name: string;
    enforcement: string;
    source_type?: string;
    source?: string;
  };
  organization: {
    login: string;
    id: number;
  };
  sender?: {
    login: string;
    type?: string;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAction(value: unknown): value is RulesetEventAction {
  return RULESET_EVENT_ACTIONS.some((action) => action === value);
}

/**
 * Validates a `ruleset` webhook payload.
 * @throws DecodeError if a field the bot relies on is missing
 */
export function decodeRulesetEvent(payload: unknown): RulesetEvent {
  if (!isRecord(payload)) {
    throw new DecodeError("Ruleset event payload must be a JSON object");
  }

  const { action, ruleset, organization } = payload;
  if (!isAction(action)) {
    throw new DecodeError(
      `Unsupported ruleset event action: ${JSON.stringify(action)}`
    );
  }
  if (
    !isRecord(ruleset) ||
    typeof ruleset.id !== "number" ||
    typeof ruleset.name !== "string" ||
    typeof ruleset.enforcement !== "string"
  ) {
    throw new DecodeError(
      "Ruleset event requires 'ruleset' with 'id', 'name' and 'enforcement'"
    );
  }
  if (
    !isRecord(organization) ||
    typeof organization.login !== "string" ||
    typeof organization.id !== "number"
  ) {
    throw new DecodeError(
      "Ruleset event requires 'organization' with 'login' and 'id'"
    );
  }

  const event: RulesetEvent = {
    action,
    ruleset: {
      id: ruleset.id,
      name: ruleset.name,
      enforcement: ruleset.enforcement,
      ...(typeof ruleset.source_type === "string" && {
        source_type: ruleset.source_type,
      }),
      ...(typeof ruleset.source === "string" && { source: ruleset.source }),
    },
    organization: { login: organization.login, id: organization.id },
  };

  const { sender } = payload;
  if (isRecord(sender) && typeof sender.login === "string") {
    event.sender = {
      login: sender.login,
      ...(typeof sender.type === "string" && { type: sender.type }),
    };
  }

  return event;
}

/**
 * Reads a webhook payload from disk, e.g. the file named by
 * GITHUB_EVENT_PATH.
 */
export function loadRulesetEvent(path: string): RulesetEvent {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ReadError(`Failed to read event payload ${path}`, {
      cause: error,
    });
  }

  try {
    return decodeRulesetEvent(JSON.parse(content));
  } catch (error) {
    if (error instanceof DecodeError) {
      throw error;
    }
    throw new DecodeError(
      `Failed to parse event payload ${path}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
