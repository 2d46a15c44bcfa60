import type { JsonObject, RulesetDocument } from "../rulesets/types.js";
import { UpstreamApiError } from "../shared/errors.js";
import { GhApi, type GhApiOptions } from "./gh-api.js";

/**
 * Organization ruleset as returned by the list, create and update
 * endpoints. Only the fields the bot reads.
 */
export interface OrgRulesetSummary {
  id: number;
  name: string;
  enforcement: string;
}

export interface IOrgRulesetClient {
  list(org: string): Promise<OrgRulesetSummary[]>;
  create(org: string, document: RulesetDocument): Promise<OrgRulesetSummary>;
  update(
    org: string,
    rulesetId: number,
    document: RulesetDocument
  ): Promise<OrgRulesetSummary>;
}

/**
 * Converts a translated document to the request body GitHub accepts.
 * `source` only describes where the IDs came from and is not sent.
 */
export function toRulesetPayload(document: RulesetDocument): JsonObject {
  const payload: JsonObject = {
    name: document.name,
    target: document.target ?? "branch",
    enforcement: document.enforcement,
    rules: document.rules.map((rule): JsonObject =>
      rule.parameters === undefined
        ? { type: rule.type }
        : { type: rule.type, parameters: rule.parameters }
    ),
    bypass_actors: document.bypass_actors.map((actor) => {
      const encoded: JsonObject = {
        actor_id: actor.actor_id,
        actor_type: actor.actor_type,
      };
      if (actor.bypass_mode !== undefined) {
        encoded.bypass_mode = actor.bypass_mode;
      }
      return encoded;
    }),
  };

  if (document.conditions) {
    payload.conditions = document.conditions;
  }

  return payload;
}

function toSummary(body: unknown, endpoint: string): OrgRulesetSummary {
  if (
    typeof body !== "object" ||
    body === null ||
    !("id" in body) ||
    !("name" in body) ||
    typeof body.id !== "number" ||
    typeof body.name !== "string"
  ) {
    throw new UpstreamApiError(
      `GitHub API ${endpoint} returned an unexpected ruleset`
    );
  }
  const enforcement =
    "enforcement" in body && typeof body.enforcement === "string"
      ? body.enforcement
      : "";
  return { id: body.id, name: body.name, enforcement };
}

/**
 * Manages organization rulesets via the GitHub REST API (`gh api`).
 */
export class GhOrgRulesetClient implements IOrgRulesetClient {
  private readonly api: GhApi;

  constructor(options?: GhApiOptions | GhApi) {
    this.api = options instanceof GhApi ? options : new GhApi(options);
  }

  async list(org: string): Promise<OrgRulesetSummary[]> {
    const endpoint = `orgs/${org}/rulesets?per_page=100`;
    const body = await this.api.sendJson("GET", endpoint);
    if (!Array.isArray(body)) {
      throw new UpstreamApiError(
        `GitHub API ${endpoint} returned no ruleset list`
      );
    }
    return body.map((item) => toSummary(item, endpoint));
  }

  async create(
    org: string,
    document: RulesetDocument
  ): Promise<OrgRulesetSummary> {
    const endpoint = `orgs/${org}/rulesets`;
    const body = await this.api.sendJson(
      "POST",
      endpoint,
      toRulesetPayload(document)
    );
    return toSummary(body, endpoint);
  }

  async update(
    org: string,
    rulesetId: number,
    document: RulesetDocument
  ): Promise<OrgRulesetSummary> {
    const endpoint = `orgs/${org}/rulesets/${rulesetId}`;
    const body = await this.api.sendJson(
      "PUT",
      endpoint,
      toRulesetPayload(document)
    );
    return toSummary(body, endpoint);
  }
}
