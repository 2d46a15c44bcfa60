// =============================================================================
// JSON
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// =============================================================================
// Ruleset Documents
// =============================================================================

export type RulesetEnforcement = "active" | "disabled" | "evaluate";
export type RulesetTarget = "branch" | "tag" | "push";

/**
 * Actor types GitHub accepts in `bypass_actors`. Only Team and
 * RepositoryRole IDs are local to an organization.
 */
export type KnownActorType =
  | "Team"
  | "RepositoryRole"
  | "Integration"
  | "OrganizationAdmin"
  | "DeployKey";

export interface BypassActor {
  actor_id: number | null;
  actor_type: KnownActorType | (string & {});
  bypass_mode?: string;
}

/**
 * A rule as it appears in a definition file. `parameters` is opaque until
 * the rule rewriter classifies the rule by `type`.
 */
export interface RulesetRule {
  type: string;
  parameters?: JsonObject;
}

/**
 * One ruleset definition, written against the `source` organization.
 */
export interface RulesetDocument {
  name: string;
  enforcement: RulesetEnforcement;
  /** Login of the organization whose IDs the document references */
  source: string;
  target?: RulesetTarget;
  conditions?: JsonObject;
  rules: RulesetRule[];
  bypass_actors: BypassActor[];
}

// =============================================================================
// Workflows Rule
// =============================================================================

export interface WorkflowRef {
  repository_id: number;
  path: string;
  ref?: string;
  sha?: string;
}

export interface WorkflowsParameters {
  workflows: WorkflowRef[];
  /** Any other parameter keys, kept as-is across re-encoding */
  extra: JsonObject;
}

/**
 * Tagged view of a rule: `workflows` rules carry decoded parameters, every
 * other rule is passed through without interpretation.
 */
export type ClassifiedRule =
  | { kind: "workflows"; rule: RulesetRule; parameters: WorkflowsParameters }
  | { kind: "passthrough"; rule: RulesetRule };
