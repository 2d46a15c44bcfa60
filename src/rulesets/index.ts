export type {
  JsonValue,
  JsonObject,
  RulesetEnforcement,
  RulesetTarget,
  KnownActorType,
  BypassActor,
  RulesetRule,
  RulesetDocument,
  WorkflowRef,
  WorkflowsParameters,
  ClassifiedRule,
} from "./types.js";

export {
  WORKFLOWS_RULE_TYPE,
  classifyRule,
  decodeWorkflowsParameters,
  encodeWorkflowsParameters,
} from "./workflow-codec.js";

export {
  RuleRewriter,
  type RepositoryResolver,
  type RuleRewriteResult,
} from "./rule-rewriter.js";

export {
  BypassActorRewriter,
  MAX_RESERVED_ACTOR_ID,
  isEligibleBypassActor,
  type ActorResolver,
  type BypassActorRewriteResult,
} from "./bypass-actor-rewriter.js";

export {
  RulesetStorage,
  decodeRulesetDocument,
  loadRulesetFile,
  type RulesetStorageOptions,
} from "./storage.js";

export {
  RulesetPipeline,
  isManaged,
  type IRulesetStorage,
  type IdentityResolver,
  type ProcessOptions,
  type ProcessResult,
} from "./pipeline.js";
