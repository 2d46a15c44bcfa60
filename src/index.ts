export * from "./shared/index.js";
export * from "./rulesets/index.js";
export * from "./identity/index.js";
export * from "./github/index.js";
export * from "./config/index.js";
export {
  decodeRulesetEvent,
  loadRulesetEvent,
  type RulesetEvent,
  type RulesetEventAction,
} from "./events/ruleset-event.js";
export {
  RulesetSyncHandler,
  type RulesetClientFactory,
  type RulesetSyncHandlerOptions,
  type RulesetSyncReport,
  type RulesetSyncResult,
  type RulesetSyncStatus,
  type HandleOptions as SyncHandleOptions,
} from "./sync/ruleset-sync-handler.js";
export * from "./cli/index.js";
