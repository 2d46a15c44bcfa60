export {
  EntityResolver,
  type EntityResolverOptions,
} from "./entity-resolver.js";
export {
  translate,
  MISSING_IN_TARGET_POLICY,
  type MissingInTargetPolicy,
  type ResolvedIdentity,
  type TranslationRequest,
  type TranslationResult,
} from "./translate.js";
