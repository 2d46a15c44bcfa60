import type { RulesetEvent } from "../events/ruleset-event.js";
import { ContextError } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import {
  BypassActorRewriter,
  type ActorResolver,
  type BypassActorRewriteResult,
} from "./bypass-actor-rewriter.js";
import {
  RuleRewriter,
  type RepositoryResolver,
  type RuleRewriteResult,
} from "./rule-rewriter.js";
import type { RulesetDocument } from "./types.js";

/**
 * Source of candidate ruleset definitions.
 */
export interface IRulesetStorage {
  loadCandidates(): RulesetDocument[];
}

export type IdentityResolver = RepositoryResolver & ActorResolver;

export interface ProcessOptions {
  signal?: AbortSignal;
}

export interface ProcessResult {
  document: RulesetDocument;
  rules: RuleRewriteResult;
  bypassActors: BypassActorRewriteResult;
}

/**
 * Returns true if the document is the ruleset the event is about. The
 * ruleset name is the only key: exact, case-sensitive comparison.
 */
export function isManaged(
  event: RulesetEvent,
  document: RulesetDocument,
  logger: ILogger = defaultLogger
): boolean {
  const org = event.organization.login;
  if (document.name !== event.ruleset.name) {
    logger.debug(
      `Ruleset ${document.name} does not match ${event.ruleset.name} in the organization ${org}`
    );
    return false;
  }
  logger.info(
    `Ruleset ${event.ruleset.name} in the organization ${org} is managed by this app`
  );
  return true;
}

/**
 * Loads ruleset definitions and translates them into a target
 * organization's ID space, one document at a time.
 */
export class RulesetPipeline {
  private readonly storage: IRulesetStorage;
  private readonly logger: ILogger;

  constructor(storage: IRulesetStorage, logger?: ILogger) {
    this.storage = storage;
    this.logger = logger ?? defaultLogger;
  }

  loadCandidates(): RulesetDocument[] {
    return this.storage.loadCandidates();
  }

  /**
   * Candidate documents managed for the event, not yet translated.
   */
  managedRulesets(event: RulesetEvent): RulesetDocument[] {
    return this.loadCandidates().filter((document) =>
      isManaged(event, document, this.logger)
    );
  }

  /**
   * Rewrites workflow rules, then bypass actors, in place. Rejects with the
   * first failure; the caller must then discard the document.
   */
  async process(
    document: RulesetDocument,
    resolver: IdentityResolver,
    options?: ProcessOptions
  ): Promise<ProcessResult> {
    this.logger.info(`Processing ruleset ${document.name}...`);
    try {
      options?.signal?.throwIfAborted();
      const rules = await new RuleRewriter(resolver, this.logger).rewrite(
        document
      );
      options?.signal?.throwIfAborted();
      const bypassActors = await new BypassActorRewriter(
        resolver,
        this.logger
      ).rewrite(document);

      this.logger.info(`Processed ruleset ${document.name}.`);
      return { document, rules, bypassActors };
    } catch (error) {
      throw new ContextError(
        `Failed to process ruleset ${document.name}`,
        error
      );
    }
  }
}
