import { ContextError, UnhandledActorTypeError } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import type { BypassActor, RulesetDocument } from "./types.js";

/**
 * Highest built-in actor ID. IDs 1-5 are GitHub's predefined repository
 * roles and are the same in every organization.
 */
export const MAX_RESERVED_ACTOR_ID = 5;

export interface ActorResolver {
  resolveTeam(sourceOrg: string, teamId: number): Promise<number>;
  resolveCustomRole(
    sourceOrg: string,
    roleId: number
  ): Promise<number | undefined>;
}

export interface BypassActorRewriteResult {
  translated: number;
  /** Ineligible, Integration and custom roles missing from the target */
  unchanged: number;
  warnings: string[];
}

/**
 * Returns true if the actor's ID is organization-specific and may need
 * translating.
 */
export function isEligibleBypassActor(actor: BypassActor): boolean {
  const actorId = actor.actor_id;
  return actorId !== null && actorId !== 0 && actorId > MAX_RESERVED_ACTOR_ID;
}

/**
 * Rewrites team and custom repository role IDs in a ruleset's bypass list,
 * in place and in document order.
 */
export class BypassActorRewriter {
  private readonly resolver: ActorResolver;
  private readonly logger: ILogger;

  constructor(resolver: ActorResolver, logger?: ILogger) {
    this.resolver = resolver;
    this.logger = logger ?? defaultLogger;
  }

  async rewrite(document: RulesetDocument): Promise<BypassActorRewriteResult> {
    const result: BypassActorRewriteResult = {
      translated: 0,
      unchanged: 0,
      warnings: [],
    };

    for (const actor of document.bypass_actors) {
      if (actor.actor_id === null || !isEligibleBypassActor(actor)) {
        result.unchanged++;
        continue;
      }
      const actorId = actor.actor_id;

      switch (actor.actor_type) {
        case "Team": {
          actor.actor_id = await this.resolve(document, actor, () =>
            this.resolver.resolveTeam(document.source, actorId)
          );
          result.translated++;
          break;
        }
        case "RepositoryRole": {
          const roleId = await this.resolve(document, actor, () =>
            this.resolver.resolveCustomRole(document.source, actorId)
          );
          if (roleId === undefined) {
            result.unchanged++;
          } else {
            actor.actor_id = roleId;
            result.translated++;
          }
          break;
        }
        case "Integration":
          result.unchanged++;
          break;
        default: {
          const warning = new UnhandledActorTypeError(actor.actor_type);
          this.logger.warn(warning.message);
          result.warnings.push(warning.message);
          result.unchanged++;
        }
      }
    }

    return result;
  }

  private async resolve<T>(
    document: RulesetDocument,
    actor: BypassActor,
    resolution: () => Promise<T>
  ): Promise<T> {
    try {
      return await resolution();
    } catch (error) {
      const label = actor.actor_type === "Team" ? "team" : "repository role";
      throw new ContextError(
        `Failed to process ${label} bypass actor with id ${actor.actor_id} in ruleset ${document.name}`,
        error
      );
    }
  }
}
