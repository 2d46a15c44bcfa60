import type {
  IInstallationBroker,
  IOrganizationDirectory,
} from "../github/types.js";
import { NotFoundInTargetError, UpstreamApiError } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import { translate, type TranslationResult } from "./translate.js";

export interface EntityResolverOptions {
  /** Organization the translated ruleset is applied to */
  targetOrg: string;
  /** Directory authorized for the target organization */
  targetDirectory: IOrganizationDirectory;
  /** Hands out installation scopes for source organizations */
  broker: IInstallationBroker;
  logger?: ILogger;
  signal?: AbortSignal;
}

/**
 * Finds the target-organization equivalent of repositories, teams and
 * custom repository roles referenced by ID in a source organization.
 *
 * Nothing is cached: each call does its own round trips.
 */
export class EntityResolver {
  private readonly targetOrg: string;
  private readonly targetDirectory: IOrganizationDirectory;
  private readonly broker: IInstallationBroker;
  private readonly logger: ILogger;
  private readonly signal?: AbortSignal;

  constructor(options: EntityResolverOptions) {
    this.targetOrg = options.targetOrg;
    this.targetDirectory = options.targetDirectory;
    this.broker = options.broker;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
  }

  /**
   * Repository IDs are looked up through the target organization's client,
   * which can read any repository the installation sees by ID.
   */
  async resolveRepository(
    sourceRepoId: number,
    sourceOrg: string
  ): Promise<number> {
    const result = await translate({
      kind: "repository",
      sourceOrg,
      targetOrg: this.targetOrg,
      idInSource: sourceRepoId,
      lookupNameInSource: (id) => {
        this.signal?.throwIfAborted();
        return this.targetDirectory.getRepoName(id);
      },
      lookupIdInTarget: (name) => {
        this.signal?.throwIfAborted();
        return this.targetDirectory.getRepoId(this.targetOrg, name);
      },
    });
    return this.requireResolved(result);
  }

  async resolveTeam(sourceOrg: string, teamId: number): Promise<number> {
    const result = await this.withSourceScope(sourceOrg, (sourceDirectory) =>
      translate({
        kind: "team",
        sourceOrg,
        targetOrg: this.targetOrg,
        idInSource: teamId,
        lookupNameInSource: async (id) => {
          this.signal?.throwIfAborted();
          const orgId = await sourceDirectory.getOrgId(sourceOrg);
          if (orgId === null) {
            throw new UpstreamApiError(
              `Source organization ${sourceOrg} not found`
            );
          }
          const team = await sourceDirectory.getTeamById(orgId, id);
          return team?.slug ?? null;
        },
        lookupIdInTarget: async (slug) => {
          this.signal?.throwIfAborted();
          const team = await this.targetDirectory.getTeamBySlug(
            this.targetOrg,
            slug
          );
          return team?.id ?? null;
        },
      })
    );
    return this.requireResolved(result);
  }

  /**
   * Resolves a custom repository role by name. Resolves to undefined when
   * the role is not defined in the target organization.
   */
  async resolveCustomRole(
    sourceOrg: string,
    roleId: number
  ): Promise<number | undefined> {
    const result = await this.withSourceScope(sourceOrg, (sourceDirectory) =>
      translate({
        kind: "custom-role",
        sourceOrg,
        targetOrg: this.targetOrg,
        idInSource: roleId,
        lookupNameInSource: async (id) => {
          this.signal?.throwIfAborted();
          const roles = await sourceDirectory.getCustomRepoRoles(sourceOrg);
          return roles.find((role) => role.id === id)?.name ?? null;
        },
        lookupIdInTarget: async (name) => {
          this.signal?.throwIfAborted();
          const roles = await this.targetDirectory.getCustomRepoRoles(
            this.targetOrg
          );
          return roles.find((role) => role.name === name)?.id ?? null;
        },
      })
    );

    if (result.status === "unresolved") {
      this.logger.info(
        `Custom repository role '${result.name}' does not exist in ${this.targetOrg}, leaving role ID ${roleId} unchanged`
      );
      return undefined;
    }
    this.logResolved(result);
    return result.identity.targetId;
  }

  private async withSourceScope<T>(
    sourceOrg: string,
    operation: (directory: IOrganizationDirectory) => Promise<T>
  ): Promise<T> {
    this.signal?.throwIfAborted();
    const scope = await this.broker.acquire(sourceOrg, this.signal);
    try {
      return await operation(scope.directory);
    } finally {
      scope.release();
    }
  }

  private requireResolved(result: TranslationResult): number {
    if (result.status === "unresolved") {
      throw new NotFoundInTargetError(result.kind, this.targetOrg, result.name);
    }
    this.logResolved(result);
    return result.identity.targetId;
  }

  private logResolved(
    result: Extract<TranslationResult, { status: "resolved" }>
  ): void {
    const { kind, name, sourceId, targetId } = result.identity;
    this.logger.debug(
      `Resolved ${kind} '${name}': ${sourceId} -> ${targetId} in ${this.targetOrg}`
    );
  }
}
