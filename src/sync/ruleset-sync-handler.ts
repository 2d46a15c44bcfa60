import type { RulesetEvent } from "../events/ruleset-event.js";
import type {
  IOrgRulesetClient,
  OrgRulesetSummary,
} from "../github/org-ruleset-client.js";
import { toRulesetPayload } from "../github/org-ruleset-client.js";
import type {
  IInstallationBroker,
  InstallationScope,
} from "../github/types.js";
import { EntityResolver } from "../identity/entity-resolver.js";
import { RulesetPipeline, type IRulesetStorage } from "../rulesets/pipeline.js";
import type { RulesetDocument } from "../rulesets/types.js";
import { ContextError, errorMessage } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";

/**
 * Builds the apply client for a target organization scope.
 */
export type RulesetClientFactory = (
  scope: InstallationScope
) => IOrgRulesetClient;

export interface RulesetSyncHandlerOptions {
  storage: IRulesetStorage;
  broker: IInstallationBroker;
  createRulesetClient: RulesetClientFactory;
  /** Extra sender logins to ignore, e.g. a static token's user */
  ignoreSenders?: string[];
  dryRun?: boolean;
  logger?: ILogger;
}

export type RulesetSyncStatus = "created" | "updated" | "planned" | "failed";

export interface RulesetSyncResult {
  name: string;
  status: RulesetSyncStatus;
  rulesetId?: number;
  message: string;
  /** Translated request body, set in dry-run mode */
  payload?: ReturnType<typeof toRulesetPayload>;
  error?: unknown;
}

export interface RulesetSyncReport {
  org: string;
  rulesetName: string;
  skipped?: string;
  results: RulesetSyncResult[];
}

export interface HandleOptions {
  signal?: AbortSignal;
}

/**
 * Reacts to one `ruleset` event: re-applies every managed definition
 * matching the event's ruleset to the event's organization.
 */
export class RulesetSyncHandler {
  private readonly pipeline: RulesetPipeline;
  private readonly broker: IInstallationBroker;
  private readonly createRulesetClient: RulesetClientFactory;
  private readonly ignoreSenders: string[];
  private readonly dryRun: boolean;
  private readonly logger: ILogger;

  constructor(options: RulesetSyncHandlerOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.pipeline = new RulesetPipeline(options.storage, this.logger);
    this.broker = options.broker;
    this.createRulesetClient = options.createRulesetClient;
    this.ignoreSenders = options.ignoreSenders ?? [];
    this.dryRun = options.dryRun ?? false;
  }

  async handle(
    event: RulesetEvent,
    options?: HandleOptions
  ): Promise<RulesetSyncReport> {
    const org = event.organization.login;
    const report: RulesetSyncReport = {
      org,
      rulesetName: event.ruleset.name,
      results: [],
    };

    const skipReason =
      this.skipReason(event) ?? (await this.ownEventReason(event, options));
    if (skipReason) {
      this.logger.info(`Skipping ruleset event: ${skipReason}`);
      return { ...report, skipped: skipReason };
    }

    const managed = this.pipeline.managedRulesets(event);
    if (managed.length === 0) {
      return {
        ...report,
        skipped: `Ruleset ${event.ruleset.name} is not managed by this app`,
      };
    }

    const scope = await this.broker.acquire(org, options?.signal);
    try {
      const resolver = new EntityResolver({
        targetOrg: org,
        targetDirectory: scope.directory,
        broker: this.broker,
        logger: this.logger,
        signal: options?.signal,
      });
      const client = this.createRulesetClient(scope);

      // A failed document does not stop the others.
      for (const document of managed) {
        try {
          await this.pipeline.process(document, resolver, {
            signal: options?.signal,
          });
          report.results.push(await this.apply(event, document, client));
        } catch (error) {
          this.logger.error(errorMessage(error));
          report.results.push({
            name: document.name,
            status: "failed",
            message: errorMessage(error),
            error,
          });
        }
      }
    } finally {
      scope.release();
    }

    return report;
  }

  private skipReason(event: RulesetEvent): string | undefined {
    const sender = event.sender?.login;
    if (sender !== undefined && this.ignoreSenders.includes(sender)) {
      return `event sent by ignored sender ${sender}`;
    }
    if (
      event.ruleset.source_type !== undefined &&
      event.ruleset.source_type !== "Organization"
    ) {
      return `ruleset ${event.ruleset.name} is a ${event.ruleset.source_type} ruleset, not an organization ruleset`;
    }
    return undefined;
  }

  /**
   * Skips events raised by the broker's own credentials. Only bot senders
   * are checked.
   */
  private async ownEventReason(
    event: RulesetEvent,
    options?: HandleOptions
  ): Promise<string | undefined> {
    if (event.sender?.type !== "Bot" || !this.broker.selfLogin) {
      return undefined;
    }
    const self = await this.broker.selfLogin(options?.signal);
    return event.sender.login === self
      ? `event sent by this app (${self})`
      : undefined;
  }

  private async apply(
    event: RulesetEvent,
    document: RulesetDocument,
    client: IOrgRulesetClient
  ): Promise<RulesetSyncResult> {
    const org = event.organization.login;
    if (this.dryRun) {
      const message = `[DRY RUN] Would apply ruleset ${document.name} to ${org}`;
      this.logger.info(message);
      return {
        name: document.name,
        status: "planned",
        message,
        payload: toRulesetPayload(document),
      };
    }

    try {
      // A deleted ruleset is always recreated.
      const existing =
        event.action === "deleted"
          ? undefined
          : (await client.list(org)).find(
              (ruleset) => ruleset.name === document.name
            );
      let applied: OrgRulesetSummary;
      let status: RulesetSyncStatus;
      if (existing) {
        applied = await client.update(org, existing.id, document);
        status = "updated";
      } else {
        applied = await client.create(org, document);
        status = "created";
      }

      const message = `Ruleset ${document.name} ${status} in ${org} (id ${applied.id})`;
      this.logger.success(message);
      return { name: document.name, status, rulesetId: applied.id, message };
    } catch (error) {
      throw new ContextError(
        `Failed to apply ruleset ${document.name} to ${org}`,
        error
      );
    }
  }
}
