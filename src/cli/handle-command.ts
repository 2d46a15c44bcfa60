import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig } from "../config/index.js";
import { loadRulesetEvent } from "../events/ruleset-event.js";
import {
  GhOrgRulesetClient,
  createInstallationBroker,
  type BrokerEnvironment,
} from "../github/index.js";
import { RulesetStorage } from "../rulesets/storage.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import type { ICommandExecutor } from "../shared/command-executor.js";
import {
  RulesetSyncHandler,
  type RulesetSyncReport,
} from "../sync/ruleset-sync-handler.js";

/**
 * Options shared by every command.
 */
export interface SharedOptions {
  config: string;
  retries?: number;
}

export interface HandleOptions extends SharedOptions {
  /** Path of the webhook payload; GITHUB_EVENT_PATH when omitted */
  event?: string;
  dryRun?: boolean;
}

/**
 * Process-level collaborators, replaced in tests.
 */
export interface CommandContext {
  env?: BrokerEnvironment & { GITHUB_EVENT_PATH?: string };
  executor?: ICommandExecutor;
  logger?: ILogger;
  signal?: AbortSignal;
}

export function resolveConfigPath(config: string): string {
  const configPath = resolve(config);
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  return configPath;
}

/**
 * Handles one `ruleset` webhook payload. Resolves with the report; the
 * caller decides the exit code.
 */
export async function runHandle(
  options: HandleOptions,
  context: CommandContext = {}
): Promise<RulesetSyncReport> {
  const env = context.env ?? process.env;
  const logger = context.logger ?? defaultLogger;

  const configPath = resolveConfigPath(options.config);
  logger.info(`Loading config from: ${configPath}`);
  const config = loadConfig(configPath);
  const retries = options.retries ?? config.retries;

  const eventPath = options.event ?? env.GITHUB_EVENT_PATH;
  if (!eventPath) {
    throw new Error(
      "No event payload: pass --event or set GITHUB_EVENT_PATH"
    );
  }
  const event = loadRulesetEvent(eventPath);
  logger.info(
    `Received ruleset ${event.action} event for ${event.ruleset.name} in ${event.organization.login}`
  );
  if (options.dryRun) {
    logger.info("Running in DRY RUN mode - no changes will be made");
  }

  const ghApi = { executor: context.executor };
  const broker = createInstallationBroker({
    host: config.host,
    retries,
    env,
    ghApi,
    logger,
  });
  const handler = new RulesetSyncHandler({
    storage: new RulesetStorage(config.rulesetsDir, { logger }),
    broker,
    createRulesetClient: (scope) =>
      new GhOrgRulesetClient({
        ...ghApi,
        token: scope.token,
        host: config.host,
        retries,
      }),
    ignoreSenders: config.ignoreSenders,
    dryRun: options.dryRun,
    logger,
  });

  const report = await handler.handle(event, { signal: context.signal });

  for (const result of report.results) {
    if (result.payload) {
      logger.info(JSON.stringify(result.payload, null, 2));
    }
  }
  const failed = report.results.filter((r) => r.status === "failed").length;
  if (report.skipped === undefined) {
    logger.info(
      `Processed ${report.results.length} ruleset(s) for ${report.org}, ${failed} failed`
    );
  }

  return report;
}

/**
 * True if any ruleset in the report failed to sync.
 */
export function hasFailures(report: RulesetSyncReport): boolean {
  return report.results.some((result) => result.status === "failed");
}
