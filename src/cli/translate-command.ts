import { loadConfig } from "../config/index.js";
import { createInstallationBroker } from "../github/index.js";
import { EntityResolver } from "../identity/entity-resolver.js";
import { RulesetPipeline } from "../rulesets/pipeline.js";
import { RulesetStorage } from "../rulesets/storage.js";
import type { RulesetDocument } from "../rulesets/types.js";
import { errorMessage } from "../shared/errors.js";
import { logger as defaultLogger } from "../shared/logger.js";
import {
  resolveConfigPath,
  type CommandContext,
  type SharedOptions,
} from "./handle-command.js";

export interface TranslateOptions extends SharedOptions {
  /** Organization to translate into */
  org: string;
  /** Only translate the ruleset with this name */
  name?: string;
}

export interface TranslateResult {
  translated: RulesetDocument[];
  failed: Array<{ name: string; error: string }>;
}

/**
 * Translates ruleset definitions into an organization's ID space without
 * applying them.
 */
export async function runTranslate(
  options: TranslateOptions,
  context: CommandContext = {}
): Promise<TranslateResult> {
  const logger = context.logger ?? defaultLogger;
  const config = loadConfig(resolveConfigPath(options.config));
  const retries = options.retries ?? config.retries;

  const pipeline = new RulesetPipeline(
    new RulesetStorage(config.rulesetsDir, { logger }),
    logger
  );
  const documents = pipeline
    .loadCandidates()
    .filter((document) => !options.name || document.name === options.name);
  if (options.name && documents.length === 0) {
    throw new Error(
      `No ruleset named ${options.name} in ${config.rulesetsDir}`
    );
  }

  const broker = createInstallationBroker({
    host: config.host,
    retries,
    env: context.env ?? process.env,
    ghApi: { executor: context.executor },
    logger,
  });

  const result: TranslateResult = { translated: [], failed: [] };
  const scope = await broker.acquire(options.org, context.signal);
  try {
    const resolver = new EntityResolver({
      targetOrg: options.org,
      targetDirectory: scope.directory,
      broker,
      logger,
      signal: context.signal,
    });
    for (const document of documents) {
      try {
        await pipeline.process(document, resolver, { signal: context.signal });
        result.translated.push(document);
      } catch (error) {
        logger.error(errorMessage(error));
        result.failed.push({ name: document.name, error: errorMessage(error) });
      }
    }
  } finally {
    scope.release();
  }

  return result;
}
