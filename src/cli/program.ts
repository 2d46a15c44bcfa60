import { program, Command, InvalidArgumentError } from "commander";
import { dirname, join } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { toRulesetPayload } from "../github/org-ruleset-client.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import {
  hasFailures,
  runHandle,
  type HandleOptions,
} from "./handle-command.js";
import { runTranslate, type TranslateOptions } from "./translate-command.js";

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "../..", "package.json"), "utf-8")
);
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

export function parseRetries(value: string): number {
  const retries = Number(value);
  if (!Number.isInteger(retries) || retries < 0) {
    throw new InvalidArgumentError("Retries must be a non-negative integer.");
  }
  return retries;
}

function addSharedOptions(cmd: Command): Command {
  return cmd
    .requiredOption("-c, --config <path>", "Path to YAML config file")
    .option(
      "-r, --retries <number>",
      "Number of retries for GitHub API calls (0 to disable)",
      parseRetries
    );
}

function fail(error: unknown): never {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
}

program
  .name("rulesetbot")
  .description(
    "Keep organization rulesets in sync with definitions written against a source organization"
  )
  .version(version);

const handleCommand = new Command("handle")
  .description("Handle one ruleset webhook payload")
  .option(
    "-e, --event <path>",
    "Path to the event payload (default: $GITHUB_EVENT_PATH)"
  )
  .option("-d, --dry-run", "Print translated rulesets instead of applying them")
  .action((opts: HandleOptions) => {
    runHandle(opts)
      .then((report) => {
        if (hasFailures(report)) {
          process.exit(1);
        }
      })
      .catch(fail);
  });

addSharedOptions(handleCommand);
program.addCommand(handleCommand);

const translateCommand = new Command("translate")
  .description("Print rulesets translated for an organization")
  .requiredOption("-o, --org <org>", "Organization to translate into")
  .option("-n, --name <name>", "Only translate the ruleset with this name")
  .action((opts: TranslateOptions) => {
    runTranslate(opts)
      .then((result) => {
        console.log(
          JSON.stringify(result.translated.map(toRulesetPayload), null, 2)
        );
        if (result.failed.length > 0) {
          process.exit(1);
        }
      })
      .catch(fail);
  });

addSharedOptions(translateCommand);
program.addCommand(translateCommand);

export { program };
