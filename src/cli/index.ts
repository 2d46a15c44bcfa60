export {
  runHandle,
  hasFailures,
  resolveConfigPath,
  type HandleOptions,
  type SharedOptions,
  type CommandContext,
} from "./handle-command.js";
export {
  runTranslate,
  type TranslateOptions,
  type TranslateResult,
} from "./translate-command.js";
