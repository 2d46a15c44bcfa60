export type {
  GitHubTeam,
  GitHubCustomRepoRole,
  IOrganizationDirectory,
  InstallationScope,
  IInstallationBroker,
} from "./types.js";

export {
  GhApi,
  isNotFoundError,
  type GhApiOptions,
  type HttpMethod,
} from "./gh-api.js";
export { GhOrganizationDirectory } from "./org-directory.js";
export {
  GhOrgRulesetClient,
  toRulesetPayload,
  type IOrgRulesetClient,
  type OrgRulesetSummary,
} from "./org-ruleset-client.js";
export {
  GitHubAppTokenManager,
  deriveApiHost,
  type GitHubAppTokenManagerOptions,
} from "./app-token-manager.js";
export {
  GitHubAppInstallationBroker,
  StaticTokenBroker,
  createInstallationBroker,
  createInstallationScope,
  type BrokerEnvironment,
  type CreateBrokerOptions,
  type DirectoryFactory,
  type GitHubAppInstallationBrokerOptions,
} from "./installation-broker.js";
