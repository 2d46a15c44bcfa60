import { AuthError } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import { GitHubAppTokenManager } from "./app-token-manager.js";
import type { GhApiOptions } from "./gh-api.js";
import { GhOrganizationDirectory } from "./org-directory.js";
import type {
  GitHubCustomRepoRole,
  GitHubTeam,
  IInstallationBroker,
  IOrganizationDirectory,
  InstallationScope,
} from "./types.js";

/**
 * Builds the directory client a scope hands out for a token.
 */
export type DirectoryFactory = (
  token: string | undefined
) => IOrganizationDirectory;

/**
 * Directory view that stops working once its scope is released.
 */
class ScopedDirectory implements IOrganizationDirectory {
  private readonly org: string;
  private readonly inner: IOrganizationDirectory;
  private released = false;

  constructor(org: string, inner: IOrganizationDirectory) {
    this.org = org;
    this.inner = inner;
  }

  release(): void {
    this.released = true;
  }

  getRepoId(org: string, repoName: string): Promise<number | null> {
    return this.live().getRepoId(org, repoName);
  }

  getRepoName(repoId: number): Promise<string | null> {
    return this.live().getRepoName(repoId);
  }

  getOrgId(org: string): Promise<number | null> {
    return this.live().getOrgId(org);
  }

  getTeamById(orgId: number, teamId: number): Promise<GitHubTeam | null> {
    return this.live().getTeamById(orgId, teamId);
  }

  getTeamBySlug(org: string, slug: string): Promise<GitHubTeam | null> {
    return this.live().getTeamBySlug(org, slug);
  }

  getCustomRepoRoles(org: string): Promise<GitHubCustomRepoRole[]> {
    return this.live().getCustomRepoRoles(org);
  }

  private live(): IOrganizationDirectory {
    if (this.released) {
      throw new AuthError(`Installation scope for ${this.org} was released`);
    }
    return this.inner;
  }
}

/**
 * Wraps a token and directory into a scope that can be released once.
 */
export function createInstallationScope(
  org: string,
  token: string | undefined,
  directory: IOrganizationDirectory
): InstallationScope {
  const scoped = new ScopedDirectory(org, directory);
  return {
    org,
    token,
    directory: scoped,
    release: () => scoped.release(),
  };
}

export interface GitHubAppInstallationBrokerOptions {
  createDirectory: DirectoryFactory;
  logger?: ILogger;
}

/**
 * Mints a fresh installation token for each scope: app JWT, the
 * organization's installation, then an installation access token.
 */
export class GitHubAppInstallationBroker implements IInstallationBroker {
  private readonly tokenManager: GitHubAppTokenManager;
  private readonly createDirectory: DirectoryFactory;
  private readonly logger: ILogger;
  private botLogin?: string;

  constructor(
    tokenManager: GitHubAppTokenManager,
    options: GitHubAppInstallationBrokerOptions
  ) {
    this.tokenManager = tokenManager;
    this.createDirectory = options.createDirectory;
    this.logger = options.logger ?? defaultLogger;
  }

  async acquire(org: string, signal?: AbortSignal): Promise<InstallationScope> {
    const installationId = await this.tokenManager.getOrgInstallationId(
      org,
      signal
    );
    const token = await this.tokenManager.createInstallationToken(
      installationId,
      signal
    );
    this.logger.debug(
      `Acquired installation token for ${org} (installation ${installationId})`
    );
    return createInstallationScope(org, token, this.createDirectory(token));
  }

  async selfLogin(signal?: AbortSignal): Promise<string> {
    if (this.botLogin === undefined) {
      const slug = await this.tokenManager.getAppSlug(signal);
      this.botLogin = `${slug}[bot]`;
    }
    return this.botLogin;
  }
}

/**
 * Hands out scopes backed by one fixed token, or by the ambient `gh`
 * login when there is none. Used when no GitHub App is configured.
 */
export class StaticTokenBroker implements IInstallationBroker {
  private readonly token?: string;
  private readonly createDirectory: DirectoryFactory;

  constructor(token: string | undefined, createDirectory: DirectoryFactory) {
    this.token = token;
    this.createDirectory = createDirectory;
  }

  async acquire(org: string, signal?: AbortSignal): Promise<InstallationScope> {
    signal?.throwIfAborted();
    return createInstallationScope(
      org,
      this.token,
      this.createDirectory(this.token)
    );
  }
}

export interface BrokerEnvironment {
  RULESETBOT_GITHUB_APP_ID?: string;
  RULESETBOT_GITHUB_APP_PRIVATE_KEY?: string;
  GH_TOKEN?: string;
  GITHUB_TOKEN?: string;
}

export interface CreateBrokerOptions {
  host: string;
  retries: number;
  env?: BrokerEnvironment;
  ghApi?: Omit<GhApiOptions, "token" | "host" | "retries">;
  logger?: ILogger;
}

/**
 * Picks the GitHub App broker when app credentials are configured and the
 * static-token broker otherwise.
 */
export function createInstallationBroker(
  options: CreateBrokerOptions
): IInstallationBroker {
  const env = options.env ?? process.env;
  const createDirectory: DirectoryFactory = (token) =>
    new GhOrganizationDirectory({
      ...options.ghApi,
      token,
      host: options.host,
      retries: options.retries,
    });

  const appId = env.RULESETBOT_GITHUB_APP_ID;
  const privateKey = env.RULESETBOT_GITHUB_APP_PRIVATE_KEY;
  if (appId && privateKey) {
    // Keys stored in a single-line secret carry escaped newlines
    const pem = privateKey.replace(/\\n/g, "\n");
    const tokenManager = new GitHubAppTokenManager(appId, pem, {
      host: options.host,
      retries: options.retries,
    });
    return new GitHubAppInstallationBroker(tokenManager, {
      createDirectory,
      logger: options.logger,
    });
  }

  return new StaticTokenBroker(
    env.GH_TOKEN ?? env.GITHUB_TOKEN,
    createDirectory
  );
}
