// =============================================================================
// GitHub API Types (snake_case, as returned by the REST API)
// =============================================================================

export interface GitHubTeam {
  id: number;
  slug: string;
  name: string;
}

export interface GitHubCustomRepoRole {
  id: number;
  name: string;
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

/**
 * Read access to one GitHub host's organization catalogs. Lookups that
 * find nothing resolve to null (or an empty list); other failures reject.
 */
export interface IOrganizationDirectory {
  getRepoId(org: string, repoName: string): Promise<number | null>;
  getRepoName(repoId: number): Promise<string | null>;
  getOrgId(org: string): Promise<number | null>;
  getTeamById(orgId: number, teamId: number): Promise<GitHubTeam | null>;
  getTeamBySlug(org: string, slug: string): Promise<GitHubTeam | null>;
  getCustomRepoRoles(org: string): Promise<GitHubCustomRepoRole[]>;
}

/**
 * Short-lived authority over one organization. Acquired per cross-org
 * operation and released when it completes.
 */
export interface InstallationScope {
  readonly org: string;
  /** Installation token, absent when the ambient gh login is used */
  readonly token?: string;
  readonly directory: IOrganizationDirectory;
  release(): void;
}

export interface IInstallationBroker {
  acquire(org: string, signal?: AbortSignal): Promise<InstallationScope>;
  /**
   * Login the broker's credentials write as, e.g. `my-app[bot]`. Brokers
   * that cannot tell leave it out.
   */
  selfLogin?(signal?: AbortSignal): Promise<string>;
}
