import { UpstreamApiError } from "../shared/errors.js";
import { GhApi, type GhApiOptions } from "./gh-api.js";
import type {
  GitHubCustomRepoRole,
  GitHubTeam,
  IOrganizationDirectory,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireNumber(
  body: Record<string, unknown>,
  field: string,
  endpoint: string
): number {
  const value = body[field];
  if (typeof value !== "number") {
    throw new UpstreamApiError(
      `GitHub API ${endpoint} returned no numeric '${field}'`
    );
  }
  return value;
}

function requireString(
  body: Record<string, unknown>,
  field: string,
  endpoint: string
): string {
  const value = body[field];
  if (typeof value !== "string") {
    throw new UpstreamApiError(
      `GitHub API ${endpoint} returned no string '${field}'`
    );
  }
  return value;
}

function toTeam(body: Record<string, unknown>, endpoint: string): GitHubTeam {
  return {
    id: requireNumber(body, "id", endpoint),
    slug: requireString(body, "slug", endpoint),
    name: requireString(body, "name", endpoint),
  };
}

/**
 * Organization catalogs read through `gh api`.
 */
export class GhOrganizationDirectory implements IOrganizationDirectory {
  private readonly api: GhApi;

  constructor(options?: GhApiOptions | GhApi) {
    this.api = options instanceof GhApi ? options : new GhApi(options);
  }

  async getRepoId(org: string, repoName: string): Promise<number | null> {
    const endpoint = `repos/${org}/${repoName}`;
    const body = await this.getObject(endpoint);
    return body ? requireNumber(body, "id", endpoint) : null;
  }

  async getRepoName(repoId: number): Promise<string | null> {
    const endpoint = `repositories/${repoId}`;
    const body = await this.getObject(endpoint);
    return body ? requireString(body, "name", endpoint) : null;
  }

  async getOrgId(org: string): Promise<number | null> {
    const endpoint = `orgs/${org}`;
    const body = await this.getObject(endpoint);
    return body ? requireNumber(body, "id", endpoint) : null;
  }

  async getTeamById(orgId: number, teamId: number): Promise<GitHubTeam | null> {
    const endpoint = `organizations/${orgId}/team/${teamId}`;
    const body = await this.getObject(endpoint);
    return body ? toTeam(body, endpoint) : null;
  }

  async getTeamBySlug(org: string, slug: string): Promise<GitHubTeam | null> {
    const endpoint = `orgs/${org}/teams/${slug}`;
    const body = await this.getObject(endpoint);
    return body ? toTeam(body, endpoint) : null;
  }

  /**
   * Lists the organization's custom repository roles. An organization
   * without the feature (404) has none.
   */
  async getCustomRepoRoles(org: string): Promise<GitHubCustomRepoRole[]> {
    const endpoint = `orgs/${org}/custom-repository-roles`;
    const body = await this.getObject(endpoint);
    if (!body) {
      return [];
    }
    const roles = body.custom_roles;
    if (!Array.isArray(roles)) {
      throw new UpstreamApiError(
        `GitHub API ${endpoint} returned no 'custom_roles' array`
      );
    }
    return roles.filter(isRecord).map((role) => ({
      id: requireNumber(role, "id", endpoint),
      name: requireString(role, "name", endpoint),
    }));
  }

  private async getObject(
    endpoint: string
  ): Promise<Record<string, unknown> | null> {
    const body = await this.api.getJson(endpoint);
    if (body === null) {
      return null;
    }
    if (!isRecord(body)) {
      throw new UpstreamApiError(
        `GitHub API ${endpoint} returned an unexpected response`
      );
    }
    return body;
  }
}
