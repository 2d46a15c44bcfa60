import { createSign } from "node:crypto";
import { AuthError, errorMessage } from "../shared/errors.js";
import { withRetry } from "../shared/retry-utils.js";

export interface GitHubAppTokenManagerOptions {
  /** GitHub host of the organizations, e.g. github.com */
  host?: string;
  retries?: number;
  retryMinTimeout?: number;
}

/**
 * Derives the GitHub API host from a web host.
 * - github.com -> api.github.com
 * - ghe.example.com -> ghe.example.com/api/v3
 */
export function deriveApiHost(host: string): string {
  if (host === "github.com") {
    return "api.github.com";
  }
  return `${host}/api/v3`;
}

/**
 * Encodes data as base64url (no padding).
 */
function base64UrlEncode(data: string | Buffer): string {
  const buffer = typeof data === "string" ? Buffer.from(data) : data;
  return buffer
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, url: string) {
    super(`GitHub API error: HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/**
 * Mints GitHub App credentials: the app JWT, an organization's
 * installation ID, and installation access tokens.
 *
 * Tokens are not cached; every call asks GitHub for a new one.
 */
export class GitHubAppTokenManager {
  private readonly appId: string;
  private readonly privateKey: string;
  private readonly apiHost: string;
  private readonly retries: number;
  private readonly retryMinTimeout?: number;

  constructor(
    appId: string,
    privateKey: string,
    options?: GitHubAppTokenManagerOptions
  ) {
    this.appId = appId;
    this.privateKey = privateKey;
    this.apiHost = deriveApiHost(options?.host ?? "github.com");
    this.retries = options?.retries ?? 3;
    this.retryMinTimeout = options?.retryMinTimeout;
  }

  /**
   * Generates a JWT for GitHub App authentication, signed with RS256 and
   * valid for 10 minutes.
   */
  generateJWT(): string {
    const now = Math.floor(Date.now() / 1000);

    const header = {
      alg: "RS256",
      typ: "JWT",
    };

    const payload = {
      iat: now - 60, // clock drift allowance
      exp: now + 600,
      iss: this.appId,
    };

    const encodedHeader = base64UrlEncode(JSON.stringify(header));
    const encodedPayload = base64UrlEncode(JSON.stringify(payload));

    const signatureInput = `${encodedHeader}.${encodedPayload}`;

    let signature: Buffer;
    try {
      const sign = createSign("RSA-SHA256");
      sign.update(signatureInput);
      signature = sign.sign(this.privateKey);
    } catch (error) {
      throw new AuthError(
        `Failed to sign GitHub App JWT: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return `${signatureInput}.${base64UrlEncode(signature)}`;
  }

  /**
   * Looks up the app's installation on an organization.
   * @throws AuthError if the app is not installed or the call fails
   */
  async getOrgInstallationId(
    org: string,
    signal?: AbortSignal
  ): Promise<number> {
    const body = await this.call(
      "GET",
      `https://${this.apiHost}/orgs/${org}/installation`,
      `Failed to get installation for the app on ${org}`,
      signal
    );
    if (typeof body.id !== "number") {
      throw new AuthError(`Installation response for ${org} has no 'id'`);
    }
    return body.id;
  }

  /**
   * Looks up the app's slug. Its bot user is `<slug>[bot]`.
   * @throws AuthError if the call fails
   */
  async getAppSlug(signal?: AbortSignal): Promise<string> {
    const body = await this.call(
      "GET",
      `https://${this.apiHost}/app`,
      "Failed to get the authenticated app",
      signal
    );
    if (typeof body.slug !== "string") {
      throw new AuthError("App response has no 'slug'");
    }
    return body.slug;
  }

  /**
   * Creates an installation access token.
   * @throws AuthError if GitHub refuses
   */
  async createInstallationToken(
    installationId: number,
    signal?: AbortSignal
  ): Promise<string> {
    const body = await this.call(
      "POST",
      `https://${this.apiHost}/app/installations/${installationId}/access_tokens`,
      `Failed to create installation token for installation ${installationId}`,
      signal
    );
    if (typeof body.token !== "string") {
      throw new AuthError(
        `Token response for installation ${installationId} has no 'token'`
      );
    }
    return body.token;
  }

  private async call(
    method: "GET" | "POST",
    url: string,
    failure: string,
    signal?: AbortSignal
  ): Promise<Record<string, unknown>> {
    const jwt = this.generateJWT();

    let body: unknown;
    try {
      const response = await withRetry(
        async () => {
          const res = await fetch(url, {
            method,
            headers: {
              Authorization: `Bearer ${jwt}`,
              Accept: "application/vnd.github+json",
              "X-GitHub-Api-Version": "2022-11-28",
            },
            signal,
          });

          if (!res.ok) {
            throw new HttpStatusError(res.status, url);
          }

          return res;
        },
        { retries: this.retries, minTimeout: this.retryMinTimeout, signal }
      );
      body = await response.json();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new AuthError(`${failure}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!isRecord(body)) {
      throw new AuthError(`${failure}: unexpected response body`);
    }
    return body;
  }
}
