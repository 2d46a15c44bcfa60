import {
  type ICommandExecutor,
  defaultExecutor,
} from "../shared/command-executor.js";
import { UpstreamApiError, errorMessage } from "../shared/errors.js";
import { withRetry } from "../shared/retry-utils.js";
import { sanitizeCredentials } from "../shared/sanitize-utils.js";
import { escapeShellArg } from "../shared/shell-utils.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface GhApiOptions {
  executor?: ICommandExecutor;
  /** Sent as GH_TOKEN; the ambient `gh auth` login is used when absent */
  token?: string;
  /** GitHub host, e.g. github.com or a GitHub Enterprise hostname */
  host?: string;
  retries?: number;
  /** Delay before the first retry in ms */
  retryMinTimeout?: number;
  cwd?: string;
}

const NOT_FOUND_PATTERNS = [/HTTP 404/, /Not Found/];

/**
 * Returns true if a `gh api` failure means the resource does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  const stderr =
    error instanceof Error && "stderr" in error ? String(error.stderr) : "";
  const text = `${errorMessage(error)}\n${stderr}`;
  return NOT_FOUND_PATTERNS.some((pattern) => pattern.test(text));
}

function extractStatus(error: unknown): number | undefined {
  const match = /HTTP (\d{3})/.exec(errorMessage(error));
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Thin wrapper over the `gh api` CLI: authentication, GitHub Enterprise
 * hosts, retries and JSON decoding.
 */
export class GhApi {
  private readonly executor: ICommandExecutor;
  private readonly token?: string;
  private readonly host?: string;
  private readonly retries: number;
  private readonly retryMinTimeout?: number;
  private readonly cwd: string;

  constructor(options?: GhApiOptions) {
    const opts = options ?? {};
    this.executor = opts.executor ?? defaultExecutor;
    this.token = opts.token;
    this.host = opts.host;
    this.retries = opts.retries ?? 3;
    this.retryMinTimeout = opts.retryMinTimeout;
    this.cwd = opts.cwd ?? process.cwd();
  }

  /**
   * Calls the endpoint and returns the raw response body.
   * @throws UpstreamApiError once retries are exhausted
   */
  async request(
    method: HttpMethod,
    endpoint: string,
    payload?: unknown
  ): Promise<string> {
    const command = this.buildCommand(method, endpoint, payload);
    try {
      return await withRetry(() => this.executor.exec(command, this.cwd), {
        retries: this.retries,
        minTimeout: this.retryMinTimeout,
      });
    } catch (error) {
      throw new UpstreamApiError(
        `GitHub API ${method} ${endpoint} failed: ${sanitizeCredentials(errorMessage(error))}`,
        { cause: error, status: extractStatus(error) }
      );
    }
  }

  /**
   * GETs a JSON resource. Resolves to null when GitHub answers 404.
   */
  async getJson(endpoint: string): Promise<unknown> {
    let body: string;
    try {
      body = await this.request("GET", endpoint);
    } catch (error) {
      if (
        error instanceof UpstreamApiError &&
        (error.status === 404 || isNotFoundError(error.cause))
      ) {
        return null;
      }
      throw error;
    }
    return this.parse(endpoint, body);
  }

  async sendJson(
    method: HttpMethod,
    endpoint: string,
    payload?: unknown
  ): Promise<unknown> {
    return this.parse(endpoint, await this.request(method, endpoint, payload));
  }

  private parse(endpoint: string, body: string): unknown {
    if (body === "") {
      return null;
    }
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new UpstreamApiError(
        `GitHub API ${endpoint} returned invalid JSON: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private buildCommand(
    method: HttpMethod,
    endpoint: string,
    payload?: unknown
  ): string {
    const args: string[] = ["gh", "api"];

    if (method !== "GET") {
      args.push("-X", method);
    }

    if (this.host && this.host !== "github.com") {
      args.push("--hostname", escapeShellArg(this.host));
    }

    args.push(escapeShellArg(endpoint));

    const baseCommand = args.join(" ");
    const tokenPrefix = this.token
      ? `GH_TOKEN=${escapeShellArg(this.token)} `
      : "";

    if (payload !== undefined && (method === "POST" || method === "PUT")) {
      const payloadJson = JSON.stringify(payload);
      return `echo ${escapeShellArg(payloadJson)} | ${tokenPrefix}${baseCommand} --input -`;
    }

    return `${tokenPrefix}${baseCommand}`;
  }
}
