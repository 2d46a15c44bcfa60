/**
 * Config file shape before validation and defaults.
 */
export interface RawConfig {
  rulesetsDir: string;
  host?: string;
  retries?: number;
  ignoreSenders?: string[];
}

export interface Config {
  /** Absolute path of the directory holding ruleset definition files */
  rulesetsDir: string;
  host: string;
  retries: number;
  /**
   * Sender logins whose events are ignored. The GitHub App's own bot login
   * is always ignored; list the token owner here when using GH_TOKEN.
   */
  ignoreSenders: string[];
}

export const DEFAULT_HOST = "github.com";
export const DEFAULT_RETRIES = 3;
