import { execSync } from "node:child_process";
import { sanitizeCredentials } from "./sanitize-utils.js";

export interface ExecOptions {
  /** Additional environment variables for the command */
  env?: Record<string, string>;
}

/**
 * Runs shell commands. Injected into the GitHub clients so tests can script
 * `gh api` responses.
 */
export interface ICommandExecutor {
  /**
   * Execute a shell command and resolve with its trimmed stdout.
   * Rejects if the command exits non-zero.
   */
  exec(command: string, cwd: string, options?: ExecOptions): Promise<string>;
}

/**
 * Error thrown by {@link ShellCommandExecutor} with credentials already
 * stripped from the message and stderr.
 */
export class CommandError extends Error {
  readonly stderr: string;
  readonly status?: number;

  constructor(message: string, stderr: string, status?: number) {
    super(message);
    this.name = "CommandError";
    this.stderr = stderr;
    this.status = status;
  }
}

/**
 * Executor backed by child_process.execSync. Arguments must already be
 * quoted with escapeShellArg.
 */
export class ShellCommandExecutor implements ICommandExecutor {
  async exec(
    command: string,
    cwd: string,
    options?: ExecOptions
  ): Promise<string> {
    try {
      return execSync(command, {
        cwd,
        encoding: "utf-8",
        stdio: ["pipe", "pipe", "pipe"],
        env: options?.env ? { ...process.env, ...options.env } : undefined,
      }).trim();
    } catch (error) {
      const execError = error as {
        stderr?: Buffer | string;
        message?: string;
        status?: number | null;
      };
      const stderr = sanitizeCredentials(
        execError.stderr === undefined ? "" : execError.stderr.toString()
      );
      const message = sanitizeCredentials(execError.message);
      throw new CommandError(
        stderr ? `${message}\n${stderr}` : message,
        stderr,
        execError.status ?? undefined
      );
    }
  }
}

export const defaultExecutor: ICommandExecutor = new ShellCommandExecutor();
