import type { ICommandExecutor } from "../../src/shared/command-executor.js";

export interface ExecutorMockConfig {
  defaultResponse?: string;
  /** First pattern contained in the command wins */
  responses?: Map<string, string | Error>;
}

export interface ExecutorMockResult {
  mock: ICommandExecutor;
  calls: Array<{ command: string; cwd: string }>;
  reset: () => void;
}

export function createMockExecutor(
  config: ExecutorMockConfig = {}
): ExecutorMockResult {
  const calls: Array<{ command: string; cwd: string }> = [];
  const responses = config.responses ?? new Map<string, string | Error>();
  const defaultResponse = config.defaultResponse ?? "";

  const mock: ICommandExecutor = {
    async exec(command: string, cwd: string): Promise<string> {
      calls.push({ command, cwd });

      for (const [pattern, response] of responses) {
        if (command.includes(pattern)) {
          if (response instanceof Error) {
            throw response;
          }
          return response;
        }
      }

      return defaultResponse;
    },
  };

  return {
    mock,
    calls,
    reset: () => {
      calls.length = 0;
    },
  };
}

/**
 * Error shaped like a failed `gh api` call.
 */
export function ghError(message: string): Error & { stderr: string } {
  return Object.assign(new Error(message), { stderr: message });
}
