import { execFile } from "node:child_process";

export interface CommandResult {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** Killed because `timeoutMs` elapsed. */
  readonly timedOut: boolean;
  /** Set when the binary could not be started at all. */
  readonly spawnErrorCode?: string;
}

export interface CommandInput {
  readonly file: string;
  readonly args: readonly string[];
  readonly env: NodeJS.ProcessEnv;
  readonly timeoutMs: number;
}

export type CommandRunner = (input: CommandInput) => Promise<CommandResult>;

/**
 * Runs a binary to completion, killing it once `timeoutMs` elapses. Never
 * rejects: every outcome is described by the result.
 */
export const runCommand: CommandRunner = (input) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), input.timeoutMs);

  return new Promise<CommandResult>((resolve) => {
    execFile(
      input.file,
      [...input.args],
      {
        encoding: "utf8",
        env: input.env,
        maxBuffer: 10 * 1024 * 1024,
        signal: controller.signal,
      },
      (error, stdout, stderr) => {
        clearTimeout(timeout);
        const timedOut = controller.signal.aborted;

        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        const spawnErrorCode =
          typeof error.code === "string" && !timedOut ? error.code : undefined;
        resolve({
          exitCode: typeof error.code === "number" ? error.code : null,
          stdout,
          stderr,
          timedOut,
          ...(spawnErrorCode ? { spawnErrorCode } : {}),
        });
      },
    );
  });
};
