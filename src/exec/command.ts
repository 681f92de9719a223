import { execFile } from "node:child_process";
import { promisify } from "node:util";

export interface CommandOutput {
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandOptions {
  readonly env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

export const execCommand: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    env: options?.env,
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

/** Prefer the child's stderr over the generic "Command failed" message. */
export function describeCommandFailure(error: unknown): string {
  if (error instanceof Error) {
    const stderr =
      "stderr" in error && typeof error.stderr === "string"
        ? error.stderr.trim()
        : "";
    return stderr || error.message;
  }
  return String(error);
}
