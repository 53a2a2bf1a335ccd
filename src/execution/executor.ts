/**
 * Command execution infrastructure.
 * Runs an external program and captures its result.
 */

import { execFile } from "child_process";
import type { Readable } from "stream";

export type CommandResult = {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives each line of stdout and stderr while the command runs */
  onLine?: (line: string) => void;
};

// Image builds are chatty; exec's 1 MiB default would kill the child
const MAX_BUFFER_BYTES = 256 * 1024 * 1024;

function forwardLines(stream: Readable | null, onLine: (line: string) => void): void {
  if (!stream) return;

  let pending = "";
  stream.on("data", (chunk: Buffer | string) => {
    const lines = (pending + chunk.toString()).split(/\r?\n/);
    pending = lines.pop() ?? "";
    for (const line of lines) onLine(line);
  });
  stream.on("end", () => {
    if (pending) onLine(pending);
    pending = "";
  });
}

export function execCmd(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = execFile(
      file,
      args,
      { cwd: options.cwd, env: options.env, maxBuffer: MAX_BUFFER_BYTES },
      (error, stdout, stderr) => {
        let exitCode = 0;
        let signal: string | null = null;

        if (error) {
          // code is a number for non-zero exits, a string (ENOENT, ...) when spawning failed
          if (typeof error.code === "number") {
            exitCode = error.code;
          } else {
            exitCode = error.code === "ENOENT" ? 127 : 1;
          }
          signal = error.signal ?? null;
        }

        resolve({
          success: exitCode === 0 && !signal,
          exitCode,
          stdout: stdout.trim(),
          stderr: (stderr.trim() || error?.message) ?? "",
        });
      },
    );

    if (options.onLine) {
      forwardLines(child.stdout, options.onLine);
      forwardLines(child.stderr, options.onLine);
    }
  });
}
