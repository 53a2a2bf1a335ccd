/**
 * Build-then-push for a single project.
 * Push never runs after a failed build, and nothing is retried.
 */

import type { BuildEngine } from "./engine";
import type { CommandResult } from "./executor";

export type DriverResult =
  | { status: "Success" }
  | { status: "BuildFailed"; exitCode: number; output: string }
  | { status: "PushFailed"; exitCode: number; output: string };

function failureOutput(result: CommandResult): string {
  return result.stderr || result.stdout;
}

export async function buildAndPush(
  projectDir: string,
  engine: BuildEngine,
): Promise<DriverResult> {
  const build = await engine.build(projectDir);
  if (!build.success) {
    return {
      status: "BuildFailed",
      exitCode: build.exitCode,
      output: failureOutput(build),
    };
  }

  const push = await engine.push(projectDir);
  if (!push.success) {
    return {
      status: "PushFailed",
      exitCode: push.exitCode,
      output: failureOutput(push),
    };
  }

  return { status: "Success" };
}
