/**
 * Command-line surface: `stevedore tag` and `stevedore build-push`.
 */

import { Command, CommanderError } from "commander";
import { resolveConfig, requireRegistry, type CliFlags } from "./config/config";
import { ComposeEngine, type BuildEngine } from "./execution/engine";
import { runBuildMode, runTagMode } from "./orchestration/orchestrator";
import { StevedoreError } from "./errors";
import type { RunReport } from "./types";
import { getErrorMessage } from "./utils/helpers";
import { logger } from "./utils/logger";

export const EXIT_CODES = {
  ok: 0,
  projectFailed: 1,
  aborted: 2,
} as const;

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Defaults to the Docker CLI */
  engine?: BuildEngine;
};

function exitCodeFor(report: RunReport): number {
  return report.ok ? EXIT_CODES.ok : EXIT_CODES.projectFailed;
}

function tagCommand(flags: CliFlags, deps: CliDeps): number {
  const config = resolveConfig({ flags, env: deps.env, cwd: deps.cwd });
  const registry = requireRegistry(config);

  logger.startup("tag", {
    Root: config.root,
    Registry: registry,
    Tag: config.tag,
    "Max Depth": config.maxDepth,
  });

  const report = runTagMode({
    root: config.root,
    maxDepth: config.maxDepth,
    registry,
    tag: config.tag,
  });
  logger.report(report);
  return exitCodeFor(report);
}

async function buildPushCommand(flags: CliFlags, deps: CliDeps): Promise<number> {
  const config = resolveConfig({ flags, env: deps.env, cwd: deps.cwd });

  logger.startup("build-push", {
    Root: config.root,
    "Max Depth": config.maxDepth,
  });

  const report = await runBuildMode({
    root: config.root,
    maxDepth: config.maxDepth,
    engine: deps.engine ?? new ComposeEngine(),
  });
  logger.report(report);
  return exitCodeFor(report);
}

function aborted(err: unknown): number {
  const label = err instanceof StevedoreError ? err.kind : "UnexpectedError";
  logger.result(false, `Run aborted: ${label}`, { Error: getErrorMessage(err) });
  return EXIT_CODES.aborted;
}

export function createProgram(deps: CliDeps, onExit: (code: number) => void): Command {
  const program = new Command()
    .name("stevedore")
    .description("Pin canonical image names into compose projects and build/push them")
    .exitOverride();

  program
    .command("tag")
    .description("Set services.<name>.image in every discovered compose file")
    .option("-r, --registry <name>", "registry namespace for image names")
    .option("--root <dir>", "directory to search for compose projects")
    .option("-d, --max-depth <n>", "directory levels below root to search")
    .option("-t, --tag <tag>", "image tag")
    .action((flags: CliFlags) => {
      try {
        onExit(tagCommand(flags, deps));
      } catch (err) {
        onExit(aborted(err));
      }
    });

  program
    .command("build-push")
    .description("Run docker compose build, then push, in every discovered project")
    .option("--root <dir>", "directory to search for compose projects")
    .option("-d, --max-depth <n>", "directory levels below root to search")
    .action(async (flags: CliFlags) => {
      try {
        onExit(await buildPushCommand(flags, deps));
      } catch (err) {
        onExit(aborted(err));
      }
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the chosen command.
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let exitCode: number = EXIT_CODES.ok;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    // --help and --version exit 0; usage errors count as an aborted run
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.aborted;
    }
    throw err;
  }

  return exitCode;
}
