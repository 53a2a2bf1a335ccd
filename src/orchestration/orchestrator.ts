/**
 * Run orchestration.
 *
 * Tag mode:        discover -> list services -> resolve -> pin, per project
 * Build-push mode: discover -> ping engine -> build -> push, per project
 *
 * Projects run one at a time in discovery order. A failing project is
 * recorded in the report and never stops the ones after it; only setup
 * errors (bad root, unreachable engine) abort the run.
 */

import path from "path";
import { discoverProjects, type WarningHandler } from "../discovery/discover";
import { buildAndPush } from "../execution/driver";
import type { BuildEngine } from "../execution/engine";
import { listServices } from "../infrastructure/compose";
import { setImage } from "../mutation/setImage";
import { DEFAULT_TAG, formatImageReference, resolveImage } from "../naming/resolve";
import type { ProjectDefinition, RunMode, RunReport } from "../types";
import { logger } from "../utils/logger";
import { tailLines } from "../utils/helpers";
import {
  createInitialState,
  toReport,
  toReportedError,
  transition,
  type ProjectState,
} from "./state";

export type DiscoveryOptions = {
  root: string;
  maxDepth: number;
  onWarning?: WarningHandler;
};

export type TagRunOptions = DiscoveryOptions & {
  registry: string;
  tag?: string;
};

export type BuildRunOptions = DiscoveryOptions & {
  engine: BuildEngine;
};

// Lines of failing command output kept in the report
const OUTPUT_TAIL_LINES = 20;

function discover(options: DiscoveryOptions): ProjectDefinition[] {
  const warn: WarningHandler =
    options.onWarning ?? ((message, details) => logger.warn(message, details));
  const projects = discoverProjects(options.root, options.maxDepth, { onWarning: warn });

  if (projects.length === 0) {
    warn("No compose projects found", { Root: options.root, "Max Depth": String(options.maxDepth) });
  }

  const seen = new Map<string, string>();
  for (const project of projects) {
    const first = seen.get(project.projectId);
    if (first) {
      warn(`Projects share the identifier '${project.projectId}'; their image names collide`, {
        First: first,
        Second: project.dir,
      });
    } else {
      seen.set(project.projectId, project.dir);
    }
  }

  return projects;
}

function finish(mode: RunMode, root: string, states: ProjectState[]): RunReport {
  const projects = states.map(toReport);
  return {
    mode,
    root: path.resolve(root),
    projects,
    ok: projects.every((p) => p.status === "done"),
  };
}

function tagProject(
  state: ProjectState,
  registry: string,
  tag: string,
): ProjectState {
  const { project } = state;
  let current = transition(state, "processing");
  logger.stage(`Project: ${project.projectId}`);
  logger.info(`Compose: ${project.file}`);

  const images: string[] = [];
  try {
    const services = listServices(project.file);

    for (const service of services) {
      const image = resolveImage(registry, project.projectId, service, tag);
      const rendered = formatImageReference(image);
      const outcome = setImage(project.file, service, image);

      images.push(rendered);
      logger.result(true, `${service} -> ${rendered}`, outcome === "unchanged" ? { Status: "already pinned" } : undefined);
    }

    current = transition(current, "done", { images });
  } catch (err) {
    const error = toReportedError(err);
    logger.result(false, `Tagging failed: ${error.kind}`, { Error: error.message });
    current = transition(current, "failed", { images, error });
  }

  return current;
}

export function runTagMode(options: TagRunOptions): RunReport {
  const tag = options.tag ?? DEFAULT_TAG;
  const states = discover(options).map(createInitialState);

  const finished = states.map((state) => tagProject(state, options.registry, tag));
  return finish("tag", options.root, finished);
}

async function buildProject(
  state: ProjectState,
  engine: BuildEngine,
): Promise<ProjectState> {
  const { project } = state;
  const current = transition(state, "processing");
  logger.stage(`Project: ${project.projectId}`);
  logger.info(`Compose: ${project.file}`);

  try {
    logger.action("Building and pushing images");
    const result = await buildAndPush(project.dir, engine);

    if (result.status === "Success") {
      logger.result(true, "Built and pushed");
      return transition(current, "done");
    }

    const output = tailLines(result.output, OUTPUT_TAIL_LINES);
    logger.result(false, result.status === "BuildFailed" ? "Build failed" : "Push failed", {
      "Exit Code": result.exitCode,
    });

    return transition(current, "failed", {
      error: {
        kind: result.status,
        message: output || `exit code ${result.exitCode}`,
      },
    });
  } catch (err) {
    const error = toReportedError(err);
    logger.result(false, "Build engine error", { Error: error.message });
    return transition(current, "failed", { error });
  }
}

export async function runBuildMode(options: BuildRunOptions): Promise<RunReport> {
  const states = discover(options).map(createInitialState);

  if (states.length > 0) {
    await options.engine.ping();
  }

  const finished: ProjectState[] = [];
  for (const state of states) {
    finished.push(await buildProject(state, options.engine));
  }

  return finish("build-push", options.root, finished);
}
