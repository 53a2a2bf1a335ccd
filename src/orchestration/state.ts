/**
 * Per-project state for an orchestrator run.
 *
 * Each discovered project moves pending -> processing -> done | failed,
 * independently of every other project.
 */

import { StevedoreError } from "../errors";
import type {
  ProjectDefinition,
  ProjectReport,
  ProjectStatus,
  ReportedError,
} from "../types";
import { getErrorMessage } from "../utils/helpers";

export type ProjectState = Readonly<{
  project: ProjectDefinition;
  status: ProjectStatus;
  /** Image references pinned so far (tag mode) */
  images: string[];
  error: ReportedError | null;
}>;

const TRANSITIONS: Record<ProjectStatus, readonly ProjectStatus[]> = {
  pending: ["processing"],
  processing: ["done", "failed"],
  done: [],
  failed: [],
};

export function createInitialState(project: ProjectDefinition): ProjectState {
  return { project, status: "pending", images: [], error: null };
}

export function transition(
  state: ProjectState,
  next: ProjectStatus,
  patch: Partial<Pick<ProjectState, "images" | "error">> = {},
): ProjectState {
  if (!TRANSITIONS[state.status].includes(next)) {
    throw new Error(
      `Illegal transition for ${state.project.projectId}: ${state.status} -> ${next}`,
    );
  }
  return { ...state, ...patch, status: next };
}

/**
 * Convert a caught error into the kind/message pair stored in the report.
 */
export function toReportedError(err: unknown): ReportedError {
  if (err instanceof StevedoreError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: "UnexpectedError", message: getErrorMessage(err) };
}

export function toReport(state: ProjectState): ProjectReport {
  if (state.status !== "done" && state.status !== "failed") {
    throw new Error(
      `Project ${state.project.projectId} has not finished (status: ${state.status})`,
    );
  }

  const report: ProjectReport = {
    projectId: state.project.projectId,
    file: state.project.file,
    status: state.status,
  };
  if (state.images.length > 0) report.images = state.images;
  if (state.error) report.error = state.error;
  return report;
}
