/**
 * Core domain types for Stevedore.
 * These types represent the data structures that flow through a run.
 */

/** Path of keys into a structured document, e.g. ["services", "web", "image"] */
export type FieldPath = readonly string[];

/** Scalar values the document accessor reads and writes */
export type Scalar = string | number | boolean | null;

/** A discovered compose project */
export type ProjectDefinition = {
  projectId: string; // basename of dir
  dir: string;
  file: string; // absolute path to the compose file
};

/** Canonical image reference, rendered as registry/project-service:tag */
export type ImageReference = {
  registry: string;
  project: string;
  service: string;
  tag: string;
};

/** Which pipeline a run executes */
export type RunMode = "tag" | "build-push";

/** Per-project lifecycle within a single run */
export type ProjectStatus = "pending" | "processing" | "done" | "failed";

/** Error kinds surfaced in a project report */
export type ErrorKind =
  | "NotFoundError"
  | "MalformedDocumentError"
  | "SchemaError"
  | "InvalidIdentifierError"
  | "ConfigError"
  | "EngineUnavailableError"
  | "BuildFailed"
  | "PushFailed"
  | "UnexpectedError";

export type ReportedError = {
  kind: ErrorKind;
  message: string;
};

/** Outcome for one project after a run */
export type ProjectReport = {
  projectId: string;
  file: string;
  status: Extract<ProjectStatus, "done" | "failed">;
  images?: string[]; // tag mode only
  error?: ReportedError;
};

/** Outcome of a whole run, in discovery order */
export type RunReport = {
  mode: RunMode;
  root: string;
  projects: ProjectReport[];
  ok: boolean; // false if any project failed
};
