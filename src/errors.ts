/**
 * Error taxonomy.
 * Every error Stevedore throws on purpose carries a kind that ends up in the run report.
 */

import type { ErrorKind } from "./types";

type ThrownKind = Exclude<ErrorKind, "BuildFailed" | "PushFailed" | "UnexpectedError">;

export abstract class StevedoreError extends Error {
  abstract readonly kind: ThrownKind;
}

/** Root directory (or another required path) does not exist */
export class NotFoundError extends StevedoreError {
  readonly kind = "NotFoundError";

  constructor(public path: string, reason = "Path not found") {
    super(`${reason}: ${path}`);
    this.name = "NotFoundError";
  }
}

/** File is not valid structured data */
export class MalformedDocumentError extends StevedoreError {
  readonly kind = "MalformedDocumentError";

  constructor(public file: string, public reason: string) {
    super(`Malformed document ${file}: ${reason}`);
    this.name = "MalformedDocumentError";
  }
}

/** Document parses but an expected key is missing or has the wrong shape */
export class SchemaError extends StevedoreError {
  readonly kind = "SchemaError";

  constructor(public file: string, public reason: string) {
    super(`${reason} (${file})`);
    this.name = "SchemaError";
  }
}

/** A registry, project, service or tag cannot form a valid image reference */
export class InvalidIdentifierError extends StevedoreError {
  readonly kind = "InvalidIdentifierError";

  constructor(
    public field: "registry" | "project" | "service" | "tag",
    public value: string,
    public reason: string,
  ) {
    super(`Invalid ${field} '${value}': ${reason}`);
    this.name = "InvalidIdentifierError";
  }
}

export class ConfigError extends StevedoreError {
  readonly kind = "ConfigError";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Build engine cannot be reached before any project is built */
export class EngineUnavailableError extends StevedoreError {
  readonly kind = "EngineUnavailableError";

  constructor(public reason: string) {
    super(`Build engine unavailable: ${reason}`);
    this.name = "EngineUnavailableError";
  }
}

