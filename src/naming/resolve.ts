/**
 * Canonical image naming.
 *
 * Every service of a project lives under one registry path segment:
 * `{registry}/{project}-{service}:{tag}`.
 */

import { InvalidIdentifierError } from "../errors";
import type { ImageReference } from "../types";

export const DEFAULT_TAG = "latest";

// Docker's tag grammar
const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

/**
 * Reserved characters per field. A registry may carry a port (`host:5000`),
 * so only project and service reject `:`.
 */
const RESERVED: Record<"registry" | "project" | "service", RegExp> = {
  registry: /[/@\s]/,
  project: /[/:@\s]/,
  service: /[/:@\s]/,
};

function assertIdentifier(
  field: keyof typeof RESERVED,
  value: string,
): void {
  if (value.length === 0) {
    throw new InvalidIdentifierError(field, value, "must not be empty");
  }

  const reserved = value.match(RESERVED[field]);
  if (reserved) {
    throw new InvalidIdentifierError(
      field,
      value,
      `must not contain ${JSON.stringify(reserved[0])}`,
    );
  }
}

export function resolveImage(
  registry: string,
  projectId: string,
  serviceName: string,
  tag: string = DEFAULT_TAG,
): ImageReference {
  assertIdentifier("registry", registry);
  assertIdentifier("project", projectId);
  assertIdentifier("service", serviceName);

  if (!TAG_PATTERN.test(tag)) {
    throw new InvalidIdentifierError(
      "tag",
      tag,
      "must be 1-128 characters of letters, digits, '_', '.' or '-' and not start with '.' or '-'",
    );
  }

  return { registry, project: projectId, service: serviceName, tag };
}

export function formatImageReference(ref: ImageReference): string {
  return `${ref.registry}/${ref.project}-${ref.service}:${ref.tag}`;
}
