/**
 * Pins an image reference into a compose service entry.
 */

import { SchemaError } from "../errors";
import { openDocument, type DocumentAccessor } from "../infrastructure/document";
import { formatImageReference } from "../naming/resolve";
import type { ImageReference } from "../types";

export type MutationOutcome = "updated" | "unchanged";

/**
 * Write `image` into `services.<service>.image` of an open document.
 * Never creates a service entry; skips the write when the value is already pinned.
 */
export function applyImage(
  doc: DocumentAccessor,
  serviceName: string,
  image: ImageReference,
): MutationOutcome {
  const service = doc.inspect(["services", serviceName]);

  if (service.type === "missing") {
    throw new SchemaError(doc.file, `Service '${serviceName}' is not declared`);
  }
  if (service.type !== "map" && service.type !== "null") {
    throw new SchemaError(
      doc.file,
      `Service '${serviceName}' must be a mapping, found ${service.type}`,
    );
  }

  const rendered = formatImageReference(image);
  const imagePath = ["services", serviceName, "image"];

  if (doc.get(imagePath) === rendered) {
    return "unchanged";
  }

  doc.set(imagePath, rendered);
  return "updated";
}

export function setImage(
  projectFile: string,
  serviceName: string,
  image: ImageReference,
): MutationOutcome {
  return applyImage(openDocument(projectFile), serviceName, image);
}
