/**
 * Docker Compose file reader.
 */

import { SchemaError } from "../errors";
import { openDocument, type DocumentAccessor } from "./document";

export const COMPOSE_FILENAMES = ["docker-compose.yaml", "docker-compose.yml"] as const;

/**
 * Service names declared under the top-level `services` key, in document order.
 * An empty `services:` key is valid and yields no services.
 */
export function readServices(doc: DocumentAccessor): string[] {
  const services = doc.inspect(["services"]);

  switch (services.type) {
    case "map":
      return services.keys;
    case "null":
      return [];
    case "missing":
      throw new SchemaError(doc.file, "Missing top-level 'services' key");
    default:
      throw new SchemaError(doc.file, `'services' must be a mapping, found ${services.type}`);
  }
}

export function listServices(projectFile: string): string[] {
  return readServices(openDocument(projectFile));
}
