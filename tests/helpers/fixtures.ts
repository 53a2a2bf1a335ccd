import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";

/**
 * Create a temp directory populated with `files` (relative path -> content).
 */
export function createTree(files: Record<string, string> = {}): string {
  const root = mkdtempSync(path.join(tmpdir(), "stevedore-"));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, content, "utf-8");
  }
  return root;
}

export function read(root: string, relative: string): string {
  return readFileSync(path.join(root, relative), "utf-8");
}

export const BILLING_COMPOSE = `# billing stack
services:
  api:
    build: ./api
    ports:
      - "8080:80"
  worker:
    build: ./worker
    environment:
      QUEUE: billing
volumes:
  data: {}
`;
