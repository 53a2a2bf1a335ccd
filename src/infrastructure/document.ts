/**
 * Structured-document accessor for YAML files.
 *
 * Reads and writes scalar fields by key path using the yaml document model,
 * so comments, key order and quoting of untouched content survive a write.
 * Reads follow aliases; writes never change an anchored node.
 */

import { readFileSync, renameSync, rmSync, statSync, writeFileSync } from "fs";
import path from "path";
import {
  Alias,
  Document,
  Pair,
  Scalar as YamlScalar,
  YAMLMap,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseDocument,
} from "yaml";
import { MalformedDocumentError, NotFoundError, SchemaError } from "../errors";
import type { FieldPath, Scalar } from "../types";
import { getErrorCode } from "../utils/helpers";

/** What lives at a path inside a document */
export type DocumentNode =
  | { type: "missing" }
  | { type: "null" }
  | { type: "scalar"; value: Scalar }
  | { type: "map"; keys: string[] }
  | { type: "seq"; length: number };

export interface DocumentAccessor {
  readonly file: string;
  get(path: FieldPath): Scalar | undefined;
  inspect(path: FieldPath): DocumentNode;
  /** Sets a scalar and atomically replaces the file on disk */
  set(path: FieldPath, value: Scalar): void;
}

// Keep long scalars on one line when re-serialising
const STRINGIFY_OPTIONS = { lineWidth: 0 } as const;

function keyName(key: unknown): string {
  return isScalar(key) ? String(key.value) : String(key);
}

function findPair(map: YAMLMap, key: string): Pair | undefined {
  for (const item of map.items) {
    if (keyName(item.key) === key) return item;
  }
  return undefined;
}

function toScalar(value: unknown): Scalar {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return String(value);
}

function isEmptyNode(node: unknown): boolean {
  return node === null || node === undefined || (isScalar(node) && node.value === null);
}

/**
 * Write to a sibling temp file, then rename over the target so readers
 * never observe a half-written document.
 */
export function atomicWriteFile(file: string, content: string): void {
  const dir = path.dirname(file);
  const tmpPath = path.join(
    dir,
    `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`,
  );

  let mode: number | undefined;
  try {
    mode = statSync(file).mode;
  } catch (err) {
    if (getErrorCode(err) !== "ENOENT") throw err;
  }

  try {
    writeFileSync(tmpPath, content, { encoding: "utf-8", mode });
    renameSync(tmpPath, file);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}

export class YamlDocument implements DocumentAccessor {
  private constructor(
    readonly file: string,
    private readonly doc: Document,
  ) {}

  /**
   * Parse a YAML file. Throws NotFoundError if it is missing and
   * MalformedDocumentError if it does not parse as a single document.
   */
  static open(file: string): YamlDocument {
    let raw: string;
    try {
      raw = readFileSync(file, "utf-8");
    } catch (err) {
      if (getErrorCode(err) === "ENOENT") {
        throw new NotFoundError(file, "Document not found");
      }
      throw err;
    }

    const doc = parseDocument(raw);
    if (doc.errors.length > 0) {
      throw new MalformedDocumentError(file, doc.errors[0].message.split("\n")[0]);
    }

    return new YamlDocument(file, doc);
  }

  private resolve(node: unknown): unknown {
    return isAlias(node) ? node.resolve(this.doc) : node;
  }

  /**
   * Replace an aliased mapping with a local `{ <<: *anchor }` mapping so a
   * key can be added to it without touching the anchor or its other users.
   * Only the mapping that receives the leaf may be an alias.
   */
  private detachAlias(pair: Pair, alias: Alias, holdsLeaf: boolean, at: string): unknown {
    const target = alias.resolve(this.doc);
    if (isEmptyNode(target)) return undefined;

    if (!holdsLeaf || !isMap(target)) {
      throw new SchemaError(this.file, `Cannot write through the alias at '${at}'`);
    }

    const local = new YAMLMap();
    local.items.push(new Pair(new YamlScalar("<<"), alias));
    pair.value = local;
    return local;
  }

  private lookup(fieldPath: FieldPath): unknown {
    let node: unknown = this.resolve(this.doc.contents);

    for (const key of fieldPath) {
      if (!isMap(node)) return undefined;
      const pair = findPair(node, key);
      if (!pair) return undefined;
      node = this.resolve(pair.value);
    }

    return node;
  }

  inspect(fieldPath: FieldPath): DocumentNode {
    const node = this.lookup(fieldPath);

    if (node === undefined) return { type: "missing" };
    if (isEmptyNode(node)) return { type: "null" };
    if (isMap(node)) return { type: "map", keys: node.items.map((item) => keyName(item.key)) };
    if (isSeq(node)) return { type: "seq", length: node.items.length };
    if (isScalar(node)) return { type: "scalar", value: toScalar(node.value) };

    return { type: "scalar", value: toScalar(node) };
  }

  get(fieldPath: FieldPath): Scalar | undefined {
    const node = this.inspect(fieldPath);
    if (node.type === "scalar") return node.value;
    if (node.type === "null") return null;
    return undefined;
  }

  set(fieldPath: FieldPath, value: Scalar): void {
    if (fieldPath.length === 0) {
      throw new SchemaError(this.file, "Cannot set the document root");
    }

    if (isEmptyNode(this.doc.contents)) {
      this.doc.contents = new YAMLMap();
    }

    let parent: unknown = this.doc.contents;
    const walked: string[] = [];
    const parents = fieldPath.slice(0, -1);

    for (const [index, key] of parents.entries()) {
      if (!isMap(parent)) {
        throw new SchemaError(this.file, `Expected a mapping at '${walked.join(".") || "<root>"}'`);
      }

      const pair = findPair(parent, key);
      let child: unknown = pair?.value;
      if (pair && isAlias(pair.value)) {
        const at = [...walked, key].join(".");
        child = this.detachAlias(pair, pair.value, index === parents.length - 1, at);
      }

      if (isEmptyNode(child)) {
        child = new YAMLMap();
        parent.set(pair ? pair.key : key, child);
      }

      walked.push(key);
      parent = child;
    }

    if (!isMap(parent)) {
      throw new SchemaError(this.file, `Expected a mapping at '${walked.join(".") || "<root>"}'`);
    }

    const leaf = fieldPath[fieldPath.length - 1];
    const existing = findPair(parent, leaf);
    parent.set(existing ? existing.key : leaf, value);

    atomicWriteFile(this.file, this.doc.toString(STRINGIFY_OPTIONS));
  }
}

export function openDocument(file: string): DocumentAccessor {
  return YamlDocument.open(file);
}
