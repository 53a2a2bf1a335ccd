import path from "path";
import { describe, expect, it } from "vitest";
import { requireRegistry, resolveConfig } from "../../src/config/config";
import { ConfigError } from "../../src/errors";
import { createTree } from "../helpers/fixtures";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    const cwd = createTree();

    expect(resolveConfig({ env: {}, cwd })).toEqual({
      root: cwd,
      registry: undefined,
      maxDepth: 1,
      tag: "latest",
    });
  });

  it("reads stevedore.json relative to the working directory", () => {
    const cwd = createTree({
      "stevedore.json": JSON.stringify({ root: "stacks", registry: "acme", maxDepth: 3, tag: "stable" }),
    });

    expect(resolveConfig({ env: {}, cwd })).toEqual({
      root: path.join(cwd, "stacks"),
      registry: "acme",
      maxDepth: 3,
      tag: "stable",
    });
  });

  it("lets environment variables override the file and flags override both", () => {
    const cwd = createTree({ "stevedore.json": JSON.stringify({ registry: "file", maxDepth: 3 }) });
    const env = {
      STEVEDORE_REGISTRY: "env",
      STEVEDORE_ROOT: "/srv/env",
      STEVEDORE_MAX_DEPTH: "2",
    };

    expect(resolveConfig({ env, cwd })).toMatchObject({
      registry: "env",
      root: "/srv/env",
      maxDepth: 2,
    });
    expect(
      resolveConfig({ env, cwd, flags: { registry: "flag", root: "here", maxDepth: "0" } }),
    ).toMatchObject({ registry: "flag", root: path.join(cwd, "here"), maxDepth: 0 });
  });

  it("ignores empty environment variables", () => {
    const cwd = createTree({ "stevedore.json": JSON.stringify({ registry: "file" }) });

    expect(resolveConfig({ env: { STEVEDORE_REGISTRY: "" }, cwd }).registry).toBe("file");
  });

  it("rejects a non-numeric depth", () => {
    const cwd = createTree();

    expect(() => resolveConfig({ env: {}, cwd, flags: { maxDepth: "two" } })).toThrow(
      "--max-depth must be a non-negative integer, got 'two'",
    );
    expect(() => resolveConfig({ env: { STEVEDORE_MAX_DEPTH: "-1" }, cwd })).toThrow(ConfigError);
  });

  it("rejects a config file that fails the schema", () => {
    const cwd = createTree({ "stevedore.json": JSON.stringify({ maxDepth: -1, extra: true }) });

    expect(() => resolveConfig({ env: {}, cwd })).toThrow(ConfigError);
  });

  it("rejects a config file that is not JSON", () => {
    const cwd = createTree({ "stevedore.json": "{ registry: acme" });

    expect(() => resolveConfig({ env: {}, cwd })).toThrow("stevedore.json is not valid JSON");
  });
});

describe("requireRegistry", () => {
  it("fails when no registry is configured", () => {
    const cwd = createTree();

    expect(() => requireRegistry(resolveConfig({ env: {}, cwd }))).toThrow(ConfigError);
    expect(requireRegistry(resolveConfig({ env: {}, cwd, flags: { registry: "acme" } }))).toBe("acme");
  });
});
