import path from "path";
import { describe, expect, it, vi } from "vitest";
import { parse } from "yaml";
import { runBuildMode, runTagMode } from "../../src/orchestration/orchestrator";
import { EngineUnavailableError, NotFoundError } from "../../src/errors";
import { BILLING_COMPOSE, createTree, read } from "../helpers/fixtures";
import { failed, fakeEngine } from "../helpers/engine";

vi.mock("../../src/utils/logger", () => ({
  logger: {
    startup: vi.fn(),
    stage: vi.fn(),
    action: vi.fn(),
    result: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    output: vi.fn(),
    report: vi.fn(),
    shutdown: vi.fn(),
  },
}));

const WEB = "services:\n  web:\n    build: .\n";

describe("runTagMode", () => {
  it("tags every project and keeps going past a malformed one", () => {
    const root = createTree({
      "alpha/docker-compose.yml": WEB,
      "beta/docker-compose.yml": "services:\n  web: [\n",
      "gamma/docker-compose.yaml": WEB,
    });

    const report = runTagMode({ root, maxDepth: 1, registry: "acme", onWarning: vi.fn() });

    expect(report.ok).toBe(false);
    expect(report.projects.map((p) => [p.projectId, p.status, p.error?.kind])).toEqual([
      ["alpha", "done", undefined],
      ["beta", "failed", "MalformedDocumentError"],
      ["gamma", "done", undefined],
    ]);
    expect(parse(read(root, "alpha/docker-compose.yml")).services.web.image).toBe("acme/alpha-web:latest");
    expect(parse(read(root, "gamma/docker-compose.yaml")).services.web.image).toBe("acme/gamma-web:latest");
    expect(read(root, "beta/docker-compose.yml")).toBe("services:\n  web: [\n");
  });

  it("pins each service of a project to its own reference", () => {
    const root = createTree({ "billing/docker-compose.yml": BILLING_COMPOSE });

    const report = runTagMode({ root, maxDepth: 1, registry: "acme", tag: "2024.1", onWarning: vi.fn() });

    expect(report).toEqual({
      mode: "tag",
      root,
      ok: true,
      projects: [
        {
          projectId: "billing",
          file: path.join(root, "billing", "docker-compose.yml"),
          status: "done",
          images: ["acme/billing-api:2024.1", "acme/billing-worker:2024.1"],
        },
      ],
    });
    expect(parse(read(root, "billing/docker-compose.yml"))).toEqual({
      services: {
        api: { build: "./api", ports: ["8080:80"], image: "acme/billing-api:2024.1" },
        worker: {
          build: "./worker",
          environment: { QUEUE: "billing" },
          image: "acme/billing-worker:2024.1",
        },
      },
      volumes: { data: {} },
    });
  });

  it("produces byte-identical files when run twice", () => {
    const root = createTree({
      "billing/docker-compose.yml": BILLING_COMPOSE,
      "shop/docker-compose.yaml": "# shop\nservices:\n  web:\n    image: nginx\n  cache:\n",
    });
    const files = ["billing/docker-compose.yml", "shop/docker-compose.yaml"];

    runTagMode({ root, maxDepth: 1, registry: "acme", onWarning: vi.fn() });
    const first = files.map((f) => read(root, f));
    runTagMode({ root, maxDepth: 1, registry: "acme", onWarning: vi.fn() });
    const second = files.map((f) => read(root, f));

    expect(second).toEqual(first);
    expect(parse(first[1])).toEqual({
      services: {
        web: { image: "acme/shop-web:latest" },
        cache: { image: "acme/shop-cache:latest" },
      },
    });
  });

  it("records the triggering error and the images pinned before it", () => {
    const root = createTree({
      "proj/docker-compose.yml": 'services:\n  web:\n    build: .\n  "a/b":\n    build: .\n',
      "other/docker-compose.yml": "volumes: {}\n",
    });

    const report = runTagMode({ root, maxDepth: 1, registry: "acme", onWarning: vi.fn() });

    expect(report.projects).toEqual([
      {
        projectId: "other",
        file: path.join(root, "other", "docker-compose.yml"),
        status: "failed",
        error: {
          kind: "SchemaError",
          message: `Missing top-level 'services' key (${path.join(root, "other", "docker-compose.yml")})`,
        },
      },
      {
        projectId: "proj",
        file: path.join(root, "proj", "docker-compose.yml"),
        status: "failed",
        images: ["acme/proj-web:latest"],
        error: {
          kind: "InvalidIdentifierError",
          message: "Invalid service 'a/b': must not contain \"/\"",
        },
      },
    ]);
  });

  it("reports an empty tree as a successful run", () => {
    const root = createTree({ "README.md": "nothing here\n" });
    const onWarning = vi.fn();

    const report = runTagMode({ root, maxDepth: 1, registry: "acme", onWarning });

    expect(report).toEqual({ mode: "tag", root, projects: [], ok: true });
    expect(onWarning).toHaveBeenCalledWith("No compose projects found", { Root: root, "Max Depth": "1" });
  });

  it("warns when two projects share an identifier", () => {
    const root = createTree({
      "team-a/app/docker-compose.yml": WEB,
      "team-b/app/docker-compose.yml": WEB,
    });
    const onWarning = vi.fn();

    runTagMode({ root, maxDepth: 2, registry: "acme", onWarning });

    expect(onWarning).toHaveBeenCalledWith(
      "Projects share the identifier 'app'; their image names collide",
      { First: path.join(root, "team-a", "app"), Second: path.join(root, "team-b", "app") },
    );
  });

  it("aborts before touching any project when the root is missing", () => {
    const root = createTree();

    expect(() =>
      runTagMode({ root: path.join(root, "missing"), maxDepth: 1, registry: "acme" }),
    ).toThrow(NotFoundError);
  });
});

describe("runBuildMode", () => {
  function threeProjects() {
    const root = createTree({
      "alpha/docker-compose.yml": WEB,
      "beta/docker-compose.yml": WEB,
      "gamma/docker-compose.yml": WEB,
    });
    return { root, dir: (name: string) => path.join(root, name) };
  }

  it("skips push for a failed build and continues with the next project", async () => {
    const { root, dir } = threeProjects();
    const engine = fakeEngine({ [dir("beta")]: { build: failed("no space left on device") } });

    const report = await runBuildMode({ root, maxDepth: 1, engine, onWarning: vi.fn() });

    expect(report.ok).toBe(false);
    expect(report.projects.map((p) => [p.projectId, p.status])).toEqual([
      ["alpha", "done"],
      ["beta", "failed"],
      ["gamma", "done"],
    ]);
    expect(report.projects[1].error).toEqual({ kind: "BuildFailed", message: "no space left on device" });
    expect(engine.build.mock.calls).toEqual([[dir("alpha")], [dir("beta")], [dir("gamma")]]);
    expect(engine.push.mock.calls).toEqual([[dir("alpha")], [dir("gamma")]]);
  });

  it("reports a failed push", async () => {
    const { root, dir } = threeProjects();
    const engine = fakeEngine({ [dir("gamma")]: { push: failed("", 1) } });

    const report = await runBuildMode({ root, maxDepth: 1, engine, onWarning: vi.fn() });

    expect(report.projects[2]).toEqual({
      projectId: "gamma",
      file: path.join(dir("gamma"), "docker-compose.yml"),
      status: "failed",
      error: { kind: "PushFailed", message: "exit code 1" },
    });
  });

  it("records an engine that throws as an unexpected error", async () => {
    const { root, dir } = threeProjects();
    const engine = fakeEngine();
    engine.build.mockImplementationOnce(async () => {
      throw new Error("spawn EAGAIN");
    });

    const report = await runBuildMode({ root, maxDepth: 1, engine, onWarning: vi.fn() });

    expect(report.projects[0].error).toEqual({ kind: "UnexpectedError", message: "spawn EAGAIN" });
    expect(report.projects.slice(1).every((p) => p.status === "done")).toBe(true);
    expect(engine.push).not.toHaveBeenCalledWith(dir("alpha"));
  });

  it("aborts when the engine is unreachable", async () => {
    const { root } = threeProjects();
    const engine = fakeEngine();
    engine.ping.mockRejectedValueOnce(new EngineUnavailableError("connect ENOENT /var/run/docker.sock"));

    await expect(runBuildMode({ root, maxDepth: 1, engine, onWarning: vi.fn() })).rejects.toBeInstanceOf(
      EngineUnavailableError,
    );
    expect(engine.build).not.toHaveBeenCalled();
  });

  it("does not contact the engine when nothing was discovered", async () => {
    const root = createTree();
    const engine = fakeEngine();

    const report = await runBuildMode({ root, maxDepth: 1, engine, onWarning: vi.fn() });

    expect(report.projects).toEqual([]);
    expect(engine.ping).not.toHaveBeenCalled();
  });
});
