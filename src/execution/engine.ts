/**
 * Build engine backed by the Docker CLI and daemon.
 */

import Docker from "dockerode";
import { EngineUnavailableError } from "../errors";
import { getErrorMessage } from "../utils/helpers";
import { logger } from "../utils/logger";
import { execCmd, type CommandResult } from "./executor";

export interface BuildEngine {
  /** Throws EngineUnavailableError when builds cannot run at all */
  ping(): Promise<void>;
  build(projectDir: string): Promise<CommandResult>;
  push(projectDir: string): Promise<CommandResult>;
}

export type ComposeEngineOptions = {
  /** Docker CLI executable */
  binary?: string;
  docker?: Docker;
  /** Receives build and push output line by line; defaults to the console logger */
  onOutput?: (line: string) => void;
};

/**
 * Runs `docker compose build` / `docker compose push` inside the project
 * directory, letting compose pick up the project file the way it normally does.
 */
export class ComposeEngine implements BuildEngine {
  private readonly binary: string;
  private readonly docker: Docker;
  private readonly onOutput: (line: string) => void;

  constructor(options: ComposeEngineOptions = {}) {
    this.binary = options.binary ?? "docker";
    this.docker = options.docker ?? new Docker();
    this.onOutput = options.onOutput ?? ((line) => logger.output(line));
  }

  async ping(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (err) {
      throw new EngineUnavailableError(getErrorMessage(err));
    }
  }

  build(projectDir: string): Promise<CommandResult> {
    return this.compose("build", projectDir);
  }

  push(projectDir: string): Promise<CommandResult> {
    return this.compose("push", projectDir);
  }

  private compose(step: "build" | "push", projectDir: string): Promise<CommandResult> {
    return execCmd(this.binary, ["compose", step], {
      cwd: projectDir,
      onLine: this.onOutput,
    });
  }
}
