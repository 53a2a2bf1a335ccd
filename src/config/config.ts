/**
 * Run configuration.
 *
 * Precedence, highest first: CLI flags, STEVEDORE_* environment variables,
 * stevedore.json in the working directory, built-in defaults.
 */

import fs from "fs";
import path from "path";
import configSchema from "./config.schema.json";
import { ConfigError } from "../errors";
import { DEFAULT_TAG } from "../naming/resolve";
import { validateSchema } from "../utils/validateSchema";
import { getErrorMessage } from "../utils/helpers";

export const CONFIG_FILENAME = "stevedore.json";

export const ENV_VARS = {
  root: "STEVEDORE_ROOT",
  registry: "STEVEDORE_REGISTRY",
  maxDepth: "STEVEDORE_MAX_DEPTH",
  tag: "STEVEDORE_TAG",
} as const;

// Project directories sit directly below the root
export const DEFAULT_MAX_DEPTH = 1;

export type FileConfig = {
  root?: string;
  registry?: string;
  maxDepth?: number;
  tag?: string;
};

/** Raw option values as commander hands them over */
export type CliFlags = {
  root?: string;
  registry?: string;
  maxDepth?: string;
  tag?: string;
};

export type Config = {
  root: string;
  registry: string | undefined;
  maxDepth: number;
  tag: string;
};

export type ConfigSources = {
  flags?: CliFlags;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export function loadConfigFile(cwd: string): FileConfig {
  const configPath = path.join(cwd, CONFIG_FILENAME);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILENAME} is not valid JSON: ${getErrorMessage(err)}`);
  }

  return validateSchema<FileConfig>(configSchema, parsed, CONFIG_FILENAME);
}

function parseMaxDepth(value: string, source: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${source} must be a non-negative integer, got '${value}'`);
  }
  return Number(value);
}

/** Empty strings count as unset */
function pick(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value !== "");
}

export function resolveConfig(sources: ConfigSources = {}): Config {
  const flags = sources.flags ?? {};
  const env = sources.env ?? process.env;
  const cwd = sources.cwd ?? process.cwd();
  const file = loadConfigFile(cwd);

  const root = pick(flags.root, env[ENV_VARS.root], file.root) ?? ".";

  const depthFlag = pick(flags.maxDepth);
  const depthEnv = pick(env[ENV_VARS.maxDepth]);
  let maxDepth = file.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (depthFlag !== undefined) {
    maxDepth = parseMaxDepth(depthFlag, "--max-depth");
  } else if (depthEnv !== undefined) {
    maxDepth = parseMaxDepth(depthEnv, ENV_VARS.maxDepth);
  }

  return {
    root: path.resolve(cwd, root),
    registry: pick(flags.registry, env[ENV_VARS.registry], file.registry),
    maxDepth,
    tag: pick(flags.tag, env[ENV_VARS.tag], file.tag) ?? DEFAULT_TAG,
  };
}

/** Tag mode cannot run without a registry */
export function requireRegistry(config: Config): string {
  if (!config.registry) {
    throw new ConfigError(
      `No registry configured: pass --registry, set ${ENV_VARS.registry}, or add "registry" to ${CONFIG_FILENAME}`,
    );
  }
  return config.registry;
}
