/**
 * Configuration for docker-dash: an optional TOML file overridden by
 * command-line flags.
 */

import { readFile } from "node:fs/promises";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { logger } from "../logger.js";
import { DEFAULT_CONFIG_FILE } from "../paths.js";
import { errorMessage, UserError } from "./errors.js";

export interface DockerConfig {
  /** Daemon URL (unix://, tcp://, http(s)://, ssh://). Empty means environment defaults. */
  host: string;
  /** Private key used for ssh:// hosts. Empty means agent authentication. */
  identityFile: string;
}

export interface RefreshConfig {
  /** Duration string such as "30s". Empty disables auto-refresh. */
  interval: string;
}

export interface DashConfig {
  docker: DockerConfig;
  refresh: RefreshConfig;
}

export interface ConfigFlags {
  config?: string;
  dockerHost?: string;
  identityFile?: string;
  refreshInterval?: string;
}

// Unknown keys are dropped; wrong types fail the whole load.
const ConfigFileSchema = z.object({
  docker: z
    .object({
      host: z.string().default(""),
      identity_file: z.string().default(""),
    })
    .default({}),
  refresh: z
    .object({
      interval: z.string().default(""),
    })
    .default({}),
});

export function defaultConfig(): DashConfig {
  return { docker: { host: "", identityFile: "" }, refresh: { interval: "" } };
}

export function defaultConfigPath(): string {
  return DEFAULT_CONFIG_FILE;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Decode a TOML document into a config. Throws UserError on syntax or type errors. */
export function parseConfig(text: string): DashConfig {
  let doc: unknown;
  try {
    doc = parseToml(text);
  } catch (err: unknown) {
    throw new UserError(errorMessage(err), { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new UserError(where ? `${where}: ${issue?.message}` : parsed.error.message);
  }

  return {
    docker: { host: parsed.data.docker.host, identityFile: parsed.data.docker.identity_file },
    refresh: { interval: parsed.data.refresh.interval },
  };
}

/**
 * Load the config file at path. A missing file is not an error: the defaults
 * are returned and a notice is printed to stderr.
 */
export async function loadConfig(path: string): Promise<DashConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      process.stderr.write("Config file not present. Using default values\n");
      logger.info(`[config] ${path} not found, using defaults`);
      return defaultConfig();
    }
    throw new UserError(errorMessage(err), { cause: err });
  }

  const config = parseConfig(text);
  logger.debug(`[config] Loaded ${path}`);
  return config;
}

/** Non-empty flag values win over file values. */
export function applyFlags(config: DashConfig, flags: ConfigFlags): DashConfig {
  return {
    docker: {
      host: flags.dockerHost || config.docker.host,
      identityFile: flags.identityFile || config.docker.identityFile,
    },
    refresh: {
      interval: flags.refreshInterval || config.refresh.interval,
    },
  };
}
