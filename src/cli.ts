#!/usr/bin/env node

/**
 * docker-dash: terminal dashboard for a local or remote Docker daemon.
 */

import { parseArgs } from "node:util";
import { applyFlags, defaultConfigPath, loadConfig, type DashConfig } from "./core/config.js";
import { errorMessage } from "./core/errors.js";
import { createEngineClient, MockEngineClient } from "./engine/index.js";
import type { EngineClient } from "./engine/types.js";
import { logger } from "./logger.js";
import { App } from "./tui/app.js";
import { runTui } from "./tui/render.js";
import { EXIT_OK, EXIT_STARTUP, VERSION } from "./types.js";

function help(): void {
  console.log(`
docker-dash - Terminal dashboard for Docker

Usage:
  docker-dash [options]

Options:
  --config <path>                 Config file (default: ${defaultConfigPath()})
  --docker.host <url>             Daemon URL: unix://, tcp://, http(s)://, ssh://user@host[:port][/socket]
  --docker.identity-file <path>   Private key for ssh:// hosts (default: SSH agent)
  --refresh.interval <duration>   Auto-refresh period, e.g. 30s or 1m (default: off)
  -h, --help                      Show this help
  -v, --version                   Show version

Keys:
  q / ctrl+c quit   ←/→ switch tab   r refresh   ctrl+r refresh all   ? full help
`);
}

function parseFlags(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: "string" },
      "docker.host": { type: "string" },
      "docker.identity-file": { type: "string" },
      "refresh.interval": { type: "string" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    strict: true,
  }).values;
}

type Flags = ReturnType<typeof parseFlags>;

/** Connect to the configured daemon, or fall back to sample data when it cannot be reached. */
async function connect(config: DashConfig): Promise<EngineClient> {
  let engine: EngineClient;
  try {
    engine = createEngineClient(config.docker);
  } catch (err: unknown) {
    process.stderr.write(`Warning: could not create Docker client: ${errorMessage(err)} - falling back to mock data\n`);
    logger.warn(`[engine] Client creation failed: ${errorMessage(err)}`);
    return new MockEngineClient();
  }

  try {
    await engine.ping();
    return engine;
  } catch (err: unknown) {
    engine.close();
    process.stderr.write(`Warning: Docker daemon unreachable (${errorMessage(err)}) - falling back to mock data\n`);
    logger.warn(`[engine] Ping failed: ${errorMessage(err)}`);
    return new MockEngineClient();
  }
}

async function main(): Promise<number> {
  let values: Flags;
  try {
    values = parseFlags(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(errorMessage(err));
    help();
    return EXIT_STARTUP;
  }

  if (values.help) {
    help();
    return EXIT_OK;
  }
  if (values.version) {
    console.log(`docker-dash ${VERSION}`);
    return EXIT_OK;
  }

  const configPath = values.config || defaultConfigPath();
  let config: DashConfig;
  try {
    config = applyFlags(await loadConfig(configPath), {
      dockerHost: values["docker.host"],
      identityFile: values["docker.identity-file"],
      refreshInterval: values["refresh.interval"],
    });
  } catch (err: unknown) {
    console.error(`Error loading config ${configPath}: ${errorMessage(err)}`);
    return EXIT_STARTUP;
  }

  const engine = await connect(config);
  try {
    await runTui(new App(engine, { refreshInterval: config.refresh.interval }));
    return EXIT_OK;
  } catch (err: unknown) {
    logger.error(`[ui] Program failed: ${errorMessage(err)}`);
    console.error(`Error: ${errorMessage(err)}`);
    return EXIT_STARTUP;
  } finally {
    engine.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(EXIT_STARTUP);
  },
);
